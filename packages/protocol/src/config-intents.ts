/**
 * Account config intents.
 *
 * Intents that change the account itself rather than its policy state:
 * metadata, the Deps list, and whether unverified deps are allowed.
 * Each kind has its own intent witness; none of them is handed out.
 */

import { z } from "zod";
import type { Account } from "./account.js";
import { defineAction } from "./actions.js";
import type { ActionSpec } from "./actions.js";
import type { Auth } from "./auth.js";
import { Deps } from "./deps.js";
import type { Executable } from "./executable.js";
import type { Expired } from "./expired.js";
import type { Extensions } from "./extensions.js";
import type { IntentParams } from "./intent.js";
import { Metadata } from "./metadata.js";
import { PROTOCOL_ADDRESS, PROTOCOL_VERSION } from "./version.js";
import { defineWitness } from "./witness.js";
import type { Witness } from "./witness.js";

// =============================================================================
// Witnesses & actions
// =============================================================================

const ConfigMetadataIntent = defineWitness(PROTOCOL_ADDRESS, "config", "ConfigMetadataIntent");
const ConfigDepsIntent = defineWitness(PROTOCOL_ADDRESS, "config", "ConfigDepsIntent");
const ToggleUnverifiedAllowedIntent = defineWitness(
  PROTOCOL_ADDRESS,
  "config",
  "ToggleUnverifiedAllowedIntent",
);

export const ConfigMetadataAction = defineAction(
  "config::ConfigMetadata",
  z.object({ keys: z.array(z.string()), values: z.array(z.string()) }),
);

export const ConfigDepsAction = defineAction(
  "config::ConfigDeps",
  z.object({
    names: z.array(z.string()),
    addresses: z.array(z.string()),
    versions: z.array(z.number().int().nonnegative()),
  }),
);

export const ToggleUnverifiedAllowedAction = defineAction(
  "config::ToggleUnverifiedAllowed",
  z.object({}),
);

export const CONFIG_INTENT_TYPES = {
  metadata: ConfigMetadataIntent.type,
  deps: ConfigDepsIntent.type,
  toggleUnverifiedAllowed: ToggleUnverifiedAllowedIntent.type,
} as const;

// =============================================================================
// Metadata
// =============================================================================

export function requestConfigMetadata<C, O>(
  auth: Auth,
  account: Account<C, O>,
  params: IntentParams,
  outcome: O,
  keys: readonly string[],
  values: readonly string[],
): void {
  Metadata.fromKeysValues(keys, values);
  propose(auth, account, params, outcome, ConfigMetadataIntent, ConfigMetadataAction, {
    keys: [...keys],
    values: [...values],
  });
}

export function executeConfigMetadata<C, O>(
  executable: Executable,
  account: Account<C, O>,
): void {
  account.atomic(() => {
    const { keys, values } = account.processAction(
      executable,
      ConfigMetadataAction,
      PROTOCOL_VERSION,
      ConfigMetadataIntent,
    );
    account.setMetadata(Metadata.fromKeysValues(keys, values), PROTOCOL_VERSION);
    const expired = account.confirmExecution(executable, ConfigMetadataIntent);
    if (expired !== undefined) {
      deleteConfigMetadata(expired);
    }
  });
}

export function deleteConfigMetadata(expired: Expired): void {
  expired.removeAction(ConfigMetadataAction);
  expired.destroyEmpty();
}

// =============================================================================
// Deps
// =============================================================================

/**
 * Propose a new Deps list. It is checked against the allow-list now and
 * again when the intent executes, since either may change in between.
 */
export function requestConfigDeps<C, O>(
  auth: Auth,
  account: Account<C, O>,
  extensions: Extensions,
  params: IntentParams,
  outcome: O,
  names: readonly string[],
  addresses: readonly string[],
  versions: readonly number[],
): void {
  Deps.new(extensions, account.deps.unverifiedAllowed, names, addresses, versions);
  propose(auth, account, params, outcome, ConfigDepsIntent, ConfigDepsAction, {
    names: [...names],
    addresses: [...addresses],
    versions: [...versions],
  });
}

export function executeConfigDeps<C, O>(
  executable: Executable,
  account: Account<C, O>,
  extensions: Extensions,
): void {
  account.atomic(() => {
    const { names, addresses, versions } = account.processAction(
      executable,
      ConfigDepsAction,
      PROTOCOL_VERSION,
      ConfigDepsIntent,
    );
    const deps = Deps.new(extensions, account.deps.unverifiedAllowed, names, addresses, versions);
    account.setDeps(deps, PROTOCOL_VERSION);
    const expired = account.confirmExecution(executable, ConfigDepsIntent);
    if (expired !== undefined) {
      deleteConfigDeps(expired);
    }
  });
}

export function deleteConfigDeps(expired: Expired): void {
  expired.removeAction(ConfigDepsAction);
  expired.destroyEmpty();
}

// =============================================================================
// Toggle unverified deps
// =============================================================================

export function requestToggleUnverifiedAllowed<C, O>(
  auth: Auth,
  account: Account<C, O>,
  params: IntentParams,
  outcome: O,
): void {
  propose(
    auth,
    account,
    params,
    outcome,
    ToggleUnverifiedAllowedIntent,
    ToggleUnverifiedAllowedAction,
    {},
  );
}

export function executeToggleUnverifiedAllowed<C, O>(
  executable: Executable,
  account: Account<C, O>,
): void {
  account.atomic(() => {
    account.processAction(
      executable,
      ToggleUnverifiedAllowedAction,
      PROTOCOL_VERSION,
      ToggleUnverifiedAllowedIntent,
    );
    account.setDeps(
      account.deps.withUnverifiedAllowed(!account.deps.unverifiedAllowed),
      PROTOCOL_VERSION,
    );
    const expired = account.confirmExecution(executable, ToggleUnverifiedAllowedIntent);
    if (expired !== undefined) {
      deleteToggleUnverifiedAllowed(expired);
    }
  });
}

export function deleteToggleUnverifiedAllowed(expired: Expired): void {
  expired.removeAction(ToggleUnverifiedAllowedAction);
  expired.destroyEmpty();
}

// =============================================================================
// Private
// =============================================================================

function propose<C, O, T>(
  auth: Auth,
  account: Account<C, O>,
  params: IntentParams,
  outcome: O,
  witness: Witness,
  spec: ActionSpec<T>,
  payload: T,
): void {
  account.atomic(() => {
    const intent = account.createIntent(auth, params, outcome, "", PROTOCOL_VERSION, witness);
    intent.addAction(spec, payload, witness);
    account.addIntent(intent, PROTOCOL_VERSION, witness);
  });
}
