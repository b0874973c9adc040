/**
 * Multisig — weighted-threshold approval policy.
 *
 * An intent may execute once the approving members' total weight reaches
 * the global threshold, or once the weight of approvers holding the
 * intent's role reaches that role's threshold.
 *
 * The verdict is taken again at every scheduled execution of an intent,
 * against the config in force at that time: approvals are weighed by the
 * current members, so a removed member's approval no longer counts.
 */

import {
  ACCOUNT_PROTOCOL,
  APPROVED,
  Account,
  Deps,
  Metadata,
  defineWitness,
  rejected,
  versionWitness,
} from "@covenant/protocol";
import type {
  AccountJournal,
  AccountPolicy,
  Auth,
  Executable,
  Extensions,
  Logger,
  ObjectStore,
} from "@covenant/protocol";
import type { Address, Clock } from "@covenant/types";
import { MultisigError } from "./errors.js";
import { Approvals, noApprovals, withApproval, withoutApproval } from "./approvals.js";
import { getMember, getRole, isMember } from "./rules.js";
import type { MultisigConfig } from "./types.js";

// =============================================================================
// Identity
// =============================================================================

export const MULTISIG_NAME = "AccountMultisig";
export const MULTISIG_ADDRESS: Address = "0xac02";
export const MULTISIG_VERSION_NUMBER = 1;
export const MULTISIG_VERSION = versionWitness(MULTISIG_ADDRESS, MULTISIG_VERSION_NUMBER);

/** Deps added to new accounts when they are on the allow-list. */
const OPTIONAL_DEPS = ["AccountActions"] as const;

/** Config witness. Left out of the package entry point. */
export const ConfigWitness = defineWitness(MULTISIG_ADDRESS, "multisig", "Witness");

export type MultisigAccount = Account<MultisigConfig, Approvals>;

// =============================================================================
// Policy
// =============================================================================

export const multisigPolicy: AccountPolicy<MultisigConfig, Approvals> = {
  configWitnessType: ConfigWitness.type,
  name: "multisig",
  validate(outcome, config, role) {
    if (!(outcome instanceof Approvals)) {
      return rejected(new MultisigError("THRESHOLD_NOT_REACHED", "Outcome is not a multisig approval set"));
    }
    const { totalWeight, roleWeight } = outcome.weights(config, role);
    if (totalWeight >= config.global) {
      return APPROVED;
    }
    const configured = getRole(config, role);
    if (configured !== undefined && roleWeight >= configured.threshold) {
      return APPROVED;
    }
    return rejected(
      new MultisigError(
        "THRESHOLD_NOT_REACHED",
        configured === undefined
          ? `Approved weight ${totalWeight} is below the global threshold ${config.global}`
          : `Approved weight ${totalWeight} is below the global threshold ${config.global} and role weight ${roleWeight} is below ${configured.threshold}`,
      ),
    );
  },
};

export function emptyApprovals(): Approvals {
  return noApprovals();
}

// =============================================================================
// Account
// =============================================================================

export interface NewMultisigOptions {
  readonly creator: Address;
  readonly address?: Address;
  readonly metadata?: Metadata;
  readonly objects?: ObjectStore;
  readonly logger?: Logger;
  readonly journal?: AccountJournal;
}

/**
 * Create an account whose only member is its creator.
 *
 * Deps are the latest allow-listed protocol and multisig, plus the
 * actions package when it is allow-listed.
 */
export function newAccount(extensions: Extensions, options: NewMultisigOptions): MultisigAccount {
  const listed = new Set(extensions.list().map((e) => e.name));
  const names = [
    ACCOUNT_PROTOCOL,
    MULTISIG_NAME,
    ...OPTIONAL_DEPS.filter((name) => listed.has(name)),
  ];

  const config: MultisigConfig = {
    members: [{ addr: options.creator, weight: 1, roles: [] }],
    global: 1,
    roles: [],
  };

  return Account.new({
    config,
    policy: multisigPolicy,
    deps: Deps.latest(extensions, names),
    metadata: options.metadata ?? Metadata.empty(),
    ...(options.address !== undefined ? { address: options.address } : {}),
    ...(options.objects !== undefined ? { objects: options.objects } : {}),
    ...(options.logger !== undefined ? { logger: options.logger } : {}),
    ...(options.journal !== undefined ? { journal: options.journal } : {}),
  });
}

/**
 * Issue an Auth to a member of the account.
 */
export function authenticate(account: MultisigAccount, sender: Address): Auth {
  if (!isMember(account.config, sender)) {
    throw new MultisigError("NOT_MEMBER", `${sender} is not a member of ${account.address}`);
  }
  return account.newAuth(MULTISIG_VERSION, ConfigWitness);
}

// =============================================================================
// Approvals
// =============================================================================

export function approveIntent(account: MultisigAccount, key: string, sender: Address): Approvals {
  getMember(account.config, sender);

  return account.updateOutcome(key, MULTISIG_VERSION, ConfigWitness, (outcome) => {
    if (outcome.includes(sender)) {
      throw new MultisigError("ALREADY_APPROVED", `${sender} already approved '${key}'`);
    }
    return withApproval(outcome, sender);
  });
}

/**
 * Withdraw an approval. Open to anyone who approved, including members
 * removed since.
 */
export function disapproveIntent(account: MultisigAccount, key: string, sender: Address): Approvals {
  return account.updateOutcome(key, MULTISIG_VERSION, ConfigWitness, (outcome) => {
    if (!outcome.includes(sender)) {
      throw new MultisigError("NOT_APPROVED", `${sender} has not approved '${key}'`);
    }
    return withoutApproval(outcome, sender);
  });
}

/**
 * Start an execution of an approved, due intent.
 */
export function executeIntent(account: MultisigAccount, key: string, clock: Clock): Executable {
  return account.executeIntent(key, clock, MULTISIG_VERSION).executable;
}
