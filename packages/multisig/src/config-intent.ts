/**
 * Multisig config intent — replace members, weights, roles and thresholds.
 */

import { defineAction, defineWitness } from "@covenant/protocol";
import type { Auth, Executable, Expired, IntentParams } from "@covenant/protocol";
import type { Approvals } from "./approvals.js";
import { ConfigWitness, MULTISIG_ADDRESS, MULTISIG_VERSION } from "./multisig.js";
import type { MultisigAccount } from "./multisig.js";
import { newConfig, verifyRules } from "./rules.js";
import { MultisigConfigSchema } from "./types.js";
import type { MultisigRulesInput } from "./types.js";

const ConfigMultisigIntent = defineWitness(MULTISIG_ADDRESS, "config", "ConfigMultisigIntent");

export const ConfigMultisigAction = defineAction(
  "multisig::ConfigMultisig",
  MultisigConfigSchema,
);

export const CONFIG_MULTISIG_INTENT_TYPE = ConfigMultisigIntent.type;

export function requestConfigMultisig(
  auth: Auth,
  account: MultisigAccount,
  params: IntentParams,
  outcome: Approvals,
  rules: MultisigRulesInput,
): void {
  const config = newConfig(rules);
  account.atomic(() => {
    const intent = account.createIntent(
      auth,
      params,
      outcome,
      "",
      MULTISIG_VERSION,
      ConfigMultisigIntent,
    );
    intent.addAction(
      ConfigMultisigAction,
      {
        members: config.members.map((m) => ({ addr: m.addr, weight: m.weight, roles: [...m.roles] })),
        global: config.global,
        roles: config.roles.map((r) => ({ name: r.name, threshold: r.threshold })),
      },
      ConfigMultisigIntent,
    );
    account.addIntent(intent, MULTISIG_VERSION, ConfigMultisigIntent);
  });
}

export function executeConfigMultisig(executable: Executable, account: MultisigAccount): void {
  account.atomic(() => {
    const config = account.processAction(
      executable,
      ConfigMultisigAction,
      MULTISIG_VERSION,
      ConfigMultisigIntent,
    );
    verifyRules(config);
    account.updateConfig(MULTISIG_VERSION, ConfigWitness, () => config);
    const expired = account.confirmExecution(executable, ConfigMultisigIntent);
    if (expired !== undefined) {
      deleteConfigMultisig(expired);
    }
  });
}

export function deleteConfigMultisig(expired: Expired): void {
  expired.removeAction(ConfigMultisigAction);
  expired.destroyEmpty();
}
