/**
 * Ready-made action batches, one witness per intent kind.
 *
 * Each intent kind has its own witness and request / execute / delete
 * functions. Execute functions process every action, confirm the
 * execution and clean up when it was the last one; callers only obtain
 * the Executable from the account's policy.
 */

import {
  defineWitness,
  deleteWithdraw,
  doWithdraw,
  newWithdraw,
} from "@covenant/protocol";
import type {
  Account,
  Auth,
  Executable,
  Expired,
  Intent,
  IntentParams,
  Witness,
} from "@covenant/protocol";
import { isCoin } from "@covenant/types";
import type { Address, ObjectId } from "@covenant/types";
import {
  deleteBurn,
  deleteDisable,
  deleteMint,
  doBurn,
  doDisable,
  doMint,
  newBurn,
  newDisable,
  newMint,
} from "./currency.js";
import { ActionError } from "./errors.js";
import { deleteTransfer, doTransfer, newTransfer } from "./transfer.js";
import { deleteSpend, doSpend, getVault, newSpend } from "./vault.js";
import { ACTIONS_ADDRESS, ACTIONS_VERSION } from "./version.js";

const WithdrawAndTransferIntent = defineWitness(ACTIONS_ADDRESS, "owned_intents", "WithdrawAndTransferIntent");
const SpendAndTransferIntent = defineWitness(ACTIONS_ADDRESS, "vault_intents", "SpendAndTransferIntent");
const MintAndTransferIntent = defineWitness(ACTIONS_ADDRESS, "currency_intents", "MintAndTransferIntent");
const WithdrawAndBurnIntent = defineWitness(ACTIONS_ADDRESS, "currency_intents", "WithdrawAndBurnIntent");
const DisableRulesIntent = defineWitness(ACTIONS_ADDRESS, "currency_intents", "DisableRulesIntent");

export const ACTIONS_INTENT_TYPES = {
  withdrawAndTransfer: WithdrawAndTransferIntent.type,
  spendAndTransfer: SpendAndTransferIntent.type,
  mintAndTransfer: MintAndTransferIntent.type,
  withdrawAndBurn: WithdrawAndBurnIntent.type,
  disableRules: DisableRulesIntent.type,
} as const;

// =============================================================================
// Withdraw and transfer
// =============================================================================

/**
 * Send objects held by the account, one recipient per object.
 */
export function requestWithdrawAndTransfer<C, O>(
  auth: Auth,
  account: Account<C, O>,
  params: IntentParams,
  outcome: O,
  objectIds: readonly ObjectId[],
  recipients: readonly Address[],
): void {
  assertSameLength(objectIds.length, recipients.length, "object ids", "recipients");
  propose(auth, account, params, outcome, "", WithdrawAndTransferIntent, (intent) => {
    objectIds.forEach((id, i) => {
      newWithdraw(intent, account, id, WithdrawAndTransferIntent);
      newTransfer(intent, recipients[i] ?? "", WithdrawAndTransferIntent);
    });
  });
}

export function executeWithdrawAndTransfer<C, O>(
  executable: Executable,
  account: Account<C, O>,
): void {
  execute(executable, account, WithdrawAndTransferIntent, 2, () => {
    const object = doWithdraw(executable, account, WithdrawAndTransferIntent);
    doTransfer(executable, account, object, WithdrawAndTransferIntent);
  }, (expired) => deleteWithdrawAndTransfer(expired, account));
}

export function deleteWithdrawAndTransfer<C, O>(expired: Expired, account: Account<C, O>): void {
  account.atomic(() => {
    while (!expired.isEmpty) {
      deleteWithdraw(expired, account);
      deleteTransfer(expired);
    }
    expired.destroyEmpty();
  });
}

// =============================================================================
// Spend and transfer
// =============================================================================

/**
 * Pay out of a vault, one coin per recipient. Approved under the vault's role.
 */
export function requestSpendAndTransfer<C, O>(
  auth: Auth,
  account: Account<C, O>,
  params: IntentParams,
  outcome: O,
  vaultName: string,
  coinType: string,
  amounts: readonly bigint[],
  recipients: readonly Address[],
): void {
  assertSameLength(amounts.length, recipients.length, "amounts", "recipients");
  getVault(account, vaultName);
  propose(auth, account, params, outcome, vaultName, SpendAndTransferIntent, (intent) => {
    amounts.forEach((amount, i) => {
      newSpend(intent, vaultName, coinType, amount, SpendAndTransferIntent);
      newTransfer(intent, recipients[i] ?? "", SpendAndTransferIntent);
    });
  });
}

export function executeSpendAndTransfer<C, O>(executable: Executable, account: Account<C, O>): void {
  execute(executable, account, SpendAndTransferIntent, 2, () => {
    const coin = doSpend(executable, account, SpendAndTransferIntent);
    doTransfer(executable, account, coin, SpendAndTransferIntent);
  }, deleteSpendAndTransfer);
}

export function deleteSpendAndTransfer(expired: Expired): void {
  while (!expired.isEmpty) {
    deleteSpend(expired);
    deleteTransfer(expired);
  }
  expired.destroyEmpty();
}

// =============================================================================
// Mint and transfer
// =============================================================================

export function requestMintAndTransfer<C, O>(
  auth: Auth,
  account: Account<C, O>,
  params: IntentParams,
  outcome: O,
  coinType: string,
  amounts: readonly bigint[],
  recipients: readonly Address[],
): void {
  assertSameLength(amounts.length, recipients.length, "amounts", "recipients");
  propose(auth, account, params, outcome, coinType, MintAndTransferIntent, (intent) => {
    amounts.forEach((amount, i) => {
      newMint(intent, account, coinType, amount, MintAndTransferIntent);
      newTransfer(intent, recipients[i] ?? "", MintAndTransferIntent);
    });
  });
}

export function executeMintAndTransfer<C, O>(executable: Executable, account: Account<C, O>): void {
  execute(executable, account, MintAndTransferIntent, 2, () => {
    const coin = doMint(executable, account, MintAndTransferIntent);
    doTransfer(executable, account, coin, MintAndTransferIntent);
  }, deleteMintAndTransfer);
}

export function deleteMintAndTransfer(expired: Expired): void {
  while (!expired.isEmpty) {
    deleteMint(expired);
    deleteTransfer(expired);
  }
  expired.destroyEmpty();
}

// =============================================================================
// Withdraw and burn
// =============================================================================

/**
 * Burn a coin held by the account.
 */
export function requestWithdrawAndBurn<C, O>(
  auth: Auth,
  account: Account<C, O>,
  params: IntentParams,
  outcome: O,
  coinType: string,
  coinId: ObjectId,
  amount: bigint,
): void {
  propose(auth, account, params, outcome, coinType, WithdrawAndBurnIntent, (intent) => {
    newWithdraw(intent, account, coinId, WithdrawAndBurnIntent);
    newBurn(intent, account, coinType, amount, WithdrawAndBurnIntent);
  });
}

export function executeWithdrawAndBurn<C, O>(executable: Executable, account: Account<C, O>): void {
  execute(executable, account, WithdrawAndBurnIntent, 2, () => {
    const object = doWithdraw(executable, account, WithdrawAndBurnIntent);
    if (!isCoin(object)) {
      throw new ActionError("NOT_COIN", `Object ${object.id} is a ${object.type}, not a coin`);
    }
    doBurn(executable, account, object, WithdrawAndBurnIntent);
  }, (expired) => deleteWithdrawAndBurn(expired, account));
}

export function deleteWithdrawAndBurn<C, O>(expired: Expired, account: Account<C, O>): void {
  account.atomic(() => {
    deleteWithdraw(expired, account);
    deleteBurn(expired);
    expired.destroyEmpty();
  });
}

// =============================================================================
// Disable rules
// =============================================================================

export function requestDisableRules<C, O>(
  auth: Auth,
  account: Account<C, O>,
  params: IntentParams,
  outcome: O,
  coinType: string,
  flags: { readonly mint: boolean; readonly burn: boolean },
): void {
  propose(auth, account, params, outcome, coinType, DisableRulesIntent, (intent) => {
    newDisable(intent, account, coinType, flags, DisableRulesIntent);
  });
}

export function executeDisableRules<C, O>(executable: Executable, account: Account<C, O>): void {
  execute(executable, account, DisableRulesIntent, 1, () => {
    doDisable(executable, account, DisableRulesIntent);
  }, deleteDisableRules);
}

export function deleteDisableRules(expired: Expired): void {
  deleteDisable(expired);
  expired.destroyEmpty();
}

// =============================================================================
// Private
// =============================================================================

function propose<C, O>(
  auth: Auth,
  account: Account<C, O>,
  params: IntentParams,
  outcome: O,
  roleName: string,
  witness: Witness,
  build: (intent: Intent<O>) => void,
): void {
  account.atomic(() => {
    const intent = account.createIntent(auth, params, outcome, roleName, ACTIONS_VERSION, witness);
    build(intent);
    account.addIntent(intent, ACTIONS_VERSION, witness);
  });
}

/**
 * Run `step` once per group of `groupSize` actions, then confirm.
 */
function execute<C, O>(
  executable: Executable,
  account: Account<C, O>,
  witness: Witness,
  groupSize: number,
  step: () => void,
  cleanup: (expired: Expired) => void,
): void {
  account.atomic(() => {
    const total = account.intents.get(executable.intentKey).actionCount;
    while (executable.actionIdx + groupSize <= total) {
      step();
    }
    const expired = account.confirmExecution(executable, witness);
    if (expired !== undefined) {
      cleanup(expired);
    }
  });
}

function assertSameLength(a: number, b: number, left: string, right: string): void {
  if (a !== b) {
    throw new ActionError("NOT_SAME_LENGTH", `Got ${a} ${left} and ${b} ${right}`);
  }
}
