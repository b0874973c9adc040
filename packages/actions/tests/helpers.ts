/**
 * Shared fixtures for action tests: multisig accounts with the actions
 * package in their deps.
 */

import {
  ACCOUNT_PROTOCOL,
  Extensions,
  PROTOCOL_ADDRESS,
  newParams,
  silentLogger,
} from "@covenant/protocol";
import type { Executable, IntentParams } from "@covenant/protocol";
import {
  MULTISIG_ADDRESS,
  MULTISIG_NAME,
  approveIntent,
  authenticate,
  emptyApprovals,
  executeConfigMultisig,
  executeIntent,
  newAccount,
  requestConfigMultisig,
} from "@covenant/multisig";
import type { MultisigAccount, MultisigRulesInput } from "@covenant/multisig";
import type { Clock, Coin, Timestamp, TreasuryCap } from "@covenant/types";
import { ACTIONS_ADDRESS, ACTIONS_NAME } from "../src/version.js";

export const CREATOR = "0xc0ffee";
export const ALICE = "0xa11ce";
export const BOB = "0xb0b";
export const CAROL = "0xca201";

export const USD = "0x2::usd::USD";

export class ManualClock implements Clock {
  constructor(private time: Timestamp = 0) {}

  now(): Timestamp {
    return this.time;
  }

  set(time: Timestamp): void {
    this.time = time;
  }
}

export function newTreasury(): MultisigAccount {
  const { extensions, cap } = Extensions.init();
  extensions.add(cap, ACCOUNT_PROTOCOL, PROTOCOL_ADDRESS, 1);
  extensions.add(cap, MULTISIG_NAME, MULTISIG_ADDRESS, 1);
  extensions.add(cap, ACTIONS_NAME, ACTIONS_ADDRESS, 1);
  return newAccount(extensions, { creator: CREATOR, logger: silentLogger() });
}

export function params(
  key: string,
  clock: Clock = new ManualClock(0),
  expirationTime = 10,
): IntentParams {
  return newParams({ key, description: `intent ${key}`, executionTimes: [0], expirationTime }, clock);
}

export function coin(id: string, value: bigint, coinType = USD): Coin {
  return { id, type: "coin", coinType, value };
}

export function treasuryCap(totalSupply = 0n, coinType = USD): TreasuryCap {
  return { id: "0xcab", type: "treasury_cap", coinType, totalSupply };
}

/**
 * Approve `key` as `approvers` and run `body` on its executable in one
 * transaction.
 */
export function approveAndRun(
  account: MultisigAccount,
  key: string,
  body: (executable: Executable) => void,
  approvers: readonly string[] = [CREATOR],
  clock: Clock = new ManualClock(0),
): void {
  for (const approver of approvers) approveIntent(account, key, approver);
  account.transaction(() => {
    body(executeIntent(account, key, clock));
  });
}

/** Replace the rules while CREATOR alone can approve. */
export function reconfigure(account: MultisigAccount, rules: MultisigRulesInput): void {
  requestConfigMultisig(authenticate(account, CREATOR), account, params("setup"), emptyApprovals(), rules);
  approveAndRun(account, "setup", (executable) => executeConfigMultisig(executable, account));
}

/**
 * Run `fn` and return the `code` of the error it throws.
 */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
      return err.code;
    }
    throw err;
  }
  return undefined;
}
