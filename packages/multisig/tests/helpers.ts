/**
 * Shared fixtures for multisig tests.
 */

import {
  ACCOUNT_PROTOCOL,
  Extensions,
  PROTOCOL_ADDRESS,
  newParams,
  silentLogger,
} from "@covenant/protocol";
import type { IntentParams } from "@covenant/protocol";
import type { Clock, Timestamp } from "@covenant/types";
import { requestConfigMultisig, executeConfigMultisig } from "../src/config-intent.js";
import {
  MULTISIG_ADDRESS,
  MULTISIG_NAME,
  approveIntent,
  emptyApprovals,
  executeIntent,
  authenticate,
  newAccount,
} from "../src/multisig.js";
import type { MultisigAccount } from "../src/multisig.js";
import type { MultisigRulesInput } from "../src/types.js";

export const CREATOR = "0xc1";
export const ALICE = "0xa11ce";
export const BOB = "0xb0b";
export const CAROL = "0xca201";

export class ManualClock implements Clock {
  constructor(private time: Timestamp = 0) {}

  now(): Timestamp {
    return this.time;
  }

  set(time: Timestamp): void {
    this.time = time;
  }
}

export function setupExtensions(): Extensions {
  const { extensions, cap } = Extensions.init();
  extensions.add(cap, ACCOUNT_PROTOCOL, PROTOCOL_ADDRESS, 1);
  extensions.add(cap, MULTISIG_NAME, MULTISIG_ADDRESS, 1);
  return extensions;
}

export function newMultisig(): MultisigAccount {
  return newAccount(setupExtensions(), { creator: CREATOR, logger: silentLogger() });
}

export function params(
  key: string,
  clock: Clock = new ManualClock(0),
  expirationTime = 10,
): IntentParams {
  return newParams({ key, description: `intent ${key}`, executionTimes: [0], expirationTime }, clock);
}

/**
 * Propose, approve and execute a new rule set while CREATOR alone can
 * approve it.
 */
export function reconfigure(account: MultisigAccount, rules: MultisigRulesInput): void {
  const clock = new ManualClock(0);
  requestConfigMultisig(authenticate(account, CREATOR), account, params("setup"), emptyApprovals(), rules);
  approveIntent(account, "setup", CREATOR);
  account.transaction(() => {
    executeConfigMultisig(executeIntent(account, "setup", clock), account);
  });
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
