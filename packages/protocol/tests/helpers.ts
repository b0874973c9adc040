/**
 * Shared fixtures for protocol tests: a manual clock, a counting policy
 * and a one-field action.
 */

import { z } from "zod";
import type { Clock, Timestamp } from "@covenant/types";
import { Account } from "../src/account.js";
import { defineAction } from "../src/actions.js";
import type { Auth } from "../src/auth.js";
import { Deps } from "../src/deps.js";
import { ACCOUNT_PROTOCOL, Extensions } from "../src/extensions.js";
import type { AdminCap } from "../src/extensions.js";
import { newParams } from "../src/intent.js";
import type { Intent } from "../src/intent.js";
import { silentLogger } from "../src/logger.js";
import { APPROVED, rejected } from "../src/policy.js";
import type { AccountPolicy } from "../src/policy.js";
import { PROTOCOL_ADDRESS } from "../src/version.js";
import { defineWitness, versionWitness } from "../src/witness.js";

export class ManualClock implements Clock {
  constructor(private time: Timestamp = 0) {}

  now(): Timestamp {
    return this.time;
  }

  set(time: Timestamp): void {
    this.time = time;
  }
}

// ─── Test policy package ────────────────────────────────────────────

export const POLICY_NAME = "TestPolicy";
export const POLICY_ADDRESS = "0xbeef";
export const POLICY_VERSION = versionWitness(POLICY_ADDRESS, 1);
export const ConfigWitness = defineWitness(POLICY_ADDRESS, "policy", "Witness");

export const PayIntent = defineWitness(POLICY_ADDRESS, "payments", "PayIntent");
export const OtherIntent = defineWitness(POLICY_ADDRESS, "payments", "OtherIntent");

export interface TestConfig {
  readonly threshold: number;
}

export interface TestOutcome {
  readonly approvals: number;
}

export const testPolicy: AccountPolicy<TestConfig, TestOutcome> = {
  configWitnessType: ConfigWitness.type,
  name: "test",
  validate(outcome, config) {
    return outcome.approvals >= config.threshold
      ? APPROVED
      : rejected(new Error(`${outcome.approvals} of ${config.threshold} approvals`));
  },
};

export const ValueAction = defineAction("payments::Value", z.object({ value: z.number().int() }));
export const NoteAction = defineAction("payments::Note", z.object({ text: z.string() }));

export type TestAccount = Account<TestConfig, TestOutcome>;

// ─── Setup ──────────────────────────────────────────────────────────

export function setupExtensions(): { extensions: Extensions; cap: AdminCap } {
  const { extensions, cap } = Extensions.init();
  extensions.add(cap, ACCOUNT_PROTOCOL, PROTOCOL_ADDRESS, 1);
  extensions.add(cap, POLICY_NAME, POLICY_ADDRESS, 1);
  return { extensions, cap };
}

export function newTestAccount(threshold = 1): TestAccount {
  const { extensions } = setupExtensions();
  return Account.new({
    config: { threshold },
    policy: testPolicy,
    deps: Deps.latest(extensions, [ACCOUNT_PROTOCOL, POLICY_NAME]),
    logger: silentLogger(),
  });
}

export function auth(account: TestAccount): Auth {
  return account.newAuth(POLICY_VERSION, ConfigWitness);
}

export function approve(account: TestAccount, key: string): void {
  account.updateOutcome(key, POLICY_VERSION, ConfigWitness, (o) => ({ approvals: o.approvals + 1 }));
}

export interface ProposeOptions {
  readonly executionTimes?: readonly number[];
  readonly expirationTime?: number;
  readonly values?: readonly number[];
}

/**
 * Create a draft with one Value action per entry of `values`.
 */
export function draft(
  account: TestAccount,
  key: string,
  options: ProposeOptions = {},
  clock: Clock = new ManualClock(0),
): Intent<TestOutcome> {
  const params = newParams(
    {
      key,
      description: `intent ${key}`,
      executionTimes: [...(options.executionTimes ?? [0])],
      expirationTime: options.expirationTime ?? 1,
    },
    clock,
  );
  const intent = account.createIntent(
    auth(account),
    params,
    { approvals: 0 },
    "",
    POLICY_VERSION,
    PayIntent,
  );
  for (const value of options.values ?? [1]) {
    intent.addAction(ValueAction, { value }, PayIntent);
  }
  return intent;
}

/**
 * Create and admit an intent in one transaction.
 */
export function propose(
  account: TestAccount,
  key: string,
  options: ProposeOptions = {},
): Intent<TestOutcome> {
  return account.transaction(() => {
    const intent = draft(account, key, options);
    account.addIntent(intent, POLICY_VERSION, PayIntent);
    return intent;
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
