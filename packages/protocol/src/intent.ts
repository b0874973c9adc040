/**
 * Intent — a proposed, named batch of ordered actions.
 *
 * Lifecycle:
 *   created (draft) → actions appended → admitted to the registry (sealed)
 *   → approved by the policy (outcome updates) → executed once per
 *   scheduled time → destroyed, or deleted after expiry.
 *
 * Rules:
 * - execution times are non-empty and strictly ascending at creation
 * - actions are append-only and only before admission
 * - the outcome is replaced, never mutated in place
 */

import { z } from "zod";
import type { Clock, Timestamp } from "@covenant/types";
import { encodeAction } from "./actions.js";
import type { ActionEntry, ActionSpec } from "./actions.js";
import { ProtocolError } from "./errors.js";
import type { Issuer } from "./issuer.js";
import { LinearResource, assertCore } from "./resource.js";
import type { CoreKey } from "./resource.js";
import type { Witness } from "./witness.js";

// =============================================================================
// Params
// =============================================================================

const TimestampSchema = z.number().int().nonnegative();

export const IntentParamsInputSchema = z.object({
  key: z.string().min(1),
  description: z.string(),
  executionTimes: z.array(TimestampSchema),
  expirationTime: TimestampSchema,
});

export type IntentParamsInput = z.input<typeof IntentParamsInputSchema>;

export interface IntentParams {
  readonly key: string;
  readonly description: string;
  readonly executionTimes: readonly Timestamp[];
  readonly expirationTime: Timestamp;
  readonly creationTime: Timestamp;
}

/**
 * Shape-check caller input and stamp the creation time.
 *
 * Ordering of execution times is checked by `newIntent`.
 */
export function newParams(input: IntentParamsInput, clock: Clock): IntentParams {
  const parsed = IntentParamsInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ProtocolError("INVALID_PARAMS", "Invalid intent params", {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return { ...parsed.data, creationTime: clock.now() };
}

// =============================================================================
// Intent
// =============================================================================

export class Intent<Outcome> extends LinearResource {
  readonly resourceKind = "intent" as const;

  readonly issuer: Issuer;
  readonly key: string;
  readonly description: string;
  readonly expirationTime: Timestamp;
  readonly creationTime: Timestamp;
  readonly role: string;

  private _executionTimes: Timestamp[];
  private _actions: ActionEntry[] = [];
  private _outcome: Outcome;

  /** @internal use newIntent */
  constructor(issuer: Issuer, params: IntentParams, role: string, outcome: Outcome) {
    super();
    this.issuer = issuer;
    this.key = params.key;
    this.description = params.description;
    this.expirationTime = params.expirationTime;
    this.creationTime = params.creationTime;
    this.role = role;
    this._executionTimes = [...params.executionTimes];
    this._outcome = outcome;
  }

  get executionTimes(): readonly Timestamp[] {
    return this._executionTimes;
  }

  get actions(): readonly ActionEntry[] {
    return this._actions;
  }

  get actionCount(): number {
    return this._actions.length;
  }

  get outcome(): Outcome {
    return this._outcome;
  }

  /** True once admitted to a registry. */
  get sealed(): boolean {
    return this.state !== "live";
  }

  describe(): string {
    return `Intent '${this.key}'`;
  }

  /**
   * Append an action at the next index.
   */
  addAction<T>(spec: ActionSpec<T>, payload: T, witness: Witness): void {
    this.assertDraft();
    this.issuer.assertIsIntent(witness);
    this._actions.push(encodeAction(spec, this._actions.length, payload));
  }

  assertDraft(): void {
    if (this.sealed) {
      throw new ProtocolError(
        "INTENT_ALREADY_ADDED",
        `Intent '${this.key}' can no longer be modified`,
      );
    }
  }

  /**
   * Remove and return the earliest scheduled execution time.
   */
  popFrontExecutionTime(key: CoreKey): Timestamp {
    assertCore(key);
    const front = this._executionTimes.shift();
    if (front === undefined) {
      throw new ProtocolError(
        "NO_EXECUTION_TIME",
        `Intent '${this.key}' has no execution time left`,
      );
    }
    return front;
  }

  /** Rollback of popFrontExecutionTime */
  restoreFrontExecutionTime(key: CoreKey, time: Timestamp): void {
    assertCore(key);
    this._executionTimes.unshift(time);
  }

  replaceOutcome(key: CoreKey, outcome: Outcome): void {
    assertCore(key);
    this._outcome = outcome;
  }
}

/**
 * Build an intent record after checking its schedule.
 */
export function newIntent<Outcome>(
  issuer: Issuer,
  params: IntentParams,
  role: string,
  outcome: Outcome,
): Intent<Outcome> {
  const times = params.executionTimes;
  if (times.length === 0) {
    throw new ProtocolError(
      "NO_EXECUTION_TIME",
      `Intent '${params.key}' needs at least one execution time`,
    );
  }
  for (let i = 1; i < times.length; i++) {
    const prev = times[i - 1];
    const current = times[i];
    if (prev === undefined || current === undefined || current <= prev) {
      throw new ProtocolError(
        "EXECUTION_TIMES_NOT_ASCENDING",
        `Execution times of intent '${params.key}' must be strictly ascending`,
        { executionTimes: [...times] },
      );
    }
  }
  return new Intent(issuer, params, role, outcome);
}
