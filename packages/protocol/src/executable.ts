/**
 * Single-use proof that an intent was approved and is due.
 *
 * States: created (idx 0) → next_action* → exhausted → settled.
 *
 * `nextAction` never checks the bound; `Account.confirmExecution` is the
 * one place that asserts every action was visited.
 */

import type { Issuer } from "./issuer.js";
import { LinearResource, assertCore } from "./resource.js";
import type { CoreKey } from "./resource.js";

export class Executable extends LinearResource {
  readonly resourceKind = "executable" as const;
  readonly issuer: Issuer;
  private _actionIdx = 0;

  /** @internal created by Account.executeIntent */
  constructor(issuer: Issuer) {
    super();
    this.issuer = issuer;
  }

  get intentKey(): string {
    return this.issuer.intentKey;
  }

  /** Index of the next action to process. */
  get actionIdx(): number {
    return this._actionIdx;
  }

  describe(): string {
    return `Executable for intent '${this.issuer.intentKey}'`;
  }

  /**
   * Return the current index, then advance by one.
   */
  nextAction(key: CoreKey): number {
    assertCore(key);
    this.assertLive();
    const idx = this._actionIdx;
    this._actionIdx = idx + 1;
    return idx;
  }

  /** Rollback of nextAction */
  rewind(key: CoreKey): void {
    assertCore(key);
    if (this._actionIdx > 0) {
      this._actionIdx--;
    }
  }
}
