/**
 * Linear resources.
 *
 * Auth, un-admitted intents, executables and expired bags must be used up
 * by an explicit call before the transaction that created them ends.
 * Nothing here relies on garbage collection: the owning transaction checks
 * every resource it handed out when it closes, and revokes them if it
 * rolls back.
 *
 * State changes take the `CORE` key. It is shared by the modules of this
 * package and left out of the package entry point, so only the account
 * core and the resources themselves move a resource between states.
 */

import { ProtocolError } from "./errors.js";

export const CORE: unique symbol = Symbol("covenant.core");
export type CoreKey = typeof CORE;

export type ResourceKind = "auth" | "intent" | "executable" | "expired";

export type ResourceState = "live" | "settled" | "revoked";

export function assertCore(key: CoreKey): void {
  if (key !== CORE) {
    throw new ProtocolError("WRONG_WITNESS", "State changes are reserved to the account core");
  }
}

export abstract class LinearResource {
  abstract readonly resourceKind: ResourceKind;

  private _state: ResourceState = "live";

  get state(): ResourceState {
    return this._state;
  }

  get settled(): boolean {
    return this._state === "settled";
  }

  /** Human-readable label used in error messages */
  abstract describe(): string;

  /**
   * Linear resources cannot be persisted between calls.
   */
  toJSON(): never {
    throw new ProtocolError(
      "NOT_STORABLE",
      `${this.describe()} cannot be serialized`,
    );
  }

  assertLive(): void {
    if (this._state !== "live") {
      throw new ProtocolError(
        "RESOURCE_CONSUMED",
        `${this.describe()} is already ${this._state}`,
      );
    }
  }

  settle(key: CoreKey): void {
    assertCore(key);
    this.assertLive();
    this._state = "settled";
  }

  /** Rollback of settle() */
  reopen(key: CoreKey): void {
    assertCore(key);
    if (this._state === "settled") {
      this._state = "live";
    }
  }

  revoke(key: CoreKey): void {
    assertCore(key);
    if (this._state === "live") {
      this._state = "revoked";
    }
  }
}
