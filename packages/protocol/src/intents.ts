/**
 * Intents — the per-account registry of live intents.
 *
 * Holds live intents in admission order plus the set of object IDs
 * reserved by pending intents.
 *
 * Invariants:
 * - at most one live intent per key
 * - an object ID is locked by at most one live intent
 * - lock / unlock are not idempotent: a double call is a bug and throws
 *
 * The registry never reads a clock. Execution and expiry gates live in
 * the account core.
 */

import type { ObjectId } from "@covenant/types";
import { ProtocolError } from "./errors.js";
import type { Intent } from "./intent.js";

/**
 * Read-only view handed out by the account.
 */
export interface IntentsView<Outcome> {
  get(key: string): Intent<Outcome>;
  has(key: string): boolean;
  keys(): readonly string[];
  values(): readonly Intent<Outcome>[];
  readonly size: number;
  isLocked(id: ObjectId): boolean;
  lockedIds(): readonly ObjectId[];
}

export class Intents<Outcome> implements IntentsView<Outcome> {
  private _inner = new Map<string, Intent<Outcome>>();
  private readonly _locked = new Set<ObjectId>();

  // ───────────────────────────────────────────────────────────────────────
  // Intents
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Admit an intent. Sole entry point into the live registry.
   */
  add(intent: Intent<Outcome>): void {
    if (this._inner.has(intent.key)) {
      throw new ProtocolError(
        "KEY_ALREADY_EXISTS",
        `Intent '${intent.key}' already exists`,
      );
    }
    this._inner.set(intent.key, intent);
  }

  get(key: string): Intent<Outcome> {
    const intent = this._inner.get(key);
    if (intent === undefined) {
      throw new ProtocolError("INTENT_NOT_FOUND", `Intent '${key}' not found`);
    }
    return intent;
  }

  has(key: string): boolean {
    return this._inner.has(key);
  }

  keys(): readonly string[] {
    return [...this._inner.keys()];
  }

  values(): readonly Intent<Outcome>[] {
    return [...this._inner.values()];
  }

  get size(): number {
    return this._inner.size;
  }

  /**
   * Remove an intent and return its position, for callers that may need
   * to put it back.
   */
  remove(key: string): { readonly intent: Intent<Outcome>; readonly position: number } {
    const intent = this.get(key);
    const position = [...this._inner.keys()].indexOf(key);
    this._inner.delete(key);
    return { intent, position };
  }

  /**
   * Put a removed intent back at its former position.
   *
   * @internal rollback only
   */
  restore(intent: Intent<Outcome>, position: number): void {
    const entries = [...this._inner.entries()];
    entries.splice(position, 0, [intent.key, intent]);
    this._inner = new Map(entries);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Locks
  // ───────────────────────────────────────────────────────────────────────

  lock(id: ObjectId): void {
    if (this._locked.has(id)) {
      throw new ProtocolError(
        "OBJECT_ALREADY_LOCKED",
        `Object ${id} is already locked by a pending intent`,
      );
    }
    this._locked.add(id);
  }

  unlock(id: ObjectId): void {
    if (!this._locked.has(id)) {
      throw new ProtocolError("OBJECT_NOT_LOCKED", `Object ${id} is not locked`);
    }
    this._locked.delete(id);
  }

  isLocked(id: ObjectId): boolean {
    return this._locked.has(id);
  }

  lockedIds(): readonly ObjectId[] {
    return [...this._locked];
  }
}
