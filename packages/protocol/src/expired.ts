/**
 * Leftover actions of a destroyed or expired intent.
 *
 * Each action module pops and disposes of its own actions, in order.
 * The bag cannot be destroyed while anything is left in it, so a locked
 * object reference is never silently dropped.
 */

import { decodeAction } from "./actions.js";
import type { ActionEntry, ActionSpec } from "./actions.js";
import { ProtocolError } from "./errors.js";
import type { Issuer } from "./issuer.js";
import { CORE, LinearResource } from "./resource.js";

export class Expired extends LinearResource {
  readonly resourceKind = "expired" as const;
  readonly key: string;
  readonly issuer: Issuer;
  private _startIndex: number;
  private readonly _actions: readonly ActionEntry[];

  /** @internal created by the intents registry */
  constructor(issuer: Issuer, actions: readonly ActionEntry[], startIndex = 0) {
    super();
    this.key = issuer.intentKey;
    this.issuer = issuer;
    this._actions = actions;
    this._startIndex = startIndex;
  }

  get startIndex(): number {
    return this._startIndex;
  }

  get remaining(): number {
    return this._actions.length - this._startIndex;
  }

  get isEmpty(): boolean {
    return this.remaining === 0;
  }

  /** Type name of the next action to remove, if any. */
  peekType(): string | undefined {
    return this._actions[this._startIndex]?.type;
  }

  describe(): string {
    return `Expired actions of intent '${this.key}'`;
  }

  /**
   * Pop the action at the current start index.
   */
  removeAction<T>(spec: ActionSpec<T>): T {
    this.assertLive();
    const entry = this._actions[this._startIndex];
    if (entry === undefined) {
      throw new ProtocolError(
        "ACTION_NOT_FOUND",
        `No action left in expired intent '${this.key}'`,
      );
    }
    const payload = decodeAction(entry, spec);
    this._startIndex++;
    return payload;
  }

  destroyEmpty(): void {
    this.assertLive();
    if (!this.isEmpty) {
      throw new ProtocolError(
        "ACTIONS_NOT_EMPTY",
        `Expired intent '${this.key}' still holds ${this.remaining} action(s)`,
        { next: this.peekType() },
      );
    }
    this.settle(CORE);
  }
}
