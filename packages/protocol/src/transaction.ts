/**
 * All-or-nothing scope for a sequence of account calls.
 *
 * Collects an undo step for every account mutation, every linear resource
 * handed out, and every event produced. On rollback the undo steps run in
 * reverse order, then the resources created inside are revoked. On commit
 * the staged events go to the journal.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent } from "@covenant/types";
import { CORE } from "./resource.js";
import type { LinearResource } from "./resource.js";

export type UndoStep = () => void;

export class Transaction {
  readonly id: string = randomUUID();

  private readonly _undo: UndoStep[] = [];
  private readonly _resources: LinearResource[] = [];
  private readonly _events: DomainEvent[] = [];

  record(undo: UndoStep): void {
    this._undo.push(undo);
  }

  track(resource: LinearResource): void {
    this._resources.push(resource);
  }

  stage(event: DomainEvent): void {
    this._events.push(event);
  }

  get events(): readonly DomainEvent[] {
    return this._events;
  }

  /** Resources created inside this transaction that were never used up. */
  unsettled(): readonly LinearResource[] {
    return this._resources.filter((r) => r.state === "live");
  }

  rollback(): void {
    for (let i = this._undo.length - 1; i >= 0; i--) {
      this._undo[i]?.();
    }
    for (const resource of this._resources) {
      resource.revoke(CORE);
    }
    this._undo.length = 0;
    this._events.length = 0;
  }
}
