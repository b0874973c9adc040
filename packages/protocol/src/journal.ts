/**
 * AccountJournal — tamper-evident log of an account's lifecycle events.
 *
 * Each entry is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * chained to its predecessor:
 *
 *   entry[0].hash = sha256(canonicalize(entry[0]) + "genesis")
 *   entry[n].hash = sha256(canonicalize(entry[n]) + entry[n-1].hash)
 *
 * The journal only ever receives committed events. Events produced inside
 * a transaction are staged by the transaction and appended on commit.
 */

import { createHash, randomUUID } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { DomainEvent } from "@covenant/types";

export const GENESIS_HASH = "genesis";

export interface JournalEntry {
  /** 1-based position in the journal */
  readonly position: number;
  readonly event: DomainEvent;
  readonly previousHash: string;
  readonly hash: string;
}

export type JournalHandler = (entry: JournalEntry) => void;

export interface JournalSubscription {
  unsubscribe(): void;
}

export interface JournalIntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface JournalIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly JournalIntegrityError[];
}

/**
 * Hash an entry's content together with its predecessor's hash.
 */
export function computeEntryHash(
  position: number,
  event: DomainEvent,
  previousHash: string,
): string {
  const content = canonicalize({
    position,
    event: {
      type: event.type,
      metadata: event.metadata,
      payload: event.payload,
    },
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

export function verifyJournal(entries: readonly JournalEntry[]): JournalIntegrityResult {
  const errors: JournalIntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const entry of entries) {
    if (entry.previousHash !== previousHash) {
      errors.push({
        position: entry.position,
        reason: `previousHash mismatch at position ${entry.position}: expected "${previousHash}", got "${entry.previousHash}"`,
      });
    }
    const expected = computeEntryHash(entry.position, entry.event, entry.previousHash);
    if (entry.hash !== expected) {
      errors.push({
        position: entry.position,
        reason: `Hash mismatch at position ${entry.position}: expected "${expected}", got "${entry.hash}"`,
      });
    }
    previousHash = entry.hash;
    lastVerifiedPosition = entry.position;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}

export class AccountJournal {
  private readonly _entries: JournalEntry[] = [];
  private readonly _subscribers = new Set<JournalHandler>();
  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(events: readonly DomainEvent[]): readonly JournalEntry[] {
    const appended: JournalEntry[] = [];
    for (const event of events) {
      const position = this._entries.length + 1;
      const previousHash = this._lastHash;
      const hash = computeEntryHash(position, event, previousHash);
      const entry: JournalEntry = { position, event, previousHash, hash };
      this._entries.push(entry);
      this._lastHash = hash;
      appended.push(entry);
    }
    for (const entry of appended) {
      for (const handler of this._subscribers) {
        handler(entry);
      }
    }
    return appended;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(): readonly JournalEntry[] {
    return [...this._entries];
  }

  ofType(type: string): readonly JournalEntry[] {
    return this._entries.filter((e) => e.event.type === type);
  }

  get length(): number {
    return this._entries.length;
  }

  get lastHash(): string {
    return this._lastHash;
  }

  // ─── Subscribe ──────────────────────────────────────────────────────

  subscribe(handler: JournalHandler): JournalSubscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): JournalIntegrityResult {
    return verifyJournal(this._entries);
  }
}

/**
 * Build a domain event stamped with a fresh id and the current time.
 */
export function createEvent(
  type: string,
  actor: string,
  correlationId: string,
  payload: Readonly<Record<string, unknown>>,
): DomainEvent {
  return {
    type,
    metadata: {
      eventId: randomUUID(),
      timestamp: new Date().toISOString(),
      actor,
      correlationId,
    },
    payload,
  };
}
