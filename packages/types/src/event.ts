/**
 * Event Types
 *
 * Every observable state change of an account is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - No UPDATE, no DELETE — only new events
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event (usually the account address) */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events (intent key or transaction ID) */
  readonly correlationId: string;
}

/**
 * A domain event. Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "intent.added", "object.locked") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (JSON-compatible, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
