/**
 * Event Types
 *
 * Every successful state change of a wrapper is captured as a DomainEvent.
 * Failed operations emit nothing.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when)
 * - Payloads are JSON-safe: bigint amounts travel as decimal strings
 */

/** Which wrapper subsystem emitted an event. */
export type EventSource = "basket" | "engine" | "oracle" | "admin";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp (host time) */
  readonly timestamp: string;

  /** Principal that invoked the operation */
  readonly actor: string;

  /** ID for grouping the events of one operation */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`
 * (e.g. "wrapper.minted", "basket.configured").
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
