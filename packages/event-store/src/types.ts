/**
 * Event journal types.
 *
 * A journal holds one or more streams of domain events. Every record is
 * linked into a single SHA-256 chain spanning all streams, in the order
 * records were written.
 */

import type { DomainEvent } from "@basketwrap/types";

// =============================================================================
// Records
// =============================================================================

export interface StoredEvent {
  readonly event: DomainEvent;
  readonly streamId: string;

  /** 1-based, contiguous within the stream */
  readonly version: number;

  /** 1-based, contiguous across the whole journal */
  readonly sequence: number;

  /** When the journal accepted the record */
  readonly recordedAt: string;

  /** Hash of the preceding record, or GENESIS_HASH for the first */
  readonly previousHash: string;

  /** SHA-256 over the canonical record, excluding this field */
  readonly hash: string;
}

/** A record before its hash has been computed. */
export type UnsealedEvent = Omit<StoredEvent, "hash">;

// =============================================================================
// Writing
// =============================================================================

/**
 * Optimistic concurrency expectation for an append.
 *
 * A number pins the stream's current version, "no_stream" requires the
 * stream to be empty, "any" skips the check.
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly firstVersion: number;
  readonly lastVersion: number;
}

// =============================================================================
// Reading
// =============================================================================

export interface ReadOptions {
  /** First version to return. Default: 1 */
  readonly fromVersion?: number;
  readonly maxCount?: number;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly sequence: number;
  readonly reason: string;
}

export interface IntegrityReport {
  readonly valid: boolean;

  /** Number of records walked */
  readonly checked: number;

  /** Hash of the last record walked (GENESIS_HASH when empty) */
  readonly head: string;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Journal
// =============================================================================

export interface EventStore {
  /**
   * Append a batch to one stream. Either the whole batch is recorded or
   * nothing is.
   */
  append(streamId: string, events: readonly DomainEvent[], options?: AppendOptions): AppendResult;

  /** Records of one stream in version order; empty for an unknown stream. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  streamExists(streamId: string): boolean;

  /** 0 for an unknown stream */
  streamVersion(streamId: string): number;

  /** Total records across all streams */
  size(): number;

  verifyIntegrity(): IntegrityReport;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "INVALID_EVENT"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
