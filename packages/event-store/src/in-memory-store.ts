/**
 * In-process event journal. State lives for the lifetime of the object.
 */

import type { DomainEvent } from "@basketwrap/types";
import { isDomainEvent } from "@basketwrap/types";
import { GENESIS_HASH, seal, verifyChain } from "./hash-chain.js";
import type {
  AppendOptions,
  AppendResult,
  EventStore,
  ExpectedVersion,
  IntegrityReport,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";

export interface InMemoryEventStoreOptions {
  /** Clock for `recordedAt`. Default: wall time */
  readonly now?: () => Date;
}

export class InMemoryEventStore implements EventStore {
  private readonly _log: StoredEvent[] = [];
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _now: () => Date;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._now = options.now ?? (() => new Date());
  }

  append(streamId: string, events: readonly DomainEvent[], options: AppendOptions = {}): AppendResult {
    assertStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Nothing to append", streamId);
    }
    const malformed = events.findIndex((e) => !isDomainEvent(e));
    if (malformed !== -1) {
      throw new EventStoreError("INVALID_EVENT", `Event ${malformed} in the batch is malformed`, streamId);
    }

    const current = this.streamVersion(streamId);
    checkExpected(streamId, current, options.expectedVersion ?? "any");

    const recordedAt = this._now().toISOString();
    const batch: StoredEvent[] = [];
    let previousHash = this._head();

    for (const [i, event] of events.entries()) {
      const record = seal({
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: current + i + 1,
        sequence: this._log.length + i + 1,
        recordedAt,
        previousHash,
      });
      batch.push(record);
      previousHash = record.hash;
    }

    this._log.push(...batch);
    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      this._streams.set(streamId, batch);
    } else {
      stream.push(...batch);
    }

    return { streamId, firstVersion: current + 1, lastVersion: current + events.length };
  }

  read(streamId: string, options: ReadOptions = {}): readonly StoredEvent[] {
    assertStreamId(streamId);
    const fromVersion = options.fromVersion ?? 1;
    if (!Number.isInteger(fromVersion) || fromVersion < 1) {
      throw new EventStoreError("INVALID_VERSION", `fromVersion must be a positive integer, got ${fromVersion}`, streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    const end = options.maxCount === undefined ? undefined : fromVersion - 1 + Math.max(0, options.maxCount);
    return stream.slice(fromVersion - 1, end);
  }

  streamExists(streamId: string): boolean {
    return this._streams.has(streamId);
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  size(): number {
    return this._log.length;
  }

  verifyIntegrity(): IntegrityReport {
    return verifyChain(this._log);
  }

  private _head(): string {
    return this._log.at(-1)?.hash ?? GENESIS_HASH;
  }
}

function assertStreamId(streamId: string): void {
  if (streamId.trim().length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream id must be non-empty");
  }
}

function checkExpected(streamId: string, current: number, expected: ExpectedVersion): void {
  if (expected === "any") return;
  const wanted = expected === "no_stream" ? 0 : expected;
  if (current !== wanted) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" is at version ${current}, expected ${expected === "no_stream" ? "no stream" : wanted}`,
      streamId,
    );
  }
}
