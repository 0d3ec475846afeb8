/**
 * @basketwrap/event-store - Append-only, hash-chained event journal.
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  UnsealedEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadOptions,
  IntegrityError,
  IntegrityReport,
  EventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { GENESIS_HASH, hashEvent, seal, verifyChain } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";
