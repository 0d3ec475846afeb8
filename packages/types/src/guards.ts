/**
 * Runtime Type Guards
 *
 * Narrowing functions for basket domain types.
 * Used at system boundaries: collaborator results, restored
 * snapshots and events handed to the store.
 */

import type { AssetEntry, Basket } from "./basket.js";
import type { PriceReading } from "./capability.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Basket guards
// =============================================================================

export function isAssetEntry(value: unknown): value is AssetEntry {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.token === "string" &&
    v.token.length > 0 &&
    typeof v.weightBps === "number" &&
    Number.isInteger(v.weightBps) &&
    v.weightBps >= 0 &&
    v.weightBps <= 10_000 &&
    typeof v.active === "boolean"
  );
}

export function isBasket(value: unknown): value is Basket {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.version === "number" &&
    Number.isInteger(v.version) &&
    v.version >= 0 &&
    Array.isArray(v.entries) &&
    v.entries.every(isAssetEntry) &&
    (v.configuredAt === undefined || typeof v.configuredAt === "string")
  );
}

// =============================================================================
// Price guards
// =============================================================================

export function isPriceReading(value: unknown): value is PriceReading {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.answer === "bigint" &&
    typeof v.updatedAt === "number" &&
    Number.isSafeInteger(v.updatedAt) &&
    v.updatedAt >= 0
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["basket", "engine", "oracle", "admin"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    v.type.length > 0 &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
