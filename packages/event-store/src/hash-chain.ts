/**
 * Hash linking for journal records.
 *
 * hash = sha256(canonicalize(record without `hash`)). The predecessor's
 * hash sits inside the canonical record, so editing or reordering any
 * record changes every hash after it.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { IntegrityError, IntegrityReport, StoredEvent, UnsealedEvent } from "./types.js";

export const GENESIS_HASH = "0".repeat(64);

export function hashEvent(record: UnsealedEvent): string {
  const canonical = canonicalize({
    event: record.event,
    streamId: record.streamId,
    version: record.version,
    sequence: record.sequence,
    recordedAt: record.recordedAt,
    previousHash: record.previousHash,
  });
  return createHash("sha256").update(canonical).digest("hex");
}

export function seal(record: UnsealedEvent): StoredEvent {
  return { ...record, hash: hashEvent(record) };
}

/**
 * Walk records in sequence order and report every broken link.
 * Verification continues past a failure so all damage is reported.
 */
export function verifyChain(records: readonly StoredEvent[]): IntegrityReport {
  const errors: IntegrityError[] = [];
  let expectedPrevious = GENESIS_HASH;
  let expectedSequence = 1;

  for (const record of records) {
    const { sequence } = record;

    if (sequence !== expectedSequence) {
      errors.push({ sequence, reason: `Expected sequence ${expectedSequence}, found ${sequence}` });
    }
    if (record.previousHash !== expectedPrevious) {
      errors.push({ sequence, reason: `Record ${sequence} does not link to its predecessor` });
    }
    if (hashEvent(record) !== record.hash) {
      errors.push({ sequence, reason: `Record ${sequence} does not match its hash` });
    }

    expectedPrevious = record.hash;
    expectedSequence = sequence + 1;
  }

  return {
    valid: errors.length === 0,
    checked: records.length,
    head: expectedPrevious,
    errors,
  };
}
