/**
 * @basketwrap/ledger - Deterministic fixed-point arithmetic.
 *
 * All arithmetic uses bigint. Division always floors (amounts are
 * non-negative), so per-asset shares may under-allocate by at most
 * one base unit.
 *
 * Rules:
 * - No floating-point operations
 * - Weights and tolerances are integer basis points
 * - Prices are normalized to PRICE_DECIMALS
 */

import { LedgerError } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────

/** 100% expressed in basis points. */
export const BPS_DENOMINATOR = 10_000;

/** Decimal precision of normalized prices. */
export const PRICE_DECIMALS = 18;

/** One whole unit at PRICE_DECIMALS. */
export const PRICE_UNIT = 10n ** BigInt(PRICE_DECIMALS);

const BPS = BigInt(BPS_DENOMINATOR);

/** Upper bound on source precision we accept when rescaling. */
const MAX_DECIMALS = 77;

// ─── Core Arithmetic ─────────────────────────────────────────────────────

/**
 * floor(a * b / denominator) for non-negative operands.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "mulDiv denominator must be non-zero");
  }
  if (a < 0n || b < 0n || denominator < 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `mulDiv operands must be non-negative, got ${a.toString()} * ${b.toString()} / ${denominator.toString()}`,
    );
  }
  return (a * b) / denominator;
}

/**
 * Assert a basis-point value is an integer in [0, 10000].
 */
export function assertBps(bps: number, label = "basis points"): void {
  if (!Number.isInteger(bps) || bps < 0 || bps > BPS_DENOMINATOR) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be an integer between 0 and ${String(BPS_DENOMINATOR)}, got ${String(bps)}`,
    );
  }
}

/**
 * floor(amount * bps / 10000).
 *
 * 1000n at 6000 bps → 600n
 * 1n at 6000 bps → 0n (dust)
 */
export function shareOfBps(amount: bigint, bps: number): bigint {
  assertBps(bps);
  return mulDiv(amount, BigInt(bps), BPS);
}

/**
 * Widen a value by `bps` above 100%: floor(value * (10000 + bps) / 10000).
 */
export function addBps(value: bigint, bps: number): bigint {
  assertBps(bps);
  return mulDiv(value, BPS + BigInt(bps), BPS);
}

/**
 * Narrow a value by `bps` below 100%: floor(value * (10000 - bps) / 10000).
 */
export function subtractBps(value: bigint, bps: number): bigint {
  assertBps(bps);
  return mulDiv(value, BPS - BigInt(bps), BPS);
}

/**
 * Rescale an integer from one decimal precision to another.
 * Narrowing truncates toward zero.
 *
 * 200000000n (8 dp) → 2000000000000000000n (18 dp)
 */
export function scaleDecimals(value: bigint, fromDecimals: number, toDecimals: number): bigint {
  assertDecimals(fromDecimals);
  assertDecimals(toDecimals);
  if (fromDecimals === toDecimals) return value;
  if (fromDecimals < toDecimals) {
    return value * 10n ** BigInt(toDecimals - fromDecimals);
  }
  return value / 10n ** BigInt(fromDecimals - toDecimals);
}

/**
 * Assert a decimal precision is an integer in [0, 77].
 */
export function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
    throw new LedgerError(
      "INVALID_DECIMALS",
      `Decimals must be an integer between 0 and ${String(MAX_DECIMALS)}, got ${String(decimals)}`,
    );
  }
}

// ─── Decimal Strings ─────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  assertDecimals(decimals);
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  assertDecimals(decimals);
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}
