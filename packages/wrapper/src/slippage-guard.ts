/**
 * SlippageGuard - caller-specified value bounds on mint and burn.
 *
 * One tolerance, in basis points, is applied symmetrically:
 * a mint may cost at most maxValue widened by the tolerance, a burn
 * must return at least minValue narrowed by it.
 */

import { addBps, subtractBps, BPS_DENOMINATOR } from "@basketwrap/ledger";
import type { PriceOracleAdapter } from "./price-oracle.js";
import { WrapperError } from "./errors.js";

export const DEFAULT_SLIPPAGE_TOLERANCE_BPS = 100;

export function assertTolerance(bps: number): void {
  if (!Number.isInteger(bps) || bps < 0 || bps > BPS_DENOMINATOR) {
    throw new WrapperError(
      "INVALID_TOLERANCE",
      `Slippage tolerance must be an integer between 0 and ${String(BPS_DENOMINATOR)} bps, got ${String(bps)}`,
    );
  }
}

export class SlippageGuard {
  private readonly _oracle: PriceOracleAdapter;
  private _toleranceBps: number;

  constructor(oracle: PriceOracleAdapter, toleranceBps = DEFAULT_SLIPPAGE_TOLERANCE_BPS) {
    assertTolerance(toleranceBps);
    this._oracle = oracle;
    this._toleranceBps = toleranceBps;
  }

  get toleranceBps(): number {
    return this._toleranceBps;
  }

  setTolerance(bps: number): void {
    assertTolerance(bps);
    this._toleranceBps = bps;
  }

  /**
   * Fails if totalValue(amount) > maxValue × (10000 + tolerance) / 10000.
   * @returns the checked total value
   */
  async checkMint(amount: bigint, maxValue: bigint): Promise<bigint> {
    assertBound("maxValue", maxValue);
    const value = await this._oracle.totalValue(amount);
    const ceiling = addBps(maxValue, this._toleranceBps);
    if (value > ceiling) {
      throw new WrapperError(
        "SLIPPAGE_EXCEEDED",
        `Basket value ${value.toString()} exceeds maximum ${ceiling.toString()} (maxValue ${maxValue.toString()} + ${String(this._toleranceBps)} bps)`,
      );
    }
    return value;
  }

  /**
   * Fails if totalValue(amount) < minValue × (10000 − tolerance) / 10000.
   * @returns the checked total value
   */
  async checkBurn(amount: bigint, minValue: bigint): Promise<bigint> {
    assertBound("minValue", minValue);
    const value = await this._oracle.totalValue(amount);
    const floor = subtractBps(minValue, this._toleranceBps);
    if (value < floor) {
      throw new WrapperError(
        "SLIPPAGE_EXCEEDED",
        `Basket value ${value.toString()} is below minimum ${floor.toString()} (minValue ${minValue.toString()} − ${String(this._toleranceBps)} bps)`,
      );
    }
    return value;
  }
}

function assertBound(label: string, value: bigint): void {
  if (value < 0n) {
    throw new WrapperError("INVALID_AMOUNT", `${label} must be non-negative, got ${value.toString()}`);
  }
}
