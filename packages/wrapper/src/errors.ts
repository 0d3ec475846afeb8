/**
 * @basketwrap/wrapper - Structured errors.
 *
 * Every wrapper operation fails by throwing a WrapperError. The code is
 * machine-readable and determines the category; nothing is retried.
 */

// =============================================================================
// Codes
// =============================================================================

const CATEGORY_BY_CODE = {
  // Malformed input
  INVALID_CONFIGURATION: "validation",
  INVALID_WEIGHTS: "validation",
  DUPLICATE_ASSET: "validation",
  INVALID_AMOUNT: "validation",
  INVALID_TOLERANCE: "validation",
  INVALID_ADDRESS: "validation",
  BELOW_GRANULARITY: "validation",

  UNAUTHORIZED: "authorization",

  // Preconditions on current state
  EMPTY_BASKET: "state",
  INSUFFICIENT_BALANCE: "state",
  INSUFFICIENT_ALLOWANCE: "state",
  PAUSED: "state",
  NOT_PAUSED: "state",
  REENTRANT_CALL: "state",
  NOTHING_TO_RECOVER: "state",
  RECOVERY_FORBIDDEN: "state",

  // Collaborators
  UNKNOWN_ASSET: "external",
  TRANSFER_FAILED: "external",
  PRICE_FEED_UNRESOLVABLE: "external",
  PRICE_FEED_NOT_CONFIGURED: "external",
  PRICE_READ_FAILED: "external",
  INVALID_FEED_DECIMALS: "external",
  INVALID_PRICE: "external",
  STALE_PRICE: "external",

  SLIPPAGE_EXCEEDED: "policy",
} as const;

export type WrapperErrorCode = keyof typeof CATEGORY_BY_CODE;

export type WrapperErrorCategory = (typeof CATEGORY_BY_CODE)[WrapperErrorCode];

export function categoryOf(code: WrapperErrorCode): WrapperErrorCategory {
  return CATEGORY_BY_CODE[code];
}

// =============================================================================
// Error
// =============================================================================

export class WrapperError extends Error {
  public readonly code: WrapperErrorCode;
  public readonly category: WrapperErrorCategory;

  constructor(code: WrapperErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WrapperError";
    this.code = code;
    this.category = categoryOf(code);
  }
}

/**
 * Describe an unknown thrown value for an error message.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
