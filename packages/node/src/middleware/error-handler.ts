/**
 * Global error handler.
 *
 * Registered as Hono's onError handler. Maps domain errors to HTTP
 * statuses and renders the error envelope. Anything without a known
 * code is a 500 and its message is not exposed.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { WrapperError } from "@basketwrap/wrapper";
import type { WrapperErrorCategory } from "@basketwrap/wrapper";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorStatus } from "../types/error.js";
import { RequestValidationError } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_BY_CATEGORY: Record<WrapperErrorCategory, ErrorStatus> = {
  validation: 400,
  authorization: 403,
  state: 409,
  external: 502,
  policy: 422,
};

/** Codes whose status differs from their category's. */
const STATUS_BY_CODE: Readonly<Partial<Record<string, ErrorStatus>>> = {
  // Wrapper
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  NOTHING_TO_RECOVER: 422,
  UNKNOWN_ASSET: 404,
  PRICE_FEED_NOT_CONFIGURED: 503,
  STALE_PRICE: 503,

  // Sandbox host
  DUPLICATE_ASSET: 409,
  DUPLICATE_FEED: 409,
  UNKNOWN_FEED: 404,
  INVALID_AMOUNT: 400,
  INVALID_ADDRESS: 400,
  INVALID_TIME: 400,

  // Event store
  CONCURRENCY_CONFLICT: 409,
};

function statusFor(err: Error): { status: ErrorStatus; code: string } | undefined {
  if (err instanceof WrapperError) {
    return {
      status: STATUS_BY_CODE[err.code] ?? STATUS_BY_CATEGORY[err.category],
      code: err.code,
    };
  }
  if ("code" in err && typeof err.code === "string") {
    const status = STATUS_BY_CODE[err.code];
    if (status !== undefined) {
      return { status, code: err.code };
    }
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

export function handleError(err: Error, c: Context): Response {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }
  if (err instanceof RequestValidationError) {
    return c.json(
      createErrorEnvelope(err.code, err.message, { issues: err.issues }),
      400,
    );
  }

  const mapped = statusFor(err);
  if (mapped === undefined) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }
  return c.json(createErrorEnvelope(mapped.code, err.message), mapped.status);
}
