/**
 * Request DTOs with Zod validation schemas.
 *
 * Amounts travel as base-unit decimal integer strings and are parsed to
 * bigint here. Schemas check shape only; domain rules (weight sums,
 * tolerance range, address rules) are enforced by the wrapper itself so
 * that they surface with their domain error codes.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer string")
  .transform((v) => BigInt(v));

export const SignedAmountSchema = z
  .string()
  .regex(/^-?\d+$/, "Expected an integer string")
  .transform((v) => BigInt(v));

export const IdentifierSchema = z.string().min(1).max(128);

export const AmountQuerySchema = z.object({
  amount: AmountSchema,
});

export type AmountQuery = z.output<typeof AmountQuerySchema>;

// =============================================================================
// Mint / Burn DTOs
// =============================================================================

export const MintSchema = z.object({
  amount: AmountSchema,
  maxValue: AmountSchema.optional(),
});

export type MintDto = z.output<typeof MintSchema>;

export const BurnSchema = z.object({
  amount: AmountSchema,
  minValue: AmountSchema.optional(),
});

export type BurnDto = z.output<typeof BurnSchema>;

// =============================================================================
// Admin DTOs
// =============================================================================

export const ConfigureBasketSchema = z.object({
  tokens: z.array(z.string()),
  weights: z.array(z.number()),
});

export type ConfigureBasketDto = z.output<typeof ConfigureBasketSchema>;

export const ConfigurePriceFeedSchema = z.object({
  token: IdentifierSchema,
  feed: IdentifierSchema,
});

export type ConfigurePriceFeedDto = z.output<typeof ConfigurePriceFeedSchema>;

export const SlippageSchema = z.object({
  bps: z.number(),
});

export type SlippageDto = z.output<typeof SlippageSchema>;

export const RecoverSchema = z.object({
  token: IdentifierSchema,
});

export type RecoverDto = z.output<typeof RecoverSchema>;

export const TransferOwnershipSchema = z.object({
  newOwner: z.string(),
});

export type TransferOwnershipDto = z.output<typeof TransferOwnershipSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  from: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type ListEventsQuery = z.output<typeof ListEventsQuerySchema>;

// =============================================================================
// Sandbox DTOs
// =============================================================================

export const CreateAssetSchema = z.object({
  token: IdentifierSchema,
  decimals: z.number().int().min(0).max(77).default(18),
});

export type CreateAssetDto = z.output<typeof CreateAssetSchema>;

export const FaucetSchema = z.object({
  token: IdentifierSchema,
  holder: IdentifierSchema,
  amount: AmountSchema,
});

export type FaucetDto = z.output<typeof FaucetSchema>;

export const ApproveSchema = z.object({
  token: IdentifierSchema,
  amount: AmountSchema,
});

export type ApproveDto = z.output<typeof ApproveSchema>;

export const PublishPriceSchema = z.object({
  handle: IdentifierSchema,
  decimals: z.number().int().min(0).max(36),
  answer: SignedAmountSchema,
  updatedAt: z.number().int().min(0).optional(),
});

export type PublishPriceDto = z.output<typeof PublishPriceSchema>;

export const AdvanceClockSchema = z.object({
  advanceSeconds: z.number().int().min(0),
});

export type AdvanceClockDto = z.output<typeof AdvanceClockSchema>;
