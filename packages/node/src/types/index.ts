/**
 * Type barrel - re-exports all public types from @basketwrap/node.
 */

// DTOs
export {
  AmountSchema,
  SignedAmountSchema,
  IdentifierSchema,
  AmountQuerySchema,
  MintSchema,
  BurnSchema,
  ConfigureBasketSchema,
  ConfigurePriceFeedSchema,
  SlippageSchema,
  RecoverSchema,
  TransferOwnershipSchema,
  ListEventsQuerySchema,
  CreateAssetSchema,
  FaucetSchema,
  ApproveSchema,
  PublishPriceSchema,
  AdvanceClockSchema,
} from "./dto.js";
export type {
  AmountQuery,
  MintDto,
  BurnDto,
  ConfigureBasketDto,
  ConfigurePriceFeedDto,
  SlippageDto,
  RecoverDto,
  TransferOwnershipDto,
  ListEventsQuery,
  CreateAssetDto,
  FaucetDto,
  ApproveDto,
  PublishPriceDto,
  AdvanceClockDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorStatus, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { paginate } from "./pagination.js";
export type { PaginationQuery, PaginationMeta, PaginatedResponse } from "./pagination.js";

// JSON
export { toJson } from "./json.js";
export type { JsonValue } from "./json.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
