/**
 * Type barrel — re-exports all public types from @lapse/node.
 */

// DTOs
export {
  AddressSchema,
  AmountSchema,
  PaginationQuerySchema,
  MintSchema,
  BurnSchema,
  TransferSchema,
  ApproveSchema,
  TransferFromSchema,
  BalanceQuerySchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  MintDto,
  BurnDto,
  TransferDto,
  ApproveDto,
  TransferFromDto,
  AmountView,
  EventView,
  TokenInfoView,
  WindowView,
  BalanceView,
  BucketView,
  BucketsView,
  AllowanceView,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
  DecodedCursor,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
