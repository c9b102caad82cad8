/**
 * Type barrel — re-exports all public types from @proofpass/node.
 */

// DTOs
export {
  AddressSchema,
  EventRefSchema,
  HexSchema,
  WeiSchema,
  TokenIdParamSchema,
  CreateEventSchema,
  UpdateEventSchema,
  EventStatusSchema,
  MintSchema,
  PairSchema,
  FaucetSchema,
  PaginationQuerySchema,
  StreamQuerySchema,
} from "./dto.js";
export type {
  CreateEventDto,
  UpdateEventDto,
  MintDto,
  PairDto,
  PaginationQueryDto,
  StreamQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Views
export {
  eventView,
  attendanceView,
  collectibleView,
  distributionView,
  pairView,
} from "./views.js";
export type { EventView, TokenView, DistributionView, PairView } from "./views.js";

// App env
export type { AppEnv } from "./api-contract.js";
