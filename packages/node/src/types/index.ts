/**
 * Type barrel for @swapdesk/node.
 */

// DTOs
export {
  PaginationQuerySchema,
  SourceServiceSchema,
  WalletServiceSchema,
  SwapStatusSchema,
  AmountSchema,
  GeoLocationSchema,
  RegisterAgentSchema,
  RegisterClientSchema,
  VerifyAgentSchema,
  AgentStatusSchema,
  CreateSwapSchema,
  SwapWriteSchema,
  SwapReasonSchema,
  ListSwapsQuerySchema,
  SubmitProofSchema,
  ReviewProofSchema,
  OpenDisputeSchema,
  MoveDisputeSchema,
  ResolveDisputeSchema,
  RateAgentSchema,
  RecommendationQuerySchema,
  LedgerEventTypeSchema,
  RecordLedgerEventSchema,
  ListLedgerEventsQuerySchema,
  ReportMonthSchema,
} from "./dto.js";
export type {
  RegisterAgentDto,
  RegisterClientDto,
  VerifyAgentDto,
  AgentStatusDto,
  CreateSwapDto,
  SwapWriteDto,
  SwapReasonDto,
  ListSwapsQuery,
  SubmitProofDto,
  ReviewProofDto,
  OpenDisputeDto,
  MoveDisputeDto,
  ResolveDisputeDto,
  RateAgentDto,
  RecommendationQuery,
  RecordLedgerEventDto,
  ListLedgerEventsQuery,
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

// App env
export type { AppEnv } from "./api-contract.js";
