/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import { isLedgerEventType } from "@swapdesk/event-ledger";
import type { LedgerEventType } from "@swapdesk/event-ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const SourceServiceSchema = z.enum([
  "national_bank",
  "standard_bank",
  "fdh_bank",
  "nedbank",
  "mpamba",
  "airtel_money",
]);

export const WalletServiceSchema = z.enum(["TNM", "AIRTEL"]);

export const SwapStatusSchema = z.enum([
  "PENDING",
  "ACCEPTED",
  "REJECTED",
  "CLIENT_PROOF_UPLOADED",
  "AGENT_PROOF_UPLOADED",
  "COMPLETE",
  "DISPUTE",
  "CANCELLED",
  "EXPIRED",
]);

/** Decimal amount as a string, e.g. "1000" or "1000.50" */
export const AmountSchema = z.string().regex(/^\d+(\.\d+)?$/, "Amount must be a decimal string");

export const GeoLocationSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
  address: z.string().max(256),
});

const ExpectedVersion = z.number().int().min(1).optional();

// =============================================================================
// Party DTOs
// =============================================================================

export const RegisterAgentSchema = z.object({
  id: z.string().min(1).max(128).optional(),
  displayName: z.string().min(1).max(128),
  phone: z.string().min(1).max(32),
  email: z.string().email().optional(),
  location: GeoLocationSchema.optional(),
  paymentDetails: z
    .object({
      bankName: z.string().max(128).optional(),
      bankAccount: z.string().max(64).optional(),
      mpambaNumber: z.string().max(32).optional(),
      airtelNumber: z.string().max(32).optional(),
    })
    .optional(),
  dailyCapacity: z.number().int().min(1).optional(),
});

export type RegisterAgentDto = z.infer<typeof RegisterAgentSchema>;

export const RegisterClientSchema = z.object({
  id: z.string().min(1).max(128).optional(),
  displayName: z.string().min(1).max(128),
  phone: z.string().min(1).max(32),
  email: z.string().email().optional(),
  location: GeoLocationSchema.optional(),
});

export type RegisterClientDto = z.infer<typeof RegisterClientSchema>;

export const VerifyAgentSchema = z.object({
  approved: z.boolean().default(true),
  reason: z.string().max(1024).optional(),
});

export type VerifyAgentDto = z.infer<typeof VerifyAgentSchema>;

export const AgentStatusSchema = z.object({
  /** Omit to toggle */
  online: z.boolean().optional(),
});

export type AgentStatusDto = z.infer<typeof AgentStatusSchema>;

// =============================================================================
// Swap DTOs
// =============================================================================

export const CreateSwapSchema = z.object({
  agentId: z.string().min(1).optional(),
  amount: AmountSchema,
  fromService: SourceServiceSchema,
  toService: WalletServiceSchema,
  destNumber: z.string().min(1).max(32),
});

export type CreateSwapDto = z.infer<typeof CreateSwapSchema>;

export const SwapWriteSchema = z.object({
  expectedVersion: ExpectedVersion,
});

export type SwapWriteDto = z.infer<typeof SwapWriteSchema>;

export const SwapReasonSchema = z.object({
  reason: z.string().max(1024).optional(),
  expectedVersion: ExpectedVersion,
});

export type SwapReasonDto = z.infer<typeof SwapReasonSchema>;

export const ListSwapsQuerySchema = PaginationQuerySchema.extend({
  status: SwapStatusSchema.optional(),
  clientId: z.string().optional(),
  agentId: z.string().optional(),
});

export type ListSwapsQuery = z.infer<typeof ListSwapsQuerySchema>;

// =============================================================================
// Proof DTOs
// =============================================================================

export const SubmitProofSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("sms"),
    text: z.string().min(1).max(2048),
    expectedVersion: ExpectedVersion,
  }),
  z.object({
    kind: z.literal("image"),
    /** Base64-encoded screenshot */
    imageBase64: z.string().min(1),
    expectedVersion: ExpectedVersion,
  }),
]);

export type SubmitProofDto = z.infer<typeof SubmitProofSchema>;

export const ReviewProofSchema = z.object({
  decision: z.enum(["verified", "rejected"]),
});

export type ReviewProofDto = z.infer<typeof ReviewProofSchema>;

// =============================================================================
// Dispute & Rating DTOs
// =============================================================================

export const OpenDisputeSchema = z.object({
  reason: z.string().min(1).max(2048),
  severity: z.enum(["low", "medium", "high"]).default("medium"),
  expectedVersion: ExpectedVersion,
});

export type OpenDisputeDto = z.infer<typeof OpenDisputeSchema>;

export const MoveDisputeSchema = z.object({
  status: z.enum(["investigating", "escalated"]),
});

export type MoveDisputeDto = z.infer<typeof MoveDisputeSchema>;

export const ResolveDisputeSchema = z.object({
  resolution: z.string().min(1).max(2048),
  outcome: z.enum(["resume", "complete", "cancel"]),
});

export type ResolveDisputeDto = z.infer<typeof ResolveDisputeSchema>;

export const RateAgentSchema = z.object({
  rating: z.number().int().min(1).max(5),
});

export type RateAgentDto = z.infer<typeof RateAgentSchema>;

// =============================================================================
// Recommendation DTOs
// =============================================================================

export const RecommendationQuerySchema = z.object({
  amount: AmountSchema,
  toService: WalletServiceSchema,
  limit: z.coerce.number().int().min(1).max(20).optional(),
});

export type RecommendationQuery = z.infer<typeof RecommendationQuerySchema>;

// =============================================================================
// Ledger & Report DTOs
// =============================================================================

export const LedgerEventTypeSchema = z.custom<LedgerEventType>(
  (value) => isLedgerEventType(value),
  { message: "Unknown ledger event type" },
);

export const RecordLedgerEventSchema = z.object({
  eventType: LedgerEventTypeSchema,
  entityRef: z.string().min(1).max(256),
  payload: z.record(z.unknown()),
  signature: z.string().max(512).optional(),
});

export type RecordLedgerEventDto = z.infer<typeof RecordLedgerEventSchema>;

export const ListLedgerEventsQuerySchema = PaginationQuerySchema.extend({
  entityRef: z.string().optional(),
  eventType: LedgerEventTypeSchema.optional(),
});

export type ListLedgerEventsQuery = z.infer<typeof ListLedgerEventsQuerySchema>;

export const ReportMonthSchema = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])$/, "Month must be YYYY-MM");
