/**
 * @swapdesk/event-ledger: Business event catalog.
 *
 * Every ledger entry has one of these types. Payload interfaces document
 * what each emitter hashes; the ledger itself stores only the hash.
 */

export const LEDGER_EVENT_TYPES = {
  SWAP_CREATED: "SWAP_CREATED",
  SWAP_RESERVED: "SWAP_RESERVED",
  SWAP_REJECTED: "SWAP_REJECTED",
  SWAP_CANCELLED: "SWAP_CANCELLED",
  SWAP_EXPIRED: "SWAP_EXPIRED",
  SWAP_PAID_BANK: "SWAP_PAID_BANK",
  SWAP_SENT_WALLET: "SWAP_SENT_WALLET",
  SWAP_COMPLETED: "SWAP_COMPLETED",
  PROOF_REVIEWED: "PROOF_REVIEWED",
  DISPUTE_OPENED: "DISPUTE_OPENED",
  DISPUTE_RESOLVED: "DISPUTE_RESOLVED",
  AGENT_RATED: "AGENT_RATED",
  AGENT_STATUS_CHANGED: "AGENT_STATUS_CHANGED",
  KYC_APPROVED: "KYC_APPROVED",
  KYC_REJECTED: "KYC_REJECTED",
  INVOICE_ISSUED: "INVOICE_ISSUED",
} as const;

export type LedgerEventType =
  (typeof LEDGER_EVENT_TYPES)[keyof typeof LEDGER_EVENT_TYPES];

const EVENT_TYPE_SET = new Set<string>(Object.values(LEDGER_EVENT_TYPES));

export function isLedgerEventType(value: unknown): value is LedgerEventType {
  return typeof value === "string" && EVENT_TYPE_SET.has(value);
}

// =============================================================================
// Payloads
// =============================================================================

export interface SwapCreatedPayload {
  readonly swapRef: string;
  readonly amount: string;
  readonly currency: string;
  readonly clientId: string;
  readonly agentId: string;
  readonly fromService: string;
  readonly toService: string;
  readonly calculatedFee: string;
  readonly moneyFlow: "direct_client_to_agent";
}

export interface SwapReservedPayload {
  readonly swapRef: string;
  readonly agentRespondedAt: string;
  readonly responseSeconds: number;
}

export interface SwapPaidBankPayload {
  readonly swapRef: string;
  readonly clientProofUploadedAt: string;
  readonly proofId: string;
  readonly confidence: number;
  readonly moneyFlow: "direct_client_to_agent";
}

export interface SwapSentWalletPayload {
  readonly swapRef: string;
  readonly agentProofUploadedAt: string;
  readonly proofId: string;
  readonly confidence: number;
  readonly moneyFlow: "direct_agent_to_client";
}

export interface SwapCompletedPayload {
  readonly swapRef: string;
  readonly platformFeeOwed: string;
  readonly agentFeeEarned: string;
  readonly settlementStatus: "monthly_invoice";
}

export interface InvoiceIssuedPayload {
  readonly invoiceNumber: string;
  readonly agentId: string;
  readonly period: string;
  readonly totalSwaps: number;
  readonly platformFeeOwed: string;
  readonly dueDate: string;
}

export interface DisputeOpenedPayload {
  readonly swapRef: string;
  readonly disputeId: string;
  readonly reason: string;
  readonly severity: string;
}
