/**
 * @swapdesk/types: Shared domain types for the SwapDesk stack.
 *
 * These types are used across all SwapDesk packages:
 * - Money (string amounts, explicit currency)
 * - Parties (clients, agents and their performance counters)
 * - Swaps, proofs and disputes
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Records carry a `version` for optimistic concurrency
 */

// Money
export type { Money, Currency } from "./money.js";

// Parties
export type {
  GeoLocation,
  PaymentDetails,
  ClientProfile,
  AgentProfile,
} from "./party.js";

// Swaps
export type {
  SwapStatus,
  SourceService,
  WalletService,
  SwapRequest,
} from "./swap.js";

// Proofs
export type {
  ProofProvider,
  ProofKind,
  ProofRole,
  ProofStatus,
  ExtractionResult,
  ProofValidation,
  ProofSubmission,
} from "./proof.js";

// Disputes
export type {
  DisputeSeverity,
  DisputeStatus,
  DisputeOutcome,
  Dispute,
} from "./dispute.js";

// Runtime type guards
export {
  SWAP_STATUSES,
  TERMINAL_STATUSES,
  SOURCE_SERVICES,
  BANK_SERVICES,
  WALLET_SERVICES,
  isMoney,
  isSwapStatus,
  isTerminalStatus,
  isSourceService,
  isBankService,
  isWalletService,
  isDisputeSeverity,
  isDisputeOutcome,
  isProofKind,
  isGeoLocation,
} from "./guards.js";
