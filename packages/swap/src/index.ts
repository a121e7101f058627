/**
 * @swapdesk/swap
 *
 * Swap lifecycle for SwapDesk: state machine, fee policy, proof review,
 * disputes, timeout sweeps and monthly fee statements.
 *
 * @packageDocumentation
 */

// Lifecycle
export { SwapLifecycle, SYSTEM_ACTOR } from "./swap-lifecycle.js";
export type {
  SwapLifecycleOptions,
  TransitionHook,
  ProofReader,
  WriteOptions,
  CreateSwapInput,
  RegisterAgentInput,
  RegisterClientInput,
  ProofInput,
  ProofResult,
  DisputeResult,
  ReviewDecision,
} from "./swap-lifecycle.js";
export type { SwapAction, SwapTransition } from "./unit-of-work.js";

// State machine
export { VALID_TRANSITIONS, canTransition, assertTransition } from "./transitions.js";

// Errors
export { SwapError } from "./errors.js";
export type { SwapErrorCode } from "./errors.js";

// Policy
export { DEFAULT_SWAP_CONFIG, resolveSwapConfig } from "./config.js";
export type { SwapConfig } from "./config.js";
export { calculateFees } from "./fees.js";
export type { FeeSplit, FeeConfig } from "./fees.js";
export {
  WALLET_PREFIXES,
  normalizeWalletNumber,
  validateDestNumber,
  validateSwapAmount,
} from "./validation.js";
export { generateReference, isSwapReference, REFERENCE_PATTERN } from "./reference.js";
export { systemClock, utcDay, minutesBefore } from "./clock.js";
export type { Clock } from "./clock.js";

// Persistence
export { InMemorySwapStore, StoreAgentDirectory } from "./store.js";
export type { SwapStore, ChangeSet, SwapFilter } from "./store.js";

// Notifications
export {
  NotificationDispatcher,
  MemoryNotificationSink,
  LoggingNotificationSink,
} from "./notifications.js";
export type {
  Notification,
  NotificationChannel,
  NotificationSink,
} from "./notifications.js";

// Sweeps
export { selectExpiredPending, selectStaleAccepted, selectRemindable } from "./sweeps.js";

// Reports
export {
  generateAgentInvoice,
  generatePlatformReport,
  previousMonth,
  INVOICE_LEGAL_NOTE,
  REPORT_LEGAL_DISCLAIMER,
} from "./invoices.js";
export type {
  AgentInvoice,
  AgentFeeSummary,
  PlatformReport,
  InvoiceCurrency,
} from "./invoices.js";
