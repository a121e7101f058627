/**
 * @swapdesk/event-ledger
 *
 * Hash-chained, append-only audit ledger for SwapDesk business events.
 *
 * @packageDocumentation
 */

export type {
  LedgerEvent,
  LedgerBlock,
  PreparedEvent,
  RecordEventInput,
  LedgerStatus,
  IntegrityError,
  LedgerIntegrityResult,
  LedgerStore,
  LedgerErrorCode,
} from "./types.js";
export { LedgerError } from "./types.js";

export { LEDGER_EVENT_TYPES, isLedgerEventType } from "./event-types.js";
export type {
  LedgerEventType,
  SwapCreatedPayload,
  SwapReservedPayload,
  SwapPaidBankPayload,
  SwapSentWalletPayload,
  SwapCompletedPayload,
  DisputeOpenedPayload,
  InvoiceIssuedPayload,
} from "./event-types.js";

export {
  ZERO_HASH,
  EVENT_ID_PREFIX,
  hashPayload,
  computeEventId,
  computeBlockHash,
  verifyChain,
} from "./hash-chain.js";

export { InMemoryLedgerStore } from "./in-memory-store.js";
export { JsonlLedgerStore } from "./jsonl-store.js";
export type { JsonlLedgerStoreOptions } from "./jsonl-store.js";

export { EventLedger } from "./event-ledger.js";
export type { EventLedgerOptions, LedgerEventFilter } from "./event-ledger.js";
