/**
 * SwapLifecycle: swap operations over the state machine.
 *
 * Every operation follows the same shape:
 *
 *   1. Load fresh records from the store and check preconditions
 *   2. Stage the next records, ledger events and notifications
 *   3. Commit: version checks → transition hooks → ledger append → writes
 *   4. Dispatch notifications (fire-and-forget)
 *
 * A failure before or during step 3 leaves no trace: no record, counter
 * or ledger event changes. Notifications only go out for committed work.
 *
 * The platform never moves money. Clients pay agents, agents pay the
 * client's wallet, and fees are recorded for monthly invoicing.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type {
  AgentProfile,
  ClientProfile,
  Dispute,
  DisputeOutcome,
  DisputeSeverity,
  DisputeStatus,
  ExtractionResult,
  GeoLocation,
  PaymentDetails,
  ProofKind,
  ProofRole,
  ProofStatus,
  ProofSubmission,
  ProofValidation,
  SourceService,
  SwapRequest,
  SwapStatus,
  WalletService,
} from "@swapdesk/types";
import {
  isBankService,
  isDisputeSeverity,
  isGeoLocation,
  isSourceService,
  isTerminalStatus,
  isWalletService,
} from "@swapdesk/types";
import type {
  DisputeOpenedPayload,
  EventLedger,
  InvoiceIssuedPayload,
  LedgerEvent,
  LedgerEventType,
  RecordEventInput,
  SwapCompletedPayload,
  SwapCreatedPayload,
  SwapPaidBankPayload,
  SwapReservedPayload,
  SwapSentWalletPayload,
} from "@swapdesk/event-ledger";
import { isZero } from "@swapdesk/money";
import { ProofParser, validateProof, LOW_CONFIDENCE } from "@swapdesk/proof";
import { RecommendationEngine } from "@swapdesk/matching";
import type { AgentRecommendation } from "@swapdesk/matching";
import { resolveSwapConfig } from "./config.js";
import type { SwapConfig } from "./config.js";
import { systemClock, utcDay } from "./clock.js";
import type { Clock } from "./clock.js";
import { SwapError } from "./errors.js";
import { calculateFees } from "./fees.js";
import {
  generateAgentInvoice,
  generatePlatformReport,
  previousMonth,
} from "./invoices.js";
import type { AgentInvoice, PlatformReport } from "./invoices.js";
import {
  LoggingNotificationSink,
  NotificationDispatcher,
} from "./notifications.js";
import type { Notification } from "./notifications.js";
import { generateReference } from "./reference.js";
import { StoreAgentDirectory } from "./store.js";
import type { SwapFilter, SwapStore } from "./store.js";
import {
  selectExpiredPending,
  selectRemindable,
  selectStaleAccepted,
} from "./sweeps.js";
import { assertTransition } from "./transitions.js";
import { UnitOfWork } from "./unit-of-work.js";
import type { SwapAction, SwapTransition } from "./unit-of-work.js";
import {
  normalizeWalletNumber,
  validateDestNumber,
  validateSwapAmount,
} from "./validation.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Runs inside every commit, after version checks and before anything is
 * written. Throwing aborts the whole operation.
 */
export type TransitionHook = (transition: SwapTransition) => void;

export type ProofReader = Pick<ProofParser, "parseText" | "parseImage">;

export interface SwapLifecycleOptions {
  readonly store: SwapStore;
  readonly ledger: EventLedger;
  readonly parser?: ProofReader;
  readonly recommender?: RecommendationEngine;
  readonly notifications?: NotificationDispatcher;
  readonly config?: Partial<SwapConfig>;
  readonly now?: Clock;
  readonly logger?: Logger;
  readonly hooks?: readonly TransitionHook[];

  /** Actor ids allowed to review proofs, resolve disputes and verify agents */
  readonly operators?: readonly string[];
}

export interface WriteOptions {
  /** Reject the operation unless the swap is still at this version */
  readonly expectedVersion?: number;
}

export interface CreateSwapInput {
  readonly clientId: string;

  /** Omit to assign the top recommended agent */
  readonly agentId?: string;

  readonly amount: string;
  readonly fromService: SourceService;
  readonly toService: WalletService;
  readonly destNumber: string;
}

export interface RegisterAgentInput {
  readonly id?: string;
  readonly displayName: string;
  readonly phone: string;
  readonly email?: string;
  readonly location?: GeoLocation;
  readonly paymentDetails?: PaymentDetails;
  readonly dailyCapacity?: number;
}

export interface RegisterClientInput {
  readonly id?: string;
  readonly displayName: string;
  readonly phone: string;
  readonly email?: string;
  readonly location?: GeoLocation;
}

export type ProofInput =
  | { readonly kind: "sms"; readonly text: string }
  | { readonly kind: "image"; readonly bytes: Uint8Array };

export interface ProofResult {
  readonly swap: SwapRequest;
  readonly proof: ProofSubmission;
}

export interface DisputeResult {
  readonly swap: SwapRequest;
  readonly dispute: Dispute;
}

export type ReviewDecision = "verified" | "rejected";

export const SYSTEM_ACTOR = "system";

const DISPUTE_TRANSITIONS: Record<DisputeStatus, readonly DisputeStatus[]> = {
  open: ["investigating", "escalated", "resolved"],
  investigating: ["escalated", "resolved"],
  escalated: ["investigating", "resolved"],
  resolved: [],
};

const RESOLUTION_TARGETS: Record<Exclude<DisputeOutcome, "resume">, SwapStatus> = {
  complete: "COMPLETE",
  cancel: "CANCELLED",
};

const MAX_REFERENCE_ATTEMPTS = 20;

// =============================================================================
// Helpers
// =============================================================================

function sms(
  party: { readonly id: string; readonly phone: string },
  message: string,
  swapRef?: string,
): Notification {
  return swapRef !== undefined
    ? { channel: "sms", recipientId: party.id, address: party.phone, message, swapRef }
    : { channel: "sms", recipientId: party.id, address: party.phone, message };
}

function email(
  party: { readonly id: string; readonly email?: string },
  subject: string,
  message: string,
  swapRef?: string,
): Notification | undefined {
  if (party.email === undefined) return undefined;
  const base = { channel: "email" as const, recipientId: party.id, address: party.email, subject, message };
  return swapRef !== undefined ? { ...base, swapRef } : base;
}

function paymentInstructions(agent: AgentProfile, from: SourceService): string | undefined {
  const d = agent.paymentDetails;
  if (isBankService(from)) {
    return d.bankName !== undefined && d.bankAccount !== undefined
      ? `Send to: ${d.bankName} Acc: ${d.bankAccount}`
      : undefined;
  }
  if (from === "mpamba") {
    return d.mpambaNumber !== undefined ? `Send to: TNM Mpamba ${d.mpambaNumber}` : undefined;
  }
  return d.airtelNumber !== undefined ? `Send to: Airtel Money ${d.airtelNumber}` : undefined;
}

function requireText(field: string, value: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new SwapError("VALIDATION_ERROR", `${field} must not be empty`, { field });
  }
  return trimmed;
}

function optionalLocation(location: GeoLocation | undefined): { location?: GeoLocation } {
  if (location === undefined) return {};
  if (!isGeoLocation(location)) {
    throw new SwapError("VALIDATION_ERROR", "location must have lat in [-90, 90] and lng in [-180, 180]", {
      field: "location",
    });
  }
  return { location };
}

// =============================================================================
// SwapLifecycle
// =============================================================================

export class SwapLifecycle {
  readonly config: SwapConfig;

  private readonly store: SwapStore;
  private readonly ledger: EventLedger;
  private readonly parser: ProofReader;
  private readonly recommender: RecommendationEngine;
  private readonly notifier: NotificationDispatcher;
  private readonly now: Clock;
  private readonly logger: Logger;
  private readonly hooks: readonly TransitionHook[];
  private readonly operators: ReadonlySet<string>;

  constructor(options: SwapLifecycleOptions) {
    this.config = resolveSwapConfig(options.config);
    this.store = options.store;
    this.ledger = options.ledger;
    this.logger = options.logger ?? pino({ level: "silent" });
    this.parser = options.parser ?? new ProofParser({ logger: this.logger });
    this.recommender =
      options.recommender ?? new RecommendationEngine(new StoreAgentDirectory(this.store));
    this.notifier =
      options.notifications ??
      new NotificationDispatcher(new LoggingNotificationSink(this.logger), this.logger);
    this.now = options.now ?? systemClock;
    this.hooks = options.hooks ?? [];
    this.operators = new Set(options.operators ?? ["admin"]);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Parties
  // ───────────────────────────────────────────────────────────────────────

  registerAgent(input: RegisterAgentInput): AgentProfile {
    const id = input.id ?? randomUUID();
    if (this.store.getAgent(id) !== undefined) {
      throw new SwapError("VALIDATION_ERROR", `Agent '${id}' already exists`, { field: "id" });
    }
    const capacity = input.dailyCapacity ?? this.config.defaultDailyCapacity;
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new SwapError("VALIDATION_ERROR", "dailyCapacity must be a positive integer", {
        field: "dailyCapacity",
      });
    }

    const at = this.now();
    const uow = new UnitOfWork();
    const agent = uow.agents.insert({
      id,
      displayName: requireText("displayName", input.displayName),
      phone: normalizeWalletNumber(requireText("phone", input.phone)),
      ...(input.email !== undefined ? { email: input.email } : {}),
      ...optionalLocation(input.location),
      paymentDetails: input.paymentDetails ?? {},
      verified: false,
      online: false,
      dailyCapacity: capacity,
      swapsToday: 0,
      capacityDay: utcDay(at),
      responseTimeSumSeconds: 0,
      responseTimeCount: 0,
      swapAttempts: 0,
      completedSwaps: 0,
      disputeCount: 0,
      ratingSum: 0,
      ratingCount: 0,
      joinedAt: at.toISOString(),
      version: 1,
    });
    this.commit(uow);
    return agent;
  }

  registerClient(input: RegisterClientInput): ClientProfile {
    const id = input.id ?? randomUUID();
    if (this.store.getClient(id) !== undefined) {
      throw new SwapError("VALIDATION_ERROR", `Client '${id}' already exists`, { field: "id" });
    }

    const uow = new UnitOfWork();
    const client = uow.clients.insert({
      id,
      displayName: requireText("displayName", input.displayName),
      phone: normalizeWalletNumber(requireText("phone", input.phone)),
      ...(input.email !== undefined ? { email: input.email } : {}),
      ...optionalLocation(input.location),
      version: 1,
    });
    this.commit(uow);
    return client;
  }

  /**
   * Record the outcome of an agent's KYC review.
   */
  verifyAgent(agentId: string, operator: string, approved = true, reason?: string): AgentProfile {
    this.requireOperator(operator);
    const stored = this.requireAgent(agentId);

    const uow = new UnitOfWork();
    const agent = uow.agents.update(stored, () =>
      approved ? { verified: true } : { verified: false, online: false },
    );
    this.stageEvent(uow, approved ? "KYC_APPROVED" : "KYC_REJECTED", agent.id, operator, {
      agentId: agent.id,
      ...(reason !== undefined ? { reason } : {}),
    });

    const message = approved
      ? "Your KYC verification has been approved! You can now use all platform features."
      : `Your KYC verification was rejected. Reason: ${reason ?? "not given"}. Please submit new documents.`;
    uow.notify(sms(agent, message), email(agent, "KYC Verification Status Update", message));

    this.commit(uow);
    return agent;
  }

  setAgentOnline(agentId: string, actor: string, online: boolean): AgentProfile {
    const stored = this.requireAgent(agentId);
    if (actor !== stored.id && !this.operators.has(actor)) {
      throw new SwapError("FORBIDDEN", "Only the agent may change their availability");
    }
    if (online && !stored.verified) {
      throw new SwapError("VALIDATION_ERROR", `Agent '${agentId}' must be verified before going online`);
    }
    if (stored.online === online) {
      return stored;
    }

    const uow = new UnitOfWork();
    const agent = uow.agents.update(stored, () => ({ online }));
    this.stageEvent(uow, "AGENT_STATUS_CHANGED", agent.id, actor, { agentId: agent.id, online });
    this.commit(uow);
    return agent;
  }

  toggleAgentOnline(agentId: string, actor: string): AgentProfile {
    return this.setAgentOnline(agentId, actor, !this.requireAgent(agentId).online);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Create / respond
  // ───────────────────────────────────────────────────────────────────────

  createSwap(input: CreateSwapInput): SwapRequest {
    const client = this.requireClient(input.clientId);
    if (!isSourceService(input.fromService)) {
      throw new SwapError("VALIDATION_ERROR", `Unknown source service "${String(input.fromService)}"`, {
        field: "fromService",
      });
    }
    if (!isWalletService(input.toService)) {
      throw new SwapError("VALIDATION_ERROR", `Unknown wallet service "${String(input.toService)}"`, {
        field: "toService",
      });
    }
    const amount = validateSwapAmount(input.amount, this.config);
    const destNumber = validateDestNumber(input.destNumber, input.toService);

    const agent =
      input.agentId !== undefined
        ? this.requireAgent(input.agentId)
        : this.pickAgent(client, amount.amount, input.toService);

    if (!agent.online || !agent.verified) {
      throw new SwapError("AGENT_UNAVAILABLE", `Agent '${agent.displayName}' is not available`, {
        agentId: agent.id,
      });
    }
    const at = this.now();
    this.assertCapacity(agent, at);

    const fees = calculateFees(amount, this.config);
    const uow = new UnitOfWork();
    const swap = uow.swaps.insert({
      id: randomUUID(),
      clientId: client.id,
      agentId: agent.id,
      amount,
      fromService: input.fromService,
      toService: input.toService,
      destNumber,
      status: "PENDING",
      reference: this.uniqueReference(),
      platformFee: fees.platformFee,
      agentFee: fees.agentFee,
      createdAt: at.toISOString(),
      version: 1,
    });

    const payload: SwapCreatedPayload = {
      swapRef: swap.reference,
      amount: amount.amount,
      currency: amount.currency,
      clientId: client.id,
      agentId: agent.id,
      fromService: swap.fromService,
      toService: swap.toService,
      calculatedFee: fees.total.amount,
      moneyFlow: "direct_client_to_agent",
    };
    this.stageTransition(uow, "create", client.id, undefined, swap, "SWAP_CREATED", payload);

    uow.notify(
      sms(
        agent,
        `New swap request: ${amount.currency} ${amount.amount} from ${client.displayName}. Reference: ${swap.reference}`,
        swap.reference,
      ),
      email(
        agent,
        `New Swap Request - ${swap.reference}`,
        [
          `You have a new swap request from ${client.displayName}.`,
          `Amount: ${amount.currency} ${amount.amount}`,
          `From: ${swap.fromService}`,
          `To: ${swap.toService}`,
          `Reference: ${swap.reference}`,
          `Please respond within ${this.config.pendingTimeoutMinutes} minutes.`,
        ].join("\n"),
        swap.reference,
      ),
    );

    this.commit(uow);
    return swap;
  }

  acceptSwap(swapId: string, agentId: string, options: WriteOptions = {}): SwapRequest {
    const stored = this.loadSwap(swapId, options);
    const agent = this.requireAssignedAgent(stored, agentId);
    assertTransition(stored, "ACCEPTED", ["PENDING"]);

    const at = this.now();
    this.assertCapacity(agent, at);
    const responseSeconds = Math.max(
      0,
      Math.round((at.getTime() - Date.parse(stored.resumedAt ?? stored.createdAt)) / 1000),
    );
    const today = utcDay(at);

    const uow = new UnitOfWork();
    const swap = uow.swaps.update(stored, () => ({
      status: "ACCEPTED",
      agentRespondedAt: at.toISOString(),
    }));
    uow.agents.update(agent, (a) => ({
      swapsToday: (a.capacityDay === today ? a.swapsToday : 0) + 1,
      capacityDay: today,
      responseTimeSumSeconds: a.responseTimeSumSeconds + responseSeconds,
      responseTimeCount: a.responseTimeCount + 1,
      swapAttempts: a.swapAttempts + 1,
    }));

    const payload: SwapReservedPayload = {
      swapRef: swap.reference,
      agentRespondedAt: at.toISOString(),
      responseSeconds,
    };
    this.stageTransition(uow, "accept", agent.id, stored, swap, "SWAP_RESERVED", payload);

    const client = this.requireClient(swap.clientId);
    const message = `Agent ${agent.displayName} accepted your swap request. Please send ${swap.amount.currency} ${swap.amount.amount} to their account.`;
    const instructions = paymentInstructions(agent, swap.fromService);
    uow.notify(
      sms(
        client,
        instructions !== undefined
          ? `${message} ${instructions}. Ref: ${swap.reference}`
          : `${message} Reference: ${swap.reference}`,
        swap.reference,
      ),
    );

    this.commit(uow);
    return swap;
  }

  rejectSwap(
    swapId: string,
    agentId: string,
    reason?: string,
    options: WriteOptions = {},
  ): SwapRequest {
    const stored = this.loadSwap(swapId, options);
    const agent = this.requireAssignedAgent(stored, agentId);
    assertTransition(stored, "REJECTED", ["PENDING"]);

    const uow = new UnitOfWork();
    const swap = uow.swaps.update(stored, () =>
      reason !== undefined ? { status: "REJECTED", rejectionReason: reason } : { status: "REJECTED" },
    );
    this.stageTransition(uow, "reject", agent.id, stored, swap, "SWAP_REJECTED", {
      swapRef: swap.reference,
      ...(reason !== undefined ? { reason } : {}),
    });

    const client = this.requireClient(swap.clientId);
    uow.notify(
      sms(
        client,
        `Agent ${agent.displayName} declined swap ${swap.reference}.${reason !== undefined ? ` Reason: ${reason}` : ""}`,
        swap.reference,
      ),
    );

    this.commit(uow);
    return swap;
  }

  /**
   * Client withdraws a swap that is still PENDING or ACCEPTED.
   */
  cancelSwap(
    swapId: string,
    clientId: string,
    reason?: string,
    options: WriteOptions = {},
  ): SwapRequest {
    const stored = this.loadSwap(swapId, options);
    if (stored.clientId !== clientId) {
      throw new SwapError("FORBIDDEN", "Only the requesting client may cancel this swap");
    }
    assertTransition(stored, "CANCELLED", ["PENDING", "ACCEPTED"]);

    const cancellationReason = reason ?? "Cancelled by client";
    const uow = new UnitOfWork();
    const swap = uow.swaps.update(stored, () => ({ status: "CANCELLED", cancellationReason }));
    this.stageTransition(uow, "cancel", clientId, stored, swap, "SWAP_CANCELLED", {
      swapRef: swap.reference,
      reason: cancellationReason,
    });

    const agent = this.requireAgent(swap.agentId);
    uow.notify(sms(agent, `Swap ${swap.reference} was cancelled by the client.`, swap.reference));

    this.commit(uow);
    return swap;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Proofs
  // ───────────────────────────────────────────────────────────────────────

  submitClientProof(
    swapId: string,
    clientId: string,
    input: ProofInput,
    options: WriteOptions = {},
  ): ProofResult {
    const stored = this.loadSwap(swapId, options);
    if (stored.clientId !== clientId) {
      throw new SwapError("FORBIDDEN", "Only the requesting client may upload the payment proof");
    }
    assertTransition(stored, "CLIENT_PROOF_UPLOADED", ["ACCEPTED"]);

    const at = this.now().toISOString();
    const uow = new UnitOfWork();
    const proof = this.stageProof(uow, stored, "client", clientId, input, at);
    const swap = uow.swaps.update(stored, () => ({
      status: "CLIENT_PROOF_UPLOADED",
      clientProofUploadedAt: at,
    }));

    const payload: SwapPaidBankPayload = {
      swapRef: swap.reference,
      clientProofUploadedAt: at,
      proofId: proof.id,
      confidence: proof.extraction.confidence,
      moneyFlow: "direct_client_to_agent",
    };
    this.stageTransition(uow, "client_proof", clientId, stored, swap, "SWAP_PAID_BANK", payload);

    const agent = this.requireAgent(swap.agentId);
    uow.notify(
      sms(
        agent,
        `Client uploaded payment proof for swap ${swap.reference}. Confirm receipt of ${swap.amount.currency} ${swap.amount.amount}, then send to ${swap.toService} ${swap.destNumber}.`,
        swap.reference,
      ),
    );

    this.commit(uow);
    return { swap, proof };
  }

  /**
   * Agent proves the wallet payout. If both proofs end up verified the
   * swap completes in the same commit.
   */
  submitAgentProof(
    swapId: string,
    agentId: string,
    input: ProofInput,
    options: WriteOptions = {},
  ): ProofResult {
    const stored = this.loadSwap(swapId, options);
    this.requireAssignedAgent(stored, agentId);
    assertTransition(stored, "AGENT_PROOF_UPLOADED", ["CLIENT_PROOF_UPLOADED"]);

    const at = this.now().toISOString();
    const uow = new UnitOfWork();
    const proof = this.stageProof(uow, stored, "agent", agentId, input, at);
    const swap = uow.swaps.update(stored, () => ({
      status: "AGENT_PROOF_UPLOADED",
      agentProofUploadedAt: at,
    }));

    const payload: SwapSentWalletPayload = {
      swapRef: swap.reference,
      agentProofUploadedAt: at,
      proofId: proof.id,
      confidence: proof.extraction.confidence,
      moneyFlow: "direct_agent_to_client",
    };
    this.stageTransition(uow, "agent_proof", agentId, stored, swap, "SWAP_SENT_WALLET", payload);

    const client = this.requireClient(swap.clientId);
    uow.notify(
      sms(
        client,
        `Agent sent ${swap.amount.currency} ${swap.amount.amount} to your ${swap.toService} wallet ${swap.destNumber} for swap ${swap.reference}.`,
        swap.reference,
      ),
    );

    const final = this.completeIfVerified(uow, stored, agentId);
    this.commit(uow);
    return { swap: final, proof };
  }

  /**
   * Operator verifies or rejects a proof. Verifying the last missing
   * proof of an AGENT_PROOF_UPLOADED swap completes it.
   */
  reviewProof(
    proofId: string,
    operator: string,
    decision: ReviewDecision,
  ): ProofResult {
    this.requireOperator(operator);
    const storedProof = this.store.getProof(proofId);
    if (storedProof === undefined) {
      throw new SwapError("NOT_FOUND", `Proof '${proofId}' not found`);
    }
    if (storedProof.status === "verified" || storedProof.status === "rejected") {
      throw new SwapError(
        "INVALID_TRANSITION",
        `Proof '${proofId}' was already ${storedProof.status}`,
      );
    }
    const stored = this.requireSwap(storedProof.swapId);
    if (isTerminalStatus(stored.status)) {
      throw new SwapError(
        "INVALID_TRANSITION",
        `Swap '${stored.reference}' is ${stored.status}; its proofs can no longer be reviewed`,
      );
    }

    const at = this.now().toISOString();
    const uow = new UnitOfWork();
    const proof = uow.proofs.update(storedProof, () => ({
      status: decision,
      reviewedBy: operator,
      reviewedAt: at,
    }));
    this.stageEvent(uow, "PROOF_REVIEWED", stored.reference, operator, {
      proofId: proof.id,
      role: proof.role,
      decision,
    });

    const swap = decision === "verified" ? this.completeIfVerified(uow, stored, operator) : stored;
    this.commit(uow);
    return { swap, proof };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Completion
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Client confirms receipt of the wallet payout, or an operator closes the
   * swap. The agent cannot confirm its own payout, and a rejected agent
   * proof blocks completion until a dispute settles it.
   */
  completeSwap(swapId: string, actor: string, options: WriteOptions = {}): SwapRequest {
    const stored = this.loadSwap(swapId, options);
    if (actor !== stored.clientId && !this.operators.has(actor)) {
      throw new SwapError("FORBIDDEN", "Only the requesting client or an operator may complete this swap");
    }
    assertTransition(stored, "COMPLETE", ["AGENT_PROOF_UPLOADED"]);

    const uow = new UnitOfWork();
    if (this.latestProof(uow, stored.id, "agent")?.status === "rejected") {
      throw new SwapError(
        "INVALID_TRANSITION",
        `Swap '${stored.reference}' cannot complete: the agent's proof was rejected`,
      );
    }

    const swap = this.stageCompletion(uow, stored, actor, "complete");
    this.commit(uow);
    return swap;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Disputes
  // ───────────────────────────────────────────────────────────────────────

  openDispute(
    swapId: string,
    openedBy: string,
    reason: string,
    severity: DisputeSeverity = "medium",
    options: WriteOptions = {},
  ): DisputeResult {
    const stored = this.loadSwap(swapId, options);
    if (openedBy !== stored.clientId && openedBy !== stored.agentId && !this.operators.has(openedBy)) {
      throw new SwapError("FORBIDDEN", "Only a party to the swap may open a dispute");
    }
    if (this.store.listDisputes(swapId).some((d) => d.status !== "resolved")) {
      throw new SwapError("DUPLICATE_DISPUTE", `Swap '${stored.reference}' already has an open dispute`);
    }
    const trimmed = reason.trim();
    if (trimmed.length < this.config.minDisputeReasonLength) {
      throw new SwapError(
        "VALIDATION_ERROR",
        `Dispute reason must be at least ${this.config.minDisputeReasonLength} characters`,
        { field: "reason" },
      );
    }
    if (!isDisputeSeverity(severity)) {
      throw new SwapError("VALIDATION_ERROR", `Unknown severity "${String(severity)}"`, {
        field: "severity",
      });
    }
    assertTransition(stored, "DISPUTE");

    const at = this.now().toISOString();
    const uow = new UnitOfWork();
    const dispute = uow.disputes.insert({
      id: randomUUID(),
      swapId,
      openedBy,
      reason: trimmed,
      severity,
      status: "open",
      openedAt: at,
      version: 1,
    });
    const swap = uow.swaps.update(stored, () => ({
      status: "DISPUTE",
      statusBeforeDispute: stored.status,
    }));
    const agent = this.requireAgent(stored.agentId);
    uow.agents.update(agent, (a) => ({ disputeCount: a.disputeCount + 1 }));

    const payload: DisputeOpenedPayload = {
      swapRef: swap.reference,
      disputeId: dispute.id,
      reason: trimmed,
      severity,
    };
    this.stageTransition(uow, "dispute", openedBy, stored, swap, "DISPUTE_OPENED", payload);

    const summary = trimmed.length > 50 ? `${trimmed.slice(0, 50)}...` : trimmed;
    const message = `Dispute alert: dispute opened for swap ${swap.reference}. Severity: ${severity}. Reason: ${summary}`;
    uow.notify(
      sms(this.requireClient(swap.clientId), message, swap.reference),
      sms(agent, message, swap.reference),
    );

    this.commit(uow);
    return { swap, dispute };
  }

  markInvestigating(disputeId: string, operator: string): Dispute {
    return this.moveDispute(disputeId, operator, "investigating");
  }

  escalateDispute(disputeId: string, operator: string): Dispute {
    return this.moveDispute(disputeId, operator, "escalated");
  }

  /**
   * Close a dispute and decide what happens to the swap.
   *
   * - resume: back to the status held when the dispute opened
   * - complete: COMPLETE, with the usual completion effects
   * - cancel: CANCELLED
   */
  resolveDispute(
    disputeId: string,
    operator: string,
    resolution: string,
    outcome: DisputeOutcome,
  ): DisputeResult {
    this.requireOperator(operator);
    const storedDispute = this.requireDispute(disputeId);
    if (!DISPUTE_TRANSITIONS[storedDispute.status].includes("resolved")) {
      throw new SwapError("INVALID_TRANSITION", `Dispute '${disputeId}' is already resolved`);
    }
    const text = requireText("resolution", resolution);
    const stored = this.requireSwap(storedDispute.swapId);

    const target =
      outcome === "resume" ? stored.statusBeforeDispute : RESOLUTION_TARGETS[outcome];
    if (target === undefined) {
      throw new SwapError(
        "INVALID_TRANSITION",
        `Swap '${stored.reference}' has no status to resume`,
      );
    }
    assertTransition(stored, target, ["DISPUTE"]);

    const at = this.now().toISOString();
    const uow = new UnitOfWork();
    const dispute = uow.disputes.update(storedDispute, () => ({
      status: "resolved",
      resolution: text,
      outcome,
      resolvedBy: operator,
      resolvedAt: at,
    }));

    let swap: SwapRequest;
    if (target === "COMPLETE") {
      uow.swaps.update(stored, () => ({ statusBeforeDispute: undefined }));
      swap = this.stageCompletion(uow, stored, operator, "resolve");
    } else if (target === "CANCELLED") {
      const cancellationReason = `Dispute resolved: ${text}`;
      swap = uow.swaps.update(stored, () => ({
        status: "CANCELLED",
        cancellationReason,
        statusBeforeDispute: undefined,
      }));
      this.stageTransition(uow, "resolve", operator, stored, swap, "SWAP_CANCELLED", {
        swapRef: swap.reference,
        reason: cancellationReason,
      });
    } else {
      swap = uow.swaps.update(stored, () => ({
        status: target,
        statusBeforeDispute: undefined,
        resumedAt: at,
      }));
      uow.transitions.push({ action: "resolve", actor: operator, previous: stored, next: swap });
    }

    this.stageEvent(uow, "DISPUTE_RESOLVED", swap.reference, operator, {
      swapRef: swap.reference,
      disputeId: dispute.id,
      outcome,
      resolution: text,
    });

    const message = `Dispute for swap ${swap.reference} resolved: ${text}`;
    uow.notify(
      sms(this.requireClient(swap.clientId), message, swap.reference),
      sms(this.requireAgent(swap.agentId), message, swap.reference),
    );

    this.commit(uow);
    return { swap, dispute };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Ratings
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Client rates the agent of a completed swap, once. The swap record is
   * not touched; the rating lives on the agent and in the ledger.
   */
  rateAgent(swapId: string, clientId: string, rating: number): AgentProfile {
    const swap = this.requireSwap(swapId);
    if (swap.clientId !== clientId) {
      throw new SwapError("FORBIDDEN", "Only the requesting client may rate this swap");
    }
    if (swap.status !== "COMPLETE") {
      throw new SwapError("INVALID_TRANSITION", `Swap '${swap.reference}' is not complete`);
    }
    if (!Number.isInteger(rating) || rating < 1 || rating > 5) {
      throw new SwapError("VALIDATION_ERROR", "Rating must be an integer from 1 to 5", {
        field: "rating",
      });
    }
    const rated = this.ledger
      .listEvents({ entityRef: swap.reference, eventType: "AGENT_RATED" })
      .length > 0;
    if (rated) {
      throw new SwapError("VALIDATION_ERROR", `Swap '${swap.reference}' has already been rated`);
    }

    const uow = new UnitOfWork();
    const agent = uow.agents.update(this.requireAgent(swap.agentId), (a) => ({
      ratingSum: a.ratingSum + rating,
      ratingCount: a.ratingCount + 1,
    }));
    this.stageEvent(uow, "AGENT_RATED", swap.reference, clientId, {
      swapRef: swap.reference,
      agentId: agent.id,
      rating,
    });
    this.commit(uow);
    return agent;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Sweeps
  // ───────────────────────────────────────────────────────────────────────

  /**
   * PENDING swaps past the response window become EXPIRED. Each swap is
   * its own commit; a swap changed concurrently is skipped.
   */
  expirePending(now: Date = this.now()): SwapRequest[] {
    const due = selectExpiredPending(this.store.listSwaps({ status: "PENDING" }), now, this.config);
    return this.sweep(due, (stored, uow) => {
      const swap = uow.swaps.update(stored, () => ({ status: "EXPIRED" }));
      this.stageTransition(uow, "expire", SYSTEM_ACTOR, stored, swap, "SWAP_EXPIRED", {
        swapRef: swap.reference,
        createdAt: swap.createdAt,
      });
      uow.notify(
        sms(
          this.requireClient(swap.clientId),
          `Swap request ${swap.reference} expired - the agent didn't respond in time.`,
          swap.reference,
        ),
      );
      return swap;
    });
  }

  /**
   * ACCEPTED swaps without a client proof after the payment window are
   * CANCELLED.
   */
  cancelStaleAccepted(now: Date = this.now()): SwapRequest[] {
    const due = selectStaleAccepted(this.store.listSwaps({ status: "ACCEPTED" }), now, this.config);
    return this.sweep(due, (stored, uow) => {
      const cancellationReason = "Payment proof not uploaded in time";
      const swap = uow.swaps.update(stored, () => ({ status: "CANCELLED", cancellationReason }));
      this.stageTransition(uow, "timeout", SYSTEM_ACTOR, stored, swap, "SWAP_CANCELLED", {
        swapRef: swap.reference,
        reason: cancellationReason,
      });
      uow.notify(
        sms(
          this.requireClient(swap.clientId),
          `Swap ${swap.reference} cancelled - payment proof not uploaded in time.`,
          swap.reference,
        ),
        sms(
          this.requireAgent(swap.agentId),
          `Swap ${swap.reference} cancelled - the client didn't upload proof in time.`,
          swap.reference,
        ),
      );
      return swap;
    });
  }

  /**
   * Remind agents of PENDING swaps waiting longer than the reminder
   * threshold. Changes no state.
   */
  remindPending(now: Date = this.now()): SwapRequest[] {
    const due = selectRemindable(this.store.listSwaps({ status: "PENDING" }), now, this.config);
    const notifications = due.map((swap) => {
      const client = this.requireClient(swap.clientId);
      return sms(
        this.requireAgent(swap.agentId),
        `Reminder: pending swap request ${swap.amount.currency} ${swap.amount.amount} from ${client.displayName}. Reference: ${swap.reference}`,
        swap.reference,
      );
    });
    this.notifier.dispatch(notifications);
    return due;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Ledger & reports
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Record a business event that is not part of a swap transition.
   */
  recordLedgerEvent(input: RecordEventInput): LedgerEvent {
    return this.ledger.recordEvent(input);
  }

  generateAgentInvoice(agentId: string, month: string): AgentInvoice {
    this.requireAgent(agentId);
    return generateAgentInvoice(this.store.listSwaps({ agentId }), agentId, month, this.config);
  }

  /**
   * Issue the invoices for `month` (by default the month before now): one
   * per verified agent that owes platform fees. Each invoice is recorded
   * in the ledger and sent to the agent; an invoice already recorded is
   * not issued again.
   */
  issueMonthlyInvoices(month: string = previousMonth(this.now())): AgentInvoice[] {
    const issued: AgentInvoice[] = [];
    for (const agent of this.store.listAgents()) {
      if (!agent.verified) continue;
      const invoice = generateAgentInvoice(
        this.store.listSwaps({ agentId: agent.id }),
        agent.id,
        month,
        this.config,
      );
      if (isZero(invoice.totalPlatformFee)) continue;
      const recorded = this.ledger.listEvents({
        entityRef: invoice.invoiceNumber,
        eventType: "INVOICE_ISSUED",
      });
      if (recorded.length > 0) continue;

      const fee = invoice.totalPlatformFee;
      const uow = new UnitOfWork();
      const payload: InvoiceIssuedPayload = {
        invoiceNumber: invoice.invoiceNumber,
        agentId: agent.id,
        period: invoice.period,
        totalSwaps: invoice.totalSwaps,
        platformFeeOwed: fee.amount,
        dueDate: invoice.dueDate,
      };
      this.stageEvent(uow, "INVOICE_ISSUED", invoice.invoiceNumber, SYSTEM_ACTOR, payload);

      const summary = `Invoice ${invoice.invoiceNumber} for ${invoice.periodLabel}: ${invoice.totalSwaps} swap(s), platform fee ${fee.currency} ${fee.amount} due ${invoice.dueDate}.`;
      uow.notify(
        email(agent, `SwapDesk Invoice - ${invoice.periodLabel}`, summary) ?? sms(agent, summary),
      );
      this.commit(uow);
      issued.push(invoice);
    }
    return issued;
  }

  generatePlatformReport(month: string): PlatformReport {
    return generatePlatformReport(this.store.listSwaps(), month, this.config);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getSwap(id: string): SwapRequest | undefined {
    return this.store.getSwap(id);
  }

  getSwapByReference(reference: string): SwapRequest | undefined {
    return this.store.getSwapByReference(reference);
  }

  listSwaps(filter?: SwapFilter): readonly SwapRequest[] {
    return this.store.listSwaps(filter);
  }

  getAgent(id: string): AgentProfile | undefined {
    return this.store.getAgent(id);
  }

  listAgents(): readonly AgentProfile[] {
    return this.store.listAgents();
  }

  getClient(id: string): ClientProfile | undefined {
    return this.store.getClient(id);
  }

  listProofs(swapId: string): readonly ProofSubmission[] {
    return this.store.listProofs(swapId);
  }

  getDispute(id: string): Dispute | undefined {
    return this.store.getDispute(id);
  }

  listDisputes(swapId?: string): readonly Dispute[] {
    return this.store.listDisputes(swapId);
  }

  recommend(
    clientId: string,
    amount: string,
    targetService: WalletService,
    maxResults?: number,
  ): AgentRecommendation[] {
    const client = this.requireClient(clientId);
    return this.recommender.recommend({
      client,
      amount: validateSwapAmount(amount, this.config),
      targetService,
      ...(maxResults !== undefined ? { maxResults } : {}),
    });
  }

  isOperator(actor: string): boolean {
    return this.operators.has(actor);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private: staging
  // ───────────────────────────────────────────────────────────────────────

  private stageEvent(
    uow: UnitOfWork,
    eventType: LedgerEventType,
    entityRef: string,
    actor: string,
    payload: object,
  ): void {
    uow.events.push(this.ledger.prepareEvent({ eventType, entityRef, actor, payload }));
  }

  private stageTransition(
    uow: UnitOfWork,
    action: SwapAction,
    actor: string,
    previous: SwapRequest | undefined,
    next: SwapRequest,
    eventType: LedgerEventType,
    payload: object,
  ): void {
    uow.transitions.push({ action, actor, previous, next });
    this.stageEvent(uow, eventType, next.reference, actor, payload);
  }

  private stageProof(
    uow: UnitOfWork,
    swap: SwapRequest,
    role: ProofRole,
    submittedBy: string,
    input: ProofInput,
    at: string,
  ): ProofSubmission {
    const kind: ProofKind = input.kind;
    const extraction =
      input.kind === "sms" ? this.parser.parseText(input.text) : this.parser.parseImage(input.bytes);
    const validation = validateProof(extraction, swap);
    const status = this.proofStatus(extraction, validation);

    return uow.proofs.insert({
      id: randomUUID(),
      swapId: swap.id,
      role,
      submittedBy,
      kind,
      extraction,
      validation,
      status,
      submittedAt: at,
      ...(status === "verified" ? { reviewedBy: SYSTEM_ACTOR, reviewedAt: at } : {}),
      version: 1,
    });
  }

  private proofStatus(extraction: ExtractionResult, validation: ProofValidation): ProofStatus {
    if (validation.isValid && extraction.confidence > this.config.autoVerifyConfidence) {
      return "verified";
    }
    if (!validation.isValid || extraction.confidence < LOW_CONFIDENCE) {
      return "needs_review";
    }
    return "pending";
  }

  /**
   * Stage completion if the swap (as staged so far) is awaiting it and
   * the latest client and agent proofs are both verified.
   */
  private completeIfVerified(uow: UnitOfWork, stored: SwapRequest, actor: string): SwapRequest {
    const current = uow.swaps.current(stored);
    if (current.status !== "AGENT_PROOF_UPLOADED") {
      return current;
    }
    const client = this.latestProof(uow, stored.id, "client");
    const agent = this.latestProof(uow, stored.id, "agent");
    if (client?.status !== "verified" || agent?.status !== "verified") {
      return current;
    }
    return this.stageCompletion(uow, stored, actor, "complete");
  }

  private latestProof(uow: UnitOfWork, swapId: string, role: ProofRole): ProofSubmission | undefined {
    const staged = uow.proofs.values().filter((p) => p.swapId === swapId && p.role === role);
    const candidates = [
      ...this.store.listProofs(swapId).filter((p) => p.role === role).map((p) => uow.proofs.current(p)),
      ...staged.filter((p) => p.version === 1),
    ];
    return candidates[candidates.length - 1];
  }

  private stageCompletion(
    uow: UnitOfWork,
    stored: SwapRequest,
    actor: string,
    action: SwapAction,
  ): SwapRequest {
    const previous = uow.swaps.current(stored);
    const at = this.now().toISOString();
    const swap = uow.swaps.update(stored, () => ({ status: "COMPLETE", completedAt: at }));
    const agent = uow.agents.update(this.requireAgent(stored.agentId), (a) => ({
      completedSwaps: a.completedSwaps + 1,
    }));

    const payload: SwapCompletedPayload = {
      swapRef: swap.reference,
      platformFeeOwed: swap.platformFee.amount,
      agentFeeEarned: swap.agentFee.amount,
      settlementStatus: "monthly_invoice",
    };
    this.stageTransition(uow, action, actor, previous, swap, "SWAP_COMPLETED", payload);

    const client = this.requireClient(swap.clientId);
    uow.notify(
      sms(
        client,
        `Swap ${swap.reference} completed! You received ${swap.amount.currency} ${swap.amount.amount} on your ${swap.toService} wallet.`,
        swap.reference,
      ),
      sms(
        agent,
        `Swap ${swap.reference} completed! You earned ${swap.agentFee.currency} ${swap.agentFee.amount} in agent fees.`,
        swap.reference,
      ),
    );
    return swap;
  }

  private moveDispute(disputeId: string, operator: string, target: DisputeStatus): Dispute {
    this.requireOperator(operator);
    const stored = this.requireDispute(disputeId);
    if (!DISPUTE_TRANSITIONS[stored.status].includes(target)) {
      throw new SwapError(
        "INVALID_TRANSITION",
        `Cannot move dispute '${disputeId}' from '${stored.status}' to '${target}'`,
      );
    }
    const uow = new UnitOfWork();
    const dispute = uow.disputes.update(stored, () => ({ status: target }));
    this.commit(uow);
    return dispute;
  }

  private sweep(
    due: readonly SwapRequest[],
    stage: (stored: SwapRequest, uow: UnitOfWork) => SwapRequest,
  ): SwapRequest[] {
    const changed: SwapRequest[] = [];
    for (const stored of due) {
      try {
        const uow = new UnitOfWork();
        const swap = stage(stored, uow);
        this.commit(uow);
        changed.push(swap);
      } catch (err) {
        this.logger.error({ err, swapRef: stored.reference }, "Sweep failed for swap");
      }
    }
    return changed;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private: commit
  // ───────────────────────────────────────────────────────────────────────

  private commit(uow: UnitOfWork): void {
    this.store.commit(uow.toChangeSet(), () => {
      for (const transition of uow.transitions) {
        for (const hook of this.hooks) {
          hook(transition);
        }
      }
      this.ledger.commitEvents(uow.events);
    });

    for (const t of uow.transitions) {
      this.logger.info(
        {
          action: t.action,
          swapRef: t.next.reference,
          from: t.previous?.status ?? null,
          to: t.next.status,
          actor: t.actor,
        },
        "Swap transition committed",
      );
    }
    this.notifier.dispatch(uow.notifications);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private: lookups & checks
  // ───────────────────────────────────────────────────────────────────────

  private requireSwap(id: string): SwapRequest {
    const swap = this.store.getSwap(id);
    if (swap === undefined) {
      throw new SwapError("NOT_FOUND", `Swap '${id}' not found`);
    }
    return swap;
  }

  private loadSwap(id: string, options: WriteOptions): SwapRequest {
    const swap = this.requireSwap(id);
    if (options.expectedVersion !== undefined && options.expectedVersion !== swap.version) {
      throw new SwapError(
        "INVALID_TRANSITION",
        `Swap '${swap.reference}' is at version ${swap.version}, request expected ${options.expectedVersion}`,
        { swapId: id, version: swap.version },
      );
    }
    return swap;
  }

  private requireAgent(id: string): AgentProfile {
    const agent = this.store.getAgent(id);
    if (agent === undefined) {
      throw new SwapError("NOT_FOUND", `Agent '${id}' not found`);
    }
    return agent;
  }

  private requireClient(id: string): ClientProfile {
    const client = this.store.getClient(id);
    if (client === undefined) {
      throw new SwapError("NOT_FOUND", `Client '${id}' not found`);
    }
    return client;
  }

  private requireDispute(id: string): Dispute {
    const dispute = this.store.getDispute(id);
    if (dispute === undefined) {
      throw new SwapError("NOT_FOUND", `Dispute '${id}' not found`);
    }
    return dispute;
  }

  private requireAssignedAgent(swap: SwapRequest, agentId: string): AgentProfile {
    if (swap.agentId !== agentId) {
      throw new SwapError("FORBIDDEN", "Only the assigned agent may act on this swap");
    }
    return this.requireAgent(agentId);
  }

  private requireOperator(actor: string): void {
    if (!this.operators.has(actor)) {
      throw new SwapError("FORBIDDEN", `'${actor}' is not an operator`);
    }
  }

  private assertCapacity(agent: AgentProfile, at: Date): void {
    const used = agent.capacityDay === utcDay(at) ? agent.swapsToday : 0;
    if (used >= agent.dailyCapacity) {
      throw new SwapError(
        "CAPACITY_EXCEEDED",
        `Agent '${agent.displayName}' has reached the daily limit of ${agent.dailyCapacity} swaps`,
        { agentId: agent.id },
      );
    }
  }

  private pickAgent(client: ClientProfile, amount: string, toService: WalletService): AgentProfile {
    const [top] = this.recommend(client.id, amount, toService, 1);
    if (top === undefined) {
      throw new SwapError("AGENT_UNAVAILABLE", "No agents are available right now");
    }
    return top.agent;
  }

  private uniqueReference(): string {
    for (let i = 0; i < MAX_REFERENCE_ATTEMPTS; i++) {
      const reference = generateReference();
      if (this.store.getSwapByReference(reference) === undefined) {
        return reference;
      }
    }
    throw new Error(`Could not generate a unique swap reference in ${MAX_REFERENCE_ATTEMPTS} attempts`);
  }
}
