import { expect } from "vitest";
import pino from "pino";
import type { Logger } from "pino";
import { EventLedger, InMemoryLedgerStore } from "@swapdesk/event-ledger";
import type { AgentProfile, ClientProfile, ExtractionResult, Money, SwapRequest } from "@swapdesk/types";
import { SwapLifecycle } from "../src/swap-lifecycle.js";
import type { ProofReader, SwapLifecycleOptions } from "../src/swap-lifecycle.js";
import { InMemorySwapStore } from "../src/store.js";
import { SwapError } from "../src/errors.js";
import type { SwapErrorCode } from "../src/errors.js";
import { MemoryNotificationSink, NotificationDispatcher } from "../src/notifications.js";
import type { NotificationSink } from "../src/notifications.js";

export const T0 = new Date("2026-03-10T08:00:00.000Z");

export const OPERATOR = "ops-1";

export function mwk(amount: string): Money {
  return { amount, currency: "MWK", decimals: 2 };
}

export function makeSwap(overrides: Partial<SwapRequest> = {}): SwapRequest {
  return {
    id: "swap-1",
    clientId: "client-1",
    agentId: "agent-1",
    amount: mwk("1000.00"),
    fromService: "national_bank",
    toService: "AIRTEL",
    destNumber: "0991234567",
    status: "PENDING",
    reference: "SWAPTEST0001",
    platformFee: mwk("12.50"),
    agentFee: mwk("37.50"),
    createdAt: T0.toISOString(),
    version: 1,
    ...overrides,
  };
}

export class ManualClock {
  private current: Date;

  constructor(start: Date = T0) {
    this.current = start;
  }

  readonly now = (): Date => this.current;

  advanceMinutes(minutes: number): Date {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
    return this.current;
  }
}

export interface Harness {
  readonly lifecycle: SwapLifecycle;
  readonly store: InMemorySwapStore;
  readonly ledger: EventLedger;
  readonly clock: ManualClock;
  readonly sink: MemoryNotificationSink;
  readonly notifications: NotificationDispatcher;
}

export interface HarnessOptions extends Partial<Omit<SwapLifecycleOptions, "store" | "ledger" | "now" | "notifications">> {
  readonly sink?: NotificationSink;
  readonly notificationLogger?: Logger;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const { sink: customSink, notificationLogger, ...rest } = options;
  const clock = new ManualClock();
  const store = new InMemorySwapStore();
  const ledger = new EventLedger({ store: new InMemoryLedgerStore(), now: clock.now });
  const sink = new MemoryNotificationSink();
  const notifications = new NotificationDispatcher(
    customSink ?? sink,
    notificationLogger ?? pino({ level: "silent" }),
  );
  const lifecycle = new SwapLifecycle({
    store,
    ledger,
    notifications,
    now: clock.now,
    operators: [OPERATOR],
    ...rest,
  });
  return { lifecycle, store, ledger, clock, sink, notifications };
}

/**
 * Register a verified, online agent and a client.
 */
export function seedParties(
  lifecycle: SwapLifecycle,
  agentOverrides: { dailyCapacity?: number; email?: string } = {},
): { agent: AgentProfile; client: ClientProfile } {
  lifecycle.registerAgent({
    id: "agent-1",
    displayName: "Agent One",
    phone: "0991000001",
    paymentDetails: {
      bankName: "National Bank",
      bankAccount: "1001234567",
      mpambaNumber: "0881000001",
    },
    ...agentOverrides,
  });
  lifecycle.verifyAgent("agent-1", OPERATOR);
  const agent = lifecycle.setAgentOnline("agent-1", "agent-1", true);
  const client = lifecycle.registerClient({
    id: "client-1",
    displayName: "Client One",
    phone: "0999000001",
  });
  return { agent, client };
}

export function createDefaultSwap(lifecycle: SwapLifecycle, amount = "1000"): SwapRequest {
  return lifecycle.createSwap({
    clientId: "client-1",
    agentId: "agent-1",
    amount,
    fromService: "national_bank",
    toService: "AIRTEL",
    destNumber: "0991234567",
  });
}

/**
 * Parser stand-in that returns the same extraction for every input.
 */
export function fixedParser(extraction: ExtractionResult): ProofReader {
  return {
    parseText: () => extraction,
    parseImage: () => extraction,
  };
}

export function extraction(amount: string, confidence: number, reference: string | null = null): ExtractionResult {
  return { amount, reference, txId: null, account: null, confidence, provider: "unknown" };
}

/**
 * Run `fn` and return the SwapError it throws, asserting its code.
 */
export function expectSwapError(fn: () => unknown, code: SwapErrorCode): SwapError {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(SwapError);
    if (err instanceof SwapError) {
      expect(err.code).toBe(code);
      return err;
    }
  }
  throw new Error(`Expected a SwapError with code ${code}`);
}
