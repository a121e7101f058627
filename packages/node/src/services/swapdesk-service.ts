/**
 * SwapDeskService: Composition root for the domain packages.
 *
 * Route handlers and jobs delegate to this service; they reach the
 * swap lifecycle and the audit ledger through it and never build
 * domain objects themselves.
 */

import pino from "pino";
import type { Logger } from "pino";
import {
  EventLedger,
  InMemoryLedgerStore,
  JsonlLedgerStore,
} from "@swapdesk/event-ledger";
import type {
  LedgerBlock,
  LedgerIntegrityResult,
  LedgerStore,
} from "@swapdesk/event-ledger";
import {
  InMemorySwapStore,
  LoggingNotificationSink,
  NotificationDispatcher,
  SwapError,
  SwapLifecycle,
} from "@swapdesk/swap";
import type {
  Clock,
  NotificationSink,
  ProofReader,
  SwapConfig,
  TransitionHook,
} from "@swapdesk/swap";

// =============================================================================
// Configuration
// =============================================================================

export interface SwapDeskServiceConfig {
  /** Swap policy overrides */
  readonly swap?: Partial<SwapConfig>;

  readonly operators?: readonly string[];

  /** JSONL ledger file; the ledger stays in memory when omitted */
  readonly ledgerFile?: string;
  readonly maxEventsPerBlock?: number;

  readonly logger?: Logger;
  readonly now?: Clock;
  readonly parser?: ProofReader;
  readonly notificationSink?: NotificationSink;
  readonly hooks?: readonly TransitionHook[];
}

// =============================================================================
// Service
// =============================================================================

export class SwapDeskService {
  readonly lifecycle: SwapLifecycle;
  readonly ledger: EventLedger;
  readonly store: InMemorySwapStore;
  readonly notifications: NotificationDispatcher;

  private readonly _logger: Logger;
  private _ready = false;

  constructor(config: SwapDeskServiceConfig = {}) {
    this._logger = config.logger ?? pino({ level: "silent" });

    const ledgerStore: LedgerStore =
      config.ledgerFile !== undefined
        ? new JsonlLedgerStore({ filePath: config.ledgerFile })
        : new InMemoryLedgerStore();

    this.ledger = new EventLedger({
      store: ledgerStore,
      ...(config.maxEventsPerBlock !== undefined
        ? { maxEventsPerBlock: config.maxEventsPerBlock }
        : {}),
      ...(config.now !== undefined ? { now: config.now } : {}),
      onIntegrityViolation: (result) => {
        this._logger.fatal(
          { lastVerifiedIndex: result.lastVerifiedIndex, errors: result.errors },
          "Ledger integrity violation",
        );
      },
    });

    const notificationLogger = this._logger.child({ component: "notifications" });
    this.notifications = new NotificationDispatcher(
      config.notificationSink ?? new LoggingNotificationSink(notificationLogger),
      notificationLogger,
    );

    this.store = new InMemorySwapStore();
    this.lifecycle = new SwapLifecycle({
      store: this.store,
      ledger: this.ledger,
      notifications: this.notifications,
      logger: this._logger.child({ component: "swap-lifecycle" }),
      ...(config.swap !== undefined ? { config: config.swap } : {}),
      ...(config.operators !== undefined ? { operators: config.operators } : {}),
      ...(config.now !== undefined ? { now: config.now } : {}),
      ...(config.parser !== undefined ? { parser: config.parser } : {}),
      ...(config.hooks !== undefined ? { hooks: config.hooks } : {}),
    });
  }

  // ─── Access ────────────────────────────────────────────────────────

  /**
   * @throws SwapError FORBIDDEN unless the actor is an operator
   */
  assertOperator(actor: string): void {
    if (!this.lifecycle.isOperator(actor)) {
      throw new SwapError("FORBIDDEN", `Actor '${actor}' is not an operator`);
    }
  }

  /**
   * @throws SwapError FORBIDDEN unless the actor is the party or an operator
   */
  assertSelfOrOperator(actor: string, partyId: string): void {
    if (actor !== partyId && !this.lifecycle.isOperator(actor)) {
      throw new SwapError("FORBIDDEN", `Actor '${actor}' may not act for '${partyId}'`);
    }
  }

  // ─── Ledger ────────────────────────────────────────────────────────

  /**
   * Verify the whole chain. A broken chain is logged at fatal level.
   */
  checkLedger(): LedgerIntegrityResult {
    const result = this.ledger.verify();
    if (!result.valid) {
      this._logger.fatal(
        { lastVerifiedIndex: result.lastVerifiedIndex, errors: result.errors },
        "Ledger integrity violation",
      );
    }
    return result;
  }

  /**
   * Seal the open block.
   *
   * @returns The sealed block, or undefined when there was nothing to seal
   */
  sealLedgerBlock(): LedgerBlock | undefined {
    return this.ledger.sealBlock();
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  /**
   * Create the genesis block if needed and check the chain. The service
   * reports not ready while the chain is broken.
   */
  initialize(): void {
    this.ledger.initialize();
    this._ready = this.checkLedger().valid;
  }

  isReady(): boolean {
    return this._ready;
  }

  /**
   * Stop taking work and wait for in-flight notifications.
   */
  async stop(): Promise<void> {
    this._ready = false;
    await this.notifications.drain();
  }
}
