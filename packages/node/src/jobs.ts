/**
 * Background jobs.
 *
 * sweep        expire unanswered PENDING swaps, cancel ACCEPTED swaps
 *              whose client never uploaded proof
 * reminders    remind agents about PENDING swaps
 * integrity    verify the ledger chain (violations log at fatal)
 * invoices     issue last month's agent invoices (once per invoice)
 *
 * Each job runs on its own interval and can be run once by hand. A job
 * that throws on a timer tick is logged; the timer keeps running.
 */

import type { Logger } from "pino";
import type { SwapDeskService } from "./services/swapdesk-service.js";

export type JobName = "sweep" | "reminders" | "integrity" | "invoices";

export const JOB_NAMES: readonly JobName[] = ["sweep", "reminders", "integrity", "invoices"];

export type JobOutcome =
  | { readonly job: "sweep"; readonly expired: number; readonly cancelled: number }
  | { readonly job: "reminders"; readonly reminded: number }
  | { readonly job: "integrity"; readonly valid: boolean; readonly errors: number }
  | { readonly job: "invoices"; readonly issued: readonly string[] };

export interface JobRunnerOptions {
  readonly service: SwapDeskService;
  readonly logger: Logger;

  /** Milliseconds between runs; 0 or absent disables the job */
  readonly intervals: Partial<Record<JobName, number>>;
}

export class JobRunner {
  private readonly _service: SwapDeskService;
  private readonly _logger: Logger;
  private readonly _intervals: Partial<Record<JobName, number>>;
  private readonly _timers = new Map<JobName, NodeJS.Timeout>();

  constructor(options: JobRunnerOptions) {
    this._service = options.service;
    this._logger = options.logger;
    this._intervals = options.intervals;
  }

  /**
   * Schedule every enabled job. Calling start twice is a no-op.
   */
  start(): void {
    for (const job of JOB_NAMES) {
      const ms = this._intervals[job] ?? 0;
      if (ms <= 0 || this._timers.has(job)) continue;
      const timer = setInterval(() => this.tick(job), ms);
      timer.unref();
      this._timers.set(job, timer);
      this._logger.info({ job, intervalMs: ms }, "Job scheduled");
    }
  }

  stop(): void {
    for (const timer of this._timers.values()) {
      clearInterval(timer);
    }
    this._timers.clear();
  }

  get scheduled(): readonly JobName[] {
    return [...this._timers.keys()];
  }

  /**
   * Run one job now.
   *
   * @throws whatever the job throws
   */
  runOnce(job: JobName): JobOutcome {
    const { lifecycle } = this._service;
    switch (job) {
      case "sweep": {
        const expired = lifecycle.expirePending();
        const cancelled = lifecycle.cancelStaleAccepted();
        return { job, expired: expired.length, cancelled: cancelled.length };
      }
      case "reminders":
        return { job, reminded: lifecycle.remindPending().length };
      case "integrity": {
        const result = this._service.checkLedger();
        return { job, valid: result.valid, errors: result.errors.length };
      }
      case "invoices":
        return { job, issued: lifecycle.issueMonthlyInvoices().map((i) => i.invoiceNumber) };
    }
  }

  private tick(job: JobName): void {
    try {
      const outcome = this.runOnce(job);
      this._logger.debug(outcome, "Job finished");
    } catch (err) {
      this._logger.error({ err, job }, "Job failed");
    }
  }
}
