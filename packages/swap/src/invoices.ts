/**
 * Monthly fee statements.
 *
 * Fees are settled outside the platform. These reports total what each
 * agent owes the platform for the swaps completed in a calendar month
 * (UTC).
 */

import type { Money, SwapRequest } from "@swapdesk/types";
import { compareMoney, sumMoney } from "@swapdesk/money";
import { SwapError } from "./errors.js";

export interface AgentInvoice {
  /** "INV-<agentId>-YYYYMM" */
  readonly invoiceNumber: string;
  readonly agentId: string;

  /** "YYYY-MM" */
  readonly period: string;

  /** e.g. "March 2026" */
  readonly periodLabel: string;

  readonly totalSwaps: number;
  readonly totalVolume: Money;
  readonly totalPlatformFee: Money;
  readonly totalAgentFee: Money;
  readonly swapReferences: readonly string[];

  /** "YYYY-MM-DD", 30 days after the start of the period */
  readonly dueDate: string;
  readonly legalNote: string;
}

export interface AgentFeeSummary {
  readonly agentId: string;
  readonly totalSwaps: number;
  readonly totalPlatformFee: Money;
}

export interface PlatformReport {
  readonly period: string;
  readonly periodLabel: string;
  readonly totalSwaps: number;
  readonly totalVolume: Money;
  readonly totalPlatformFee: Money;
  readonly totalAgentFee: Money;

  /** Highest platform fee first */
  readonly agentBreakdown: readonly AgentFeeSummary[];
  readonly legalDisclaimer: string;
}

export interface InvoiceCurrency {
  readonly currency: string;
  readonly decimals: number;
}

export const INVOICE_LEGAL_NOTE =
  "Platform fees for matching and verification services only. No money holding.";

export const REPORT_LEGAL_DISCLAIMER =
  "SwapDesk acts as a matching service only. No funds are held or transmitted.";

const DUE_AFTER_DAYS = 30;
const DAY_MS = 86_400_000;

interface MonthRange {
  readonly start: number;
  readonly end: number;
  readonly label: string;
}

function monthRange(month: string): MonthRange {
  const match = /^(\d{4})-(0[1-9]|1[0-2])$/.exec(month);
  if (match === null) {
    throw new SwapError("VALIDATION_ERROR", `Month must be "YYYY-MM", got "${month}"`, {
      field: "month",
    });
  }
  const year = Number(match[1]);
  const monthIndex = Number(match[2]) - 1;
  const start = Date.UTC(year, monthIndex, 1);
  return {
    start,
    end: Date.UTC(year, monthIndex + 1, 1),
    label: new Date(start).toLocaleString("en-US", {
      month: "long",
      year: "numeric",
      timeZone: "UTC",
    }),
  };
}

/** "YYYY-MM" of the calendar month (UTC) before `now` */
export function previousMonth(now: Date): string {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - 1, 1)).toISOString().slice(0, 7);
}

function completedIn(swaps: readonly SwapRequest[], range: MonthRange): SwapRequest[] {
  return swaps.filter((s) => {
    if (s.status !== "COMPLETE" || s.completedAt === undefined) return false;
    const at = Date.parse(s.completedAt);
    return at >= range.start && at < range.end;
  });
}

function totals(swaps: readonly SwapRequest[], unit: InvoiceCurrency) {
  const sum = (pick: (s: SwapRequest) => Money): Money =>
    sumMoney(swaps.map(pick), unit.currency, unit.decimals);
  return {
    totalSwaps: swaps.length,
    totalVolume: sum((s) => s.amount),
    totalPlatformFee: sum((s) => s.platformFee),
    totalAgentFee: sum((s) => s.agentFee),
  };
}

export function generateAgentInvoice(
  swaps: readonly SwapRequest[],
  agentId: string,
  month: string,
  unit: InvoiceCurrency,
): AgentInvoice {
  const range = monthRange(month);
  const completed = completedIn(
    swaps.filter((s) => s.agentId === agentId),
    range,
  );

  return {
    invoiceNumber: `INV-${agentId}-${month.replace("-", "")}`,
    agentId,
    period: month,
    periodLabel: range.label,
    ...totals(completed, unit),
    swapReferences: completed.map((s) => s.reference),
    dueDate: new Date(range.start + DUE_AFTER_DAYS * DAY_MS).toISOString().slice(0, 10),
    legalNote: INVOICE_LEGAL_NOTE,
  };
}

export function generatePlatformReport(
  swaps: readonly SwapRequest[],
  month: string,
  unit: InvoiceCurrency,
): PlatformReport {
  const range = monthRange(month);
  const completed = completedIn(swaps, range);

  const byAgent = new Map<string, SwapRequest[]>();
  for (const swap of completed) {
    const list = byAgent.get(swap.agentId) ?? [];
    list.push(swap);
    byAgent.set(swap.agentId, list);
  }

  const agentBreakdown = [...byAgent.entries()]
    .map(([agentId, list]) => {
      const t = totals(list, unit);
      return { agentId, totalSwaps: t.totalSwaps, totalPlatformFee: t.totalPlatformFee };
    })
    .sort((a, b) => compareMoney(b.totalPlatformFee, a.totalPlatformFee));

  return {
    period: month,
    periodLabel: range.label,
    ...totals(completed, unit),
    agentBreakdown,
    legalDisclaimer: REPORT_LEGAL_DISCLAIMER,
  };
}
