/**
 * @swapdesk/proof: Provider message templates.
 *
 * Patterns run against the upper-cased, trimmed message. Templates are
 * tried in order and the first matching pattern wins. Each pattern lists
 * which extraction field its capture groups fill, in group order.
 */

import type { ProofProvider } from "@swapdesk/types";

export type ExtractedField = "amount" | "reference" | "txId" | "account";

export interface TemplatePattern {
  readonly regex: RegExp;
  readonly fields: readonly ExtractedField[];
}

export interface ProofTemplate {
  readonly provider: Exclude<ProofProvider, "unknown">;
  readonly patterns: readonly TemplatePattern[];
}

const AMOUNT = String.raw`([\d,]+\.\d{2})`;

export const PROOF_TEMPLATES: readonly ProofTemplate[] = [
  {
    // National Bank of Malawi "Mo626" alerts
    provider: "mo626",
    patterns: [
      {
        regex: new RegExp(String.raw`RECEIVED MWK\s*${AMOUNT}\s*FROM\s*(.+?)\.\s*REF:\s*(\w+)`),
        fields: ["amount", "account", "reference"],
      },
      {
        regex: new RegExp(String.raw`DEPOSITED MWK\s*${AMOUNT}\s*INTO YOUR ACCOUNT\.\s*REF:\s*(\w+)`),
        fields: ["amount", "reference"],
      },
      {
        regex: new RegExp(String.raw`TRANSACTION:\s*MWK\s*${AMOUNT}\s*REF:\s*(\w+)\s*FROM\s*(.+)`),
        fields: ["amount", "reference", "account"],
      },
    ],
  },
  {
    provider: "tnm",
    patterns: [
      {
        regex: new RegExp(String.raw`RECEIVED K\s*${AMOUNT}\s*FROM\s*(\d+)\.\s*TXN ID:\s*(\w+)`),
        fields: ["amount", "account", "txId"],
      },
      {
        regex: new RegExp(String.raw`SENT K\s*${AMOUNT}\s*TO\s*(\d+)\.\s*TXN ID:\s*(\w+)`),
        fields: ["amount", "account", "txId"],
      },
    ],
  },
  {
    provider: "airtel",
    patterns: [
      {
        regex: new RegExp(String.raw`RECEIVED\s*${AMOUNT}\s*FROM\s*(\d+)\.\s*REF:\s*(\w+)`),
        fields: ["amount", "account", "txId"],
      },
      {
        regex: new RegExp(String.raw`SENT\s*${AMOUNT}\s*TO\s*(\d+)\.\s*REF:\s*(\w+)`),
        fields: ["amount", "account", "txId"],
      },
    ],
  },
  {
    provider: "standard_bank",
    patterns: [
      {
        regex: new RegExp(String.raw`CREDIT\s*MWK\s*${AMOUNT}\s*FROM\s*(.+?)\s*REF:\s*(\w+)`),
        fields: ["amount", "account", "reference"],
      },
      {
        regex: new RegExp(String.raw`DEPOSIT\s*MWK\s*${AMOUNT}\s*REF:\s*(\w+)`),
        fields: ["amount", "reference"],
      },
    ],
  },
];

/** Amount-only patterns, tried when no template matches */
export const FALLBACK_AMOUNT_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`MWK\s*${AMOUNT}`),
  new RegExp(String.raw`K\s*${AMOUNT}`),
];

export const TEMPLATE_CONFIDENCE = 0.9;
export const FALLBACK_CONFIDENCE = 0.3;
