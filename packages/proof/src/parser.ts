/**
 * @swapdesk/proof: ProofParser.
 *
 * Turns an SMS confirmation (or the text read from a screenshot of one)
 * into an ExtractionResult. Text extraction from images is delegated to
 * an injected TextExtractor; the parser itself does no OCR.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { ExtractionResult } from "@swapdesk/types";
import {
  FALLBACK_AMOUNT_PATTERNS,
  FALLBACK_CONFIDENCE,
  PROOF_TEMPLATES,
  TEMPLATE_CONFIDENCE,
} from "./templates.js";
import type { ExtractedField } from "./templates.js";

/**
 * Reads the text out of an image. Throws when it cannot.
 */
export type TextExtractor = (bytes: Uint8Array) => string;

export interface ProofParserOptions {
  readonly extractor?: TextExtractor;
  readonly logger?: Logger;
}

export const EMPTY_EXTRACTION: ExtractionResult = {
  amount: null,
  reference: null,
  txId: null,
  account: null,
  confidence: 0,
  provider: "unknown",
};

const noExtractor: TextExtractor = () => {
  throw new Error("No text extractor configured");
};

function normalizeAmount(raw: string): string {
  return raw.replace(/,/g, "");
}

/**
 * Parse message text against the provider templates.
 */
export function parseProofText(text: string): ExtractionResult {
  const normalized = text.trim().toUpperCase();
  if (normalized.length === 0) {
    return EMPTY_EXTRACTION;
  }

  for (const template of PROOF_TEMPLATES) {
    for (const pattern of template.patterns) {
      const match = pattern.regex.exec(normalized);
      if (match === null) continue;

      const values: Record<ExtractedField, string | null> = {
        amount: null,
        reference: null,
        txId: null,
        account: null,
      };
      pattern.fields.forEach((field, i) => {
        const captured = match[i + 1];
        values[field] = captured !== undefined ? captured.trim() : null;
      });

      return {
        ...values,
        amount: values.amount !== null ? normalizeAmount(values.amount) : null,
        confidence: TEMPLATE_CONFIDENCE,
        provider: template.provider,
      };
    }
  }

  for (const regex of FALLBACK_AMOUNT_PATTERNS) {
    const captured = regex.exec(normalized)?.[1];
    if (captured !== undefined) {
      return {
        ...EMPTY_EXTRACTION,
        amount: normalizeAmount(captured),
        confidence: FALLBACK_CONFIDENCE,
      };
    }
  }

  return EMPTY_EXTRACTION;
}

export class ProofParser {
  private readonly _extractor: TextExtractor;
  private readonly _logger: Logger;

  constructor(options: ProofParserOptions = {}) {
    this._extractor = options.extractor ?? noExtractor;
    this._logger = options.logger ?? pino({ level: "silent" });
  }

  parseText(text: string): ExtractionResult {
    return parseProofText(text);
  }

  /**
   * Extract text from an image and parse it.
   *
   * Extractor failures degrade to an empty, zero-confidence result.
   */
  parseImage(bytes: Uint8Array): ExtractionResult {
    let text: string;
    try {
      text = this._extractor(bytes);
    } catch (err) {
      this._logger.warn(
        { err, byteLength: bytes.byteLength },
        "Text extraction failed",
      );
      return EMPTY_EXTRACTION;
    }
    return parseProofText(text);
  }
}
