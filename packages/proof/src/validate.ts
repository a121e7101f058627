/**
 * @swapdesk/proof: Proof validation against a swap.
 *
 * Errors make a proof invalid; warnings flag it for attention.
 */

import { formatAmount, MoneyError, parseAmount } from "@swapdesk/money";
import { isBankService } from "@swapdesk/types";
import type { ExtractionResult, ProofValidation, SwapRequest } from "@swapdesk/types";

/** Largest amount difference that is only a warning */
export const AMOUNT_TOLERANCE = "1.00";

export const LOW_CONFIDENCE = 0.5;
export const MODERATE_CONFIDENCE = 0.8;

export type ProofTarget = Pick<SwapRequest, "amount" | "reference" | "fromService">;

function readAmount(amount: string, decimals: number): bigint | null {
  try {
    return parseAmount(amount, decimals);
  } catch (err) {
    if (err instanceof MoneyError) return null;
    throw err;
  }
}

export function validateProof(
  extraction: ExtractionResult,
  swap: ProofTarget,
): ProofValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { decimals } = swap.amount;

  const extracted =
    extraction.amount !== null ? readAmount(extraction.amount, decimals) : null;

  if (extracted === null) {
    warnings.push("Could not extract amount from proof");
  } else {
    const expected = parseAmount(swap.amount.amount, decimals);
    const diff = extracted > expected ? extracted - expected : expected - extracted;
    if (diff !== 0n) {
      const shown = `proof shows ${formatAmount(extracted, decimals)}, swap is ${formatAmount(expected, decimals)}`;
      if (diff <= parseAmount(AMOUNT_TOLERANCE, decimals)) {
        warnings.push(`Small amount difference: ${shown}`);
      } else {
        errors.push(`Amount mismatch: ${shown}`);
      }
    }
  }

  if (
    isBankService(swap.fromService) &&
    extraction.reference !== null &&
    extraction.reference !== swap.reference
  ) {
    warnings.push(
      `Reference mismatch: proof shows ${extraction.reference}, swap reference is ${swap.reference}`,
    );
  }

  if (extraction.confidence < LOW_CONFIDENCE) {
    warnings.push(`Low confidence in proof parsing: ${extraction.confidence}`);
  } else if (extraction.confidence < MODERATE_CONFIDENCE) {
    warnings.push(`Moderate confidence in proof parsing: ${extraction.confidence}`);
  }

  return { isValid: errors.length === 0, errors, warnings };
}
