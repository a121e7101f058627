/**
 * @swapdesk/proof
 *
 * Proof-of-payment extraction from provider SMS text and screenshots,
 * and validation of extracted data against a swap.
 *
 * @packageDocumentation
 */

export { ProofParser, parseProofText, EMPTY_EXTRACTION } from "./parser.js";
export type { TextExtractor, ProofParserOptions } from "./parser.js";

export {
  PROOF_TEMPLATES,
  FALLBACK_AMOUNT_PATTERNS,
  TEMPLATE_CONFIDENCE,
  FALLBACK_CONFIDENCE,
} from "./templates.js";
export type { ProofTemplate, TemplatePattern, ExtractedField } from "./templates.js";

export {
  validateProof,
  AMOUNT_TOLERANCE,
  LOW_CONFIDENCE,
  MODERATE_CONFIDENCE,
} from "./validate.js";
export type { ProofTarget } from "./validate.js";
