/**
 * Proof Types
 *
 * A proof is an SMS confirmation or a screenshot/photo of one,
 * submitted by the client (paid the agent) or the agent (paid the
 * client's wallet). Extraction is best-effort and carries a confidence.
 */

/**
 * Which provider template produced an extraction.
 */
export type ProofProvider =
  | "mo626"
  | "tnm"
  | "airtel"
  | "standard_bank"
  | "unknown";

export type ProofKind = "sms" | "image";

export type ProofRole = "client" | "agent";

export type ProofStatus = "pending" | "verified" | "rejected" | "needs_review";

/**
 * Structured data pulled out of proof text.
 * Nullable fields are null when extraction could not find them.
 */
export interface ExtractionResult {
  /** Decimal string without thousands separators, e.g. "5000.00" */
  readonly amount: string | null;
  readonly reference: string | null;
  readonly txId: string | null;
  readonly account: string | null;

  /** 0.9 template match, 0.3 bare amount, 0.0 nothing */
  readonly confidence: number;
  readonly provider: ProofProvider;
}

export interface ProofValidation {
  readonly isValid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}

export interface ProofSubmission {
  readonly id: string;
  readonly swapId: string;
  readonly role: ProofRole;
  readonly submittedBy: string;
  readonly kind: ProofKind;

  readonly extraction: ExtractionResult;
  readonly validation: ProofValidation;

  readonly status: ProofStatus;
  readonly submittedAt: string;
  readonly reviewedBy?: string;
  readonly reviewedAt?: string;

  /** Optimistic concurrency version (1 on creation) */
  readonly version: number;
}
