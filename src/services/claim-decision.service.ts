import { log } from "../config.js";
import type { ClaimDecision, ProcessedDocument, ValidationResult } from "../types.js";
import { getErrorMessage } from "../utils/errors.js";

export const MISSING_BILL_REASON = "Missing required medical bill document";
export const LOW_CONFIDENCE_REASON =
  "Low confidence in extracted data. Manual review required.";
export const CONSISTENT_REASON = "All required documents present and data is consistent";

const COUNTED_CONFIDENCE_FLOOR = 0.3;
const APPROVAL_CONFIDENCE = 0.7;

/**
 * Mean extraction confidence over documents scoring above 0.3. Documents at
 * or below the floor, or without an extraction, are left out entirely.
 */
export function averageExtractionConfidence(documents: ProcessedDocument[]): number {
  const counted = documents
    .map((doc) => doc.extraction?.confidence)
    .filter((c): c is number => c !== undefined && c > COUNTED_CONFIDENCE_FLOOR);
  if (counted.length === 0) return 0;
  return counted.reduce((sum, c) => sum + c, 0) / counted.length;
}

/**
 * Ordered rules; the first match decides:
 *  1. no bill                        → rejected (0.9)
 *  2. a discrepancy naming insurance → rejected (0.3)
 *  3. any other discrepancy          → approved with warnings (0.7)
 *  4. average confidence below 0.7   → requires_review
 *  5. otherwise                      → approved
 */
export class ClaimDecisionService {
  decide(documents: ProcessedDocument[], validation: ValidationResult): ClaimDecision {
    try {
      if (!documents.some((doc) => doc.document_type === "bill")) {
        return { status: "rejected", reason: MISSING_BILL_REASON, confidence: 0.9 };
      }

      const { discrepancies, warnings } = validation;
      if (discrepancies.length > 0) {
        if (discrepancies.some((d) => d.toLowerCase().includes("insurance"))) {
          return {
            status: "rejected",
            reason: `Insurance claim validation failed: ${discrepancies.join(", ")}`,
            confidence: 0.3,
          };
        }
        return {
          status: "approved",
          reason: `Approved with warnings: ${discrepancies.join(", ")}`,
          confidence: 0.7,
        };
      }

      const avgConfidence = averageExtractionConfidence(documents);
      if (avgConfidence < APPROVAL_CONFIDENCE) {
        return {
          status: "requires_review",
          reason: LOW_CONFIDENCE_REASON,
          confidence: avgConfidence,
        };
      }

      return {
        status: "approved",
        reason:
          warnings.length > 0
            ? `Approved with minor warnings: ${warnings.join(", ")}`
            : CONSISTENT_REASON,
        confidence: avgConfidence,
      };
    } catch (err) {
      log("error", "Decision synthesis failed", err);
      return {
        status: "rejected",
        reason: `Decision processing error: ${getErrorMessage(err)}`,
        confidence: 0,
      };
    }
  }
}
