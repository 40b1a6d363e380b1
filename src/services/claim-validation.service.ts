import { log } from "../config.js";
import type { DocumentType, ProcessedDocument, ValidationResult } from "../types.js";
import { getErrorMessage } from "../utils/errors.js";
import { normalizePersonName } from "../utils/normalization.js";

const REQUIRED_DOCUMENT_TYPES: readonly DocumentType[] = ["bill"];

const LOW_CONFIDENCE_THRESHOLD = 0.5;
const HIGH_AMOUNT_THRESHOLD = 100000;

interface ObservedName {
  name: string;
  filename: string;
}

const hasExtractedData = (doc: ProcessedDocument): boolean =>
  doc.extraction !== undefined && Object.keys(doc.extraction.extracted_data).length > 0;

export class ClaimValidationService {
  validate(documents: ProcessedDocument[]): ValidationResult {
    try {
      const missingDocuments = this.checkMissingDocuments(documents);
      const discrepancies = [
        ...this.checkPairwiseNames(documents),
        ...this.checkDateConsistency(documents),
        ...this.checkGroupedNames(documents),
      ];
      const warnings = [
        ...this.checkDataQuality(documents),
        ...this.checkBillAmounts(documents),
      ];
      const isValid = discrepancies.length === 0 && missingDocuments.length === 0;

      log("info", "Validation complete", {
        valid: isValid,
        missing: missingDocuments.length,
        discrepancies: discrepancies.length,
        warnings: warnings.length,
      });

      return {
        missing_documents: missingDocuments,
        discrepancies,
        warnings,
        is_valid: isValid,
      };
    } catch (err) {
      log("error", "Validation failed", err);
      return {
        missing_documents: [],
        discrepancies: [`Validation error: ${getErrorMessage(err)}`],
        warnings: [],
        is_valid: false,
      };
    }
  }

  /** A required type counts as present only once it produced an extraction. */
  private checkMissingDocuments(documents: ProcessedDocument[]): DocumentType[] {
    const present = new Set(
      documents.filter((doc) => doc.extraction).map((doc) => doc.document_type)
    );
    return REQUIRED_DOCUMENT_TYPES.filter((type) => !present.has(type));
  }

  private collectPatientNames(documents: ProcessedDocument[]): ObservedName[] {
    const names: ObservedName[] = [];
    for (const doc of documents) {
      if (!doc.extraction || !hasExtractedData(doc)) continue;
      const name = doc.extraction.extracted_data.patient_name;
      if (typeof name === "string" && name) {
        names.push({ name, filename: doc.filename });
      }
    }
    return names;
  }

  private checkPairwiseNames(documents: ProcessedDocument[]): string[] {
    const [first, ...rest] = this.collectPatientNames(documents);
    if (!first) return [];

    const reference = first.name.trim().toLowerCase();
    const reported = new Set<string>();
    const discrepancies: string[] = [];
    for (const { name } of rest) {
      const candidate = name.trim().toLowerCase();
      if (candidate === reference || reported.has(candidate)) continue;
      reported.add(candidate);
      discrepancies.push(`Patient name mismatch: ${first.name} vs ${name}`);
    }
    return discrepancies;
  }

  private checkGroupedNames(documents: ProcessedDocument[]): string[] {
    const names = this.collectPatientNames(documents);
    if (names.length < 2) return [];

    const distinct = [...new Set(names.map(({ name }) => normalizePersonName(name)))];
    if (distinct.length < 2) return [];
    return [`Patient name inconsistency found: ${distinct.join(", ")}`];
  }

  /**
   * Collects the bill service dates and the discharge admission window.
   * The window comparison itself is not performed: dates are free-form
   * strings and no discrepancy is ever produced here.
   */
  private checkDateConsistency(documents: ProcessedDocument[]): string[] {
    const serviceDates: string[] = [];
    const admissionDates: string[] = [];
    const dischargeDates: string[] = [];

    for (const doc of documents) {
      if (!doc.extraction || !hasExtractedData(doc)) continue;
      const data = doc.extraction.extracted_data;
      if (doc.document_type === "bill" && typeof data.date_of_service === "string") {
        serviceDates.push(data.date_of_service);
      } else if (doc.document_type === "discharge_summary") {
        if (typeof data.admission_date === "string") admissionDates.push(data.admission_date);
        if (typeof data.discharge_date === "string") dischargeDates.push(data.discharge_date);
      }
    }

    log("debug", "Date window check skipped", {
      service_dates: serviceDates.length,
      admission_dates: admissionDates.length,
      discharge_dates: dischargeDates.length,
    });
    return [];
  }

  private checkDataQuality(documents: ProcessedDocument[]): string[] {
    const warnings: string[] = [];
    for (const doc of documents) {
      const extraction = doc.extraction;
      if (!extraction) {
        warnings.push(`Failed to process document: ${doc.filename}`);
        continue;
      }
      if (extraction.confidence < LOW_CONFIDENCE_THRESHOLD) {
        warnings.push(
          `Low confidence (${extraction.confidence.toFixed(2)}) for ${doc.filename}`
        );
      }
      if (extraction.errors.length > 0) {
        warnings.push(
          `Processing errors in ${doc.filename}: ${extraction.errors.join(", ")}`
        );
      }
    }
    return warnings;
  }

  private checkBillAmounts(documents: ProcessedDocument[]): string[] {
    const warnings: string[] = [];
    for (const doc of documents) {
      if (doc.document_type !== "bill" || !doc.extraction || !hasExtractedData(doc)) {
        continue;
      }
      const amount = doc.extraction.extracted_data.total_amount;
      if (typeof amount !== "number") {
        warnings.push(`Missing total amount in bill: ${doc.filename}`);
      } else if (amount <= 0) {
        warnings.push(`Invalid total amount (${amount}) in bill: ${doc.filename}`);
      } else if (amount > HIGH_AMOUNT_THRESHOLD) {
        warnings.push(`Unusually high amount (${amount}) in bill: ${doc.filename}`);
      }
    }
    return warnings;
  }
}
