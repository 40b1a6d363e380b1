/**
 * End-to-end claim processing tests with in-process stand-ins for the PDF
 * reader and the oracles.
 *
 * Tests:
 *  - A single complete bill is approved
 *  - A claim without a bill is rejected
 *  - Patient-name discrepancies approve with warnings, or reject when they
 *    mention insurance
 *  - One failing document never hides the others, and order is preserved
 *  - Failures in any stage land in the response, never as an exception
 */

import { describe, it, expect } from "vitest";

import { ClaimDecisionService, CONSISTENT_REASON, MISSING_BILL_REASON } from "../src/services/claim-decision.service.js";
import { ClaimProcessingService, type ClaimPipeline } from "../src/services/claim-processing.service.js";
import { ClaimValidationService } from "../src/services/claim-validation.service.js";
import { DocumentClassificationService } from "../src/services/document-classification.service.js";
import { FieldExtractionService } from "../src/services/field-extraction.service.js";
import type { DocumentType, ProcessedDocument } from "../src/types.js";
import { filenameIn, pdfUpload, ScriptedOracle, stubTextExtractor } from "./helpers/stubs.js";

// ─── Fixtures ────────────────────────────────────────────────────────────────

const FULL_BILL = {
  hospital_name: "General Hospital",
  total_amount: "$450.00",
  date_of_service: "2024-02-10",
  patient_name: "Jane Doe",
  patient_id: "P-1",
  services: ["Consultation"],
  insurance_details: "Acme Health PPO",
  billing_address: "1 Main St",
  account_number: "AC-1",
  diagnosis_codes: ["j06.9"],
  procedure_codes: ["99213"],
};

const CLEANED_FULL_BILL = {
  ...FULL_BILL,
  total_amount: 450,
  diagnosis_codes: ["J06.9"],
};

type Replies = Record<string, Record<string, unknown>>;

/** Extraction oracle answering per filename; unknown filenames get "{}". */
const extractionOracle = (replies: Replies, delays: Record<string, number> = {}) =>
  new ScriptedOracle(async (_system, user) => {
    const filename = filenameIn(user);
    const delay = delays[filename] ?? 0;
    if (delay > 0) await new Promise((resolve) => setTimeout(resolve, delay));
    return JSON.stringify(replies[filename] ?? {});
  });

/** Filename-rule classification, real validation and decision. */
function pipelineFor(
  texts: Record<string, string | Error>,
  replies: Replies,
  overrides: Partial<ClaimPipeline> = {}
): ClaimPipeline {
  return {
    textExtractor: stubTextExtractor(texts),
    classifier: new DocumentClassificationService(null),
    fieldExtractor: new FieldExtractionService(extractionOracle(replies)),
    validator: new ClaimValidationService(),
    decisionEngine: new ClaimDecisionService(),
    ...overrides,
  };
}

const processWith = (pipeline: ClaimPipeline, filenames: string[]) =>
  new ClaimProcessingService(pipeline).processClaim(filenames.map(pdfUpload));

// ─── Scenarios ───────────────────────────────────────────────────────────────

describe("claim scenarios", () => {
  it("approves a single complete bill", async () => {
    const response = await processWith(
      pipelineFor({ "hospital_bill.pdf": "Total due $450" }, { "hospital_bill.pdf": FULL_BILL }),
      ["hospital_bill.pdf"]
    );

    expect(response.documents).toEqual([
      {
        type: "bill",
        filename: "hospital_bill.pdf",
        confidence: 1,
        classification_confidence: 0.6,
        extracted_data: CLEANED_FULL_BILL,
        errors: [],
      },
    ]);
    expect(response.validation.is_valid).toBe(true);
    expect(response.claim_decision).toEqual({
      status: "approved",
      reason: CONSISTENT_REASON,
      confidence: 1,
    });
    expect(response.structured_data).toEqual({
      documents: [{ type: "bill", filename: "hospital_bill.pdf", data: CLEANED_FULL_BILL }],
      summary: { total_documents: 1, processed_successfully: 1, processing_errors: 0 },
    });
    expect(response.processing_time).toBeGreaterThanOrEqual(0);
    expect(Number.isNaN(Date.parse(response.timestamp))).toBe(false);
  });

  it("rejects a claim without a bill", async () => {
    const response = await processWith(
      pipelineFor(
        { "summary_report.pdf": "Admitted 2024-02-09", "member_card.pdf": "Member Jane Doe" },
        {
          "summary_report.pdf": { patient_name: "Jane Doe", diagnosis: "Bronchitis" },
          "member_card.pdf": { patient_name: "Jane Doe", member_id: "M-1" },
        }
      ),
      ["summary_report.pdf", "member_card.pdf"]
    );

    expect(response.documents.map((d) => d.type)).toEqual(["discharge_summary", "id_card"]);
    expect(response.validation.missing_documents).toEqual(["bill"]);
    expect(response.claim_decision).toEqual({
      status: "rejected",
      reason: MISSING_BILL_REASON,
      confidence: 0.9,
    });
  });

  it("approves with warnings when patient names differ", async () => {
    const response = await processWith(
      pipelineFor(
        { "hospital_bill.pdf": "Total due $450", "member_card.pdf": "Member John Smith" },
        {
          "hospital_bill.pdf": FULL_BILL,
          "member_card.pdf": { patient_name: "John Smith", member_id: "M-1" },
        }
      ),
      ["hospital_bill.pdf", "member_card.pdf"]
    );

    expect(response.validation.discrepancies).toEqual([
      "Patient name mismatch: Jane Doe vs John Smith",
      "Patient name inconsistency found: jane doe, john smith",
    ]);
    expect(response.claim_decision).toEqual({
      status: "approved",
      reason:
        "Approved with warnings: Patient name mismatch: Jane Doe vs John Smith, Patient name inconsistency found: jane doe, john smith",
      confidence: 0.7,
    });
  });

  it("rejects when a discrepancy mentions insurance", async () => {
    const realValidator = new ClaimValidationService();
    const response = await processWith(
      pipelineFor(
        { "hospital_bill.pdf": "Total due $450", "member_card.pdf": "Member John Smith" },
        {
          "hospital_bill.pdf": FULL_BILL,
          "member_card.pdf": { patient_name: "John Smith" },
        },
        {
          validator: {
            validate: (docs: ProcessedDocument[]) => {
              const result = realValidator.validate(docs);
              return {
                ...result,
                discrepancies: [...result.discrepancies, "Insurance member ID does not match policy"],
              };
            },
          },
        }
      ),
      ["hospital_bill.pdf", "member_card.pdf"]
    );

    expect(response.claim_decision.status).toBe("rejected");
    expect(response.claim_decision.confidence).toBe(0.3);
    expect(response.claim_decision.reason).toBe(
      "Insurance claim validation failed: Patient name mismatch: Jane Doe vs John Smith, Patient name inconsistency found: jane doe, john smith, Insurance member ID does not match policy"
    );
  });

  it("rejects an empty claim", async () => {
    const response = await processWith(pipelineFor({}, {}), []);
    expect(response.documents).toEqual([]);
    expect(response.claim_decision.reason).toBe(MISSING_BILL_REASON);
    expect(response.structured_data.summary.total_documents).toBe(0);
  });
});

// ─── Per-document failure isolation ──────────────────────────────────────────

describe("failure isolation", () => {
  const bills = ["first_bill.pdf", "second_bill.pdf", "third_bill.pdf"];
  const texts = Object.fromEntries(bills.map((f) => [f, "Total due $450"]));
  const replies = Object.fromEntries(bills.map((f) => [f, FULL_BILL]));

  it("keeps every document when one extraction throws", async () => {
    const real = new FieldExtractionService(extractionOracle(replies));
    const response = await processWith(
      pipelineFor(texts, replies, {
        fieldExtractor: {
          extract: async (type: DocumentType, text: string, filename: string) => {
            if (filename === "second_bill.pdf") throw new Error("extractor crashed");
            return real.extract(type, text, filename);
          },
        },
      }),
      bills
    );

    expect(response.documents.map((d) => d.filename)).toEqual(bills);
    expect(response.documents[0]?.extracted_data).toEqual(CLEANED_FULL_BILL);
    expect(response.documents[1]).toEqual({
      type: "bill",
      filename: "second_bill.pdf",
      confidence: 0,
      classification_confidence: 0.6,
      extracted_data: {},
      errors: ["extractor crashed"],
    });
    expect(response.documents[2]?.extracted_data).toEqual(CLEANED_FULL_BILL);
    expect(response.structured_data.summary).toEqual({
      total_documents: 3,
      processed_successfully: 2,
      processing_errors: 1,
    });
    expect(response.claim_decision).toEqual({
      status: "approved",
      reason: "Approved with minor warnings: Failed to process document: second_bill.pdf",
      confidence: 1,
    });
  });

  it("preserves input order when extractions finish out of order", async () => {
    const response = await processWith(
      pipelineFor(texts, replies, {
        fieldExtractor: new FieldExtractionService(
          extractionOracle(replies, { "first_bill.pdf": 40, "second_bill.pdf": 20 })
        ),
      }),
      bills
    );

    expect(response.documents.map((d) => d.filename)).toEqual(bills);
    expect(response.documents.every((d) => d.confidence === 1)).toBe(true);
  });

  it("classifies documents without text as unknown without calling the oracle", async () => {
    const classificationOracle = new ScriptedOracle('{"document_type": "bill", "confidence": 0.9}');
    const response = await processWith(
      pipelineFor(
        { "hospital_bill.pdf": "Total due $450", "scan.pdf": "" },
        { "hospital_bill.pdf": FULL_BILL },
        { classifier: new DocumentClassificationService(classificationOracle) }
      ),
      ["hospital_bill.pdf", "scan.pdf"]
    );

    expect(classificationOracle.calls).toHaveLength(1);
    expect(response.documents[1]).toEqual({
      type: "unknown",
      filename: "scan.pdf",
      confidence: 0,
      classification_confidence: 0,
      extracted_data: {},
      errors: [],
    });
    expect(response.validation.warnings).toEqual(["Failed to process document: scan.pdf"]);
  });

  it("records text extraction failures on the document", async () => {
    const response = await processWith(
      pipelineFor(
        { "hospital_bill.pdf": "Total due $450", "broken.pdf": new Error("disk read failed") },
        { "hospital_bill.pdf": FULL_BILL }
      ),
      ["hospital_bill.pdf", "broken.pdf"]
    );

    expect(response.documents[1]?.type).toBe("unknown");
    expect(response.documents[1]?.errors).toEqual(["disk read failed"]);
    expect(response.claim_decision.status).toBe("approved");
  });

  it("records classifier failures on the document", async () => {
    const response = await processWith(
      pipelineFor(
        { "hospital_bill.pdf": "Total due $450" },
        { "hospital_bill.pdf": FULL_BILL },
        {
          classifier: {
            classify: async () => {
              throw new Error("classifier offline");
            },
          },
        }
      ),
      ["hospital_bill.pdf"]
    );

    expect(response.documents[0]).toEqual({
      type: "unknown",
      filename: "hospital_bill.pdf",
      confidence: 0,
      classification_confidence: 0,
      extracted_data: {},
      errors: ["classifier offline"],
    });
    expect(response.claim_decision.reason).toBe(MISSING_BILL_REASON);
  });
});

// ─── Whole-request fallback ──────────────────────────────────────────────────

describe("fallback response", () => {
  it("returns a rejected response when a stage throws", async () => {
    const response = await processWith(
      pipelineFor(
        { "hospital_bill.pdf": "Total due $450" },
        { "hospital_bill.pdf": FULL_BILL },
        {
          validator: {
            validate: () => {
              throw new Error("validator exploded");
            },
          },
        }
      ),
      ["hospital_bill.pdf"]
    );

    expect(response.documents).toEqual([]);
    expect(response.structured_data).toEqual({
      documents: [],
      summary: { total_documents: 0, processed_successfully: 0, processing_errors: 0 },
    });
    expect(response.validation).toEqual({
      missing_documents: [],
      discrepancies: ["Processing failed: validator exploded"],
      warnings: [],
      is_valid: false,
    });
    expect(response.claim_decision).toEqual({
      status: "rejected",
      reason: "Processing error: validator exploded",
      confidence: 0,
    });
  });
});
