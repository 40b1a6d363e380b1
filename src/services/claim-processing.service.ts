import { log } from "../config.js";
import type {
  ClaimDecision,
  ClaimProcessingResponse,
  ClassifiedDocument,
  DocumentSummary,
  ProcessedDocument,
  RawDocument,
  StructuredData,
  UploadedFile,
  ValidationResult,
} from "../types.js";
import { getErrorMessage } from "../utils/errors.js";
import type { ClaimDecisionService } from "./claim-decision.service.js";
import type { ClaimValidationService } from "./claim-validation.service.js";
import type { DocumentClassificationService } from "./document-classification.service.js";
import type { FieldExtractionService } from "./field-extraction.service.js";
import type { PdfExtractionService } from "./pdf-extraction.service.js";

export interface ClaimPipeline {
  textExtractor: Pick<PdfExtractionService, "extractText">;
  classifier: Pick<DocumentClassificationService, "classify">;
  fieldExtractor: Pick<FieldExtractionService, "extract">;
  validator: Pick<ClaimValidationService, "validate">;
  decisionEngine: Pick<ClaimDecisionService, "decide">;
}

const emptyStructuredData = (): StructuredData => ({
  documents: [],
  summary: { total_documents: 0, processed_successfully: 0, processing_errors: 0 },
});

/**
 * Drives one claim through text extraction, classification, concurrent field
 * extraction, validation and decision. Never rejects: failures are contained
 * per document, and anything that escapes becomes a rejected fallback response.
 */
export class ClaimProcessingService {
  constructor(private readonly pipeline: ClaimPipeline) {}

  async processClaim(files: UploadedFile[]): Promise<ClaimProcessingResponse> {
    const startedAt = Date.now();
    try {
      log("info", `Starting claim processing for ${files.length} files`);

      const rawDocuments = await this.extractTexts(files);
      const classified = await this.classifyDocuments(rawDocuments);
      const processed = await this.extractFields(classified);
      const validation = this.pipeline.validator.validate(processed);
      const decision = this.pipeline.decisionEngine.decide(processed, validation);

      const processingTime = (Date.now() - startedAt) / 1000;
      log("info", `Claim processing completed in ${processingTime.toFixed(2)} seconds`, {
        status: decision.status,
      });

      return {
        documents: processed.map(summarizeDocument),
        structured_data: buildStructuredData(processed),
        validation,
        claim_decision: decision,
        processing_time: processingTime,
        timestamp: new Date().toISOString(),
      };
    } catch (err) {
      log("error", "Claim processing failed", err);
      return fallbackResponse(getErrorMessage(err), (Date.now() - startedAt) / 1000);
    }
  }

  private async extractTexts(files: UploadedFile[]): Promise<RawDocument[]> {
    const documents: RawDocument[] = [];
    for (const file of files) {
      try {
        const outcome = await this.pipeline.textExtractor.extractText(
          file.content,
          file.filename
        );
        documents.push({
          filename: file.filename,
          content: file.content,
          text: outcome.text,
          ...(outcome.error ? { extraction_error: outcome.error } : {}),
        });
      } catch (err) {
        log("error", `Error extracting text from ${file.filename}`, err);
        documents.push({
          filename: file.filename,
          content: Buffer.alloc(0),
          text: "",
          extraction_error: getErrorMessage(err),
        });
      }
    }
    return documents;
  }

  private async classifyDocuments(documents: RawDocument[]): Promise<ClassifiedDocument[]> {
    const classified: ClassifiedDocument[] = [];
    for (const doc of documents) {
      if (!doc.text) {
        classified.push({ ...doc, document_type: "unknown", classification_confidence: 0 });
        continue;
      }
      try {
        const result = await this.pipeline.classifier.classify(doc.text, doc.filename);
        classified.push({
          ...doc,
          document_type: result.document_type,
          classification_confidence: result.confidence,
        });
      } catch (err) {
        log("error", `Error classifying ${doc.filename}`, err);
        classified.push({
          ...doc,
          document_type: "unknown",
          classification_confidence: 0,
          classification_error: getErrorMessage(err),
        });
      }
    }
    return classified;
  }

  /** Scatter/gather: one task per document, failures kept per slot. */
  private async extractFields(documents: ClassifiedDocument[]): Promise<ProcessedDocument[]> {
    const settled = await Promise.allSettled(
      documents.map((doc) => this.extractSingle(doc))
    );

    return settled.map((result, index): ProcessedDocument => {
      if (result.status === "fulfilled") {
        return result.value;
      }
      const doc = documents[index];
      log("error", `Field extraction failed for ${doc.filename}`, result.reason);
      return { ...doc, processing_error: getErrorMessage(result.reason) };
    });
  }

  private async extractSingle(doc: ClassifiedDocument): Promise<ProcessedDocument> {
    if (!doc.text) {
      return doc;
    }
    const extraction = await this.pipeline.fieldExtractor.extract(
      doc.document_type,
      doc.text,
      doc.filename
    );
    if (!extraction) {
      log("warn", `No extractor for document type ${doc.document_type} (${doc.filename})`);
      return doc;
    }
    return { ...doc, extraction };
  }
}

function summarizeDocument(doc: ProcessedDocument): DocumentSummary {
  const errors = [doc.extraction_error, doc.classification_error, doc.processing_error]
    .filter((e): e is string => typeof e === "string")
    .concat(doc.extraction?.errors ?? []);

  return {
    type: doc.document_type,
    filename: doc.filename,
    confidence: doc.extraction?.confidence ?? 0,
    classification_confidence: doc.classification_confidence,
    extracted_data: doc.extraction?.extracted_data ?? {},
    errors,
  };
}

function buildStructuredData(documents: ProcessedDocument[]): StructuredData {
  const structured: StructuredData = {
    documents: [],
    summary: {
      total_documents: documents.length,
      processed_successfully: 0,
      processing_errors: 0,
    },
  };

  for (const doc of documents) {
    if (doc.extraction) {
      structured.documents.push({
        type: doc.document_type,
        filename: doc.filename,
        data: doc.extraction.extracted_data,
      });
      structured.summary.processed_successfully += 1;
    } else {
      structured.summary.processing_errors += 1;
    }
  }
  return structured;
}

function fallbackResponse(message: string, processingTime: number): ClaimProcessingResponse {
  const validation: ValidationResult = {
    missing_documents: [],
    discrepancies: [`Processing failed: ${message}`],
    warnings: [],
    is_valid: false,
  };
  const decision: ClaimDecision = {
    status: "rejected",
    reason: `Processing error: ${message}`,
    confidence: 0,
  };
  return {
    documents: [],
    structured_data: emptyStructuredData(),
    validation,
    claim_decision: decision,
    processing_time: processingTime,
    timestamp: new Date().toISOString(),
  };
}
