// ─── Enumerations ─────────────────────────────────────────────────────────────

export const DOCUMENT_TYPES = [
  "bill",
  "discharge_summary",
  "id_card",
  "prescription",
  "insurance_card",
  "unknown",
] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export type ClaimStatus = "approved" | "rejected" | "pending" | "requires_review";

export function isDocumentType(value: unknown): value is DocumentType {
  return DOCUMENT_TYPES.some((type) => type === value);
}

// ─── Field schemas ────────────────────────────────────────────────────────────

/** How a single extracted field is cleaned after the oracle returns it. */
export type FieldKind = "text" | "amount" | "date" | "phone" | "list" | "code_list";

export type FieldSchema = Readonly<Record<string, FieldKind>>;

export type FieldValue = string | number | string[] | null;

export type ExtractedData = Record<string, FieldValue>;

// ─── Pipeline entities ────────────────────────────────────────────────────────

export interface UploadedFile {
  filename: string;
  content: Buffer;
}

export interface RawDocument {
  filename: string;
  content: Buffer;
  text: string;
  extraction_error?: string;
}

export interface ClassifiedDocument extends RawDocument {
  document_type: DocumentType;
  /** Always within [0, 1]. */
  classification_confidence: number;
  classification_error?: string;
}

export interface ExtractionResult {
  agent_name: string;
  document_type: DocumentType;
  extracted_data: ExtractedData;
  confidence: number;
  /** Seconds. */
  processing_time: number;
  errors: string[];
}

export interface ProcessedDocument extends ClassifiedDocument {
  extraction?: ExtractionResult;
  processing_error?: string;
}

export interface ClassificationResult {
  document_type: DocumentType;
  confidence: number;
  source: "oracle" | "filename";
  reasoning?: string;
  fallback_reason?: string;
}

export interface ValidationResult {
  missing_documents: DocumentType[];
  discrepancies: string[];
  warnings: string[];
  is_valid: boolean;
}

export interface ClaimDecision {
  status: ClaimStatus;
  reason: string;
  confidence: number;
  additional_info?: string;
}

// ─── Response ─────────────────────────────────────────────────────────────────

export interface DocumentSummary {
  type: DocumentType;
  filename: string;
  confidence: number;
  classification_confidence: number;
  extracted_data: ExtractedData;
  errors: string[];
}

export interface StructuredData {
  documents: Array<{ type: DocumentType; filename: string; data: ExtractedData }>;
  summary: {
    total_documents: number;
    processed_successfully: number;
    processing_errors: number;
  };
}

export interface ClaimProcessingResponse {
  documents: DocumentSummary[];
  structured_data: StructuredData;
  validation: ValidationResult;
  claim_decision: ClaimDecision;
  /** Seconds. */
  processing_time: number;
  timestamp: string;
}

// ─── Failures ─────────────────────────────────────────────────────────────────

/** `oracle`: no response, an error or a timeout. `parse`: no usable JSON. */
export type FailureKind = "oracle" | "parse";

export interface PipelineFailure {
  kind: FailureKind;
  message: string;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: PipelineFailure };
