import { log } from "../config.js";
import {
  DEFAULT_ORACLE_CONFIDENCE,
  FILENAME_KEYWORD_RULES,
  FILENAME_MATCH_CONFIDENCE,
  UNKNOWN_CONFIDENCE,
} from "../constants/classification.js";
import { CLASSIFICATION_PROMPTS } from "../constants/prompts.js";
import { requestStructured, type GenerativeOracle } from "../oracle/oracle.js";
import { classificationResponseSchema } from "../schemas/tool-schemas.js";
import { isDocumentType, type ClassificationResult } from "../types.js";

const clampConfidence = (value: number): number => Math.min(Math.max(value, 0), 1);

export class DocumentClassificationService {
  constructor(
    private readonly oracle: GenerativeOracle | null,
    private readonly timeoutMs?: number
  ) {}

  async classify(text: string, filename: string): Promise<ClassificationResult> {
    const structured = await requestStructured(
      this.oracle,
      CLASSIFICATION_PROMPTS.system,
      CLASSIFICATION_PROMPTS.userTemplate(text, filename),
      { timeoutMs: this.timeoutMs }
    );

    if (!structured.ok) {
      return this.classifyByFilename(filename, structured.failure.message);
    }

    const parsed = classificationResponseSchema.safeParse(structured.value);
    if (!parsed.success) {
      return this.classifyByFilename(
        filename,
        "Classification response did not match the expected shape"
      );
    }

    const label = parsed.data.document_type;
    if (!isDocumentType(label)) {
      log("warn", `Unrecognized document type '${label}' for ${filename}`);
      return this.classifyByFilename(filename, `Unrecognized document type: ${label}`);
    }

    const confidence = clampConfidence(
      parsed.data.confidence ?? DEFAULT_ORACLE_CONFIDENCE
    );
    log("info", `Classified ${filename} as ${label} with confidence ${confidence}`);
    return {
      document_type: label,
      confidence,
      source: "oracle",
      reasoning: parsed.data.reasoning,
    };
  }

  /** Deterministic: the same filename always yields the same result. */
  classifyByFilename(filename: string, fallbackReason?: string): ClassificationResult {
    const lower = filename.toLowerCase();
    const rule = FILENAME_KEYWORD_RULES.find(({ keywords }) =>
      keywords.some((keyword) => lower.includes(keyword))
    );

    return {
      document_type: rule?.type ?? "unknown",
      confidence: rule ? FILENAME_MATCH_CONFIDENCE : UNKNOWN_CONFIDENCE,
      source: "filename",
      fallback_reason: fallbackReason,
    };
  }
}
