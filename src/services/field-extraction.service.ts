import { log } from "../config.js";
import { EXTRACTION_PROMPTS, extractionUserPrompt } from "../constants/prompts.js";
import {
  describeFieldSchema,
  EXTRACTOR_DEFINITIONS,
  type ExtractorDefinition,
} from "../schemas/field-schemas.js";
import { requestStructured, type GenerativeOracle } from "../oracle/oracle.js";
import type { DocumentType, ExtractionResult } from "../types.js";
import { calculateConfidence, cleanExtractedFields } from "../utils/normalization.js";

const elapsedSeconds = (startedAt: number): number => (Date.now() - startedAt) / 1000;

/**
 * Per-type field extraction. One oracle call per document; every failure
 * mode ends in an ExtractionResult with empty data and the error recorded.
 */
export class FieldExtractionService {
  constructor(
    private readonly oracle: GenerativeOracle | null,
    private readonly timeoutMs?: number
  ) {}

  async extract(
    documentType: DocumentType,
    text: string,
    filename: string
  ): Promise<ExtractionResult | null> {
    const definition = EXTRACTOR_DEFINITIONS[documentType];
    if (!definition) {
      return null;
    }
    return this.runExtractor(definition, documentType, text, filename);
  }

  private async runExtractor(
    definition: ExtractorDefinition,
    documentType: DocumentType,
    text: string,
    filename: string
  ): Promise<ExtractionResult> {
    const startedAt = Date.now();
    const prompts = EXTRACTION_PROMPTS[definition.prompt];
    log("info", `${definition.agentName} processing ${filename}`);

    const structured = await requestStructured(
      this.oracle,
      prompts.system,
      extractionUserPrompt(
        prompts.label,
        text,
        filename,
        describeFieldSchema(definition.schema)
      ),
      { responseSchema: definition.schema, timeoutMs: this.timeoutMs }
    );

    if (!structured.ok) {
      log("error", `${definition.agentName} failed on ${filename}`, structured.failure);
      return {
        agent_name: definition.agentName,
        document_type: documentType,
        extracted_data: {},
        confidence: 0,
        processing_time: elapsedSeconds(startedAt),
        errors: [structured.failure.message],
      };
    }

    const extractedData = cleanExtractedFields(definition.schema, structured.value);
    return {
      agent_name: definition.agentName,
      document_type: documentType,
      extracted_data: extractedData,
      confidence: calculateConfidence(extractedData),
      processing_time: elapsedSeconds(startedAt),
      errors: [],
    };
  }
}
