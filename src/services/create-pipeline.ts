import { config, type Config } from "../config.js";
import { createOracle } from "../oracle/create-oracle.js";
import type { GenerativeOracle } from "../oracle/oracle.js";
import { ClaimDecisionService } from "./claim-decision.service.js";
import type { ClaimPipeline } from "./claim-processing.service.js";
import { ClaimValidationService } from "./claim-validation.service.js";
import { DocumentClassificationService } from "./document-classification.service.js";
import { FieldExtractionService } from "./field-extraction.service.js";
import { loadPdfText, PdfExtractionService } from "./pdf-extraction.service.js";

export interface PipelineOracles {
  classification: GenerativeOracle | null;
  extraction: GenerativeOracle | null;
}

export function createOracles(settings: Config = config): PipelineOracles {
  return {
    classification: createOracle("classification", settings),
    extraction: createOracle("extraction", settings),
  };
}

/** Text clean-up shares the classification oracle (the lighter model). */
export function createPipeline(
  oracles: PipelineOracles,
  timeoutMs: number = config.oracleTimeoutMs
): ClaimPipeline {
  return {
    textExtractor: new PdfExtractionService(oracles.classification, loadPdfText, timeoutMs),
    classifier: new DocumentClassificationService(oracles.classification, timeoutMs),
    fieldExtractor: new FieldExtractionService(oracles.extraction, timeoutMs),
    validator: new ClaimValidationService(),
    decisionEngine: new ClaimDecisionService(),
  };
}

