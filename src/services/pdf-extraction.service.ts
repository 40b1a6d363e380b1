import { PDFParse } from "pdf-parse";

import { log } from "../config.js";
import { TEXT_ENHANCEMENT_PROMPTS, UNREADABLE_MARKER } from "../constants/prompts.js";
import { callOracle, type GenerativeOracle } from "../oracle/oracle.js";
import { classifyPdfError, getErrorMessage } from "../utils/errors.js";

export interface PdfText {
  text: string;
  pages: number;
}

export type PdfTextLoader = (data: Buffer) => Promise<PdfText>;

export interface TextExtractionOutcome extends PdfText {
  /** True when the oracle rewrote low-quality text. */
  enhanced: boolean;
  error?: string;
}

const MIN_PLAIN_TEXT_LENGTH = 100;

export const loadPdfText: PdfTextLoader = async (data) => {
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return { text: (result.text ?? "").trim(), pages: result.total ?? 0 };
  } finally {
    await parser.destroy();
  }
};

/**
 * Garbled-text heuristic: many symbols, mostly near-empty lines, or almost
 * no content.
 */
export function isLowQualityText(text: string): boolean {
  if (!text) return true;

  const chars = Array.from(text);
  const special = chars.filter((c) => !/[\p{L}\p{N}\s]/u.test(c)).length;
  const lines = text.split("\n");
  const shortLines = lines.filter((line) => line.trim().length < 3).length;

  return (
    special / chars.length > 0.3 ||
    shortLines > lines.length * 0.5 ||
    text.trim().length < 50
  );
}

export class PdfExtractionService {
  constructor(
    private readonly oracle: GenerativeOracle | null,
    private readonly loadText: PdfTextLoader = loadPdfText,
    private readonly timeoutMs?: number
  ) {}

  async extractText(content: Buffer, filename: string): Promise<TextExtractionOutcome> {
    let extracted: PdfText;
    try {
      extracted = await this.loadText(content);
    } catch (err) {
      log("error", `Text extraction failed for ${filename}`, { error: getErrorMessage(err) });
      return { text: "", pages: 0, enhanced: false, error: classifyPdfError(err, filename).message };
    }

    if (!extracted.text.trim()) {
      log("warn", `No text extracted from ${filename}`);
      return { ...extracted, text: "", enhanced: false };
    }

    if (extracted.text.length < MIN_PLAIN_TEXT_LENGTH || isLowQualityText(extracted.text)) {
      log("info", `Enhancing low-quality text for ${filename}`);
      return this.enhance(extracted, filename);
    }

    return { ...extracted, enhanced: false };
  }

  private async enhance(extracted: PdfText, filename: string): Promise<TextExtractionOutcome> {
    const response = await callOracle(
      this.oracle,
      TEXT_ENHANCEMENT_PROMPTS.system,
      TEXT_ENHANCEMENT_PROMPTS.userTemplate(extracted.text),
      { timeoutMs: this.timeoutMs }
    );

    if (!response.ok || response.value.trim() === UNREADABLE_MARKER) {
      log("warn", `Keeping raw text for ${filename}`);
      return { ...extracted, enhanced: false };
    }
    return { ...extracted, text: response.value, enhanced: true };
  }
}
