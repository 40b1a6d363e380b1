/**
 * In-process stand-ins for the external collaborators: a scripted oracle
 * and a text extractor that serves canned text per filename.
 */

import type { GenerativeOracle } from "../../src/oracle/oracle.js";
import type { TextExtractionOutcome } from "../../src/services/pdf-extraction.service.js";
import type { ExtractedData, FieldSchema, ProcessedDocument, DocumentType } from "../../src/types.js";

export type OracleReply =
  | string
  | Error
  | ((systemInstruction: string, userContent: string) => string | Promise<string>);

export interface RecordedCall {
  systemInstruction: string;
  userContent: string;
  responseSchema?: FieldSchema;
  signal?: AbortSignal;
}

export class ScriptedOracle implements GenerativeOracle {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly reply: OracleReply,
    readonly name = "scripted"
  ) {}

  async request(
    systemInstruction: string,
    userContent: string,
    responseSchema?: FieldSchema,
    signal?: AbortSignal
  ): Promise<string> {
    this.calls.push({ systemInstruction, userContent, responseSchema, signal });
    if (this.reply instanceof Error) throw this.reply;
    if (typeof this.reply === "function") return this.reply(systemInstruction, userContent);
    return this.reply;
  }
}

/** Never settles; exercises the per-call timeout. */
export class HangingOracle implements GenerativeOracle {
  readonly name = "hanging";
  lastSignal: AbortSignal | undefined;

  request(
    _systemInstruction: string,
    _userContent: string,
    _responseSchema?: FieldSchema,
    signal?: AbortSignal
  ): Promise<string> {
    this.lastSignal = signal;
    return new Promise<string>(() => undefined);
  }
}

export const filenameIn = (userContent: string): string =>
  /Filename: (.+)/.exec(userContent)?.[1]?.trim() ?? "";

export function stubTextExtractor(texts: Record<string, string | Error>) {
  const calls: string[] = [];
  return {
    calls,
    async extractText(_content: Buffer, filename: string): Promise<TextExtractionOutcome> {
      calls.push(filename);
      const text = texts[filename] ?? "";
      if (text instanceof Error) throw text;
      return { text, pages: 1, enhanced: false };
    },
  };
}

export const pdfUpload = (filename: string) => ({
  filename,
  content: Buffer.from(`%PDF-1.4 ${filename}`),
});

export function processedDoc(
  filename: string,
  documentType: DocumentType,
  data?: ExtractedData,
  extraction: { confidence?: number; errors?: string[] } = {}
): ProcessedDocument {
  return {
    filename,
    content: Buffer.alloc(0),
    text: "document text",
    document_type: documentType,
    classification_confidence: 0.9,
    extraction:
      data === undefined
        ? undefined
        : {
            agent_name: "TestExtractor",
            document_type: documentType,
            extracted_data: data,
            confidence: extraction.confidence ?? 0.9,
            processing_time: 0.01,
            errors: extraction.errors ?? [],
          },
  };
}
