import type { FailureKind, Outcome, PipelineFailure } from "../types.js";

export type McpErrorCode =
  | "MCP_INVALID_INPUT"
  | "MCP_RESOURCE_UNREADABLE"
  | "MCP_INTERNAL_ERROR";

export interface ToolErrorResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError: true;
}

export const mcpErrorResponse = (
  code: McpErrorCode,
  message: string
): ToolErrorResult => ({
  content: [{ type: "text", text: `[${code}] ${message}` }],
  isError: true,
});

export const getErrorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

export const failure = (kind: FailureKind, message: string): PipelineFailure => ({
  kind,
  message,
});

export const succeeded = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const failed = <T>(kind: FailureKind, message: string): Outcome<T> => ({
  ok: false,
  failure: failure(kind, message),
});

/** Thrown at the tool boundary for input the pipeline must never see. */
export class InvalidUploadError extends Error {
  constructor(
    message: string,
    readonly code: McpErrorCode = "MCP_INVALID_INPUT"
  ) {
    super(message);
    this.name = "InvalidUploadError";
  }
}

/**
 * Maps a read or parse error to a tool error. `subject` names the upload
 * (its filename, or the path it was read from) so inline documents are never
 * described as file paths.
 */
export const classifyPdfError = (
  err: unknown,
  subject = "the uploaded document"
): { code: McpErrorCode; message: string } => {
  const message = getErrorMessage(err);
  const lower = message.toLowerCase();

  if (/password|encrypted|encryption/i.test(message)) {
    return {
      code: "MCP_RESOURCE_UNREADABLE",
      message: `Cannot parse ${subject}: the PDF is encrypted or password-protected.`,
    };
  }

  if (/enoent|no such file|eisdir|enotdir/i.test(lower)) {
    return {
      code: "MCP_INVALID_INPUT",
      message: `Cannot find ${subject}. Ensure the file exists and is readable.`,
    };
  }

  if (/eacces|eperm|permission denied/i.test(lower)) {
    return {
      code: "MCP_RESOURCE_UNREADABLE",
      message: `Permission denied while reading ${subject}.`,
    };
  }

  if (/invalid pdf|format error|corrupt|xref|bad xref/i.test(lower)) {
    return {
      code: "MCP_RESOURCE_UNREADABLE",
      message: `Cannot parse ${subject}: the PDF may be malformed or unsupported. Details: ${message}`,
    };
  }

  return {
    code: "MCP_RESOURCE_UNREADABLE",
    message: `Failed to read or parse ${subject}. Details: ${message}`,
  };
};
