import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";

import { log } from "../config.js";
import {
  classifyDocumentSchema,
  healthCheckSchema,
  processClaimSchema,
} from "../schemas/tool-schemas.js";
import type { ClaimPipeline, ClaimProcessingService } from "../services/claim-processing.service.js";
import {
  getErrorMessage,
  InvalidUploadError,
  mcpErrorResponse,
  type ToolErrorResult,
} from "../utils/errors.js";
import { loadUploads, readUploadFromPath } from "./uploads.js";

export interface ToolContext {
  pipeline: ClaimPipeline;
  processor: ClaimProcessingService;
  /** Oracle provider names, null where none is configured. */
  providers: { classification: string | null; extraction: string | null };
}

interface ToolTextResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
}

export type ToolResult = ToolTextResult | ToolErrorResult;

const jsonResult = (payload: unknown): ToolTextResult => ({
  content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
});

export const TOOLS: Tool[] = [
  {
    name: "process_claim",
    description:
      "Processes the PDF documents of one medical insurance claim: classifies each document, extracts structured fields, cross-validates them and returns a claim decision (approved, rejected or requires_review) with reason and confidence.",
    inputSchema: {
      type: "object",
      properties: {
        file_paths: {
          type: "array",
          items: { type: "string" },
          description: "Absolute or workspace-relative paths to the claim PDFs",
        },
        documents: {
          type: "array",
          description: "Claim PDFs passed inline",
          items: {
            type: "object",
            required: ["filename", "content_base64"],
            properties: {
              filename: { type: "string" },
              content_base64: { type: "string", description: "Base64-encoded PDF bytes" },
            },
          },
        },
      },
    },
  },
  {
    name: "classify_document",
    description:
      "Extracts text from one claim PDF and classifies it as bill, discharge_summary, id_card, prescription, insurance_card or unknown.",
    inputSchema: {
      type: "object",
      required: ["file_path"],
      properties: {
        file_path: { type: "string", description: "Path to the PDF" },
      },
    },
  },
  {
    name: "health_check",
    description: "Reports server liveness and which oracle providers are configured.",
    inputSchema: { type: "object", properties: {} },
  },
];

/**
 * Input problems come back as MCP_INVALID_INPUT tool errors; processing
 * problems never do, they surface inside the claim response itself.
 */
export async function handleToolCall(
  context: ToolContext,
  name: string,
  args: Record<string, unknown>
): Promise<ToolResult> {
  log("info", `Tool call: ${name}`);

  switch (name) {
    case "process_claim": {
      const parsed = processClaimSchema.safeParse(args);
      if (!parsed.success) {
        return mcpErrorResponse("MCP_INVALID_INPUT", parsed.error.issues[0]?.message ?? "Invalid claim payload.");
      }
      try {
        const uploads = await loadUploads(parsed.data);
        return jsonResult(await context.processor.processClaim(uploads));
      } catch (err) {
        return toolErrorFrom(name, err);
      }
    }

    case "classify_document": {
      const parsed = classifyDocumentSchema.safeParse(args);
      if (!parsed.success) {
        return mcpErrorResponse("MCP_INVALID_INPUT", parsed.error.issues[0]?.message ?? "Invalid payload.");
      }
      try {
        const upload = await readUploadFromPath(parsed.data.file_path);
        const extracted = await context.pipeline.textExtractor.extractText(
          upload.content,
          upload.filename
        );
        const classification = extracted.text
          ? await context.pipeline.classifier.classify(extracted.text, upload.filename)
          : null;
        return jsonResult({
          filename: upload.filename,
          text_length: extracted.text.length,
          extraction_error: extracted.error,
          classification,
        });
      } catch (err) {
        return toolErrorFrom(name, err);
      }
    }

    case "health_check":
      if (!healthCheckSchema.safeParse(args).success) {
        return mcpErrorResponse("MCP_INVALID_INPUT", "health_check takes no arguments.");
      }
      return jsonResult({
        status: "healthy",
        services: {
          claim_processor: "ready",
          classification_oracle: context.providers.classification ?? "not configured",
          extraction_oracle: context.providers.extraction ?? "not configured",
        },
      });

    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}

function toolErrorFrom(tool: string, err: unknown): ToolErrorResult {
  if (err instanceof InvalidUploadError) {
    return mcpErrorResponse(err.code, err.message);
  }
  log("error", `Tool ${tool} failed`, { error: getErrorMessage(err) });
  return mcpErrorResponse("MCP_INTERNAL_ERROR", getErrorMessage(err));
}

export function registerServerHandlers(server: Server, context: ToolContext): void {
  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    handleToolCall(context, request.params.name, request.params.arguments ?? {})
  );
}
