import { z } from "zod";

export const uploadedDocumentSchema = z.object({
  filename: z.string().min(1).describe("Original filename, e.g. hospital_bill.pdf"),
  content_base64: z.string().min(1).describe("Base64-encoded PDF bytes"),
});

export const processClaimSchema = z
  .object({
    file_paths: z
      .array(z.string().min(1))
      .optional()
      .describe("Absolute or workspace-relative paths to the claim PDFs"),
    documents: z
      .array(uploadedDocumentSchema)
      .optional()
      .describe("Claim PDFs passed inline as base64"),
  })
  .refine(
    (input) => (input.file_paths?.length ?? 0) + (input.documents?.length ?? 0) > 0,
    { message: "Provide at least one document via file_paths or documents" }
  );

export type ProcessClaimInput = z.infer<typeof processClaimSchema>;

export const classifyDocumentSchema = z.object({
  file_path: z
    .string()
    .min(1)
    .describe("Absolute or workspace-relative path to a claim PDF"),
});

export const healthCheckSchema = z.object({}).strict();

/** Shape the classifier asks the oracle for. */
export const classificationResponseSchema = z.object({
  document_type: z.string(),
  confidence: z.number().finite().optional().catch(undefined),
  reasoning: z.string().optional().catch(undefined),
});
