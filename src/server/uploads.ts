import fs from "node:fs/promises";
import path from "node:path";

import { config } from "../config.js";
import type { ProcessClaimInput } from "../schemas/tool-schemas.js";
import type { UploadedFile } from "../types.js";
import { classifyPdfError, InvalidUploadError } from "../utils/errors.js";

export interface UploadLimits {
  maxFileMb: number;
  maxFilesPerRequest: number;
}

const defaultLimits: UploadLimits = {
  maxFileMb: config.maxFileMb,
  maxFilesPerRequest: config.maxFilesPerRequest,
};

export function assertPdfFilename(filename: string): void {
  if (!filename.toLowerCase().endsWith(".pdf")) {
    throw new InvalidUploadError(
      `Invalid file type: ${filename}. Only PDF files are supported.`
    );
  }
}

function assertWithinSize(
  filename: string,
  bytes: number,
  limits: UploadLimits
): void {
  if (bytes > limits.maxFileMb * 1024 * 1024) {
    throw new InvalidUploadError(
      `File too large: ${filename}. The limit is ${limits.maxFileMb} MB.`
    );
  }
}

/** Checks the size on disk before reading, so oversized files are never buffered. */
export async function readUploadFromPath(
  filePath: string,
  limits: UploadLimits = defaultLimits
): Promise<UploadedFile> {
  assertPdfFilename(filePath);
  const resolvedPath = path.resolve(filePath);
  const filename = path.basename(resolvedPath);

  let size: number;
  try {
    size = (await fs.stat(resolvedPath)).size;
  } catch (err) {
    const classified = classifyPdfError(err, filePath);
    throw new InvalidUploadError(classified.message, classified.code);
  }
  assertWithinSize(filename, size, limits);

  try {
    const content = await fs.readFile(resolvedPath);
    return { filename, content };
  } catch (err) {
    const classified = classifyPdfError(err, filePath);
    throw new InvalidUploadError(classified.message, classified.code);
  }
}

/**
 * Turns tool input into uploads. Everything rejected here (non-PDF names,
 * oversized files, too many files, unreadable paths) never reaches the
 * pipeline.
 */
export async function loadUploads(
  input: ProcessClaimInput,
  limits: UploadLimits = defaultLimits
): Promise<UploadedFile[]> {
  const filePaths = input.file_paths ?? [];
  const inline = input.documents ?? [];
  const total = filePaths.length + inline.length;
  if (total > limits.maxFilesPerRequest) {
    throw new InvalidUploadError(
      `Too many files: ${total}. At most ${limits.maxFilesPerRequest} files are accepted per claim.`
    );
  }

  for (const doc of inline) assertPdfFilename(doc.filename);
  for (const filePath of filePaths) assertPdfFilename(filePath);

  const uploads: UploadedFile[] = [];
  for (const filePath of filePaths) {
    uploads.push(await readUploadFromPath(filePath, limits));
  }
  for (const doc of inline) {
    const content = Buffer.from(doc.content_base64, "base64");
    assertWithinSize(doc.filename, content.length, limits);
    uploads.push({ filename: doc.filename, content });
  }
  return uploads;
}
