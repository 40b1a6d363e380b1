import type { DocumentType } from "../types.js";

export const FILENAME_MATCH_CONFIDENCE = 0.6;
export const UNKNOWN_CONFIDENCE = 0.3;
export const DEFAULT_ORACLE_CONFIDENCE = 0.5;

/** Checked in order; the first rule with a keyword in the filename wins. */
export const FILENAME_KEYWORD_RULES: ReadonlyArray<{
  type: DocumentType;
  keywords: readonly string[];
}> = [
  { type: "bill", keywords: ["bill", "invoice", "payment", "charge"] },
  { type: "discharge_summary", keywords: ["discharge", "summary", "report"] },
  { type: "id_card", keywords: ["id", "card", "identity"] },
  { type: "prescription", keywords: ["prescription", "medication", "rx"] },
  { type: "insurance_card", keywords: ["insurance", "policy"] },
];
