import type { ExtractedData, FieldKind, FieldSchema, FieldValue } from "../types.js";

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export const cleanTextField = (value: unknown): string | null => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== "string") {
    return null;
  }
  const cleaned = value.trim();
  return cleaned.length > 0 ? cleaned : null;
};

/** "$1,234.56" → 1234.56. Never throws; unparseable input maps to null. */
export const parseAmount = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  const cleaned = value.replace(/[$€£₹,\s]/g, "");
  if (!DECIMAL_PATTERN.test(cleaned)) {
    return null;
  }
  const amount = Number(cleaned);
  return Number.isFinite(amount) ? amount : null;
};

/** Dates are only trimmed; no calendar validation. */
export const parseDate = (value: unknown): string | null => cleanTextField(value);

export const normalizePhone = (value: unknown): string | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const digits = trimmed.replace(/[()\-\s]/g, "");
  if (/^\d{10}$/.test(digits)) {
    return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
  }
  if (/^1\d{10}$/.test(digits)) {
    return `1-(${digits.slice(1, 4)}) ${digits.slice(4, 7)}-${digits.slice(7)}`;
  }
  return trimmed;
};

/** Keeps non-empty string entries in order. Duplicates are preserved. */
export const cleanStringList = (value: unknown): string[] => {
  if (!Array.isArray(value)) {
    return [];
  }
  const cleaned: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") continue;
    const trimmed = item.trim();
    if (trimmed) cleaned.push(trimmed);
  }
  return cleaned;
};

export const cleanCodeList = (value: unknown): string[] =>
  cleanStringList(value).map((code) => code.toUpperCase());

const fieldCleaners: Record<FieldKind, (value: unknown) => FieldValue> = {
  text: cleanTextField,
  amount: parseAmount,
  date: parseDate,
  phone: normalizePhone,
  list: cleanStringList,
  code_list: cleanCodeList,
};

export const cleanExtractedFields = (
  schema: FieldSchema,
  raw: Record<string, unknown>
): ExtractedData => {
  const cleaned: ExtractedData = {};
  for (const [field, kind] of Object.entries(schema)) {
    cleaned[field] = fieldCleaners[kind](raw[field]);
  }
  return cleaned;
};

/**
 * Share of fields holding a value, plus 0.1 when any list is non-empty,
 * capped at 1. Empty lists count as values; only null and "" do not.
 */
export const calculateConfidence = (data: ExtractedData): number => {
  const values = Object.values(data);
  if (values.length === 0) {
    return 0;
  }
  const present = values.filter((v) => v !== null && v !== "").length;
  let confidence = present / values.length;
  if (values.some((v) => Array.isArray(v) && v.length > 0)) {
    confidence += 0.1;
  }
  return Math.min(confidence, 1);
};

const HONORIFICS = ["mr.", "mrs.", "ms.", "dr.", "prof."];

export const normalizePersonName = (name: string): string => {
  let normalized = name.trim().toLowerCase();
  for (const prefix of HONORIFICS) {
    if (normalized.startsWith(prefix)) {
      normalized = normalized.slice(prefix.length).trim();
    }
  }
  return normalized.split(/\s+/).filter(Boolean).join(" ");
};
