const HTML_ENTITIES: Array<[string, string]> = [
  ["&lt;", "<"],
  ["&gt;", ">"],
  ["&quot;", '"'],
  ["&apos;", "'"],
  ["&nbsp;", " "],
  ["&amp;", "&"],
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const tryParse = (candidate: string): Record<string, unknown> | null => {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

export const stripHtmlTags = (text: string): string => {
  let cleaned = text.replace(/<[^>]+>/g, "");
  for (const [entity, replacement] of HTML_ENTITIES) {
    cleaned = cleaned.split(entity).join(replacement);
  }
  return cleaned;
};

export const stripCodeFences = (text: string): string =>
  text.replace(/```(?:json)?/gi, "");

/** Widest `{ ... }` span in the text, or null when there is none. */
export const extractBraceSpan = (text: string): string | null => {
  const first = text.indexOf("{");
  const last = text.lastIndexOf("}");
  if (first === -1 || last === -1 || last < first) {
    return null;
  }
  return text.slice(first, last + 1);
};

export const repairJson = (candidate: string): string =>
  candidate
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(/'([^'"\n]*)'\s*:/g, '"$1":')
    .replace(/,\s*([}\]])/g, "$1");

/**
 * Recovers a JSON object from model output. Tries the raw text, then the
 * brace span of the de-tagged, de-fenced text, then that span after repairs.
 * Returns null rather than throwing.
 */
export function recoverJson(text: string): Record<string, unknown> | null {
  if (!text.trim()) {
    return null;
  }

  const direct = tryParse(text);
  if (direct) {
    return direct;
  }

  const span = extractBraceSpan(stripCodeFences(stripHtmlTags(text)));
  if (!span) {
    return null;
  }

  return tryParse(span) ?? tryParse(repairJson(span));
}
