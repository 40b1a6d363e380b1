export const CLASSIFICATION_EXCERPT_CHARS = 2000;

export const CLASSIFICATION_PROMPTS = {
  system: [
    "You are a medical document classifier.",
    "Classify the document into exactly one of these categories:",
    "- bill: medical bills, invoices, payment statements",
    "- discharge_summary: hospital discharge summaries, medical reports",
    "- id_card: patient ID cards and identification documents",
    "- prescription: prescriptions, medication lists",
    "- insurance_card: insurance cards, policy documents",
    "- unknown: the document fits none of the categories",
    "",
    "Consider both the filename and the content. Useful indicators:",
    "bills carry amounts, charges and invoice numbers;",
    "discharge summaries carry admission/discharge dates, diagnoses and treatment plans;",
    "ID cards carry patient details, ID numbers and addresses;",
    "prescriptions carry medication names, dosages and pharmacy details.",
    "",
    'Respond with JSON only: {"document_type": "<category>", "confidence": <0.0-1.0>, "reasoning": "<one sentence>"}',
  ].join("\n"),
  userTemplate: (text: string, filename: string) =>
    [
      `Filename: ${filename}`,
      "",
      "Document Content:",
      `${text.slice(0, CLASSIFICATION_EXCERPT_CHARS)}...`,
      "",
      "Classify this document.",
    ].join("\n"),
} as const;

const JSON_ONLY =
  "Be precise with numbers and dates. If a value is not clearly stated, use null. Respond only with valid JSON matching the requested keys.";

export const EXTRACTION_PROMPTS = {
  bill: {
    system: [
      "You are a medical billing specialist.",
      "Extract structured information from medical bills, invoices and payment statements:",
      "provider details, patient details, service dates and descriptions, amounts and charges,",
      "insurance information, ICD/CPT codes, and account details.",
      "For lists (services, codes) include every item found.",
      JSON_ONLY,
    ].join(" "),
    label: "medical bill",
  },
  discharge_summary: {
    system: [
      "You are a medical records specialist.",
      "Extract structured information from hospital discharge summaries and medical reports:",
      "patient identification, admission and discharge dates, attending physician,",
      "primary and secondary diagnoses, treatment summary and procedures, medications,",
      "discharge instructions, follow-up care, and facility details.",
      "For lists (medications, procedures) include every item found.",
      JSON_ONLY,
    ].join(" "),
    label: "discharge summary",
  },
  id_card: {
    system: [
      "You are an identification document specialist.",
      "Extract structured information from patient ID cards and insurance cards:",
      "personal identification, contact details, insurer, policy and group numbers,",
      "member IDs, effective and expiration dates, and emergency contacts.",
      JSON_ONLY,
    ].join(" "),
    label: "ID card",
  },
} as const;

export const extractionUserPrompt = (
  label: string,
  text: string,
  filename: string,
  fieldList: string
) =>
  [
    `Extract structured data from this ${label} document.`,
    "",
    `Filename: ${filename}`,
    "",
    "Document Content:",
    text,
    "",
    "Return a JSON object with exactly these keys:",
    fieldList,
  ].join("\n");

export const UNREADABLE_MARKER = "UNREADABLE_DOCUMENT";

export const TEXT_ENHANCEMENT_PROMPTS = {
  system: [
    "The following text was extracted from a medical document PDF and may contain",
    "formatting issues, OCR errors or garbled characters.",
    "Fix obvious OCR errors, improve the structure, and keep every piece of medical information.",
    "Return only the cleaned text with no commentary.",
    `If the text is completely unreadable, return ${UNREADABLE_MARKER}.`,
  ].join(" "),
  userTemplate: (rawText: string) =>
    ["Clean and enhance this medical document text:", "", rawText].join("\n"),
} as const;
