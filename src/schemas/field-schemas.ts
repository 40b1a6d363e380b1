import type { DocumentType, FieldKind, FieldSchema } from "../types.js";

export const billFieldSchema = {
  hospital_name: "text",
  total_amount: "amount",
  date_of_service: "date",
  patient_name: "text",
  patient_id: "text",
  services: "list",
  insurance_details: "text",
  billing_address: "text",
  account_number: "text",
  diagnosis_codes: "code_list",
  procedure_codes: "code_list",
} as const satisfies FieldSchema;

export const dischargeSummaryFieldSchema = {
  patient_name: "text",
  patient_id: "text",
  admission_date: "date",
  discharge_date: "date",
  attending_physician: "text",
  diagnosis: "text",
  secondary_diagnoses: "list",
  treatment_summary: "text",
  medications: "list",
  procedures: "list",
  discharge_instructions: "text",
  follow_up_appointments: "list",
  hospital_name: "text",
} as const satisfies FieldSchema;

export const idCardFieldSchema = {
  patient_name: "text",
  patient_id: "text",
  date_of_birth: "date",
  address: "text",
  phone_number: "phone",
  emergency_contact: "text",
  insurance_provider: "text",
  policy_number: "text",
  group_number: "text",
  member_id: "text",
  effective_date: "date",
  expiration_date: "date",
} as const satisfies FieldSchema;

export interface ExtractorDefinition {
  agentName: string;
  schema: FieldSchema;
  prompt: "bill" | "discharge_summary" | "id_card";
}

/** Document types without an entry here get no field extraction. */
export const EXTRACTOR_DEFINITIONS: Partial<Record<DocumentType, ExtractorDefinition>> = {
  bill: { agentName: "BillExtractor", schema: billFieldSchema, prompt: "bill" },
  discharge_summary: {
    agentName: "DischargeSummaryExtractor",
    schema: dischargeSummaryFieldSchema,
    prompt: "discharge_summary",
  },
  id_card: { agentName: "IdCardExtractor", schema: idCardFieldSchema, prompt: "id_card" },
  insurance_card: {
    agentName: "IdCardExtractor",
    schema: idCardFieldSchema,
    prompt: "id_card",
  },
};

const KIND_DESCRIPTIONS: Record<FieldKind, string> = {
  text: "string or null",
  amount: "number or null",
  date: "string or null",
  phone: "string or null",
  list: "array of strings",
  code_list: "array of strings",
};

/** Renders a schema as the key list the oracle is asked to fill. */
export const describeFieldSchema = (schema: FieldSchema): string =>
  Object.entries(schema)
    .map(([field, kind]) => `- ${field}: ${KIND_DESCRIPTIONS[kind]}`)
    .join("\n");
