import { GoogleGenerativeAI } from "@google/generative-ai";

import { describeFieldSchema } from "../schemas/field-schemas.js";
import type { FieldSchema } from "../types.js";
import type { GenerativeOracle } from "./oracle.js";

export class GeminiOracle implements GenerativeOracle {
  readonly name: string;
  private readonly client: GoogleGenerativeAI;

  constructor(
    apiKey: string,
    private readonly model: string,
    private readonly temperature: number
  ) {
    this.client = new GoogleGenerativeAI(apiKey);
    this.name = `gemini:${model}`;
  }

  async request(
    systemInstruction: string,
    userContent: string,
    responseSchema?: FieldSchema,
    signal?: AbortSignal
  ): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: this.model,
      systemInstruction: responseSchema
        ? `${systemInstruction}\n\nExpected JSON keys:\n${describeFieldSchema(responseSchema)}`
        : systemInstruction,
      generationConfig: {
        temperature: this.temperature,
        ...(responseSchema ? { responseMimeType: "application/json" } : {}),
      },
    });

    const response = await model.generateContent(userContent, { signal });
    return response.response.text();
  }
}
