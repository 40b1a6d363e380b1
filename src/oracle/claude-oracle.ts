import Anthropic from "@anthropic-ai/sdk";

import { describeFieldSchema } from "../schemas/field-schemas.js";
import type { FieldSchema } from "../types.js";
import type { GenerativeOracle } from "./oracle.js";

export class ClaudeOracle implements GenerativeOracle {
  readonly name: string;
  private readonly client: Anthropic;

  constructor(
    apiKey: string,
    private readonly model: string,
    private readonly temperature: number,
    private readonly maxTokens: number
  ) {
    this.client = new Anthropic({ apiKey });
    this.name = `claude:${model}`;
  }

  async request(
    systemInstruction: string,
    userContent: string,
    responseSchema?: FieldSchema,
    signal?: AbortSignal
  ): Promise<string> {
    const system = responseSchema
      ? `${systemInstruction}\n\nReturn JSON only, with these keys:\n${describeFieldSchema(responseSchema)}`
      : systemInstruction;

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        system,
        messages: [{ role: "user", content: userContent }],
      },
      { signal }
    );

    const textContent = response.content.find((c) => c.type === "text");
    if (textContent && textContent.type === "text") {
      return textContent.text;
    }
    return "";
  }
}
