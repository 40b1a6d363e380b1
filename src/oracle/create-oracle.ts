import { config, log, type Config } from "../config.js";
import { ClaudeOracle } from "./claude-oracle.js";
import { GeminiOracle } from "./gemini-oracle.js";
import type { GenerativeOracle } from "./oracle.js";

export type OracleRole = "classification" | "extraction";

/**
 * Claude when USE_CLAUDE_ORACLE is on and a key is present, otherwise Gemini,
 * otherwise null (callers fall back to deterministic behavior).
 */
export function createOracle(
  role: OracleRole,
  settings: Config = config
): GenerativeOracle | null {
  if (settings.useClaudeOracle && settings.anthropicApiKey) {
    return new ClaudeOracle(
      settings.anthropicApiKey,
      settings.claudeModel,
      settings.oracleTemperature,
      settings.oracleMaxTokens
    );
  }

  if (settings.geminiApiKey) {
    const model =
      role === "classification"
        ? settings.geminiClassifierModel
        : settings.geminiExtractionModel;
    return new GeminiOracle(settings.geminiApiKey, model, settings.oracleTemperature);
  }

  log("warn", `No oracle configured for ${role}; using deterministic fallbacks`);
  return null;
}
