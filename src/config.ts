function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envInt(key: string, fallback: number): number {
  const v = process.env[key];
  if (!v) return fallback;
  const n = parseInt(v, 10);
  return isNaN(n) ? fallback : n;
}

function envFloat(key: string, fallback: number): number {
  const v = process.env[key];
  if (!v) return fallback;
  const n = parseFloat(v);
  return isNaN(n) ? fallback : n;
}

function envBool(key: string, fallback: boolean): boolean {
  const v = process.env[key];
  if (!v) return fallback;
  return v.toLowerCase() === "true" || v === "1";
}

export const config = {
  serverName: "claim-decision-mcp",
  serverVersion: "1.0.0",
  logLevel: env("LOG_LEVEL", "info"),
  geminiApiKey: process.env.GEMINI_API_KEY ?? null,
  geminiClassifierModel: env("GEMINI_CLASSIFIER_MODEL", "gemini-2.5-flash"),
  geminiExtractionModel: env("GEMINI_EXTRACTION_MODEL", "gemini-2.5-pro"),
  useClaudeOracle: envBool("USE_CLAUDE_ORACLE", false),
  anthropicApiKey: process.env.ANTHROPIC_API_KEY ?? null,
  claudeModel: env("CLAUDE_MODEL", "claude-sonnet-4-20250514"),
  oracleTemperature: envFloat("ORACLE_TEMPERATURE", 0.1),
  oracleMaxTokens: envInt("ORACLE_MAX_TOKENS", 4096),
  oracleTimeoutMs: envInt("ORACLE_TIMEOUT_MS", 60000),
  maxFileMb: envInt("MAX_FILE_MB", 10),
  maxFilesPerRequest: envInt("MAX_FILES_PER_REQUEST", 10),
} as const;

export type Config = typeof config;

export type LogLevel = "debug" | "info" | "warn" | "error";

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return value in levels;
}

/**
 * Single-line stderr logger. stdout is reserved for the MCP stdio transport.
 */
export function log(level: LogLevel, message: string, meta?: unknown): void {
  const configured = config.logLevel.toLowerCase();
  const configLevel = isLogLevel(configured) ? levels[configured] : levels.info;
  if (levels[level] < configLevel) return;
  const detail = meta instanceof Error ? { error: meta.message } : meta;
  const line =
    detail !== undefined
      ? `[${config.serverName}] [${level.toUpperCase()}] ${message} ${JSON.stringify(detail)}`
      : `[${config.serverName}] [${level.toUpperCase()}] ${message}`;
  process.stderr.write(line + "\n");
}
