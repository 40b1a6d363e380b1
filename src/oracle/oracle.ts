import { config, log } from "../config.js";
import type { FieldSchema, Outcome } from "../types.js";
import { failed, getErrorMessage, succeeded } from "../utils/errors.js";
import { recoverJson } from "../utils/json-recovery.js";

/**
 * A generative text service. Implementations reject on transport or API
 * failure and stop the underlying request once `signal` aborts; callers go
 * through {@link callOracle}, which never rejects.
 */
export interface GenerativeOracle {
  readonly name: string;
  request(
    systemInstruction: string,
    userContent: string,
    responseSchema?: FieldSchema,
    signal?: AbortSignal
  ): Promise<string>;
}

export interface OracleCallOptions {
  responseSchema?: FieldSchema;
  timeoutMs?: number;
}

export async function callOracle(
  oracle: GenerativeOracle | null,
  systemInstruction: string,
  userContent: string,
  options: OracleCallOptions = {}
): Promise<Outcome<string>> {
  if (!oracle) {
    return failed("oracle", "No generative oracle is configured");
  }

  const timeoutMs = options.timeoutMs ?? config.oracleTimeoutMs;
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    const text = await Promise.race([
      oracle.request(
        systemInstruction,
        userContent,
        options.responseSchema,
        controller.signal
      ),
      timeout,
    ]);
    if (!text.trim()) {
      return failed("oracle", `${oracle.name} returned an empty response`);
    }
    return succeeded(text);
  } catch (err) {
    log("warn", `${oracle.name} request failed`, { error: getErrorMessage(err) });
    return failed("oracle", `${oracle.name} request failed: ${getErrorMessage(err)}`);
  } finally {
    clearTimeout(timer);
  }
}

/** One oracle call whose answer must recover into a non-empty JSON object. */
export async function requestStructured(
  oracle: GenerativeOracle | null,
  systemInstruction: string,
  userContent: string,
  options: OracleCallOptions = {}
): Promise<Outcome<Record<string, unknown>>> {
  const response = await callOracle(oracle, systemInstruction, userContent, options);
  if (!response.ok) {
    return response;
  }

  const parsed = recoverJson(response.value);
  if (!parsed || Object.keys(parsed).length === 0) {
    log("warn", "Oracle response held no structured data", {
      preview: response.value.slice(0, 200),
    });
    return failed("parse", "Could not parse structured data from oracle response");
  }
  return succeeded(parsed);
}
