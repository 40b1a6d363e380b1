#!/usr/bin/env node
/**
 * Stdio entry point for the claim decision server.
 *
 * Tools: process_claim (classify, extract, validate and decide one claim),
 * classify_document (a single PDF) and health_check.
 */

import "dotenv/config";

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { config, log } from "./config.js";
import { createServer, createToolContext } from "./server/create-server.js";

async function main(): Promise<void> {
  const context = createToolContext();
  log("info", `Starting ${config.serverName}`, {
    classificationOracle: context.providers.classification ?? "disabled",
    extractionOracle: context.providers.extraction ?? "disabled",
    oracleTimeoutMs: config.oracleTimeoutMs,
  });

  const server = createServer(context);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log("info", `${config.serverName} running on stdio`);

  const shutdown = (): void => {
    server
      .close()
      .catch((err: unknown) => log("error", "Error during shutdown", err))
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  log("error", "Fatal error", err);
  process.exit(1);
});
