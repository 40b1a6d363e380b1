import { Server } from "@modelcontextprotocol/sdk/server/index.js";

import { config, type Config } from "../config.js";
import { ClaimProcessingService } from "../services/claim-processing.service.js";
import { createOracles, createPipeline } from "../services/create-pipeline.js";
import { registerServerHandlers, type ToolContext } from "./register.js";

export function createToolContext(settings: Config = config): ToolContext {
  const oracles = createOracles(settings);
  const pipeline = createPipeline(oracles, settings.oracleTimeoutMs);
  return {
    pipeline,
    processor: new ClaimProcessingService(pipeline),
    providers: {
      classification: oracles.classification?.name ?? null,
      extraction: oracles.extraction?.name ?? null,
    },
  };
}

export function createServer(context: ToolContext = createToolContext()): Server {
  const server = new Server(
    { name: config.serverName, version: config.serverVersion },
    { capabilities: { tools: {} } }
  );

  registerServerHandlers(server, context);
  return server;
}
