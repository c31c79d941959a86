#!/usr/bin/env node
import "dotenv/config";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { getToolDefinitions, handleToolCall } from "./tools/index.js";
import { closePool } from "./db/pool.js";
import { disconnectRedis } from "../../shared/redis/src/index.js";
import { logger } from "../../shared/observability/src/logger.js";

// Create MCP server
const server = new Server(
  {
    name: "nps-signal-finder",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: getToolDefinitions() };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(name, args);
});

// Graceful shutdown
process.on("SIGINT", async () => {
  await Promise.allSettled([closePool(), disconnectRedis()]);
  process.exit(0);
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP server running on stdio");
}

main().catch((error) => {
  logger.error("Server error", { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
