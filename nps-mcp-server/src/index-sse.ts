// ── OTel SDK must be imported FIRST ────────────────────────────────────────
import "../../shared/observability/src/tracing.js";
import "dotenv/config";

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import express, { type Request, type Response } from "express";
import cors from "cors";
import { getToolDefinitions, handleToolCall } from "./tools/index.js";
import { closePool, getDbCircuitSnapshot } from "./db/pool.js";
import { getDatasetCache } from "./tools/dataset-context.js";
import { disconnectRedis, isRedisAvailable } from "../../shared/redis/src/index.js";
import {
  requestLoggingMiddleware,
  errorLoggingMiddleware,
  asyncRoute,
  logInfo,
  logError,
  withMCPServerToolSpan,
  startSSESessionSpan,
} from "../../shared/observability/src/index.js";

// Create Express app
const app = express();
app.use(cors());
app.use(express.json());
app.use(requestLoggingMiddleware());

// ── Session storage ──
const sessionTransports = new Map<string, SSEServerTransport>();

// One MCP server per SSE session; a Server binds to a single transport
function createServer(): Server {
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

    return withMCPServerToolSpan(
      { toolName: name, toolArgs: args ?? {} },
      async () => handleToolCall(name, args)
    );
  });

  return server;
}

// SSE endpoint
app.get("/sse", asyncRoute("SSE connection failed", async (req: Request, res: Response) => {
  const transport = new SSEServerTransport("/messages", res);
  const sessionId = transport.sessionId;
  logInfo("New SSE connection established", { sessionId });

  const sseSpan = startSSESessionSpan(sessionId);
  sessionTransports.set(sessionId, transport);

  req.on("close", () => {
    logInfo("SSE connection closed", { sessionId });
    sseSpan.end();
    sessionTransports.delete(sessionId);
  });

  await createServer().connect(transport);
}));

// POST endpoint for client messages
app.post("/messages", asyncRoute("Message handling failed", async (req: Request, res: Response) => {
  const sessionId = typeof req.query.sessionId === "string" ? req.query.sessionId : "";
  const transport = sessionTransports.get(sessionId);
  if (!transport) {
    logError("No active SSE session for sessionId", undefined, { sessionId });
    res.status(400).json({ error: "No active SSE session for this sessionId" });
    return;
  }
  await transport.handlePostMessage(req, res, req.body);
}));

// Health check endpoint
app.get("/health", async (_req, res) => {
  const circuits = { postgresql: getDbCircuitSnapshot() };
  try {
    const { dataset, refreshed_at } = await getDatasetCache().get();
    res.json({
      status: "ok",
      server: "nps-signal-finder",
      dataset: { rows: dataset.rows.length, refreshed_at },
      redis: isRedisAvailable() ? "connected" : "memory-fallback",
      circuits,
    });
  } catch (err) {
    logError("Health check: dataset unavailable", err instanceof Error ? err : new Error(String(err)));
    res.status(503).json({ status: "error", server: "nps-signal-finder", dataset: "unavailable", circuits });
  }
});

// Error logging middleware (must be last)
app.use(errorLoggingMiddleware());

// Graceful shutdown
process.on("SIGINT", async () => {
  await Promise.allSettled([closePool(), disconnectRedis()]);
  process.exit(0);
});

// Start server
const PORT = parseInt(process.env.PORT || "3000");

app.listen(PORT, () => {
  logInfo("MCP SSE server running", {
    port: PORT,
    sse_endpoint: `http://localhost:${PORT}/sse`,
    health_endpoint: `http://localhost:${PORT}/health`,
  });
});
