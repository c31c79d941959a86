import { trace, SpanStatusCode, type Span } from "@opentelemetry/api";
import type { ErrorRequestHandler, RequestHandler } from "express";
import { logger, type LogAttributes } from "./logger.js";

export { logger } from "./logger.js";
export type { LogAttributes, LogLevel } from "./logger.js";

const tracer = trace.getTracer("nps-signal-finder");

export function logInfo(message: string, attributes?: LogAttributes): void {
  logger.info(message, attributes);
}

export function logError(message: string, error?: Error, attributes?: LogAttributes): void {
  logger.error(message, {
    ...attributes,
    error: error?.message,
    error_name: error?.name,
  });
}

// ── Express middleware ─────────────────────────────────────────────────────

export function requestLoggingMiddleware(): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      logger.info("HTTP request", {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - startedAt,
      });
    });
    next();
  };
}

export function errorLoggingMiddleware(): ErrorRequestHandler {
  return (err, req, res, _next) => {
    const error = err instanceof Error ? err : new Error(String(err));
    logError("Unhandled request error", error, { method: req.method, path: req.path });
    if (!res.headersSent) {
      res.status(500).json({ error: error.message });
    }
  };
}

/** The part of a response the route guard writes to */
export interface RouteResponse {
  readonly headersSent: boolean;
  status(code: number): { json(body: unknown): unknown };
}

/**
 * Wrap an async route handler. A rejection is logged under `label` and
 * answered with a 500 unless the handler already started its response.
 */
export function asyncRoute<Req extends { method: string; path: string }, Res extends RouteResponse>(
  label: string,
  handler: (req: Req, res: Res) => Promise<void>
): (req: Req, res: Res) => Promise<void> {
  return async (req, res) => {
    try {
      await handler(req, res);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logError(label, error, { method: req.method, path: req.path });
      if (!res.headersSent) {
        res.status(500).json({ error: error.message });
      }
    }
  };
}

// ── Spans ──────────────────────────────────────────────────────────────────

export interface ToolSpanContext {
  toolName: string;
  toolArgs: Record<string, unknown>;
}

/** Run a tool handler inside an active span named after the tool. */
export async function withMCPServerToolSpan<T>(
  ctx: ToolSpanContext,
  fn: () => Promise<T>
): Promise<T> {
  return tracer.startActiveSpan(`mcp.tool.${ctx.toolName}`, async (span) => {
    span.setAttribute("mcp.tool.name", ctx.toolName);
    span.setAttribute("mcp.tool.arg_keys", Object.keys(ctx.toolArgs).join(","));
    try {
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      throw err;
    } finally {
      span.end();
    }
  });
}

/** Span covering the lifetime of one SSE session; caller ends it on close. */
export function startSSESessionSpan(sessionId?: string): Span {
  const span = tracer.startSpan("mcp.sse.session");
  if (sessionId) span.setAttribute("mcp.session_id", sessionId);
  return span;
}
