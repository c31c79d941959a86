import { logs, SeverityNumber } from "@opentelemetry/api-logs";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogAttributes = Record<string, string | number | boolean | undefined>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SEVERITY: Record<LogLevel, SeverityNumber> = {
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warn: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
};

const serviceName = process.env.OTEL_SERVICE_NAME || "nps-signal-finder";

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function minimumLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(configured) ? configured : "info";
}

function compact(attributes: LogAttributes | undefined): Record<string, string | number | boolean> {
  const out: Record<string, string | number | boolean> = {};
  if (!attributes) return out;
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function emit(level: LogLevel, message: string, attributes?: LogAttributes): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) return;
  const attrs = compact(attributes);

  // No-op until tracing.ts registers a LoggerProvider
  logs.getLogger(serviceName).emit({
    severityNumber: SEVERITY[level],
    severityText: level.toUpperCase(),
    body: message,
    attributes: attrs,
  });

  // stdout is reserved for the stdio MCP transport
  process.stderr.write(
    JSON.stringify({
      ts: new Date().toISOString(),
      level,
      service: serviceName,
      msg: message,
      ...attrs,
    }) + "\n"
  );
}

export const logger = {
  debug: (message: string, attributes?: LogAttributes) => emit("debug", message, attributes),
  info: (message: string, attributes?: LogAttributes) => emit("info", message, attributes),
  warn: (message: string, attributes?: LogAttributes) => emit("warn", message, attributes),
  error: (message: string, attributes?: LogAttributes) => emit("error", message, attributes),
};
