/**
 * OpenTelemetry SDK bootstrap. Import before any other module of an entrypoint.
 *
 * Usage:  import "../../shared/observability/src/tracing.js";
 *
 * Auto-instruments Express, HTTP, pg and ioredis, and exports traces + logs
 * via OTLP/gRPC. Set OTEL_SDK_DISABLED=true to skip initialization.
 */

import {
  diag,
  DiagConsoleLogger,
  DiagLogLevel,
} from "@opentelemetry/api";

const otelDisabled =
  process.env.OTEL_SDK_DISABLED === "true" ||
  process.env.OTEL_SDK_DISABLED === "1";

const serviceName = process.env.OTEL_SERVICE_NAME || "nps-signal-finder";
const collectorUrl = process.env.OTEL_EXPORTER_OTLP_ENDPOINT || "http://localhost:4317";

// WARN by default so export failures against a missing collector stay quiet
const diagLevel =
  process.env.OTEL_LOG_LEVEL === "debug"
    ? DiagLogLevel.DEBUG
    : process.env.OTEL_LOG_LEVEL === "info"
      ? DiagLogLevel.INFO
      : DiagLogLevel.WARN;
diag.setLogger(new DiagConsoleLogger(), diagLevel);

let sdk: import("@opentelemetry/sdk-node").NodeSDK | null = null;
let loggerProvider: import("@opentelemetry/sdk-logs").LoggerProvider | null = null;

if (otelDisabled) {
  console.error(`[OTel] SDK disabled for ${serviceName}`);
} else {
  const { NodeSDK } = await import("@opentelemetry/sdk-node");
  const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-grpc");
  const { OTLPLogExporter } = await import("@opentelemetry/exporter-logs-otlp-grpc");
  const { Resource } = await import("@opentelemetry/resources");
  const { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } = await import("@opentelemetry/semantic-conventions");
  const { getNodeAutoInstrumentations } = await import("@opentelemetry/auto-instrumentations-node");
  const { BatchLogRecordProcessor, LoggerProvider } = await import("@opentelemetry/sdk-logs");
  const { logs } = await import("@opentelemetry/api-logs");

  const resource = new Resource({
    [ATTR_SERVICE_NAME]: serviceName,
    [ATTR_SERVICE_VERSION]: process.env.npm_package_version || "1.0.0",
    "deployment.environment": process.env.NODE_ENV || "development",
    "service.namespace": "nps-signal-finder",
    "host.timezone": "Asia/Seoul",
  });

  loggerProvider = new LoggerProvider({ resource });
  loggerProvider.addLogRecordProcessor(
    new BatchLogRecordProcessor(new OTLPLogExporter({ url: collectorUrl }))
  );
  logs.setGlobalLoggerProvider(loggerProvider);

  sdk = new NodeSDK({
    resource,
    traceExporter: new OTLPTraceExporter({ url: collectorUrl }),
    instrumentations: getNodeAutoInstrumentations({
      "@opentelemetry/instrumentation-express": { enabled: true },
      "@opentelemetry/instrumentation-http": { enabled: true },
      "@opentelemetry/instrumentation-pg": {
        enabled: true,
        enhancedDatabaseReporting: false,
      },
      "@opentelemetry/instrumentation-ioredis": { enabled: true },
      "@opentelemetry/instrumentation-fs": { enabled: false },
    }),
  });

  sdk.start();
  console.error(`[OTel] ${serviceName} → ${collectorUrl}`);
}

const shutdown = async () => {
  try {
    if (sdk) await sdk.shutdown();
    if (loggerProvider) await loggerProvider.shutdown();
  } catch (err) {
    // Collector may already be gone at shutdown
    console.error(`[OTel] shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
  }
};

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);

export { sdk, loggerProvider, serviceName };
