import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/PII redaction
 *
 * Redaction paths live in src/utils/logger-config.ts so that the Fastify
 * logger and this standalone logger stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type Event = Record<string, unknown>;
type TestSink = (eventName: string, data: Event) => void;

/**
 * Test sink for capturing telemetry events in tests.
 * Only usable when NODE_ENV=test or under Vitest.
 */
let testSink: TestSink | null = null;

export function setTestSink(sink: TestSink | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * Dashboards key on these strings; rename with care.
 */
export const TelemetryEvents = {
  IntentParsed: "intent.parsed",
  IntentPipelineFailed: "intent.pipeline_failed",
  ModelQueryFailed: "intent.model_query_failed",
  ModelSkipped: "intent.model_skipped",
  ModelLoaded: "intent.model_loaded",
  ModelLoadFailed: "intent.model_load_failed",
  MockMode: "intent.mock_mode",
} as const;

export type TelemetryEventName = typeof TelemetryEvents[keyof typeof TelemetryEvents];

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "studio.intent.",
    globalTags: {
      service: env.DD_SERVICE || "studio-intent-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

function sendMetrics(event: string, data: Event): void {
  if (!datadogClient) return;

  switch (event) {
    case TelemetryEvents.IntentParsed: {
      datadogClient.increment("parsed", 1, {
        action: String(data.action ?? "unknown"),
        source: String(data.source ?? "unknown"),
      });
      if (typeof data.confidence === "number") {
        datadogClient.histogram("confidence", data.confidence);
      }
      if (typeof data.nodes === "object" && data.nodes !== null) {
        for (const [node, timing] of Object.entries(data.nodes)) {
          if (typeof timing === "number") {
            datadogClient.histogram("node.latency_ms", timing, { node });
          }
        }
      }
      break;
    }
    case TelemetryEvents.IntentPipelineFailed:
      datadogClient.increment("pipeline.failed", 1);
      break;
    case TelemetryEvents.ModelQueryFailed:
      datadogClient.increment("model.query_failed", 1);
      break;
    case TelemetryEvents.ModelSkipped:
      datadogClient.increment("model.skipped", 1);
      break;
    default:
      break;
  }
}

/**
 * Emit telemetry event (logs + Datadog metrics)
 */
export function emit(event: TelemetryEventName, data: Event): void {
  if (testSink) {
    testSink(event, data);
  }

  log.info({ event, ...data });

  try {
    sendMetrics(event, data);
  } catch (error) {
    log.warn({ error, event }, "Failed to send telemetry metrics");
  }
}
