// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { intentRoutes } from "./routes/v1.intents.js";
import { statusRoutes } from "./routes/v1.status.js";
import { IntentOrchestrator } from "./orchestrator/intent-orchestrator.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./version.js";
import { generateRequestId, getRequestId, REQUEST_ID_HEADER, REQUEST_ID_HEADER_LOWER } from "./utils/request-id.js";
import { buildErrorV1, toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { config } from "./config/index.js";
import { createLoggerConfig } from "./utils/logger-config.js";

function resolveAllowedOrigins(): string[] {
  const origins = config.server.allowedOrigins
    .split(",")
    .map((o) => o.trim())
    .filter((o) => o.length > 0);

  if (config.server.nodeEnv === "production" && origins.includes("*")) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }

  return origins;
}

export interface BuildOptions {
  /** Injected by tests; otherwise one is created from env config. */
  orchestrator?: IntentOrchestrator;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(options: BuildOptions = {}) {
  const orchestrator = options.orchestrator ?? new IntentOrchestrator();
  const rateLimitRpm = config.server.rateLimitRpm;

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    requestIdHeader: REQUEST_ID_HEADER_LOWER,
    genReqId: () => generateRequestId(),
  });

  await app.register(cors, {
    origin: resolveAllowedOrigins(),
  });

  // Pure JSON API: CSP and cross-origin isolation headers are not relevant
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
  });

  await app.register(rateLimit, {
    global: true,
    max: rateLimitRpm,
    timeWindow: "1 minute",
    errorResponseBuilder: (req, context) => {
      const requestId = getRequestId(req);
      const retryAfter = Math.max(1, Math.ceil(context.ttl / 1000));
      app.log.warn({ event: "rate_limit_hit", max: rateLimitRpm, request_id: requestId }, "Rate limit exceeded");

      // statusCode is read by @fastify/rate-limit
      return {
        statusCode: 429,
        ...buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: retryAfter }, requestId),
      };
    },
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      app.log.error(
        { error, request_id: errorV1.request_id, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    } else {
      app.log.warn(
        { request_id: errorV1.request_id, code: errorV1.code, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    }

    const retryAfter = errorV1.details?.retry_after_seconds;
    if (errorV1.code === "RATE_LIMITED" && typeof retryAfter === "number") {
      reply.header("Retry-After", retryAfter);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.addHook("onClose", async () => {
    await orchestrator.shutdown();
  });

  if (!orchestrator.initialized) {
    await orchestrator.initialize();
  }

  await statusRoutes(app, orchestrator);
  await intentRoutes(app, orchestrator);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          rate_limit_rpm: config.server.rateLimitRpm,
          body_limit_kb: Math.round(config.server.bodyLimitBytes / 1024),
          cors_origins: resolveAllowedOrigins(),
          model_base_url: config.model.baseUrl ?? "not set",
          assets_path: config.model.assetsPath,
        },
        "Intent service starting",
      );

      await app.listen({ port: config.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
