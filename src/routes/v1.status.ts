/**
 * GET /healthz - liveness plus inference mode
 *
 * mode is "model" when a language model is loaded, "mock" when the service
 * is answering from rules alone.
 */

import type { FastifyInstance } from "fastify";
import type { IntentOrchestrator } from "../orchestrator/intent-orchestrator.js";
import { SERVICE_NAME, SERVICE_VERSION } from "../version.js";

export async function statusRoutes(app: FastifyInstance, orchestrator: IntentOrchestrator) {
  app.get("/healthz", async (_request, reply) => {
    return reply.code(200).send({
      ok: true,
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      mode: orchestrator.mode,
      initialized: orchestrator.initialized,
      grammar: orchestrator.grammarPath !== null,
    });
  });
}
