/**
 * Intent endpoints
 *
 * POST /v1/intents/parse   { text } → Intent Record (parameters JSON-encoded)
 * GET  /v1/intents/history → last N intents, oldest first
 *
 * Parsing never fails once the body is valid: pipeline errors come back as a
 * 200 with action "unknown" and near-zero confidence.
 */

import type { FastifyInstance } from "fastify";
import type { IntentOrchestrator } from "../orchestrator/intent-orchestrator.js";
import { buildParseIntentInput, type IntentHistoryV1T, type IntentRecordV1T } from "../schemas/intent.js";
import { config } from "../config/index.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";

export async function intentRoutes(app: FastifyInstance, orchestrator: IntentOrchestrator) {
  const ParseIntentInput = buildParseIntentInput(config.server.maxInputChars);

  app.post("/v1/intents/parse", async (request, reply) => {
    const parsed = ParseIntentInput.safeParse(request.body);

    if (!parsed.success) {
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, getRequestId(request)));
    }

    const intent = await orchestrator.parseIntent(parsed.data.text);
    const body: IntentRecordV1T = { ...intent };
    return reply.code(200).send(body);
  });

  app.get("/v1/intents/history", async (_request, reply) => {
    const body: IntentHistoryV1T = {
      schema: "intent-history.v1",
      items: orchestrator.getHistory(),
    };
    return reply.code(200).send(body);
  });
}
