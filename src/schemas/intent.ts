import { z } from "zod";
import { INTENT_ACTIONS } from "../orchestrator/vocabulary.js";

/**
 * Request body for POST /v1/intents/parse. Empty text is accepted and yields
 * the guardrail "unknown" intent.
 */
export function buildParseIntentInput(maxChars: number) {
  return z.object({
    text: z.string().max(maxChars),
  });
}

/**
 * Intent Record as sent over the wire. `parameters` is a JSON-encoded object.
 */
export const IntentRecordV1 = z.object({
  action: z.enum(INTENT_ACTIONS),
  target: z.string(),
  parameters: z.string(),
  confidence: z.number().min(0).max(1),
  timestamp: z.number().int(),
});

export const IntentHistoryV1 = z.object({
  schema: z.literal("intent-history.v1"),
  items: z.array(IntentRecordV1),
});

export const ErrorV1 = z.object({
  schema: z.literal("error.v1"),
  code: z.enum(["BAD_INPUT", "RATE_LIMITED", "INTERNAL"]),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
  request_id: z.string().optional(),
});

export type IntentRecordV1T = z.infer<typeof IntentRecordV1>;
export type IntentHistoryV1T = z.infer<typeof IntentHistoryV1>;
export type ErrorV1T = z.infer<typeof ErrorV1>;
