/**
 * Query the model for one normalised command and return its raw JSON object.
 *
 * Only the first well-formed `{...}` object in the completion is used; any
 * prose around it is ignored. Rejections from the handle propagate; the
 * classify stage owns recovery.
 */

import { extractFirstJsonObject } from "../../utils/json-extractor.js";
import { buildIntentPrompt } from "./prompt.js";
import type { ModelHandle } from "./types.js";

export async function queryModel(
  handle: ModelHandle,
  normalizedInput: string,
  maxTokens: number,
): Promise<Record<string, unknown> | null> {
  const text = await handle.complete(buildIntentPrompt(normalizedInput), { maxTokens });
  const extracted = extractFirstJsonObject(text, { task: 'intent_parse' });
  return extracted ? extracted.json : null;
}
