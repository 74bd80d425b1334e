/**
 * Stage 1: Preprocess
 *
 * Lower-case, trim, strip filler phrases and cap the length.
 * Writes normalized_input, original_input and (when cut) truncated.
 */

import type { NodeProcessor, PipelineDeps } from "../types.js";

export const FILLER_PHRASES = ['please', 'can you', 'could you', 'i want to', "i'd like to"] as const;

/**
 * Normalise a raw command. Fillers are removed wherever they occur as
 * substrings, trimming after each removal.
 */
export function normalizeInput(input: string): string {
  let normalized = input.toLowerCase().trim();
  for (const filler of FILLER_PHRASES) {
    normalized = normalized.replaceAll(filler, '').trim();
  }
  return normalized;
}

export function createPreprocessStage(deps: PipelineDeps): NodeProcessor {
  return (input, context) => {
    let normalized = normalizeInput(input);

    // Code points, not UTF-16 units, so a cut never splits a surrogate pair
    const chars = Array.from(normalized);
    const maxLength = deps.settings.maxNormalizedLength;
    if (chars.length > maxLength) {
      normalized = chars.slice(0, maxLength).join('');
      context.truncated = true;
    }

    context.normalized_input = normalized;
    context.original_input = input;
    return context;
  };
}
