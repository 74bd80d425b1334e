/**
 * JSON Extractor Utility
 *
 * Pulls the first well-formed JSON object out of raw model text. Small local
 * models routinely wrap their answer in prose ("Sure! Here is the intent:")
 * or trail off after the closing brace, even when grammar-constrained.
 */

import { log } from "./telemetry.js";

export interface JsonObjectExtraction {
  json: Record<string, unknown>;
  /** The substring that parsed */
  content: string;
  /** Characters of text before the object */
  preambleLength: number;
  /** Characters of text after the object */
  suffixLength: number;
}

export interface JsonExtractionOptions {
  /** Task name for logging (e.g., "intent_parse") */
  task?: string;
  /** Whether to log when surrounding text had to be stripped */
  logWarnings?: boolean;
}

/**
 * Find the first `{` position from which a balanced, parseable JSON object
 * can be read. Returns null when there is none.
 */
export function extractFirstJsonObject(
  content: string,
  options: JsonExtractionOptions = {},
): JsonObjectExtraction | null {
  const { task, logWarnings = true } = options;
  const trimmed = content.trim();

  let candidates = 0;
  for (let i = trimmed.indexOf("{"); i !== -1; i = trimmed.indexOf("{", i + 1)) {
    candidates++;
    const match = matchBalancedObject(trimmed, i);
    if (!match) continue;

    const preambleLength = i;
    const suffixLength = trimmed.length - (i + match.content.length);

    if ((preambleLength > 0 || suffixLength > 0) && logWarnings) {
      log.debug(
        {
          task,
          preamble_length: preambleLength,
          suffix_length: suffixLength,
          candidates_tried: candidates,
        },
        "JSON object extracted from surrounding model text",
      );
    }

    return { json: match.json, content: match.content, preambleLength, suffixLength };
  }

  return null;
}

/**
 * Bracket-match from `startIndex`, honouring strings and escapes, and parse
 * the enclosed text. Arrays and scalars are rejected.
 */
function matchBalancedObject(
  content: string,
  startIndex: number,
): { json: Record<string, unknown>; content: string } | null {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = startIndex; i < content.length; i++) {
    const char = content[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (char === "\\") {
      escape = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === "{" || char === "[") depth++;
    if (char === "}" || char === "]") depth--;

    if (depth === 0) {
      const jsonStr = content.slice(startIndex, i + 1);
      try {
        const json: unknown = JSON.parse(jsonStr);
        if (typeof json !== "object" || json === null || Array.isArray(json)) return null;
        return { json: Object.fromEntries(Object.entries(json)), content: jsonStr };
      } catch {
        return null;
      }
    }
  }

  // Unbalanced
  return null;
}
