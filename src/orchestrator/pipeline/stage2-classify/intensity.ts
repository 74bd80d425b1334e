/**
 * Intensity Extractor
 *
 * "50%" → 0.5, "subtle" → 0.3, "medium" → 0.5, "strong" → 0.8.
 * Returns null (not a default) when nothing matches.
 */

import { containsAny, getKeywordTables } from "./keywords.js";

const PERCENT_PATTERN = /(\d+)\s*%/;

export function extractIntensity(text: string): number | null {
  const match = PERCENT_PATTERN.exec(text);
  if (match) {
    return Number.parseInt(match[1], 10) / 100;
  }

  for (const level of getKeywordTables().intensityLevels) {
    if (containsAny(text, level.keywords)) return level.value;
  }

  return null;
}
