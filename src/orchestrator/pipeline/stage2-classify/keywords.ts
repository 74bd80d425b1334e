/**
 * Keyword tables for the rule classifier and intensity extractor.
 *
 * Loaded once from data/intent-keywords.json. Table order is precedence:
 * the first entry whose keywords appear in the text wins.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { EFFECT_TYPES, INTENT_ACTIONS, RENDER_MODES } from "../../vocabulary.js";

// src/ under vitest, dist/src/ after a build
const KEYWORDS_CANDIDATES = [
  "../../../../data/intent-keywords.json",
  "../../../../../data/intent-keywords.json",
];

const KeywordList = z.array(z.string().min(1)).min(1);

const KeywordTablesSchema = z.object({
  renderModes: z.array(z.object({ target: z.enum(RENDER_MODES), keywords: KeywordList })),
  effects: z.array(z.object({ target: z.enum(EFFECT_TYPES), keywords: KeywordList })),
  removeMarkers: KeywordList,
  controls: z.array(
    z.object({
      action: z.enum(INTENT_ACTIONS),
      confidence: z.number().min(0).max(1),
      keywords: KeywordList,
    }),
  ),
  intensityLevels: z.array(z.object({ value: z.number().min(0).max(1), keywords: KeywordList })),
});

export type KeywordTables = z.infer<typeof KeywordTablesSchema>;

let cached: KeywordTables | null = null;

function readKeywordsFile(): string {
  const url = KEYWORDS_CANDIDATES.map((c) => new URL(c, import.meta.url)).find((u) => existsSync(u));
  if (!url) {
    throw new Error("intent-keywords.json not found");
  }
  return readFileSync(url, "utf8");
}

export function getKeywordTables(): KeywordTables {
  if (cached === null) {
    cached = KeywordTablesSchema.parse(JSON.parse(readKeywordsFile()));
  }
  return cached;
}

export function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((kw) => text.includes(kw));
}
