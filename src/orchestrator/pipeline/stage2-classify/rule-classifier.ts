/**
 * Rule Classifier
 *
 * Deterministic keyword classification of normalised text.
 *
 * Priority (first match wins, no fallthrough):
 *   render mode (0.75) > effect (0.7) > control words > unknown (0.5)
 *
 * Several keywords are ambiguous across categories ("normal" is both a
 * render mode and an intensity word); table order resolves them.
 *
 * No I/O after the tables are loaded.
 */

import type { ClassificationRecord } from "../types.js";
import { containsAny, getKeywordTables } from "./keywords.js";
import { extractIntensity } from "./intensity.js";

const RENDER_MODE_CONFIDENCE = 0.75;
const EFFECT_CONFIDENCE = 0.7;
const NO_MATCH_CONFIDENCE = 0.5;

export function ruleBasedClassify(normalized: string): ClassificationRecord {
  const tables = getKeywordTables();

  for (const mode of tables.renderModes) {
    if (containsAny(normalized, mode.keywords)) {
      return {
        action: 'set_render_mode',
        target: mode.target,
        parameters: {},
        confidence: RENDER_MODE_CONFIDENCE,
        source: 'rule',
      };
    }
  }

  for (const effect of tables.effects) {
    if (containsAny(normalized, effect.keywords)) {
      const intensity = extractIntensity(normalized);
      return {
        action: containsAny(normalized, tables.removeMarkers) ? 'remove_effect' : 'add_effect',
        target: effect.target,
        parameters: intensity === null ? {} : { intensity },
        confidence: EFFECT_CONFIDENCE,
        source: 'rule',
      };
    }
  }

  // Exclusive chain: capture > start recording > stop > reset > help
  const control = tables.controls.find((entry) => containsAny(normalized, entry.keywords));
  if (control) {
    return {
      action: control.action,
      target: '',
      parameters: {},
      confidence: control.confidence,
      source: 'rule',
    };
  }

  return {
    action: 'unknown',
    target: '',
    parameters: {},
    confidence: NO_MATCH_CONFIDENCE,
    source: 'rule',
  };
}
