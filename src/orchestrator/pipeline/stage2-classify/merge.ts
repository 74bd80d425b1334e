/**
 * Merge / Guardrail Engine
 *
 * Reconciles the rule classification with an optional model classification.
 * The rule result is the baseline; a model answer replaces it only when it is
 * structurally valid and confident enough:
 *
 *   model.confidence >= max(0.55, rule.confidence - 0.05)
 */

import { clampConfidence, isIntentAction, isValidTargetFor } from "../../vocabulary.js";
import type { ClassificationRecord, IntentParameters } from "../types.js";

export const MODEL_CONFIDENCE_FLOOR = 0.55;
export const RULE_CONFIDENCE_MARGIN = 0.05;
export const GUARDRAIL_CONFIDENCE = 0.2;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Coerce a parameters payload into an object.
 * Strings are parsed as JSON; anything that is not an object becomes {}.
 */
export function coerceParameters(value: unknown): IntentParameters {
  let parsed = value;
  if (typeof parsed === 'string') {
    try {
      parsed = JSON.parse(parsed);
    } catch {
      return {};
    }
  }
  return isPlainObject(parsed) ? { ...parsed } : {};
}

function asTrimmedString(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value).trim();
}

/**
 * Normalise raw model output into a classification record.
 * Returns null when the output is missing, not an object, or has no action.
 */
export function normalizeModelResult(raw: unknown): ClassificationRecord | null {
  if (!isPlainObject(raw)) return null;

  const action = asTrimmedString(raw.action);
  if (!action) return null;

  return {
    action,
    target: asTrimmedString(raw.target).toLowerCase(),
    parameters: coerceParameters(raw.parameters ?? {}),
    confidence: clampConfidence(raw.confidence ?? 0.5),
    source: 'llm',
  };
}

/**
 * Threshold a model answer must reach to override the rule answer.
 */
export function modelAdoptionThreshold(ruleConfidence: number): number {
  return Math.max(MODEL_CONFIDENCE_FLOOR, ruleConfidence - RULE_CONFIDENCE_MARGIN);
}

export function mergeClassifications(
  modelResult: ClassificationRecord | null,
  ruleResult: ClassificationRecord,
): ClassificationRecord {
  let classification: ClassificationRecord = { ...ruleResult };

  if (modelResult) {
    const target = modelResult.target.toLowerCase();
    const structurallyValid =
      isIntentAction(modelResult.action) && isValidTargetFor(modelResult.action, target);

    if (structurallyValid && modelResult.confidence >= modelAdoptionThreshold(ruleResult.confidence)) {
      classification = {
        action: modelResult.action,
        target,
        parameters: modelResult.parameters,
        confidence: modelResult.confidence,
        source: 'llm',
      };
    }
  }

  classification.confidence = clampConfidence(classification.confidence);
  return classification;
}

/**
 * Low-confidence fallback for input the pipeline cannot use.
 */
export function unknownClassification(reason: string): ClassificationRecord {
  return {
    action: 'unknown',
    target: reason,
    parameters: {},
    confidence: GUARDRAIL_CONFIDENCE,
    source: 'guardrail',
  };
}
