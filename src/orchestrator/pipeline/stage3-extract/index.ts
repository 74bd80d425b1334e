/**
 * Stage 3: Extract
 *
 * Flattens the merged classification into top-level context fields.
 * A numeric-less `intensity` parameter falls back to the configured default.
 */

import { coerceParameters } from "../stage2-classify/merge.js";
import type { IntentParameters, NodeProcessor, PipelineDeps } from "../types.js";

function withIntensityDefault(parameters: IntentParameters, fallback: number): IntentParameters {
  if (!('intensity' in parameters)) return parameters;
  const value = parameters.intensity;
  if (typeof value === 'number' && Number.isFinite(value)) return parameters;
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  return { ...parameters, intensity: Number.isFinite(parsed) ? parsed : fallback };
}

export function createExtractStage(deps: PipelineDeps): NodeProcessor {
  return (_input, context) => {
    const classification = context.classification;
    if (!classification) return context;

    context.action = classification.action;
    context.target = classification.target;
    context.parameters = withIntensityDefault(
      coerceParameters(classification.parameters),
      deps.settings.defaultEffectIntensity,
    );
    context.confidence = classification.confidence;
    context.classification_source = classification.source;
    return context;
  };
}
