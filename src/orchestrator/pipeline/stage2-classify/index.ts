/**
 * Stage 2: Classify
 *
 * Rule classification first; the model is consulted only when the rules are
 * not already confident and a model is loaded. Model failures never escape
 * this stage; the rule result stands.
 */

import { log, emit, TelemetryEvents } from "../../../utils/telemetry.js";
import { queryModel } from "../../model/query-model.js";
import type { ClassificationRecord, NodeProcessor, PipelineDeps } from "../types.js";
import { mergeClassifications, normalizeModelResult, unknownClassification } from "./merge.js";
import { ruleBasedClassify } from "./rule-classifier.js";

export function createClassifyStage(deps: PipelineDeps): NodeProcessor {
  return async (input, context) => {
    const normalized = context.normalized_input ?? input.toLowerCase().trim();

    if (!normalized) {
      const classification = unknownClassification('empty_input');
      context.classification = classification;
      context.confidence = classification.confidence;
      return context;
    }

    const ruleResult = ruleBasedClassify(normalized);
    let modelResult: ClassificationRecord | null = null;

    const { ruleConfidenceSkipLlm, maxLlmTokens } = deps.settings;
    const model = deps.getModel();

    if (ruleResult.confidence >= ruleConfidenceSkipLlm) {
      if (model) {
        emit(TelemetryEvents.ModelSkipped, {
          rule_action: ruleResult.action,
          rule_confidence: ruleResult.confidence,
        });
      }
    } else if (model) {
      try {
        const raw = await queryModel(model, normalized, maxLlmTokens);
        modelResult = normalizeModelResult(raw);
        if (modelResult) {
          context.llm_result = modelResult;
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.warn({ error: message }, "Model query failed, using rule classification");
        emit(TelemetryEvents.ModelQueryFailed, { error: message });
      }
    }

    const classification = mergeClassifications(modelResult, ruleResult);

    context.classification = classification;
    context.rule_result = ruleResult;
    context.confidence = classification.confidence;
    return context;
  };
}
