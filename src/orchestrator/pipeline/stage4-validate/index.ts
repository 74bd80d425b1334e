/**
 * Stage 4: Validate
 *
 * Re-checks the extracted intent against the vocabulary. An unknown action is
 * demoted to "unknown" (confidence ≤ 0.3); a target outside the render-mode or
 * effect set caps confidence at 0.4.
 */

import { clampConfidence, isIntentAction, isValidTargetFor } from "../../vocabulary.js";
import type { NodeProcessor } from "../types.js";

export const INVALID_ACTION_CONFIDENCE_CAP = 0.3;
export const INVALID_TARGET_CONFIDENCE_CAP = 0.4;

export function createValidateStage(): NodeProcessor {
  return (_input, context) => {
    const action = context.action ?? 'unknown';
    const target = context.target ?? '';
    let confidence = context.confidence ?? 0.5;

    if (!isIntentAction(action)) {
      context.action = 'unknown';
      confidence = Math.min(confidence, INVALID_ACTION_CONFIDENCE_CAP);
    } else if (!isValidTargetFor(action, target)) {
      confidence = Math.min(confidence, INVALID_TARGET_CONFIDENCE_CAP);
    }

    context.confidence = clampConfidence(confidence);
    context.validated = true;
    return context;
  };
}
