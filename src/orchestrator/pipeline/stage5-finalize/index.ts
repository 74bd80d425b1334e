/**
 * Stage 5: Finalize
 *
 * Builds the immutable Intent Record. Parameters are JSON-encoded ("{}" when
 * empty) to match the flat record consumed on the native side.
 */

import { createIntentRecord, isIntentAction } from "../../vocabulary.js";
import type { NodeProcessor } from "../types.js";

export function createFinalizeStage(): NodeProcessor {
  return (_input, context) => {
    const parameters = context.parameters ?? {};
    const action = context.action ?? 'unknown';

    context.intent = createIntentRecord({
      action: isIntentAction(action) ? action : 'unknown',
      target: context.target ?? '',
      parameters: Object.keys(parameters).length > 0 ? JSON.stringify(parameters) : '{}',
      confidence: context.confidence ?? 0,
      timestamp: context.timestamp,
    });
    return context;
  };
}
