/**
 * Intent Pipeline
 *
 * The fixed five-stage micro-DAG: preprocess → classify → extract →
 * validate → finalize. Each stage depends on the one before it.
 */

import type { DagNodes, PipelineDeps } from "./types.js";
import { createPreprocessStage } from "./stage1-preprocess/index.js";
import { createClassifyStage } from "./stage2-classify/index.js";
import { createExtractStage } from "./stage3-extract/index.js";
import { createValidateStage } from "./stage4-validate/index.js";
import { createFinalizeStage } from "./stage5-finalize/index.js";

export const INTENT_EXECUTION_ORDER = ['preprocess', 'classify', 'extract', 'validate', 'finalize'] as const;

export function buildIntentDag(deps: PipelineDeps): DagNodes {
  return {
    preprocess: {
      name: 'preprocess',
      processor: createPreprocessStage(deps),
      dependencies: [],
    },
    classify: {
      name: 'classify',
      processor: createClassifyStage(deps),
      dependencies: ['preprocess'],
    },
    extract: {
      name: 'extract',
      processor: createExtractStage(deps),
      dependencies: ['classify'],
    },
    validate: {
      name: 'validate',
      processor: createValidateStage(),
      dependencies: ['extract'],
    },
    finalize: {
      name: 'finalize',
      processor: createFinalizeStage(),
      dependencies: ['validate'],
    },
  };
}
