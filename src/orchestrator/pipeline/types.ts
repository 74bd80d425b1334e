/**
 * Intent Pipeline Types
 *
 * Contracts shared by the DAG executor and the five pipeline stages
 * (preprocess → classify → extract → validate → finalize).
 */

import type { IntentRecord } from "../vocabulary.js";
import type { ModelHandle } from "../model/types.js";

// ============================================================================
// Classification
// ============================================================================

export type ClassificationSource = 'rule' | 'llm' | 'guardrail';

export type IntentParameters = Record<string, unknown>;

export interface ClassificationRecord {
  /** Free string from the model path; narrowed to IntentAction by validate. */
  action: string;
  target: string;
  parameters: IntentParameters;
  confidence: number;
  source: ClassificationSource;
}

// ============================================================================
// Pipeline Context
// ============================================================================

export interface NodeTiming {
  ms: number;
}

export interface PipelineTelemetry {
  nodes: Record<string, NodeTiming>;
}

/**
 * Mutable record threaded through every stage of one parse.
 * Keys are populated progressively; see each stage for what it writes.
 */
export interface PipelineContext {
  input: string;
  timestamp: number;
  telemetry?: PipelineTelemetry;

  // preprocess
  normalized_input?: string;
  original_input?: string;
  truncated?: boolean;

  // classify
  classification?: ClassificationRecord;
  rule_result?: ClassificationRecord;
  llm_result?: ClassificationRecord;
  confidence?: number;

  // extract
  action?: string;
  target?: string;
  parameters?: IntentParameters;
  classification_source?: ClassificationSource;

  // validate
  validated?: boolean;

  // finalize
  intent?: IntentRecord;

  // orchestrator failure guard
  error?: string;
}

// ============================================================================
// DAG
// ============================================================================

export type NodeProcessor = (
  input: string,
  context: PipelineContext,
) => PipelineContext | Promise<PipelineContext>;

export interface DagNode {
  name: string;
  processor: NodeProcessor;
  dependencies: string[];
}

export type DagNodes = Record<string, DagNode>;

// ============================================================================
// Stage Dependencies
// ============================================================================

export interface PipelineSettings {
  ruleConfidenceSkipLlm: number;
  maxLlmTokens: number;
  maxNormalizedLength: number;
  defaultEffectIntensity: number;
  telemetryEnabled: boolean;
}

/**
 * What the stages need from their owner. The model handle is read through a
 * getter so that initialize()/shutdown() take effect without rebuilding nodes.
 */
export interface PipelineDeps {
  settings: PipelineSettings;
  getModel(): ModelHandle | null;
}
