/**
 * Intent Orchestrator
 *
 * Owns one intent pipeline: the DAG, the optional model handle, the bounded
 * history and the last-context diagnostic snapshot. Construct one per caller;
 * there is no process-wide instance.
 *
 * parseIntent() never rejects. Any failure inside the pipeline becomes an
 * "unknown" intent with zero confidence, and the error is kept on lastContext.
 * Calls on one instance are serialised.
 */

import {
  config,
  ModelConfigSchema,
  OrchestratorConfigSchema,
  type ModelConfig,
  type OrchestratorConfig,
} from "../config/index.js";
import { log, emit, TelemetryEvents } from "../utils/telemetry.js";
import { IntentHistory } from "./history.js";
import { locateModelAssets } from "./model/assets.js";
import { createOpenAICompatibleRuntime } from "./model/openai-compatible.js";
import type { ModelHandle, ModelRuntime } from "./model/types.js";
import { executeDag } from "./pipeline/dag.js";
import { buildIntentDag, INTENT_EXECUTION_ORDER } from "./pipeline/pipeline.js";
import type { DagNodes, PipelineContext, PipelineDeps } from "./pipeline/types.js";
import { createIntentRecord, intentToJson, type IntentRecord } from "./vocabulary.js";

export const PIPELINE_FAILURE_CONFIDENCE = 0;

export type OrchestratorMode = 'model' | 'mock';

export interface IntentOrchestratorOptions {
  assetsPath?: string;
  /** Overrides for pipeline tunables; unspecified keys come from env config. */
  config?: Partial<OrchestratorConfig>;
  /** Overrides for model location and runtime connection. */
  model?: Partial<ModelConfig>;
  /**
   * Runtime used to load the model. Defaults to the OpenAI-compatible runtime
   * when a model base URL is configured; null forces rule-only mode.
   */
  runtime?: ModelRuntime | null;
  clock?: () => number;
}

function defaultRuntime(modelConfig: ModelConfig): ModelRuntime | null {
  if (!modelConfig.baseUrl) return null;
  return createOpenAICompatibleRuntime({
    baseUrl: modelConfig.baseUrl,
    apiKey: modelConfig.apiKey,
    timeoutMs: modelConfig.timeoutMs,
  });
}

export class IntentOrchestrator {
  readonly settings: OrchestratorConfig;
  readonly modelConfig: ModelConfig;

  /** Replaceable for diagnostics; validated on every run. */
  nodes: DagNodes;
  executionOrder: string[] = [...INTENT_EXECUTION_ORDER];

  private assetsPath: string;
  private readonly runtime: ModelRuntime | null;
  private readonly clock: () => number;
  private readonly history: IntentHistory;

  private model: ModelHandle | null = null;
  private _grammarPath: string | null = null;
  private _initialized = false;
  private _lastContext: PipelineContext | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: IntentOrchestratorOptions = {}) {
    this.settings = OrchestratorConfigSchema.parse({ ...config.orchestrator, ...options.config });
    this.modelConfig = ModelConfigSchema.parse({ ...config.model, ...options.model });
    this.assetsPath = options.assetsPath ?? this.modelConfig.assetsPath;
    this.runtime = options.runtime === undefined ? defaultRuntime(this.modelConfig) : options.runtime;
    this.clock = options.clock ?? Date.now;
    this.history = new IntentHistory(this.settings.maxHistory);

    const deps: PipelineDeps = {
      settings: this.settings,
      getModel: () => this.model,
    };
    this.nodes = buildIntentDag(deps);
  }

  get initialized(): boolean {
    return this._initialized;
  }

  get mode(): OrchestratorMode {
    return this.model ? 'model' : 'mock';
  }

  get grammarPath(): string | null {
    return this._grammarPath;
  }

  get lastContext(): PipelineContext | null {
    return this._lastContext;
  }

  /**
   * Locate and load the model under `assetsPath`. Missing files, no runtime
   * or a failed load all degrade to rule-only mode; always resolves true.
   * Waits for parses already queued, so a handle in use is never released.
   */
  initialize(assetsPath?: string): Promise<boolean> {
    const run = this.queue.then(() => this.loadModel(assetsPath));
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Parse one command into an Intent Record. Never rejects.
   */
  parseIntent(userInput: string): Promise<IntentRecord> {
    const run = this.queue.then(() => this.runPipeline(userInput));
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** JSON form of parseIntent; `parameters` stays a JSON-encoded string. */
  async parseIntentJson(userInput: string): Promise<string> {
    return intentToJson(await this.parseIntent(userInput));
  }

  /** Oldest first. */
  getHistory(): IntentRecord[] {
    return this.history.toArray();
  }

  /** Release the model handle. Safe to call repeatedly. */
  async shutdown(): Promise<void> {
    await this.queue;
    await this.releaseModel();
    this._initialized = false;
  }

  // Runs on the queue only.
  private async loadModel(assetsPath?: string): Promise<boolean> {
    if (assetsPath) {
      this.assetsPath = assetsPath;
    }
    await this.releaseModel();

    const assets = await locateModelAssets(
      this.assetsPath,
      this.modelConfig.modelFileName,
      this.modelConfig.grammarFileName,
    );
    this._grammarPath = assets.grammarPath;

    if (!this.runtime || !assets.modelPath) {
      emit(TelemetryEvents.MockMode, {
        assets_path: this.assetsPath,
        reason: this.runtime ? 'model_not_found' : 'no_runtime',
      });
      this._initialized = true;
      return true;
    }

    try {
      this.model = await this.runtime.load({ modelPath: assets.modelPath, grammarPath: assets.grammarPath });
      emit(TelemetryEvents.ModelLoaded, {
        runtime: this.runtime.name,
        model_path: assets.modelPath,
        grammar: assets.grammarPath !== null,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ error: message, model_path: assets.modelPath }, "Failed to load model, running in mock mode");
      emit(TelemetryEvents.ModelLoadFailed, { runtime: this.runtime.name, error: message });
      this.model = null;
    }

    this._initialized = true;
    return true;
  }

  private async releaseModel(): Promise<void> {
    const handle = this.model;
    this.model = null;
    if (!handle) return;
    try {
      await handle.dispose();
    } catch (error) {
      log.warn({ error: error instanceof Error ? error.message : String(error) }, "Model dispose failed");
    }
  }

  private async runPipeline(userInput: string): Promise<IntentRecord> {
    let context: PipelineContext = { input: userInput, timestamp: this.clock() };
    let intent: IntentRecord;

    try {
      if (!this._initialized) {
        await this.loadModel();
      }
      context = await executeDag(this.nodes, this.executionOrder, userInput, context, {
        telemetry: this.settings.telemetryEnabled,
      });
      intent = context.intent ?? this.fallbackIntent(userInput, context.timestamp);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      context.error = message;
      intent = this.fallbackIntent(userInput, context.timestamp);

      log.error({ error: message }, "Intent pipeline error");
      emit(TelemetryEvents.IntentPipelineFailed, { error: message });
    }

    this._lastContext = context;
    this.history.append(intent);

    if (!context.error) {
      emit(TelemetryEvents.IntentParsed, {
        action: intent.action,
        target: intent.target,
        confidence: intent.confidence,
        source: context.classification_source ?? null,
        truncated: context.truncated ?? false,
        model_consulted: context.llm_result !== undefined,
        nodes: Object.fromEntries(
          Object.entries(context.telemetry?.nodes ?? {}).map(([name, timing]) => [name, timing.ms]),
        ),
      });
    }

    return intent;
  }

  private fallbackIntent(userInput: string, timestamp: number): IntentRecord {
    return createIntentRecord({
      action: 'unknown',
      target: userInput,
      parameters: '{}',
      confidence: PIPELINE_FAILURE_CONFIDENCE,
      timestamp,
    });
  }
}
