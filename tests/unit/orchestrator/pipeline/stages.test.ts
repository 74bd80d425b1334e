/**
 * Pipeline stage tests
 *
 * Each stage is exercised in isolation against a hand-built context.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { createPreprocessStage, normalizeInput } from "../../../../src/orchestrator/pipeline/stage1-preprocess/index.js";
import { createClassifyStage } from "../../../../src/orchestrator/pipeline/stage2-classify/index.js";
import { createExtractStage } from "../../../../src/orchestrator/pipeline/stage3-extract/index.js";
import { createValidateStage } from "../../../../src/orchestrator/pipeline/stage4-validate/index.js";
import { createFinalizeStage } from "../../../../src/orchestrator/pipeline/stage5-finalize/index.js";
import type { ClassificationRecord, PipelineContext, PipelineDeps, PipelineSettings } from "../../../../src/orchestrator/pipeline/types.js";
import type { CompletionOptions, ModelHandle } from "../../../../src/orchestrator/model/types.js";
import { setTestSink } from "../../../../src/utils/telemetry.js";

const SETTINGS: PipelineSettings = {
  ruleConfidenceSkipLlm: 0.9,
  maxLlmTokens: 96,
  maxNormalizedLength: 512,
  defaultEffectIntensity: 0.5,
  telemetryEnabled: true,
};

function makeDeps(overrides: Partial<PipelineSettings> = {}, model: ModelHandle | null = null): PipelineDeps {
  return { settings: { ...SETTINGS, ...overrides }, getModel: () => model };
}

function makeContext(fields: Partial<PipelineContext> = {}): PipelineContext {
  return { input: "", timestamp: 1_700_000_000_000, ...fields };
}

function fakeModel(reply: () => Promise<string>) {
  const complete = vi.fn((_prompt: string, _options: CompletionOptions) => reply());
  const handle: ModelHandle = { complete, dispose: async () => undefined };
  return { handle, complete };
}

function classification(fields: Partial<ClassificationRecord>): ClassificationRecord {
  return { action: "add_effect", target: "blur", parameters: {}, confidence: 0.7, source: "rule", ...fields };
}

afterEach(() => {
  setTestSink(null);
});

describe("preprocess", () => {
  it.each([
    ["  Add BLUR  ", "add blur"],
    ["Please add blur", "add blur"],
    ["Could you please show depth", "show depth"],
    ["I'd like to add grain please", "add grain"],
    ["can you", ""],
  ])("normalises %j to %j", (input, expected) => {
    expect(normalizeInput(input)).toBe(expected);
  });

  it("keeps the original input alongside the normalised one", async () => {
    const stage = createPreprocessStage(makeDeps());
    const context = await stage("Please add blur", makeContext({ input: "Please add blur" }));

    expect(context.normalized_input).toBe("add blur");
    expect(context.original_input).toBe("Please add blur");
    expect(context.truncated).toBeUndefined();
  });

  it("truncates to the configured length", async () => {
    const stage = createPreprocessStage(makeDeps({ maxNormalizedLength: 5 }));
    const context = await stage("abcdefgh", makeContext());

    expect(context.normalized_input).toBe("abcde");
    expect(context.truncated).toBe(true);
  });

  it("never splits a surrogate pair when truncating", async () => {
    const stage = createPreprocessStage(makeDeps({ maxNormalizedLength: 2 }));
    const context = await stage("😀😀😀", makeContext());

    expect(context.normalized_input).toBe("😀😀");
  });
});

describe("classify", () => {
  it("short-circuits empty input to the guardrail without the model", async () => {
    const { handle, complete } = fakeModel(async () => "{}");
    const stage = createClassifyStage(makeDeps({}, handle));
    const context = await stage("", makeContext({ normalized_input: "" }));

    expect(context.classification).toEqual({
      action: "unknown",
      target: "empty_input",
      parameters: {},
      confidence: 0.2,
      source: "guardrail",
    });
    expect(context.confidence).toBe(0.2);
    expect(complete).not.toHaveBeenCalled();
  });

  it("uses rules alone when no model is loaded", async () => {
    const stage = createClassifyStage(makeDeps());
    const context = await stage("add subtle blur", makeContext({ normalized_input: "add subtle blur" }));

    expect(context.classification).toEqual(
      classification({ parameters: { intensity: 0.3 } }),
    );
    expect(context.rule_result).toEqual(context.classification);
    expect(context.llm_result).toBeUndefined();
  });

  it("skips the model when the rules are confident enough", async () => {
    const events: string[] = [];
    setTestSink((name) => events.push(name));
    const { handle, complete } = fakeModel(async () => "{}");
    const stage = createClassifyStage(makeDeps({}, handle));

    const context = await stage("help", makeContext({ normalized_input: "help" }));

    expect(complete).not.toHaveBeenCalled();
    expect(context.classification?.action).toBe("help");
    expect(events).toEqual(["intent.model_skipped"]);
  });

  it("asks the model with the prompt and token budget when rules are unsure", async () => {
    const { handle, complete } = fakeModel(
      async () => 'Sure! {"action":"set_render_mode","target":"Stylized","parameters":"{}","confidence":0.8}',
    );
    const stage = createClassifyStage(makeDeps({ maxLlmTokens: 32 }, handle));

    const context = await stage("make it look nice", makeContext({ normalized_input: "make it look nice" }));

    expect(complete).toHaveBeenCalledTimes(1);
    const [prompt, options] = complete.mock.calls[0];
    expect(prompt.endsWith("\n\nUser: make it look nice\nAssistant:")).toBe(true);
    expect(options).toEqual({ maxTokens: 32 });

    expect(context.llm_result?.target).toBe("stylized");
    expect(context.classification).toEqual({
      action: "set_render_mode",
      target: "stylized",
      parameters: {},
      confidence: 0.8,
      source: "llm",
    });
    expect(context.rule_result?.action).toBe("unknown");
  });

  it("keeps the rule result when the model fails", async () => {
    const events: string[] = [];
    setTestSink((name) => events.push(name));
    const { handle } = fakeModel(async () => {
      throw new Error("connection refused");
    });
    const stage = createClassifyStage(makeDeps({}, handle));

    const context = await stage("add blur", makeContext({ normalized_input: "add blur" }));

    expect(context.classification).toEqual(classification({}));
    expect(context.llm_result).toBeUndefined();
    expect(events).toEqual(["intent.model_query_failed"]);
  });

  it("ignores model output with no JSON object", async () => {
    const { handle } = fakeModel(async () => "I am not sure what you mean.");
    const stage = createClassifyStage(makeDeps({}, handle));

    const context = await stage("add blur", makeContext({ normalized_input: "add blur" }));

    expect(context.llm_result).toBeUndefined();
    expect(context.classification?.source).toBe("rule");
  });
});

describe("extract", () => {
  const stage = createExtractStage(makeDeps({ defaultEffectIntensity: 0.6 }));

  it("flattens the classification", async () => {
    const context = await stage(
      "",
      makeContext({ classification: classification({ parameters: { intensity: 0.3 }, source: "llm" }) }),
    );

    expect(context.action).toBe("add_effect");
    expect(context.target).toBe("blur");
    expect(context.parameters).toEqual({ intensity: 0.3 });
    expect(context.confidence).toBe(0.7);
    expect(context.classification_source).toBe("llm");
  });

  it("parses a numeric string intensity", async () => {
    const context = await stage("", makeContext({ classification: classification({ parameters: { intensity: "0.4" } }) }));
    expect(context.parameters).toEqual({ intensity: 0.4 });
  });

  it("falls back to the default intensity for a non-numeric value", async () => {
    const context = await stage(
      "",
      makeContext({ classification: classification({ parameters: { intensity: "strong", radius: 2 } }) }),
    );
    expect(context.parameters).toEqual({ intensity: 0.6, radius: 2 });
  });

  it("leaves the context alone without a classification", async () => {
    const context = await stage("", makeContext());
    expect(context.action).toBeUndefined();
    expect(context.parameters).toBeUndefined();
  });
});

describe("validate", () => {
  const stage = createValidateStage();

  it("passes a valid intent through", async () => {
    const context = await stage("", makeContext({ action: "add_effect", target: "blur", confidence: 0.7 }));
    expect(context.action).toBe("add_effect");
    expect(context.confidence).toBe(0.7);
    expect(context.validated).toBe(true);
  });

  it("demotes an unknown action and caps its confidence", async () => {
    const context = await stage("", makeContext({ action: "explode", target: "", confidence: 0.9 }));
    expect(context.action).toBe("unknown");
    expect(context.confidence).toBe(0.3);
  });

  it("does not raise an already low confidence", async () => {
    const context = await stage("", makeContext({ action: "explode", target: "", confidence: 0.1 }));
    expect(context.confidence).toBe(0.1);
  });

  it("caps confidence for a target outside the vocabulary", async () => {
    const context = await stage("", makeContext({ action: "set_render_mode", target: "blur", confidence: 0.75 }));
    expect(context.action).toBe("set_render_mode");
    expect(context.confidence).toBe(0.4);
  });

  it("defaults a missing confidence to 0.5", async () => {
    const context = await stage("", makeContext({ action: "help", target: "" }));
    expect(context.confidence).toBe(0.5);
  });
});

describe("finalize", () => {
  const stage = createFinalizeStage();

  it("builds a frozen record with JSON-encoded parameters", async () => {
    const context = await stage(
      "",
      makeContext({ action: "add_effect", target: "blur", parameters: { intensity: 0.3 }, confidence: 0.7 }),
    );

    expect(context.intent).toEqual({
      action: "add_effect",
      target: "blur",
      parameters: '{"intensity":0.3}',
      confidence: 0.7,
      timestamp: 1_700_000_000_000,
    });
    expect(Object.isFrozen(context.intent)).toBe(true);
  });

  it("encodes empty parameters as {}", async () => {
    const context = await stage("", makeContext({ action: "help", target: "", parameters: {}, confidence: 0.95 }));
    expect(context.intent?.parameters).toBe("{}");
  });

  it("fills in defaults for an empty context", async () => {
    const context = await stage("", makeContext());
    expect(context.intent).toEqual({
      action: "unknown",
      target: "",
      parameters: "{}",
      confidence: 0,
      timestamp: 1_700_000_000_000,
    });
  });
});
