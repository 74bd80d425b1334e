/**
 * OpenAI-compatible model runtime
 *
 * Talks to a local llama.cpp server (or anything else speaking the
 * `/v1/completions` dialect) that has the intent model loaded. The model file
 * name doubles as the model id; the GBNF grammar, when present, is sent with
 * every request so the server can constrain sampling.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import OpenAI from "openai";
import type { CompletionCreateParamsNonStreaming } from "openai/resources/completions";
import { log } from "../../utils/telemetry.js";
import { INTENT_STOP_SEQUENCES } from "./prompt.js";
import type { CompletionOptions, ModelAssets, ModelHandle, ModelRuntime } from "./types.js";

export interface OpenAICompatibleRuntimeOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

/** llama.cpp accepts a `grammar` field next to the standard parameters. */
type GrammarCompletionParams = CompletionCreateParamsNonStreaming & { grammar?: string };

export function createOpenAICompatibleRuntime(options: OpenAICompatibleRuntimeOptions): ModelRuntime {
  return {
    name: 'openai-compatible',

    async load(assets: ModelAssets): Promise<ModelHandle> {
      const grammar = assets.grammarPath ? await readFile(assets.grammarPath, 'utf8') : undefined;
      let client: OpenAI | null = new OpenAI({
        baseURL: options.baseUrl,
        apiKey: options.apiKey,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
      const model = basename(assets.modelPath);

      log.info(
        { base_url: options.baseUrl, model, grammar: grammar !== undefined },
        "OpenAI-compatible model runtime ready",
      );

      return {
        async complete(prompt: string, completion: CompletionOptions): Promise<string> {
          if (!client) {
            throw new Error('Model handle has been disposed');
          }
          const params: GrammarCompletionParams = {
            model,
            prompt,
            max_tokens: completion.maxTokens,
            temperature: 0.1,
            top_p: 0.9,
            stop: INTENT_STOP_SEQUENCES,
          };
          if (grammar !== undefined) {
            params.grammar = grammar;
          }
          const response = await client.completions.create(params);
          return response.choices[0]?.text.trim() ?? '';
        },

        async dispose(): Promise<void> {
          client = null;
        },
      };
    },
  };
}
