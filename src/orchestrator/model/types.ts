/**
 * Model collaborator contracts.
 *
 * The pipeline never talks to an inference engine directly: it holds a
 * ModelHandle produced by a ModelRuntime. Production wires in the
 * OpenAI-compatible runtime; tests wire in fakes.
 */

export interface ModelAssets {
  modelPath: string;
  /** GBNF grammar constraining output to the intent JSON shape, when shipped. */
  grammarPath: string | null;
}

export interface CompletionOptions {
  maxTokens: number;
}

export interface ModelHandle {
  /** Raw completion text for a prompt. May reject. */
  complete(prompt: string, options: CompletionOptions): Promise<string>;
  dispose(): Promise<void>;
}

export interface ModelRuntime {
  readonly name: string;
  load(assets: ModelAssets): Promise<ModelHandle>;
}
