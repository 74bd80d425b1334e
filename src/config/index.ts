/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to environment variables. Invalid
 * configurations fail fast on first access; every value has a default.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    return true;
  });

/**
 * Optional URL string that treats empty/undefined as undefined
 */
const optionalUrl = z
  .union([z.string(), z.undefined()])
  .transform((val, ctx) => {
    if (val === undefined || val === "") {
      return undefined;
    }
    try {
      new URL(val);
      return val;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid url" });
      return z.NEVER;
    }
  });

const Environment = z.enum(["development", "test", "production"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

const unitInterval = z.coerce.number().min(0).max(1);

/**
 * Pipeline tunables. Also accepted as constructor overrides by
 * IntentOrchestrator, so exported separately.
 */
export const OrchestratorConfigSchema = z.object({
  // Rule confidence at or above which the model is not consulted
  ruleConfidenceSkipLlm: unitInterval.default(0.9),
  // Completion budget per model call
  maxLlmTokens: z.coerce.number().int().positive().default(96),
  // Normalised input longer than this is truncated
  maxNormalizedLength: z.coerce.number().int().positive().default(512),
  // Intensity used when a parameter names intensity without a number
  defaultEffectIntensity: unitInterval.default(0.5),
  // Per-node timings in the pipeline context
  telemetryEnabled: booleanString.default(true),
  maxHistory: z.coerce.number().int().positive().default(10),
});

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;

export const ModelConfigSchema = z.object({
  assetsPath: z.string().default("./assets"),
  modelFileName: z.string().default("qwen-2.5-1.5b-instruct-q4_k_m.gguf"),
  grammarFileName: z.string().default("qwen_grammar.gbnf"),
  // OpenAI-compatible completion server fronting the local model
  baseUrl: optionalUrl,
  apiKey: z.string().default("local"),
  timeoutMs: z.coerce.number().int().positive().default(30_000),
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3101),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(64 * 1024),
    maxInputChars: z.coerce.number().int().positive().default(4096),
    // Requests per minute per client IP
    rateLimitRpm: z.coerce.number().int().positive().default(120),
    // Comma-separated CORS allowlist
    allowedOrigins: z.string().default("http://localhost:5173,http://localhost:3000"),
  }),
  orchestrator: OrchestratorConfigSchema,
  model: ModelConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      maxInputChars: env.MAX_INPUT_CHARS,
      rateLimitRpm: env.GLOBAL_RATE_LIMIT_RPM,
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    orchestrator: {
      ruleConfidenceSkipLlm: env.RULE_CONFIDENCE_SKIP_LLM,
      maxLlmTokens: env.MAX_LLM_TOKENS,
      maxNormalizedLength: env.MAX_NORMALIZED_LENGTH,
      defaultEffectIntensity: env.DEFAULT_EFFECT_INTENSITY,
      telemetryEnabled: env.TELEMETRY_ENABLED,
      maxHistory: env.MAX_INTENT_HISTORY,
    },
    model: {
      assetsPath: env.ASSETS_PATH,
      modelFileName: env.MODEL_FILE_NAME,
      grammarFileName: env.GRAMMAR_FILE_NAME,
      baseUrl: env.MODEL_BASE_URL,
      apiKey: env.MODEL_API_KEY,
      timeoutMs: env.MODEL_TIMEOUT_MS,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
        .join("\n");
      throw new Error(`Configuration validation failed:\n${issues}`);
    }
    throw error;
  }
}

/**
 * Lazily parsed configuration.
 *
 * ```
 * import { config } from './config/index.js';
 * const port = config.server.port;
 * ```
 *
 * The config is parsed once on first access and cached thereafter.
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },
  ownKeys() {
    return Reflect.ownKeys(loadConfig());
  },
  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },
  has(_target, prop) {
    return prop in loadConfig();
  },
});

export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
