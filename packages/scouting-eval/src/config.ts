import {
  readEnv,
  resolveLogLevel,
  logger as defaultLogger,
  type Environment,
  type Logger,
  type LogLevel,
  type ProviderSettings,
} from "@rinkscout/scouting";
import type { AdapterDefinition } from "./adapters";

export const DEFAULT_TIMEOUT_MS = 300_000;
export const DEFAULT_DEEPSEEK_MODEL = "DeepSeek-R1";
export const DEFAULT_LLAMA_MODEL = "llama-4-scout";
export const DEFAULT_OSS_MODEL = "gpt-oss-120b";
export const DEFAULT_MAVERICK_MODEL = "meta-llama/llama-4-maverick:free";

const COMPAT_TEMPERATURE = 0.2;

export const ADAPTER_KEYS = [
  "gpt-5",
  "gpt-5-mini",
  "deepseek",
  "llama",
  "oss",
  "gemini",
  "opus",
  "maverick",
] as const;

export type AdapterKey = (typeof ADAPTER_KEYS)[number];

export interface ScoringModels {
  deepseek: string;
  llama: string;
  oss: string;
  gemini?: string;
  opus?: string;
  maverick: string;
}

export interface ScoringConfig {
  models: ScoringModels;
  skip: string[];
  timeoutMs: number;
  logLevel: LogLevel;
}

export interface ScoringOverrides {
  deepseekModel?: string;
  llamaModel?: string;
  ossModel?: string;
  geminiModel?: string;
  opusModel?: string;
  maverickModel?: string;
  skip?: string[];
  timeoutMs?: number;
  logLevel?: LogLevel;
}

/** The Jetstream server only accepts the exact casing `DeepSeek-R1`. */
export function normalizeDeepSeekModel(model: string): string {
  return model.toLowerCase().replace(/_/g, "-") === "deepseek-r1"
    ? DEFAULT_DEEPSEEK_MODEL
    : model;
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export function resolveScoringConfig(
  env: Environment,
  overrides: ScoringOverrides = {}
): ScoringConfig {
  return {
    models: {
      deepseek: normalizeDeepSeekModel(
        overrides.deepseekModel ??
          readEnv(env, "DEEPSEEK_MODEL") ??
          DEFAULT_DEEPSEEK_MODEL
      ),
      llama:
        overrides.llamaModel ?? readEnv(env, "LLAMA_MODEL") ?? DEFAULT_LLAMA_MODEL,
      oss: overrides.ossModel ?? readEnv(env, "OSS_MODEL") ?? DEFAULT_OSS_MODEL,
      gemini: overrides.geminiModel ?? readEnv(env, "GEMINI_MODEL"),
      opus: overrides.opusModel ?? readEnv(env, "OPUS_MODEL"),
      maverick:
        overrides.maverickModel ??
        readEnv(env, "MAVERICK_MODEL") ??
        DEFAULT_MAVERICK_MODEL,
    },
    skip: [...new Set(overrides.skip ?? [])],
    timeoutMs:
      overrides.timeoutMs ??
      parseTimeout(readEnv(env, "SCORER_TIMEOUT_MS")) ??
      DEFAULT_TIMEOUT_MS,
    logLevel: overrides.logLevel ?? resolveLogLevel(env),
  };
}

/**
 * The scorer line-up: two OpenAI models with strict structured output, three
 * Jetstream-hosted open models, and OpenRouter models when that provider has
 * a key. Gemini and Opus need an explicit model id.
 */
export function buildAdapterDefinitions(
  config: ScoringConfig,
  settings: ProviderSettings,
  logger: Logger = defaultLogger
): AdapterDefinition[] {
  const { models } = config;
  const definitions: AdapterDefinition[] = [
    {
      key: "gpt-5",
      identifier: "gpt-5",
      kind: "structured",
      provider: "openai",
      modelId: "gpt-5",
      providerOptions: { openai: { reasoningEffort: "high" } },
    },
    {
      key: "gpt-5-mini",
      identifier: "gpt-5-mini",
      kind: "structured",
      provider: "openai",
      modelId: "gpt-5-mini",
    },
    {
      key: "deepseek",
      identifier: models.deepseek,
      kind: "reasoning-json",
      provider: "jetstream",
      modelId: models.deepseek,
      temperature: COMPAT_TEMPERATURE,
    },
    {
      key: "llama",
      identifier: models.llama,
      kind: "structured",
      provider: "jetstream",
      modelId: models.llama,
      temperature: COMPAT_TEMPERATURE,
    },
    {
      key: "oss",
      identifier: models.oss,
      kind: "json",
      provider: "jetstream",
      modelId: models.oss,
      temperature: COMPAT_TEMPERATURE,
    },
  ];

  if (settings.openrouter.apiKey) {
    const openRouterModels: Array<[AdapterKey, string | undefined, string]> = [
      ["gemini", models.gemini, "GEMINI_MODEL"],
      ["opus", models.opus, "OPUS_MODEL"],
      ["maverick", models.maverick, "MAVERICK_MODEL"],
    ];
    for (const [key, modelId, variable] of openRouterModels) {
      if (!modelId) {
        logger.info(`OpenRouter detected but ${variable} not set; skipping ${key} scorer.`);
        continue;
      }
      definitions.push({
        key,
        identifier: modelId,
        kind: "json",
        provider: "openrouter",
        modelId,
        temperature: COMPAT_TEMPERATURE,
      });
    }
  } else {
    logger.info(
      "OPENROUTER_API_KEY not set; skipping OpenRouter scorers (gemini/opus/maverick)"
    );
  }

  const skipped = new Set(config.skip);
  return definitions.filter((definition) => !skipped.has(definition.key));
}
