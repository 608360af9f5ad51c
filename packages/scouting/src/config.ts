import { createAiAgent, type IAiAgent } from "./ai";
import {
  createLanguageModel,
  readEnv,
  type Environment,
  type ProviderSettings,
} from "./providers";
import { describeError } from "./errors";
import { isLogLevel, type LogLevel, type Logger } from "./logger";
import type { SampleSeed } from "./sampling";

export const DEFAULT_RESEARCH_MODEL = "gpt-5";
export const DEFAULT_ENHANCER_MODEL = "perplexity/sonar-deep-research";
export const DEFAULT_SAMPLE_SIZE = 500;

export interface GenerationConfig {
  researchModel: string;
  enhancerModel: string;
  sampleSize: number;
  seed?: SampleSeed;
  logLevel: LogLevel;
}

export type GenerationOverrides = Partial<GenerationConfig>;

export function resolveLogLevel(env: Environment): LogLevel {
  const level = readEnv(env, "LOG_LEVEL")?.toLowerCase();
  return isLogLevel(level) ? level : "info";
}

export function resolveGenerationConfig(
  env: Environment,
  overrides: GenerationOverrides = {}
): GenerationConfig {
  return {
    researchModel:
      overrides.researchModel ??
      readEnv(env, "RESEARCH_MODEL") ??
      DEFAULT_RESEARCH_MODEL,
    enhancerModel:
      overrides.enhancerModel ??
      readEnv(env, "ENHANCER_MODEL") ??
      DEFAULT_ENHANCER_MODEL,
    sampleSize: overrides.sampleSize ?? DEFAULT_SAMPLE_SIZE,
    seed: overrides.seed ?? readEnv(env, "PLAYER_SAMPLE_SEED"),
    logLevel: overrides.logLevel ?? resolveLogLevel(env),
  };
}

export interface GenerationAgents {
  researchAgent: IAiAgent;
  enhancerAgent?: IAiAgent;
}

/**
 * The research agent is required; the enhancer runs through OpenRouter and
 * is left out when that provider is not configured.
 */
export function createGenerationAgents(
  config: GenerationConfig,
  settings: ProviderSettings,
  logger: Logger
): GenerationAgents {
  const researchAgent = createAiAgent({
    model: createLanguageModel(settings, "openai", config.researchModel),
    providerOptions: {
      openai: { reasoningEffort: "high", textVerbosity: "high" },
    },
  });

  if (!settings.openrouter.apiKey) {
    logger.info("OPENROUTER_API_KEY not set; skipping deep research enhancement");
    return { researchAgent };
  }

  try {
    const enhancerAgent = createAiAgent({
      model: createLanguageModel(settings, "openrouter", config.enhancerModel),
    });
    return { researchAgent, enhancerAgent };
  } catch (error) {
    logger.error(`Skipping enhancer due to configuration error: ${describeError(error)}`);
    return { researchAgent };
  }
}
