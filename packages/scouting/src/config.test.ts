import { describe, expect, it } from "vitest";
import {
  DEFAULT_ENHANCER_MODEL,
  createGenerationAgents,
  resolveGenerationConfig,
  resolveLogLevel,
} from "./config";
import { createLanguageModel, resolveProviderSettings, DEFAULT_JETSTREAM_BASE_URL } from "./providers";
import { extractModelId } from "./ai";
import { ConfigurationError } from "./errors";
import { silentLogger } from "./logger";

describe("resolveProviderSettings", () => {
  it("applies base URL defaults and ignores blank keys", () => {
    const settings = resolveProviderSettings({
      OPENAI_API_KEY: " test-openai-key ",
      JETSTREAM_API_KEY: "   ",
      OPENROUTER_SITE_URL: "https://example.test",
    });

    expect(settings.openai.apiKey).toBe("test-openai-key");
    expect(settings.jetstream).toEqual({ baseURL: DEFAULT_JETSTREAM_BASE_URL, apiKey: undefined });
    expect(settings.openrouter).toEqual({
      baseURL: "https://openrouter.ai/api/v1",
      apiKey: undefined,
      siteUrl: "https://example.test",
      appTitle: "rinkscout",
    });
  });
});

describe("createLanguageModel", () => {
  it("names the missing credential", () => {
    const settings = resolveProviderSettings({});
    expect(() => createLanguageModel(settings, "jetstream", "llama-4-scout")).toThrow(
      new ConfigurationError("Missing API key in env var JETSTREAM_API_KEY")
    );
  });

  it("builds a model for a configured provider", () => {
    const settings = resolveProviderSettings({ OPENROUTER_API_KEY: "test-secret" });
    const model = createLanguageModel(settings, "openrouter", "meta-llama/llama-4-maverick:free");
    expect(extractModelId(model)).toBe("meta-llama/llama-4-maverick:free");
  });
});

describe("resolveGenerationConfig", () => {
  it("reads the environment", () => {
    expect(
      resolveGenerationConfig({
        RESEARCH_MODEL: "gpt-5-mini",
        PLAYER_SAMPLE_SEED: "17",
        LOG_LEVEL: "WARN",
      })
    ).toEqual({
      researchModel: "gpt-5-mini",
      enhancerModel: DEFAULT_ENHANCER_MODEL,
      sampleSize: 500,
      seed: "17",
      logLevel: "warn",
    });
  });

  it("prefers explicit overrides", () => {
    const config = resolveGenerationConfig(
      { RESEARCH_MODEL: "gpt-5-mini" },
      { researchModel: "gpt-5", sampleSize: 10 }
    );
    expect(config.researchModel).toBe("gpt-5");
    expect(config.sampleSize).toBe(10);
  });

  it("defaults unknown log levels to info", () => {
    expect(resolveLogLevel({ LOG_LEVEL: "loud" })).toBe("info");
  });
});

describe("createGenerationAgents", () => {
  const config = resolveGenerationConfig({});

  it("leaves the enhancer out without an OpenRouter key", () => {
    const agents = createGenerationAgents(
      config,
      resolveProviderSettings({ OPENAI_API_KEY: "test-secret" }),
      silentLogger
    );
    expect(agents.researchAgent.modelId).toBe("gpt-5");
    expect(agents.enhancerAgent).toBeUndefined();
  });

  it("creates the enhancer with an OpenRouter key", () => {
    const agents = createGenerationAgents(
      config,
      resolveProviderSettings({ OPENAI_API_KEY: "test-secret", OPENROUTER_API_KEY: "test-secret" }),
      silentLogger
    );
    expect(agents.enhancerAgent?.modelId).toBe("perplexity/sonar-deep-research");
  });

  it("fails without the research credential", () => {
    expect(() => createGenerationAgents(config, resolveProviderSettings({}), silentLogger)).toThrow(
      ConfigurationError
    );
  });
});
