import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import { ConfigurationError } from "./errors";

export type ProviderName = "openai" | "jetstream" | "openrouter";

export const DEFAULT_JETSTREAM_BASE_URL = "https://llm.jetstream-cloud.org/api";
export const DEFAULT_OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

export type Environment = Record<string, string | undefined>;

export interface ProviderSettings {
  openai: {
    apiKey?: string;
  };
  /** Private vLLM deployment speaking the OpenAI chat completions API. */
  jetstream: {
    baseURL: string;
    apiKey?: string;
  };
  openrouter: {
    baseURL: string;
    apiKey?: string;
    siteUrl?: string;
    appTitle: string;
  };
}

export function readEnv(env: Environment, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function resolveProviderSettings(
  env: Environment,
  appTitle = "rinkscout"
): ProviderSettings {
  return {
    openai: {
      apiKey: readEnv(env, "OPENAI_API_KEY"),
    },
    jetstream: {
      baseURL: readEnv(env, "JETSTREAM_BASE_URL") ?? DEFAULT_JETSTREAM_BASE_URL,
      apiKey: readEnv(env, "JETSTREAM_API_KEY"),
    },
    openrouter: {
      baseURL:
        readEnv(env, "OPENROUTER_BASE_URL") ?? DEFAULT_OPENROUTER_BASE_URL,
      apiKey: readEnv(env, "OPENROUTER_API_KEY"),
      siteUrl: readEnv(env, "OPENROUTER_SITE_URL"),
      appTitle,
    },
  };
}

const API_KEY_VARIABLES: Record<ProviderName, string> = {
  openai: "OPENAI_API_KEY",
  jetstream: "JETSTREAM_API_KEY",
  openrouter: "OPENROUTER_API_KEY",
};

function requireApiKey(
  provider: ProviderName,
  apiKey: string | undefined
): string {
  if (!apiKey) {
    throw new ConfigurationError(
      `Missing API key in env var ${API_KEY_VARIABLES[provider]}`
    );
  }
  return apiKey;
}

/**
 * Builds the model handle for one provider. Throws `ConfigurationError`
 * when that provider's credential is absent.
 */
export function createLanguageModel(
  settings: ProviderSettings,
  provider: ProviderName,
  modelId: string
): LanguageModel {
  switch (provider) {
    case "openai": {
      const openai = createOpenAI({
        apiKey: requireApiKey(provider, settings.openai.apiKey),
      });
      return openai(modelId);
    }
    case "jetstream": {
      const jetstream = createOpenAI({
        apiKey: requireApiKey(provider, settings.jetstream.apiKey),
        baseURL: settings.jetstream.baseURL,
      });
      return jetstream.chat(modelId);
    }
    case "openrouter": {
      const headers: Record<string, string> = {
        "X-Title": settings.openrouter.appTitle,
      };
      if (settings.openrouter.siteUrl) {
        headers["HTTP-Referer"] = settings.openrouter.siteUrl;
      }
      const openrouter = createOpenAI({
        apiKey: requireApiKey(provider, settings.openrouter.apiKey),
        baseURL: settings.openrouter.baseURL,
        headers,
      });
      return openrouter.chat(modelId);
    }
    default:
      throw new ConfigurationError(`Unsupported provider: ${String(provider)}`);
  }
}
