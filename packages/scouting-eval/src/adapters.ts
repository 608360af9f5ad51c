import {
  createAiAgent,
  createLanguageModel,
  describeError,
  logger as defaultLogger,
  type IAiAgent,
  type Logger,
  type ProviderName,
  type ProviderOptions,
  type ProviderSettings,
} from "@rinkscout/scouting";
import { normalizeReply } from "./parsers";
import { buildScoringPrompt, DEFAULT_SCORING_SYSTEM_PROMPT, type ScoringPrompt } from "./prompts";
import { ratingResponseSchema, type RatingCandidate } from "./schema";
import type {
  AdapterKind,
  RawReply,
  ScoringAdapter,
  ScoringRequest,
} from "./types";

export interface AdapterDefinition {
  /** Short name used by `--skip`. */
  key: string;
  /** Recorded as `model_name` on every rating this adapter produces. */
  identifier: string;
  kind: AdapterKind;
  provider: ProviderName;
  modelId: string;
  temperature?: number;
  providerOptions?: ProviderOptions;
}

abstract class BaseScoringAdapter implements ScoringAdapter {
  abstract readonly kind: AdapterKind;

  constructor(
    readonly identifier: string,
    protected agent: IAiAgent,
    protected systemPrompt: string = DEFAULT_SCORING_SYSTEM_PROMPT
  ) {}

  async score(request: ScoringRequest): Promise<RatingCandidate> {
    const prompt = buildScoringPrompt(request.document, this.systemPrompt);
    const reply = await this.invoke(prompt, request.abortSignal);
    return normalizeReply(reply, this.kind);
  }

  protected abstract invoke(
    prompt: ScoringPrompt,
    abortSignal?: AbortSignal
  ): Promise<RawReply>;
}

/** Backends that honour a response schema and return the object directly. */
export class StructuredOutputAdapter extends BaseScoringAdapter {
  readonly kind = "structured" as const;

  protected async invoke(
    prompt: ScoringPrompt,
    abortSignal?: AbortSignal
  ): Promise<RawReply> {
    const result = await this.agent.generateObject(ratingResponseSchema, {
      ...prompt,
      abortSignal,
    });
    return { type: "object", object: result.object };
  }
}

/** Backends that answer in free text with a JSON object somewhere inside. */
export class JsonTextAdapter extends BaseScoringAdapter {
  readonly kind: AdapterKind = "json";

  protected async invoke(
    prompt: ScoringPrompt,
    abortSignal?: AbortSignal
  ): Promise<RawReply> {
    const text = await this.agent.generateText({ ...prompt, abortSignal });
    return { type: "text", text };
  }
}

/** Free-text backends that prepend `<think>` chain-of-thought to the JSON. */
export class ReasoningJsonTextAdapter extends JsonTextAdapter {
  override readonly kind: AdapterKind = "reasoning-json";
}

export function createScoringAdapter(
  kind: AdapterKind,
  identifier: string,
  agent: IAiAgent,
  systemPrompt?: string
): ScoringAdapter {
  switch (kind) {
    case "structured":
      return new StructuredOutputAdapter(identifier, agent, systemPrompt);
    case "json":
      return new JsonTextAdapter(identifier, agent, systemPrompt);
    case "reasoning-json":
      return new ReasoningJsonTextAdapter(identifier, agent, systemPrompt);
    default:
      throw new Error(`Unsupported adapter kind: ${String(kind)}`);
  }
}

export interface AdapterConfigurationFailure {
  key: string;
  identifier: string;
  error: string;
}

export interface InstantiatedAdapters {
  adapters: ScoringAdapter[];
  failures: AdapterConfigurationFailure[];
}

/**
 * Builds one adapter per definition. A definition whose provider credential
 * is missing is reported in `failures` and left out; the rest still load.
 */
export function instantiateAdapters(
  definitions: readonly AdapterDefinition[],
  settings: ProviderSettings,
  options: { systemPrompt?: string; logger?: Logger } = {}
): InstantiatedAdapters {
  const log = options.logger ?? defaultLogger;
  const adapters: ScoringAdapter[] = [];
  const failures: AdapterConfigurationFailure[] = [];

  for (const definition of definitions) {
    try {
      const agent = createAiAgent({
        model: createLanguageModel(
          settings,
          definition.provider,
          definition.modelId
        ),
        temperature: definition.temperature,
        providerOptions: definition.providerOptions,
        maxRetries: 0,
      });
      adapters.push(
        createScoringAdapter(
          definition.kind,
          definition.identifier,
          agent,
          options.systemPrompt
        )
      );
    } catch (error) {
      const message = describeError(error);
      log.error(`Skipping ${definition.identifier} due to configuration error: ${message}`);
      failures.push({
        key: definition.key,
        identifier: definition.identifier,
        error: message,
      });
    }
  }

  return { adapters, failures };
}
