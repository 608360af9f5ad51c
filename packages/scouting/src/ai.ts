import {
  generateText,
  generateObject,
  type GenerateObjectResult,
  type LanguageModel,
} from "ai";
import type { z } from "zod";

export type ProviderOptions = Parameters<
  typeof generateText
>[0]["providerOptions"];

export interface AiRequest {
  system?: string;
  prompt: string;
  abortSignal?: AbortSignal;
}

export interface IAiAgent {
  readonly modelId: string;
  generateText: (request: AiRequest) => Promise<string>;
  generateObject: <T extends z.ZodType>(
    schema: T,
    request: AiRequest
  ) => Promise<GenerateObjectResult<z.infer<T>>>;
}

export type AiAgentArgs = {
  model: LanguageModel;
  temperature?: number;
  providerOptions?: ProviderOptions;
  /** Passed to the SDK; `0` disables its automatic retries. */
  maxRetries?: number;
};

export function extractModelId(model: LanguageModel): string {
  if (typeof model === "string") {
    return model.trim() || "unknown";
  }
  return model.modelId;
}

export class AiAgent implements IAiAgent {
  readonly modelId: string;
  private model: LanguageModel;
  private temperature?: number;
  private providerOptions?: ProviderOptions;
  private maxRetries?: number;

  constructor({ model, temperature, providerOptions, maxRetries }: AiAgentArgs) {
    this.model = model;
    this.modelId = extractModelId(model);
    this.temperature = temperature;
    this.providerOptions = providerOptions;
    this.maxRetries = maxRetries;
  }

  async generateText(request: AiRequest): Promise<string> {
    const result = await generateText({
      model: this.model,
      system: request.system,
      prompt: request.prompt,
      abortSignal: request.abortSignal,
      temperature: this.temperature,
      providerOptions: this.providerOptions,
      maxRetries: this.maxRetries,
    });
    return result.text;
  }

  async generateObject<T extends z.ZodType>(
    schema: T,
    request: AiRequest
  ): Promise<GenerateObjectResult<z.infer<T>>> {
    return generateObject({
      model: this.model,
      schema,
      system: request.system,
      prompt: request.prompt,
      abortSignal: request.abortSignal,
      temperature: this.temperature,
      providerOptions: this.providerOptions,
      maxRetries: this.maxRetries,
    });
  }
}

export function createAiAgent(args: AiAgentArgs): IAiAgent {
  return new AiAgent(args);
}
