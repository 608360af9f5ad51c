import { describe, expect, it } from "vitest";
import { MockLanguageModelV2 } from "ai/test";
import { z } from "zod";
import { createAiAgent, extractModelId } from "./ai";

function buildTextGenerationResult(text: string) {
  return {
    content: [{ type: "text" as const, text }],
    finishReason: "stop" as const,
    usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 },
    warnings: [],
  };
}

describe("AiAgent", () => {
  it("returns generated text and forwards call settings", async () => {
    const model = new MockLanguageModelV2({
      doGenerate: async () => buildTextGenerationResult("A fast, skilled centre."),
    });
    const agent = createAiAgent({ model, temperature: 0.2, maxRetries: 0 });

    const text = await agent.generateText({ system: "Be brief.", prompt: "Describe the player." });

    expect(text).toBe("A fast, skilled centre.");
    expect(agent.modelId).toBe("mock-model-id");
    const call = model.doGenerateCalls[0];
    expect(call?.temperature).toBe(0.2);
    expect(call?.prompt[0]).toMatchObject({ role: "system", content: "Be brief." });
  });

  it("parses structured output against the schema", async () => {
    const model = new MockLanguageModelV2({
      doGenerate: async () => buildTextGenerationResult('{"goals":41,"assists":28}'),
    });
    const agent = createAiAgent({ model });

    const result = await agent.generateObject(
      z.object({ goals: z.number(), assists: z.number() }),
      { prompt: "Season totals" }
    );

    expect(result.object).toEqual({ goals: 41, assists: 28 });
  });
});

describe("extractModelId", () => {
  it("uses a string model id as given", () => {
    expect(extractModelId("openai/gpt-5")).toBe("openai/gpt-5");
    expect(extractModelId("  ")).toBe("unknown");
  });
});
