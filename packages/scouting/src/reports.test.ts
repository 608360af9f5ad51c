import { afterEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm, writeFile, access } from "node:fs/promises";
import path from "node:path";
import { tmpdir } from "node:os";
import type { AiRequest, IAiAgent } from "./ai";
import type { PlayerIdentity } from "./identity";
import { generateReports, reportPathsFor } from "./reports";
import { silentLogger } from "./logger";

const tempDirs: string[] = [];

afterEach(async () => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  }
});

async function createTempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), "rinkscout-reports-"));
  tempDirs.push(dir);
  return dir;
}

type Reply = (request: AiRequest, call: number) => string;

function createFakeAgent(modelId: string, reply: Reply) {
  const requests: AiRequest[] = [];
  const agent: IAiAgent = {
    modelId,
    generateText: async (request) => {
      requests.push(request);
      return reply(request, requests.length);
    },
    generateObject: async () => {
      throw new Error("generateObject is not used by report generation");
    },
  };
  return { agent, requests };
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

const matthews: PlayerIdentity = {
  team_name: "Toronto Maple Leafs",
  first_name: "Auston",
  last_name: "Matthews",
};

const makar: PlayerIdentity = {
  team_name: "Colorado Avalanche",
  first_name: "Cale",
  last_name: "Makar",
};

describe("reportPathsFor", () => {
  it("names base and extended reports after team and player", () => {
    expect(reportPathsFor("/reports", matthews)).toEqual({
      base: path.join("/reports", "toronto_maple_leafs_auston_matthews.md"),
      extended: path.join("/reports", "toronto_maple_leafs_auston_matthews_extended.md"),
    });
  });
});

describe("generateReports", () => {
  it("writes the research report and the enhanced report", async () => {
    const dir = await createTempDir();
    const research = createFakeAgent("gpt-5", () => "# Auston Matthews\nBase report");
    const enhancer = createFakeAgent("sonar", () => "  Extended report  \n");

    const result = await generateReports({
      players: [matthews],
      outputDir: dir,
      researchAgent: research.agent,
      enhancerAgent: enhancer.agent,
      systemPrompt: "Write a scouting report.",
      enhancerTemplate: "Improve this:\n{stub}",
      logger: silentLogger,
    });

    expect(result).toEqual({ total: 1, generated: 1, enhanced: 1, skipped: 0, failed: 0 });
    expect(research.requests).toEqual([
      {
        system: "Write a scouting report.",
        prompt:
          "Research and produce the full markdown summary for player: Auston Matthews (Toronto Maple Leafs).",
      },
    ]);
    expect(enhancer.requests).toEqual([
      { prompt: "Improve this:\n# Auston Matthews\nBase report" },
    ]);

    const paths = reportPathsFor(dir, matthews);
    expect(await readFile(paths.base, "utf-8")).toBe("# Auston Matthews\nBase report");
    expect(await readFile(paths.extended, "utf-8")).toBe("Extended report");
  });

  it("skips players whose base and extended reports both exist", async () => {
    const dir = await createTempDir();
    const paths = reportPathsFor(dir, matthews);
    await writeFile(paths.base, "base", "utf-8");
    await writeFile(paths.extended, "extended", "utf-8");
    const research = createFakeAgent("gpt-5", () => "new");
    const enhancer = createFakeAgent("sonar", () => "new");

    const result = await generateReports({
      players: [matthews],
      outputDir: dir,
      researchAgent: research.agent,
      enhancerAgent: enhancer.agent,
      logger: silentLogger,
    });

    expect(result.skipped).toBe(1);
    expect(research.requests).toHaveLength(0);
    expect(enhancer.requests).toHaveLength(0);
    expect(await readFile(paths.base, "utf-8")).toBe("base");
  });

  it("skips an existing base report when no enhancer is configured", async () => {
    const dir = await createTempDir();
    await writeFile(reportPathsFor(dir, matthews).base, "base", "utf-8");
    const research = createFakeAgent("gpt-5", () => "new");

    const result = await generateReports({
      players: [matthews],
      outputDir: dir,
      researchAgent: research.agent,
      logger: silentLogger,
    });

    expect(result).toEqual({ total: 1, generated: 0, enhanced: 0, skipped: 1, failed: 0 });
    expect(research.requests).toHaveLength(0);
  });

  it("enhances an existing base report without regenerating it", async () => {
    const dir = await createTempDir();
    const paths = reportPathsFor(dir, matthews);
    await writeFile(paths.base, "existing stub", "utf-8");
    const research = createFakeAgent("gpt-5", () => "new");
    const enhancer = createFakeAgent("sonar", () => "enhanced");

    const result = await generateReports({
      players: [matthews],
      outputDir: dir,
      researchAgent: research.agent,
      enhancerAgent: enhancer.agent,
      enhancerTemplate: "Extend {{STUB}} please",
      logger: silentLogger,
    });

    expect(result).toEqual({ total: 1, generated: 0, enhanced: 1, skipped: 0, failed: 0 });
    expect(research.requests).toHaveLength(0);
    expect(enhancer.requests).toEqual([{ prompt: "Extend existing stub please" }]);
    expect(await readFile(paths.extended, "utf-8")).toBe("enhanced");
  });

  it("retries the enhancer once before giving up", async () => {
    const dir = await createTempDir();
    const research = createFakeAgent("gpt-5", () => "stub");
    const enhancer = createFakeAgent("sonar", (_, call) => {
      if (call === 1) {
        throw new Error("rate limited");
      }
      return "second try";
    });

    const result = await generateReports({
      players: [matthews],
      outputDir: dir,
      researchAgent: research.agent,
      enhancerAgent: enhancer.agent,
      retryDelayMs: 0,
      logger: silentLogger,
    });

    expect(enhancer.requests).toHaveLength(2);
    expect(result.enhanced).toBe(1);
    expect(await readFile(reportPathsFor(dir, matthews).extended, "utf-8")).toBe("second try");
  });

  it("leaves the extended report out when every enhancer attempt fails", async () => {
    const dir = await createTempDir();
    const research = createFakeAgent("gpt-5", () => "stub");
    const enhancer = createFakeAgent("sonar", () => {
      throw new Error("unavailable");
    });

    const result = await generateReports({
      players: [matthews],
      outputDir: dir,
      researchAgent: research.agent,
      enhancerAgent: enhancer.agent,
      enhancerAttempts: 3,
      retryDelayMs: 0,
      logger: silentLogger,
    });

    expect(enhancer.requests).toHaveLength(3);
    expect(result).toEqual({ total: 1, generated: 1, enhanced: 0, skipped: 0, failed: 0 });
    expect(await exists(reportPathsFor(dir, matthews).extended)).toBe(false);
  });

  it("counts a research failure and moves on to the next player", async () => {
    const dir = await createTempDir();
    const research = createFakeAgent("gpt-5", (request) => {
      if (request.prompt.includes("Auston Matthews")) {
        throw new Error("server error");
      }
      return "# Cale Makar";
    });

    const result = await generateReports({
      players: [matthews, makar],
      outputDir: dir,
      researchAgent: research.agent,
      logger: silentLogger,
    });

    expect(result).toEqual({ total: 2, generated: 1, enhanced: 0, skipped: 0, failed: 1 });
    expect(await exists(reportPathsFor(dir, matthews).base)).toBe(false);
    expect(await readFile(reportPathsFor(dir, makar).base, "utf-8")).toBe("# Cale Makar");
  });
});
