import { afterEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { tmpdir } from "node:os";
import { buildEnhancerPrompt, buildResearchPrompt, loadPromptFile } from "./prompts";
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
  const dir = await mkdtemp(path.join(tmpdir(), "rinkscout-prompts-"));
  tempDirs.push(dir);
  return dir;
}

describe("buildResearchPrompt", () => {
  it("names the player and team", () => {
    expect(
      buildResearchPrompt({ team_name: "Vegas Golden Knights", first_name: "Jack", last_name: "Eichel" })
    ).toBe("Research and produce the full markdown summary for player: Jack Eichel (Vegas Golden Knights).");
  });
});

describe("buildEnhancerPrompt", () => {
  it("substitutes every {stub} placeholder", () => {
    expect(buildEnhancerPrompt("A {stub} B {stub}", "X")).toBe("A X B X");
  });

  it("substitutes the {{STUB}} placeholder", () => {
    expect(buildEnhancerPrompt("Extend:\n{{STUB}}", "report")).toBe("Extend:\nreport");
  });

  it("appends the stub when the template has no placeholder", () => {
    expect(buildEnhancerPrompt("Extend this.", "report")).toBe("Extend this.\n\nreport");
  });
});

describe("loadPromptFile", () => {
  it("returns the fallback without a path", async () => {
    expect(await loadPromptFile(undefined, "default", silentLogger)).toBe("default");
  });

  it("reads and trims the file", async () => {
    const dir = await createTempDir();
    const promptPath = path.join(dir, "prompt.md");
    await writeFile(promptPath, "\n  Custom prompt\n\n", "utf-8");
    expect(await loadPromptFile(promptPath, "default", silentLogger)).toBe("Custom prompt");
  });

  it("falls back for missing or empty files", async () => {
    const dir = await createTempDir();
    const emptyPath = path.join(dir, "empty.md");
    await writeFile(emptyPath, "   \n", "utf-8");
    expect(await loadPromptFile(emptyPath, "default", silentLogger)).toBe("default");
    expect(await loadPromptFile(path.join(dir, "missing.md"), "default", silentLogger)).toBe(
      "default"
    );
  });
});
