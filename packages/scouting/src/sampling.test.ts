import { afterEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { tmpdir } from "node:os";
import { loadOrCreateRosterSample, normalizeSeed, samplePlayers } from "./sampling";
import { silentLogger } from "./logger";
import type { PlayerIdentity } from "./identity";

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
  const dir = await mkdtemp(path.join(tmpdir(), "rinkscout-sampling-"));
  tempDirs.push(dir);
  return dir;
}

function createPlayers(count: number): PlayerIdentity[] {
  return Array.from({ length: count }, (_, index) => ({
    team_name: `Team ${index % 4}`,
    first_name: "Player",
    last_name: `Number${index}`,
  }));
}

describe("normalizeSeed", () => {
  it("keeps numbers and numeric strings", () => {
    expect(normalizeSeed(42)).toBe(42);
    expect(normalizeSeed(" 7 ")).toBe(7);
  });

  it("hashes other strings to an unsigned 32-bit value", () => {
    const seed = normalizeSeed("draft-2024");
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThan(2 ** 32);
    expect(normalizeSeed("draft-2024")).toBe(seed);
  });
});

describe("samplePlayers", () => {
  it("returns every player in roster order when the roster is small enough", () => {
    const players = createPlayers(3);
    const sample = samplePlayers(players, 5, 1);
    expect(sample).toEqual(players);
    expect(sample).not.toBe(players);
  });

  it("is deterministic for a seed", () => {
    const players = createPlayers(50);
    const first = samplePlayers(players, 10, 1234);
    const second = samplePlayers(players, 10, "1234");

    expect(first).toHaveLength(10);
    expect(second).toEqual(first);
    expect(new Set(first.map((player) => player.last_name)).size).toBe(10);
  });

  it("draws distinct roster rows", () => {
    const players = createPlayers(20);
    const sample = samplePlayers(players, 5, "seed");
    for (const player of sample) {
      expect(players).toContainEqual(player);
    }
  });
});

describe("loadOrCreateRosterSample", () => {
  it("persists a new sample and reuses it on the next run", async () => {
    const dir = await createTempDir();
    const rosterPath = path.join(dir, "roster.csv");
    const samplePath = path.join(dir, "roster_sample.csv");
    const rows = createPlayers(6)
      .map((player) => `${player.team_name},${player.first_name},${player.last_name}`)
      .join("\n");
    await writeFile(rosterPath, `team_name,firstName,lastName\n${rows}\n`, "utf-8");

    const first = await loadOrCreateRosterSample({
      rosterPath,
      samplePath,
      sampleSize: 3,
      seed: 99,
      logger: silentLogger,
    });
    expect(first).toHaveLength(3);
    expect((await readFile(samplePath, "utf-8")).split("\n")[0]).toBe(
      "team_name,firstName,lastName"
    );

    // The roster disappearing proves the second run never reads it.
    await rm(rosterPath);
    const second = await loadOrCreateRosterSample({
      rosterPath,
      samplePath,
      sampleSize: 3,
      logger: silentLogger,
    });
    expect(second).toEqual(first);
  });
});
