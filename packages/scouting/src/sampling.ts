import fsp from "node:fs/promises";
import type { PlayerIdentity } from "./identity";
import { readRoster, writeRoster } from "./roster";
import { describeError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";

type RandomFn = () => number;

export type SampleSeed = number | string;

function createSeededRandom(seed: number): RandomFn {
  let state = seed >>> 0;
  return () => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (hash << 5) - hash + value.charCodeAt(i);
    hash |= 0;
  }
  return hash >>> 0;
}

/**
 * Numeric strings seed like the number they spell; anything else is hashed.
 */
export function normalizeSeed(seed: SampleSeed): number {
  if (typeof seed === "number") {
    return seed;
  }
  const trimmed = seed.trim();
  const numeric = Number(trimmed);
  return trimmed.length > 0 && Number.isInteger(numeric)
    ? numeric
    : hashString(trimmed);
}

function shuffleInPlace<T>(array: T[], random: RandomFn): void {
  for (let i = array.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const current = array[i];
    const swap = array[j];
    if (current === undefined || swap === undefined) {
      continue;
    }
    array[i] = swap;
    array[j] = current;
  }
}

export function samplePlayers(
  players: readonly PlayerIdentity[],
  count: number,
  seed?: SampleSeed
): PlayerIdentity[] {
  if (players.length <= count) {
    return [...players];
  }

  const random =
    seed === undefined ? Math.random : createSeededRandom(normalizeSeed(seed));
  const shuffled = [...players];
  shuffleInPlace(shuffled, random);
  return shuffled.slice(0, Math.max(0, count));
}

export interface RosterSampleOptions {
  rosterPath: string;
  samplePath: string;
  sampleSize: number;
  seed?: SampleSeed;
  logger?: Logger;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsp.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reuses the persisted sample when one exists so reruns work on the same
 * players; otherwise samples the full roster and persists the result.
 */
export async function loadOrCreateRosterSample(
  options: RosterSampleOptions
): Promise<PlayerIdentity[]> {
  const log = options.logger ?? defaultLogger;

  if (await fileExists(options.samplePath)) {
    const players = await readRoster(options.samplePath);
    log.info(
      `Loaded roster sample with ${players.length} rows from ${options.samplePath} (no resampling)`
    );
    return players;
  }

  const roster = await readRoster(options.rosterPath);
  const players = samplePlayers(roster, options.sampleSize, options.seed);

  try {
    await writeRoster(options.samplePath, players);
    log.info(
      `Wrote roster sample with ${players.length} rows to ${options.samplePath}`
    );
  } catch (error) {
    log.error(
      `Failed to write roster sample to ${options.samplePath}; proceeding without persisted sample: ${describeError(error)}`
    );
  }

  log.info(
    `Loaded roster file with ${players.length} rows to process from ${options.rosterPath}`
  );
  return players;
}
