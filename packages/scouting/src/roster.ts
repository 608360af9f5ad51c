import fsp from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import type { PlayerIdentity } from "./identity";
import { ConfigurationError, describeError } from "./errors";

export type RosterRecord = Record<string, string | undefined>;

const TEAM_COLUMNS = ["team_name", "Team"] as const;
const FIRST_NAME_COLUMNS = ["firstName", "First"] as const;
const LAST_NAME_COLUMNS = ["lastName", "Last"] as const;

export const ROSTER_SAMPLE_COLUMNS = ["team_name", "firstName", "lastName"];

function readColumn(record: RosterRecord, columns: readonly string[]): string {
  for (const column of columns) {
    const value = record[column]?.trim();
    if (value) {
      return value;
    }
  }
  return "";
}

/**
 * Maps one roster row to a player, or `undefined` when the team, first name
 * or last name is blank.
 */
export function toPlayerIdentity(
  record: RosterRecord
): PlayerIdentity | undefined {
  const team_name = readColumn(record, TEAM_COLUMNS);
  const first_name = readColumn(record, FIRST_NAME_COLUMNS);
  const last_name = readColumn(record, LAST_NAME_COLUMNS);
  if (!team_name || !first_name || !last_name) {
    return undefined;
  }
  return { team_name, first_name, last_name };
}

function isRosterRecord(value: unknown): value is RosterRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(
      (cell) => cell === undefined || typeof cell === "string"
    )
  );
}

export function parseRosterCsv(contents: string): PlayerIdentity[] {
  const records: unknown = parse(contents, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
    relax_column_count: true,
  });
  if (!Array.isArray(records)) {
    throw new Error("Roster CSV did not produce a list of rows.");
  }

  const players: PlayerIdentity[] = [];
  for (const record of records) {
    if (!isRosterRecord(record)) {
      continue;
    }
    const identity = toPlayerIdentity(record);
    if (identity) {
      players.push(identity);
    }
  }
  return players;
}

export async function readRoster(rosterPath: string): Promise<PlayerIdentity[]> {
  let contents: string;
  try {
    contents = await fsp.readFile(rosterPath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `Roster CSV not readable at ${rosterPath}: ${describeError(error)}`
    );
  }
  return parseRosterCsv(contents);
}

export async function writeRoster(
  rosterPath: string,
  players: readonly PlayerIdentity[]
): Promise<void> {
  const csv = stringify(
    players.map((player) => [
      player.team_name,
      player.first_name,
      player.last_name,
    ]),
    { header: true, columns: ROSTER_SAMPLE_COLUMNS }
  );
  await fsp.mkdir(path.dirname(rosterPath), { recursive: true });
  await fsp.writeFile(rosterPath, csv, "utf-8");
}
