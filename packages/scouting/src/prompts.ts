import fsp from "node:fs/promises";
import type { PlayerIdentity } from "./identity";
import { displayName } from "./identity";
import { describeError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";

export const DEFAULT_RESEARCH_SYSTEM_PROMPT = `You are a hockey scouting analyst writing a professional scouting report.

Produce a single markdown document for the requested player with these sections:
- Profile (position, handedness, age, height/weight, contract status)
- Statistics (a table of recent seasons; leave a cell blank when the value is unknown)
- Strengths
- Weaknesses
- Projection (current role and ceiling)
- Sources

Only state facts you can attribute to a source. Mark estimates as estimates and say so when data is missing.`;

export const DEFAULT_ENHANCER_TEMPLATE = `You are a deep research analyst for a professional hockey team. Below is the stub of research about a hockey player. Search for all available information about this player and fill in any missing data values.
Extend this research to be as exhaustive as possible. Return the completed research of everything from the stub as well as any new research in markdown format. Add any new sources to the Sources section.

{stub}`;

export function buildResearchPrompt(player: PlayerIdentity): string {
  return `Research and produce the full markdown summary for player: ${displayName(
    player
  )} (${player.team_name}).`;
}

/**
 * Inserts the first-pass report into the enhancer template at `{stub}` or
 * `{{STUB}}`, or appends it when the template has neither placeholder.
 */
export function buildEnhancerPrompt(template: string, stub: string): string {
  if (template.includes("{stub}")) {
    return template.split("{stub}").join(stub);
  }
  if (template.includes("{{STUB}}")) {
    return template.split("{{STUB}}").join(stub);
  }
  return `${template}\n\n${stub}`;
}

/**
 * Reads a prompt file, falling back to `fallback` when no path is given or
 * the file cannot be read.
 */
export async function loadPromptFile(
  promptPath: string | undefined,
  fallback: string,
  logger: Logger = defaultLogger
): Promise<string> {
  if (!promptPath) {
    return fallback;
  }
  try {
    const text = (await fsp.readFile(promptPath, "utf-8")).trim();
    if (text.length === 0) {
      logger.warn(`Prompt file ${promptPath} is empty, using default prompt text`);
      return fallback;
    }
    logger.info(`Loaded prompt from ${promptPath}`);
    return text;
  } catch (error) {
    logger.warn(
      `Failed reading prompt at ${promptPath}, using default. Error: ${describeError(error)}`
    );
    return fallback;
  }
}
