import fsp from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import type { IAiAgent } from "./ai";
import {
  displayName,
  reportStem,
  type PlayerIdentity,
} from "./identity";
import {
  DEFAULT_ENHANCER_TEMPLATE,
  DEFAULT_RESEARCH_SYSTEM_PROMPT,
  buildEnhancerPrompt,
  buildResearchPrompt,
} from "./prompts";
import { describeError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";

export const EXTENDED_SUFFIX = "_extended";

export interface GenerateReportsOptions {
  players: readonly PlayerIdentity[];
  outputDir: string;
  researchAgent: IAiAgent;
  /** Second-pass model; enhancement is skipped when absent. */
  enhancerAgent?: IAiAgent;
  systemPrompt?: string;
  enhancerTemplate?: string;
  /** Pause after each generated player, to stay under provider rate limits. */
  delayMs?: number;
  /** Pause after a player whose research call failed. */
  failureDelayMs?: number;
  enhancerAttempts?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

export interface GenerateReportsResult {
  total: number;
  generated: number;
  enhanced: number;
  skipped: number;
  failed: number;
}

export interface ReportPaths {
  base: string;
  extended: string;
}

export function reportPathsFor(
  outputDir: string,
  player: PlayerIdentity
): ReportPaths {
  const stem = reportStem(player);
  return {
    base: path.join(outputDir, `${stem}.md`),
    extended: path.join(outputDir, `${stem}${EXTENDED_SUFFIX}.md`),
  };
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fsp.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fsp.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function enhanceReport(
  agent: IAiAgent,
  template: string,
  stub: string,
  attempts: number,
  retryDelayMs: number,
  playerName: string,
  log: Logger
): Promise<string> {
  const prompt = buildEnhancerPrompt(template, stub);
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return (await agent.generateText({ prompt })).trim();
    } catch (error) {
      log.error(
        `Enhancer request failed (attempt ${attempt}/${attempts}) for ${playerName}: ${describeError(error)}`
      );
      if (attempt < attempts && retryDelayMs > 0) {
        await sleep(retryDelayMs);
      }
    }
  }
  return "";
}

/**
 * Writes `{team}_{player}.md` from the research model and, when an enhancer
 * is configured, `{team}_{player}_extended.md` from the second pass. Players
 * with both files are skipped; an existing base report is reused as the
 * enhancer's input instead of being regenerated.
 */
export async function generateReports(
  options: GenerateReportsOptions
): Promise<GenerateReportsResult> {
  const log = options.logger ?? defaultLogger;
  const systemPrompt = options.systemPrompt ?? DEFAULT_RESEARCH_SYSTEM_PROMPT;
  const enhancerTemplate = options.enhancerTemplate ?? DEFAULT_ENHANCER_TEMPLATE;
  const enhancerAttempts = Math.max(1, options.enhancerAttempts ?? 2);
  const retryDelayMs = options.retryDelayMs ?? 10_000;
  const delayMs = options.delayMs ?? 0;
  const failureDelayMs = options.failureDelayMs ?? 0;
  const total = options.players.length;

  const result: GenerateReportsResult = {
    total,
    generated: 0,
    enhanced: 0,
    skipped: 0,
    failed: 0,
  };

  await fsp.mkdir(options.outputDir, { recursive: true });

  for (const [offset, player] of options.players.entries()) {
    const idx = offset + 1;
    const playerName = displayName(player);
    const paths = reportPathsFor(options.outputDir, player);
    const hasExtended = await pathExists(paths.extended);
    const existingBase = await readIfExists(paths.base);

    if (
      existingBase !== undefined &&
      (hasExtended || !options.enhancerAgent)
    ) {
      log.info(`[${idx}/${total}] Skipping ${playerName}: reports exist`);
      result.skipped += 1;
      continue;
    }

    log.info(`[${idx}/${total}] Starting summary for ${playerName} (${player.team_name})`);
    const startedAt = Date.now();
    let stub = existingBase;
    try {
      if (stub === undefined) {
        stub = await options.researchAgent.generateText({
          system: systemPrompt,
          prompt: buildResearchPrompt(player),
        });
        await fsp.writeFile(paths.base, stub, "utf-8");
        result.generated += 1;
      }
    } catch (error) {
      log.error(
        `[${idx}/${total}] Error while generating summary for ${playerName} (${player.team_name}): ${describeError(error)}`
      );
      result.failed += 1;
      if (failureDelayMs > 0) {
        await sleep(failureDelayMs);
      }
      continue;
    }

    if (options.enhancerAgent && !hasExtended) {
      log.info(`Enhancing report with ${options.enhancerAgent.modelId} for ${playerName}`);
      const enhanced = await enhanceReport(
        options.enhancerAgent,
        enhancerTemplate,
        stub,
        enhancerAttempts,
        retryDelayMs,
        playerName,
        log
      );
      if (enhanced) {
        try {
          await fsp.writeFile(paths.extended, enhanced, "utf-8");
          result.enhanced += 1;
          log.info(`Enhanced report saved to ${paths.extended}`);
        } catch (error) {
          log.error(
            `Failed writing enhanced report for ${playerName}: ${describeError(error)}`
          );
        }
      }
    }

    const elapsed = ((Date.now() - startedAt) / 1000).toFixed(2);
    log.info(`[${idx}/${total}] Saved report to ${paths.base} | time: ${elapsed}s`);

    if (delayMs > 0 && idx < total) {
      log.info(`Sleeping for ${Math.round(delayMs / 1000)} seconds...`);
      await sleep(delayMs);
    }
  }

  log.info(`Completed ${total} players.`);
  return result;
}
