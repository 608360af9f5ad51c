import { randomUUID } from "node:crypto";
import fsp from "node:fs/promises";
import path from "node:path";
import {
  describeError,
  logger as defaultLogger,
  nameFromStem,
} from "@rinkscout/scouting";
import type {
  AggregateResult,
  Rating,
  ScorePlayerReportOptions,
  ScoreReportOptions,
  ScoringError,
} from "./types";
import type { RatingCandidate } from "./schema";
import { AGGREGATE_SCHEMA_VERSION, buildRating } from "./schema";
import { settleAll } from "./concurrency";
import { loadMergedReport } from "./documents";

interface AdapterOutcome {
  candidate: RatingCandidate;
  completedAt: Date;
}

/**
 * Scores one document with every adapter at once. All calls run to
 * completion (or timeout) before the result is assembled; ratings and errors
 * follow adapter order, not completion order.
 */
export async function scoreReport(
  options: ScoreReportOptions
): Promise<AggregateResult> {
  const log = options.logger ?? defaultLogger;
  const now = options.now ?? (() => new Date());
  const { adapters, document } = options;

  log.info(`Invoking models: ${adapters.map((adapter) => adapter.identifier).join(", ")}`);

  const settled = await settleAll<AdapterOutcome>(
    adapters.map((adapter) => async (abortSignal) => {
      const candidate = await adapter.score({ document, abortSignal });
      return { candidate, completedAt: now() };
    }),
    { timeoutMs: options.timeoutMs }
  );

  const ratings: Rating[] = [];
  const errors: ScoringError[] = [];
  for (const [index, adapter] of adapters.entries()) {
    const outcome = settled[index];
    if (!outcome) {
      continue;
    }
    if (outcome.status === "fulfilled") {
      log.info(`${adapter.identifier} completed successfully`);
      ratings.push(
        buildRating(
          outcome.value.candidate,
          adapter.identifier,
          outcome.value.completedAt.toISOString()
        )
      );
      continue;
    }
    const message = describeError(outcome.reason);
    log.error(`${adapter.identifier} failed: ${message}`);
    errors.push({ model_name: adapter.identifier, error: message });
  }

  const result: AggregateResult = {
    player: options.player,
    ratings,
    generated_at: now().toISOString(),
    schema_version: AGGREGATE_SCHEMA_VERSION,
  };
  if (errors.length > 0) {
    result.errors = errors;
  }

  if (options.outputPath) {
    const savedPath = await persistResultToFile(result, options.outputPath);
    log.info(`Saved scores to ${savedPath}`);
  }

  return result;
}

/**
 * Loads a report (merged with its companion) and scores it into
 * `outputPath`.
 */
export async function scorePlayerReport(
  options: ScorePlayerReportOptions
): Promise<AggregateResult> {
  const { reportPath, companionDir, player, ...scoreOptions } = options;
  const document = await loadMergedReport(reportPath, {
    companionDir,
    logger: options.logger,
  });
  return scoreReport({
    ...scoreOptions,
    document,
    player: player ?? nameFromStem(path.basename(reportPath, path.extname(reportPath))),
  });
}

/**
 * Writes through a temporary sibling and renames it into place, so a rating
 * file is either absent or complete.
 */
export async function persistResultToFile(
  result: AggregateResult,
  requestedPath: string
): Promise<string> {
  const resolvedPath = path.resolve(requestedPath);
  await fsp.mkdir(path.dirname(resolvedPath), { recursive: true });
  const tempPath = `${resolvedPath}.${randomUUID()}.tmp`;
  try {
    await fsp.writeFile(tempPath, JSON.stringify(result, null, 2), "utf-8");
    await fsp.rename(tempPath, resolvedPath);
  } catch (error) {
    await fsp.rm(tempPath, { force: true });
    throw error;
  }
  return resolvedPath;
}
