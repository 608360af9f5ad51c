import fsp from "node:fs/promises";
import path from "node:path";
import {
  ConfigurationError,
  candidateReportStems,
  describeError,
  displayName,
  logger as defaultLogger,
  playerSlug,
  readRoster,
  reportStem,
  type Logger,
  type PlayerIdentity,
} from "@rinkscout/scouting";
import type {
  BatchProgress,
  BatchResult,
  BatchScoreOptions,
  BatchSummary,
  RowOutcome,
} from "./types";
import { processWithConcurrency, normalizeConcurrency } from "./concurrency";
import { scorePlayerReport } from "./evaluator";

export type ReportIndex = ReadonlyMap<string, string>;

export type ReportResolution =
  | { status: "found"; path: string; stem: string }
  | { status: "missing"; candidates: string[] }
  | { status: "ambiguous"; matches: string[] };

/** Supports `*` and `?` within a single path segment. */
export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split("")
    .map((ch) => {
      if (ch === "*") return "[^/]*";
      if (ch === "?") return "[^/]";
      return ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${source}$`);
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fsp.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Maps lower-cased file stems to report paths. Listing order is sorted so
 * that the first of two same-stem files always wins.
 */
export async function indexReports(
  dir: string,
  pattern = "*.md",
  options: { recursive?: boolean; logger?: Logger } = {}
): Promise<Map<string, string>> {
  const log = options.logger ?? defaultLogger;
  const matcher = globToRegExp(pattern);
  const entries = await fsp.readdir(dir, { recursive: options.recursive ?? false });
  const index = new Map<string, string>();

  for (const relative of [...entries].sort()) {
    const fileName = path.basename(relative);
    if (!matcher.test(fileName)) {
      continue;
    }
    const fullPath = path.join(dir, relative);
    if (!(await fsp.stat(fullPath)).isFile()) {
      continue;
    }
    const stem = path.basename(fileName, path.extname(fileName)).toLowerCase();
    const existing = index.get(stem);
    if (existing) {
      log.warn(`Duplicate report stem "${stem}": keeping ${existing}, ignoring ${fullPath}`);
      continue;
    }
    index.set(stem, fullPath);
  }
  return index;
}

/**
 * Looks up `{team}_{player}`, then `{player}`, then any stem ending in
 * `_{player}`. The last step only resolves when exactly one stem matches;
 * several matches (two same-named players on different teams) are reported
 * as ambiguous instead of picking one.
 */
export function resolveReportPath(
  player: PlayerIdentity,
  index: ReportIndex
): ReportResolution {
  const candidates = candidateReportStems(player);
  for (const stem of candidates) {
    const found = index.get(stem);
    if (found) {
      return { status: "found", path: found, stem };
    }
  }

  const suffix = `_${playerSlug(player)}`;
  const matches = [...index.keys()].filter((stem) => stem.endsWith(suffix)).sort();
  const [only] = matches;
  if (matches.length === 1 && only !== undefined) {
    const found = index.get(only);
    if (found) {
      return { status: "found", path: found, stem: only };
    }
  }
  if (matches.length > 1) {
    return {
      status: "ambiguous",
      matches: matches.flatMap((stem) => index.get(stem) ?? []),
    };
  }
  return { status: "missing", candidates };
}

export function ratingsPathFor(outputDir: string, player: PlayerIdentity): string {
  return path.join(outputDir, `${reportStem(player)}.json`);
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fsp.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function summarize(outcomes: readonly RowOutcome[], total: number): BatchSummary {
  const count = (status: RowOutcome["status"]) =>
    outcomes.filter((outcome) => outcome.status === status).length;
  return {
    total,
    succeeded: count("scored"),
    failed: count("failed"),
    skippedExisting: count("skipped-existing"),
    missingInput: count("missing-input"),
  };
}

/**
 * Scores every roster row that has a report and no rating file yet. The
 * rating-file check happens right before each row's work, so interleaved or
 * resumed runs never score a player twice.
 */
export async function runBatch(options: BatchScoreOptions): Promise<BatchResult> {
  const log = options.logger ?? defaultLogger;
  const renderer = options.progressRenderer;
  const startedAt = Date.now();
  const reportsDir = path.resolve(options.reportsDir);
  const outputDir = path.resolve(options.outputDir);
  const concurrency = normalizeConcurrency(options.concurrency);

  if (!(await isDirectory(reportsDir))) {
    throw new ConfigurationError(`Summaries directory not found: ${reportsDir}`);
  }
  if (options.adapters.length === 0) {
    throw new ConfigurationError("No scoring adapters are configured.");
  }

  const players =
    typeof options.roster === "string"
      ? await readRoster(options.roster)
      : [...options.roster];
  const index = await indexReports(reportsDir, options.pattern, {
    recursive: options.recursive,
    logger: log,
  });
  await fsp.mkdir(outputDir, { recursive: true });

  const total = players.length;
  log.info(`Loaded ${total} roster rows; ${index.size} reports indexed in ${reportsDir}`);

  const finished: RowOutcome[] = [];
  // Output paths taken by a row of this run; two roster rows may share one.
  const claimedOutputs = new Set<string>();
  const notifyProgress = (completed: number, inProgress: number) => {
    const progress: BatchProgress = {
      ...summarize(finished, total),
      completed,
      inProgress,
    };
    renderer?.update(progress);
    options.onProgress?.(progress);
  };

  const processRow = async (
    player: PlayerIdentity,
    rowIndex: number
  ): Promise<RowOutcome> => {
    const tag = `[${rowIndex + 1}/${total}]`;
    const name = displayName(player);
    const resolution = resolveReportPath(player, index);

    if (resolution.status === "ambiguous") {
      log.warn(
        `${tag} Ambiguous summary for ${name}; several files match: ${resolution.matches.join(", ")}. Skipping.`
      );
      return { player: name, status: "missing-input" };
    }
    if (resolution.status === "missing") {
      log.info(
        `${tag} Missing summary for ${name}; expected stems like ${JSON.stringify(resolution.candidates)}. Skipping.`
      );
      return { player: name, status: "missing-input" };
    }

    const outputPath = ratingsPathFor(outputDir, player);
    if (await pathExists(outputPath)) {
      log.info(`${tag} Skipping ${name} (exists: ${outputPath})`);
      return {
        player: name,
        status: "skipped-existing",
        reportPath: resolution.path,
        outputPath,
      };
    }
    if (claimedOutputs.has(outputPath)) {
      log.info(`${tag} Skipping ${name} (already scored in this run: ${outputPath})`);
      return {
        player: name,
        status: "skipped-existing",
        reportPath: resolution.path,
        outputPath,
      };
    }
    claimedOutputs.add(outputPath);

    log.info(
      `${tag} Scoring ${name} (${path.basename(resolution.path)}); merging base and extended if available`
    );
    try {
      await scorePlayerReport({
        reportPath: resolution.path,
        outputPath,
        player: name,
        companionDir: options.companionDir,
        adapters: options.adapters,
        timeoutMs: options.timeoutMs,
        now: options.now,
        logger: log,
      });
      return { player: name, status: "scored", reportPath: resolution.path, outputPath };
    } catch (error) {
      const message = describeError(error);
      log.error(`${tag} Failed ${name}: ${message}`);
      return {
        player: name,
        status: "failed",
        reportPath: resolution.path,
        outputPath,
        error: message,
      };
    }
  };

  renderer?.start({
    total,
    concurrency,
    adapterIds: options.adapters.map((adapter) => adapter.identifier),
    reportsDir,
    outputDir,
  });

  try {
    const outcomes = await processWithConcurrency(
      players,
      concurrency,
      async (player, rowIndex) => {
        const outcome = await processRow(player, rowIndex);
        finished.push(outcome);
        return outcome;
      },
      { onProgress: (completed, inProgress) => notifyProgress(completed, inProgress) }
    );

    const summary = summarize(outcomes, total);
    log.info(
      `Completed. Success: ${summary.succeeded}, Failures: ${summary.failed}, Skipped: ${summary.skippedExisting}, Missing: ${summary.missingInput}`
    );
    renderer?.finish({ ...summary, durationMs: Date.now() - startedAt });
    return { ...summary, outcomes };
  } catch (error) {
    if (error instanceof Error) {
      renderer?.fail(error);
    }
    throw error;
  }
}
