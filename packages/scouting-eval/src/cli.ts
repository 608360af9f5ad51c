#!/usr/bin/env node
import fsp from "node:fs/promises";
import path from "node:path";
import dotenv from "dotenv";
import { Command } from "commander";
import {
  ConfigurationError,
  Logger,
  describeError,
  loadPromptFile,
  resolveProviderSettings,
} from "@rinkscout/scouting";
import { instantiateAdapters } from "./adapters";
import { buildAdapterDefinitions, resolveScoringConfig } from "./config";
import { DEFAULT_SCORING_SYSTEM_PROMPT } from "./prompts";
import { scorePlayerReport } from "./evaluator";
import { runBatch } from "./batch";
import { BatchProgressRenderer } from "./batch-renderer";
import type { ScoringAdapter } from "./types";

dotenv.config();

interface ScoringCommandOptions {
  skip?: string[];
  skipLlama?: boolean;
  skipDeepseek?: boolean;
  skipOss?: boolean;
  llamaModel?: string;
  deepseekModel?: string;
  ossModel?: string;
  geminiModel?: string;
  opusModel?: string;
  maverickModel?: string;
  timeout?: string;
  promptFile?: string;
}

interface ScoreCommandOptions extends ScoringCommandOptions {
  input: string;
  output?: string;
  companionDir?: string;
}

interface BatchCommandOptions extends ScoringCommandOptions {
  roster: string;
  inputDir: string;
  pattern: string;
  recursive?: boolean;
  outputDir?: string;
  companionDir?: string;
  concurrency: string;
  progress?: boolean;
}

function parsePositiveInteger(value: string, flag: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${flag} must be a positive integer, received "${value}"`);
  }
  return parsed;
}

function collectSkips(options: ScoringCommandOptions): string[] {
  const skip = [...(options.skip ?? [])];
  if (options.skipLlama) skip.push("llama");
  if (options.skipDeepseek) skip.push("deepseek");
  if (options.skipOss) skip.push("oss");
  return skip;
}

async function setupScoring(
  options: ScoringCommandOptions,
  logger: Logger
): Promise<{ adapters: ScoringAdapter[]; timeoutMs: number }> {
  const config = resolveScoringConfig(process.env, {
    skip: collectSkips(options),
    llamaModel: options.llamaModel,
    deepseekModel: options.deepseekModel,
    ossModel: options.ossModel,
    geminiModel: options.geminiModel,
    opusModel: options.opusModel,
    maverickModel: options.maverickModel,
    timeoutMs:
      options.timeout === undefined
        ? undefined
        : parsePositiveInteger(options.timeout, "--timeout"),
  });
  logger.setLevel(config.logLevel);

  const settings = resolveProviderSettings(process.env, "rinkscout-score");
  const systemPrompt = await loadPromptFile(
    options.promptFile,
    DEFAULT_SCORING_SYSTEM_PROMPT,
    logger
  );
  const definitions = buildAdapterDefinitions(config, settings, logger);
  const { adapters } = instantiateAdapters(definitions, settings, {
    systemPrompt,
    logger,
  });
  if (adapters.length === 0) {
    throw new ConfigurationError(
      "No scoring models are available; check API keys and --skip flags."
    );
  }
  return { adapters, timeoutMs: config.timeoutMs };
}

async function requireFile(filePath: string, label: string): Promise<void> {
  const stats = await fsp.stat(filePath).catch(() => undefined);
  if (!stats?.isFile()) {
    throw new ConfigurationError(`${label} not found: ${filePath}`);
  }
}

async function runScore(options: ScoreCommandOptions): Promise<void> {
  const logger = new Logger({ prefix: "score" });
  const inputPath = path.resolve(options.input);
  await requireFile(inputPath, "Input summary");

  const { adapters, timeoutMs } = await setupScoring(options, logger);
  const stem = path.basename(inputPath, path.extname(inputPath));
  const outputPath = options.output
    ? path.resolve(options.output)
    : path.join(path.dirname(path.dirname(inputPath)), "ratings", `${stem}.json`);

  await scorePlayerReport({
    reportPath: inputPath,
    outputPath,
    companionDir: options.companionDir,
    adapters,
    timeoutMs,
    logger,
  });
}

async function runBatchCommand(options: BatchCommandOptions): Promise<void> {
  const logger = new Logger({ prefix: "batch" });
  const rosterPath = path.resolve(options.roster);
  await requireFile(rosterPath, "Roster CSV");
  const reportsDir = path.resolve(options.inputDir);

  const { adapters, timeoutMs } = await setupScoring(options, logger);
  if (options.progress) {
    // The dashboard owns the terminal; only errors get through.
    logger.setLevel("error");
  }

  await runBatch({
    roster: rosterPath,
    reportsDir,
    outputDir: options.outputDir
      ? path.resolve(options.outputDir)
      : path.join(path.dirname(reportsDir), "ratings"),
    adapters,
    pattern: options.pattern,
    recursive: options.recursive,
    companionDir: options.companionDir,
    timeoutMs,
    concurrency: parsePositiveInteger(options.concurrency, "--concurrency"),
    logger,
    progressRenderer: options.progress ? new BatchProgressRenderer() : undefined,
  });
}

function withScoringOptions(command: Command): Command {
  return command
    .option("--skip <keys...>", "Scorer keys to leave out (gpt-5, gpt-5-mini, deepseek, llama, oss, gemini, opus, maverick)")
    .option("--skip-llama", "Leave out the Llama scorer")
    .option("--skip-deepseek", "Leave out the DeepSeek scorer")
    .option("--skip-oss", "Leave out the gpt-oss scorer")
    .option("--llama-model <id>", "Jetstream Llama model id")
    .option("--deepseek-model <id>", "Jetstream DeepSeek model id")
    .option("--oss-model <id>", "Jetstream gpt-oss model id")
    .option("--gemini-model <id>", "OpenRouter Gemini model id")
    .option("--opus-model <id>", "OpenRouter Opus model id")
    .option("--maverick-model <id>", "OpenRouter Maverick model id")
    .option("--timeout <ms>", "Per-model call timeout")
    .option("--prompt-file <md>", "Scoring system prompt file");
}

function reportFailure(error: unknown): void {
  console.error(`❌ ${describeError(error)}`);
  process.exitCode = 1;
}

const program = new Command();

program
  .name("rinkscout-score")
  .description("Score markdown scouting reports with several LLMs")
  .version("0.1.0");

withScoringOptions(
  program
    .command("score")
    .description("Score a single report file")
    .requiredOption("--input <md>", "Report markdown file")
    .option("--output <json>", "Ratings file (default: <input dir>/../ratings/<stem>.json)")
    .option("--companion-dir <dir>", "Where to look for the paired base/extended report")
).action(async (options: ScoreCommandOptions) => {
  try {
    await runScore(options);
  } catch (error) {
    reportFailure(error);
  }
});

withScoringOptions(
  program
    .command("batch")
    .description("Score every roster player that has a report and no ratings yet")
    .requiredOption("--roster <csv>", "Roster CSV")
    .requiredOption("--input-dir <dir>", "Directory of report markdown files")
    .option("--pattern <glob>", "File name pattern for reports", "*.md")
    .option("--recursive", "Search the input directory recursively")
    .option("--output-dir <dir>", "Ratings directory (default: <input dir>/../ratings)")
    .option("--companion-dir <dir>", "Where to look for paired base/extended reports")
    .option("--concurrency <n>", "Players scored at once", "1")
    .option("--progress", "Show a live progress dashboard")
).action(async (options: BatchCommandOptions) => {
  try {
    await runBatchCommand(options);
  } catch (error) {
    reportFailure(error);
  }
});

await program.parseAsync(process.argv);
