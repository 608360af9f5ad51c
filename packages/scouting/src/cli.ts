#!/usr/bin/env node
import path from "node:path";
import dotenv from "dotenv";
import { Command } from "commander";
import {
  createGenerationAgents,
  resolveGenerationConfig,
} from "./config";
import { resolveProviderSettings } from "./providers";
import { loadOrCreateRosterSample } from "./sampling";
import { generateReports } from "./reports";
import {
  DEFAULT_ENHANCER_TEMPLATE,
  DEFAULT_RESEARCH_SYSTEM_PROMPT,
  loadPromptFile,
} from "./prompts";
import { describeError } from "./errors";
import { Logger } from "./logger";

dotenv.config();

interface GenerateCommandOptions {
  roster: string;
  sample?: string;
  sampleSize: string;
  seed?: string;
  outputDir: string;
  delay: string;
  systemPrompt?: string;
  enhancerPrompt?: string;
  researchModel?: string;
  enhancerModel?: string;
}

function parseInteger(value: string, flag: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${flag} must be a non-negative integer, received "${value}"`);
  }
  return parsed;
}

async function runGenerate(options: GenerateCommandOptions): Promise<void> {
  const config = resolveGenerationConfig(process.env, {
    sampleSize: parseInteger(options.sampleSize, "--sample-size"),
    seed: options.seed,
    researchModel: options.researchModel,
    enhancerModel: options.enhancerModel,
  });
  const logger = new Logger({ level: config.logLevel, prefix: "reports" });
  const settings = resolveProviderSettings(process.env, "rinkscout-reports");

  const rosterPath = path.resolve(options.roster);
  const samplePath = options.sample
    ? path.resolve(options.sample)
    : path.join(path.dirname(rosterPath), "roster_sample.csv");

  const players = await loadOrCreateRosterSample({
    rosterPath,
    samplePath,
    sampleSize: config.sampleSize,
    seed: config.seed,
    logger,
  });
  const agents = createGenerationAgents(config, settings, logger);

  const [systemPrompt, enhancerTemplate] = await Promise.all([
    loadPromptFile(options.systemPrompt, DEFAULT_RESEARCH_SYSTEM_PROMPT, logger),
    loadPromptFile(options.enhancerPrompt, DEFAULT_ENHANCER_TEMPLATE, logger),
  ]);

  const result = await generateReports({
    players,
    outputDir: path.resolve(options.outputDir),
    researchAgent: agents.researchAgent,
    enhancerAgent: agents.enhancerAgent,
    systemPrompt,
    enhancerTemplate,
    delayMs: parseInteger(options.delay, "--delay"),
    failureDelayMs: 5_000,
    logger,
  });

  logger.info(
    `Generated: ${result.generated}, Enhanced: ${result.enhanced}, Skipped: ${result.skipped}, Failures: ${result.failed}`
  );
}

const program = new Command();

program
  .name("rinkscout-reports")
  .description("Generate markdown scouting reports for a sampled roster")
  .version("0.1.0");

program
  .command("generate")
  .description("Research and write one report per sampled roster row")
  .requiredOption("--roster <csv>", "Full roster CSV")
  .option("--sample <csv>", "Persisted roster sample (default: roster_sample.csv beside the roster)")
  .option("--sample-size <n>", "Players to sample when no sample exists", "500")
  .option("--seed <seed>", "Sampling seed (default: env PLAYER_SAMPLE_SEED)")
  .option("--output-dir <dir>", "Directory for generated reports", "player_summaries")
  .option("--delay <ms>", "Pause between players", "65000")
  .option("--system-prompt <md>", "Research system prompt file")
  .option("--enhancer-prompt <md>", "Enhancer prompt template file")
  .option("--research-model <id>", "OpenAI model for the research pass")
  .option("--enhancer-model <id>", "OpenRouter model for the enhancement pass")
  .action(async (options: GenerateCommandOptions) => {
    try {
      await runGenerate(options);
    } catch (error) {
      console.error(`❌ ${describeError(error)}`);
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
