import type { Logger, PlayerIdentity } from "@rinkscout/scouting";
import type { RatingCandidate } from "./schema";

export type AdapterKind = "structured" | "json" | "reasoning-json";

export type RawReply =
  | { type: "object"; object: unknown }
  | { type: "text"; text: string };

export interface ScoringRequest {
  document: string;
  abortSignal?: AbortSignal;
}

/**
 * One configured connector to an LLM backend. Holds no per-call state, so a
 * single instance may serve concurrent requests.
 */
export interface ScoringAdapter {
  readonly identifier: string;
  readonly kind: AdapterKind;
  score(request: ScoringRequest): Promise<RatingCandidate>;
}

export interface Rating {
  model_name: string;
  current_rating: number;
  future_rating: number;
  current_confidence: number;
  future_confidence: number;
  /** Always exactly three entries. */
  reasoning: string[];
  timestamp: string;
  version: string;
}

export interface ScoringError {
  model_name: string;
  error: string;
}

export interface AggregateResult {
  player: string;
  ratings: Rating[];
  generated_at: string;
  schema_version: string;
  errors?: ScoringError[];
}

export interface ScoreReportOptions {
  document: string;
  player: string;
  adapters: readonly ScoringAdapter[];
  timeoutMs?: number;
  outputPath?: string;
  now?: () => Date;
  logger?: Logger;
}

export interface ScorePlayerReportOptions
  extends Omit<ScoreReportOptions, "document" | "player" | "outputPath"> {
  reportPath: string;
  outputPath: string;
  player?: string;
  companionDir?: string;
}

export type RosterSource = string | readonly PlayerIdentity[];

export type RowStatus = "scored" | "failed" | "skipped-existing" | "missing-input";

export interface RowOutcome {
  player: string;
  status: RowStatus;
  reportPath?: string;
  outputPath?: string;
  error?: string;
}

export interface BatchProgress {
  completed: number;
  inProgress: number;
  total: number;
  succeeded: number;
  failed: number;
  skippedExisting: number;
  missingInput: number;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  skippedExisting: number;
  missingInput: number;
}

export interface BatchResult extends BatchSummary {
  outcomes: RowOutcome[];
}

export interface BatchRendererConfig {
  total: number;
  concurrency: number;
  adapterIds: string[];
  reportsDir: string;
  outputDir: string;
}

export interface BatchRenderer {
  start(config: BatchRendererConfig): void;
  update(progress: BatchProgress): void;
  finish(summary: BatchSummary & { durationMs: number }): void;
  fail(error: Error): void;
}

export interface BatchScoreOptions {
  roster: RosterSource;
  reportsDir: string;
  outputDir: string;
  adapters: readonly ScoringAdapter[];
  pattern?: string;
  recursive?: boolean;
  companionDir?: string;
  timeoutMs?: number;
  concurrency?: number;
  logger?: Logger;
  progressRenderer?: BatchRenderer;
  onProgress?: (progress: BatchProgress) => void;
  now?: () => Date;
}
