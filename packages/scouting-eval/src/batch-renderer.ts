import type {
  BatchProgress,
  BatchRenderer,
  BatchRendererConfig,
  BatchSummary,
} from "./types";

export class BatchProgressRenderer implements BatchRenderer {
  private progress: BatchProgress = emptyProgress(0);
  private config: BatchRendererConfig | null = null;
  private startTime = 0;
  private lastRenderTime = 0;
  private pendingRenderTimer?: NodeJS.Timeout;
  private readonly RENDER_THROTTLE_MS = 250;
  private isFinished = false;

  start(config: BatchRendererConfig): void {
    this.config = config;
    this.startTime = Date.now();
    this.progress = emptyProgress(config.total);
    this.isFinished = false;
    this.queueRender(true);
  }

  update(progress: BatchProgress): void {
    if (!this.config || this.isFinished) return;
    this.progress = progress;
    this.queueRender();
  }

  finish(summary: BatchSummary & { durationMs: number }): void {
    if (!this.config) return;
    this.isFinished = true;
    this.clearPendingRender();
    this.clearConsole();
    this.renderCompletion(summary);
  }

  fail(error: Error): void {
    if (!this.config) return;
    this.isFinished = true;
    this.clearPendingRender();
    this.clearConsole();
    console.log("╔═══════════════════════════════════════════════════════════╗");
    console.log("║        Batch Scoring Failed ❌                            ║");
    console.log("╚═══════════════════════════════════════════════════════════╝");
    console.log();
    console.log("Reason:", error.message);
  }

  private queueRender(force = false): void {
    if (!this.config || this.isFinished) {
      return;
    }

    const now = Date.now();
    const sinceLastRender = now - this.lastRenderTime;

    if (force || sinceLastRender >= this.RENDER_THROTTLE_MS) {
      this.renderImmediate();
      this.lastRenderTime = now;
      this.clearPendingRender();
      return;
    }

    if (!this.pendingRenderTimer) {
      this.pendingRenderTimer = setTimeout(() => {
        this.pendingRenderTimer = undefined;
        this.renderImmediate();
        this.lastRenderTime = Date.now();
      }, this.RENDER_THROTTLE_MS - sinceLastRender);
    }
  }

  private clearPendingRender(): void {
    if (this.pendingRenderTimer) {
      clearTimeout(this.pendingRenderTimer);
      this.pendingRenderTimer = undefined;
    }
  }

  private renderImmediate(): void {
    if (!this.config) return;
    this.clearConsole();

    console.log("╔═══════════════════════════════════════════════════════════╗");
    console.log("║             Player Scoring Dashboard 🏒                   ║");
    console.log("╚═══════════════════════════════════════════════════════════╝");
    console.log();

    this.renderConfig(this.config);
    this.renderProgress();
    const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1);
    console.log(`⏱️  Elapsed: ${elapsed}s`);
  }

  private renderConfig(config: BatchRendererConfig): void {
    console.log("📋 Configuration:");
    console.log(`   Roster rows: ${config.total}`);
    console.log(`   Concurrency: ${config.concurrency}`);
    console.log(`   Models: ${config.adapterIds.join(", ") || "none"}`);
    console.log(`   Summaries: ${config.reportsDir}`);
    console.log(`   Ratings: ${config.outputDir}`);
    console.log();
  }

  private renderProgress(): void {
    const { completed, inProgress, total } = this.progress;
    const percentage = total > 0 ? ((completed / total) * 100).toFixed(1) : "0.0";
    console.log("📊 Progress:");
    console.log(
      `   ${renderProgressBar(completed, total)} ${completed}/${total} (${percentage}%)`
    );
    const remaining = Math.max(total - completed - inProgress, 0);
    console.log(`   ⚙️  In flight: ${inProgress} | 📋 Remaining: ${remaining}`);
    console.log(`   ${formatCounts(this.progress)}`);
    console.log();
  }

  private renderCompletion(summary: BatchSummary & { durationMs: number }): void {
    console.log("╔═══════════════════════════════════════════════════════════╗");
    console.log("║          Batch Scoring Complete ✅                        ║");
    console.log("╚═══════════════════════════════════════════════════════════╝");
    console.log();
    console.log(`⏱️  Total time: ${(summary.durationMs / 1000).toFixed(2)}s`);
    console.log(`   ${formatCounts(summary)}`);
    if (this.config) {
      console.log(`💾 Ratings written to: ${this.config.outputDir}`);
    }
    console.log();
  }

  private clearConsole(): void {
    process.stdout.write("\x1b[2J\x1b[H");
  }
}

function emptyProgress(total: number): BatchProgress {
  return {
    completed: 0,
    inProgress: 0,
    total,
    succeeded: 0,
    failed: 0,
    skippedExisting: 0,
    missingInput: 0,
  };
}

export function formatCounts(counts: BatchSummary): string {
  return `✅ Scored: ${counts.succeeded} | ❌ Failed: ${counts.failed} | ⏭️  Skipped: ${counts.skippedExisting} | ❓ Missing: ${counts.missingInput}`;
}

export function renderProgressBar(current: number, total: number, width = 30): string {
  if (total <= 0) {
    return `[${"░".repeat(width)}]`;
  }
  const ratio = Math.min(Math.max(current / total, 0), 1);
  const filled = Math.round(ratio * width);
  return `[${"█".repeat(filled)}${"░".repeat(Math.max(width - filled, 0))}]`;
}
