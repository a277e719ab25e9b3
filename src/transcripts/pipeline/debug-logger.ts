/**
 * Debug Logger for Pipeline Operations
 *
 * Writes trace logs to ~/.transcript-search-mcp/logs/ when DEBUG=1
 * Helps diagnose:
 * - Batch timing and failures
 * - Checkpoint cadence
 * - Embedding and Qdrant call volume
 * - Time spent per stage
 */

import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

const LOG_DIR = join(homedir(), ".transcript-search-mcp", "logs");
const DEBUG = process.env.DEBUG === "true" || process.env.DEBUG === "1";

export type PipelineStage = "chunk" | "embed" | "upload" | "checkpoint";

const STAGES: PipelineStage[] = ["chunk", "embed", "upload", "checkpoint"];

export interface LogContext {
  component: string;
  operation?: string;
  batchId?: string;
}

interface StageData {
  totalMs: number;
  count: number;
  activeStarts: number[];
}

export interface StageSummary {
  totalMs: number;
  count: number;
  percentage: number;
}

class StageProfiler {
  private stages: Map<PipelineStage, StageData> = new Map();

  private getOrCreate(stage: PipelineStage): StageData {
    let data = this.stages.get(stage);
    if (!data) {
      data = { totalMs: 0, count: 0, activeStarts: [] };
      this.stages.set(stage, data);
    }
    return data;
  }

  startStage(stage: PipelineStage): void {
    this.getOrCreate(stage).activeStarts.push(Date.now());
  }

  endStage(stage: PipelineStage): void {
    const data = this.getOrCreate(stage);
    const start = data.activeStarts.shift();
    if (start !== undefined) {
      data.totalMs += Date.now() - start;
      data.count++;
    }
  }

  getSummary(): Partial<Record<PipelineStage, StageSummary>> {
    const totalMs = this.getTotalMs();
    const result: Partial<Record<PipelineStage, StageSummary>> = {};

    for (const stage of STAGES) {
      const data = this.stages.get(stage);
      if (data && data.totalMs > 0) {
        result[stage] = {
          totalMs: data.totalMs,
          count: data.count,
          percentage: totalMs > 0 ? (data.totalMs / totalMs) * 100 : 0,
        };
      }
    }

    return result;
  }

  getTotalMs(): number {
    return Array.from(this.stages.values()).reduce((sum, d) => sum + d.totalMs, 0);
  }

  reset(): void {
    this.stages.clear();
  }
}

/**
 * Format milliseconds as human-readable duration (e.g., "2m 30s", "45.5s", "150ms")
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds % 60);
  return `${minutes}m ${seconds.toString().padStart(2, "0")}s`;
}

class DebugLogger {
  private logFile: string | null = null;
  private readonly sessionStart: number;
  private readonly profiler = new StageProfiler();
  private readonly counters = {
    batches: 0,
    items: 0,
    failedBatches: 0,
    checkpoints: 0,
    embedCalls: 0,
    qdrantCalls: 0,
  };

  constructor() {
    this.sessionStart = Date.now();

    if (DEBUG) {
      this.initLogFile();
    }
  }

  private initLogFile(): void {
    try {
      if (!existsSync(LOG_DIR)) {
        mkdirSync(LOG_DIR, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
      this.logFile = join(LOG_DIR, `pipeline-${timestamp}.log`);

      const env = (key: string, fallback: string) =>
        process.env[key] != null ? process.env[key] : `${fallback} (default)`;

      this.writeRaw(`
================================================================================
PIPELINE DEBUG LOG - Session started at ${new Date().toISOString()}
================================================================================
ENV:
  DATA_DIR                    = ${env("DATA_DIR", "./data")}
  EMBEDDING_PROVIDER          = ${env("EMBEDDING_PROVIDER", "openai")}
  EMBEDDING_MODEL             = ${env("EMBEDDING_MODEL", "text-embedding-3-small")}
  EMBEDDING_BATCH_SIZE        = ${env("EMBEDDING_BATCH_SIZE", "100")}
  QDRANT_UPSERT_BATCH_SIZE    = ${env("QDRANT_UPSERT_BATCH_SIZE", "100")}
  CHECKPOINT_EVERY_BATCHES    = ${env("CHECKPOINT_EVERY_BATCHES", "10")}
  INTER_BATCH_DELAY_MS        = ${env("INTER_BATCH_DELAY_MS", "100")}
================================================================================
`);
    } catch (error) {
      console.error("[DebugLogger] Failed to init log file:", error);
    }
  }

  private writeRaw(message: string): void {
    if (this.logFile) {
      try {
        appendFileSync(this.logFile, message + "\n");
      } catch {
        // Logging must never break the pipeline
      }
    }
  }

  private formatTime(): string {
    const elapsed = Date.now() - this.sessionStart;
    const sec = Math.floor(elapsed / 1000);
    const ms = elapsed % 1000;
    return `+${sec.toString().padStart(4, " ")}.${ms.toString().padStart(3, "0")}s`;
  }

  /**
   * Log a pipeline step with timing
   */
  step(ctx: LogContext, message: string, data?: Record<string, unknown>): void {
    if (!DEBUG) return;

    const prefix = `[${this.formatTime()}] [${ctx.component}]`;
    const suffix = data ? ` | ${JSON.stringify(data)}` : "";

    const line = `${prefix} ${message}${suffix}`;
    this.writeRaw(line);
    console.error(line);
  }

  batchStart(ctx: LogContext, batchId: string, itemCount: number): void {
    this.step(ctx, `BATCH_START: ${batchId}`, { items: itemCount });
  }

  batchComplete(ctx: LogContext, batchId: string, succeeded: number, failed: number, durationMs: number): void {
    this.counters.batches++;
    this.counters.items += succeeded;
    this.step(ctx, `BATCH_COMPLETE: ${batchId}`, {
      succeeded,
      failed,
      durationMs,
      totalItems: this.counters.items,
    });
  }

  batchFailed(ctx: LogContext, batchId: string, error: string, itemCount: number): void {
    this.counters.batches++;
    this.counters.failedBatches++;
    this.step(ctx, `BATCH_FAILED: ${batchId}`, { error, items: itemCount });
  }

  checkpoint(ctx: LogContext, completed: number, failed: number, records: number): void {
    this.counters.checkpoints++;
    this.step(ctx, "CHECKPOINT", { completed, failed, records });
  }

  embedCall(ctx: LogContext, textCount: number, durationMs?: number): void {
    this.counters.embedCalls++;
    this.step(ctx, "EMBED_CALL", {
      texts: textCount,
      durationMs,
      totalCalls: this.counters.embedCalls,
    });
  }

  qdrantCall(ctx: LogContext, operation: string, pointCount: number, durationMs?: number): void {
    this.counters.qdrantCalls++;
    this.step(ctx, `QDRANT_${operation.toUpperCase()}`, {
      points: pointCount,
      durationMs,
      totalCalls: this.counters.qdrantCalls,
    });
  }

  stageStart(stage: PipelineStage): void {
    this.profiler.startStage(stage);
  }

  stageEnd(stage: PipelineStage): void {
    this.profiler.endStage(stage);
  }

  resetProfiler(): void {
    this.profiler.reset();
  }

  /**
   * Log run summary with per-stage timing
   */
  summary(ctx: LogContext, stats: Record<string, unknown>): void {
    const stageSummary = this.profiler.getSummary();

    let stageBlock = "";
    if (this.profiler.getTotalMs() > 0) {
      stageBlock = "\nSTAGE PROFILING:\n";
      for (const stage of STAGES) {
        const data = stageSummary[stage];
        if (data) {
          stageBlock += `  ${stage.padEnd(10)}  ${formatDuration(data.totalMs).padStart(10)}  ${(data.percentage.toFixed(1) + "%").padStart(6)}  ${data.count.toString().padStart(6)}\n`;
        }
      }
    }

    this.writeRaw(`
--------------------------------------------------------------------------------
SUMMARY for ${ctx.component}
--------------------------------------------------------------------------------
${JSON.stringify(stats, null, 2)}
Session counters: ${JSON.stringify(this.counters)}${stageBlock}
--------------------------------------------------------------------------------
`);
  }

  getLogPath(): string | null {
    return this.logFile;
  }
}

// Singleton instance
export const pipelineLog = new DebugLogger();
