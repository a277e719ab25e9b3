/**
 * BatchPipelineRunner - Resumable, checkpointed driver for bulk batch operations
 *
 * Flow per run:
 *   init → filtering → (batch_processing ⇄ checkpointing)* → finalizing → done
 *
 * - Incremental runs skip ids the progress store already marks completed;
 *   full runs start from empty progress and output
 * - One adapter call in flight at a time, with a fixed pause between batches
 * - A batch that throws marks all of its items failed; the run moves on
 * - Output and progress are checkpointed every N batches and at the end,
 *   output first, so progress never claims an item the output lacks
 *
 * Usage:
 *   const runner = new BatchPipelineRunner(config, { progress, output });
 *   const summary = await runner.run(items, applyBatch, { mode: "incremental" });
 */

import { errorMessage } from "../errors.js";
import { createProgressState, markCompleted, markFailed, type ProgressState, type ProgressStorage } from "../sync/progress-store.js";
import type { OutputStore } from "../sync/output-store.js";
import { formatDuration, pipelineLog } from "./debug-logger.js";
import {
  DEFAULT_CONFIG,
  type ApplyBatch,
  type BatchOutcome,
  type BatchRunnerConfig,
  type RunOptions,
  type RunPhase,
  type RunSummary,
  type WorkItem,
} from "./types.js";

const MS_PER_HOUR = 3_600_000;

export interface RunnerStores<R> {
  progress: ProgressStorage;
  /** Omit for operations whose results live elsewhere (e.g. vector upserts) */
  output?: OutputStore<R>;
}

export type SleepFn = (ms: number) => Promise<void>;

const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

interface RunState<R> {
  progress: ProgressState;
  records: Map<string, R>;
  succeeded: number;
  failedIds: string[];
  startTime: number;
}

export class BatchPipelineRunner<T extends WorkItem, R> {
  private readonly config: BatchRunnerConfig;
  private readonly stores: RunnerStores<R>;
  private readonly sleep: SleepFn;

  constructor(config: Partial<BatchRunnerConfig>, stores: RunnerStores<R>, sleep: SleepFn = defaultSleep) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(this.config.batchSize) || this.config.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${this.config.batchSize}`);
    }
    if (!Number.isInteger(this.config.checkpointEvery) || this.config.checkpointEvery < 1) {
      throw new RangeError(`checkpointEvery must be a positive integer, got ${this.config.checkpointEvery}`);
    }
    this.stores = stores;
    this.sleep = sleep;
  }

  async run(items: T[], applyBatch: ApplyBatch<T, R>, options: RunOptions): Promise<RunSummary> {
    const label = options.label ?? "BatchRunner";
    const ctx = { component: label };
    const { batchSize, checkpointEvery, interBatchDelayMs } = this.config;

    // INIT
    const state: RunState<R> = {
      progress: createProgressState(),
      records: new Map(),
      succeeded: 0,
      failedIds: [],
      startTime: Date.now(),
    };
    this.report(options, "init", state, 0, 0, 0, 0);

    if (options.mode === "incremental") {
      state.progress = await this.stores.progress.load();
      if (this.stores.output) {
        state.records = (await this.stores.output.load()).records;
      }
    }

    // FILTERING
    this.report(options, "filtering", state, 0, 0, 0, 0);
    const seen = new Set<string>();
    let pending: T[] = [];
    for (const item of items) {
      if (seen.has(item.id)) {
        console.error(`[${label}] Duplicate work item id "${item.id}" ignored`);
        continue;
      }
      seen.add(item.id);
      if (options.mode === "incremental" && state.progress.completed.has(item.id)) {
        continue;
      }
      pending.push(item);
    }
    const skipped = seen.size - pending.length;
    if (options.limit !== undefined && options.limit >= 0) {
      pending = pending.slice(0, options.limit);
    }

    const total = pending.length;
    const totalBatches = Math.ceil(total / batchSize);

    pipelineLog.step(ctx, "RUN_START", {
      mode: options.mode,
      items: items.length,
      skipped,
      pending: total,
      batchSize,
      checkpointEvery,
    });

    if (total === 0) {
      console.error(`[${label}] Nothing to process (${skipped} already completed)`);
      if (options.mode === "full") {
        // A rebuild over nothing still clears what earlier runs left behind
        await this.checkpoint(state, ctx);
      }
      this.report(options, "done", state, 0, 0, 0, 0);
      return this.summarize(state, items.length, skipped, 0, 0, "noop");
    }

    console.error(
      `[${label}] Processing ${total} items in ${totalBatches} batches (${options.mode} mode, ${skipped} skipped)`,
    );

    let processed = 0;
    for (let batchIndex = 0; batchIndex < totalBatches; batchIndex++) {
      const batch = pending.slice(batchIndex * batchSize, (batchIndex + 1) * batchSize);
      const batchNumber = batchIndex + 1;
      const batchId = `${batchNumber}/${totalBatches}`;

      // BATCH_PROCESSING
      this.report(options, "batch_processing", state, batchNumber, totalBatches, processed, total);
      pipelineLog.batchStart(ctx, batchId, batch.length);
      const batchStart = Date.now();

      try {
        const outcome = await applyBatch(batch);
        const { succeeded, failed } = this.applyOutcome(state, batch, outcome, label);
        pipelineLog.batchComplete(ctx, batchId, succeeded, failed, Date.now() - batchStart);
        console.error(`[${label}] [Batch ${batchId}] ✓ ${succeeded} succeeded${failed > 0 ? `, ${failed} failed` : ""}`);
      } catch (error) {
        const message = errorMessage(error);
        for (const item of batch) {
          markFailed(state.progress, item.id);
          state.failedIds.push(item.id);
        }
        pipelineLog.batchFailed(ctx, batchId, message, batch.length);
        console.error(`[${label}] [Batch ${batchId}] ✗ ${batch.length} items failed: ${message}`);
      }

      processed += batch.length;
      const isLast = batchNumber === totalBatches;

      // CHECKPOINTING
      if (!isLast && batchNumber % checkpointEvery === 0) {
        this.report(options, "checkpointing", state, batchNumber, totalBatches, processed, total);
        await this.checkpoint(state, ctx);
        const { throughputPerHour, etaMs } = this.rates(state, processed, total);
        console.error(
          `[${label}] --- Progress saved. Rate: ${Math.round(throughputPerHour)}/hr, ETA: ${etaMs === null ? "unknown" : formatDuration(etaMs)} ---`,
        );
      }

      if (!isLast && interBatchDelayMs > 0) {
        await this.sleep(interBatchDelayMs);
      }
    }

    // FINALIZING
    this.report(options, "finalizing", state, totalBatches, totalBatches, processed, total);
    await this.checkpoint(state, ctx);

    const failed = state.failedIds.length;
    const status = failed === 0 ? "completed" : state.succeeded === 0 ? "failed" : "partial";
    const summary = this.summarize(state, items.length, skipped, processed, totalBatches, status);

    pipelineLog.summary(ctx, { ...summary, failedIds: summary.failedIds.length });
    this.report(options, "done", state, totalBatches, totalBatches, processed, total);

    return summary;
  }

  /**
   * Fold one adapter result into the run state.
   * Ids the adapter dropped count as failed; ids it invented are ignored.
   */
  private applyOutcome(
    state: RunState<R>,
    batch: T[],
    outcome: BatchOutcome<R>,
    label: string,
  ): { succeeded: number; failed: number } {
    const batchIds = new Set(batch.map((item) => item.id));
    const results = new Map<string, { payload: R }>();

    for (const entry of outcome.succeeded) {
      if (!batchIds.has(entry.id)) {
        console.error(`[${label}] Adapter returned unknown id "${entry.id}", ignoring`);
        continue;
      }
      results.set(entry.id, { payload: entry.payload });
    }
    const reportedFailed = new Set(outcome.failed);

    let succeeded = 0;
    let failed = 0;
    for (const item of batch) {
      const result = results.get(item.id);
      if (result && !reportedFailed.has(item.id)) {
        markCompleted(state.progress, item.id);
        // Re-insert so a retried item moves to the end instead of duplicating
        state.records.delete(item.id);
        state.records.set(item.id, result.payload);
        state.succeeded++;
        succeeded++;
      } else {
        markFailed(state.progress, item.id);
        state.failedIds.push(item.id);
        failed++;
      }
    }

    return { succeeded, failed };
  }

  private async checkpoint(state: RunState<R>, ctx: { component: string }): Promise<void> {
    pipelineLog.stageStart("checkpoint");
    try {
      if (this.stores.output) {
        await this.stores.output.save(state.records);
      }
      await this.stores.progress.save(state.progress);
    } finally {
      pipelineLog.stageEnd("checkpoint");
    }
    pipelineLog.checkpoint(ctx, state.progress.completed.size, state.progress.failed.size, state.records.size);
  }

  private rates(
    state: RunState<R>,
    processed: number,
    total: number,
  ): { throughputPerHour: number; etaMs: number | null } {
    const elapsedMs = Date.now() - state.startTime;
    const throughputPerHour = elapsedMs > 0 ? (state.succeeded / elapsedMs) * MS_PER_HOUR : 0;
    const remaining = total - processed;

    let etaMs: number | null = null;
    if (remaining <= 0) {
      etaMs = 0;
    } else if (throughputPerHour > 0) {
      etaMs = (remaining / throughputPerHour) * MS_PER_HOUR;
    }
    return { throughputPerHour, etaMs };
  }

  private report(
    options: RunOptions,
    phase: RunPhase,
    state: RunState<R>,
    batchNumber: number,
    totalBatches: number,
    processed: number,
    total: number,
  ): void {
    if (!options.onProgress) return;
    const { throughputPerHour, etaMs } = this.rates(state, processed, total);
    options.onProgress({
      phase,
      batchNumber,
      totalBatches,
      processed,
      total,
      succeeded: state.succeeded,
      failed: state.failedIds.length,
      throughputPerHour,
      etaMs,
    });
  }

  private summarize(
    state: RunState<R>,
    total: number,
    skipped: number,
    processed: number,
    batches: number,
    status: RunSummary["status"],
  ): RunSummary {
    const { throughputPerHour, etaMs } = this.rates(state, processed, processed);
    return {
      status,
      total,
      skipped,
      processed,
      succeeded: state.succeeded,
      failed: state.failedIds.length,
      totalInOutput: this.stores.output ? state.records.size : state.progress.completed.size,
      batches,
      elapsedMs: Date.now() - state.startTime,
      throughputPerHour,
      etaMs,
      failedIds: [...state.failedIds],
    };
  }
}
