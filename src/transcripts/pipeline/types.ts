/**
 * Pipeline Types - Interfaces for the resumable batch runner
 */

/**
 * Base work item interface
 */
export interface WorkItem {
  /** Stable unique id, used for progress tracking and result correlation */
  id: string;
}

/**
 * What an adapter returns for one batch.
 * Items missing from both lists are treated as failed.
 */
export interface BatchOutcome<R> {
  succeeded: Array<{ id: string; payload: R }>;
  failed: string[];
}

/**
 * Transform one batch of items, or throw to fail the whole batch.
 */
export type ApplyBatch<T extends WorkItem, R> = (items: T[]) => Promise<BatchOutcome<R>>;

export type RunMode = "incremental" | "full";

/**
 * Runner phases, in order. batch_processing and checkpointing alternate.
 */
export type RunPhase = "init" | "filtering" | "batch_processing" | "checkpointing" | "finalizing" | "done";

export interface BatchRunnerConfig {
  /** Items per adapter call */
  batchSize: number;
  /** Batches between checkpoints (progress + output are also saved at run end) */
  checkpointEvery: number;
  /** Pause between consecutive batches (ms) */
  interBatchDelayMs: number;
}

export interface RunProgress {
  phase: RunPhase;
  batchNumber: number;
  totalBatches: number;
  processed: number;
  total: number;
  succeeded: number;
  failed: number;
  throughputPerHour: number;
  /** Projected time to completion, null until the first item succeeds */
  etaMs: number | null;
}

export type RunProgressCallback = (progress: RunProgress) => void;

export interface RunOptions {
  mode: RunMode;
  /** Process at most this many pending items */
  limit?: number;
  /** Label used in log lines */
  label?: string;
  onProgress?: RunProgressCallback;
}

export interface RunSummary {
  status: "completed" | "partial" | "failed" | "noop";
  /** Items in the input list */
  total: number;
  /** Items skipped because an earlier run completed them */
  skipped: number;
  /** Items handed to the adapter in this run */
  processed: number;
  succeeded: number;
  failed: number;
  /** Records in the output collection after the run */
  totalInOutput: number;
  batches: number;
  elapsedMs: number;
  throughputPerHour: number;
  etaMs: number | null;
  failedIds: string[];
}

/**
 * Default configuration values
 *
 * Batch sizes follow the provider limits: embedding APIs accept a few hundred
 * inputs per request, Qdrant upserts stay fast at around a hundred points.
 */
export const DEFAULT_CONFIG: BatchRunnerConfig = {
  batchSize: 100,
  checkpointEvery: 10,
  interBatchDelayMs: 100,
};
