/**
 * Shared paths, stores and helpers for the transcript stage modules.
 */

import { join, resolve } from "node:path";

import type { EmbeddingProvider } from "../../embeddings/base.js";
import type { RunMode, RunProgress } from "../pipeline/types.js";
import { createChunksCodec, createEmbeddingsCodec, JsonDocumentStore } from "../sync/output-store.js";
import { ProgressStore, type ProgressStorage } from "../sync/progress-store.js";
import type { EmbeddedChunk, ProgressCallback, ProgressUpdate, TranscriptChunk, TranscriptConfig } from "../types.js";

export interface StagePaths {
  transcriptsDir: string;
  metadataFile: string;
  chunksFile: string;
  chunkingProgressFile: string;
  embeddingsFile: string;
  embeddingProgressFile: string;
  uploadProgressFile: string;
}

export function resolveStagePaths(dataDir: string): StagePaths {
  const root = resolve(dataDir);
  return {
    transcriptsDir: join(root, "transcripts"),
    metadataFile: join(root, "metadata", "video_metadata.json"),
    chunksFile: join(root, "chunks", "all_chunks.json"),
    chunkingProgressFile: join(root, "chunks", "chunking_progress.json"),
    embeddingsFile: join(root, "embeddings", "embeddings.json"),
    embeddingProgressFile: join(root, "embeddings", "embedding_progress.json"),
    uploadProgressFile: join(root, "upload", "upload_progress.json"),
  };
}

export interface StageStores {
  chunks: JsonDocumentStore<TranscriptChunk[]>;
  chunkingProgress: ProgressStore;
  embeddings: JsonDocumentStore<EmbeddedChunk>;
  embeddingProgress: ProgressStore;
  uploadProgress: ProgressStore;
}

/**
 * The documents and progress files every stage reads or writes.
 * Chunks are pretty-printed; embeddings are written compact.
 */
export function openStageStores(config: TranscriptConfig, embeddings: EmbeddingProvider): StageStores {
  const paths = resolveStagePaths(config.dataDir);
  return {
    chunks: new JsonDocumentStore(
      paths.chunksFile,
      createChunksCodec({ channelDisplayName: config.channelDisplayName, segmenter: config.segmenter }),
      2,
    ),
    chunkingProgress: new ProgressStore(paths.chunkingProgressFile, "chunking"),
    embeddings: new JsonDocumentStore(
      paths.embeddingsFile,
      createEmbeddingsCodec({
        channelDisplayName: config.channelDisplayName,
        model: embeddings.getModel(),
        dimensions: embeddings.getDimensions(),
      }),
    ),
    embeddingProgress: new ProgressStore(paths.embeddingProgressFile),
    uploadProgress: new ProgressStore(paths.uploadProgressFile),
  };
}

export function toRunMode(incremental: boolean | undefined): RunMode {
  return incremental ? "incremental" : "full";
}

/**
 * Items a run would hand to its adapter: completed ids dropped in
 * incremental mode, then capped at `limit`. Mirrors the runner's filtering
 * so a stage can size or preview the work before it starts.
 */
export async function selectPending<T extends { id: string }>(
  items: T[],
  progress: ProgressStorage,
  mode: RunMode,
  limit?: number,
): Promise<T[]> {
  let pending = items;
  if (mode === "incremental") {
    const { completed } = await progress.load();
    pending = pending.filter((item) => !completed.has(item.id));
  }
  if (limit !== undefined && limit >= 0) {
    pending = pending.slice(0, limit);
  }
  return pending;
}

/**
 * Adapt runner progress to the stage-level progress callback.
 */
export function forwardProgress(
  phase: ProgressUpdate["phase"],
  callback: ProgressCallback | undefined,
): ((progress: RunProgress) => void) | undefined {
  if (!callback) return undefined;
  return (progress) => {
    if (progress.phase !== "batch_processing" && progress.phase !== "done") return;
    callback({
      phase,
      current: progress.processed,
      total: progress.total,
      percentage: progress.total > 0 ? Math.round((progress.processed / progress.total) * 100) : 100,
      message:
        progress.phase === "done"
          ? `Finished: ${progress.succeeded} succeeded, ${progress.failed} failed`
          : `Batch ${progress.batchNumber}/${progress.totalBatches}`,
    });
  };
}
