/**
 * ChunkingModule - Turns transcript files into timestamped chunks.
 *
 * Each video is one work item whose payload is its chunk list, so the
 * resumable runner drives the per-video loop: an incremental run skips
 * videos already chunked and a bad transcript fails only itself.
 */

import { buildSourceMetadata, enrichChunk } from "../chunk-metadata.js";
import { errorMessage } from "../errors.js";
import { listTranscriptFiles, loadVideoMetadata, readTranscript, type TranscriptFileEntry } from "../loader.js";
import { BatchPipelineRunner } from "../pipeline/batch-runner.js";
import { pipelineLog } from "../pipeline/debug-logger.js";
import type { BatchOutcome } from "../pipeline/types.js";
import { segment } from "../segmenter.js";
import type {
  ChunkingOptions,
  ChunkingStats,
  DurationStats,
  ProgressCallback,
  TranscriptChunk,
  TranscriptConfig,
  VideoInfo,
} from "../types.js";
import { forwardProgress, resolveStagePaths, toRunMode, type StageStores } from "./shared.js";

const LABEL = "ChunkingModule";

export function computeDurationStats(chunks: TranscriptChunk[]): DurationStats | undefined {
  if (chunks.length === 0) return undefined;
  let total = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const chunk of chunks) {
    total += chunk.durationSeconds;
    min = Math.min(min, chunk.durationSeconds);
    max = Math.max(max, chunk.durationSeconds);
  }
  return { avgSeconds: total / chunks.length, minSeconds: min, maxSeconds: max };
}

export class ChunkingModule {
  constructor(
    private readonly config: TranscriptConfig,
    private readonly stores: Pick<StageStores, "chunks" | "chunkingProgress">,
  ) {}

  async chunkTranscripts(options: ChunkingOptions = {}, progressCallback?: ProgressCallback): Promise<ChunkingStats> {
    const startTime = Date.now();
    const paths = resolveStagePaths(this.config.dataDir);
    const { segmenter } = this.config;

    pipelineLog.resetProfiler();
    const files = await listTranscriptFiles(paths.transcriptsDir);
    const videos = await loadVideoMetadata(paths.metadataFile);

    console.error(
      `[${LABEL}] Found ${files.length} transcripts (target ${segmenter.targetDuration}s, min ${segmenter.minDuration}s, max ${segmenter.maxDuration}s)`,
    );

    let chunksCreated = 0;
    const runner = new BatchPipelineRunner<TranscriptFileEntry, TranscriptChunk[]>(
      { batchSize: 1, checkpointEvery: this.config.chunkCheckpointEvery, interBatchDelayMs: 0 },
      { progress: this.stores.chunkingProgress, output: this.stores.chunks },
    );

    const summary = await runner.run(
      files,
      async (entries) => {
        const outcome: BatchOutcome<TranscriptChunk[]> = { succeeded: [], failed: [] };
        for (const entry of entries) {
          const chunks = await this.chunkOne(entry, videos);
          if (chunks.length > 0) {
            outcome.succeeded.push({ id: entry.id, payload: chunks });
            chunksCreated += chunks.length;
          } else {
            outcome.failed.push(entry.id);
          }
        }
        return outcome;
      },
      {
        mode: toRunMode(options.incremental),
        limit: options.limit,
        label: LABEL,
        onProgress: forwardProgress("chunking", progressCallback),
      },
    );

    const { records } = await this.stores.chunks.load();
    const allChunks = Array.from(records.values()).flat();
    const durations = computeDurationStats(allChunks);

    console.error(
      `[${LABEL}] Done: ${summary.succeeded} videos chunked, ${chunksCreated} chunks created, ${summary.failed} failed, ${allChunks.length} chunks in output`,
    );
    if (durations) {
      console.error(
        `[${LABEL}] Chunk duration avg ${durations.avgSeconds.toFixed(1)}s, min ${durations.minSeconds.toFixed(1)}s, max ${durations.maxSeconds.toFixed(1)}s`,
      );
    }

    return {
      videosFound: files.length,
      videosProcessed: summary.succeeded,
      videosFailed: summary.failed,
      chunksCreated,
      totalChunksInOutput: allChunks.length,
      durationMs: Date.now() - startTime,
      status: summary.status,
      durations,
      failedVideoIds: summary.failedIds,
    };
  }

  /**
   * Chunk one video. Returns an empty list when the transcript is unusable;
   * the reason is logged.
   */
  private async chunkOne(entry: TranscriptFileEntry, videos: Map<string, VideoInfo>): Promise<TranscriptChunk[]> {
    const ctx = { component: LABEL, operation: entry.id };
    pipelineLog.stageStart("chunk");
    try {
      const transcript = await readTranscript(entry);
      const metadata = buildSourceMetadata(
        transcript,
        videos.get(transcript.videoId),
        this.config.channelDisplayName,
      );
      const chunks = segment(transcript.videoId, transcript.segments, this.config.segmenter, metadata).map(enrichChunk);

      if (chunks.length === 0) {
        console.error(`[${LABEL}] ⚠ ${entry.id} - No segments found`);
      } else {
        const title = transcript.title.slice(0, 40);
        pipelineLog.step(ctx, "CHUNKED", { chunks: chunks.length, title });
      }
      return chunks;
    } catch (error) {
      console.error(`[${LABEL}] ✗ ${entry.id} - ${errorMessage(error)}`);
      return [];
    } finally {
      pipelineLog.stageEnd("chunk");
    }
  }
}
