/**
 * EmbeddingModule - Attaches an embedding vector to every chunk.
 */

import type { EmbeddingProvider } from "../../embeddings/base.js";
import { InputMissingError } from "../errors.js";
import { BatchPipelineRunner } from "../pipeline/batch-runner.js";
import { pipelineLog } from "../pipeline/debug-logger.js";
import type { BatchOutcome } from "../pipeline/types.js";
import type {
  EmbeddedChunk,
  EmbeddingOptions,
  EmbeddingStats,
  ProgressCallback,
  TranscriptChunk,
  TranscriptConfig,
} from "../types.js";
import { forwardProgress, selectPending, toRunMode, type StageStores } from "./shared.js";

const LABEL = "EmbeddingModule";

/** Rough token count used for cost estimates */
export function estimateTokens(texts: string[]): number {
  let chars = 0;
  for (const text of texts) chars += text.length;
  return Math.floor(chars / 4);
}

export function estimateCost(tokens: number, pricePerMillionTokens: number): number {
  return (tokens / 1_000_000) * pricePerMillionTokens;
}

interface EmbeddingItem {
  id: string;
  chunk: TranscriptChunk;
}

export class EmbeddingModule {
  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly config: TranscriptConfig,
    private readonly stores: Pick<StageStores, "chunks" | "embeddings" | "embeddingProgress">,
  ) {}

  async generateEmbeddings(
    options: EmbeddingOptions = {},
    progressCallback?: ProgressCallback,
  ): Promise<EmbeddingStats> {
    const startTime = Date.now();
    const mode = toRunMode(options.incremental);
    const batchSize = options.batchSize ?? this.config.embeddingBatchSize;
    const price = this.config.embeddingPricePerMillionTokens;

    if (!(await this.stores.chunks.exists())) {
      throw new InputMissingError(
        `Chunks file not found: ${this.stores.chunks.getPath()}. Run chunk_transcripts first.`,
        this.stores.chunks.getPath(),
      );
    }

    pipelineLog.resetProfiler();
    const { records } = await this.stores.chunks.load();
    const items: EmbeddingItem[] = Array.from(records.values())
      .flat()
      .map((chunk) => ({ id: chunk.chunkId, chunk }));

    const pending = await selectPending(items, this.stores.embeddingProgress, mode, options.limit);
    const estimatedTokens = estimateTokens(pending.map((item) => item.chunk.embeddingText));
    const estimatedCost = estimateCost(estimatedTokens, price);

    console.error(
      `[${LABEL}] ${items.length} chunks loaded, ${pending.length} to embed with ${this.embeddings.getModel()} ` +
        `(~${estimatedTokens.toLocaleString("en-US")} tokens, ~$${estimatedCost.toFixed(4)})`,
    );

    let tokensUsed = 0;
    const runner = new BatchPipelineRunner<EmbeddingItem, EmbeddedChunk>(
      {
        batchSize,
        checkpointEvery: this.config.checkpointEveryBatches,
        interBatchDelayMs: this.config.interBatchDelayMs,
      },
      { progress: this.stores.embeddingProgress, output: this.stores.embeddings },
    );

    const summary = await runner.run(
      items,
      async (batch) => {
        const outcome = await this.embedBatch(batch);
        tokensUsed += estimateTokens(
          batch.filter((item) => !outcome.failed.includes(item.id)).map((item) => item.chunk.embeddingText),
        );
        return outcome;
      },
      {
        mode,
        limit: options.limit,
        label: LABEL,
        onProgress: forwardProgress("embedding", progressCallback),
      },
    );

    const actualCost = estimateCost(tokensUsed, price);
    console.error(
      `[${LABEL}] Done: ${summary.succeeded} embedded, ${summary.failed} failed, ` +
        `~${tokensUsed.toLocaleString("en-US")} tokens (~$${actualCost.toFixed(4)}), ${summary.totalInOutput} embeddings in output`,
    );

    return {
      chunksToEmbed: summary.processed,
      chunksEmbedded: summary.succeeded,
      chunksFailed: summary.failed,
      totalEmbeddingsInOutput: summary.totalInOutput,
      estimatedTokens,
      estimatedCost,
      tokensUsed,
      actualCost,
      durationMs: Date.now() - startTime,
      throughputPerHour: summary.throughputPerHour,
      status: summary.status,
      failedChunkIds: summary.failedIds,
    };
  }

  /**
   * One provider call for the whole batch.
   * @throws Error if the provider returns a different number of vectors
   */
  private async embedBatch(batch: EmbeddingItem[]): Promise<BatchOutcome<EmbeddedChunk>> {
    const ctx = { component: LABEL };
    const callStart = Date.now();
    pipelineLog.stageStart("embed");
    const results = await this.embeddings
      .embedBatch(batch.map((item) => item.chunk.embeddingText))
      .finally(() => pipelineLog.stageEnd("embed"));
    pipelineLog.embedCall(ctx, batch.length, Date.now() - callStart);

    if (results.length !== batch.length) {
      throw new Error(`Embedding provider returned ${results.length} vectors for ${batch.length} texts`);
    }

    const outcome: BatchOutcome<EmbeddedChunk> = { succeeded: [], failed: [] };
    batch.forEach((item, index) => {
      const result = results[index];
      if (result && result.embedding.length > 0) {
        outcome.succeeded.push({ id: item.id, payload: { ...item.chunk, embedding: result.embedding } });
      } else {
        outcome.failed.push(item.id);
      }
    });
    return outcome;
  }
}
