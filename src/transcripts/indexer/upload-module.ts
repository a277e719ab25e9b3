/**
 * UploadModule - Upserts embedded chunks into the Qdrant collection.
 *
 * All points of this pipeline share one `namespace` payload value, so a
 * collection can hold several channels and a namespace can be wiped without
 * touching the others.
 */

import type { Payload, PointInput, QdrantManager } from "../../qdrant/client.js";
import { InputMissingError } from "../errors.js";
import { BatchPipelineRunner } from "../pipeline/batch-runner.js";
import { pipelineLog } from "../pipeline/debug-logger.js";
import type { BatchOutcome, RunMode } from "../pipeline/types.js";
import type { EmbeddedChunk, ProgressCallback, TranscriptConfig, UploadOptions, UploadStats } from "../types.js";
import { forwardProgress, selectPending, toRunMode, type StageStores } from "./shared.js";

const LABEL = "UploadModule";

export const CONTENT_TYPE = "youtube_transcript";
const MAX_TEXT_LENGTH = 1000;
const MAX_TITLE_LENGTH = 200;

function truncate(text: string, max: number, marker = ""): string {
  return text.length > max ? text.slice(0, max) + marker : text;
}

function metadataValue(chunk: EmbeddedChunk, key: string): string | number | undefined {
  return chunk.sourceMetadata[key];
}

/**
 * Point payload for one chunk. The full text stays in the embeddings
 * document; the payload carries a preview.
 */
export function buildPointPayload(chunk: EmbeddedChunk, namespace: string, channelDisplayName: string): Payload {
  const title = metadataValue(chunk, "videoTitle");
  return {
    namespace,
    chunkId: chunk.chunkId,
    videoId: chunk.sourceId,
    chunkIndex: chunk.index,
    text: truncate(chunk.text, MAX_TEXT_LENGTH, "..."),
    startTime: chunk.start,
    endTime: chunk.end,
    startTimestamp: chunk.startTimestamp,
    endTimestamp: chunk.endTimestamp,
    durationSeconds: chunk.durationSeconds,
    videoTitle: truncate(typeof title === "string" ? title : "", MAX_TITLE_LENGTH),
    channel: metadataValue(chunk, "channel") ?? channelDisplayName,
    videoDurationSeconds: metadataValue(chunk, "videoDurationSeconds") ?? 0,
    thumbnailUrl: metadataValue(chunk, "thumbnailUrl") ?? "",
    youtubeUrl: chunk.youtubeUrl,
    videoUrl: chunk.videoUrl,
    contentType: CONTENT_TYPE,
  };
}

interface UploadItem {
  id: string;
  chunk: EmbeddedChunk;
}

export interface DeleteNamespaceResult {
  namespace: string;
  collectionName: string;
  pointsDeleted: number;
}

export class UploadModule {
  constructor(
    private readonly qdrant: QdrantManager,
    private readonly config: TranscriptConfig,
    private readonly stores: Pick<StageStores, "embeddings" | "uploadProgress">,
  ) {}

  async uploadEmbeddings(options: UploadOptions = {}, progressCallback?: ProgressCallback): Promise<UploadStats> {
    const startTime = Date.now();
    const mode = toRunMode(options.incremental);
    const { collectionName, namespace } = this.config;

    if (!(await this.stores.embeddings.exists())) {
      throw new InputMissingError(
        `Embeddings file not found: ${this.stores.embeddings.getPath()}. Run generate_embeddings first.`,
        this.stores.embeddings.getPath(),
      );
    }

    pipelineLog.resetProfiler();
    const { records } = await this.stores.embeddings.load();
    const items: UploadItem[] = Array.from(records.values()).map((chunk) => ({ id: chunk.chunkId, chunk }));
    console.error(`[${LABEL}] Loaded ${items.length} chunks with embeddings`);

    if (options.dryRun) {
      return this.dryRun(items, mode, options.limit, startTime);
    }

    const first = items[0];
    if (!first) {
      console.error(`[${LABEL}] No chunks to upload`);
      if (mode === "full") {
        await this.stores.uploadProgress.delete();
      }
      return {
        chunksToUpload: 0,
        pointsUploaded: 0,
        pointsFailed: 0,
        namespacePointsBefore: 0,
        namespacePointsAfter: 0,
        durationMs: Date.now() - startTime,
        status: "noop",
        failedChunkIds: [],
      };
    }

    await this.ensureCollection(first.chunk.embedding.length);
    const namespacePointsBefore = await this.qdrant.countPoints(collectionName, { namespace });
    console.error(
      `[${LABEL}] Collection "${collectionName}", namespace "${namespace}": ${namespacePointsBefore} points before upload`,
    );

    const runner = new BatchPipelineRunner<UploadItem, null>(
      {
        batchSize: this.config.upsertBatchSize,
        checkpointEvery: this.config.checkpointEveryBatches,
        interBatchDelayMs: this.config.interBatchDelayMs,
      },
      { progress: this.stores.uploadProgress },
    );

    const summary = await runner.run(items, (batch) => this.upsertBatch(batch), {
      mode,
      limit: options.limit,
      label: LABEL,
      onProgress: forwardProgress("uploading", progressCallback),
    });

    const namespacePointsAfter = await this.qdrant.countPoints(collectionName, { namespace });
    console.error(
      `[${LABEL}] Done: ${summary.succeeded} uploaded, ${summary.failed} failed, ${namespacePointsAfter} points in namespace "${namespace}"`,
    );

    return {
      chunksToUpload: summary.processed,
      pointsUploaded: summary.succeeded,
      pointsFailed: summary.failed,
      namespacePointsBefore,
      namespacePointsAfter,
      durationMs: Date.now() - startTime,
      status: summary.status,
      failedChunkIds: summary.failedIds,
    };
  }

  /**
   * Delete every point of the configured namespace and forget upload progress.
   */
  async deleteNamespace(): Promise<DeleteNamespaceResult> {
    const { collectionName, namespace } = this.config;
    let pointsDeleted = 0;

    if (await this.qdrant.collectionExists(collectionName)) {
      pointsDeleted = await this.qdrant.countPoints(collectionName, { namespace });
      console.error(`[${LABEL}] Deleting ${pointsDeleted} points in namespace "${namespace}"`);
      await this.qdrant.deletePointsByFilter(collectionName, { namespace });
    } else {
      console.error(`[${LABEL}] Collection "${collectionName}" does not exist, nothing to delete`);
    }

    await this.stores.uploadProgress.delete();
    return { namespace, collectionName, pointsDeleted };
  }

  private async dryRun(
    items: UploadItem[],
    mode: RunMode,
    limit: number | undefined,
    startTime: number,
  ): Promise<UploadStats> {
    const pending = await selectPending(items, this.stores.uploadProgress, mode, limit);
    const { collectionName, namespace } = this.config;
    console.error(
      `[${LABEL}] DRY RUN - would upload ${pending.length} points to "${collectionName}" (namespace "${namespace}")`,
    );

    const first = pending[0];
    const sample = first
      ? {
          id: first.id,
          dimensions: first.chunk.embedding.length,
          metadataKeys: Object.keys(buildPointPayload(first.chunk, namespace, this.config.channelDisplayName)),
        }
      : undefined;
    if (sample) {
      console.error(`[${LABEL}] Sample point ${sample.id}: ${sample.dimensions} dimensions, keys ${sample.metadataKeys.join(", ")}`);
    }

    return {
      chunksToUpload: pending.length,
      pointsUploaded: 0,
      pointsFailed: 0,
      namespacePointsBefore: 0,
      namespacePointsAfter: 0,
      durationMs: Date.now() - startTime,
      status: "dry-run",
      failedChunkIds: [],
      sample,
    };
  }

  /**
   * Create the collection on first upload, with payload indexes for the
   * fields searches filter on.
   * @throws Error if an existing collection has a different vector size
   */
  private async ensureCollection(vectorSize: number): Promise<void> {
    const { collectionName } = this.config;
    if (await this.qdrant.collectionExists(collectionName)) {
      const info = await this.qdrant.getCollectionInfo(collectionName);
      if (info.vectorSize !== vectorSize) {
        throw new Error(
          `Collection "${collectionName}" stores ${info.vectorSize}-dimensional vectors, embeddings have ${vectorSize}`,
        );
      }
    } else {
      console.error(`[${LABEL}] Creating collection "${collectionName}" (${vectorSize} dimensions)`);
      await this.qdrant.createCollection(collectionName, vectorSize, "Cosine");
    }

    await this.qdrant.ensurePayloadIndex(collectionName, "namespace", "keyword");
    await this.qdrant.ensurePayloadIndex(collectionName, "videoId", "keyword");
  }

  private async upsertBatch(batch: UploadItem[]): Promise<BatchOutcome<null>> {
    const { collectionName, namespace, channelDisplayName } = this.config;
    const points: PointInput[] = batch.map((item) => ({
      id: item.id,
      vector: item.chunk.embedding,
      payload: buildPointPayload(item.chunk, namespace, channelDisplayName),
    }));

    const callStart = Date.now();
    pipelineLog.stageStart("upload");
    await this.qdrant.addPoints(collectionName, points).finally(() => pipelineLog.stageEnd("upload"));
    pipelineLog.qdrantCall({ component: LABEL }, "upsert", points.length, Date.now() - callStart);

    return { succeeded: batch.map((item) => ({ id: item.id, payload: null })), failed: [] };
  }
}
