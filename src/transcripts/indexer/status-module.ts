/**
 * StatusModule - Where each stage of the pipeline stands.
 */

import type { QdrantManager } from "../../qdrant/client.js";
import type { PipelineStatus, StageStatus, TranscriptConfig } from "../types.js";
import type { StageStores } from "./shared.js";

export class StatusModule {
  constructor(
    private readonly qdrant: QdrantManager,
    private readonly config: TranscriptConfig,
    private readonly stores: StageStores,
  ) {}

  async getStatus(): Promise<PipelineStatus> {
    const [chunkingProgress, embeddingProgress, uploadProgress] = await Promise.all([
      this.stores.chunkingProgress.load(),
      this.stores.embeddingProgress.load(),
      this.stores.uploadProgress.load(),
    ]);

    const chunksDocument = await this.stores.chunks.load();
    let chunkCount = 0;
    for (const chunks of chunksDocument.records.values()) {
      chunkCount += chunks.length;
    }

    const embeddingsDocument = await this.stores.embeddings.load();

    const chunking: StageStatus = {
      completed: chunkingProgress.completed.size,
      failed: chunkingProgress.failed.size,
      recordsInOutput: chunkCount,
      outputCreatedAt: chunksDocument.createdAt ?? undefined,
    };
    const embedding: StageStatus = {
      completed: embeddingProgress.completed.size,
      failed: embeddingProgress.failed.size,
      recordsInOutput: embeddingsDocument.records.size,
      outputCreatedAt: embeddingsDocument.createdAt ?? undefined,
    };
    const upload: StageStatus = {
      completed: uploadProgress.completed.size,
      failed: uploadProgress.failed.size,
      recordsInOutput: await this.countNamespacePoints(),
    };

    return { chunking, embedding, upload };
  }

  private async countNamespacePoints(): Promise<number> {
    const { collectionName, namespace } = this.config;
    if (!(await this.qdrant.collectionExists(collectionName))) {
      return 0;
    }
    return this.qdrant.countPoints(collectionName, { namespace });
  }
}
