/**
 * SearchModule - Semantic search over uploaded transcript chunks.
 */

import type { EmbeddingProvider } from "../../embeddings/base.js";
import type { MatchFilter, Payload, QdrantManager } from "../../qdrant/client.js";
import type { SearchOptions, TranscriptConfig, TranscriptSearchResult } from "../types.js";

const DEFAULT_LIMIT = 5;

function stringField(payload: Payload | undefined, key: string): string {
  const value = payload?.[key];
  return typeof value === "string" ? value : "";
}

export class SearchModule {
  constructor(
    private readonly qdrant: QdrantManager,
    private readonly embeddings: EmbeddingProvider,
    private readonly config: TranscriptConfig,
  ) {}

  /**
   * Search chunks of the configured namespace, optionally within one video.
   */
  async searchTranscripts(query: string, options?: SearchOptions): Promise<TranscriptSearchResult[]> {
    const { collectionName, namespace } = this.config;

    const exists = await this.qdrant.collectionExists(collectionName);
    if (!exists) {
      throw new Error(`Collection "${collectionName}" not found. Run upload_embeddings first.`);
    }

    const { embedding } = await this.embeddings.embed(query);

    const filter: MatchFilter = { namespace };
    if (options?.videoId) {
      filter.videoId = options.videoId;
    }

    const results = await this.qdrant.search(collectionName, embedding, options?.limit ?? DEFAULT_LIMIT, filter);

    return results.map((result) => ({
      chunkId: stringField(result.payload, "chunkId"),
      videoId: stringField(result.payload, "videoId"),
      videoTitle: stringField(result.payload, "videoTitle"),
      startTimestamp: stringField(result.payload, "startTimestamp"),
      endTimestamp: stringField(result.payload, "endTimestamp"),
      text: stringField(result.payload, "text"),
      youtubeUrl: stringField(result.payload, "youtubeUrl"),
      score: result.score,
    }));
  }
}
