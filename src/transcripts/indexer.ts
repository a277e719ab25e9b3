/**
 * TranscriptIndexer - Entry point for the chunk → embed → upload pipeline
 *
 * Each stage is its own module; this class wires them to one set of stores
 * so every stage reads and writes the same documents and progress files.
 */

import type { EmbeddingProvider } from "../embeddings/base.js";
import type { QdrantManager } from "../qdrant/client.js";
import { ChunkingModule } from "./indexer/chunking-module.js";
import { EmbeddingModule } from "./indexer/embedding-module.js";
import { openStageStores, type StageStores } from "./indexer/shared.js";
import { SearchModule } from "./indexer/search-module.js";
import { StatusModule } from "./indexer/status-module.js";
import { UploadModule, type DeleteNamespaceResult } from "./indexer/upload-module.js";
import type {
  ChunkingOptions,
  ChunkingStats,
  EmbeddingOptions,
  EmbeddingStats,
  PipelineStatus,
  ProgressCallback,
  SearchOptions,
  TranscriptConfig,
  TranscriptSearchResult,
  UploadOptions,
  UploadStats,
} from "./types.js";

export class TranscriptIndexer {
  private readonly stores: StageStores;
  private readonly chunking: ChunkingModule;
  private readonly embedding: EmbeddingModule;
  private readonly upload: UploadModule;
  private readonly search: SearchModule;
  private readonly status: StatusModule;

  constructor(qdrant: QdrantManager, embeddings: EmbeddingProvider, config: TranscriptConfig) {
    this.stores = openStageStores(config, embeddings);
    this.chunking = new ChunkingModule(config, this.stores);
    this.embedding = new EmbeddingModule(embeddings, config, this.stores);
    this.upload = new UploadModule(qdrant, config, this.stores);
    this.search = new SearchModule(qdrant, embeddings, config);
    this.status = new StatusModule(qdrant, config, this.stores);
  }

  async chunkTranscripts(options?: ChunkingOptions, progressCallback?: ProgressCallback): Promise<ChunkingStats> {
    return this.chunking.chunkTranscripts(options, progressCallback);
  }

  async generateEmbeddings(options?: EmbeddingOptions, progressCallback?: ProgressCallback): Promise<EmbeddingStats> {
    return this.embedding.generateEmbeddings(options, progressCallback);
  }

  async uploadEmbeddings(options?: UploadOptions, progressCallback?: ProgressCallback): Promise<UploadStats> {
    return this.upload.uploadEmbeddings(options, progressCallback);
  }

  async deleteNamespace(): Promise<DeleteNamespaceResult> {
    return this.upload.deleteNamespace();
  }

  async searchTranscripts(query: string, options?: SearchOptions): Promise<TranscriptSearchResult[]> {
    return this.search.searchTranscripts(query, options);
  }

  async getStatus(): Promise<PipelineStatus> {
    return this.status.getStatus();
  }
}
