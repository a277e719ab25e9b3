/**
 * Type definitions for transcript chunking and indexing
 */

/**
 * One raw timed caption fragment, as delivered by the caption source.
 * Times are seconds from the start of the video.
 */
export interface RawSegment {
  text: string;
  start: number;
  duration: number;
}

/**
 * Display metadata carried through from the source video.
 * Opaque to the segmenter; copied onto every chunk of the source.
 */
export type SourceMetadata = Record<string, string | number>;

export interface Chunk {
  /** `{sourceId}-{index:04d}` */
  chunkId: string;
  sourceId: string;
  index: number;
  /** Whitespace-normalized, never empty */
  text: string;
  start: number;
  end: number;
  sourceMetadata: SourceMetadata;
}

export interface SegmenterConfig {
  targetDuration: number;
  minDuration: number;
  maxDuration: number;
}

/**
 * Chunk with the derived fields used for display, deep-linking and embedding.
 */
export interface TranscriptChunk extends Chunk {
  startTimestamp: string;
  endTimestamp: string;
  durationSeconds: number;
  youtubeUrl: string;
  videoUrl: string;
  /** Text sent to the embedding model: title and start time, then the chunk text */
  embeddingText: string;
}

export interface EmbeddedChunk extends TranscriptChunk {
  embedding: number[];
}

/**
 * Per-video information from the metadata file, merged into chunk metadata.
 */
export interface VideoInfo {
  videoId: string;
  title?: string;
  channel?: string;
  thumbnailUrl?: string;
  durationSeconds?: number;
}

export interface Transcript {
  videoId: string;
  title: string;
  channel: string;
  durationSeconds: number;
  segments: RawSegment[];
}

export interface TranscriptConfig {
  /** Root directory holding transcripts/, chunks/, embeddings/ and upload/ */
  dataDir: string;
  channelDisplayName: string;

  // Chunking
  segmenter: SegmenterConfig;
  /** Videos between chunking checkpoints */
  chunkCheckpointEvery: number;

  // Embedding
  embeddingBatchSize: number;
  embeddingPricePerMillionTokens: number;

  // Upload
  collectionName: string;
  namespace: string;
  upsertBatchSize: number;

  // Runner
  checkpointEveryBatches: number;
  interBatchDelayMs: number;
}

export interface ChunkingOptions {
  incremental?: boolean;
  limit?: number;
}

export interface EmbeddingOptions {
  incremental?: boolean;
  limit?: number;
  batchSize?: number;
}

export interface UploadOptions {
  incremental?: boolean;
  limit?: number;
  dryRun?: boolean;
}

export interface DurationStats {
  avgSeconds: number;
  minSeconds: number;
  maxSeconds: number;
}

export interface ChunkingStats {
  videosFound: number;
  videosProcessed: number;
  videosFailed: number;
  chunksCreated: number;
  totalChunksInOutput: number;
  durationMs: number;
  status: "completed" | "partial" | "failed" | "noop";
  durations?: DurationStats;
  failedVideoIds: string[];
}

export interface EmbeddingStats {
  chunksToEmbed: number;
  chunksEmbedded: number;
  chunksFailed: number;
  totalEmbeddingsInOutput: number;
  estimatedTokens: number;
  estimatedCost: number;
  tokensUsed: number;
  actualCost: number;
  durationMs: number;
  throughputPerHour: number;
  status: "completed" | "partial" | "failed" | "noop";
  failedChunkIds: string[];
}

export interface UploadStats {
  chunksToUpload: number;
  pointsUploaded: number;
  pointsFailed: number;
  namespacePointsBefore: number;
  namespacePointsAfter: number;
  durationMs: number;
  status: "completed" | "partial" | "failed" | "noop" | "dry-run";
  failedChunkIds: string[];
  /** Set on dry runs */
  sample?: {
    id: string;
    dimensions: number;
    metadataKeys: string[];
  };
}

export interface TranscriptSearchResult {
  chunkId: string;
  videoId: string;
  videoTitle: string;
  startTimestamp: string;
  endTimestamp: string;
  text: string;
  youtubeUrl: string;
  score: number;
}

export interface SearchOptions {
  limit?: number;
  videoId?: string;
}

export interface StageStatus {
  completed: number;
  failed: number;
  recordsInOutput: number;
  outputCreatedAt?: string;
}

export interface PipelineStatus {
  chunking: StageStatus;
  embedding: StageStatus;
  upload: StageStatus;
}

export interface ProgressUpdate {
  phase: "chunking" | "embedding" | "uploading";
  current: number;
  total: number;
  percentage: number;
  message: string;
}

export type ProgressCallback = (progress: ProgressUpdate) => void;
