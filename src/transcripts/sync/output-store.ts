/**
 * OutputStore - Persisted hand-off document between pipeline stages
 *
 * A document holds a creation timestamp, aggregate counts and the ordered
 * record list. Records are keyed by work item id so a resumed run replaces
 * rather than duplicates an item it processes again.
 */

import { promises as fs } from "node:fs";

import { ChunksDocumentSchema, EmbeddingsDocumentSchema } from "../schemas.js";
import type { EmbeddedChunk, SegmenterConfig, TranscriptChunk } from "../types.js";
import { writeFileAtomic } from "./atomic-write.js";
import { isNotFound } from "./progress-store.js";

export interface StoredDocument<R> {
  createdAt: string | null;
  records: Map<string, R>;
}

/**
 * Maps between keyed records and the document written to disk.
 */
export interface DocumentCodec<R> {
  encode(records: R[], createdAt: string): unknown;
  decode(document: unknown): { createdAt: string; entries: Array<[string, R]> };
}

/**
 * Where the runner keeps its accumulated output.
 */
export interface OutputStore<R> {
  load(): Promise<StoredDocument<R>>;
  save(records: Map<string, R>): Promise<void>;
}

export class JsonDocumentStore<R> implements OutputStore<R> {
  constructor(
    private readonly documentPath: string,
    private readonly codec: DocumentCodec<R>,
    private readonly indent?: number,
  ) {}

  getPath(): string {
    return this.documentPath;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.documentPath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Load the document. A missing file yields an empty record set.
   * @throws Error if the file exists but does not match the codec's layout
   */
  async load(): Promise<StoredDocument<R>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.documentPath, "utf-8");
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return { createdAt: null, records: new Map() };
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Output document ${this.documentPath} is not valid JSON: ${String(error)}`);
    }

    const { createdAt, entries } = this.codec.decode(data);
    return { createdAt, records: new Map(entries) };
  }

  async save(records: Map<string, R>): Promise<void> {
    const document = this.codec.encode(Array.from(records.values()), new Date().toISOString());
    await writeFileAtomic(this.documentPath, JSON.stringify(document, null, this.indent));
  }
}

function countVideos(chunks: Array<{ sourceId: string }>): number {
  return new Set(chunks.map((c) => c.sourceId)).size;
}

/**
 * Chunks document, keyed per video: each record is one video's chunk list.
 */
export function createChunksCodec(context: {
  channelDisplayName: string;
  segmenter: SegmenterConfig;
}): DocumentCodec<TranscriptChunk[]> {
  return {
    encode(records, createdAt) {
      const chunks = records.flat();
      return {
        createdAt,
        channelDisplayName: context.channelDisplayName,
        totalChunks: chunks.length,
        totalVideos: countVideos(chunks),
        chunkingParameters: { ...context.segmenter },
        chunks,
      };
    },
    decode(document) {
      const parsed = ChunksDocumentSchema.safeParse(document);
      if (!parsed.success) {
        throw new Error(`Chunks document has an unexpected layout: ${parsed.error.message}`);
      }

      const grouped = new Map<string, TranscriptChunk[]>();
      for (const chunk of parsed.data.chunks) {
        const list = grouped.get(chunk.sourceId);
        if (list) {
          list.push(chunk);
        } else {
          grouped.set(chunk.sourceId, [chunk]);
        }
      }
      return { createdAt: parsed.data.createdAt, entries: Array.from(grouped.entries()) };
    },
  };
}

/**
 * Embeddings document, keyed per chunk id.
 */
export function createEmbeddingsCodec(context: {
  channelDisplayName: string;
  model: string;
  dimensions: number;
}): DocumentCodec<EmbeddedChunk> {
  return {
    encode(records, createdAt) {
      return {
        createdAt,
        channelDisplayName: context.channelDisplayName,
        model: context.model,
        dimensions: context.dimensions,
        totalChunks: records.length,
        totalVideos: countVideos(records),
        chunks: records,
      };
    },
    decode(document) {
      const parsed = EmbeddingsDocumentSchema.safeParse(document);
      if (!parsed.success) {
        throw new Error(`Embeddings document has an unexpected layout: ${parsed.error.message}`);
      }
      return {
        createdAt: parsed.data.createdAt,
        entries: parsed.data.chunks.map((chunk): [string, EmbeddedChunk] => [chunk.chunkId, chunk]),
      };
    },
  };
}
