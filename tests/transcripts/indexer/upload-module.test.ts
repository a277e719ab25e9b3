import { promises as fs } from "node:fs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { normalizeId, QdrantManager } from "../../../src/qdrant/client.js";
import { InputMissingError } from "../../../src/transcripts/errors.js";
import { openStageStores, resolveStagePaths, type StageStores } from "../../../src/transcripts/indexer/shared.js";
import { buildPointPayload, CONTENT_TYPE, UploadModule } from "../../../src/transcripts/indexer/upload-module.js";
import type { EmbeddedChunk, TranscriptConfig } from "../../../src/transcripts/types.js";
import { mockQdrantStorage } from "../../mocks/qdrant-client.js";
import {
  cleanupTempDir,
  createTempDataDir,
  defaultTestConfig,
  makeEmbeddedChunk,
  MockEmbeddingProvider,
  readJson,
} from "./test-helpers.js";

vi.mock("@qdrant/js-client-rest", async () => {
  const { setupQdrantClientMock, mockQdrantStorage } = await import("../../mocks/qdrant-client.js");
  return setupQdrantClientMock(mockQdrantStorage);
});

const PAYLOAD_KEYS = [
  "namespace",
  "chunkId",
  "videoId",
  "chunkIndex",
  "text",
  "startTime",
  "endTime",
  "startTimestamp",
  "endTimestamp",
  "durationSeconds",
  "videoTitle",
  "channel",
  "videoDurationSeconds",
  "thumbnailUrl",
  "youtubeUrl",
  "videoUrl",
  "contentType",
];

describe("UploadModule", () => {
  let dataDir: string;
  let config: TranscriptConfig;
  let stores: StageStores;
  let upload: UploadModule;

  const seedEmbeddings = async (chunks: EmbeddedChunk[] = [
    makeEmbeddedChunk("v1", 0),
    makeEmbeddedChunk("v1", 1),
    makeEmbeddedChunk("v2", 0),
  ]) => {
    await stores.embeddings.save(new Map(chunks.map((chunk) => [chunk.chunkId, chunk])));
  };

  const namespaceOf = (point: { payload: Record<string, unknown> }) => point.payload.namespace;

  beforeEach(async () => {
    mockQdrantStorage.clear();
    dataDir = await createTempDataDir();
    config = defaultTestConfig(dataDir);
    stores = openStageStores(config, new MockEmbeddingProvider());
    upload = new UploadModule(new QdrantManager("http://localhost:6333"), config, stores);
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanupTempDir(dataDir);
  });

  describe("uploadEmbeddings", () => {
    it("should throw when the embeddings file is missing", async () => {
      await expect(upload.uploadEmbeddings()).rejects.toThrow(InputMissingError);
      await expect(upload.uploadEmbeddings()).rejects.toThrow(
        `Embeddings file not found: ${resolveStagePaths(dataDir).embeddingsFile}. Run generate_embeddings first.`,
      );
    });

    it("should create the collection and upsert every chunk in batches", async () => {
      await seedEmbeddings();

      const stats = await upload.uploadEmbeddings();

      expect(stats).toMatchObject({
        chunksToUpload: 3,
        pointsUploaded: 3,
        pointsFailed: 0,
        namespacePointsBefore: 0,
        namespacePointsAfter: 3,
        status: "completed",
        failedChunkIds: [],
      });
      expect(mockQdrantStorage.upsertCalls).toBe(2);

      const collection = mockQdrantStorage.collections.get("test_transcripts");
      expect(collection?.vectorSize).toBe(4);
      expect(collection?.distance).toBe("Cosine");
      expect(Array.from(collection?.payloadIndexes ?? []).sort()).toEqual(["namespace", "videoId"]);

      const points = mockQdrantStorage.getPoints("test_transcripts");
      expect(points.map((p) => p.id)).toEqual(["v1-0000", "v1-0001", "v2-0000"].map(normalizeId));
      const first = points[0];
      expect(first?.payload).toEqual(buildPointPayload(makeEmbeddedChunk("v1", 0), "test-ns", "Test Channel"));
      expect(first?.vector).toEqual([0.1, 0.2, 0.3, 0.4]);

      expect(await readJson(resolveStagePaths(dataDir).uploadProgressFile)).toEqual({
        completedIds: ["v1-0000", "v1-0001", "v2-0000"],
        failedIds: [],
      });
    });

    it("should not duplicate points when uploading again", async () => {
      await seedEmbeddings();
      await upload.uploadEmbeddings();

      const stats = await upload.uploadEmbeddings();

      expect(stats).toMatchObject({ namespacePointsBefore: 3, namespacePointsAfter: 3, pointsUploaded: 3 });
      expect(mockQdrantStorage.getPoints("test_transcripts")).toHaveLength(3);
    });

    it("should fail only the batch whose upsert is rejected and retry it on resume", async () => {
      await seedEmbeddings();
      mockQdrantStorage.nextUpsertError = { status: 500, data: { status: { error: "service unavailable" } } };

      const stats = await upload.uploadEmbeddings({ incremental: true });

      expect(stats).toMatchObject({
        pointsUploaded: 1,
        pointsFailed: 2,
        namespacePointsAfter: 1,
        status: "partial",
        failedChunkIds: ["v1-0000", "v1-0001"],
      });
      expect(console.error).toHaveBeenCalledWith(
        '[UploadModule] [Batch 1/2] ✗ 2 items failed: Failed to add points to collection "test_transcripts": service unavailable',
      );

      const resumed = await upload.uploadEmbeddings({ incremental: true });

      expect(resumed).toMatchObject({ chunksToUpload: 2, pointsUploaded: 2, namespacePointsAfter: 3, status: "completed" });
    });

    it("should refuse a collection with a different vector size", async () => {
      await seedEmbeddings();
      await new QdrantManager().createCollection("test_transcripts", 8);

      await expect(upload.uploadEmbeddings()).rejects.toThrow(
        'Collection "test_transcripts" stores 8-dimensional vectors, embeddings have 4',
      );
    });

    it("should preview without touching Qdrant on a dry run", async () => {
      await seedEmbeddings();

      const stats = await upload.uploadEmbeddings({ dryRun: true, limit: 2 });

      expect(stats).toMatchObject({
        chunksToUpload: 2,
        pointsUploaded: 0,
        status: "dry-run",
        sample: { id: "v1-0000", dimensions: 4, metadataKeys: PAYLOAD_KEYS },
      });
      expect(mockQdrantStorage.hasCollection("test_transcripts")).toBe(false);
      expect(mockQdrantStorage.upsertCalls).toBe(0);
    });

    it("should preview nothing once an incremental upload is complete", async () => {
      await seedEmbeddings();
      await upload.uploadEmbeddings({ incremental: true });

      const stats = await upload.uploadEmbeddings({ dryRun: true, incremental: true });

      expect(stats.chunksToUpload).toBe(0);
      expect(stats.sample).toBeUndefined();
    });

    it("should return noop for an empty embeddings document", async () => {
      await seedEmbeddings([]);

      const stats = await upload.uploadEmbeddings();

      expect(stats.status).toBe("noop");
      expect(mockQdrantStorage.hasCollection("test_transcripts")).toBe(false);
    });

    it("should forget earlier upload progress when a full upload finds no chunks", async () => {
      await seedEmbeddings();
      await upload.uploadEmbeddings();
      await seedEmbeddings([]);

      const stats = await upload.uploadEmbeddings();

      expect(stats.status).toBe("noop");
      await expect(fs.access(resolveStagePaths(dataDir).uploadProgressFile)).rejects.toMatchObject({ code: "ENOENT" });
    });
  });

  describe("deleteNamespace", () => {
    it("should delete only points of the configured namespace and forget upload progress", async () => {
      await seedEmbeddings();
      await upload.uploadEmbeddings();
      mockQdrantStorage.getPoints("test_transcripts").push({
        id: "other-point",
        vector: [0, 0, 0, 0],
        payload: { namespace: "other" },
      });

      const result = await upload.deleteNamespace();

      expect(result).toEqual({ namespace: "test-ns", collectionName: "test_transcripts", pointsDeleted: 3 });
      expect(mockQdrantStorage.getPoints("test_transcripts").map(namespaceOf)).toEqual(["other"]);
      await expect(fs.access(resolveStagePaths(dataDir).uploadProgressFile)).rejects.toMatchObject({ code: "ENOENT" });
    });

    it("should report zero when the collection does not exist", async () => {
      const result = await upload.deleteNamespace();

      expect(result.pointsDeleted).toBe(0);
    });
  });
});

describe("buildPointPayload", () => {
  it("should truncate long text and titles", () => {
    const chunk = { ...makeEmbeddedChunk("v1", 0, [1]), text: "x".repeat(1001) };
    chunk.sourceMetadata = { ...chunk.sourceMetadata, videoTitle: "t".repeat(250) };

    const payload = buildPointPayload(chunk, "ns", "Fallback");

    expect(payload.text).toBe(`${"x".repeat(1000)}...`);
    expect(payload.videoTitle).toBe("t".repeat(200));
    expect(payload.contentType).toBe(CONTENT_TYPE);
  });

  it("should fall back to the channel display name", () => {
    const chunk = makeEmbeddedChunk("v1", 0);
    chunk.sourceMetadata = {};

    expect(buildPointPayload(chunk, "ns", "Fallback")).toMatchObject({
      channel: "Fallback",
      videoTitle: "",
      videoDurationSeconds: 0,
      thumbnailUrl: "",
    });
  });
});
