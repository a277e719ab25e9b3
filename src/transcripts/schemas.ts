/**
 * Zod schemas for the JSON files the pipeline reads.
 *
 * Transcript and metadata files come from the upstream fetch steps and use
 * snake_case keys; the chunk and embedding documents are written by this
 * project and use camelCase.
 */

import { z } from "zod";

export const RawSegmentFileSchema = z.object({
  text: z.string(),
  start: z.number(),
  duration: z.number().optional(),
});

export const TranscriptFileSchema = z.object({
  video_id: z.string().min(1),
  title: z.string().optional(),
  channel: z.string().optional(),
  duration_seconds: z.number().optional(),
  segments: z.array(RawSegmentFileSchema).default([]),
});

export const VideoMetadataFileSchema = z.object({
  videos: z
    .array(
      z
        .object({
          video_id: z.string(),
          title: z.string().optional(),
          channel: z.string().optional(),
          thumbnail_url: z.string().optional(),
          duration_seconds: z.number().optional(),
        })
        .passthrough(),
    )
    .default([]),
});

export const TranscriptChunkSchema = z.object({
  chunkId: z.string(),
  sourceId: z.string(),
  index: z.number().int().nonnegative(),
  text: z.string(),
  start: z.number(),
  end: z.number(),
  sourceMetadata: z.record(z.union([z.string(), z.number()])),
  startTimestamp: z.string(),
  endTimestamp: z.string(),
  durationSeconds: z.number(),
  youtubeUrl: z.string(),
  videoUrl: z.string(),
  embeddingText: z.string(),
});

export const EmbeddedChunkSchema = TranscriptChunkSchema.extend({
  embedding: z.array(z.number()),
});

export const ChunksDocumentSchema = z.object({
  createdAt: z.string(),
  chunks: z.array(TranscriptChunkSchema),
});

export const EmbeddingsDocumentSchema = z.object({
  createdAt: z.string(),
  chunks: z.array(EmbeddedChunkSchema),
});

export type TranscriptFile = z.infer<typeof TranscriptFileSchema>;
export type VideoMetadataFile = z.infer<typeof VideoMetadataFileSchema>;
