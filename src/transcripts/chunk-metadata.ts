/**
 * Derived chunk fields: readable timestamps, deep links and the embedding text.
 */

import { formatTimestamp } from "./segmenter.js";
import type { Chunk, SourceMetadata, Transcript, TranscriptChunk, VideoInfo } from "./types.js";

export function videoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/**
 * Deep link that starts playback at the given second.
 */
export function timestampedUrl(videoId: string, startSeconds: number): string {
  return `${videoUrl(videoId)}&t=${Math.floor(startSeconds)}s`;
}

export function buildSourceMetadata(
  transcript: Transcript,
  info: VideoInfo | undefined,
  channelDisplayName: string,
): SourceMetadata {
  return {
    videoTitle: transcript.title || info?.title || "",
    channel: transcript.channel || info?.channel || channelDisplayName,
    videoDurationSeconds: transcript.durationSeconds || info?.durationSeconds || 0,
    thumbnailUrl: info?.thumbnailUrl ?? "",
  };
}

function metadataString(metadata: SourceMetadata, key: string): string {
  const value = metadata[key];
  return typeof value === "string" ? value : "";
}

export function enrichChunk(chunk: Chunk): TranscriptChunk {
  const startTimestamp = formatTimestamp(chunk.start);
  const title = metadataString(chunk.sourceMetadata, "videoTitle");
  const header = title ? `${title} | ${startTimestamp}` : startTimestamp;

  return {
    ...chunk,
    startTimestamp,
    endTimestamp: formatTimestamp(chunk.end),
    durationSeconds: chunk.end - chunk.start,
    youtubeUrl: timestampedUrl(chunk.sourceId, chunk.start),
    videoUrl: videoUrl(chunk.sourceId),
    embeddingText: `${header}\n\n${chunk.text}`,
  };
}
