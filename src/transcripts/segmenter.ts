/**
 * Segmenter - Greedy duration-bounded accumulator for caption fragments
 *
 * Walks the fragments of one source once, in order, and groups them into
 * chunks that close once they reach the target duration, or earlier when the
 * next fragment would push them past the maximum. A short trailing chunk is
 * folded into the previous one.
 */

import { MalformedTranscriptError } from "./errors.js";
import type { Chunk, RawSegment, SegmenterConfig, SourceMetadata } from "./types.js";

export const DEFAULT_SEGMENTER_CONFIG: SegmenterConfig = {
  targetDuration: 75,
  minDuration: 45,
  maxDuration: 120,
};

interface OpenChunk {
  texts: string[];
  start: number;
  span: number;
}

export function validateSegmenterConfig(config: SegmenterConfig): void {
  const { targetDuration, minDuration, maxDuration } = config;
  if (!(minDuration > 0 && minDuration <= targetDuration && targetDuration <= maxDuration)) {
    throw new RangeError(
      `Invalid chunk durations: expected 0 < min (${minDuration}) <= target (${targetDuration}) <= max (${maxDuration})`,
    );
  }
}

export function formatChunkId(sourceId: string, index: number): string {
  return `${sourceId}-${index.toString().padStart(4, "0")}`;
}

/**
 * Join fragment texts with single spaces and collapse whitespace runs.
 */
export function normalizeText(texts: string[]): string {
  return texts.join(" ").split(/\s+/).filter(Boolean).join(" ");
}

/**
 * Seconds to `M:SS`, or `H:MM:SS` from one hour on.
 */
export function formatTimestamp(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  if (hours > 0) {
    return `${hours}:${minutes.toString().padStart(2, "0")}:${secs.toString().padStart(2, "0")}`;
  }
  return `${minutes}:${secs.toString().padStart(2, "0")}`;
}

function assertWellFormed(sourceId: string, segments: RawSegment[]): void {
  let previousStart = -Infinity;
  segments.forEach((segment, i) => {
    if (!Number.isFinite(segment.start) || segment.start < 0) {
      throw new MalformedTranscriptError(sourceId, `fragment ${i} has invalid start ${segment.start}`);
    }
    if (!Number.isFinite(segment.duration) || segment.duration < 0) {
      throw new MalformedTranscriptError(sourceId, `fragment ${i} has invalid duration ${segment.duration}`);
    }
    if (segment.start < previousStart) {
      throw new MalformedTranscriptError(
        sourceId,
        `fragment ${i} starts at ${segment.start}s, before the previous fragment (${previousStart}s)`,
      );
    }
    previousStart = segment.start;
  });
}

/**
 * Split one source's ordered fragments into chunks.
 *
 * @throws RangeError when the durations are inconsistent
 * @throws MalformedTranscriptError when fragments are out of order or carry invalid times
 */
export function segment(
  sourceId: string,
  segments: RawSegment[],
  config: SegmenterConfig = DEFAULT_SEGMENTER_CONFIG,
  sourceMetadata: SourceMetadata = {},
): Chunk[] {
  validateSegmenterConfig(config);
  assertWellFormed(sourceId, segments);

  const { targetDuration, minDuration, maxDuration } = config;
  const chunks: Chunk[] = [];
  let open: OpenChunk | null = null;

  const emit = (chunk: OpenChunk, end: number): void => {
    const index = chunks.length;
    chunks.push({
      chunkId: formatChunkId(sourceId, index),
      sourceId,
      index,
      text: normalizeText(chunk.texts),
      start: chunk.start,
      end,
      sourceMetadata: { ...sourceMetadata },
    });
  };

  for (const fragment of segments) {
    const text = fragment.text.trim();
    if (!text) {
      continue;
    }

    if (!open) {
      open = { texts: [text], start: fragment.start, span: fragment.duration };
      continue;
    }

    const potentialSpan = fragment.start + fragment.duration - open.start;
    // Closing at a fragment that starts with the chunk would leave an empty time range
    const canClose = fragment.start > open.start;
    const reachedTarget = open.span >= targetDuration;
    const wouldExceedMax = potentialSpan > maxDuration;

    if (canClose && (reachedTarget || wouldExceedMax)) {
      emit(open, fragment.start);
      open = { texts: [text], start: fragment.start, span: fragment.duration };
    } else {
      open.texts.push(text);
      open.span = potentialSpan;
    }
  }

  if (!open) {
    return chunks;
  }

  const end = open.start + open.span;
  const previous = chunks[chunks.length - 1];

  if (open.span >= minDuration || !previous) {
    emit(open, end);
  } else {
    previous.text = normalizeText([previous.text, ...open.texts]);
    previous.end = end;
  }

  return chunks;
}
