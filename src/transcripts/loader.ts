/**
 * Reading the upstream transcript and video-metadata files.
 */

import { promises as fs } from "node:fs";
import { basename, extname, join } from "node:path";

import { InputMissingError, MalformedTranscriptError, errorMessage } from "./errors.js";
import { TranscriptFileSchema, VideoMetadataFileSchema } from "./schemas.js";
import { isNotFound } from "./sync/progress-store.js";
import type { Transcript, VideoInfo } from "./types.js";

/** Caption fragments without a duration are assumed to last this long (seconds) */
export const DEFAULT_FRAGMENT_DURATION = 2.0;

/** Written by the caption fetch step next to the transcripts; not a transcript */
const FETCH_PROGRESS_FILE = "progress.json";

export interface TranscriptFileEntry {
  /** File stem, used as the work item id */
  id: string;
  path: string;
}

/**
 * List transcript files, sorted by name.
 * @throws InputMissingError if the directory does not exist
 */
export async function listTranscriptFiles(transcriptsDir: string): Promise<TranscriptFileEntry[]> {
  let names: string[];
  try {
    names = await fs.readdir(transcriptsDir);
  } catch (error: unknown) {
    if (isNotFound(error)) {
      throw new InputMissingError(`Transcripts directory not found: ${transcriptsDir}`, transcriptsDir);
    }
    throw error;
  }

  return names
    .filter((name) => extname(name) === ".json" && name !== FETCH_PROGRESS_FILE)
    .sort()
    .map((name) => ({ id: basename(name, ".json"), path: join(transcriptsDir, name) }));
}

/**
 * Read and validate one transcript file.
 * @throws MalformedTranscriptError if the file is not valid JSON or not a transcript
 */
export async function readTranscript(entry: TranscriptFileEntry): Promise<Transcript> {
  const raw = await fs.readFile(entry.path, "utf-8");

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new MalformedTranscriptError(entry.id, `invalid JSON (${errorMessage(error)})`);
  }

  const parsed = TranscriptFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new MalformedTranscriptError(entry.id, `not a transcript file${where}: ${issue?.message ?? "invalid"}`);
  }

  const file = parsed.data;
  // Progress and chunk output are keyed by the file stem
  if (file.video_id !== entry.id) {
    throw new MalformedTranscriptError(entry.id, `video_id "${file.video_id}" does not match the file name`);
  }
  return {
    videoId: file.video_id,
    title: file.title ?? "",
    channel: file.channel ?? "",
    durationSeconds: file.duration_seconds ?? 0,
    segments: file.segments.map((s) => ({
      text: s.text,
      start: s.start,
      duration: s.duration ?? DEFAULT_FRAGMENT_DURATION,
    })),
  };
}

/**
 * Load per-video metadata keyed by video id. A missing file yields an empty map.
 * @throws Error if the file exists but is unreadable
 */
export async function loadVideoMetadata(metadataPath: string): Promise<Map<string, VideoInfo>> {
  let raw: string;
  try {
    raw = await fs.readFile(metadataPath, "utf-8");
  } catch (error: unknown) {
    if (isNotFound(error)) {
      console.error(`[TranscriptLoader] No video metadata at ${metadataPath}, continuing without thumbnails`);
      return new Map();
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Video metadata ${metadataPath} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = VideoMetadataFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Video metadata ${metadataPath} has an unexpected layout: ${parsed.error.message}`);
  }

  const videos = new Map<string, VideoInfo>();
  for (const video of parsed.data.videos) {
    videos.set(video.video_id, {
      videoId: video.video_id,
      title: video.title,
      channel: video.channel,
      thumbnailUrl: video.thumbnail_url,
      durationSeconds: video.duration_seconds,
    });
  }
  return videos;
}
