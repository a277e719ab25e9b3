/**
 * ProgressStore - Durable record of which work items a stage has completed or failed
 *
 * The persisted file is the only thing a resumed run trusts. Writes go to a
 * temp file that is renamed over the target, so a crash mid-write leaves the
 * previous state readable.
 *
 * Two on-disk layouts are understood:
 * - "standard":  { completedIds: [...], failedIds: [...] }
 * - "chunking":  { processed: [...], failed: [...] }  (per-video chunking progress)
 */

import { promises as fs } from "node:fs";
import { z } from "zod";

import { writeFileAtomic } from "./atomic-write.js";

export type ProgressFormat = "standard" | "chunking";

export interface ProgressState {
  completed: Set<string>;
  failed: Set<string>;
}

const StandardProgressSchema = z.object({
  completedIds: z.array(z.string()),
  failedIds: z.array(z.string()).default([]),
});

const ChunkingProgressSchema = z.object({
  processed: z.array(z.string()),
  failed: z.array(z.string()).default([]),
});

export function createProgressState(): ProgressState {
  return { completed: new Set(), failed: new Set() };
}

/**
 * Record a success. Clears any earlier failure for the same id.
 */
export function markCompleted(state: ProgressState, id: string): void {
  state.failed.delete(id);
  state.completed.add(id);
}

/**
 * Record a failure. The id becomes eligible for retry on the next incremental run.
 */
export function markFailed(state: ProgressState, id: string): void {
  state.completed.delete(id);
  state.failed.add(id);
}

/**
 * Where a runner persists its progress.
 */
export interface ProgressStorage {
  load(): Promise<ProgressState>;
  save(state: ProgressState): Promise<void>;
}

export class ProgressStore implements ProgressStorage {
  constructor(
    private readonly progressPath: string,
    private readonly format: ProgressFormat = "standard",
  ) {}

  getPath(): string {
    return this.progressPath;
  }

  /**
   * Load persisted progress. Returns an empty state when nothing was saved yet.
   * @throws Error if the file exists but cannot be parsed
   */
  async load(): Promise<ProgressState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.progressPath, "utf-8");
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return createProgressState();
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Progress file ${this.progressPath} is not valid JSON: ${String(error)}`);
    }

    const standard = StandardProgressSchema.safeParse(data);
    if (standard.success) {
      return toState(standard.data.completedIds, standard.data.failedIds);
    }

    const chunking = ChunkingProgressSchema.safeParse(data);
    if (chunking.success) {
      return toState(chunking.data.processed, chunking.data.failed);
    }

    throw new Error(`Progress file ${this.progressPath} has an unrecognized layout`);
  }

  /**
   * Atomically overwrite the persisted progress.
   */
  async save(state: ProgressState): Promise<void> {
    const completed = Array.from(state.completed);
    const failed = Array.from(state.failed).filter((id) => !state.completed.has(id));

    const document =
      this.format === "chunking"
        ? { processed: completed, failed }
        : { completedIds: completed, failedIds: failed };

    await writeFileAtomic(this.progressPath, JSON.stringify(document, null, 2));
  }

  async delete(): Promise<void> {
    try {
      await fs.unlink(this.progressPath);
    } catch (error: unknown) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }
}

function toState(completedIds: string[], failedIds: string[]): ProgressState {
  const state = createProgressState();
  for (const id of failedIds) {
    state.failed.add(id);
  }
  for (const id of completedIds) {
    markCompleted(state, id);
  }
  return state;
}

export function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
