/**
 * Error types raised by the transcript pipeline stages.
 */

/**
 * A required upstream artifact is missing. Fatal for the run.
 */
export class InputMissingError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "InputMissingError";
    this.path = path;
  }
}

/**
 * One source's data cannot be chunked. Recorded against that source only.
 */
export class MalformedTranscriptError extends Error {
  public readonly sourceId: string;

  constructor(sourceId: string, message: string) {
    super(`${sourceId}: ${message}`);
    this.name = "MalformedTranscriptError";
    this.sourceId = sourceId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
