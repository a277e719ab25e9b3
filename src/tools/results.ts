import { errorMessage } from "../transcripts/errors.js";

export interface ErrorResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError: true;
}

/**
 * Tool result for a run that could not start or stopped on a fatal error.
 */
export function errorResult(error: unknown): ErrorResult {
  const prefix = error instanceof Error && error.name !== "Error" ? `${error.name}: ` : "Error: ";
  console.error(`[Tools] ${prefix}${errorMessage(error)}`);
  return {
    content: [{ type: "text", text: `${prefix}${errorMessage(error)}` }],
    isError: true,
  };
}
