/**
 * Transcript search tool registration
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { TranscriptIndexer } from "../transcripts/indexer.js";
import type { TranscriptSearchResult } from "../transcripts/types.js";
import { errorResult } from "./results.js";
import * as schemas from "./schemas.js";

export interface SearchToolDependencies {
  indexer: TranscriptIndexer;
}

export function formatSearchResults(query: string, results: TranscriptSearchResult[]): string {
  if (results.length === 0) {
    return `No transcript chunks found for "${query}".`;
  }
  return results
    .map(
      (r, i) =>
        `${i + 1}. ${r.videoTitle || r.videoId} [${r.startTimestamp}-${r.endTimestamp}] (score ${r.score.toFixed(3)})\n` +
        `${r.youtubeUrl}\n${r.text}`,
    )
    .join("\n\n");
}

export function registerSearchTools(server: McpServer, deps: SearchToolDependencies): void {
  const { indexer } = deps;

  // search_transcripts
  server.registerTool(
    "search_transcripts",
    {
      title: "Search Transcripts",
      description:
        "Search uploaded transcript chunks with a natural language query. " +
        "Each hit links to the exact moment in the video.",
      inputSchema: schemas.SearchTranscriptsSchema,
    },
    async ({ query, limit, videoId }) => {
      try {
        const results = await indexer.searchTranscripts(query, { limit, videoId });
        return {
          content: [{ type: "text", text: formatSearchResults(query, results) }],
        };
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
