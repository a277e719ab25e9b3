/**
 * Consolidated Zod schemas for all MCP tools
 *
 * Note: Schemas are exported as plain objects (not wrapped in z.object()) because
 * McpServer.registerTool() expects schemas in this format. The SDK internally
 * converts these to JSON Schema for the MCP protocol.
 */

import { z } from "zod";

const incremental = z
  .boolean()
  .optional()
  .describe("Skip items a previous run already completed (default: false, which starts over)");

const limit = z.number().int().positive().optional().describe("Process at most this many pending items");

export const ChunkTranscriptsSchema = {
  incremental,
  limit: limit.describe("Process at most this many pending transcripts"),
};

export const GenerateEmbeddingsSchema = {
  incremental,
  limit: limit.describe("Embed at most this many pending chunks"),
  batchSize: z.number().int().positive().max(2048).optional().describe("Chunks per embedding API call"),
};

export const UploadEmbeddingsSchema = {
  incremental,
  limit: limit.describe("Upload at most this many pending chunks"),
  dryRun: z.boolean().optional().describe("Report what would be uploaded without writing to Qdrant"),
};

export const DeleteNamespaceSchema = {
  confirm: z.literal(true).describe("Must be true: deletes every point in the configured namespace"),
};

export const SearchTranscriptsSchema = {
  query: z.string().min(1).describe("Natural language question or topic"),
  limit: z.number().int().positive().max(50).optional().describe("Maximum number of results (default: 5)"),
  videoId: z.string().optional().describe("Only search within this video"),
};

export const GetPipelineStatusSchema = {};
