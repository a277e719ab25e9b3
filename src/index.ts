#!/usr/bin/env node

/**
 * Transcript search MCP server (stdio)
 *
 * stdout carries the MCP protocol; all logging goes to stderr.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { ConfigError, loadConfig } from "./config.js";
import { EmbeddingProviderFactory } from "./embeddings/factory.js";
import { QdrantManager } from "./qdrant/client.js";
import { registerPipelineTools } from "./tools/pipeline.js";
import { registerSearchTools } from "./tools/search.js";
import { TranscriptIndexer } from "./transcripts/indexer.js";
import { pipelineLog } from "./transcripts/pipeline/debug-logger.js";

async function main(): Promise<void> {
  const config = loadConfig();

  const qdrant = new QdrantManager(config.qdrant.url, config.qdrant.apiKey);
  const embeddings = EmbeddingProviderFactory.create(config.embedding);
  const indexer = new TranscriptIndexer(qdrant, embeddings, config.transcripts);

  const server = new McpServer({
    name: "transcript-search-mcp",
    version: "0.1.0",
  });

  registerPipelineTools(server, { indexer });
  registerSearchTools(server, { indexer });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error(
    `[Server] transcript-search-mcp ready (data: ${config.transcripts.dataDir}, ` +
      `embeddings: ${config.embedding.provider}/${embeddings.getModel()}, ` +
      `qdrant: ${config.qdrant.url} collection "${config.transcripts.collectionName}" namespace "${config.transcripts.namespace}")`,
  );
  const logPath = pipelineLog.getLogPath();
  if (logPath) {
    console.error(`[Server] Debug log: ${logPath}`);
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`[Server] ${error.message}`);
  } else {
    console.error("[Server] Fatal error:", error);
  }
  process.exit(1);
});
