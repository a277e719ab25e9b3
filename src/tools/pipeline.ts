/**
 * Transcript pipeline tools registration
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { formatDuration } from "../transcripts/pipeline/debug-logger.js";
import type { TranscriptIndexer } from "../transcripts/indexer.js";
import type { ProgressUpdate, StageStatus } from "../transcripts/types.js";
import { errorResult } from "./results.js";
import * as schemas from "./schemas.js";

export interface PipelineToolDependencies {
  indexer: TranscriptIndexer;
}

const logProgress = (progress: ProgressUpdate): void => {
  console.error(`[${progress.phase}] ${progress.percentage}% - ${progress.message}`);
};

function failedIdsNote(ids: string[]): string {
  if (ids.length === 0) return "";
  const shown = ids.slice(0, 20).join(", ");
  const more = ids.length > 20 ? ` (+${ids.length - 20} more)` : "";
  return `\nFailed: ${shown}${more}\nRe-run with incremental=true to retry them.`;
}

function formatStage(name: string, stage: StageStatus, outputLabel: string): string {
  const created = stage.outputCreatedAt ? ` (written ${stage.outputCreatedAt})` : "";
  return `${name}: ${stage.completed} completed, ${stage.failed} failed, ${stage.recordsInOutput} ${outputLabel}${created}`;
}

export function registerPipelineTools(server: McpServer, deps: PipelineToolDependencies): void {
  const { indexer } = deps;

  // chunk_transcripts
  server.registerTool(
    "chunk_transcripts",
    {
      title: "Chunk Transcripts",
      description:
        "Split every transcript in DATA_DIR/transcripts into timestamped chunks of roughly TARGET_CHUNK_DURATION seconds. " +
        "Writes chunks/all_chunks.json. Use incremental=true to only chunk videos that were not chunked before.",
      inputSchema: schemas.ChunkTranscriptsSchema,
    },
    async ({ incremental, limit }) => {
      try {
        const stats = await indexer.chunkTranscripts({ incremental, limit }, logProgress);

        let text =
          stats.status === "noop"
            ? `No new transcripts to chunk (${stats.videosFound} found, ${stats.totalChunksInOutput} chunks in output)`
            : `Chunked ${stats.videosProcessed} videos into ${stats.chunksCreated} chunks in ${formatDuration(stats.durationMs)}. ` +
              `${stats.totalChunksInOutput} chunks in output.`;
        if (stats.durations) {
          const d = stats.durations;
          text += `\nChunk duration: avg ${d.avgSeconds.toFixed(1)}s, min ${d.minSeconds.toFixed(1)}s, max ${d.maxSeconds.toFixed(1)}s`;
        }
        text += failedIdsNote(stats.failedVideoIds);

        return {
          content: [{ type: "text", text }],
          isError: stats.status === "failed",
        };
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // generate_embeddings
  server.registerTool(
    "generate_embeddings",
    {
      title: "Generate Embeddings",
      description:
        "Embed every chunk of chunks/all_chunks.json with the configured embedding provider. " +
        "Writes embeddings/embeddings.json and checkpoints progress so an interrupted run can resume with incremental=true.",
      inputSchema: schemas.GenerateEmbeddingsSchema,
    },
    async ({ incremental, limit, batchSize }) => {
      try {
        const stats = await indexer.generateEmbeddings({ incremental, limit, batchSize }, logProgress);

        const text =
          stats.status === "noop"
            ? `No chunks left to embed (${stats.totalEmbeddingsInOutput} embeddings in output)`
            : `Embedded ${stats.chunksEmbedded}/${stats.chunksToEmbed} chunks in ${formatDuration(stats.durationMs)} ` +
              `(~${Math.round(stats.throughputPerHour)}/hr). ` +
              `Estimated usage: ~${stats.tokensUsed} tokens, ~$${stats.actualCost.toFixed(4)}. ` +
              `${stats.totalEmbeddingsInOutput} embeddings in output.` +
              failedIdsNote(stats.failedChunkIds);

        return {
          content: [{ type: "text", text }],
          isError: stats.status === "failed",
        };
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // upload_embeddings
  server.registerTool(
    "upload_embeddings",
    {
      title: "Upload Embeddings",
      description:
        "Upsert embedded chunks into the Qdrant collection under the configured namespace. " +
        "Creates the collection on first use. Use dryRun=true to preview.",
      inputSchema: schemas.UploadEmbeddingsSchema,
    },
    async ({ incremental, limit, dryRun }) => {
      try {
        const stats = await indexer.uploadEmbeddings({ incremental, limit, dryRun }, logProgress);

        let text: string;
        if (stats.status === "dry-run") {
          text = `Dry run: would upload ${stats.chunksToUpload} points.`;
          if (stats.sample) {
            text +=
              `\nSample point: ${stats.sample.id} (${stats.sample.dimensions} dimensions)` +
              `\nPayload keys: ${stats.sample.metadataKeys.join(", ")}`;
          }
        } else if (stats.status === "noop") {
          text = `Nothing to upload (${stats.namespacePointsAfter} points in namespace)`;
        } else {
          text =
            `Uploaded ${stats.pointsUploaded}/${stats.chunksToUpload} points in ${formatDuration(stats.durationMs)}. ` +
            `Namespace points: ${stats.namespacePointsBefore} → ${stats.namespacePointsAfter}.` +
            failedIdsNote(stats.failedChunkIds);
        }

        return {
          content: [{ type: "text", text }],
          isError: stats.status === "failed",
        };
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // delete_namespace
  server.registerTool(
    "delete_namespace",
    {
      title: "Delete Namespace",
      description:
        "Delete every point of the configured namespace from the Qdrant collection and reset upload progress. " +
        "Other namespaces in the collection are left untouched.",
      inputSchema: schemas.DeleteNamespaceSchema,
    },
    async () => {
      try {
        const result = await indexer.deleteNamespace();
        return {
          content: [
            {
              type: "text",
              text: `Deleted ${result.pointsDeleted} points in namespace "${result.namespace}" of collection "${result.collectionName}".`,
            },
          ],
        };
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // get_pipeline_status
  server.registerTool(
    "get_pipeline_status",
    {
      title: "Get Pipeline Status",
      description: "Show how far chunking, embedding and upload have progressed.",
      inputSchema: schemas.GetPipelineStatusSchema,
    },
    async () => {
      try {
        const status = await indexer.getStatus();
        const text = [
          formatStage("Chunking", status.chunking, "chunks in output"),
          formatStage("Embedding", status.embedding, "embeddings in output"),
          formatStage("Upload", status.upload, "points in namespace"),
        ].join("\n");
        return { content: [{ type: "text", text }] };
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
