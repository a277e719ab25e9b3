/**
 * OllamaEmbeddings - local embedding models through the /api/embed batch endpoint
 *
 * One HTTP request carries the whole batch; the response holds one vector per
 * input, in input order.
 */

import Bottleneck from "bottleneck";
import { z } from "zod";

import type { EmbeddingProvider, EmbeddingResult, RateLimitConfig } from "./base.js";

interface OllamaError {
  status?: number;
  message?: string;
}

const OllamaEmbedBatchResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
});

type OllamaEmbedBatchResponse = z.infer<typeof OllamaEmbedBatchResponseSchema>;

export class OllamaEmbeddings implements EmbeddingProvider {
  private readonly model: string;
  private readonly dimensions: number;
  private readonly limiter: Bottleneck;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;
  private readonly baseUrl: string;

  constructor(
    model = "nomic-embed-text",
    dimensions?: number,
    rateLimitConfig?: RateLimitConfig,
    baseUrl = "http://localhost:11434",
  ) {
    this.model = model;
    this.baseUrl = baseUrl;

    const defaultDimensions: Record<string, number> = {
      "nomic-embed-text": 768,
      "mxbai-embed-large": 1024,
      "all-minilm": 384,
    };

    this.dimensions = dimensions || defaultDimensions[model] || 768;

    // More lenient for local models
    const maxRequestsPerMinute = rateLimitConfig?.maxRequestsPerMinute || 1000;
    this.retryAttempts = rateLimitConfig?.retryAttempts ?? 3;
    this.retryDelayMs = rateLimitConfig?.retryDelayMs || 500;

    this.limiter = new Bottleneck({
      reservoir: maxRequestsPerMinute,
      reservoirRefreshAmount: maxRequestsPerMinute,
      reservoirRefreshInterval: 60 * 1000,
      maxConcurrent: 1,
      minTime: Math.floor((60 * 1000) / maxRequestsPerMinute),
    });
  }

  private isOllamaError(e: unknown): e is OllamaError {
    return typeof e === "object" && e !== null && ("status" in e || "message" in e);
  }

  private async retryWithBackoff<T>(fn: () => Promise<T>, attempt = 0): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      const apiError = this.isOllamaError(error) ? error : { status: 0, message: String(error) };

      const isRateLimitError =
        apiError.status === 429 ||
        (typeof apiError.message === "string" && apiError.message.toLowerCase().includes("rate limit"));

      if (isRateLimitError && attempt < this.retryAttempts) {
        const delayMs = this.retryDelayMs * Math.pow(2, attempt);
        const waitTimeSeconds = (delayMs / 1000).toFixed(1);
        console.error(
          `Rate limit reached. Retrying in ${waitTimeSeconds}s (attempt ${attempt + 1}/${this.retryAttempts})...`,
        );

        await new Promise((resolve) => setTimeout(resolve, delayMs));
        return this.retryWithBackoff(fn, attempt + 1);
      }

      if (isRateLimitError) {
        throw new Error(
          `Ollama API rate limit exceeded after ${this.retryAttempts} retry attempts. Please try again later or reduce request frequency.`,
        );
      }

      throw error;
    }
  }

  private async callBatchApi(texts: string[]): Promise<OllamaEmbedBatchResponse> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.model,
          input: texts,
        }),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : JSON.stringify(error);
      throw new Error(`Failed to call Ollama API at ${this.baseUrl} with model ${this.model}: ${reason}`);
    }

    if (!response.ok) {
      const errorBody = await response.text();
      const error: OllamaError = {
        status: response.status,
        message: `Ollama batch API error (${response.status}) for model "${this.model}": ${errorBody}`,
      };
      throw error;
    }

    const parsed = OllamaEmbedBatchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected Ollama response for model "${this.model}": ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    const [result] = await this.embedBatch([text]);
    if (!result) {
      throw new Error("No embeddings returned from Ollama API");
    }
    return result;
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) {
      return [];
    }

    return this.limiter.schedule(() =>
      this.retryWithBackoff(async () => {
        const response = await this.callBatchApi(texts);

        if (response.embeddings.length !== texts.length) {
          throw new Error(`Ollama returned ${response.embeddings.length} embeddings for ${texts.length} texts`);
        }

        return response.embeddings.map((embedding) => ({
          embedding,
          dimensions: this.dimensions,
        }));
      }),
    );
  }

  getDimensions(): number {
    return this.dimensions;
  }

  getModel(): string {
    return this.model;
  }
}
