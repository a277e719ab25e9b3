import Bottleneck from "bottleneck";
import OpenAI from "openai";

import type { EmbeddingProvider, EmbeddingResult, RateLimitConfig } from "./base.js";

interface OpenAIError {
  status?: number;
  message?: string;
}

export class OpenAIEmbeddings implements EmbeddingProvider {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly dimensions: number;
  private readonly requestedDimensions?: number;
  private readonly limiter: Bottleneck;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;

  constructor(
    apiKey: string,
    model = "text-embedding-3-small",
    dimensions?: number,
    rateLimitConfig?: RateLimitConfig,
    baseUrl?: string,
  ) {
    // Retries are handled here, not by the SDK
    this.client = new OpenAI({ apiKey, baseURL: baseUrl, maxRetries: 0 });
    this.model = model;

    const defaultDimensions: Record<string, number> = {
      "text-embedding-3-small": 1536,
      "text-embedding-3-large": 3072,
      "text-embedding-ada-002": 1536,
    };

    this.dimensions = dimensions || defaultDimensions[model] || 1536;
    // Only text-embedding-3 models accept a reduced size; send it only when asked for
    this.requestedDimensions = dimensions || undefined;

    const maxRequestsPerMinute = rateLimitConfig?.maxRequestsPerMinute || 3500;
    this.retryAttempts = rateLimitConfig?.retryAttempts ?? 3;
    this.retryDelayMs = rateLimitConfig?.retryDelayMs || 1000;

    this.limiter = new Bottleneck({
      reservoir: maxRequestsPerMinute,
      reservoirRefreshAmount: maxRequestsPerMinute,
      reservoirRefreshInterval: 60 * 1000,
      maxConcurrent: 3,
      minTime: Math.floor((60 * 1000) / maxRequestsPerMinute),
    });
  }

  private isOpenAIError(e: unknown): e is OpenAIError {
    return typeof e === "object" && e !== null && ("status" in e || "message" in e);
  }

  private async retryWithBackoff<T>(fn: () => Promise<T>, attempt = 0): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      const apiError = this.isOpenAIError(error) ? error : { status: 0, message: String(error) };
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
          `OpenAI API rate limit exceeded after ${this.retryAttempts} retry attempts. Please try again later or reduce request frequency.`,
        );
      }

      throw error;
    }
  }

  private async callApi(texts: string[]): Promise<number[][]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts,
      encoding_format: "float",
      ...(this.requestedDimensions !== undefined && { dimensions: this.requestedDimensions }),
    });

    // The API may return items out of order; `index` is authoritative
    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.limiter.schedule(async () =>
      this.retryWithBackoff(async () => {
        const [embedding] = await this.callApi([text]);

        if (!embedding) {
          throw new Error("No embedding returned from OpenAI API");
        }

        return { embedding, dimensions: this.dimensions };
      }),
    );
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) {
      return [];
    }

    return this.limiter.schedule(async () =>
      this.retryWithBackoff(async () => {
        const embeddings = await this.callApi(texts);

        if (embeddings.length !== texts.length) {
          throw new Error(`OpenAI returned ${embeddings.length} embeddings for ${texts.length} texts`);
        }

        return embeddings.map((embedding) => ({
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
