export interface EmbeddingResult {
  embedding: number[];
  dimensions: number;
}

export interface RateLimitConfig {
  maxRequestsPerMinute?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
}

/**
 * Embedding model boundary.
 *
 * `embedBatch` returns exactly one vector per input, in input order, or
 * throws for the whole batch. Rate-limit retries happen inside the provider.
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<EmbeddingResult>;
  embedBatch(texts: string[]): Promise<EmbeddingResult[]>;
  getDimensions(): number;
  getModel(): string;
}

export type EmbeddingProviderName = "openai" | "ollama";

export interface ProviderConfig {
  provider: EmbeddingProviderName;
  model: string;
  dimensions?: number;
  apiKey?: string;
  baseUrl?: string;
  rateLimitConfig?: RateLimitConfig;
}
