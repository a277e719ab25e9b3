import type { EmbeddingProvider, ProviderConfig } from "./base.js";
import { OllamaEmbeddings } from "./ollama.js";
import { OpenAIEmbeddings } from "./openai.js";

export class EmbeddingProviderFactory {
  static create(config: ProviderConfig): EmbeddingProvider {
    const { provider, model, dimensions, rateLimitConfig, apiKey, baseUrl } = config;

    switch (provider) {
      case "openai":
        if (!apiKey) {
          throw new Error("API key is required for OpenAI provider");
        }
        return new OpenAIEmbeddings(apiKey, model || "text-embedding-3-small", dimensions, rateLimitConfig, baseUrl);

      case "ollama":
        return new OllamaEmbeddings(
          model || "nomic-embed-text",
          dimensions,
          rateLimitConfig,
          baseUrl || "http://localhost:11434",
        );

      default: {
        const unknown: never = provider;
        throw new Error(`Unknown embedding provider: ${String(unknown)}. Supported providers: openai, ollama`);
      }
    }
  }
}
