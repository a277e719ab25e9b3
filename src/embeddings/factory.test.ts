import { describe, expect, it } from "vitest";

import { EmbeddingProviderFactory } from "./factory.js";
import { OllamaEmbeddings } from "./ollama.js";
import { OpenAIEmbeddings } from "./openai.js";

describe("EmbeddingProviderFactory", () => {
  it("should create an OpenAI provider", () => {
    const provider = EmbeddingProviderFactory.create({
      provider: "openai",
      model: "text-embedding-3-large",
      apiKey: "test-secret",
    });

    expect(provider).toBeInstanceOf(OpenAIEmbeddings);
    expect(provider.getModel()).toBe("text-embedding-3-large");
    expect(provider.getDimensions()).toBe(3072);
  });

  it("should require an API key for OpenAI", () => {
    expect(() => EmbeddingProviderFactory.create({ provider: "openai", model: "text-embedding-3-small" })).toThrow(
      "API key is required for OpenAI provider",
    );
  });

  it("should create an Ollama provider with default model", () => {
    const provider = EmbeddingProviderFactory.create({ provider: "ollama", model: "" });

    expect(provider).toBeInstanceOf(OllamaEmbeddings);
    expect(provider.getModel()).toBe("nomic-embed-text");
    expect(provider.getDimensions()).toBe(768);
  });

  it("should pass explicit dimensions through", () => {
    const provider = EmbeddingProviderFactory.create({ provider: "ollama", model: "custom", dimensions: 128 });

    expect(provider.getDimensions()).toBe(128);
  });
});
