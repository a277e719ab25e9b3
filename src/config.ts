/**
 * Environment configuration, validated once at start-up.
 */

import { z } from "zod";

import type { ProviderConfig } from "./embeddings/base.js";
import type { TranscriptConfig } from "./transcripts/types.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback);
const optionalPositiveInt = z.coerce.number().int().positive().optional();
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

export const EnvSchema = z
  .object({
    DATA_DIR: z.string().min(1).default("./data"),
    CHANNEL_DISPLAY_NAME: z.string().default(""),

    TARGET_CHUNK_DURATION: positiveNumber(75),
    MIN_CHUNK_DURATION: positiveNumber(45),
    MAX_CHUNK_DURATION: positiveNumber(120),
    CHUNK_CHECKPOINT_EVERY: positiveInt(100),

    EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
    OPENAI_API_KEY: optionalString,
    EMBEDDING_MODEL: optionalString,
    EMBEDDING_DIMENSIONS: optionalPositiveInt,
    EMBEDDING_BASE_URL: optionalString,
    EMBEDDING_BATCH_SIZE: positiveInt(100),
    EMBEDDING_MAX_REQUESTS_PER_MINUTE: optionalPositiveInt,
    EMBEDDING_RETRY_ATTEMPTS: z.coerce.number().int().nonnegative().optional(),
    EMBEDDING_RETRY_DELAY_MS: optionalPositiveInt,
    EMBEDDING_PRICE_PER_MILLION_TOKENS: z.coerce.number().nonnegative().default(0.02),

    QDRANT_URL: z.string().url().default("http://localhost:6333"),
    QDRANT_API_KEY: optionalString,
    QDRANT_COLLECTION: z.string().min(1).default("transcripts"),
    QDRANT_NAMESPACE: z.string().min(1).default("youtube"),
    QDRANT_UPSERT_BATCH_SIZE: positiveInt(100),

    CHECKPOINT_EVERY_BATCHES: positiveInt(10),
    INTER_BATCH_DELAY_MS: z.coerce.number().int().nonnegative().default(100),
  })
  .superRefine((env, ctx) => {
    if (env.MIN_CHUNK_DURATION > env.TARGET_CHUNK_DURATION || env.TARGET_CHUNK_DURATION > env.MAX_CHUNK_DURATION) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `chunk durations must satisfy MIN (${env.MIN_CHUNK_DURATION}) <= TARGET (${env.TARGET_CHUNK_DURATION}) <= MAX (${env.MAX_CHUNK_DURATION})`,
        path: ["TARGET_CHUNK_DURATION"],
      });
    }
    if (env.EMBEDDING_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "OPENAI_API_KEY is required when EMBEDDING_PROVIDER is openai",
        path: ["OPENAI_API_KEY"],
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  transcripts: TranscriptConfig;
  embedding: ProviderConfig;
  qdrant: {
    url: string;
    apiKey?: string;
  };
}

const DEFAULT_MODELS: Record<ProviderConfig["provider"], string> = {
  openai: "text-embedding-3-small",
  ollama: "nomic-embed-text",
};

/**
 * Parse and validate configuration from the environment.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `  ${issue.path.join(".") || "env"}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n${problems.join("\n")}`);
  }
  const e = parsed.data;

  return {
    transcripts: {
      dataDir: e.DATA_DIR,
      channelDisplayName: e.CHANNEL_DISPLAY_NAME,
      segmenter: {
        targetDuration: e.TARGET_CHUNK_DURATION,
        minDuration: e.MIN_CHUNK_DURATION,
        maxDuration: e.MAX_CHUNK_DURATION,
      },
      chunkCheckpointEvery: e.CHUNK_CHECKPOINT_EVERY,
      embeddingBatchSize: e.EMBEDDING_BATCH_SIZE,
      embeddingPricePerMillionTokens: e.EMBEDDING_PRICE_PER_MILLION_TOKENS,
      collectionName: e.QDRANT_COLLECTION,
      namespace: e.QDRANT_NAMESPACE,
      upsertBatchSize: e.QDRANT_UPSERT_BATCH_SIZE,
      checkpointEveryBatches: e.CHECKPOINT_EVERY_BATCHES,
      interBatchDelayMs: e.INTER_BATCH_DELAY_MS,
    },
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL ?? DEFAULT_MODELS[e.EMBEDDING_PROVIDER],
      dimensions: e.EMBEDDING_DIMENSIONS,
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.EMBEDDING_BASE_URL,
      rateLimitConfig: {
        maxRequestsPerMinute: e.EMBEDDING_MAX_REQUESTS_PER_MINUTE,
        retryAttempts: e.EMBEDDING_RETRY_ATTEMPTS,
        retryDelayMs: e.EMBEDDING_RETRY_DELAY_MS,
      },
    },
    qdrant: {
      url: e.QDRANT_URL,
      apiKey: e.QDRANT_API_KEY,
    },
  };
}
