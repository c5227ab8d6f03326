import "dotenv/config";
import { z } from "zod";

import { ConfigurationError } from "../errors";
import { validateChunkingOptions } from "../services/chunker";

export type LlmProvider = "ollama" | "openai";
export type PineconeCloud = "aws" | "gcp" | "azure";

export type AppConfig = {
  port: number;
  llm: {
    provider: LlmProvider;
    ollamaHost: string;
    openaiApiKey?: string;
    embeddingModel: string;
    embeddingDimension: number;
    generationModel: string;
    temperature: number;
  };
  tokenizerModel: string;
  pinecone: {
    apiKey: string;
    indexName: string;
    cloud: PineconeCloud;
    region: string;
    namespace: string;
  };
  chunking: {
    maxTokensPerChunk: number;
    overlapTokens: number;
  };
  ingestion: {
    batchSize: number;
    batchDelayMs: number;
    indexSettleMs: number;
  };
  retrieval: {
    topK: number;
  };
};

type Env = Record<string, string | undefined>;

const PROVIDER_DEFAULTS: Record<
  LlmProvider,
  { embeddingModel: string; embeddingDimension: number; generationModel: string }
> = {
  ollama: {
    embeddingModel: "bge-m3",
    embeddingDimension: 1024,
    generationModel: "deepseek-r1:7b",
  },
  openai: {
    embeddingModel: "text-embedding-3-small",
    embeddingDimension: 1536,
    generationModel: "gpt-4o",
  },
};

const providerSchema = z.enum(["ollama", "openai"]);
const cloudSchema = z.enum(["aws", "gcp", "azure"]);

const numberOr = (value: string | undefined, fallback: number) => {
  if (value === undefined || !value.trim()) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const required = (source: Env, name: string) => {
  const value = source[name]?.trim();
  if (!value) {
    throw new ConfigurationError(
      `${name} is not set. Please add it to your environment variables.`
    );
  }
  return value;
};

export const loadConfig = (source: Env = process.env): AppConfig => {
  const provider = providerSchema.safeParse(source.LLM_PROVIDER ?? "ollama");
  if (!provider.success) {
    throw new ConfigurationError(
      `LLM_PROVIDER must be one of ${providerSchema.options.join(", ")}`
    );
  }
  const cloud = cloudSchema.safeParse(source.PINECONE_CLOUD ?? "aws");
  if (!cloud.success) {
    throw new ConfigurationError(
      `PINECONE_CLOUD must be one of ${cloudSchema.options.join(", ")}`
    );
  }

  const defaults = PROVIDER_DEFAULTS[provider.data];
  const openaiApiKey =
    provider.data === "openai"
      ? required(source, "OPENAI_API_KEY")
      : source.OPENAI_API_KEY;

  const chunking = {
    maxTokensPerChunk: numberOr(source.MAX_TOKENS_PER_CHUNK, 500),
    overlapTokens: numberOr(source.CHUNK_OVERLAP, 50),
  };
  validateChunkingOptions(chunking);

  const batchSize = numberOr(source.INGEST_BATCH_SIZE, 10);
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new ConfigurationError("INGEST_BATCH_SIZE must be a positive integer");
  }

  const topK = numberOr(source.RETRIEVAL_TOP_K, 5);
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new ConfigurationError("RETRIEVAL_TOP_K must be a positive integer");
  }

  const temperature = numberOr(source.TEMPERATURE, 0);
  if (temperature < 0) {
    throw new ConfigurationError("TEMPERATURE must be a non-negative number");
  }

  return {
    port: numberOr(source.PORT, 5000),
    llm: {
      provider: provider.data,
      ollamaHost: source.OLLAMA_HOST ?? "http://127.0.0.1:11434",
      openaiApiKey,
      embeddingModel: source.EMBEDDING_MODEL ?? defaults.embeddingModel,
      embeddingDimension: numberOr(
        source.EMBEDDING_MODEL_DIMENSION,
        defaults.embeddingDimension
      ),
      generationModel: source.GENERATION_MODEL ?? defaults.generationModel,
      temperature,
    },
    tokenizerModel: source.TOKENIZER_MODEL ?? "text-embedding-3-small",
    pinecone: {
      apiKey: required(source, "PINECONE_API_KEY"),
      indexName: source.PINECONE_INDEX_NAME ?? "rag-chatbot",
      cloud: cloud.data,
      region: source.PINECONE_REGION ?? "us-east-1",
      namespace: source.PINECONE_NAMESPACE ?? "",
    },
    chunking,
    ingestion: {
      batchSize,
      batchDelayMs: numberOr(source.INGEST_BATCH_DELAY_MS, 500),
      indexSettleMs: numberOr(source.INDEX_SETTLE_MS, 10_000),
    },
    retrieval: {
      topK,
    },
  };
};

let cached: AppConfig | undefined;

/** Process-wide configuration, read from `process.env` on first use. */
export const getConfig = () => {
  cached ??= loadConfig();
  return cached;
};
