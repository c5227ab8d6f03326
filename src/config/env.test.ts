import { afterEach, describe, it, expect, vi } from "vitest";

import { ConfigurationError } from "../errors";
import { getConfig, loadConfig } from "./env";

const base = { PINECONE_API_KEY: "test-pinecone-key" };

describe("loadConfig", () => {
  it("applies ollama defaults", () => {
    const config = loadConfig(base);

    expect(config.port).toBe(5000);
    expect(config.llm).toEqual({
      provider: "ollama",
      ollamaHost: "http://127.0.0.1:11434",
      openaiApiKey: undefined,
      embeddingModel: "bge-m3",
      embeddingDimension: 1024,
      generationModel: "deepseek-r1:7b",
      temperature: 0,
    });
    expect(config.pinecone).toEqual({
      apiKey: "test-pinecone-key",
      indexName: "rag-chatbot",
      cloud: "aws",
      region: "us-east-1",
      namespace: "",
    });
    expect(config.chunking).toEqual({ maxTokensPerChunk: 500, overlapTokens: 50 });
    expect(config.ingestion).toEqual({
      batchSize: 10,
      batchDelayMs: 500,
      indexSettleMs: 10_000,
    });
    expect(config.retrieval.topK).toBe(5);
  });

  it("switches model defaults for openai", () => {
    const config = loadConfig({
      ...base,
      LLM_PROVIDER: "openai",
      OPENAI_API_KEY: "test-openai-key",
    });

    expect(config.llm.embeddingModel).toBe("text-embedding-3-small");
    expect(config.llm.embeddingDimension).toBe(1536);
    expect(config.llm.generationModel).toBe("gpt-4o");
    expect(config.llm.openaiApiKey).toBe("test-openai-key");
  });

  it("requires the Pinecone key", () => {
    expect(() => loadConfig({})).toThrow(
      new ConfigurationError(
        "PINECONE_API_KEY is not set. Please add it to your environment variables."
      )
    );
  });

  it("requires the OpenAI key for the openai provider", () => {
    expect(() => loadConfig({ ...base, LLM_PROVIDER: "openai" })).toThrow(
      "OPENAI_API_KEY is not set."
    );
  });

  it("rejects unknown providers and clouds", () => {
    expect(() => loadConfig({ ...base, LLM_PROVIDER: "bard" })).toThrow(
      "LLM_PROVIDER must be one of ollama, openai"
    );
    expect(() => loadConfig({ ...base, PINECONE_CLOUD: "moon" })).toThrow(
      "PINECONE_CLOUD must be one of aws, gcp, azure"
    );
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() =>
      loadConfig({ ...base, MAX_TOKENS_PER_CHUNK: "100", CHUNK_OVERLAP: "100" })
    ).toThrow(ConfigurationError);
  });

  it("falls back to defaults for unparsable numbers", () => {
    const config = loadConfig({ ...base, PORT: "eighty", RETRIEVAL_TOP_K: "" });

    expect(config.port).toBe(5000);
    expect(config.retrieval.topK).toBe(5);
  });

  it("rejects a top-k that is not a positive integer", () => {
    for (const value of ["0", "-3", "2.5"]) {
      expect(() => loadConfig({ ...base, RETRIEVAL_TOP_K: value })).toThrow(
        new ConfigurationError("RETRIEVAL_TOP_K must be a positive integer")
      );
    }
  });

  it("rejects a negative temperature", () => {
    expect(() => loadConfig({ ...base, TEMPERATURE: "-0.5" })).toThrow(
      new ConfigurationError("TEMPERATURE must be a non-negative number")
    );
    expect(loadConfig({ ...base, TEMPERATURE: "0.7" }).llm.temperature).toBe(0.7);
  });
});

describe("getConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads the process environment once", () => {
    vi.stubEnv("PINECONE_API_KEY", "test-pinecone-key");
    vi.stubEnv("RETRIEVAL_TOP_K", "7");

    const first = getConfig();
    vi.stubEnv("RETRIEVAL_TOP_K", "9");

    expect(first.retrieval.topK).toBe(7);
    expect(getConfig()).toBe(first);
  });
});
