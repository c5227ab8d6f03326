import type { AppConfig } from "../config/env";
import { ConfigurationError } from "../errors";
import type { IndexSpec } from "../types/rag";
import type { ChatService, EmbeddingService, VectorStore } from "./contracts";
import { IngestionService } from "./ingestionService";
import { OllamaGateway } from "./ollamaGateway";
import { OpenAIGateway } from "./openaiGateway";
import { PineconeVectorStore } from "./pineconeVectorStore";
import { QueryService } from "./queryService";
import { getTokenizer } from "./tokenizer";

export type Services = {
  indexSpec: IndexSpec;
  vectorStore: VectorStore;
  ingestion: IngestionService;
  query: QueryService;
};

const createGateway = (
  config: AppConfig["llm"]
): EmbeddingService & ChatService => {
  if (config.provider === "openai") {
    if (!config.openaiApiKey) {
      throw new ConfigurationError("OPENAI_API_KEY is not set.");
    }
    return new OpenAIGateway({
      apiKey: config.openaiApiKey,
      llmModel: config.generationModel,
      embeddingModel: config.embeddingModel,
    });
  }

  return new OllamaGateway({
    host: config.ollamaHost,
    llmModel: config.generationModel,
    embeddingModel: config.embeddingModel,
  });
};

/** Builds one long-lived client per external service and wires the orchestrators to them. */
export const createServices = (
  config: AppConfig,
  overrides: Partial<{
    gateway: EmbeddingService & ChatService;
    vectorStore: VectorStore;
  }> = {}
): Services => {
  const gateway = overrides.gateway ?? createGateway(config.llm);
  const vectorStore =
    overrides.vectorStore ?? new PineconeVectorStore(config.pinecone.apiKey);

  const indexSpec: IndexSpec = {
    name: config.pinecone.indexName,
    dimension: config.llm.embeddingDimension,
    metric: "cosine",
    cloud: config.pinecone.cloud,
    region: config.pinecone.region,
  };

  const ingestion = new IngestionService({
    embeddings: gateway,
    vectorStore,
    tokenizer: getTokenizer(config.tokenizerModel),
    settings: {
      index: indexSpec,
      namespace: config.pinecone.namespace,
      ...config.ingestion,
    },
  });

  const query = new QueryService({
    embeddings: gateway,
    vectorStore,
    chat: gateway,
    settings: {
      indexName: indexSpec.name,
      namespace: config.pinecone.namespace,
      topK: config.retrieval.topK,
      temperature: config.llm.temperature,
    },
  });

  return { indexSpec, vectorStore, ingestion, query };
};
