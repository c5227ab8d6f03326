import type {
  IndexSpec,
  IndexStats,
  VectorMatch,
  VectorRecord,
} from "../types/rag";

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type CompletionRequest = {
  systemPrompt: string;
  userMessage: string;
  temperature: number;
};

export type StreamCallbacks = {
  onChunk?: (chunk: string) => void | Promise<void>;
  signal?: AbortSignal;
};

export interface EmbeddingService {
  /** One vector per input, same order. An empty list makes no request. */
  embed(texts: string[]): Promise<number[][]>;
}

export interface ChatService {
  complete(
    request: CompletionRequest,
    callbacks?: StreamCallbacks
  ): Promise<string>;
}

export type VectorQuery = {
  vector: number[];
  topK: number;
  namespace?: string;
};

export interface VectorStore {
  /** Creates the index when absent. Resolves to true when it was created. */
  ensureIndex(spec: IndexSpec): Promise<boolean>;
  upsert(
    indexName: string,
    records: VectorRecord[],
    namespace?: string
  ): Promise<void>;
  query(indexName: string, query: VectorQuery): Promise<VectorMatch[]>;
  deleteIndex(indexName: string): Promise<boolean>;
  stats(indexName: string): Promise<IndexStats>;
}
