export type Document = {
  source: string;
  text: string;
};

export type TextChunk = {
  index: number;
  /** Offset of the first token, for sliding-window chunks. */
  startToken?: number;
  tokenCount: number;
  text: string;
};

export type ChunkMetadata = {
  text: string;
  chunk_id: number;
  source: string;
};

export type VectorRecord = {
  id: string;
  values: number[];
  metadata: ChunkMetadata;
};

export type VectorMatch = {
  id: string;
  score: number;
  metadata?: Partial<ChunkMetadata>;
};

export type IndexSpec = {
  name: string;
  dimension: number;
  metric: "cosine" | "euclidean" | "dotproduct";
  cloud: "aws" | "gcp" | "azure";
  region: string;
};

export type IndexStats = {
  dimension?: number;
  totalRecordCount?: number;
  indexFullness?: number;
  namespaces: Record<string, { recordCount: number }>;
};

export type ChatAnswer = {
  answer: string;
  retrievedContext: string[];
};

export type IngestionReport = {
  chunkCount: number;
  vectorCount: number;
  batchCount: number;
};
