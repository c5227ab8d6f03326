import { setTimeout as delay } from "node:timers/promises";

import { ConfigurationError } from "../errors";
import type {
  Document,
  IndexSpec,
  IngestionReport,
  TextChunk,
  VectorRecord,
} from "../types/rag";
import {
  splitTextBySeparator,
  splitTextIntoChunks,
  type ChunkingOptions,
} from "./chunker";
import type { EmbeddingService, VectorStore } from "./contracts";
import { countTokens, type Tokenizer } from "./tokenizer";

export type ChunkingStrategy = "tokens" | "separator";

export type IngestOptions = ChunkingOptions & {
  strategy?: ChunkingStrategy;
  separator?: string;
  /** Prepended to every record id, so documents sharing an index do not collide. */
  idPrefix?: string;
};

export type BatchProgress = {
  batch: number;
  totalBatches: number;
  upserted: number;
  totalChunks: number;
};

type IngestionSettings = {
  index: IndexSpec;
  namespace: string;
  batchSize: number;
  batchDelayMs: number;
  indexSettleMs: number;
};

type IngestionDependencies = {
  embeddings: EmbeddingService;
  vectorStore: VectorStore;
  tokenizer: Tokenizer;
  settings: IngestionSettings;
  sleep?: (ms: number) => Promise<void>;
};

export class IngestionService {
  private readonly embeddings: EmbeddingService;
  private readonly vectorStore: VectorStore;
  private readonly tokenizer: Tokenizer;
  private readonly settings: IngestionSettings;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor({
    embeddings,
    vectorStore,
    tokenizer,
    settings,
    sleep = (ms) => delay(ms),
  }: IngestionDependencies) {
    this.embeddings = embeddings;
    this.vectorStore = vectorStore;
    this.tokenizer = tokenizer;
    this.settings = settings;
    this.sleep = sleep;
  }

  /** Same clients and settings, different batch size. */
  withBatchSize(batchSize: number): IngestionService {
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new ConfigurationError(
        `batchSize must be a positive integer (got ${batchSize})`
      );
    }

    return new IngestionService({
      embeddings: this.embeddings,
      vectorStore: this.vectorStore,
      tokenizer: this.tokenizer,
      settings: { ...this.settings, batchSize },
      sleep: this.sleep,
    });
  }

  chunk(text: string, options: IngestOptions): TextChunk[] {
    if (options.strategy !== "separator") {
      return splitTextIntoChunks(text, options, this.tokenizer);
    }

    return splitTextBySeparator(
      text,
      {
        separator: options.separator,
        maxTokensPerChunk: options.maxTokensPerChunk,
      },
      this.tokenizer
    ).map((content, index) => ({
      index,
      tokenCount: countTokens(content, this.tokenizer),
      text: content,
    }));
  }

  async ingestDocument(
    document: Document,
    options: IngestOptions,
    { onBatch }: { onBatch?: (progress: BatchProgress) => void } = {}
  ): Promise<IngestionReport> {
    const { index, namespace, batchSize, batchDelayMs } = this.settings;

    console.log(
      `[ingest] Splitting ${document.source} into chunks (size=${options.maxTokensPerChunk}, overlap=${options.overlapTokens})...`
    );
    const chunks = this.chunk(document.text, options);
    console.log(
      `[ingest] Created ${chunks.length} chunks from ${document.source}`
    );

    await this.vectorStore.ensureIndex(index);

    const totalBatches = Math.ceil(chunks.length / batchSize);
    let upserted = 0;

    for (let start = 0; start < chunks.length; start += batchSize) {
      const batch = chunks.slice(start, start + batchSize);
      const embeddings = await this.embeddings.embed(
        batch.map((chunk) => chunk.text)
      );

      if (embeddings.length !== batch.length) {
        throw new Error(
          `Embedding service returned ${embeddings.length} vectors for ${batch.length} chunks`
        );
      }

      const records: VectorRecord[] = batch.map((chunk, offset) => ({
        id: `${options.idPrefix ?? ""}chunk_${start + offset}`,
        values: embeddings[offset],
        metadata: {
          text: chunk.text,
          chunk_id: start + offset,
          source: document.source,
        },
      }));

      await this.vectorStore.upsert(index.name, records, namespace);
      upserted += records.length;

      const batchNumber = start / batchSize + 1;
      onBatch?.({
        batch: batchNumber,
        totalBatches,
        upserted,
        totalChunks: chunks.length,
      });

      if (batchNumber < totalBatches) {
        await this.sleep(batchDelayMs);
      }
    }

    console.log(
      `[ingest] Ingested ${upserted} vectors into index '${index.name}'`
    );

    return {
      chunkCount: chunks.length,
      vectorCount: upserted,
      batchCount: totalBatches,
    };
  }

  /** Deletes the index, then waits for the provider to settle before anything recreates it. */
  async resetIndex(): Promise<void> {
    const { index, indexSettleMs } = this.settings;
    console.log(`[ingest] Deleting existing index '${index.name}'...`);
    await this.vectorStore.deleteIndex(index.name);
    console.log("[ingest] Waiting for index deletion to complete...");
    await this.sleep(indexSettleMs);
  }
}
