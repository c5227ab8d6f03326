import { Pinecone } from "@pinecone-database/pinecone";

import { ServiceUnavailableError, errorMessage } from "../errors";
import type {
  ChunkMetadata,
  IndexSpec,
  IndexStats,
  VectorMatch,
  VectorRecord,
} from "../types/rag";
import type { VectorQuery, VectorStore } from "./contracts";

export class PineconeVectorStore implements VectorStore {
  private readonly client: Pinecone;

  constructor(apiKey: string) {
    this.client = new Pinecone({ apiKey });
  }

  async ensureIndex(spec: IndexSpec): Promise<boolean> {
    const existing = await this.call("list indexes", () =>
      this.listIndexNames()
    );

    if (existing.includes(spec.name)) {
      return false;
    }

    console.log(`[pinecone] Creating index '${spec.name}'...`);
    await this.call(`create index '${spec.name}'`, () =>
      this.client.createIndex({
        name: spec.name,
        dimension: spec.dimension,
        metric: spec.metric,
        spec: {
          serverless: {
            cloud: spec.cloud,
            region: spec.region,
          },
        },
        suppressConflicts: true,
        waitUntilReady: true,
      })
    );
    console.log(`[pinecone] Index '${spec.name}' is ready`);
    return true;
  }

  async upsert(
    indexName: string,
    records: VectorRecord[],
    namespace = ""
  ): Promise<void> {
    if (!records.length) {
      return;
    }

    await this.call(`upsert into '${indexName}'`, () =>
      this.client
        .index<ChunkMetadata>(indexName)
        .namespace(namespace)
        .upsert(records)
    );
  }

  async query(
    indexName: string,
    { vector, topK, namespace = "" }: VectorQuery
  ): Promise<VectorMatch[]> {
    const response = await this.call(`query '${indexName}'`, () =>
      this.client.index<ChunkMetadata>(indexName).namespace(namespace).query({
        vector,
        topK,
        includeMetadata: true,
      })
    );

    return response.matches.map((match) => ({
      id: match.id,
      score: match.score ?? 0,
      metadata: match.metadata,
    }));
  }

  async deleteIndex(indexName: string): Promise<boolean> {
    const existing = await this.call("list indexes", () =>
      this.listIndexNames()
    );

    if (!existing.includes(indexName)) {
      return false;
    }

    await this.call(`delete index '${indexName}'`, () =>
      this.client.deleteIndex(indexName)
    );
    console.log(`[pinecone] Deleted index '${indexName}'`);
    return true;
  }

  async stats(indexName: string): Promise<IndexStats> {
    const description = await this.call(`describe '${indexName}'`, () =>
      this.client.index(indexName).describeIndexStats()
    );

    const namespaces: IndexStats["namespaces"] = {};
    for (const [name, summary] of Object.entries(
      description.namespaces ?? {}
    )) {
      namespaces[name] = { recordCount: summary.recordCount };
    }

    return {
      dimension: description.dimension,
      totalRecordCount: description.totalRecordCount,
      indexFullness: description.indexFullness,
      namespaces,
    };
  }

  private async listIndexNames(): Promise<string[]> {
    const { indexes } = await this.client.listIndexes();
    return (indexes ?? []).map((index) => index.name);
  }

  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new ServiceUnavailableError(
        "vector_store",
        `Pinecone failed to ${operation}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
