import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";

import { getConfig, type AppConfig } from "../config/env";
import { validateChunkingOptions } from "../services/chunker";
import { createServices, type Services } from "../services/container";
import { loadDocuments } from "../services/documentLoader";
import type {
  BatchProgress,
  ChunkingStrategy,
} from "../services/ingestionService";

type ServiceFactory = () => { config: AppConfig; services: Services };

type IngestCommandOptions = {
  file: string;
  chunkSize?: number;
  overlap?: number;
  batchSize?: number;
  reset?: boolean;
  strategy: ChunkingStrategy;
  separator?: string;
};

const defaultFactory: ServiceFactory = () => {
  const config = getConfig();
  return { config, services: createServices(config) };
};

const parseInteger = (value: string) => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
};

const parseStrategy = (value: string): ChunkingStrategy => {
  if (value !== "tokens" && value !== "separator") {
    throw new InvalidArgumentError("Expected 'tokens' or 'separator'.");
  }
  return value;
};

const printProgress = ({
  batch,
  totalBatches,
  upserted,
  totalChunks,
}: BatchProgress) => {
  console.log(
    chalk.dim(
      `[progress] batch ${batch}/${totalBatches} (${upserted}/${totalChunks} chunks)`
    )
  );
};

export const buildCli = (factory: ServiceFactory = defaultFactory) => {
  const program = new Command();

  program
    .name("grounded-answers")
    .description(
      "Ingest documents into a vector index and ask questions about them"
    );

  program
    .command("ingest")
    .description(
      "Chunk, embed and upsert a document or a directory of documents"
    )
    .option(
      "-f, --file <path>",
      "Text, markdown or PDF file, or a directory",
      "data/knowledge_base.txt"
    )
    .option(
      "--chunk-size <tokens>",
      "Maximum number of tokens per chunk",
      parseInteger
    )
    .option(
      "--overlap <tokens>",
      "Number of tokens shared by consecutive chunks",
      parseInteger
    )
    .option(
      "--batch-size <count>",
      "Chunks embedded and upserted per request",
      parseInteger
    )
    .option(
      "--strategy <name>",
      "Chunking strategy: tokens or separator",
      parseStrategy,
      "tokens"
    )
    .option("--separator <text>", "Separator for the separator strategy")
    .option("--reset", "Delete the existing index before ingestion")
    .action(async (opts: IngestCommandOptions) => {
      const documents = await loadDocuments(opts.file);
      const { config, services } = factory();
      const ingestion =
        opts.batchSize === undefined
          ? services.ingestion
          : services.ingestion.withBatchSize(opts.batchSize);

      const chunking = {
        maxTokensPerChunk: opts.chunkSize ?? config.chunking.maxTokensPerChunk,
        overlapTokens: opts.overlap ?? config.chunking.overlapTokens,
      };
      validateChunkingOptions(
        opts.strategy === "tokens" ? chunking : { ...chunking, overlapTokens: 0 }
      );

      if (opts.reset) {
        await ingestion.resetIndex();
      }

      const single = documents.length === 1;
      let total = 0;

      for (const document of documents) {
        console.log(chalk.cyan(`Reading document from ${document.source}...`));
        const report = await ingestion.ingestDocument(
          document,
          {
            ...chunking,
            strategy: opts.strategy,
            separator: opts.separator,
            idPrefix: single ? undefined : `${document.relativePath}#`,
          },
          { onBatch: printProgress }
        );
        total += report.vectorCount;
      }

      console.log(
        chalk.green(
          `Successfully ingested ${documents.length} document(s) with ${total} chunks`
        )
      );
    });

  program
    .command("ask")
    .description("Answer a question from the indexed documents")
    .requiredOption("-q, --question <text>", "Question to ask the knowledge base")
    .option("--json", "Print the raw JSON response")
    .action(async (opts: { question: string; json?: boolean }) => {
      const { services } = factory();
      const result = await services.query.answer(opts.question);

      if (opts.json) {
        console.log(
          JSON.stringify(
            {
              answer: result.answer,
              retrieved_context: result.retrievedContext,
            },
            null,
            2
          )
        );
        return;
      }

      console.log(result.answer);
      result.retrievedContext.forEach((context, index) => {
        console.log(chalk.dim(`\n[${index + 1}] ${context}`));
      });
    });

  program
    .command("stats")
    .description("Print statistics of the vector index")
    .action(async () => {
      const { services } = factory();
      const stats = await services.vectorStore.stats(services.indexSpec.name);
      console.log(JSON.stringify(stats, null, 2));
    });

  return program;
};
