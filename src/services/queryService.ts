import type { ChatAnswer, VectorMatch } from "../types/rag";
import type {
  ChatService,
  EmbeddingService,
  StreamCallbacks,
  VectorStore,
} from "./contracts";

export const NO_CONTEXT_ANSWER =
  "I couldn't find any relevant information to answer your question.";

export const INSUFFICIENT_CONTEXT_ANSWER =
  "I don't have enough information to answer that question.";

export const CONTEXT_SEPARATOR = "\n\n---\n\n";

export const buildSystemPrompt = (context: string[]) =>
  [
    "You are a helpful AI assistant using a Retrieval Augmented Generation (RAG) system.",
    "Answer the user's question based ONLY on the provided context.",
    "If the context doesn't contain enough information to answer the question,",
    `say "${INSUFFICIENT_CONTEXT_ANSWER}"`,
    "Don't make up information or use knowledge outside the provided context.",
    "Always cite your sources from the context if possible.",
    "",
    "Context:",
    context.join(CONTEXT_SEPARATOR),
  ].join("\n");

export const contextFromMatches = (matches: VectorMatch[]) =>
  matches.map((match) => match.metadata?.text ?? "");

export type AnswerHandlers = StreamCallbacks & {
  onContext?: (context: string[]) => void | Promise<void>;
};

type QuerySettings = {
  indexName: string;
  namespace: string;
  topK: number;
  temperature: number;
};

type QueryDependencies = {
  embeddings: EmbeddingService;
  vectorStore: VectorStore;
  chat: ChatService;
  settings: QuerySettings;
};

export class QueryService {
  constructor(private readonly deps: QueryDependencies) {}

  async retrieve(question: string, topK = this.deps.settings.topK) {
    const { embeddings, vectorStore, settings } = this.deps;
    const [vector] = await embeddings.embed([question]);

    if (!vector) {
      throw new Error("Embedding service returned no vector for the question");
    }

    return vectorStore.query(settings.indexName, {
      vector,
      topK,
      namespace: settings.namespace,
    });
  }

  async answer(
    question: string,
    { onContext, onChunk, signal }: AnswerHandlers = {}
  ): Promise<ChatAnswer> {
    const matches = await this.retrieve(question);
    console.log(
      `[query] Retrieved ${matches.length} chunk(s) from ${this.deps.settings.indexName}`
    );

    if (!matches.length) {
      console.log("[query] No relevant context, skipping generation");
      await onContext?.([]);
      return { answer: NO_CONTEXT_ANSWER, retrievedContext: [] };
    }

    const retrievedContext = contextFromMatches(matches);
    await onContext?.(retrievedContext);

    const answer = await this.deps.chat.complete(
      {
        systemPrompt: buildSystemPrompt(retrievedContext),
        userMessage: question,
        temperature: this.deps.settings.temperature,
      },
      { onChunk, signal }
    );

    return { answer, retrievedContext };
  }
}
