import { Ollama, type AbortableAsyncIterator, type ChatResponse } from "ollama";

import { ServiceUnavailableError, errorMessage } from "../errors";
import type {
  ChatMessage,
  ChatService,
  CompletionRequest,
  EmbeddingService,
  StreamCallbacks,
} from "./contracts";

type GatewayConfig = {
  host: string;
  llmModel: string;
  embeddingModel: string;
};

export class OllamaGateway implements EmbeddingService, ChatService {
  private readonly client: Ollama;

  constructor(private readonly config: GatewayConfig) {
    this.client = new Ollama({ host: config.host });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    let embeddings: number[][];

    try {
      const response = await this.client.embed({
        model: this.config.embeddingModel,
        input: texts,
      });
      embeddings = response.embeddings;
    } catch (error) {
      throw new ServiceUnavailableError(
        "embeddings",
        `Failed to create embeddings via Ollama (${
          this.config.embeddingModel
        }) at ${this.config.host}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (embeddings.some((vector) => !vector.length)) {
      throw new ServiceUnavailableError(
        "embeddings",
        "Embedding vector is empty. Is the model loaded in Ollama?"
      );
    }

    return embeddings;
  }

  async complete(
    { systemPrompt, userMessage, temperature }: CompletionRequest,
    { onChunk, signal }: StreamCallbacks = {}
  ): Promise<string> {
    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt },
      { role: "user", content: userMessage },
    ];

    if (signal?.aborted) {
      throw new Error("Request aborted before generation started");
    }

    let stream: AbortableAsyncIterator<ChatResponse>;

    try {
      stream = await this.startStream(messages, temperature);
    } catch (error) {
      throw new ServiceUnavailableError(
        "chat",
        `Failed to start streaming via Ollama (${this.config.llmModel}) at ${
          this.config.host
        }: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const abortHandler = () => stream.abort();
    signal?.addEventListener("abort", abortHandler);

    let accumulator = "";

    try {
      for await (const chunk of stream) {
        const token = chunk.message?.content ?? "";

        if (!token) {
          continue;
        }

        accumulator += token;
        await onChunk?.(token);
      }

      return accumulator.trim();
    } finally {
      signal?.removeEventListener("abort", abortHandler);
    }
  }

  private startStream(
    messages: ChatMessage[],
    temperature: number
  ): Promise<AbortableAsyncIterator<ChatResponse>> {
    return this.client.chat({
      model: this.config.llmModel,
      messages,
      stream: true,
      keep_alive: "5m",
      options: {
        temperature,
        num_ctx: 8192,
      },
    });
  }
}
