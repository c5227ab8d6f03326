import OpenAI from "openai";

import { ServiceUnavailableError, errorMessage } from "../errors";
import type {
  ChatService,
  CompletionRequest,
  EmbeddingService,
  StreamCallbacks,
} from "./contracts";

type GatewayConfig = {
  apiKey: string;
  llmModel: string;
  embeddingModel: string;
};

export class OpenAIGateway implements EmbeddingService, ChatService {
  private readonly client: OpenAI;

  constructor(private readonly config: GatewayConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    try {
      const response = await this.client.embeddings.create({
        model: this.config.embeddingModel,
        input: texts,
      });

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);
    } catch (error) {
      throw new ServiceUnavailableError(
        "embeddings",
        `Failed to create embeddings via OpenAI (${
          this.config.embeddingModel
        }): ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async complete(
    { systemPrompt, userMessage, temperature }: CompletionRequest,
    { onChunk, signal }: StreamCallbacks = {}
  ): Promise<string> {
    if (signal?.aborted) {
      throw new Error("Request aborted before generation started");
    }

    if (!onChunk) {
      try {
        const completion = await this.client.chat.completions.create(
          {
            model: this.config.llmModel,
            messages: [
              { role: "system", content: systemPrompt },
              { role: "user", content: userMessage },
            ],
            temperature,
          },
          { signal }
        );
        return completion.choices[0]?.message?.content?.trim() ?? "";
      } catch (error) {
        throw new ServiceUnavailableError(
          "chat",
          `Failed to generate a completion via OpenAI (${
            this.config.llmModel
          }): ${errorMessage(error)}`,
          { cause: error }
        );
      }
    }

    try {
      const stream = await this.client.chat.completions.create(
        {
          model: this.config.llmModel,
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: userMessage },
          ],
          temperature,
          stream: true,
        },
        { signal }
      );

      let accumulator = "";

      for await (const chunk of stream) {
        const token = chunk.choices[0]?.delta?.content ?? "";

        if (!token) {
          continue;
        }

        accumulator += token;
        await onChunk(token);
      }

      return accumulator.trim();
    } catch (error) {
      throw new ServiceUnavailableError(
        "chat",
        `Failed to stream a completion via OpenAI (${
          this.config.llmModel
        }): ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
