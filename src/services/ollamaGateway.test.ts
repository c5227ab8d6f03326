import { beforeEach, describe, it, expect, vi } from "vitest";

import { ServiceUnavailableError } from "../errors";
import { OllamaGateway } from "./ollamaGateway";

const client = vi.hoisted(() => ({ embed: vi.fn(), chat: vi.fn() }));

vi.mock("ollama", () => ({
  Ollama: class {
    embed = client.embed;
    chat = client.chat;
  },
}));

const streamOf = (tokens: string[]) => ({
  abort: vi.fn(),
  async *[Symbol.asyncIterator]() {
    for (const content of tokens) {
      yield { message: { role: "assistant", content } };
    }
  },
});

const gateway = () =>
  new OllamaGateway({
    host: "http://127.0.0.1:11434",
    llmModel: "deepseek-r1:7b",
    embeddingModel: "bge-m3",
  });

const request = {
  systemPrompt: "Answer from the context.",
  userMessage: "Why?",
  temperature: 0,
};

beforeEach(() => {
  vi.resetAllMocks();
});

describe("OllamaGateway.embed", () => {
  it("returns nothing for an empty batch without calling Ollama", async () => {
    expect(await gateway().embed([])).toEqual([]);
    expect(client.embed).not.toHaveBeenCalled();
  });

  it("embeds the whole batch in one call", async () => {
    client.embed.mockResolvedValue({ embeddings: [[1, 2], [3, 4]] });

    const vectors = await gateway().embed(["first", "second"]);

    expect(vectors).toEqual([[1, 2], [3, 4]]);
    expect(client.embed).toHaveBeenCalledWith({
      model: "bge-m3",
      input: ["first", "second"],
    });
  });

  it("wraps client failures", async () => {
    client.embed.mockRejectedValue(new Error("connect ECONNREFUSED"));

    const failure = gateway().embed(["text"]);

    await expect(failure).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(failure).rejects.toThrow(
      "Failed to create embeddings via Ollama (bge-m3) at http://127.0.0.1:11434: connect ECONNREFUSED"
    );
  });

  it("rejects empty vectors", async () => {
    client.embed.mockResolvedValue({ embeddings: [[1, 2], []] });

    await expect(gateway().embed(["a", "b"])).rejects.toThrow(
      "Embedding vector is empty. Is the model loaded in Ollama?"
    );
  });
});

describe("OllamaGateway.complete", () => {
  it("streams tokens and returns the trimmed answer", async () => {
    client.chat.mockResolvedValue(streamOf([" Paris", "", " is the capital. "]));
    const onChunk = vi.fn();

    const answer = await gateway().complete(request, { onChunk });

    expect(answer).toBe("Paris is the capital.");
    expect(onChunk.mock.calls).toEqual([[" Paris"], [" is the capital. "]]);
    expect(client.chat).toHaveBeenCalledWith({
      model: "deepseek-r1:7b",
      messages: [
        { role: "system", content: "Answer from the context." },
        { role: "user", content: "Why?" },
      ],
      stream: true,
      keep_alive: "5m",
      options: { temperature: 0, num_ctx: 8192 },
    });
  });

  it("wraps a failure to start the stream", async () => {
    client.chat.mockRejectedValue(new Error("model not found"));

    await expect(gateway().complete(request)).rejects.toThrow(
      new ServiceUnavailableError(
        "chat",
        "Failed to start streaming via Ollama (deepseek-r1:7b) at http://127.0.0.1:11434: model not found"
      )
    );
  });

  it("does not start generation for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      gateway().complete(request, { signal: controller.signal })
    ).rejects.toThrow("Request aborted before generation started");
    expect(client.chat).not.toHaveBeenCalled();
  });
});
