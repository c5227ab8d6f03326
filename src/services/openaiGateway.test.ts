import { beforeEach, describe, it, expect, vi } from "vitest";

import { ServiceUnavailableError } from "../errors";
import { OpenAIGateway } from "./openaiGateway";

const client = vi.hoisted(() => ({
  createEmbeddings: vi.fn(),
  createCompletion: vi.fn(),
}));

vi.mock("openai", () => ({
  default: class {
    embeddings = { create: client.createEmbeddings };
    chat = { completions: { create: client.createCompletion } };
  },
}));

const gateway = () =>
  new OpenAIGateway({
    apiKey: "test-secret",
    llmModel: "gpt-4o",
    embeddingModel: "text-embedding-3-small",
  });

const request = {
  systemPrompt: "Answer from the context.",
  userMessage: "Why?",
  temperature: 0,
};

const messages = [
  { role: "system", content: "Answer from the context." },
  { role: "user", content: "Why?" },
];

beforeEach(() => {
  vi.resetAllMocks();
});

describe("OpenAIGateway.embed", () => {
  it("returns nothing for an empty batch without calling OpenAI", async () => {
    expect(await gateway().embed([])).toEqual([]);
    expect(client.createEmbeddings).not.toHaveBeenCalled();
  });

  it("orders the vectors by their input index", async () => {
    client.createEmbeddings.mockResolvedValue({
      data: [
        { index: 1, embedding: [0.2] },
        { index: 0, embedding: [0.1] },
      ],
    });

    const vectors = await gateway().embed(["first", "second"]);

    expect(vectors).toEqual([[0.1], [0.2]]);
    expect(client.createEmbeddings).toHaveBeenCalledWith({
      model: "text-embedding-3-small",
      input: ["first", "second"],
    });
  });

  it("wraps client failures", async () => {
    client.createEmbeddings.mockRejectedValue(new Error("401 Unauthorized"));

    const failure = gateway().embed(["text"]);

    await expect(failure).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(failure).rejects.toThrow(
      "Failed to create embeddings via OpenAI (text-embedding-3-small): 401 Unauthorized"
    );
  });
});

describe("OpenAIGateway.complete", () => {
  it("makes one non-streaming call without a chunk handler", async () => {
    client.createCompletion.mockResolvedValue({
      choices: [{ message: { content: "  Paris.\n" } }],
    });

    expect(await gateway().complete(request)).toBe("Paris.");
    expect(client.createCompletion).toHaveBeenCalledWith(
      { model: "gpt-4o", messages, temperature: 0 },
      { signal: undefined }
    );
  });

  it("returns an empty answer when the model sends no choice", async () => {
    client.createCompletion.mockResolvedValue({ choices: [] });

    expect(await gateway().complete(request)).toBe("");
  });

  it("streams deltas to the chunk handler", async () => {
    client.createCompletion.mockResolvedValue({
      async *[Symbol.asyncIterator]() {
        for (const content of ["Par", "is", undefined]) {
          yield { choices: [{ delta: { content } }] };
        }
      },
    });
    const onChunk = vi.fn();

    const answer = await gateway().complete(request, { onChunk });

    expect(answer).toBe("Paris");
    expect(onChunk.mock.calls).toEqual([["Par"], ["is"]]);
    expect(client.createCompletion).toHaveBeenCalledWith(
      { model: "gpt-4o", messages, temperature: 0, stream: true },
      { signal: undefined }
    );
  });

  it("wraps streaming failures", async () => {
    client.createCompletion.mockRejectedValue(new Error("rate limited"));

    await expect(
      gateway().complete(request, { onChunk: () => {} })
    ).rejects.toThrow(
      new ServiceUnavailableError(
        "chat",
        "Failed to stream a completion via OpenAI (gpt-4o): rate limited"
      )
    );
  });
});
