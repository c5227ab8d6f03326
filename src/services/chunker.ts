import { ConfigurationError } from "../errors";
import type { TextChunk } from "../types/rag";
import { countTokens, type Tokenizer } from "./tokenizer";

export type ChunkingOptions = {
  maxTokensPerChunk: number;
  overlapTokens: number;
};

export type SeparatorOptions = {
  separator?: string;
  maxTokensPerChunk: number;
};

export type TokenWindow = {
  start: number;
  tokens: number[];
};

/**
 * Rejects settings the sliding window cannot make progress with. The step is
 * `maxTokensPerChunk - overlapTokens`, so it must stay positive.
 */
export const validateChunkingOptions = ({
  maxTokensPerChunk,
  overlapTokens,
}: ChunkingOptions) => {
  if (!Number.isInteger(maxTokensPerChunk) || maxTokensPerChunk <= 0) {
    throw new ConfigurationError(
      `maxTokensPerChunk must be a positive integer (got ${maxTokensPerChunk})`
    );
  }
  if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
    throw new ConfigurationError(
      `overlapTokens must be a non-negative integer (got ${overlapTokens})`
    );
  }
  if (overlapTokens >= maxTokensPerChunk) {
    throw new ConfigurationError(
      `overlapTokens (${overlapTokens}) must be smaller than maxTokensPerChunk (${maxTokensPerChunk})`
    );
  }
};

export const splitTokensIntoWindows = (
  tokens: number[],
  options: ChunkingOptions
): TokenWindow[] => {
  validateChunkingOptions(options);
  const { maxTokensPerChunk, overlapTokens } = options;
  const step = maxTokensPerChunk - overlapTokens;
  const windows: TokenWindow[] = [];
  let start = 0;

  while (start < tokens.length) {
    const end = Math.min(start + maxTokensPerChunk, tokens.length);
    windows.push({ start, tokens: tokens.slice(start, end) });

    if (end === tokens.length) {
      break;
    }

    start += step;
  }

  return windows;
};

export const splitTextIntoChunks = (
  text: string,
  options: ChunkingOptions,
  tokenizer: Tokenizer
): TextChunk[] =>
  splitTokensIntoWindows(tokenizer.encode(text), options).map(
    (window, index) => ({
      index,
      startToken: window.start,
      tokenCount: window.tokens.length,
      text: tokenizer.decode(window.tokens),
    })
  );

/**
 * Packs separator-delimited parts greedily under a token budget. A part that is
 * larger than the budget on its own becomes a chunk of its own, unsplit.
 */
export const splitTextBySeparator = (
  text: string,
  { separator = "\n\n", maxTokensPerChunk }: SeparatorOptions,
  tokenizer: Tokenizer
): string[] => {
  if (!Number.isInteger(maxTokensPerChunk) || maxTokensPerChunk <= 0) {
    throw new ConfigurationError(
      `maxTokensPerChunk must be a positive integer (got ${maxTokensPerChunk})`
    );
  }
  if (!separator) {
    throw new ConfigurationError("separator must not be empty");
  }

  const chunks: string[] = [];
  let current = "";

  for (const raw of text.split(separator)) {
    const part = raw.trim();
    if (!part) {
      continue;
    }

    if (
      current &&
      countTokens(current + separator + part, tokenizer) > maxTokensPerChunk
    ) {
      chunks.push(current);
      current = part;
      continue;
    }

    current = current ? current + separator + part : part;
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
};
