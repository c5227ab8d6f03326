import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";

export type Tokenizer = {
  model: string;
  encodingName: TiktokenEncoding;
  encode(text: string): number[];
  decode(tokens: number[]): string;
};

export const DEFAULT_ENCODING: TiktokenEncoding = "cl100k_base";

const MODEL_ENCODINGS: Record<string, TiktokenEncoding> = {
  "text-embedding-3-small": "cl100k_base",
  "text-embedding-3-large": "cl100k_base",
  "text-embedding-ada-002": "cl100k_base",
  "gpt-4": "cl100k_base",
  "gpt-4-turbo": "cl100k_base",
  "gpt-3.5-turbo": "cl100k_base",
  "gpt-4o": "o200k_base",
  "gpt-4o-mini": "o200k_base",
};

const encodings = new Map<TiktokenEncoding, Tiktoken>();
const tokenizers = new Map<string, Tokenizer>();

const loadEncoding = (name: TiktokenEncoding) => {
  let encoding = encodings.get(name);
  if (!encoding) {
    encoding = getEncoding(name);
    encodings.set(name, encoding);
  }
  return encoding;
};

export const encodingNameForModel = (model: string): TiktokenEncoding => {
  const known = MODEL_ENCODINGS[model];
  if (known) {
    return known;
  }
  console.warn(
    `[tokenizer] No specific tokenizer found for ${model}, using ${DEFAULT_ENCODING}`
  );
  return DEFAULT_ENCODING;
};

export const getTokenizer = (model = "text-embedding-3-small"): Tokenizer => {
  const cached = tokenizers.get(model);
  if (cached) {
    return cached;
  }

  const encodingName = encodingNameForModel(model);
  const encoding = loadEncoding(encodingName);
  const tokenizer: Tokenizer = {
    model,
    encodingName,
    encode: (text) => encoding.encode(text),
    decode: (tokens) => encoding.decode(tokens),
  };
  tokenizers.set(model, tokenizer);
  return tokenizer;
};

export const countTokens = (text: string, tokenizer: Tokenizer) =>
  tokenizer.encode(text).length;
