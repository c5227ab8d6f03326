import fs from "node:fs/promises";
import path from "node:path";

import { ValidationError } from "../errors";
import type { Document } from "../types/rag";

export const ALLOWED_EXTENSIONS = new Set([".md", ".txt", ".pdf"]);

export type LoadedDocument = Document & {
  /** Path relative to the directory it was found in; the file name for a single file. */
  relativePath: string;
};

const isAllowedFile = (fileName: string) =>
  ALLOWED_EXTENSIONS.has(path.extname(fileName).toLowerCase());

const findEligibleFiles = async (dir: string): Promise<string[]> => {
  const results: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    if (entry.name.startsWith(".")) {
      continue;
    }

    const resolved = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      results.push(...(await findEligibleFiles(resolved)));
    } else if (entry.isFile() && isAllowedFile(entry.name)) {
      results.push(resolved);
    }
  }

  return results.sort();
};

export const extractText = async (filePath: string): Promise<string> => {
  const extension = path.extname(filePath).toLowerCase();

  if (extension === ".pdf") {
    const { default: pdfParse } = await import("pdf-parse");
    const buffer = await fs.readFile(filePath);
    const parsed = await pdfParse(buffer);
    return parsed.text ?? "";
  }

  return await fs.readFile(filePath, "utf8");
};

/** Reads one file, or every eligible file under a directory, skipping blank documents. */
export const loadDocuments = async (
  target: string
): Promise<LoadedDocument[]> => {
  const resolved = path.resolve(target);
  const stats = await fs.stat(resolved).catch(() => {
    throw new ValidationError(`File not found: ${target}`);
  });

  if (stats.isFile()) {
    const text = await extractText(resolved);
    return text.trim()
      ? [{ source: resolved, relativePath: path.basename(resolved), text }]
      : [];
  }

  const documents: LoadedDocument[] = [];

  for (const filePath of await findEligibleFiles(resolved)) {
    const text = await extractText(filePath);

    if (!text.trim()) {
      continue;
    }

    documents.push({
      source: filePath,
      relativePath: path.relative(resolved, filePath).split(path.sep).join("/"),
      text,
    });
  }

  return documents;
};
