import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { ValidationError } from "../errors";
import { loadDocuments } from "./documentLoader";

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "documents-"));
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("loadDocuments", () => {
  it("reads a single file", async () => {
    const file = path.join(root, "notes.txt");
    await fs.writeFile(file, "First note.", "utf8");

    expect(await loadDocuments(file)).toEqual([
      { source: file, relativePath: "notes.txt", text: "First note." },
    ]);
  });

  it("walks a directory for text and markdown, skipping hidden and blank files", async () => {
    await fs.mkdir(path.join(root, "guide"));
    await fs.mkdir(path.join(root, ".cache"));
    await fs.writeFile(path.join(root, "b.md"), "# B", "utf8");
    await fs.writeFile(path.join(root, "guide", "a.txt"), "A", "utf8");
    await fs.writeFile(path.join(root, "empty.txt"), "  \n", "utf8");
    await fs.writeFile(path.join(root, "image.png"), "binary", "utf8");
    await fs.writeFile(path.join(root, ".cache", "c.txt"), "C", "utf8");

    const documents = await loadDocuments(root);

    expect(documents.map((document) => [document.relativePath, document.text])).toEqual([
      ["b.md", "# B"],
      ["guide/a.txt", "A"],
    ]);
  });

  it("rejects a missing path", async () => {
    await expect(loadDocuments(path.join(root, "missing.txt"))).rejects.toThrow(
      ValidationError
    );
  });
});
