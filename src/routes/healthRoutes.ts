import type { Express } from "express";

import { errorMessage } from "../errors";
import type { VectorStore } from "../services/contracts";

export const setupHealthRoutes = (
  app: Express,
  { vectorStore, indexName }: { vectorStore: VectorStore; indexName: string }
) => {
  app.get("/api/health", async (_req, res) => {
    try {
      await vectorStore.stats(indexName);
      res.json({ status: "ok", message: "Service is healthy" });
    } catch (error) {
      console.error("[http] Health check failed:", error);
      res.json({
        status: "error",
        message: `Service health check failed: ${errorMessage(error)}`,
      });
    }
  });
};
