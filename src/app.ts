import express, {
  type NextFunction,
  type Request,
  type Response,
} from "express";
import cors from "cors";

import { toHttpError, ValidationError } from "./errors";
import type { Services } from "./services/container";
import { setupChatRoutes } from "./routes/chatRoutes";
import { setupHealthRoutes } from "./routes/healthRoutes";

// body-parser tags the errors it raises with a `type`
const isMalformedBody = (error: unknown) =>
  typeof error === "object" &&
  error !== null &&
  "type" in error &&
  error.type === "entity.parse.failed";

const errorHandler = (
  error: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  let failure = error;
  if (isMalformedBody(error)) {
    failure = new ValidationError("Request body is not valid JSON");
  } else {
    console.error("[http] Unhandled request error:", error);
  }

  const { status, message } = toHttpError(failure);
  res.status(status).json({ error: message });
};

export const createApp = ({
  query,
  vectorStore,
  indexSpec,
}: Pick<Services, "query" | "vectorStore" | "indexSpec">) => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  setupChatRoutes(app, query);
  setupHealthRoutes(app, { vectorStore, indexName: indexSpec.name });

  app.use(errorHandler);

  return app;
};
