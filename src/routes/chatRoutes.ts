import type { Express, Request, Response } from "express";
import { z } from "zod";

import { HTTP_ERROR_STATUS, toHttpError } from "../errors";
import type { QueryService } from "../services/queryService";

const MISSING_QUESTION = "Missing question in request";

const chatSchema = z.object({
  question: z
    .string({
      required_error: MISSING_QUESTION,
      invalid_type_error: "question must be a string",
    })
    .trim()
    .min(1, MISSING_QUESTION),
});

type ParsedQuestion =
  | { question: string; error?: undefined }
  | { question?: undefined; error: string };

const parseQuestion = (req: Request): ParsedQuestion => {
  const parsed = chatSchema.safeParse(req.body ?? {});

  if (!parsed.success) {
    return {
      error: parsed.error.issues.map((issue) => issue.message).join(", "),
    };
  }

  return { question: parsed.data.question };
};

export const setupChatRoutes = (app: Express, queryService: QueryService) => {
  app.post("/api/chat", async (req: Request, res: Response) => {
    const { question, error } = parseQuestion(req);

    if (question === undefined) {
      res.status(HTTP_ERROR_STATUS.validation).json({ error });
      return;
    }

    try {
      const { answer, retrievedContext } = await queryService.answer(question);
      res.json({ answer, retrieved_context: retrievedContext });
    } catch (failure) {
      console.error("[http] Error processing chat query:", failure);
      const { status, message } = toHttpError(failure);
      res.status(status).json({ error: `An error occurred: ${message}` });
    }
  });

  app.post("/api/chat/stream", async (req: Request, res: Response) => {
    const { question, error } = parseQuestion(req);

    if (question === undefined) {
      res.status(HTTP_ERROR_STATUS.validation).json({ error });
      return;
    }

    const abortController = new AbortController();
    const abortHandler = () => {
      if (!res.writableEnded) {
        abortController.abort();
      }
    };
    res.on("close", abortHandler);

    req.socket.setTimeout(0);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const sendEvent = (event: string, data: unknown) => {
      res.write(`event: ${event}\n`);
      res.write(`data: ${JSON.stringify(data)}\n\n`);
    };

    try {
      const { answer, retrievedContext } = await queryService.answer(question, {
        onContext: (context) => {
          sendEvent("context", { retrieved_context: context });
        },
        onChunk: (delta) => {
          sendEvent("progress", { delta });
        },
        signal: abortController.signal,
      });
      sendEvent("done", { answer, retrieved_context: retrievedContext });
    } catch (failure) {
      console.error("[http] Streaming chat query failed:", failure);
      sendEvent("error", { message: toHttpError(failure).message });
    } finally {
      res.off("close", abortHandler);
      res.end();
    }
  });
};
