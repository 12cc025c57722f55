import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import { PipelineError, describeError } from "./errors";
import { componentLogger } from "./logger";
import type { QuestionResolver } from "./resolver";
import type { AnswerRequest } from "./types";

const logger = componentLogger("http");

const QueryBodySchema = z.object({
  query: z.string().trim().min(1, "query must be a non-empty string").max(4000),
  conversationId: z.string().trim().min(1).default("anonymous")
});

const WORKSPACE_HEADER = "x-workspace-id";

export interface ErrorBody {
  message: string;
  code?: string;
  retryable?: boolean;
}

export function errorStatus(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof PipelineError) {
    return { status: 503, body: { message: error.message, code: error.code, retryable: error.retryable } };
  }
  return { status: 500, body: { message: "Unexpected server error" } };
}

function parseRequest(req: Request): { request: AnswerRequest } | { issues: string[] } {
  const parsed = QueryBodySchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return { issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`) };
  }
  const workspace = req.header(WORKSPACE_HEADER)?.trim();
  return {
    request: {
      query: parsed.data.query,
      conversationId: parsed.data.conversationId,
      tenantId: workspace ? workspace : undefined
    }
  };
}

function writeEvent(res: Response, event: string, data: unknown): void {
  res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

export function createRouter(resolver: QuestionResolver): Router {
  const router = Router();

  router.post("/query", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = parseRequest(req);
    if ("issues" in parsed) {
      return res.status(400).json({ message: "Invalid request body.", issues: parsed.issues });
    }

    try {
      const response = await resolver.answerQuestion(parsed.request);
      return res.json(response);
    } catch (error) {
      if (error instanceof PipelineError) {
        logger.error("query:failed", { code: error.code, error: error.message });
        const { status, body } = errorStatus(error);
        return res.status(status).json(body);
      }
      return next(error);
    }
  });

  router.post("/query/stream", async (req: Request, res: Response) => {
    const parsed = parseRequest(req);
    if ("issues" in parsed) {
      return res.status(400).json({ message: "Invalid request body.", issues: parsed.issues });
    }

    res.status(200);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    try {
      for await (const event of resolver.streamAnswer(parsed.request)) {
        if (event.type === "delta") {
          writeEvent(res, "delta", { text: event.text });
        } else {
          writeEvent(res, "final", event.response);
        }
      }
    } catch (error) {
      logger.error("query_stream:failed", { error: describeError(error) });
      writeEvent(res, "error", errorStatus(error).body);
    }
    return res.end();
  });

  return router;
}
