import { Router, type Request, type Response } from "express";
import { z } from "zod";
import type { AnswerService } from "@ragline/core";
import { ValidationError } from "@ragline/errors";
import type {
  AnswerResult,
  AnswerStreamEvent,
  ApiResponse,
  RetrievalSettings,
} from "@ragline/types";
import { asyncHandler } from "../middleware/error-handler.js";

export interface ChatRouteDependencies {
  answerService: AnswerService;
  retrieval: RetrievalSettings;
  now?: () => Date;
}

export function chatRequestSchema(retrieval: RetrievalSettings) {
  return z.object({
    query: z.string().min(1, "must not be empty"),
    stream: z.boolean().default(false),
    topK: z
      .number()
      .int()
      .min(1)
      .max(retrieval.maxTopK)
      .default(retrieval.defaultTopK),
  });
}

export type ChatRequest = z.infer<ReturnType<typeof chatRequestSchema>>;

function parseChatRequest(
  schema: ReturnType<typeof chatRequestSchema>,
  body: unknown,
): ChatRequest {
  const parsed = schema.safeParse(body);
  if (parsed.success) return parsed.data;

  const fields: Record<string, string> = {};
  for (const issue of parsed.error.issues) {
    fields[issue.path.join(".") || "body"] = issue.message;
  }
  const summary = Object.entries(fields)
    .map(([field, message]) => `${field} ${message}`)
    .join("; ");
  throw new ValidationError(`Invalid chat request: ${summary}`, fields);
}

function waitForDrain(res: Response): Promise<void> {
  return new Promise((resolve) => {
    const settle = (): void => {
      res.off("drain", settle);
      res.off("close", settle);
      resolve();
    };
    res.on("drain", settle);
    res.on("close", settle);
  });
}

async function writeEvent(res: Response, event: AnswerStreamEvent): Promise<void> {
  if (!res.write(`data: ${JSON.stringify(event)}\n\n`)) {
    await waitForDrain(res);
  }
}

/**
 * Streams an answer as Server-Sent Events. Headers are only sent once the
 * first event exists, so request validation still fails as a plain JSON 400.
 */
async function streamAnswer(
  answerService: AnswerService,
  request: ChatRequest,
  req: Request,
  res: Response,
): Promise<void> {
  const controller = new AbortController();
  let finished = false;
  res.on("close", () => {
    if (!finished) {
      req.log?.info("Client disconnected, aborting answer stream");
      controller.abort();
    }
  });

  try {
    const stream = answerService.askStream(request.query, {
      topK: request.topK,
      signal: controller.signal,
    });

    let step = await stream.next();
    if (controller.signal.aborted) {
      await stream.return(undefined);
      return;
    }

    res.status(200).set({
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.flushHeaders();

    while (!step.done) {
      await writeEvent(res, step.value);
      step = await stream.next();
    }
    res.end();
  } finally {
    finished = true;
  }
}

export function createChatRouter(deps: ChatRouteDependencies): Router {
  const router = Router();
  const schema = chatRequestSchema(deps.retrieval);
  const now = deps.now ?? (() => new Date());

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const request = parseChatRequest(schema, req.body);

      if (request.stream) {
        await streamAnswer(deps.answerService, request, req, res);
        return;
      }

      const result = await deps.answerService.ask(request.query, { topK: request.topK });
      const body: ApiResponse<AnswerResult & { timestamp: string }> = {
        success: true,
        data: { ...result, timestamp: now().toISOString() },
      };
      res.json(body);
    }),
  );

  return router;
}
