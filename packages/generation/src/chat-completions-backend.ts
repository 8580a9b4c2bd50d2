import { z } from "zod";
import type { LlmConfig } from "@ragline/types";
import { GenerationError, toErrorMessage, withRetry } from "@ragline/errors";
import type { Logger } from "@ragline/logger";
import type { GenerationRequest, IGenerationBackend } from "./generation-backend.interface.js";
import { parseSseLines } from "./sse.js";

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }) }))
    .default([]),
});

const streamChunkSchema = z.object({
  choices: z
    .array(z.object({ delta: z.object({ content: z.string().nullish() }).default({}) }))
    .default([]),
  error: z.unknown().optional(),
});

const STREAM_DONE = "[DONE]";
const MAX_ERROR_BODY = 500;

interface ChatMessage {
  role: "system" | "user";
  content: string;
}

function isAbortError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "name" in err && err.name === "AbortError";
}

// The request timeout keeps running while the body downloads
async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    throw new GenerationError(
      `Generation backend response could not be read: ${toErrorMessage(err)}`,
      "GENERATION_UNAVAILABLE",
      { cause: err },
    );
  }
}

/**
 * OpenAI-compatible chat completions over HTTP (Hugging Face router,
 * vLLM, TGI and similar). Non-streaming calls retry transient failures;
 * streams are never retried.
 */
export class ChatCompletionsBackend implements IGenerationBackend {
  private readonly endpoint: string;

  constructor(
    private readonly config: LlmConfig,
    private readonly logger?: Logger,
  ) {
    this.endpoint = `${config.baseUrl.replace(/\/$/, "")}/chat/completions`;
  }

  async complete(request: GenerationRequest): Promise<string> {
    return withRetry(() => this.requestCompletion(request), {
      maxRetries: this.config.maxRetries,
      baseDelayMs: 500,
      maxDelayMs: 5_000,
      retryableErrors: ["GENERATION_UNAVAILABLE"],
      onRetry: ({ attempt, maxRetries, delayMs, error }) => {
        this.logger?.warn(
          { attempt, maxRetries, delayMs, err: error },
          "Generation request failed, retrying",
        );
      },
    });
  }

  async *completeStream(request: GenerationRequest, signal?: AbortSignal): AsyncGenerator<string> {
    signal?.throwIfAborted();

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forwardAbort, { once: true });
    // The timeout covers connecting and receiving headers only
    const timer = setTimeout(
      () => controller.abort(new GenerationError("Generation request timed out")),
      this.config.timeoutMs,
    );

    let finished = false;
    try {
      const response = await this.post(request, true, controller.signal).finally(() =>
        clearTimeout(timer),
      );
      if (!response.body) {
        throw new GenerationError("Generation stream returned no body");
      }

      const reader = response.body.getReader();
      try {
        for await (const data of parseSseLines(reader)) {
          if (data === STREAM_DONE) break;
          const text = this.parseStreamChunk(data);
          if (text) yield text;
        }
      } catch (err) {
        if (signal?.aborted || isAbortError(err) || err instanceof GenerationError) throw err;
        throw new GenerationError(
          `Generation stream interrupted: ${toErrorMessage(err)}`,
          "GENERATION_UNAVAILABLE",
          { cause: err },
        );
      }
      finished = true;
    } finally {
      signal?.removeEventListener("abort", forwardAbort);
      if (!finished) {
        // Early return or failure: release the connection
        controller.abort();
      }
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.requestCompletion({ prompt: "Hello", maxTokens: 1, temperature: 0.1 });
      return true;
    } catch (err) {
      this.logger?.warn({ err }, "Generation backend health probe failed");
      return false;
    }
  }

  private async requestCompletion(request: GenerationRequest): Promise<string> {
    const response = await this.post(request, false, AbortSignal.timeout(this.config.timeoutMs));

    const body = await readBody(response);
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new GenerationError(
        "Generation backend returned malformed JSON",
        "GENERATION_UNAVAILABLE",
        { cause: err },
      );
    }

    const parsed = completionSchema.safeParse(json);
    if (!parsed.success) {
      throw new GenerationError(
        "Generation backend returned an unexpected payload",
        "GENERATION_UNAVAILABLE",
        { cause: parsed.error },
      );
    }

    return parsed.data.choices[0]?.message.content?.trim() ?? "";
  }

  private async post(
    request: GenerationRequest,
    stream: boolean,
    signal: AbortSignal,
  ): Promise<Response> {
    const messages: ChatMessage[] = [];
    if (request.systemPrompt) {
      messages.push({ role: "system", content: request.systemPrompt });
    }
    messages.push({ role: "user", content: request.prompt });

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          "Content-Type": "application/json",
          Accept: stream ? "text/event-stream" : "application/json",
        },
        body: JSON.stringify({
          model: this.config.model,
          messages,
          max_tokens: request.maxTokens ?? this.config.maxTokens,
          temperature: request.temperature ?? this.config.temperature,
          stream,
        }),
        signal,
      });
    } catch (err) {
      // Timeouts raised by completeStream arrive as the abort reason itself
      if (err instanceof GenerationError || isAbortError(err)) throw err;
      throw new GenerationError(
        `Generation backend unreachable: ${toErrorMessage(err)}`,
        "GENERATION_UNAVAILABLE",
        { cause: err },
      );
    }

    if (!response.ok) {
      const body = (await readBody(response)).slice(0, MAX_ERROR_BODY);
      const transient = response.status === 429 || response.status >= 500;
      throw new GenerationError(
        `Generation failed (${response.status}): ${body}`,
        transient ? "GENERATION_UNAVAILABLE" : "GENERATION_REJECTED",
        { details: { status: response.status } },
      );
    }

    return response;
  }

  private parseStreamChunk(data: string): string {
    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (err) {
      throw new GenerationError("Generation stream sent malformed data", "GENERATION_UNAVAILABLE", {
        cause: err,
      });
    }

    const parsed = streamChunkSchema.safeParse(json);
    if (!parsed.success) {
      throw new GenerationError(
        "Generation stream sent an unexpected event",
        "GENERATION_UNAVAILABLE",
        { cause: parsed.error },
      );
    }
    if (parsed.data.error !== undefined) {
      throw new GenerationError(
        `Generation stream reported an error: ${JSON.stringify(parsed.data.error)}`,
        "GENERATION_UNAVAILABLE",
      );
    }

    return parsed.data.choices[0]?.delta.content ?? "";
  }
}
