import type {
  AnswerResult,
  AnswerStreamEvent,
  HealthStatus,
  RetrievalContext,
} from "@ragline/types";
import type { IEmbeddingProvider } from "@ragline/embeddings";
import type { IGenerationBackend } from "@ragline/generation";
import type { IVectorStore } from "@ragline/vector-store";
import type { Logger } from "@ragline/logger";
import { ValidationError } from "@ragline/errors";
import { assembleContext } from "./context-assembler.js";
import { checkDependencies } from "./health.js";
import { buildAnswerPrompt, buildSystemPrompt, FALLBACK_ANSWER } from "./prompts.js";
import { QueryReformulator } from "./query-reformulator.js";
import { validateRetrievalRequest } from "./query-validator.js";
import { retrieve } from "./retrieval-pipeline.js";

export interface AnswerServiceDependencies {
  generation: IGenerationBackend;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  collectionName: string;
  /** Subject area the prompts are written for. */
  domain: string;
  logger: Logger;
  maxTopK?: number;
  now?: () => Date;
}

export interface AskOptions {
  topK: number;
}

export interface AskStreamOptions extends AskOptions {
  signal?: AbortSignal;
}

function isAbort(err: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  return err instanceof Error && err.name === "AbortError";
}

/**
 * Question answering over the indexed corpus.
 *
 * Each request reformulates, retrieves and assembles context exactly once,
 * then generates either a complete answer or a stream of text events.
 * Apart from input validation, failures are logged and answered with
 * {@link FALLBACK_ANSWER}. Nothing is cached between requests.
 */
export class AnswerService {
  private readonly reformulator: QueryReformulator;
  private readonly systemPrompt: string;

  constructor(private readonly deps: AnswerServiceDependencies) {
    this.reformulator = new QueryReformulator(deps.generation, deps.domain, deps.logger);
    this.systemPrompt = buildSystemPrompt(deps.domain);
  }

  async prepareContext(query: string, topK: number): Promise<RetrievalContext> {
    const reformulatedQuery = await this.reformulator.reformulate(query);

    const chunks = await retrieve(
      { query: reformulatedQuery, topK },
      {
        embeddingProvider: this.deps.embeddingProvider,
        vectorStore: this.deps.vectorStore,
        collectionName: this.deps.collectionName,
        maxTopK: this.deps.maxTopK,
      },
    );

    return {
      originalQuery: query,
      reformulatedQuery,
      chunks,
      context: assembleContext(chunks),
      documentCount: chunks.length,
    };
  }

  async ask(query: string, options: AskOptions): Promise<AnswerResult> {
    validateRetrievalRequest(query, options.topK, this.deps.maxTopK);

    let prepared: RetrievalContext | undefined;
    try {
      prepared = await this.prepareContext(query, options.topK);
      const answer = await this.deps.generation.complete({
        prompt: buildAnswerPrompt(query, prepared.context),
        systemPrompt: this.systemPrompt,
      });

      return {
        answer,
        query,
        reformulatedQuery: prepared.reformulatedQuery,
        documentCount: prepared.documentCount,
      };
    } catch (err) {
      if (err instanceof ValidationError) throw err;
      this.deps.logger.error({ err, query }, "Answer pipeline failed, returning fallback answer");
      return {
        answer: FALLBACK_ANSWER,
        query,
        reformulatedQuery: prepared?.reformulatedQuery ?? query,
        documentCount: prepared?.documentCount ?? 0,
      };
    }
  }

  /**
   * Emits one `metadata` event, then `chunk` events as text is generated,
   * then one `end` event. Aborting `signal` or returning early from the
   * iterator cancels generation; no further events follow.
   */
  async *askStream(query: string, options: AskStreamOptions): AsyncGenerator<AnswerStreamEvent> {
    validateRetrievalRequest(query, options.topK, this.deps.maxTopK);
    const { signal } = options;

    let prepared: RetrievalContext;
    try {
      prepared = await this.prepareContext(query, options.topK);
    } catch (err) {
      if (err instanceof ValidationError) throw err;
      this.deps.logger.error(
        { err, query },
        "Context preparation failed, streaming fallback answer",
      );
      yield { type: "metadata", query, reformulatedQuery: query, documentCount: 0 };
      yield { type: "chunk", content: FALLBACK_ANSWER };
      yield { type: "end" };
      return;
    }

    if (signal?.aborted) return;

    yield {
      type: "metadata",
      query,
      reformulatedQuery: prepared.reformulatedQuery,
      documentCount: prepared.documentCount,
    };

    let sentText = false;
    try {
      const stream = this.deps.generation.completeStream(
        {
          prompt: buildAnswerPrompt(query, prepared.context),
          systemPrompt: this.systemPrompt,
        },
        signal,
      );
      for await (const text of stream) {
        if (signal?.aborted) return;
        sentText = true;
        yield { type: "chunk", content: text };
      }
    } catch (err) {
      if (isAbort(err, signal)) {
        this.deps.logger.info({ query }, "Answer stream cancelled by client");
        return;
      }
      this.deps.logger.error({ err, query }, "Answer generation failed mid-stream");
      yield { type: "chunk", content: sentText ? `\n\n${FALLBACK_ANSWER}` : FALLBACK_ANSWER };
    }

    yield { type: "end" };
  }

  async healthCheck(): Promise<HealthStatus> {
    return checkDependencies(
      {
        generation: () => this.probe("generation", () => this.deps.generation.healthCheck()),
        vectorStore: () => this.probe("vectorStore", () => this.deps.vectorStore.healthCheck()),
      },
      this.deps.now,
    );
  }

  private async probe(name: string, check: () => Promise<boolean>): Promise<boolean> {
    try {
      return await check();
    } catch (err) {
      this.deps.logger.warn({ err, dependency: name }, "Health probe threw");
      return false;
    }
  }
}
