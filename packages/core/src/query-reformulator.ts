import type { IGenerationBackend } from "@ragline/generation";
import type { Logger } from "@ragline/logger";
import { buildReformulationPrompt } from "./prompts.js";

const REFORMULATION_MAX_TOKENS = 100;
const REFORMULATION_TEMPERATURE = 0.3;

/**
 * Rewrites a user question into a retrieval-oriented query.
 * Never fails: any backend error or blank rewrite yields the original query.
 */
export class QueryReformulator {
  constructor(
    private readonly generation: IGenerationBackend,
    private readonly domain: string,
    private readonly logger: Logger,
  ) {}

  async reformulate(userQuery: string): Promise<string> {
    let rewritten: string;
    try {
      rewritten = await this.generation.complete({
        prompt: buildReformulationPrompt(userQuery, this.domain),
        systemPrompt: "",
        maxTokens: REFORMULATION_MAX_TOKENS,
        temperature: REFORMULATION_TEMPERATURE,
      });
    } catch (err) {
      this.logger.warn({ err }, "Query reformulation failed, using original query");
      return userQuery;
    }

    const trimmed = rewritten.trim();
    if (!trimmed) {
      this.logger.warn("Query reformulation returned an empty result, using original query");
      return userQuery;
    }

    this.logger.info({ query: userQuery, reformulatedQuery: trimmed }, "Query reformulated");
    return trimmed;
  }
}
