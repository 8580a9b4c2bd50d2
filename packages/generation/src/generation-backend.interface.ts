export interface GenerationRequest {
  prompt: string;
  /** Omitted or empty: no system message is sent. */
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface IGenerationBackend {
  complete(request: GenerationRequest): Promise<string>;
  /**
   * Yields text fragments as the backend produces them. Aborting `signal`
   * or returning early from the iterator cancels the underlying request.
   */
  completeStream(request: GenerationRequest, signal?: AbortSignal): AsyncIterable<string>;
  healthCheck(): Promise<boolean>;
}
