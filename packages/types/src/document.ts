export interface SourceDocument {
  /** Logical storage key, e.g. `policies/eu-ai-act.pdf`. */
  key: string;
  content: Uint8Array;
}

export interface ParseResult {
  text: string;
  pageCount: number;
  metadata: Record<string, unknown>;
}
