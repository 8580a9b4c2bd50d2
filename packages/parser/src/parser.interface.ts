import type { ParseResult } from "@ragline/types";

/**
 * Turns raw document bytes into plain text for chunking.
 *
 * Implementations throw on content they cannot read; the registry wraps
 * foreign errors in an `ExtractionError`.
 */
export interface IParser {
  /** Short label used in logs and error details, e.g. "docling". */
  readonly name: string;
  readonly supportedMimeTypes: readonly string[];
  parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult>;
}
