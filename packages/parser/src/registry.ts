import type { ParseResult } from "@ragline/types";
import { AppError, ExtractionError, toErrorMessage } from "@ragline/errors";
import type { IParser } from "./parser.interface.js";

const MIME_TYPES_BY_EXTENSION: Record<string, string> = {
  ".txt": "text/plain",
  ".md": "text/markdown",
  ".markdown": "text/markdown",
  ".csv": "text/csv",
  ".html": "text/html",
  ".htm": "text/html",
  ".json": "application/json",
  ".pdf": "application/pdf",
  ".docx": "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".pptx": "application/vnd.openxmlformats-officedocument.presentationml.presentation",
};

/** MIME type implied by a storage key's extension (case-insensitive). */
export function mimeTypeForKey(key: string): string | undefined {
  const name = key.slice(key.lastIndexOf("/") + 1);
  const dot = name.lastIndexOf(".");
  if (dot <= 0) return undefined;
  return MIME_TYPES_BY_EXTENSION[name.slice(dot).toLowerCase()];
}

/**
 * Selects a parser by the document's file extension.
 * Unknown extensions are rejected rather than guessed at.
 */
export class ParserRegistry {
  private readonly parsers: IParser[];

  constructor(parsers: IParser[]) {
    this.parsers = parsers;
  }

  getParser(mimeType: string): IParser | undefined {
    return this.parsers.find((p) => p.supportedMimeTypes.includes(mimeType));
  }

  async extract(input: Uint8Array, key: string): Promise<ParseResult> {
    const mimeType = mimeTypeForKey(key);
    const parser = mimeType === undefined ? undefined : this.getParser(mimeType);

    if (mimeType === undefined || !parser) {
      throw new ExtractionError(`Unsupported document type: ${key}`, {
        details: { key, mimeType },
      });
    }

    try {
      return await parser.parse(input, mimeType);
    } catch (err) {
      if (AppError.isAppError(err)) throw err;
      throw new ExtractionError(`Failed to extract text from ${key}: ${toErrorMessage(err)}`, {
        cause: err,
        details: { key, parser: parser.name },
      });
    }
  }
}
