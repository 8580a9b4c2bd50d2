import type { ParseResult } from "@ragline/types";
import { ExtractionError } from "@ragline/errors";
import type { IParser } from "./parser.interface.js";

const TEXT_MIME_TYPES = ["text/plain", "text/markdown", "text/csv", "text/html", "application/json"];

const CHARS_PER_PAGE = 3000;

const HTML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&nbsp;": " ",
};

/**
 * Text-based formats, handled in process.
 * Input must be valid UTF-8; a leading byte-order mark is dropped and line
 * endings are normalised to `\n` so paragraph separators survive chunking.
 */
export class TextParser implements IParser {
  readonly name = "text";
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const raw = typeof input === "string" ? input : this.decode(input);
    const text = this.normalise(raw);

    let cleanedText: string;
    switch (mimeType) {
      case "text/html":
        cleanedText = this.stripHtml(text);
        break;
      case "application/json":
        cleanedText = this.flattenJson(text);
        break;
      default:
        cleanedText = text;
    }

    return {
      text: cleanedText,
      pageCount: Math.max(1, Math.ceil(cleanedText.length / CHARS_PER_PAGE)),
      metadata: {
        mimeType,
        charCount: cleanedText.length,
        wordCount: cleanedText.split(/\s+/).filter((w) => w.length > 0).length,
      },
    };
  }

  private decode(input: Uint8Array): string {
    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(input);
    } catch (err) {
      throw new ExtractionError("Document is not valid UTF-8 text", { cause: err });
    }
  }

  private normalise(text: string): string {
    return text.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  }

  private stripHtml(html: string): string {
    return html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<\/(p|div|h[1-6]|li|tr|section|article)>/gi, "\n\n")
      .replace(/<br\s*\/?>/gi, "\n")
      .replace(/<[^>]+>/g, " ")
      .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
      .replace(/[ \t]+/g, " ")
      .replace(/ *\n */g, "\n")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  }

  /** One line per string leaf, so structured documents chunk by field. */
  private flattenJson(source: string): string {
    let value: unknown;
    try {
      value = JSON.parse(source);
    } catch (err) {
      throw new ExtractionError("Document is not valid JSON", { cause: err });
    }

    const lines: string[] = [];
    const visit = (node: unknown): void => {
      if (typeof node === "string") {
        if (node.trim().length > 0) lines.push(node.trim());
      } else if (Array.isArray(node)) {
        node.forEach(visit);
      } else if (typeof node === "object" && node !== null) {
        Object.values(node).forEach(visit);
      }
    };
    visit(value);
    return lines.join("\n");
  }
}
