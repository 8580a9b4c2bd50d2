import { spawn } from "node:child_process";
import { z } from "zod";
import type { ParseResult } from "@ragline/types";
import { ExtractionError } from "@ragline/errors";
import type { IParser } from "./parser.interface.js";

const DOCLING_MIME_TYPES = [
  "application/pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  "application/vnd.openxmlformats-officedocument.presentationml.presentation",
];

const doclingOutputSchema = z.object({
  text: z.string(),
  page_count: z.number().int().nonnegative(),
  metadata: z.record(z.unknown()).default({}),
});

export interface DoclingParserOptions {
  pythonPath?: string;
  scriptPath?: string;
  /** Kill the converter after this long. Default: 5 minutes */
  timeoutMs?: number;
}

/**
 * Python bridge to Docling for PDF/DOCX/PPTX parsing.
 * The document is piped to the script on stdin; the script answers with a
 * single JSON object holding the markdown export.
 */
export class DoclingParser implements IParser {
  readonly name = "docling";
  readonly supportedMimeTypes = DOCLING_MIME_TYPES;
  private readonly pythonPath: string;
  private readonly scriptPath: string;
  private readonly timeoutMs: number;

  constructor(options: DoclingParserOptions = {}) {
    this.pythonPath = options.pythonPath ?? "python3";
    this.scriptPath = options.scriptPath ?? "scripts/docling-parse.py";
    this.timeoutMs = options.timeoutMs ?? 300_000;
  }

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const inputBuffer = typeof input === "string" ? Buffer.from(input, "utf8") : Buffer.from(input);

    const stdout = await new Promise<string>((resolve, reject) => {
      const child = spawn(this.pythonPath, [this.scriptPath, "--mime-type", mimeType], {
        timeout: this.timeoutMs,
      });

      let out = "";
      let stderr = "";
      let settled = false;

      const fail = (err: ExtractionError): void => {
        if (settled) return;
        settled = true;
        reject(err);
      };

      child.stdout.on("data", (data: Buffer) => {
        out += data.toString();
      });

      child.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      child.on("error", (err) => {
        fail(new ExtractionError(`Failed to spawn Docling process: ${err.message}`, { cause: err }));
      });

      child.stdin.on("error", (err) => {
        fail(new ExtractionError(`Failed to send document to Docling: ${err.message}`, { cause: err }));
      });

      child.on("close", (code, signal) => {
        if (code !== 0) {
          const reason = signal ? `was killed by ${signal}` : `exited with code ${String(code)}`;
          fail(new ExtractionError(`Docling parser ${reason}: ${stderr.trim()}`));
          return;
        }
        if (!settled) {
          settled = true;
          resolve(out);
        }
      });

      child.stdin.end(inputBuffer);
    });

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (err) {
      throw new ExtractionError("Docling returned malformed output", { cause: err });
    }

    const result = doclingOutputSchema.safeParse(json);
    if (!result.success) {
      throw new ExtractionError("Docling returned an unexpected payload", { cause: result.error });
    }

    return {
      text: result.data.text,
      pageCount: result.data.page_count,
      metadata: { mimeType, ...result.data.metadata },
    };
  }
}
