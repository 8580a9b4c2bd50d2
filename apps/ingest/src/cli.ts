import { parseArgs } from "node:util";
import type { FileIngestionResult, IngestionBatchSummary } from "@ragline/types";
import { ValidationError } from "@ragline/errors";

export interface IngestCliOptions {
  /** Narrows the listing below the configured storage prefix. */
  prefix?: string;
  concurrency: number;
  help: boolean;
}

export const USAGE = `Usage: ingest [--prefix <key prefix>] [--concurrency <n>]

Ingests every supported document in the configured bucket into the vector index.

  -p, --prefix        only ingest keys below this prefix
  -c, --concurrency   documents processed at once (default 1)
  -h, --help          show this message`;

const MAX_CONCURRENCY = 16;

function readFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      prefix: { type: "string", short: "p" },
      concurrency: { type: "string", short: "c", default: "1" },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

export function parseCliArgs(argv: string[]): IngestCliOptions {
  let values: ReturnType<typeof readFlags>;
  try {
    values = readFlags(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Invalid arguments";
    throw new ValidationError(message, {}, { cause: err });
  }

  const concurrency = Number(values.concurrency);
  if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
    throw new ValidationError(
      `--concurrency must be an integer between 1 and ${MAX_CONCURRENCY}`,
      { concurrency: `must be an integer between 1 and ${MAX_CONCURRENCY}` },
    );
  }

  return {
    prefix: values.prefix,
    concurrency,
    help: values.help ?? false,
  };
}

export function formatFileLine(result: FileIngestionResult): string {
  return result.status === "success"
    ? `✓ ${result.file}: ${result.chunks} chunk${result.chunks === 1 ? "" : "s"}`
    : `✗ ${result.file}: ${result.error}`;
}

export function formatSummary(summary: IngestionBatchSummary): string {
  const total = summary.processed + summary.failed;
  return (
    `Ingestion complete: ${summary.processed}/${total} documents succeeded, ` +
    `${summary.failed} failed`
  );
}

/** 0 when every listed document was ingested, 1 otherwise. */
export function exitCode(summary: IngestionBatchSummary): number {
  return summary.failed === 0 ? 0 : 1;
}
