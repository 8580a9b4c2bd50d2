import "dotenv/config";
import { parseEnv } from "@ragline/config";
import { createLogger, redactObject } from "@ragline/logger";
import { createRuntime, initialize } from "@ragline/runtime";
import { exitCode, formatFileLine, formatSummary, parseCliArgs, USAGE } from "./cli.js";

const SERVICE_NAME = "ragline-ingest";

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: SERVICE_NAME });
  logger.debug({ config: redactObject(config) }, "Loaded configuration");

  const runtime = createRuntime(config, logger);
  await initialize(runtime);

  // First SIGINT stops new documents from starting; a second one exits.
  const controller = new AbortController();
  process.on("SIGINT", () => {
    if (controller.signal.aborted) process.exit(130);
    logger.warn("Interrupted, finishing in-flight documents");
    controller.abort();
  });

  const summary = await runtime.ingestionPipeline.ingestAll({
    prefix: options.prefix,
    concurrency: options.concurrency,
    signal: controller.signal,
  });

  for (const file of summary.files) {
    if (file.status === "success") {
      logger.info({ file: file.file, chunks: file.chunks }, formatFileLine(file));
    } else {
      logger.error({ file: file.file, code: file.code }, formatFileLine(file));
    }
  }
  logger.info({ processed: summary.processed, failed: summary.failed }, formatSummary(summary));

  return exitCode(summary);
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    createLogger({ service: SERVICE_NAME }).fatal({ err }, "Ingestion failed");
    process.exit(1);
  },
);
