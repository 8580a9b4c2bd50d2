import "dotenv/config";
import { createServer, type Server } from "node:http";
import { parseEnv } from "@ragline/config";
import { createLogger, redactObject } from "@ragline/logger";
import { createRuntime, initialize } from "@ragline/runtime";
import { createApp } from "./app.js";
import { API_VERSION } from "./version.js";

const SERVICE_NAME = "ragline-api";

function listen(server: Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: SERVICE_NAME });
  logger.info({ config: redactObject(config), version: API_VERSION }, "Starting API");

  const runtime = createRuntime(config, logger);
  await initialize(runtime);

  const server = createServer(
    createApp({ answerService: runtime.answerService, config, logger }),
  );
  await listen(server, config.server.host, config.server.port);
  logger.info({ host: config.server.host, port: config.server.port }, "API listening");

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");
    server.closeIdleConnections();
    await close(server);
    logger.info("Server closed");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  createLogger({ service: SERVICE_NAME }).fatal({ err }, "API failed to start");
  process.exit(1);
});
