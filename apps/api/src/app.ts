import express, { type Express } from "express";
import cors from "cors";
import type { AnswerService } from "@ragline/core";
import type { Logger } from "@ragline/logger";
import type { AppConfig } from "@ragline/types";
import { requestContext } from "./middleware/request-context.js";
import { errorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { createChatRouter } from "./routes/chat.js";
import { createHealthRouter } from "./routes/health.js";
import { API_VERSION } from "./version.js";

export interface ApiDependencies {
  answerService: AnswerService;
  config: AppConfig;
  logger: Logger;
  now?: () => Date;
}

export function createApp(deps: ApiDependencies): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(requestContext(deps.logger));
  if (deps.config.server.corsOrigins.length > 0) {
    app.use(cors({ origin: deps.config.server.corsOrigins }));
  }
  app.use(express.json({ limit: "1mb" }));

  app.get("/internal/liveness", (_req, res) => {
    res.type("text/plain").send(`OK: ${API_VERSION}`);
  });

  app.use(
    "/api/v1/chat",
    createChatRouter({
      answerService: deps.answerService,
      retrieval: deps.config.retrieval,
      now: deps.now,
    }),
  );
  app.use("/api/v1", createHealthRouter(deps));

  app.use(notFoundHandler());
  app.use(errorHandler(deps.logger));

  return app;
}
