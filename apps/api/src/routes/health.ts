import { Router } from "express";
import type { AnswerService } from "@ragline/core";
import type { AppConfig } from "@ragline/types";
import { asyncHandler } from "../middleware/error-handler.js";

export interface HealthRouteDependencies {
  answerService: AnswerService;
  config: AppConfig;
}

export function createHealthRouter({ answerService, config }: HealthRouteDependencies): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json({ status: "healthy", message: "RAG assistant API is running" });
  });

  router.get(
    "/rag/health",
    asyncHandler(async (_req, res) => {
      const health = await answerService.healthCheck();
      res.status(health.overall === "unhealthy" ? 503 : 200).json(health);
    }),
  );

  // Configuration summary only; no dependency is probed here.
  router.get("/status", (_req, res) => {
    res.json({
      status: "ready",
      services: {
        storage: { bucket: config.storage.bucket, prefix: config.storage.prefix },
        vectorStore: { type: config.vectorStore.type, collection: config.vectorStore.collection },
        embedding: {
          provider: config.embedding.provider,
          model: config.embedding.model,
          dimensions: config.embedding.dimensions,
        },
        generation: { model: config.llm.model },
      },
      environment: config.nodeEnv,
    });
  });

  return router;
}
