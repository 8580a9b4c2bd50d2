export { IngestionPipeline, INGESTION_CANCELLED } from "./ingestion-pipeline.js";
export type { IngestionPipelineDependencies, IngestAllOptions } from "./ingestion-pipeline.js";

export { retrieve } from "./retrieval-pipeline.js";
export type { RetrievalDependencies } from "./retrieval-pipeline.js";

export { AnswerService } from "./answer-service.js";
export type { AnswerServiceDependencies, AskOptions, AskStreamOptions } from "./answer-service.js";

export { QueryReformulator } from "./query-reformulator.js";
export { assembleContext, NO_DOCUMENTS_CONTEXT } from "./context-assembler.js";
export { validateRetrievalRequest, DEFAULT_MAX_TOP_K } from "./query-validator.js";
export { aggregateHealth, checkDependencies } from "./health.js";
export {
  FALLBACK_ANSWER,
  buildSystemPrompt,
  buildReformulationPrompt,
  buildAnswerPrompt,
} from "./prompts.js";
