export type { IGenerationBackend, GenerationRequest } from "./generation-backend.interface.js";
export { ChatCompletionsBackend } from "./chat-completions-backend.js";
export { parseSseLines } from "./sse.js";
export type { ByteReader } from "./sse.js";
