export { envSchema, parseEnv, EMBEDDING_DEFAULTS } from "./env.js";
export type { Env } from "./env.js";
