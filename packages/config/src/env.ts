import { z } from "zod";
import { ConfigurationError } from "@ragline/errors";
import type { AppConfig, EmbeddingProviderType } from "@ragline/types";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((val) => (val ? val : undefined));

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) =>
      val
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const optionalPositiveInt = z
  .string()
  .trim()
  .optional()
  .transform((val) => (val ? Number(val) : undefined))
  .pipe(z.number().int().positive().optional());

/** Model and vector width used when EMBEDDING_MODEL / EMBEDDING_DIMENSIONS are unset. */
export const EMBEDDING_DEFAULTS: Record<
  EmbeddingProviderType,
  { model: string; dimensions: number }
> = {
  tei: { model: "sentence-transformers/all-MiniLM-L6-v2", dimensions: 384 },
  cohere: { model: "embed-v4.0", dimensions: 1024 },
};

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    HOST: z.string().default("0.0.0.0"),
    PORT: positiveInt("8000"),

    // ---------- CORS ----------
    CORS_ORIGINS: commaList("").refine((origins) => !origins.includes("*"), {
      message: 'CORS_ORIGINS must not be "*"; specify explicit origins',
    }),

    // ---------- Document storage ----------
    S3_BUCKET: z.string().trim().min(1, "S3_BUCKET is required"),
    S3_REGION: z.string().default("us-east-1"),
    S3_ENDPOINT: optionalString,
    S3_ACCESS_KEY_ID: optionalString,
    S3_SECRET_ACCESS_KEY: optionalString,
    S3_PREFIX: z.string().default(""),
    DOCUMENT_SUFFIXES: commaList(".pdf")
      .transform((suffixes) => suffixes.map((suffix) => suffix.toLowerCase()))
      .refine((suffixes) => suffixes.length > 0, {
        message: "DOCUMENT_SUFFIXES must name at least one suffix",
      }),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
    QDRANT_URL: z.string().url().default("http://localhost:6333"),
    QDRANT_API_KEY: optionalString,
    QDRANT_COLLECTION: z.string().trim().min(1).default("documents"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["tei", "cohere"]).default("tei"),
    EMBEDDING_URL: z.string().url().default("http://localhost:8080"),
    EMBEDDING_MODEL: optionalString,
    EMBEDDING_DIMENSIONS: optionalPositiveInt,
    EMBEDDING_BATCH_SIZE: positiveInt("32"),
    COHERE_API_KEY: optionalString,

    // ---------- Generation ----------
    LLM_API_KEY: z.string().trim().min(1, "LLM_API_KEY is required"),
    LLM_BASE_URL: z.string().url().default("https://router.huggingface.co/v1"),
    LLM_MODEL: z.string().default("mistralai/Mistral-7B-Instruct-v0.2:featherless-ai"),
    LLM_MAX_TOKENS: positiveInt("1000"),
    LLM_TEMPERATURE: z.string().default("0.7").transform(Number).pipe(z.number().min(0).max(2)),
    LLM_TIMEOUT_MS: positiveInt("30000"),
    LLM_MAX_RETRIES: z.string().default("3").transform(Number).pipe(z.number().int().nonnegative()),

    // ---------- Chunking & retrieval ----------
    CHUNK_SIZE: positiveInt("1000"),
    CHUNK_OVERLAP: z.string().default("200").transform(Number).pipe(z.number().int().nonnegative()),
    DEFAULT_TOP_K: positiveInt("5"),
    MAX_TOP_K: positiveInt("20"),

    // ---------- Extraction ----------
    DOCLING_PYTHON: z.string().default("python3"),
    DOCLING_SCRIPT: z.string().default("scripts/docling-parse.py"),

    ASSISTANT_DOMAIN: z.string().trim().min(1).default("AI policy, ethics, governance, and regulation"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (env.DEFAULT_TOP_K > env.MAX_TOP_K) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DEFAULT_TOP_K"],
        message: "DEFAULT_TOP_K must not exceed MAX_TOP_K",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
    if (
      env.EMBEDDING_PROVIDER === "cohere" &&
      env.EMBEDDING_MODEL !== undefined &&
      !env.EMBEDDING_MODEL.startsWith("embed-")
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["EMBEDDING_MODEL"],
        message: "EMBEDDING_MODEL must name a Cohere embed model when EMBEDDING_PROVIDER is cohere",
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ConfigurationError naming every failing variable.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      variable: issue.path.join("."),
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Invalid configuration: ${issues.map((i) => `${i.variable}: ${i.message}`).join("; ")}`,
      { details: { issues }, cause: result.error },
    );
  }

  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    server: {
      host: parsed.HOST,
      port: parsed.PORT,
      corsOrigins: parsed.CORS_ORIGINS,
    },

    storage: {
      bucket: parsed.S3_BUCKET,
      region: parsed.S3_REGION,
      endpoint: parsed.S3_ENDPOINT,
      accessKeyId: parsed.S3_ACCESS_KEY_ID,
      secretAccessKey: parsed.S3_SECRET_ACCESS_KEY,
      prefix: parsed.S3_PREFIX,
      documentSuffixes: parsed.DOCUMENT_SUFFIXES,
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collection: parsed.QDRANT_COLLECTION,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      url: parsed.EMBEDDING_URL,
      model: parsed.EMBEDDING_MODEL ?? EMBEDDING_DEFAULTS[parsed.EMBEDDING_PROVIDER].model,
      dimensions:
        parsed.EMBEDDING_DIMENSIONS ?? EMBEDDING_DEFAULTS[parsed.EMBEDDING_PROVIDER].dimensions,
      batchSize: parsed.EMBEDDING_BATCH_SIZE,
      cohereApiKey: parsed.COHERE_API_KEY,
    },

    llm: {
      apiKey: parsed.LLM_API_KEY,
      baseUrl: parsed.LLM_BASE_URL,
      model: parsed.LLM_MODEL,
      maxTokens: parsed.LLM_MAX_TOKENS,
      temperature: parsed.LLM_TEMPERATURE,
      timeoutMs: parsed.LLM_TIMEOUT_MS,
      maxRetries: parsed.LLM_MAX_RETRIES,
    },

    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
    },

    retrieval: {
      defaultTopK: parsed.DEFAULT_TOP_K,
      maxTopK: parsed.MAX_TOP_K,
    },

    extraction: {
      pythonPath: parsed.DOCLING_PYTHON,
      doclingScript: parsed.DOCLING_SCRIPT,
    },

    assistant: {
      domain: parsed.ASSISTANT_DOMAIN,
    },
  };
}
