/**
 * Configuration
 * Environment-driven settings, validated once at startup.
 */

import { resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { knownEmbeddingDimensions } from './rag/embedding-providers.js';

/** Characters shared by consecutive fragments. */
export const CHUNK_OVERLAP = 200;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    OPENAI_API_KEY: z.string().trim().min(1, 'OPENAI_API_KEY is required'),
    VECTOR_INDEX: z.string().trim().min(1, 'VECTOR_INDEX is required'),
    OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
    EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
    CHAT_MODEL: z.string().min(1).default('gpt-4o-mini'),
    CHUNK_SIZE: positiveInt(1000),
    TOP_K: positiveInt(5),
    EMBEDDING_BATCH_SIZE: positiveInt(50),
    PROVIDER_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    PROVIDER_RETRY_BASE_MS: z.coerce.number().int().min(0).default(1000),
    LANCEDB_PATH: z.string().min(1).default('./data/index.lance'),
    DOCUMENTS_DIR: z.string().min(1).default('./data/documents'),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  })
  .refine((env) => env.CHUNK_SIZE > CHUNK_OVERLAP, {
    message: `CHUNK_SIZE must be greater than the ${CHUNK_OVERLAP}-character overlap`,
    path: ['CHUNK_SIZE'],
  })
  .refine(
    (env) => env.EMBEDDING_DIMENSIONS !== undefined || knownEmbeddingDimensions(env.EMBEDDING_MODEL) !== undefined,
    (env) => ({
      message: `EMBEDDING_DIMENSIONS is required for embedding model ${env.EMBEDDING_MODEL}`,
      path: ['EMBEDDING_DIMENSIONS'],
    })
  );

export interface AppConfig {
  port: number;
  openaiApiKey: string;
  openaiBaseUrl: string;
  embeddingModel: string;
  /** Overrides the built-in vector size for the embedding model */
  embeddingDimensions?: number;
  chatModel: string;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  batchSize: number;
  retry: {
    maxRetries: number;
    baseDelayMs: number;
  };
  vectorIndex: string;
  lanceDbPath: string;
  documentsDir: string;
}

/**
 * Read and validate configuration from an environment map.
 * Empty strings count as unset so that blank lines in .env fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    openaiApiKey: values.OPENAI_API_KEY,
    openaiBaseUrl: values.OPENAI_BASE_URL.replace(/\/+$/, ''),
    embeddingModel: values.EMBEDDING_MODEL,
    embeddingDimensions: values.EMBEDDING_DIMENSIONS,
    chatModel: values.CHAT_MODEL,
    chunkSize: values.CHUNK_SIZE,
    chunkOverlap: CHUNK_OVERLAP,
    topK: values.TOP_K,
    batchSize: values.EMBEDDING_BATCH_SIZE,
    retry: {
      maxRetries: values.PROVIDER_MAX_RETRIES,
      baseDelayMs: values.PROVIDER_RETRY_BASE_MS,
    },
    vectorIndex: values.VECTOR_INDEX,
    lanceDbPath: resolve(values.LANCEDB_PATH),
    documentsDir: resolve(values.DOCUMENTS_DIR),
  };
}
