/**
 * Error Types
 * Typed failures raised by the ingestion and query pipelines.
 */

export type ErrorKind =
  | 'extraction'
  | 'embedding_provider'
  | 'vector_store'
  | 'validation'
  | 'config'
  | 'internal';

/**
 * Base class for every failure the pipelines raise on purpose.
 */
export abstract class RagError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The document could not be read as a PDF. */
export class ExtractionError extends RagError {
  readonly kind = 'extraction';
}

/** The embedding service failed or returned an unusable response. */
export class EmbeddingProviderError extends RagError {
  readonly kind = 'embedding_provider';
}

/** Persisting or searching vectors failed. */
export class VectorStoreError extends RagError {
  readonly kind = 'vector_store';
}

/** The caller sent an unusable request. */
export class ValidationError extends RagError {
  readonly kind = 'validation';
}

/** The process environment is missing or has invalid settings. */
export class ConfigError extends RagError {
  readonly kind = 'config';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export function classifyError(error: unknown): ErrorKind {
  return error instanceof RagError ? error.kind : 'internal';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
