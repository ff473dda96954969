/**
 * Embedding Providers
 * Embedding service implementations for vector generation.
 */

import { embeddingResponseSchema } from '../llm/openai-types.js';
import { DEFAULT_RETRY_POLICY, fetchWithRetry, type RetryPolicy } from '../llm/retry.js';
import type { EmbeddingProvider } from './types.js';

const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

/**
 * Vector size of a model in the built-in table, or undefined for any other model.
 */
export function knownEmbeddingDimensions(model: string): number | undefined {
  return Object.hasOwn(MODEL_DIMENSIONS, model) ? MODEL_DIMENSIONS[model] : undefined;
}

export interface OpenAIEmbeddingOptions {
  baseUrl?: string;
  retry?: RetryPolicy;
  /** Required for models missing from the built-in dimension table */
  dimensions?: number;
}

/**
 * OpenAI embedding provider.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private apiKey: string;
  private baseUrl: string;
  private model: string;
  private dimensions: number;
  private retry: RetryPolicy;

  constructor(
    apiKey: string,
    model: string = 'text-embedding-3-small',
    options: OpenAIEmbeddingOptions = {}
  ) {
    this.apiKey = apiKey;
    this.model = model;
    this.baseUrl = options.baseUrl ?? 'https://api.openai.com/v1';
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;

    const dimensions = options.dimensions ?? knownEmbeddingDimensions(model);
    if (dimensions === undefined) {
      throw new Error(`Unknown embedding dimension for model ${model}`);
    }
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    if (!embedding) {
      throw new Error('OpenAI embedding API returned no data');
    }
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await fetchWithRetry(
      `${this.baseUrl}/embeddings`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          input: texts,
        }),
      },
      this.retry,
      '[OpenAIEmbedding]'
    );

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI embedding API error: ${response.status} ${error}`);
    }

    const data = embeddingResponseSchema.parse(await response.json());

    // The API documents `index` as the input position; don't rely on array order
    return [...data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }

  getDimensions(): number {
    return this.dimensions;
  }
}
