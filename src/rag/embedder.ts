import { EmbeddingProviderError, RagError, errorMessage } from '../errors.js';
import type { EmbeddingProvider } from './types.js';

export const DEFAULT_EMBEDDING_BATCH_SIZE = 50;

/**
 * Split a list into consecutive slices of at most `size` items.
 */
export function toBatches<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

/**
 * Embedder - batches texts through an embedding provider and checks the
 * vectors that come back.
 */
export class Embedder {
  private provider: EmbeddingProvider;
  private batchSize: number;

  constructor(provider: EmbeddingProvider, batchSize: number = DEFAULT_EMBEDDING_BATCH_SIZE) {
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }
    this.provider = provider;
    this.batchSize = batchSize;
  }

  getBatchSize(): number {
    return this.batchSize;
  }

  /**
   * Embed texts one batch at a time. Output order matches input order.
   */
  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const batch of toBatches(texts, this.batchSize)) {
      vectors.push(...(await this.embedOne(batch)));
    }
    return vectors;
  }

  /**
   * Embed a question as a single-element batch.
   */
  async embedQuestion(question: string): Promise<number[]> {
    const [vector] = await this.embedOne([question]);
    return vector;
  }

  private async embedOne(batch: string[]): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await this.provider.embedBatch(batch);
    } catch (error) {
      if (error instanceof RagError) {
        throw error;
      }
      throw new EmbeddingProviderError(`Embedding request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (vectors.length !== batch.length) {
      throw new EmbeddingProviderError(
        `Embedding provider returned ${vectors.length} vectors for ${batch.length} inputs`
      );
    }

    const dimensions = this.provider.getDimensions();
    const mismatch = vectors.find((vector) => vector.length !== dimensions);
    if (mismatch) {
      throw new EmbeddingProviderError(
        `Embedding has ${mismatch.length} dimensions, expected ${dimensions}`
      );
    }

    return vectors;
  }
}
