/**
 * RAG (Retrieval-Augmented Generation) Types
 */

/**
 * Text of one PDF page.
 */
export interface Page {
  /** 0-based page number */
  index: number;
  /** Sanitized page text, empty when the page has none */
  text: string;
}

/**
 * Fragment produced by the chunker before it is given an ID.
 */
export interface ChunkDraft {
  text: string;
  /** Pages the fragment overlaps, in order of first appearance */
  pages: number[];
}

/**
 * Overlapping slice of a document, the unit of embedding and retrieval.
 */
export interface Fragment extends ChunkDraft {
  /** `{sourceKey}_{sequenceIndex}` */
  id: string;
}

export interface ChunkingOptions {
  chunkSize: number; // characters
  overlap: number; // characters shared by consecutive fragments
}

export interface VectorMetadata {
  /** Storage key of the source document */
  source: string;
  pages: number[];
  /** Fragment text, truncated for storage */
  text: string;
}

/**
 * Record persisted in the vector index.
 */
export interface StoredVectorRecord {
  id: string;
  values: number[];
  metadata: VectorMetadata;
}

/**
 * Fragment returned by a similarity search.
 */
export interface RetrievalMatch {
  text: string;
  /** Similarity, higher is better, rounded to 4 decimals */
  score: number;
  source: string;
  pages: number[];
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
  getDimensions(): number;
}

export interface VectorStoreAdapter {
  /** Insert or overwrite records by ID; resolves to the number written */
  upsert(records: StoredVectorRecord[]): Promise<number>;
  /** Up to `topK` matches ordered by descending score */
  query(vector: number[], topK: number): Promise<RetrievalMatch[]>;
}
