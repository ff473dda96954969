/**
 * Ingestion Pipeline
 * Extract → chunk → embed → upsert, one document at a time.
 */

import { Chunker } from '../rag/chunker.js';
import { Embedder, toBatches } from '../rag/embedder.js';
import { extractPages } from '../rag/text-extractor.js';
import type { Fragment, Page, StoredVectorRecord, VectorStoreAdapter } from '../rag/types.js';
import type { DocumentSource } from '../storage/document-source.js';

/** Longest fragment text kept in stored metadata; the embedding still covers the full fragment */
export const METADATA_TEXT_LIMIT = 1000;

export interface IngestRecord {
  bucket: string;
  key: string;
}

export interface IngestEvent {
  records: IngestRecord[];
}

export interface IngestFileResult {
  file: string;
  chunks: number;
}

export interface IngestResponse {
  statusCode: 200;
  body: {
    message: string;
    results: IngestFileResult[];
  };
}

export interface IngestionPipelineDeps {
  source: DocumentSource;
  chunker: Chunker;
  embedder: Embedder;
  store: VectorStoreAdapter;
  /** Defaults to PDF extraction */
  extract?: (bytes: Uint8Array) => Promise<Page[]>;
}

export function truncateForStorage(text: string, limit: number = METADATA_TEXT_LIMIT): string {
  const codePoints = Array.from(text);
  return codePoints.length <= limit ? text : codePoints.slice(0, limit).join('');
}

export function toStoredRecord(fragment: Fragment, sourceKey: string, values: number[]): StoredVectorRecord {
  return {
    id: fragment.id,
    values,
    metadata: {
      source: sourceKey,
      pages: fragment.pages,
      text: truncateForStorage(fragment.text),
    },
  };
}

/** Upload notifications are filtered on this suffix. */
export function isPdfKey(key: string): boolean {
  return key.toLowerCase().endsWith('.pdf');
}

export class IngestionPipeline {
  private source: DocumentSource;
  private chunker: Chunker;
  private embedder: Embedder;
  private store: VectorStoreAdapter;
  private extract: (bytes: Uint8Array) => Promise<Page[]>;

  constructor(deps: IngestionPipelineDeps) {
    this.source = deps.source;
    this.chunker = deps.chunker;
    this.embedder = deps.embedder;
    this.store = deps.store;
    this.extract = deps.extract ?? extractPages;
  }

  /**
   * Ingest one document. Resolves to the number of vectors upserted.
   */
  async ingestDocument(sourceKey: string, bytes: Uint8Array): Promise<number> {
    const pages = await this.extract(bytes);
    const fragments = this.chunker.chunk(pages, sourceKey);
    console.log(`[Ingest] Extracted ${fragments.length} chunks from ${sourceKey} (${pages.length} pages)`);

    const batchSize = this.embedder.getBatchSize();
    let totalUpserted = 0;
    let batchStart = 0;

    for (const batch of toBatches(fragments, batchSize)) {
      const vectors = await this.embedder.embed(batch.map((fragment) => fragment.text));
      const records = batch.map((fragment, offset) => toStoredRecord(fragment, sourceKey, vectors[offset]));

      totalUpserted += await this.store.upsert(records);
      console.log(`[Ingest] Upserted batch ${batchStart} - ${batchStart + batch.length} (${totalUpserted} total)`);
      batchStart += batch.length;
    }

    console.log(`[Ingest] Ingestion complete for ${sourceKey}. Total vectors upserted: ${totalUpserted}`);
    return totalUpserted;
  }

  /**
   * Ingest every PDF named in a storage event, in order. Other keys are skipped.
   * Any failure aborts the run and propagates to the caller.
   */
  async handleEvent(event: IngestEvent): Promise<IngestResponse> {
    const results: IngestFileResult[] = [];

    for (const { bucket, key } of event.records) {
      if (!isPdfKey(key)) {
        console.log(`[Ingest] Skipping non-PDF object: ${bucket}/${key}`);
        continue;
      }
      console.log(`[Ingest] Processing: ${bucket}/${key}`);
      const bytes = await this.source.getObject(bucket, key);
      const chunks = await this.ingestDocument(key, bytes);
      results.push({ file: key, chunks });
    }

    return {
      statusCode: 200,
      body: { message: 'Ingestion complete', results },
    };
  }
}
