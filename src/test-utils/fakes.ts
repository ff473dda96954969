/**
 * In-process stand-ins for the external collaborators, shared by the tests.
 */

import type { LLMMessage, LLMOptions, LLMProvider, LLMResponse } from '../llm/types.js';
import type { EmbeddingProvider, RetrievalMatch, StoredVectorRecord, VectorStoreAdapter } from '../rag/types.js';
import type { DocumentSource } from '../storage/document-source.js';

/** Deterministic 3-dimensional vector derived from the text */
export function fakeVector(text: string): number[] {
  return [text.length, text.codePointAt(0) ?? 0, 1];
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly batches: string[][] = [];

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    return texts.map(fakeVector);
  }

  getDimensions(): number {
    return 3;
  }
}

export class FakeVectorStore implements VectorStoreAdapter {
  readonly records = new Map<string, StoredVectorRecord>();
  readonly upsertCalls: StoredVectorRecord[][] = [];
  readonly queries: Array<{ vector: number[]; topK: number }> = [];
  /** Returned by query() when set; otherwise stored records are returned with score 0.9 */
  matches: RetrievalMatch[] | null = null;

  async upsert(records: StoredVectorRecord[]): Promise<number> {
    this.upsertCalls.push(records);
    for (const record of records) {
      this.records.set(record.id, record);
    }
    return records.length;
  }

  async query(vector: number[], topK: number): Promise<RetrievalMatch[]> {
    this.queries.push({ vector, topK });
    if (this.matches) {
      return this.matches.slice(0, topK);
    }
    return [...this.records.values()].slice(0, topK).map((record) => ({
      text: record.metadata.text,
      score: 0.9,
      source: record.metadata.source,
      pages: record.metadata.pages,
    }));
  }

  async getVectorCount(): Promise<number> {
    return this.records.size;
  }
}

export class FakeLLM implements LLMProvider {
  readonly name = 'fake';
  readonly model: string;
  readonly calls: Array<{ messages: LLMMessage[]; options?: LLMOptions }> = [];
  reply: string;

  constructor(reply: string = 'Fake answer.', model: string = 'gpt-4o-mini') {
    this.reply = reply;
    this.model = model;
  }

  async complete(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    this.calls.push({ messages, options });
    return { content: this.reply, model: this.model };
  }
}

export class InMemoryDocumentSource implements DocumentSource {
  private objects = new Map<string, Uint8Array>();

  put(bucket: string, key: string, bytes: Uint8Array): void {
    this.objects.set(`${bucket}/${key}`, bytes);
  }

  async getObject(bucket: string, key: string): Promise<Uint8Array> {
    const bytes = this.objects.get(`${bucket}/${key}`);
    if (!bytes) {
      throw new Error(`No such object: ${bucket}/${key}`);
    }
    return bytes;
  }
}

/** `length` characters cycling through a-z */
export function letters(length: number, offset: number = 0): string {
  return Array.from({ length }, (_, i) => String.fromCharCode(97 + ((i + offset) % 26))).join('');
}
