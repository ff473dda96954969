/**
 * LanceDB Vector Store Wrapper
 * Persists fragment vectors in a single LanceDB table and answers
 * nearest-neighbour queries against it.
 */

import { connect, type Connection, type Table } from '@lancedb/lancedb';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { VectorStoreError, errorMessage } from '../errors.js';
import type { RetrievalMatch, StoredVectorRecord, VectorStoreAdapter } from './types.js';

/**
 * Row layout of the vectors table. `pages` is JSON-encoded.
 */
export type LanceRow = {
  id: string;
  vector: number[];
  source: string;
  pages: string;
  text: string;
};

export function toLanceRow(record: StoredVectorRecord): LanceRow {
  return {
    id: record.id,
    vector: record.values,
    source: record.metadata.source,
    pages: JSON.stringify(record.metadata.pages),
    text: record.metadata.text,
  };
}

export function roundScore(score: number): number {
  return Math.round(score * 10000) / 10000;
}

function parsePages(value: unknown): number[] {
  if (typeof value !== 'string') {
    return [];
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter((page): page is number => typeof page === 'number') : [];
  } catch {
    return [];
  }
}

/**
 * Convert a search row into a match. Rows without text are not usable as
 * context and yield null.
 */
export function rowToMatch(row: Record<string, unknown>): RetrievalMatch | null {
  if (typeof row.text !== 'string') {
    return null;
  }

  // Cosine distance is 1 - cosine similarity
  const distance = typeof row._distance === 'number' ? row._distance : Number(row._distance);
  if (Number.isNaN(distance)) {
    return null;
  }

  return {
    text: row.text,
    score: roundScore(1 - distance),
    source: typeof row.source === 'string' ? row.source : 'unknown',
    pages: parsePages(row.pages),
  };
}

function mergeRows(table: Table, data: LanceRow[]): Promise<unknown> {
  return table.mergeInsert('id').whenMatchedUpdateAll().whenNotMatchedInsertAll().execute(data);
}

/**
 * LanceDB store for all ingested documents.
 */
export class LanceVectorStore implements VectorStoreAdapter {
  private dbPath: string;
  private tableName: string;
  private connection: Connection | null = null;
  private table: Table | null = null;
  // Pending first-upsert createTable; concurrent upserts wait on it and then merge
  private tableCreation: Promise<Table> | null = null;

  constructor(dbPath: string, tableName: string) {
    this.dbPath = dbPath;
    this.tableName = tableName;
  }

  /**
   * Initialize the LanceDB connection and open the table if it exists.
   */
  async init(): Promise<void> {
    const dir = dirname(this.dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    try {
      this.connection = await connect(this.dbPath);

      const tableNames = await this.connection.tableNames();
      if (tableNames.includes(this.tableName)) {
        this.table = await this.connection.openTable(this.tableName);
      }
      // Table will be created on first upsert if it doesn't exist
    } catch (error) {
      throw new VectorStoreError(`Failed to open vector store at ${this.dbPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async upsert(records: StoredVectorRecord[]): Promise<number> {
    if (records.length === 0) return 0;

    if (!this.connection) {
      throw new VectorStoreError('LanceVectorStore not initialized. Call init() first.');
    }

    const data = records.map(toLanceRow);

    try {
      if (this.table) {
        await mergeRows(this.table, data);
      } else if (this.tableCreation) {
        await mergeRows(await this.tableCreation, data);
      } else {
        this.tableCreation = this.connection.createTable(this.tableName, data);
        try {
          this.table = await this.tableCreation;
        } finally {
          this.tableCreation = null;
        }
      }
    } catch (error) {
      throw new VectorStoreError(`Upsert of ${records.length} vectors failed: ${errorMessage(error)}`, { cause: error });
    }

    return records.length;
  }

  async query(vector: number[], topK: number): Promise<RetrievalMatch[]> {
    if (!this.table) {
      return [];
    }

    let rows: Record<string, unknown>[];
    try {
      rows = await this.table.vectorSearch(vector).distanceType('cosine').limit(topK).toArray();
    } catch (error) {
      throw new VectorStoreError(`Vector query failed: ${errorMessage(error)}`, { cause: error });
    }

    return rows
      .map(rowToMatch)
      .filter((match): match is RetrievalMatch => match !== null)
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }

  /**
   * Get the total number of vectors in the store.
   */
  async getVectorCount(): Promise<number> {
    if (!this.table) {
      return 0;
    }
    return this.table.countRows();
  }

  /**
   * Release the connection.
   */
  async close(): Promise<void> {
    this.table = null;
    this.tableCreation = null;
    this.connection = null;
  }
}

/**
 * Create and initialize a LanceVectorStore.
 */
export async function createLanceStore(dbPath: string, tableName: string): Promise<LanceVectorStore> {
  const store = new LanceVectorStore(dbPath, tableName);
  await store.init();
  return store;
}
