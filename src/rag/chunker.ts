import { ConfigError } from '../errors.js';
import type { ChunkDraft, ChunkingOptions, Fragment, Page } from './types.js';

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
  chunkSize: 1000,
  overlap: 200,
};

function distinctInOrder(values: number[]): number[] {
  const result: number[] = [];
  for (const value of values) {
    if (!result.includes(value)) {
      result.push(value);
    }
  }
  return result;
}

/**
 * Document Chunker - Splits page text into overlapping fixed-size fragments
 *
 * Lengths count code points, so a surrogate pair is never split across fragments.
 */
export class Chunker {
  private options: ChunkingOptions;

  constructor(options?: Partial<ChunkingOptions>) {
    this.options = { ...DEFAULT_CHUNKING_OPTIONS, ...options };

    const { chunkSize, overlap } = this.options;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ConfigError([`chunkSize must be a positive integer, got ${chunkSize}`]);
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
      throw new ConfigError([`overlap must be an integer in [0, ${chunkSize}), got ${overlap}`]);
    }
  }

  /**
   * Split pages into fragment drafts, in document order.
   */
  split(pages: Page[]): ChunkDraft[] {
    const { chunkSize, overlap } = this.options;
    const drafts: ChunkDraft[] = [];

    // Parallel arrays: each buffered character and the page it came from
    let chars: string[] = [];
    let charPages: number[] = [];
    let touched: number[] = [];

    for (const page of pages) {
      for (const char of page.text) {
        chars.push(char);
        charPages.push(page.index);
        if (!touched.includes(page.index)) {
          touched.push(page.index);
        }

        if (chars.length >= chunkSize) {
          drafts.push({ text: chars.join(''), pages: [...touched] });

          // Carry the tail forward so consecutive fragments share context
          chars = chars.slice(chars.length - overlap);
          charPages = charPages.slice(charPages.length - overlap);
          touched = distinctInOrder(charPages);
        }
      }
    }

    const remainder = chars.join('');
    if (remainder.trim()) {
      drafts.push({ text: remainder, pages: touched });
    }

    return drafts;
  }

  /**
   * Split a document and number its fragments.
   */
  chunk(pages: Page[], sourceKey: string): Fragment[] {
    return this.split(pages).map((draft, index) => ({
      id: fragmentId(sourceKey, index),
      text: draft.text,
      pages: draft.pages,
    }));
  }
}

export function fragmentId(sourceKey: string, sequenceIndex: number): string {
  return `${sourceKey}_${sequenceIndex}`;
}
