import { describe, it, expect } from 'vitest';
import { ConfigError } from '../errors.js';
import { letters } from '../test-utils/fakes.js';
import { Chunker, fragmentId } from './chunker.js';
import type { Page } from './types.js';

describe('Chunker', () => {
  const chunker = new Chunker({ chunkSize: 1000, overlap: 200 });

  it('splits a 2400-character page into three overlapping fragments', () => {
    const text = letters(2400);
    const drafts = chunker.split([{ index: 0, text }]);

    expect(drafts.map((d) => d.text)).toEqual([
      text.slice(0, 1000),
      text.slice(800, 1800),
      text.slice(1600, 2400),
    ]);
    expect(drafts.map((d) => d.text.length)).toEqual([1000, 1000, 800]);
    expect(drafts.map((d) => d.pages)).toEqual([[0], [0], [0]]);
  });

  it('emits nothing for an empty document', () => {
    expect(chunker.split([])).toEqual([]);
    expect(chunker.split([{ index: 0, text: '' }, { index: 1, text: '' }])).toEqual([]);
  });

  it('emits nothing when every page is whitespace', () => {
    expect(chunker.split([{ index: 0, text: '   \n' }, { index: 1, text: '\t' }])).toEqual([]);
  });

  it('emits a single fragment covering every page with text when the document is short', () => {
    const drafts = chunker.split([
      { index: 0, text: 'Hello' },
      { index: 1, text: '' },
      { index: 2, text: ' world' },
    ]);

    expect(drafts).toEqual([{ text: 'Hello world', pages: [0, 2] }]);
  });

  it('tags fragments with every page they overlap', () => {
    const pages: Page[] = [
      { index: 0, text: letters(700) },
      { index: 1, text: '' },
      { index: 2, text: letters(1500, 3) },
      { index: 3, text: letters(333, 7) },
    ];

    const drafts = chunker.split(pages);

    expect(drafts.map((d) => d.pages)).toEqual([[0, 2], [2], [2, 3]]);
    expect(drafts.map((d) => d.text.length)).toEqual([1000, 1000, 933]);
  });

  it('carries forward the pages of the overlap, not just the current page', () => {
    const drafts = chunker.split([
      { index: 0, text: letters(900) },
      { index: 1, text: letters(400) },
    ]);

    expect(drafts).toHaveLength(2);
    expect(drafts[0].pages).toEqual([0, 1]);
    // Characters 800-999 span both pages
    expect(drafts[1].pages).toEqual([0, 1]);
    expect(drafts[1].text.length).toBe(500);
  });

  it('keeps a 200-character overlap between consecutive fragments', () => {
    const pages: Page[] = [
      { index: 0, text: letters(1234) },
      { index: 1, text: letters(2001, 5) },
      { index: 2, text: letters(456, 11) },
    ];

    const drafts = chunker.split(pages);
    expect(drafts.length).toBeGreaterThan(2);

    for (let i = 1; i < drafts.length; i++) {
      expect(drafts[i].text.slice(0, 200)).toBe(drafts[i - 1].text.slice(-200));
    }
  });

  it('reconstructs the document text when overlaps are removed', () => {
    const pages: Page[] = [
      { index: 0, text: letters(1234) },
      { index: 1, text: '' },
      { index: 2, text: letters(2001, 5) },
      { index: 3, text: letters(456, 11) },
    ];

    const drafts = chunker.split(pages);
    const rebuilt = drafts.map((d, i) => (i === 0 ? d.text : d.text.slice(200))).join('');

    expect(rebuilt).toBe(pages.map((p) => p.text).join(''));
  });

  it('emits the bare overlap as a final fragment when text ends on a boundary', () => {
    const text = letters(1000);
    const drafts = chunker.split([{ index: 0, text }]);

    expect(drafts.map((d) => d.text)).toEqual([text, text.slice(800)]);
  });

  it('counts code points rather than UTF-16 units', () => {
    const drafts = chunker.split([{ index: 0, text: '😀'.repeat(1200) }]);

    expect(drafts).toHaveLength(2);
    expect(Array.from(drafts[0].text)).toHaveLength(1000);
    expect(Array.from(drafts[1].text)).toHaveLength(400);
  });

  it('numbers fragments per document', () => {
    const fragments = chunker.chunk([{ index: 0, text: letters(2400) }], 'reports/q3.pdf');

    expect(fragments.map((f) => f.id)).toEqual(['reports/q3.pdf_0', 'reports/q3.pdf_1', 'reports/q3.pdf_2']);
    expect(fragmentId('a.pdf', 7)).toBe('a.pdf_7');
  });

  it('supports a zero overlap', () => {
    const text = letters(2500);
    const drafts = new Chunker({ chunkSize: 1000, overlap: 0 }).split([{ index: 0, text }]);

    expect(drafts.map((d) => d.text)).toEqual([text.slice(0, 1000), text.slice(1000, 2000), text.slice(2000)]);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => new Chunker({ chunkSize: 200, overlap: 200 })).toThrow(ConfigError);
    expect(() => new Chunker({ chunkSize: 0 })).toThrow(ConfigError);
  });
});
