import { describe, it, expect } from 'vitest';
import { EmbeddingProviderError } from '../errors.js';
import { FakeEmbeddingProvider, fakeVector } from '../test-utils/fakes.js';
import { Embedder, toBatches } from './embedder.js';
import type { EmbeddingProvider } from './types.js';

const texts = ['alpha', 'bravo!', 'charlie', 'd', 'echo echo', 'fox', 'golf course'];

describe('toBatches', () => {
  it('splits into consecutive slices with a short tail', () => {
    expect(toBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(toBatches([], 3)).toEqual([]);
  });
});

describe('Embedder', () => {
  it('embeds in fixed-size batches and keeps input order', async () => {
    const provider = new FakeEmbeddingProvider();
    const vectors = await new Embedder(provider, 3).embed(texts);

    expect(provider.batches).toEqual([texts.slice(0, 3), texts.slice(3, 6), texts.slice(6)]);
    expect(vectors).toEqual(texts.map(fakeVector));
  });

  it('produces the same output regardless of batch boundaries', async () => {
    const whole = await new Embedder(new FakeEmbeddingProvider(), texts.length).embed(texts);
    const split = await new Embedder(new FakeEmbeddingProvider(), 4).embed(texts);

    expect(split).toEqual(whole);
  });

  it('embeds a question as a single-element batch', async () => {
    const provider = new FakeEmbeddingProvider();
    const vector = await new Embedder(provider).embedQuestion('What is the refund window?');

    expect(provider.batches).toEqual([['What is the refund window?']]);
    expect(vector).toEqual([26, 87, 1]);
  });

  it('makes no request for an empty list', async () => {
    const provider = new FakeEmbeddingProvider();

    expect(await new Embedder(provider).embed([])).toEqual([]);
    expect(provider.batches).toEqual([]);
  });

  it('wraps provider failures in EmbeddingProviderError', async () => {
    const provider: EmbeddingProvider = {
      embed: async () => [],
      embedBatch: async () => {
        throw new Error('socket hang up');
      },
      getDimensions: () => 3,
    };

    await expect(new Embedder(provider).embed(['x'])).rejects.toThrow(
      new EmbeddingProviderError('Embedding request failed: socket hang up')
    );
  });

  it('rejects a response with the wrong number of vectors', async () => {
    const provider: EmbeddingProvider = {
      embed: async () => [],
      embedBatch: async () => [[1, 2, 3]],
      getDimensions: () => 3,
    };

    await expect(new Embedder(provider).embed(['a', 'b'])).rejects.toThrow(
      'Embedding provider returned 1 vectors for 2 inputs'
    );
  });

  it('rejects vectors whose dimension differs from the provider dimension', async () => {
    const provider: EmbeddingProvider = {
      embed: async () => [],
      embedBatch: async (batch) => batch.map(() => [1, 2]),
      getDimensions: () => 3,
    };

    await expect(new Embedder(provider).embedQuestion('q')).rejects.toBeInstanceOf(EmbeddingProviderError);
  });

  it('requires a positive batch size', () => {
    expect(() => new Embedder(new FakeEmbeddingProvider(), 0)).toThrow(RangeError);
  });
});
