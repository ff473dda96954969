import { describe, it, expect, vi } from 'vitest';
import { createApp, createShutdownHandler } from './app.js';
import { loadConfig } from './config.js';
import { FakeLLM, FakeVectorStore, InMemoryDocumentSource } from './test-utils/fakes.js';

describe('createApp', () => {
  it('builds the embedding provider for a model with a configured vector size', async () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-key',
      VECTOR_INDEX: 'test-index',
      EMBEDDING_MODEL: 'nomic-embed-text',
      EMBEDDING_DIMENSIONS: '768',
    });

    const app = await createApp(config, {
      llm: new FakeLLM(),
      store: new FakeVectorStore(),
      source: new InMemoryDocumentSource(),
    });

    expect(app.queryPipeline).toBeDefined();
    expect(app.ingestionPipeline).toBeDefined();
  });
});

describe('createShutdownHandler', () => {
  it('exits with 0 once the server has stopped', async () => {
    const exit = vi.fn();
    const stop = vi.fn(async () => undefined);

    await createShutdownHandler({ stop }, exit)();

    expect(stop).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('exits with 1 when stopping the server fails', async () => {
    const exit = vi.fn();
    const stop = vi.fn(async () => {
      throw new Error('Server is not running.');
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(createShutdownHandler({ stop }, exit)()).resolves.toBeUndefined();

    expect(exit).toHaveBeenCalledWith(1);
    expect(exit).not.toHaveBeenCalledWith(0);
  });
});
