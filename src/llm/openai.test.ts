import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenAIProvider } from './openai.js';

describe('OpenAIProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends the system prompt first and returns the completion text', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      new Response(
        JSON.stringify({
          model: 'gpt-4o-mini-2024-07-18',
          choices: [{ message: { content: 'Thirty days.' }, finish_reason: 'stop' }],
          usage: { prompt_tokens: 120, completion_tokens: 4 },
        }),
        { status: 200 }
      )
    );
    vi.stubGlobal('fetch', fetchMock);

    const provider = new OpenAIProvider('test-key', 'gpt-4o-mini', { baseUrl: 'https://chat.test/v1' });
    const response = await provider.complete([{ role: 'user', content: 'How long?' }], {
      systemPrompt: 'Be brief.',
      temperature: 0.3,
      maxTokens: 800,
    });

    expect(response).toEqual({
      content: 'Thirty days.',
      usage: { inputTokens: 120, outputTokens: 4 },
      model: 'gpt-4o-mini-2024-07-18',
      finishReason: 'stop',
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://chat.test/v1/chat/completions');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'How long?' },
      ],
      max_completion_tokens: 800,
      temperature: 0.3,
    });
  });

  it('falls back to the configured model name and empty content', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ choices: [] }), { status: 200 })));

    const response = await new OpenAIProvider('test-key').complete([{ role: 'user', content: 'hi' }]);

    expect(response).toEqual({ content: '', usage: undefined, model: 'gpt-4o-mini', finishReason: undefined });
  });

  it('throws with the status and body on an API error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('invalid api key', { status: 401 })));

    const provider = new OpenAIProvider('test-key', 'gpt-4o-mini', { retry: { maxRetries: 0, baseDelayMs: 0 } });

    await expect(provider.complete([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      'OpenAI API error: 401 invalid api key'
    );
  });
});
