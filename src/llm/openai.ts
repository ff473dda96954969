import type { LLMProvider, LLMMessage, LLMOptions, LLMResponse } from './types.js';
import { chatCompletionResponseSchema, type OpenAIMessage } from './openai-types.js';
import { DEFAULT_RETRY_POLICY, fetchWithRetry, type RetryPolicy } from './retry.js';

export interface OpenAIProviderOptions {
  baseUrl?: string;
  retry?: RetryPolicy;
}

/**
 * OpenAI LLM Provider
 *
 * Chat Completions client used for answer synthesis, e.g.:
 * - gpt-4o-mini (default, fast and cheap)
 * - gpt-4o
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  readonly model: string;

  private apiKey: string;
  private baseUrl: string;
  private retry: RetryPolicy;

  constructor(apiKey: string, model: string = 'gpt-4o-mini', options: OpenAIProviderOptions = {}) {
    this.apiKey = apiKey;
    this.model = model;
    this.baseUrl = options.baseUrl ?? 'https://api.openai.com/v1';
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  async complete(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    const requestBody: Record<string, unknown> = {
      model: this.model,
      messages: this.convertMessages(messages, options?.systemPrompt),
      max_completion_tokens: options?.maxTokens ?? 4096,
      temperature: options?.temperature ?? 0.7,
    };

    if (options?.stopSequences) {
      requestBody.stop = options.stopSequences;
    }

    const response = await fetchWithRetry(
      `${this.baseUrl}/chat/completions`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(requestBody),
      },
      this.retry,
      '[OpenAI]'
    );

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI API error: ${response.status} ${error}`);
    }

    const data = chatCompletionResponseSchema.parse(await response.json());

    const choice = data.choices?.[0];
    const content = choice?.message?.content || '';

    return {
      content,
      usage: data.usage
        ? {
            inputTokens: data.usage.prompt_tokens || 0,
            outputTokens: data.usage.completion_tokens || 0,
          }
        : undefined,
      model: data.model || this.model,
      finishReason: choice?.finish_reason ?? undefined,
    };
  }

  private convertMessages(messages: LLMMessage[], systemPrompt?: string): OpenAIMessage[] {
    const result: OpenAIMessage[] = [];

    if (systemPrompt) {
      result.push({ role: 'system', content: systemPrompt });
    }

    for (const message of messages) {
      result.push({ role: message.role, content: message.content });
    }

    return result;
  }
}
