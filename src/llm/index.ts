export * from './types.js';
export { OpenAIProvider, type OpenAIProviderOptions } from './openai.js';
export { DEFAULT_RETRY_POLICY, fetchWithRetry, type RetryPolicy } from './retry.js';
