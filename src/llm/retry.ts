/**
 * Retry policy for provider HTTP calls.
 */

export interface RetryPolicy {
  /** Extra attempts after the first; 0 disables retrying */
  maxRetries: number;
  /** Backoff base; attempt n waits base * 2^n plus up to base of jitter */
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
};

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function backoff(policy: RetryPolicy, attempt: number): number {
  return Math.pow(2, attempt) * policy.baseDelayMs + Math.random() * policy.baseDelayMs;
}

/**
 * Fetch with retry for transient errors (network failures, 5xx, 429).
 * Uses exponential backoff with jitter. The last response is returned as-is
 * once retries run out so callers can report its status.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  policy: RetryPolicy,
  logPrefix: string
): Promise<Response> {
  for (let attempt = 0; ; attempt++) {
    const canRetry = attempt < policy.maxRetries;

    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      if (!canRetry) {
        throw error;
      }
      const waitMs = backoff(policy, attempt);
      console.warn(`${logPrefix} Retrying after network error (attempt ${attempt + 1}/${policy.maxRetries}), waiting ${Math.round(waitMs)}ms`);
      await new Promise((resolve) => setTimeout(resolve, waitMs));
      continue;
    }

    if (response.ok || !isRetryableStatus(response.status) || !canRetry) {
      return response;
    }

    // Drain the body so the connection can be reused
    await response.text();
    const waitMs = backoff(policy, attempt);
    console.warn(`${logPrefix} Retrying after ${response.status} error (attempt ${attempt + 1}/${policy.maxRetries}), waiting ${Math.round(waitMs)}ms`);
    await new Promise((resolve) => setTimeout(resolve, waitMs));
  }
}
