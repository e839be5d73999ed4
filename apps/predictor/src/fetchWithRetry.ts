/**
 * Fetch with retries and exponential backoff for external APIs.
 * Rate limits (429) and server errors (5xx) use longer backoff; optional Retry-After header honored.
 * Other 4xx responses are returned at once. Each attempt gets its own timeout when set.
 */
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_INITIAL_MS = 500;
const RATE_LIMIT_BACKOFF_MS = 2000;

export interface RetryConfig {
  maxRetries?: number;
  initialMs?: number;
  timeoutMs?: number;
}

function isRetryable(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status < 600);
}

export async function fetchWithRetry(
  url: string,
  options: RequestInit = {},
  config: RetryConfig = {}
): Promise<Response> {
  const { maxRetries = DEFAULT_MAX_RETRIES, initialMs = DEFAULT_INITIAL_MS, timeoutMs } = config;
  let lastError: Error | null = null;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    let delay = initialMs * Math.pow(2, attempt);
    try {
      const init = timeoutMs ? { ...options, signal: AbortSignal.timeout(timeoutMs) } : options;
      const res = await fetch(url, init);
      if (res.ok || !isRetryable(res.status) || attempt === maxRetries) return res;
      lastError = new Error(`HTTP ${res.status}`);
      // Release the connection; the body of a retried response is never read.
      await res.body?.cancel();
      delay = Math.max(delay, res.status === 429 ? RATE_LIMIT_BACKOFF_MS : 1000);
      const retryAfter = res.headers.get("Retry-After");
      if (retryAfter) {
        const sec = parseInt(retryAfter, 10);
        if (!Number.isNaN(sec)) delay = Math.max(delay, sec * 1000);
      }
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
    }
    if (attempt < maxRetries) await new Promise((r) => setTimeout(r, delay));
  }
  throw lastError ?? new Error("fetch failed");
}
