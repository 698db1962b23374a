/**
 * Resilient Fetch Utility
 *
 * Network resilience for provider requests:
 * - Per-attempt timeout so a stuck server cannot hang the session
 * - Retry with exponential backoff for transient failures
 * - Rate limit handling with Retry-After header parsing
 * - Caller AbortSignal aborts immediately, including during backoff
 */

import { CancellationError, ProviderError } from '../errors/index.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Network configuration for resilient fetch.
 */
export interface NetworkConfig {
  /** Per-attempt timeout in milliseconds (default: 300000) */
  timeout?: number;
  /** Maximum attempts (default: 3) */
  maxRetries?: number;
  /** Base delay between retries in ms (default: 1000) */
  baseRetryDelay?: number;
  /** Maximum delay between retries in ms (default: 30000) */
  maxRetryDelay?: number;
  /** HTTP status codes that trigger retry (default: [429, 500, 502, 503, 504]) */
  retryableStatusCodes?: number[];
}

export interface ResilientFetchOptions {
  url: string;
  init: RequestInit;
  /** Provider name for error messages */
  providerName: string;
  networkConfig?: NetworkConfig;
  /** External cancellation */
  signal?: AbortSignal;
  onRetry?: (attempt: number, delay: number, error: Error) => void;
}

export interface ResilientFetchResult {
  response: Response;
  attempts: number;
  /** Total duration in milliseconds */
  duration: number;
}

// =============================================================================
// DEFAULT CONFIG
// =============================================================================

// Local models can take minutes on a long context.
const DEFAULT_CONFIG: Required<NetworkConfig> = {
  timeout: 300000,
  maxRetries: 3,
  baseRetryDelay: 1000,
  maxRetryDelay: 30000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
};

// =============================================================================
// RESILIENT FETCH
// =============================================================================

/**
 * Perform a fetch with timeout, retry, and cancellation support.
 * Non-retryable HTTP errors are returned for the caller to interpret;
 * exhausted retries throw ProviderError, cancellation CancellationError.
 *
 * @example
 * ```typescript
 * const { response } = await resilientFetch({
 *   url: 'http://localhost:1234/v1/chat/completions',
 *   init: { method: 'POST', headers, body: JSON.stringify(body) },
 *   providerName: 'lm_studio',
 *   signal,
 * });
 * ```
 */
export async function resilientFetch(options: ResilientFetchOptions): Promise<ResilientFetchResult> {
  const { url, init, providerName, networkConfig = {}, signal, onRetry } = options;

  const config = { ...DEFAULT_CONFIG, ...networkConfig };
  const startTime = Date.now();
  let attempts = 0;

  while (true) {
    attempts++;
    throwIfAborted(signal);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.timeout);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let retryError: Error;
    let retryDelay: number;
    try {
      const response = await fetch(url, { ...init, signal: controller.signal });

      if (!config.retryableStatusCodes.includes(response.status)) {
        return { response, attempts, duration: Date.now() - startTime };
      }

      retryError = new Error(`HTTP ${response.status}: ${response.statusText}`);
      const retryAfter = parseRetryAfter(response.headers.get('Retry-After'));
      retryDelay =
        retryAfter !== null ? Math.min(retryAfter, config.maxRetryDelay) : calculateBackoff(attempts, config);

      if (attempts >= config.maxRetries) {
        throw response.status === 429
          ? ProviderError.rateLimited(providerName)
          : ProviderError.serverError(providerName, response.status);
      }
      // Free the connection before waiting.
      await response.body?.cancel();
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throwIfAborted(signal);

      if (error instanceof Error && error.name === 'AbortError') {
        retryError = new Error(`Request timeout after ${config.timeout}ms`);
      } else {
        retryError = error instanceof Error ? error : new Error(String(error));
      }

      if (attempts >= config.maxRetries) {
        throw new ProviderError(
          `${providerName} request failed after ${attempts} attempts: ${retryError.message}`,
          providerName,
          'NETWORK_ERROR',
          { cause: retryError }
        );
      }
      retryDelay = calculateBackoff(attempts, config);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }

    onRetry?.(attempts, retryDelay, retryError);
    await sleep(retryDelay, signal);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancellationError('Request cancelled by user');
  }
}

/**
 * Parse Retry-After header value (seconds or HTTP-date) into milliseconds.
 */
export function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) return null;
  const delay = date - Date.now();
  return delay > 0 ? delay : null;
}

/**
 * Exponential backoff with ±25% jitter, clamped to maxRetryDelay.
 */
function calculateBackoff(attempt: number, config: Required<NetworkConfig>): number {
  const exponentialDelay = config.baseRetryDelay * Math.pow(2, attempt - 1);
  const jitter = exponentialDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.min(exponentialDelay + jitter, config.maxRetryDelay);
}

/**
 * Sleep that ends early (with CancellationError) when the signal aborts.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancellationError('Request cancelled by user'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
