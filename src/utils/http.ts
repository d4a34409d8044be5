import { createLogger, describeError } from './logger.js';

const logger = createLogger('http');

/**
 * Retry behavior with exponential backoff.
 */
export interface RetryConfig {
  /** Retry attempts after the first request (default: 3). */
  maxRetries: number;
  /** Delay before the first retry, in ms (default: 1000). */
  initialDelayMs: number;
  /** Upper bound for any delay, in ms (default: 30000). */
  maxDelayMs: number;
  /** Abort an attempt that takes longer, in ms (default: 30000). */
  timeoutMs: number;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  timeoutMs: 30000,
};

const USER_AGENT = 'docs-to-pdf/1.0';

/**
 * 429 and 5xx are worth another attempt; everything else is final.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

/**
 * Backoff delay for `attempt` (0-based): `initialDelay * 2^attempt` with
 * ±25% jitter, raised to any `Retry-After` the server sent and clamped
 * to `maxDelayMs`.
 */
export function computeDelay(
  attempt: number,
  config: RetryConfig,
  response?: Response,
): number {
  const exponentialDelay = config.initialDelayMs * Math.pow(2, attempt);
  const jitter = exponentialDelay * 0.25 * (Math.random() * 2 - 1);
  let delay = exponentialDelay + jitter;

  const retryAfter = response?.headers.get('Retry-After');
  if (retryAfter) {
    const seconds = Number(retryAfter);
    if (!Number.isNaN(seconds)) {
      delay = Math.max(delay, seconds * 1000);
    } else {
      // HTTP-date form
      const retryDate = Date.parse(retryAfter);
      if (!Number.isNaN(retryDate)) {
        delay = Math.max(delay, retryDate - Date.now());
      }
    }
  }

  return Math.max(0, Math.min(delay, config.maxDelayMs));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type Attempt =
  | { kind: 'response'; response: Response }
  | { kind: 'network-error'; error: unknown };

async function attemptFetch(url: string, init: RequestInit, timeoutMs: number): Promise<Attempt> {
  try {
    const response = await fetch(url, {
      ...init,
      signal: init.signal ?? AbortSignal.timeout(timeoutMs),
    });
    return { kind: 'response', response };
  } catch (error: unknown) {
    return { kind: 'network-error', error };
  }
}

/**
 * Fetch a URL, retrying on 429/5xx responses, network errors and
 * per-attempt timeouts.
 *
 * @returns The first non-retryable response, or the last retryable one
 *   once attempts are exhausted.
 * @throws The last network error when no response was ever received.
 */
export async function fetchWithRetry(
  url: string,
  options: RequestInit = {},
  retryConfig: Partial<RetryConfig> = {},
): Promise<Response> {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...retryConfig };
  const attempts = config.maxRetries + 1;

  const headers = new Headers(options.headers);
  if (!headers.has('User-Agent')) {
    headers.set('User-Agent', USER_AGENT);
  }
  const init: RequestInit = { ...options, headers };

  let last: Attempt | undefined;
  for (let attempt = 0; attempt < attempts; attempt++) {
    if (last) {
      const delay = computeDelay(
        attempt - 1,
        config,
        last.kind === 'response' ? last.response : undefined,
      );
      logger.debug(`Retrying ${url} in ${Math.round(delay)}ms (attempt ${attempt + 1}/${attempts})`);
      await sleep(delay);
    }

    last = await attemptFetch(url, init, config.timeoutMs);
    if (last.kind === 'response') {
      if (!isRetryableStatus(last.response.status)) return last.response;
      logger.debug(`HTTP ${last.response.status} from ${url}`);
    } else {
      logger.debug(`Fetch error for ${url}: ${describeError(last.error)}`);
    }
  }

  if (last?.kind === 'response') return last.response;
  throw last?.error;
}

/**
 * GET `url` and return its body as text.
 *
 * @throws Error naming the status when the final response is not 2xx.
 */
export async function fetchText(
  url: string,
  retryConfig: Partial<RetryConfig> = {},
): Promise<string> {
  const response = await fetchWithRetry(url, {}, retryConfig);
  if (!response.ok) {
    throw new Error(`GET ${url} failed: HTTP ${response.status} ${response.statusText}`.trim());
  }
  return response.text();
}
