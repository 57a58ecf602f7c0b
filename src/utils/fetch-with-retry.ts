/**
 * @fileoverview Retry wrapper for memory store HTTP calls.
 *
 * Follows the Google call policy: two retries with linear backoff on 429/5xx
 * and on connection failures. Once the caller's signal has aborted, the last
 * outcome is returned or thrown as is.
 */

import { createLogger } from './observability/index.js';
import { errorMessage } from './errors.js';

const log = createLogger({ domain: 'http' });

const MAX_RETRIES = 2;
const RETRY_DELAY_MS = 250;

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/** undici reports refused, reset and DNS failures as `TypeError: fetch failed`. */
function isConnectionError(error: unknown): boolean {
  return error instanceof TypeError && error.message.includes('fetch failed');
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * `fetch` with retries. Non-retryable responses come back unchanged so the
 * caller can map the status.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  operation: string,
  retryDelayMs = RETRY_DELAY_MS
): Promise<Response> {
  for (let attempt = 0; ; attempt++) {
    const canRetry = attempt < MAX_RETRIES;

    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      if (!canRetry || init.signal?.aborted || !isConnectionError(error)) {
        throw error;
      }
      log.warn('http_retry', { operation, attempt: attempt + 1, maxRetries: MAX_RETRIES, error: errorMessage(error) });
      await sleep(retryDelayMs * (attempt + 1));
      continue;
    }

    if (response.ok || !canRetry || init.signal?.aborted || !isRetryableStatus(response.status)) {
      return response;
    }
    log.warn('http_retry', { operation, attempt: attempt + 1, maxRetries: MAX_RETRIES, status: response.status });
    await sleep(retryDelayMs * (attempt + 1));
  }
}
