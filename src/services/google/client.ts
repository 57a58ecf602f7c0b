/**
 * @fileoverview Shared Google API call handling.
 *
 * Loads the user's credential, runs the call with retry on 429/5xx, and
 * turns every failure into an OperationResult so tools never see a throw.
 */

import type { Auth } from 'googleapis';
import type { AppLogger } from '../../utils/observability/index.js';
import {
  CredentialExpiredError,
  errorMessage,
  fail,
  ok,
  toFailure,
  type OperationResult,
} from '../../utils/errors.js';
import type { Integration } from '../integrations.js';
import type { StoredCredential } from '../credentials/types.js';

/** Retry configuration for Google API calls. */
const MAX_RETRIES = 2;
const RETRY_DELAY_MS = 1000;

/**
 * What a provider needs from the credential lifecycle.
 */
export interface GoogleAuthSource {
  readonly integration: Integration;
  loadCredential(userId: string): Promise<StoredCredential>;
  toOAuthClient(credential: StoredCredential): Auth.OAuth2Client;
}

function errorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'number') return code;
  if (typeof code === 'string' && /^\d{3}$/.test(code)) return Number(code);
  const status: unknown = Reflect.get(error, 'status');
  return typeof status === 'number' ? status : undefined;
}

/**
 * Check if an error is retryable (429 or 5xx).
 */
export function isRetryableError(error: unknown): boolean {
  const code = errorStatus(error);
  return code !== undefined && (code === 429 || (code >= 500 && code < 600));
}

/**
 * Check if an error is due to insufficient OAuth scopes.
 */
export function isInsufficientScopesError(error: unknown): boolean {
  const message = errorMessage(error);
  return message.includes('insufficient authentication scopes') ||
         message.includes('Insufficient Permission');
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic.
 * Retries on 429/5xx errors with linear backoff.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  log: AppLogger,
  retryDelayMs = RETRY_DELAY_MS
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt < MAX_RETRIES && isRetryableError(error)) {
        log.warn('google_api_retry', {
          attempt: attempt + 1,
          maxRetries: MAX_RETRIES,
          status: errorStatus(error),
        });
        await sleep(retryDelayMs * (attempt + 1));
      } else {
        throw error;
      }
    }
  }
  throw lastError;
}

export interface GoogleCallOptions {
  auth: GoogleAuthSource;
  userId: string;
  /** Operation name for logs */
  operation: string;
  log: AppLogger;
  retryDelayMs?: number;
}

/**
 * Run a Google API operation for a user.
 *
 * Credential failures keep their kind (not connected, expired); scope errors
 * read as an expired grant so the user is asked to reconnect; anything else
 * is a remote failure.
 */
export async function runGoogleOperation<T>(
  options: GoogleCallOptions,
  fn: (client: Auth.OAuth2Client) => Promise<T>
): Promise<OperationResult<T>> {
  const { auth, userId, operation, log } = options;

  let client: Auth.OAuth2Client;
  try {
    client = auth.toOAuthClient(await auth.loadCredential(userId));
  } catch (error) {
    const failure = toFailure(error);
    log.warn('google_credential_unavailable', { userId, operation, kind: failure.kind });
    return { success: false, error: failure };
  }

  try {
    return ok(await withRetry(() => fn(client), log, options.retryDelayMs));
  } catch (error) {
    if (isInsufficientScopesError(error)) {
      log.warn('google_scope_missing', { userId, operation });
      return fail('credential_expired', new CredentialExpiredError(auth.integration, 'missing scope').message);
    }

    const failure = toFailure(error);
    log.error('google_operation_failed', {
      userId,
      operation,
      kind: failure.kind,
      status: errorStatus(error),
      error: failure.message,
    });
    return { success: false, error: failure };
  }
}
