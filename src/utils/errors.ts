/**
 * @fileoverview Error taxonomy and result types.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - One subclass per failure the tool layer has to speak about
 * - OperationResult: tagged result returned by integration providers
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** No credential on file for the user and integration. */
export class NotConnectedError extends AppError {
  constructor(public readonly userId: string, public readonly integration: string) {
    super(`${integration} is not connected for ${userId}`, 'not_connected', true, { integration });
    this.name = 'NotConnectedError';
  }
}

/** OAuth callback arrived without a pending state for the user. */
export class StateNotFoundError extends AppError {
  constructor(integration: string) {
    super('OAuth state not found. Please restart the authorization flow.', 'state_not_found', true, { integration });
    this.name = 'StateNotFoundError';
  }
}

/** OAuth callback state differs from the one issued. */
export class CsrfMismatchError extends AppError {
  constructor(integration: string) {
    super('Invalid OAuth state. Possible CSRF attack.', 'csrf_mismatch', false, { integration });
    this.name = 'CsrfMismatchError';
  }
}

/** Access token expired and could not be renewed. */
export class CredentialExpiredError extends AppError {
  constructor(integration: string, reason: string) {
    super(`${integration} credentials expired and could not be refreshed: ${reason}`, 'credential_expired', true, { integration });
    this.name = 'CredentialExpiredError';
  }
}

/** The remote API rejected or failed the call. */
export class RemoteOperationError extends AppError {
  constructor(
    message: string,
    public readonly status?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'remote_failure', true, context);
    this.name = 'RemoteOperationError';
  }
}

/** Malformed user-supplied input (times, addresses, labels). */
export class ParseError extends AppError {
  constructor(message: string, public readonly input: string) {
    super(message, 'parse_error', true);
    this.name = 'ParseError';
  }
}

/**
 * Failure kinds a caller must handle. Each maps to a distinct spoken message.
 */
export type FailureKind =
  | 'not_connected'
  | 'credential_expired'
  | 'remote_failure'
  | 'parse_error';

export interface OperationFailure {
  kind: FailureKind;
  message: string;
}

/**
 * Result type for integration operations.
 * Callers switch on `error.kind` instead of catching.
 */
export type OperationResult<T> =
  | { success: true; data: T }
  | { success: false; error: OperationFailure };

export function ok<T>(data: T): OperationResult<T> {
  return { success: true, data };
}

export function fail<T>(kind: FailureKind, message: string): OperationResult<T> {
  return { success: false, error: { kind, message } };
}

/**
 * Classify a thrown value into an operation failure.
 * Anything outside the taxonomy is a remote failure.
 */
export function toFailure(error: unknown): OperationFailure {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof NotConnectedError) return { kind: 'not_connected', message };
  if (error instanceof CredentialExpiredError) return { kind: 'credential_expired', message };
  if (error instanceof ParseError) return { kind: 'parse_error', message };
  return { kind: 'remote_failure', message };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
