/**
 * @fileoverview Credential store interface for OAuth tokens.
 *
 * Tokens are stored keyed by user id and integration ('email', 'calendar').
 * Implementations handle encryption - callers work with plain credentials.
 */

import type { Integration } from '../integrations.js';

/**
 * OAuth credential stored for a user and integration.
 */
export interface StoredCredential {
  /** Access token */
  token: string;
  /** Absent when the authorization server did not issue one */
  refreshToken: string | null;
  tokenUri: string;
  clientId: string;
  clientSecret: string;
  scopes: string[];
  /** Unix timestamp in milliseconds; null when the server gave no expiry */
  expiry: number | null;
}

/**
 * Interface for credential storage backends.
 *
 * Note: Methods return Promises for interface flexibility, but the SQLite
 * implementation (better-sqlite3) is synchronous. The async signature
 * allows swapping to an async backend without changing callers.
 */
export interface CredentialStore {
  /**
   * Get credentials for a user and integration.
   * @returns Credentials or null if not found.
   */
  get(userId: string, integration: Integration): Promise<StoredCredential | null>;

  /**
   * Store credentials for a user and integration.
   * Overwrites existing credentials if present.
   */
  set(userId: string, integration: Integration, credential: StoredCredential): Promise<void>;

  close?(): void;
}

/**
 * Single-use OAuth state tracking, at most one pending state per user and
 * integration.
 */
export interface PendingStateStore {
  /** Record a state, replacing any earlier one for the pair. */
  put(userId: string, integration: Integration, state: string, expiresAt: number): void;

  /** Active state for the pair, or null when missing or expired. */
  get(userId: string, integration: Integration): string | null;

  delete(userId: string, integration: Integration): void;

  /** Owner of an active state, used when the callback carries no user id. */
  findUser(integration: Integration, state: string): string | null;

  close(): void;
}

/**
 * Per-integration OAuth lifecycle:
 * Disconnected -> AuthorizationPending -> Connected, refreshed in place.
 */
export interface CredentialLifecycle {
  readonly integration: Integration;

  /** Authorization URL carrying a fresh single-use state. */
  beginAuthorization(userId: string): string;

  /**
   * Validate the callback state and exchange the code.
   * The caller persists the returned credential.
   */
  completeAuthorization(code: string, state: string, userId: string): Promise<StoredCredential>;

  /** Stored credential, refreshed when expired. */
  loadCredential(userId: string): Promise<StoredCredential>;

  /** True when a credential is on file, expired or not. */
  isConnected(userId: string): Promise<boolean>;

  saveCredential(userId: string, credential: StoredCredential): Promise<void>;

  /** Owner of an active pending state. */
  findUserByState(state: string): string | null;
}
