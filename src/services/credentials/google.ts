/**
 * @fileoverview Google OAuth credential lifecycle.
 *
 * One manager per integration. Issues consent URLs, checks callback state,
 * exchanges codes and refreshes access tokens on load.
 */

import crypto from 'crypto';
import { google, type Auth } from 'googleapis';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import {
  CredentialExpiredError,
  CsrfMismatchError,
  NotConnectedError,
  RemoteOperationError,
  StateNotFoundError,
  errorMessage,
} from '../../utils/errors.js';
import { INTEGRATION_SCOPES, type Integration } from '../integrations.js';
import type {
  CredentialLifecycle,
  CredentialStore,
  PendingStateStore,
  StoredCredential,
} from './types.js';

export const GOOGLE_TOKEN_URI = 'https://oauth2.googleapis.com/token';

/** Pending state lifetime. */
export const STATE_TTL_MS = 10 * 60 * 1000;

/** Tokens expiring within this window are refreshed before use. */
export const EXPIRY_SKEW_MS = 60 * 1000;

/** Assumed lifetime when Google omits expiry_date on refresh. */
const DEFAULT_TOKEN_LIFETIME_MS = 60 * 60 * 1000;

export interface GoogleCredentialManagerOptions {
  integration: Integration;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  store: CredentialStore;
  stateStore: PendingStateStore;
  logger?: AppLogger;
}

export function generateState(): string {
  return crypto.randomBytes(16).toString('base64url');
}

export function isExpired(credential: StoredCredential, now = Date.now()): boolean {
  return credential.expiry !== null && credential.expiry <= now + EXPIRY_SKEW_MS;
}

export class GoogleCredentialManager implements CredentialLifecycle {
  readonly integration: Integration;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly redirectUri: string;
  private readonly store: CredentialStore;
  private readonly stateStore: PendingStateStore;
  private readonly log: AppLogger;

  constructor(options: GoogleCredentialManagerOptions) {
    this.integration = options.integration;
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.redirectUri = options.redirectUri;
    this.store = options.store;
    this.stateStore = options.stateStore;
    this.log = (options.logger ?? createLogger({ domain: 'credentials' })).child({
      integration: options.integration,
    });
  }

  /**
   * Bare OAuth2 client for this integration's redirect URI.
   */
  createOAuthClient(): Auth.OAuth2Client {
    return new google.auth.OAuth2(this.clientId, this.clientSecret, this.redirectUri);
  }

  /**
   * Authorized client for a loaded credential.
   */
  toOAuthClient(credential: StoredCredential): Auth.OAuth2Client {
    const client = this.createOAuthClient();
    client.setCredentials({
      access_token: credential.token,
      refresh_token: credential.refreshToken,
      expiry_date: credential.expiry,
      scope: credential.scopes.join(' '),
    });
    return client;
  }

  beginAuthorization(userId: string): string {
    const state = generateState();
    this.stateStore.put(userId, this.integration, state, Date.now() + STATE_TTL_MS);

    const url = this.createOAuthClient().generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      include_granted_scopes: true,
      scope: [...INTEGRATION_SCOPES[this.integration]],
      state,
    });

    this.log.info('oauth_authorization_started', { userId });
    return url;
  }

  async completeAuthorization(code: string, state: string, userId: string): Promise<StoredCredential> {
    const pending = this.stateStore.get(userId, this.integration);
    if (pending === null) {
      this.log.warn('oauth_state_not_found', { userId });
      throw new StateNotFoundError(this.integration);
    }

    // Single use on both paths: a mismatch discards the stale state too
    this.stateStore.delete(userId, this.integration);
    if (!statesMatch(pending, state)) {
      this.log.warn('oauth_state_mismatch', { userId });
      throw new CsrfMismatchError(this.integration);
    }

    let tokens: Auth.Credentials;
    try {
      ({ tokens } = await this.createOAuthClient().getToken(code));
    } catch (error) {
      this.log.error('oauth_code_exchange_failed', { userId, error: errorMessage(error) });
      throw new RemoteOperationError(`Token exchange failed: ${errorMessage(error)}`);
    }

    if (!tokens.access_token) {
      throw new RemoteOperationError('Token exchange returned no access token');
    }
    if (!tokens.refresh_token) {
      this.log.warn('oauth_refresh_token_missing', { userId });
    }

    this.log.info('oauth_authorization_completed', {
      userId,
      hasRefreshToken: Boolean(tokens.refresh_token),
    });

    return {
      token: tokens.access_token,
      refreshToken: tokens.refresh_token ?? null,
      tokenUri: GOOGLE_TOKEN_URI,
      clientId: this.clientId,
      clientSecret: this.clientSecret,
      scopes: tokens.scope
        ? tokens.scope.split(' ').filter(Boolean)
        : [...INTEGRATION_SCOPES[this.integration]],
      expiry: tokens.expiry_date ?? null,
    };
  }

  async saveCredential(userId: string, credential: StoredCredential): Promise<void> {
    await this.store.set(userId, this.integration, credential);
  }

  async isConnected(userId: string): Promise<boolean> {
    return (await this.store.get(userId, this.integration)) !== null;
  }

  async loadCredential(userId: string): Promise<StoredCredential> {
    const credential = await this.store.get(userId, this.integration);
    if (!credential) {
      throw new NotConnectedError(userId, this.integration);
    }

    if (!isExpired(credential)) {
      return credential;
    }

    if (!credential.refreshToken) {
      this.log.warn('oauth_expired_without_refresh_token', { userId });
      throw new CredentialExpiredError(this.integration, 'no refresh token');
    }

    let refreshed: Auth.Credentials;
    try {
      const client = this.createOAuthClient();
      client.setCredentials({ refresh_token: credential.refreshToken });
      ({ credentials: refreshed } = await client.refreshAccessToken());
    } catch (error) {
      this.log.error('oauth_refresh_failed', { userId, error: errorMessage(error) });
      throw new CredentialExpiredError(this.integration, errorMessage(error));
    }

    if (!refreshed.access_token) {
      throw new CredentialExpiredError(this.integration, 'refresh returned no access token');
    }

    const updated: StoredCredential = {
      ...credential,
      token: refreshed.access_token,
      refreshToken: refreshed.refresh_token ?? credential.refreshToken,
      expiry: refreshed.expiry_date ?? Date.now() + DEFAULT_TOKEN_LIFETIME_MS,
    };
    await this.store.set(userId, this.integration, updated);

    this.log.info('oauth_token_refreshed', { userId });
    return updated;
  }

  findUserByState(state: string): string | null {
    return this.stateStore.findUser(this.integration, state);
  }
}

function statesMatch(expected: string, actual: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(actual);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}
