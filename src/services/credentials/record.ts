/**
 * @fileoverview Persisted credential record codec.
 *
 * The stored JSON uses the field names other tooling expects:
 * `token, refresh_token, token_uri, client_id, client_secret, scopes, expiry`.
 */

import type { StoredCredential } from './types.js';

export interface CredentialRecord {
  token: string;
  refresh_token: string | null;
  token_uri: string;
  client_id: string;
  client_secret: string;
  scopes: string[];
  expiry: number | null;
}

export function toCredentialRecord(credential: StoredCredential): CredentialRecord {
  return {
    token: credential.token,
    refresh_token: credential.refreshToken,
    token_uri: credential.tokenUri,
    client_id: credential.clientId,
    client_secret: credential.clientSecret,
    scopes: [...credential.scopes],
    expiry: credential.expiry,
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Validate a decoded record.
 * @returns the credential, or null when any field has the wrong shape
 */
export function fromCredentialRecord(value: unknown): StoredCredential | null {
  if (typeof value !== 'object' || value === null) return null;

  const token: unknown = Reflect.get(value, 'token');
  const refreshToken: unknown = Reflect.get(value, 'refresh_token') ?? null;
  const tokenUri: unknown = Reflect.get(value, 'token_uri');
  const clientId: unknown = Reflect.get(value, 'client_id');
  const clientSecret: unknown = Reflect.get(value, 'client_secret');
  const scopes: unknown = Reflect.get(value, 'scopes');
  const expiry: unknown = Reflect.get(value, 'expiry') ?? null;

  if (
    typeof token !== 'string' ||
    (refreshToken !== null && typeof refreshToken !== 'string') ||
    typeof tokenUri !== 'string' ||
    typeof clientId !== 'string' ||
    typeof clientSecret !== 'string' ||
    !isStringArray(scopes) ||
    (expiry !== null && typeof expiry !== 'number')
  ) {
    return null;
  }

  return { token, refreshToken, tokenUri, clientId, clientSecret, scopes, expiry };
}

export function serializeCredential(credential: StoredCredential): string {
  return JSON.stringify(toCredentialRecord(credential));
}

export function deserializeCredential(json: string): StoredCredential | null {
  try {
    return fromCredentialRecord(JSON.parse(json));
  } catch {
    return null;
  }
}
