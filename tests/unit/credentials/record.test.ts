/**
 * Unit tests for the persisted credential record codec.
 */

import { describe, it, expect } from 'vitest';
import {
  deserializeCredential,
  fromCredentialRecord,
  serializeCredential,
  toCredentialRecord,
} from '../../../src/services/credentials/record.js';
import { validCredential } from '../../helpers/runtime.js';

describe('credential record', () => {
  it('uses snake_case field names', () => {
    const credential = validCredential({ expiry: 1763600000000 });

    expect(toCredentialRecord(credential)).toEqual({
      token: 'valid-access-token',
      refresh_token: 'valid-refresh-token',
      token_uri: 'https://oauth2.googleapis.com/token',
      client_id: 'test-client-id',
      client_secret: 'test-client-secret',
      scopes: ['https://www.googleapis.com/auth/gmail.readonly'],
      expiry: 1763600000000,
    });
  });

  it('restores a serialized credential', () => {
    const credential = validCredential({ refreshToken: null, expiry: null });
    expect(deserializeCredential(serializeCredential(credential))).toEqual(credential);
  });

  it('treats a missing refresh token and expiry as null', () => {
    expect(fromCredentialRecord({
      token: 't',
      token_uri: 'u',
      client_id: 'c',
      client_secret: 's',
      scopes: [],
    })).toEqual({
      token: 't',
      refreshToken: null,
      tokenUri: 'u',
      clientId: 'c',
      clientSecret: 's',
      scopes: [],
      expiry: null,
    });
  });

  it('rejects records with the wrong shape', () => {
    expect(fromCredentialRecord(null)).toBeNull();
    expect(fromCredentialRecord({ token: 42 })).toBeNull();
    expect(fromCredentialRecord({
      token: 't',
      token_uri: 'u',
      client_id: 'c',
      client_secret: 's',
      scopes: ['ok', 7],
    })).toBeNull();
  });

  it('returns null for invalid JSON', () => {
    expect(deserializeCredential('{not json')).toBeNull();
  });
});
