/**
 * @fileoverview In-memory credential store for testing.
 *
 * No encryption - stores credentials in plain memory.
 * Data is lost on process restart. Use only for tests and local runs.
 */

import type { Integration } from '../integrations.js';
import type { CredentialStore, StoredCredential } from './types.js';

export class MemoryCredentialStore implements CredentialStore {
  private store = new Map<string, StoredCredential>();

  private key(userId: string, integration: Integration): string {
    return `${userId}:${integration}`;
  }

  async get(userId: string, integration: Integration): Promise<StoredCredential | null> {
    const credential = this.store.get(this.key(userId, integration));
    return credential ? { ...credential, scopes: [...credential.scopes] } : null;
  }

  async set(userId: string, integration: Integration, credential: StoredCredential): Promise<void> {
    this.store.set(this.key(userId, integration), { ...credential, scopes: [...credential.scopes] });
  }
}
