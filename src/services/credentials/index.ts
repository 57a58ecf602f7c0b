/**
 * @fileoverview Credential and OAuth state store factories.
 *
 * Returns the store selected by configuration. The runtime owns the
 * instances; nothing here is cached at module level.
 */

import type { AppConfig } from '../../config.js';
import type { CredentialStore, PendingStateStore } from './types.js';
import { SqliteCredentialStore } from './sqlite.js';
import { MemoryCredentialStore } from './memory.js';
import { MemoryPendingStateStore, SqlitePendingStateStore } from './state-store.js';

export type {
  CredentialLifecycle,
  CredentialStore,
  PendingStateStore,
  StoredCredential,
} from './types.js';
export { MemoryCredentialStore } from './memory.js';
export { SqliteCredentialStore } from './sqlite.js';
export { MemoryPendingStateStore, SqlitePendingStateStore } from './state-store.js';
export { GoogleCredentialManager } from './google.js';
export { CredentialRegistry } from './registry.js';

/**
 * Create the credential store:
 * - 'sqlite': SQLite with encryption (default, for dev and production)
 * - 'memory': In-memory store (for tests only)
 */
export function createCredentialStore(options: AppConfig['credentials']): CredentialStore {
  switch (options.provider) {
    case 'sqlite':
      if (!options.encryptionKey) {
        throw new Error('CREDENTIAL_ENCRYPTION_KEY is required for sqlite credential store');
      }
      return new SqliteCredentialStore(options.sqlitePath, options.encryptionKey);
    case 'memory':
      return new MemoryCredentialStore();
  }
}

export function createPendingStateStore(options: AppConfig['oauthState']): PendingStateStore {
  switch (options.provider) {
    case 'sqlite':
      return new SqlitePendingStateStore(options.sqlitePath);
    case 'memory':
      return new MemoryPendingStateStore();
  }
}
