/**
 * @fileoverview SQLite credential store with AES-256-GCM encryption.
 *
 * Credentials are encrypted at rest using the CREDENTIAL_ENCRYPTION_KEY.
 * Each credential is encrypted with a unique IV.
 */

import Database from 'better-sqlite3';
import crypto from 'crypto';
import path from 'path';
import fs from 'fs';
import { createLogger } from '../../utils/observability/index.js';
import { errorMessage } from '../../utils/errors.js';
import type { Integration } from '../integrations.js';
import type { CredentialStore, StoredCredential } from './types.js';
import { deserializeCredential, serializeCredential } from './record.js';

const log = createLogger({ domain: 'credentials' });

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;

interface EncryptedRow {
  encrypted_data: Buffer;
  iv: Buffer;
  auth_tag: Buffer;
}

/**
 * SQLite credential store with AES-256-GCM encryption.
 */
export class SqliteCredentialStore implements CredentialStore {
  private db: Database.Database;
  private encryptionKey: Buffer;

  /**
   * @param dbPath Path to SQLite database file, or ':memory:'
   * @param encryptionKey 32-byte hex string for AES-256 encryption
   */
  constructor(dbPath: string, encryptionKey: string) {
    if (!/^[0-9a-fA-F]{64}$/.test(encryptionKey)) {
      throw new Error(
        'CREDENTIAL_ENCRYPTION_KEY must be a 64-character hex string (32 bytes)'
      );
    }
    this.encryptionKey = Buffer.from(encryptionKey, 'hex');

    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS credentials (
        user_id TEXT NOT NULL,
        integration TEXT NOT NULL,
        encrypted_data BLOB NOT NULL,
        iv BLOB NOT NULL,
        auth_tag BLOB NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (user_id, integration)
      )
    `);
  }

  private encrypt(data: string): { encrypted: Buffer; iv: Buffer; authTag: Buffer } {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.encryptionKey, iv);
    const encrypted = Buffer.concat([
      cipher.update(data, 'utf8'),
      cipher.final(),
    ]);
    const authTag = cipher.getAuthTag();
    return { encrypted, iv, authTag };
  }

  private decrypt(encrypted: Buffer, iv: Buffer, authTag: Buffer): string {
    const decipher = crypto.createDecipheriv(ALGORITHM, this.encryptionKey, iv);
    decipher.setAuthTag(authTag);
    const decryptedBuffer = Buffer.concat([
      decipher.update(encrypted),
      decipher.final(),
    ]);
    return decryptedBuffer.toString('utf8');
  }

  async get(userId: string, integration: Integration): Promise<StoredCredential | null> {
    const row = this.db
      .prepare<[string, string], EncryptedRow>(
        `SELECT encrypted_data, iv, auth_tag FROM credentials
         WHERE user_id = ? AND integration = ?`
      )
      .get(userId, integration);

    if (!row) {
      return null;
    }

    let decrypted: string;
    try {
      decrypted = this.decrypt(row.encrypted_data, row.iv, row.auth_tag);
    } catch (error) {
      // Corrupted row or rotated key: treat as not connected
      log.warn('credential_decrypt_failed', { userId, integration, error: errorMessage(error) });
      return null;
    }

    const credential = deserializeCredential(decrypted);
    if (!credential) {
      log.warn('credential_record_invalid', { userId, integration });
    }
    return credential;
  }

  async set(userId: string, integration: Integration, credential: StoredCredential): Promise<void> {
    const { encrypted, iv, authTag } = this.encrypt(serializeCredential(credential));
    const now = Date.now();

    this.db
      .prepare(
        `INSERT INTO credentials (user_id, integration, encrypted_data, iv, auth_tag, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (user_id, integration) DO UPDATE SET
           encrypted_data = excluded.encrypted_data,
           iv = excluded.iv,
           auth_tag = excluded.auth_tag,
           updated_at = excluded.updated_at`
      )
      .run(userId, integration, encrypted, iv, authTag, now, now);
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}
