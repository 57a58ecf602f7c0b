/**
 * @fileoverview Pending OAuth state stores.
 *
 * Holds at most one state per (user, integration). A new authorization
 * request replaces the earlier state; expired rows read as absent.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { Integration } from '../integrations.js';
import type { PendingStateStore } from './types.js';

interface PendingState {
  state: string;
  expiresAt: number;
}

export class MemoryPendingStateStore implements PendingStateStore {
  private readonly map = new Map<string, PendingState>();

  private key(userId: string, integration: Integration): string {
    return `${userId}:${integration}`;
  }

  put(userId: string, integration: Integration, state: string, expiresAt: number): void {
    this.prune();
    this.map.set(this.key(userId, integration), { state, expiresAt });
  }

  get(userId: string, integration: Integration): string | null {
    this.prune();
    return this.map.get(this.key(userId, integration))?.state ?? null;
  }

  delete(userId: string, integration: Integration): void {
    this.map.delete(this.key(userId, integration));
  }

  findUser(integration: Integration, state: string): string | null {
    this.prune();
    const suffix = `:${integration}`;
    for (const [key, pending] of this.map.entries()) {
      if (pending.state === state && key.endsWith(suffix)) {
        return key.slice(0, -suffix.length);
      }
    }
    return null;
  }

  close(): void {
    this.map.clear();
  }

  private prune(): void {
    const now = Date.now();
    for (const [key, pending] of this.map.entries()) {
      if (pending.expiresAt < now) {
        this.map.delete(key);
      }
    }
  }
}

export class SqlitePendingStateStore implements PendingStateStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS oauth_pending_states (
        user_id TEXT NOT NULL,
        integration TEXT NOT NULL,
        state TEXT NOT NULL,
        expires_at INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (user_id, integration)
      );
      CREATE INDEX IF NOT EXISTS idx_oauth_pending_states_expires
        ON oauth_pending_states(expires_at);
    `);
  }

  put(userId: string, integration: Integration, state: string, expiresAt: number): void {
    this.prune();
    this.db
      .prepare(
        `INSERT INTO oauth_pending_states (user_id, integration, state, expires_at, created_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(user_id, integration) DO UPDATE SET
           state = excluded.state,
           expires_at = excluded.expires_at,
           created_at = excluded.created_at`
      )
      .run(userId, integration, state, expiresAt, Date.now());
  }

  get(userId: string, integration: Integration): string | null {
    this.prune();
    const row = this.db
      .prepare<[string, string], { state: string }>(
        'SELECT state FROM oauth_pending_states WHERE user_id = ? AND integration = ?'
      )
      .get(userId, integration);
    return row?.state ?? null;
  }

  delete(userId: string, integration: Integration): void {
    this.db
      .prepare('DELETE FROM oauth_pending_states WHERE user_id = ? AND integration = ?')
      .run(userId, integration);
  }

  findUser(integration: Integration, state: string): string | null {
    this.prune();
    const row = this.db
      .prepare<[string, string], { user_id: string }>(
        'SELECT user_id FROM oauth_pending_states WHERE integration = ? AND state = ?'
      )
      .get(integration, state);
    return row?.user_id ?? null;
  }

  close(): void {
    this.db.close();
  }

  private prune(): void {
    this.db
      .prepare('DELETE FROM oauth_pending_states WHERE expires_at < ?')
      .run(Date.now());
  }
}
