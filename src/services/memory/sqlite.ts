/**
 * @fileoverview SQLite memory store.
 *
 * Local stand-in for the hosted store during development. Facts are kept
 * per user and ranked by a lexical score: cosine similarity over the sets
 * of query and fact terms, with plurals folded and stop words dropped.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { randomUUID } from 'crypto';
import type { MemoryClient, MemoryRecord, MemorySearchOptions } from './types.js';

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'at', 'be', 'for', 'from', 'i', 'in', 'is', 'it',
  'me', 'my', 'of', 'on', 'or', 'the', 'to', 'was', 'what', 'who', 'with', 'you',
]);

/**
 * Split text into a set of comparable terms.
 */
export function toTerms(text: string): Set<string> {
  const terms = new Set<string>();
  for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    if (STOP_WORDS.has(word)) continue;
    const folded = word.length > 3 && word.endsWith('s') && !word.endsWith('ss')
      ? word.slice(0, -1)
      : word;
    terms.add(folded);
  }
  return terms;
}

/**
 * Cosine similarity between two term sets, 0 when either is empty.
 */
export function lexicalScore(query: Set<string>, fact: Set<string>): number {
  if (query.size === 0 || fact.size === 0) return 0;
  let shared = 0;
  for (const term of query) {
    if (fact.has(term)) shared++;
  }
  return shared / Math.sqrt(query.size * fact.size);
}

/**
 * SQLite implementation of the memory store.
 */
export class SqliteMemoryClient implements MemoryClient {
  private db: Database.Database;

  /**
   * @param dbPath Path to SQLite database file, or ':memory:'
   */
  constructor(dbPath: string) {
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
      CREATE TABLE IF NOT EXISTS user_facts (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        fact TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_user_facts_user ON user_facts(user_id);
    `);
  }

  async search(userId: string, query: string, options: MemorySearchOptions): Promise<MemoryRecord[]> {
    const rows = this.db
      .prepare<[string], { fact: string }>(
        `SELECT fact FROM user_facts
         WHERE user_id = ?
         ORDER BY created_at DESC, rowid DESC`
      )
      .all(userId);

    const queryTerms = toTerms(query);

    return rows
      .map((row) => ({ text: row.fact, score: lexicalScore(queryTerms, toTerms(row.fact)) }))
      .filter((record) => record.score > 0 && record.score >= options.threshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, options.topK);
  }

  async add(userId: string, text: string): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO user_facts (id, user_id, fact, created_at)
         VALUES (?, ?, ?, ?)`
      )
      .run(randomUUID(), userId, text, Date.now());
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}
