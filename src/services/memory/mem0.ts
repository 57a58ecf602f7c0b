/**
 * @fileoverview Hosted Mem0 memory store client.
 *
 * Talks to the Mem0 REST API directly:
 * - POST /v2/memories/search/ with `filters.user_id`, `top_k`, `threshold`
 * - POST /v1/memories/ with a single user message
 *
 * Search responses arrive either as a bare array or as `{ results: [...] }`.
 */

import { fetchWithRetry } from '../../utils/fetch-with-retry.js';
import { RemoteOperationError } from '../../utils/errors.js';
import type { MemoryClient, MemoryRecord, MemorySearchOptions } from './types.js';

interface Mem0ClientOptions {
  apiKey: string;
  baseUrl?: string;
  /** Base delay between HTTP retries */
  retryDelayMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull memory records out of a search response, skipping malformed entries.
 */
export function parseSearchResponse(body: unknown): MemoryRecord[] {
  const items = Array.isArray(body)
    ? body
    : isRecord(body) && Array.isArray(body.results)
      ? body.results
      : null;

  if (!items) {
    throw new RemoteOperationError('Unexpected memory search response shape');
  }

  const records: MemoryRecord[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    const text = typeof item.memory === 'string' ? item.memory : typeof item.text === 'string' ? item.text : null;
    if (text === null) continue;
    records.push({
      text,
      score: typeof item.score === 'number' ? item.score : 0,
    });
  }
  return records;
}

export class Mem0MemoryClient implements MemoryClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly retryDelayMs?: number;

  constructor(options: Mem0ClientOptions) {
    if (!options.apiKey) {
      throw new Error('MEM0_API_KEY is required for the mem0 memory store');
    }
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.mem0.ai').replace(/\/+$/, '');
    this.retryDelayMs = options.retryDelayMs;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Token ${this.apiKey}`,
      'Content-Type': 'application/json',
    };
  }

  async search(userId: string, query: string, options: MemorySearchOptions): Promise<MemoryRecord[]> {
    const response = await fetchWithRetry(
      `${this.baseUrl}/v2/memories/search/`,
      {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({
          query,
          filters: { user_id: userId },
          top_k: options.topK,
          threshold: options.threshold,
        }),
        signal: options.signal,
      },
      'Memory search',
      this.retryDelayMs
    );

    if (!response.ok) {
      throw new RemoteOperationError(`Memory search failed with HTTP ${response.status}`, response.status);
    }

    const body: unknown = await response.json();
    // The server applies the threshold; ordering is normalized here.
    return parseSearchResponse(body)
      .sort((a, b) => b.score - a.score)
      .slice(0, options.topK);
  }

  async add(userId: string, text: string): Promise<void> {
    const response = await fetchWithRetry(
      `${this.baseUrl}/v1/memories/`,
      {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({
          messages: [{ role: 'user', content: text }],
          user_id: userId,
        }),
      },
      'Memory add',
      this.retryDelayMs
    );

    if (!response.ok) {
      throw new RemoteOperationError(`Memory add failed with HTTP ${response.status}`, response.status);
    }
  }
}
