/**
 * @fileoverview Memory store factory.
 *
 * Builds the configured memory backend. Callers own the returned instance.
 */

import type { AppConfig } from '../../config.js';
import type { MemoryClient } from './types.js';
import { Mem0MemoryClient } from './mem0.js';
import { SqliteMemoryClient } from './sqlite.js';

export type { MemoryClient, MemoryRecord, TurnContext, ChatMessage } from './types.js';
export { MemoryContextManager } from './context-manager.js';

/**
 * Create the memory client selected by MEMORY_STORE_PROVIDER:
 * - 'mem0': hosted Mem0 API (default)
 * - 'sqlite': local lexical store for development
 */
export function createMemoryClient(config: AppConfig['memory']): MemoryClient {
  switch (config.provider) {
    case 'mem0':
      return new Mem0MemoryClient({
        apiKey: config.mem0ApiKey ?? '',
        baseUrl: config.mem0BaseUrl,
      });
    case 'sqlite':
      return new SqliteMemoryClient(config.sqlitePath);
  }
}
