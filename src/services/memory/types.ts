/**
 * Memory Service Types
 *
 * Interfaces for the long-term memory store that holds short natural
 * language facts about a user and returns them by relevance.
 */

/**
 * A fact returned by a relevance search.
 * No identity is tracked beyond the text.
 */
export interface MemoryRecord {
  /** The fact as stored, e.g. "Has a dog named Max" */
  text: string;

  /** Relevance to the query, higher is more relevant */
  score: number;
}

export interface MemorySearchOptions {
  /** Maximum number of records to return */
  topK: number;

  /** Minimum relevance score for a record to be returned */
  threshold: number;

  /** Aborted when the caller stops waiting */
  signal?: AbortSignal;
}

/**
 * Interface for memory store backends.
 *
 * Implementations partition every read and write by user id. Results are
 * ordered by relevance, most relevant first.
 */
export interface MemoryClient {
  search(userId: string, query: string, options: MemorySearchOptions): Promise<MemoryRecord[]>;

  /** Append a new fact for the user. */
  add(userId: string, text: string): Promise<void>;

  /** Release resources held by the backend. */
  close?(): void;
}

/**
 * Conversation turn the memory manager can append to.
 * Implemented by the Conversation Engine adapter.
 */
export interface TurnContext {
  addMessage(message: ChatMessage): void;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}
