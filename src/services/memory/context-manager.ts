/**
 * @fileoverview Memory Context Manager.
 *
 * Retrieves relevant facts before a turn, persists the user's utterance
 * after it, and builds the opening greeting instruction. Every operation
 * here is best effort: failures are logged and absorbed so a slow or
 * broken memory store never blocks the conversation.
 */

import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import { errorMessage } from '../../utils/errors.js';
import { withTimeout } from '../../utils/timeout.js';
import type { MemoryClient, TurnContext } from './types.js';
import {
  GREETING_QUERY,
  buildContextMessage,
  buildFallbackGreeting,
  buildGenericGreeting,
  buildPersonalizedGreeting,
} from './prompts.js';

/** In-turn injection: few, precise facts. */
export const INJECT_TOP_K = 5;
export const INJECT_MIN_SCORE = 0.3;

/** Greeting: wide, low-precision query for thematically varied facts. */
export const GREETING_TOP_K = 15;
export const GREETING_MIN_SCORE = 0.05;
export const GREETING_MAX_FACTS = 10;
export const GREETING_MIN_FACT_LENGTH = 10;

export interface MemoryContextManagerOptions {
  client: MemoryClient;
  assistantName: string;
  retrievalTimeoutMs: number;
  enrichmentTimeoutMs: number;
  logger?: AppLogger;
}

/**
 * Strip a leading source tag such as `Noted from [call 12] Likes tea`.
 */
export function cleanMemoryText(text: string): string {
  const trimmed = text.trim();
  const tagged = trimmed.match(/from \[[^\]]*\]\s*(.*)$/s);
  if (tagged && tagged[1].trim()) {
    return tagged[1].trim();
  }
  return trimmed;
}

export class MemoryContextManager {
  private readonly client: MemoryClient;
  private readonly assistantName: string;
  private readonly retrievalTimeoutMs: number;
  private readonly enrichmentTimeoutMs: number;
  private readonly log: AppLogger;

  constructor(options: MemoryContextManagerOptions) {
    this.client = options.client;
    this.assistantName = options.assistantName;
    this.retrievalTimeoutMs = options.retrievalTimeoutMs;
    this.enrichmentTimeoutMs = options.enrichmentTimeoutMs;
    this.log = options.logger ?? createLogger({ domain: 'memory' });
  }

  /**
   * Search and clean results. Throws on store failure or timeout.
   */
  private async search(
    userId: string,
    query: string,
    topK: number,
    minScore: number,
    timeoutMs: number
  ): Promise<string[]> {
    const records = await withTimeout(
      (signal) => this.client.search(userId, query, { topK, threshold: minScore, signal }),
      timeoutMs,
      'Memory search'
    );

    return records
      .map((record) => cleanMemoryText(record.text))
      .filter((text) => text.length > 0);
  }

  /**
   * Relevant fact texts, most relevant first. Empty on any failure.
   */
  async retrieve(userId: string, query: string, topK: number, minScore: number): Promise<string[]> {
    if (!query.trim()) {
      return [];
    }

    try {
      return await this.search(userId, query, topK, minScore, this.retrievalTimeoutMs);
    } catch (error) {
      this.log.warn('memory_retrieve_failed', { userId, error: errorMessage(error) });
      return [];
    }
  }

  /**
   * Append one system message with relevant facts to the turn.
   * Must be awaited before the reply is generated.
   *
   * @returns number of facts injected
   */
  async inject(turnContext: TurnContext, userId: string, utterance: string): Promise<number> {
    if (!utterance.trim()) {
      this.log.debug('memory_inject_skipped_empty', { userId });
      return 0;
    }

    const facts = await this.retrieve(userId, utterance, INJECT_TOP_K, INJECT_MIN_SCORE);
    if (facts.length === 0) {
      return 0;
    }

    const content = buildContextMessage(facts.slice(0, INJECT_TOP_K));
    turnContext.addMessage({ role: 'system', content });

    this.log.info('memory_context_injected', { userId, count: facts.length, length: content.length });
    return facts.length;
  }

  /**
   * Store the raw utterance as a new fact. Failures are logged only.
   */
  async persist(userId: string, utterance: string): Promise<void> {
    if (!utterance.trim()) {
      return;
    }

    try {
      await this.client.add(userId, utterance);
      this.log.debug('memory_persisted', { userId, length: utterance.length });
    } catch (error) {
      this.log.warn('memory_persist_failed', { userId, error: errorMessage(error) });
    }
  }

  /**
   * Instruction for the opening line of a session. Never throws.
   */
  async greet(userId: string): Promise<string> {
    let facts: string[];
    try {
      facts = await this.search(
        userId,
        GREETING_QUERY,
        GREETING_TOP_K,
        GREETING_MIN_SCORE,
        this.retrievalTimeoutMs
      );
    } catch (error) {
      this.log.warn('memory_greeting_failed', { userId, error: errorMessage(error) });
      return buildFallbackGreeting(this.assistantName);
    }

    const qualifying = facts.filter((fact) => fact.length > GREETING_MIN_FACT_LENGTH);
    if (qualifying.length === 0) {
      this.log.info('memory_greeting_generic', { userId });
      return buildGenericGreeting(this.assistantName);
    }

    const selected = qualifying.slice(0, GREETING_MAX_FACTS);
    this.log.info('memory_greeting_personalized', { userId, count: selected.length });
    return buildPersonalizedGreeting(this.assistantName, selected);
  }

  /**
   * Single best fact for a side query, or null when there is none, the
   * store fails, or the lookup exceeds the enrichment deadline.
   */
  async lookup(userId: string, query: string): Promise<string | null> {
    try {
      const [best] = await this.search(userId, query, 1, 0, this.enrichmentTimeoutMs);
      return best ?? null;
    } catch (error) {
      this.log.debug('memory_lookup_absent', { userId, error: errorMessage(error) });
      return null;
    }
  }
}
