/**
 * Per-session adapter between the conversation engine and the core.
 *
 * Memory injection is awaited before the engine generates its reply;
 * persistence runs behind it and is drained on close.
 */

import { createTurnId, withLogContext, type AppLogger } from '../../utils/observability/index.js';
import type { ChatMessage, TurnContext } from '../../services/memory/types.js';
import type { MemoryContextManager } from '../../services/memory/context-manager.js';
import { dispatchTool, type ToolCatalog } from '../../tools/index.js';
import { buildAssistantPrompt, buildLocalContext } from './prompt.js';

/**
 * Turn context backed by a plain message list.
 */
export class ChatTurnContext implements TurnContext {
  readonly messages: ChatMessage[] = [];

  addMessage(message: ChatMessage): void {
    this.messages.push(message);
  }
}

export interface SessionDependencies {
  memory: MemoryContextManager;
  tools: ToolCatalog;
  assistantName: string;
  logger: AppLogger;
}

export interface SessionOptions {
  userId: string;
  /** IANA zone declared by the user's device */
  timezone?: string;
  /** Wall-clock time at session start; defaults to now */
  currentTime?: Date;
}

export class AssistantSession {
  readonly userId: string;
  readonly timezone?: string;
  private readonly currentTime?: Date;
  private readonly deps: SessionDependencies;
  private readonly log: AppLogger;
  private readonly pendingWrites = new Set<Promise<void>>();
  private turnId?: string;

  constructor(deps: SessionDependencies, options: SessionOptions) {
    this.deps = deps;
    this.userId = options.userId;
    this.timezone = options.timezone;
    this.currentTime = options.currentTime;
    this.log = deps.logger.child({ domain: 'session', userId: options.userId });
  }

  private inContext<T>(fn: () => T): T {
    return withLogContext({ userId: this.userId, turnId: this.turnId }, fn);
  }

  /** System prompt for the conversation engine. */
  instructions(): string {
    return buildAssistantPrompt(this.deps.assistantName) + buildLocalContext(this.timezone, this.currentTime);
  }

  /** Greeting instruction for the opening line. */
  onSessionStart(): Promise<string> {
    return this.inContext(() => {
      this.log.info('session_started', { hasTimezone: Boolean(this.timezone) });
      return this.deps.memory.greet(this.userId);
    });
  }

  /** Open a turn; later log records carry its id. */
  onTurnStart(): string {
    this.turnId = createTurnId();
    return this.turnId;
  }

  /**
   * Called once the user finishes speaking. Resolves after relevant
   * memories are in the turn context; the utterance is stored afterwards.
   */
  async onUserTurn(turnContext: TurnContext, utterance: string): Promise<void> {
    await this.inContext(() => this.deps.memory.inject(turnContext, this.userId, utterance));

    const write = this.inContext(() => this.deps.memory.persist(this.userId, utterance));
    this.pendingWrites.add(write);
    void write.finally(() => this.pendingWrites.delete(write));
  }

  callTool(name: string, input: Record<string, unknown>): Promise<string> {
    return this.inContext(() =>
      dispatchTool(this.deps.tools, name, input, { userId: this.userId, timezone: this.timezone })
    );
  }

  /** Wait for background memory writes to settle. */
  async close(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
    this.log.info('session_closed');
  }
}
