/**
 * Tool type definitions (canonical location).
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import type { AppLogger } from '../utils/observability/index.js';
import type { CredentialRegistry } from '../services/credentials/registry.js';
import type { GmailProvider } from '../services/google/gmail.js';
import type { CalendarProvider } from '../services/google/calendar.js';

/**
 * Context passed to tool handlers.
 */
export interface ToolContext {
  userId: string;
  /** IANA zone declared by the user, if any */
  timezone?: string;
}

/**
 * Handler function type for tool execution. Returns text ready to speak.
 */
export type ToolHandler = (
  input: Record<string, unknown>,
  context: ToolContext
) => Promise<string>;

/**
 * Pairs a tool definition with its handler.
 */
export interface ToolDefinition {
  tool: Tool;
  handler: ToolHandler;
}

/**
 * Best-effort side lookup used to enrich spoken results.
 */
export interface ContextLookup {
  lookup(userId: string, query: string): Promise<string | null>;
}

/**
 * Collaborators the tool handlers are built with.
 */
export interface ToolDependencies {
  credentials: CredentialRegistry;
  gmail: GmailProvider;
  calendar: CalendarProvider;
  memory: ContextLookup;
  /** Public URL of the OAuth server */
  baseUrl: string;
  defaultTimezone: string;
  logger?: AppLogger;
}
