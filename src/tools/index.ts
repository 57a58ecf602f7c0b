/**
 * Tool catalog and dispatch.
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import { createLogger, type AppLogger } from '../utils/observability/index.js';
import { errorMessage } from '../utils/errors.js';
import type { ToolContext, ToolDefinition, ToolDependencies, ToolHandler } from './types.js';
import { createEmailTools } from './email.js';
import { createCalendarTools } from './calendar.js';

export interface ToolCatalog {
  /** Tool definitions for the model. */
  tools: Tool[];
  /** Map of tool handlers by name. */
  handlers: Map<string, ToolHandler>;
  log: AppLogger;
}

export function createToolCatalog(deps: ToolDependencies): ToolCatalog {
  const allTools: ToolDefinition[] = [
    ...createEmailTools(deps),
    ...createCalendarTools(deps),
  ];

  return {
    tools: allTools.map((t) => t.tool),
    handlers: new Map(allTools.map((t) => [t.tool.name, t.handler])),
    log: deps.logger ?? createLogger({ domain: 'tools' }),
  };
}

/**
 * Execute a tool by name. Always resolves to text the assistant can speak.
 */
export async function dispatchTool(
  catalog: ToolCatalog,
  name: string,
  input: Record<string, unknown>,
  context: ToolContext
): Promise<string> {
  const handler = catalog.handlers.get(name);

  if (!handler) {
    catalog.log.warn('tool_unknown', { toolName: name });
    return `I don't have a tool called ${name}.`;
  }

  catalog.log.info('tool_call_received', {
    toolName: name,
    userId: context.userId,
    inputKeys: Object.keys(input),
  });

  const startedAt = Date.now();
  try {
    const result = await handler(input, context);
    catalog.log.info('tool_call_completed', { toolName: name, durationMs: Date.now() - startedAt });
    return result;
  } catch (error) {
    catalog.log.error('tool_call_failed', { toolName: name, error: errorMessage(error) });
    return 'Something went wrong on my end while doing that. Please try again.';
  }
}

export type { ToolDefinition, ToolHandler, ToolContext, ToolDependencies } from './types.js';
