/**
 * Unit tests for tool catalog and dispatch.
 */

import { describe, it, expect } from 'vitest';
import { dispatchTool, type ToolCatalog, type ToolHandler } from '../../../src/tools/index.js';
import { createLogger } from '../../../src/utils/observability/index.js';
import { createTestRuntime } from '../../helpers/runtime.js';

describe('createToolCatalog', () => {
  it('exposes every tool with a handler', () => {
    const { runtime } = createTestRuntime();

    expect(runtime.tools.tools.map((tool) => tool.name)).toEqual([
      'search_email',
      'connect_email',
      'create_draft_email',
      'send_email',
      'list_emails_by_label',
      'fetch_digest',
      'search_attachments',
      'find_unsubscribe',
      'list_calendar_events',
      'create_calendar_event',
      'connect_calendar',
    ]);
    expect([...runtime.tools.handlers.keys()]).toEqual(runtime.tools.tools.map((tool) => tool.name));
  });
});

describe('dispatchTool', () => {
  const catalog: ToolCatalog = {
    tools: [],
    handlers: new Map<string, ToolHandler>([
      ['echo', async (input) => `echo ${String(input.text)}`],
      ['boom', async () => {
        throw new Error('handler exploded');
      }],
    ]),
    log: createLogger({ domain: 'tools' }),
  };

  it('runs the named handler', async () => {
    expect(await dispatchTool(catalog, 'echo', { text: 'hi' }, { userId: 'u1' })).toBe('echo hi');
  });

  it('answers for an unknown tool', async () => {
    expect(await dispatchTool(catalog, 'teleport', {}, { userId: 'u1' })).toBe(
      "I don't have a tool called teleport."
    );
  });

  it('turns a thrown error into a spoken apology', async () => {
    expect(await dispatchTool(catalog, 'boom', {}, { userId: 'u1' })).toBe(
      'Something went wrong on my end while doing that. Please try again.'
    );
  });
});
