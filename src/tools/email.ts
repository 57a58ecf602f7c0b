/**
 * Email tools (Gmail).
 */

import type { Integration } from '../services/integrations.js';
import type { EmailMessage } from '../services/google/gmail.js';
import type { ContextLookup, ToolDefinition, ToolDependencies } from './types.js';
import { readString, validateInput } from './utils.js';
import {
  MAX_SPOKEN_ITEMS,
  failureMessage,
  notConnectedMessage,
  pluralize,
  speakList,
  toSpeakable,
} from './messages.js';
import { connectTool } from './connect.js';

const INTEGRATION: Integration = 'email';

/**
 * Display name from a From header: `"Alex Doe" <alex@example.com>` -> `Alex Doe`.
 */
export function senderName(from: string): string {
  const named = from.match(/^\s*"?([^"<]+?)"?\s*<[^>]*>\s*$/);
  if (named) return toSpeakable(named[1]);
  const bare = from.match(/<([^>]+)>/);
  return toSpeakable(bare ? bare[1] : from) || 'an unknown sender';
}

function describeMessage(message: EmailMessage): string {
  const subject = toSpeakable(message.subject) || 'no subject';
  return `From ${senderName(message.from)}, subject "${subject}"`;
}

/**
 * One memory lookup per distinct sender among the spoken messages.
 * Missing context is simply left out.
 */
async function senderContext(
  memory: ContextLookup,
  userId: string,
  messages: EmailMessage[]
): Promise<Map<string, string>> {
  const names = [...new Set(messages.slice(0, MAX_SPOKEN_ITEMS).map((m) => senderName(m.from)))];
  const facts = await Promise.all(names.map((name) => memory.lookup(userId, `who is ${name}`)));

  const context = new Map<string, string>();
  names.forEach((name, i) => {
    const fact = facts[i];
    if (fact) context.set(name, fact);
  });
  return context;
}

export function createEmailTools(deps: ToolDependencies): ToolDefinition[] {
  const { credentials, gmail, memory } = deps;

  /** Connection check that runs before any Gmail call. */
  async function notConnected(userId: string): Promise<string | null> {
    return (await credentials.isConnected(userId, INTEGRATION)) ? null : notConnectedMessage(INTEGRATION);
  }

  const searchEmail: ToolDefinition = {
    tool: {
      name: 'search_email',
      description: `Search the user's Gmail. Accepts plain words or Gmail search syntax.

Common search operators:
- from:sender@example.com - Emails from specific sender
- subject:keyword - Search in subject line
- is:unread - Only unread emails
- newer_than:7d - Last 7 days (also: 1d, 1m, 1y)`,
      input_schema: {
        type: 'object' as const,
        properties: {
          query: {
            type: 'string',
            description: 'What to search for, e.g. "invoices" or "from:alex newer_than:7d".',
          },
        },
        required: ['query'],
      },
    },
    handler: async (input, context) => {
      const invalid = validateInput(input, { query: { type: 'string', required: true } });
      if (invalid) return `I need something to search for. ${invalid}`;
      const query = readString(input, 'query')?.trim() ?? '';

      const disconnected = await notConnected(context.userId);
      if (disconnected) return disconnected;

      const result = await gmail.searchMessages(context.userId, query);
      if (!result.success) {
        return failureMessage(INTEGRATION, 'search your email', result.error);
      }

      const messages = result.data;
      if (messages.length === 0) {
        return `I didn't find any emails matching "${query}".`;
      }

      const senderFacts = await senderContext(memory, context.userId, messages);
      const items = messages.map((message) => {
        const name = senderName(message.from);
        const fact = senderFacts.get(name);
        return fact ? `${describeMessage(message)} (Context on ${name}: ${fact})` : describeMessage(message);
      });

      return `I found ${pluralize(messages.length, 'email')} matching "${query}". ${speakList(items)}`;
    },
  };

  const createDraftEmail: ToolDefinition = {
    tool: {
      name: 'create_draft_email',
      description: 'Save an email as a draft in Gmail without sending it.',
      input_schema: {
        type: 'object' as const,
        properties: {
          to: { type: 'string', description: 'Recipient email address. Separate several with commas.' },
          subject: { type: 'string', description: 'Subject line' },
          body: { type: 'string', description: 'Plain text body' },
        },
        required: ['to', 'subject', 'body'],
      },
    },
    handler: async (input, context) => {
      const invalid = validateInput(input, {
        to: { type: 'string', required: true },
        subject: { type: 'string', required: true, nonEmpty: false },
        body: { type: 'string', required: true, nonEmpty: false },
      });
      if (invalid) return `I can't write that draft yet. ${invalid}`;
      const to = readString(input, 'to') ?? '';
      const subject = readString(input, 'subject') ?? '';
      const body = readString(input, 'body') ?? '';

      const disconnected = await notConnected(context.userId);
      if (disconnected) return disconnected;

      const result = await gmail.createDraft(context.userId, { to, subject, body });
      if (!result.success) {
        return failureMessage(INTEGRATION, 'save that draft', result.error);
      }
      return `I've saved a draft to ${to} with the subject "${toSpeakable(subject) || 'no subject'}".`;
    },
  };

  const sendEmail: ToolDefinition = {
    tool: {
      name: 'send_email',
      description: 'Send an email from the user\'s Gmail. Confirm the recipient, subject and body with the user before calling.',
      input_schema: {
        type: 'object' as const,
        properties: {
          to: { type: 'string', description: 'Recipient email address. Separate several with commas.' },
          subject: { type: 'string', description: 'Subject line' },
          body: { type: 'string', description: 'Plain text body' },
        },
        required: ['to', 'subject', 'body'],
      },
    },
    handler: async (input, context) => {
      const invalid = validateInput(input, {
        to: { type: 'string', required: true },
        subject: { type: 'string', required: true, nonEmpty: false },
        body: { type: 'string', required: true, nonEmpty: false },
      });
      if (invalid) return `I can't send that email yet. ${invalid}`;
      const to = readString(input, 'to') ?? '';
      const subject = readString(input, 'subject') ?? '';
      const body = readString(input, 'body') ?? '';

      const disconnected = await notConnected(context.userId);
      if (disconnected) return disconnected;

      const result = await gmail.sendMessage(context.userId, { to, subject, body });
      if (!result.success) {
        return failureMessage(INTEGRATION, 'send that email', result.error);
      }
      return `I've sent your email to ${to} with the subject "${toSpeakable(subject) || 'no subject'}".`;
    },
  };

  const listEmailsByLabel: ToolDefinition = {
    tool: {
      name: 'list_emails_by_label',
      description: 'List recent emails under a Gmail label: starred, snoozed, sent, drafts, unread, important, spam or trash.',
      input_schema: {
        type: 'object' as const,
        properties: {
          label: {
            type: 'string',
            description: 'One of: starred, snoozed, sent, drafts, unread, important, spam, trash',
          },
        },
        required: ['label'],
      },
    },
    handler: async (input, context) => {
      const invalid = validateInput(input, { label: { type: 'string', required: true } });
      if (invalid) return `Which label should I look in? ${invalid}`;
      const label = (readString(input, 'label') ?? '').trim().toLowerCase();

      const disconnected = await notConnected(context.userId);
      if (disconnected) return disconnected;

      const result = await gmail.listByLabel(context.userId, label);
      if (!result.success) {
        return failureMessage(INTEGRATION, `list your ${label} emails`, result.error);
      }
      if (result.data.length === 0) {
        return `There are no emails under ${label}.`;
      }
      return `Here ${result.data.length === 1 ? 'is' : 'are'} ${pluralize(result.data.length, 'email')} under ${label}. ${speakList(result.data.map(describeMessage))}`;
    },
  };

  const fetchDigest: ToolDefinition = {
    tool: {
      name: 'fetch_digest',
      description: 'Summarize unread inbox email from the last day.',
      input_schema: {
        type: 'object' as const,
        properties: {},
      },
    },
    handler: async (_input, context) => {
      const disconnected = await notConnected(context.userId);
      if (disconnected) return disconnected;

      const result = await gmail.fetchDigest(context.userId);
      if (!result.success) {
        return failureMessage(INTEGRATION, 'check your new email', result.error);
      }
      if (result.data.length === 0) {
        return "You don't have any unread email from the last day.";
      }
      return `You have ${pluralize(result.data.length, 'unread email')} from the last day. ${speakList(result.data.map(describeMessage))}`;
    },
  };

  const searchAttachments: ToolDefinition = {
    tool: {
      name: 'search_attachments',
      description: 'Find emails with attachments, optionally narrowed by a search query.',
      input_schema: {
        type: 'object' as const,
        properties: {
          query: {
            type: 'string',
            description: 'Words or Gmail search syntax to narrow the search, e.g. "contract" or "filename:pdf".',
          },
        },
      },
    },
    handler: async (input, context) => {
      const invalid = validateInput(input, { query: { type: 'string', required: false } });
      if (invalid) return `I couldn't search attachments. ${invalid}`;
      const query = readString(input, 'query')?.trim() ?? '';

      const disconnected = await notConnected(context.userId);
      if (disconnected) return disconnected;

      const result = await gmail.searchAttachments(context.userId, query);
      if (!result.success) {
        return failureMessage(INTEGRATION, 'search your attachments', result.error);
      }

      const scope = query ? ` matching "${query}"` : '';
      if (result.data.length === 0) {
        return `I didn't find any emails with attachments${scope}.`;
      }

      const items = result.data.map((message) => {
        const files = message.attachments.map((a) => toSpeakable(a.filename)).join(', ');
        return `${describeMessage(message)}, with ${files}`;
      });
      return `I found ${pluralize(result.data.length, 'email')} with attachments${scope}. ${speakList(items)}`;
    },
  };

  const findUnsubscribe: ToolDefinition = {
    tool: {
      name: 'find_unsubscribe',
      description: 'Find how to unsubscribe from a sender, using the unsubscribe header of their recent mail.',
      input_schema: {
        type: 'object' as const,
        properties: {
          sender: {
            type: 'string',
            description: 'Sender name, address or domain, e.g. "newsletter@shop.example" or "shop.example".',
          },
        },
        required: ['sender'],
      },
    },
    handler: async (input, context) => {
      const invalid = validateInput(input, { sender: { type: 'string', required: true } });
      if (invalid) return `Who do you want to unsubscribe from? ${invalid}`;
      const sender = readString(input, 'sender')?.trim() ?? '';

      const disconnected = await notConnected(context.userId);
      if (disconnected) return disconnected;

      const result = await gmail.findUnsubscribe(context.userId, sender);
      if (!result.success) {
        return failureMessage(INTEGRATION, 'look for an unsubscribe link', result.error);
      }

      const info = result.data;
      if (!info) {
        return `I couldn't find an unsubscribe option in recent mail from ${sender}.`;
      }
      const name = senderName(info.from);
      if (info.url) {
        return `I found an unsubscribe link for ${name}. Open ${info.url} to unsubscribe.`;
      }
      return `${name} takes unsubscribe requests by email. Send a message to ${info.mailto ?? ''} to unsubscribe.`;
    },
  };

  return [
    searchEmail,
    connectTool(deps, INTEGRATION, 'connect_email'),
    createDraftEmail,
    sendEmail,
    listEmailsByLabel,
    fetchDigest,
    searchAttachments,
    findUnsubscribe,
  ];
}
