/**
 * @fileoverview Gmail provider.
 *
 * Search, label listing, digest, attachments, unsubscribe lookup, drafts
 * and sending. Every method returns an OperationResult.
 */

import { google, type Auth, type gmail_v1 } from 'googleapis';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import { ParseError, fail, ok, type OperationResult } from '../../utils/errors.js';
import { runGoogleOperation, type GoogleAuthSource } from './client.js';

export interface EmailAttachment {
  filename: string;
  mimeType: string;
  size: number;
}

/**
 * Email returned by list operations.
 */
export interface EmailMessage {
  id: string;
  threadId: string;
  from: string;
  subject: string;
  snippet: string;
  date: string;
  isUnread: boolean;
  attachments: EmailAttachment[];
}

export interface OutgoingEmail {
  to: string;
  subject: string;
  body: string;
}

export interface UnsubscribeInfo {
  from: string;
  subject: string;
  url?: string;
  mailto?: string;
}

/** Spoken label names and the Gmail query each one stands for. */
export const LABEL_QUERIES: Readonly<Record<string, string>> = {
  starred: 'is:starred',
  snoozed: 'in:snoozed',
  sent: 'in:sent',
  drafts: 'in:drafts',
  unread: 'is:unread',
  important: 'is:important',
  spam: 'in:spam',
  trash: 'in:trash',
};

export const DIGEST_QUERY = 'in:inbox is:unread newer_than:1d';

const METADATA_HEADERS = ['From', 'Subject', 'Date'];

const EMAIL_ADDRESS = /^[^\s@<>,;"]+@[^\s@<>,;"]+\.[^\s@<>,;"]+$/;

/**
 * Gmail query for a label name, or null when the label is unknown.
 */
export function labelQuery(label: string): string | null {
  const key = label.trim().toLowerCase();
  return Object.hasOwn(LABEL_QUERIES, key) ? LABEL_QUERIES[key] : null;
}

/**
 * Split and validate a recipient list. Accepts `Name <addr>` entries.
 *
 * @throws ParseError when any entry is not an email address
 */
export function parseRecipients(to: string): string[] {
  const entries = to.split(',').map((entry) => entry.trim()).filter(Boolean);
  if (entries.length === 0) {
    throw new ParseError('No recipient address given', to);
  }

  return entries.map((entry) => {
    const bracketed = entry.match(/<([^>]+)>\s*$/);
    const address = (bracketed ? bracketed[1] : entry).trim();
    if (!EMAIL_ADDRESS.test(address)) {
      throw new ParseError(`"${entry}" is not an email address`, to);
    }
    return address;
  });
}

function stripLineBreaks(value: string): string {
  return value.replace(/[\r\n]+/g, ' ').trim();
}

/** RFC 2047 encoded-word for non-ASCII header values. */
function encodeHeader(value: string): string {
  return /^[\x20-\x7e]*$/.test(value)
    ? value
    : `=?UTF-8?B?${Buffer.from(value, 'utf8').toString('base64')}?=`;
}

/**
 * Build an RFC 2822 message encoded as base64url for the Gmail API.
 */
export function buildRawMessage(recipients: string[], subject: string, body: string): string {
  const message = [
    `To: ${recipients.join(', ')}`,
    `Subject: ${encodeHeader(stripLineBreaks(subject))}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: 8bit',
    '',
    body,
  ].join('\r\n');
  return Buffer.from(message, 'utf8').toString('base64url');
}

/**
 * Parse a List-Unsubscribe header: `<mailto:...>, <https://...>`.
 */
export function parseListUnsubscribe(header: string): { url?: string; mailto?: string } {
  const result: { url?: string; mailto?: string } = {};
  for (const match of header.matchAll(/<([^>]+)>/g)) {
    const target = match[1].trim();
    if (!result.mailto && target.toLowerCase().startsWith('mailto:')) {
      result.mailto = target.slice('mailto:'.length);
    } else if (!result.url && /^https?:\/\//i.test(target)) {
      result.url = target;
    }
  }
  return result;
}

function collectAttachments(part: gmail_v1.Schema$MessagePart | undefined): EmailAttachment[] {
  if (!part) return [];

  const own: EmailAttachment[] = part.filename
    ? [{
        filename: part.filename,
        mimeType: part.mimeType ?? 'application/octet-stream',
        size: part.body?.size ?? 0,
      }]
    : [];

  return own.concat(...(part.parts ?? []).map(collectAttachments));
}

function headerValue(message: gmail_v1.Schema$Message, name: string): string {
  const wanted = name.toLowerCase();
  const headers = message.payload?.headers ?? [];
  return headers.find((h) => h.name?.toLowerCase() === wanted)?.value ?? '';
}

function toEmailMessage(message: gmail_v1.Schema$Message): EmailMessage {
  const id = message.id ?? '';
  return {
    id,
    threadId: message.threadId ?? id,
    from: headerValue(message, 'From'),
    subject: headerValue(message, 'Subject'),
    snippet: message.snippet ?? '',
    date: headerValue(message, 'Date'),
    isUnread: message.labelIds?.includes('UNREAD') ?? false,
    attachments: collectAttachments(message.payload),
  };
}

function encodeOutgoing(email: OutgoingEmail): OperationResult<string> {
  try {
    return ok(buildRawMessage(parseRecipients(email.to), email.subject, email.body));
  } catch (error) {
    if (error instanceof ParseError) return fail('parse_error', error.message);
    throw error;
  }
}

export interface GmailProviderOptions {
  auth: GoogleAuthSource;
  logger?: AppLogger;
  retryDelayMs?: number;
}

export class GmailProvider {
  private readonly auth: GoogleAuthSource;
  private readonly log: AppLogger;
  private readonly retryDelayMs?: number;

  constructor(options: GmailProviderOptions) {
    this.auth = options.auth;
    this.log = options.logger ?? createLogger({ domain: 'gmail', integration: 'email' });
    this.retryDelayMs = options.retryDelayMs;
  }

  private run<T>(
    userId: string,
    operation: string,
    fn: (gmail: gmail_v1.Gmail) => Promise<T>
  ): Promise<OperationResult<T>> {
    return runGoogleOperation(
      { auth: this.auth, userId, operation, log: this.log, retryDelayMs: this.retryDelayMs },
      (client: Auth.OAuth2Client) => fn(google.gmail({ version: 'v1', auth: client }))
    );
  }

  /**
   * List message ids for a query and fetch each one.
   */
  private async listMessages(
    gmail: gmail_v1.Gmail,
    query: string,
    maxResults: number,
    options: { full?: boolean; headers?: string[] } = {}
  ): Promise<gmail_v1.Schema$Message[]> {
    const response = await gmail.users.messages.list({ userId: 'me', q: query, maxResults });
    const ids = (response.data.messages ?? [])
      .map((msg) => msg.id)
      .filter((id): id is string => typeof id === 'string' && id.length > 0);

    return Promise.all(
      ids.map(async (id) => {
        const detail = await gmail.users.messages.get(
          options.full
            ? { userId: 'me', id, format: 'full' }
            : { userId: 'me', id, format: 'metadata', metadataHeaders: options.headers ?? METADATA_HEADERS }
        );
        return { ...detail.data, id: detail.data.id ?? id };
      })
    );
  }

  searchMessages(userId: string, query: string, maxResults = 10): Promise<OperationResult<EmailMessage[]>> {
    return this.run(userId, 'search_messages', async (gmail) => {
      const messages = await this.listMessages(gmail, query, maxResults);
      return messages.map(toEmailMessage);
    });
  }

  async listByLabel(userId: string, label: string, maxResults = 10): Promise<OperationResult<EmailMessage[]>> {
    const query = labelQuery(label);
    if (query === null) {
      return fail('parse_error', `Unknown label "${label}"`);
    }
    return this.run(userId, 'list_by_label', async (gmail) => {
      const messages = await this.listMessages(gmail, query, maxResults);
      return messages.map(toEmailMessage);
    });
  }

  /** Unread inbox mail from the last day. */
  fetchDigest(userId: string, maxResults = 10): Promise<OperationResult<EmailMessage[]>> {
    return this.run(userId, 'fetch_digest', async (gmail) => {
      const messages = await this.listMessages(gmail, DIGEST_QUERY, maxResults);
      return messages.map(toEmailMessage);
    });
  }

  /** Messages with attachments matching a query; only those that carry files. */
  searchAttachments(userId: string, query: string, maxResults = 10): Promise<OperationResult<EmailMessage[]>> {
    const q = query.trim() ? `has:attachment ${query.trim()}` : 'has:attachment';
    return this.run(userId, 'search_attachments', async (gmail) => {
      const messages = await this.listMessages(gmail, q, maxResults, { full: true });
      return messages
        .map((msg) => toEmailMessage(msg))
        .filter((msg) => msg.attachments.length > 0);
    });
  }

  /**
   * Unsubscribe target from the sender's most recent mail carrying a
   * List-Unsubscribe header. Null when none does.
   */
  findUnsubscribe(userId: string, sender: string): Promise<OperationResult<UnsubscribeInfo | null>> {
    return this.run(userId, 'find_unsubscribe', async (gmail) => {
      const messages = await this.listMessages(gmail, `from:${sender.trim()}`, 5, {
        headers: ['From', 'Subject', 'List-Unsubscribe'],
      });

      for (const msg of messages) {
        const header = headerValue(msg, 'List-Unsubscribe');
        if (!header) continue;
        const targets = parseListUnsubscribe(header);
        if (targets.url || targets.mailto) {
          return { from: headerValue(msg, 'From'), subject: headerValue(msg, 'Subject'), ...targets };
        }
      }
      return null;
    });
  }

  async createDraft(userId: string, email: OutgoingEmail): Promise<OperationResult<{ id: string }>> {
    const encoded = encodeOutgoing(email);
    if (!encoded.success) return encoded;
    const raw = encoded.data;

    return this.run(userId, 'create_draft', async (gmail) => {
      const response = await gmail.users.drafts.create({
        userId: 'me',
        requestBody: { message: { raw } },
      });
      return { id: response.data.id ?? '' };
    });
  }

  async sendMessage(userId: string, email: OutgoingEmail): Promise<OperationResult<{ id: string; threadId: string }>> {
    const encoded = encodeOutgoing(email);
    if (!encoded.success) return encoded;
    const raw = encoded.data;

    return this.run(userId, 'send_message', async (gmail) => {
      const response = await gmail.users.messages.send({
        userId: 'me',
        requestBody: { raw },
      });
      const id = response.data.id ?? '';
      return { id, threadId: response.data.threadId ?? id };
    });
  }
}
