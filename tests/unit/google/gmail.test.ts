/**
 * Unit tests for the Gmail provider and its message helpers.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  buildRawMessage,
  labelQuery,
  parseListUnsubscribe,
  parseRecipients,
} from '../../../src/services/google/gmail.js';
import { ParseError } from '../../../src/utils/errors.js';
import {
  mockDraftsCreate,
  mockMessagesGet,
  mockMessagesList,
  mockMessagesSend,
  networkCallCount,
  queueGmailErrors,
  setMockEmails,
  type MockEmail,
} from '../../mocks/googleapis.js';
import { createTestRuntime, type TestRuntime } from '../../helpers/runtime.js';

function email(id: string, from: string, subject: string, extra: Partial<MockEmail> = {}): MockEmail {
  return {
    id,
    threadId: `thread-${id}`,
    snippet: `Snippet ${id}`,
    labelIds: ['INBOX'],
    payload: {
      headers: [
        { name: 'From', value: from },
        { name: 'Subject', value: subject },
        { name: 'Date', value: 'Thu, 20 Nov 2025 09:00:00 -0800' },
      ],
    },
    ...extra,
  };
}

function decode(raw: string): string {
  return Buffer.from(raw, 'base64url').toString('utf8');
}

function httpError(code: number, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('labelQuery', () => {
  it('maps spoken labels to Gmail queries', () => {
    expect(labelQuery('Starred')).toBe('is:starred');
    expect(labelQuery(' snoozed ')).toBe('in:snoozed');
  });

  it('returns null for unknown labels', () => {
    expect(labelQuery('receipts')).toBeNull();
    expect(labelQuery('constructor')).toBeNull();
  });
});

describe('parseRecipients', () => {
  it('accepts plain and named addresses', () => {
    expect(parseRecipients('bob@example.com, Ana Ruiz <ana@example.org>')).toEqual([
      'bob@example.com',
      'ana@example.org',
    ]);
  });

  it('rejects names without an address', () => {
    expect(() => parseRecipients('bob')).toThrow(ParseError);
    expect(() => parseRecipients('bob')).toThrow('"bob" is not an email address');
  });

  it('rejects an empty list', () => {
    expect(() => parseRecipients(' , ')).toThrow('No recipient address given');
  });
});

describe('buildRawMessage', () => {
  it('builds a plain-text RFC 2822 message', () => {
    expect(decode(buildRawMessage(['a@example.com', 'b@example.com'], 'Hello', 'See you soon'))).toBe(
      'To: a@example.com, b@example.com\r\n' +
        'Subject: Hello\r\n' +
        'MIME-Version: 1.0\r\n' +
        'Content-Type: text/plain; charset="UTF-8"\r\n' +
        'Content-Transfer-Encoding: 8bit\r\n' +
        '\r\n' +
        'See you soon'
    );
  });

  it('encodes non-ASCII subjects and strips line breaks', () => {
    const text = decode(buildRawMessage(['a@example.com'], 'Café', 'x'));
    expect(text).toContain('Subject: =?UTF-8?B?Q2Fmw6k=?=\r\n');

    const injected = decode(buildRawMessage(['a@example.com'], 'Hi\r\nBcc: evil@example.com', 'x'));
    expect(injected).toContain('Subject: Hi Bcc: evil@example.com\r\n');
  });
});

describe('parseListUnsubscribe', () => {
  it('reads mailto and https targets', () => {
    expect(parseListUnsubscribe('<mailto:unsub@news.example.com>, <https://news.example.com/u/1>')).toEqual({
      mailto: 'unsub@news.example.com',
      url: 'https://news.example.com/u/1',
    });
  });

  it('ignores unbracketed values', () => {
    expect(parseListUnsubscribe('https://news.example.com/u/1')).toEqual({});
  });
});

describe('GmailProvider', () => {
  let t: TestRuntime;

  beforeEach(async () => {
    t = createTestRuntime();
    await t.connect('user-1', 'email');
  });

  it('reports not connected without calling Gmail', async () => {
    const result = await t.runtime.gmail.searchMessages('user-2', 'invoices');

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.kind).toBe('not_connected');
    expect(networkCallCount()).toBe(0);
  });

  it('searches and maps message metadata', async () => {
    setMockEmails([
      email('m1', 'Ana Ruiz <ana@example.org>', 'Invoice 42', { labelIds: ['INBOX', 'UNREAD'] }),
    ]);

    const result = await t.runtime.gmail.searchMessages('user-1', 'invoices');

    expect(mockMessagesList).toHaveBeenCalledWith({ userId: 'me', q: 'invoices', maxResults: 10 });
    expect(mockMessagesGet).toHaveBeenCalledWith({
      userId: 'me',
      id: 'm1',
      format: 'metadata',
      metadataHeaders: ['From', 'Subject', 'Date'],
    });
    expect(result).toEqual({
      success: true,
      data: [{
        id: 'm1',
        threadId: 'thread-m1',
        from: 'Ana Ruiz <ana@example.org>',
        subject: 'Invoice 42',
        snippet: 'Snippet m1',
        date: 'Thu, 20 Nov 2025 09:00:00 -0800',
        isUnread: true,
        attachments: [],
      }],
    });
  });

  it('retries a 503 and then succeeds', async () => {
    queueGmailErrors(httpError(503, 'Backend Error'));
    setMockEmails([email('m1', 'ana@example.org', 'Hi')]);

    const result = await t.runtime.gmail.searchMessages('user-1', 'hi');

    expect(result.success).toBe(true);
    expect(mockMessagesList).toHaveBeenCalledTimes(2);
  });

  it('gives up after repeated server errors', async () => {
    queueGmailErrors(
      httpError(503, 'Backend Error'),
      httpError(503, 'Backend Error'),
      httpError(503, 'Backend Error')
    );

    const result = await t.runtime.gmail.searchMessages('user-1', 'hi');

    expect(result).toEqual({ success: false, error: { kind: 'remote_failure', message: 'Backend Error' } });
    expect(mockMessagesList).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors', async () => {
    queueGmailErrors(httpError(400, 'Invalid query'));

    const result = await t.runtime.gmail.searchMessages('user-1', 'hi');

    expect(result.success).toBe(false);
    expect(mockMessagesList).toHaveBeenCalledTimes(1);
  });

  it('treats a missing scope as an expired grant', async () => {
    queueGmailErrors(httpError(403, 'Request had insufficient authentication scopes.'));

    const result = await t.runtime.gmail.searchMessages('user-1', 'hi');

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.kind).toBe('credential_expired');
  });

  it('rejects an unknown label before loading credentials', async () => {
    const result = await t.runtime.gmail.listByLabel('user-2', 'receipts');

    expect(result).toEqual({ success: false, error: { kind: 'parse_error', message: 'Unknown label "receipts"' } });
    expect(networkCallCount()).toBe(0);
  });

  it('lists by label and fetches the digest with their queries', async () => {
    await t.runtime.gmail.listByLabel('user-1', 'starred', 5);
    await t.runtime.gmail.fetchDigest('user-1');

    expect(mockMessagesList).toHaveBeenNthCalledWith(1, { userId: 'me', q: 'is:starred', maxResults: 5 });
    expect(mockMessagesList).toHaveBeenNthCalledWith(2, {
      userId: 'me',
      q: 'in:inbox is:unread newer_than:1d',
      maxResults: 10,
    });
  });

  it('keeps only messages that carry attachments', async () => {
    setMockEmails([
      email('m1', 'ana@example.org', 'Contract', {
        payload: {
          headers: [{ name: 'Subject', value: 'Contract' }],
          parts: [
            { mimeType: 'text/plain', body: { size: 10 } },
            { mimeType: 'application/pdf', filename: 'contract.pdf', body: { size: 2048 } },
          ],
        },
      }),
      email('m2', 'bob@example.com', 'No files'),
    ]);

    const result = await t.runtime.gmail.searchAttachments('user-1', 'contract');

    expect(mockMessagesList).toHaveBeenCalledWith({ userId: 'me', q: 'has:attachment contract', maxResults: 10 });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.map((m) => m.id)).toEqual(['m1']);
      expect(result.data[0].attachments).toEqual([
        { filename: 'contract.pdf', mimeType: 'application/pdf', size: 2048 },
      ]);
    }
  });

  it('finds an unsubscribe target from the sender', async () => {
    setMockEmails([
      email('m1', 'News <news@example.com>', 'Weekly'),
      email('m2', 'News <news@example.com>', 'Special offer', {
        payload: {
          headers: [
            { name: 'From', value: 'News <news@example.com>' },
            { name: 'Subject', value: 'Special offer' },
            { name: 'List-Unsubscribe', value: '<https://news.example.com/u/1>' },
          ],
        },
      }),
    ]);

    const result = await t.runtime.gmail.findUnsubscribe('user-1', 'news@example.com');

    expect(mockMessagesList).toHaveBeenCalledWith({ userId: 'me', q: 'from:news@example.com', maxResults: 5 });
    expect(result).toEqual({
      success: true,
      data: { from: 'News <news@example.com>', subject: 'Special offer', url: 'https://news.example.com/u/1' },
    });
  });

  it('returns null when no message offers unsubscribe', async () => {
    setMockEmails([email('m1', 'news@example.com', 'Weekly')]);

    expect(await t.runtime.gmail.findUnsubscribe('user-1', 'news@example.com')).toEqual({ success: true, data: null });
  });

  it('creates a draft', async () => {
    const result = await t.runtime.gmail.createDraft('user-1', {
      to: 'bob@example.com',
      subject: 'Lunch',
      body: 'Noon?',
    });

    expect(result).toEqual({ success: true, data: { id: 'draft-id' } });
    const raw = mockDraftsCreate.mock.calls[0][0].requestBody.message.raw;
    expect(decode(raw)).toContain('To: bob@example.com\r\nSubject: Lunch\r\n');
  });

  it('sends a message', async () => {
    const result = await t.runtime.gmail.sendMessage('user-1', {
      to: 'Bob <bob@example.com>',
      subject: 'Lunch',
      body: 'Noon?',
    });

    expect(result).toEqual({ success: true, data: { id: 'sent-message-id', threadId: 'sent-thread-id' } });
    expect(decode(mockMessagesSend.mock.calls[0][0].requestBody.raw)).toMatch(/^To: bob@example\.com\r\n/);
  });

  it('refuses to send to an invalid address', async () => {
    const result = await t.runtime.gmail.sendMessage('user-1', { to: 'bob', subject: 'Lunch', body: 'Noon?' });

    expect(result).toEqual({ success: false, error: { kind: 'parse_error', message: '"bob" is not an email address' } });
    expect(mockMessagesSend).not.toHaveBeenCalled();
  });
});
