/**
 * Unit tests for the email tools.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { dispatchTool } from '../../../src/tools/index.js';
import { senderName } from '../../../src/tools/email.js';
import {
  mockMessagesSend,
  networkCallCount,
  queueGmailErrors,
  setMockEmails,
  type MockEmail,
} from '../../mocks/googleapis.js';
import { createTestRuntime, type TestRuntime } from '../../helpers/runtime.js';

function email(id: string, from: string, subject: string, extraHeaders: Array<{ name: string; value: string }> = []): MockEmail {
  return {
    id,
    threadId: `thread-${id}`,
    labelIds: ['INBOX'],
    payload: {
      headers: [
        { name: 'From', value: from },
        { name: 'Subject', value: subject },
        ...extraHeaders,
      ],
    },
  };
}

describe('senderName', () => {
  it('prefers the display name', () => {
    expect(senderName('"Alex Doe" <alex@example.com>')).toBe('Alex Doe');
    expect(senderName('Alex Doe <alex@example.com>')).toBe('Alex Doe');
  });

  it('falls back to the address', () => {
    expect(senderName('<alex@example.com>')).toBe('alex@example.com');
    expect(senderName('alex@example.com')).toBe('alex@example.com');
    expect(senderName('')).toBe('an unknown sender');
  });
});

describe('email tools', () => {
  let t: TestRuntime;

  const call = (name: string, input: Record<string, unknown>, userId = 'u1') =>
    dispatchTool(t.runtime.tools, name, input, { userId });

  beforeEach(() => {
    t = createTestRuntime();
  });

  describe('search_email', () => {
    it('asks the user to connect without calling Gmail', async () => {
      const reply = await call('search_email', { query: 'invoices' });

      expect(reply).toBe(
        'Your Gmail isn\'t connected yet. Say "connect my email" and I\'ll give you a link to set it up.'
      );
      expect(networkCallCount()).toBe(0);
      expect(t.memoryClient.search).not.toHaveBeenCalled();
    });

    it('rejects a missing query', async () => {
      expect(await call('search_email', {})).toBe('I need something to search for. query is required.');
    });

    it('adds what memory knows about the sender', async () => {
      await t.connect('u1', 'email');
      setMockEmails([email('m1', 'Ana Ruiz <ana@example.org>', 'Invoice 42')]);
      t.memoryClient.setResults('who is Ana Ruiz', [{ text: 'Ana is your accountant', score: 0.9 }]);

      expect(await call('search_email', { query: 'invoices' })).toBe(
        'I found 1 email matching "invoices". ' +
          'From Ana Ruiz, subject "Invoice 42" (Context on Ana Ruiz: Ana is your accountant).'
      );
    });

    it('speaks three results and counts the rest', async () => {
      await t.connect('u1', 'email');
      setMockEmails(['S1', 'S2', 'S3', 'S4', 'S5'].map((s, i) => email(`m${i}`, 'Bob <bob@example.com>', s)));

      expect(await call('search_email', { query: 'lunch' })).toBe(
        'I found 5 emails matching "lunch". ' +
          'From Bob, subject "S1". From Bob, subject "S2". From Bob, subject "S3". And 2 more.'
      );
      expect(t.memoryClient.search).toHaveBeenCalledTimes(1);
      expect(t.memoryClient.search.mock.calls[0][1]).toBe('who is Bob');
    });

    it('still answers when the memory store fails', async () => {
      await t.connect('u1', 'email');
      t.memoryClient.failSearch = true;
      setMockEmails([email('m1', 'Bob <bob@example.com>', 'Lunch')]);

      expect(await call('search_email', { query: 'lunch' })).toBe(
        'I found 1 email matching "lunch". From Bob, subject "Lunch".'
      );
    });

    it('says when nothing matched', async () => {
      await t.connect('u1', 'email');

      expect(await call('search_email', { query: 'invoices' })).toBe(
        'I didn\'t find any emails matching "invoices".'
      );
    });

    it('explains a Gmail outage', async () => {
      await t.connect('u1', 'email');
      const unavailable = Object.assign(new Error('Backend Error'), { code: 503 });
      queueGmailErrors(unavailable, unavailable, unavailable);

      expect(await call('search_email', { query: 'invoices' })).toBe(
        "I couldn't search your email because Gmail didn't respond properly. Please try again in a moment."
      );
    });

    it('asks to reconnect when the grant cannot be renewed', async () => {
      await t.connect('u1', 'email', { expiry: Date.now() - 1000, refreshToken: null });

      expect(await call('search_email', { query: 'invoices' })).toBe(
        'Your Gmail access has expired. Please reconnect Gmail and then ask me again.'
      );
      expect(networkCallCount()).toBe(0);
    });
  });

  describe('connect_email', () => {
    it('returns an authorization link', async () => {
      expect(await call('connect_email', {})).toBe(
        'To connect Gmail, open this link and approve access: http://localhost:3000/email/auth?user_id=u1'
      );
    });

    it('says when Gmail is already connected', async () => {
      await t.connect('u1', 'email');
      expect(await call('connect_email', {})).toBe('Your Gmail is already connected.');
    });
  });

  describe('create_draft_email and send_email', () => {
    beforeEach(async () => {
      await t.connect('u1', 'email');
    });

    it('saves a draft', async () => {
      expect(await call('create_draft_email', { to: 'bob@example.com', subject: 'Lunch', body: 'Noon?' })).toBe(
        'I\'ve saved a draft to bob@example.com with the subject "Lunch".'
      );
    });

    it('sends an email', async () => {
      expect(await call('send_email', { to: 'bob@example.com', subject: 'Lunch', body: 'Noon?' })).toBe(
        'I\'ve sent your email to bob@example.com with the subject "Lunch".'
      );
      expect(mockMessagesSend).toHaveBeenCalledTimes(1);
    });

    it('asks again for an invalid recipient', async () => {
      expect(await call('send_email', { to: 'bob', subject: 'Lunch', body: 'Noon?' })).toBe(
        'I couldn\'t send that email: "bob" is not an email address. Could you say that again?'
      );
      expect(mockMessagesSend).not.toHaveBeenCalled();
    });

    it('requires a body', async () => {
      expect(await call('send_email', { to: 'bob@example.com', subject: 'Lunch' })).toBe(
        "I can't send that email yet. body is required."
      );
    });
  });

  describe('list_emails_by_label', () => {
    beforeEach(async () => {
      await t.connect('u1', 'email');
    });

    it('lists emails under a label', async () => {
      setMockEmails([email('m1', 'Bob <bob@example.com>', 'Lunch')]);

      expect(await call('list_emails_by_label', { label: 'Starred' })).toBe(
        'Here is 1 email under starred. From Bob, subject "Lunch".'
      );
    });

    it('asks again for an unknown label', async () => {
      expect(await call('list_emails_by_label', { label: 'receipts' })).toBe(
        'I couldn\'t list your receipts emails: Unknown label "receipts". Could you say that again?'
      );
    });
  });

  describe('fetch_digest', () => {
    it('summarizes unread mail', async () => {
      await t.connect('u1', 'email');
      setMockEmails([
        email('m1', 'Bob <bob@example.com>', 'Lunch'),
        email('m2', 'Ana Ruiz <ana@example.org>', 'Invoice 42'),
      ]);

      expect(await call('fetch_digest', {})).toBe(
        'You have 2 unread emails from the last day. From Bob, subject "Lunch". From Ana Ruiz, subject "Invoice 42".'
      );
    });

    it('says when the inbox is clear', async () => {
      await t.connect('u1', 'email');
      expect(await call('fetch_digest', {})).toBe("You don't have any unread email from the last day.");
    });
  });

  describe('find_unsubscribe', () => {
    beforeEach(async () => {
      await t.connect('u1', 'email');
    });

    it('reads out the unsubscribe link', async () => {
      setMockEmails([
        email('m1', 'News <news@example.com>', 'Weekly', [
          { name: 'List-Unsubscribe', value: '<https://news.example.com/u/1>' },
        ]),
      ]);

      expect(await call('find_unsubscribe', { sender: 'news@example.com' })).toBe(
        'I found an unsubscribe link for News. Open https://news.example.com/u/1 to unsubscribe.'
      );
    });

    it('falls back to the mailto address', async () => {
      setMockEmails([
        email('m1', 'News <news@example.com>', 'Weekly', [
          { name: 'List-Unsubscribe', value: '<mailto:leave@news.example.com>' },
        ]),
      ]);

      expect(await call('find_unsubscribe', { sender: 'news@example.com' })).toBe(
        'News takes unsubscribe requests by email. Send a message to leave@news.example.com to unsubscribe.'
      );
    });

    it('says when there is no option', async () => {
      expect(await call('find_unsubscribe', { sender: 'news@example.com' })).toBe(
        "I couldn't find an unsubscribe option in recent mail from news@example.com."
      );
    });
  });
});
