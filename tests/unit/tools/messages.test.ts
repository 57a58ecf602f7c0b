/**
 * Unit tests for spoken tool messages.
 */

import { describe, it, expect } from 'vitest';
import { failureMessage, pluralize, speakList, toSpeakable } from '../../../src/tools/messages.js';
import { integerBetween, validateInput } from '../../../src/tools/utils.js';

describe('speakList', () => {
  it('reads short lists in full', () => {
    expect(speakList(['One', 'Two'])).toBe('One. Two.');
  });

  it('summarizes beyond three items', () => {
    expect(speakList(['A', 'B', 'C', 'D'])).toBe('A. B. C. And 1 more.');
  });
});

describe('pluralize', () => {
  it('adds s except for one', () => {
    expect(pluralize(1, 'email')).toBe('1 email');
    expect(pluralize(0, 'email')).toBe('0 emails');
  });
});

describe('toSpeakable', () => {
  it('drops markup and collapses whitespace', () => {
    expect(toSpeakable('  **Quarterly**  report\n#2 ')).toBe('Quarterly report 2');
  });
});

describe('failureMessage', () => {
  it('words each failure kind differently', () => {
    const messages = (['not_connected', 'credential_expired', 'remote_failure', 'parse_error'] as const).map(
      (kind) => failureMessage('calendar', 'check your calendar', { kind, message: 'bad input' })
    );

    expect(messages).toEqual([
      'Your Google Calendar isn\'t connected yet. Say "connect my calendar" and I\'ll give you a link to set it up.',
      'Your Google Calendar access has expired. Please reconnect Google Calendar and then ask me again.',
      "I couldn't check your calendar because Google Calendar didn't respond properly. Please try again in a moment.",
      "I couldn't check your calendar: bad input. Could you say that again?",
    ]);
  });
});

describe('validateInput', () => {
  it('checks presence, type and emptiness', () => {
    const spec = {
      name: { type: 'string' as const, required: true },
      count: { type: 'number' as const, required: false, validate: integerBetween('count', 1, 5) },
    };

    expect(validateInput({}, spec)).toBe('name is required.');
    expect(validateInput({ name: 3 }, spec)).toBe('name must be a string.');
    expect(validateInput({ name: '  ' }, spec)).toBe('name must be a non-empty string.');
    expect(validateInput({ name: 'a', count: 2.5 }, spec)).toBe('count must be a whole number from 1 to 5.');
    expect(validateInput({ name: 'a', count: 5 }, spec)).toBeNull();
  });
});
