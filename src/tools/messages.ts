/**
 * Spoken messages shared by the tool handlers.
 *
 * Each failure kind gets its own wording so the user knows whether to
 * connect, reconnect, retry or rephrase.
 */

import type { OperationFailure } from '../utils/errors.js';
import { INTEGRATION_LABELS, type Integration } from '../services/integrations.js';

/** Longest list read aloud before summarizing the rest. */
export const MAX_SPOKEN_ITEMS = 3;

const CONNECT_PHRASES: Record<Integration, string> = {
  email: 'connect my email',
  calendar: 'connect my calendar',
};

export function notConnectedMessage(integration: Integration): string {
  return `Your ${INTEGRATION_LABELS[integration]} isn't connected yet. Say "${CONNECT_PHRASES[integration]}" and I'll give you a link to set it up.`;
}

export function reconnectMessage(integration: Integration): string {
  const label = INTEGRATION_LABELS[integration];
  return `Your ${label} access has expired. Please reconnect ${label} and then ask me again.`;
}

export function timeParseMessage(input: string): string {
  return `I couldn't parse the time "${input}". Please tell me the date and time again, for example November 20 at 9 AM.`;
}

/**
 * Spoken message for a failed operation.
 *
 * @param action what the user asked for, as a verb phrase ("search your email")
 */
export function failureMessage(integration: Integration, action: string, failure: OperationFailure): string {
  switch (failure.kind) {
    case 'not_connected':
      return notConnectedMessage(integration);
    case 'credential_expired':
      return reconnectMessage(integration);
    case 'remote_failure':
      return `I couldn't ${action} because ${INTEGRATION_LABELS[integration]} didn't respond properly. Please try again in a moment.`;
    case 'parse_error':
      return `I couldn't ${action}: ${failure.message}. Could you say that again?`;
  }
}

/**
 * Read at most MAX_SPOKEN_ITEMS sentences, then "And N more."
 */
export function speakList(items: string[]): string {
  const shown = items.slice(0, MAX_SPOKEN_ITEMS).map((item) => `${item}.`);
  const remaining = items.length - MAX_SPOKEN_ITEMS;
  if (remaining > 0) {
    shown.push(`And ${remaining} more.`);
  }
  return shown.join(' ');
}

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Drop characters a speech engine would read out literally.
 */
export function toSpeakable(text: string): string {
  return text.replace(/[*_#`<>|]+/g, '').replace(/\s+/g, ' ').trim();
}
