/**
 * @fileoverview Connected integrations and their OAuth scopes.
 */

export const INTEGRATIONS = ['email', 'calendar'] as const;

export type Integration = (typeof INTEGRATIONS)[number];

export function isIntegration(value: unknown): value is Integration {
  return INTEGRATIONS.some((integration) => integration === value);
}

/** Scopes requested for each integration. */
export const INTEGRATION_SCOPES: Record<Integration, readonly string[]> = {
  email: [
    'https://www.googleapis.com/auth/gmail.readonly',
    'https://www.googleapis.com/auth/gmail.compose',
    'https://www.googleapis.com/auth/gmail.send',
  ],
  calendar: [
    'https://www.googleapis.com/auth/calendar.readonly',
    'https://www.googleapis.com/auth/calendar.events',
  ],
};

/** Spoken product name for each integration. */
export const INTEGRATION_LABELS: Record<Integration, string> = {
  email: 'Gmail',
  calendar: 'Google Calendar',
};
