/**
 * @fileoverview Google Calendar provider.
 *
 * List and create events on the user's primary calendar.
 */

import { google, type Auth, type calendar_v3 } from 'googleapis';
import type { DateTime } from 'luxon';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import type { OperationResult } from '../../utils/errors.js';
import { toLocalIso, toOffsetIso } from '../date/time.js';
import { runGoogleOperation, type GoogleAuthSource } from './client.js';

/**
 * Calendar event returned by our API.
 */
export interface CalendarEvent {
  id: string;
  title: string;
  start: string; // ISO string, or yyyy-MM-dd for all-day events
  end: string;
  allDay: boolean;
  location?: string;
}

/**
 * Event time as sent to Calendar. With `timeZone`, the wall-clock time is
 * read in that zone; without it the offset in `start` applies.
 */
export interface EventTiming {
  start: DateTime;
  end: DateTime;
  timeZone?: string;
}

export interface NewEvent extends EventTiming {
  summary: string;
  location?: string;
}

export function toEventDateTime(value: DateTime, timeZone?: string): calendar_v3.Schema$EventDateTime {
  return timeZone
    ? { dateTime: toLocalIso(value), timeZone }
    : { dateTime: toOffsetIso(value) };
}

function toCalendarEvent(event: calendar_v3.Schema$Event, fallbackTitle = '(No title)'): CalendarEvent {
  return {
    id: event.id ?? '',
    title: event.summary ?? fallbackTitle,
    start: event.start?.dateTime ?? event.start?.date ?? '',
    end: event.end?.dateTime ?? event.end?.date ?? '',
    allDay: !event.start?.dateTime && Boolean(event.start?.date),
    location: event.location ?? undefined,
  };
}

export interface CalendarProviderOptions {
  auth: GoogleAuthSource;
  logger?: AppLogger;
  retryDelayMs?: number;
}

export class CalendarProvider {
  private readonly auth: GoogleAuthSource;
  private readonly log: AppLogger;
  private readonly retryDelayMs?: number;

  constructor(options: CalendarProviderOptions) {
    this.auth = options.auth;
    this.log = options.logger ?? createLogger({ domain: 'calendar', integration: 'calendar' });
    this.retryDelayMs = options.retryDelayMs;
  }

  private run<T>(
    userId: string,
    operation: string,
    fn: (calendar: calendar_v3.Calendar) => Promise<T>
  ): Promise<OperationResult<T>> {
    return runGoogleOperation(
      { auth: this.auth, userId, operation, log: this.log, retryDelayMs: this.retryDelayMs },
      (client: Auth.OAuth2Client) => fn(google.calendar({ version: 'v3', auth: client }))
    );
  }

  /**
   * Upcoming events from now through the next `days` days.
   */
  listEvents(userId: string, days: number, maxResults = 10, now = new Date()): Promise<OperationResult<CalendarEvent[]>> {
    const timeMax = new Date(now.getTime() + days * 24 * 60 * 60 * 1000);
    return this.run(userId, 'list_events', async (calendar) => {
      const response = await calendar.events.list({
        calendarId: 'primary',
        timeMin: now.toISOString(),
        timeMax: timeMax.toISOString(),
        singleEvents: true,
        orderBy: 'startTime',
        maxResults,
      });
      return (response.data.items ?? []).map((event) => toCalendarEvent(event));
    });
  }

  createEvent(userId: string, event: NewEvent): Promise<OperationResult<CalendarEvent>> {
    const requestBody: calendar_v3.Schema$Event = {
      summary: event.summary,
      start: toEventDateTime(event.start, event.timeZone),
      end: toEventDateTime(event.end, event.timeZone),
    };
    if (event.location !== undefined) requestBody.location = event.location;

    return this.run(userId, 'create_event', async (calendar) => {
      const response = await calendar.events.insert({ calendarId: 'primary', requestBody });
      return toCalendarEvent(response.data, event.summary);
    });
  }
}
