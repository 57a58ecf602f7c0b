/**
 * Calendar tools.
 */

import { DateTime } from 'luxon';
import { ParseError } from '../utils/errors.js';
import type { Integration } from '../services/integrations.js';
import type { CalendarEvent } from '../services/google/calendar.js';
import {
  formatSpokenDate,
  formatSpokenDateTime,
  parseStartTime,
  resolveTimezone,
  type ParsedStartTime,
} from '../services/date/time.js';
import type { ToolDefinition, ToolDependencies } from './types.js';
import { integerBetween, readNumber, readString, validateInput } from './utils.js';
import { failureMessage, notConnectedMessage, pluralize, speakList, timeParseMessage, toSpeakable } from './messages.js';
import { connectTool } from './connect.js';

const INTEGRATION: Integration = 'calendar';

export const DEFAULT_DURATION_MINUTES = 60;

/** Max event duration: 7 days in minutes */
export const MAX_DURATION_MINUTES = 7 * 24 * 60;

export const DEFAULT_LIST_DAYS = 7;
const MAX_LIST_DAYS = 60;

function describeEvent(event: CalendarEvent, timezone: string): string {
  const title = toSpeakable(event.title) || 'Untitled event';
  if (event.allDay) {
    const day = DateTime.fromISO(event.start, { zone: timezone });
    return day.isValid ? `${title} on ${formatSpokenDate(day)}, all day` : `${title}, all day`;
  }
  const start = DateTime.fromISO(event.start, { zone: timezone });
  return start.isValid ? `${title} on ${formatSpokenDateTime(start)}` : title;
}

export function createCalendarTools(deps: ToolDependencies): ToolDefinition[] {
  const { credentials, calendar, defaultTimezone } = deps;

  const listCalendarEvents: ToolDefinition = {
    tool: {
      name: 'list_calendar_events',
      description: "List upcoming events on the user's Google Calendar.",
      input_schema: {
        type: 'object' as const,
        properties: {
          days: {
            type: 'number',
            description: `How many days ahead to look (default ${DEFAULT_LIST_DAYS}, max ${MAX_LIST_DAYS}).`,
          },
        },
      },
    },
    handler: async (input, context) => {
      const invalid = validateInput(input, {
        days: { type: 'number', required: false, validate: integerBetween('days', 1, MAX_LIST_DAYS) },
      });
      if (invalid) return `I couldn't check your calendar. ${invalid}`;
      const days = readNumber(input, 'days') ?? DEFAULT_LIST_DAYS;

      if (!(await credentials.isConnected(context.userId, INTEGRATION))) {
        return notConnectedMessage(INTEGRATION);
      }

      const result = await calendar.listEvents(context.userId, days);
      if (!result.success) {
        return failureMessage(INTEGRATION, 'check your calendar', result.error);
      }

      const period = days === 1 ? 'the next day' : `the next ${days} days`;
      if (result.data.length === 0) {
        return `You have no events in ${period}.`;
      }

      const timezone = resolveTimezone(context.timezone, defaultTimezone);
      const items = result.data.map((event) => describeEvent(event, timezone));
      return `You have ${pluralize(result.data.length, 'event')} in ${period}. ${speakList(items)}`;
    },
  };

  const createCalendarEvent: ToolDefinition = {
    tool: {
      name: 'create_calendar_event',
      description: `Create an event on the user's Google Calendar.

Pass the start as ISO 8601. Without an offset ("2025-11-20T09:00:00") the time is read in the user's timezone.`,
      input_schema: {
        type: 'object' as const,
        properties: {
          summary: { type: 'string', description: 'Event title' },
          start_time_iso: {
            type: 'string',
            description: 'Start time in ISO 8601, e.g. "2025-11-20T09:00:00".',
          },
          duration_minutes: {
            type: 'number',
            description: `Length in minutes (default ${DEFAULT_DURATION_MINUTES}).`,
          },
          location: { type: 'string', description: 'Event location (optional)' },
        },
        required: ['summary', 'start_time_iso'],
      },
    },
    handler: async (input, context) => {
      const invalid = validateInput(input, {
        summary: { type: 'string', required: true },
        start_time_iso: { type: 'string', required: true, nonEmpty: false },
        duration_minutes: {
          type: 'number',
          required: false,
          validate: integerBetween('duration_minutes', 1, MAX_DURATION_MINUTES),
        },
        location: { type: 'string', required: false },
      });
      if (invalid) return `I couldn't create that event. ${invalid}`;

      const summary = readString(input, 'summary')?.trim() ?? '';
      const startInput = readString(input, 'start_time_iso') ?? '';
      const duration = readNumber(input, 'duration_minutes') ?? DEFAULT_DURATION_MINUTES;
      const location = readString(input, 'location')?.trim() || undefined;

      const timezone = resolveTimezone(context.timezone, defaultTimezone);
      let parsed: ParsedStartTime;
      try {
        parsed = parseStartTime(startInput, timezone);
      } catch (error) {
        if (error instanceof ParseError) return timeParseMessage(startInput);
        throw error;
      }

      if (!(await credentials.isConnected(context.userId, INTEGRATION))) {
        return notConnectedMessage(INTEGRATION);
      }

      const end = parsed.start.plus({ minutes: duration });
      const result = await calendar.createEvent(context.userId, {
        summary,
        start: parsed.start,
        end,
        timeZone: parsed.naive ? parsed.timezone : undefined,
        location,
      });
      if (!result.success) {
        return failureMessage(INTEGRATION, 'create that event', result.error);
      }

      return `I've created an event called '${toSpeakable(summary)}' for ${formatSpokenDateTime(parsed.start)}.`;
    },
  };

  return [
    listCalendarEvents,
    createCalendarEvent,
    connectTool(deps, INTEGRATION, 'connect_calendar'),
  ];
}
