/**
 * Unit tests for the calendar tools.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { dispatchTool } from '../../../src/tools/index.js';
import {
  mockEventsInsert,
  networkCallCount,
  setCalendarError,
  setMockEvents,
} from '../../mocks/googleapis.js';
import { createTestRuntime, type TestRuntime } from '../../helpers/runtime.js';

describe('calendar tools', () => {
  let t: TestRuntime;

  const call = (name: string, input: Record<string, unknown>, timezone?: string) =>
    dispatchTool(t.runtime.tools, name, input, { userId: 'u1', timezone });

  beforeEach(() => {
    t = createTestRuntime();
  });

  describe('create_calendar_event', () => {
    it('reads a naive start time in the user timezone', async () => {
      await t.connect('u1', 'calendar');

      const reply = await call(
        'create_calendar_event',
        { summary: 'Standup', start_time_iso: '2025-11-20T09:00:00', duration_minutes: 30 },
        'America/New_York'
      );

      expect(mockEventsInsert).toHaveBeenCalledWith({
        calendarId: 'primary',
        requestBody: {
          summary: 'Standup',
          start: { dateTime: '2025-11-20T09:00:00', timeZone: 'America/New_York' },
          end: { dateTime: '2025-11-20T09:30:00', timeZone: 'America/New_York' },
        },
      });
      expect(reply).toBe("I've created an event called 'Standup' for Thursday, November 20 at 9:00 AM.");
    });

    it('falls back to the default timezone for an unknown zone', async () => {
      await t.connect('u1', 'calendar');

      await call('create_calendar_event', { summary: 'Call', start_time_iso: '2025-11-20T09:00:00' }, 'Mars/Base');

      expect(mockEventsInsert.mock.calls[0][0].requestBody.start).toEqual({
        dateTime: '2025-11-20T09:00:00',
        timeZone: 'America/Los_Angeles',
      });
      expect(mockEventsInsert.mock.calls[0][0].requestBody.end).toEqual({
        dateTime: '2025-11-20T10:00:00',
        timeZone: 'America/Los_Angeles',
      });
    });

    it('keeps an explicit offset', async () => {
      await t.connect('u1', 'calendar');

      const reply = await call('create_calendar_event', {
        summary: 'Review',
        start_time_iso: '2025-11-20T14:00:00+01:00',
        duration_minutes: 45,
        location: 'Room 4',
      });

      expect(mockEventsInsert).toHaveBeenCalledWith({
        calendarId: 'primary',
        requestBody: {
          summary: 'Review',
          start: { dateTime: '2025-11-20T14:00:00+01:00' },
          end: { dateTime: '2025-11-20T14:45:00+01:00' },
          location: 'Room 4',
        },
      });
      expect(reply).toBe("I've created an event called 'Review' for Thursday, November 20 at 2:00 PM.");
    });

    it('asks again for a time it cannot parse', async () => {
      await t.connect('u1', 'calendar');

      expect(await call('create_calendar_event', { summary: 'X', start_time_iso: 'not-a-date' })).toBe(
        'I couldn\'t parse the time "not-a-date". Please tell me the date and time again, for example November 20 at 9 AM.'
      );
      expect(networkCallCount()).toBe(0);
    });

    it('rejects a duration out of range', async () => {
      expect(
        await call('create_calendar_event', { summary: 'X', start_time_iso: '2025-11-20T09:00:00', duration_minutes: 0 })
      ).toBe("I couldn't create that event. duration_minutes must be a whole number from 1 to 10080.");
    });

    it('asks the user to connect first', async () => {
      expect(await call('create_calendar_event', { summary: 'X', start_time_iso: '2025-11-20T09:00:00' })).toBe(
        'Your Google Calendar isn\'t connected yet. Say "connect my calendar" and I\'ll give you a link to set it up.'
      );
      expect(networkCallCount()).toBe(0);
    });

    it('asks to reconnect when the grant cannot be renewed', async () => {
      await t.connect('u1', 'calendar', { expiry: Date.now() - 1000, refreshToken: null });

      expect(await call('create_calendar_event', { summary: 'X', start_time_iso: '2025-11-20T09:00:00' })).toBe(
        'Your Google Calendar access has expired. Please reconnect Google Calendar and then ask me again.'
      );
      expect(mockEventsInsert).not.toHaveBeenCalled();
    });
  });

  describe('list_calendar_events', () => {
    it('reads upcoming events in the user timezone', async () => {
      await t.connect('u1', 'calendar');
      setMockEvents([
        {
          id: 'e1',
          summary: 'Standup',
          start: { dateTime: '2025-11-20T14:00:00Z' },
          end: { dateTime: '2025-11-20T14:30:00Z' },
        },
        { id: 'e2', summary: 'Holiday', start: { date: '2025-11-27' }, end: { date: '2025-11-28' } },
      ]);

      expect(await call('list_calendar_events', {}, 'America/New_York')).toBe(
        'You have 2 events in the next 7 days. ' +
          'Standup on Thursday, November 20 at 9:00 AM. Holiday on Thursday, November 27, all day.'
      );
    });

    it('says when the calendar is clear', async () => {
      await t.connect('u1', 'calendar');
      expect(await call('list_calendar_events', { days: 1 })).toBe('You have no events in the next day.');
    });

    it('rejects a range out of bounds', async () => {
      expect(await call('list_calendar_events', { days: 90 })).toBe(
        "I couldn't check your calendar. days must be a whole number from 1 to 60."
      );
    });

    it('explains a Calendar outage', async () => {
      await t.connect('u1', 'calendar');
      setCalendarError(new Error('Calendar unavailable'));

      expect(await call('list_calendar_events', {})).toBe(
        "I couldn't check your calendar because Google Calendar didn't respond properly. Please try again in a moment."
      );
    });
  });

  describe('connect_calendar', () => {
    it('returns an authorization link', async () => {
      expect(await call('connect_calendar', {})).toBe(
        'To connect Google Calendar, open this link and approve access: http://localhost:3000/calendar/auth?user_id=u1'
      );
    });
  });
});
