/**
 * @fileoverview Time parsing and spoken formatting for calendar tools.
 *
 * Uses Luxon for timezone handling. Only ISO 8601 input is accepted; the
 * model is instructed to resolve natural language before calling tools.
 */

import { DateTime } from 'luxon';
import { ParseError } from '../../utils/errors.js';

/** Trailing `Z` or `±HH:MM` / `±HHMM` / `±HH` offset on the time part. */
const OFFSET_SUFFIX = /(?:[zZ]|[+-]\d{2}(?::?\d{2})?)$/;

/** `2025-11-20 09:00` style input, date and time split by spaces. */
const SPACE_SEPARATOR = /^(\d{4}-\d{2}-\d{2}) +(?=\d)/;

/** Date-time layout sent to Calendar alongside an explicit `timeZone`. */
const LOCAL_ISO_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

export type ParsedStartTime = {
  start: DateTime;
  /** True when the input carried no offset and was read in the user's zone */
  naive: boolean;
  /** IANA zone for naive input; undefined when the input carried its own offset */
  timezone?: string;
};

export function isValidTimezone(timezone: string): boolean {
  return DateTime.now().setZone(timezone).isValid;
}

/**
 * Pick the zone to interpret naive times in: the user's declared zone when
 * it is a valid IANA name, otherwise the configured default.
 */
export function resolveTimezone(userTimezone: string | undefined, fallback: string): string {
  if (userTimezone && isValidTimezone(userTimezone)) {
    return userTimezone;
  }
  return fallback;
}

/**
 * Parse an ISO 8601 start time. A space may stand in for the `T`, and a
 * bare date means midnight in `timezone`.
 *
 * @throws ParseError when the input is not a valid ISO date or date-time
 */
export function parseStartTime(input: string, timezone: string): ParsedStartTime {
  const normalized = input.trim().replace(SPACE_SEPARATOR, '$1T');
  const timePart = normalized.split('T')[1];

  if (timePart !== undefined && OFFSET_SUFFIX.test(timePart)) {
    const start = DateTime.fromISO(normalized, { setZone: true });
    if (!start.isValid) {
      throw new ParseError(start.invalidExplanation ?? `"${input}" is not a valid time`, input);
    }
    return { start, naive: false };
  }

  const start = DateTime.fromISO(normalized, { zone: timezone });
  if (!start.isValid) {
    throw new ParseError(start.invalidExplanation ?? `"${input}" is not a valid time`, input);
  }
  return { start, naive: true, timezone };
}

/** Local wall-clock form without offset, e.g. `2025-11-20T09:30:00`. */
export function toLocalIso(value: DateTime): string {
  return value.toFormat(LOCAL_ISO_FORMAT);
}

/** Offset-bearing form, e.g. `2025-11-20T09:30:00-05:00`. */
export function toOffsetIso(value: DateTime): string {
  return value.toISO({ suppressMilliseconds: true }) ?? toLocalIso(value);
}

/** "Thursday, November 20 at 9:00 AM" */
export function formatSpokenDateTime(value: DateTime): string {
  return value.setLocale('en-US').toFormat("cccc, LLLL d 'at' h:mm a");
}

/** "Thursday, November 20" (all-day events) */
export function formatSpokenDate(value: DateTime): string {
  return value.setLocale('en-US').toFormat('cccc, LLLL d');
}
