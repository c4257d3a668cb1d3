/**
 * Calendar Event Model
 *
 * The parsed shape of a VEVENT as the sync core sees it. Feeds may carry
 * all-day entries (a bare date) or timed entries (an instant in a zone), and
 * the two are kept apart so the core can tell which events still need a
 * time-of-day resolved.
 */

import { DateTime } from "luxon";

// ============================================================================
// Types
// ============================================================================

export type EventStart =
  | { kind: "date"; date: string } // YYYY-MM-DD
  | { kind: "date-time"; value: DateTime };

export interface CalendarEvent {
  summary?: string;
  start?: EventStart;
  end?: DateTime;
  location?: string;
  description?: string;
}

/**
 * Wall-clock time of day, "HH:mm".
 */
export type ClockTime = string;

// ============================================================================
// Helpers
// ============================================================================

export function hasTimeOfDay(
  start: EventStart
): start is { kind: "date-time"; value: DateTime } {
  return start.kind === "date-time";
}

/**
 * Calendar date of a start, in the zone the feed gave it.
 */
export function startDateKey(start: EventStart): string {
  if (start.kind === "date") {
    return start.date;
  }
  return formatDateKey(start.value);
}

/**
 * Format a DateTime as YYYY-MM-DD in its own zone
 */
export function formatDateKey(value: DateTime): string {
  const key = value.toISODate();
  if (key === null) {
    throw new Error(`Invalid date-time: ${value.invalidExplanation ?? "unknown reason"}`);
  }
  return key;
}

/**
 * ISO 8601 with seconds and the offset of the value's own zone.
 */
export function formatInstant(value: DateTime): string {
  const iso = value.toISO({ suppressMilliseconds: true });
  if (iso === null) {
    throw new Error(`Invalid date-time: ${value.invalidExplanation ?? "unknown reason"}`);
  }
  return iso;
}

/**
 * Locale-independent text form of an event start.
 * Bare dates render as YYYY-MM-DD, instants as ISO 8601 with offset.
 */
export function formatStart(start: EventStart | undefined): string {
  if (!start) return "";
  return start.kind === "date" ? start.date : formatInstant(start.value);
}

/**
 * Combine a YYYY-MM-DD date with an "HH:mm" clock time in the given zone.
 */
export function atTimeOnDate(date: string, time: ClockTime, zone: string): DateTime {
  const value = DateTime.fromISO(`${date}T${time}`, { zone });
  if (!value.isValid) {
    throw new Error(
      `Cannot place ${time} on ${date} in ${zone}: ${value.invalidExplanation ?? "invalid"}`
    );
  }
  return value;
}
