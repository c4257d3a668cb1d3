/**
 * iCalendar Feed Module
 *
 * Fetches a published .ics feed and turns each VEVENT component into one
 * CalendarEvent. Recurrence rules are not expanded: a recurring entry is one
 * event at its own DTSTART, and a RECURRENCE-ID override is another.
 */

import ICAL from "ical.js";
import { DateTime, IANAZone } from "luxon";
import type { CalendarEvent, EventStart } from "./calendar-event.js";
import { FetchError, describeError, type FeedName } from "./sync-errors.js";

export interface FeedOptions {
  /** Zone for floating times and TZIDs luxon doesn't know */
  defaultZone: string;
}

/**
 * Pick the zone a parsed time should be read in
 */
function resolveZone(time: ICAL.Time, defaultZone: string): string {
  const tzid = time.timezone ?? time.zone?.tzid;
  if (!tzid || tzid === "floating") {
    return defaultZone;
  }
  if (tzid === "Z" || tzid === "UTC") {
    return "utc";
  }
  return IANAZone.isValidZone(tzid) ? tzid : defaultZone;
}

function toDateTime(time: ICAL.Time, defaultZone: string): DateTime {
  return DateTime.fromObject(
    {
      year: time.year,
      month: time.month,
      day: time.day,
      hour: time.hour,
      minute: time.minute,
      second: time.second,
    },
    { zone: resolveZone(time, defaultZone) }
  );
}

function toEventStart(time: ICAL.Time, defaultZone: string): EventStart {
  if (time.isDate) {
    const date = [
      String(time.year).padStart(4, "0"),
      String(time.month).padStart(2, "0"),
      String(time.day).padStart(2, "0"),
    ].join("-");
    return { kind: "date", date };
  }
  return { kind: "date-time", value: toDateTime(time, defaultZone) };
}

/**
 * Convert one VEVENT to a CalendarEvent. A VEVENT without DTSTART comes
 * back without a start.
 */
function toCalendarEvent(vevent: ICAL.Component, defaultZone: string): CalendarEvent {
  const event = new ICAL.Event(vevent);
  const startDate = event.startDate;

  // ical.js invents an end when DTEND is absent; keep "unspecified" instead
  let end: DateTime | undefined;
  if (startDate && (vevent.hasProperty("dtend") || vevent.hasProperty("duration"))) {
    const endDate = event.endDate;
    end = endDate.isDate ? undefined : toDateTime(endDate, defaultZone);
  }

  return {
    summary: event.summary ?? undefined,
    start: startDate ? toEventStart(startDate, defaultZone) : undefined,
    end,
    location: event.location ?? undefined,
    description: event.description ?? undefined,
  };
}

function rootComponents(jCal: unknown[]): ICAL.Component[] {
  if (typeof jCal[0] === "string") {
    return [new ICAL.Component(jCal)];
  }
  // Several top-level components parse to a list of them
  return jCal
    .filter((entry): entry is unknown[] => Array.isArray(entry))
    .map((entry) => new ICAL.Component(entry));
}

/**
 * Parse iCalendar text into events, one per VEVENT, in file order
 */
export function parseCalendarFeed(ics: string, options: FeedOptions): CalendarEvent[] {
  const events: CalendarEvent[] = [];
  for (const root of rootComponents(ICAL.parse(ics))) {
    for (const vevent of root.getAllSubcomponents("vevent")) {
      events.push(toCalendarEvent(vevent, options.defaultZone));
    }
  }
  return events;
}

/**
 * Download and parse a feed. Any failure is reported as a FetchError.
 */
export async function fetchCalendarFeed(
  feed: FeedName,
  url: string,
  options: FeedOptions
): Promise<CalendarEvent[]> {
  const httpUrl = url.replace(/^webcal:\/\//i, "https://");

  let body: string;
  try {
    const response = await fetch(httpUrl);
    if (!response.ok) {
      throw new FetchError(feed, `HTTP ${response.status} ${response.statusText}`);
    }
    body = await response.text();
  } catch (error) {
    if (error instanceof FetchError) throw error;
    throw new FetchError(feed, describeError(error), { cause: error });
  }

  try {
    return parseCalendarFeed(body, options);
  } catch (error) {
    throw new FetchError(feed, `Malformed calendar data: ${describeError(error)}`, {
      cause: error,
    });
  }
}
