/**
 * Schedule Matcher
 *
 * Fills in time-of-day for all-day entries in the personal feed by looking
 * them up in the reference timetable: same calendar date, overlapping core
 * title. The first timetable entry that qualifies wins, in feed order.
 */

import type { DateTime } from "luxon";
import { startDateKey, type CalendarEvent } from "./calendar-event.js";
import { comparisonTitle, titlesOverlap, DEFAULT_TITLE_RULES, type TitleRules } from "./title-matching.js";

export interface ResolvedTimes {
  start: DateTime;
  end: DateTime;
}

/**
 * Find the timetable slot for a date-only personal event.
 * Returns null when the event is not date-only or nothing matches.
 */
export function resolveTimes(
  personalEvent: CalendarEvent,
  referenceEvents: readonly CalendarEvent[],
  rules: TitleRules = DEFAULT_TITLE_RULES
): ResolvedTimes | null {
  const personalStart = personalEvent.start;
  if (!personalStart || personalStart.kind !== "date") {
    return null;
  }

  const personalDate = personalStart.date;
  const personalTitle = comparisonTitle(personalEvent.summary ?? "", rules);

  for (const reference of referenceEvents) {
    const start = reference.start;
    // All-day timetable entries carry no time to borrow
    if (!start || start.kind !== "date-time") continue;
    if (startDateKey(start) !== personalDate) continue;

    const referenceTitle = comparisonTitle(reference.summary ?? "", rules);
    if (titlesOverlap(personalTitle, referenceTitle)) {
      return {
        start: start.value,
        end: reference.end ?? start.value.plus({ hours: 1 }),
      };
    }
  }

  return null;
}
