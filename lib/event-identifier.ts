import { formatStart, type CalendarEvent } from "./calendar-event.js";

/**
 * Dedup key for a personal-feed event.
 *
 * Built from the summary and the start exactly as the feed gave it, never the
 * resolved time, so an all-day entry keeps its key even when the timetable
 * lookup lands on a different slot between runs.
 */
export function identifyEvent(event: Pick<CalendarEvent, "summary" | "start">): string {
  return `${event.summary ?? ""}-${formatStart(event.start)}`;
}
