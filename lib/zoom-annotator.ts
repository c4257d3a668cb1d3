/**
 * Delivery-mode marker for remote sessions.
 */

import type { CalendarEvent } from "./calendar-event.js";

export const ZOOM_PREFIX = "Zoom ";

/**
 * Whether the event's location or description points at a Zoom session
 */
export function isZoomSession(event: Pick<CalendarEvent, "location" | "description">): boolean {
  const location = (event.location ?? "").toLowerCase();
  const description = (event.description ?? "").toLowerCase();
  return location.includes("zoom") || description.includes("zoom meeting");
}

/**
 * Prefix "Zoom " to the title of a remote session, unless it is already there.
 */
export function annotateDeliveryMode(
  title: string,
  event: Pick<CalendarEvent, "location" | "description">
): string {
  if (!isZoomSession(event)) {
    return title;
  }
  if (title.toLowerCase().startsWith(ZOOM_PREFIX.toLowerCase())) {
    return title;
  }
  return ZOOM_PREFIX + title;
}
