import { describe, it, expect } from "vitest";
import { DateTime } from "luxon";
import { resolveTimes } from "../lib/schedule-matcher.js";
import { formatInstant, type CalendarEvent } from "../lib/calendar-event.js";

const ZONE = "Europe/Stockholm";

function at(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: ZONE });
}

function timed(summary: string, start: string, end?: string): CalendarEvent {
  return {
    summary,
    start: { kind: "date-time", value: at(start) },
    end: end ? at(end) : undefined,
  };
}

const personal: CalendarEvent = {
  summary: "Program: X Laboratoriemedicin vår T3 [BMA401 VT25] sign: abc",
  start: { kind: "date", date: "2025-03-10" },
};

describe("resolveTimes", () => {
  it("takes start and end from the timetable entry on the same date", () => {
    const reference = [
      timed("Laboratoriemedicin vår T3", "2025-03-10T09:00:00", "2025-03-10T11:00:00"),
    ];

    const result = resolveTimes(personal, reference);

    expect(result).not.toBeNull();
    expect(result && formatInstant(result.start)).toBe("2025-03-10T09:00:00+01:00");
    expect(result && formatInstant(result.end)).toBe("2025-03-10T11:00:00+01:00");
  });

  it("returns null when the only match is on another date", () => {
    const reference = [
      timed("Laboratoriemedicin vår T3", "2025-03-11T09:00:00", "2025-03-11T11:00:00"),
    ];
    expect(resolveTimes(personal, reference)).toBeNull();
  });

  it("compares dates in the timetable entry's own zone", () => {
    const lateUtc = DateTime.fromISO("2025-03-09T23:30:00Z", { setZone: true });
    const reference: CalendarEvent[] = [
      { summary: "Laboratoriemedicin vår T3", start: { kind: "date-time", value: lateUtc } },
    ];
    expect(resolveTimes(personal, reference)).toBeNull();
  });

  it("skips all-day timetable entries", () => {
    const reference: CalendarEvent[] = [
      { summary: "Laboratoriemedicin vår T3", start: { kind: "date", date: "2025-03-10" } },
    ];
    expect(resolveTimes(personal, reference)).toBeNull();
  });

  it("skips timetable entries without a start", () => {
    const reference: CalendarEvent[] = [{ summary: "Laboratoriemedicin vår T3" }];
    expect(resolveTimes(personal, reference)).toBeNull();
  });

  it("returns the first match in feed order", () => {
    const reference = [
      timed("Lunch", "2025-03-10T12:00:00", "2025-03-10T13:00:00"),
      timed("Laboratoriemedicin vår T3", "2025-03-10T13:00:00", "2025-03-10T15:00:00"),
      timed("Laboratoriemedicin vår T3 [BMA401 VT25]", "2025-03-10T08:00:00", "2025-03-10T09:00:00"),
    ];

    const result = resolveTimes(personal, reference);

    expect(result && formatInstant(result.start)).toBe("2025-03-10T13:00:00+01:00");
  });

  it("defaults a missing timetable end to one hour after start", () => {
    const reference = [timed("Laboratoriemedicin vår T3", "2025-03-10T10:00:00")];

    const result = resolveTimes(personal, reference);

    expect(result && formatInstant(result.end)).toBe("2025-03-10T11:00:00+01:00");
  });

  it("matches titles without the anchor case- and whitespace-insensitively", () => {
    const seminar: CalendarEvent = {
      summary: "Seminar in Biochemistry",
      start: { kind: "date", date: "2025-04-02" },
    };
    const reference = [
      timed("SEMINAR in  biochemistry - room 3", "2025-04-02T15:00:00", "2025-04-02T16:00:00"),
    ];

    const result = resolveTimes(seminar, reference);

    expect(result && formatInstant(result.start)).toBe("2025-04-02T15:00:00+02:00");
  });

  it("returns null for events that already have a time", () => {
    const reference = [
      timed("Laboratoriemedicin vår T3", "2025-03-10T09:00:00", "2025-03-10T11:00:00"),
    ];
    expect(resolveTimes(timed(personal.summary ?? "", "2025-03-10T08:00:00"), reference)).toBeNull();
  });
});
