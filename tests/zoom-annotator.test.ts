import { describe, it, expect } from "vitest";
import { annotateDeliveryMode, isZoomSession } from "../lib/zoom-annotator.js";

describe("zoom-annotator", () => {
  it("prefixes the title when the location mentions Zoom", () => {
    expect(
      annotateDeliveryMode("Laboratoriemedicin vår T3", { location: "Zoom Room 4" })
    ).toBe("Zoom Laboratoriemedicin vår T3");
  });

  it("prefixes the title when the description has a Zoom meeting", () => {
    expect(
      annotateDeliveryMode("Seminar", { description: "Join ZOOM MEETING https://example.test/j/1" })
    ).toBe("Zoom Seminar");
  });

  it("ignores a description that only mentions zoom in passing", () => {
    expect(annotateDeliveryMode("Seminar", { description: "Recording on zoom later" })).toBe(
      "Seminar"
    );
  });

  it("leaves titles that already carry the marker", () => {
    expect(annotateDeliveryMode("zoom Seminar", { location: "Zoom" })).toBe("zoom Seminar");
  });

  it("leaves in-person events unchanged", () => {
    expect(annotateDeliveryMode("Seminar", { location: "Hall B", description: "Bring notes" })).toBe(
      "Seminar"
    );
    expect(annotateDeliveryMode("Seminar", {})).toBe("Seminar");
  });

  it("is idempotent", () => {
    const event = { location: "zoom.us/j/123" };
    const once = annotateDeliveryMode("Lab", event);
    expect(annotateDeliveryMode(once, event)).toBe(once);
    expect(once).toBe("Zoom Lab");
  });

  it("detects Zoom sessions", () => {
    expect(isZoomSession({ location: "ZOOM" })).toBe(true);
    expect(isZoomSession({ location: undefined, description: undefined })).toBe(false);
  });
});
