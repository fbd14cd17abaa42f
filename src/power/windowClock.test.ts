import { describe, expect, it } from "vitest";
import { sameWindow, windowBounds, WINDOW_MS } from "./windowClock";

const at = (iso: string) => Date.parse(iso);

describe("windowBounds", () => {
  const tests: [string, string, string][] = [
    // exactly on a boundary
    ["2026-10-18T10:00:00.000Z", "2026-10-18T10:00:00.000Z", "2026-10-18T10:15:00.000Z"],
    // just before the next boundary
    ["2026-10-18T10:14:59.999Z", "2026-10-18T10:00:00.000Z", "2026-10-18T10:15:00.000Z"],
    // every quarter
    ["2026-10-18T10:15:00.000Z", "2026-10-18T10:15:00.000Z", "2026-10-18T10:30:00.000Z"],
    ["2026-10-18T10:37:12.000Z", "2026-10-18T10:30:00.000Z", "2026-10-18T10:45:00.000Z"],
    // last window of the day ends at midnight
    ["2026-10-18T23:59:59.000Z", "2026-10-18T23:45:00.000Z", "2026-10-19T00:00:00.000Z"],
  ];

  it.each(tests)("%s falls in %s to %s", (t, start, end) => {
    expect(windowBounds(at(t))).toEqual({ start: at(start), end: at(end) });
  });

  it("always spans fifteen minutes", () => {
    const { start, end } = windowBounds(at("2026-01-01T08:07:00.000Z"));

    expect(end - start).toBe(WINDOW_MS);
    expect(WINDOW_MS).toBe(900_000);
  });

  it("gives the same windows for any offset that is a multiple of 15 minutes", () => {
    const t = at("2026-10-18T10:37:12.000Z");

    expect(windowBounds(t, 120)).toEqual(windowBounds(t));
    expect(windowBounds(t, -330)).toEqual(windowBounds(t));
    expect(windowBounds(t, 345)).toEqual(windowBounds(t));
  });

  it("aligns to the quarter-hours of an offset that is not", () => {
    // At +00:10, 10:37:12 UTC reads 10:47:12, inside 10:45 to 11:00 local.
    expect(windowBounds(at("2026-10-18T10:37:12.000Z"), 10)).toEqual({
      start: at("2026-10-18T10:35:00.000Z"),
      end: at("2026-10-18T10:50:00.000Z"),
    });
  });

  it("keeps windows of fifteen minutes across a DST transition", () => {
    // Europe/Amsterdam moves from +01:00 to +02:00 at 01:00 UTC on 2026-03-29.
    // Local 01:45-02:00 (+01:00) is followed directly by 03:00-03:15 (+02:00).
    const beforeJump = windowBounds(at("2026-03-29T00:50:00.000Z"), 60);
    const afterJump = windowBounds(at("2026-03-29T01:05:00.000Z"), 120);

    expect(beforeJump).toEqual({
      start: at("2026-03-29T00:45:00.000Z"),
      end: at("2026-03-29T01:00:00.000Z"),
    });
    expect(afterJump).toEqual({
      start: at("2026-03-29T01:00:00.000Z"),
      end: at("2026-03-29T01:15:00.000Z"),
    });
    expect(afterJump.start).toBe(beforeJump.end);
  });

  it("handles instants before the epoch", () => {
    expect(windowBounds(-1)).toEqual({ start: -WINDOW_MS, end: 0 });
  });
});

describe("sameWindow", () => {
  it("is true inside one window", () => {
    expect(
      sameWindow(at("2026-10-18T10:00:00.000Z"), at("2026-10-18T10:14:59.999Z"))
    ).toBe(true);
  });

  it("is false across a boundary, to the millisecond", () => {
    expect(
      sameWindow(at("2026-10-18T10:14:59.999Z"), at("2026-10-18T10:15:00.000Z"))
    ).toBe(false);
  });

  it("is false for the same minute an hour apart", () => {
    expect(
      sameWindow(at("2026-10-18T10:05:00.000Z"), at("2026-10-18T11:05:00.000Z"))
    ).toBe(false);
  });

  it("uses the offset it is given", () => {
    const a = at("2026-10-18T10:33:00.000Z");
    const b = at("2026-10-18T10:36:00.000Z");

    expect(sameWindow(a, b)).toBe(true);
    expect(sameWindow(a, b, 10)).toBe(false);
  });
});
