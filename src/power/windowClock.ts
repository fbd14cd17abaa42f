import ms from "ms";
import type { Instant, WindowBounds } from "./types";

export const WINDOW_MS = ms("15m");

export const WINDOW_SECONDS = WINDOW_MS / 1000;

/**
 * Returns the quarter-hour window that contains `t`.
 *
 * Windows start on minutes 0, 15, 30 and 45 of the hour as seen in a fixed
 * reference offset (minutes east of UTC). Every offset in use today is a
 * multiple of 15 minutes, which makes the windows identical for all of them;
 * the knob only matters for offsets that are not.
 *
 * @param t - Instant to look up
 * @param offsetMinutes - Reference offset from UTC (default 0)
 */
export function windowBounds(t: Instant, offsetMinutes = 0): WindowBounds {
  const offsetMs = offsetMinutes * ms("1m");
  const start =
    Math.floor((t + offsetMs) / WINDOW_MS) * WINDOW_MS - offsetMs;

  return { start, end: start + WINDOW_MS };
}

export function sameWindow(
  a: Instant,
  b: Instant,
  offsetMinutes = 0
): boolean {
  return (
    windowBounds(a, offsetMinutes).start === windowBounds(b, offsetMinutes).start
  );
}
