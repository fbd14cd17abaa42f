import { WINDOW_SECONDS } from "./windowClock";
import type { CurrentWindow, EstimationResult, Instant, Power } from "./types";

/**
 * Projects what the current window's average will end up at if
 * `powerTarget` watts are added on top of the running average for the rest of
 * the window.
 *
 * The elapsed part of the window keeps the running average, the remaining part
 * is assumed to run at `average + powerTarget`. This is a linear projection
 * over the full window, not a guarantee: it does not know how many samples are
 * still to come or what they will read.
 *
 * Example: an average of 2000 W after 300 s with a 3000 W target gives
 * (2000 × 300 + 5000 × 600) / 900 = 4000 W.
 *
 * @param current - Read of the window that is still accumulating
 * @param powerTarget - Extra load in watts, negative for a reduction
 * @param now - Moment the projection is made for
 */
export function estimate(
  current: CurrentWindow,
  powerTarget: Power,
  now: Instant
): EstimationResult {
  const elapsedSeconds = Math.min(
    WINDOW_SECONDS,
    Math.max(0, (now - current.windowStart) / 1000)
  );
  const remainingSeconds = WINDOW_SECONDS - elapsedSeconds;
  const currentAverage =
    current.measurementCount > 0 ? current.totalAverage : 0;
  const targetForRemainder = currentAverage + powerTarget;

  return {
    powerTarget,
    windowStart: current.windowStart,
    currentAverage,
    elapsedSeconds,
    remainingSeconds,
    targetForRemainder,
    estimatedFinalAverage:
      (currentAverage * elapsedSeconds + targetForRemainder * remainingSeconds) /
      WINDOW_SECONDS,
  };
}

/**
 * One projection per target, all against the same read of the window.
 */
export function estimateAll(
  current: CurrentWindow,
  powerTargets: readonly Power[],
  now: Instant
): EstimationResult[] {
  return powerTargets.map((powerTarget) => estimate(current, powerTarget, now));
}
