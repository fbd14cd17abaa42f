import ms from "ms";
import type { SensorState } from "../types";
import type {
  CompletedWindow,
  CurrentWindow,
  EstimationResult,
  Instant,
} from "./types";

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * Formats an instant as ISO-8601 with the given offset, to the second.
 *
 * formatInstant(Date.UTC(2026, 2, 29, 1, 15), 120) -> "2026-03-29T03:15:00+02:00"
 */
export function formatInstant(t: Instant, offsetMinutes = 0): string {
  const local = new Date(t + offsetMinutes * ms("1m"))
    .toISOString()
    .slice(0, 19);
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);

  return `${local}${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

export function currentWindowState(
  current: CurrentWindow,
  offsetMinutes = 0
): SensorState {
  const base = {
    window_start: formatInstant(current.windowStart, offsetMinutes),
    measurement_count: current.measurementCount,
  };

  if (current.measurementCount === 0 || current.lastMeasurementTime === null) {
    return {
      state: 0,
      attributes: { ...base, window_duration_seconds: 0 },
    };
  }

  return {
    state: round(current.totalAverage, 2),
    attributes: {
      ...base,
      window_duration_seconds: round(current.elapsedSeconds, 1),
      l1_average_power: round(current.phaseAverages.l1, 2),
      l2_average_power: round(current.phaseAverages.l2, 2),
      l3_average_power: round(current.phaseAverages.l3, 2),
      last_measurement: formatInstant(
        current.lastMeasurementTime,
        offsetMinutes
      ),
    },
  };
}

export function completedWindowState(
  completed: CompletedWindow,
  offsetMinutes = 0
): SensorState {
  return {
    state: round(completed.totalAverage, 2),
    attributes: {
      window_start: formatInstant(completed.windowStart, offsetMinutes),
      window_end: formatInstant(completed.windowEnd, offsetMinutes),
      measurement_count: completed.measurementCount,
      l1_average_power: round(completed.phaseAverages.l1, 2),
      l2_average_power: round(completed.phaseAverages.l2, 2),
      l3_average_power: round(completed.phaseAverages.l3, 2),
    },
  };
}

export function estimationState(
  estimation: EstimationResult,
  offsetMinutes = 0
): SensorState {
  return {
    state: round(estimation.estimatedFinalAverage, 2),
    attributes: {
      power_target: estimation.powerTarget,
      current_average_power: round(estimation.currentAverage, 2),
      elapsed_seconds: round(estimation.elapsedSeconds, 1),
      remaining_seconds: round(estimation.remainingSeconds, 1),
      target_power_for_remainder: round(estimation.targetForRemainder, 2),
      window_start: formatInstant(estimation.windowStart, offsetMinutes),
    },
  };
}
