import { sameWindow, windowBounds } from "./windowClock";
import {
  type CompletedWindow,
  type CurrentWindow,
  type IngestOutcome,
  type Instant,
  type Phase,
  PHASES,
  type PhaseValues,
  type Power,
  type Sample,
} from "./types";

type WindowState = {
  windowStart: Instant;
  sums: PhaseValues<Power>;
  totalSum: Power;
  measurementCount: number;
  lastMeasurementTime: Instant | null;
};

export type WindowAccumulatorOptions = {
  /**
   * Reference offset from UTC the quarter-hours are aligned to.
   */
  offsetMinutes?: number;
};

const zeroes = (): PhaseValues<Power> => ({ l1: 0, l2: 0, l3: 0 });

function openWindow(t: Instant, offsetMinutes: number): WindowState {
  return {
    windowStart: windowBounds(t, offsetMinutes).start,
    sums: zeroes(),
    totalSum: 0,
    measurementCount: 0,
    lastMeasurementTime: null,
  };
}

function averages(state: WindowState): {
  phaseAverages: PhaseValues<Power>;
  totalAverage: Power;
} {
  const count = state.measurementCount;
  if (count === 0) {
    return { phaseAverages: zeroes(), totalAverage: 0 };
  }

  return {
    phaseAverages: {
      l1: state.sums.l1 / count,
      l2: state.sums.l2 / count,
      l3: state.sums.l3 / count,
    },
    totalAverage: state.totalSum / count,
  };
}

function findInvalidReading(sample: Sample): string | null {
  if (!Number.isFinite(sample.timestamp)) {
    return "timestamp is not a finite number";
  }

  for (const phase of PHASES) {
    if (!Number.isFinite(sample.current[phase])) {
      return `current ${phase} is not a finite number`;
    }
    if (!Number.isFinite(sample.voltage[phase])) {
      return `voltage ${phase} is not a finite number`;
    }
  }

  return null;
}

/**
 * Averages three-phase power over quarter-hour windows.
 *
 * Holds one open window and the last window that was closed. A window is
 * closed only when a sample arrives that belongs to a later window, so
 * windows in which no sample arrived are skipped without a snapshot.
 *
 * The running average is the plain mean of the samples, not weighted by the
 * time between them.
 */
export class WindowAccumulator {
  private readonly offsetMinutes: number;
  private state: WindowState | null = null;
  private completed: CompletedWindow | null = null;

  constructor(options: WindowAccumulatorOptions = {}) {
    this.offsetMinutes = options.offsetMinutes ?? 0;
  }

  ingest(sample: Sample): IngestOutcome {
    const invalid = findInvalidReading(sample);
    if (invalid) {
      return { kind: "invalid", reason: invalid };
    }
    // Windows only move forward, also when the clock steps back.
    if (this.state && sample.timestamp < this.state.windowStart) {
      return { kind: "invalid", reason: "timestamp before the open window" };
    }

    const clampedPhases: Phase[] = [];
    const phasePower = zeroes();
    for (const phase of PHASES) {
      let current = sample.current[phase];
      if (current < 0) {
        clampedPhases.push(phase);
        current = 0;
      }
      phasePower[phase] = current * sample.voltage[phase];
    }
    const totalPower = phasePower.l1 + phasePower.l2 + phasePower.l3;

    let rollover: CompletedWindow | null = null;
    let state = this.state;
    if (!state) {
      state = openWindow(sample.timestamp, this.offsetMinutes);
    } else if (
      !sameWindow(sample.timestamp, state.windowStart, this.offsetMinutes)
    ) {
      rollover = this.freeze(state);
      state = openWindow(sample.timestamp, this.offsetMinutes);
    }

    // Build the next state before swapping it in.
    this.state = {
      windowStart: state.windowStart,
      sums: {
        l1: state.sums.l1 + phasePower.l1,
        l2: state.sums.l2 + phasePower.l2,
        l3: state.sums.l3 + phasePower.l3,
      },
      totalSum: state.totalSum + totalPower,
      measurementCount: state.measurementCount + 1,
      lastMeasurementTime: sample.timestamp,
    };
    if (rollover) {
      this.completed = rollover;
    }

    return { kind: "accepted", phasePower, totalPower, clampedPhases, rollover };
  }

  currentWindow(now: Instant): CurrentWindow {
    const state = this.state ?? openWindow(now, this.offsetMinutes);
    const { phaseAverages, totalAverage } = averages(state);

    return {
      windowStart: state.windowStart,
      windowEnd: windowBounds(state.windowStart, this.offsetMinutes).end,
      measurementCount: state.measurementCount,
      phaseAverages,
      totalAverage,
      elapsedSeconds: Math.max(0, (now - state.windowStart) / 1000),
      lastMeasurementTime: state.lastMeasurementTime,
    };
  }

  completedWindow(): CompletedWindow | null {
    return this.completed;
  }

  private freeze(state: WindowState): CompletedWindow {
    const { phaseAverages, totalAverage } = averages(state);

    return Object.freeze({
      windowStart: state.windowStart,
      windowEnd: windowBounds(state.windowStart, this.offsetMinutes).end,
      measurementCount: state.measurementCount,
      phaseAverages: Object.freeze(phaseAverages),
      totalAverage,
    });
  }
}
