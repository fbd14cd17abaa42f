/**
 * Milliseconds since the unix epoch.
 */
export type Instant = number;

/**
 * Power in watts.
 */
export type Power = number;

export type Phase = "l1" | "l2" | "l3";

export const PHASES: readonly Phase[] = ["l1", "l2", "l3"];

export type PhaseValues<T = number> = Record<Phase, T>;

/**
 * One reading of all three phases, taken at the same moment.
 *
 * Current is signed (negative means export to the grid), voltage is not.
 */
export interface Sample {
  timestamp: Instant;
  current: PhaseValues;
  voltage: PhaseValues;
}

/**
 * A tick for which no usable sample could be taken.
 * Nothing is accumulated for it.
 */
export interface InvalidSample {
  kind: "invalid";
  timestamp: Instant;
  reason: string;
}

export interface WindowBounds {
  start: Instant;
  end: Instant;
}

/**
 * Read-only view on the window that is still accumulating.
 */
export interface CurrentWindow {
  windowStart: Instant;
  windowEnd: Instant;
  measurementCount: number;
  /**
   * Running mean per phase. 0 while there are no measurements.
   */
  phaseAverages: PhaseValues<Power>;
  /**
   * Running mean of the total power. 0 while there are no measurements.
   */
  totalAverage: Power;
  elapsedSeconds: number;
  lastMeasurementTime: Instant | null;
}

/**
 * Frozen averages of a window that has been closed by a rollover.
 */
export interface CompletedWindow {
  readonly windowStart: Instant;
  readonly windowEnd: Instant;
  readonly measurementCount: number;
  readonly phaseAverages: Readonly<PhaseValues<Power>>;
  readonly totalAverage: Power;
}

export type IngestOutcome =
  | {
      kind: "accepted";
      phasePower: PhaseValues<Power>;
      totalPower: Power;
      /**
       * Phases whose negative current was clamped to 0.
       */
      clampedPhases: Phase[];
      /**
       * The window this sample closed, if it crossed a boundary.
       */
      rollover: CompletedWindow | null;
    }
  | {
      kind: "invalid";
      reason: string;
    };

/**
 * Projection of a window's final average if `powerTarget` extra watts were
 * drawn for the rest of it. A projection, not a guarantee.
 */
export interface EstimationResult {
  powerTarget: Power;
  windowStart: Instant;
  currentAverage: Power;
  elapsedSeconds: number;
  remainingSeconds: number;
  targetForRemainder: Power;
  estimatedFinalAverage: Power;
}

/**
 * Debug function signature (from debug package)
 */
export type DebugFn = {
  (formatter: unknown, ...args: unknown[]): void;
  extend: (namespace: string) => DebugFn;
};
