import { defer, Observable, OperatorFunction } from "rxjs";
import { map } from "rxjs/operators";
import { WindowAccumulator } from "../../power/WindowAccumulator";
import { estimateAll } from "../../power/estimate";
import { isInvalidSample } from "../../power/readings";
import type {
  CompletedWindow,
  CurrentWindow,
  EstimationResult,
  IngestOutcome,
  InvalidSample,
  Instant,
  Power,
  Sample,
} from "../../power/types";

export type WindowUpdate = {
  timestamp: Instant;
  outcome: IngestOutcome;
  current: CurrentWindow;
  completed: CompletedWindow | null;
  /**
   * One estimation per power target, in the order the targets were given.
   */
  estimates: EstimationResult[];
};

export type AccumulateWindowsOptions = {
  windowOffsetMinutes?: number;
  powerTargets?: readonly Power[];
};

/**
 * RxJS operator that averages samples over quarter-hour windows.
 *
 * Every subscription gets its own accumulator. Each incoming tick, also one
 * that carries an invalid sample, emits the state of the windows as of that
 * tick so elapsed time and estimations keep moving.
 *
 * @example
 * ```typescript
 * samples$.pipe(
 *   accumulateWindows({ powerTargets: [3000, -1000] }),
 *   map((update) => update.current.totalAverage)
 * )
 * ```
 */
export function accumulateWindows(
  options: AccumulateWindowsOptions = {}
): OperatorFunction<Sample | InvalidSample, WindowUpdate> {
  const powerTargets = options.powerTargets ?? [];

  return (source$: Observable<Sample | InvalidSample>) =>
    defer(() => {
      const accumulator = new WindowAccumulator({
        offsetMinutes: options.windowOffsetMinutes,
      });

      return source$.pipe(
        map((sample): WindowUpdate => {
          const outcome: IngestOutcome = isInvalidSample(sample)
            ? { kind: "invalid", reason: sample.reason }
            : accumulator.ingest(sample);

          const current = accumulator.currentWindow(sample.timestamp);

          return {
            timestamp: sample.timestamp,
            outcome,
            current,
            completed: accumulator.completedWindow(),
            estimates: estimateAll(current, powerTargets, sample.timestamp),
          };
        })
      );
    });
}
