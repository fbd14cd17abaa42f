import { combineLatest, interval, merge, Observable } from "rxjs";
import {
  distinctUntilChanged,
  filter,
  map,
  share,
  shareReplay,
  switchMap,
  take,
  tap,
  timestamp,
} from "rxjs/operators";
import {
  accumulateWindows,
  type WindowUpdate,
} from "../helpers/operators/accumulateWindows";
import type { MeterConfig } from "../services/Config";
import type Sensor from "../services/Sensor";
import type States from "../services/States";
import type { SensorState } from "../types";
import {
  completedWindowState,
  currentWindowState,
  estimationState,
  formatInstant,
} from "./attributes";
import { type PhaseReadings, toSample } from "./readings";
import type {
  CompletedWindow,
  DebugFn,
  InvalidSample,
  PhaseValues,
  Sample,
} from "./types";

export type MeterServices = {
  states: Pick<States, "entity$">;
  sensor: Pick<Sensor, "create$">;
};

export type MeterOptions = {
  /**
   * Milliseconds between samples when none of the sources change.
   */
  pollInterval: number;
  windowOffsetMinutes: number;
  debug: DebugFn;
};

function phaseStates$(
  states: MeterServices["states"],
  entities: PhaseValues<string>
): Observable<PhaseValues<string>> {
  const state$ = (entityId: string) =>
    states.entity$(entityId).pipe(
      map((entity) => entity.state),
      distinctUntilChanged()
    );

  return combineLatest({
    l1: state$(entities.l1),
    l2: state$(entities.l2),
    l3: state$(entities.l3),
  });
}

/**
 * Takes a sample whenever one of the readings changes and, in between, every
 * `pollInterval` milliseconds from the latest readings.
 */
export function sampleReadings$(
  readings$: Observable<PhaseReadings>,
  pollInterval: number
): Observable<Sample | InvalidSample> {
  const latest$ = readings$.pipe(
    shareReplay({ bufferSize: 1, refCount: true })
  );
  const poll$ = interval(pollInterval).pipe(
    switchMap(() => latest$.pipe(take(1)))
  );

  return merge(latest$, poll$).pipe(
    timestamp(),
    map(({ value, timestamp }) => toSample(value, timestamp))
  );
}

function logUpdate(
  update: WindowUpdate,
  debug: DebugFn,
  offsetMinutes: number
) {
  const { outcome } = update;
  if (outcome.kind === "invalid") {
    debug("skipping sample: %s", outcome.reason);
    return;
  }

  debug(
    "measurement taken: L1=%dW, L2=%dW, L3=%dW, Total=%dW",
    outcome.phasePower.l1,
    outcome.phasePower.l2,
    outcome.phasePower.l3,
    outcome.totalPower
  );

  if (outcome.clampedPhases.length > 0) {
    debug(
      "negative current on %s counted as 0 (export)",
      outcome.clampedPhases.join(", ")
    );
  }

  if (outcome.rollover) {
    debug(
      "window %s closed at %dW over %d measurements",
      formatInstant(outcome.rollover.windowStart, offsetMinutes),
      outcome.rollover.totalAverage,
      outcome.rollover.measurementCount
    );
  }
}

/**
 * Sensor id suffix for a power target, e.g. `3000w` or `minus_1500w`.
 */
export function targetSuffix(target: number): string {
  return `${target < 0 ? "minus_" : ""}${Math.abs(target)}w`;
}

/**
 * Follows the six source entities of a meter and publishes its running
 * average, its last completed window and one estimation per power target.
 */
export function createMeter$(
  services: MeterServices,
  meter: MeterConfig,
  options: MeterOptions
): Observable<SensorState> {
  const { pollInterval, windowOffsetMinutes, debug } = options;
  const { sensor, states } = services;

  const readings$: Observable<PhaseReadings> = combineLatest({
    current: phaseStates$(states, meter.current),
    voltage: phaseStates$(states, meter.voltage),
  });

  const updates$ = sampleReadings$(readings$, pollInterval).pipe(
    accumulateWindows({
      windowOffsetMinutes,
      powerTargets: meter.powerTargets,
    }),
    tap((update) => logUpdate(update, debug, windowOffsetMinutes)),
    share()
  );

  const device = { id: meter.id, name: meter.name };

  const current$ = sensor.create$(
    updates$.pipe(
      map((update) => currentWindowState(update.current, windowOffsetMinutes))
    ),
    `${meter.id}_power_average`,
    { name: meter.name, device }
  );

  const completed$ = sensor.create$(
    updates$.pipe(
      map((update) => update.completed),
      filter((completed): completed is CompletedWindow => completed !== null),
      distinctUntilChanged(),
      map((completed) => completedWindowState(completed, windowOffsetMinutes))
    ),
    `${meter.id}_completed_window`,
    { name: `${meter.name} Completed Window`, device }
  );

  const estimated$ = meter.powerTargets.map((target, index) => {
    return sensor.create$(
      updates$.pipe(
        map((update) =>
          estimationState(update.estimates[index], windowOffsetMinutes)
        )
      ),
      `${meter.id}_estimated_${targetSuffix(target)}`,
      {
        name: `${meter.name} Estimated ${target > 0 ? "+" : ""}${target}W`,
        device,
      }
    );
  });

  return merge(current$, completed$, ...estimated$);
}
