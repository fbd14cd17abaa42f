import { merge, Observable } from "rxjs";
import { switchMap } from "rxjs/operators";
import DEBUG from "debug";
import servicesCradle from "../services/cradle";
import type { SensorState } from "../types";
import { createMeter$ } from "./meter";

const debug = DEBUG("power-average.meter");

/**
 * Every configured meter, each with its own accumulator.
 */
function createMeters$(): Observable<SensorState> {
  const { config, states, sensor } = servicesCradle;

  return config.root$().pipe(
    switchMap((root) => {
      if (root.meters.length === 0) {
        console.warn("no meters configured, nothing to average");
      }

      return merge(
        ...root.meters.map((meter) => {
          debug(
            `Initializing meter: ${meter.name} (${meter.id}) with targets %j`,
            meter.powerTargets
          );

          return createMeter$({ states, sensor }, meter, {
            pollInterval: root.pollInterval,
            windowOffsetMinutes: root.windowOffsetMinutes,
            debug: debug.extend(meter.id),
          });
        })
      );
    })
  );
}

export default createMeters$();
