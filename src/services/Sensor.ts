import DEBUG from "debug";
import { combineLatest, concat, merge, Observable, of } from "rxjs";
import { concatMap, map, shareReplay, switchMap } from "rxjs/operators";
import type { SensorState } from "../types";
import type Discovery from "./Discovery";
import type { DiscoveryOptions } from "./Discovery";
import type Mqtt from "./Mqtt";

const debug = DEBUG("power-average.sensor");

export type SensorOptions = DiscoveryOptions;

/**
 * https://www.home-assistant.io/integrations/sensor.mqtt/
 *
 * A power sensor in watts whose state and attributes are controlled by us.
 */
export default class Sensor {
  private discovery: Pick<Discovery, "create$">;
  private mqtt: Pick<Mqtt, "publish$">;

  constructor(services: {
    discovery: Pick<Discovery, "create$">;
    mqtt: Pick<Mqtt, "publish$">;
  }) {
    this.discovery = services.discovery;
    this.mqtt = services.mqtt;
  }

  /**
   * Advertises the sensor and publishes every state of `state$`.
   *
   * The sensor is advertised again, with its last state, whenever Home
   * Assistant comes back online. Emits each state once it is published.
   */
  create$(
    state$: Observable<SensorState>,
    id: string,
    options?: SensorOptions
  ): Observable<SensorState> {
    debug("asking for a sensor with id %s and options %o", id, options);

    const config$ = this.discovery.create$(id, "sensor", options).pipe(
      map((discovery) => {
        return {
          topic: discovery.topics.config,
          payload: {
            ...discovery.payload,
            json_attributes_topic: `${discovery.topics.root}/attributes`,
            device_class: "power",
            state_class: "measurement",
            unit_of_measurement: "W",
          },
        };
      }),
      shareReplay(1)
    );

    const advertise$ = config$.pipe(
      switchMap((config) => {
        return this.mqtt.publish$(config.topic, config.payload, {
          qos: 1,
          retain: true,
        });
      })
    );

    const publish$ = combineLatest([config$, state$]).pipe(
      concatMap(([config, state]) => {
        return concat(
          this.mqtt.publish$(
            config.payload.json_attributes_topic,
            state.attributes
          ),
          this.mqtt.publish$(config.payload.state_topic, String(state.state)),
          of(state)
        );
      })
    );

    return merge(advertise$, publish$);
  }
}
