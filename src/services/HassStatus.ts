import DEBUG from "debug";
import { Observable } from "rxjs";
import {
  filter,
  map,
  share,
  startWith,
  switchMap,
  tap,
} from "rxjs/operators";
import type Config from "./Config";
import type Mqtt from "./Mqtt";

const debug = DEBUG("power-average.hass-status");

export default class HassStatus {
  private status$: Observable<string>;

  constructor(dependencies: {
    config: Pick<Config, "root$">;
    mqtt: Pick<Mqtt, "subscribe$">;
  }) {
    const { config, mqtt } = dependencies;

    this.status$ = config.root$().pipe(
      switchMap((root) => mqtt.subscribe$(`${root.mqttDiscoveryPrefix}/status`)),
      tap((v) => {
        debug("status %s", v);
      }),
      // Late subscribers start from startWith, not from a replayed status.
      share()
    );
  }

  /**
   * nexts whenever HASS goes online.
   */
  get online$(): Observable<boolean> {
    return this.status$.pipe(
      map((v) => v === "online"),
      filter((v) => v),
      startWith(true)
    );
  }
}
