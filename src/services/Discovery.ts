import type Config from "./Config";
import { Observable } from "rxjs";
import { map, switchMap } from "rxjs/operators";
import type HassStatus from "./HassStatus";
import DEBUG from "debug";

const debug = DEBUG("power-average.discovery");

export type DiscoveryDevice = {
  name: string;
  model: string;
  manufacturer: string;
  identifiers: string[];
};

export type DiscoveryPayload = {
  unique_id: string;
  name: string;
  state_topic: string;
  object_id: string;
  device: DiscoveryDevice;
};

export type DiscoveryState = {
  topics: {
    root: string;
    config: string;
  };
  payload: DiscoveryPayload;
};

export type DiscoveryOptions = {
  name?: string;
  /**
   * Groups the entity under a device. One device per meter.
   */
  device?: { id: string; name: string };
};

/**
 * Discovery helps us build discovery services.
 * The problem with home assistant discovery is that it will not see your discovery entities after a restart of home assistant.
 * Unless the entities re-announce themselves.
 */
export default class Discovery {
  private config: Pick<Config, "root$">;
  private hassStatus: Pick<HassStatus, "online$">;

  constructor(dependencies: {
    config: Pick<Config, "root$">;
    hassStatus: Pick<HassStatus, "online$">;
  }) {
    this.config = dependencies.config;
    this.hassStatus = dependencies.hassStatus;
  }

  create$(
    id: string,
    categoryName: string,
    options?: DiscoveryOptions
  ): Observable<DiscoveryState> {
    const prefix$ = this.config.root$().pipe(
      map((config) => {
        const uniqueId = [config.idPrefix, categoryName, id]
          .filter((v) => v)
          .join("-");

        const objectId = `${config.objectId}_${id}`;
        const root = `${config.mqttDiscoveryPrefix}/${categoryName}/${uniqueId}`;
        const deviceId = options?.device
          ? `${config.objectId}_${options.device.id}`
          : config.objectId;

        debug(
          `Creating discovery for ${categoryName}/${id} with object_id: ${objectId}`
        );

        return {
          topics: {
            root,
            config: `${root}/config`,
          },
          payload: {
            object_id: objectId,
            unique_id: uniqueId,
            state_topic: `${root}/state`,
            name: options?.name ?? id,
            device: {
              name: options?.device?.name ?? "Power Average",
              model: "Power Average",
              manufacturer: "Custom",
              identifiers: [deviceId],
            },
          },
        };
      })
    );

    return this.hassStatus.online$.pipe(switchMap(() => prefix$));
  }
}
