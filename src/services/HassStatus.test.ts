import { describe, expect, it } from "vitest";
import { of, Subject } from "rxjs";
import type { IRootConfig } from "./Config";
import HassStatus from "./HassStatus";

const root: IRootConfig = {
  host: "http://hass.test:8123",
  token: "test-secret",
  idPrefix: "power_average",
  mqttDiscoveryPrefix: "homeassistant",
  mqttUrl: "mqtt://mqtt.test",
  objectId: "power_average",
  pollInterval: 10_000,
  windowOffsetMinutes: 0,
  meters: [],
};

const createHassStatus = () => {
  const status$ = new Subject<string>();
  const topics: string[] = [];
  const hassStatus = new HassStatus({
    config: { root$: () => of(root) },
    mqtt: {
      subscribe$: (topic) => {
        topics.push(topic);
        return status$;
      },
    },
  });

  return { hassStatus, status$, topics };
};

describe("HassStatus", () => {
  it("emits at start and whenever Home Assistant comes online", () => {
    const { hassStatus, status$, topics } = createHassStatus();
    let online = 0;

    hassStatus.online$.subscribe(() => online++);
    status$.next("online");
    status$.next("offline");
    status$.next("online");

    expect(topics).toEqual(["homeassistant/status"]);
    expect(online).toBe(3);
  });

  it("emits once for a subscriber that comes after the status", () => {
    const { hassStatus, status$, topics } = createHassStatus();
    hassStatus.online$.subscribe();
    status$.next("online");
    let online = 0;

    hassStatus.online$.subscribe(() => online++);

    expect(online).toBe(1);
    expect(topics).toHaveLength(1);
  });
});
