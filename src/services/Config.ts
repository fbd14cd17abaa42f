import { from, Observable } from "rxjs";

import convict from "convict";

import yaml from "js-yaml";

import { url } from "convict-format-with-validator";
import { shareReplay } from "rxjs/operators";
import ms from "ms";
import DEBUG from "debug";
import { PHASES, type PhaseValues } from "../power/types";

const debug = DEBUG("power-average.config");

const METER_ID = /^[a-z0-9_]+$/;

export interface MeterConfig {
  /**
   * Used in unique ids and MQTT topics.
   */
  id: string;
  name: string;
  current: PhaseValues<string>;
  voltage: PhaseValues<string>;
  /**
   * Extra load in watts to project the window average for. One estimated
   * sensor per target.
   */
  powerTargets: number[];
}

export interface IRootConfig {
  host: string;
  token: string;
  idPrefix?: string;
  mqttDiscoveryPrefix: string;
  mqttUrl: string;
  objectId: string;
  /**
   * Milliseconds between samples when none of the sources change.
   */
  pollInterval: number;
  windowOffsetMinutes: number;
  meters: MeterConfig[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Every value is read as a number of whole watts. Values that are not
 * numbers are left out, and so are repeats.
 */
export function parsePowerTargets(raw: unknown): number[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new Error("powerTargets must be a list");
  }

  const entries: unknown[] = raw;
  const targets: number[] = [];
  for (const target of entries) {
    const text = typeof target === "string" ? target.trim() : "";
    const value =
      typeof target === "number" ? target : text ? Number(text) : NaN;
    if (!Number.isFinite(value)) {
      debug("ignoring power target %j", target);
      continue;
    }

    const watts = Math.trunc(value) || 0;
    if (!targets.includes(watts)) {
      targets.push(watts);
    }
  }

  return targets;
}

function parsePhaseEntities(
  raw: unknown,
  meterId: string,
  kind: "current" | "voltage"
): PhaseValues<string> {
  if (!isRecord(raw)) {
    throw new Error(`meter '${meterId}' is missing its ${kind} entities`);
  }

  const entities: PhaseValues<string> = { l1: "", l2: "", l3: "" };
  for (const phase of PHASES) {
    const entityId = raw[phase];
    if (typeof entityId !== "string" || !entityId.includes(".")) {
      throw new Error(
        `meter '${meterId}' needs an entity id for ${kind} ${phase}`
      );
    }
    entities[phase] = entityId;
  }

  return entities;
}

export function parseMeters(raw: unknown): MeterConfig[] {
  if (!Array.isArray(raw)) {
    throw new Error("meters must be a list");
  }

  const seen = new Set<string>();

  const entries: unknown[] = raw;

  return entries.map((entry, index) => {
    if (!isRecord(entry)) {
      throw new Error(`meter #${index} must be an object`);
    }

    const { id } = entry;
    if (typeof id !== "string" || !METER_ID.test(id)) {
      throw new Error(
        `meter #${index} needs an id of lowercase letters, digits and underscores`
      );
    }
    if (seen.has(id)) {
      throw new Error(`meter '${id}' is configured twice`);
    }
    seen.add(id);

    return {
      id,
      name:
        typeof entry.name === "string" && entry.name
          ? entry.name
          : "Power Average",
      current: parsePhaseEntities(entry.current, id, "current"),
      voltage: parsePhaseEntities(entry.voltage, id, "voltage"),
      powerTargets: parsePowerTargets(entry.powerTargets),
    };
  });
}

convict.addParser({ extension: ["yml", "yaml"], parse: yaml.load });
convict.addFormat(url);
convict.addFormat({
  name: "duration",
  validate(value: unknown) {
    const parsed = typeof value === "string" ? ms(value) : undefined;
    if (typeof parsed !== "number" || !(parsed > 0)) {
      throw new Error(`'${String(value)}' is not a duration like '10s'`);
    }
  },
});
convict.addFormat({
  name: "utc-offset",
  validate(value: unknown) {
    if (
      typeof value !== "number" ||
      !Number.isInteger(value) ||
      value < -720 ||
      value > 840
    ) {
      throw new Error("must be a whole number of minutes between -720 and 840");
    }
  },
  coerce: (value: string) => Number(value),
});
convict.addFormat({
  name: "meter-list",
  validate(value: unknown) {
    parseMeters(value);
  },
});

const CONVICT_SCHEMA = {
  host: {
    default: "http://homeassistant.local:8123",
    doc: "The host for your Home Assistant instance. Needs to include the port if it is not the default port.",
    env: "HASS_HOST",
    format: "url",
  },
  token: {
    default: "",
    doc: "A long-lived access token. Create one on your account profile. https://www.home-assistant.io/docs/authentication/#your-account-profile",
    env: "HASS_TOKEN",
    format: String,
    sensitive: true,
  },
  mqttDiscoveryPrefix: {
    default: "homeassistant",
    doc: "The discovery prefix Home Assistant listens on.",
    env: "MQTT_DISCOVERY_PREFIX",
    format: String,
  },
  idPrefix: {
    default: "power_average",
    doc: "A prefix to put on the IDs. Maybe you want to have a secondary instance during development with different IDs so there is no overlap.",
    env: "POWER_AVERAGE_ID_PREFIX",
    format: String,
  },
  mqttUrl: {
    default: "mqtt://mqtt.local",
    doc: "The URL to use for MQTT",
    env: "MQTT_URL",
    format: String,
  },
  pollInterval: {
    default: "10s",
    doc: "How often to take a sample when none of the source sensors change.",
    env: "POWER_AVERAGE_POLL_INTERVAL",
    format: "duration",
  },
  windowOffsetMinutes: {
    default: 0,
    doc: "Offset from UTC, in minutes, the quarter-hour windows are aligned to and timestamps are shown in.",
    env: "POWER_AVERAGE_WINDOW_OFFSET",
    format: "utc-offset",
  },
  meters: {
    default: [] as unknown[],
    doc: "The meters to average. Each one names three current and three voltage sensors and optional power targets.",
    format: "meter-list",
  },
};

export function loadConfig(path: string): IRootConfig {
  const config = convict(CONVICT_SCHEMA).loadFile(path);

  config.validate({ allowed: "strict" });

  const root: IRootConfig = {
    host: config.get("host"),
    token: config.get("token"),
    idPrefix: config.get("idPrefix"),
    mqttDiscoveryPrefix: config.get("mqttDiscoveryPrefix"),
    mqttUrl: config.get("mqttUrl"),
    objectId: "power_average",
    pollInterval: ms(config.get("pollInterval")),
    windowOffsetMinutes: config.get("windowOffsetMinutes"),
    meters: parseMeters(config.get("meters")),
  };
  debug("loaded %s with %d meter(s)", path, root.meters.length);

  return root;
}

export default class Config {
  private cached$?: Observable<IRootConfig>;

  root$(): Observable<IRootConfig> {
    if (!this.cached$) {
      this.cached$ = from([
        loadConfig(process.env.CONFIG_PATH || "./config.yaml"),
      ]).pipe(shareReplay(1));
    }

    return this.cached$;
  }
}
