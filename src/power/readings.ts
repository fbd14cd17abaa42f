import {
  type InvalidSample,
  type Instant,
  PHASES,
  type PhaseValues,
  type Sample,
} from "./types";

/**
 * Raw Home Assistant states of the six source entities.
 */
export type PhaseReadings = {
  current: PhaseValues<string>;
  voltage: PhaseValues<string>;
};

const NOT_A_READING = new Set(["unavailable", "unknown", "none", ""]);

function parseReading(raw: string): number | null {
  const trimmed = raw.trim();
  if (NOT_A_READING.has(trimmed.toLowerCase())) {
    return null;
  }

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function isInvalidSample(
  value: Sample | InvalidSample
): value is InvalidSample {
  return "kind" in value && value.kind === "invalid";
}

/**
 * Turns the six raw states into a sample.
 *
 * When any of them is not a number the whole tick is unusable.
 */
export function toSample(
  readings: PhaseReadings,
  timestamp: Instant
): Sample | InvalidSample {
  const current: PhaseValues = { l1: 0, l2: 0, l3: 0 };
  const voltage: PhaseValues = { l1: 0, l2: 0, l3: 0 };

  for (const phase of PHASES) {
    const i = parseReading(readings.current[phase]);
    if (i === null) {
      return {
        kind: "invalid",
        timestamp,
        reason: `current ${phase} reads '${readings.current[phase]}'`,
      };
    }

    const u = parseReading(readings.voltage[phase]);
    if (u === null) {
      return {
        kind: "invalid",
        timestamp,
        reason: `voltage ${phase} reads '${readings.voltage[phase]}'`,
      };
    }

    current[phase] = i;
    voltage[phase] = u;
  }

  return { timestamp, current, voltage };
}
