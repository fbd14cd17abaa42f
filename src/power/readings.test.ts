import { describe, expect, it } from "vitest";
import { isInvalidSample, toSample, type PhaseReadings } from "./readings";

const NOW = Date.parse("2026-10-18T10:00:00.000Z");

const createReadings = (
  overrides: Partial<{
    current: Partial<PhaseReadings["current"]>;
    voltage: Partial<PhaseReadings["voltage"]>;
  }> = {}
): PhaseReadings => ({
  current: { l1: "10", l2: "5.5", l3: "-2", ...overrides.current },
  voltage: { l1: "230", l2: "231.4", l3: "229", ...overrides.voltage },
});

describe("toSample", () => {
  it("parses the six readings", () => {
    expect(toSample(createReadings(), NOW)).toEqual({
      timestamp: NOW,
      current: { l1: 10, l2: 5.5, l3: -2 },
      voltage: { l1: 230, l2: 231.4, l3: 229 },
    });
  });

  it("tolerates surrounding whitespace", () => {
    const sample = toSample(
      createReadings({ current: { l1: " 12.5 " } }),
      NOW
    );

    expect(isInvalidSample(sample)).toBe(false);
    expect(!isInvalidSample(sample) && sample.current.l1).toBe(12.5);
  });

  const invalid: [string, Parameters<typeof createReadings>[0], string][] = [
    [
      "unavailable current",
      { current: { l2: "unavailable" } },
      "current l2 reads 'unavailable'",
    ],
    [
      "unknown voltage",
      { voltage: { l3: "unknown" } },
      "voltage l3 reads 'unknown'",
    ],
    ["empty state", { voltage: { l1: "" } }, "voltage l1 reads ''"],
    ["text", { current: { l3: "ten" } }, "current l3 reads 'ten'"],
  ];

  it.each(invalid)("marks the tick invalid on %s", (_, overrides, reason) => {
    expect(toSample(createReadings(overrides), NOW)).toEqual({
      kind: "invalid",
      timestamp: NOW,
      reason,
    });
  });
});

describe("isInvalidSample", () => {
  it("tells samples and invalid ticks apart", () => {
    expect(
      isInvalidSample({ kind: "invalid", timestamp: NOW, reason: "test" })
    ).toBe(true);
    expect(isInvalidSample(toSample(createReadings(), NOW))).toBe(false);
  });
});
