import { beforeEach, describe, expect, it } from "vitest";
import { firstValueFrom, from, lastValueFrom } from "rxjs";
import { map, toArray } from "rxjs/operators";
import { TestScheduler } from "rxjs/testing";
import { accumulateWindows } from "./accumulateWindows";
import type { InvalidSample, Sample } from "../../power/types";

const T0 = Date.parse("2026-10-18T10:00:00.000Z");

const createSample = (offsetMs: number, amps: number): Sample => ({
  timestamp: T0 + offsetMs,
  current: { l1: amps, l2: amps, l3: amps },
  voltage: { l1: 230, l2: 230, l3: 230 },
});

const invalid = (offsetMs: number): InvalidSample => ({
  kind: "invalid",
  timestamp: T0 + offsetMs,
  reason: "voltage l1 reads 'unavailable'",
});

describe("accumulateWindows", () => {
  let testScheduler: TestScheduler;

  beforeEach(() => {
    testScheduler = new TestScheduler((actual, expected) => {
      expect(actual).toEqual(expected);
    });
  });

  it("should emit the running average for every sample", () => {
    testScheduler.run(({ cold, expectObservable }) => {
      const source$ = cold("a b c|", {
        a: createSample(0, 10),
        b: createSample(10_000, 20),
        c: createSample(20_000, 30),
      });
      const result$ = source$.pipe(
        accumulateWindows(),
        map((update) => update.current.totalAverage)
      );

      // a: 6900
      // b: avg of [6900, 13800] = 10350
      // c: avg of [6900, 13800, 20700] = 13800
      expectObservable(result$).toBe("a b c|", {
        a: 6900,
        b: 10350,
        c: 13800,
      });
    });
  });

  it("should keep emitting on invalid samples without counting them", () => {
    testScheduler.run(({ cold, expectObservable }) => {
      const source$ = cold("a b|", {
        a: createSample(0, 10),
        b: invalid(30_000),
      });
      const result$ = source$.pipe(
        accumulateWindows(),
        map((update) => ({
          kind: update.outcome.kind,
          count: update.current.measurementCount,
          elapsed: update.current.elapsedSeconds,
        }))
      );

      expectObservable(result$).toBe("a b|", {
        a: { kind: "accepted", count: 1, elapsed: 0 },
        b: { kind: "invalid", count: 1, elapsed: 30 },
      });
    });
  });

  it("should report the completed window from the rollover on", () => {
    testScheduler.run(({ cold, expectObservable }) => {
      const source$ = cold("a b c|", {
        a: createSample(60_000, 10),
        b: createSample(900_000, 20),
        c: createSample(910_000, 20),
      });
      const result$ = source$.pipe(
        accumulateWindows(),
        map((update) => update.completed?.totalAverage ?? null)
      );

      expectObservable(result$).toBe("a b c|", {
        a: null,
        b: 6900,
        c: 6900,
      });
    });
  });

  it("should estimate every power target against the same window", async () => {
    const update = await firstValueFrom(
      from([createSample(300_000, 10)]).pipe(
        accumulateWindows({ powerTargets: [3000, -900] })
      )
    );

    // (6900 × 300 + 9900 × 600) / 900 and (6900 × 300 + 6000 × 600) / 900
    expect(update.estimates.map((e) => e.estimatedFinalAverage)).toEqual([
      8900, 6300,
    ]);
    expect(update.estimates.map((e) => e.windowStart)).toEqual([T0, T0]);
  });

  it("should give every subscription its own windows", async () => {
    const source$ = from([createSample(0, 10), createSample(1_000, 10)]).pipe(
      accumulateWindows(),
      map((update) => update.current.measurementCount),
      toArray()
    );

    expect(await lastValueFrom(source$)).toEqual([1, 2]);
    expect(await lastValueFrom(source$)).toEqual([1, 2]);
  });

  it("should align windows to the given offset", async () => {
    const update = await firstValueFrom(
      from([createSample(7 * 60_000, 1)]).pipe(
        accumulateWindows({ windowOffsetMinutes: 10 })
      )
    );

    // 10:07 UTC is 10:17 at +00:10, in the window that started 10:15 there.
    expect(update.current.windowStart).toBe(T0 + 5 * 60_000);
  });
});
