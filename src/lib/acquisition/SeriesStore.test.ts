import { beforeEach, describe, expect, it, vi } from "vitest";
import { SeriesStore } from "./SeriesStore";
import { SeriesError } from "../errors";
import type { Sample, SeriesRecord } from "../types";

function makeSample(overrides: Partial<Sample> = {}): Sample {
  return {
    timestamp: 0.1,
    channel: "pressure",
    rawVoltage: 2.5,
    value: 50,
    calibrated: true,
    ...overrides,
  };
}

function makeRecord(
  timestamp: number,
  overrides: Partial<SeriesRecord> = {},
): SeriesRecord {
  return {
    timestamp,
    pressure: makeSample({ timestamp }),
    displacement: makeSample({
      timestamp,
      channel: "displacement",
      rawVoltage: 1,
      value: 4,
    }),
    segment: 0,
    discontinuity: false,
    ...overrides,
  };
}

describe("SeriesStore", () => {
  let store: SeriesStore;

  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    store = new SeriesStore();
  });

  it("appends records in order", () => {
    store.append(makeRecord(0.1));
    store.append(makeRecord(0.2));
    store.append(makeRecord(0.3));

    expect(store.size).toBe(3);
    expect(store.snapshot().map((r) => r.timestamp)).toEqual([0.1, 0.2, 0.3]);
    expect(store.last()?.timestamp).toBe(0.3);
  });

  it("rejects non-increasing timestamps", () => {
    store.append(makeRecord(0.2));

    expect(() => store.append(makeRecord(0.2))).toThrow(
      "Non-increasing timestamp 0.2 after 0.2",
    );
    expect(() => store.append(makeRecord(0.1))).toThrow(SeriesError);
    expect(() => store.append(makeRecord(0.1))).toThrow(
      expect.objectContaining({ code: "NonIncreasingTimestamp" }),
    );
    expect(store.size).toBe(1);
  });

  it("returns snapshots that do not change with later appends", () => {
    store.append(makeRecord(0.1));
    const snapshot = store.snapshot();

    store.append(makeRecord(0.2));

    expect(snapshot).toHaveLength(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(store.snapshot()).toHaveLength(2);
  });

  it("stores frozen copies of appended records", () => {
    const record = makeRecord(0.1);
    store.append(record);

    const stored = store.snapshot()[0];
    expect(stored).toEqual(record);
    expect(stored).not.toBe(record);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it("returns the most recent records for the plot window", () => {
    for (let i = 1; i <= 5; i++) store.append(makeRecord(i / 10));

    expect(store.tail(2).map((r) => r.timestamp)).toEqual([0.4, 0.5]);
    expect(store.tail(10)).toHaveLength(5);
    expect(store.tail(0)).toEqual([]);
  });

  it("lists records that open resumed runs", () => {
    store.append(makeRecord(0.1));
    store.append(makeRecord(2.1, { segment: 1, discontinuity: true }));
    store.append(makeRecord(2.2, { segment: 1 }));

    expect(store.discontinuities().map((r) => r.timestamp)).toEqual([2.1]);
  });

  it("clears the session and allows timestamps to restart", () => {
    store.append(makeRecord(0.5));
    store.clear();

    expect(store.size).toBe(0);
    expect(store.last()).toBeUndefined();
    store.append(makeRecord(0.1));
    expect(store.size).toBe(1);
  });

  it("notifies sinks of appends and clears until unsubscribed", () => {
    const onRecord = vi.fn();
    const onClear = vi.fn();
    const unsubscribe = store.subscribe({ onRecord, onClear });

    store.append(makeRecord(0.1));
    store.clear();
    unsubscribe();
    store.append(makeRecord(0.1));

    expect(onRecord).toHaveBeenCalledTimes(1);
    expect(onRecord.mock.calls[0][0].timestamp).toBe(0.1);
    expect(onClear).toHaveBeenCalledTimes(1);
  });

  it("keeps appending when a sink throws", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    store.subscribe({
      onRecord: () => {
        throw new Error("render failed");
      },
    });

    store.append(makeRecord(0.1));

    expect(store.size).toBe(1);
    expect(errorSpy).toHaveBeenCalled();
  });

  it("summarises the session", () => {
    store.append(makeRecord(0.1));
    store.append(makeRecord(0.2, { pressure: null }));
    store.append(makeRecord(0.3, { displacement: null }));
    store.append(makeRecord(0.5, { pressure: null, segment: 1, discontinuity: true }));

    const stats = store.stats();
    expect(stats.recordCount).toBe(4);
    expect(stats.missing).toEqual({ pressure: 2, displacement: 1 });
    expect(stats.duration).toBe(0.5);
    expect(stats.effectiveRateHz).toBeCloseTo(7.5, 9);
    expect(stats.segments).toBe(2);
  });

  it("reports empty stats for an empty session", () => {
    expect(store.stats()).toEqual({
      recordCount: 0,
      missing: { pressure: 0, displacement: 0 },
      duration: 0,
      effectiveRateHz: 0,
      segments: 0,
    });
  });
});
