import { describe, expect, it } from "vitest";
import { formatReadout, toRow } from "./readout";
import type { SeriesRecord } from "../types";

const RECORD: SeriesRecord = {
  timestamp: 1.234,
  pressure: {
    timestamp: 1.234,
    channel: "pressure",
    rawVoltage: 2.5,
    value: 50,
    calibrated: true,
  },
  displacement: {
    timestamp: 1.234,
    channel: "displacement",
    rawVoltage: 1.2,
    value: 1.2,
    calibrated: false,
  },
  segment: 0,
  discontinuity: false,
};

describe("readout", () => {
  it("formats calibrated values in physical units and raw ones in volts", () => {
    expect(formatReadout(RECORD)).toEqual({
      time: "1.23 s",
      pressure: "50.000 kPa",
      displacement: "1.200 V",
    });
  });

  it("shows missing fields as dashes", () => {
    expect(formatReadout({ ...RECORD, pressure: null }).pressure).toBe("--");
    expect(formatReadout(undefined)).toEqual({
      time: "--",
      pressure: "--",
      displacement: "--",
    });
  });

  it("projects records to table rows", () => {
    expect(toRow(RECORD)).toEqual({ time: 1.234, pressure: 50, displacement: 1.2 });
    expect(toRow({ ...RECORD, displacement: null })).toEqual({
      time: 1.234,
      pressure: 50,
      displacement: null,
    });
  });
});
