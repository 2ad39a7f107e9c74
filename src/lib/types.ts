/**
 * Core data model: channels, calibration points, samples and records.
 */

export type Channel = "pressure" | "displacement";

export const CHANNELS: readonly Channel[] = ["pressure", "displacement"];

/** Physical unit each channel reports once calibrated. */
export const CHANNEL_UNITS: Record<Channel, string> = {
  pressure: "kPa",
  displacement: "mm",
};

/** Single-byte request code the microcontroller answers with a voltage line. */
export const CHANNEL_COMMANDS: Record<Channel, string> = {
  pressure: "a",
  displacement: "b",
};

export type CalibrationSide = "low" | "high";

export interface CalibrationPoint {
  rawVoltage: number;
  physicalValue: number;
}

/** physical = slope * voltage + offset */
export interface AffineMapping {
  slope: number;
  offset: number;
}

export interface CalibratedReading {
  value: number;
  calibrated: boolean;
}

/** One channel reading taken inside a tick. Frozen once created. */
export interface Sample {
  readonly timestamp: number; // seconds since session start
  readonly channel: Channel;
  readonly rawVoltage: number;
  readonly value: number;
  readonly calibrated: boolean;
}

/**
 * One tick's aligned pair. A channel whose read failed is `null` rather than
 * the record being dropped.
 */
export interface SeriesRecord {
  readonly timestamp: number; // seconds since session start
  readonly pressure: Sample | null;
  readonly displacement: Sample | null;
  /** Run index within the session; increments on each resumed start. */
  readonly segment: number;
  /** First record after a resumed start (timestamp gap precedes it). */
  readonly discontinuity: boolean;
}

/** Tabular projection of a record: what the table and CSV carry. */
export interface RecordRow {
  time: number;
  pressure: number | null;
  displacement: number | null;
}

/** Receives records as they are appended (live plot, table, counters). */
export interface SampleSink {
  onRecord(record: SeriesRecord): void;
  onClear?(): void;
}
