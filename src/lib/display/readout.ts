import { CHANNEL_UNITS, type RecordRow, type Sample, type SeriesRecord } from "../types";

export interface Readout {
  time: string;
  pressure: string;
  displacement: string;
}

const MISSING = "--";

/** Table / CSV projection of a record. */
export function toRow(record: SeriesRecord): RecordRow {
  return {
    time: record.timestamp,
    pressure: record.pressure ? record.pressure.value : null,
    displacement: record.displacement ? record.displacement.value : null,
  };
}

function formatSample(sample: Sample | null): string {
  if (!sample) return MISSING;
  const unit = sample.calibrated ? CHANNEL_UNITS[sample.channel] : "V";
  return `${sample.value.toFixed(3)} ${unit}`;
}

/** Live label text for the latest record. */
export function formatReadout(record: SeriesRecord | undefined): Readout {
  if (!record) {
    return { time: MISSING, pressure: MISSING, displacement: MISSING };
  }
  return {
    time: `${record.timestamp.toFixed(2)} s`,
    pressure: formatSample(record.pressure),
    displacement: formatSample(record.displacement),
  };
}
