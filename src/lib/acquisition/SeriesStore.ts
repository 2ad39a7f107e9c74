import type { SampleSink, SeriesRecord } from "../types";
import { SeriesError } from "../errors";
import { sessionLog } from "../logger";

export interface SessionStats {
  recordCount: number;
  missing: { pressure: number; displacement: number };
  /** Seconds from session start to the last record */
  duration: number;
  /** Records per second over the session, 0 until two records exist */
  effectiveRateHz: number;
  segments: number;
}

/**
 * SeriesStore - ordered, append-only buffer of records for the active session.
 *
 * Single writer (the Sampler tick) and any number of readers. Records are
 * frozen before they are stored, and readers only ever get copies, so a
 * snapshot is always a consistent prefix of the series. We keep records out
 * of store state so an append stays O(1).
 */
export class SeriesStore {
  private records: SeriesRecord[] = [];
  private sinks = new Set<SampleSink>();
  private missingPressure = 0;
  private missingDisplacement = 0;

  get size(): number {
    return this.records.length;
  }

  /** Writer-only. Timestamps must strictly increase within a session. */
  append(record: SeriesRecord): void {
    const last = this.last();
    if (last && record.timestamp <= last.timestamp) {
      throw new SeriesError(
        "NonIncreasingTimestamp",
        `Non-increasing timestamp ${record.timestamp} after ${last.timestamp}`,
      );
    }

    const frozen = Object.freeze({ ...record });
    this.records.push(frozen);
    if (!frozen.pressure) this.missingPressure++;
    if (!frozen.displacement) this.missingDisplacement++;

    for (const sink of this.sinks) {
      try {
        sink.onRecord(frozen);
      } catch (error) {
        sessionLog.error("Sample sink failed:", error);
      }
    }
  }

  snapshot(): readonly SeriesRecord[] {
    return Object.freeze(this.records.slice());
  }

  /** Most recent `count` records (live plot window). */
  tail(count: number): readonly SeriesRecord[] {
    if (count <= 0) return Object.freeze([]);
    return Object.freeze(this.records.slice(-count));
  }

  last(): SeriesRecord | undefined {
    return this.records[this.records.length - 1];
  }

  /** Records that open a resumed run (a timestamp gap precedes each). */
  discontinuities(): readonly SeriesRecord[] {
    return Object.freeze(this.records.filter((record) => record.discontinuity));
  }

  clear(): void {
    const dropped = this.records.length;
    this.records = [];
    this.missingPressure = 0;
    this.missingDisplacement = 0;
    sessionLog.debug(`Session cleared (${dropped} records dropped)`);

    for (const sink of this.sinks) {
      try {
        sink.onClear?.();
      } catch (error) {
        sessionLog.error("Sample sink failed:", error);
      }
    }
  }

  subscribe(sink: SampleSink): () => void {
    this.sinks.add(sink);
    return () => {
      this.sinks.delete(sink);
    };
  }

  stats(): SessionStats {
    const count = this.records.length;
    const first = this.records[0];
    const last = this.last();
    const duration = last ? last.timestamp : 0;
    const span = first && last ? last.timestamp - first.timestamp : 0;

    return {
      recordCount: count,
      missing: {
        pressure: this.missingPressure,
        displacement: this.missingDisplacement,
      },
      duration,
      effectiveRateHz: count > 1 && span > 0 ? (count - 1) / span : 0,
      segments: last ? last.segment + 1 : 0,
    };
  }
}
