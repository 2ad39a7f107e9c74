import type { Link } from "../connection/ILink";
import type { SeriesStore } from "./SeriesStore";
import type { CalibrationStore } from "../../store/calibrationStore";
import { DEFAULT_ACQUISITION_CONFIG } from "../config";
import {
  LinkError,
  SamplerError,
  errorMessage,
  isTransientLinkError,
} from "../errors";
import { samplerLog } from "../logger";
import type { Channel, Sample, SeriesRecord } from "../types";

/** Monotonic millisecond clock. */
export interface Clock {
  now(): number;
}

export const performanceClock: Clock = {
  now: () => performance.now(),
};

export type SamplerState = "idle" | "running";

export type StopReason = "requested" | "link-lost" | "failed";

export interface SamplerOptions {
  link: Link;
  calibration: CalibrationStore;
  series: SeriesStore;
  clock?: Clock;
  maxRateHz?: number;
  /** Extra attempts after a timed-out read within one tick */
  retryOnTimeout?: number;
}

export interface StartOptions {
  /**
   * Begin a new session (clears the series). Without it, starting after a
   * stop resumes the same session: timestamps keep counting from the
   * session's first start and the first record of the run is flagged as a
   * discontinuity.
   */
  reset?: boolean;
}

type StateListener = (state: SamplerState, reason?: StopReason) => void;

/**
 * Sampler - drives acquisition at a fixed rate and assembles records.
 *
 * Tick n of a run fires at runStart + n/rate, computed from the run start
 * rather than accumulated, so scheduling jitter never drifts the series. A
 * tick that overruns its slot skips the slots it missed.
 */
export class Sampler {
  private readonly link: Link;
  private readonly calibration: CalibrationStore;
  private readonly series: SeriesStore;
  private readonly clock: Clock;
  private readonly maxRateHz: number;
  private readonly retryOnTimeout: number;

  private _state: SamplerState = "idle";
  private _rateHz = 0;
  private sessionEpochMs = 0;
  private segment = 0;
  private stopRequested = false;
  private stopReason: StopReason = "requested";
  private loopPromise: Promise<void> | null = null;
  private sleepTimer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;
  private _overruns = 0;

  private listeners = new Set<StateListener>();

  constructor(options: SamplerOptions) {
    this.link = options.link;
    this.calibration = options.calibration;
    this.series = options.series;
    this.clock = options.clock ?? performanceClock;
    this.maxRateHz = options.maxRateHz ?? DEFAULT_ACQUISITION_CONFIG.maxRateHz;
    this.retryOnTimeout =
      options.retryOnTimeout ?? DEFAULT_ACQUISITION_CONFIG.retryOnTimeout;
  }

  get state(): SamplerState {
    return this._state;
  }

  get rateHz(): number {
    return this._rateHz;
  }

  /** Slots skipped because a tick ran past them, since the session began. */
  get overruns(): number {
    return this._overruns;
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private setState(state: SamplerState, reason?: StopReason) {
    this._state = state;
    for (const listener of this.listeners) listener(state, reason);
  }

  start(rateHz: number, options: StartOptions = {}): void {
    if (this._state === "running") {
      throw new SamplerError("AlreadyRunning", "Sampler is already running");
    }
    if (!Number.isFinite(rateHz) || rateHz <= 0 || rateHz > this.maxRateHz) {
      throw new SamplerError(
        "InvalidRate",
        `Sample rate must be within (0, ${this.maxRateHz}] Hz, got ${rateHz}`,
      );
    }
    if (!this.link.isOpen()) {
      throw new SamplerError("NotConnected", "Serial port not connected");
    }

    const runStartMs = this.clock.now();
    const last = this.series.last();
    const resume = !options.reset && last !== undefined;

    if (resume) {
      this.segment = last.segment + 1;
      samplerLog.info(
        `Resuming session at ${rateHz} Hz (segment ${this.segment}, gap after ${last.timestamp.toFixed(3)} s)`,
      );
    } else {
      if (this.series.size > 0) this.series.clear();
      this.sessionEpochMs = runStartMs;
      this.segment = 0;
      this._overruns = 0;
      samplerLog.info(`Starting new session at ${rateHz} Hz`);
    }

    this._rateHz = rateHz;
    this.stopRequested = false;
    this.stopReason = "requested";
    this.setState("running");
    this.loopPromise = this.run(runStartMs, 1000 / rateHz, resume);
  }

  /**
   * Halt the clock. A read already in flight completes and its tick's record
   * is kept, with channels not yet read marked missing; no further read,
   * retry or tick starts. Resolves once the loop has exited, at most one
   * read timeout later.
   */
  async stop(): Promise<void> {
    if (this._state === "idle") return;
    this.stopRequested = true;
    this.cancelSleep();
    await this.loopPromise;
  }

  private async run(
    runStartMs: number,
    periodMs: number,
    resumed: boolean,
  ): Promise<void> {
    let slot = 1;
    let discontinuity = resumed;

    try {
      while (!this.stopRequested) {
        await this.sleepUntil(runStartMs + slot * periodMs);
        if (this.stopRequested) break;

        const appended = await this.tick(discontinuity);
        if (appended) discontinuity = false;

        let next = slot + 1;
        const now = this.clock.now();
        if (runStartMs + next * periodMs < now) {
          const catchUp = Math.ceil((now - runStartMs) / periodMs);
          this._overruns += catchUp - next;
          samplerLog.warn(
            `Tick overran by ${catchUp - next} slot(s) at ${this._rateHz} Hz`,
          );
          next = catchUp;
        }
        slot = next;
      }
    } catch (error) {
      this.stopReason = "failed";
      samplerLog.error("Sampling loop failed:", errorMessage(error));
    } finally {
      this.cancelSleep();
      this.loopPromise = null;
      samplerLog.info(
        `Stopped (${this.stopReason}); ${this.series.size} records in session`,
      );
      this.setState("idle", this.stopReason);
    }
  }

  /** One tick: read both channels, convert, append. False if nothing appended. */
  private async tick(discontinuity: boolean): Promise<boolean> {
    const timestamp = (this.clock.now() - this.sessionEpochMs) / 1000;

    let pressure: Sample | null;
    let displacement: Sample | null;
    try {
      pressure = await this.readChannel("pressure", timestamp);
      displacement = await this.readChannel("displacement", timestamp);
    } catch (error) {
      // Connection-level failure: end the run, keep what was recorded.
      this.stopRequested = true;
      this.stopReason = "link-lost";
      samplerLog.warn("Link lost during tick:", errorMessage(error));
      return false;
    }

    const record: SeriesRecord = {
      timestamp,
      pressure,
      displacement,
      segment: this.segment,
      discontinuity,
    };
    this.series.append(record);
    return true;
  }

  private async readChannel(
    channel: Channel,
    timestamp: number,
  ): Promise<Sample | null> {
    for (let attempt = 0; ; attempt++) {
      // After stop() only the read already in flight completes.
      if (this.stopRequested) return null;
      try {
        const rawVoltage = await this.link.readVoltage(channel);
        const reading = this.calibration.getState().convert(channel, rawVoltage);
        return Object.freeze({
          timestamp,
          channel,
          rawVoltage,
          value: reading.value,
          calibrated: reading.calibrated,
        });
      } catch (error) {
        if (
          error instanceof LinkError &&
          error.code === "Timeout" &&
          attempt < this.retryOnTimeout
        ) {
          samplerLog.debug(`${channel} read timed out, retrying`);
          continue;
        }
        if (isTransientLinkError(error)) {
          samplerLog.debug(
            `${channel} missing at ${timestamp.toFixed(3)} s: ${error.code}`,
          );
          return null;
        }
        throw error;
      }
    }
  }

  private sleepUntil(targetMs: number): Promise<void> {
    const delay = targetMs - this.clock.now();
    if (delay <= 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.wake = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake = null;
        resolve();
      }, delay);
    });
  }

  private cancelSleep() {
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
