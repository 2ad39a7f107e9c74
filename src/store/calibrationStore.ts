/**
 * Calibration Store - two-point voltage→unit calibration per channel.
 *
 * Each channel holds an immutable {low, high, mapping} snapshot. Recording a
 * point swaps in a new snapshot with the mapping recomputed, so the sampling
 * loop always reads a complete, consistent calibration.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import {
  EMPTY_CHANNEL_CALIBRATION,
  applyCalibration,
  describeCalibration,
  fitTwoPoint,
  type ChannelCalibration,
} from "../calibration/twoPointCalibration";
import { CalibrationError } from "../lib/errors";
import { calibLog } from "../lib/logger";
import type {
  CalibratedReading,
  CalibrationSide,
  Channel,
} from "../lib/types";

const CHANNEL_SYMBOLS: Record<Channel, string> = {
  pressure: "P",
  displacement: "D",
};

export interface CalibrationState {
  channels: Record<Channel, ChannelCalibration>;

  // Actions
  recordPoint: (
    channel: Channel,
    side: CalibrationSide,
    referenceValue: number,
    measuredVoltage: number,
  ) => void;
  resetChannel: (channel: Channel) => void;

  // Queries
  convert: (channel: Channel, rawVoltage: number) => CalibratedReading;
  isComplete: (channel: Channel) => boolean;
  describe: (channel: Channel) => string;
}

export type CalibrationStore = StoreApi<CalibrationState>;

export function createCalibrationStore(): CalibrationStore {
  return createStore<CalibrationState>()((set, get) => ({
    channels: {
      pressure: EMPTY_CHANNEL_CALIBRATION,
      displacement: EMPTY_CHANNEL_CALIBRATION,
    },

    recordPoint: (channel, side, referenceValue, measuredVoltage) => {
      const current = get().channels[channel];
      const other = side === "low" ? current.high : current.low;

      if (other && other.rawVoltage === measuredVoltage) {
        throw new CalibrationError(
          "DegenerateCalibration",
          `${channel} calibration voltages are identical (${measuredVoltage} V)`,
        );
      }

      const point = { rawVoltage: measuredVoltage, physicalValue: referenceValue };
      const low = side === "low" ? point : current.low;
      const high = side === "high" ? point : current.high;
      const next: ChannelCalibration = Object.freeze({
        low,
        high,
        mapping: low && high ? fitTwoPoint(low, high) : null,
      });

      set((state) => ({ channels: { ...state.channels, [channel]: next } }));

      calibLog.info(
        `${channel} ${side} point: ${measuredVoltage.toFixed(3)} V → ${referenceValue}`,
      );
      if (next.mapping) {
        calibLog.info(describeCalibration(next, CHANNEL_SYMBOLS[channel]));
      }
    },

    resetChannel: (channel) => {
      set((state) => ({
        channels: { ...state.channels, [channel]: EMPTY_CHANNEL_CALIBRATION },
      }));
      calibLog.info(`${channel} calibration cleared`);
    },

    convert: (channel, rawVoltage) =>
      applyCalibration(get().channels[channel], rawVoltage),

    isComplete: (channel) => get().channels[channel].mapping !== null,

    describe: (channel) =>
      describeCalibration(get().channels[channel], CHANNEL_SYMBOLS[channel]),
  }));
}
