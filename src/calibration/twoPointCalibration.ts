import type {
  AffineMapping,
  CalibratedReading,
  CalibrationPoint,
} from "../lib/types";

/**
 * Per-channel two-point calibration snapshot.
 * Treated as immutable: every change produces a new object.
 */
export interface ChannelCalibration {
  readonly low: CalibrationPoint | null;
  readonly high: CalibrationPoint | null;
  readonly mapping: AffineMapping | null;
}

export const EMPTY_CHANNEL_CALIBRATION: ChannelCalibration = Object.freeze({
  low: null,
  high: null,
  mapping: null,
});

/**
 * Affine fit through two reference points.
 * Returns null when the voltages coincide (slope undefined).
 */
export function fitTwoPoint(
  low: CalibrationPoint,
  high: CalibrationPoint,
): AffineMapping | null {
  const dv = high.rawVoltage - low.rawVoltage;
  if (dv === 0) return null;
  const slope = (high.physicalValue - low.physicalValue) / dv;
  return { slope, offset: low.physicalValue - slope * low.rawVoltage };
}

/** Raw voltage passes through, flagged uncalibrated, until both points exist. */
export function applyCalibration(
  calibration: ChannelCalibration,
  rawVoltage: number,
): CalibratedReading {
  const { mapping } = calibration;
  if (!mapping) {
    return { value: rawVoltage, calibrated: false };
  }
  return { value: mapping.slope * rawVoltage + mapping.offset, calibrated: true };
}

/** Status line shown next to each channel, e.g. "Calibrated (P = 25.000*V + -12.500)". */
export function describeCalibration(
  calibration: ChannelCalibration,
  symbol: string,
): string {
  const { mapping } = calibration;
  if (!mapping) {
    return "Not calibrated";
  }
  return `Calibrated (${symbol} = ${mapping.slope.toFixed(3)}*V + ${mapping.offset.toFixed(3)})`;
}
