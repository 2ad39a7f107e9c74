// Public surface of the acquisition core.

export { createAcquisitionStore } from "./store/acquisitionStore";
export type {
  AcquisitionDeps,
  AcquisitionState,
  AcquisitionStore,
} from "./store/acquisitionStore";
export { createCalibrationStore } from "./store/calibrationStore";
export type { CalibrationState, CalibrationStore } from "./store/calibrationStore";

export { Sampler, performanceClock } from "./lib/acquisition/Sampler";
export type {
  Clock,
  SamplerOptions,
  SamplerState,
  StartOptions,
  StopReason,
} from "./lib/acquisition/Sampler";
export { SeriesStore } from "./lib/acquisition/SeriesStore";
export type { SessionStats } from "./lib/acquisition/SeriesStore";

export { SerialLink } from "./lib/connection/SerialLink";
export type { SerialLinkOptions } from "./lib/connection/SerialLink";
export { createNodeSerialDevice, listSerialPorts } from "./lib/connection/serialDevice";
export type { SerialDevice, SerialDeviceFactory } from "./lib/connection/serialDevice";
export type { ConnectionStatus, Link, PortDescriptor } from "./lib/connection/ILink";
export { parseVoltageLine } from "./lib/parsers/voltageParser";

export {
  applyCalibration,
  describeCalibration,
  fitTwoPoint,
} from "./calibration/twoPointCalibration";
export type { ChannelCalibration } from "./calibration/twoPointCalibration";

export * from "./lib/export";
export { formatReadout, toRow } from "./lib/display/readout";
export type { Readout } from "./lib/display/readout";

export { DEFAULT_ACQUISITION_CONFIG, loadAcquisitionConfig } from "./lib/config";
export type { AcquisitionConfig } from "./lib/config";
export {
  AcquisitionError,
  CalibrationError,
  ExportError,
  LinkError,
  SamplerError,
  SeriesError,
} from "./lib/errors";
export type {
  CalibrationErrorCode,
  ExportErrorCode,
  LinkErrorCode,
  SamplerErrorCode,
  SeriesErrorCode,
} from "./lib/errors";
export { createLogger } from "./lib/logger";
export type { Logger } from "./lib/logger";
export * from "./lib/types";
