/**
 * Error taxonomy for the acquisition core.
 *
 * Every failure the core reports is one of these classes, each carrying a
 * literal `code` so a shell can narrow with `instanceof` and then switch on
 * the code. Nothing here is fatal to the process.
 */

export type LinkErrorCode =
  | "PortUnavailable"
  | "AlreadyOpen"
  | "NotOpen"
  | "Timeout"
  | "MalformedResponse";

export type CalibrationErrorCode = "DegenerateCalibration";

export type SamplerErrorCode = "InvalidRate" | "NotConnected" | "AlreadyRunning";

export type ExportErrorCode = "WriteError" | "NoData";

export type SeriesErrorCode = "NonIncreasingTimestamp";

export abstract class AcquisitionError<TCode extends string> extends Error {
  readonly code: TCode;

  protected constructor(code: TCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

export class LinkError extends AcquisitionError<LinkErrorCode> {
  constructor(code: LinkErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
  }
}

export class CalibrationError extends AcquisitionError<CalibrationErrorCode> {
  constructor(
    code: CalibrationErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(code, message, options);
  }
}

export class SamplerError extends AcquisitionError<SamplerErrorCode> {
  constructor(code: SamplerErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
  }
}

export class ExportError extends AcquisitionError<ExportErrorCode> {
  constructor(code: ExportErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
  }
}

/** A record that would break the series' ordering. The series is unchanged. */
export class SeriesError extends AcquisitionError<SeriesErrorCode> {
  constructor(code: SeriesErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
  }
}

/** Per-tick read failures the Sampler absorbs instead of aborting the run. */
export function isTransientLinkError(error: unknown): error is LinkError {
  return (
    error instanceof LinkError &&
    (error.code === "Timeout" || error.code === "MalformedResponse")
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
