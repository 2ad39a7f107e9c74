/**
 * Data Export Module
 *
 * Flat CSV rows (`time_s,pressure_kPa,displacement_mm`) for files and
 * clipboard text, plus a parser for reading exports back.
 *
 * @module export
 */

export {
  CSV_HEADER,
  DEFAULT_EXPORT_CHUNK_SIZE,
  parseRecordsCsv,
  toCSV,
  toClipboardText,
} from "./recordsCsv";
export type { CsvOptions } from "./recordsCsv";

export { writeCsvFile } from "./writeCsvFile";
