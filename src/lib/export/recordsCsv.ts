import { DEFAULT_ACQUISITION_CONFIG } from "../config";
import { toRow } from "../display/readout";
import type { RecordRow, SeriesRecord } from "../types";

export const CSV_HEADER = "time_s,pressure_kPa,displacement_mm";

export const DEFAULT_EXPORT_CHUNK_SIZE = 2000;

interface CsvChunkProgress {
  processed: number;
  total: number;
}

export interface CsvOptions {
  /** Fixed decimals per cell; null writes the shortest exact form. */
  decimals?: number | null;
  chunkSize?: number;
  onProgress?: (progress: CsvChunkProgress) => void;
}

function formatNumber(value: number, decimals: number | null): string {
  return decimals === null ? String(value) : value.toFixed(decimals);
}

function formatCell(value: number | null, decimals: number | null): string {
  // Missing stays empty, never 0
  return value === null ? "" : formatNumber(value, decimals);
}

function formatCsvLine(row: RecordRow, decimals: number | null): string {
  return [
    formatNumber(row.time, decimals),
    formatCell(row.pressure, decimals),
    formatCell(row.displacement, decimals),
  ].join(",");
}

/**
 * Render records as CSV: header plus one row per record, `\n` separated,
 * no trailing newline.
 */
export function toCSV(
  records: readonly SeriesRecord[],
  {
    decimals = DEFAULT_ACQUISITION_CONFIG.csvDecimals,
    chunkSize = DEFAULT_EXPORT_CHUNK_SIZE,
    onProgress,
  }: CsvOptions = {},
): string {
  const lines: string[] = [CSV_HEADER];
  const total = records.length;

  for (let index = 0; index < total; index += chunkSize) {
    const end = Math.min(index + chunkSize, total);
    for (let i = index; i < end; i += 1) {
      lines.push(formatCsvLine(toRow(records[i]), decimals));
    }
    onProgress?.({ processed: end, total });
  }

  return lines.join("\n");
}

/** Same text as the CSV file; delivering it to a clipboard is up to the shell. */
export function toClipboardText(
  records: readonly SeriesRecord[],
  options: CsvOptions = {},
): string {
  return toCSV(records, options);
}

function parseNumber(cell: string, lineNumber: number, column: string): number {
  const value = Number(cell);
  if (cell.trim() === "" || !Number.isFinite(value)) {
    throw new Error(`Invalid ${column} "${cell}" on line ${lineNumber}`);
  }
  return value;
}

/** Parse exported CSV text back into rows. Empty value cells become null. */
export function parseRecordsCsv(text: string): RecordRow[] {
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }

  if (lines.length === 0 || lines[0].trim() !== CSV_HEADER) {
    throw new Error("Invalid CSV header");
  }

  return lines.slice(1).map((line, index) => {
    const lineNumber = index + 2;
    const cells = line.split(",");
    if (cells.length !== 3) {
      throw new Error(
        `Expected 3 columns on line ${lineNumber}, found ${cells.length}`,
      );
    }
    const [time, pressure, displacement] = cells;
    return {
      time: parseNumber(time, lineNumber, "time_s"),
      pressure:
        pressure === "" ? null : parseNumber(pressure, lineNumber, "pressure_kPa"),
      displacement:
        displacement === ""
          ? null
          : parseNumber(displacement, lineNumber, "displacement_mm"),
    };
  });
}
