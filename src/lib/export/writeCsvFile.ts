import { randomBytes } from "node:crypto";
import { rename, rm, writeFile } from "node:fs/promises";
import { ExportError, errorMessage } from "../errors";
import { exportLog } from "../logger";
import type { SeriesRecord } from "../types";
import { toCSV, type CsvOptions } from "./recordsCsv";

/**
 * Write records as a CSV file. The text goes to a temporary file beside the
 * target which is then renamed over it, so the target is either fully
 * replaced or left as it was.
 */
export async function writeCsvFile(
  path: string,
  records: readonly SeriesRecord[],
  options: CsvOptions = {},
): Promise<void> {
  const text = `${toCSV(records, options)}\n`;
  const tempPath = `${path}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;

  try {
    await writeFile(tempPath, text, { encoding: "utf8", flag: "wx" });
    await rename(tempPath, path);
  } catch (error) {
    try {
      await rm(tempPath, { force: true });
    } catch (cleanupError) {
      exportLog.warn(
        `Could not remove temporary file ${tempPath}:`,
        errorMessage(cleanupError),
      );
    }
    exportLog.error(`Failed to save CSV to ${path}:`, errorMessage(error));
    throw new ExportError(
      "WriteError",
      `Failed to save CSV to ${path}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  exportLog.info(`Saved ${records.length} records to ${path}`);
}
