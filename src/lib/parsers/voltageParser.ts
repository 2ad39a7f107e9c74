import { LinkError } from "../errors";

// Plain decimal or exponent notation; no hex, no "Infinity", no units.
// An exponent can still overflow to Infinity, so the value is checked too.
const NUMERIC_LINE = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Parse one response line from the microcontroller as a voltage.
 * Surrounding whitespace (including a stray `\r`) is ignored.
 */
export function parseVoltageLine(line: string): number {
  const text = line.trim();
  if (!text) {
    throw new LinkError("MalformedResponse", "Empty response");
  }
  if (!NUMERIC_LINE.test(text)) {
    throw new LinkError(
      "MalformedResponse",
      `Unrecognised response "${text.slice(0, 32)}"`,
    );
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new LinkError(
      "MalformedResponse",
      `Voltage out of range "${text.slice(0, 32)}"`,
    );
  }
  return value;
}
