/**
 * Prefix-scoped console logging for the acquisition core.
 *
 * Verbosity is read from the environment on every call:
 * - LOGGER_LEVEL=debug|info|warn|error sets the threshold outright
 * - otherwise development shows everything and production (NODE_ENV)
 *   only warnings and errors, unless LOGGER_DEBUG=1
 *
 * Usage:
 *   samplerLog.debug('pressure read timed out, retrying');
 *   samplerLog.warn('Tick overran by 2 slot(s) at 10 Hz');
 *   exportLog.error('Failed to save CSV to run.csv:', message);
 */

type Env = Record<string, string | undefined>;

const LEVELS = ["debug", "info", "warn", "error"] as const;

type LogLevel = (typeof LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function threshold(env: Env): LogLevel {
  const configured = env.LOGGER_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) return configured;
  const verbose = env.NODE_ENV !== "production" || env.LOGGER_DEBUG === "1";
  return verbose ? "debug" : "warn";
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  /** Always emitted, with an ISO timestamp. */
  error(message: string, ...args: unknown[]): void;
}

export function createLogger(prefix: string, env: Env = process.env): Logger {
  const enabled = (level: LogLevel) =>
    LEVELS.indexOf(level) >= LEVELS.indexOf(threshold(env));

  return {
    debug(message, ...args) {
      if (enabled("debug")) console.debug(`[${prefix}] ${message}`, ...args);
    },

    info(message, ...args) {
      if (enabled("info")) console.info(`[${prefix}] ${message}`, ...args);
    },

    warn(message, ...args) {
      if (enabled("warn")) console.warn(`[${prefix}] ${message}`, ...args);
    },

    error(message, ...args) {
      const ts = new Date().toISOString();
      console.error(`[${ts}] [${prefix}] ${message}`, ...args);
    },
  };
}

export const linkLog = createLogger("Link");
export const samplerLog = createLogger("Sampler");
export const calibLog = createLogger("Calib");
export const exportLog = createLogger("Export");
export const sessionLog = createLogger("Session");
