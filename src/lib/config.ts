/**
 * Acquisition configuration.
 *
 * Defaults match the microcontroller sketch (9600 baud, line-terminated
 * ASCII voltages). Each value can be overridden through the environment or
 * by passing overrides from the shell.
 */

export interface AcquisitionConfig {
  baudRate: number;
  readTimeoutMs: number;
  maxRateHz: number;
  defaultRateHz: number;
  /** Records kept in the live plot window */
  plotWindow: number;
  /** Fixed decimals in exported cells; null keeps full precision */
  csvDecimals: number | null;
  /** Extra attempts after a timed-out read inside one tick */
  retryOnTimeout: number;
}

export const DEFAULT_ACQUISITION_CONFIG = {
  baudRate: 9600,
  readTimeoutMs: 300,
  maxRateHz: 1000,
  defaultRateHz: 10,
  plotWindow: 2000,
  csvDecimals: null,
  retryOnTimeout: 1,
} as const satisfies AcquisitionConfig;

type EnvKey = Exclude<keyof AcquisitionConfig, "retryOnTimeout">;

const ENV_KEYS: [EnvKey, string, boolean][] = [
  ["baudRate", "LOGGER_BAUD_RATE", true],
  ["readTimeoutMs", "LOGGER_READ_TIMEOUT_MS", false],
  ["maxRateHz", "LOGGER_MAX_RATE_HZ", false],
  ["defaultRateHz", "LOGGER_DEFAULT_RATE_HZ", false],
  ["plotWindow", "LOGGER_PLOT_WINDOW", true],
  ["csvDecimals", "LOGGER_CSV_DECIMALS", true],
];

function parsePositive(name: string, raw: string, integer: boolean): number {
  const value = Number(raw.trim());
  if (!raw.trim() || !Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid ${name}: expected a positive number, got "${raw}"`);
  }
  if (integer && !Number.isInteger(value)) {
    throw new Error(`Invalid ${name}: expected an integer, got "${raw}"`);
  }
  return value;
}

export function loadAcquisitionConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<AcquisitionConfig> = {},
): AcquisitionConfig {
  const config: AcquisitionConfig = { ...DEFAULT_ACQUISITION_CONFIG };

  for (const [key, envName, integer] of ENV_KEYS) {
    const raw = env[envName];
    if (raw === undefined) continue;
    config[key] = parsePositive(envName, raw, integer);
  }

  const merged = { ...config, ...overrides };
  if (merged.defaultRateHz > merged.maxRateHz) {
    throw new Error(
      `Invalid configuration: default rate ${merged.defaultRateHz} Hz exceeds max rate ${merged.maxRateHz} Hz`,
    );
  }
  return merged;
}
