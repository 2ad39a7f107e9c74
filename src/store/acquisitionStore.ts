/**
 * Acquisition Store - the surface a shell (GUI, CLI) drives.
 *
 * Owns the Link, Sampler, SeriesStore and calibration store for one logger
 * and mirrors their status into zustand state. Records stay in the
 * SeriesStore; state only carries the count and the latest record.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import { Sampler, type Clock, type StartOptions, type StopReason } from "../lib/acquisition/Sampler";
import { SeriesStore, type SessionStats } from "../lib/acquisition/SeriesStore";
import { DEFAULT_ACQUISITION_CONFIG, type AcquisitionConfig } from "../lib/config";
import type { ConnectionStatus, Link, PortDescriptor } from "../lib/connection/ILink";
import { SerialLink } from "../lib/connection/SerialLink";
import { listSerialPorts } from "../lib/connection/serialDevice";
import { ExportError, errorMessage } from "../lib/errors";
import { toClipboardText } from "../lib/export/recordsCsv";
import { writeCsvFile } from "../lib/export/writeCsvFile";
import { sessionLog } from "../lib/logger";
import type { CalibrationSide, Channel, SeriesRecord } from "../lib/types";
import { createCalibrationStore, type CalibrationStore } from "./calibrationStore";

export interface AcquisitionDeps {
  config?: AcquisitionConfig;
  link?: Link;
  calibration?: CalibrationStore;
  series?: SeriesStore;
  clock?: Clock;
  listPorts?: () => Promise<PortDescriptor[]>;
}

export interface AcquisitionState {
  connection: { status: ConnectionStatus; port: string | null };
  running: boolean;
  rateHz: number;
  stopReason: StopReason | null;
  recordCount: number;
  latest: SeriesRecord | null;
  lastError: string | null;
  calibration: Record<Channel, boolean>;

  // Connection
  listPorts: () => Promise<PortDescriptor[]>;
  open: (portPath: string) => Promise<void>;
  close: () => Promise<void>;

  // Acquisition
  start: (rateHz?: number, options?: StartOptions) => void;
  stop: () => Promise<void>;

  // Calibration
  recordPoint: (
    channel: Channel,
    side: CalibrationSide,
    referenceValue: number,
    measuredVoltage: number,
  ) => void;
  capturePoint: (
    channel: Channel,
    side: CalibrationSide,
    referenceValue: number,
  ) => Promise<number>;
  isComplete: (channel: Channel) => boolean;
  describeCalibration: (channel: Channel) => string;

  // Data
  snapshot: () => readonly SeriesRecord[];
  plotWindow: () => readonly SeriesRecord[];
  stats: () => SessionStats;
  exportTo: (path: string) => Promise<void>;
  copyText: () => string;
  clearError: () => void;
}

export type AcquisitionStore = StoreApi<AcquisitionState>;

function completeness(calibration: CalibrationStore): Record<Channel, boolean> {
  const { isComplete } = calibration.getState();
  return {
    pressure: isComplete("pressure"),
    displacement: isComplete("displacement"),
  };
}

export function createAcquisitionStore(
  deps: AcquisitionDeps = {},
): AcquisitionStore {
  const config = deps.config ?? { ...DEFAULT_ACQUISITION_CONFIG };
  const link =
    deps.link ??
    new SerialLink({
      baudRate: config.baudRate,
      readTimeoutMs: config.readTimeoutMs,
    });
  const calibration = deps.calibration ?? createCalibrationStore();
  const series = deps.series ?? new SeriesStore();
  const sampler = new Sampler({
    link,
    calibration,
    series,
    clock: deps.clock,
    maxRateHz: config.maxRateHz,
    retryOnTimeout: config.retryOnTimeout,
  });
  const listPorts = deps.listPorts ?? listSerialPorts;

  const store = createStore<AcquisitionState>()((set, get) => {
    // Record the message for display, then rethrow to the caller.
    const fail = (error: unknown): never => {
      set({ lastError: errorMessage(error) });
      throw error;
    };

    const requireRecords = (action: string): readonly SeriesRecord[] => {
      const records = series.snapshot();
      if (records.length === 0) {
        fail(new ExportError("NoData", `No data to ${action}`));
      }
      return records;
    };

    return {
      connection: { status: link.status, port: link.getPortPath() ?? null },
      running: false,
      rateHz: config.defaultRateHz,
      stopReason: null,
      recordCount: series.size,
      latest: series.last() ?? null,
      lastError: null,
      calibration: completeness(calibration),

      listPorts: async () => {
        try {
          return await listPorts();
        } catch (error) {
          return fail(error);
        }
      },

      open: async (portPath) => {
        try {
          await link.open(portPath);
          set({ lastError: null });
        } catch (error) {
          fail(error);
        }
      },

      close: async () => {
        await sampler.stop();
        await link.close();
      },

      start: (rateHz = get().rateHz, options) => {
        try {
          sampler.start(rateHz, options);
          set({ rateHz, lastError: null, stopReason: null });
        } catch (error) {
          fail(error);
        }
      },

      stop: () => sampler.stop(),

      recordPoint: (channel, side, referenceValue, measuredVoltage) => {
        try {
          calibration
            .getState()
            .recordPoint(channel, side, referenceValue, measuredVoltage);
        } catch (error) {
          fail(error);
        }
      },

      capturePoint: async (channel, side, referenceValue) => {
        try {
          const voltage = await link.readVoltage(channel);
          calibration.getState().recordPoint(channel, side, referenceValue, voltage);
          return voltage;
        } catch (error) {
          return fail(error);
        }
      },

      isComplete: (channel) => calibration.getState().isComplete(channel),

      describeCalibration: (channel) => calibration.getState().describe(channel),

      snapshot: () => series.snapshot(),

      plotWindow: () => series.tail(config.plotWindow),

      stats: () => series.stats(),

      exportTo: async (path) => {
        const records = requireRecords("save");
        try {
          await writeCsvFile(path, records, { decimals: config.csvDecimals });
        } catch (error) {
          fail(error);
        }
      },

      copyText: () =>
        toClipboardText(requireRecords("copy"), { decimals: config.csvDecimals }),

      clearError: () => set({ lastError: null }),
    };
  });

  link.onStatus((status) => {
    store.setState({
      connection: { status, port: link.getPortPath() ?? null },
    });
    if (status === "error") {
      store.setState({ lastError: "Serial connection lost" });
    }
  });

  sampler.onStateChange((state, reason) => {
    store.setState({
      running: state === "running",
      stopReason: reason ?? null,
    });
    if (reason === "link-lost" || reason === "failed") {
      sessionLog.warn(`Acquisition stopped: ${reason}`);
    }
  });

  series.subscribe({
    onRecord: (record) => {
      store.setState({ recordCount: series.size, latest: record });
    },
    onClear: () => {
      store.setState({ recordCount: 0, latest: null });
    },
  });

  calibration.subscribe(() => {
    store.setState({ calibration: completeness(calibration) });
  });

  return store;
}
