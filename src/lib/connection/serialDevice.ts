/**
 * Node serial device adapter.
 *
 * Wraps a `serialport` SerialPort and its ReadlineParser behind a small
 * promise-based surface so SerialLink can be exercised with an in-process
 * fake instead of real hardware.
 */

import { ReadlineParser, SerialPort } from "serialport";
import { linkLog } from "../logger";
import type { PortDescriptor } from "./ILink";

export interface SerialDevice {
  open(): Promise<void>;
  close(): Promise<void>;
  /** Resolves once the bytes have been handed to the OS (write + drain). */
  write(data: string): Promise<void>;
  /** Discard unread input, like resetting the input buffer. */
  flushInput(): Promise<void>;
  onLine(callback: (line: string) => void): void;
  /**
   * Fires once when the port closes or its stream fails (unplug, I/O
   * error); the error is set unless the close was clean.
   */
  onClose(callback: (error: Error | null) => void): void;
}

export type SerialDeviceFactory = (path: string, baudRate: number) => SerialDevice;

type ErrorCallback = (error: Error | null | undefined) => void;

function settle(
  resolve: () => void,
  reject: (error: Error) => void,
): ErrorCallback {
  return (error) => {
    if (error) {
      reject(error);
    } else {
      resolve();
    }
  };
}

export const createNodeSerialDevice: SerialDeviceFactory = (path, baudRate) => {
  // 8N1, line-terminated ASCII responses
  const port = new SerialPort({
    path,
    baudRate,
    dataBits: 8,
    stopBits: 1,
    parity: "none",
    autoOpen: false,
  });
  const parser = port.pipe(new ReadlineParser({ delimiter: "\n" }));

  const closeListeners: ((error: Error | null) => void)[] = [];
  let lost = false;

  // Reported once per device: an unlistened 'error' would crash the process.
  const reportLoss = (error: Error | null) => {
    if (lost) return;
    lost = true;
    for (const listener of closeListeners) listener(error);
  };

  const handleStreamError = (error: Error) => {
    linkLog.warn(`Serial stream error on ${path}:`, error.message);
    reportLoss(error);
    if (port.isOpen) {
      port.close((closeError) => {
        if (closeError) {
          linkLog.warn("Close after stream error failed:", closeError.message);
        }
      });
    }
  };

  port.on("error", handleStreamError);
  parser.on("error", handleStreamError);
  port.on("close", (error?: Error | null) => reportLoss(error ?? null));

  return {
    open: () =>
      new Promise<void>((resolve, reject) => {
        port.open(settle(resolve, reject));
      }),

    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!port.isOpen) {
          resolve();
          return;
        }
        port.close(settle(resolve, reject));
      }),

    write: (data) =>
      new Promise<void>((resolve, reject) => {
        port.write(data, (error) => {
          if (error) {
            reject(error);
            return;
          }
          port.drain(settle(resolve, reject));
        });
      }),

    flushInput: () =>
      new Promise<void>((resolve, reject) => {
        port.flush(settle(resolve, reject));
      }),

    onLine: (callback) => {
      parser.on("data", (line: string) => callback(line));
    },

    onClose: (callback) => {
      closeListeners.push(callback);
    },
  };
};

/** Serial devices currently visible to the OS, for the port chooser. */
export async function listSerialPorts(): Promise<PortDescriptor[]> {
  const ports = await SerialPort.list();
  return ports.map((port) => ({
    path: port.path,
    manufacturer: port.manufacturer,
    serialNumber: port.serialNumber,
    vendorId: port.vendorId,
    productId: port.productId,
  }));
}
