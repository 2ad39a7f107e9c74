import type { ConnectionStatus, Link } from "./ILink";
import { createNodeSerialDevice, type SerialDevice, type SerialDeviceFactory } from "./serialDevice";
import { DEFAULT_ACQUISITION_CONFIG } from "../config";
import { LinkError, errorMessage } from "../errors";
import { linkLog } from "../logger";
import { parseVoltageLine } from "../parsers/voltageParser";
import { CHANNEL_COMMANDS, type Channel } from "../types";

export interface SerialLinkOptions {
  baudRate?: number;
  readTimeoutMs?: number;
  deviceFactory?: SerialDeviceFactory;
}

interface PendingResponse {
  resolve: (line: string) => void;
  reject: (error: LinkError) => void;
}

/**
 * Serial link to the acquisition microcontroller.
 *
 * Protocol: write a single ASCII request byte ('a' pressure, 'b'
 * displacement), read back one text line holding the voltage. Exchanges are
 * serialised; input left over from an abandoned request is discarded before
 * the next one is sent.
 */
export class SerialLink implements Link {
  status: ConnectionStatus = "disconnected";

  private readonly baudRate: number;
  private readonly readTimeoutMs: number;
  private readonly deviceFactory: SerialDeviceFactory;

  private device: SerialDevice | null = null;
  private portPath: string | undefined;
  private isOpening = false;
  private pending: PendingResponse | null = null;
  private requestMutex: Promise<void> = Promise.resolve();

  private statusListeners = new Set<(status: ConnectionStatus) => void>();

  constructor(options: SerialLinkOptions = {}) {
    this.baudRate = options.baudRate ?? DEFAULT_ACQUISITION_CONFIG.baudRate;
    this.readTimeoutMs =
      options.readTimeoutMs ?? DEFAULT_ACQUISITION_CONFIG.readTimeoutMs;
    this.deviceFactory = options.deviceFactory ?? createNodeSerialDevice;
  }

  onStatus(callback: (status: ConnectionStatus) => void): () => void {
    this.statusListeners.add(callback);
    return () => {
      this.statusListeners.delete(callback);
    };
  }

  isOpen(): boolean {
    return this.device !== null;
  }

  getPortPath(): string | undefined {
    return this.portPath;
  }

  private setStatus(status: ConnectionStatus) {
    if (this.status === status) return;
    this.status = status;
    for (const listener of this.statusListeners) listener(status);
  }

  async open(portPath: string): Promise<void> {
    if (this.device || this.isOpening) {
      throw new LinkError(
        "AlreadyOpen",
        `Link already open on ${this.portPath ?? "a port being opened"}`,
      );
    }

    const previousStatus = this.status;
    this.isOpening = true;
    this.setStatus("connecting");

    let device: SerialDevice;
    try {
      device = this.deviceFactory(portPath, this.baudRate);
      await device.open();
    } catch (error) {
      this.isOpening = false;
      this.setStatus(previousStatus === "error" ? "error" : "disconnected");
      linkLog.warn(`Failed to open ${portPath}:`, errorMessage(error));
      throw new LinkError(
        "PortUnavailable",
        `Failed to open ${portPath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    device.onLine((line) => this.handleLine(device, line));
    device.onClose((error) => this.handleDeviceClosed(device, error));

    this.device = device;
    this.portPath = portPath;
    this.isOpening = false;
    linkLog.info(`Connected to ${portPath} at ${this.baudRate} baud`);
    this.setStatus("connected");
  }

  async close(): Promise<void> {
    const device = this.device;
    if (!device) return;

    // Detach first so the device's own close event is not treated as a loss.
    this.device = null;
    this.failPending(new LinkError("NotOpen", "Link closed during read"));

    try {
      await device.close();
    } catch (error) {
      linkLog.warn("Serial port close error:", errorMessage(error));
    }

    linkLog.info(`Disconnected from ${this.portPath}`);
    this.portPath = undefined;
    this.setStatus("disconnected");
  }

  readVoltage(channel: Channel): Promise<number> {
    const run = this.requestMutex.then(() => this.exchange(channel));
    this.requestMutex = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async exchange(channel: Channel): Promise<number> {
    const device = this.device;
    if (!device) {
      throw new LinkError("NotOpen", "Serial port not connected");
    }

    try {
      await device.flushInput();
    } catch (error) {
      linkLog.debug("Input flush failed:", errorMessage(error));
    }
    if (this.device !== device) {
      throw new LinkError("NotOpen", "Serial port closed before request");
    }

    const response = new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(
          new LinkError(
            "Timeout",
            `No response to '${CHANNEL_COMMANDS[channel]}' within ${this.readTimeoutMs} ms`,
          ),
        );
      }, this.readTimeoutMs);

      this.pending = {
        resolve: (line) => {
          clearTimeout(timer);
          this.pending = null;
          resolve(line);
        },
        reject: (error) => {
          clearTimeout(timer);
          this.pending = null;
          reject(error);
        },
      };
    });

    const written = device
      .write(CHANNEL_COMMANDS[channel])
      .catch((error: unknown) => {
        const failure = new LinkError(
          "NotOpen",
          `Write failed: ${errorMessage(error)}`,
          { cause: error },
        );
        this.failPending(failure);
        throw failure;
      });

    // Both settle handlers attach now; the reply may time out mid-write.
    const [, line] = await Promise.all([written, response]);
    return parseVoltageLine(line);
  }

  private failPending(error: LinkError) {
    this.pending?.reject(error);
  }

  private handleLine(device: SerialDevice, line: string) {
    if (device !== this.device) return;
    if (!this.pending) {
      linkLog.debug(`Discarding unsolicited line "${line.trim()}"`);
      return;
    }
    this.pending.resolve(line);
  }

  private handleDeviceClosed(device: SerialDevice, error: Error | null) {
    if (device !== this.device) return;

    this.device = null;
    this.failPending(new LinkError("NotOpen", "Serial port closed unexpectedly"));
    linkLog.warn(
      `Lost connection to ${this.portPath}`,
      error ? errorMessage(error) : "",
    );
    this.portPath = undefined;
    // A faulted close (unplug, I/O error) is "error"; a clean one is not.
    this.setStatus(error ? "error" : "disconnected");
  }
}
