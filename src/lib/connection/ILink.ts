import type { Channel } from "../types";

export type ConnectionStatus =
  | "disconnected"
  | "connecting"
  | "connected"
  | "error";

export interface PortDescriptor {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  vendorId?: string;
  productId?: string;
}

/**
 * Byte-oriented request/response connection to the microcontroller.
 *
 * No retries happen here: a timed-out or malformed read is reported to the
 * caller so that timing jitter stays visible to the Sampler.
 */
export interface Link {
  readonly status: ConnectionStatus;

  /** Rejects with LinkError PortUnavailable / AlreadyOpen. */
  open(portPath: string): Promise<void>;
  /** Idempotent. */
  close(): Promise<void>;
  isOpen(): boolean;
  getPortPath(): string | undefined;

  /** Rejects with LinkError NotOpen / Timeout / MalformedResponse. */
  readVoltage(channel: Channel): Promise<number>;

  onStatus(callback: (status: ConnectionStatus) => void): () => void;
}
