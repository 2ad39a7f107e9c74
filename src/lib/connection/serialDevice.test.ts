import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SerialPortMock } from "serialport";
import { createNodeSerialDevice, listSerialPorts } from "./serialDevice";
import { SerialLink } from "./SerialLink";

const { createdPorts } = vi.hoisted(() => {
  const createdPorts: SerialPortMock[] = [];
  return { createdPorts };
});

// Run the adapter on serialport's in-process mock binding.
vi.mock("serialport", async (importOriginal) => {
  const actual = await importOriginal<typeof import("serialport")>();
  class RecordedSerialPort extends actual.SerialPortMock {
    constructor(...args: ConstructorParameters<typeof actual.SerialPortMock>) {
      super(...args);
      createdPorts.push(this);
    }
  }
  return { ...actual, SerialPort: RecordedSerialPort };
});

const PATH = "/dev/ttyMOCK0";

function bindingOf(port: SerialPortMock | undefined) {
  const binding = port?.port;
  if (!binding) throw new Error("Mock port is not open");
  return binding;
}

describe("createNodeSerialDevice", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    SerialPortMock.binding.createPort(PATH, { echo: false, record: true });
  });

  afterEach(() => {
    for (const port of createdPorts) {
      if (port.isOpen) port.close();
    }
    createdPorts.length = 0;
    SerialPortMock.binding.reset();
  });

  it("opens the port and writes bytes through drain", async () => {
    const device = createNodeSerialDevice(PATH, 9600);
    await device.open();

    const [port] = createdPorts;
    expect(port.isOpen).toBe(true);
    expect(port.baudRate).toBe(9600);

    await device.write("a");
    await device.write("b");
    expect(bindingOf(port).recording.toString()).toBe("ab");
  });

  it("rejects opening a port that does not exist", async () => {
    const device = createNodeSerialDevice("/dev/ttyMISSING", 9600);

    await expect(device.open()).rejects.toThrow(/does not exist/);
  });

  it("splits incoming text into lines on \\n", async () => {
    const device = createNodeSerialDevice(PATH, 9600);
    const lines: string[] = [];
    device.onLine((line) => lines.push(line));
    await device.open();

    bindingOf(createdPorts[0]).emitData("2.50\r\n1.125\n");

    await vi.waitFor(() => expect(lines).toEqual(["2.50\r", "1.125"]));
  });

  it("flushes input while open and rejects once closed", async () => {
    const device = createNodeSerialDevice(PATH, 9600);
    await device.open();

    await expect(device.flushInput()).resolves.toBeUndefined();

    await device.close();
    await expect(device.flushInput()).rejects.toThrow(/not open/);
  });

  it("closes idempotently and reports a clean close once", async () => {
    const device = createNodeSerialDevice(PATH, 9600);
    const closes: (Error | null)[] = [];
    device.onClose((error) => closes.push(error));
    await device.open();

    await device.close();
    await device.close();

    expect(createdPorts[0].isOpen).toBe(false);
    await vi.waitFor(() => expect(closes).toEqual([null]));
  });

  it("passes the error of an unexpected close", async () => {
    const device = createNodeSerialDevice(PATH, 9600);
    const closes: (Error | null)[] = [];
    device.onClose((error) => closes.push(error));
    await device.open();

    createdPorts[0].emit("close", new Error("Disconnected"));

    expect(closes).toHaveLength(1);
    expect(closes[0]?.message).toBe("Disconnected");
  });

  it("turns a stream error into a single loss report and closes the port", async () => {
    const device = createNodeSerialDevice(PATH, 9600);
    const closes: (Error | null)[] = [];
    device.onClose((error) => closes.push(error));
    await device.open();
    const [port] = createdPorts;

    port.emit("error", new Error("EIO"));

    expect(closes).toHaveLength(1);
    expect(closes[0]?.message).toBe("EIO");
    await vi.waitFor(() => expect(port.isOpen).toBe(false));
    expect(closes).toHaveLength(1);
  });

  it("lists the ports the OS reports", async () => {
    await expect(listSerialPorts()).resolves.toMatchObject([{ path: PATH }]);
  });

  describe("behind SerialLink", () => {
    it("reads a voltage from the reply line", async () => {
      const link = new SerialLink({ readTimeoutMs: 1000 });
      await link.open(PATH);
      const binding = bindingOf(createdPorts[0]);

      const read = link.readVoltage("pressure");
      await vi.waitFor(() => expect(binding.recording.toString()).toBe("a"));
      binding.emitData("2.5\r\n");

      await expect(read).resolves.toBe(2.5);
      await link.close();
    });

    it("survives an OS write failure and reports the link as lost", async () => {
      const link = new SerialLink({ readTimeoutMs: 1000 });
      await link.open(PATH);
      vi.spyOn(bindingOf(createdPorts[0]), "write").mockRejectedValue(
        new Error("EIO"),
      );

      await expect(link.readVoltage("pressure")).rejects.toMatchObject({
        code: "NotOpen",
      });
      await vi.waitFor(() => expect(link.status).toBe("error"));
      expect(link.isOpen()).toBe(false);
    });
  });
});
