import { describe, it, expect, afterEach, vi } from "vitest";
import dgram from "node:dgram";
import { EventEmitter } from "node:events";

import { controlChange, noteOff, noteOn } from "../../src/midi/messages.js";
import { OscMidiSink, toOscMessage } from "../../src/midi/osc-sink.js";

describe("toOscMessage", () => {
  it("maps note-on to /pd/note note velocity channel", () => {
    expect(toOscMessage(noteOn(10, 36, 127), "pd")).toEqual({
      address: "/pd/note",
      args: [
        { type: "i", value: 36 },
        { type: "i", value: 127 },
        { type: "i", value: 10 },
      ],
    });
  });

  it("maps note-off to /pd/note with velocity 0", () => {
    expect(toOscMessage(noteOff(10, 36), "pd").args).toEqual([
      { type: "i", value: 36 },
      { type: "i", value: 0 },
      { type: "i", value: 10 },
    ]);
  });

  it("maps control change to /pd/cc", () => {
    expect(toOscMessage(controlChange(10, 106, 127), "pd")).toEqual({
      address: "/pd/cc",
      args: [
        { type: "i", value: 106 },
        { type: "i", value: 127 },
        { type: "i", value: 10 },
      ],
    });
  });

  it("packs raw bytes into an OSC MIDI argument for the midi format", () => {
    expect(toOscMessage(noteOn(10, 36, 100), "midi")).toEqual({
      address: "/midi",
      args: [{ type: "m", value: [0, 0x99, 36, 100] }],
    });
  });
});

describe("OscMidiSink", () => {
  const sockets: dgram.Socket[] = [];
  const sinks: OscMidiSink[] = [];

  afterEach(() => {
    for (const s of sinks) s.close();
    for (const s of sockets) s.close();
    sinks.length = 0;
    sockets.length = 0;
  });

  /** Start a mock UDP server on a random port. Returns port and received buffers. */
  function startUdpServer(): Promise<{ port: number; received: Buffer[] }> {
    return new Promise((resolve) => {
      const received: Buffer[] = [];
      const server = dgram.createSocket("udp4");
      sockets.push(server);
      server.on("message", (msg) => received.push(Buffer.from(msg)));
      server.bind(0, "127.0.0.1", () => resolve({ port: server.address().port, received }));
    });
  }

  it("is not ready until opened", () => {
    const sink = new OscMidiSink({ host: "127.0.0.1", port: 9000, format: "pd" });
    expect(sink.ready).toBe(false);
    // Dropped, not thrown.
    sink.send(noteOn(10, 36, 127));
    expect(sink.errorCount).toBe(0);
  });

  it("delivers /pd/note to a UDP listener", async () => {
    const { port, received } = await startUdpServer();
    const sink = new OscMidiSink({ host: "127.0.0.1", port, format: "pd", log: () => {} });
    sinks.push(sink);
    sink.open();
    expect(sink.ready).toBe(true);

    sink.send(noteOn(10, 36, 127));
    await new Promise((r) => setTimeout(r, 100));

    expect(received.length).toBe(1);
    const buf = received[0];
    // "/pd/note" (8 + null, padded to 12), ",iii" (4 + null, padded to 8)
    expect(buf.subarray(0, 8).toString("utf-8")).toBe("/pd/note");
    expect(buf.subarray(12, 16).toString("utf-8")).toBe(",iii");
    expect(buf.readInt32BE(20)).toBe(36);
    expect(buf.readInt32BE(24)).toBe(127);
    expect(buf.readInt32BE(28)).toBe(10);
  });

  it("delivers raw MIDI bytes in the midi format", async () => {
    const { port, received } = await startUdpServer();
    const sink = new OscMidiSink({ host: "127.0.0.1", port, format: "midi", log: () => {} });
    sinks.push(sink);
    sink.open();

    sink.send(controlChange(10, 106, 127));
    await new Promise((r) => setTimeout(r, 100));

    expect(received.length).toBe(1);
    // "/midi" (5 + null, padded to 8), ",m" (2 + null, padded to 4), then 4 bytes
    expect([...received[0].subarray(12, 16)]).toEqual([0, 0xb9, 106, 127]);
  });

  it("stops sending after close", async () => {
    const { port, received } = await startUdpServer();
    const sink = new OscMidiSink({ host: "127.0.0.1", port, format: "pd", log: () => {} });
    sink.open();
    sink.close();
    expect(sink.ready).toBe(false);

    sink.send(noteOn(10, 36, 127));
    await new Promise((r) => setTimeout(r, 50));
    expect(received).toEqual([]);
  });

  it("counts a socket error and stops being ready", () => {
    const fakeSocket = Object.assign(new EventEmitter(), { close: vi.fn(), send: vi.fn() });
    const spy = vi
      .spyOn(dgram, "createSocket")
      .mockReturnValue(fakeSocket as unknown as dgram.Socket);
    try {
      const logs: string[] = [];
      const sink = new OscMidiSink({
        host: "127.0.0.1",
        port: 9000,
        format: "pd",
        log: (m) => logs.push(m),
      });
      sink.open();
      fakeSocket.emit("error", new Error("network down"));

      expect(sink.ready).toBe(false);
      expect(sink.errorCount).toBe(1);
      expect(logs).toEqual(["[osc-sink] socket error, sink closed: network down"]);
    } finally {
      spy.mockRestore();
    }
  });

  it("counts a failed send and stays ready", async () => {
    const fakeSocket = Object.assign(new EventEmitter(), {
      close: vi.fn(),
      send: vi.fn(
        (_buf: Buffer, _offset: number, _length: number, _port: number, _host: string,
          callback: (err: Error | null) => void) => callback(new Error("no route")),
      ),
    });
    const spy = vi
      .spyOn(dgram, "createSocket")
      .mockReturnValue(fakeSocket as unknown as dgram.Socket);
    try {
      const logs: string[] = [];
      const sink = new OscMidiSink({
        host: "127.0.0.1",
        port: 9000,
        format: "pd",
        log: (m) => logs.push(m),
      });
      sink.open();
      sink.send(noteOn(10, 36, 127));
      await new Promise((r) => setTimeout(r, 0));

      expect(sink.ready).toBe(true);
      expect(sink.errorCount).toBe(1);
      expect(logs).toEqual(["[osc-sink] send to 127.0.0.1:9000 failed: no route"]);
      sink.close();
    } finally {
      spy.mockRestore();
    }
  });
});
