/**
 * MIDI sink that forwards channel messages over OSC/UDP.
 *
 * Formats:
 *   pd:   Pure Data [netreceive -u -b] bridge addresses:
 *          /pd/note <note> <velocity> <channel>  (note-off as velocity 0)
 *          /pd/cc <cc> <value> <channel>
 *   midi: /midi with a single OSC "m" argument [0, status, data1, data2]
 */

import { encodeOscMessage, type OscMessage } from "../network/osc-encoder.js";
import { UdpSender, type UdpSendOptions } from "../network/udp-sender.js";
import { toBytes, type MidiEvent } from "./messages.js";
import type { MidiSink } from "./sink.js";

export type OscMidiFormat = "pd" | "midi";

export interface OscMidiSinkOptions extends UdpSendOptions {
  format: OscMidiFormat;
  log?: (message: string) => void;
}

/** Map a MIDI event to the OSC message for the given format. */
export function toOscMessage(event: MidiEvent, format: OscMidiFormat): OscMessage {
  if (format === "midi") {
    const [status, data1, data2] = toBytes(event);
    return { address: "/midi", args: [{ type: "m", value: [0, status, data1, data2] }] };
  }
  switch (event.type) {
    case "noteon":
      return {
        address: "/pd/note",
        args: [
          { type: "i", value: event.note },
          { type: "i", value: event.velocity },
          { type: "i", value: event.channel },
        ],
      };
    case "noteoff":
      return {
        address: "/pd/note",
        args: [
          { type: "i", value: event.note },
          { type: "i", value: 0 },
          { type: "i", value: event.channel },
        ],
      };
    case "cc":
      return {
        address: "/pd/cc",
        args: [
          { type: "i", value: event.controller },
          { type: "i", value: event.value },
          { type: "i", value: event.channel },
        ],
      };
  }
}

export class OscMidiSink implements MidiSink {
  private readonly sender: UdpSender;
  private readonly format: OscMidiFormat;
  private readonly log: (message: string) => void;
  private failures = 0;

  constructor(options: OscMidiSinkOptions) {
    this.sender = new UdpSender({ host: options.host, port: options.port });
    this.format = options.format;
    this.log = options.log ?? ((message) => console.error(message));
  }

  get ready(): boolean {
    return this.sender.ready;
  }

  /** Socket errors and failed sends since the sink was opened. */
  get errorCount(): number {
    return this.failures;
  }

  open(): void {
    this.failures = 0;
    this.sender.open((err) => {
      this.failures++;
      this.log(`[osc-sink] socket error, sink closed: ${err.message}`);
    });
  }

  close(): void {
    this.sender.close();
  }

  send(event: MidiEvent): void {
    if (!this.sender.ready) return;
    const buf = encodeOscMessage(toOscMessage(event, this.format));
    this.sender.send(buf).catch((err: unknown) => {
      this.failures++;
      const msg = err instanceof Error ? err.message : String(err);
      this.log(`[osc-sink] send to ${this.sender.target} failed: ${msg}`);
    });
  }
}
