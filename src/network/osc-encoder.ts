/**
 * OSC (Open Sound Control) 1.0 message encoder.
 *
 *   - Address: null-terminated, padded to a 4-byte boundary
 *   - Type tags: "," + one char per arg, padded to a 4-byte boundary
 *   - i: int32 BE, f: float32 BE, s: padded string,
 *     m: 4-byte MIDI message (port id, status, data1, data2)
 */

export type OscArg =
  | { type: "i"; value: number }
  | { type: "f"; value: number }
  | { type: "s"; value: string }
  | { type: "m"; value: [number, number, number, number] };

export interface OscMessage {
  address: string;
  args: OscArg[];
}

function padded(raw: Buffer): Buffer {
  const remainder = raw.length % 4;
  return remainder === 0 ? raw : Buffer.concat([raw, Buffer.alloc(4 - remainder)]);
}

function oscString(s: string): Buffer {
  return padded(Buffer.from(s + "\0", "utf-8"));
}

function encodeArg(arg: OscArg): Buffer {
  const buf = Buffer.alloc(4);
  switch (arg.type) {
    case "i":
      buf.writeInt32BE(arg.value, 0);
      return buf;
    case "f":
      buf.writeFloatBE(arg.value, 0);
      return buf;
    case "s":
      return oscString(arg.value);
    case "m":
      arg.value.forEach((byte, i) => buf.writeUInt8(byte & 0xff, i));
      return buf;
  }
}

/**
 * Encode an OSC message.
 *
 * @throws If the address doesn't start with `/`
 */
export function encodeOscMessage(message: OscMessage): Buffer {
  if (!message.address.startsWith("/")) {
    throw new Error(`OSC address must start with "/", got: "${message.address}"`);
  }
  const tags = "," + message.args.map((a) => a.type).join("");
  return Buffer.concat([
    oscString(message.address),
    oscString(tags),
    ...message.args.map(encodeArg),
  ]);
}
