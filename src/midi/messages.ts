/**
 * MIDI channel messages emitted by the translator.
 *
 * Channels are 1-based (1-16) as shown to users; the status byte
 * carries channel - 1.
 */

export interface NoteOnEvent {
  type: "noteon";
  channel: number;
  note: number;
  velocity: number;
}

export interface NoteOffEvent {
  type: "noteoff";
  channel: number;
  note: number;
}

export interface ControlChangeEvent {
  type: "cc";
  channel: number;
  controller: number;
  value: number;
}

export type MidiEvent = NoteOnEvent | NoteOffEvent | ControlChangeEvent;

const clamp7 = (n: number): number => Math.max(0, Math.min(127, Math.round(n)));
const clampChannel = (n: number): number => Math.max(1, Math.min(16, Math.round(n)));

export function noteOn(channel: number, note: number, velocity: number): NoteOnEvent {
  return { type: "noteon", channel: clampChannel(channel), note: clamp7(note), velocity: clamp7(velocity) };
}

export function noteOff(channel: number, note: number): NoteOffEvent {
  return { type: "noteoff", channel: clampChannel(channel), note: clamp7(note) };
}

export function controlChange(channel: number, controller: number, value: number): ControlChangeEvent {
  return { type: "cc", channel: clampChannel(channel), controller: clamp7(controller), value: clamp7(value) };
}

/** Encode as a 3-byte MIDI message. Note-off is sent as 0x8n with velocity 0. */
export function toBytes(event: MidiEvent): [number, number, number] {
  const ch = event.channel - 1;
  switch (event.type) {
    case "noteon":
      return [0x90 | ch, event.note, event.velocity];
    case "noteoff":
      return [0x80 | ch, event.note, 0];
    case "cc":
      return [0xb0 | ch, event.controller, event.value];
  }
}

/** Short text for status displays: "Note 36 on (velocity 127)". */
export function describeMidiEvent(event: MidiEvent): string {
  switch (event.type) {
    case "noteon":
      return `Note ${event.note} on (velocity ${event.velocity})`;
    case "noteoff":
      return `Note ${event.note} off`;
    case "cc":
      return `CC ${event.controller} = ${event.value}`;
  }
}
