/**
 * Downstream MIDI sink contract.
 */

import type { MidiEvent } from "./messages.js";

export interface MidiSink {
  /** False while the transport is down; sends are dropped. */
  readonly ready: boolean;
  /** Fire-and-forget. Must not throw. */
  send(event: MidiEvent): void;
}
