/**
 * Translator — input transitions to MIDI events for the active mode.
 */

import type { LogicalInput } from "../devices/types.js";
import type { ModeRegistry } from "../modes/registry.js";
import type { ActiveModeState } from "../modes/types.js";
import {
  controlChange,
  noteOff,
  noteOn,
  type ControlChangeEvent,
  type NoteOffEvent,
  type NoteOnEvent,
} from "../midi/messages.js";
import type { Transition } from "./edge-detector.js";
import type { HeldNotes } from "./held-notes.js";

/** CC value sent when a special input is pressed. */
export const CONTROL_ON_VALUE = 127;

export class Translator {
  constructor(
    private readonly registry: ModeRegistry,
    private readonly held: HeldNotes,
  ) {}

  get channel(): number {
    return this.registry.channel;
  }

  /**
   * Note path.
   *
   * A press looks the input up in the mode's NoteMap and registers the
   * note as held. A release ends whatever note the press registered,
   * so a mode change mid-hold cannot produce a note-off for the wrong note.
   */
  translate(
    input: LogicalInput,
    transition: Transition,
    state: ActiveModeState,
  ): NoteOnEvent | NoteOffEvent | undefined {
    switch (transition.type) {
      case "none":
        return undefined;
      case "pressed": {
        const note = this.registry.noteFor(state, input);
        if (note === undefined) return undefined;
        this.held.register(input, note);
        return noteOn(this.channel, note, transition.velocity);
      }
      case "released": {
        const note = this.held.release(input);
        if (note === undefined) return undefined;
        return noteOff(this.channel, note);
      }
    }
  }

  /** Special-input path. Only presses produce control changes. */
  translateControl(
    input: LogicalInput,
    pressed: boolean,
    state: ActiveModeState,
  ): ControlChangeEvent | undefined {
    if (!pressed) return undefined;
    const binding = this.registry.controlFor(state, input);
    if (!binding) return undefined;
    return controlChange(this.channel, binding.cc, CONTROL_ON_VALUE);
  }
}
