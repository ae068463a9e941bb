/**
 * Mode switcher — cycles DAW modes from the designated special input
 * and routes every other special input to the control path.
 */

import type { LogicalInput, ModeSwitchInput } from "../devices/types.js";
import type { ModeRegistry } from "../modes/registry.js";
import type { ActiveModeState, ModeId } from "../modes/types.js";
import { noteOff, type ControlChangeEvent, type MidiEvent } from "../midi/messages.js";
import type { Transition } from "./edge-detector.js";
import type { HeldNotes } from "./held-notes.js";
import type { Translator } from "./translator.js";

export interface ModeSwitchContext {
  registry: ModeRegistry;
  /** Session-owned; mutated in place. */
  state: ActiveModeState;
  held: HeldNotes;
  translator: Translator;
  emit: (event: MidiEvent) => void;
  log: (message: string) => void;
}

export type SpecialInputOutcome =
  | { type: "mode-switch"; from: ActiveModeState; to: ActiveModeState; flushed: number[] }
  | { type: "control"; event: ControlChangeEvent | undefined }
  | { type: "none" };

export class ModeSwitcher {
  constructor(
    private readonly context: ModeSwitchContext,
    private designator: ModeSwitchInput = "ps",
  ) {}

  get switchInput(): ModeSwitchInput {
    return this.designator;
  }

  set switchInput(input: ModeSwitchInput) {
    this.designator = input;
  }

  onSpecialInput(input: LogicalInput, transition: Transition): SpecialInputOutcome {
    if (input === this.designator) {
      if (transition.type !== "pressed") return { type: "none" };
      const from = { ...this.context.state };
      const flushed = this.switchTo(this.context.registry.next(from.mode));
      return { type: "mode-switch", from, to: { ...this.context.state }, flushed };
    }

    if (transition.type === "none") return { type: "none" };
    const event = this.context.translator.translateControl(
      input,
      transition.type === "pressed",
      this.context.state,
    );
    if (event) this.context.emit(event);
    return { type: "control", event };
  }

  /**
   * Flush held notes, then make `mode` active.
   * Returns the notes that were turned off.
   */
  switchTo(mode: ModeId, variant = this.context.registry.defaultVariant(mode)): number[] {
    // Validates before anything is flushed.
    this.context.registry.getVariant(mode, variant);
    const flushed = this.flush();
    this.context.state.mode = mode;
    this.context.state.variant = variant;
    return flushed;
  }

  /**
   * Note-off for every held note, then clear the set.
   * Returns the notes whose note-off went out; a failed note-off is logged
   * as an invariant violation and the note is still dropped from the set.
   */
  flush(): number[] {
    const { held, translator, emit, log } = this.context;
    const sent: number[] = [];
    for (const note of held.notes()) {
      try {
        emit(noteOff(translator.channel, note));
        sent.push(note);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        log(`[mode-switcher] invariant violation: note-off for ${note} not sent: ${msg}`);
      }
    }
    held.clear();
    return sent;
  }
}
