/**
 * Mode registry — cyclic mode order, variants, and table lookups.
 */

import type { LogicalInput } from "../devices/types.js";
import { loadModeTables } from "./tables.js";
import {
  MODE_IDS,
  type ActiveModeState,
  type ControlBinding,
  type ModeDef,
  type ModeId,
  type ModeTables,
  type VariantDef,
} from "./types.js";

export class ModeRegistry {
  /** MIDI channel (1-16) shared by every mode. */
  readonly channel: number;
  private readonly modes = new Map<ModeId, ModeDef>();

  constructor(tables: ModeTables) {
    this.channel = tables.channel;
    for (const mode of tables.modes) {
      this.modes.set(mode.id, mode);
    }
  }

  /** Modes in cycle order. */
  list(): ModeDef[] {
    return MODE_IDS.map((id) => this.get(id));
  }

  get(id: ModeId): ModeDef {
    const mode = this.modes.get(id);
    if (!mode) {
      throw new Error(
        `Unknown mode "${id}". Available modes: ${[...this.modes.keys()].join(", ")}`,
      );
    }
    return mode;
  }

  /** The mode after `id`, wrapping to the first. */
  next(id: ModeId): ModeId {
    const index = MODE_IDS.indexOf(id);
    return MODE_IDS[(index + 1) % MODE_IDS.length];
  }

  defaultVariant(id: ModeId): string {
    return this.get(id).variants[0].id;
  }

  hasVariant(id: ModeId, variant: string): boolean {
    return this.get(id).variants.some((v) => v.id === variant);
  }

  getVariant(id: ModeId, variant: string): VariantDef {
    const mode = this.get(id);
    const found = mode.variants.find((v) => v.id === variant);
    if (!found) {
      throw new Error(
        `Unknown variant "${variant}" for mode "${id}". ` +
          `Available variants: ${mode.variants.map((v) => v.id).join(", ")}`,
      );
    }
    return found;
  }

  /** Initial state for a mode: the mode plus its default variant. */
  initialState(id: ModeId): ActiveModeState {
    return { mode: id, variant: this.defaultVariant(id) };
  }

  /** NoteMap lookup. Undefined when the input is unmapped in this mode. */
  noteFor(state: ActiveModeState, input: LogicalInput): number | undefined {
    return this.get(state.mode).notes[input];
  }

  /** ControlMap lookup for the active variant. */
  controlFor(state: ActiveModeState, input: LogicalInput): ControlBinding | undefined {
    const variant = this.get(state.mode).variants.find((v) => v.id === state.variant);
    return variant?.controls[input];
  }
}

let defaultRegistry: ModeRegistry | undefined;

/** Registry over the bundled tables, loaded on first use. */
export function getModeRegistry(): ModeRegistry {
  defaultRegistry ??= new ModeRegistry(loadModeTables());
  return defaultRegistry;
}
