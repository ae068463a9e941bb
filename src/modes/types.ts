/**
 * DAW mode types: per-mode note maps and per-variant control maps.
 */

import type { LogicalInput } from "../devices/types.js";

/** Selectable modes, in the order the mode-switch input cycles through them. */
export const MODE_IDS = [
  "standard-drums",
  "pad-controller",
  "scene-launcher",
  "session-view",
  "sampler-rack",
] as const;

export type ModeId = (typeof MODE_IDS)[number];

/** A special input bound to a MIDI control change. */
export interface ControlBinding {
  /** CC number (0-127) */
  cc: number;
  /** What the CC does in the target application: "Pattern Next" */
  label: string;
}

/** Mode sub-selector that decides which special inputs send CCs. */
export interface VariantDef {
  /** Variant id: "plain", "with-scenes" */
  id: string;
  label: string;
  controls: Partial<Record<LogicalInput, ControlBinding>>;
}

export interface ModeDef {
  id: ModeId;
  label: string;
  description: string;
  /** NoteMap: input → MIDI note (0-127). Absent inputs are unmapped. */
  notes: Partial<Record<LogicalInput, number>>;
  /** First entry is the default variant. */
  variants: VariantDef[];
}

export interface ModeTables {
  /** MIDI channel (1-16) every message is sent on */
  channel: number;
  modes: ModeDef[];
}

/** The mode and variant the translator currently reads. */
export interface ActiveModeState {
  mode: ModeId;
  variant: string;
}
