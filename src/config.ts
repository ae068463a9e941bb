/**
 * Server configuration from environment variables.
 *
 *   GAMEPAD_MIDI_HOST          OSC target host            (127.0.0.1)
 *   GAMEPAD_MIDI_PORT          OSC target port            (9000)
 *   GAMEPAD_MIDI_FORMAT        "pd" | "midi"              (pd)
 *   GAMEPAD_MIDI_DEVICE        device profile name        (dualsense)
 *   GAMEPAD_MIDI_SWITCH_INPUT  mode-switch input          (ps)
 *   GAMEPAD_MIDI_MODE          mode active at startup     (standard-drums)
 */

import { z } from "zod";

import { MODE_SWITCH_INPUTS } from "./devices/types.js";
import { MODE_IDS } from "./modes/types.js";

export const configSchema = z.object({
  GAMEPAD_MIDI_HOST: z.string().min(1).default("127.0.0.1"),
  GAMEPAD_MIDI_PORT: z.coerce.number().int().min(1).max(65535).default(9000),
  GAMEPAD_MIDI_FORMAT: z.enum(["pd", "midi"]).default("pd"),
  GAMEPAD_MIDI_DEVICE: z.string().min(1).default("dualsense"),
  GAMEPAD_MIDI_SWITCH_INPUT: z.enum(MODE_SWITCH_INPUTS).default("ps"),
  GAMEPAD_MIDI_MODE: z.enum(MODE_IDS).default("standard-drums"),
});

export interface ServerConfig {
  host: string;
  port: number;
  format: "pd" | "midi";
  device: string;
  modeSwitchInput: (typeof MODE_SWITCH_INPUTS)[number];
  initialMode: (typeof MODE_IDS)[number];
}

/**
 * Parse configuration. Empty variables count as unset.
 * Throws naming every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const result = configSchema.safeParse(defined);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  const c = result.data;
  return {
    host: c.GAMEPAD_MIDI_HOST,
    port: c.GAMEPAD_MIDI_PORT,
    format: c.GAMEPAD_MIDI_FORMAT,
    device: c.GAMEPAD_MIDI_DEVICE,
    modeSwitchInput: c.GAMEPAD_MIDI_SWITCH_INPUT,
    initialMode: c.GAMEPAD_MIDI_MODE,
  };
}
