/**
 * list_mappings MCP tool — NoteMap and ControlMap tables per mode.
 */

import type { DeviceProfile } from "../devices/types.js";
import type { ModeRegistry } from "../modes/registry.js";
import type { ModeDef, ModeId } from "../modes/types.js";

function formatMode(mode: ModeDef, device: DeviceProfile): string {
  const lines = [`# ${mode.label} (${mode.id})`, mode.description, "", "Notes:"];
  const notes = Object.values(device.inputs).flatMap((input) => {
    const note = mode.notes[input.id];
    return note === undefined ? [] : [`  ${input.label.padEnd(12)} → ${note}`];
  });
  lines.push(...(notes.length > 0 ? notes : ["  (none)"]));

  for (const variant of mode.variants) {
    const controls = Object.values(device.inputs).flatMap((input) => {
      const binding = variant.controls[input.id];
      return binding ? [`    ${input.label.padEnd(10)} → CC ${binding.cc} (${binding.label})`] : [];
    });
    lines.push(`Variant ${variant.id} — ${variant.label}:`);
    lines.push(...(controls.length > 0 ? controls : ["    (no control changes)"]));
  }
  return lines.join("\n");
}

export function executeListMappings(
  registry: ModeRegistry,
  device: DeviceProfile,
  input: { mode?: ModeId },
): string {
  const modes = input.mode ? [registry.get(input.mode)] : registry.list();
  const header = `Channel ${registry.channel} · ${device.label}`;
  return [header, ...modes.map((m) => formatMode(m, device))].join("\n\n");
}
