/**
 * MCP tool handlers that drive a ControllerSession.
 *
 * The tools are the controller input source for the server: each call
 * feeds samples into the session and reports the MIDI it produced.
 */

import type { ControllerSession, SessionStatus } from "../core/session.js";
import type { LogicalInput, ModeSwitchInput } from "../devices/types.js";
import type { ModeId } from "../modes/types.js";
import { describeMidiEvent, type MidiEvent } from "../midi/messages.js";

export type ControllerSample =
  | { type: "input"; input: LogicalInput; pressed: boolean; pressure?: number }
  | { type: "stick"; x: number; y: number };

/** Run `fn` and return every MIDI message the session emitted meanwhile. */
function capture(session: ControllerSession, fn: () => void): MidiEvent[] {
  const events: MidiEvent[] = [];
  const unsubscribe = session.onMidi((e) => events.push(e));
  try {
    fn();
  } finally {
    unsubscribe();
  }
  return events;
}

function formatMidiLines(events: MidiEvent[]): string[] {
  return events.map((e) => `  ${describeMidiEvent(e)} [ch ${e.channel}]`);
}

function formatRepeat(session: ControllerSession, status: SessionStatus): string {
  if (status.repeat.type !== "repeating") return "off";
  const { direction, intervalMs } = status.repeat;
  return `${direction} every ${intervalMs} ms (${session.device.repeatStickLabel})`;
}

export function executeControllerConnect(
  session: ControllerSession,
  input: { deviceName: string },
): string {
  session.handle({ type: "connect", deviceName: input.deviceName });
  const status = session.status();
  return [
    `Connected: ${input.deviceName}`,
    `  Mode: ${status.modeLabel} (${status.variant})`,
    `  Mode switch: ${session.device.inputs[status.modeSwitchInput].label}`,
  ].join("\n");
}

export function executeControllerDisconnect(session: ControllerSession): string {
  if (!session.status().connected) return "No controller connected.";
  const events = capture(session, () => session.handle({ type: "disconnect" }));
  const lines = ["Disconnected."];
  if (events.length > 0) {
    lines.push(`Flushed ${events.length} MIDI message(s):`, ...formatMidiLines(events));
  }
  return lines.join("\n");
}

export function executeControllerInput(
  session: ControllerSession,
  input: { events: ControllerSample[] },
): string {
  if (!session.status().connected) {
    throw new Error("No controller connected. Call controller_connect first.");
  }
  const before = session.status().mode;
  const events = capture(session, () => {
    for (const sample of input.events) {
      session.handle(sample);
    }
  });
  const status = session.status();

  const lines = [
    events.length > 0
      ? `Applied ${input.events.length} sample(s), ${events.length} MIDI message(s):`
      : `Applied ${input.events.length} sample(s), no MIDI messages.`,
    ...formatMidiLines(events),
  ];
  if (status.mode !== before) {
    lines.push(`Mode: ${status.modeLabel} (${status.variant})`);
  }
  lines.push(`Note repeat: ${formatRepeat(session, status)}`);
  return lines.join("\n");
}

export function executeSetMode(
  session: ControllerSession,
  input: { mode: ModeId; variant?: string },
): string {
  const events = capture(session, () => session.setMode(input.mode, input.variant));
  const status = session.status();
  const lines = [`Mode: ${status.modeLabel} (${status.variant})`];
  if (events.length > 0) {
    lines.push(`Flushed ${events.length} held note(s):`, ...formatMidiLines(events));
  }
  return lines.join("\n");
}

export function executeSetModeSwitchInput(
  session: ControllerSession,
  input: { input: ModeSwitchInput },
): string {
  session.setModeSwitchInput(input.input);
  return `Mode switch input: ${session.device.inputs[input.input].label}`;
}

export function executeGetStatus(session: ControllerSession): string {
  const s = session.status();
  return [
    `Controller: ${s.connected ? s.deviceName ?? "connected" : "not connected"}`,
    `MIDI output: ${s.sinkReady ? "ready" : "not connected"}`,
    `Mode: ${s.modeLabel} (${s.variant})`,
    `Mode switch: ${session.device.inputs[s.modeSwitchInput].label}`,
    `Held notes: ${s.heldNotes.length > 0 ? s.heldNotes.join(", ") : "none"}`,
    `Note repeat: ${formatRepeat(session, s)}`,
    `Last input: ${s.lastInput ?? "none"}`,
    `Last message: ${s.lastMessage ?? "none"}`,
  ].join("\n");
}
