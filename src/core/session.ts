/**
 * Controller session — owns all translation state for one controller.
 *
 * Every mutation (controller samples, repeat timer callbacks, mode
 * changes from tools) runs through one SerialQueue, so state is only
 * ever touched by one task at a time and in arrival order.
 */

import { dualSenseProfile } from "../devices/dualsense.js";
import type { DeviceProfile, LogicalInput, ModeSwitchInput } from "../devices/types.js";
import { getModeRegistry, type ModeRegistry } from "../modes/registry.js";
import type { ActiveModeState, ModeId } from "../modes/types.js";
import { describeMidiEvent, type MidiEvent } from "../midi/messages.js";
import type { MidiSink } from "../midi/sink.js";
import { EdgeDetector } from "./edge-detector.js";
import { HeldNotes } from "./held-notes.js";
import { ModeSwitcher } from "./mode-switcher.js";
import { NoteRepeatScheduler, type RepeatState, type RepeatTimers } from "./note-repeat.js";
import { SerialQueue } from "./serial-queue.js";
import { Translator } from "./translator.js";

/** Everything a controller input source can report. */
export type ControllerEvent =
  | { type: "connect"; deviceName: string }
  | { type: "disconnect" }
  | { type: "input"; input: LogicalInput; pressed: boolean; pressure?: number }
  | { type: "stick"; x: number; y: number };

export type MidiListener = (event: MidiEvent) => void;

export interface ControllerSessionOptions {
  /** Downstream sink. Without one, sends are no-ops. */
  sink?: MidiSink;
  registry?: ModeRegistry;
  device?: DeviceProfile;
  initialMode?: ModeId;
  modeSwitchInput?: ModeSwitchInput;
  timers?: RepeatTimers;
  log?: (message: string) => void;
}

export interface SessionStatus {
  connected: boolean;
  deviceName: string | undefined;
  mode: ModeId;
  modeLabel: string;
  variant: string;
  modeSwitchInput: ModeSwitchInput;
  heldNotes: number[];
  repeat: RepeatState;
  sinkReady: boolean;
  lastInput: string | undefined;
  lastMessage: string | undefined;
}

const clampAxis = (v: number): number => (Number.isNaN(v) ? 0 : Math.max(-1, Math.min(1, v)));

export class ControllerSession {
  readonly device: DeviceProfile;
  private readonly registry: ModeRegistry;
  private readonly sink: MidiSink | undefined;
  private readonly log: (message: string) => void;
  private readonly queue: SerialQueue;
  private readonly state: ActiveModeState;
  private readonly held = new HeldNotes();
  private readonly edges = new EdgeDetector();
  private readonly translator: Translator;
  private readonly switcher: ModeSwitcher;
  private readonly repeater: NoteRepeatScheduler;
  private readonly listeners = new Set<MidiListener>();

  private connected = false;
  private deviceName: string | undefined;
  private lastInput: string | undefined;
  private lastMessage: string | undefined;

  constructor(options: ControllerSessionOptions = {}) {
    this.device = options.device ?? dualSenseProfile;
    this.registry = options.registry ?? getModeRegistry();
    this.sink = options.sink;
    this.log = options.log ?? ((message) => console.error(message));
    this.queue = new SerialQueue(this.log);
    this.state = this.registry.initialState(options.initialMode ?? "standard-drums");

    this.translator = new Translator(this.registry, this.held);
    this.switcher = new ModeSwitcher(
      {
        registry: this.registry,
        state: this.state,
        held: this.held,
        translator: this.translator,
        emit: (event) => this.send(event),
        log: this.log,
      },
      options.modeSwitchInput,
    );
    this.repeater = new NoteRepeatScheduler({
      channel: this.registry.channel,
      heldNotes: () => this.held.notes(),
      emit: (event) => this.deliver(event),
      run: (task) => this.queue.run(task),
      timers: options.timers,
    });
  }

  /** Single entry point for controller input. */
  handle(event: ControllerEvent): void {
    this.queue.run(() => this.dispatch(event));
  }

  /** Observe every MIDI message the session emits. Returns an unsubscribe function. */
  onMidi(listener: MidiListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Make `mode` active (default variant unless given). Held notes are flushed first. */
  setMode(mode: ModeId, variant?: string): void {
    const target = variant ?? this.registry.defaultVariant(mode);
    this.registry.getVariant(mode, target);
    this.queue.run(() => {
      this.switcher.switchTo(mode, target);
      this.log(`[session] mode set to ${mode} (${target})`);
    });
  }

  /** Change the variant of the current mode. */
  setVariant(variant: string): void {
    this.registry.getVariant(this.state.mode, variant);
    this.queue.run(() => {
      this.state.variant = variant;
    });
  }

  setModeSwitchInput(input: ModeSwitchInput): void {
    this.queue.run(() => {
      this.switcher.switchInput = input;
    });
  }

  status(): SessionStatus {
    return {
      connected: this.connected,
      deviceName: this.deviceName,
      mode: this.state.mode,
      modeLabel: this.registry.get(this.state.mode).label,
      variant: this.state.variant,
      modeSwitchInput: this.switcher.switchInput,
      heldNotes: this.held.notes(),
      repeat: this.repeater.state,
      sinkReady: this.sink?.ready ?? false,
      lastInput: this.lastInput,
      lastMessage: this.lastMessage,
    };
  }

  private dispatch(event: ControllerEvent): void {
    switch (event.type) {
      case "connect":
        if (this.connected) this.teardown();
        this.connected = true;
        this.deviceName = event.deviceName;
        this.log(`[session] controller connected: ${event.deviceName}`);
        return;
      case "disconnect":
        if (!this.connected) return;
        this.teardown();
        this.log(`[session] controller disconnected: ${this.deviceName ?? "unknown"}`);
        this.deviceName = undefined;
        return;
      case "input":
        if (this.connected) this.onInput(event.input, event.pressed, event.pressure);
        return;
      case "stick":
        if (this.connected) this.repeater.update(clampAxis(event.x), clampAxis(event.y));
        return;
    }
  }

  private onInput(id: LogicalInput, pressed: boolean, pressure: number | undefined): void {
    const input = this.device.inputs[id];
    const transition = this.edges.observe(input, pressed, pressure);
    if (transition.type === "pressed") {
      this.lastInput =
        input.kind === "trigger" ? `${input.label} (velocity ${transition.velocity})` : input.label;
    }

    if (input.kind === "special") {
      const outcome = this.switcher.onSpecialInput(id, transition);
      if (outcome.type === "mode-switch") {
        this.lastInput = `Mode: ${this.registry.get(outcome.to.mode).label}`;
        this.log(`[session] mode ${outcome.from.mode} -> ${outcome.to.mode}`);
      }
      return;
    }

    const event = this.translator.translate(id, transition, this.state);
    if (event) this.send(event);
  }

  /** Flush held notes, stop repeat, forget input levels. */
  private teardown(): void {
    this.switcher.flush();
    this.repeater.stop();
    this.edges.reset();
    this.connected = false;
  }

  /** Send from the input path. Supersedes a pending staccato note-off for the same note. */
  private send(event: MidiEvent): void {
    if (event.type === "noteoff") this.repeater.cancelPendingOff(event.note);
    this.deliver(event);
  }

  private deliver(event: MidiEvent): void {
    this.lastMessage = describeMidiEvent(event);
    for (const listener of this.listeners) {
      listener(event);
    }
    if (this.sink?.ready) this.sink.send(event);
  }
}
