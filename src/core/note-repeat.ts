/**
 * Note-repeat scheduler.
 *
 * While the repeat stick is pushed past STICK_THRESHOLD, every held note
 * is re-triggered at a rate picked by direction:
 *
 *   left  500 ms  (quarter)
 *   up    250 ms  (eighth)
 *   right 166 ms  (eighth triplet)
 *   down  125 ms  (sixteenth)
 *
 * Each re-trigger is a note-on followed by a staccato note-off after
 * STACCATO_MS. The repeat interval and every pending note-off are separate
 * cancellable handles owned here; at most one interval exists at a time.
 */

import { noteOff, noteOn, type MidiEvent } from "../midi/messages.js";

export type RepeatDirection = "left" | "up" | "right" | "down";

export const STICK_THRESHOLD = 0.7;
export const STACCATO_MS = 50;
export const REPEAT_VELOCITY = 127;

export const REPEAT_INTERVALS_MS: Record<RepeatDirection, number> = {
  left: 500,
  up: 250,
  right: 166,
  down: 125,
};

export type RepeatState =
  | { type: "idle" }
  | { type: "repeating"; direction: RepeatDirection; intervalMs: number };

/** Cancels a scheduled task. */
export type Cancel = () => void;

export interface RepeatTimers {
  every(ms: number, fn: () => void): Cancel;
  after(ms: number, fn: () => void): Cancel;
}

export const systemTimers: RepeatTimers = {
  every(ms, fn) {
    const handle = setInterval(fn, ms);
    return () => clearInterval(handle);
  },
  after(ms, fn) {
    const handle = setTimeout(fn, ms);
    return () => clearTimeout(handle);
  },
};

/**
 * Direction of a stick sample, or undefined when neither axis is past
 * the threshold. The dominant axis wins; an exact tie falls back to
 * left, up, right, down. Positive y is up.
 */
export function stickDirection(x: number, y: number): RepeatDirection | undefined {
  const ax = Math.abs(x);
  const ay = Math.abs(y);
  const horizontal: RepeatDirection | undefined =
    ax > STICK_THRESHOLD ? (x < 0 ? "left" : "right") : undefined;
  const vertical: RepeatDirection | undefined =
    ay > STICK_THRESHOLD ? (y > 0 ? "up" : "down") : undefined;

  if (horizontal && vertical) {
    if (ax > ay) return horizontal;
    if (ay > ax) return vertical;
    const order: RepeatDirection[] = ["left", "up", "right", "down"];
    return order.find((d) => d === horizontal || d === vertical);
  }
  return horizontal ?? vertical;
}

export interface NoteRepeatContext {
  channel: number;
  /** Notes to re-trigger on each tick. */
  heldNotes: () => number[];
  emit: (event: MidiEvent) => void;
  /** Serialization point timer callbacks are funneled through. */
  run?: (task: () => void) => void;
  timers?: RepeatTimers;
}

interface PendingOff {
  cancel: Cancel;
}

export class NoteRepeatScheduler {
  private current: RepeatState = { type: "idle" };
  private cancelInterval: Cancel | undefined;
  private readonly pending = new Map<number, PendingOff>();
  private readonly timers: RepeatTimers;
  private readonly run: (task: () => void) => void;

  constructor(private readonly context: NoteRepeatContext) {
    this.timers = context.timers ?? systemTimers;
    this.run = context.run ?? ((task) => task());
  }

  get state(): RepeatState {
    return this.current;
  }

  /** Notes with a staccato note-off still scheduled. */
  get pendingNotes(): number[] {
    return [...this.pending.keys()];
  }

  /** Apply a stick sample. */
  update(x: number, y: number): RepeatState {
    const direction = stickDirection(x, y);
    if (!direction) {
      this.stop();
    } else if (this.current.type !== "repeating" || this.current.direction !== direction) {
      this.start(direction);
    }
    return this.current;
  }

  private start(direction: RepeatDirection): void {
    this.stop();
    const intervalMs = REPEAT_INTERVALS_MS[direction];
    this.current = { type: "repeating", direction, intervalMs };
    this.cancelInterval = this.timers.every(intervalMs, () => this.run(() => this.tick()));
  }

  /** Re-trigger every held note once. */
  tick(): void {
    const { channel, emit } = this.context;
    for (const note of this.context.heldNotes()) {
      // A note-off still pending from the previous tick goes out first.
      this.firePendingOff(note);
      emit(noteOn(channel, note, REPEAT_VELOCITY));

      const entry: PendingOff = { cancel: () => {} };
      entry.cancel = this.timers.after(STACCATO_MS, () =>
        this.run(() => {
          if (this.pending.get(note) !== entry) return;
          this.pending.delete(note);
          emit(noteOff(channel, note));
        }),
      );
      this.pending.set(note, entry);
    }
  }

  /**
   * Drop a pending staccato note-off without sending it.
   * For callers about to send their own note-off for `note`.
   */
  cancelPendingOff(note: number): boolean {
    const entry = this.pending.get(note);
    if (!entry) return false;
    entry.cancel();
    this.pending.delete(note);
    return true;
  }

  /** Cancel the interval and send every pending note-off now. */
  stop(): void {
    this.cancelInterval?.();
    this.cancelInterval = undefined;
    for (const note of [...this.pending.keys()]) {
      this.firePendingOff(note);
    }
    this.current = { type: "idle" };
  }

  private firePendingOff(note: number): void {
    if (this.cancelPendingOff(note)) {
      this.context.emit(noteOff(this.context.channel, note));
    }
  }
}
