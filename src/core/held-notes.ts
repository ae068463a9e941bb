/**
 * Notes currently sounding, keyed by the input that started them.
 */

import type { LogicalInput } from "../devices/types.js";

export class HeldNotes {
  private readonly byInput = new Map<LogicalInput, number>();

  register(input: LogicalInput, note: number): void {
    this.byInput.set(input, note);
  }

  /** Remove and return the note registered for `input`. */
  release(input: LogicalInput): number | undefined {
    const note = this.byInput.get(input);
    this.byInput.delete(input);
    return note;
  }

  noteFor(input: LogicalInput): number | undefined {
    return this.byInput.get(input);
  }

  has(note: number): boolean {
    for (const held of this.byInput.values()) {
      if (held === note) return true;
    }
    return false;
  }

  /** Distinct note numbers in press order. */
  notes(): number[] {
    return [...new Set(this.byInput.values())];
  }

  get size(): number {
    return this.byInput.size;
  }

  clear(): void {
    this.byInput.clear();
  }
}
