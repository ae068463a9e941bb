/**
 * Per-input edge detection.
 *
 * Turns a stream of level samples into press/release transitions.
 * Buttons report a boolean level; triggers report pressure and count as
 * pressed above TRIGGER_THRESHOLD, with velocity taken from the pressure
 * at the moment of the press.
 */

import type { DeviceInput, LogicalInput } from "../devices/types.js";

export const TRIGGER_THRESHOLD = 0.5;
export const MAX_VELOCITY = 127;

export type Transition =
  | { type: "none" }
  | { type: "pressed"; velocity: number }
  | { type: "released" };

const NONE: Transition = { type: "none" };

/** Clamp to [0, 1]; NaN counts as no pressure. */
export function clampPressure(pressure: number): number {
  if (Number.isNaN(pressure)) return 0;
  return Math.max(0, Math.min(1, pressure));
}

export function pressureToVelocity(pressure: number): number {
  return Math.round(clampPressure(pressure) * MAX_VELOCITY);
}

export class EdgeDetector {
  private readonly pressed = new Map<LogicalInput, boolean>();

  /**
   * Record one sample.
   *
   * @param input - The control the sample belongs to; its kind decides
   *   whether `rawPressed` or `pressure` is the level.
   */
  observe(input: DeviceInput, rawPressed: boolean, pressure = rawPressed ? 1 : 0): Transition {
    const level = clampPressure(pressure);
    const isPressed = input.kind === "trigger" ? level > TRIGGER_THRESHOLD : rawPressed;
    const wasPressed = this.pressed.get(input.id) ?? false;
    this.pressed.set(input.id, isPressed);

    if (isPressed && !wasPressed) {
      const velocity = input.kind === "trigger" ? pressureToVelocity(level) : MAX_VELOCITY;
      return { type: "pressed", velocity };
    }
    if (!isPressed && wasPressed) return { type: "released" };
    return NONE;
  }

  isPressed(input: LogicalInput): boolean {
    return this.pressed.get(input) ?? false;
  }

  reset(): void {
    this.pressed.clear();
  }
}
