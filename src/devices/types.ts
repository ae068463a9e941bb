/**
 * Device profile types for game-controller input.
 */

/** Digital and pressure inputs that can be mapped to notes or control changes. */
export const LOGICAL_INPUTS = [
  "cross",
  "circle",
  "square",
  "triangle",
  "l1",
  "r1",
  "l2",
  "r2",
  "dpadUp",
  "dpadDown",
  "dpadLeft",
  "dpadRight",
  "ps",
  "options",
  "create",
  "touchpad",
  "leftStick",
  "rightStick",
] as const;

/** Identifier of a physical control, stable across modes. */
export type LogicalInput = (typeof LOGICAL_INPUTS)[number];

/** Inputs that may be designated as the mode-switch control. */
export const MODE_SWITCH_INPUTS = [
  "ps",
  "create",
  "touchpad",
  "leftStick",
  "rightStick",
] as const satisfies readonly LogicalInput[];

export type ModeSwitchInput = (typeof MODE_SWITCH_INPUTS)[number];

export interface DeviceInput {
  /** Logical id: "cross", "l2", "leftStick" */
  id: LogicalInput;
  /** Display label: "Cross", "L2", "L3" */
  label: string;
  /**
   * How samples are interpreted:
   *   button:  digital, fixed velocity
   *   trigger: analog pressure, pressed above a threshold
   *   special: never note-mapped; mode switch or control change
   */
  kind: "button" | "trigger" | "special";
}

export interface DeviceProfile {
  /** Device identifier: "dualsense" */
  name: string;
  /** Human-readable name: "Sony DualSense" */
  label: string;
  /** Every control the device reports, keyed by logical id */
  inputs: Record<LogicalInput, DeviceInput>;
  /** Label of the analog stick that drives note repeat */
  repeatStickLabel: string;
}
