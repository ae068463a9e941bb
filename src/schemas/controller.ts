/**
 * Zod schemas for controller and mode tool parameters.
 */

import { z } from "zod";

import { LOGICAL_INPUTS, MODE_SWITCH_INPUTS } from "../devices/types.js";
import { MODE_IDS } from "../modes/types.js";

const inputSample = z.object({
  type: z.literal("input"),
  input: z.enum(LOGICAL_INPUTS).describe("Control id, e.g. cross, l2, dpadUp, options, leftStick (L3)."),
  pressed: z.boolean().describe("Digital level. Ignored for l2/r2, which use pressure."),
  pressure: z
    .number()
    .optional()
    .describe("Analog pressure 0-1 for l2/r2 (pressed above 0.5). Out-of-range values are clamped."),
});

const stickSample = z.object({
  type: z.literal("stick"),
  x: z.number().describe("Left stick X, -1 (left) to 1 (right)."),
  y: z.number().describe("Left stick Y, -1 (down) to 1 (up)."),
});

export const controllerEventSchema = z.discriminatedUnion("type", [inputSample, stickSample]);

export const controllerConnectSchema = {
  deviceName: z
    .string()
    .min(1)
    .default("DualSense Wireless Controller")
    .describe("Human-readable controller name shown in status."),
};

export const controllerInputSchema = {
  events: z
    .array(controllerEventSchema)
    .min(1)
    .describe(
      "Samples applied in order. Button: { type: 'input', input: 'cross', pressed: true }. " +
        "Trigger: { type: 'input', input: 'l2', pressed: true, pressure: 0.9 }. " +
        "Stick: { type: 'stick', x: -0.8, y: 0 } starts note repeat; { x: 0, y: 0 } stops it.",
    ),
};

export const setModeSchema = {
  mode: z.enum(MODE_IDS).describe("DAW mode to activate."),
  variant: z
    .string()
    .optional()
    .describe(
      "Mode variant. pad-controller: plain|with-patterns|with-scenes. " +
        "session-view: plain|with-scenes|with-transport. Others: plain. Defaults to the first.",
    ),
};

export const setModeSwitchInputSchema = {
  input: z.enum(MODE_SWITCH_INPUTS).describe("Special input that cycles modes when pressed."),
};

export const listMappingsSchema = {
  mode: z.enum(MODE_IDS).optional().describe("Mode to show. Defaults to every mode."),
};
