/**
 * Sony DualSense (PS5) device profile.
 *
 * Face buttons, shoulders and the D-pad are digital note inputs.
 * L2/R2 are analog triggers with pressure-derived velocity.
 * PS, Options, Create, touchpad click and the stick clicks are special
 * inputs: one of them switches modes, the rest may emit control changes.
 * The left analog stick drives note repeat.
 */

import type { DeviceInput, DeviceProfile, LogicalInput } from "./types.js";

const button = (id: LogicalInput, label: string): DeviceInput => ({ id, label, kind: "button" });
const trigger = (id: LogicalInput, label: string): DeviceInput => ({ id, label, kind: "trigger" });
const special = (id: LogicalInput, label: string): DeviceInput => ({ id, label, kind: "special" });

export const dualSenseProfile: DeviceProfile = {
  name: "dualsense",
  label: "Sony DualSense",
  repeatStickLabel: "Left Stick",
  inputs: {
    cross:      button("cross", "Cross"),
    circle:     button("circle", "Circle"),
    square:     button("square", "Square"),
    triangle:   button("triangle", "Triangle"),
    l1:         button("l1", "L1"),
    r1:         button("r1", "R1"),
    l2:         trigger("l2", "L2"),
    r2:         trigger("r2", "R2"),
    dpadUp:     button("dpadUp", "D-Pad Up"),
    dpadDown:   button("dpadDown", "D-Pad Down"),
    dpadLeft:   button("dpadLeft", "D-Pad Left"),
    dpadRight:  button("dpadRight", "D-Pad Right"),
    ps:         special("ps", "PS"),
    options:    special("options", "Options"),
    create:     special("create", "Create"),
    touchpad:   special("touchpad", "Touchpad"),
    leftStick:  special("leftStick", "L3"),
    rightStick: special("rightStick", "R3"),
  },
};
