import { describe, it, expect } from "vitest";

import { getDevice } from "../../src/devices/index.js";
import { dualSenseProfile } from "../../src/devices/dualsense.js";
import { LOGICAL_INPUTS, MODE_SWITCH_INPUTS } from "../../src/devices/types.js";

describe("device registry", () => {
  it("finds the DualSense by name and alias", () => {
    expect(getDevice("dualsense")).toBe(dualSenseProfile);
    expect(getDevice("PS5")).toBe(dualSenseProfile);
  });

  it("throws listing available devices", () => {
    expect(() => getDevice("xbox")).toThrow(
      'Unknown device "xbox". Available devices: dualsense',
    );
  });
});

describe("DualSense profile", () => {
  it("describes every logical input under its own id", () => {
    for (const id of LOGICAL_INPUTS) {
      expect(dualSenseProfile.inputs[id].id).toBe(id);
    }
  });

  it("treats only L2 and R2 as pressure triggers", () => {
    const triggers = Object.values(dualSenseProfile.inputs)
      .filter((i) => i.kind === "trigger")
      .map((i) => i.id);
    expect(triggers).toEqual(["l2", "r2"]);
  });

  it("marks every mode-switch candidate as special", () => {
    for (const id of MODE_SWITCH_INPUTS) {
      expect(dualSenseProfile.inputs[id].kind).toBe("special");
    }
    expect(dualSenseProfile.inputs.options.kind).toBe("special");
  });
});
