import { describe, it, expect } from "vitest";

import { dualSenseProfile } from "../../src/devices/dualsense.js";
import { getModeRegistry } from "../../src/modes/registry.js";
import { executeListMappings } from "../../src/tools/mappings.js";

const registry = getModeRegistry();

describe("executeListMappings", () => {
  it("shows one mode's notes in device order", () => {
    const result = executeListMappings(registry, dualSenseProfile, { mode: "scene-launcher" });
    expect(result).toBe(
      [
        "Channel 10 · Sony DualSense",
        "",
        "# Scene Launcher (scene-launcher)",
        "Eight scene triggers on the face buttons and D-pad",
        "",
        "Notes:",
        "  Cross        → 48",
        "  Circle       → 49",
        "  Square       → 50",
        "  Triangle     → 51",
        "  D-Pad Up     → 55",
        "  D-Pad Down   → 53",
        "  D-Pad Left   → 52",
        "  D-Pad Right  → 54",
        "Variant plain — Scenes:",
        "    (no control changes)",
      ].join("\n"),
    );
  });

  it("lists control changes per variant", () => {
    const lines = executeListMappings(registry, dualSenseProfile, { mode: "pad-controller" }).split("\n");
    const scenes = lines.indexOf("Variant with-scenes — Pads + Scenes:");
    expect(scenes).toBeGreaterThan(0);
    expect(lines.slice(scenes + 1)).toEqual([
      "    Options    → CC 106 (Pattern Next)",
      "    Create     → CC 107 (Pattern Previous)",
      "    L3         → CC 109 (Scene Next)",
      "    R3         → CC 108 (Scene Previous)",
    ]);
  });

  it("lists every mode when none is given", () => {
    const result = executeListMappings(registry, dualSenseProfile, {});
    const headings = result.split("\n").filter((l) => l.startsWith("# "));
    expect(headings).toEqual([
      "# Standard Drums (standard-drums)",
      "# Pad Controller (pad-controller)",
      "# Scene Launcher (scene-launcher)",
      "# Session View (session-view)",
      "# Sampler Rack (sampler-rack)",
    ]);
  });
});
