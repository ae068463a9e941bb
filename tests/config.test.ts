import { describe, it, expect } from "vitest";

import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      host: "127.0.0.1",
      port: 9000,
      format: "pd",
      device: "dualsense",
      modeSwitchInput: "ps",
      initialMode: "standard-drums",
    });
  });

  it("reads every variable", () => {
    expect(
      loadConfig({
        GAMEPAD_MIDI_HOST: "192.168.1.20",
        GAMEPAD_MIDI_PORT: "57120",
        GAMEPAD_MIDI_FORMAT: "midi",
        GAMEPAD_MIDI_DEVICE: "ps5",
        GAMEPAD_MIDI_SWITCH_INPUT: "touchpad",
        GAMEPAD_MIDI_MODE: "session-view",
      }),
    ).toEqual({
      host: "192.168.1.20",
      port: 57120,
      format: "midi",
      device: "ps5",
      modeSwitchInput: "touchpad",
      initialMode: "session-view",
    });
  });

  it("treats empty strings as unset", () => {
    expect(loadConfig({ GAMEPAD_MIDI_PORT: "", GAMEPAD_MIDI_FORMAT: "" }).port).toBe(9000);
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ PATH: "/usr/bin", HOME: "/root" }).host).toBe("127.0.0.1");
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ GAMEPAD_MIDI_PORT: "70000" })).toThrow(
      /Invalid configuration: GAMEPAD_MIDI_PORT/,
    );
  });

  it("rejects an unknown mode-switch input", () => {
    expect(() => loadConfig({ GAMEPAD_MIDI_SWITCH_INPUT: "cross" })).toThrow(
      /GAMEPAD_MIDI_SWITCH_INPUT/,
    );
  });

  it("rejects an unknown mode", () => {
    expect(() => loadConfig({ GAMEPAD_MIDI_MODE: "arranger" })).toThrow(/GAMEPAD_MIDI_MODE/);
  });
});
