#!/usr/bin/env node

/**
 * gamepad-midi-mcp-server — MCP entry point.
 *
 * Creates the controller session and OSC MIDI sink from the environment,
 * registers tools and starts the stdio transport.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { ControllerSession } from "./core/session.js";
import { getDevice } from "./devices/index.js";
import { getModeRegistry } from "./modes/registry.js";
import { OscMidiSink } from "./midi/osc-sink.js";
import {
  controllerConnectSchema,
  controllerInputSchema,
  listMappingsSchema,
  setModeSchema,
  setModeSwitchInputSchema,
} from "./schemas/controller.js";
import {
  executeControllerConnect,
  executeControllerDisconnect,
  executeControllerInput,
  executeGetStatus,
  executeSetMode,
  executeSetModeSwitchInput,
} from "./tools/controller.js";
import { executeListMappings } from "./tools/mappings.js";

const config = loadConfig();
const registry = getModeRegistry();
const device = getDevice(config.device);

const sink = new OscMidiSink({ host: config.host, port: config.port, format: config.format });
const session = new ControllerSession({
  sink,
  registry,
  device,
  initialMode: config.initialMode,
  modeSwitchInput: config.modeSwitchInput,
});

const server = new McpServer({
  name: "gamepad-midi-mcp-server",
  version: "0.1.0",
});

type ToolResult = { content: { type: "text"; text: string }[]; isError?: boolean };

/** Wrap a handler so thrown errors come back as tool errors. */
function respond(label: string, fn: () => string): ToolResult {
  try {
    return { content: [{ type: "text", text: fn() }] };
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    return {
      content: [{ type: "text", text: `Error ${label}: ${msg}` }],
      isError: true,
    };
  }
}

// ---------------------------------------------------------------------------
// Controller tools
// ---------------------------------------------------------------------------

server.tool(
  "controller_connect",
  "Start a controller session. Inputs are ignored until a controller is connected.",
  controllerConnectSchema,
  async ({ deviceName }) =>
    respond("connecting controller", () => executeControllerConnect(session, { deviceName })),
);

server.tool(
  "controller_disconnect",
  "End the controller session: held notes get note-offs and note repeat stops.",
  async () => respond("disconnecting controller", () => executeControllerDisconnect(session)),
);

server.tool(
  "controller_input",
  "Apply controller samples in order and return the MIDI messages they produced. " +
    "Buttons send note-on on press and note-off on release; L2/R2 use pressure for velocity. " +
    "The mode-switch input cycles DAW modes. Pushing the left stick past 0.7 re-triggers " +
    "held notes (left 1/4, up 1/8, right 1/8T, down 1/16) until it returns to center.",
  controllerInputSchema,
  async ({ events }) =>
    respond("applying controller input", () => executeControllerInput(session, { events })),
);

// ---------------------------------------------------------------------------
// Mode tools
// ---------------------------------------------------------------------------

server.tool(
  "set_mode",
  "Select the DAW mode and variant. Held notes are released first.",
  setModeSchema,
  async ({ mode, variant }) =>
    respond("setting mode", () => executeSetMode(session, { mode, variant })),
);

server.tool(
  "set_mode_switch_input",
  "Choose which special input (ps, create, touchpad, leftStick, rightStick) cycles DAW modes.",
  setModeSwitchInputSchema,
  async ({ input }) =>
    respond("setting mode switch input", () => executeSetModeSwitchInput(session, { input })),
);

server.tool(
  "get_status",
  "Show controller connection, MIDI output state, active mode, held notes and note repeat.",
  async () => respond("reading status", () => executeGetStatus(session)),
);

server.tool(
  "list_mappings",
  "List the note and control-change mappings of one or every DAW mode.",
  listMappingsSchema,
  async ({ mode }) =>
    respond("listing mappings", () => executeListMappings(registry, device, { mode })),
);

// ---------------------------------------------------------------------------
// Start server
// ---------------------------------------------------------------------------

async function main() {
  sink.open();
  console.error(
    `[server] MIDI over OSC (${config.format}) to ${config.host}:${config.port}`,
  );
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Fatal error starting MCP server:", error);
  process.exit(1);
});
