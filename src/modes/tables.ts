/**
 * Mapping tables loader.
 *
 * The tables ship as data/modes.json and are validated once on load.
 * They are constants for the life of the process.
 */

import fs from "node:fs";
import { z } from "zod";

import { LOGICAL_INPUTS } from "../devices/types.js";
import { MODE_IDS, type ModeTables } from "./types.js";

const DEFAULT_TABLES_URL = new URL("../../data/modes.json", import.meta.url);

const midiNumber = z.number().int().min(0).max(127);
const inputId = z.enum(LOGICAL_INPUTS);

const variantSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  controls: z.record(inputId, z.object({ cc: midiNumber, label: z.string().min(1) })),
});

const modeSchema = z.object({
  id: z.enum(MODE_IDS),
  label: z.string().min(1),
  description: z.string(),
  notes: z.record(inputId, midiNumber),
  variants: z.array(variantSchema).min(1),
});

export const modeTablesSchema = z
  .object({
    channel: z.number().int().min(1).max(16),
    modes: z.array(modeSchema),
  })
  .superRefine((tables, ctx) => {
    const seen = new Set<string>();
    for (const mode of tables.modes) {
      if (seen.has(mode.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate mode "${mode.id}"` });
      }
      seen.add(mode.id);

      const variants = new Set<string>();
      for (const variant of mode.variants) {
        if (variants.has(variant.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate variant "${variant.id}" in mode "${mode.id}"`,
          });
        }
        variants.add(variant.id);
      }
    }
    const missing = MODE_IDS.filter((id) => !seen.has(id));
    if (missing.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Missing mode tables: ${missing.join(", ")}`,
      });
    }
  });

/**
 * Validate raw table data.
 * Throws with every zod issue joined into one message.
 */
export function parseModeTables(raw: unknown): ModeTables {
  const result = modeTablesSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
    );
    throw new Error(`Invalid mode tables: ${issues.join("; ")}`);
  }
  return result.data;
}

/** Read and validate a tables file (defaults to the bundled data/modes.json). */
export function loadModeTables(file: string | URL = DEFAULT_TABLES_URL): ModeTables {
  const text = fs.readFileSync(file, "utf-8");
  return parseModeTables(JSON.parse(text));
}
