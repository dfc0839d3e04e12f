/**
 * Max object registry.
 *
 * Category and signal-type metadata for the objects the converter knows
 * about. Box port counts come from the patch itself, so unlike a port table
 * this registry only answers "what is this object" questions.
 */

import { z } from "zod";
import registryData from "./max-objects.json" with { type: "json" };
import { CONTROL_WIDGETS } from "./object-kind.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const maxObjectDefSchema = z.object({
  name: z.string(),
  aliases: z.array(z.string()).optional(),
  category: z.string(),
  description: z.string(),
  signalType: z.enum(["control", "audio"]),
});

export type MaxObjectDef = z.infer<typeof maxObjectDefSchema>;

// ---------------------------------------------------------------------------
// Build lookup maps
// ---------------------------------------------------------------------------

const REGISTRY_DATA: MaxObjectDef[] = z.array(maxObjectDefSchema).parse(registryData);

/** Primary registry: object name → definition. */
const REGISTRY = new Map<string, MaxObjectDef>();

/** Alias map: alias → canonical name. */
const ALIAS_MAP = new Map<string, string>();

for (const def of REGISTRY_DATA) {
  REGISTRY.set(def.name, def);
  if (def.aliases) {
    for (const alias of def.aliases) {
      ALIAS_MAP.set(alias, def.name);
    }
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Look up an object definition by name (resolves aliases).
 * Returns undefined for unknown objects.
 */
export function lookupObject(name: string): MaxObjectDef | undefined {
  const canonical = ALIAS_MAP.get(name) ?? name;
  return REGISTRY.get(canonical);
}

/**
 * Get the category for an object name. Control widgets report "gui".
 */
export function getObjectCategory(name: string): string | undefined {
  if (CONTROL_WIDGETS.has(name)) return "gui";
  const def = lookupObject(name);
  return def?.category;
}
