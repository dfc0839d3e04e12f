/**
 * Zod schemas for analyze_patch tool parameters.
 */

import { z } from "zod";
import { pathBudgetSchema } from "./options.js";

export const patchSourceSchema = z
  .string()
  .min(1)
  .describe(
    "Absolute file path to a .maxpat file, or raw .maxpat JSON. " +
      "If it starts with '{' it is treated as raw JSON.",
  );

export const analyzePatchSchema = {
  source: patchSourceSchema,
  pathBudget: pathBudgetSchema
    .optional()
    .describe("Limits on signal chain discovery. Omitted fields keep their defaults."),
};
