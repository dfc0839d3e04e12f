/**
 * Zod schemas for analyze_spatial and convert_spatial tool parameters.
 */

import { z } from "zod";
import { patchSourceSchema } from "./analyze.js";
import { conversionOptionsSchema } from "./options.js";

export const speakerSourceSchema = z
  .string()
  .min(1)
  .describe(
    "Absolute file path to a speaker configuration JSON file, or the raw JSON (starting with '[')." +
      " The document is an array of { name, bus?, format?, speakers: [{ id, azimuth, elevation?, distance, delay?, gain? }] }.",
  );

export const spatialToolSchema = {
  source: patchSourceSchema,
  speakers: speakerSourceSchema.optional(),
  options: conversionOptionsSchema.optional().describe("Conversion switches. Omit to run everything."),
};
