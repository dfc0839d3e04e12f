/**
 * Zod schema for conversion options.
 *
 * Every switch defaults to "run everything"; an empty object is a complete
 * configuration.
 */

import { z } from "zod";

/** A positive integer limit; null lifts it. */
const limit = (fallback: number) =>
  z
    .number()
    .int()
    .positive()
    .nullable()
    .default(fallback)
    .transform((value) => value ?? Number.POSITIVE_INFINITY);

export const pathBudgetSchema = z.object({
  maxDepth: limit(64).describe("Longest audio path considered, in cables. null for no limit."),
  maxChains: limit(1000).describe("Total signal chains reported. null for no limit."),
  maxExpansions: limit(10_000).describe(
    "Partial paths expanded per source/sink search. null for no limit.",
  ),
});

export const decoderTypeSchema = z.enum(["basic", "maxRe", "inPhase", "controlled", "binaural"]);

export const conversionOptionsSchema = z.object({
  skipSpatial: z.boolean().default(false).describe("Skip spatial objects and spatial generation."),
  skipMultichannel: z
    .boolean()
    .default(false)
    .describe("Leave out mc.* objects when converting boxes."),
  generateOsc: z.boolean().default(true).describe("Generate OSC responder descriptors."),
  simplified: z
    .boolean()
    .default(false)
    .describe("First-order HOA, 2D VBAP panning, WFS without prefilter."),
  decoderType: decoderTypeSchema.default("maxRe").describe("HOA decoding method."),
  decoderMatrix: z
    .union([z.string().min(1), z.array(z.array(z.number()))])
    .default("decoder_matrix")
    .describe("HOA decoder matrix: rows of gains per speaker, or the name of a matrix held by the target."),
  temperature: z
    .number()
    .min(-40)
    .max(60)
    .default(20)
    .describe("Air temperature in °C, used for the speed of sound."),
});

export type ConversionOptions = z.infer<typeof conversionOptionsSchema>;
/** Options as a caller writes them, before defaults. */
export type ConversionOptionsInput = z.input<typeof conversionOptionsSchema>;
