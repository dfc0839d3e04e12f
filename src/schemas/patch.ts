/**
 * Zod schemas for the on-disk patch format and speaker geometry records.
 */

import { z } from "zod";

const rectSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

/** One entry of `patcher.boxes` in a .maxpat file. */
export const maxBoxFileSchema = z.object({
  box: z
    .object({
      id: z.string().min(1),
      maxclass: z.string(),
      text: z.string().optional(),
      numinlets: z.number().int().min(0).default(0),
      numoutlets: z.number().int().min(0).default(0),
      patching_rect: rectSchema.optional(),
    })
    .passthrough(),
});

/**
 * One entry of `patcher.lines`. Endpoints stay `unknown`: the graph builder
 * owns endpoint validation and reports it as a routing error.
 */
export const patchLineFileSchema = z.object({
  patchline: z
    .object({
      source: z.unknown(),
      destination: z.unknown(),
    })
    .passthrough(),
});

export const maxPatchFileSchema = z.object({
  patcher: z
    .object({
      boxes: z.array(maxBoxFileSchema).default([]),
      lines: z.array(patchLineFileSchema).default([]),
      rect: rectSchema.optional(),
      fileversion: z.number().int().optional(),
    })
    .passthrough(),
});
export type MaxPatchFile = z.infer<typeof maxPatchFileSchema>;

// ---------------------------------------------------------------------------
// Speaker geometry
// ---------------------------------------------------------------------------

export const speakerRecordSchema = z.object({
  id: z.number().int(),
  azimuth: z.number(),
  elevation: z.number().default(0),
  distance: z.number().positive(),
  delay: z.number().default(0),
  gain: z.number().default(1),
});

export const speakerArrayRecordSchema = z.object({
  bus: z.number().int().min(0).default(0),
  format: z.string().default(""),
  name: z.string().min(1),
  speakers: z.array(speakerRecordSchema),
});

export const speakerConfigSchema = z.array(speakerArrayRecordSchema);
