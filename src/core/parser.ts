/**
 * Patch and speaker-config decoding.
 *
 * Pure data-shape mapping from the JSON file formats onto MaxPatch and
 * SpeakerArrayRecord. No routing decisions happen here.
 */

import type { ZodError } from "zod";
import {
  maxPatchFileSchema,
  speakerConfigSchema,
  type MaxPatchFile,
} from "../schemas/patch.js";
import type { MaxPatch, SpeakerArrayRecord } from "../types.js";

/**
 * Parse .maxpat JSON text into a MaxPatch.
 * @throws Error when the text is not JSON or not a patcher document
 */
export function parsePatch(json: string): MaxPatch {
  return decodePatch(parseJson(json, "patch"));
}

/** Decode an already-parsed .maxpat document. */
export function decodePatch(value: unknown): MaxPatch {
  const result = maxPatchFileSchema.safeParse(value);
  if (!result.success) {
    throw new Error(`Invalid patch: ${formatIssues(result.error)}`);
  }
  return toMaxPatch(result.data);
}

function toMaxPatch(file: MaxPatchFile): MaxPatch {
  const { patcher } = file;
  return {
    boxes: patcher.boxes.map(({ box }) => ({
      id: box.id,
      maxclass: box.maxclass,
      text: box.text,
      numInlets: box.numinlets,
      numOutlets: box.numoutlets,
      rect: box.patching_rect,
    })),
    lines: patcher.lines.map(({ patchline }) => ({
      source: patchline.source,
      destination: patchline.destination,
    })),
    rect: patcher.rect,
    fileVersion: patcher.fileversion,
  };
}

/**
 * Parse a speaker configuration: a JSON array of speaker-array records.
 */
export function parseSpeakerConfig(json: string): SpeakerArrayRecord[] {
  return decodeSpeakerConfig(parseJson(json, "speaker configuration"));
}

export function decodeSpeakerConfig(value: unknown): SpeakerArrayRecord[] {
  const result = speakerConfigSchema.safeParse(value);
  if (!result.success) {
    throw new Error(`Invalid speaker configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read ${what} JSON: ${msg}`);
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}
