/**
 * analyze_spatial and convert_spatial MCP tools.
 *
 * Both read a patch and an optional speaker configuration. analyze_spatial
 * reports what the analysis found; convert_spatial returns the generated
 * parameter objects as JSON for the emitter.
 */

import path from "node:path";
import { parsePatch, parseSpeakerConfig } from "../core/parser.js";
import { convertSpatial, type SpatialConversion } from "../codegen/plan.js";
import type { ConversionOptionsInput } from "../schemas/options.js";
import type { SpatialObject, SpeakerArray } from "../analysis/spatial.js";
import type { SpatialObjectType } from "../core/object-kind.js";
import type { AudioFormat, SpeakerArrayRecord } from "../types.js";
import { resolveSource } from "../utils/resolve-source.js";

export interface SpatialToolInput {
  source: string;
  speakers?: string;
  options?: ConversionOptionsInput;
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

export async function executeAnalyzeSpatial(input: SpatialToolInput): Promise<string> {
  const { conversion, filePath } = await runConversion(input);
  return formatSpatialAnalysis(conversion, filePath);
}

export async function executeConvertSpatial(input: SpatialToolInput): Promise<string> {
  const { conversion } = await runConversion(input);
  const { config, plan, objects, failures } = conversion;
  return JSON.stringify(
    {
      processingMethod: config.processingMethod,
      spatialObjects: config.spatialObjects,
      speakerArrays: config.speakerArrays.map((a) => ({
        id: a.id,
        arrayType: a.arrayType,
        speakers: a.speakers.length,
      })),
      plan,
      objects,
      failures,
    },
    null,
    2,
  );
}

async function runConversion(
  input: SpatialToolInput,
): Promise<{ conversion: SpatialConversion; filePath?: string }> {
  const { text, filePath } = await resolveSource(input.source);
  const patch = parsePatch(text);
  const records = input.speakers ? await loadSpeakers(input.speakers) : [];
  return { conversion: convertSpatial(patch, records, input.options), filePath };
}

async function loadSpeakers(source: string): Promise<SpeakerArrayRecord[]> {
  const { text } = await resolveSource(source);
  return parseSpeakerConfig(text);
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatSpatialAnalysis(conversion: SpatialConversion, filePath?: string): string {
  const { config, plan, failures } = conversion;
  const lines: string[] = [];

  if (filePath) {
    lines.push(`# Spatial Analysis: ${path.basename(filePath)}`);
    lines.push(`Path: ${filePath}`);
  } else {
    lines.push("# Spatial Analysis");
  }
  lines.push("");

  lines.push("## Processing Method");
  lines.push(`**${config.processingMethod.toUpperCase()}**`);
  lines.push("");

  lines.push(`## Spatial Objects (${config.spatialObjects.length})`);
  if (config.spatialObjects.length === 0) {
    lines.push("No spatial objects found.");
  }
  for (const object of config.spatialObjects) {
    lines.push(`- ${formatSpatialObject(object)}`);
  }
  lines.push("");

  lines.push(`## Speaker Arrays (${config.speakerArrays.length})`);
  if (config.speakerArrays.length === 0) {
    lines.push("No speaker arrays supplied.");
  }
  for (const array of config.speakerArrays) {
    lines.push(`- ${formatSpeakerArray(array)}`);
  }
  lines.push("");

  if (plan.validation.length > 0) {
    lines.push("## Validation");
    for (const report of plan.validation) {
      const status = report.result.isValid ? "VALID" : "INVALID";
      const extra =
        report.method === "vbap"
          ? `optimal spread ${report.result.optimalSpread.toFixed(1)}°`
          : `recommended order ${report.result.recommendedOrder}`;
      lines.push(`- ${report.arrayId} (${report.method.toUpperCase()}): **${status}**, ${extra}`);
    }
    lines.push("");
  }

  if (failures.length > 0) {
    lines.push(`## Conversion Errors (${failures.length})`);
    for (const failure of failures) {
      lines.push(`  [ERROR] [${failure.boxId}] ${failure.message}`);
    }
    lines.push("");
  }

  lines.push(`## Warnings (${plan.warnings.length})`);
  for (const warning of plan.warnings) {
    lines.push(`  [WARN] ${warning}`);
  }
  lines.push("");

  return lines.join("\n");
}

function formatSpatialObject(object: SpatialObject): string {
  const params = object.parameters.map((p) => `${p.name}=${p.value}`).join(", ");
  return (
    `${object.id}: ${spatialLabel(object.objectType)}, ${object.inputs} in / ${object.outputs} out, ` +
    formatAudioFormat(object.format) +
    (params ? `; ${params}` : "")
  );
}

function spatialLabel(type: SpatialObjectType): string {
  switch (type.type) {
    case "hoa-encoder":
    case "hoa-decoder":
      return `${type.type} (order ${type.order})`;
    case "vbap":
      return `vbap (${type.numSpeakers} speakers)`;
    case "generic":
      return `generic (${type.name})`;
    case "panoramix":
      return "panoramix";
  }
}

function formatAudioFormat(format: AudioFormat): string {
  switch (format.type) {
    case "mono":
    case "stereo":
      return format.type;
    case "multichannel":
      return `${format.channels} channels`;
    case "ambisonic":
      return `ambisonic order ${format.order} (${format.dimension}D)`;
  }
}

function formatSpeakerArray(array: SpeakerArray): string {
  const n = array.speakers.length;
  const type = array.arrayType;
  switch (type.type) {
    case "ring":
      return `${array.id}: ring, ${n} speakers, radius ${type.radius.toFixed(2)}m`;
    case "wfs":
      return `${array.id}: wfs, ${n} speakers, length ${type.length.toFixed(2)}m, spacing ${type.spacing.toFixed(3)}m`;
    case "irregular":
      return `${array.id}: irregular, ${n} speakers`;
  }
}
