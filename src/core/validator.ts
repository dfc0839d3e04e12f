/**
 * Patch validator: detects broken cables, out-of-range ports, orphan
 * boxes, unknown objects and missing DSP output.
 *
 * Unlike the graph builder, which refuses a malformed patch outright, the
 * validator reports every problem it finds and never throws.
 */

import type { MaxBox, MaxPatch } from "../types.js";
import { parsePort } from "../analysis/graph.js";
import { isAudioBearing, lexObject, SPATIAL_PREFIX, tokenize } from "./object-kind.js";
import { lookupObject } from "./object-registry.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ValidationIssue {
  severity: "error" | "warning" | "info";
  code: string;
  message: string;
  /** Box id if the issue relates to a specific box. */
  boxId?: string;
}

export interface ValidationResult {
  valid: boolean;
  issues: ValidationIssue[];
  summary: { errors: number; warnings: number; infos: number };
}

interface Endpoint {
  box: MaxBox;
  port: number;
}

// ---------------------------------------------------------------------------
// Exception lists
// ---------------------------------------------------------------------------

/** Box classes that never take part in patching. */
const DECORATIVE_CLASSES = new Set(["comment", "panel", "fpic"]);

/** Objects that legitimately have zero cables. */
const ORPHAN_EXCEPTIONS = new Set([
  // wireless
  "send", "s", "receive", "r", "send~", "receive~",
  // data objects accessed by name
  "buffer~", "value", "v",
  // fire-and-forget
  "loadbang", "print", "udpreceive",
  // monitoring
  "spat5.viewer",
]);

/** Non-DAC objects that terminate an audio chain. */
const EXTRA_DSP_SINKS = new Set(["send~", "sfrecord~", "record~"]);

// ---------------------------------------------------------------------------
// Main validation function
// ---------------------------------------------------------------------------

/**
 * Validate a decoded patch, returning all detected issues.
 */
export function validatePatch(patch: MaxPatch): ValidationResult {
  const issues: ValidationIssue[] = [];
  const boxes = new Map(patch.boxes.map((box) => [box.id, box] as const));

  const cables = checkConnections(patch, boxes, issues);
  checkDuplicateConnections(cables, issues);
  checkUnknownObjects(patch, issues);
  checkOrphanObjects(patch, cables, issues);
  checkDspSink(patch, issues);

  const errors = issues.filter((i) => i.severity === "error").length;
  const warnings = issues.filter((i) => i.severity === "warning").length;
  const infos = issues.filter((i) => i.severity === "info").length;

  return {
    valid: errors === 0,
    issues,
    summary: { errors, warnings, infos },
  };
}

// ---------------------------------------------------------------------------
// Check 1-4: Cable validity (endpoints, outlet/inlet bounds)
// ---------------------------------------------------------------------------

/** Returns the cables whose both ends resolved. */
function checkConnections(
  patch: MaxPatch,
  boxes: ReadonlyMap<string, MaxBox>,
  issues: ValidationIssue[],
): Array<{ from: Endpoint; to: Endpoint }> {
  const resolved: Array<{ from: Endpoint; to: Endpoint }> = [];

  patch.lines.forEach((line, index) => {
    // Check 1: source endpoint
    const from = resolveEndpoint(line.source, boxes);
    if (typeof from === "string") {
      issues.push({
        severity: "error",
        code: "BROKEN_CONNECTION_SOURCE",
        message: `Cable ${index} source ${from}`,
      });
    }

    // Check 2: destination endpoint
    const to = resolveEndpoint(line.destination, boxes);
    if (typeof to === "string") {
      issues.push({
        severity: "error",
        code: "BROKEN_CONNECTION_TARGET",
        message: `Cable ${index} destination ${to}`,
      });
    }

    if (typeof from === "string" || typeof to === "string") return;

    // Check 3: outlet in bounds
    if (from.port >= from.box.numOutlets) {
      issues.push({
        severity: "error",
        code: "OUTLET_OUT_OF_BOUNDS",
        message: `${boxDesc(from.box)} outlet ${from.port} out of bounds (has ${from.box.numOutlets} outlets)`,
        boxId: from.box.id,
      });
    }

    // Check 4: inlet in bounds
    if (to.port >= to.box.numInlets) {
      issues.push({
        severity: "error",
        code: "INLET_OUT_OF_BOUNDS",
        message: `${boxDesc(to.box)} inlet ${to.port} out of bounds (has ${to.box.numInlets} inlets)`,
        boxId: to.box.id,
      });
    }

    resolved.push({ from, to });
  });

  return resolved;
}

/** The resolved endpoint, or a description of what is wrong with it. */
function resolveEndpoint(
  endpoint: unknown,
  boxes: ReadonlyMap<string, MaxBox>,
): Endpoint | string {
  if (!Array.isArray(endpoint) || endpoint.length !== 2) {
    return "is not a [id, port] pair";
  }
  const [id, rawPort]: unknown[] = endpoint;
  const port = parsePort(rawPort);
  if (typeof id !== "string" || port === undefined) {
    return "is malformed";
  }
  const box = boxes.get(id);
  if (!box) {
    return `references unknown object "${id}"`;
  }
  return { box, port };
}

// ---------------------------------------------------------------------------
// Check 5: Duplicate cables
// ---------------------------------------------------------------------------

function checkDuplicateConnections(
  cables: ReadonlyArray<{ from: Endpoint; to: Endpoint }>,
  issues: ValidationIssue[],
): void {
  const seen = new Set<string>();
  for (const { from, to } of cables) {
    const key = `${from.box.id}:${from.port}:${to.box.id}:${to.port}`;
    if (seen.has(key)) {
      issues.push({
        severity: "warning",
        code: "DUPLICATE_CONNECTION",
        message: `Duplicate connection: ${from.box.id}[${from.port}] → ${to.box.id}[${to.port}]`,
      });
    }
    seen.add(key);
  }
}

// ---------------------------------------------------------------------------
// Check 6: Unknown objects
// ---------------------------------------------------------------------------

function checkUnknownObjects(patch: MaxPatch, issues: ValidationIssue[]): void {
  for (const box of patch.boxes) {
    if (box.maxclass !== "newobj") continue;
    const name = objectName(box);
    if (!name) continue;

    // Spatial objects are handled generically even when unlisted
    if (name.startsWith(SPATIAL_PREFIX)) continue;

    if (!lookupObject(name)) {
      issues.push({
        severity: "warning",
        code: "UNKNOWN_OBJECT",
        message: `Unknown object: "${name}" (not in Max object registry)`,
        boxId: box.id,
      });
    }
  }
}

// ---------------------------------------------------------------------------
// Check 7: Orphan objects (no cables at all)
// ---------------------------------------------------------------------------

function checkOrphanObjects(
  patch: MaxPatch,
  cables: ReadonlyArray<{ from: Endpoint; to: Endpoint }>,
  issues: ValidationIssue[],
): void {
  const connected = new Set<string>();
  for (const { from, to } of cables) {
    connected.add(from.box.id);
    connected.add(to.box.id);
  }

  for (const box of patch.boxes) {
    if (connected.has(box.id)) continue;
    if (DECORATIVE_CLASSES.has(box.maxclass)) continue;

    const name = objectName(box);
    if (name && ORPHAN_EXCEPTIONS.has(name)) continue;

    issues.push({
      severity: "warning",
      code: "ORPHAN_OBJECT",
      message: `${boxDesc(box)} has no connections`,
      boxId: box.id,
    });
  }
}

// ---------------------------------------------------------------------------
// Check 8: No DSP sink (audio objects exist but no output)
// ---------------------------------------------------------------------------

function checkDspSink(patch: MaxPatch, issues: ValidationIssue[]): void {
  const kinds = patch.boxes.map((box) => lexObject(box.maxclass, box.text));
  const audioCount = kinds.filter(isAudioBearing).length;
  if (audioCount === 0) return;

  const hasSink = kinds.some(
    (kind) =>
      kind.kind === "output" ||
      (kind.kind === "spatial" &&
        (kind.spatial.type === "panoramix" || kind.spatial.type === "generic")) ||
      (kind.kind === "audio" && EXTRA_DSP_SINKS.has(kind.name)),
  );

  if (!hasSink) {
    issues.push({
      severity: "warning",
      code: "NO_DSP_SINK",
      message: `Patch has ${audioCount} audio objects but no DSP sink (dac~, ezdac~, send~, spat5.panoramix~)`,
    });
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function objectName(box: MaxBox): string | undefined {
  return tokenize(box.text ?? "")[0];
}

function boxDesc(box: MaxBox): string {
  return `[${box.id}] ${objectName(box) ?? box.maxclass}`;
}
