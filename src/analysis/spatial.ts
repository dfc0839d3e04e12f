/**
 * Spatial configuration analysis.
 *
 * Scans a patch for spatial-processing objects, classifies speaker arrays
 * from their geometry, and picks the spatial algorithm the converted project
 * should target.
 */

import { lexObject, tokenize, type SpatialObjectType } from "../core/object-kind.js";
import { AnalysisError } from "../core/errors.js";
import type {
  AudioFormat,
  MaxBox,
  MaxPatch,
  SpeakerArrayRecord,
  SphericalCoord,
} from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SpatialParameter {
  name: string;
  value: number;
  /** Inclusive valid range. */
  range: [number, number];
}

export interface SpatialObject {
  id: string;
  objectType: SpatialObjectType;
  inputs: number;
  outputs: number;
  format: AudioFormat;
  parameters: SpatialParameter[];
}

export interface Speaker {
  id: number;
  position: SphericalCoord;
  delay: number;
  gain: number;
}

export type SpeakerArrayType =
  | { type: "ring"; radius: number }
  | { type: "wfs"; length: number; spacing: number }
  | { type: "irregular" };

export interface WfsConfig {
  /** Hz. */
  prefilterCutoff: number;
  distanceCompensation: boolean;
  amplitudeCorrection: boolean;
  /** Hz. */
  aliasingFrequency: number;
}

export interface SpeakerArray {
  id: string;
  arrayType: SpeakerArrayType;
  speakers: Speaker[];
  wfsConfig?: WfsConfig;
}

export type SpatialProcessingMethod = "stereo" | "vbap" | "hoa" | "wfs";

export interface SpatialConfig {
  spatialObjects: SpatialObject[];
  speakerArrays: SpeakerArray[];
  processingMethod: SpatialProcessingMethod;
}

export interface SpatialAnalysisOptions {
  /** Return no spatial objects at all. */
  skipSpatial?: boolean;
}

export const DEFAULT_WFS_CONFIG: WfsConfig = {
  prefilterCutoff: 0,
  distanceCompensation: false,
  amplitudeCorrection: false,
  aliasingFrequency: 0,
};

// Classification thresholds
const WFS_MIN_SPEAKERS = 16;
const RING_MIN_SPEAKERS = 4;
const VBAP_MIN_SPEAKERS = 4;
const ELEVATION_TOLERANCE_DEG = 10;
const DISTANCE_TOLERANCE_M = 0.5;

/** Valid ranges for the `@attribute value` pairs spatial objects accept. */
const PARAMETER_RANGES: Record<string, [number, number]> = {
  inputs: [1, 128],
  outputs: [1, 128],
  buses: [1, 64],
  order: [1, 7],
  speakers: [3, 128],
  gain: [-144, 24],
  spread: [0, 100],
};

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Analyze the spatial objects of a patch together with its speaker arrays
 * and choose a processing method.
 */
export function analyzeSpatialConfig(
  patch: MaxPatch,
  speakerRecords: readonly SpeakerArrayRecord[] = [],
  options: SpatialAnalysisOptions = {},
): SpatialConfig {
  const spatialObjects = analyzeSpatialObjects(patch, options);
  const speakerArrays = analyzeSpeakerArrays(speakerRecords);
  const processingMethod = determineProcessingMethod({ spatialObjects, speakerArrays });
  return { spatialObjects, speakerArrays, processingMethod };
}

// ---------------------------------------------------------------------------
// Spatial objects
// ---------------------------------------------------------------------------

/**
 * Find spatial objects in a patch. Boxes that are not spatial objects are
 * ignored.
 */
export function analyzeSpatialObjects(
  patch: MaxPatch,
  options: SpatialAnalysisOptions = {},
): SpatialObject[] {
  if (options.skipSpatial) return [];

  const objects: SpatialObject[] = [];
  for (const box of patch.boxes) {
    const kind = lexObject(box.maxclass, box.text);
    if (kind.kind !== "spatial") continue;

    objects.push({
      id: box.id,
      objectType: kind.spatial,
      inputs: box.numInlets,
      outputs: box.numOutlets,
      format: formatFor(kind.spatial, box),
      parameters: extractParameters(box.text ?? ""),
    });
  }
  return objects;
}

function formatFor(objectType: SpatialObjectType, box: MaxBox): AudioFormat {
  switch (objectType.type) {
    case "hoa-encoder":
      return { type: "ambisonic", order: objectType.order, dimension: 3 };
    case "vbap":
      return { type: "multichannel", channels: objectType.numSpeakers };
    case "panoramix":
    case "hoa-decoder":
    case "generic":
      return { type: "multichannel", channels: box.numOutlets };
  }
}

/** Pull `@name <number>` pairs for attributes with a known range. */
function extractParameters(text: string): SpatialParameter[] {
  const tokens = tokenize(text);
  const params: SpatialParameter[] = [];

  for (let i = 0; i < tokens.length - 1; i++) {
    if (!tokens[i].startsWith("@")) continue;
    const name = tokens[i].slice(1);
    const range = PARAMETER_RANGES[name];
    const value = Number(tokens[i + 1]);
    if (range && Number.isFinite(value)) {
      params.push({ name, value, range });
    }
  }
  return params;
}

// ---------------------------------------------------------------------------
// Speaker arrays
// ---------------------------------------------------------------------------

/**
 * Convert speaker-geometry records to classified speaker arrays.
 *
 * @throws AnalysisError UNSUPPORTED_SPATIAL for an array without speakers
 */
export function analyzeSpeakerArrays(
  records: readonly SpeakerArrayRecord[],
): SpeakerArray[] {
  return records.map((record) => {
    if (record.speakers.length === 0) {
      throw AnalysisError.unsupportedSpatial(`speaker array "${record.name}" has no speakers`);
    }

    const speakers: Speaker[] = record.speakers.map((s) => ({
      id: s.id,
      position: { azimuth: s.azimuth, elevation: s.elevation, distance: s.distance },
      delay: s.delay,
      gain: s.gain,
    }));
    const arrayType = determineArrayType(speakers);

    return {
      id: record.name,
      arrayType,
      speakers,
      wfsConfig: arrayType.type === "wfs" ? { ...DEFAULT_WFS_CONFIG } : undefined,
    };
  });
}

/**
 * Classify an array's topology. The WFS check runs first, then the ring
 * check; anything else is irregular.
 */
export function determineArrayType(speakers: readonly Speaker[]): SpeakerArrayType {
  if (speakers.length >= WFS_MIN_SPEAKERS && isLinearArray(speakers)) {
    return {
      type: "wfs",
      length: calculateArrayLength(speakers),
      spacing: calculateSpeakerSpacing(speakers),
    };
  }
  if (speakers.length >= RING_MIN_SPEAKERS && isCircularArray(speakers)) {
    return { type: "ring", radius: averageDistance(speakers) };
  }
  return { type: "irregular" };
}

/** All elevations lie within the tolerance of the mean elevation. */
function isLinearArray(speakers: readonly Speaker[]): boolean {
  const mean = average(speakers.map((s) => s.position.elevation));
  return speakers.every(
    (s) => Math.abs(s.position.elevation - mean) < ELEVATION_TOLERANCE_DEG,
  );
}

/** All distances lie within the tolerance of the mean distance. */
function isCircularArray(speakers: readonly Speaker[]): boolean {
  const mean = averageDistance(speakers);
  return speakers.every(
    (s) => Math.abs(s.position.distance - mean) < DISTANCE_TOLERANCE_M,
  );
}

/** Angular span converted to an arc length at the mean distance. */
function calculateArrayLength(speakers: readonly Speaker[]): number {
  const azimuths = speakers.map((s) => s.position.azimuth);
  const span = Math.max(...azimuths) - Math.min(...azimuths);
  return averageDistance(speakers) * toRadians(span);
}

/** Mean gap between azimuth-sorted neighbours, as an arc length. */
function calculateSpeakerSpacing(speakers: readonly Speaker[]): number {
  if (speakers.length < 2) return 0;

  const sorted = speakers.map((s) => s.position.azimuth).sort((a, b) => a - b);
  const span = sorted[sorted.length - 1] - sorted[0];
  return averageDistance(speakers) * toRadians(span / (speakers.length - 1));
}

export function averageDistance(speakers: readonly Speaker[]): number {
  return average(speakers.map((s) => s.position.distance));
}

// ---------------------------------------------------------------------------
// Processing method
// ---------------------------------------------------------------------------

/**
 * Pick the spatial algorithm: any WFS array wins, then HOA intent in the
 * patch, then VBAP when some array has enough speakers, else stereo.
 */
export function determineProcessingMethod(
  config: Pick<SpatialConfig, "spatialObjects" | "speakerArrays">,
): SpatialProcessingMethod {
  if (config.speakerArrays.some((a) => a.arrayType.type === "wfs")) {
    return "wfs";
  }

  const hasHoa = config.spatialObjects.some(
    (o) => o.objectType.type === "hoa-encoder" || o.objectType.type === "hoa-decoder",
  );
  if (hasHoa) return "hoa";

  const maxSpeakers = Math.max(0, ...config.speakerArrays.map((a) => a.speakers.length));
  if (maxSpeakers >= VBAP_MIN_SPEAKERS) return "vbap";

  return "stereo";
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}
