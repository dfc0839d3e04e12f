/**
 * Vector base amplitude panning (VBAP) parameter generation and gain solving.
 */

import {
  averageDistance,
  toRadians,
  type Speaker,
  type SpeakerArray,
} from "../analysis/spatial.js";
import { float, floats, int, list, scObject, symbol, type ScObject } from "./sc-object.js";
import type { SphericalCoord } from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DistanceCompensation = "none" | "linear" | "inverseSquare";

export type SpreadType = "linear" | "gaussian" | "uniform";

export interface VbapValidationResult {
  isValid: boolean;
  warnings: string[];
  errors: string[];
  /** Mean angular gap between neighbouring speakers, in degrees. */
  optimalSpread: number;
}

export type Vec3 = [number, number, number];

const MIN_SPEAKERS = 3;
const MIN_SEPARATION_DEG = 10;
/** Arrays whose elevations all lie within this band pan in the horizontal plane. */
const FLAT_ELEVATION_DEG = 1;
const GAIN_EPSILON = 1e-6;

const COMPENSATION_FACTORS: Record<DistanceCompensation, number> = {
  none: 0,
  linear: 1,
  inverseSquare: 2,
};

// ---------------------------------------------------------------------------
// Speaker setup
// ---------------------------------------------------------------------------

/**
 * Generate the speaker setup for an array: sorted angles for a ring,
 * spherical triples for a linear (WFS) array, cartesian triples otherwise.
 */
export function generateVbapSetup(array: SpeakerArray): ScObject {
  switch (array.arrayType.type) {
    case "ring":
      return generateRingSetup(array, array.arrayType.radius);
    case "wfs":
      return generateLinearSetup(array);
    case "irregular":
      return generateIrregularSetup(array);
  }
}

/**
 * Setup whose dimension matches the panner: an elevated ring is given as
 * cartesian triples for 3D panning, and a non-ring array panned in 2D as
 * sorted angles at its mean distance.
 */
export function generatePannerSetup(array: SpeakerArray, use3d: boolean): ScObject {
  const isRing = array.arrayType.type === "ring";
  if (use3d) {
    return isRing ? generateIrregularSetup(array) : generateVbapSetup(array);
  }
  return isRing ? generateVbapSetup(array) : generateRingSetup(array, averageDistance(array.speakers));
}

function generateRingSetup(array: SpeakerArray, radius: number): ScObject {
  const n = array.speakers.length;
  const angles = array.speakers.map((s) => s.position.azimuth).sort((a, b) => a - b);

  return scObject("VBAPSpeakerSetup")
    .method("new")
    .arg(int(n))
    .arg("ring")
    .arg(float(radius))
    .arg(floats(angles))
    .prop("dimension", "2D")
    .prop("buffer_size", int(512))
    .prop("comment", `VBAP ring setup: ${n} speakers, ${radius.toFixed(2)}m radius`)
    .build();
}

function generateLinearSetup(array: SpeakerArray): ScObject {
  const n = array.speakers.length;
  const positions = array.speakers.map(({ position }) =>
    floats([position.azimuth, position.elevation, position.distance]),
  );

  return scObject("VBAPSpeakerSetup")
    .method("new")
    .arg(int(n))
    .arg("linear")
    .arg(list(positions))
    .prop("dimension", "3D")
    .prop("comment", `VBAP linear setup: ${n} speakers`)
    .build();
}

function generateIrregularSetup(array: SpeakerArray): ScObject {
  const n = array.speakers.length;
  const positions = array.speakers.map((s) => floats(sphericalToCartesian(s.position)));

  return scObject("VBAPSpeakerSetup")
    .method("new")
    .arg(int(n))
    .arg("irregular")
    .arg(list(positions))
    .prop("dimension", "3D")
    .prop("triangulation", "auto")
    .prop("comment", `VBAP irregular setup: ${n} speakers`)
    .build();
}

// ---------------------------------------------------------------------------
// Panners
// ---------------------------------------------------------------------------

export function generateVbapPanner(numChannels: number, speakerSetup: string, use3d: boolean): ScObject {
  return scObject(use3d ? "VBAP3D" : "VBAP")
    .ar()
    .arg(int(numChannels))
    .arg(symbol("input"))
    .arg(symbol("azimuth"))
    .arg(symbol("elevation"))
    .arg(symbol("spread"))
    .arg(symbol("gain"))
    .prop("speaker_setup", speakerSetup)
    .prop("comment", `VBAP panner: ${numChannels} channels, ${use3d ? "3D" : "2D"}`)
    .build();
}

/** Panner with distance attenuation. */
export function generateDistanceVbap(
  numChannels: number,
  compensation: DistanceCompensation,
): ScObject {
  return scObject("VBAPDistance")
    .ar()
    .arg(int(numChannels))
    .arg(symbol("input"))
    .arg(symbol("azimuth"))
    .arg(symbol("elevation"))
    .arg(symbol("distance"))
    .arg(symbol("spread"))
    .arg(float(COMPENSATION_FACTORS[compensation]))
    .prop("reference_distance", float(2))
    .prop("comment", `Distance VBAP: ${numChannels} channels, ${compensation} compensation`)
    .build();
}

export function generateSpreadVbap(numChannels: number, spread: SpreadType): ScObject {
  return scObject("VBAPSpread")
    .ar()
    .arg(int(numChannels))
    .arg(symbol("input"))
    .arg(symbol("azimuth"))
    .arg(symbol("elevation"))
    .arg(symbol("spread_amount"))
    .arg(spread)
    .prop("comment", `VBAP with ${spread} spread: ${numChannels} channels`)
    .build();
}

/** Triplet search over the convex hull of a 3-D array. */
export function generateTripletCalculation(array: SpeakerArray): ScObject {
  return scObject("VBAPTriplets")
    .method("calculate")
    .arg(int(array.speakers.length))
    .arg(symbol("speaker_positions"))
    .prop("hull_method", "convex")
    .prop("angle_threshold", float(MIN_SEPARATION_DEG))
    .prop("comment", "VBAP triplet calculation for 3D panning")
    .build();
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Check that an array can drive VBAP. Fewer than three speakers is an error;
 * pairs closer than 10° in azimuth are warnings.
 */
export function validateSpeakerSetup(array: SpeakerArray): VbapValidationResult {
  const result: VbapValidationResult = {
    isValid: true,
    warnings: [],
    errors: [],
    optimalSpread: 0,
  };

  const { speakers } = array;
  if (speakers.length < MIN_SPEAKERS) {
    result.isValid = false;
    result.errors.push(`VBAP requires at least ${MIN_SPEAKERS} speakers`);
    return result;
  }

  for (let i = 0; i < speakers.length; i++) {
    for (let j = i + 1; j < speakers.length; j++) {
      const diff = Math.abs(speakers[i].position.azimuth - speakers[j].position.azimuth);
      if (diff < MIN_SEPARATION_DEG) {
        result.warnings.push(`Speakers ${i} and ${j} are very close (${diff.toFixed(1)}°)`);
      }
    }
  }

  result.optimalSpread = calculateOptimalSpread(array);
  return result;
}

/**
 * Mean azimuth gap between sorted neighbours, wrap-around gap included.
 * An even ring of n speakers gives 360 / n.
 */
export function calculateOptimalSpread(array: SpeakerArray): number {
  const n = array.speakers.length;
  if (n < 2) return 0;

  const angles = array.speakers.map((s) => s.position.azimuth).sort((a, b) => a - b);
  let total = 0;
  for (let i = 1; i < n; i++) {
    total += angles[i] - angles[i - 1];
  }
  total += (360 + angles[0] - angles[n - 1]) % 360;

  return total / n;
}

// ---------------------------------------------------------------------------
// Gain solving
// ---------------------------------------------------------------------------

export function sphericalToCartesian(position: SphericalCoord): Vec3 {
  const az = toRadians(position.azimuth);
  const el = toRadians(position.elevation);
  return [
    position.distance * Math.cos(el) * Math.cos(az),
    position.distance * Math.cos(el) * Math.sin(az),
    position.distance * Math.sin(el),
  ];
}

/** True when every speaker sits within the horizontal band. */
export function isHorizontalArray(speakers: readonly Speaker[]): boolean {
  return speakers.every((s) => Math.abs(s.position.elevation) <= FLAT_ELEVATION_DEG);
}

/**
 * Find the speakers that enclose a direction.
 *
 * Horizontal arrays return an azimuth-adjacent pair, others the triplet
 * whose smallest gain is largest. Returns undefined for fewer than three
 * speakers or when no group encloses the direction.
 */
export function findOptimalTriangle(
  azimuth: number,
  elevation: number,
  speakers: readonly Speaker[],
): number[] | undefined {
  if (speakers.length < MIN_SPEAKERS) return undefined;

  if (isHorizontalArray(speakers)) {
    return findEnclosingPair(azimuth, speakers);
  }

  let best: number[] | undefined;
  let bestMin = -GAIN_EPSILON;
  for (let i = 0; i < speakers.length; i++) {
    for (let j = i + 1; j < speakers.length; j++) {
      for (let k = j + 1; k < speakers.length; k++) {
        const gains = solveGains(azimuth, elevation, [i, j, k], speakers);
        if (!gains) continue;
        const min = Math.min(...gains);
        if (min >= bestMin) {
          best = [i, j, k];
          bestMin = min;
        }
      }
    }
  }
  return best;
}

function findEnclosingPair(azimuth: number, speakers: readonly Speaker[]): number[] | undefined {
  const order = speakers
    .map((s, index) => ({ index, azimuth: s.position.azimuth }))
    .sort((a, b) => a.azimuth - b.azimuth)
    .map((entry) => entry.index);

  for (let i = 0; i < order.length; i++) {
    const pair = [order[i], order[(i + 1) % order.length]];
    const gains = solveGains(azimuth, 0, pair, speakers);
    if (gains && gains.every((g) => g >= -GAIN_EPSILON)) return pair;
  }
  return undefined;
}

/**
 * Power-normalised gains for a speaker pair or triplet, from the inverse of
 * the speaker direction matrix. A singular group gets zero gains.
 */
export function calculateVbapGains(
  azimuth: number,
  elevation: number,
  group: readonly number[],
  speakers: readonly Speaker[],
): number[] {
  const gains = solveGains(azimuth, elevation, group, speakers);
  if (!gains) return group.map(() => 0);

  const clamped = gains.map((g) => Math.max(0, g));
  const norm = Math.hypot(...clamped);
  return norm > 0 ? clamped.map((g) => g / norm) : clamped;
}

function solveGains(
  azimuth: number,
  elevation: number,
  group: readonly number[],
  speakers: readonly Speaker[],
): number[] | undefined {
  const p = unitVector(azimuth, elevation);
  const dirs = group.map((index) => {
    const { position } = speakers[index];
    return unitVector(position.azimuth, group.length === 2 ? 0 : position.elevation);
  });

  if (dirs.length === 2) {
    const [l1, l2] = dirs;
    const det = l1[0] * l2[1] - l1[1] * l2[0];
    if (Math.abs(det) < GAIN_EPSILON) return undefined;
    return [(p[0] * l2[1] - p[1] * l2[0]) / det, (l1[0] * p[1] - l1[1] * p[0]) / det];
  }

  if (dirs.length === 3) {
    const [l1, l2, l3] = dirs;
    const det = dot(l1, cross(l2, l3));
    if (Math.abs(det) < GAIN_EPSILON) return undefined;
    return [
      dot(p, cross(l2, l3)) / det,
      dot(l1, cross(p, l3)) / det,
      dot(l1, cross(l2, p)) / det,
    ];
  }

  return undefined;
}

function unitVector(azimuth: number, elevation: number): Vec3 {
  return sphericalToCartesian({ azimuth, elevation, distance: 1 });
}

function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

function cross(a: Vec3, b: Vec3): Vec3 {
  return [a[1] * b[2] - a[2] * b[1], a[2] * b[0] - a[0] * b[2], a[0] * b[1] - a[1] * b[0]];
}
