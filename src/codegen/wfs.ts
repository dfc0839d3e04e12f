/**
 * Wave field synthesis (WFS) parameter generation.
 *
 * Per-speaker delays and gains are carried over from the speaker records;
 * the geometry helpers below compute them for a virtual source when needed.
 */

import { ConversionError } from "../core/errors.js";
import {
  DEFAULT_WFS_CONFIG,
  toRadians,
  type Speaker,
  type SpeakerArray,
  type WfsConfig,
} from "../analysis/spatial.js";
import {
  float,
  floats,
  int,
  scObject,
  symbol,
  type ScObject,
  type ScObjectBuilder,
} from "./sc-object.js";
import type { SphericalCoord } from "../types.js";

/** Room temperature used when the caller has none, in °C. */
export const DEFAULT_TEMPERATURE_C = 20;

// ---------------------------------------------------------------------------
// Array generation
// ---------------------------------------------------------------------------

/**
 * Generate the WFS array description for a classified speaker array.
 */
export function generateWfsArray(array: SpeakerArray): ScObject {
  switch (array.arrayType.type) {
    case "wfs":
      return generateLinearArray(array, array.arrayType.length, array.arrayType.spacing);
    case "ring":
      return generateCircularArray(array, array.arrayType.radius);
    case "irregular":
      return generateIrregularArray(array);
  }
}

function generateLinearArray(array: SpeakerArray, length: number, spacing: number): ScObject {
  const n = array.speakers.length;
  const config = configOf(array);

  return withSourceInputs(scObject("WFSArrayLinear"))
    .arg(int(n))
    .arg(float(length))
    .arg(float(spacing))
    .arg(floats(speakerDelays(array.speakers)))
    .arg(floats(speakerGains(array.speakers)))
    .prop("prefilter_cutoff", float(config.prefilterCutoff))
    .prop("distance_compensation", config.distanceCompensation)
    .prop("amplitude_correction", config.amplitudeCorrection)
    .prop("aliasing_frequency", float(config.aliasingFrequency))
    .prop("comment", `WFS linear array: ${n} speakers, ${length.toFixed(2)}m length`)
    .build();
}

function generateCircularArray(array: SpeakerArray, radius: number): ScObject {
  const n = array.speakers.length;
  const config = configOf(array);

  return withSourceInputs(scObject("WFSArrayCircular"))
    .arg(int(n))
    .arg(float(radius))
    .arg(floats(speakerDelays(array.speakers)))
    .arg(floats(speakerGains(array.speakers)))
    .prop("prefilter_cutoff", float(config.prefilterCutoff))
    .prop("distance_compensation", config.distanceCompensation)
    .prop("amplitude_correction", config.amplitudeCorrection)
    .prop("comment", `WFS circular array: ${n} speakers, ${radius.toFixed(2)}m radius`)
    .build();
}

function generateIrregularArray(array: SpeakerArray): ScObject {
  const n = array.speakers.length;
  const config = configOf(array);
  const { speakers } = array;

  return withSourceInputs(scObject("WFSArrayIrregular"))
    .arg(int(n))
    .arg(floats(speakers.map((s) => s.position.azimuth)))
    .arg(floats(speakers.map((s) => s.position.elevation)))
    .arg(floats(speakers.map((s) => s.position.distance)))
    .arg(floats(speakerDelays(speakers)))
    .arg(floats(speakerGains(speakers)))
    .prop("prefilter_cutoff", float(config.prefilterCutoff))
    .prop("distance_compensation", config.distanceCompensation)
    .prop("comment", `WFS irregular array: ${n} speakers`)
    .build();
}

function withSourceInputs(builder: ScObjectBuilder): ScObjectBuilder {
  return builder
    .ar()
    .arg(symbol("input"))
    .arg(symbol("source_azimuth"))
    .arg(symbol("source_distance"));
}

function configOf(array: SpeakerArray): WfsConfig {
  return array.wfsConfig ?? DEFAULT_WFS_CONFIG;
}

/**
 * Fill the unset frequencies of a linear array's configuration from its
 * speaker spacing. Other arrays keep their configuration as is.
 */
export function deriveWfsConfig(array: SpeakerArray, soundSpeed: number): WfsConfig {
  const config = configOf(array);
  if (array.arrayType.type !== "wfs") return config;

  const aliasing = calculateAliasingFrequency(array.arrayType.spacing, soundSpeed);
  const derived = Number.isFinite(aliasing) ? aliasing : 0;
  return {
    ...config,
    aliasingFrequency: config.aliasingFrequency > 0 ? config.aliasingFrequency : derived,
    prefilterCutoff: config.prefilterCutoff > 0 ? config.prefilterCutoff : derived,
  };
}

function speakerDelays(speakers: readonly Speaker[]): number[] {
  return speakers.map((s) => s.delay);
}

function speakerGains(speakers: readonly Speaker[]): number[] {
  return speakers.map((s) => s.gain);
}

// ---------------------------------------------------------------------------
// Auxiliary stages
// ---------------------------------------------------------------------------

/**
 * Prefilter that reduces spatial aliasing above `cutoff` Hz.
 * @throws ConversionError INVALID_PARAMETER when cutoff is not positive
 */
export function generateWfsPrefilter(cutoff: number): ScObject {
  if (!(cutoff > 0)) {
    throw ConversionError.invalidParameter("cutoff", cutoff);
  }
  return scObject("WFSPrefilter")
    .ar()
    .arg(symbol("input"))
    .arg(float(cutoff))
    .prop("comment", "WFS prefilter for spatial aliasing reduction")
    .build();
}

/** Virtual source in front of the array, focused at `focusDistance`. */
export function generateWfsFocusedSource(
  sourceAzimuth: number,
  sourceDistance: number,
  focusDistance: number,
): ScObject {
  return scObject("WFSFocusedSource")
    .ar()
    .arg(symbol("input"))
    .arg(float(sourceAzimuth))
    .arg(float(sourceDistance))
    .arg(float(focusDistance))
    .prop("comment", "WFS focused source with virtual distance")
    .build();
}

export function generateWfsPlaneWave(azimuth: number): ScObject {
  return scObject("WFSPlaneWave")
    .ar()
    .arg(symbol("input"))
    .arg(float(azimuth))
    .prop("comment", "WFS plane wave synthesis")
    .build();
}

export function generateDistanceCompensation(referenceDistance: number): ScObject {
  return scObject("WFSDistanceCompensation")
    .ar()
    .arg(symbol("input"))
    .arg(symbol("source_distance"))
    .arg(float(referenceDistance))
    .prop("comment", "WFS distance-based amplitude compensation")
    .build();
}

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

/** Speed of sound in air, m/s. */
export function speedOfSound(temperatureCelsius: number = DEFAULT_TEMPERATURE_C): number {
  return 343 + 0.6 * temperatureCelsius;
}

/**
 * Propagation delay in seconds from a virtual source to a speaker, measured
 * in the horizontal plane.
 */
export function calculateSpeakerDelay(
  speaker: SphericalCoord,
  sourceAzimuth: number,
  sourceDistance: number,
  soundSpeed: number,
): number {
  const speakerX = speaker.distance * Math.cos(toRadians(speaker.azimuth));
  const speakerY = speaker.distance * Math.sin(toRadians(speaker.azimuth));
  const sourceX = sourceDistance * Math.cos(toRadians(sourceAzimuth));
  const sourceY = sourceDistance * Math.sin(toRadians(sourceAzimuth));

  return Math.hypot(speakerX - sourceX, speakerY - sourceY) / soundSpeed;
}

/**
 * Amplitude factor for a speaker. A source distance of zero or less is a
 * plane wave and gets unity gain; a speaker at the reference point adds no
 * speaker factor.
 */
export function calculateWfsAmplitude(
  speaker: SphericalCoord,
  sourceDistance: number,
  referenceDistance: number,
): number {
  if (sourceDistance <= 0) return 1;

  const distanceFactor = Math.sqrt(referenceDistance / sourceDistance);
  const speakerFactor = speaker.distance > 0 ? Math.sqrt(referenceDistance / speaker.distance) : 1;
  return distanceFactor * speakerFactor;
}

/**
 * Frequency above which an array with the given speaker spacing aliases,
 * c / (2 · spacing). Zero spacing has no aliasing limit.
 */
export function calculateAliasingFrequency(spacing: number, soundSpeed: number): number {
  if (spacing <= 0) return Number.POSITIVE_INFINITY;
  return soundSpeed / (2 * spacing);
}
