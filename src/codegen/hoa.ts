/**
 * Higher-order ambisonics (HOA) parameter generation.
 *
 * First order uses the FOA objects, higher orders the general HOA objects
 * with (order + 1)² channels.
 */

import { ConversionError } from "../core/errors.js";
import type { SpeakerArray } from "../analysis/spatial.js";
import {
  floats,
  int,
  list,
  scObject,
  symbol,
  type ScObject,
  type ScObjectBuilder,
  type ScValue,
} from "./sc-object.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type HoaDecoderType = "basic" | "maxRe" | "inPhase" | "controlled" | "binaural";

export type HoaMirrorAxis = "x" | "y" | "z" | "xy" | "yz" | "xz";

export type HoaFocusType = "push" | "press" | "zoom";

export type HrtfType = "diffuse" | "spherical" | "cipic" | "listen";

/**
 * Decoder matrix handed to a decoder: either rows of gains (one row per
 * speaker) or the name of a matrix the target already holds.
 */
export type DecoderMatrix = readonly (readonly number[])[] | string;

export interface HoaValidationResult {
  isValid: boolean;
  warnings: string[];
  errors: string[];
  recommendedOrder: number;
}

export const DEFAULT_DECODER_MATRIX = "decoder_matrix";

const MAX_ORDER = 7;
const MAX_RECOMMENDED_ORDER = 5;

/** Channels of a 3-D ambisonic signal of the given order. */
export function channelCount(order: number): number {
  return (order + 1) ** 2;
}

// ---------------------------------------------------------------------------
// Encoding and decoding
// ---------------------------------------------------------------------------

/**
 * @throws ConversionError UNSUPPORTED_OBJECT for a higher-order 2-D request
 *   or any dimension other than 2 and 3
 */
export function generateHoaEncoder(order: number, dimension: number): ScObject {
  if (order === 1 && dimension === 2) {
    return scObject("FoaEncode")
      .ar()
      .arg(symbol("input"))
      .arg(symbol("azimuth"))
      .prop("encoder_type", "omni")
      .prop("dimension", "2D")
      .prop("order", int(1))
      .prop("channels", int(3))
      .prop("comment", "FOA 2D encoder")
      .build();
  }

  if (order === 1 && dimension === 3) {
    return scObject("FoaEncode")
      .ar()
      .arg(symbol("input"))
      .arg(symbol("azimuth"))
      .arg(symbol("elevation"))
      .prop("encoder_type", "omni")
      .prop("dimension", "3D")
      .prop("order", int(1))
      .prop("channels", int(4))
      .prop("comment", "FOA 3D encoder")
      .build();
  }

  if (order > 1 && dimension === 3) {
    const channels = channelCount(order);
    return scObject("HoaEncode")
      .ar()
      .arg(int(order))
      .arg(symbol("input"))
      .arg(symbol("azimuth"))
      .arg(symbol("elevation"))
      .prop("dimension", "3D")
      .prop("order", int(order))
      .prop("channels", int(channels))
      .prop("comment", `HOA 3D encoder, order ${order}, ${channels} channels`)
      .build();
  }

  throw ConversionError.unsupportedObject(
    `HOA configuration order ${order}, dimension ${dimension}`,
  );
}

/**
 * Decoder for a speaker array. The matrix is passed through as given:
 * numeric rows become a nested float array, a name becomes a symbol.
 */
export function generateHoaDecoder(
  order: number,
  array: SpeakerArray,
  decoderType: HoaDecoderType,
  decoderMatrix: DecoderMatrix = DEFAULT_DECODER_MATRIX,
): ScObject {
  const n = array.speakers.length;
  const matrix = matrixValue(decoderMatrix);

  if (order === 1) {
    const positions = array.speakers.map(({ position }) =>
      floats([position.azimuth, position.elevation, position.distance]),
    );
    return scObject("FoaDecode")
      .ar()
      .arg(symbol("encoded_input"))
      .arg(matrix)
      .prop("decoder_type", decoderType)
      .prop("num_speakers", int(n))
      .prop("speaker_positions", list(positions))
      .prop("order", int(1))
      .prop("comment", `FOA decoder: ${decoderType} method, ${n} speakers`)
      .build();
  }

  return scObject("HoaDecode")
    .ar()
    .arg(int(order))
    .arg(int(n))
    .arg(symbol("encoded_input"))
    .arg(matrix)
    .prop("decoder_type", decoderType)
    .prop("channels", int(channelCount(order)))
    .prop("comment", `HOA decoder: order ${order}, ${decoderType} method, ${n} speakers`)
    .build();
}

function matrixValue(matrix: DecoderMatrix): ScValue {
  if (typeof matrix === "string") return symbol(matrix);
  return list(matrix.map((row) => floats(row)));
}

export function generateBinauralDecoder(order: number, hrtf: HrtfType): ScObject {
  if (order === 1) {
    return scObject("FoaDecode")
      .ar()
      .arg(symbol("encoded_input"))
      .arg("binaural")
      .prop("hrtf_type", hrtf)
      .prop("order", int(1))
      .prop("channels", int(2))
      .prop("comment", `FOA binaural decoder: ${hrtf}`)
      .build();
  }
  return scObject("HoaBinaural")
    .ar()
    .arg(int(order))
    .arg(symbol("encoded_input"))
    .prop("hrtf_type", hrtf)
    .prop("order", int(order))
    .prop("channels", int(2))
    .prop("comment", `HOA binaural decoder: ${hrtf}, order ${order}`)
    .build();
}

// ---------------------------------------------------------------------------
// Soundfield transforms
// ---------------------------------------------------------------------------

/** FOA or HOA class name and the leading order argument HOA objects take. */
function transform(foaName: string, hoaName: string, order: number): ScObjectBuilder {
  return order === 1
    ? scObject(foaName).ar()
    : scObject(hoaName).ar().arg(int(order));
}

export function generateHoaRotation(order: number): ScObject {
  return transform("FoaRotate", "HoaRotate", order)
    .arg(symbol("encoded_input"))
    .arg(symbol("azimuth"))
    .arg(symbol("elevation"))
    .arg(symbol("roll"))
    .prop("order", int(order))
    .prop("comment", order === 1 ? "FOA rotation transform" : `HOA rotation transform, order ${order}`)
    .build();
}

export function generateHoaMirror(order: number, axis: HoaMirrorAxis): ScObject {
  return transform("FoaMirror", "HoaMirror", order)
    .arg(symbol("encoded_input"))
    .arg(axis)
    .prop("order", int(order))
    .prop(
      "comment",
      order === 1
        ? `FOA mirror transform: ${axis} axis`
        : `HOA mirror transform: ${axis} axis, order ${order}`,
    )
    .build();
}

export function generateHoaFocus(order: number, focus: HoaFocusType): ScObject {
  return transform("FoaFocus", "HoaFocus", order)
    .arg(symbol("encoded_input"))
    .arg(symbol("azimuth"))
    .arg(symbol("elevation"))
    .arg(symbol("focus_amount"))
    .prop("focus_type", focus)
    .prop("order", int(order))
    .prop(
      "comment",
      order === 1 ? `FOA focus transform: ${focus}` : `HOA focus transform: ${focus}, order ${order}`,
    )
    .build();
}

/** Near-field compensation driven by source distance. */
export function generateHoaDistance(order: number): ScObject {
  return transform("FoaNFC", "HoaNFC", order)
    .arg(symbol("encoded_input"))
    .arg(symbol("distance"))
    .prop("order", int(order))
    .prop(
      "comment",
      order === 1 ? "FOA near-field compensation" : `HOA near-field compensation, order ${order}`,
    )
    .build();
}

/** Order conversion; equal orders pass straight through. */
export function generateHoaConverter(fromOrder: number, toOrder: number): ScObject {
  if (fromOrder === toOrder) {
    return scObject("Through")
      .ar()
      .arg(symbol("input"))
      .prop("comment", "Pass-through (same order)")
      .build();
  }
  return scObject("HoaConvert")
    .ar()
    .arg(int(fromOrder))
    .arg(int(toOrder))
    .arg(symbol("encoded_input"))
    .prop("from_order", int(fromOrder))
    .prop("to_order", int(toOrder))
    .prop("comment", `HOA format converter: order ${fromOrder} to ${toOrder}`)
    .build();
}

// ---------------------------------------------------------------------------
// Order selection
// ---------------------------------------------------------------------------

/** Highest order a speaker count supports, floor(√(n/4)) within [1, 7]. */
export function calculateOptimalOrder(numSpeakers: number): number {
  return clamp(Math.floor(Math.sqrt(numSpeakers / 4)), 1, MAX_ORDER);
}

/**
 * Check a speaker count against an order. Fewer than (order + 1)² speakers
 * is invalid; fewer than twice that is a warning.
 */
export function validateHoaConfig(order: number, numSpeakers: number): HoaValidationResult {
  const minSpeakers = channelCount(order);
  const recommendedSpeakers = minSpeakers * 2;

  const result: HoaValidationResult = {
    isValid: numSpeakers >= minSpeakers,
    warnings: [],
    errors: [],
    recommendedOrder: clamp(Math.floor(Math.sqrt(numSpeakers / 8)), 1, MAX_RECOMMENDED_ORDER),
  };

  if (numSpeakers < minSpeakers) {
    result.errors.push(
      `Order ${order} requires at least ${minSpeakers} speakers, but only ${numSpeakers} available`,
    );
  } else if (numSpeakers < recommendedSpeakers) {
    result.warnings.push(
      `Order ${order} works best with ${recommendedSpeakers} speakers, only ${numSpeakers} available`,
    );
  }

  return result;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
