/**
 * Per-object conversion.
 *
 * Maps one box to the parameter object of its target-engine counterpart.
 * Panners, spat5 objects, audio I/O and the mc.* family have converters;
 * every other box becomes a placeholder that carries the original name.
 */

import { ConversionError, type ConversionErrorCode } from "../core/errors.js";
import { lexObject, tokenize, type SpatialObjectType } from "../core/object-kind.js";
import type { MaxBox, MaxPatch } from "../types.js";
import {
  float,
  int,
  list,
  scObject,
  symbol,
  type ScObject,
  type ScObjectBuilder,
} from "./sc-object.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ObjectConversionOptions {
  /** Leave out panners, stereo~, matrix~ and spat5 objects. */
  skipSpatial?: boolean;
  /** Leave out mc.* objects. */
  skipMultichannel?: boolean;
}

export interface ConvertedObject {
  boxId: string;
  object: ScObject;
}

export interface ObjectConversionFailure {
  boxId: string;
  code: ConversionErrorCode;
  message: string;
}

export interface ObjectConversionResult {
  objects: ConvertedObject[];
  failures: ObjectConversionFailure[];
}

const MULTICHANNEL_PREFIX = "mc.";
const MAX_CHANNELS = 128;
const MAX_HOA_ORDER = 7;
const MIN_VBAP_SPEAKERS = 3;
/** dB range of mc.live.gain~. */
const GAIN_RANGE_DB: [number, number] = [-144, 24];

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/**
 * Convert every object box of a patch. A recognized object that cannot be
 * converted is reported in `failures` and the run continues.
 */
export function convertObjects(
  patch: MaxPatch,
  options: ObjectConversionOptions = {},
): ObjectConversionResult {
  const result: ObjectConversionResult = { objects: [], failures: [] };

  for (const box of patch.boxes) {
    if (box.maxclass !== "newobj") continue;
    try {
      const object = convertObject(box, options);
      if (object) result.objects.push({ boxId: box.id, object });
    } catch (error) {
      if (!(error instanceof ConversionError)) throw error;
      result.failures.push({ boxId: box.id, code: error.code, message: error.message });
    }
  }
  return result;
}

/**
 * Convert one box. Returns undefined when a switch in `options` leaves the
 * box out.
 *
 * @throws ConversionError INVALID_PARAMETER for an argument out of range,
 *   MISSING_ATTRIBUTE for an `@attribute` written without a value
 */
export function convertObject(
  box: MaxBox,
  options: ObjectConversionOptions = {},
): ScObject | undefined {
  const kind = lexObject(box.maxclass, box.text);
  const args = tokenize(box.text ?? "").slice(1);

  switch (kind.kind) {
    case "panner":
      return options.skipSpatial ? undefined : convertPanner(kind.name, args);
    case "spatial":
      return options.skipSpatial ? undefined : convertSpat5(kind.name, kind.spatial, args);
    case "input":
    case "output":
      return convertAudioIo(kind.name, args);
    case "audio":
      if (kind.name.startsWith(MULTICHANNEL_PREFIX)) {
        return options.skipMultichannel ? undefined : convertMultichannel(kind.name, args, box);
      }
      if (kind.name === "stereo~" || kind.name === "matrix~") {
        return options.skipSpatial ? undefined : convertRouting(kind.name, args, box);
      }
      return convertAudioIo(kind.name, args);
    case "generator":
    case "ramp":
    case "message":
      return placeholder("UnknownObject", kind.name);
    case "control-widget":
      return placeholder("UnknownObject", kind.widget);
    case "unknown":
      return scObject("Unknown").build();
  }
}

// ---------------------------------------------------------------------------
// Panners and routing
// ---------------------------------------------------------------------------

function convertPanner(name: string, args: string[]): ScObject {
  switch (name) {
    case "pan4~": {
      const x = checkRange("x", numberArg(args, 0) ?? 0, -1, 1);
      const y = checkRange("y", numberArg(args, 1) ?? 0, -1, 1);
      return scObject("Pan4")
        .ar()
        .arg(symbol("input"))
        .arg(float(x))
        .arg(float(y))
        .arg(float(1))
        .prop("comment", name)
        .build();
    }
    case "pan8~": {
      const position = checkRange("position", numberArg(args, 0) ?? 0, 0, 1);
      return scObject("PanAz")
        .ar()
        .arg(int(8))
        .arg(symbol("input"))
        .arg(float(position * 2))
        .arg(float(1))
        .arg(float(2))
        .arg(float(0))
        .prop("comment", name)
        .build();
    }
    default: {
      // pan~ and pan2~: 0..1 left to right, mapped onto -1..1
      const position = checkRange("position", numberArg(args, 0) ?? 0.5, 0, 1);
      return scObject("Pan2")
        .ar()
        .arg(symbol("input"))
        .arg(float(position * 2 - 1))
        .arg(float(1))
        .prop("comment", name)
        .build();
    }
  }
}

function convertRouting(name: string, args: string[], box: MaxBox): ScObject {
  if (name === "stereo~") {
    return scObject("Array")
      .arg(symbol("inputL"))
      .arg(symbol("inputR"))
      .prop("comment", name)
      .build();
  }

  const inputs = checkRange("inputs", numberArg(args, 0) ?? box.numInlets, 1, MAX_CHANNELS);
  const outputs = checkRange("outputs", numberArg(args, 1) ?? box.numOutlets, 1, MAX_CHANNELS);
  return scObject("Matrix")
    .ar()
    .arg(int(inputs))
    .arg(int(outputs))
    .arg(symbol("input"))
    .prop("comment", `matrix~ ${inputs}x${outputs}`)
    .build();
}

// ---------------------------------------------------------------------------
// spat5
// ---------------------------------------------------------------------------

function convertSpat5(name: string, spatial: SpatialObjectType, args: string[]): ScObject {
  switch (spatial.type) {
    case "panoramix": {
      const inputs = channelCount("inputs", numberArg(args, 0) ?? attribute(args, "inputs") ?? 1);
      const outputs = channelCount("outputs", numberArg(args, 1) ?? attribute(args, "outputs") ?? 8);
      return scObject("SpatPanoramix")
        .ar()
        .arg(symbol("input"))
        .arg(int(inputs))
        .arg(int(outputs))
        .arg(list([symbol("azimuth"), symbol("elevation"), symbol("distance")]))
        .prop("format", "VBAP")
        .prop("room_model", "basic")
        .prop("reverb_enable", true)
        .prop("early_reflections", true)
        .prop("comment", name)
        .build();
    }
    case "hoa-encoder": {
      const order = hoaOrder(spatial.order);
      const encoder = order === 1 ? scObject("FoaEncode").ar() : scObject("HoaEncodeMatrix").ar().arg(int(order));
      encoder.arg(symbol("input")).arg(symbol("azimuth")).arg(symbol("elevation"));
      if (order === 1) encoder.prop("encoder_type", "omni");
      return encoder.prop("comment", `${name} (order ${order})`).build();
    }
    case "hoa-decoder": {
      const order = hoaOrder(spatial.order);
      const speakers = channelCount("speakers", numberArg(args, 1) ?? 8);
      if (order === 1) {
        return scObject("FoaDecode")
          .ar()
          .arg(symbol("encoded_input"))
          .arg(symbol("decoder_matrix"))
          .prop("num_speakers", int(speakers))
          .prop("comment", `${name} (order 1)`)
          .build();
      }
      return scObject("HoaDecodeMatrix")
        .ar()
        .arg(int(order))
        .arg(int(speakers))
        .arg(symbol("encoded_input"))
        .prop("comment", `${name} (order ${order})`)
        .build();
    }
    case "vbap": {
      const speakers = checkRange("speakers", spatial.numSpeakers, MIN_VBAP_SPEAKERS, MAX_CHANNELS);
      return vbapPanner(speakers, name).prop("speaker_setup", "ring").build();
    }
    case "generic":
      return convertGenericSpat5(name, args);
  }
}

function convertGenericSpat5(name: string, args: string[]): ScObject {
  switch (name) {
    case "spat5.pan~": {
      const outputs = channelCount("outputs", numberArg(args, 0) ?? attribute(args, "outputs") ?? 8);
      return vbapPanner(outputs, name).build();
    }
    case "spat5.stereo~":
      return scObject("Splay")
        .ar()
        .arg(symbol("input"))
        .arg(float(1))
        .arg(float(1))
        .arg(float(0))
        .prop("comment", name)
        .build();
    case "spat5.hoa.rotate~": {
      const order = hoaOrder(numberArg(args, 0) ?? 1);
      const rotate = order === 1 ? scObject("FoaRotate").ar() : scObject("HoaRotate").ar().arg(int(order));
      rotate.arg(symbol("encoded_input")).arg(symbol("azimuth")).arg(symbol("elevation"));
      if (order === 1) rotate.arg(symbol("roll"));
      return rotate.prop("comment", `${name} (order ${order})`).build();
    }
    case "spat5.reverb~": {
      const outputs = channelCount("outputs", numberArg(args, 0) ?? 2);
      const reverb = scObject("JPverb").ar().arg(symbol("input"));
      for (const param of REVERB_PARAMS) reverb.arg(symbol(param));
      return reverb.prop("num_outputs", int(outputs)).prop("comment", name).build();
    }
    case "spat5.early~": {
      const taps = channelCount("taps", numberArg(args, 0) ?? 8);
      return scObject("EarlyReflections")
        .ar()
        .arg(symbol("input"))
        .arg(int(taps))
        .arg(symbol("room_size"))
        .arg(symbol("damping"))
        .arg(list([symbol("delay_times"), symbol("gains"), symbol("pan_positions")]))
        .prop("comment", name)
        .build();
    }
    default:
      return placeholder("SPAT5_Placeholder", name);
  }
}

const REVERB_PARAMS = [
  "rt60", "damping", "size", "early_diff", "mod_depth",
  "mod_freq", "low", "mid", "high", "hf_damping",
];

function vbapPanner(speakers: number, comment: string): ScObjectBuilder {
  return scObject("VBAP")
    .ar()
    .arg(int(speakers))
    .arg(symbol("input"))
    .arg(symbol("azimuth"))
    .arg(symbol("elevation"))
    .arg(symbol("spread"))
    .prop("comment", comment);
}

// ---------------------------------------------------------------------------
// Audio I/O
// ---------------------------------------------------------------------------

function convertAudioIo(name: string, args: string[]): ScObject {
  switch (name) {
    case "dac~":
      return output(channelList(args) ?? [0, 1]);
    case "adc~":
      return input(channelList(args) ?? [0, 1]);
    case "ezdac~":
      return output([0, 1], "ezdac~: stereo output");
    case "ezadc~":
      return input([0, 1], "ezadc~: stereo input");
    case "out~": {
      const outlet = checkRange("outlet", numberArg(args, 0) ?? 1, 1, MAX_CHANNELS);
      return scObject("Out")
        .ar()
        .arg(int(outlet - 1))
        .arg(symbol("signal"))
        .prop("comment", `out~ ${outlet}`)
        .build();
    }
    case "in~": {
      const inlet = checkRange("inlet", numberArg(args, 0) ?? 1, 1, MAX_CHANNELS);
      return scObject("In")
        .ar()
        .arg(int(inlet - 1))
        .prop("comment", `in~ ${inlet}`)
        .build();
    }
    default:
      return placeholder("UnknownObject", name);
  }
}

/** Out.ar for zero-based hardware channels. */
function output(channels: number[], comment?: string): ScObject {
  const out = scObject("Out").ar();
  if (channels.length === 1) {
    out.arg(int(channels[0])).arg(symbol("input"));
  } else if (isStereoPair(channels)) {
    out.arg(int(0)).arg(list([symbol("inputL"), symbol("inputR")]));
  } else {
    out.arg(list(channels.map(int))).arg(symbol("input"));
  }
  if (comment) out.prop("comment", comment);
  return out.build();
}

function input(channels: number[], comment?: string): ScObject {
  const soundIn = scObject("SoundIn")
    .ar()
    .arg(channels.length === 1 ? int(channels[0]) : list(channels.map(int)));
  if (comment) soundIn.prop("comment", comment);
  return soundIn.build();
}

function isStereoPair(channels: number[]): boolean {
  return channels.length === 2 && channels[0] === 0 && channels[1] === 1;
}

// ---------------------------------------------------------------------------
// mc.*
// ---------------------------------------------------------------------------

function convertMultichannel(name: string, args: string[], box: MaxBox): ScObject {
  switch (name) {
    case "mc.pack~":
    case "mc.unpack~": {
      const channels = channelCount("channels", numberArg(args, 0) ?? 2);
      return scObject(name === "mc.pack~" ? "Array" : "ArrayIndex")
        .prop("channels", int(channels))
        .prop("comment", `${name} ${channels} channels`)
        .build();
    }
    case "mc.dac~": {
      const channels = channelList(args) ?? range(box.numInlets);
      return scObject("Out").ar().arg(list(channels.map(int))).arg(symbol("input")).build();
    }
    case "mc.adc~": {
      const channels = channelList(args) ?? range(box.numOutlets);
      return scObject("In").ar().arg(list(channels.map(int))).build();
    }
    case "mc.live.gain~": {
      const db = checkRange("gain", numberArg(args, 0) ?? 0, ...GAIN_RANGE_DB);
      return scObject("*")
        .arg(symbol("input"))
        .arg(float(10 ** (db / 20)))
        .prop("lag", float(0.1))
        .prop("comment", name)
        .build();
    }
    default:
      return placeholder("UnknownMC", name);
  }
}

// ---------------------------------------------------------------------------
// Argument helpers
// ---------------------------------------------------------------------------

function placeholder(className: string, name: string): ScObject {
  return scObject(className).arg(symbol(name)).prop("comment", `${name}: no converter`).build();
}

/** Numeric positional argument; positions stop at the first `@attribute`. */
function numberArg(args: string[], index: number): number | undefined {
  const end = args.findIndex((a) => a.startsWith("@"));
  const positional = end < 0 ? args : args.slice(0, end);
  if (index >= positional.length) return undefined;
  const value = Number(positional[index]);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Value of `@name`, or undefined when the attribute is not written.
 *
 * @throws ConversionError MISSING_ATTRIBUTE when the attribute has no numeric value
 */
function attribute(args: string[], name: string): number | undefined {
  const index = args.indexOf(`@${name}`);
  if (index < 0) return undefined;
  const raw: string | undefined = args[index + 1];
  const value = Number(raw);
  if (raw === undefined || raw.startsWith("@") || !Number.isFinite(value)) {
    throw ConversionError.missingAttribute(name);
  }
  return value;
}

/** Max channel arguments are one-based; returns zero-based channels. */
function channelList(args: string[]): number[] | undefined {
  const channels: number[] = [];
  for (const arg of args) {
    if (!/^-?\d+$/.test(arg)) continue;
    channels.push(checkRange("channel", Number.parseInt(arg, 10), 1, MAX_CHANNELS) - 1);
  }
  return channels.length > 0 ? channels : undefined;
}

function channelCount(name: string, value: number): number {
  return checkRange(name, value, 1, MAX_CHANNELS);
}

function hoaOrder(order: number): number {
  return checkRange("order", order, 1, MAX_HOA_ORDER);
}

function checkRange(name: string, value: number, min: number, max: number): number {
  if (value < min || value > max) throw ConversionError.invalidParameter(name, value);
  return value;
}

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}
