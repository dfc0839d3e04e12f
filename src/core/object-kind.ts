/**
 * Object lexer.
 *
 * Reduces a box's class and text to a small closed set of object kinds, once,
 * so graph construction, path analysis and spatial analysis all match over
 * the same finite union instead of re-reading text prefixes.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SpatialObjectType =
  | { type: "panoramix" }
  | { type: "hoa-encoder"; order: number }
  | { type: "hoa-decoder"; order: number }
  | { type: "vbap"; numSpeakers: number }
  | { type: "generic"; name: string };

export type ObjectKind =
  | { kind: "control-widget"; widget: string }
  | { kind: "generator"; name: string }
  | { kind: "input"; name: string }
  | { kind: "output"; name: string }
  | { kind: "panner"; name: string }
  | { kind: "spatial"; name: string; spatial: SpatialObjectType }
  | { kind: "ramp"; name: string }
  | { kind: "audio"; name: string }
  | { kind: "message"; name: string }
  | { kind: "unknown"; text: string };

// ---------------------------------------------------------------------------
// Vocabulary
// ---------------------------------------------------------------------------

/** Box classes that are user-interface controls. Matched on class, not text. */
export const CONTROL_WIDGETS: ReadonlySet<string> = new Set([
  "flonum", "number", "slider", "dial", "toggle", "button", "kslider",
  "multislider", "rslider", "nslider", "umenu", "tab", "radiogroup",
  "pictslider", "matrixctrl", "live.dial", "live.slider", "live.numbox",
  "live.toggle", "live.button", "live.tab", "live.menu",
]);

/** Oscillators and noise sources. */
const GENERATORS = new Set([
  "cycle~", "saw~", "rect~", "tri~", "phasor~", "noise~", "pink~",
]);

/** Hardware input (ADC family). */
const INPUTS = new Set(["adc~", "ezadc~"]);

/** Hardware output (DAC family). */
const OUTPUTS = new Set(["dac~", "ezdac~"]);

const PANNERS = new Set(["pan~", "pan2~", "pan4~", "pan8~"]);

/** Ramp and line generators; drive parameters rather than carry audio. */
const RAMPS = new Set(["line", "line~", "curve", "curve~"]);

export const SPATIAL_PREFIX = "spat5";

export const DEFAULT_HOA_ORDER = 1;
export const DEFAULT_VBAP_SPEAKERS = 8;

// ---------------------------------------------------------------------------
// Lexing
// ---------------------------------------------------------------------------

/** Split box text into whitespace-separated tokens. */
export function tokenize(text: string): string[] {
  return text.trim().split(/\s+/).filter((t) => t.length > 0);
}

/**
 * Classify a box by its class and text.
 */
export function lexObject(maxclass: string, text?: string): ObjectKind {
  if (CONTROL_WIDGETS.has(maxclass)) {
    return { kind: "control-widget", widget: maxclass };
  }

  const tokens = tokenize(text ?? "");
  if (tokens.length === 0) {
    return { kind: "unknown", text: text ?? "" };
  }

  const name = tokens[0];
  if (name.startsWith(SPATIAL_PREFIX)) {
    return { kind: "spatial", name, spatial: lexSpatial(tokens) };
  }
  if (RAMPS.has(name)) return { kind: "ramp", name };
  if (GENERATORS.has(name)) return { kind: "generator", name };
  if (INPUTS.has(name)) return { kind: "input", name };
  if (OUTPUTS.has(name)) return { kind: "output", name };
  if (PANNERS.has(name)) return { kind: "panner", name };

  // A tilde anywhere in the text marks a signal object (e.g. "*~ 0.5").
  if (text !== undefined && text.includes("~")) {
    return { kind: "audio", name };
  }
  return { kind: "message", name };
}

function lexSpatial(tokens: string[]): SpatialObjectType {
  const [name, firstArg] = tokens;
  switch (name) {
    case "spat5.panoramix~":
      return { type: "panoramix" };
    case "spat5.hoa.encoder~":
      return { type: "hoa-encoder", order: parseCount(firstArg) ?? DEFAULT_HOA_ORDER };
    case "spat5.hoa.decoder~":
      return { type: "hoa-decoder", order: parseCount(firstArg) ?? DEFAULT_HOA_ORDER };
    case "spat5.vbap~":
      return { type: "vbap", numSpeakers: parseCount(firstArg) ?? DEFAULT_VBAP_SPEAKERS };
    default:
      return { type: "generic", name };
  }
}

/** Parse a non-negative integer token; anything else is undefined. */
function parseCount(token: string | undefined): number | undefined {
  if (token === undefined || !/^\d+$/.test(token)) return undefined;
  return Number.parseInt(token, 10);
}

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

/**
 * True when the object's text contains a tilde or names a spatial object.
 * Control widgets never bear audio.
 */
export function isAudioBearing(kind: ObjectKind): boolean {
  switch (kind.kind) {
    case "generator":
    case "input":
    case "output":
    case "panner":
    case "spatial":
    case "audio":
      return true;
    case "ramp":
      return kind.name.includes("~");
    case "control-widget":
    case "message":
    case "unknown":
      return false;
  }
}

/** The leading name of a kind, or undefined for widgets and empty boxes. */
export function kindName(kind: ObjectKind): string | undefined {
  switch (kind.kind) {
    case "control-widget":
      return kind.widget;
    case "unknown":
      return undefined;
    default:
      return kind.name;
  }
}
