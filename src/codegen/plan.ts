/**
 * Spatial plan generation.
 *
 * Turns an analyzed SpatialConfig into the ordered parameter objects for the
 * chosen processing method, along with the VBAP/HOA validation reports the
 * caller needs to accept or reject a sub-optimal configuration.
 */

import {
  analyzeSpatialConfig,
  type SpatialConfig,
  type SpatialProcessingMethod,
  type SpeakerArray,
} from "../analysis/spatial.js";
import { DEFAULT_HOA_ORDER } from "../core/object-kind.js";
import {
  conversionOptionsSchema,
  type ConversionOptions,
  type ConversionOptionsInput,
} from "../schemas/options.js";
import type { MaxPatch, SpeakerArrayRecord } from "../types.js";
import {
  generateBinauralDecoder,
  generateHoaDecoder,
  generateHoaEncoder,
  validateHoaConfig,
  type HoaValidationResult,
} from "./hoa.js";
import {
  convertObjects,
  type ConvertedObject,
  type ObjectConversionFailure,
} from "./objects.js";
import { extractOscRoutes, generateOscResponders, type OscRoute } from "./osc.js";
import { float, scObject, symbol, type ScObject } from "./sc-object.js";
import {
  generateTripletCalculation,
  generatePannerSetup,
  generateVbapPanner,
  isHorizontalArray,
  validateSpeakerSetup,
  type VbapValidationResult,
} from "./vbap.js";
import {
  deriveWfsConfig,
  generateWfsArray,
  generateWfsPrefilter,
  speedOfSound,
} from "./wfs.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StageRole =
  | "wfs-array"
  | "wfs-prefilter"
  | "hoa-encoder"
  | "hoa-decoder"
  | "vbap-setup"
  | "vbap-panner"
  | "vbap-triplets"
  | "stereo-panner";

export interface PlanStage {
  role: StageRole;
  /** Speaker array the stage drives, when it is array-specific. */
  arrayId?: string;
  object: ScObject;
}

export type ValidationReport =
  | { method: "vbap"; arrayId: string; result: VbapValidationResult }
  | { method: "hoa"; arrayId: string; result: HoaValidationResult };

export interface SpatialPlan {
  method: SpatialProcessingMethod;
  stages: PlanStage[];
  /** OSC responder descriptors; empty when OSC generation is off. */
  osc: ScObject[];
  validation: ValidationReport[];
  warnings: string[];
}

export interface SpatialConversion {
  config: SpatialConfig;
  plan: SpatialPlan;
  /** Per-box parameter objects in patch order. */
  objects: ConvertedObject[];
  /** Boxes the converters recognized but could not convert. */
  failures: ObjectConversionFailure[];
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/**
 * Analyze a patch with its speaker arrays, generate the spatial plan and
 * convert each object box.
 *
 * @throws AnalysisError UNSUPPORTED_SPATIAL for an array without speakers
 */
export function convertSpatial(
  patch: MaxPatch,
  speakerRecords: readonly SpeakerArrayRecord[] = [],
  options: ConversionOptionsInput = {},
): SpatialConversion {
  const opts = conversionOptionsSchema.parse(options);
  const config = analyzeSpatialConfig(patch, speakerRecords, opts);
  const routes = opts.generateOsc ? extractOscRoutes(patch) : [];
  const plan = generateSpatialPlan(config, opts, routes);
  return { config, plan, ...convertObjects(patch, opts) };
}

/**
 * Generate the stages for `config.processingMethod`.
 */
export function generateSpatialPlan(
  config: SpatialConfig,
  options: ConversionOptionsInput = {},
  oscRoutes: readonly OscRoute[] = [],
): SpatialPlan {
  const opts = conversionOptionsSchema.parse(options);
  const plan: SpatialPlan = {
    method: config.processingMethod,
    stages: [],
    osc: [],
    validation: [],
    warnings: [],
  };

  if (opts.skipSpatial) {
    plan.warnings.push("Spatial processing skipped");
    return plan;
  }

  switch (config.processingMethod) {
    case "wfs":
      planWfs(config.speakerArrays, opts, plan);
      break;
    case "hoa":
      planHoa(config, opts, plan);
      break;
    case "vbap":
      planVbap(config.speakerArrays, opts, plan);
      break;
    case "stereo":
      plan.stages.push({ role: "stereo-panner", object: stereoPanner() });
      break;
  }

  if (opts.generateOsc) {
    plan.osc = generateOscResponders(oscRoutes);
  }

  return plan;
}

// ---------------------------------------------------------------------------
// Per-method planning
// ---------------------------------------------------------------------------

function planWfs(arrays: readonly SpeakerArray[], opts: ConversionOptions, plan: SpatialPlan): void {
  const c = speedOfSound(opts.temperature);

  for (const array of arrays) {
    const wfsConfig = deriveWfsConfig(array, c);
    plan.stages.push({
      role: "wfs-array",
      arrayId: array.id,
      object: generateWfsArray({ ...array, wfsConfig }),
    });

    if (opts.simplified) continue;
    if (wfsConfig.prefilterCutoff > 0) {
      plan.stages.push({
        role: "wfs-prefilter",
        arrayId: array.id,
        object: generateWfsPrefilter(wfsConfig.prefilterCutoff),
      });
    } else if (array.arrayType.type === "wfs") {
      plan.warnings.push(`${array.id}: no speaker spacing, prefilter omitted`);
    }
  }
}

function planHoa(config: SpatialConfig, opts: ConversionOptions, plan: SpatialPlan): void {
  const order = opts.simplified ? 1 : patchHoaOrder(config);

  plan.stages.push({ role: "hoa-encoder", object: generateHoaEncoder(order, 3) });

  if (config.speakerArrays.length === 0) {
    plan.warnings.push("No speaker arrays; decoding to binaural");
    plan.stages.push({ role: "hoa-decoder", object: generateBinauralDecoder(order, "diffuse") });
    return;
  }

  for (const array of config.speakerArrays) {
    const result = validateHoaConfig(order, array.speakers.length);
    plan.validation.push({ method: "hoa", arrayId: array.id, result });
    collectMessages(array.id, result, plan);

    plan.stages.push({
      role: "hoa-decoder",
      arrayId: array.id,
      object: generateHoaDecoder(order, array, opts.decoderType, opts.decoderMatrix),
    });
  }
}

/** Highest order any HOA object in the patch declares. */
function patchHoaOrder(config: SpatialConfig): number {
  let order = 0;
  for (const { objectType } of config.spatialObjects) {
    if (objectType.type === "hoa-encoder" || objectType.type === "hoa-decoder") {
      order = Math.max(order, objectType.order);
    }
  }
  return order > 0 ? order : DEFAULT_HOA_ORDER;
}

function planVbap(arrays: readonly SpeakerArray[], opts: ConversionOptions, plan: SpatialPlan): void {
  for (const array of arrays) {
    const result = validateSpeakerSetup(array);
    plan.validation.push({ method: "vbap", arrayId: array.id, result });
    collectMessages(array.id, result, plan);
    if (!result.isValid) continue;

    const use3d = !opts.simplified && !isHorizontalArray(array.speakers);
    plan.stages.push({
      role: "vbap-setup",
      arrayId: array.id,
      object: generatePannerSetup(array, use3d),
    });
    plan.stages.push({
      role: "vbap-panner",
      arrayId: array.id,
      object: generateVbapPanner(array.speakers.length, array.id, use3d),
    });
    if (use3d) {
      plan.stages.push({
        role: "vbap-triplets",
        arrayId: array.id,
        object: generateTripletCalculation(array),
      });
    }
  }
}

function stereoPanner(): ScObject {
  return scObject("Pan2")
    .ar()
    .arg(symbol("input"))
    .arg(float(0))
    .arg(float(1))
    .prop("comment", "Stereo panner")
    .build();
}

function collectMessages(
  arrayId: string,
  result: { warnings: string[]; errors: string[] },
  plan: SpatialPlan,
): void {
  for (const message of [...result.errors, ...result.warnings]) {
    plan.warnings.push(`${arrayId}: ${message}`);
  }
}
