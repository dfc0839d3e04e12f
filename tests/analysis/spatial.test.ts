import { describe, it, expect } from "vitest";
import {
  analyzeSpatialConfig,
  analyzeSpatialObjects,
  analyzeSpeakerArrays,
  averageDistance,
  determineArrayType,
  determineProcessingMethod,
  toRadians,
} from "../../src/analysis/spatial.js";
import { AnalysisError } from "../../src/core/errors.js";
import { parsePatch, parseSpeakerConfig } from "../../src/core/parser.js";
import { arrayRecord, CUBE, obj, patchOf, readFixture, ringPositions } from "../helpers/patch.js";

async function fixture() {
  return {
    patch: parsePatch(await readFixture("hoa-chain.maxpat")),
    ring: parseSpeakerConfig(await readFixture("speakers-ring.json")),
    line: parseSpeakerConfig(await readFixture("speakers-line.json")),
  };
}

describe("analyzeSpatialObjects", () => {
  it("describes each spatial object in patch order", async () => {
    const { patch } = await fixture();
    expect(analyzeSpatialObjects(patch)).toEqual([
      {
        id: "obj-3",
        objectType: { type: "hoa-encoder", order: 3 },
        inputs: 1,
        outputs: 16,
        format: { type: "ambisonic", order: 3, dimension: 3 },
        parameters: [{ name: "inputs", value: 1, range: [1, 128] }],
      },
      {
        id: "obj-4",
        objectType: { type: "hoa-decoder", order: 3 },
        inputs: 16,
        outputs: 8,
        format: { type: "multichannel", channels: 8 },
        parameters: [],
      },
      {
        id: "obj-5",
        objectType: { type: "panoramix" },
        inputs: 1,
        outputs: 8,
        format: { type: "multichannel", channels: 8 },
        parameters: [
          { name: "inputs", value: 1, range: [1, 128] },
          { name: "outputs", value: 8, range: [1, 128] },
        ],
      },
    ]);
  });

  it("returns nothing when spatial objects are skipped", async () => {
    const { patch } = await fixture();
    expect(analyzeSpatialObjects(patch, { skipSpatial: true })).toEqual([]);
  });

  it("keeps only numeric attributes it knows", () => {
    const patch = patchOf([obj("obj-1", "spat5.spat~ @spread 50 @gain loud @colour 3 @order")]);
    expect(analyzeSpatialObjects(patch)[0].parameters).toEqual([
      { name: "spread", value: 50, range: [0, 100] },
    ]);
  });

  it("ignores objects outside the spatial family", () => {
    const patch = patchOf([obj("obj-1", "pan2~"), obj("obj-2", "cycle~")]);
    expect(analyzeSpatialObjects(patch)).toEqual([]);
  });
});

describe("analyzeSpeakerArrays", () => {
  it("classifies an even ring", async () => {
    const { ring } = await fixture();
    const [array] = analyzeSpeakerArrays(ring);
    expect(array.id).toBe("ring8");
    expect(array.arrayType).toEqual({ type: "ring", radius: 2.5 });
    expect(array.wfsConfig).toBeUndefined();
    expect(array.speakers[1]).toEqual({
      id: 2,
      position: { azimuth: 45, elevation: 0, distance: 2.5 },
      delay: 0,
      gain: 1,
    });
  });

  it("classifies a flat line of sixteen as WFS", async () => {
    const { line } = await fixture();
    const [array] = analyzeSpeakerArrays(line);
    if (array.arrayType.type !== "wfs") throw new Error(`expected wfs, got ${array.arrayType.type}`);
    expect(array.arrayType.length).toBeCloseTo(3 * toRadians(75), 12);
    expect(array.arrayType.spacing).toBeCloseTo(3 * toRadians(5), 12);
    expect(array.wfsConfig).toEqual({
      prefilterCutoff: 0,
      distanceCompensation: false,
      amplitudeCorrection: false,
      aliasingFrequency: 0,
    });
  });

  it("falls back to ring when sixteen speakers are not level", () => {
    const positions = Array.from({ length: 16 }, (_, i): [number, number, number] => [
      i * 22.5,
      i % 2 === 0 ? 0 : 30,
      2,
    ]);
    const [array] = analyzeSpeakerArrays([arrayRecord("dome", positions)]);
    expect(array.arrayType).toEqual({ type: "ring", radius: 2 });
  });

  it("classifies uneven distances and small arrays as irregular", () => {
    const [uneven, small] = analyzeSpeakerArrays([
      arrayRecord("uneven", [[0, 0, 1], [90, 0, 2], [180, 0, 3], [270, 0, 4]]),
      arrayRecord("small", [[0, 0, 2], [120, 0, 2], [240, 0, 2]]),
    ]);
    expect(uneven.arrayType).toEqual({ type: "irregular" });
    expect(small.arrayType).toEqual({ type: "irregular" });
  });

  it("rejects an array without speakers", () => {
    expect(() => analyzeSpeakerArrays([arrayRecord("empty", [])])).toThrow(AnalysisError);
    expect(() => analyzeSpeakerArrays([arrayRecord("empty", [])])).toThrow(
      'Unsupported spatial configuration: speaker array "empty" has no speakers',
    );
  });

  it("reclassifies to the same type", async () => {
    const { ring, line } = await fixture();
    const arrays = analyzeSpeakerArrays([
      ...ring,
      ...line,
      arrayRecord("cube", CUBE),
      arrayRecord("uneven", [[0, 0, 1], [90, 0, 2], [180, 0, 3], [270, 0, 4]]),
    ]);
    for (const array of arrays) {
      expect(determineArrayType(array.speakers)).toEqual(array.arrayType);
    }
  });
});

describe("determineProcessingMethod", () => {
  it("prefers WFS over HOA objects", async () => {
    const { patch, line, ring } = await fixture();
    expect(analyzeSpatialConfig(patch, [...ring, ...line]).processingMethod).toBe("wfs");
  });

  it("chooses HOA when the patch encodes ambisonics", async () => {
    const { patch, ring } = await fixture();
    expect(analyzeSpatialConfig(patch, ring).processingMethod).toBe("hoa");
    expect(analyzeSpatialConfig(patch).processingMethod).toBe("hoa");
  });

  it("chooses VBAP for four or more speakers", async () => {
    const { patch, ring } = await fixture();
    expect(analyzeSpatialConfig(patch, ring, { skipSpatial: true }).processingMethod).toBe("vbap");
    const quad = analyzeSpeakerArrays([arrayRecord("quad", ringPositions(4, 2))]);
    expect(determineProcessingMethod({ spatialObjects: [], speakerArrays: quad })).toBe("vbap");
  });

  it("falls back to stereo", () => {
    const trio = analyzeSpeakerArrays([arrayRecord("trio", ringPositions(3, 2))]);
    expect(determineProcessingMethod({ spatialObjects: [], speakerArrays: trio })).toBe("stereo");
    expect(determineProcessingMethod({ spatialObjects: [], speakerArrays: [] })).toBe("stereo");
  });
});

describe("helpers", () => {
  it("averages distances and converts degrees", () => {
    const arrays = analyzeSpeakerArrays([arrayRecord("a", [[0, 0, 1], [90, 0, 2], [180, 0, 6]])]);
    expect(averageDistance(arrays[0].speakers)).toBe(3);
    expect(toRadians(180)).toBeCloseTo(Math.PI, 15);
  });
});
