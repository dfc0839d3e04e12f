import { describe, it, expect } from "vitest";
import {
  calculateAliasingFrequency,
  calculateSpeakerDelay,
  calculateWfsAmplitude,
  deriveWfsConfig,
  generateDistanceCompensation,
  generateWfsArray,
  generateWfsFocusedSource,
  generateWfsPlaneWave,
  generateWfsPrefilter,
  speedOfSound,
} from "../../src/codegen/wfs.js";
import { getProperty, numberValue, textValue } from "../../src/codegen/sc-object.js";
import { analyzeSpeakerArrays, toRadians } from "../../src/analysis/spatial.js";
import { ConversionError } from "../../src/core/errors.js";
import { parseSpeakerConfig } from "../../src/core/parser.js";
import { arrayRecord, readFixture } from "../helpers/patch.js";

async function loadArray(fixture: string) {
  const [array] = analyzeSpeakerArrays(parseSpeakerConfig(await readFixture(fixture)));
  return array;
}

describe("generateWfsArray", () => {
  it("describes a ring as a circular array", async () => {
    const object = generateWfsArray(await loadArray("speakers-ring.json"));

    expect(object.className).toBe("WFSArrayCircular");
    expect(object.method).toBe("ar");
    expect(object.args.slice(0, 5)).toEqual([
      { type: "symbol", value: "input" },
      { type: "symbol", value: "source_azimuth" },
      { type: "symbol", value: "source_distance" },
      { type: "int", value: 8 },
      { type: "float", value: 2.5 },
    ]);
    expect(object.properties).toEqual([
      { name: "prefilter_cutoff", value: { type: "float", value: 0 } },
      { name: "distance_compensation", value: { type: "int", value: 0 } },
      { name: "amplitude_correction", value: { type: "int", value: 0 } },
      {
        name: "comment",
        value: { type: "string", value: "WFS circular array: 8 speakers, 2.50m radius" },
      },
    ]);
  });

  it("carries per-speaker delays and gains", () => {
    const [array] = analyzeSpeakerArrays([
      {
        name: "pair",
        bus: 0,
        format: "",
        speakers: [
          { id: 1, azimuth: 0, elevation: 0, distance: 2, delay: 0.001, gain: 0.5 },
          { id: 2, azimuth: 180, elevation: 0, distance: 3, delay: 0.002, gain: 0.75 },
        ],
      },
    ]);
    const object = generateWfsArray(array);

    expect(object.className).toBe("WFSArrayIrregular");
    expect(object.args.slice(3)).toEqual([
      { type: "int", value: 2 },
      { type: "array", items: [{ type: "float", value: 0 }, { type: "float", value: 180 }] },
      { type: "array", items: [{ type: "float", value: 0 }, { type: "float", value: 0 }] },
      { type: "array", items: [{ type: "float", value: 2 }, { type: "float", value: 3 }] },
      { type: "array", items: [{ type: "float", value: 0.001 }, { type: "float", value: 0.002 }] },
      { type: "array", items: [{ type: "float", value: 0.5 }, { type: "float", value: 0.75 }] },
    ]);
    expect(textValue(getProperty(object, "comment"))).toBe("WFS irregular array: 2 speakers");
  });

  it("describes a flat line with its length and spacing", async () => {
    const object = generateWfsArray(await loadArray("speakers-line.json"));

    expect(object.className).toBe("WFSArrayLinear");
    expect(object.args[3]).toEqual({ type: "int", value: 16 });
    expect(numberValue(object.args[4])).toBeCloseTo(3 * toRadians(75), 12);
    expect(numberValue(object.args[5])).toBeCloseTo(3 * toRadians(5), 12);
    expect(textValue(getProperty(object, "comment"))).toBe("WFS linear array: 16 speakers, 3.93m length");
    expect(numberValue(getProperty(object, "aliasing_frequency"))).toBe(0);
  });
});

describe("deriveWfsConfig", () => {
  it("fills the aliasing frequency and prefilter cutoff of a line from its spacing", async () => {
    const array = await loadArray("speakers-line.json");
    const config = deriveWfsConfig(array, 355);
    const expected = 355 / (2 * 3 * toRadians(5));

    expect(config.aliasingFrequency).toBeCloseTo(expected, 9);
    expect(config.prefilterCutoff).toBeCloseTo(expected, 9);
    expect(config.distanceCompensation).toBe(false);
  });

  it("keeps frequencies that are already set", async () => {
    const array = await loadArray("speakers-line.json");
    const config = deriveWfsConfig(
      {
        ...array,
        wfsConfig: {
          prefilterCutoff: 800,
          distanceCompensation: true,
          amplitudeCorrection: true,
          aliasingFrequency: 0,
        },
      },
      355,
    );
    expect(config.prefilterCutoff).toBe(800);
    expect(config.aliasingFrequency).toBeCloseTo(355 / (2 * 3 * toRadians(5)), 9);
    expect(config.distanceCompensation).toBe(true);
  });

  it("leaves other arrays at their configuration", async () => {
    const ring = await loadArray("speakers-ring.json");
    expect(deriveWfsConfig(ring, 343)).toEqual({
      prefilterCutoff: 0,
      distanceCompensation: false,
      amplitudeCorrection: false,
      aliasingFrequency: 0,
    });
  });
});

describe("auxiliary stages", () => {
  it("builds a prefilter for a positive cutoff", () => {
    expect(generateWfsPrefilter(1000)).toEqual({
      className: "WFSPrefilter",
      method: "ar",
      args: [
        { type: "symbol", value: "input" },
        { type: "float", value: 1000 },
      ],
      properties: [
        {
          name: "comment",
          value: { type: "string", value: "WFS prefilter for spatial aliasing reduction" },
        },
      ],
    });
  });

  it("rejects a cutoff that is not positive", () => {
    expect(() => generateWfsPrefilter(0)).toThrow(ConversionError);
    expect(() => generateWfsPrefilter(-50)).toThrow("Invalid parameter range: cutoff = -50");
    expect(() => generateWfsPrefilter(Number.NaN)).toThrow("Invalid parameter range: cutoff = NaN");
  });

  it("builds focused sources, plane waves and distance compensation", () => {
    expect(generateWfsFocusedSource(30, 1.5, 0.5).args.slice(1)).toEqual([
      { type: "float", value: 30 },
      { type: "float", value: 1.5 },
      { type: "float", value: 0.5 },
    ]);
    expect(generateWfsPlaneWave(-45).args).toEqual([
      { type: "symbol", value: "input" },
      { type: "float", value: -45 },
    ]);
    const compensation = generateDistanceCompensation(2);
    expect(compensation.className).toBe("WFSDistanceCompensation");
    expect(compensation.args[2]).toEqual({ type: "float", value: 2 });
  });
});

describe("geometry", () => {
  it("computes the speed of sound from temperature", () => {
    expect(speedOfSound(0)).toBe(343);
    expect(speedOfSound()).toBe(355);
    expect(speedOfSound(-10)).toBe(337);
  });

  it("computes propagation delay in the horizontal plane", () => {
    expect(calculateSpeakerDelay({ azimuth: 0, elevation: 0, distance: 3 }, 0, 1, 343)).toBeCloseTo(
      2 / 343,
      12,
    );
    expect(calculateSpeakerDelay({ azimuth: 90, elevation: 40, distance: 4 }, 0, 3, 343)).toBeCloseTo(
      5 / 343,
      12,
    );
  });

  it("gives a plane wave unity amplitude", () => {
    expect(calculateWfsAmplitude({ azimuth: 0, elevation: 0, distance: 3 }, 0, 3)).toBe(1);
    expect(calculateWfsAmplitude({ azimuth: 0, elevation: 0, distance: 3 }, -1, 3)).toBe(1);
  });

  it("scales amplitude with source and speaker distance", () => {
    expect(calculateWfsAmplitude({ azimuth: 0, elevation: 0, distance: 4 }, 1, 4)).toBe(2);
    expect(calculateWfsAmplitude({ azimuth: 0, elevation: 0, distance: 2 }, 8, 2)).toBe(0.5);
  });

  it("adds no speaker factor for a speaker at the reference point", () => {
    expect(calculateWfsAmplitude({ azimuth: 0, elevation: 0, distance: 0 }, 1, 4)).toBe(2);
  });

  it("computes the aliasing frequency from spacing", () => {
    expect(calculateAliasingFrequency(0.5, 340)).toBe(340);
    expect(calculateAliasingFrequency(0, 343)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("irregular input", () => {
  it("handles a single speaker", () => {
    const [array] = analyzeSpeakerArrays([arrayRecord("solo", [[0, 0, 1]])]);
    expect(generateWfsArray(array).args[3]).toEqual({ type: "int", value: 1 });
  });
});
