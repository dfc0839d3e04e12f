import { describe, it, expect } from "vitest";
import { validatePatch } from "../src/core/validator.js";
import { parsePatch } from "../src/core/parser.js";
import type { MaxBox, MaxLine } from "../src/types.js";
import { cable, obj, patchOf, readFixture, ui } from "./helpers/patch.js";

function validate(boxes: MaxBox[], lines: MaxLine[] = []) {
  return validatePatch(patchOf(boxes, lines));
}

const OSC = obj("obj-1", "cycle~ 440", 2, 1);
const DAC = obj("obj-2", "dac~", 2, 0);

describe("validator", () => {
  describe("clean patches pass validation", () => {
    it("hoa-chain.maxpat has no issues", async () => {
      const result = validatePatch(parsePatch(await readFixture("hoa-chain.maxpat")));
      expect(result.valid).toBe(true);
      expect(result.issues).toEqual([]);
      expect(result.summary).toEqual({ errors: 0, warnings: 0, infos: 0 });
    });

    it("accepts numeric-string ports", () => {
      const result = validate([OSC, DAC], [{ source: ["obj-1", "0"], destination: ["obj-2", "1"] }]);
      expect(result.valid).toBe(true);
      expect(result.issues).toEqual([]);
    });
  });

  describe("BROKEN_CONNECTION_SOURCE", () => {
    it("detects a cable from a nonexistent box", () => {
      const result = validate([OSC, DAC], [cable("obj-9", 0, "obj-2", 0)]);
      expect(result.valid).toBe(false);
      const issue = result.issues.find((i) => i.code === "BROKEN_CONNECTION_SOURCE");
      expect(issue?.severity).toBe("error");
      expect(issue?.message).toBe('Cable 0 source references unknown object "obj-9"');
    });

    it("detects a malformed endpoint", () => {
      const result = validate([OSC, DAC], [{ source: [5, 0], destination: ["obj-2", 0] }]);
      const issue = result.issues.find((i) => i.code === "BROKEN_CONNECTION_SOURCE");
      expect(issue?.message).toBe("Cable 0 source is malformed");
    });
  });

  describe("BROKEN_CONNECTION_TARGET", () => {
    it("detects a cable to a nonexistent box", () => {
      const result = validate([OSC, DAC], [cable("obj-1", 0, "obj-2", 0), cable("obj-1", 0, "gone", 0)]);
      expect(result.valid).toBe(false);
      const issue = result.issues.find((i) => i.code === "BROKEN_CONNECTION_TARGET");
      expect(issue?.message).toBe('Cable 1 destination references unknown object "gone"');
    });

    it("detects an endpoint that is not a pair", () => {
      const result = validate([OSC, DAC], [{ source: ["obj-1", 0], destination: ["obj-2"] }]);
      const issue = result.issues.find((i) => i.code === "BROKEN_CONNECTION_TARGET");
      expect(issue?.message).toBe("Cable 0 destination is not a [id, port] pair");
    });

    it("detects a negative port", () => {
      const result = validate([OSC, DAC], [cable("obj-1", 0, "obj-2", -1)]);
      const issue = result.issues.find((i) => i.code === "BROKEN_CONNECTION_TARGET");
      expect(issue?.message).toBe("Cable 0 destination is malformed");
    });
  });

  describe("OUTLET_OUT_OF_BOUNDS", () => {
    it("detects an outlet index beyond the box's outlets", () => {
      const result = validate([OSC, DAC], [cable("obj-1", 3, "obj-2", 0)]);
      expect(result.valid).toBe(false);
      const issue = result.issues.find((i) => i.code === "OUTLET_OUT_OF_BOUNDS");
      expect(issue?.message).toBe("[obj-1] cycle~ outlet 3 out of bounds (has 1 outlets)");
      expect(issue?.boxId).toBe("obj-1");
    });
  });

  describe("INLET_OUT_OF_BOUNDS", () => {
    it("detects an inlet index beyond the box's inlets", () => {
      const result = validate([OSC, DAC], [cable("obj-1", 0, "obj-2", 2)]);
      expect(result.valid).toBe(false);
      const issue = result.issues.find((i) => i.code === "INLET_OUT_OF_BOUNDS");
      expect(issue?.message).toBe("[obj-2] dac~ inlet 2 out of bounds (has 2 inlets)");
      expect(issue?.boxId).toBe("obj-2");
    });
  });

  describe("DUPLICATE_CONNECTION", () => {
    it("warns about a repeated cable", () => {
      const result = validate([OSC, DAC], [cable("obj-1", 0, "obj-2", 0), cable("obj-1", 0, "obj-2", 0)]);
      expect(result.valid).toBe(true);
      expect(result.issues).toEqual([
        {
          severity: "warning",
          code: "DUPLICATE_CONNECTION",
          message: "Duplicate connection: obj-1[0] → obj-2[0]",
        },
      ]);
    });

    it("does not flag the same boxes on different inlets", () => {
      const result = validate([OSC, DAC], [cable("obj-1", 0, "obj-2", 0), cable("obj-1", 0, "obj-2", 1)]);
      expect(result.issues).toEqual([]);
    });
  });

  describe("UNKNOWN_OBJECT", () => {
    it("warns about objects missing from the registry", () => {
      const result = validate(
        [OSC, obj("obj-3", "mystery.thing 1"), DAC],
        [cable("obj-1", 0, "obj-2", 0), cable("obj-3", 0, "obj-2", 1)],
      );
      expect(result.issues).toEqual([
        {
          severity: "warning",
          code: "UNKNOWN_OBJECT",
          message: 'Unknown object: "mystery.thing" (not in Max object registry)',
          boxId: "obj-3",
        },
      ]);
    });

    it("accepts aliases and unlisted spatial objects", () => {
      const result = validate(
        [obj("obj-1", "t b b", 1, 2), obj("obj-2", "spat5.future~", 1, 1)],
        [cable("obj-1", 0, "obj-2", 0)],
      );
      expect(result.issues.filter((i) => i.code === "UNKNOWN_OBJECT")).toEqual([]);
    });
  });

  describe("ORPHAN_OBJECT", () => {
    it("warns about boxes with no cables", () => {
      const result = validate(
        [OSC, DAC, obj("obj-3", "metro 100"), ui("obj-4", "flonum", 1, 2)],
        [cable("obj-1", 0, "obj-2", 0)],
      );
      const orphans = result.issues.filter((i) => i.code === "ORPHAN_OBJECT");
      expect(orphans.map((i) => i.message)).toEqual([
        "[obj-3] metro has no connections",
        "[obj-4] flonum has no connections",
      ]);
    });

    it("skips decorative boxes and objects used without cables", () => {
      const result = validate(
        [
          OSC,
          DAC,
          { id: "obj-3", maxclass: "comment", text: "notes", numInlets: 1, numOutlets: 0 },
          obj("obj-4", "loadbang"),
          obj("obj-5", "s tempo"),
          obj("obj-6", "buffer~ sample 1000", 1, 2),
          ui("obj-7", "panel", 1, 0),
        ],
        [cable("obj-1", 0, "obj-2", 0)],
      );
      expect(result.issues.filter((i) => i.code === "ORPHAN_OBJECT")).toEqual([]);
    });

    it("treats the ends of a broken cable as unconnected", () => {
      const result = validate([OSC, DAC], [cable("obj-9", 0, "obj-2", 0)]);
      const orphans = result.issues.filter((i) => i.code === "ORPHAN_OBJECT");
      expect(orphans.map((i) => i.boxId)).toEqual(["obj-1", "obj-2"]);
    });
  });

  describe("NO_DSP_SINK", () => {
    it("warns when audio objects never reach an output", () => {
      const result = validate(
        [OSC, obj("obj-2", "*~ 0.5", 2, 1)],
        [cable("obj-1", 0, "obj-2", 0)],
      );
      expect(result.issues).toEqual([
        {
          severity: "warning",
          code: "NO_DSP_SINK",
          message:
            "Patch has 2 audio objects but no DSP sink (dac~, ezdac~, send~, spat5.panoramix~)",
        },
      ]);
    });

    it("accepts send~ and spatial renderers as sinks", () => {
      const viaSend = validate([OSC, obj("obj-2", "send~ bus", 1, 0)], [cable("obj-1", 0, "obj-2", 0)]);
      expect(viaSend.issues).toEqual([]);

      const viaSpat = validate(
        [OSC, obj("obj-2", "spat5.panoramix~ @inputs 1", 1, 8)],
        [cable("obj-1", 0, "obj-2", 0)],
      );
      expect(viaSpat.issues).toEqual([]);
    });

    it("ignores control-only patches", () => {
      const result = validate(
        [obj("obj-1", "metro 100"), obj("obj-2", "print", 1, 0)],
        [cable("obj-1", 0, "obj-2", 0)],
      );
      expect(result.issues).toEqual([]);
    });
  });
});
