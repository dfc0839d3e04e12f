import { describe, it, expect } from "vitest";
import {
  isAudioBearing,
  kindName,
  lexObject,
  tokenize,
} from "../src/core/object-kind.js";

describe("tokenize", () => {
  it("splits on runs of whitespace and drops empties", () => {
    expect(tokenize("  cycle~   440 \n")).toEqual(["cycle~", "440"]);
    expect(tokenize("")).toEqual([]);
  });
});

describe("lexObject", () => {
  it("classifies widgets by class, ignoring text", () => {
    expect(lexObject("flonum")).toEqual({ kind: "control-widget", widget: "flonum" });
    expect(lexObject("live.dial", "cycle~")).toEqual({ kind: "control-widget", widget: "live.dial" });
  });

  it("classifies the fixed families", () => {
    expect(lexObject("newobj", "cycle~ 440")).toEqual({ kind: "generator", name: "cycle~" });
    expect(lexObject("newobj", "noise~")).toEqual({ kind: "generator", name: "noise~" });
    expect(lexObject("newobj", "adc~ 1 2")).toEqual({ kind: "input", name: "adc~" });
    expect(lexObject("newobj", "ezdac~")).toEqual({ kind: "output", name: "ezdac~" });
    expect(lexObject("newobj", "pan4~")).toEqual({ kind: "panner", name: "pan4~" });
    expect(lexObject("newobj", "line 0")).toEqual({ kind: "ramp", name: "line" });
    expect(lexObject("newobj", "line~")).toEqual({ kind: "ramp", name: "line~" });
  });

  it("treats a tilde anywhere in the text as audio", () => {
    expect(lexObject("newobj", "*~ 0.5")).toEqual({ kind: "audio", name: "*~" });
    expect(lexObject("newobj", "send~ bus")).toEqual({ kind: "audio", name: "send~" });
    expect(lexObject("newobj", "receive sig~")).toEqual({ kind: "audio", name: "receive" });
  });

  it("falls back to message and unknown", () => {
    expect(lexObject("newobj", "metro 100")).toEqual({ kind: "message", name: "metro" });
    expect(lexObject("message", "bang")).toEqual({ kind: "message", name: "bang" });
    expect(lexObject("newobj", "   ")).toEqual({ kind: "unknown", text: "   " });
    expect(lexObject("newobj")).toEqual({ kind: "unknown", text: "" });
  });

  it("reads spatial object types and their count argument", () => {
    expect(lexObject("newobj", "spat5.panoramix~ @inputs 2")).toEqual({
      kind: "spatial",
      name: "spat5.panoramix~",
      spatial: { type: "panoramix" },
    });
    expect(lexObject("newobj", "spat5.hoa.encoder~ 3")).toEqual({
      kind: "spatial",
      name: "spat5.hoa.encoder~",
      spatial: { type: "hoa-encoder", order: 3 },
    });
    expect(lexObject("newobj", "spat5.hoa.decoder~ 2 @outputs 9")).toEqual({
      kind: "spatial",
      name: "spat5.hoa.decoder~",
      spatial: { type: "hoa-decoder", order: 2 },
    });
    expect(lexObject("newobj", "spat5.vbap~ 16")).toEqual({
      kind: "spatial",
      name: "spat5.vbap~",
      spatial: { type: "vbap", numSpeakers: 16 },
    });
    expect(lexObject("newobj", "spat5.spat~")).toEqual({
      kind: "spatial",
      name: "spat5.spat~",
      spatial: { type: "generic", name: "spat5.spat~" },
    });
  });

  it("uses defaults when the count argument is missing or not a number", () => {
    expect(lexObject("newobj", "spat5.hoa.encoder~")).toEqual({
      kind: "spatial",
      name: "spat5.hoa.encoder~",
      spatial: { type: "hoa-encoder", order: 1 },
    });
    expect(lexObject("newobj", "spat5.hoa.decoder~ @order 3")).toEqual({
      kind: "spatial",
      name: "spat5.hoa.decoder~",
      spatial: { type: "hoa-decoder", order: 1 },
    });
    expect(lexObject("newobj", "spat5.vbap~ -4")).toEqual({
      kind: "spatial",
      name: "spat5.vbap~",
      spatial: { type: "vbap", numSpeakers: 8 },
    });
  });
});

describe("isAudioBearing", () => {
  it("is true for signal families and false for control families", () => {
    expect(isAudioBearing(lexObject("newobj", "cycle~"))).toBe(true);
    expect(isAudioBearing(lexObject("newobj", "spat5.viewer"))).toBe(true);
    expect(isAudioBearing(lexObject("newobj", "line~"))).toBe(true);
    expect(isAudioBearing(lexObject("newobj", "line"))).toBe(false);
    expect(isAudioBearing(lexObject("flonum"))).toBe(false);
    expect(isAudioBearing(lexObject("newobj", "metro 100"))).toBe(false);
    expect(isAudioBearing(lexObject("newobj", ""))).toBe(false);
  });
});

describe("kindName", () => {
  it("returns the widget class or object name", () => {
    expect(kindName(lexObject("toggle"))).toBe("toggle");
    expect(kindName(lexObject("newobj", "dac~ 1 2"))).toBe("dac~");
    expect(kindName(lexObject("newobj", ""))).toBeUndefined();
  });
});
