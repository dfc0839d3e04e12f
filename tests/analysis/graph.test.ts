import { describe, it, expect } from "vitest";
import {
  buildSignalFlowGraph,
  findNode,
  incomingEdges,
  outgoingEdges,
  parsePort,
} from "../../src/analysis/graph.js";
import { AnalysisError } from "../../src/core/errors.js";
import { parsePatch } from "../../src/core/parser.js";
import { cable, obj, patchOf, readFixture, ui } from "../helpers/patch.js";

function routingError(fn: () => unknown): AnalysisError | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof AnalysisError) return error;
    throw error;
  }
  return undefined;
}

describe("buildSignalFlowGraph", () => {
  it("builds two nodes and one audio edge for cycle~ → dac~", () => {
    const graph = buildSignalFlowGraph(
      patchOf([obj("obj-1", "cycle~ 440", 2, 1), obj("obj-2", "dac~", 2, 0)], [cable("obj-1", 0, "obj-2", 1)]),
    );

    expect(graph.nodes).toHaveLength(2);
    expect(graph.edges).toEqual([
      { source: 0, target: 1, connection: { sourceOutlet: 0, destInlet: 1, connectionType: "audio" } },
    ]);
    expect(graph.outgoing).toEqual([[0], []]);
    expect(graph.incoming).toEqual([[], [0]]);
  });

  it("classifies flonum → cycle~ as control and cycle~ → dac~ as audio", () => {
    const graph = buildSignalFlowGraph(
      patchOf(
        [ui("obj-1", "flonum", 1, 2), obj("obj-2", "cycle~", 2, 1), obj("obj-3", "dac~", 2, 0)],
        [cable("obj-1", 0, "obj-2", 0), cable("obj-2", 0, "obj-3", 0)],
      ),
    );
    expect(graph.edges.map((e) => e.connection.connectionType)).toEqual(["control", "audio"]);
  });

  it("keeps one edge per cable with ports unchanged", async () => {
    const patch = parsePatch(await readFixture("hoa-chain.maxpat"));
    const graph = buildSignalFlowGraph(patch);

    expect(graph.nodes).toHaveLength(patch.boxes.length);
    expect(graph.edges).toHaveLength(patch.lines.length);
    expect(graph.edges.map((e) => [e.source, e.connection.sourceOutlet, e.target, e.connection.destInlet])).toEqual([
      [5, 0, 0, 0],
      [0, 0, 1, 0],
      [1, 0, 2, 0],
      [2, 0, 3, 0],
      [3, 0, 6, 0],
      [3, 1, 6, 1],
      [1, 0, 4, 0],
    ]);
  });

  it("lexes each node once from its class and text", async () => {
    const graph = buildSignalFlowGraph(parsePatch(await readFixture("hoa-chain.maxpat")));
    expect(graph.nodes[2].kind).toEqual({
      kind: "spatial",
      name: "spat5.hoa.encoder~",
      spatial: { type: "hoa-encoder", order: 3 },
    });
    expect(graph.nodes[5].kind).toEqual({ kind: "control-widget", widget: "flonum" });
    expect(graph.nodes[5].objectType).toBe("flonum");
    expect(graph.nodes[0].rect).toEqual([40, 80, 70, 22]);
  });

  describe("invalid routing", () => {
    const boxes = [obj("obj-1", "cycle~"), obj("obj-2", "dac~", 2, 0)];

    it("rejects a cable to an unknown box", () => {
      const error = routingError(() =>
        buildSignalFlowGraph(patchOf(boxes, [cable("obj-1", 0, "obj-2", 0), cable("obj-1", 0, "obj-3", 0)])),
      );
      expect(error?.code).toBe("INVALID_ROUTING");
      expect(error?.message).toBe(
        'Invalid routing configuration: cable 1 destination references unknown object "obj-3"',
      );
    });

    it("rejects an endpoint that is not an array", () => {
      const error = routingError(() =>
        buildSignalFlowGraph(patchOf(boxes, [{ source: "obj-1", destination: ["obj-2", 0] }])),
      );
      expect(error?.message).toBe(
        "Invalid routing configuration: cable 0 source is not a [id, port] pair",
      );
    });

    it("rejects a non-string id", () => {
      const error = routingError(() =>
        buildSignalFlowGraph(patchOf(boxes, [{ source: [1, 0], destination: ["obj-2", 0] }])),
      );
      expect(error?.message).toBe(
        "Invalid routing configuration: cable 0 source has a non-string object id",
      );
    });

    it("rejects a non-numeric port", () => {
      const error = routingError(() =>
        buildSignalFlowGraph(patchOf(boxes, [{ source: ["obj-1", 0], destination: ["obj-2", "left"] }])),
      );
      expect(error?.message).toBe(
        'Invalid routing configuration: cable 0 destination has a non-numeric port "left"',
      );
    });
  });
});

describe("parsePort", () => {
  it("accepts non-negative integers and their decimal strings", () => {
    expect(parsePort(0)).toBe(0);
    expect(parsePort(7)).toBe(7);
    expect(parsePort("12")).toBe(12);
  });

  it("rejects everything else", () => {
    expect(parsePort(-1)).toBeUndefined();
    expect(parsePort(1.5)).toBeUndefined();
    expect(parsePort("1.5")).toBeUndefined();
    expect(parsePort(null)).toBeUndefined();
  });
});

describe("graph queries", () => {
  it("finds nodes and their edges", async () => {
    const graph = buildSignalFlowGraph(parsePatch(await readFixture("hoa-chain.maxpat")));
    const mul = findNode(graph, "obj-2");

    expect(mul).toBe(1);
    expect(findNode(graph, "obj-99")).toBeUndefined();
    expect(outgoingEdges(graph, 1).map((e) => e.target)).toEqual([2, 4]);
    expect(incomingEdges(graph, 6).map((e) => e.connection.destInlet)).toEqual([0, 1]);
  });
});
