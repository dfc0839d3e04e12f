/**
 * Signal flow graph construction.
 *
 * Turns the flat box and cable lists of a patch into a directed graph of
 * audio nodes joined by classified connections.
 */

import { lexObject, type ObjectKind } from "../core/object-kind.js";
import { AnalysisError } from "../core/errors.js";
import { classifyConnection, type ConnectionType } from "./connection.js";
import type { MaxPatch, Rect } from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AudioNode {
  readonly id: string;
  /** Box class, e.g. "newobj" or "flonum". */
  readonly objectType: string;
  /** Object name plus arguments. */
  readonly text?: string;
  readonly kind: ObjectKind;
  readonly numInlets: number;
  readonly numOutlets: number;
  readonly rect?: Rect;
}

export interface AudioConnection {
  readonly sourceOutlet: number;
  readonly destInlet: number;
  readonly connectionType: ConnectionType;
}

export interface GraphEdge {
  /** Index of the source node. */
  readonly source: number;
  /** Index of the destination node. */
  readonly target: number;
  readonly connection: AudioConnection;
}

export interface SignalFlowGraph {
  readonly nodes: readonly AudioNode[];
  /** Edges in cable order. */
  readonly edges: readonly GraphEdge[];
  /** Node index → indices into `edges` leaving that node. */
  readonly outgoing: readonly (readonly number[])[];
  /** Node index → indices into `edges` entering that node. */
  readonly incoming: readonly (readonly number[])[];
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Build the signal flow graph for a patch.
 *
 * @throws AnalysisError INVALID_ROUTING when a cable endpoint is malformed or
 *   names a box that does not exist. No partial graph is returned.
 */
export function buildSignalFlowGraph(patch: MaxPatch): SignalFlowGraph {
  // Pass 1: one node per box
  const nodes: AudioNode[] = [];
  const indexById = new Map<string, number>();

  for (const box of patch.boxes) {
    indexById.set(box.id, nodes.length);
    nodes.push({
      id: box.id,
      objectType: box.maxclass,
      text: box.text,
      kind: lexObject(box.maxclass, box.text),
      numInlets: box.numInlets,
      numOutlets: box.numOutlets,
      rect: box.rect,
    });
  }

  // Pass 2: one classified edge per cable
  const edges: GraphEdge[] = [];
  const outgoing: number[][] = nodes.map(() => []);
  const incoming: number[][] = nodes.map(() => []);

  patch.lines.forEach((line, lineIndex) => {
    const from = resolveEndpoint(line.source, indexById, `cable ${lineIndex} source`);
    const to = resolveEndpoint(line.destination, indexById, `cable ${lineIndex} destination`);

    const edgeIndex = edges.length;
    edges.push({
      source: from.node,
      target: to.node,
      connection: {
        sourceOutlet: from.port,
        destInlet: to.port,
        connectionType: classifyConnection(nodes[from.node], nodes[to.node]),
      },
    });
    outgoing[from.node].push(edgeIndex);
    incoming[to.node].push(edgeIndex);
  });

  return { nodes, edges, outgoing, incoming };
}

/**
 * Validate a `[boxId, portIndex]` endpoint and resolve it to a node index.
 */
function resolveEndpoint(
  endpoint: unknown,
  indexById: ReadonlyMap<string, number>,
  where: string,
): { node: number; port: number } {
  if (!Array.isArray(endpoint) || endpoint.length !== 2) {
    throw AnalysisError.invalidRouting(`${where} is not a [id, port] pair`);
  }

  const [id, rawPort]: unknown[] = endpoint;
  if (typeof id !== "string") {
    throw AnalysisError.invalidRouting(`${where} has a non-string object id`);
  }

  const port = parsePort(rawPort);
  if (port === undefined) {
    throw AnalysisError.invalidRouting(`${where} has a non-numeric port "${String(rawPort)}"`);
  }

  const node = indexById.get(id);
  if (node === undefined) {
    throw AnalysisError.invalidRouting(`${where} references unknown object "${id}"`);
  }

  return { node, port };
}

/** Ports are numbers in current files and numeric strings in older ones. */
export function parsePort(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/** Edges leaving a node, in cable order. */
export function outgoingEdges(graph: SignalFlowGraph, node: number): GraphEdge[] {
  return graph.outgoing[node].map((e) => graph.edges[e]);
}

/** Edges entering a node, in cable order. */
export function incomingEdges(graph: SignalFlowGraph, node: number): GraphEdge[] {
  return graph.incoming[node].map((e) => graph.edges[e]);
}

/** Find a node index by box id. */
export function findNode(graph: SignalFlowGraph, id: string): number | undefined {
  const index = graph.nodes.findIndex((n) => n.id === id);
  return index === -1 ? undefined : index;
}
