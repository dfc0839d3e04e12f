/**
 * Audio path analysis over a built signal flow graph.
 *
 * Finds audio sources and sinks and the audio-only chains between them.
 */

import type { SignalFlowGraph } from "./graph.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SignalChain {
  /** Index of the source node. */
  source: number;
  /** Index of the sink node. */
  sink: number;
  /** Node indices from source to sink inclusive; every hop is an audio edge. */
  path: number[];
}

/** Limits on chain discovery. Use Infinity to lift a limit. */
export interface PathSearchBudget {
  /** Longest path considered, in edges. */
  maxDepth: number;
  /** Chains returned in total. */
  maxChains: number;
  /** Paths expanded per (source, sink) search. */
  maxExpansions: number;
}

export const DEFAULT_PATH_BUDGET: PathSearchBudget = {
  maxDepth: 64,
  maxChains: 1000,
  maxExpansions: 10_000,
};

// ---------------------------------------------------------------------------
// Sources, sinks, spatial nodes
// ---------------------------------------------------------------------------

/**
 * Nodes that generate or capture audio (oscillators, noise, ADC family) and
 * have no incoming audio edge.
 */
export function getAudioSources(graph: SignalFlowGraph): number[] {
  const sources: number[] = [];
  graph.nodes.forEach((node, index) => {
    const family = node.kind.kind;
    if (family !== "generator" && family !== "input") return;
    if (hasAudioEdge(graph, graph.incoming[index])) return;
    sources.push(index);
  });
  return sources;
}

/**
 * Nodes that terminate audio (DAC family, panoramix, generic spatial
 * objects) and have no outgoing audio edge.
 */
export function getAudioSinks(graph: SignalFlowGraph): number[] {
  const sinks: number[] = [];
  graph.nodes.forEach((node, index) => {
    const { kind } = node;
    const isSinkFamily =
      kind.kind === "output" ||
      (kind.kind === "spatial" &&
        (kind.spatial.type === "panoramix" || kind.spatial.type === "generic"));
    if (!isSinkFamily) return;
    if (hasAudioEdge(graph, graph.outgoing[index])) return;
    sinks.push(index);
  });
  return sinks;
}

/** Nodes doing spatial processing: spatial objects and the pan~ family. */
export function getSpatialNodes(graph: SignalFlowGraph): number[] {
  const result: number[] = [];
  graph.nodes.forEach((node, index) => {
    if (node.kind.kind === "spatial" || node.kind.kind === "panner") {
      result.push(index);
    }
  });
  return result;
}

function hasAudioEdge(graph: SignalFlowGraph, edgeIndices: readonly number[]): boolean {
  return edgeIndices.some(
    (e) => graph.edges[e].connection.connectionType === "audio",
  );
}

// ---------------------------------------------------------------------------
// Chain discovery
// ---------------------------------------------------------------------------

/**
 * For every (source, sink) pair, find the first audio-only simple path.
 *
 * Reachability is computed once per source so unreachable sinks cost
 * nothing; each remaining pair is searched breadth-first within `budget`,
 * which yields the shortest chain.
 */
export function analyzeSignalChains(
  graph: SignalFlowGraph,
  budget: Partial<PathSearchBudget> = {},
): SignalChain[] {
  const limits: PathSearchBudget = { ...DEFAULT_PATH_BUDGET, ...budget };
  const audioAdj = buildAudioAdjacency(graph);
  const sources = getAudioSources(graph);
  const sinks = getAudioSinks(graph);
  const chains: SignalChain[] = [];

  for (const source of sources) {
    const reachable = reachableFrom(source, audioAdj);
    for (const sink of sinks) {
      if (chains.length >= limits.maxChains) return chains;
      if (sink === source || !reachable.has(sink)) continue;

      const path = findAudioPath(source, sink, audioAdj, limits);
      if (path) chains.push({ source, sink, path });
    }
  }

  return chains;
}

/** Node index → successor indices over audio edges only, in cable order. */
function buildAudioAdjacency(graph: SignalFlowGraph): number[][] {
  const adj: number[][] = graph.nodes.map(() => []);
  for (const edge of graph.edges) {
    if (edge.connection.connectionType === "audio") {
      adj[edge.source].push(edge.target);
    }
  }
  return adj;
}

function reachableFrom(start: number, adj: readonly number[][]): Set<number> {
  const seen = new Set<number>([start]);
  const stack = [start];
  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    for (const next of adj[node]) {
      if (!seen.has(next)) {
        seen.add(next);
        stack.push(next);
      }
    }
  }
  return seen;
}

function findAudioPath(
  source: number,
  sink: number,
  adj: readonly number[][],
  limits: PathSearchBudget,
): number[] | undefined {
  const queue: number[][] = [[source]];
  let expansions = 0;

  for (let head = 0; head < queue.length; head++) {
    if (expansions >= limits.maxExpansions) return undefined;
    expansions++;

    const current = queue[head];
    const last = current[current.length - 1];
    if (last === sink) return current;
    if (current.length - 1 >= limits.maxDepth) continue;

    for (const next of adj[last]) {
      // Simple paths only
      if (!current.includes(next)) {
        queue.push([...current, next]);
      }
    }
  }

  return undefined;
}
