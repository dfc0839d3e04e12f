/**
 * analyze_patch MCP tool.
 *
 * Provides deep analysis: object counts, signal flow graph, audio chain
 * detection, complexity scoring, and validation.
 */

import path from "node:path";
import { parsePatch } from "../core/parser.js";
import { validatePatch } from "../core/validator.js";
import { AnalysisError } from "../core/errors.js";
import { getObjectCategory } from "../core/object-registry.js";
import { kindName, SPATIAL_PREFIX, tokenize } from "../core/object-kind.js";
import { buildSignalFlowGraph, type AudioNode, type SignalFlowGraph } from "../analysis/graph.js";
import type { ConnectionType } from "../analysis/connection.js";
import {
  analyzeSignalChains,
  getAudioSinks,
  getAudioSources,
  getSpatialNodes,
  type PathSearchBudget,
} from "../analysis/paths.js";
import { resolveSource } from "../utils/resolve-source.js";
import type { MaxBox, MaxPatch } from "../types.js";
import type { ValidationResult } from "../core/validator.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AnalysisResult {
  filePath?: string;
  objectCounts: Record<string, number>;
  totalObjects: number;
  totalConnections: number;
  /** Undefined when the cables could not be resolved; see `graphError`. */
  signalFlow?: SignalFlowSummary;
  graphError?: string;
  complexity: ComplexityScore;
  validation: ValidationResult;
}

export interface SignalFlowSummary {
  connectionTypes: Record<ConnectionType, number>;
  sources: string[];
  sinks: string[];
  spatialNodes: string[];
  chains: SignalChainSummary[];
  /** Topological order (empty if cycles exist). */
  topologicalOrder: string[];
  hasCycles: boolean;
}

export interface SignalChainSummary {
  /** Node indices forming the chain from source to sink. */
  path: number[];
  /** Node names along the path. */
  names: string[];
}

export interface ComplexityScore {
  score: number;
  label: string;
  factors: {
    objectFactor: number;
    densityFactor: number;
    audioFactor: number;
    spatialFactor: number;
    uniqueFactor: number;
  };
}

// ---------------------------------------------------------------------------
// Main entry point
// ---------------------------------------------------------------------------

/**
 * Execute the analyze_patch tool.
 */
export async function executeAnalyzePatch(
  source: string,
  budget: Partial<PathSearchBudget> = {},
): Promise<string> {
  const { text, filePath } = await resolveSource(source);
  const patch = parsePatch(text);
  const result = analyzePatch(patch, filePath, budget);
  return formatAnalysis(result);
}

/**
 * Analyze a decoded patch. A routing failure is reported, not thrown, so the
 * validation section still explains what is wrong.
 */
export function analyzePatch(
  patch: MaxPatch,
  filePath?: string,
  budget: Partial<PathSearchBudget> = {},
): AnalysisResult {
  const validation = validatePatch(patch);

  let signalFlow: SignalFlowSummary | undefined;
  let graphError: string | undefined;
  try {
    signalFlow = summarizeSignalFlow(buildSignalFlowGraph(patch), budget);
  } catch (error) {
    if (!(error instanceof AnalysisError)) throw error;
    graphError = error.message;
  }

  const totalObjects = patch.boxes.length;
  const totalConnections = patch.lines.length;
  const complexity = computeComplexity(
    totalObjects,
    totalConnections,
    signalFlow,
    countUniqueTypes(patch.boxes),
  );

  return {
    filePath,
    objectCounts: countObjectsByCategory(patch.boxes),
    totalObjects,
    totalConnections,
    signalFlow,
    graphError,
    complexity,
    validation,
  };
}

// ---------------------------------------------------------------------------
// Object counting
// ---------------------------------------------------------------------------

function countObjectsByCategory(boxes: readonly MaxBox[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const box of boxes) {
    const cat = boxCategory(box);
    counts[cat] = (counts[cat] ?? 0) + 1;
  }
  return counts;
}

function boxCategory(box: MaxBox): string {
  if (box.maxclass === "message") return "message";
  if (box.maxclass === "comment") return "comment";
  if (box.maxclass !== "newobj") return getObjectCategory(box.maxclass) ?? box.maxclass;

  const name = tokenize(box.text ?? "")[0];
  if (!name) return "unknown";
  if (name.startsWith(SPATIAL_PREFIX)) return "spatial";
  return getObjectCategory(name) ?? "unknown";
}

function countUniqueTypes(boxes: readonly MaxBox[]): number {
  const types = new Set<string>();
  for (const box of boxes) {
    const name = box.maxclass === "newobj" ? tokenize(box.text ?? "")[0] : undefined;
    types.add(name ?? box.maxclass);
  }
  return types.size;
}

// ---------------------------------------------------------------------------
// Signal flow
// ---------------------------------------------------------------------------

function summarizeSignalFlow(
  graph: SignalFlowGraph,
  budget: Partial<PathSearchBudget>,
): SignalFlowSummary {
  const connectionTypes: Record<ConnectionType, number> = {
    audio: 0,
    control: 0,
    message: 0,
    unknown: 0,
  };
  for (const edge of graph.edges) {
    connectionTypes[edge.connection.connectionType]++;
  }

  const label = (index: number): string => nodeLabel(graph.nodes[index]);
  const { order, hasCycles } = kahnSort(graph);

  return {
    connectionTypes,
    sources: getAudioSources(graph).map(label),
    sinks: getAudioSinks(graph).map(label),
    spatialNodes: getSpatialNodes(graph).map(label),
    chains: analyzeSignalChains(graph, budget).map((chain) => ({
      path: chain.path,
      names: chain.path.map((i) => nodeName(graph.nodes[i])),
    })),
    topologicalOrder: hasCycles ? [] : order.map((i) => graph.nodes[i].id),
    hasCycles,
  };
}

function kahnSort(graph: SignalFlowGraph): { order: number[]; hasCycles: boolean } {
  const nodeCount = graph.nodes.length;
  const inDegree = graph.incoming.map((edges) => edges.length);

  const queue: number[] = [];
  for (let i = 0; i < nodeCount; i++) {
    if (inDegree[i] === 0) queue.push(i);
  }

  const order: number[] = [];
  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    order.push(node);

    for (const e of graph.outgoing[node]) {
      const target = graph.edges[e].target;
      inDegree[target]--;
      if (inDegree[target] === 0) queue.push(target);
    }
  }

  return {
    order,
    hasCycles: order.length < nodeCount,
  };
}

function nodeName(node: AudioNode): string {
  return kindName(node.kind) ?? node.objectType;
}

function nodeLabel(node: AudioNode): string {
  return `${node.id} (${nodeName(node)})`;
}

// ---------------------------------------------------------------------------
// Complexity score
// ---------------------------------------------------------------------------

function computeComplexity(
  totalObjects: number,
  totalConnections: number,
  signalFlow: SignalFlowSummary | undefined,
  uniqueTypes: number,
): ComplexityScore {
  const objectFactor = Math.min(30, totalObjects / 3.3);

  const ratio = totalObjects > 0 ? totalConnections / totalObjects : 0;
  const densityFactor = Math.min(20, ratio * 6.7);

  const chains = signalFlow?.chains ?? [];
  const avgLength =
    chains.length > 0
      ? chains.reduce((sum, c) => sum + c.path.length, 0) / chains.length
      : 0;
  const audioFactor = Math.min(20, chains.length * avgLength * 2);

  const spatialFactor = Math.min(15, (signalFlow?.spatialNodes.length ?? 0) * 5);

  const uniqueFactor = Math.min(15, uniqueTypes * 0.75);

  const score = Math.round(
    objectFactor + densityFactor + audioFactor + spatialFactor + uniqueFactor,
  );

  let label: string;
  if (score <= 15) label = "trivial";
  else if (score <= 35) label = "simple";
  else if (score <= 60) label = "moderate";
  else if (score <= 80) label = "complex";
  else label = "very complex";

  return {
    score,
    label,
    factors: {
      objectFactor: Math.round(objectFactor * 10) / 10,
      densityFactor: Math.round(densityFactor * 10) / 10,
      audioFactor: Math.round(audioFactor * 10) / 10,
      spatialFactor: Math.round(spatialFactor * 10) / 10,
      uniqueFactor: Math.round(uniqueFactor * 10) / 10,
    },
  };
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatAnalysis(result: AnalysisResult): string {
  const lines: string[] = [];

  if (result.filePath) {
    lines.push(`# Analysis: ${path.basename(result.filePath)}`);
    lines.push(`Path: ${result.filePath}`);
  } else {
    lines.push("# Patch Analysis");
  }
  lines.push("");

  // Overview
  lines.push("## Overview");
  lines.push(`- **Total objects**: ${result.totalObjects}`);
  lines.push(`- **Total connections**: ${result.totalConnections}`);
  lines.push(
    `- **Complexity**: ${result.complexity.score}/100 (${result.complexity.label})`,
  );
  lines.push("");

  // Object counts by category
  lines.push("## Objects by Category");
  const sorted = Object.entries(result.objectCounts).sort(
    ([, a], [, b]) => b - a,
  );
  for (const [cat, count] of sorted) {
    lines.push(`- **${cat}**: ${count}`);
  }
  lines.push("");

  // Signal flow
  lines.push("## Signal Flow");
  const flow = result.signalFlow;
  if (!flow) {
    lines.push(`- Unavailable: ${result.graphError ?? "unknown error"}`);
    lines.push("");
  } else {
    const t = flow.connectionTypes;
    lines.push(
      `- Connections: ${t.audio} audio, ${t.control} control, ${t.message} message`,
    );
    lines.push(`- Sources: ${flow.sources.join(", ") || "none"}`);
    lines.push(`- Sinks: ${flow.sinks.join(", ") || "none"}`);
    lines.push(`- Spatial: ${flow.spatialNodes.join(", ") || "none"}`);
    if (flow.hasCycles) {
      lines.push("- Cycles detected (feedback loops)");
    } else {
      lines.push(`- Topological order: ${flow.topologicalOrder.join(" → ")}`);
    }
    lines.push("");

    // Signal chains
    lines.push(`## Signal Chains (${flow.chains.length})`);
    if (flow.chains.length === 0) {
      lines.push("No audio chains detected.");
    } else {
      for (let i = 0; i < flow.chains.length; i++) {
        lines.push(`  ${i + 1}. ${flow.chains[i].names.join(" → ")}`);
      }
    }
    lines.push("");
  }

  // Complexity breakdown
  lines.push("## Complexity Breakdown");
  const f = result.complexity.factors;
  lines.push(`- Objects: ${f.objectFactor}/30`);
  lines.push(`- Density: ${f.densityFactor}/20`);
  lines.push(`- Audio: ${f.audioFactor}/20`);
  lines.push(`- Spatial: ${f.spatialFactor}/15`);
  lines.push(`- Variety: ${f.uniqueFactor}/15`);
  lines.push("");

  // Validation summary
  lines.push("## Validation");
  const v = result.validation;
  if (v.valid) {
    lines.push(`**VALID** — ${v.summary.warnings} warning(s)`);
  } else {
    lines.push(
      `**INVALID** — ${v.summary.errors} error(s), ${v.summary.warnings} warning(s)`,
    );
  }
  for (const issue of v.issues) {
    const icon =
      issue.severity === "error"
        ? "[ERROR]"
        : issue.severity === "warning"
          ? "[WARN]"
          : "[INFO]";
    lines.push(`  ${icon} ${issue.message}`);
  }
  lines.push("");

  return lines.join("\n");
}
