/**
 * PDG Analyzer - slicing, independent statement groups and data-only taint.
 */

import { buildAdjacency, reachableFrom, type Adjacency } from '../graph';
import type {
  DependenceTaint,
  ParallelGroup,
  ProgramDependenceAnalysis,
  ProgramDependenceGraph,
  ProgramDependenceOptions,
  ProgramSlice,
  SliceDirection,
} from './pdg-types';

export const DEFAULT_MAX_PARALLEL_GROUPS = 20;

/**
 * Every node that can affect (`backward`) or be affected by (`forward`) the
 * criterion through control or data dependences. Always contains the criterion.
 */
export function slice(
  pdg: ProgramDependenceGraph,
  criterion: number,
  direction: SliceDirection = 'backward',
  adjacency: Adjacency = buildAdjacency(pdg)
): ProgramSlice {
  const nodes = [...reachableFrom(pdg, [criterion], { direction, adjacency })].sort((a, b) => a - b);
  return { criterion, direction, nodes, lines: linesOf(pdg, nodes) };
}

export function backwardSlice(pdg: ProgramDependenceGraph, criterion: number): ProgramSlice {
  return slice(pdg, criterion, 'backward');
}

export function forwardSlice(pdg: ProgramDependenceGraph, criterion: number): ProgramSlice {
  return slice(pdg, criterion, 'forward');
}

/**
 * Nodes of the statements starting on `line`
 */
export function nodesAtLine(pdg: ProgramDependenceGraph, line: number): number[] {
  const starting = pdg.nodes.filter((node) => node.line === line);
  if (starting.length > 0) return starting.map((node) => node.id);
  // a line inside a multi-line statement
  return pdg.nodes.filter((node) => node.line <= line && line <= node.endLine).map((node) => node.id);
}

/**
 * Union of the slices of every statement on `line`; `null` when no statement
 * covers it
 */
export function sliceAtLine(
  pdg: ProgramDependenceGraph,
  line: number,
  direction: SliceDirection = 'backward'
): ProgramSlice | null {
  const criteria = nodesAtLine(pdg, line);
  if (criteria.length === 0) return null;

  const adjacency = buildAdjacency(pdg);
  const nodes = new Set<number>();
  for (const criterion of criteria) {
    for (const node of slice(pdg, criterion, direction, adjacency).nodes) nodes.add(node);
  }
  const sorted = [...nodes].sort((a, b) => a - b);
  return { criterion: criteria[0], direction, nodes: sorted, lines: linesOf(pdg, sorted) };
}

/**
 * Whether no dependence path joins `a` and `b` in either direction
 */
export function areIndependent(pdg: ProgramDependenceGraph, a: number, b: number): boolean {
  if (a === b) return false;
  const adjacency = buildAdjacency(pdg);
  return !reachableFrom(pdg, [a], { adjacency }).has(b) && !reachableFrom(pdg, [b], { adjacency }).has(a);
}

/**
 * Groups of mutually independent statements, formed greedily in statement
 * order: each ungrouped node opens a group and takes every later node that is
 * independent of all members so far. Only groups of two or more are kept.
 */
export function findParallelGroups(
  pdg: ProgramDependenceGraph,
  maxGroups = DEFAULT_MAX_PARALLEL_GROUPS
): ParallelGroup[] {
  const adjacency = buildAdjacency(pdg);
  const reach = pdg.nodes.map((node) => reachableFrom(pdg, [node.id], { adjacency }));
  const connected = (a: number, b: number) => reach[a].has(b) || reach[b].has(a);

  const grouped = new Set<number>();
  const groups: ParallelGroup[] = [];

  for (const seed of pdg.nodes) {
    if (groups.length >= maxGroups) break;
    if (grouped.has(seed.id)) continue;

    const members = [seed.id];
    for (const candidate of pdg.nodes) {
      if (candidate.id <= seed.id || grouped.has(candidate.id)) continue;
      if (members.every((member) => !connected(member, candidate.id))) members.push(candidate.id);
    }

    if (members.length < 2) continue;
    for (const member of members) grouped.add(member);
    groups.push({ nodes: members, lines: linesOf(pdg, members) });
  }

  return groups;
}

/**
 * Sinks reached from a source over data edges only. Control dependences do not
 * carry taint.
 */
export function findDataTaint(pdg: ProgramDependenceGraph, sources: number[], sinks: number[]): DependenceTaint[] {
  const adjacency = buildAdjacency(pdg);
  const findings: DependenceTaint[] = [];

  for (const source of sources) {
    const previous = new Map<number, number | null>([[source, null]]);
    const queue = [source];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const edgeIndex of adjacency.outgoing[current]) {
        const edge = pdg.edges[edgeIndex];
        if (edge.kind !== 'data' || previous.has(edge.to)) continue;
        previous.set(edge.to, current);
        queue.push(edge.to);
      }
    }

    for (const sink of sinks) {
      if (sink === source || !previous.has(sink)) continue;
      const path: number[] = [];
      for (let node: number | null | undefined = sink; node !== null && node !== undefined; node = previous.get(node)) {
        path.unshift(node);
      }
      findings.push({ source, sink, path });
    }
  }

  return findings;
}

/**
 * Taint by variable name: sources are statements defining a source name, sinks
 * are statements reading or calling a sink name.
 */
export function findDataTaintByName(
  pdg: ProgramDependenceGraph,
  sourceNames: string[],
  sinkNames: string[]
): DependenceTaint[] {
  const sourceSet = new Set(sourceNames);
  const sinkSet = new Set(sinkNames);
  const sources = pdg.nodes.filter((node) => node.defs.some((name) => sourceSet.has(name))).map((node) => node.id);
  const sinks = pdg.nodes
    .filter((node) => node.uses.some((name) => sinkSet.has(name)) || node.calls.some((name) => sinkSet.has(name)))
    .map((node) => node.id);
  return findDataTaint(pdg, sources, sinks);
}

export function analyzeProgramDependence(
  pdg: ProgramDependenceGraph,
  options: ProgramDependenceOptions = {}
): ProgramDependenceAnalysis {
  const controlEdges = pdg.edges.filter((edge) => edge.kind === 'control').length;
  return {
    functionName: pdg.functionName,
    file: pdg.file,
    parallelGroups: findParallelGroups(pdg, options.maxParallelGroups ?? DEFAULT_MAX_PARALLEL_GROUPS),
    stats: {
      nodes: pdg.nodes.length,
      edges: pdg.edges.length,
      controlEdges,
      dataEdges: pdg.edges.length - controlEdges,
    },
  };
}

function linesOf(pdg: ProgramDependenceGraph, nodes: number[]): number[] {
  return [...new Set(nodes.map((node) => pdg.nodes[node].line))].sort((a, b) => a - b);
}
