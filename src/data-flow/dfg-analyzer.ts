/**
 * DFG Analyzer - unused definitions, variable lifetimes, redundant
 * computations and intra-procedural taint.
 */

import { buildAdjacency, type Adjacency } from '../graph';
import type {
  DataFlowAnalysis,
  DataFlowGraph,
  DataFlowOptions,
  RedundantComputation,
  TaintFinding,
  VarNode,
  VariableLifetime,
} from './dfg-types';

function defUseTargets(dfg: DataFlowGraph, adjacency: Adjacency, node: number): number[] {
  return adjacency.outgoing[node]
    .map((index) => dfg.edges[index])
    .filter((edge) => edge.kind === 'def-use')
    .map((edge) => edge.to);
}

/**
 * Definitions no use is reached from. Parameters are a separate node kind and
 * never reported; neither are exported names.
 */
export function findUnusedDefinitions(dfg: DataFlowGraph, options: DataFlowOptions = {}): VarNode[] {
  const adjacency = buildAdjacency(dfg);
  return dfg.nodes.filter(
    (node) =>
      node.kind === 'definition' &&
      !options.exported?.has(node.name) &&
      defUseTargets(dfg, adjacency, node.id).length === 0
  );
}

/**
 * Span from each used definition (or parameter) to its last reaching use.
 */
export function variableLifetimes(dfg: DataFlowGraph): VariableLifetime[] {
  const adjacency = buildAdjacency(dfg);
  const lifetimes: VariableLifetime[] = [];

  for (const node of dfg.nodes) {
    if (node.kind !== 'definition' && node.kind !== 'parameter') continue;
    const uses = defUseTargets(dfg, adjacency, node.id);
    if (uses.length === 0) continue;

    const lastUseLine = Math.max(...uses.map((use) => dfg.nodes[use].line));
    lifetimes.push({
      name: node.name,
      definition: node.id,
      defLine: node.line,
      lastUseLine,
      span: Math.max(0, lastUseLine - node.line),
    });
  }

  return lifetimes;
}

/**
 * Operations repeating an earlier one: same operator, same operands resolved
 * to the same reaching definitions, so no operand was redefined in between.
 */
export function findRedundantComputations(dfg: DataFlowGraph): RedundantComputation[] {
  const seen = new Map<string, VarNode>();
  const redundant: RedundantComputation[] = [];

  for (const node of dfg.nodes) {
    if (node.kind !== 'operation' || !node.operands) continue;
    // an operation without any variable operand is constant folding, not a repeat
    if (!node.operands.some((operand) => operand.startsWith('#') || operand.startsWith('?'))) continue;

    const key = `${node.name}(${node.operands.join(',')})`;
    const first = seen.get(key);
    if (first) {
      redundant.push({ original: first.id, repeated: node.id, operator: node.name, line: node.line });
    } else {
      seen.set(key, node);
    }
  }

  return redundant;
}

/**
 * Sinks reachable from a source over data edges only (both def-use and flow).
 */
export function findTaintedSinks(dfg: DataFlowGraph, sources: number[], sinks: number[]): TaintFinding[] {
  const adjacency = buildAdjacency(dfg);
  const sinkSet = new Set(sinks);
  const findings: TaintFinding[] = [];

  for (const source of sources) {
    const previous = new Map<number, number>([[source, -1]]);
    const queue = [source];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const index of adjacency.outgoing[current]) {
        const next = dfg.edges[index].to;
        if (previous.has(next)) continue;
        previous.set(next, current);
        queue.push(next);
      }
    }

    for (const sink of sinkSet) {
      if (sink === source || !previous.has(sink)) continue;
      findings.push({ source, sink, path: pathTo(previous, sink) });
    }
  }

  return findings;
}

function pathTo(previous: Map<number, number>, target: number): number[] {
  const path: number[] = [];
  let current: number | undefined = target;
  while (current !== undefined && current !== -1) {
    path.unshift(current);
    current = previous.get(current);
  }
  return path;
}

/**
 * Taint by name: sources are definitions and parameters of the source names,
 * sinks are uses and calls of the sink names.
 */
export function findTaintByName(dfg: DataFlowGraph, sourceNames: string[], sinkNames: string[]): TaintFinding[] {
  const sourceSet = new Set(sourceNames);
  const sinkSet = new Set(sinkNames);
  const sources = dfg.nodes
    .filter((node) => (node.kind === 'definition' || node.kind === 'parameter') && sourceSet.has(node.name))
    .map((node) => node.id);
  const sinks = dfg.nodes
    .filter((node) => (node.kind === 'use' || node.kind === 'call') && sinkSet.has(node.name))
    .map((node) => node.id);
  return findTaintedSinks(dfg, sources, sinks);
}

/**
 * Definitions reaching a use node
 */
export function reachingDefinitions(dfg: DataFlowGraph, use: number): VarNode[] {
  return dfg.edges
    .filter((edge) => edge.kind === 'def-use' && edge.to === use)
    .map((edge) => dfg.nodes[edge.from]);
}

export function analyzeDataFlow(dfg: DataFlowGraph, options: DataFlowOptions = {}): DataFlowAnalysis {
  const count = (kind: VarNode['kind']) => dfg.nodes.filter((node) => node.kind === kind).length;
  return {
    functionName: dfg.functionName,
    file: dfg.file,
    unused: findUnusedDefinitions(dfg, options),
    lifetimes: variableLifetimes(dfg),
    redundant: findRedundantComputations(dfg),
    stats: {
      nodes: dfg.nodes.length,
      edges: dfg.edges.length,
      definitions: count('definition'),
      uses: count('use'),
      parameters: count('parameter'),
    },
  };
}
