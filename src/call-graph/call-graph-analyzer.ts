/**
 * Call graph analyses: recursion, dead functions, depth, callers/callees and
 * call chains.
 */

import { bfsDistances, buildAdjacency } from '../graph';
import type { CallGraph, CallGraphAnalysis, FunctionNode } from './call-graph-types';

const MAX_CHAINS = 100;

/**
 * Functions on a directed cycle (a self-call is the one-node cycle), found as
 * the non-trivial strongly connected components of a depth-first search.
 */
export function findRecursive(graph: CallGraph): number[] {
  const adjacency = buildAdjacency(graph);
  const index = new Map<number, number>();
  const lowLink = new Map<number, number>();
  const onStack = new Set<number>();
  const stack: number[] = [];
  const recursive = new Set<number>();
  let counter = 0;

  // iterative to stay clear of the call stack limit on long chains
  for (const root of graph.nodes) {
    if (index.has(root.id)) continue;
    const work: Array<{ node: number; next: number }> = [{ node: root.id, next: 0 }];
    index.set(root.id, counter);
    lowLink.set(root.id, counter);
    counter++;
    stack.push(root.id);
    onStack.add(root.id);

    while (work.length > 0) {
      const frame = work[work.length - 1];
      const outgoing = adjacency.outgoing[frame.node];

      if (frame.next < outgoing.length) {
        const target = graph.edges[outgoing[frame.next]].to;
        frame.next++;
        if (!index.has(target)) {
          index.set(target, counter);
          lowLink.set(target, counter);
          counter++;
          stack.push(target);
          onStack.add(target);
          work.push({ node: target, next: 0 });
        } else if (onStack.has(target)) {
          lowLink.set(frame.node, Math.min(lowLink.get(frame.node) ?? 0, index.get(target) ?? 0));
        }
        continue;
      }

      work.pop();
      const parent = work[work.length - 1];
      if (parent) {
        lowLink.set(parent.node, Math.min(lowLink.get(parent.node) ?? 0, lowLink.get(frame.node) ?? 0));
      }

      if (lowLink.get(frame.node) === index.get(frame.node)) {
        const component: number[] = [];
        let member: number | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.node);

        const selfCall = graph.edges.some((edge) => edge.from === frame.node && edge.to === frame.node);
        if (component.length > 1 || selfCall) {
          for (const id of component) recursive.add(id);
        }
      }
    }
  }

  return [...recursive].sort((a, b) => a - b);
}

/**
 * Functions with no incoming call edge that are not entry points. A self-call
 * counts, as do calls within a cycle nothing else reaches.
 */
export function findDeadFunctions(graph: CallGraph): number[] {
  const called = new Set(graph.edges.map((edge) => edge.to));
  return graph.nodes.filter((node) => !node.isEntryPoint && !called.has(node.id)).map((node) => node.id);
}

/**
 * Functions with no incoming call edge
 */
export function findRoots(graph: CallGraph): number[] {
  const called = new Set(graph.edges.map((edge) => edge.to));
  return graph.nodes.filter((node) => !called.has(node.id)).map((node) => node.id);
}

/**
 * Shortest number of calls from `from` to every function it reaches
 */
export function callDepths(graph: CallGraph, from: number): Map<number, number> {
  return bfsDistances(graph, from);
}

export function callDepth(graph: CallGraph, from: number, to: number): number | null {
  return callDepths(graph, from).get(to) ?? null;
}

export function callers(graph: CallGraph, fn: number): FunctionNode[] {
  const ids = new Set(graph.edges.filter((edge) => edge.to === fn).map((edge) => edge.from));
  return [...ids].sort((a, b) => a - b).map((id) => graph.nodes[id]);
}

export function callees(graph: CallGraph, fn: number): FunctionNode[] {
  const ids = new Set(graph.edges.filter((edge) => edge.from === fn).map((edge) => edge.to));
  return [...ids].sort((a, b) => a - b).map((id) => graph.nodes[id]);
}

/**
 * Simple call paths from `from` to `to`, at most `maxDepth` calls long.
 */
export function callChains(graph: CallGraph, from: number, to: number, maxDepth = 10): number[][] {
  const adjacency = buildAdjacency(graph);
  const chains: number[][] = [];
  const current: number[] = [];
  const onPath = new Set<number>();

  function dfs(node: number): void {
    if (chains.length >= MAX_CHAINS) return;
    current.push(node);
    onPath.add(node);

    if (node === to && current.length > 1) {
      chains.push([...current]);
    } else if (current.length <= maxDepth) {
      const targets = new Set(adjacency.outgoing[node].map((index) => graph.edges[index].to));
      for (const next of targets) {
        if (!onPath.has(next) || (next === to && next === from)) dfs(next);
      }
    }

    current.pop();
    onPath.delete(node);
  }

  dfs(from);
  return chains;
}

/**
 * Functions matching a user-supplied name: exact qualified name, `Class.name`,
 * or bare name.
 */
export function findFunctions(graph: CallGraph, query: string): FunctionNode[] {
  const exact = graph.nodes.filter((node) => node.qualifiedName === query);
  if (exact.length > 0) return exact;
  return graph.nodes.filter(
    (node) =>
      node.name === query ||
      node.qualifiedName.endsWith(`::${query}`) ||
      (node.className !== null && `${node.className}.${node.name}` === query)
  );
}

export function analyzeCallGraph(graph: CallGraph): CallGraphAnalysis {
  const recursive = findRecursive(graph);
  const dead = findDeadFunctions(graph);
  const roots = findRoots(graph);

  let maxDepth = 0;
  const adjacency = buildAdjacency(graph);
  for (const node of graph.nodes) {
    if (!node.isEntryPoint) continue;
    for (const depth of bfsDistances(graph, node.id, adjacency).values()) {
      maxDepth = Math.max(maxDepth, depth);
    }
  }

  return {
    recursive,
    dead,
    roots,
    unresolved: graph.unresolved,
    maxDepth,
    stats: {
      functions: graph.nodes.length,
      calls: graph.edges.length,
      unresolved: graph.unresolved.length,
      recursive: recursive.length,
      dead: dead.length,
      roots: roots.length,
    },
  };
}
