/**
 * Module dependency graph.
 *
 * Built from each file's import lines alone (no declaration extraction), so
 * files the grammar rejects still take part. Imports that resolve outside the
 * analyzed file set (packages, the standard library) are not edges.
 */

import * as path from 'path';
import type { Graph, GraphEdge } from './graph';
import { buildAdjacency } from './graph';
import type { LanguageRegistry } from './language/language-registry';
import { createPathResolver, type PathResolver } from './path-resolver';
import { modulePathOf } from './syntax/extractor';
import { scanImports } from './syntax/import-scanner';

export interface ModuleNode {
  id: number;
  /** Absolute path */
  file: string;
  /** Project-relative path without extension */
  modulePath: string;
  language: string;
}

export interface DependencyEdge extends GraphEdge<'import'> {
  specifier: string;
  line: number;
}

export interface UnresolvedImport {
  file: string;
  specifier: string;
  line: number;
}

export interface ModuleGraph extends Graph<ModuleNode, DependencyEdge> {
  root: string;
  /** Imports that matched no project file */
  external: UnresolvedImport[];
}

export interface ModuleSource {
  file: string;
  source: string;
}

export interface ModuleGraphOptions {
  root: string;
  registry: LanguageRegistry;
  resolver?: PathResolver;
}

export interface CircularDependency {
  /** Module ids around the cycle; the first module is repeated at the end */
  modules: number[];
  /** Module paths, same order */
  paths: string[];
}

export interface ModuleGraphAnalysis {
  cycles: CircularDependency[];
  roots: number[];
  leaves: number[];
  depth: Map<number, number>;
  maxDepth: number;
  stats: {
    modules: number;
    dependencies: number;
    external: number;
    cycles: number;
  };
}

export function buildModuleGraph(files: ModuleSource[], options: ModuleGraphOptions): ModuleGraph {
  const root = path.resolve(options.root);
  const resolver =
    options.resolver ?? createPathResolver({ projectRoot: root, files: files.map((item) => item.file) });

  const nodes: ModuleNode[] = [];
  const idByFile = new Map<string, number>();
  for (const { file } of [...files].sort((a, b) => a.file.localeCompare(b.file))) {
    const absolute = path.resolve(file);
    if (idByFile.has(absolute)) continue;
    const profile = options.registry.forFile(absolute) ?? options.registry.generic;
    idByFile.set(absolute, nodes.length);
    nodes.push({ id: nodes.length, file: absolute, modulePath: modulePathOf(absolute, root), language: profile.id });
  }

  const edges: DependencyEdge[] = [];
  const edgeKeys = new Set<string>();
  const external: UnresolvedImport[] = [];

  for (const { file, source } of files) {
    const absolute = path.resolve(file);
    const from = idByFile.get(absolute);
    if (from === undefined) continue;
    const profile = options.registry.forFile(absolute) ?? options.registry.generic;
    const packageBased = profile.grammar === 'babel';

    for (const reference of scanImports(source, profile)) {
      const targets = resolver.resolve(absolute, reference.specifier, {
        relativeFirst: !packageBased,
        suffixMatch: !packageBased,
      });
      const resolved = targets.map((target) => idByFile.get(target)).filter((id): id is number => id !== undefined);
      if (resolved.length === 0) {
        external.push({ file: absolute, specifier: reference.specifier, line: reference.line });
        continue;
      }
      for (const to of resolved) {
        // a Go package import lists the importer's own directory too
        if (to === from && targets.length > 1) continue;
        const key = `${from}>${to}`;
        if (edgeKeys.has(key)) continue;
        edgeKeys.add(key);
        edges.push({ from, to, kind: 'import', specifier: reference.specifier, line: reference.line });
      }
    }
  }

  return { root, nodes, edges, external };
}

/**
 * Every elementary cycle a depth-first search closes with a back edge to a
 * gray (in-progress) module, reported as the full path with the first module
 * repeated at the end. Rotations of one cycle are reported once.
 */
export function findCircularDependencies(graph: ModuleGraph): CircularDependency[] {
  const adjacency = buildAdjacency(graph);
  const color = new Map<number, 'gray' | 'black'>();
  const stack: number[] = [];
  const seen = new Set<string>();
  const cycles: CircularDependency[] = [];

  function visit(node: number): void {
    color.set(node, 'gray');
    stack.push(node);

    for (const edgeIndex of adjacency.outgoing[node]) {
      const target = graph.edges[edgeIndex].to;
      const state = color.get(target);
      if (state === 'gray') {
        const cycle = [...stack.slice(stack.indexOf(target)), target];
        const key = canonicalKey(cycle);
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push({ modules: cycle, paths: cycle.map((id) => graph.nodes[id].modulePath) });
        }
      } else if (state === undefined) {
        visit(target);
      }
    }

    stack.pop();
    color.set(node, 'black');
  }

  for (const node of graph.nodes) {
    if (!color.has(node.id)) visit(node.id);
  }
  return cycles;
}

export function hasCircularDependency(graph: ModuleGraph): boolean {
  return findCircularDependencies(graph).length > 0;
}

function canonicalKey(cycle: number[]): string {
  const ring = cycle.slice(0, -1);
  const start = ring.indexOf(Math.min(...ring));
  return [...ring.slice(start), ...ring.slice(0, start)].join('>');
}

/**
 * Modules nothing imports
 */
export function findRootModules(graph: ModuleGraph): number[] {
  const imported = new Set(graph.edges.map((edge) => edge.to));
  return graph.nodes.filter((node) => !imported.has(node.id)).map((node) => node.id);
}

/**
 * Modules that import nothing in the project
 */
export function findLeafModules(graph: ModuleGraph): number[] {
  const importing = new Set(graph.edges.map((edge) => edge.from));
  return graph.nodes.filter((node) => !importing.has(node.id)).map((node) => node.id);
}

/**
 * Longest import path from a root to each module. Edges that close a cycle are
 * left out, so modules that only sit on cycles count from where the search
 * entered the cycle.
 */
export function moduleDepths(graph: ModuleGraph): Map<number, number> {
  const adjacency = buildAdjacency(graph);
  const order: number[] = [];
  const color = new Map<number, 'gray' | 'black'>();
  const backEdges = new Set<number>();

  function visit(node: number): void {
    color.set(node, 'gray');
    for (const edgeIndex of adjacency.outgoing[node]) {
      const target = graph.edges[edgeIndex].to;
      const state = color.get(target);
      if (state === 'gray') {
        backEdges.add(edgeIndex);
      } else if (state === undefined) {
        visit(target);
      }
    }
    color.set(node, 'black');
    order.push(node);
  }

  const roots = findRootModules(graph);
  for (const node of [...roots, ...graph.nodes.map((item) => item.id)]) {
    if (!color.has(node)) visit(node);
  }

  // reverse post-order is a topological order of the graph without back edges
  const depth = new Map<number, number>(graph.nodes.map((node) => [node.id, 0]));
  for (const node of order.reverse()) {
    const current = depth.get(node) ?? 0;
    for (const edgeIndex of adjacency.outgoing[node]) {
      if (backEdges.has(edgeIndex)) continue;
      const target = graph.edges[edgeIndex].to;
      depth.set(target, Math.max(depth.get(target) ?? 0, current + 1));
    }
  }
  return depth;
}

/**
 * Modules `module` imports; with `transitive`, everything it reaches
 */
export function dependenciesOf(graph: ModuleGraph, module: number, transitive = false): number[] {
  return neighbours(graph, module, 'forward', transitive);
}

/**
 * Modules importing `module`; with `transitive`, everything that reaches it
 */
export function dependentsOf(graph: ModuleGraph, module: number, transitive = false): number[] {
  return neighbours(graph, module, 'backward', transitive);
}

function neighbours(graph: ModuleGraph, start: number, direction: 'forward' | 'backward', transitive: boolean): number[] {
  const adjacency = buildAdjacency(graph);
  const found = new Set<number>();
  const queue = [start];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    const edgeIndices = direction === 'forward' ? adjacency.outgoing[current] : adjacency.incoming[current];
    for (const edgeIndex of edgeIndices) {
      const edge = graph.edges[edgeIndex];
      const next = direction === 'forward' ? edge.to : edge.from;
      if (found.has(next)) continue;
      found.add(next);
      if (transitive) queue.push(next);
    }
  }

  found.delete(start);
  return [...found].sort((a, b) => a - b);
}

/**
 * Module matching a file path or module path
 */
export function findModule(graph: ModuleGraph, query: string): ModuleNode | undefined {
  const absolute = path.resolve(graph.root, query);
  return graph.nodes.find(
    (node) => node.file === absolute || node.modulePath === query || node.modulePath === query.replace(/\.[^./]+$/, '')
  );
}

export function analyzeModuleGraph(graph: ModuleGraph): ModuleGraphAnalysis {
  const cycles = findCircularDependencies(graph);
  const depth = moduleDepths(graph);
  return {
    cycles,
    roots: findRootModules(graph),
    leaves: findLeafModules(graph),
    depth,
    maxDepth: Math.max(0, ...depth.values()),
    stats: {
      modules: graph.nodes.length,
      dependencies: graph.edges.length,
      external: graph.external.length,
      cycles: cycles.length,
    },
  };
}
