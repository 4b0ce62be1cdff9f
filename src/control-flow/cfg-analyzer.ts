/**
 * CFG Analyzer - reachability, complexity and loop structure of a CFG.
 */

import { buildAdjacency, reachableFrom } from '../graph';
import type {
  ControlFlowAnalysis,
  ControlFlowGraph,
  ControlFlowStats,
  DeadCodeRegion,
  NaturalLoop,
  StatementSite,
} from './cfg-types';

/**
 * Blocks reachable from the entry block (entry included).
 */
export function reachableBlocks(cfg: ControlFlowGraph): Set<number> {
  return reachableFrom(cfg, [cfg.entry]);
}

/**
 * Blocks not reachable from entry, ascending. An empty join block that no edge
 * touches (after an endless loop, or a switch whose arms all return) is left out.
 */
export function unreachableBlocks(cfg: ControlFlowGraph, reachable = reachableBlocks(cfg)): number[] {
  const touched = new Set(cfg.edges.flatMap((edge) => [edge.from, edge.to]));
  return cfg.nodes
    .filter((block) => !reachable.has(block.id))
    .filter((block) => block.statements.length > 0 || touched.has(block.id))
    .map((block) => block.id);
}

/**
 * Unreachable blocks that hold statements: code after a return, break or throw.
 */
export function findDeadCode(cfg: ControlFlowGraph, reachable = reachableBlocks(cfg)): DeadCodeRegion[] {
  const sites = siteIndex(cfg);
  const regions: DeadCodeRegion[] = [];

  for (const block of cfg.nodes) {
    if (reachable.has(block.id) || block.statements.length === 0) continue;
    const blockSites = block.statements
      .map((id) => sites.get(id))
      .filter((site): site is StatementSite => site !== undefined);
    if (blockSites.length === 0) continue;

    regions.push({
      block: block.id,
      startLine: Math.min(...blockSites.map((site) => site.line)),
      endLine: Math.max(...blockSites.map((site) => site.endLine)),
      text: blockSites[0].text,
    });
  }

  return regions;
}

/**
 * Cyclomatic complexity as 1 + the number of extra ways out of each reachable
 * decision block. Equal to edges - nodes + 2 when every block is reachable.
 */
export function cyclomaticComplexity(cfg: ControlFlowGraph, reachable = reachableBlocks(cfg)): number {
  const adjacency = buildAdjacency(cfg);
  let complexity = 1;

  for (const block of cfg.nodes) {
    if (block.kind !== 'branch' && block.kind !== 'loop') continue;
    if (!reachable.has(block.id)) continue;
    complexity += Math.max(0, adjacency.outgoing[block.id].length - 1);
  }

  return complexity;
}

/**
 * Natural loops, one per loop-back edge: the header plus every block that
 * reaches the latch without passing through the header.
 */
export function findLoops(cfg: ControlFlowGraph): NaturalLoop[] {
  const adjacency = buildAdjacency(cfg);
  const sites = siteIndex(cfg);
  const loops: NaturalLoop[] = [];

  for (const edge of cfg.edges) {
    if (edge.kind !== 'loop-back') continue;
    const header = edge.to;
    const body = reachableFrom(cfg, [edge.from], {
      direction: 'backward',
      stopAt: new Set([header]),
      adjacency,
    });
    body.add(header);

    const headerSite = cfg.nodes[header].statements
      .map((id) => sites.get(id))
      .find((site): site is StatementSite => site !== undefined);

    loops.push({
      header,
      latch: edge.from,
      blocks: [...body].sort((a, b) => a - b),
      line: headerSite?.line ?? 0,
    });
  }

  return loops;
}

/**
 * Blocks with an edge into the exit block.
 */
export function exitBlocks(cfg: ControlFlowGraph): number[] {
  const exits = new Set<number>();
  for (const edge of cfg.edges) {
    if (edge.to === cfg.exit) exits.add(edge.from);
  }
  return [...exits].sort((a, b) => a - b);
}

export function cfgStats(cfg: ControlFlowGraph): ControlFlowStats {
  const reachable = reachableBlocks(cfg);
  return {
    blocks: cfg.nodes.length,
    edges: cfg.edges.length,
    statements: cfg.statements.length,
    branches: cfg.nodes.filter((block) => block.kind === 'branch').length,
    loops: cfg.nodes.filter((block) => block.kind === 'loop').length,
    exits: exitBlocks(cfg).length,
    unreachable: unreachableBlocks(cfg, reachable).length,
    complexity: cyclomaticComplexity(cfg, reachable),
  };
}

/**
 * Run every CFG analysis.
 */
export function analyzeControlFlow(cfg: ControlFlowGraph): ControlFlowAnalysis {
  const reachable = reachableBlocks(cfg);
  return {
    functionName: cfg.functionName,
    file: cfg.file,
    reachable: [...reachable].sort((a, b) => a - b),
    unreachable: unreachableBlocks(cfg, reachable),
    deadCode: findDeadCode(cfg, reachable),
    loops: findLoops(cfg),
    exits: exitBlocks(cfg),
    complexity: cyclomaticComplexity(cfg, reachable),
    stats: cfgStats(cfg),
  };
}

/**
 * Statement sites keyed by statement id
 */
export function siteIndex(cfg: ControlFlowGraph): Map<number, StatementSite> {
  return new Map(cfg.statements.map((site) => [site.id, site]));
}

/**
 * Block holding the statement that starts on `line`, if any
 */
export function blockAtLine(cfg: ControlFlowGraph, line: number): number | undefined {
  return cfg.statements.find((site) => site.line === line)?.block;
}
