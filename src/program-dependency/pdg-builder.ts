/**
 * PDG Builder - merges one function's CFG and DFG.
 *
 * Data dependences are the DFG's def-use edges lifted to the statements that
 * hold their endpoints. Control dependences are approximated from the CFG
 * without a post-dominator tree: a statement depends on a branch when it can
 * be reached from exactly one of the branch's successors before control gets
 * back to the branch's join block. Nested branches that leave through jumps
 * can make this over-report.
 */

import { buildAdjacency, reachableFrom } from '../graph';
import type { ControlEdgeKind, ControlFlowGraph } from '../control-flow/cfg-types';
import type { DataFlowGraph } from '../data-flow/dfg-types';
import type { DependenceEdge, DependenceKind, PDGNode, ProgramDependenceGraph } from './pdg-types';

const BRANCH_LABELS: Partial<Record<ControlEdgeKind, string>> = {
  'true-branch': 'true',
  'false-branch': 'false',
};

export function buildProgramDependenceGraph(cfg: ControlFlowGraph, dfg: DataFlowGraph): ProgramDependenceGraph {
  const nodes: PDGNode[] = cfg.statements.map((site, index) => ({
    id: index,
    statement: site.id,
    block: site.block,
    line: site.line,
    endLine: site.endLine,
    text: site.text,
    defs: site.facts.defs,
    uses: site.facts.uses,
    calls: site.facts.calls.map((call) => call.callee),
  }));
  const byStatement = new Map(nodes.map((node) => [node.statement, node.id]));

  const edges: DependenceEdge[] = [];
  const keys = new Set<string>();
  const add = (from: number, to: number, kind: DependenceKind, variable: string | null, label: string | null) => {
    const key = `${kind}:${from}>${to}:${variable ?? ''}`;
    if (keys.has(key)) return;
    keys.add(key);
    edges.push({ from, to, kind, variable, label });
  };

  for (const dependence of controlDependences(cfg)) {
    for (const statement of cfg.nodes[dependence.block].statements) {
      const to = byStatement.get(statement);
      if (to !== undefined && to !== dependence.controller) {
        add(dependence.controller, to, 'control', null, dependence.label);
      }
    }
  }

  for (const edge of dfg.edges) {
    if (edge.kind !== 'def-use') continue;
    const definition = dfg.nodes[edge.from];
    const use = dfg.nodes[edge.to];
    // parameters have no statement; they are defined before the body runs
    if (definition.statement === null || use.statement === null) continue;
    const from = byStatement.get(definition.statement);
    const to = byStatement.get(use.statement);
    if (from === undefined || to === undefined) continue;
    add(from, to, 'data', definition.name, null);
  }

  return { functionName: cfg.functionName, file: cfg.file, nodes, edges };
}

interface ControlDependence {
  /** PDG node of the branch condition */
  controller: number;
  /** Dependent block */
  block: number;
  label: string;
}

function controlDependences(cfg: ControlFlowGraph): ControlDependence[] {
  const adjacency = buildAdjacency(cfg);
  const nodeOfStatement = new Map(cfg.statements.map((site, index) => [site.id, index]));
  const dependences: ControlDependence[] = [];

  for (const block of cfg.nodes) {
    if (block.kind !== 'branch' && block.kind !== 'loop') continue;
    const condition = block.statements[block.statements.length - 1];
    const controller = condition === undefined ? undefined : nodeOfStatement.get(condition);
    if (controller === undefined) continue;

    const successors = new Map<number, string>();
    for (const edgeIndex of adjacency.outgoing[block.id]) {
      const edge = cfg.edges[edgeIndex];
      if (!successors.has(edge.to)) successors.set(edge.to, BRANCH_LABELS[edge.kind] ?? 'case');
    }

    const stopAt = new Set([block.id]);
    if (block.joinBlock !== null) stopAt.add(block.joinBlock);

    const reachCount = new Map<number, number>();
    const labelOf = new Map<number, string>();
    for (const [successor, label] of successors) {
      if (successor === block.joinBlock) continue;
      for (const reached of reachableFrom(cfg, [successor], { stopAt, adjacency })) {
        reachCount.set(reached, (reachCount.get(reached) ?? 0) + 1);
        labelOf.set(reached, label);
      }
    }

    for (const [reached, count] of reachCount) {
      if (count !== 1 || reached === block.id) continue;
      dependences.push({ controller, block: reached, label: labelOf.get(reached) ?? 'case' });
    }
  }

  return dependences;
}
