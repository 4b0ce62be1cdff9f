/**
 * Program Dependence Graph (PDG) types.
 *
 * Nodes are the statement sites of one function's CFG; edges say which
 * statement decides whether another runs (control) or feeds it a value (data).
 */

import type { Graph, GraphEdge } from '../graph';

export type DependenceKind = 'control' | 'data';

export interface PDGNode {
  id: number;
  /** Statement id shared with the CFG and DFG */
  statement: number;
  /** CFG block holding the statement */
  block: number;
  line: number;
  endLine: number;
  text: string;
  defs: string[];
  uses: string[];
  /** Callees of the statement's calls */
  calls: string[];
}

export interface DependenceEdge extends GraphEdge<DependenceKind> {
  /** Data edges: the variable carried */
  variable: string | null;
  /** Control edges: `true` or `false` for the arm the statement sits in, `case` for switch arms */
  label: string | null;
}

export interface ProgramDependenceGraph extends Graph<PDGNode, DependenceEdge> {
  functionName: string;
  file: string;
}

export type SliceDirection = 'backward' | 'forward';

export interface ProgramSlice {
  /** Node the slice was taken from */
  criterion: number;
  direction: SliceDirection;
  /** Node ids in the slice, ascending; the criterion is always one of them */
  nodes: number[];
  /** Lines covered by the slice, ascending and unique */
  lines: number[];
}

/**
 * Statements with no dependence path between any two of them in either
 * direction
 */
export interface ParallelGroup {
  nodes: number[];
  lines: number[];
}

export interface DependenceTaint {
  source: number;
  sink: number;
  /** Node ids from source to sink over data edges */
  path: number[];
}

export interface ProgramDependenceOptions {
  maxParallelGroups?: number;
}

export interface ProgramDependenceStats {
  nodes: number;
  edges: number;
  controlEdges: number;
  dataEdges: number;
}

export interface ProgramDependenceAnalysis {
  functionName: string;
  file: string;
  parallelGroups: ParallelGroup[];
  stats: ProgramDependenceStats;
}
