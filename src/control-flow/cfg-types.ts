/**
 * Control Flow Graph (CFG) types.
 *
 * A CFG partitions one function body into basic blocks joined by typed control
 * edges. Blocks live in the graph's node arena and edges refer to them by index,
 * so loop back-edges need no special handling.
 */

import type { Graph, GraphEdge } from '../graph';
import type { ValueFacts } from '../syntax/syntax-types';

/**
 * Kinds of basic blocks.
 */
export type BlockKind =
  | 'entry' // Function entry, always block 0
  | 'normal' // Straight-line statements
  | 'branch' // if / switch / match condition
  | 'loop' // Loop header (condition, or the test of a do-while)
  | 'return' // Ends with a return or an uncaught throw
  | 'exit'; // Function exit, always block 1

export type ControlEdgeKind =
  | 'sequential'
  | 'true-branch' // Condition holds, or a switch arm is taken
  | 'false-branch' // Condition fails; also the "no arm matched" edge of a switch
  | 'loop-back'
  | 'break' // break, and goto to a label
  | 'continue';

export interface BasicBlock {
  /** Index in the node arena */
  id: number;
  kind: BlockKind;
  /** Statement ids in execution order */
  statements: number[];
  /** For branch and loop blocks: the block where control rejoins, when there is one */
  joinBlock: number | null;
}

export type ControlEdge = GraphEdge<ControlEdgeKind>;

/**
 * A statement (or the header part of a compound statement) placed in a block.
 */
export interface StatementSite {
  id: number;
  line: number;
  endLine: number;
  text: string;
  block: number;
  facts: ValueFacts;
}

export interface ControlFlowGraph extends Graph<BasicBlock, ControlEdge> {
  /** Qualified name of the function */
  functionName: string;
  file: string;
  entry: number;
  exit: number;
  /** Every statement site, ordered by statement id */
  statements: StatementSite[];
}

/**
 * A loop found from a loop-back edge.
 */
export interface NaturalLoop {
  header: number;
  /** Block the loop-back edge leaves from */
  latch: number;
  /** Blocks of the loop, header included, ascending */
  blocks: number[];
  /** First line of the header */
  line: number;
}

export interface DeadCodeRegion {
  block: number;
  startLine: number;
  endLine: number;
  /** First statement of the block */
  text: string;
}

export interface ControlFlowStats {
  blocks: number;
  edges: number;
  statements: number;
  branches: number;
  loops: number;
  exits: number;
  unreachable: number;
  complexity: number;
}

export interface ControlFlowAnalysis {
  functionName: string;
  file: string;
  reachable: number[];
  unreachable: number[];
  deadCode: DeadCodeRegion[];
  loops: NaturalLoop[];
  exits: number[];
  complexity: number;
  stats: ControlFlowStats;
}

/**
 * Enclosing construct a break or continue can target.
 */
export interface JumpContext {
  kind: 'loop' | 'switch';
  label: string | null;
  breakTo: number;
  /** `null` for switches */
  continueTo: number | null;
}

export interface TryContext {
  /** Handler block thrown exceptions enter; `null` while building the handler itself */
  handler: number | null;
}
