/**
 * Data Flow Graph (DFG) types.
 */

import type { Graph, GraphEdge } from '../graph';

export type VarNodeKind = 'definition' | 'use' | 'parameter' | 'constant' | 'operation' | 'call';

export interface VarNode {
  id: number;
  kind: VarNodeKind;
  /**
   * Variable name for definitions, uses and parameters; literal text for
   * constants; operator for operations; callee for calls
   */
  name: string;
  line: number;
  /** Statement the node belongs to; `null` for parameters */
  statement: number | null;
  /**
   * Operations only: each operand as the reaching definition ids of a variable
   * (`#3|#7`) or the literal text
   */
  operands?: string[];
}

/**
 * `def-use` edges are reaching-definition chains (definition or parameter to
 * use). `flow` edges carry values inside one statement: operands and call
 * arguments into the nodes that consume them, and values into the definitions
 * they produce.
 */
export type DataEdgeKind = 'def-use' | 'flow';

export type DataEdge = GraphEdge<DataEdgeKind>;

export interface DataFlowGraph extends Graph<VarNode, DataEdge> {
  functionName: string;
  file: string;
  parameters: string[];
}

export interface DataFlowOptions {
  /** Names whose definitions are never reported unused */
  exported?: ReadonlySet<string>;
}

export interface VariableLifetime {
  name: string;
  definition: number;
  defLine: number;
  lastUseLine: number;
  /** Lines between the definition and its last reaching use */
  span: number;
}

export interface RedundantComputation {
  /** First computation */
  original: number;
  /** Later computation of the same operator over the same reaching definitions */
  repeated: number;
  operator: string;
  line: number;
}

export interface TaintFinding {
  source: number;
  sink: number;
  /** Node ids from source to sink */
  path: number[];
}

export interface DataFlowStats {
  nodes: number;
  edges: number;
  definitions: number;
  uses: number;
  parameters: number;
}

export interface DataFlowAnalysis {
  functionName: string;
  file: string;
  unused: VarNode[];
  lifetimes: VariableLifetime[];
  redundant: RedundantComputation[];
  stats: DataFlowStats;
}
