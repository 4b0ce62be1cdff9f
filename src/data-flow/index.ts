/**
 * Data Flow Graph module: def-use chains and the analyses over them.
 */

export type {
  DataEdge,
  DataEdgeKind,
  DataFlowAnalysis,
  DataFlowGraph,
  DataFlowOptions,
  DataFlowStats,
  RedundantComputation,
  TaintFinding,
  VarNode,
  VarNodeKind,
  VariableLifetime,
} from './dfg-types';

export { buildDataFlowGraph, DFGBuilder } from './dfg-builder';

export {
  analyzeDataFlow,
  findRedundantComputations,
  findTaintByName,
  findTaintedSinks,
  findUnusedDefinitions,
  reachingDefinitions,
  variableLifetimes,
} from './dfg-analyzer';
