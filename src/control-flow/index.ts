/**
 * Control Flow Graph module.
 *
 * This module provides:
 * - CFG construction from a function's statement tree
 * - Reachability and dead-code detection
 * - Cyclomatic complexity, loop and exit analysis
 */

// Types
export type {
  BasicBlock,
  BlockKind,
  ControlEdge,
  ControlEdgeKind,
  ControlFlowAnalysis,
  ControlFlowGraph,
  ControlFlowStats,
  DeadCodeRegion,
  NaturalLoop,
  StatementSite,
} from './cfg-types';

// Builder
export { buildControlFlowGraph, CFGBuilder } from './cfg-builder';

// Analyzer
export {
  analyzeControlFlow,
  blockAtLine,
  cfgStats,
  cyclomaticComplexity,
  exitBlocks,
  findDeadCode,
  findLoops,
  reachableBlocks,
  siteIndex,
  unreachableBlocks,
} from './cfg-analyzer';
