/**
 * Call graph module: registration, resolution and analyses.
 */

export type {
  CallEdge,
  CallGraph,
  CallGraphAnalysis,
  CallGraphOptions,
  CallGraphStats,
  FunctionNode,
  UnresolvedCall,
  UnresolvedReason,
} from './call-graph-types';

export { FunctionRegistry, MODULE_NODE_NAME } from './function-registry';

export {
  buildCallGraph,
  createRegistry,
  DEFAULT_ENTRY_POINTS,
  registerTree,
  resolveCalls,
  resolveModuleSpecifier,
} from './call-graph-builder';

export {
  analyzeCallGraph,
  callChains,
  callDepth,
  callDepths,
  callees,
  callers,
  findDeadFunctions,
  findFunctions,
  findRecursive,
  findRoots,
} from './call-graph-analyzer';
