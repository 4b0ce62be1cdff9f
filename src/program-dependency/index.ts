/**
 * Program Dependence Graph module: control and data dependences of one
 * function, with slicing, independence groups and taint.
 */

export type {
  DependenceEdge,
  DependenceKind,
  DependenceTaint,
  ParallelGroup,
  PDGNode,
  ProgramDependenceAnalysis,
  ProgramDependenceGraph,
  ProgramDependenceOptions,
  ProgramDependenceStats,
  ProgramSlice,
  SliceDirection,
} from './pdg-types';

export { buildProgramDependenceGraph } from './pdg-builder';

export {
  analyzeProgramDependence,
  areIndependent,
  backwardSlice,
  DEFAULT_MAX_PARALLEL_GROUPS,
  findDataTaint,
  findDataTaintByName,
  findParallelGroups,
  forwardSlice,
  nodesAtLine,
  slice,
  sliceAtLine,
} from './pdg-analyzer';
