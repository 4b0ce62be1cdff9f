/**
 * Call graph types.
 */

import type { Graph, GraphEdge } from '../graph';
import type { Visibility } from '../syntax/syntax-types';

export interface FunctionNode {
  /** Index in the node arena */
  id: number;
  /** `<module>::<name>`, `<module>::<Class>.<name>`, `<outer>.<name>` when nested, or `<module>::<module>` for top-level code */
  qualifiedName: string;
  name: string;
  className: string | null;
  /** Qualified name of the enclosing function, for nested functions */
  owner: string | null;
  modulePath: string;
  file: string;
  line: number;
  endLine: number;
  visibility: Visibility;
  /** Stands for a file's top-level code rather than a declared function */
  synthetic: boolean;
  isEntryPoint: boolean;
}

export interface CallEdge extends GraphEdge<'call'> {
  /** Line of the call site */
  line: number;
}

export type UnresolvedReason = 'not-found' | 'ambiguous';

export interface UnresolvedCall {
  caller: number;
  /** Callee as written, receiver included */
  callee: string;
  file: string;
  line: number;
  reason: UnresolvedReason;
  /** Qualified names that matched, for ambiguous calls */
  candidates: string[];
}

export interface CallGraph extends Graph<FunctionNode, CallEdge> {
  unresolved: UnresolvedCall[];
}

export interface CallGraphOptions {
  /** Regex sources matched against function names; default `^main$` */
  entryPoints?: string[];
}

export interface CallGraphStats {
  functions: number;
  calls: number;
  unresolved: number;
  recursive: number;
  dead: number;
  roots: number;
}

export interface CallGraphAnalysis {
  recursive: number[];
  dead: number[];
  roots: number[];
  unresolved: UnresolvedCall[];
  /** Longest shortest-path distance from an entry point, per reachable function */
  maxDepth: number;
  stats: CallGraphStats;
}
