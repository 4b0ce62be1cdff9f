/**
 * Per-file analysis: read → extract → CFG/DFG/PDG for every function.
 * This file is executed by piscina worker threads, and called directly when a
 * batch runs sequentially.
 */

import { buildControlFlowGraph } from './control-flow/cfg-builder';
import type { ControlFlowGraph } from './control-flow/cfg-types';
import { buildDataFlowGraph } from './data-flow/dfg-builder';
import type { DataFlowGraph } from './data-flow/dfg-types';
import { Diagnostics, type Diagnostic } from './errors';
import { LanguageRegistry } from './language/language-registry';
import { buildProgramDependenceGraph } from './program-dependency/pdg-builder';
import type { ProgramDependenceGraph } from './program-dependency/pdg-types';
import { extractSyntaxTree, readSourceFile } from './syntax/extractor';
import { isFunctionDecl, type SyntaxTree } from './syntax/syntax-types';

export interface AnalyzeTask {
  file: string;
  /** Project root module paths are relative to */
  root: string;
  /** Build CFG, DFG and PDG per function (not needed for call and dependency graphs) */
  functionGraphs: boolean;
}

export interface FunctionGraphs {
  /** Qualified name */
  name: string;
  file: string;
  line: number;
  cfg: ControlFlowGraph;
  dfg: DataFlowGraph;
  pdg: ProgramDependenceGraph;
}

export interface FileAnalysis {
  file: string;
  /** `null` when the file could not be read */
  source: string | null;
  /** `null` when the file could not be read or parsed */
  tree: SyntaxTree | null;
  functions: FunctionGraphs[];
  diagnostics: Diagnostic[];
}

let workerRegistry: LanguageRegistry | null = null;

/**
 * Analyze one file. Parse and I/O failures become diagnostics; the result is
 * still returned so the batch keeps going.
 */
export function analyzeFile(task: AnalyzeTask, registry: LanguageRegistry): FileAnalysis {
  const diagnostics = new Diagnostics();
  let source: string | null = null;
  let tree: SyntaxTree | null = null;

  try {
    source = readSourceFile(task.file);
    const extraction = extractSyntaxTree(task.file, source, registry, task.root);
    diagnostics.addAll(extraction.diagnostics);
    tree = extraction.tree;
  } catch (error) {
    diagnostics.record(task.file, error);
  }

  const functions = tree && task.functionGraphs ? buildFunctionGraphs(tree) : [];
  return { file: task.file, source, tree, functions, diagnostics: diagnostics.list() };
}

export function buildFunctionGraphs(tree: SyntaxTree): FunctionGraphs[] {
  return tree.decls.filter(isFunctionDecl).map((fn) => {
    const cfg = buildControlFlowGraph(fn);
    const dfg = buildDataFlowGraph(fn);
    return {
      name: fn.qualifiedName,
      file: fn.file,
      line: fn.range.start,
      cfg,
      dfg,
      pdg: buildProgramDependenceGraph(cfg, dfg),
    };
  });
}

/**
 * Analyze a single file in a worker thread.
 * This function is called by piscina for each file.
 */
export default function analyzeFileWorker(task: AnalyzeTask): FileAnalysis {
  // one registry per worker thread, built on its first task
  if (!workerRegistry) {
    workerRegistry = LanguageRegistry.load();
  }
  return analyzeFile(task, workerRegistry);
}
