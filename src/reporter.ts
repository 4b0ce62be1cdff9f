/**
 * Text rendering of analysis results for the terminal.
 */

import * as path from 'path';
import chalk from 'chalk';
import { codeFrameColumns } from '@babel/code-frame';
import type { FunctionGraphs } from './analyze-worker';
import type { CallGraph, CallGraphAnalysis } from './call-graph/call-graph-types';
import { analyzeControlFlow } from './control-flow/cfg-analyzer';
import type { DataFlowAnalysis, TaintFinding } from './data-flow/dfg-types';
import { IOFailureError, type Diagnostic } from './errors';
import type { GraphSummary } from './export/graph-document';
import type { ModuleGraph, ModuleGraphAnalysis } from './module-graph';
import type { DependenceTaint, ParallelGroup, ProgramSlice } from './program-dependency/pdg-types';
import { readSourceFile } from './syntax/extractor';
import type { DeclNode, SyntaxTree } from './syntax/syntax-types';

const ARROW = ' → ';

// Cache for file contents to avoid re-reading
const fileContentCache = new Map<string, string | null>();

function getFileContent(filePath: string): string | null {
  const cached = fileContentCache.get(filePath);
  if (cached !== undefined) return cached;

  let content: string | null = null;
  try {
    content = readSourceFile(filePath);
  } catch (error) {
    if (!(error instanceof IOFailureError)) throw error;
  }
  fileContentCache.set(filePath, content);
  return content;
}

export function generateCodeFrame(filePath: string, line: number, column?: number): string | null {
  const content = getFileContent(filePath);
  if (content === null) return null;
  if (line < 1 || line > content.split('\n').length) return null;

  return codeFrameColumns(
    content,
    { start: { line, ...(column !== undefined ? { column: column + 1 } : {}) } },
    {
      highlightCode: chalk.level > 0,
      linesAbove: 2,
      linesBelow: 2,
    }
  );
}

function relativePath(file: string): string {
  return path.relative(process.cwd(), file) || file;
}

function indent(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line) => prefix + line)
    .join('\n');
}

export function formatSyntaxTree(tree: SyntaxTree): string {
  const lines: string[] = [];
  const mode = tree.heuristic ? `${tree.strategy}, heuristic` : tree.strategy;
  lines.push(chalk.bold(`${relativePath(tree.file)}`) + chalk.gray(` (${tree.language}, ${mode})`));

  const children = new Map<number | null, DeclNode[]>();
  for (const decl of tree.decls) {
    const list = children.get(decl.parent) ?? [];
    list.push(decl);
    children.set(decl.parent, list);
  }

  const walk = (parent: number | null, depth: number) => {
    for (const decl of children.get(parent) ?? []) {
      lines.push(`${'  '.repeat(depth)}${describeDecl(decl)}`);
      walk(decl.id, depth + 1);
    }
  };
  walk(null, 1);

  if (tree.decls.length === 0) lines.push(chalk.gray('  (no declarations)'));
  return lines.join('\n');
}

function describeDecl(decl: DeclNode): string {
  const range =
    decl.range.start === decl.range.end ? `[${decl.range.start}]` : `[${decl.range.start}-${decl.range.end}]`;
  switch (decl.kind) {
    case 'function': {
      const name = decl.className ? `${decl.className}.${decl.name}` : decl.name;
      const prefix = decl.isAsync ? 'async function' : 'function';
      const returns = decl.returnType ? `: ${decl.returnType}` : '';
      return `${chalk.cyan(prefix)} ${name}(${decl.parameters.join(', ')})${returns} ${chalk.gray(range)}`;
    }
    case 'class':
      return `${chalk.magenta('class')} ${decl.name} ${chalk.gray(range)}`;
    case 'import': {
      const names = decl.importedNames.length > 0 ? ` { ${decl.importedNames.join(', ')} }` : '';
      return `${chalk.blue('import')} ${decl.source}${names} ${chalk.gray(range)}`;
    }
    case 'variable':
      return `${chalk.yellow(decl.isConst ? 'const' : 'var')} ${decl.name} ${chalk.gray(range)}`;
    case 'call-site':
      return `${chalk.gray('call')} ${decl.receiver ? `${decl.receiver}.` : ''}${decl.callee}() ${chalk.gray(range)}`;
  }
}

export function formatControlFlow(fn: FunctionGraphs): string {
  const analysis = analyzeControlFlow(fn.cfg);
  const lines: string[] = [];
  lines.push(chalk.bold(fn.name) + chalk.gray(` (line ${fn.line})`));
  lines.push(
    `  ${analysis.stats.blocks} blocks, ${analysis.stats.edges} edges, complexity ${chalk.bold(String(analysis.complexity))}`
  );

  if (analysis.deadCode.length > 0) {
    lines.push(chalk.red(`  Unreachable code:`));
    for (const region of analysis.deadCode) {
      lines.push(`    line ${region.startLine}: ${region.text}`);
      const frame = generateCodeFrame(fn.file, region.startLine);
      if (frame) lines.push(indent(frame, '      '));
    }
  }

  if (analysis.loops.length > 0) {
    lines.push(`  Loops: ${analysis.loops.map((loop) => `line ${loop.line}`).join(', ')}`);
  }
  lines.push(chalk.gray(`  Exit blocks: ${analysis.exits.join(', ') || 'none'}`));
  return lines.join('\n');
}

export function formatDataFlow(fn: FunctionGraphs, analysis: DataFlowAnalysis, taint: TaintFinding[] = []): string {
  const { dfg } = fn;
  const lines: string[] = [];
  lines.push(chalk.bold(fn.name) + chalk.gray(` (line ${fn.line})`));
  lines.push(
    `  ${analysis.stats.definitions} definitions, ${analysis.stats.uses} uses, ${analysis.stats.parameters} parameters`
  );

  if (analysis.unused.length > 0) {
    lines.push(chalk.yellow('  Unused definitions:'));
    for (const node of analysis.unused) {
      lines.push(`    ${node.name} (line ${node.line})`);
    }
  }

  if (analysis.redundant.length > 0) {
    lines.push(chalk.yellow('  Redundant computations:'));
    for (const item of analysis.redundant) {
      lines.push(`    '${item.operator}' at line ${item.line} repeats line ${dfg.nodes[item.original].line}`);
    }
  }

  if (taint.length > 0) {
    lines.push(chalk.red('  Tainted sinks:'));
    for (const finding of taint) {
      const source = dfg.nodes[finding.source];
      const sink = dfg.nodes[finding.sink];
      lines.push(`    ${source.name} (line ${source.line})${ARROW}${sink.name} (line ${sink.line})`);
    }
  }

  return lines.join('\n');
}

export interface CallGraphReportOptions {
  recursiveOnly?: boolean;
  deadOnly?: boolean;
  /** Distances from a starting function */
  from?: { name: string; depths: Map<number, number> };
}

export function formatCallGraph(
  graph: CallGraph,
  analysis: CallGraphAnalysis,
  options: CallGraphReportOptions = {}
): string {
  const lines: string[] = [];
  const recursive = new Set(analysis.recursive);
  const dead = new Set(analysis.dead);

  lines.push(
    chalk.bold('Call graph: ') +
      `${analysis.stats.functions} functions, ${analysis.stats.calls} calls, ${analysis.stats.unresolved} unresolved`
  );

  const shown = graph.nodes.filter(
    (fn) => (!options.recursiveOnly || recursive.has(fn.id)) && (!options.deadOnly || dead.has(fn.id))
  );
  for (const fn of shown) {
    const callees = [...new Set(graph.edges.filter((edge) => edge.from === fn.id).map((edge) => edge.to))];
    const tags = [
      recursive.has(fn.id) ? chalk.red('recursive') : null,
      dead.has(fn.id) ? chalk.yellow('dead') : null,
      fn.isEntryPoint ? chalk.green('entry') : null,
    ].filter((tag): tag is string => tag !== null);
    const suffix = tags.length > 0 ? ` [${tags.join(', ')}]` : '';
    lines.push(`  ${fn.qualifiedName}${suffix}`);
    for (const callee of callees) {
      lines.push(chalk.gray(`    → ${graph.nodes[callee].qualifiedName}`));
    }
  }

  if (options.from) {
    lines.push(chalk.bold(`Call depth from ${options.from.name}:`));
    const entries = [...options.from.depths.entries()].filter(([, depth]) => depth > 0).sort((a, b) => a[1] - b[1]);
    for (const [id, depth] of entries) {
      lines.push(`  ${depth}  ${graph.nodes[id].qualifiedName}`);
    }
  }

  if (!options.recursiveOnly && !options.deadOnly && analysis.unresolved.length > 0) {
    lines.push(chalk.gray(`Unresolved calls (${analysis.unresolved.length}):`));
    for (const call of analysis.unresolved) {
      lines.push(chalk.gray(`  ${relativePath(call.file)}:${call.line} ${call.callee} (${call.reason})`));
    }
  }

  lines.push(`Max call depth from entry points: ${analysis.maxDepth}`);
  return lines.join('\n');
}

export function formatDependencyGraph(
  graph: ModuleGraph,
  analysis: ModuleGraphAnalysis,
  options: { circularOnly?: boolean } = {}
): string {
  const lines: string[] = [];
  const name = (id: number) => graph.nodes[id].modulePath;

  if (!options.circularOnly) {
    lines.push(
      chalk.bold('Dependency graph: ') +
        `${analysis.stats.modules} modules, ${analysis.stats.dependencies} imports, ${analysis.stats.external} external`
    );
    for (const module of graph.nodes) {
      const targets = graph.edges.filter((edge) => edge.from === module.id).map((edge) => name(edge.to));
      lines.push(`  ${module.modulePath}${targets.length > 0 ? chalk.gray(`${ARROW}${targets.join(', ')}`) : ''}`);
    }
    lines.push(`Roots: ${analysis.roots.map(name).join(', ') || 'none'}`);
    lines.push(`Leaves: ${analysis.leaves.map(name).join(', ') || 'none'}`);
    lines.push(`Max depth: ${analysis.maxDepth}`);
  }

  if (analysis.cycles.length > 0) {
    lines.push(chalk.red(`Circular dependencies (${analysis.cycles.length}):`));
    for (const cycle of analysis.cycles) {
      lines.push(chalk.red(`  ${cycle.paths.join(ARROW)}`));
    }
  } else {
    lines.push(chalk.green('No circular dependencies'));
  }

  return lines.join('\n');
}

export interface ProgramDependenceReport {
  slice?: ProgramSlice | null;
  sliceLine?: number;
  parallelGroups?: ParallelGroup[];
  taint?: DependenceTaint[];
}

export function formatProgramDependence(fn: FunctionGraphs, report: ProgramDependenceReport = {}): string {
  const { pdg } = fn;
  const lines: string[] = [];
  const control = pdg.edges.filter((edge) => edge.kind === 'control');
  lines.push(chalk.bold(fn.name) + chalk.gray(` (line ${fn.line})`));
  lines.push(`  ${pdg.nodes.length} statements, ${control.length} control and ${pdg.edges.length - control.length} data dependences`);

  for (const node of pdg.nodes) {
    const incoming = pdg.edges.filter((edge) => edge.to === node.id && edge.from !== node.id);
    if (incoming.length === 0) continue;
    const reasons = incoming.map((edge) =>
      edge.kind === 'control'
        ? `control line ${pdg.nodes[edge.from].line}${edge.label ? ` (${edge.label})` : ''}`
        : `data ${edge.variable ?? ''} line ${pdg.nodes[edge.from].line}`
    );
    lines.push(chalk.gray(`  line ${node.line} ← ${reasons.join('; ')}`));
  }

  if (report.sliceLine !== undefined) {
    if (report.slice) {
      lines.push(`  ${report.slice.direction === 'backward' ? 'Backward' : 'Forward'} slice from line ${report.sliceLine}: lines ${report.slice.lines.join(', ')}`);
    } else {
      lines.push(chalk.gray(`  No statement on line ${report.sliceLine}`));
    }
  }

  if (report.parallelGroups) {
    if (report.parallelGroups.length === 0) {
      lines.push(chalk.gray('  No independent statements'));
    } else {
      lines.push('  Independent statement groups:');
      for (const group of report.parallelGroups) {
        lines.push(`    lines ${group.lines.join(', ')}`);
      }
    }
  }

  if (report.taint && report.taint.length > 0) {
    lines.push(chalk.red('  Tainted statements:'));
    for (const finding of report.taint) {
      lines.push(`    ${finding.path.map((id) => `line ${pdg.nodes[id].line}`).join(ARROW)}`);
    }
  }

  return lines.join('\n');
}

export function formatSummary(summary: GraphSummary): string {
  const findings = summary.keyFindings.length > 0 ? `: ${summary.keyFindings.join('; ')}` : '';
  return chalk.gray(`${summary.nodeCount} nodes, ${summary.edgeCount} edges${findings}`);
}

export function formatDiagnostics(diagnostics: Diagnostic[], verbose = false): string {
  if (diagnostics.length === 0) return '';
  const lines: string[] = [];
  const shown = verbose ? diagnostics : diagnostics.filter((item) => item.kind !== 'unsupported-language');

  for (const diagnostic of shown) {
    const location = diagnostic.line !== undefined ? `:${diagnostic.line}` : '';
    const color = diagnostic.kind === 'parse-failure' || diagnostic.kind === 'io-failure' ? chalk.yellow : chalk.gray;
    lines.push(color(`${relativePath(diagnostic.file)}${location} ${diagnostic.kind}: ${diagnostic.message}`));
    if (verbose && diagnostic.kind === 'parse-failure' && diagnostic.line !== undefined) {
      const frame = generateCodeFrame(diagnostic.file, diagnostic.line, diagnostic.column);
      if (frame) lines.push(indent(frame, '  '));
    }
  }

  const hidden = diagnostics.length - shown.length;
  if (hidden > 0) lines.push(chalk.gray(`${hidden} more diagnostic(s); use --verbose to list them`));
  return lines.join('\n');
}
