#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from 'commander';
import * as path from 'path';
import * as fs from 'fs';
import chalk from 'chalk';
import { analyzeProject, type ProjectAnalysis } from './analyzer';
import type { FunctionGraphs } from './analyze-worker';
import { analyzeCallGraph, callDepths, findFunctions } from './call-graph/call-graph-analyzer';
import { analyzeControlFlow } from './control-flow/cfg-analyzer';
import type { CodegraphConfig } from './config';
import { writeDefaultConfig } from './config';
import { analyzeDataFlow, findTaintByName } from './data-flow/dfg-analyzer';
import { InvalidRequestError, errorMessage } from './errors';
import {
  callGraphToDocument,
  controlFlowToDocument,
  dataFlowToDocument,
  moduleGraphToDocument,
  programDependenceToDocument,
  syntaxTreeToDocument,
} from './export/converters';
import { documentToDot } from './export/dot';
import { serializeDocument, subgraph, summarize, type GraphDocument, type GraphSummary } from './export/graph-document';
import { configureLogger } from './logger';
import { analyzeModuleGraph } from './module-graph';
import { findDataTaintByName, findParallelGroups, sliceAtLine } from './program-dependency/pdg-analyzer';
import type { SliceDirection } from './program-dependency/pdg-types';
import {
  formatCallGraph,
  formatControlFlow,
  formatDataFlow,
  formatDependencyGraph,
  formatDiagnostics,
  formatProgramDependence,
  formatSummary,
  formatSyntaxTree,
} from './reporter';

type OutputFormat = 'text' | 'json' | 'dot';

interface CommonOptions {
  extensions?: string[];
  ignore?: string[];
  format: OutputFormat;
  export?: string;
  color?: boolean; // Commander turns --no-color into color: false
  verbose?: boolean;
  parallel?: boolean;
  workers?: number;
}

interface FunctionOptions extends CommonOptions {
  function?: string;
}

interface DataFlowCliOptions extends FunctionOptions {
  taintSource?: string[];
  taintSink?: string[];
}

interface CallGraphCliOptions extends CommonOptions {
  recursiveOnly?: boolean;
  deadOnly?: boolean;
  entry?: string[];
  from?: string;
}

interface DependencyCliOptions extends CommonOptions {
  circularOnly?: boolean;
}

interface ProgramDependencyCliOptions extends DataFlowCliOptions {
  slice?: number;
  direction: SliceDirection;
  parallelCandidates?: boolean;
}

/**
 * What a command produced: documents for machine formats, text for the terminal
 */
interface CommandOutput {
  documents: GraphDocument[];
  /** Print a single document as an object rather than a one-element array */
  single: boolean;
  text: () => string;
  summary: GraphSummary;
}

const VERSION = '0.1.0';

function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

function addCommonOptions(command: Command): Command {
  return command
    .option('-e, --extensions <extensions...>', 'File extensions to analyze (default: every supported language)')
    .option('-i, --ignore <patterns...>', 'Additional glob patterns to ignore')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json', 'dot']).default('text'))
    .option('-o, --export <path>', 'Also write the graph to a file (JSON, or DOT with --format dot)')
    .option('--no-color', 'Disable colored output')
    .option('--verbose', 'List every diagnostic, with code frames for parse failures')
    .option('--parallel', 'Analyze files on worker threads (default: for 20 files or more)')
    .option('--workers <count>', 'Number of worker threads (default: CPU cores - 1)', parsePositiveInteger);
}

function addFunctionOption(command: Command): Command {
  return command.option('--function <name>', 'Only the function with this name or qualified name');
}

function addTaintOptions(command: Command): Command {
  return command
    .option('--taint-source <names...>', 'Variables whose values are tainted')
    .option('--taint-sink <names...>', 'Variables or functions that must not receive tainted values');
}

/**
 * Apply the output options shared by every command
 */
function prepare(options: CommonOptions): void {
  // Disable colors if --no-color flag is used
  if (options.color === false) {
    chalk.level = 0;
  }
  configureLogger({ quiet: options.format !== 'text', verbose: options.verbose });
}

function configOverrides(options: CommonOptions): CodegraphConfig {
  return {
    extensions: options.extensions,
    ignore: options.ignore,
    parallel: options.parallel,
    workers: options.workers,
  };
}

function requireFile(targetPath: string, command: string): void {
  const absolute = path.resolve(targetPath);
  if (fs.existsSync(absolute) && fs.statSync(absolute).isDirectory()) {
    throw new InvalidRequestError(`${command} needs a single file, but "${targetPath}" is a directory`);
  }
}

function selectFunctions(analysis: ProjectAnalysis, name?: string): FunctionGraphs[] {
  if (name === undefined) return analysis.functions;
  const selected = analysis.functions.filter(
    (fn) => fn.name === name || fn.name.endsWith(`::${name}`) || fn.name.endsWith(`.${name}`)
  );
  if (selected.length === 0) {
    throw new InvalidRequestError(`No function named "${name}"`);
  }
  return selected;
}

function renderMachine(output: CommandOutput, format: 'json' | 'dot'): string {
  if (format === 'dot') {
    return output.documents.map((document) => documentToDot(document)).join('\n\n');
  }
  const [first] = output.documents;
  return output.single && first ? serializeDocument(first) : JSON.stringify(output.documents, null, 2);
}

function writeExport(exportPath: string, content: string): void {
  try {
    fs.mkdirSync(path.dirname(path.resolve(exportPath)), { recursive: true });
    fs.writeFileSync(exportPath, content.endsWith('\n') ? content : `${content}\n`, 'utf-8');
  } catch (error) {
    throw new InvalidRequestError(`Cannot write export file ${exportPath}: ${errorMessage(error)}`);
  }
}

function emit(output: CommandOutput, analysis: ProjectAnalysis, options: CommonOptions): void {
  if (options.export) {
    writeExport(options.export, renderMachine(output, options.format === 'dot' ? 'dot' : 'json'));
  }

  if (options.format !== 'text') {
    console.log(renderMachine(output, options.format));
    return;
  }

  const text = output.text();
  if (text) console.log(text);
  console.log(formatSummary(output.summary));
  const diagnostics = formatDiagnostics(analysis.diagnostics, options.verbose);
  if (diagnostics) console.log(diagnostics);
  if (options.export) console.log(chalk.green(`Exported to ${options.export}`));
}

/**
 * Wrap a command action: an invalid request prints its message, anything else
 * prints the error; both exit with status 1.
 */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      if (error instanceof InvalidRequestError) {
        console.error(chalk.red(`Error: ${error.message}`));
      } else {
        console.error(chalk.red('Error:'), error);
      }
      process.exitCode = 1;
    }
  };
}

function syntaxTreeOutput(analysis: ProjectAnalysis): CommandOutput {
  const documents = analysis.trees.map(syntaxTreeToDocument);
  const functions = analysis.trees.reduce((sum, tree) => sum + tree.decls.filter((decl) => decl.kind === 'function').length, 0);
  const classes = analysis.trees.reduce((sum, tree) => sum + tree.decls.filter((decl) => decl.kind === 'class').length, 0);
  return {
    documents,
    single: false,
    text: () => analysis.trees.map(formatSyntaxTree).join('\n\n'),
    summary: summarize(documents, [`${analysis.trees.length} files`, `${functions} functions`, `${classes} classes`]),
  };
}

function controlFlowOutput(functions: FunctionGraphs[]): CommandOutput {
  const documents = functions.map((fn) => controlFlowToDocument(fn.cfg));
  const analyses = functions.map((fn) => analyzeControlFlow(fn.cfg));
  const unreachable = analyses.reduce((sum, analysis) => sum + analysis.deadCode.length, 0);
  const maxComplexity = Math.max(0, ...analyses.map((analysis) => analysis.complexity));
  return {
    documents,
    single: false,
    text: () => functions.map(formatControlFlow).join('\n\n'),
    summary: summarize(documents, [
      `${functions.length} functions`,
      `${unreachable} unreachable regions`,
      `max complexity ${maxComplexity}`,
    ]),
  };
}

function dataFlowOutput(analysis: ProjectAnalysis, functions: FunctionGraphs[]): CommandOutput {
  const exportedByFile = new Map(analysis.trees.map((tree) => [tree.file, new Set(tree.exportedNames)]));
  const { taintSources, taintSinks } = analysis.config;

  const results = functions.map((fn) => {
    const exported = exportedByFile.get(fn.file);
    const result = analyzeDataFlow(fn.dfg, { exported });
    const taint = taintSources.length > 0 && taintSinks.length > 0 ? findTaintByName(fn.dfg, taintSources, taintSinks) : [];
    return { fn, exported, result, taint };
  });
  const documents = results.map(({ fn, exported }) => dataFlowToDocument(fn.dfg, { exported }));
  const unused = results.reduce((sum, { result }) => sum + result.unused.length, 0);
  const redundant = results.reduce((sum, { result }) => sum + result.redundant.length, 0);
  const tainted = results.reduce((sum, { taint }) => sum + taint.length, 0);

  return {
    documents,
    single: false,
    text: () => results.map(({ fn, result, taint }) => formatDataFlow(fn, result, taint)).join('\n\n'),
    summary: summarize(documents, [
      `${unused} unused definitions`,
      `${redundant} redundant computations`,
      ...(tainted > 0 ? [`${tainted} tainted sinks`] : []),
    ]),
  };
}

function callGraphOutput(analysis: ProjectAnalysis, options: Partial<CallGraphCliOptions>): CommandOutput {
  const graph = analysis.callGraph;
  const result = analyzeCallGraph(graph);
  let document = callGraphToDocument(graph, result);

  let from: { name: string; depths: Map<number, number> } | undefined;
  if (options.from) {
    const [start] = findFunctions(graph, options.from);
    if (!start) {
      throw new InvalidRequestError(`No function named "${options.from}"`);
    }
    from = { name: start.qualifiedName, depths: callDepths(graph, start.id) };
    document = subgraph(document, new Set(from.depths.keys()));
  }
  if (options.recursiveOnly) document = subgraph(document, new Set(result.recursive));
  if (options.deadOnly) document = subgraph(document, new Set(result.dead));

  return {
    documents: [document],
    single: true,
    text: () =>
      formatCallGraph(graph, result, { recursiveOnly: options.recursiveOnly, deadOnly: options.deadOnly, from }),
    summary: summarize(document, [
      `${result.recursive.length} recursive`,
      `${result.dead.length} dead`,
      `${result.unresolved.length} unresolved calls`,
    ]),
  };
}

function dependencyGraphOutput(analysis: ProjectAnalysis, options: Partial<DependencyCliOptions>): CommandOutput {
  const graph = analysis.moduleGraph;
  const result = analyzeModuleGraph(graph);
  let document = moduleGraphToDocument(graph, result);
  if (options.circularOnly) {
    document = subgraph(document, new Set(result.cycles.flatMap((cycle) => cycle.modules)));
  }

  return {
    documents: [document],
    single: true,
    text: () => formatDependencyGraph(graph, result, { circularOnly: options.circularOnly }),
    summary: summarize(document, [`${result.cycles.length} circular dependencies`, `max depth ${result.maxDepth}`]),
  };
}

function programDependencyOutput(
  analysis: ProjectAnalysis,
  functions: FunctionGraphs[],
  options: Partial<ProgramDependencyCliOptions>
): CommandOutput {
  const { maxParallelGroups, taintSources, taintSinks } = analysis.config;
  const direction = options.direction ?? 'backward';

  const results = functions.map((fn) => {
    const slice = options.slice !== undefined ? sliceAtLine(fn.pdg, options.slice, direction) : undefined;
    const parallelGroups = options.parallelCandidates ? findParallelGroups(fn.pdg, maxParallelGroups) : undefined;
    const taint =
      taintSources.length > 0 && taintSinks.length > 0 ? findDataTaintByName(fn.pdg, taintSources, taintSinks) : [];
    let document = programDependenceToDocument(fn.pdg, maxParallelGroups);
    if (slice) document = subgraph(document, new Set(slice.nodes));
    return { fn, slice, parallelGroups, taint, document };
  });

  // a slice line only concerns the functions containing it
  const shown = options.slice !== undefined ? results.filter((item) => item.slice) : results;
  if (options.slice !== undefined && shown.length === 0) {
    throw new InvalidRequestError(`No statement on line ${options.slice}`);
  }

  const documents = shown.map((item) => item.document);
  const control = documents.reduce((sum, doc) => sum + doc.edges.filter((edge) => edge.kind === 'control').length, 0);
  return {
    documents,
    single: false,
    text: () =>
      shown
        .map(({ fn, slice, parallelGroups, taint }) =>
          formatProgramDependence(fn, { slice, sliceLine: options.slice, parallelGroups, taint })
        )
        .join('\n\n'),
    summary: summarize(documents, [
      `${control} control dependences`,
      `${documents.reduce((sum, doc) => sum + doc.edges.length, 0) - control} data dependences`,
    ]),
  };
}

async function analyze(
  targetPath: string,
  options: CommonOptions,
  overrides: CodegraphConfig = {},
  functionGraphs = true
): Promise<ProjectAnalysis> {
  prepare(options);
  return analyzeProject(targetPath, {
    config: { ...configOverrides(options), ...overrides },
    functionGraphs,
  });
}

function taintOverrides(options: DataFlowCliOptions): CodegraphConfig {
  return { taintSources: options.taintSource, taintSinks: options.taintSink };
}

const ALL_GRAPHS = [
  'syntax-tree',
  'control-flow',
  'data-flow',
  'call-graph',
  'dependency-graph',
  'program-dependency',
] as const;

export function createProgram(): Command {
  const program = new Command();

  program
    .name('codegraph')
    .description('Build syntax, control-flow, data-flow, call, dependency and program-dependency graphs')
    .version(VERSION);

  addCommonOptions(
    program.command('syntax-tree <path>').description('Declarations of every file: functions, classes, imports, calls')
  ).action(
    run(async (targetPath: string, options: CommonOptions) => {
      const analysis = await analyze(targetPath, options, {}, false);
      emit(syntaxTreeOutput(analysis), analysis, options);
    })
  );

  addFunctionOption(
    addCommonOptions(
      program.command('control-flow <path>').description('Control-flow graph per function: dead code, loops, complexity')
    )
  ).action(
    run(async (targetPath: string, options: FunctionOptions) => {
      const analysis = await analyze(targetPath, options);
      emit(controlFlowOutput(selectFunctions(analysis, options.function)), analysis, options);
    })
  );

  addTaintOptions(
    addFunctionOption(
      addCommonOptions(
        program.command('data-flow <path>').description('Data-flow graph per function: def-use chains, unused values, taint')
      )
    )
  ).action(
    run(async (targetPath: string, options: DataFlowCliOptions) => {
      const analysis = await analyze(targetPath, options, taintOverrides(options));
      emit(dataFlowOutput(analysis, selectFunctions(analysis, options.function)), analysis, options);
    })
  );

  addCommonOptions(program.command('call-graph <path>').description('Calls between functions across files'))
    .option('--recursive-only', 'Only recursive functions')
    .option('--dead-only', 'Only functions nothing calls')
    .option('--entry <patterns...>', 'Regular expressions for entry-point function names (default: ^main$)')
    .option('--from <function>', 'Functions reachable from this one, with their call depth')
    .action(
      run(async (targetPath: string, options: CallGraphCliOptions) => {
        const analysis = await analyze(targetPath, options, { entryPoints: options.entry }, false);
        emit(callGraphOutput(analysis, options), analysis, options);
      })
    );

  addCommonOptions(program.command('dependency-graph <path>').description('Imports between files'))
    .option('--circular-only', 'Only circular dependencies')
    .action(
      run(async (targetPath: string, options: DependencyCliOptions) => {
        const analysis = await analyze(targetPath, options, {}, false);
        emit(dependencyGraphOutput(analysis, options), analysis, options);
      })
    );

  addTaintOptions(
    addFunctionOption(
      addCommonOptions(
        program
          .command('program-dependency <file>')
          .description('Control and data dependences between the statements of each function in a file')
      )
    )
  )
    .option('--slice <line>', 'Program slice from the statement on this line', parsePositiveInteger)
    .addOption(
      new Option('--direction <direction>', 'Slice direction').choices(['backward', 'forward']).default('backward')
    )
    .option('--parallel-candidates', 'Groups of statements with no dependence between them')
    .action(
      run(async (targetPath: string, options: ProgramDependencyCliOptions) => {
        requireFile(targetPath, 'program-dependency');
        const analysis = await analyze(targetPath, options, taintOverrides(options));
        emit(programDependencyOutput(analysis, selectFunctions(analysis, options.function), options), analysis, options);
      })
    );

  addCommonOptions(
    program.command('all <file>').description('Every graph for one file; with --export <dir>, one file per graph')
  ).action(
    run(async (targetPath: string, options: CommonOptions) => {
      requireFile(targetPath, 'all');
      const analysis = await analyze(targetPath, options);
      const outputs = {
        'syntax-tree': syntaxTreeOutput(analysis),
        'control-flow': controlFlowOutput(analysis.functions),
        'data-flow': dataFlowOutput(analysis, analysis.functions),
        'call-graph': callGraphOutput(analysis, {}),
        'dependency-graph': dependencyGraphOutput(analysis, {}),
        'program-dependency': programDependencyOutput(analysis, analysis.functions, {}),
      } satisfies Record<(typeof ALL_GRAPHS)[number], CommandOutput>;

      if (options.export) {
        const base = path.basename(targetPath, path.extname(targetPath));
        const extension = options.format === 'dot' ? 'dot' : 'json';
        for (const graph of ALL_GRAPHS) {
          writeExport(
            path.join(options.export, `${base}.${graph}.${extension}`),
            renderMachine(outputs[graph], extension)
          );
        }
      }

      if (options.format === 'json') {
        const combined = Object.fromEntries(
          ALL_GRAPHS.map((graph) => {
            const [first] = outputs[graph].documents;
            return [graph, outputs[graph].single && first ? first : outputs[graph].documents];
          })
        );
        console.log(JSON.stringify(combined, null, 2));
        return;
      }
      if (options.format === 'dot') {
        console.log(ALL_GRAPHS.map((graph) => renderMachine(outputs[graph], 'dot')).filter(Boolean).join('\n\n'));
        return;
      }

      for (const graph of ALL_GRAPHS) {
        console.log(chalk.blue.bold(`\n== ${graph} ==`));
        const text = outputs[graph].text();
        if (text) console.log(text);
        console.log(formatSummary(outputs[graph].summary));
      }
      const diagnostics = formatDiagnostics(analysis.diagnostics, options.verbose);
      if (diagnostics) console.log(diagnostics);
      if (options.export) console.log(chalk.green(`Exported ${ALL_GRAPHS.length} graphs to ${options.export}`));
    })
  );

  // Init command to generate default config file
  program
    .command('init [dir]')
    .description('Generate a default codegraph.config.json configuration file')
    .action(
      run(async (dir?: string) => {
        const configPath = writeDefaultConfig(dir ?? process.cwd());
        console.log(chalk.green(`Created ${configPath}`));
        console.log(chalk.gray('\nConfiguration options:'));
        console.log(chalk.gray('  extensions: File extensions to analyze (empty: every supported language)'));
        console.log(chalk.gray('  ignore: Additional patterns to ignore'));
        console.log(chalk.gray('  entryPoints: Regular expressions for function names that are never dead'));
        console.log(chalk.gray('  taintSources / taintSinks: Names for taint analysis'));
        console.log(chalk.gray('  maxParallelGroups: Most independent statement groups listed per function'));
      })
    );

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(chalk.red('Error:'), error);
      process.exitCode = 1;
    });
}
