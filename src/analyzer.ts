import { glob, Path } from 'glob';
import * as path from 'path';
import * as fs from 'fs';
import { cpus } from 'os';
import micromatch from 'micromatch';
import Piscina from 'piscina';
import { analyzeFile, type AnalyzeTask, type FileAnalysis, type FunctionGraphs } from './analyze-worker';
import { createRegistry, registerTree, resolveCalls } from './call-graph/call-graph-builder';
import type { CallGraph } from './call-graph/call-graph-types';
import { DEFAULT_IGNORE, loadConfigWithInfo, mergeConfig, type CodegraphConfig, type ResolvedConfig } from './config';
import { Diagnostics, InvalidRequestError, type Diagnostic } from './errors';
import { LanguageRegistry } from './language/language-registry';
import { logger } from './logger';
import { buildModuleGraph, type ModuleGraph } from './module-graph';
import type { SyntaxTree } from './syntax/syntax-types';

export interface AnalyzerOptions {
  /** Overrides on top of the config file (CLI options) */
  config?: CodegraphConfig;
  /** Build CFG, DFG and PDG for every function */
  functionGraphs?: boolean;
  registry?: LanguageRegistry;
}

export interface ProjectAnalysis {
  /** Directory module paths are relative to */
  root: string;
  /** The target was a single file */
  singleFile: boolean;
  config: ResolvedConfig;
  configPath: string | null;
  files: string[];
  trees: SyntaxTree[];
  functions: FunctionGraphs[];
  callGraph: CallGraph;
  moduleGraph: ModuleGraph;
  diagnostics: Diagnostic[];
}

// Minimum file count to benefit from parallel processing
export const PARALLEL_THRESHOLD = 20;

/**
 * Analyze a file or a directory tree.
 *
 * Per-file work runs first (in parallel for large batches). Only after every
 * file has settled is the function registry filled and sealed, and only then
 * are call sites resolved against it.
 */
export async function analyzeProject(targetPath: string, options: AnalyzerOptions = {}): Promise<ProjectAnalysis> {
  const target = path.resolve(targetPath);
  if (!fs.existsSync(target)) {
    throw new InvalidRequestError(`Path does not exist: ${targetPath}`);
  }
  const singleFile = fs.statSync(target).isFile();
  const root = singleFile ? path.dirname(target) : target;

  // Merge order: defaults < config file < options.config
  const configResult = loadConfigWithInfo(root);
  const config = options.config ? mergeConfig(configResult.config, options.config) : configResult.config;
  const registry = options.registry ?? LanguageRegistry.load();

  const files = singleFile ? [target] : await findFiles(root, config, registry);

  // Decide whether to use parallel processing
  // Use parallel if explicitly enabled OR if we have many files and it wasn't explicitly disabled
  const useParallel = config.parallel === true || (config.parallel !== false && files.length >= PARALLEL_THRESHOLD);
  const tasks: AnalyzeTask[] = files.map((file) => ({ file, root, functionGraphs: options.functionGraphs ?? true }));

  const results = useParallel
    ? await analyzeFilesParallel(tasks, registry, config.workers)
    : analyzeFilesSequential(tasks, registry);

  const diagnostics = new Diagnostics();
  const trees: SyntaxTree[] = [];
  const functions: FunctionGraphs[] = [];
  for (const result of results) {
    diagnostics.addAll(result.diagnostics);
    for (const diagnostic of result.diagnostics) {
      logger.debug(`${diagnostic.file}: ${diagnostic.kind}: ${diagnostic.message}`);
    }
    if (result.tree) trees.push(result.tree);
    functions.push(...result.functions);
  }

  // Barrier: registration of every file completes before any call is resolved
  const functionRegistry = createRegistry({ entryPoints: config.entryPoints });
  for (const tree of trees) {
    registerTree(functionRegistry, tree);
  }
  functionRegistry.seal();
  const callGraph = resolveCalls(functionRegistry, trees);

  const moduleGraph = buildModuleGraph(
    results.flatMap((result) => (result.source === null ? [] : [{ file: result.file, source: result.source }])),
    { root, registry }
  );
  for (const reference of moduleGraph.external) {
    // a relative import that matches no file is broken, not external
    if (reference.specifier.startsWith('.')) {
      diagnostics.add({
        file: reference.file,
        kind: 'unresolved-reference',
        message: `Cannot resolve import "${reference.specifier}"`,
        line: reference.line,
      });
    }
  }

  return {
    root,
    singleFile,
    config,
    configPath: configResult.configPath,
    files,
    trees,
    functions,
    callGraph,
    moduleGraph,
    diagnostics: diagnostics.list(),
  };
}

/**
 * Files under `root` with an analyzed extension that no ignore pattern matches
 */
export async function findFiles(root: string, config: ResolvedConfig, registry: LanguageRegistry): Promise<string[]> {
  const extensions = new Set(
    (config.extensions.length > 0 ? config.extensions : registry.extensions()).map((ext) =>
      ext.replace(/^\./, '').toLowerCase()
    )
  );
  const ignorePatterns = [...DEFAULT_IGNORE, ...config.ignore];

  const isIgnored = (fullPath: string) => {
    const relative = path.relative(root, fullPath).split(path.sep).join('/');
    // Use micromatch for robust glob pattern matching
    return (
      micromatch.isMatch(relative, ignorePatterns, { dot: true }) ||
      micromatch.isMatch(fullPath, ignorePatterns, { dot: true })
    );
  };

  const files = await glob('**/*', {
    cwd: root,
    absolute: true,
    nodir: true,
    ignore: {
      ignored: (p: Path) => isIgnored(p.fullpath()),
    },
  });

  return files.filter((file) => extensions.has(path.extname(file).replace(/^\./, '').toLowerCase())).sort();
}

/**
 * Analyze files one after another in this thread
 */
function analyzeFilesSequential(tasks: AnalyzeTask[], registry: LanguageRegistry): FileAnalysis[] {
  return tasks.map((task) => analyzeFile(task, registry));
}

/**
 * Analyze files on worker threads (faster for large codebases). Falls back to
 * sequential analysis when the compiled worker is not available, as when
 * running from TypeScript sources.
 */
async function analyzeFilesParallel(
  tasks: AnalyzeTask[],
  registry: LanguageRegistry,
  workers?: number
): Promise<FileAnalysis[]> {
  const filename = path.join(__dirname, 'analyze-worker.js');
  if (!fs.existsSync(filename)) {
    logger.debug(`Worker ${filename} not found, analyzing sequentially`);
    return analyzeFilesSequential(tasks, registry);
  }

  const workerCount = workers ?? Math.max(1, cpus().length - 1);

  // Create worker pool
  const piscina = new Piscina({
    filename,
    maxThreads: workerCount,
    idleTimeout: 5000,
  });

  logger.info(`Analyzing ${tasks.length} files using ${workerCount} worker threads...`);

  try {
    // Submit all tasks and wait for all of them to settle
    const pending: Promise<FileAnalysis>[] = tasks.map((task) => piscina.run(task));
    return await Promise.all(pending);
  } finally {
    // Destroy the worker pool
    await piscina.destroy();
  }
}
