/**
 * codegraph
 *
 * Static analysis of source trees in several languages into syntax, control-flow,
 * data-flow, call, dependency and program-dependence graphs.
 *
 * @example
 * ```typescript
 * import { analyzeProject, analyzeCallGraph } from 'codegraph';
 *
 * const project = await analyzeProject('./src', {
 *   config: { ignore: ['**\/*.test.ts'] },
 * });
 *
 * console.log(analyzeCallGraph(project.callGraph).recursive);
 * ```
 */

// Project analysis (main entry point)
export { analyzeProject, findFiles, PARALLEL_THRESHOLD, type AnalyzerOptions, type ProjectAnalysis } from './analyzer';
export { analyzeFile, buildFunctionGraphs, type FileAnalysis, type FunctionGraphs } from './analyze-worker';

// Configuration
export {
  CONFIG_FILES,
  DEFAULT_CONFIG,
  DEFAULT_IGNORE,
  findConfigFile,
  loadConfig,
  loadConfigFile,
  loadConfigWithInfo,
  mergeConfig,
  writeDefaultConfig,
  type CodegraphConfig,
  type ResolvedConfig,
} from './config';

// Errors and diagnostics
export {
  Diagnostics,
  DocumentFormatError,
  GraphError,
  InvalidRequestError,
  IOFailureError,
  ParseFailureError,
  type Diagnostic,
  type DiagnosticKind,
  type GraphErrorCode,
} from './errors';

// Languages and syntax extraction
export { GENERIC_PROFILE_ID, LanguageRegistry, type LanguageProfile } from './language/language-registry';
export { extractSyntaxTree, readSourceFile, type ExtractionResult } from './syntax/extractor';
export { scanImports, type ImportReference } from './syntax/import-scanner';
export type { DeclKind, DeclNode, FunctionDecl, Statement, SyntaxTree } from './syntax/syntax-types';

// Graph primitives
export { bfsDistances, buildAdjacency, reachableFrom, type Graph, type GraphEdge } from './graph';

// Graph analyses
export * from './control-flow';
export * from './data-flow';
export * from './call-graph';
export * from './program-dependency';
export {
  analyzeModuleGraph,
  buildModuleGraph,
  dependenciesOf,
  dependentsOf,
  findCircularDependencies,
  findLeafModules,
  findModule,
  findRootModules,
  hasCircularDependency,
  moduleDepths,
  type CircularDependency,
  type DependencyEdge,
  type ModuleGraph,
  type ModuleGraphAnalysis,
  type ModuleNode,
} from './module-graph';
export { createPathResolver, type PathResolver } from './path-resolver';

// Export formats
export * from './export';

// CLI
export { createProgram } from './cli';
