/**
 * Conversion of every graph kind to the shared interchange document.
 *
 * Node ids in a document are the node's index in its graph's arena, so a
 * document can be read back against the graph it came from. Findings of the
 * analyzers travel as node attributes (`reachable`, `recursive`, `onCycle`)
 * for the DOT renderer and other consumers.
 */

import type { CallGraph, CallGraphAnalysis } from '../call-graph/call-graph-types';
import { analyzeCallGraph } from '../call-graph/call-graph-analyzer';
import { analyzeControlFlow } from '../control-flow/cfg-analyzer';
import type { ControlFlowGraph } from '../control-flow/cfg-types';
import { findUnusedDefinitions } from '../data-flow/dfg-analyzer';
import type { DataFlowGraph, DataFlowOptions } from '../data-flow/dfg-types';
import { analyzeModuleGraph, type ModuleGraph, type ModuleGraphAnalysis } from '../module-graph';
import { findParallelGroups } from '../program-dependency/pdg-analyzer';
import type { ProgramDependenceGraph } from '../program-dependency/pdg-types';
import type { SyntaxTree } from '../syntax/syntax-types';
import type { AttributeValue, DocumentEdge, DocumentNode, GraphDocument } from './graph-document';

const MAX_LABEL = 40;

export function syntaxTreeToDocument(tree: SyntaxTree): GraphDocument {
  const nodes: DocumentNode[] = [
    {
      id: 0,
      kind: 'file',
      label: tree.modulePath,
      file: tree.file,
      modulePath: tree.modulePath,
      language: tree.language,
    },
  ];
  const edges: DocumentEdge[] = [];

  // declaration n is document node n + 1
  for (const decl of tree.decls) {
    const base = {
      id: decl.id + 1,
      name: decl.name,
      qualifiedName: decl.qualifiedName,
      line: decl.range.start,
      endLine: decl.range.end,
      visibility: decl.visibility,
    };
    switch (decl.kind) {
      case 'function':
        nodes.push({
          ...base,
          kind: 'function',
          label: `${decl.name}(${decl.parameters.join(', ')})`,
          parameters: decl.parameters,
          returnType: decl.returnType,
          isAsync: decl.isAsync,
          className: decl.className,
        });
        break;
      case 'class':
        nodes.push({ ...base, kind: 'class', label: decl.name, methods: decl.methods, fields: decl.fields });
        break;
      case 'import':
        nodes.push({ ...base, kind: 'import', label: decl.source, source: decl.source, importedNames: decl.importedNames });
        break;
      case 'variable':
        nodes.push({ ...base, kind: 'variable', label: decl.name, isConst: decl.isConst, isMutable: decl.isMutable });
        break;
      case 'call-site':
        nodes.push({
          ...base,
          kind: 'call-site',
          label: decl.receiver ? `${decl.receiver}.${decl.callee}()` : `${decl.callee}()`,
          callee: decl.callee,
          receiver: decl.receiver,
        });
        break;
    }
    edges.push({ from: decl.parent === null ? 0 : decl.parent + 1, to: decl.id + 1, kind: 'contains' });
  }

  return {
    graphType: 'syntax-tree',
    nodes,
    edges,
    metadata: {
      file: tree.file,
      modulePath: tree.modulePath,
      language: tree.language,
      strategy: tree.strategy,
      heuristic: tree.heuristic,
      exportedNames: tree.exportedNames,
    },
  };
}

export function controlFlowToDocument(cfg: ControlFlowGraph): GraphDocument {
  const analysis = analyzeControlFlow(cfg);
  const reachable = new Set(analysis.reachable);
  const sites = new Map(cfg.statements.map((site) => [site.id, site]));

  const nodes: DocumentNode[] = cfg.nodes.map((block) => {
    const blockSites = block.statements.flatMap((statement) => {
      const site = sites.get(statement);
      return site ? [site] : [];
    });
    const texts = blockSites.map((site) => site.text);
    return {
      id: block.id,
      kind: block.kind,
      label: block.kind === 'entry' || block.kind === 'exit' ? block.kind.toUpperCase() : blockLabel(texts),
      statements: texts,
      lines: blockSites.map((site) => site.line),
      reachable: reachable.has(block.id),
      joinBlock: block.joinBlock,
    };
  });

  return {
    graphType: 'control-flow',
    nodes,
    edges: cfg.edges.map((edge) => ({ from: edge.from, to: edge.to, kind: edge.kind })),
    metadata: {
      functionName: cfg.functionName,
      file: cfg.file,
      entry: cfg.entry,
      exit: cfg.exit,
      complexity: analysis.complexity,
      unreachable: analysis.unreachable,
      loops: analysis.loops.map((loop) => loop.header),
    },
  };
}

export function dataFlowToDocument(dfg: DataFlowGraph, options: DataFlowOptions = {}): GraphDocument {
  const unused = new Set(findUnusedDefinitions(dfg, options).map((node) => node.id));

  const nodes: DocumentNode[] = dfg.nodes.map((node) => ({
    id: node.id,
    kind: node.kind,
    label: `${node.name}\n(line ${node.line})`,
    name: node.name,
    line: node.line,
    statement: node.statement,
    unused: unused.has(node.id),
    ...(node.operands ? { operands: node.operands } : {}),
  }));

  return {
    graphType: 'data-flow',
    nodes,
    edges: dfg.edges.map((edge) => ({ from: edge.from, to: edge.to, kind: edge.kind })),
    metadata: {
      functionName: dfg.functionName,
      file: dfg.file,
      parameters: dfg.parameters,
      unused: [...unused],
    },
  };
}

export function callGraphToDocument(graph: CallGraph, analysis: CallGraphAnalysis = analyzeCallGraph(graph)): GraphDocument {
  const recursive = new Set(analysis.recursive);
  const dead = new Set(analysis.dead);
  const roots = new Set(analysis.roots);

  const unresolvedBy = new Map<number, AttributeValue[]>();
  for (const call of graph.unresolved) {
    const list = unresolvedBy.get(call.caller) ?? [];
    list.push({ callee: call.callee, line: call.line, reason: call.reason, candidates: call.candidates });
    unresolvedBy.set(call.caller, list);
  }

  const nodes: DocumentNode[] = graph.nodes.map((fn) => ({
    id: fn.id,
    kind: fn.synthetic ? 'module' : 'function',
    label: fn.synthetic ? fn.modulePath : fn.className ? `${fn.className}.${fn.name}` : fn.name,
    qualifiedName: fn.qualifiedName,
    name: fn.name,
    className: fn.className,
    modulePath: fn.modulePath,
    file: fn.file,
    line: fn.line,
    endLine: fn.endLine,
    visibility: fn.visibility,
    entryPoint: fn.isEntryPoint,
    recursive: recursive.has(fn.id),
    dead: dead.has(fn.id),
    root: roots.has(fn.id),
    unresolvedCalls: unresolvedBy.get(fn.id) ?? [],
  }));

  return {
    graphType: 'call-graph',
    nodes,
    edges: graph.edges.map((edge) => ({ from: edge.from, to: edge.to, kind: edge.kind, line: edge.line })),
    metadata: {
      functions: analysis.stats.functions,
      calls: analysis.stats.calls,
      unresolved: analysis.stats.unresolved,
      maxDepth: analysis.maxDepth,
    },
  };
}

export function moduleGraphToDocument(
  graph: ModuleGraph,
  analysis: ModuleGraphAnalysis = analyzeModuleGraph(graph)
): GraphDocument {
  const roots = new Set(analysis.roots);
  const leaves = new Set(analysis.leaves);
  const onCycle = new Set<number>();
  const cycleEdges = new Set<string>();
  for (const cycle of analysis.cycles) {
    cycle.modules.forEach((module, index) => {
      onCycle.add(module);
      const next = cycle.modules[index + 1];
      if (next !== undefined) cycleEdges.add(`${module}>${next}`);
    });
  }

  const nodes: DocumentNode[] = graph.nodes.map((module) => ({
    id: module.id,
    kind: 'module',
    label: module.modulePath,
    file: module.file,
    modulePath: module.modulePath,
    language: module.language,
    root: roots.has(module.id),
    leaf: leaves.has(module.id),
    depth: analysis.depth.get(module.id) ?? 0,
    onCycle: onCycle.has(module.id),
  }));

  const edges: DocumentEdge[] = graph.edges.map((edge) => ({
    from: edge.from,
    to: edge.to,
    kind: edge.kind,
    specifier: edge.specifier,
    line: edge.line,
    onCycle: cycleEdges.has(`${edge.from}>${edge.to}`),
  }));

  return {
    graphType: 'dependency-graph',
    nodes,
    edges,
    metadata: {
      root: graph.root,
      cycles: analysis.cycles.map((cycle) => cycle.paths),
      maxDepth: analysis.maxDepth,
      external: graph.external.length,
    },
  };
}

export function programDependenceToDocument(pdg: ProgramDependenceGraph, maxParallelGroups?: number): GraphDocument {
  const nodes: DocumentNode[] = pdg.nodes.map((node) => ({
    id: node.id,
    kind: 'statement',
    label: `${truncate(node.text)}\n(line ${node.line})`,
    statement: node.statement,
    block: node.block,
    line: node.line,
    endLine: node.endLine,
    text: node.text,
    defs: node.defs,
    uses: node.uses,
  }));

  return {
    graphType: 'program-dependency',
    nodes,
    edges: pdg.edges.map((edge) => ({
      from: edge.from,
      to: edge.to,
      kind: edge.kind,
      variable: edge.variable,
      label: edge.label,
    })),
    metadata: {
      functionName: pdg.functionName,
      file: pdg.file,
      parallelGroups: findParallelGroups(pdg, maxParallelGroups).map((group) => group.lines),
    },
  };
}

function blockLabel(texts: string[]): string {
  if (texts.length === 0) return '(empty)';
  return texts.map(truncate).join('\n');
}

function truncate(text: string): string {
  const line = text.replace(/\s+/g, ' ').trim();
  return line.length > MAX_LABEL ? `${line.substring(0, MAX_LABEL - 3)}...` : line;
}
