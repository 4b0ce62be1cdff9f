import {
  analyzeCallGraph,
  buildCallGraph,
  callChains,
  callDepth,
  callDepths,
  callees,
  callers,
  createRegistry,
  findDeadFunctions,
  findFunctions,
  findRecursive,
  findRoots,
  MODULE_NODE_NAME,
  registerTree,
  resolveCalls,
} from '../src/call-graph';
import { GraphError } from '../src/errors';
import { LanguageRegistry } from '../src/language/language-registry';
import { extractSyntaxTree } from '../src/syntax/extractor';
import type { SyntaxTree } from '../src/syntax/syntax-types';

const registry = LanguageRegistry.load();

function treeOf(name: string, lines: string[]): SyntaxTree {
  return extractSyntaxTree(`/project/${name}`, lines.join('\n'), registry, '/project').tree;
}

const RECURSIVE = [
  'export function f(n: number): number {',
  '  if (n <= 0) return 0;',
  '  return g(n - 1);',
  '}',
  'export function g(n: number): number {',
  '  return f(n) + helper();',
  '}',
  'function helper(): number {',
  '  return 1;',
  '}',
  'function unused(): void {}',
  'export function main(): void {',
  '  f(3);',
  '}',
];

describe('Call Graph', () => {
  describe('single module', () => {
    const graph = buildCallGraph([treeOf('rec.ts', RECURSIVE)]);

    it('should register functions in declaration order', () => {
      expect(graph.nodes.map((node) => node.qualifiedName)).toEqual([
        'rec::f',
        'rec::g',
        'rec::helper',
        'rec::unused',
        'rec::main',
      ]);
      expect(graph.nodes.filter((node) => node.isEntryPoint).map((node) => node.name)).toEqual(['main']);
    });

    it('should resolve calls to edges with their lines', () => {
      expect(graph.edges.map((edge) => [edge.from, edge.to, edge.line])).toEqual([
        [0, 1, 3],
        [1, 0, 6],
        [1, 2, 6],
        [4, 0, 13],
      ]);
      expect(graph.unresolved).toEqual([]);
    });

    it('should find mutual recursion', () => {
      expect(findRecursive(graph)).toEqual([0, 1]);
    });

    it('should find dead functions and roots', () => {
      expect(findDeadFunctions(graph)).toEqual([3]);
      expect(findRoots(graph)).toEqual([3, 4]);
    });

    it('should measure call depth', () => {
      expect(callDepths(graph, 0)).toEqual(
        new Map([
          [0, 0],
          [1, 1],
          [2, 2],
        ])
      );
      expect(callDepth(graph, 0, 1)).toBe(1);
      expect(callDepth(graph, 2, 0)).toBeNull();
      expect(analyzeCallGraph(graph).maxDepth).toBe(3);
    });

    it('should list call chains, callers and callees', () => {
      expect(callChains(graph, 4, 2)).toEqual([[4, 0, 1, 2]]);
      expect(callers(graph, 0).map((node) => node.name)).toEqual(['g', 'main']);
      expect(callees(graph, 1).map((node) => node.name)).toEqual(['f', 'helper']);
    });

    it('should find functions by bare or qualified name', () => {
      expect(findFunctions(graph, 'g').map((node) => node.qualifiedName)).toEqual(['rec::g']);
      expect(findFunctions(graph, 'rec::helper').map((node) => node.id)).toEqual([2]);
      expect(findFunctions(graph, 'missing')).toEqual([]);
    });

    it('should summarize the analysis', () => {
      expect(analyzeCallGraph(graph).stats).toEqual({
        functions: 5,
        calls: 4,
        unresolved: 0,
        recursive: 2,
        dead: 1,
        roots: 2,
      });
    });
  });

  describe('top-level code', () => {
    it('should give module-level calls a synthetic caller', () => {
      const graph = buildCallGraph([treeOf('app.ts', ['function main(): void {}', 'main();'])]);

      expect(graph.nodes[1]).toMatchObject({
        qualifiedName: `app::${MODULE_NODE_NAME}`,
        synthetic: true,
        isEntryPoint: true,
      });
      expect(graph.edges).toEqual([{ from: 1, to: 0, kind: 'call', line: 2 }]);
      expect(findDeadFunctions(graph)).toEqual([]);
    });
  });

  describe('cross-module resolution', () => {
    const b = treeOf('b.ts', ['export function helper(): number {', '  return 2;', '}']);

    it('should resolve a call through an import binding', () => {
      const a = treeOf('a.ts', ["import { helper } from './b';", 'export function run(): number {', '  return helper();', '}']);
      const graph = buildCallGraph([a, b]);

      expect(graph.nodes.map((node) => node.qualifiedName)).toEqual(['a::run', 'b::helper']);
      expect(graph.edges).toEqual([{ from: 0, to: 1, kind: 'call', line: 3 }]);
    });

    it('should record calls that match no function', () => {
      const a = treeOf('a.ts', [
        "import { helper } from './b';",
        'export function run(): number {',
        "  console.log('run');",
        '  return helper();',
        '}',
      ]);
      const graph = buildCallGraph([a, b]);

      expect(graph.unresolved).toEqual([
        { caller: 0, callee: 'console.log', file: '/project/a.ts', line: 3, reason: 'not-found', candidates: [] },
      ]);
    });

    it('should report an ambiguous call instead of guessing', () => {
      const graph = buildCallGraph([
        treeOf('x.ts', ["export function format(): string { return 'x'; }"]),
        treeOf('y.ts', ["export function format(): string { return 'y'; }"]),
        treeOf('z.ts', ['export function show(): string {', '  return format();', '}']),
      ]);

      expect(graph.edges).toEqual([]);
      expect(graph.unresolved).toEqual([
        {
          caller: 2,
          callee: 'format',
          file: '/project/z.ts',
          line: 2,
          reason: 'ambiguous',
          candidates: ['x::format', 'y::format'],
        },
      ]);
    });

    it('should resolve method calls on this to the same class', () => {
      const graph = buildCallGraph([
        treeOf('service.ts', [
          'export class Service {',
          '  start(): void {',
          '    this.load();',
          '  }',
          '  load(): void {}',
          '}',
        ]),
      ]);

      expect(graph.nodes.map((node) => node.qualifiedName)).toEqual(['service::Service.start', 'service::Service.load']);
      expect(graph.edges).toEqual([{ from: 0, to: 1, kind: 'call', line: 3 }]);
    });

    it('should keep same-named nested functions apart', () => {
      const graph = buildCallGraph([
        treeOf('c.ts', [
          'export function a(): void {',
          '  const helper = () => x();',
          '  helper();',
          '}',
          'export function b(): void {',
          '  const helper = () => y();',
          '  helper();',
          '}',
          'function x(): void {}',
          'function y(): void {}',
        ]),
      ]);

      expect(graph.nodes.map((node) => [node.qualifiedName, node.owner, node.line])).toEqual([
        ['c::a', null, 1],
        ['c::a.helper', 'c::a', 2],
        ['c::b', null, 5],
        ['c::b.helper', 'c::b', 6],
        ['c::x', null, 9],
        ['c::y', null, 10],
      ]);
      expect(graph.edges).toEqual([
        { from: 1, to: 4, kind: 'call', line: 2 },
        { from: 0, to: 1, kind: 'call', line: 3 },
        { from: 3, to: 5, kind: 'call', line: 6 },
        { from: 2, to: 3, kind: 'call', line: 7 },
      ]);
    });
  });

  describe('registry phases', () => {
    it('should refuse registration after the registry is sealed', () => {
      const functions = createRegistry();
      functions.seal();

      expect(() => registerTree(functions, treeOf('b.ts', ['function late(): void {}']))).toThrow(GraphError);
      expect(() => registerTree(functions, treeOf('b.ts', ['function late(): void {}']))).toThrow(
        'Function registry is sealed'
      );
    });

    it('should refuse resolution before the registry is sealed', () => {
      const functions = createRegistry();
      const tree = treeOf('b.ts', ['function early(): void {}']);
      registerTree(functions, tree);

      expect(() => resolveCalls(functions, [tree])).toThrow('must be sealed');
    });

    it('should not count a function that calls itself as dead', () => {
      const graph = buildCallGraph([treeOf('spin.ts', ['function spin(n: number): number {', '  return spin(n - 1);', '}'])]);

      expect(graph.edges).toEqual([{ from: 0, to: 0, kind: 'call', line: 2 }]);
      expect(findRecursive(graph)).toEqual([0]);
      expect(findDeadFunctions(graph)).toEqual([]);
    });

    it('should accept custom entry point patterns', () => {
      const graph = buildCallGraph([treeOf('rec.ts', RECURSIVE)], { entryPoints: ['^unused$'] });

      expect(findDeadFunctions(graph)).toEqual([4]);
    });
  });
});
