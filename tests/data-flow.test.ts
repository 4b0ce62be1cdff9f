import {
  analyzeDataFlow,
  buildDataFlowGraph,
  findRedundantComputations,
  findTaintByName,
  findUnusedDefinitions,
  reachingDefinitions,
  variableLifetimes,
} from '../src/data-flow';
import type { DataFlowGraph } from '../src/data-flow';
import { LanguageRegistry } from '../src/language/language-registry';
import { extractSyntaxTree } from '../src/syntax/extractor';
import { isFunctionDecl } from '../src/syntax/syntax-types';

const registry = LanguageRegistry.load();

function dfgOf(lines: string[]): DataFlowGraph {
  const { tree } = extractSyntaxTree('/project/flow.ts', lines.join('\n'), registry, '/project');
  const fn = tree.decls.find(isFunctionDecl);
  if (!fn) throw new Error('snippet has no function');
  return buildDataFlowGraph(fn);
}

function nodeIdOf(dfg: DataFlowGraph, kind: string, name: string): number {
  const node = dfg.nodes.find((candidate) => candidate.kind === kind && candidate.name === name);
  if (!node) throw new Error(`no ${kind} node named ${name}`);
  return node.id;
}

describe('Data Flow Graph', () => {
  describe('definitions and uses', () => {
    const lines = ['function compute(x) {', '  const a = x + 1;', '  const b = a * 2;', '  return a;', '}'];

    it('should create nodes in statement order', () => {
      const dfg = dfgOf(lines);

      expect(dfg.parameters).toEqual(['x']);
      expect(dfg.nodes.map((node) => `${node.kind}:${node.name}`)).toEqual([
        'parameter:x',
        'use:x',
        'constant:1',
        'operation:+',
        'definition:a',
        'use:a',
        'constant:2',
        'operation:*',
        'definition:b',
        'use:a',
      ]);
      expect(dfg.nodes[3].operands).toEqual(['#0', '1']);
      expect(dfg.nodes[7].operands).toEqual(['#4', '2']);
    });

    it('should link each use to the definition that reaches it', () => {
      const dfg = dfgOf(lines);

      expect(reachingDefinitions(dfg, 1).map((node) => node.id)).toEqual([0]);
      expect(reachingDefinitions(dfg, 5).map((node) => node.id)).toEqual([4]);
      expect(reachingDefinitions(dfg, 9).map((node) => node.id)).toEqual([4]);
    });

    it('should report the definition nothing reads', () => {
      const unused = findUnusedDefinitions(dfgOf(lines));

      expect(unused.map((node) => [node.name, node.line])).toEqual([['b', 3]]);
    });

    it('should not report exported names as unused', () => {
      const unused = findUnusedDefinitions(dfgOf(lines), { exported: new Set(['b']) });

      expect(unused).toEqual([]);
    });

    it('should measure variable lifetimes', () => {
      expect(variableLifetimes(dfgOf(lines))).toEqual([
        { name: 'x', definition: 0, defLine: 1, lastUseLine: 2, span: 1 },
        { name: 'a', definition: 4, defLine: 2, lastUseLine: 4, span: 2 },
      ]);
    });

    it('should count node kinds', () => {
      const analysis = analyzeDataFlow(dfgOf(lines));

      expect(analysis.functionName).toBe('flow::compute');
      expect(analysis.stats).toMatchObject({ nodes: 10, definitions: 2, uses: 3, parameters: 1 });
    });
  });

  describe('branches', () => {
    it('should not let a definition inside one arm reach past the branch', () => {
      const dfg = dfgOf([
        'function grade(score: number): string {',
        "  let label = 'fail';",
        '  if (score > 50) {',
        "    label = 'pass';",
        '  }',
        '  const bonus = score * 2;',
        '  return label;',
        '}',
      ]);

      const returned = dfg.nodes.find((node) => node.kind === 'use' && node.name === 'label');
      expect(returned?.line).toBe(7);
      expect(reachingDefinitions(dfg, returned?.id ?? -1).map((node) => node.line)).toEqual([2]);
      expect(findUnusedDefinitions(dfg).map((node) => [node.name, node.line])).toEqual([
        ['label', 4],
        ['bonus', 6],
      ]);
    });
  });

  describe('redundant computations', () => {
    it('should flag an operation repeated over the same definitions', () => {
      const dfg = dfgOf([
        'function area(w: number, h: number): number {',
        '  const first = w * h;',
        '  const second = w * h;',
        '  return first + second;',
        '}',
      ]);

      expect(findRedundantComputations(dfg)).toEqual([{ original: 4, repeated: 8, operator: '*', line: 3 }]);
    });

    it('should not flag a repeat after an operand is reassigned', () => {
      const dfg = dfgOf([
        'function scale(w: number, h: number): number {',
        '  const first = w * h;',
        '  w = w + 1;',
        '  const second = w * h;',
        '  return first + second;',
        '}',
      ]);

      expect(findRedundantComputations(dfg)).toEqual([]);
    });
  });

  describe('taint tracking', () => {
    const lines = [
      'function handle(input: string): void {',
      '  const query = input.trim();',
      "  const safe = 'constant';",
      '  db.run(query);',
      '  log(safe);',
      '}',
    ];

    it('should follow a parameter into a call argument', () => {
      const dfg = dfgOf(lines);

      expect(nodeIdOf(dfg, 'call', 'db.run')).toBe(8);
      expect(findTaintByName(dfg, ['input'], ['db.run', 'log'])).toEqual([
        { source: 0, sink: 8, path: [0, 1, 3, 7, 8] },
      ]);
    });

    it('should find nothing when the source never reaches the sink', () => {
      const dfg = dfgOf(lines);

      expect(findTaintByName(dfg, ['safe'], ['db.run'])).toEqual([]);
    });
  });
});
