import { buildCallGraph } from '../src/call-graph';
import { analyzeControlFlow, buildControlFlowGraph, findLoops } from '../src/control-flow';
import type { ControlFlowGraph } from '../src/control-flow';
import { analyzeDataFlow, buildDataFlowGraph } from '../src/data-flow';
import { LanguageRegistry } from '../src/language/language-registry';
import { extractSyntaxTree } from '../src/syntax/extractor';
import { isFunctionDecl, type FunctionDecl } from '../src/syntax/syntax-types';

const registry = LanguageRegistry.load();

function firstFunction(file: string, lines: string[]): FunctionDecl {
  const { tree } = extractSyntaxTree(`/project/${file}`, lines.join('\n'), registry, '/project');
  const fn = tree.decls.find(isFunctionDecl);
  if (!fn) throw new Error(`${file} has no function`);
  return fn;
}

function edgeList(cfg: ControlFlowGraph): string[] {
  return cfg.edges.map((edge) => `${edge.from}->${edge.to}:${edge.kind}`);
}

describe('Pattern-based languages', () => {
  describe('Python', () => {
    it('should report the call after an if/else that returns on both arms', () => {
      const fn = firstFunction('check.py', [
        'def check(x):',
        '    if x > 0:',
        '        return 1',
        '    else:',
        '        return 0',
        '    log(x)',
      ]);
      const analysis = analyzeControlFlow(buildControlFlowGraph(fn));

      expect(analysis.complexity).toBe(2);
      expect(analysis.unreachable).toEqual([5]);
      expect(analysis.deadCode).toEqual([{ block: 5, startLine: 6, endLine: 6, text: 'log(x)' }]);
    });

    it('should flag a value that is never read', () => {
      const fn = firstFunction('compute.py', ['def compute():', '    a = 1', '    b = a + 1']);

      expect(analyzeDataFlow(buildDataFlowGraph(fn)).unused.map((node) => node.name)).toEqual(['b']);
    });

    it('should route break to the block after the loop', () => {
      const cfg = buildControlFlowGraph(
        firstFunction('search.py', [
          'def first_negative(values):',
          '    for v in values:',
          '        if v < 0:',
          '            break',
          '    return v',
        ])
      );

      expect(edgeList(cfg)).toEqual([
        '0->2:sequential',
        '2->4:true-branch',
        '4->5:true-branch',
        '5->3:break',
        '4->6:false-branch',
        '6->2:loop-back',
        '2->3:false-branch',
        '3->1:sequential',
      ]);
      expect(cfg.nodes[2].joinBlock).toBe(3);
    });

    it('should scope a nested def by the function around it', () => {
      const { tree } = extractSyntaxTree(
        '/project/nest.py',
        [
          'def outer():',
          '    def helper():',
          '        return 1',
          '    return helper()',
          'def helper():',
          '    return 2',
        ].join('\n'),
        registry,
        '/project'
      );
      const graph = buildCallGraph([tree]);

      expect(graph.nodes.map((node) => [node.qualifiedName, node.owner])).toEqual([
        ['nest::outer', null],
        ['nest::outer.helper', 'nest::outer'],
        ['nest::helper', null],
      ]);
      expect(graph.edges).toEqual([{ from: 0, to: 1, kind: 'call', line: 4 }]);
    });
  });

  describe('Go', () => {
    it('should report the call after an if/else that returns on both arms', () => {
      const fn = firstFunction('check.go', [
        'func check(x int) int {',
        '\tif x > 0 {',
        '\t\treturn 1',
        '\t} else {',
        '\t\treturn 0',
        '\t}',
        '\tlog(x)',
        '}',
      ]);
      const analysis = analyzeControlFlow(buildControlFlowGraph(fn));

      expect(analysis.complexity).toBe(2);
      expect(analysis.deadCode).toEqual([{ block: 5, startLine: 7, endLine: 7, text: 'log(x)' }]);
    });

    it('should flag a value that is never read', () => {
      const fn = firstFunction('compute.go', ['func compute() {', '\ta := 1', '\tb := a + 1', '}']);

      expect(analyzeDataFlow(buildDataFlowGraph(fn)).unused.map((node) => node.name)).toEqual(['b']);
    });

    it('should route break out of an endless loop', () => {
      const cfg = buildControlFlowGraph(
        firstFunction('drain.go', [
          'func drain() int {',
          '\tcount := 0',
          '\tfor {',
          '\t\tif count > 10 {',
          '\t\t\tbreak',
          '\t\t}',
          '\t\tcount++',
          '\t}',
          '\treturn count',
          '}',
        ])
      );

      expect(edgeList(cfg)).toEqual([
        '0->2:sequential',
        '2->4:true-branch',
        '4->5:true-branch',
        '5->3:break',
        '4->6:false-branch',
        '6->2:loop-back',
        '3->1:sequential',
      ]);
      expect(findLoops(cfg)).toEqual([{ header: 2, latch: 6, blocks: [2, 4, 6], line: 3 }]);
      expect(analyzeControlFlow(cfg).unreachable).toEqual([]);
    });
  });
});
