import {
  analyzeControlFlow,
  blockAtLine,
  buildControlFlowGraph,
  cyclomaticComplexity,
  exitBlocks,
  findDeadCode,
  findLoops,
  reachableBlocks,
  unreachableBlocks,
} from '../src/control-flow';
import type { ControlFlowGraph } from '../src/control-flow';
import { LanguageRegistry } from '../src/language/language-registry';
import { extractSyntaxTree } from '../src/syntax/extractor';
import { isFunctionDecl } from '../src/syntax/syntax-types';

const registry = LanguageRegistry.load();

/**
 * Build the CFG of the first function in a TypeScript snippet.
 */
function cfgOf(code: string): ControlFlowGraph {
  const { tree } = extractSyntaxTree('/project/sample.ts', code, registry, '/project');
  const fn = tree.decls.find(isFunctionDecl);
  if (!fn) throw new Error('snippet has no function');
  return buildControlFlowGraph(fn);
}

function edgeList(cfg: ControlFlowGraph): string[] {
  return cfg.edges.map((edge) => `${edge.from}->${edge.to}:${edge.kind}`);
}

describe('Control Flow Graph', () => {
  describe('straight-line code', () => {
    it('should keep every statement in the entry block', () => {
      const cfg = cfgOf(['function add(a: number, b: number) {', '  const sum = a + b;', '  return sum;', '}'].join('\n'));

      expect(cfg.functionName).toBe('sample::add');
      expect(cfg.nodes[0]).toEqual({ id: 0, kind: 'entry', statements: [0], joinBlock: null });
      expect(cfg.nodes[1].kind).toBe('exit');
      expect(cyclomaticComplexity(cfg)).toBe(1);
    });
  });

  describe('early return', () => {
    const code = [
      'export function check(x: number): number {',
      '  if (x > 0) {',
      '    return 1;',
      '  }',
      '  return 0;',
      "  console.log('unreachable');",
      '}',
    ].join('\n');

    it('should split the function into branch and return blocks', () => {
      const cfg = cfgOf(code);

      expect(cfg.nodes.map((block) => block.kind)).toEqual(['entry', 'exit', 'branch', 'return', 'return', 'normal']);
      expect(cfg.nodes.map((block) => block.statements)).toEqual([[], [], [0], [1], [2], [3]]);
      expect(edgeList(cfg)).toEqual([
        '0->2:sequential',
        '2->3:true-branch',
        '3->1:sequential',
        '2->4:false-branch',
        '4->1:sequential',
        '5->1:sequential',
      ]);
    });

    it('should report the statement after the final return as dead code', () => {
      const cfg = cfgOf(code);

      expect([...reachableBlocks(cfg)].sort()).toEqual([0, 1, 2, 3, 4]);
      expect(unreachableBlocks(cfg)).toEqual([5]);
      expect(findDeadCode(cfg)).toEqual([
        { block: 5, startLine: 6, endLine: 6, text: "console.log('unreachable');" },
      ]);
    });

    it('should count one decision point', () => {
      const analysis = analyzeControlFlow(cfgOf(code));

      expect(analysis.complexity).toBe(2);
      expect(analysis.exits).toEqual([3, 4, 5]);
      expect(analysis.loops).toEqual([]);
      expect(analysis.stats.unreachable).toBe(1);
    });
  });

  describe('loops', () => {
    it('should find the natural loop of a while statement', () => {
      const cfg = cfgOf(
        [
          'function total(items: number[]): number {',
          '  let sum = 0;',
          '  let i = 0;',
          '  while (i < items.length) {',
          '    sum += items[i];',
          '    i++;',
          '  }',
          '  return sum;',
          '}',
        ].join('\n')
      );

      expect(cfg.nodes[0].statements).toEqual([0, 1]);
      expect(edgeList(cfg)).toEqual([
        '0->2:sequential',
        '2->4:true-branch',
        '4->2:loop-back',
        '2->3:false-branch',
        '3->1:sequential',
      ]);
      expect(findLoops(cfg)).toEqual([{ header: 2, latch: 4, blocks: [2, 4], line: 4 }]);
      expect(exitBlocks(cfg)).toEqual([3]);
      expect(cyclomaticComplexity(cfg)).toBe(2);
    });

    it('should keep a return inside a for loop reachable', () => {
      const cfg = cfgOf(
        [
          'function find(items: string[], target: string): number {',
          '  for (let i = 0; i < items.length; i++) {',
          '    if (items[i] === target) {',
          '      return i;',
          '    }',
          '  }',
          '  return -1;',
          '}',
        ].join('\n')
      );

      expect(cfg.nodes.map((block) => block.kind)).toEqual([
        'entry',
        'exit',
        'loop',
        'return',
        'normal',
        'branch',
        'return',
        'normal',
      ]);
      expect(unreachableBlocks(cfg)).toEqual([]);
      expect(findDeadCode(cfg)).toEqual([]);
      expect(cyclomaticComplexity(cfg)).toBe(3);
      expect(findLoops(cfg)).toEqual([{ header: 2, latch: 4, blocks: [2, 4, 5, 7], line: 2 }]);
    });
  });

  describe('endless constructs', () => {
    it('should leave no join block behind an endless loop', () => {
      const cfg = cfgOf(['function serve(queue: string[]): void {', '  while (true) {', '    handle(queue);', '  }', '}'].join('\n'));

      expect(edgeList(cfg)).toEqual(['0->2:sequential', '2->4:true-branch', '4->2:loop-back']);
      expect(unreachableBlocks(cfg)).toEqual([]);
      expect(exitBlocks(cfg)).toEqual([]);
      expect(analyzeControlFlow(cfg).stats.unreachable).toBe(0);
    });

    it('should leave no join block behind a switch whose arms all return', () => {
      const cfg = cfgOf(
        [
          'function sign(n: number): string {',
          '  switch (Math.sign(n)) {',
          '    case 1:',
          "      return 'up';",
          '    default:',
          "      return 'down';",
          '  }',
          '}',
        ].join('\n')
      );

      expect(edgeList(cfg)).toEqual([
        '0->2:sequential',
        '2->4:true-branch',
        '4->1:sequential',
        '2->5:true-branch',
        '5->1:sequential',
      ]);
      expect(unreachableBlocks(cfg)).toEqual([]);
      expect(findDeadCode(cfg)).toEqual([]);
      expect(cyclomaticComplexity(cfg)).toBe(2);
    });
  });

  describe('switch', () => {
    const code = [
      'function label(kind: string): string {',
      "  let result = '';",
      '  switch (kind) {',
      "    case 'a':",
      "      result = 'A';",
      "    case 'b':",
      "      result = 'B';",
      '      break;',
      '    default:',
      "      result = '?';",
      '  }',
      '  return result;',
      '}',
    ].join('\n');

    it('should give every case its own block and let cases fall through', () => {
      const cfg = cfgOf(code);

      expect(cfg.nodes[2]).toEqual({ id: 2, kind: 'branch', statements: [1], joinBlock: 3 });
      expect(cfg.nodes.slice(3).map((block) => block.statements)).toEqual([[9], [2, 3], [4, 5, 6], [7, 8]]);
      expect(edgeList(cfg)).toEqual([
        '0->2:sequential',
        '2->4:true-branch',
        '2->5:true-branch',
        '4->5:sequential',
        '5->3:break',
        '2->6:true-branch',
        '6->3:sequential',
        '3->1:sequential',
      ]);
    });

    it('should count each extra arm toward complexity', () => {
      const cfg = cfgOf(code);

      expect(cyclomaticComplexity(cfg)).toBe(3);
      expect(blockAtLine(cfg, 5)).toBe(4);
      expect(blockAtLine(cfg, 100)).toBeUndefined();
    });
  });
});
