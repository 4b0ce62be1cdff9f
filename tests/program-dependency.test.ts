import { buildControlFlowGraph } from '../src/control-flow';
import { buildDataFlowGraph } from '../src/data-flow';
import { documentToDot, programDependenceToDocument } from '../src/export';
import { LanguageRegistry } from '../src/language/language-registry';
import {
  analyzeProgramDependence,
  areIndependent,
  backwardSlice,
  buildProgramDependenceGraph,
  findDataTaintByName,
  findParallelGroups,
  forwardSlice,
  nodesAtLine,
  sliceAtLine,
} from '../src/program-dependency';
import type { ProgramDependenceGraph } from '../src/program-dependency';
import { extractSyntaxTree } from '../src/syntax/extractor';
import { isFunctionDecl } from '../src/syntax/syntax-types';

const registry = LanguageRegistry.load();

const GRADE = [
  'function grade(score: number): string {',
  "  let label = 'fail';",
  '  if (score > 50) {',
  "    label = 'pass';",
  '  }',
  '  const bonus = score * 2;',
  '  return label;',
  '}',
];

function pdgOf(lines: string[]): ProgramDependenceGraph {
  const { tree } = extractSyntaxTree('/project/grade.ts', lines.join('\n'), registry, '/project');
  const fn = tree.decls.find(isFunctionDecl);
  if (!fn) throw new Error('snippet has no function');
  return buildProgramDependenceGraph(buildControlFlowGraph(fn), buildDataFlowGraph(fn));
}

describe('Program Dependence Graph', () => {
  describe('construction', () => {
    it('should create one node per statement', () => {
      const pdg = pdgOf(GRADE);

      expect(pdg.functionName).toBe('grade::grade');
      expect(pdg.nodes.map((node) => node.line)).toEqual([2, 3, 4, 6, 7]);
      expect(pdg.nodes.map((node) => node.block)).toEqual([0, 2, 3, 4, 4]);
      expect(pdg.nodes[0].defs).toEqual(['label']);
      expect(pdg.nodes[4].uses).toEqual(['label']);
    });

    it('should add control edges from the condition and data edges from reaching definitions', () => {
      const pdg = pdgOf(GRADE);

      expect(pdg.edges).toEqual([
        { from: 1, to: 2, kind: 'control', variable: null, label: 'true' },
        { from: 0, to: 4, kind: 'data', variable: 'label', label: null },
      ]);
      expect(analyzeProgramDependence(pdg).stats).toEqual({ nodes: 5, edges: 2, controlEdges: 1, dataEdges: 1 });
    });
  });

  describe('slicing', () => {
    it('should take the backward slice of a line', () => {
      const result = sliceAtLine(pdgOf(GRADE), 7);

      expect(result).toEqual({ criterion: 4, direction: 'backward', nodes: [0, 4], lines: [2, 7] });
    });

    it('should take the forward slice of a condition', () => {
      const pdg = pdgOf(GRADE);

      expect(forwardSlice(pdg, 1)).toEqual({ criterion: 1, direction: 'forward', nodes: [1, 2], lines: [3, 4] });
      expect(backwardSlice(pdg, 2).nodes).toEqual([1, 2]);
    });

    it('should fall back to the statement spanning a line and return null past the last one', () => {
      const pdg = pdgOf(GRADE);

      expect(nodesAtLine(pdg, 5)).toEqual([1]);
      expect(nodesAtLine(pdg, 8)).toEqual([]);
      expect(sliceAtLine(pdg, 8)).toBeNull();
    });
  });

  describe('independence', () => {
    it('should tell dependent statements from independent ones', () => {
      const pdg = pdgOf(GRADE);

      expect(areIndependent(pdg, 0, 4)).toBe(false);
      expect(areIndependent(pdg, 0, 3)).toBe(true);
      expect(areIndependent(pdg, 2, 2)).toBe(false);
    });

    it('should group independent statements greedily', () => {
      const pdg = pdgOf(GRADE);

      expect(findParallelGroups(pdg)).toEqual([
        { nodes: [0, 1, 3], lines: [2, 3, 6] },
        { nodes: [2, 4], lines: [4, 7] },
      ]);
      expect(findParallelGroups(pdg, 1)).toHaveLength(1);
    });
  });

  describe('taint', () => {
    it('should follow data edges from a definition to its readers', () => {
      expect(findDataTaintByName(pdgOf(GRADE), ['label'], ['label'])).toEqual([
        { source: 0, sink: 4, path: [0, 4] },
      ]);
    });

    it('should not carry taint along control edges', () => {
      expect(findDataTaintByName(pdgOf(GRADE), ['score'], ['label'])).toEqual([]);
    });
  });

  describe('DOT rendering', () => {
    it('should draw control edges solid and data edges dashed', () => {
      const dot = documentToDot(programDependenceToDocument(pdgOf(GRADE))).split('\n');

      expect(dot[0]).toBe('digraph PDG {');
      expect(dot).toContain('  "0" [label="let label = \'fail\';\\n(line 2)", shape=box];');
      expect(dot).toContain('  "1" -> "2" [color="#DC143C"];');
      expect(dot).toContain('  "0" -> "4" [color="#1E90FF", style=dashed, label="label"];');
    });
  });
});
