import { buildCallGraph } from '../src/call-graph';
import { buildControlFlowGraph } from '../src/control-flow';
import { DocumentFormatError } from '../src/errors';
import {
  callGraphToDocument,
  controlFlowToDocument,
  documentToDot,
  moduleGraphToDocument,
  parseGraphDocument,
  serializeDocument,
  subgraph,
  summarize,
  syntaxTreeToDocument,
} from '../src/export';
import type { DocumentNode, GraphDocument } from '../src/export';
import { LanguageRegistry } from '../src/language/language-registry';
import { buildModuleGraph } from '../src/module-graph';
import { extractSyntaxTree } from '../src/syntax/extractor';
import { isFunctionDecl, type SyntaxTree } from '../src/syntax/syntax-types';

const registry = LanguageRegistry.load();

function treeOf(name: string, lines: string[]): SyntaxTree {
  return extractSyntaxTree(`/project/${name}`, lines.join('\n'), registry, '/project').tree;
}

const CHECK = treeOf('check.ts', [
  'export function check(x: number): number {',
  '  if (x > 0) {',
  '    return 1;',
  '  }',
  '  return 0;',
  "  console.log('unreachable');",
  '}',
]);

const PINGPONG = treeOf('pingpong.ts', [
  'export function ping(n: number): number {',
  '  return pong(n - 1);',
  '}',
  'export function pong(n: number): number {',
  '  return ping(n);',
  '}',
  'export function main(): void {',
  '  ping(1);',
  '}',
]);

function checkDocument(): GraphDocument {
  const fn = CHECK.decls.find(isFunctionDecl);
  if (!fn) throw new Error('no function');
  return controlFlowToDocument(buildControlFlowGraph(fn));
}

describe('Graph export', () => {
  describe('JSON documents', () => {
    it('should read back what it writes', () => {
      const document = callGraphToDocument(buildCallGraph([PINGPONG]));

      expect(parseGraphDocument(serializeDocument(document))).toEqual(document);
    });

    it('should carry analysis findings as attributes', () => {
      const document = callGraphToDocument(buildCallGraph([PINGPONG]));

      expect(document.graphType).toBe('call-graph');
      expect(document.nodes.map((node) => [node.label, node.recursive, node.entryPoint])).toEqual([
        ['ping', true, false],
        ['pong', true, false],
        ['main', false, true],
      ]);
      expect(document.edges).toEqual([
        { from: 0, to: 1, kind: 'call', line: 2 },
        { from: 1, to: 0, kind: 'call', line: 5 },
        { from: 2, to: 0, kind: 'call', line: 8 },
      ]);
      expect(document.metadata).toEqual({ functions: 3, calls: 3, unresolved: 0, maxDepth: 2 });
    });

    it('should keep extra attributes on nodes and edges', () => {
      const node: DocumentNode = { id: 0, kind: 'function', label: 'main', tags: ['entry'], span: { start: 1, end: 3 } };
      const document: GraphDocument = {
        graphType: 'call-graph',
        nodes: [node],
        edges: [{ from: 0, to: 0, kind: 'call', line: 2 }],
        metadata: {},
      };
      const parsed = parseGraphDocument(serializeDocument(document));

      expect(parsed.nodes[0].label).toBe('main');
      expect(parsed.nodes[0].span).toEqual({ start: 1, end: 3 });
      expect(parsed.edges[0].line).toBe(2);
    });

    it('should reject text that is not JSON', () => {
      expect(() => parseGraphDocument('{ nodes: ')).toThrow(DocumentFormatError);
      expect(() => parseGraphDocument('{ nodes: ')).toThrow('Graph document is not valid JSON');
    });

    it('should reject edges to unknown nodes', () => {
      const text = JSON.stringify({
        graphType: 'call-graph',
        nodes: [{ id: 0, kind: 'function' }],
        edges: [{ from: 0, to: 3, kind: 'call' }],
        metadata: {},
      });

      expect(() => parseGraphDocument(text)).toThrow('Invalid graph document:\n  edges.0.to: Edge refers to unknown node 3');
    });

    it('should reject duplicate node ids and unknown graph types', () => {
      const duplicate = JSON.stringify({
        graphType: 'data-flow',
        nodes: [
          { id: 1, kind: 'use' },
          { id: 1, kind: 'use' },
        ],
        edges: [],
        metadata: {},
      });
      const unknownType = JSON.stringify({ graphType: 'flowchart', nodes: [], edges: [], metadata: {} });

      expect(() => parseGraphDocument(duplicate)).toThrow('nodes.1.id: Duplicate node id 1');
      expect(() => parseGraphDocument(unknownType)).toThrow(/graphType: /);
    });
  });

  describe('document helpers', () => {
    it('should cut a document down to a node set', () => {
      const document = callGraphToDocument(buildCallGraph([PINGPONG]));
      const part = subgraph(document, new Set([0, 1]));

      expect(part.nodes.map((node) => node.id)).toEqual([0, 1]);
      expect(part.edges.map((edge) => [edge.from, edge.to])).toEqual([
        [0, 1],
        [1, 0],
      ]);
      expect(part.metadata).toBe(document.metadata);
    });

    it('should add up counts over several documents', () => {
      const document = callGraphToDocument(buildCallGraph([PINGPONG]));

      expect(summarize([document, document], ['2 recursive'])).toEqual({
        nodeCount: 6,
        edgeCount: 6,
        keyFindings: ['2 recursive'],
      });
    });

    it('should number syntax tree nodes after the file node', () => {
      const document = syntaxTreeToDocument(CHECK);

      expect(document.nodes.map((node) => [node.id, node.kind, node.label])).toEqual([
        [0, 'file', 'check'],
        [1, 'function', 'check(x)'],
        [2, 'call-site', 'console.log()'],
      ]);
      expect(document.edges).toEqual([
        { from: 0, to: 1, kind: 'contains' },
        { from: 1, to: 2, kind: 'contains' },
      ]);
    });
  });

  describe('DOT rendering', () => {
    it('should style control-flow blocks by kind', () => {
      const lines = documentToDot(checkDocument()).split('\n');

      expect(lines[0]).toBe('digraph CFG {');
      expect(lines[1]).toBe('  label="control-flow";');
      expect(lines).toContain('  "0" [label="ENTRY", shape=ellipse, fillcolor="#90EE90", style=filled];');
      expect(lines).toContain('  "2" -> "3" [label="T", color="#228B22"];');
      expect(lines).toContain('  "4" -> "1";');
      expect(lines[lines.length - 1]).toBe('}');
    });

    it('should gray out unreachable blocks or leave them out', () => {
      const shown = documentToDot(checkDocument()).split('\n');
      const hidden = documentToDot(checkDocument(), { showUnreachable: false, title: 'check' }).split('\n');

      expect(shown).toContain(
        '  "5" [label="console.log(\'unreachable\');", shape=box, fillcolor="#eeeeee", style="filled,dashed", fontcolor="#888888"];'
      );
      expect(hidden[1]).toBe('  label="check";');
      expect(hidden.some((line) => line.startsWith('  "5"'))).toBe(false);
    });

    it('should highlight import cycles', () => {
      const graph = buildModuleGraph(
        [
          { file: '/project/a.ts', source: "import './b';\n" },
          { file: '/project/b.ts', source: "import './a';\n" },
          { file: '/project/c.ts', source: "import './a';\n" },
        ],
        { root: '/project', registry }
      );
      const lines = documentToDot(moduleGraphToDocument(graph), { leftToRight: true }).split('\n');

      expect(lines).toContain('  rankdir="LR";');
      expect(lines).toContain('  "0" [label="a", shape=note, fillcolor="#FFB6C1", style=filled];');
      expect(lines).toContain('  "2" [label="c", shape=note];');
      expect(lines).toContain('  "0" -> "1" [color="#DC143C", penwidth=2];');
      expect(lines).toContain('  "2" -> "0";');
    });
  });
});
