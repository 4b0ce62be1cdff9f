import { LanguageRegistry } from '../src/language/language-registry';
import {
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
  type ModuleGraph,
  type ModuleSource,
} from '../src/module-graph';

const registry = LanguageRegistry.load();

function graphOf(files: Record<string, string>): ModuleGraph {
  const sources: ModuleSource[] = Object.entries(files).map(([name, source]) => ({
    file: `/project/${name}`,
    source,
  }));
  return buildModuleGraph(sources, { root: '/project', registry });
}

describe('Module Graph', () => {
  describe('circular imports', () => {
    const graph = graphOf({
      'a.ts': "import { b } from './b';\nexport const a = 1;\n",
      'b.ts': "import { c } from './c';\nexport const b = 2;\n",
      'c.ts': "import { a } from './a';\nimport lodash from 'lodash';\nexport const c = 3;\n",
    });

    it('should create an edge per resolved import', () => {
      expect(graph.nodes.map((node) => node.modulePath)).toEqual(['a', 'b', 'c']);
      expect(graph.edges.map((edge) => [edge.from, edge.to, edge.specifier, edge.line])).toEqual([
        [0, 1, './b', 1],
        [1, 2, './c', 1],
        [2, 0, './a', 1],
      ]);
    });

    it('should keep package imports out of the graph', () => {
      expect(graph.external).toEqual([{ file: '/project/c.ts', specifier: 'lodash', line: 2 }]);
    });

    it('should report the cycle once with its full path', () => {
      expect(findCircularDependencies(graph)).toEqual([{ modules: [0, 1, 2, 0], paths: ['a', 'b', 'c', 'a'] }]);
      expect(hasCircularDependency(graph)).toBe(true);
    });

    it('should have no roots or leaves when every module is on the cycle', () => {
      expect(findRootModules(graph)).toEqual([]);
      expect(findLeafModules(graph)).toEqual([]);
      expect(moduleDepths(graph)).toEqual(
        new Map([
          [0, 0],
          [1, 1],
          [2, 2],
        ])
      );
    });

    it('should list direct and transitive neighbours', () => {
      expect(dependenciesOf(graph, 0)).toEqual([1]);
      expect(dependenciesOf(graph, 0, true)).toEqual([1, 2]);
      expect(dependentsOf(graph, 0)).toEqual([2]);
      expect(dependentsOf(graph, 0, true)).toEqual([1, 2]);
    });
  });

  describe('acyclic imports', () => {
    const graph = graphOf({
      'main.ts': "import { util } from './util';\nimport { format } from './lib/format';\n",
      'lib/format.ts': "import { util } from '../util';\nexport const format = util;\n",
      'util.ts': 'export const util = 1;\n',
    });

    it('should order modules by file path', () => {
      expect(graph.nodes.map((node) => node.modulePath)).toEqual(['lib/format', 'main', 'util']);
    });

    it('should find roots, leaves and depths', () => {
      const analysis = analyzeModuleGraph(graph);

      expect(analysis.cycles).toEqual([]);
      expect(analysis.roots).toEqual([1]);
      expect(analysis.leaves).toEqual([2]);
      expect(analysis.depth.get(0)).toBe(1);
      expect(analysis.depth.get(1)).toBe(0);
      expect(analysis.depth.get(2)).toBe(2);
      expect(analysis.maxDepth).toBe(2);
      expect(analysis.stats).toEqual({ modules: 3, dependencies: 3, external: 0, cycles: 0 });
    });

    it('should find modules by module path or file name', () => {
      expect(findModule(graph, 'lib/format')?.id).toBe(0);
      expect(findModule(graph, 'util.ts')?.id).toBe(2);
      expect(findModule(graph, 'missing')).toBeUndefined();
    });
  });

  describe('other languages', () => {
    it('should resolve Python imports against project modules', () => {
      const graph = graphOf({
        'app.py': 'from utils import helper\nimport os\n',
        'utils.py': 'def helper():\n    return 1\n',
      });

      expect(graph.nodes.map((node) => [node.modulePath, node.language])).toEqual([
        ['app', 'python'],
        ['utils', 'python'],
      ]);
      expect(graph.edges).toEqual([{ from: 0, to: 1, kind: 'import', specifier: 'utils', line: 1 }]);
      expect(graph.external.map((item) => item.specifier)).toEqual(['os']);
    });
  });
});
