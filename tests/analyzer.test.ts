import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { analyzeProject } from '../src/analyzer';
import { InvalidRequestError } from '../src/errors';

function writeFiles(root: string, files: Record<string, string>): void {
  for (const [name, content] of Object.entries(files)) {
    const file = path.join(root, name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }
}

describe('Project analysis', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'codegraph-analyzer-'));
    writeFiles(tempDir, {
      'src/main.ts': [
        "import { helper } from './util';",
        "import { gone } from './missing';",
        'export function main(): void {',
        '  helper();',
        '}',
        '',
      ].join('\n'),
      'src/util.ts': ['export function helper(): number {', '  return 1;', '}', ''].join('\n'),
      'src/broken.ts': 'const = ;\n',
      'node_modules/pkg/index.ts': 'export function vendored(): void {}\n',
      'README.md': '# notes\n',
    });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should find source files and skip ignored directories', async () => {
    const analysis = await analyzeProject(tempDir);

    expect(analysis.singleFile).toBe(false);
    expect(analysis.files.map((file) => path.relative(tempDir, file))).toEqual([
      path.join('src', 'broken.ts'),
      path.join('src', 'main.ts'),
      path.join('src', 'util.ts'),
    ]);
  });

  it('should keep going past a file that does not parse', async () => {
    const analysis = await analyzeProject(tempDir);

    expect(analysis.trees.map((tree) => tree.modulePath)).toEqual(['src/main', 'src/util']);
    expect(analysis.diagnostics[0]).toMatchObject({
      file: path.join(tempDir, 'src', 'broken.ts'),
      kind: 'parse-failure',
      line: 1,
    });
  });

  it('should report relative imports that match no file', async () => {
    const analysis = await analyzeProject(tempDir);

    expect(analysis.diagnostics.filter((diagnostic) => diagnostic.kind === 'unresolved-reference')).toEqual([
      {
        file: path.join(tempDir, 'src', 'main.ts'),
        kind: 'unresolved-reference',
        message: 'Cannot resolve import "./missing"',
        line: 2,
      },
    ]);
  });

  it('should resolve calls across files after every file is registered', async () => {
    const analysis = await analyzeProject(tempDir);

    expect(analysis.callGraph.nodes.map((node) => node.qualifiedName)).toEqual(['src/main::main', 'src/util::helper']);
    expect(analysis.callGraph.edges).toEqual([{ from: 0, to: 1, kind: 'call', line: 4 }]);
    expect(analysis.moduleGraph.nodes.map((node) => node.modulePath)).toEqual(['src/broken', 'src/main', 'src/util']);
    expect(analysis.moduleGraph.edges.map((edge) => [edge.from, edge.to])).toEqual([[1, 2]]);
  });

  it('should build function graphs only when asked', async () => {
    const full = await analyzeProject(tempDir);
    const light = await analyzeProject(tempDir, { functionGraphs: false });

    expect(full.functions.map((fn) => [fn.name, fn.line])).toEqual([
      ['src/main::main', 3],
      ['src/util::helper', 1],
    ]);
    expect(light.functions).toEqual([]);
  });

  it('should apply config overrides', async () => {
    const analysis = await analyzeProject(tempDir, { config: { extensions: ['py'] } });

    expect(analysis.files).toEqual([]);
    expect(analysis.callGraph.nodes).toEqual([]);
  });

  it('should give the same result when parallel analysis is requested', async () => {
    const analysis = await analyzeProject(tempDir, { config: { parallel: true, workers: 2 } });

    expect(analysis.trees).toHaveLength(2);
    expect(analysis.callGraph.edges).toHaveLength(1);
  });

  it('should analyze a single file relative to its directory', async () => {
    const analysis = await analyzeProject(path.join(tempDir, 'src', 'util.ts'));

    expect(analysis.singleFile).toBe(true);
    expect(analysis.root).toBe(path.join(tempDir, 'src'));
    expect(analysis.trees.map((tree) => tree.modulePath)).toEqual(['util']);
  });

  it('should reject a path that does not exist', async () => {
    await expect(analyzeProject(path.join(tempDir, 'nope'))).rejects.toThrow(InvalidRequestError);
  });
});
