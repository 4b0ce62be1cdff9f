import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createProgram } from '../src/cli';
import { parseGraphDocument } from '../src/export';

const CALC = [
  'export function main(): void {',
  '  const total = add(1, 2);',
  '  console.log(total);',
  '}',
  'export function add(a: number, b: number): number {',
  '  const unused = a;',
  '  return a + b;',
  '}',
  '',
].join('\n');

describe('CLI', () => {
  let tempDir: string;
  let calcFile: string;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  async function run(...args: string[]): Promise<void> {
    await createProgram().parseAsync(['node', 'codegraph', ...args]);
  }

  function logged(): string {
    return logSpy.mock.calls.map((call: unknown[]) => call.join(' ')).join('\n');
  }

  function loggedArray(): unknown[] {
    const value: unknown = JSON.parse(logged());
    if (!Array.isArray(value)) throw new Error('expected a JSON array');
    return value;
  }

  function errors(): string {
    return errorSpy.mock.calls.map((call: unknown[]) => call.map(String).join(' ')).join('\n');
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'codegraph-cli-'));
    calcFile = path.join(tempDir, 'calc.ts');
    fs.writeFileSync(calcFile, CALC);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    process.exitCode = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('call-graph', () => {
    it('should print a single JSON document', async () => {
      await run('call-graph', tempDir, '--format', 'json', '--no-color');

      const document = parseGraphDocument(logged());
      expect(document.graphType).toBe('call-graph');
      expect(document.nodes.map((node) => node.label)).toEqual(['main', 'add']);
      expect(document.edges).toEqual([{ from: 0, to: 1, kind: 'call', line: 2 }]);
      expect(process.exitCode).toBeUndefined();
    });

    it('should write the document to the export file', async () => {
      const exportFile = path.join(tempDir, 'out', 'calls.json');
      await run('call-graph', tempDir, '--export', exportFile, '--no-color');

      const document = parseGraphDocument(fs.readFileSync(exportFile, 'utf-8'));
      expect(document.nodes).toHaveLength(2);
      expect(logged()).toContain(`Exported to ${exportFile}`);
    });
  });

  describe('data-flow', () => {
    it('should limit output to the named function', async () => {
      await run('data-flow', calcFile, '--format', 'json', '--function', 'add', '--no-color');

      const documents = loggedArray();
      expect(documents).toHaveLength(1);
      expect(documents).toMatchObject([{ graphType: 'data-flow', metadata: { functionName: 'calc::add' } }]);
    });

    it('should flag values that are never read', async () => {
      await run('data-flow', calcFile, '--format', 'json', '--function', 'add', '--no-color');

      const [document] = loggedArray();
      const parsed = parseGraphDocument(JSON.stringify(document));
      expect(parsed.nodes.filter((node) => node.unused === true).map((node) => node.name)).toEqual(['unused']);
    });

    it('should fail on an unknown function name', async () => {
      await run('data-flow', calcFile, '--function', 'missing', '--no-color');

      expect(process.exitCode).toBe(1);
      expect(errors()).toContain('No function named "missing"');
    });
  });

  describe('control-flow', () => {
    it('should print one DOT graph per function', async () => {
      await run('control-flow', calcFile, '--format', 'dot', '--no-color');

      const output = logged();
      expect(output.split('\n').filter((line) => line === 'digraph CFG {')).toHaveLength(2);
    });
  });

  describe('dependency-graph', () => {
    it('should keep only modules on a cycle with --circular-only', async () => {
      fs.writeFileSync(path.join(tempDir, 'ping.ts'), "import './pong';\n");
      fs.writeFileSync(path.join(tempDir, 'pong.ts'), "import './ping';\n");

      await run('dependency-graph', tempDir, '--format', 'json', '--circular-only', '--no-color');

      const document = parseGraphDocument(logged());
      expect(document.graphType).toBe('dependency-graph');
      expect(document.nodes.map((node) => node.label)).toEqual(['ping', 'pong']);
    });
  });

  describe('program-dependency', () => {
    it('should print the slice of the statement on a line', async () => {
      await run('program-dependency', calcFile, '--format', 'json', '--slice', '7', '--no-color');

      const documents = loggedArray();
      expect(documents).toHaveLength(1);
      const document = parseGraphDocument(JSON.stringify(documents[0]));
      expect(document.metadata.functionName).toBe('calc::add');
      expect(document.nodes.map((node) => node.id)).toEqual([1]);
    });

    it('should fail when no statement is on the slice line', async () => {
      await run('program-dependency', calcFile, '--slice', '40', '--no-color');

      expect(process.exitCode).toBe(1);
      expect(errors()).toContain('No statement on line 40');
    });

    it('should refuse a directory', async () => {
      await run('program-dependency', tempDir, '--no-color');

      expect(process.exitCode).toBe(1);
      expect(errors()).toContain(`program-dependency needs a single file, but "${tempDir}" is a directory`);
    });
  });

  describe('all', () => {
    it('should print every graph keyed by name', async () => {
      await run('all', calcFile, '--format', 'json', '--no-color');

      const combined: Record<string, unknown> = JSON.parse(logged());
      expect(Object.keys(combined)).toEqual([
        'syntax-tree',
        'control-flow',
        'data-flow',
        'call-graph',
        'dependency-graph',
        'program-dependency',
      ]);
      expect(combined).toMatchObject({ 'call-graph': { graphType: 'call-graph' } });
    });

    it('should export one file per graph', async () => {
      const outDir = path.join(tempDir, 'graphs');
      await run('all', calcFile, '--export', outDir, '--no-color');

      expect(fs.readdirSync(outDir).sort()).toEqual([
        'calc.call-graph.json',
        'calc.control-flow.json',
        'calc.data-flow.json',
        'calc.dependency-graph.json',
        'calc.program-dependency.json',
        'calc.syntax-tree.json',
      ]);
      const calls = parseGraphDocument(fs.readFileSync(path.join(outDir, 'calc.call-graph.json'), 'utf-8'));
      expect(calls.graphType).toBe('call-graph');
      expect(logged()).toContain('\n== call-graph ==');
    });
  });

  describe('init', () => {
    it('should create a config file once', async () => {
      await run('init', tempDir);

      expect(fs.existsSync(path.join(tempDir, 'codegraph.config.json'))).toBe(true);
      expect(logged()).toContain(`Created ${path.join(tempDir, 'codegraph.config.json')}`);
      expect(process.exitCode).toBeUndefined();

      await run('init', tempDir);

      expect(process.exitCode).toBe(1);
      expect(errors()).toContain('already exists');
    });
  });
});
