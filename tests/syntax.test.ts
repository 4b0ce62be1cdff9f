import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GraphError, IOFailureError, ParseFailureError } from '../src/errors';
import { GENERIC_PROFILE_ID, LanguageRegistry } from '../src/language/language-registry';
import { extractSyntaxTree, modulePathOf, readSourceFile } from '../src/syntax/extractor';
import { scanImports } from '../src/syntax/import-scanner';

const registry = LanguageRegistry.load();

function profile(id: string) {
  const found = registry.get(id);
  if (!found) throw new Error(`no profile ${id}`);
  return found;
}

describe('Syntax extraction', () => {
  describe('language registry', () => {
    it('should pick a profile by file extension', () => {
      expect(registry.forFile('/project/app.tsx')?.id).toBe('typescript');
      expect(registry.forFile('/project/main.PY')?.id).toBe('python');
      expect(registry.forFile('/project/notes.xyz')).toBeUndefined();
      expect(registry.generic.id).toBe(GENERIC_PROFILE_ID);
    });

    it('should reject a profile table without a generic profile', () => {
      expect(() => LanguageRegistry.fromTable({ reservedWords: [], profiles: [] })).toThrow(GraphError);
    });
  });

  describe('module paths', () => {
    it('should be project-relative without the extension', () => {
      expect(modulePathOf('/project/src/store.ts', '/project')).toBe('src/store');
    });
  });

  describe('TypeScript', () => {
    const source = [
      "import { readFile } from 'fs';",
      'export class Store {',
      '  private items: string[] = [];',
      '  add(item: string): void {',
      '    this.items.push(item);',
      '  }',
      '}',
      'export async function load(path: string): Promise<string> {',
      '  return readFile(path);',
      '}',
      'const LIMIT = 10;',
    ].join('\n');

    it('should list declarations in source order', () => {
      const { tree, diagnostics } = extractSyntaxTree('/project/src/store.ts', source, registry, '/project');

      expect(diagnostics).toEqual([]);
      expect(tree.modulePath).toBe('src/store');
      expect(tree.strategy).toBe('grammar');
      expect(tree.heuristic).toBe(false);
      expect(tree.decls.map((decl) => [decl.kind, decl.name, decl.parent])).toEqual([
        ['import', 'fs', null],
        ['class', 'Store', null],
        ['function', 'add', 1],
        ['call-site', 'push', 2],
        ['function', 'load', null],
        ['call-site', 'readFile', 4],
        ['variable', 'LIMIT', null],
      ]);
    });

    it('should record class members and function signatures', () => {
      const { tree } = extractSyntaxTree('/project/src/store.ts', source, registry, '/project');
      const [imported, store, add, push, load] = tree.decls;

      expect(imported).toMatchObject({ kind: 'import', source: 'fs', importedNames: ['readFile'] });
      expect(store).toMatchObject({ kind: 'class', methods: ['add'], fields: ['items'] });
      expect(add).toMatchObject({
        qualifiedName: 'src/store::Store.add',
        visibility: 'public',
        className: 'Store',
        isAsync: false,
      });
      expect(push).toMatchObject({ callee: 'push', receiver: 'this.items' });
      expect(load).toMatchObject({
        qualifiedName: 'src/store::load',
        visibility: 'exported',
        parameters: ['path'],
        returnType: 'Promise<string>',
        isAsync: true,
      });
      expect(load).toMatchObject({ body: [{ kind: 'return', line: 9 }] });
      expect(tree.exportedNames).toEqual(['Store', 'load']);
    });

    it('should throw a parse failure with its location', () => {
      let failure: unknown;
      try {
        extractSyntaxTree('/project/bad.ts', 'const x = ;', registry, '/project');
      } catch (error) {
        failure = error;
      }

      expect(failure).toBeInstanceOf(ParseFailureError);
      expect(failure).toMatchObject({ file: '/project/bad.ts', line: 1, code: 'parse-failure' });
    });
  });

  describe('pattern-based languages', () => {
    it('should extract Python classes, methods and functions', () => {
      const source = ['class Greeter:', '    def greet(self, name):', '        return name', '', 'def _helper():', '    pass', ''].join(
        '\n'
      );
      const { tree } = extractSyntaxTree('/project/greeter.py', source, registry, '/project');

      expect(tree.language).toBe('python');
      expect(tree.heuristic).toBe(true);
      expect(tree.decls.map((decl) => [decl.kind, decl.qualifiedName, decl.visibility, decl.parent])).toEqual([
        ['class', 'greeter::Greeter', 'public', null],
        ['function', 'greeter::Greeter.greet', 'public', 0],
        ['function', 'greeter::_helper', 'private', null],
      ]);
      expect(tree.decls[1]).toMatchObject({ parameters: ['name'] });
      expect(tree.decls[0]).toMatchObject({ methods: ['greet'] });
      expect(tree.exportedNames).toEqual(['Greeter']);
    });

    it('should fall back to the generic profile with a diagnostic', () => {
      const { tree, diagnostics } = extractSyntaxTree('/project/notes.xyz', 'plain text\n', registry, '/project');

      expect(tree.language).toBe(GENERIC_PROFILE_ID);
      expect(diagnostics).toEqual([
        {
          file: '/project/notes.xyz',
          kind: 'unsupported-language',
          message: 'No language profile for ".xyz", using generic patterns',
        },
      ]);
    });
  });

  describe('import scanning', () => {
    it('should find every import form outside comments', () => {
      const source = [
        "import a from './a';",
        "export * from './b';",
        "const c = require('./c');",
        "const d = import('./d');",
        "// import e from './e';",
      ].join('\n');

      expect(scanImports(source, profile('typescript')).map((item) => [item.specifier, item.line])).toEqual([
        ['./a', 1],
        ['./b', 2],
        ['./c', 3],
        ['./d', 4],
      ]);
    });

    it('should read the names a Python import binds', () => {
      const imports = scanImports('from pkg.util import load, save as store\nimport os\n', profile('python'));

      expect(imports).toEqual([
        { specifier: 'pkg.util', names: ['load', 'store'], line: 1 },
        { specifier: 'os', names: [], line: 2 },
      ]);
    });
  });

  describe('reading files', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'codegraph-syntax-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should read a text file', () => {
      const file = path.join(tempDir, 'a.ts');
      fs.writeFileSync(file, 'export const a = 1;\n');

      expect(readSourceFile(file)).toBe('export const a = 1;\n');
    });

    it('should refuse missing and binary files', () => {
      const binary = path.join(tempDir, 'blob.ts');
      fs.writeFileSync(binary, Buffer.from([0x61, 0x00, 0x62]));

      expect(() => readSourceFile(path.join(tempDir, 'missing.ts'))).toThrow(IOFailureError);
      expect(() => readSourceFile(binary)).toThrow(IOFailureError);
    });
  });
});
