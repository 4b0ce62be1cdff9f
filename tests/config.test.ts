import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfig,
  loadConfigWithInfo,
  mergeConfig,
  writeDefaultConfig,
} from '../src/config';
import { InvalidRequestError } from '../src/errors';

describe('Config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'codegraph-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should return default config when no config file exists', () => {
      expect(loadConfigWithInfo(tempDir)).toEqual({ config: DEFAULT_CONFIG, configPath: null });
    });

    it('should load JSON config file', () => {
      fs.writeFileSync(
        path.join(tempDir, 'codegraph.config.json'),
        JSON.stringify({ extensions: ['ts'], ignore: ['generated/**'], taintSources: ['input'], maxParallelGroups: 5 })
      );

      const config = loadConfig(tempDir);

      expect(config.extensions).toEqual(['ts']);
      expect(config.ignore).toEqual(['generated/**']);
      expect(config.taintSources).toEqual(['input']);
      expect(config.entryPoints).toEqual(['^main$']);
      expect(config.maxParallelGroups).toBe(5);
    });

    it('should load .codegraphrc as JSON', () => {
      fs.writeFileSync(path.join(tempDir, '.codegraphrc'), JSON.stringify({ entryPoints: ['^start$'] }));

      expect(loadConfig(tempDir).entryPoints).toEqual(['^start$']);
    });

    it('should load a CommonJS config file', () => {
      fs.writeFileSync(path.join(tempDir, 'codegraph.config.js'), 'module.exports = { taintSinks: ["db.run"] };\n');

      expect(loadConfig(tempDir).taintSinks).toEqual(['db.run']);
    });

    it('should find config in a parent directory', () => {
      const nested = path.join(tempDir, 'src', 'deep');
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(tempDir, '.codegraphrc.json'), JSON.stringify({ workers: 2 }));

      const result = loadConfigWithInfo(nested);

      expect(result.configPath).toBe(path.join(tempDir, '.codegraphrc.json'));
      expect(result.config.workers).toBe(2);
    });

    it('should start the search from a file argument', () => {
      const file = path.join(tempDir, 'main.ts');
      fs.writeFileSync(file, '');
      fs.writeFileSync(path.join(tempDir, 'codegraph.config.json'), '{}');

      expect(findConfigFile(file)).toBe(path.join(tempDir, 'codegraph.config.json'));
    });

    it('should reject unknown keys', () => {
      fs.writeFileSync(path.join(tempDir, 'codegraph.config.json'), JSON.stringify({ severity: 'high' }));

      expect(() => loadConfig(tempDir)).toThrow(InvalidRequestError);
      expect(() => loadConfig(tempDir)).toThrow('Invalid config in');
    });

    it('should reject values of the wrong type', () => {
      fs.writeFileSync(path.join(tempDir, 'codegraph.config.json'), JSON.stringify({ workers: 0 }));

      expect(() => loadConfig(tempDir)).toThrow(/workers: /);
    });

    it('should reject malformed JSON', () => {
      fs.writeFileSync(path.join(tempDir, 'codegraph.config.json'), '{ "extensions": [');

      expect(() => loadConfig(tempDir)).toThrow('Could not load config from');
    });
  });

  describe('mergeConfig', () => {
    it('should accumulate pattern lists and replace the rest', () => {
      const base = mergeConfig(DEFAULT_CONFIG, { ignore: ['a/**'], taintSinks: ['exec'] });
      const merged = mergeConfig(base, { ignore: ['b/**'], entryPoints: ['^run$'], parallel: true });

      expect(merged.ignore).toEqual(['a/**', 'b/**']);
      expect(merged.taintSinks).toEqual(['exec']);
      expect(merged.entryPoints).toEqual(['^run$']);
      expect(merged.parallel).toBe(true);
    });
  });

  describe('writeDefaultConfig', () => {
    it('should write the defaults and refuse to overwrite them', () => {
      const written = writeDefaultConfig(tempDir);

      expect(written).toBe(path.join(tempDir, 'codegraph.config.json'));
      expect(JSON.parse(fs.readFileSync(written, 'utf-8'))).toEqual(DEFAULT_CONFIG);
      expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
      expect(() => writeDefaultConfig(tempDir)).toThrow('already exists');
    });
  });
});
