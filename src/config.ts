import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { InvalidRequestError, errorMessage } from './errors';

/**
 * Configuration schema for codegraph
 */
export interface CodegraphConfig {
  /**
   * File extensions to analyze, with or without the dot. Empty means every
   * extension a language profile claims.
   * @example ["ts", "tsx"]
   */
  extensions?: string[];

  /**
   * Glob patterns of files to leave out, on top of the defaults
   * @example ["src/generated/**", "**\/*.test.ts"]
   */
  ignore?: string[];

  /**
   * Regular expressions (as strings) for function names that count as entry
   * points and are never reported dead
   * @default ["^main$"]
   */
  entryPoints?: string[];

  /**
   * Run per-file work on a worker pool. Unset means: only for batches of 20
   * files or more.
   */
  parallel?: boolean;

  /**
   * Worker pool size; defaults to one less than the CPU count
   */
  workers?: number;

  /** Variable names whose values are taint sources */
  taintSources?: string[];

  /** Variable or function names that must not receive tainted values */
  taintSinks?: string[];

  /**
   * Most groups of independent statements listed per function
   * @default 20
   */
  maxParallelGroups?: number;
}

export type ResolvedConfig = Required<Omit<CodegraphConfig, 'parallel' | 'workers'>> &
  Pick<CodegraphConfig, 'parallel' | 'workers'>;

const configSchema = z
  .object({
    extensions: z.array(z.string()).optional(),
    ignore: z.array(z.string()).optional(),
    entryPoints: z.array(z.string()).optional(),
    parallel: z.boolean().optional(),
    workers: z.number().int().positive().optional(),
    taintSources: z.array(z.string()).optional(),
    taintSinks: z.array(z.string()).optional(),
    maxParallelGroups: z.number().int().positive().optional(),
  })
  .strict();

export const CONFIG_FILES = ['codegraph.config.js', 'codegraph.config.json', '.codegraphrc', '.codegraphrc.json'];

export const DEFAULT_IGNORE = [
  '**/node_modules/**',
  '**/.git/**',
  '**/dist/**',
  '**/build/**',
  '**/target/**',
  '**/__pycache__/**',
  '**/vendor/**',
];

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
  extensions: [],
  ignore: [],
  entryPoints: ['^main$'],
  taintSources: [],
  taintSinks: [],
  maxParallelGroups: 20,
};

/**
 * Result of loading config, including where it came from
 */
export interface LoadConfigResult {
  config: ResolvedConfig;
  configPath: string | null;
}

/**
 * Load configuration from the nearest config file
 * @param startDir Directory to start searching from
 * @returns Merged configuration with defaults
 */
export function loadConfig(startDir: string): ResolvedConfig {
  return loadConfigWithInfo(startDir).config;
}

/**
 * Load configuration and report which file it came from. A config file that
 * cannot be read or does not validate fails the command.
 */
export function loadConfigWithInfo(startDir: string): LoadConfigResult {
  const configPath = findConfigFile(startDir);
  const userConfig = configPath ? loadConfigFile(configPath) : {};

  return {
    config: mergeConfig(DEFAULT_CONFIG, userConfig),
    configPath,
  };
}

/**
 * Find the nearest config file by walking up the directory tree
 */
export function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);
  if (fs.existsSync(dir) && fs.statSync(dir).isFile()) dir = path.dirname(dir);
  const root = path.parse(dir).root;

  while (true) {
    for (const configFile of CONFIG_FILES) {
      const configPath = path.join(dir, configFile);
      if (fs.existsSync(configPath)) {
        return configPath;
      }
    }
    if (dir === root) return null;
    dir = path.dirname(dir);
  }
}

/**
 * Load and validate a config file
 */
export function loadConfigFile(configPath: string): CodegraphConfig {
  const ext = path.extname(configPath);
  let raw: unknown;

  try {
    if (ext === '.json' || path.basename(configPath) === '.codegraphrc') {
      raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } else if (ext === '.js') {
      // For CommonJS config files, use require
      const loaded: unknown = require(configPath);
      raw = isRecord(loaded) && 'default' in loaded ? loaded.default : loaded;
    } else {
      throw new Error(`Unsupported config file format: ${ext}`);
    }
  } catch (error) {
    throw new InvalidRequestError(`Could not load config from ${configPath}: ${errorMessage(error)}`);
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new InvalidRequestError(`Invalid config in ${configPath}: ${issues.join('; ')}`);
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Merge user config over defaults. Lists of patterns accumulate; the rest is
 * replaced.
 */
export function mergeConfig(defaults: ResolvedConfig, userConfig: CodegraphConfig): ResolvedConfig {
  return {
    extensions: userConfig.extensions ?? defaults.extensions,
    ignore: [...defaults.ignore, ...(userConfig.ignore ?? [])],
    entryPoints: userConfig.entryPoints ?? defaults.entryPoints,
    parallel: userConfig.parallel ?? defaults.parallel,
    workers: userConfig.workers ?? defaults.workers,
    taintSources: [...defaults.taintSources, ...(userConfig.taintSources ?? [])],
    taintSinks: [...defaults.taintSinks, ...(userConfig.taintSinks ?? [])],
    maxParallelGroups: userConfig.maxParallelGroups ?? defaults.maxParallelGroups,
  };
}

/**
 * Write a default `codegraph.config.json` into `dir`. Refuses to overwrite.
 */
export function writeDefaultConfig(dir: string): string {
  const configPath = path.join(path.resolve(dir), 'codegraph.config.json');
  if (fs.existsSync(configPath)) {
    throw new InvalidRequestError(`${configPath} already exists`);
  }

  fs.writeFileSync(configPath, `${JSON.stringify(DEFAULT_CONFIG, null, 2)}\n`, 'utf-8');
  return configPath;
}
