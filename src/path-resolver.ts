/**
 * Import Path Resolver
 *
 * Resolves import specifiers to files of the analyzed file set:
 * - Relative imports (./foo, ../bar, Python's .foo) with extension and index probing
 * - Path aliases from tsconfig.json / jsconfig.json (@/components, @utils/helpers)
 * - Sibling modules for languages without relative syntax (Rust `mod x;`, C includes, Ruby)
 * - Dotted and `::` module paths (a.b.c, crate::net::tcp) matched by path suffix,
 *   and Go-style package directories
 */

import * as fs from 'fs';
import * as path from 'path';
import { getTsconfig, createPathsMatcher, type TsConfigResult } from 'get-tsconfig';

export interface PathResolverOptions {
  /** Root directory for the project (where tsconfig.json is located) */
  projectRoot: string;
  /** Absolute paths of every file in the analyzed set */
  files: string[];
  /** Pre-loaded tsconfig; looked up under projectRoot when omitted */
  tsconfigResult?: TsConfigResult | null;
}

export interface PathResolver {
  /**
   * Files an import refers to. Usually one; a Go package import yields every
   * file of the package directory. Empty when the import leaves the project.
   */
  resolve(fromFile: string, specifier: string, options?: ResolveOptions): string[];
}

export interface ResolveOptions {
  /** Try a bare specifier as a path next to the importing file first */
  relativeFirst?: boolean;
  /** Match bare specifiers against project paths; off for package-based languages */
  suffixMatch?: boolean;
}

const INDEX_STEMS = ['index', '__init__', 'mod'];
const SCRIPT_EXTENSION = /\.(?:[cm]?[jt]sx?)$/;

// Cache for tsconfig lookups per project root
const tsconfigCache = new Map<string, TsConfigResult | null>();

/**
 * Get the tsconfig (or jsconfig) for a project, with caching
 */
export function getTsconfigForProject(projectRoot: string): TsConfigResult | null {
  const cached = tsconfigCache.get(projectRoot);
  if (cached !== undefined) return cached;

  let result: TsConfigResult | null = null;
  for (const name of ['tsconfig.json', 'jsconfig.json']) {
    const configPath = path.join(projectRoot, name);
    if (fs.existsSync(configPath)) {
      result = getTsconfig(projectRoot, name);
      break;
    }
  }

  tsconfigCache.set(projectRoot, result);
  return result;
}

/**
 * Create a resolver over a fixed file set
 */
export function createPathResolver(options: PathResolverOptions): PathResolver {
  const root = path.resolve(options.projectRoot);
  const tsconfig = options.tsconfigResult === undefined ? getTsconfigForProject(root) : options.tsconfigResult;
  const pathsMatcher = tsconfig ? createPathsMatcher(tsconfig) : null;

  const files = new Set(options.files.map((file) => path.resolve(file)));
  // absolute path without extension → files
  const byStem = new Map<string, string[]>();
  // directory → files directly inside it
  const byDirectory = new Map<string, string[]>();
  for (const file of [...files].sort()) {
    append(byStem, stripExtension(file), file);
    append(byDirectory, path.dirname(file), file);
  }

  const relativeStems = [...byStem.keys()].map((stem) => ({
    stem,
    relative: path.relative(root, stem).split(path.sep).join('/'),
  }));

  function findFile(base: string, fromFile: string): string | null {
    if (files.has(base)) return base;
    const stem = base.replace(SCRIPT_EXTENSION, '');
    const direct = preferred(byStem.get(stem), fromFile);
    if (direct) return direct;
    for (const index of INDEX_STEMS) {
      const found = preferred(byStem.get(path.join(stem, index)), fromFile);
      if (found) return found;
    }
    return null;
  }

  function bySuffix(specifier: string, fromFile: string): string[] {
    const segments = specifier
      .replace(/^(?:crate|self|super)::/, '')
      .split(/::|\.|\//)
      .filter(Boolean);

    // drop trailing segments that name items rather than modules
    while (segments.length > 0) {
      const suffix = segments.join('/');
      const matches = relativeStems.filter(
        ({ relative }) =>
          relative === suffix ||
          relative.endsWith(`/${suffix}`) ||
          INDEX_STEMS.some((index) => relative === `${suffix}/${index}` || relative.endsWith(`/${suffix}/${index}`))
      );
      if (matches.length === 1) {
        return [preferred(byStem.get(matches[0].stem), fromFile) ?? matches[0].stem];
      }
      if (matches.length > 1) return [];

      const packageFiles = directoryFiles(suffix);
      if (packageFiles.length > 0) return packageFiles;
      segments.pop();
    }
    return [];
  }

  function directoryFiles(suffix: string): string[] {
    const directories = [...byDirectory.keys()].filter((directory) => {
      const relative = path.relative(root, directory).split(path.sep).join('/');
      return relative === suffix || relative.endsWith(`/${suffix}`);
    });
    return directories.length === 1 ? (byDirectory.get(directories[0]) ?? []) : [];
  }

  return {
    resolve(fromFile: string, specifier: string, resolveOptions: ResolveOptions = {}): string[] {
      const fromDir = path.dirname(path.resolve(fromFile));

      // Handle relative imports
      if (specifier.startsWith('./') || specifier.startsWith('../') || specifier === '.' || specifier === '..') {
        const found = findFile(path.resolve(fromDir, specifier), fromFile);
        return found ? [found] : [];
      }

      // Python relative imports: `.sibling`, `..pkg.mod`
      const dotted = /^(\.+)([\w.]*)$/.exec(specifier);
      if (dotted) {
        let base = fromDir;
        for (let i = 1; i < dotted[1].length; i++) base = path.dirname(base);
        const found = findFile(path.join(base, ...dotted[2].split('.').filter(Boolean)), fromFile);
        return found ? [found] : [];
      }

      // Handle path aliases
      if (pathsMatcher) {
        for (const candidate of pathsMatcher(specifier)) {
          const found = findFile(path.resolve(candidate), fromFile);
          if (found) return [found];
        }
      }

      if (resolveOptions.relativeFirst) {
        const sibling = findFile(path.resolve(fromDir, specifier), fromFile);
        if (sibling) return [sibling];
      }

      if (path.isAbsolute(specifier)) {
        const found = findFile(specifier, fromFile);
        return found ? [found] : [];
      }

      return resolveOptions.suffixMatch === false ? [] : bySuffix(specifier, fromFile);
    },
  };
}

/**
 * Among files sharing a stem, the one with the importer's extension, else the first
 */
function preferred(candidates: string[] | undefined, fromFile: string): string | null {
  if (!candidates || candidates.length === 0) return null;
  const extension = path.extname(fromFile);
  return candidates.find((candidate) => path.extname(candidate) === extension) ?? candidates[0];
}

function stripExtension(file: string): string {
  const extension = path.extname(file);
  return extension ? file.slice(0, -extension.length) : file;
}

function append(map: Map<string, string[]>, key: string, value: string): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}
