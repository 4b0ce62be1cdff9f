/**
 * Syntax extraction entry point.
 *
 * The strategy is picked per language when the profile is looked up: a grammar
 * when the profile names one, line patterns otherwise.
 */

import * as fs from 'fs';
import * as path from 'path';
import { IOFailureError, type Diagnostic } from '../errors';
import type { LanguageProfile, LanguageRegistry } from '../language/language-registry';
import { extractWithGrammar } from './babel-extractor';
import { extractWithPatterns, type ExtractionInput } from './pattern-extractor';
import type { SyntaxTree } from './syntax-types';

export type ExtractionStrategy =
  | { kind: 'grammar'; grammar: 'babel'; profile: LanguageProfile }
  | { kind: 'pattern'; profile: LanguageProfile };

export interface ExtractionResult {
  tree: SyntaxTree;
  diagnostics: Diagnostic[];
}

export function strategyFor(profile: LanguageProfile): ExtractionStrategy {
  return profile.grammar === 'babel'
    ? { kind: 'grammar', grammar: profile.grammar, profile }
    : { kind: 'pattern', profile };
}

export function runStrategy(strategy: ExtractionStrategy, input: ExtractionInput): SyntaxTree {
  switch (strategy.kind) {
    case 'grammar':
      return extractWithGrammar(input, strategy.profile);
    case 'pattern':
      return extractWithPatterns(input, strategy.profile);
  }
}

/**
 * Module path used to qualify names: project-relative, forward slashes, no extension
 */
export function modulePathOf(file: string, root: string): string {
  const relative = path.relative(root, file) || path.basename(file);
  return relative.split(path.sep).join('/').replace(/\.[^./]+$/, '');
}

/**
 * Extract the declaration tree of one file's text.
 * A file without a matching profile is read with the generic profile and an
 * `unsupported-language` diagnostic.
 * @throws ParseFailureError when the grammar rejects the text
 */
export function extractSyntaxTree(
  file: string,
  source: string,
  registry: LanguageRegistry,
  root: string = path.dirname(file)
): ExtractionResult {
  const diagnostics: Diagnostic[] = [];
  let profile = registry.forFile(file);
  if (!profile) {
    profile = registry.generic;
    diagnostics.push({
      file,
      kind: 'unsupported-language',
      message: `No language profile for "${path.extname(file) || path.basename(file)}", using generic patterns`,
    });
  }

  const tree = runStrategy(strategyFor(profile), { file, source, modulePath: modulePathOf(file, root) });
  return { tree, diagnostics };
}

/**
 * Read a file as text.
 * @throws IOFailureError when the file cannot be read or is not text
 */
export function readSourceFile(file: string): string {
  let buffer: Buffer;
  try {
    buffer = fs.readFileSync(file);
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : 'unknown';
    throw new IOFailureError(file, `Cannot read ${file} (${code})`);
  }
  if (buffer.includes(0)) {
    throw new IOFailureError(file, `${file} is not a text file`);
  }
  return buffer.toString('utf-8');
}
