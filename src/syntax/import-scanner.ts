import type { LanguageProfile } from '../language/language-registry';
import { maskSource } from './source-text';

export interface ImportReference {
  /** Module specifier as written: `./util`, `crate::net::tcp`, `os.path` */
  specifier: string;
  /** Local names the import binds, when the statement lists them */
  names: string[];
  line: number;
}

/**
 * Import statements of one file, found with the profile's import patterns over
 * the text with comments removed.
 */
export function scanImports(source: string, profile: LanguageProfile): ImportReference[] {
  const text = maskSource(source, profile, { keepStrings: true });
  const references: ImportReference[] = [];
  const seen = new Set<string>();

  const add = (reference: ImportReference) => {
    const key = `${reference.line}:${reference.specifier}`;
    if (seen.has(key)) return;
    seen.add(key);
    references.push(reference);
  };

  for (const pattern of profile.importPatterns) {
    for (const match of text.matchAll(pattern)) {
      const groups = match.groups ?? {};
      const start = match.index ?? 0;
      const line = lineAt(text, start);

      if (groups.block !== undefined) {
        const blockStart = start + match[0].indexOf(groups.block);
        for (const quoted of groups.block.matchAll(/"([^"]+)"/g)) {
          add({ specifier: quoted[1], names: [], line: lineAt(text, blockStart + (quoted.index ?? 0)) });
        }
        continue;
      }

      if (groups.module === undefined) continue;
      const names = groups.names ? bindingNames(groups.names) : [];
      for (const specifier of groups.module.split(',')) {
        const cleaned = specifier.replace(/\s+as\s+\w+\s*$/, '').trim();
        if (cleaned) add({ specifier: cleaned, names, line });
      }
    }
  }

  return references.sort((a, b) => a.line - b.line);
}

/**
 * `a, b as c, (d)` → the names bound locally: a, c, d
 */
function bindingNames(list: string): string[] {
  return list
    .replace(/[()]/g, ' ')
    .split(',')
    .map((part) => {
      const alias = /\bas\s+([\w$]+)/.exec(part);
      return alias ? alias[1] : part.trim().split(/\s+/)[0];
    })
    .filter((name): name is string => Boolean(name));
}

function lineAt(text: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === '\n') line++;
  }
  return line;
}
