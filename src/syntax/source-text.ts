import type { LanguageProfile } from '../language/language-registry';

const STRING_DELIMITERS = ['"""', "'''", '"', "'", '`'];

/**
 * Replace comments with spaces and blank the inside of string literals, keeping
 * every character offset and line break where it was. Pattern matching then runs
 * on the cleaned text while labels and literal values come from the original.
 * With `keepStrings` only comments are removed (import scanning needs the paths).
 */
export function maskSource(
  source: string,
  profile: LanguageProfile,
  options: { keepStrings?: boolean } = {}
): string {
  const out: string[] = [];
  let i = 0;

  while (i < source.length) {
    const blockOpen = profile.blockComment?.[0];
    if (blockOpen && source.startsWith(blockOpen, i)) {
      const close = profile.blockComment?.[1] ?? '';
      const end = source.indexOf(close, i + blockOpen.length);
      const stop = end === -1 ? source.length : end + close.length;
      out.push(blank(source.slice(i, stop)));
      i = stop;
      continue;
    }

    const lineComment = profile.lineComment.find((marker) => source.startsWith(marker, i));
    if (lineComment) {
      const end = source.indexOf('\n', i);
      const stop = end === -1 ? source.length : end;
      out.push(blank(source.slice(i, stop)));
      i = stop;
      continue;
    }

    const delimiter = STRING_DELIMITERS.find((d) => source.startsWith(d, i));
    if (delimiter) {
      const stop = findStringEnd(source, i, delimiter, profile);
      if (stop !== null) {
        const inner = source.slice(i + delimiter.length, stop - delimiter.length);
        out.push(delimiter, options.keepStrings ? inner : blank(inner), delimiter);
        i = stop;
        continue;
      }
    }

    out.push(source[i]);
    i++;
  }

  return out.join('');
}

/**
 * Offset just past the closing delimiter, or null when this is not a string start
 */
function findStringEnd(
  source: string,
  start: number,
  delimiter: string,
  profile: LanguageProfile
): number | null {
  if (delimiter === "'" && profile.singleQuote === 'char') {
    const match = /^'(?:\\.|[^\\'\n])'/.exec(source.slice(start, start + 4));
    return match ? start + match[0].length : null;
  }

  const multiline = delimiter.length === 3 || delimiter === '`';
  let i = start + delimiter.length;
  while (i < source.length) {
    const ch = source[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '\n' && !multiline) return null;
    if (source.startsWith(delimiter, i)) return i + delimiter.length;
    i++;
  }
  return null;
}

function blank(text: string): string {
  return text.replace(/[^\n]/g, ' ');
}

export function indentOf(line: string): number {
  let width = 0;
  for (const ch of line) {
    if (ch === ' ') width++;
    else if (ch === '\t') width += 4;
    else break;
  }
  return width;
}

/**
 * First line of a source excerpt, shortened for labels
 */
export function excerpt(text: string, max = 60): string {
  const firstLine = text.trim().split('\n')[0].trim();
  return firstLine.length > max ? `${firstLine.slice(0, max - 3)}...` : firstLine;
}

/**
 * Index of the bracket closing the one at `open`, or -1
 */
export function matchingBracket(text: string, open: number): number {
  const pairs: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
  const opener = text[open];
  const closer = pairs[opener];
  if (!closer) return -1;

  let depth = 0;
  for (let i = open; i < text.length; i++) {
    if (text[i] === opener) depth++;
    else if (text[i] === closer) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Split at `separator` where no bracket is open
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth = Math.max(0, depth - 1);

    if (depth === 0 && text.startsWith(separator, i)) {
      parts.push(current);
      current = '';
      i += separator.length - 1;
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts;
}
