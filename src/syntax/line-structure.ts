/**
 * Nesting recovery for languages without a structural grammar.
 *
 * Brace-delimited code is cut into statements at `;`, at line ends and at block
 * braces; indentation-delimited code is nested by indent width. Both produce the
 * same LogicalLine tree, which pattern-statements turns into statements.
 */

import { indentOf } from './source-text';

export interface LogicalLine {
  /** Masked text (comments and string contents blanked), trimmed */
  text: string;
  /** Original text, trimmed */
  raw: string;
  line: number;
  endLine: number;
  /** Nested block, or null when the line opens none */
  children: LogicalLine[] | null;
}

/**
 * Both views of one file: masked and original text at identical offsets
 */
export class SourceView {
  readonly masked: string;
  readonly raw: string;
  readonly maskedLines: string[];
  readonly rawLines: string[];
  private readonly lineStarts: number[];

  constructor(masked: string, raw: string) {
    this.masked = masked;
    this.raw = raw;
    this.maskedLines = masked.split('\n');
    this.rawLines = raw.split('\n');
    this.lineStarts = [0];
    for (let i = 0; i < masked.length; i++) {
      if (masked[i] === '\n') this.lineStarts.push(i + 1);
    }
  }

  /** 1-based line of an offset */
  lineOf(offset: number): number {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.lineStarts[mid] <= offset) low = mid;
      else high = mid - 1;
    }
    return low + 1;
  }

  /** Offset of the first character of a 1-based line */
  offsetOf(line: number): number {
    return this.lineStarts[Math.min(Math.max(line, 1), this.lineStarts.length) - 1];
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  maskedLine(line: number): string {
    return this.maskedLines[line - 1] ?? '';
  }

  rawLine(line: number): string {
    return this.rawLines[line - 1] ?? '';
  }
}

const CONTINUATION = /(?:[+*/%=&|^<>!?.,\\-])$/;
const INCREMENT = /(?:\+\+|--)$/;

/**
 * Statement tree of the brace-delimited region [start, end).
 * `opensBlock` decides whether a `{` after the given header starts a statement
 * block; otherwise the brace belongs to an expression (struct literal, closure).
 */
export function braceBlocks(
  view: SourceView,
  start: number,
  end: number,
  opensBlock: (header: string) => boolean
): LogicalLine[] {
  const { masked, raw } = view;
  const root: LogicalLine[] = [];
  const stack: LogicalLine[][] = [root];
  const awaitingBlock = new Set<LogicalLine>();
  let depth = 0;
  let tokenStart = -1;

  const top = () => stack[stack.length - 1];

  const flush = (stop: number): LogicalLine | null => {
    if (tokenStart === -1) return null;
    const text = masked.slice(tokenStart, stop).trim();
    const from = tokenStart;
    tokenStart = -1;
    if (!text) return null;

    const node: LogicalLine = {
      text,
      raw: raw.slice(from, stop).trim(),
      line: view.lineOf(from),
      endLine: view.lineOf(Math.max(from, stop - 1)),
      children: null,
    };
    top().push(node);
    return node;
  };

  for (let i = start; i < end; i++) {
    const ch = masked[i];

    if (depth > 0) {
      if (ch === '(' || ch === '[' || ch === '{') depth++;
      else if (ch === ')' || ch === ']' || ch === '}') depth--;
      continue;
    }

    switch (ch) {
      case '(':
      case '[':
        if (tokenStart === -1) tokenStart = i;
        depth++;
        break;
      case ';': {
        // Go-style headers carry unparenthesised clauses: `for i := 0; i < n; i++ {`
        const pending = tokenStart === -1 ? '' : masked.slice(tokenStart, i).trim();
        const lineRest = masked.slice(i + 1, end).split('\n')[0];
        if (/^\w+\s+[^(\s]/.test(pending) && opensBlock(pending) && lineRest.includes('{')) break;
        flush(i);
        break;
      }
      case '\n': {
        if (tokenStart === -1) break;
        const pending = masked.slice(tokenStart, i).trim();
        const nextChar = masked.slice(i + 1, end).trimStart().charAt(0);
        const continues =
          (CONTINUATION.test(pending) && !INCREMENT.test(pending)) ||
          (nextChar === '.' && !masked.slice(i + 1, end).trimStart().startsWith('..'));
        if (!continues) {
          const node = flush(i);
          if (node && opensBlock(node.text)) awaitingBlock.add(node);
        }
        break;
      }
      case '{': {
        const header = tokenStart === -1 ? '' : masked.slice(tokenStart, i).trim();
        if (header === '') {
          tokenStart = -1;
          const siblings = top();
          const previous = siblings[siblings.length - 1];
          if (previous && previous.children === null && awaitingBlock.has(previous)) {
            previous.children = [];
            stack.push(previous.children);
          } else {
            const children: LogicalLine[] = [];
            siblings.push({ text: '', raw: '', line: view.lineOf(i), endLine: view.lineOf(i), children });
            stack.push(children);
          }
        } else if (opensBlock(header)) {
          const node = flush(i);
          if (node) {
            node.children = [];
            stack.push(node.children);
          }
        } else {
          depth++;
        }
        break;
      }
      case '}':
        flush(i);
        if (stack.length > 1) stack.pop();
        break;
      default:
        if (tokenStart === -1 && !/\s/.test(ch)) tokenStart = i;
    }
  }

  flush(end);
  return root;
}

/**
 * Statement tree of lines [firstLine, lastLine] nested by indentation.
 * Lines that only hold a closing keyword (`end`) are dropped.
 */
export function indentBlocks(
  view: SourceView,
  firstLine: number,
  lastLine: number,
  closers: string[]
): LogicalLine[] {
  const root: LogicalLine[] = [];
  const stack: Array<{ indent: number; children: LogicalLine[] }> = [{ indent: -1, children: root }];
  const closerPattern =
    closers.length > 0 ? new RegExp(`^(?:${closers.map(escapeRegExp).join('|')})[\\s).,;]*$`) : null;

  for (let line = firstLine; line <= lastLine; line++) {
    let text = view.maskedLine(line);
    if (!text.trim()) continue;

    const startLine = line;
    const indent = indentOf(text);
    let rawText = view.rawLine(line);

    while (line < lastLine && (bracketBalance(text) > 0 || text.trimEnd().endsWith('\\'))) {
      line++;
      text += '\n' + view.maskedLine(line);
      rawText += '\n' + view.rawLine(line);
    }

    const trimmed = text.trim();
    if (closerPattern?.test(trimmed)) continue;

    const node: LogicalLine = {
      text: trimmed,
      raw: rawText.trim(),
      line: startLine,
      endLine: line,
      children: null,
    };

    while (stack.length > 1 && indent <= stack[stack.length - 1].indent) {
      stack.pop();
    }
    const parent = stack[stack.length - 1];
    parent.children.push(node);

    node.children = [];
    stack.push({ indent, children: node.children });
  }

  pruneEmpty(root);
  return root;
}

function pruneEmpty(nodes: LogicalLine[]): void {
  for (const node of nodes) {
    if (node.children && node.children.length === 0) {
      node.children = null;
    } else if (node.children) {
      pruneEmpty(node.children);
    }
  }
}

function bracketBalance(text: string): number {
  let balance = 0;
  for (const ch of text) {
    if (ch === '(' || ch === '[' || ch === '{') balance++;
    else if (ch === ')' || ch === ']' || ch === '}') balance--;
  }
  return balance;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
