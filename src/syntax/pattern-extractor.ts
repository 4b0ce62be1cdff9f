/**
 * Declaration extraction for languages without a structural grammar.
 *
 * Declarations are found line by line with the profile's patterns. Nesting is
 * recovered from brace depth or indentation, so class membership and nested
 * function boundaries are approximations; trees built here are marked heuristic.
 */

import type { LanguageProfile } from '../language/language-registry';
import { scanImports } from './import-scanner';
import { braceBlocks, indentBlocks, SourceView, type LogicalLine } from './line-structure';
import { opensBlock, toStatements, type PatternContext } from './pattern-statements';
import { indentOf, maskSource, matchingBracket, splitTopLevel } from './source-text';
import { findCalls } from './text-facts';
import {
  StatementIds,
  type CallFact,
  type CallSiteDecl,
  type ClassDecl,
  type DeclNode,
  type FunctionDecl,
  type ImportDecl,
  type Statement,
  type SyntaxTree,
  type VariableDecl,
  type Visibility,
} from './syntax-types';

export interface ExtractionInput {
  file: string;
  source: string;
  modulePath: string;
}

interface FunctionMatch {
  name: string;
  params: string;
  ret: string | null;
  isAsync: boolean;
  vis: string | null;
  /** Type a method is declared on outside its class body (Go receivers, `Foo::bar`) */
  owner: string | null;
}

interface Span {
  start: number;
  end: number;
}

interface BodySpan extends Span {
  /** Brace bodies: offsets of `{` and `}` */
  open: number;
  close: number;
  /** Indented bodies: first line after the header */
  bodyStart: number;
  /** Same-line body after the header (`def f(x): return x`) */
  inline: string;
}

/** Words that can precede `name(...)` without making it a declaration */
const STATEMENT_WORDS = new Set(['return', 'else', 'new', 'throw', 'case', 'delete', 'await', 'yield', 'goto', 'not']);

export function extractWithPatterns(input: ExtractionInput, profile: LanguageProfile): SyntaxTree {
  const masked = maskSource(input.source, profile);
  const view = new SourceView(masked, input.source);
  const decls: DeclNode[] = [];
  const parentOf = new Map<DeclNode, DeclNode>();
  const classes: Array<{ decl: ClassDecl; span: Span }> = [];
  const functions: Array<{ decl: FunctionDecl; span: BodySpan }> = [];

  const ctx: PatternContext = {
    profile,
    ids: new StatementIds(),
    functionName: (header) => matchFunction(header, profile)?.name ?? null,
  };

  for (let line = 1; line <= view.lineCount; line++) {
    const text = view.maskedLine(line);
    const className = matchClass(text, profile);
    if (className) {
      const span = bodySpan(view, line, profile);
      const decl: ClassDecl = {
        kind: 'class',
        id: -1,
        name: className,
        qualifiedName: `${input.modulePath}::${className}`,
        file: input.file,
        range: { start: line, end: span.end },
        visibility: visibilityOf(className, null, profile),
        language: profile.id,
        parent: null,
        methods: [],
        fields: [],
      };
      classes.push({ decl, span });
      decls.push(decl);
    }
  }

  for (let line = 1; line <= view.lineCount; line++) {
    const text = view.maskedLine(line);
    if (matchClass(text, profile)) continue;
    const match = matchFunction(text, profile);
    if (!match) continue;

    const span = bodySpan(view, line, profile);
    const enclosingClass = innermost(classes, line);
    const className = match.owner ?? enclosingClass?.decl.name ?? null;
    ctx.ids = new StatementIds();
    const body = toStatements(bodyLines(view, span, profile, ctx), ctx);

    const decl: FunctionDecl = {
      kind: 'function',
      id: -1,
      name: match.name,
      qualifiedName: `${input.modulePath}::${className ? `${className}.` : ''}${match.name}`,
      file: input.file,
      range: { start: line, end: span.end },
      visibility: visibilityOf(match.name, match.vis, profile),
      language: profile.id,
      parent: null,
      parameters: parseParameters(match.params, profile),
      returnType: match.ret,
      isAsync: match.isAsync,
      className,
      body,
      statementCount: ctx.ids.count,
    };
    functions.push({ decl, span });
    decls.push(decl);
  }

  for (const fn of functions) {
    const outer = innermost(
      functions.filter((other) => other !== fn),
      fn.span.start,
      fn.span.end
    );
    const cls = innermost(classes, fn.span.start);
    if (outer && (!cls || outer.span.start > cls.span.start)) {
      parentOf.set(fn.decl, outer.decl);
      // functions run in line order, so the outer name is already final
      fn.decl.className = null;
      fn.decl.qualifiedName = `${outer.decl.qualifiedName}.${fn.decl.name}`;
    } else if (cls) {
      parentOf.set(fn.decl, cls.decl);
      cls.decl.methods.push(fn.decl.name);
    } else if (fn.decl.className) {
      const owner = classes.find((c) => c.decl.name === fn.decl.className);
      if (owner) owner.decl.methods.push(fn.decl.name);
    }

    for (const call of callsIn(fn.decl.body)) {
      const site = callSite(call.fact, call.line, fn.decl, input, profile);
      parentOf.set(site, fn.decl);
      decls.push(site);
    }
  }

  for (const cls of classes) {
    const outer = innermost(
      classes.filter((other) => other !== cls),
      cls.span.start,
      cls.span.end
    );
    if (outer) parentOf.set(cls.decl, outer.decl);
    cls.decl.fields.push(...fieldsOf(view, cls.span, functions, profile));
  }

  decls.push(...variables(view, input, profile, functions, parentOf));
  decls.push(...imports(input, profile));
  decls.push(...moduleLevelCalls(view, input, profile, classes, functions));

  return assemble(input, profile, decls, parentOf);
}

export function matchFunction(text: string, profile: LanguageProfile): FunctionMatch | null {
  for (const pattern of profile.functionPatterns) {
    const match = pattern.exec(text);
    const groups = match?.groups;
    if (!groups?.name) continue;
    if (profile.reservedWords.has(groups.name)) continue;
    const ret = groups.ret?.trim() || null;
    if (ret && STATEMENT_WORDS.has(ret.split(/\s+/)[0])) continue;

    return {
      name: groups.name,
      params: groups.params ?? '',
      ret,
      isAsync: Boolean(groups.async),
      vis: groups.vis?.trim() || null,
      owner: ownerName(groups.receiver ?? groups.owner ?? null),
    };
  }
  return null;
}

function matchClass(text: string, profile: LanguageProfile): string | null {
  for (const pattern of profile.classPatterns) {
    const name = pattern.exec(text)?.groups?.name;
    if (name && !profile.reservedWords.has(name)) {
      return name.split('::').pop() ?? name;
    }
  }
  return null;
}

function ownerName(text: string | null): string | null {
  if (!text) return null;
  const names = text.replace(/[*&]/g, ' ').match(/[A-Za-z_]\w*/g);
  return names ? names[names.length - 1] : null;
}

/**
 * Extent of the declaration starting at `line` and where its body is
 */
function bodySpan(view: SourceView, line: number, profile: LanguageProfile): BodySpan {
  if (profile.blockStyle === 'indent') {
    return indentSpan(view, line, profile);
  }

  const { masked } = view;
  let parens = 0;
  for (let i = view.offsetOf(line); i < masked.length; i++) {
    const ch = masked[i];
    if (ch === '(' || ch === '[') parens++;
    else if (ch === ')' || ch === ']') parens--;
    else if (parens > 0) continue;
    else if (ch === ';') break;
    else if (ch === '{') {
      const close = matchingBracket(masked, i);
      const stop = close === -1 ? masked.length - 1 : close;
      return { start: line, end: view.lineOf(stop), open: i, close: stop, bodyStart: line, inline: '' };
    } else if (ch === '\n') {
      const sofar = masked.slice(view.offsetOf(line), i).trimEnd();
      const next = masked.slice(i + 1).trimStart().charAt(0);
      if (next !== '{' && !/[,(:>]$/.test(sofar) && !/\bwhere$/.test(sofar)) break;
    }
  }

  return { start: line, end: line, open: -1, close: -1, bodyStart: line, inline: '' };
}

function indentSpan(view: SourceView, line: number, profile: LanguageProfile): BodySpan {
  const base = indentOf(view.maskedLine(line));
  let headerEnd = line;
  let balance = bracketBalance(view.maskedLine(line));
  while (balance > 0 && headerEnd < view.lineCount) {
    headerEnd++;
    balance += bracketBalance(view.maskedLine(headerEnd));
  }

  let end = headerEnd;
  const closer =
    profile.closers.length > 0 ? new RegExp(`^(?:${profile.closers.join('|')})\\b`) : null;
  for (let l = headerEnd + 1; l <= view.lineCount; l++) {
    const text = view.maskedLine(l);
    if (!text.trim()) continue;
    if (indentOf(text) <= base) {
      if (closer && indentOf(text) === base && closer.test(text.trim())) end = l;
      break;
    }
    end = l;
  }

  const header = view.maskedLine(headerEnd);
  const colon = firstTopLevelColon(header);
  const inline = end === headerEnd && colon !== -1 ? header.slice(colon + 1).trim() : '';
  return { start: line, end, open: -1, close: -1, bodyStart: headerEnd + 1, inline };
}

function bodyLines(view: SourceView, span: BodySpan, profile: LanguageProfile, ctx: PatternContext): LogicalLine[] {
  if (profile.blockStyle === 'brace') {
    if (span.open === -1) return [];
    return braceBlocks(view, span.open + 1, span.close, (header) => opensBlock(header, ctx));
  }
  if (span.inline) {
    return [{ text: span.inline, raw: span.inline, line: span.start, endLine: span.start, children: null }];
  }
  return indentBlocks(view, span.bodyStart, span.end, profile.closers);
}

export function parseParameters(list: string, profile: LanguageProfile): string[] {
  const names: string[] = [];
  for (const part of splitTopLevel(list, ',')) {
    const declared = splitTopLevel(part, '=')[0].replace(/[{}[\]]/g, ' ');
    let name: string | undefined;
    if (profile.paramStyle === 'name-first') {
      const colon = declared.search(/(?<!:):(?!:)/);
      const head = colon === -1 ? declared : declared.slice(0, colon);
      const identifiers = (head.match(/[A-Za-z_$][\w$]*/g) ?? []).filter(
        (id) => !profile.reservedWords.has(id)
      );
      name = colon === -1 ? identifiers[0] : identifiers[identifiers.length - 1];
    } else {
      const identifiers = (declared.match(/[A-Za-z_$][\w$]*/g) ?? []).filter(
        (id) => !profile.reservedWords.has(id)
      );
      name = identifiers[identifiers.length - 1];
    }
    if (name && !names.includes(name)) names.push(name);
  }
  return names;
}

function visibilityOf(name: string, modifier: string | null, profile: LanguageProfile): Visibility {
  switch (profile.visibility) {
    case 'capitalized':
      return /^[A-Z]/.test(name) ? 'exported' : 'internal';
    case 'underscore':
      return name.startsWith('_') && !/^__\w+__$/.test(name) ? 'private' : 'public';
    case 'keyword':
      if (!modifier) return profile.defaultVisibility;
      if (/\bprivate\b|\bfileprivate\b|\bstatic\b|\blocal\b/.test(modifier)) return 'private';
      if (/\bprotected\b/.test(modifier)) return 'protected';
      if (/\binternal\b|\(crate\)/.test(modifier)) return 'internal';
      return 'public';
  }
}

function fieldsOf(
  view: SourceView,
  span: Span,
  functions: Array<{ decl: FunctionDecl; span: BodySpan }>,
  profile: LanguageProfile
): string[] {
  const fields: string[] = [];
  const add = (name: string | undefined) => {
    if (name && !profile.reservedWords.has(name) && !fields.includes(name)) fields.push(name);
  };

  for (let line = span.start + 1; line <= span.end; line++) {
    const text = view.maskedLine(line);
    if (profile.blockStyle === 'indent') {
      for (const match of text.matchAll(/(?:\bself\.|@)([A-Za-z_]\w*)\s*=(?!=)/g)) add(match[1]);
      continue;
    }
    if (functions.some((fn) => line >= fn.span.start && line <= fn.span.end)) continue;
    const pattern =
      profile.paramStyle === 'name-first'
        ? /^\s*(?:(?:pub|public|private|protected|internal|let|var|val|static|final|lateinit)\s+)*([A-Za-z_]\w*)\s*(?::(?!:)|\s+[\w*.[\]]+\s*[,;]?\s*$)/
        : /^\s*(?:(?:public|private|protected|internal|static|final|readonly|const|var|late)\s+)*(?:[\w<>[\],.?*&\\]+\s+)?\$?([A-Za-z_]\w*)\s*(?:=(?!=)|;)/;
    add(pattern.exec(text)?.[1]);
  }
  return fields;
}

function variables(
  view: SourceView,
  input: ExtractionInput,
  profile: LanguageProfile,
  functions: Array<{ decl: FunctionDecl; span: BodySpan }>,
  parentOf: Map<DeclNode, DeclNode>
): VariableDecl[] {
  const found: VariableDecl[] = [];
  for (let line = 1; line <= view.lineCount; line++) {
    const text = view.maskedLine(line);
    for (const pattern of profile.variablePatterns) {
      const groups = pattern.exec(text)?.groups;
      if (!groups?.name || profile.reservedWords.has(groups.name)) continue;
      const owner = innermost(functions, line);
      const isConst = Boolean(groups.const);
      const decl: VariableDecl = {
        kind: 'variable',
        id: -1,
        name: groups.name,
        qualifiedName: owner
          ? `${owner.decl.qualifiedName}.${groups.name}`
          : `${input.modulePath}::${groups.name}`,
        file: input.file,
        range: { start: line, end: line },
        visibility: owner ? 'private' : visibilityOf(groups.name, null, profile),
        language: profile.id,
        parent: null,
        isConst,
        isMutable: Boolean(groups.mut) || (!isConst && !pattern.source.includes('(?<mut>')),
      };
      if (owner) parentOf.set(decl, owner.decl);
      found.push(decl);
      break;
    }
  }
  return found;
}

function imports(input: ExtractionInput, profile: LanguageProfile): ImportDecl[] {
  return scanImports(input.source, profile).map((reference) => ({
    kind: 'import',
    id: -1,
    name: reference.specifier,
    qualifiedName: `${input.modulePath}::${reference.specifier}`,
    file: input.file,
    range: { start: reference.line, end: reference.line },
    visibility: 'private',
    language: profile.id,
    parent: null,
    source: reference.specifier,
    importedNames: reference.names,
  }));
}

/**
 * Calls made outside every function body (`main()` at the bottom of a script)
 */
function moduleLevelCalls(
  view: SourceView,
  input: ExtractionInput,
  profile: LanguageProfile,
  classes: Array<{ decl: ClassDecl; span: Span }>,
  functions: Array<{ decl: FunctionDecl; span: BodySpan }>
): CallSiteDecl[] {
  const covered = (line: number) =>
    functions.some((fn) => line >= fn.span.start && line <= fn.span.end) ||
    classes.some((cls) => line >= cls.span.start && line <= cls.span.end);

  const importLines = profile.importPatterns.map((pattern) => new RegExp(pattern.source));
  const sites: CallSiteDecl[] = [];
  for (let line = 1; line <= view.lineCount; line++) {
    if (covered(line)) continue;
    const text = view.maskedLine(line);
    if (!text.trim() || importLines.some((pattern) => pattern.test(text))) continue;
    for (const fact of findCalls(text, profile)) {
      sites.push(callSite(fact, line, null, input, profile));
    }
  }
  return sites;
}

function callSite(
  fact: CallFact,
  line: number,
  caller: FunctionDecl | null,
  input: ExtractionInput,
  profile: LanguageProfile
): CallSiteDecl {
  const dot = fact.callee.lastIndexOf('.');
  const callee = dot === -1 ? fact.callee : fact.callee.slice(dot + 1);
  const receiver = dot === -1 ? null : fact.callee.slice(0, dot);
  return {
    kind: 'call-site',
    id: -1,
    name: callee,
    qualifiedName: `${caller ? caller.qualifiedName : `${input.modulePath}::<module>`}@${line}:${fact.callee}`,
    file: input.file,
    range: { start: line, end: line },
    visibility: 'private',
    language: profile.id,
    parent: null,
    callee,
    receiver,
  };
}

/**
 * Calls in a statement tree, in statement order
 */
export function callsIn(statements: Statement[]): Array<{ fact: CallFact; line: number }> {
  const calls: Array<{ fact: CallFact; line: number }> = [];
  const visit = (list: Statement[]) => {
    for (const statement of list) {
      calls.push(...statement.facts.calls.map((fact) => ({ fact, line: statement.line })));
      switch (statement.kind) {
        case 'if':
          visit(statement.consequent);
          if (statement.alternate) visit(statement.alternate);
          break;
        case 'loop':
          visit(statement.body);
          if (statement.update) {
            const updateLine = statement.update.line;
            calls.push(...statement.update.facts.calls.map((fact) => ({ fact, line: updateLine })));
          }
          break;
        case 'switch':
          for (const arm of statement.cases) {
            calls.push(...arm.facts.calls.map((fact) => ({ fact, line: arm.line })));
            visit(arm.body);
          }
          break;
        case 'try':
          visit(statement.block);
          if (statement.handler) visit(statement.handler.body);
          if (statement.finalizer) visit(statement.finalizer);
          break;
        default:
          break;
      }
    }
  };
  visit(statements);
  return calls;
}

function assemble(
  input: ExtractionInput,
  profile: LanguageProfile,
  decls: DeclNode[],
  parentOf: Map<DeclNode, DeclNode>
): SyntaxTree {
  const order: Record<DeclNode['kind'], number> = { import: 0, class: 1, function: 2, variable: 3, 'call-site': 4 };
  decls.sort((a, b) => a.range.start - b.range.start || order[a.kind] - order[b.kind]);
  decls.forEach((decl, index) => {
    decl.id = index;
  });
  for (const decl of decls) {
    decl.parent = parentOf.get(decl)?.id ?? null;
  }

  const exportedNames = decls
    .filter(
      (decl) =>
        decl.parent === null &&
        (decl.kind === 'function' || decl.kind === 'class' || decl.kind === 'variable') &&
        (decl.visibility === 'public' || decl.visibility === 'exported')
    )
    .map((decl) => decl.name);

  return {
    file: input.file,
    modulePath: input.modulePath,
    language: profile.id,
    strategy: 'pattern',
    heuristic: true,
    decls,
    exportedNames: [...new Set(exportedNames)],
  };
}

function innermost<T extends { span: Span }>(items: T[], start: number, end = start): T | undefined {
  let best: T | undefined;
  for (const item of items) {
    if (item.span.start <= start && item.span.end >= end && !(item.span.start === start && item.span.end === end)) {
      if (!best || item.span.start >= best.span.start) best = item;
    }
  }
  return best;
}

function firstTopLevelColon(text: string): number {
  let depth = 0;
  let found = -1;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth--;
    else if (ch === ':' && depth === 0 && text[i + 1] !== ':' && text[i - 1] !== ':') {
      found = i;
      break;
    }
  }
  return found;
}

function bracketBalance(text: string): number {
  let balance = 0;
  for (const ch of text) {
    if (ch === '(' || ch === '[' || ch === '{') balance++;
    else if (ch === ')' || ch === ']' || ch === '}') balance--;
  }
  return balance;
}
