/**
 * Turns a LogicalLine tree into the language-neutral statement tree by keyword
 * recognition. Used for every language that has no structural grammar.
 */

import type { LanguageProfile } from '../language/language-registry';
import { escapeRegExp, type LogicalLine } from './line-structure';
import { excerpt, matchingBracket, splitTopLevel } from './source-text';
import { assignmentTargets, factsFromText } from './text-facts';
import {
  emptyFacts,
  mergeFacts,
  type CatchClause,
  type IfStatement,
  type JumpKind,
  type LoopKind,
  type LoopStatement,
  type Statement,
  type StatementIds,
  type StatementPart,
  type SwitchCase,
  type ValueFacts,
} from './syntax-types';

export interface PatternContext {
  profile: LanguageProfile;
  ids: StatementIds;
  /** Name of the function a header declares, or null */
  functionName: (header: string) => string | null;
}

/** Masked text with the original text at the same offsets */
interface Fragment {
  text: string;
  raw: string;
}

const keywordPatterns = new Map<string, RegExp>();

export function startsWithKeyword(text: string, keywords: string[]): string | null {
  for (const keyword of keywords) {
    let pattern = keywordPatterns.get(keyword);
    if (!pattern) {
      const body = keyword.split(' ').map(escapeRegExp).join('\\s+');
      pattern = new RegExp(`^${body}(?![\\w$])`);
      keywordPatterns.set(keyword, pattern);
    }
    if (pattern.test(text)) return keyword;
  }
  return null;
}

/**
 * Whether a brace after this header opens a statement block
 */
export function opensBlock(header: string, ctx: PatternContext): boolean {
  const text = stripLabel(header, ctx).text;
  const k = ctx.profile.keywords;
  const blockKeywords = [
    ...k.if, ...k.elseIf, ...k.else, ...k.loop, ...k.infiniteLoop, ...k.doLoop,
    ...k.switch, ...k.arm, ...k.try, ...k.catch, ...k.finally,
    'unsafe', 'async', 'defer', 'synchronized', 'with', 'using', 'static',
  ];
  if (startsWithKeyword(text, blockKeywords)) return true;
  if (/\bmatch$/.test(text)) return true;
  if (hasTopLevel(text, '=>') || (hasTopLevel(text, '->') && !/^[\w$.]+\s*->\s*[\w$]+/.test(text))) {
    return true;
  }
  return ctx.functionName(text) !== null;
}

export function toStatements(lines: LogicalLine[], ctx: PatternContext): Statement[] {
  const statements: Statement[] = [];
  let index = 0;

  while (index < lines.length) {
    const [produced, next] = classify(lines, index, ctx);
    statements.push(...produced);
    index = next;
  }

  return statements;
}

function classify(lines: LogicalLine[], index: number, ctx: PatternContext): [Statement[], number] {
  const node = lines[index];
  const { profile } = ctx;
  const k = profile.keywords;
  const { label, text: unlabelled, offset } = stripLabel(node.text, ctx);
  const body: Fragment = { text: unlabelled, raw: node.raw.slice(offset) };

  if (!body.text) {
    if (label && k.goto.length > 0) {
      return [[labelStatement(node, label, ctx)], index + 1];
    }
    return [node.children ? toStatements(node.children, ctx) : [], index + 1];
  }

  const labelPrefix: Statement[] =
    label && k.goto.length > 0 ? [labelStatement(node, label, ctx)] : [];

  const nested = ctx.functionName(body.text);
  if (nested) {
    // `name(` in the header declares, it does not call
    return [[...labelPrefix, simple(node, body, ctx, { defs: [nested], calls: [] })], index + 1];
  }

  if (startsWithKeyword(body.text, k.if)) {
    const [statements, next] = buildIf(lines, index, body, ctx);
    return [[...labelPrefix, ...statements], next];
  }

  const doKeyword = startsWithKeyword(body.text, k.doLoop);
  if (doKeyword && node.children) {
    const [loop, next] = buildDoLoop(lines, index, ctx, label);
    return [[...labelPrefix, loop], next];
  }

  const loopKeyword = startsWithKeyword(body.text, [...k.infiniteLoop, ...k.loop]);
  if (loopKeyword) {
    return [[...labelPrefix, ...buildLoop(node, body, loopKeyword, ctx, label)], index + 1];
  }

  const switchKeyword = startsWithKeyword(body.text, k.switch);
  if (switchKeyword || (/\bmatch$/.test(body.text) && node.children)) {
    return [[...labelPrefix, ...buildSwitch(node, body, switchKeyword, ctx, label)], index + 1];
  }

  if (startsWithKeyword(body.text, k.try) && node.children) {
    const [statement, next] = buildTry(lines, index, ctx);
    return [[...labelPrefix, statement], next];
  }

  const jump = jumpKind(body.text, ctx);
  if (jump) {
    const modified = modifierCondition(body, ctx);
    if (modified) {
      return [[...labelPrefix, conditionalWrap(node, modified, ctx)], index + 1];
    }
    return [[...labelPrefix, buildJump(node, body, jump, ctx)], index + 1];
  }

  const modified = modifierCondition(body, ctx);
  if (modified) {
    return [[...labelPrefix, conditionalWrap(node, modified, ctx)], index + 1];
  }

  // plain statement, possibly heading an unrecognised block (`with`, `unsafe`, scope braces)
  const statements: Statement[] = [...labelPrefix, simple(node, body, ctx)];
  if (node.children) {
    statements.push(...toStatements(node.children, ctx));
  }
  return [statements, index + 1];
}

function buildIf(
  lines: LogicalLine[],
  index: number,
  header: Fragment,
  ctx: PatternContext
): [Statement[], number] {
  const node = lines[index];
  const k = ctx.profile.keywords;
  const keyword = startsWithKeyword(header.text, k.elseIf) ?? startsWithKeyword(header.text, k.if) ?? '';
  const rest = afterKeyword(header, keyword);
  const { condition, inline, init } = splitHeader(rest, ctx);

  const prefix: Statement[] = init.map((part) => simple(node, part, ctx));
  const id = ctx.ids.take();
  const consequent = node.children
    ? toStatements(node.children, ctx)
    : inline
      ? inlineStatements(node, inline, ctx)
      : [];

  let next = index + 1;
  let alternate: Statement[] | null = null;
  const sibling = lines[next];

  if (sibling && startsWithKeyword(sibling.text, k.elseIf)) {
    const [chained, after] = buildIf(lines, next, { text: sibling.text, raw: sibling.raw }, ctx);
    alternate = chained;
    next = after;
  } else if (sibling && startsWithKeyword(sibling.text, k.else)) {
    const elseRest = afterKeyword({ text: sibling.text, raw: sibling.raw }, 'else');
    const elseInline = trimFragment(elseRest, /^:/, /^$/);
    alternate = sibling.children
      ? toStatements(sibling.children, ctx)
      : elseInline.text
        ? inlineStatements(sibling, elseInline, ctx)
        : [];
    next++;
  }

  const statement: IfStatement = {
    kind: 'if',
    id,
    line: node.line,
    endLine: endLineOf(node, lines.slice(index + 1, next)),
    text: excerpt(header.raw),
    facts: factsFromText(condition.text, ctx.profile, condition.raw),
    consequent,
    alternate,
  };
  return [[...prefix, statement], next];
}

function buildLoop(
  node: LogicalLine,
  header: Fragment,
  keyword: string,
  ctx: PatternContext,
  label: string | null
): Statement[] {
  const { profile } = ctx;
  const rest = trimFragment(afterKeyword(header, keyword), /^/, /\s*(?::|\bdo)$/);
  const inner = unwrapParens(rest);
  const clauses = splitTopLevel(inner.text, ';');
  const cStyle = clauses.length === 3;
  const prefix: Statement[] = [];

  // the init clause runs once, before the loop header
  if (cStyle && clauses[0].trim()) {
    prefix.push(simple(node, sliceFragment(inner, 0, clauses[0].length), ctx, undefined, true));
  }

  const id = ctx.ids.take();
  let loopKind: LoopKind = 'while';
  let facts: ValueFacts = emptyFacts();
  let update: StatementPart | null = null;

  if (profile.keywords.infiniteLoop.includes(keyword) || /^(?:true|1)?$/.test(inner.text.trim())) {
    loopKind = 'infinite';
  } else if (cStyle) {
    loopKind = clauses[1].trim() ? 'for' : 'infinite';
    const [initText, testText] = clauses;
    const testStart = initText.length + 1;
    const updateStart = testStart + testText.length + 1;
    const testFragment = sliceFragment(inner, testStart, testStart + testText.length);
    facts = factsFromText(testFragment.text, profile, testFragment.raw);
    const updateFragment = sliceFragment(inner, updateStart, inner.text.length);
    if (updateFragment.text.trim()) {
      update = {
        id: ctx.ids.take(),
        line: node.line,
        endLine: node.line,
        text: excerpt(updateFragment.raw),
        facts: mergeFacts(
          ...splitTopLevel(updateFragment.text, ',').map((part) => factsFromText(part, profile))
        ),
      };
    }
  } else {
    const each = splitForEach(inner.text);
    if (each) {
      loopKind = 'for-each';
      const targets = assignmentTargets(each.target, profile);
      const source = factsFromText(each.source, profile);
      facts = mergeFacts(source, { ...emptyFacts(), defs: targets.defs, uses: targets.uses });
    } else {
      facts = factsFromText(inner.text, profile, inner.raw);
    }
  }

  const loop: LoopStatement = {
    kind: 'loop',
    id,
    line: node.line,
    endLine: endLineOf(node, []),
    text: excerpt(header.raw),
    facts,
    loopKind,
    update,
    body: node.children ? toStatements(node.children, ctx) : [],
    label,
  };

  return [...prefix, loop];
}

function buildDoLoop(
  lines: LogicalLine[],
  index: number,
  ctx: PatternContext,
  label: string | null
): [LoopStatement, number] {
  const node = lines[index];
  const id = ctx.ids.take();
  const body = node.children ? toStatements(node.children, ctx) : [];
  const sibling = lines[index + 1];
  const conditionKeyword = sibling && !sibling.children ? startsWithKeyword(sibling.text, ['while', 'until']) : null;

  if (sibling && conditionKeyword) {
    const condition = unwrapParens(afterKeyword({ text: sibling.text, raw: sibling.raw }, conditionKeyword));
    return [
      {
        kind: 'loop',
        id,
        line: node.line,
        endLine: sibling.endLine,
        text: excerpt(`${node.raw} … ${sibling.raw}`),
        facts: factsFromText(condition.text, ctx.profile, condition.raw),
        loopKind: 'do-while',
        update: null,
        body,
        label,
      },
      index + 2,
    ];
  }

  return [
    {
      kind: 'loop',
      id,
      line: node.line,
      endLine: endLineOf(node, []),
      text: excerpt(node.raw),
      facts: emptyFacts(),
      loopKind: 'infinite',
      update: null,
      body,
      label,
    },
    index + 1,
  ];
}

function buildSwitch(
  node: LogicalLine,
  header: Fragment,
  keyword: string | null,
  ctx: PatternContext,
  label: string | null
): Statement[] {
  const subject = keyword
    ? unwrapParens(trimFragment(afterKeyword(header, keyword), /^/, /\s*:$/))
    : trimFragment(header, /^/, /\s*\bmatch$/);
  const { condition, init } = splitHeader(subject, ctx, false);
  const prefix = init.map((part) => simple(node, part, ctx));
  const id = ctx.ids.take();
  const arrowArms = keyword === null || !['switch', 'select'].includes(keyword);
  const cases: SwitchCase[] = [];

  const children = node.children ?? [];
  let index = 0;
  while (index < children.length) {
    const child = children[index];
    const arm = armOf(child, ctx, arrowArms);
    if (arm) {
      const caseId = ctx.ids.take();
      const armBody = child.children
        ? toStatements(child.children, ctx)
        : arm.inline.text
          ? inlineStatements(child, arm.inline, ctx)
          : [];
      cases.push({
        id: caseId,
        line: child.line,
        endLine: child.endLine,
        text: excerpt(child.raw),
        facts: factsFromText(arm.pattern.text, ctx.profile, arm.pattern.raw),
        isDefault: arm.isDefault,
        body: armBody,
      });
      index++;
      continue;
    }

    // statements under a C-style `case x:` up to the next arm
    let stop = index + 1;
    while (stop < children.length && !armOf(children[stop], ctx, arrowArms)) stop++;
    const group = children.slice(index, stop);
    const current = cases[cases.length - 1];
    const produced = toStatements(group, ctx);
    if (current) {
      current.body.push(...produced);
      current.endLine = Math.max(current.endLine, ...group.map((line) => line.endLine));
    }
    index = stop;
  }

  return [
    ...prefix,
    {
      kind: 'switch',
      id,
      line: node.line,
      endLine: endLineOf(node, []),
      text: excerpt(header.raw),
      facts: factsFromText(condition.text, ctx.profile, condition.raw),
      cases,
      fallsThrough: ctx.profile.switchFallthrough && !arrowArms,
      label,
    },
  ];
}

function buildTry(lines: LogicalLine[], index: number, ctx: PatternContext): [Statement, number] {
  const node = lines[index];
  const k = ctx.profile.keywords;
  const id = ctx.ids.take();
  const block = toStatements(node.children ?? [], ctx);
  let handler: CatchClause | null = null;
  let finalizer: Statement[] | null = null;
  let next = index + 1;

  while (next < lines.length) {
    const sibling = lines[next];
    const catchKeyword = startsWithKeyword(sibling.text, k.catch);
    if (catchKeyword) {
      const param = catchParameter(sibling.text.slice(catchKeyword.length));
      const body = toStatements(sibling.children ?? [], ctx);
      if (handler) {
        // several handlers share one catch path
        handler.body.push(...body);
        handler.endLine = sibling.endLine;
        if (param && !handler.facts.defs.includes(param)) handler.facts.defs.push(param);
      } else {
        handler = {
          id: ctx.ids.take(),
          line: sibling.line,
          endLine: sibling.endLine,
          text: excerpt(sibling.raw),
          facts: { ...emptyFacts(), defs: param ? [param] : [] },
          body,
        };
      }
      next++;
      continue;
    }
    if (startsWithKeyword(sibling.text, k.finally)) {
      finalizer = toStatements(sibling.children ?? [], ctx);
      next++;
    }
    break;
  }

  return [
    {
      kind: 'try',
      id,
      line: node.line,
      endLine: endLineOf(node, lines.slice(index + 1, next)),
      text: excerpt(node.raw),
      facts: emptyFacts(),
      block,
      handler,
      finalizer,
    },
    next,
  ];
}

function buildJump(node: LogicalLine, body: Fragment, kind: JumpKind, ctx: PatternContext): Statement {
  const keyword = jumpKeyword(body.text, kind, ctx) ?? '';
  const rest = afterKeyword(body, keyword);
  const restText = rest.text.replace(/[;,]\s*$/, '').trim();
  const id = ctx.ids.take();

  let label: string | null = null;
  let facts: ValueFacts = emptyFacts();
  if (kind === 'break' || kind === 'continue' || kind === 'goto') {
    const match = /^'?([A-Za-z_]\w*)$/.exec(restText);
    label = match ? match[1] : null;
  } else if (restText) {
    facts = factsFromText(rest.text, ctx.profile, rest.raw);
  }

  return {
    kind,
    id,
    line: node.line,
    endLine: node.endLine,
    text: excerpt(node.raw),
    facts,
    label,
  };
}

function simple(
  node: LogicalLine,
  fragment: Fragment,
  ctx: PatternContext,
  override?: Partial<ValueFacts>,
  commaSeparated = false
): Statement {
  const id = ctx.ids.take();
  const base = commaSeparated
    ? mergeFacts(...splitTopLevel(fragment.text, ',').map((part) => factsFromText(part, ctx.profile)))
    : factsFromText(fragment.text, ctx.profile, fragment.raw);
  return {
    kind: 'simple',
    id,
    line: node.line,
    endLine: node.endLine,
    text: excerpt(fragment.raw || fragment.text),
    facts: { ...base, ...override },
  };
}

function labelStatement(node: LogicalLine, name: string, ctx: PatternContext): Statement {
  return {
    kind: 'label',
    id: ctx.ids.take(),
    line: node.line,
    endLine: node.line,
    text: `${name}:`,
    facts: emptyFacts(),
    name,
  };
}

function inlineStatements(node: LogicalLine, fragment: Fragment, ctx: PatternContext): Statement[] {
  const text = fragment.text.replace(/^\{|\}$/g, '').trim();
  if (!text) return [];
  const synthetic: LogicalLine[] = splitTopLevel(fragment.text.replace(/^\{|\}$/g, ''), ';')
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => ({
      text: part,
      raw: part,
      line: node.line,
      endLine: node.endLine,
      children: null,
    }));
  if (synthetic.length === 1) {
    synthetic[0].raw = fragment.raw.trim();
  }
  return toStatements(synthetic, ctx);
}

/**
 * Ruby-style trailing condition: `return if done`
 */
function modifierCondition(
  body: Fragment,
  ctx: PatternContext
): { statement: Fragment; condition: Fragment } | null {
  if (!ctx.profile.keywords.if.includes('unless')) return null;
  const match = /\s(if|unless)\s/.exec(body.text);
  if (!match) return null;
  const cut = match.index;
  const conditionStart = cut + match[0].length;
  return {
    statement: sliceFragment(body, 0, cut),
    condition: sliceFragment(body, conditionStart, body.text.length),
  };
}

function conditionalWrap(
  node: LogicalLine,
  modified: { statement: Fragment; condition: Fragment },
  ctx: PatternContext
): Statement {
  const id = ctx.ids.take();
  return {
    kind: 'if',
    id,
    line: node.line,
    endLine: node.endLine,
    text: excerpt(node.raw),
    facts: factsFromText(modified.condition.text, ctx.profile, modified.condition.raw),
    consequent: inlineStatements(node, modified.statement, ctx),
    alternate: null,
  };
}

function jumpKind(text: string, ctx: PatternContext): JumpKind | null {
  const kinds: JumpKind[] = ['return', 'throw', 'break', 'continue', 'goto'];
  return kinds.find((kind) => jumpKeyword(text, kind, ctx) !== null) ?? null;
}

function jumpKeyword(text: string, kind: JumpKind, ctx: PatternContext): string | null {
  return startsWithKeyword(text, ctx.profile.keywords[kind]);
}

function armOf(
  node: LogicalLine,
  ctx: PatternContext,
  arrowArms: boolean
): { pattern: Fragment; inline: Fragment; isDefault: boolean } | null {
  const full: Fragment = { text: node.text, raw: node.raw };
  const keyword = startsWithKeyword(node.text, ctx.profile.keywords.arm);

  if (keyword) {
    const rest = afterKeyword(full, keyword);
    const split = splitArm(rest, [':', '=>', '->', ' then ']);
    const isDefault = keyword === 'default' || keyword === 'else' || split.pattern.text.trim() === '_';
    return { ...split, isDefault };
  }

  if (arrowArms && (hasTopLevel(node.text, '=>') || hasTopLevel(node.text, '->'))) {
    const split = splitArm(full, ['=>', '->']);
    const pattern = split.pattern.text.trim();
    return { ...split, isDefault: pattern === '_' || pattern === 'else' || pattern === 'default' };
  }

  return null;
}

function splitArm(fragment: Fragment, separators: string[]): { pattern: Fragment; inline: Fragment } {
  let best = -1;
  let bestSeparator = '';
  for (const separator of separators) {
    const position = topLevelIndex(fragment.text, separator);
    if (position !== -1 && (best === -1 || position < best)) {
      best = position;
      bestSeparator = separator;
    }
  }
  if (best === -1) {
    return { pattern: fragment, inline: { text: '', raw: '' } };
  }
  const inline = sliceFragment(fragment, best + bestSeparator.length, fragment.text.length);
  return {
    pattern: sliceFragment(fragment, 0, best),
    inline: trimFragment(inline, /^/, /,$/),
  };
}

/**
 * Condition, same-line body and init clauses (`if x := f(); x > 0`) of a header
 */
function splitHeader(
  rest: Fragment,
  ctx: PatternContext,
  allowInline = true
): { condition: Fragment; inline: Fragment | null; init: Fragment[] } {
  let condition = rest;
  let inline: Fragment | null = null;
  const text = rest.text;

  if (text.startsWith('(')) {
    const close = matchingBracket(text, 0);
    if (close !== -1) {
      condition = sliceFragment(rest, 1, close);
      const after = sliceFragment(rest, close + 1, text.length);
      if (allowInline && after.text.trim()) inline = trimFragment(after, /^\s*(?:then\b)?/, /$/);
    }
  } else {
    const colon = ctx.profile.blockStyle === 'indent' ? topLevelIndex(text, ':') : -1;
    const then = topLevelIndex(text, ' then');
    const cut = colon !== -1 ? colon : then;
    if (cut !== -1) {
      condition = sliceFragment(rest, 0, cut);
      const after = sliceFragment(rest, cut + (colon !== -1 ? 1 : 5), text.length);
      if (allowInline && after.text.trim()) inline = after;
    }
  }

  const init: Fragment[] = [];
  const clauses = splitTopLevel(condition.text, ';');
  if (clauses.length > 1) {
    let position = 0;
    for (const clause of clauses.slice(0, -1)) {
      init.push(sliceFragment(condition, position, position + clause.length));
      position += clause.length + 1;
    }
    condition = sliceFragment(condition, position, condition.text.length);
  }

  return { condition, inline: inline && inline.text.trim() ? inline : null, init };
}

function splitForEach(text: string): { target: string; source: string } | null {
  const range = /^(.*?)(?::=|=)\s*range\s+(.+)$/.exec(text);
  if (range) return { target: range[1], source: range[2] };

  for (const separator of [' in ', ' of ', ' as ']) {
    const position = topLevelIndex(text, separator);
    if (position !== -1) {
      const left = text.slice(0, position);
      const right = text.slice(position + separator.length);
      // PHP: foreach ($items as $item)
      return separator === ' as ' ? { target: right, source: left } : { target: left, source: right };
    }
  }

  const colon = text.search(/(?<!:):(?!:)/);
  if (colon !== -1) {
    return { target: text.slice(0, colon), source: text.slice(colon + 1) };
  }
  return null;
}

function catchParameter(text: string): string | null {
  const trimmed = text.trim().replace(/:$/, '');
  const as = /\bas\s+([A-Za-z_]\w*)/.exec(trimmed) ?? /=>\s*([A-Za-z_]\w*)/.exec(trimmed);
  if (as) return as[1];
  const parens = /^\(([^)]*)\)/.exec(trimmed);
  if (parens) {
    const names = parens[1].match(/[A-Za-z_$][\w$]*/g);
    return names ? names[names.length - 1] : null;
  }
  return null;
}

function stripLabel(
  text: string,
  ctx: PatternContext
): { label: string | null; text: string; offset: number } {
  const match = /^'?([A-Za-z_]\w*):(?!:)\s*/.exec(text);
  if (!match) return { label: null, text, offset: 0 };
  const rest = text.slice(match[0].length);
  // `default:`, `try:` and `else:` are keywords; `key: value` is not a label
  if (ctx.profile.reservedWords.has(match[1])) {
    return { label: null, text, offset: 0 };
  }
  if (rest && !/^(?:for|while|loop|do|switch|match|\{)/.test(rest)) {
    return { label: null, text, offset: 0 };
  }
  return { label: match[1], text: rest, offset: match[0].length };
}

function afterKeyword(fragment: Fragment, keyword: string): Fragment {
  const match = new RegExp(`^${keyword.split(' ').map(escapeRegExp).join('\\s+')}\\s*`).exec(fragment.text);
  const length = match ? match[0].length : 0;
  return sliceFragment(fragment, length, fragment.text.length);
}

function unwrapParens(fragment: Fragment): Fragment {
  const text = fragment.text.trim();
  const start = fragment.text.indexOf(text);
  if (text.startsWith('(') && matchingBracket(text, 0) === text.length - 1) {
    return sliceFragment(fragment, start + 1, start + text.length - 1);
  }
  return fragment;
}

function trimFragment(fragment: Fragment, leading: RegExp, trailing: RegExp): Fragment {
  const head = leading.exec(fragment.text);
  const start = head && head.index === 0 ? head[0].length : 0;
  const tail = new RegExp(`(?:${trailing.source})`).exec(fragment.text.slice(start));
  const end = tail && tail.index !== undefined ? start + tail.index : fragment.text.length;
  return sliceFragment(fragment, start, end);
}

function sliceFragment(fragment: Fragment, start: number, end: number): Fragment {
  return { text: fragment.text.slice(start, end), raw: fragment.raw.slice(start, end) };
}

function hasTopLevel(text: string, token: string): boolean {
  return topLevelIndex(text, token) !== -1;
}

function topLevelIndex(text: string, token: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth = Math.max(0, depth - 1);
    else if (depth === 0 && text.startsWith(token, i)) {
      if (token === ':' && (text[i + 1] === ':' || text[i - 1] === ':')) continue;
      return i;
    }
  }
  return -1;
}

function endLineOf(node: LogicalLine, followers: LogicalLine[]): number {
  let end = node.endLine;
  const visit = (line: LogicalLine) => {
    end = Math.max(end, line.endLine);
    line.children?.forEach(visit);
  };
  node.children?.forEach(visit);
  followers.forEach(visit);
  return end;
}
