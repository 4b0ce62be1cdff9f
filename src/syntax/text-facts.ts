/**
 * Def/use facts for one statement of a language without a structural grammar.
 *
 * Works on masked text (see maskSource), so string contents and comments are
 * already blank. The result is an approximation: member writes count as reads of
 * the receiver and every call argument is attributed to the call it sits in.
 */

import type { LanguageProfile } from '../language/language-registry';
import { emptyFacts, type CallFact, type OperationFact, type ValueFacts } from './syntax-types';
import { matchingBracket, splitTopLevel } from './source-text';

const IDENTIFIER = /[A-Za-z_$][\w$]*/g;
const CALL = /(?<![\w$.])([A-Za-z_$][\w$]*(?:[ \t]*(?:\.|::|->)[ \t]*[A-Za-z_$][\w$]*)*)[ \t]*!?[ \t]*\(/g;
const OPERATION =
  /(?<![\w$.])([A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*|\d+(?:\.\d+)?)[ \t]*(\*\*|<<|>>|&&|\|\||==|!=|<=|>=|[+\-*/%<>&|^])[ \t]*(?=([A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*|\d+(?:\.\d+)?))/g;
const NUMBER = /(?<![\w$.])\d+(?:\.\d+)?(?![\w$])/g;
const STRING = /(["'`])( *)\1/g;
const ASSIGNMENT_OPERATORS = [
  '<<=', '>>=', '**=', '//=', '??=', '||=', '&&=',
  ':=', '+=', '-=', '*=', '/=', '%=', '|=', '&=', '^=',
];

export interface AssignmentSplit {
  lhs: string;
  /** Assignment operator as written (`=`, `+=`, `:=`) */
  operator: string;
  rhs: string;
}

/**
 * Find the first top-level assignment operator
 */
export function splitAssignment(text: string): AssignmentSplit | null {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth = Math.max(0, depth - 1);
    if (depth !== 0) continue;

    const compound = ASSIGNMENT_OPERATORS.find((op) => text.startsWith(op, i));
    if (compound) {
      return { lhs: text.slice(0, i), operator: compound, rhs: text.slice(i + compound.length) };
    }
    if (ch === '=') {
      const prev = text[i - 1] ?? '';
      const next = text[i + 1] ?? '';
      if ('=!<>'.includes(prev) || next === '=' || next === '>') {
        // comparison or arrow; skip the whole operator
        if (next === '=' || next === '>') i++;
        continue;
      }
      return { lhs: text.slice(0, i), operator: '=', rhs: text.slice(i + 1) };
    }
  }
  return null;
}

/**
 * Facts for one statement. `raw` is the unmasked text at the same offsets and is
 * only used to recover string literal values.
 */
export function factsFromText(text: string, profile: LanguageProfile, raw: string = text): ValueFacts {
  const facts = emptyFacts();
  const statement = text.replace(/[;,]\s*$/, '').trim();
  const offset = text.indexOf(statement);
  const rawStatement = raw.slice(offset, offset + statement.length);

  const increment = /^(?:(\+\+|--)\s*([A-Za-z_$][\w$]*)|([A-Za-z_$][\w$]*)\s*(\+\+|--))$/.exec(statement);
  if (increment) {
    const name = increment[2] ?? increment[3];
    const operator = (increment[1] ?? increment[4]).charAt(0);
    facts.defs.push(name);
    facts.uses.push(name);
    facts.operations.push({
      operator,
      operands: [
        { value: name, literal: false },
        { value: '1', literal: true },
      ],
    });
    facts.constants.push('1');
    return facts;
  }

  const assignment = splitAssignment(statement);
  let valueText = statement;
  let valueRaw = rawStatement;

  if (assignment) {
    const { defs, uses } = assignmentTargets(assignment.lhs, profile);
    facts.defs.push(...defs);
    addUnique(facts.uses, uses);
    const rhsStart = assignment.lhs.length + assignment.operator.length;
    valueText = statement.slice(rhsStart);
    valueRaw = rawStatement.slice(rhsStart);

    if (assignment.operator !== '=' && assignment.operator !== ':=') {
      // compound assignment reads its target
      addUnique(facts.uses, defs);
      const rhsOperand = valueText.trim();
      facts.operations.push({
        operator: assignment.operator.slice(0, -1),
        operands: [
          ...defs.map((name) => ({ value: name, literal: false })),
          { value: rhsOperand, literal: /^\d/.test(rhsOperand) },
        ],
      });
    }
  }

  const calls = findCalls(valueText, profile);
  facts.calls.push(...calls);
  addUnique(facts.uses, readNames(valueText, profile));
  facts.operations.push(...findOperations(valueText, profile));
  facts.constants.push(...findConstants(valueText, valueRaw));

  return facts;
}

/**
 * Names written by an assignment's left side. Member and index targets are not
 * definitions; their names are reads.
 */
export function assignmentTargets(
  lhs: string,
  profile: LanguageProfile
): { defs: string[]; uses: string[] } {
  const defs: string[] = [];
  const uses: string[] = [];

  for (const part of splitTopLevel(lhs, ',')) {
    const target = stripTypeAnnotation(part).trim();
    if (!target) continue;

    if (/[.[]|->/.test(target)) {
      addUnique(uses, readNames(target, profile));
      continue;
    }

    const names = identifiers(target).filter((name) => !profile.reservedWords.has(name));
    const name = names[names.length - 1];
    if (name && !defs.includes(name)) defs.push(name);
  }

  return { defs, uses };
}

/**
 * Variable names read in an expression: identifiers that are not keywords,
 * member names, namespace prefixes or the names of called functions.
 */
export function readNames(text: string, profile: LanguageProfile): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(IDENTIFIER)) {
    const name = match[0];
    const start = match.index ?? 0;
    const end = start + name.length;
    if (profile.reservedWords.has(name)) continue;
    if (/\d/.test(text[start - 1] ?? '')) continue;

    const before = text.slice(0, start).trimEnd();
    if (before.endsWith('.') || before.endsWith('::') || before.endsWith('->')) continue;

    const after = text.slice(end).trimStart();
    if (after.startsWith('::')) continue;
    if (/^!?\s*\(/.test(after)) continue;
    if (!names.includes(name)) names.push(name);
  }
  return names;
}

export function findCalls(text: string, profile: LanguageProfile): CallFact[] {
  const calls: CallFact[] = [];
  for (const match of text.matchAll(CALL)) {
    const callee = match[1].replace(/\s+/g, '').replace(/::|->/g, '.');
    const head = callee.split('.')[0];
    if (profile.reservedWords.has(head) && head !== 'self' && head !== 'this') continue;

    const open = (match.index ?? 0) + match[0].length - 1;
    const close = matchingBracket(text, open);
    const args = close === -1 ? text.slice(open + 1) : text.slice(open + 1, close);
    calls.push({ callee, args: readNames(args, profile) });
  }
  return calls;
}

export function findOperations(text: string, profile: LanguageProfile): OperationFact[] {
  const operations: OperationFact[] = [];
  for (const match of text.matchAll(OPERATION)) {
    const [, left, operator, right] = match;
    if (profile.reservedWords.has(left) || profile.reservedWords.has(right)) continue;
    operations.push({
      operator,
      operands: [
        { value: left, literal: /^\d/.test(left) },
        { value: right, literal: /^\d/.test(right) },
      ],
    });
  }
  return operations;
}

function findConstants(text: string, raw: string): string[] {
  const constants: string[] = [];
  for (const match of text.matchAll(NUMBER)) {
    constants.push(match[0]);
  }
  for (const match of text.matchAll(STRING)) {
    const start = match.index ?? 0;
    constants.push(raw.slice(start, start + match[0].length));
  }
  return constants;
}

function stripTypeAnnotation(target: string): string {
  const colon = target.search(/(?<!:):(?!:)/);
  return colon === -1 ? target : target.slice(0, colon);
}

function identifiers(text: string): string[] {
  return [...text.matchAll(IDENTIFIER)].map((match) => match[0]);
}

function addUnique(target: string[], values: string[]): void {
  for (const value of values) {
    if (!target.includes(value)) target.push(value);
  }
}
