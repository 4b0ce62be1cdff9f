/**
 * Types for the structural tree produced by the syntax extractors.
 *
 * A file becomes an ordered list of declarations. Every function declaration
 * also carries its body as a language-neutral statement tree, which is the
 * input of the control-flow and data-flow builders.
 */

export type Visibility = 'public' | 'private' | 'protected' | 'exported' | 'internal';

export type DeclKind = 'function' | 'class' | 'import' | 'variable' | 'call-site';

export interface LineRange {
  start: number;
  end: number;
}

/**
 * What a statement (or the header part of a compound statement) reads and writes.
 */
export interface ValueFacts {
  /** Variable names written */
  defs: string[];
  /** Variable names read */
  uses: string[];
  /** Binary, logical and compound-assignment operations */
  operations: OperationFact[];
  /** Calls made, with the variable names passed as arguments */
  calls: CallFact[];
  /** Literal values, as written */
  constants: string[];
}

export interface OperationFact {
  operator: string;
  /** Operand variable names or literal text, in source order */
  operands: Operand[];
}

export interface Operand {
  value: string;
  literal: boolean;
}

export interface CallFact {
  /** Callee as written, e.g. `save` or `repo.save` */
  callee: string;
  /** Variable names read in the argument list */
  args: string[];
}

interface StatementHead {
  /** Statement id, unique within the enclosing function */
  id: number;
  line: number;
  endLine: number;
  /** Short source excerpt used as a label */
  text: string;
  /** Facts of the statement itself, or of its condition/header for compound statements */
  facts: ValueFacts;
}

export interface SimpleStatement extends StatementHead {
  kind: 'simple';
}

export interface IfStatement extends StatementHead {
  kind: 'if';
  consequent: Statement[];
  /** `null` when there is no else arm */
  alternate: Statement[] | null;
}

export type LoopKind = 'while' | 'for' | 'for-each' | 'do-while' | 'infinite';

export interface LoopStatement extends StatementHead {
  kind: 'loop';
  loopKind: LoopKind;
  /** Update clause of a C-style `for`, evaluated after the body */
  update: StatementPart | null;
  body: Statement[];
  label: string | null;
}

export interface SwitchStatement extends StatementHead {
  kind: 'switch';
  cases: SwitchCase[];
  /** Whether a case body that does not jump runs on into the next case */
  fallsThrough: boolean;
  label: string | null;
}

export interface SwitchCase extends StatementPart {
  /** `default`, `_` or `else` arm */
  isDefault: boolean;
  body: Statement[];
}

export interface TryStatement extends StatementHead {
  kind: 'try';
  block: Statement[];
  handler: CatchClause | null;
  finalizer: Statement[] | null;
}

export interface CatchClause extends StatementPart {
  body: Statement[];
}

export type JumpKind = 'return' | 'throw' | 'break' | 'continue' | 'goto';

export interface JumpStatement extends StatementHead {
  kind: JumpKind;
  /** Target label for labelled break/continue and goto */
  label: string | null;
}

/** A `name:` line that a goto can target */
export interface LabelStatement extends StatementHead {
  kind: 'label';
  name: string;
}

/** Sub-part of a compound statement that gets its own statement id */
export interface StatementPart {
  id: number;
  line: number;
  endLine: number;
  text: string;
  facts: ValueFacts;
}

export type Statement =
  | SimpleStatement
  | IfStatement
  | LoopStatement
  | SwitchStatement
  | TryStatement
  | JumpStatement
  | LabelStatement;

interface DeclBase {
  /** Index in the file's declaration list */
  id: number;
  name: string;
  /** `<module>::<name>` or `<module>::<Class>.<name>` */
  qualifiedName: string;
  file: string;
  range: LineRange;
  visibility: Visibility;
  language: string;
  /** Enclosing declaration (class for methods, function for nested functions and call sites) */
  parent: number | null;
}

export interface FunctionDecl extends DeclBase {
  kind: 'function';
  parameters: string[];
  returnType: string | null;
  isAsync: boolean;
  className: string | null;
  body: Statement[];
  /** Number of statement ids used by `body` */
  statementCount: number;
}

export interface ClassDecl extends DeclBase {
  kind: 'class';
  methods: string[];
  fields: string[];
}

export interface ImportDecl extends DeclBase {
  kind: 'import';
  /** Module specifier as written */
  source: string;
  importedNames: string[];
}

export interface VariableDecl extends DeclBase {
  kind: 'variable';
  isConst: boolean;
  isMutable: boolean;
}

export interface CallSiteDecl extends DeclBase {
  kind: 'call-site';
  /** Called name without receiver */
  callee: string;
  /** Receiver expression for member calls (`this`, `self`, `repo`) */
  receiver: string | null;
}

export type DeclNode = FunctionDecl | ClassDecl | ImportDecl | VariableDecl | CallSiteDecl;

export type ExtractionStrategyKind = 'grammar' | 'pattern';

export interface SyntaxTree {
  file: string;
  /** Module path used as the qualified-name prefix */
  modulePath: string;
  language: string;
  strategy: ExtractionStrategyKind;
  /** Set when the declarations come from line patterns rather than a grammar */
  heuristic: boolean;
  decls: DeclNode[];
  /** Names the module exports */
  exportedNames: string[];
}

export function emptyFacts(): ValueFacts {
  return { defs: [], uses: [], operations: [], calls: [], constants: [] };
}

/**
 * Merge facts in order, dropping duplicate names.
 */
export function mergeFacts(...items: ValueFacts[]): ValueFacts {
  const merged = emptyFacts();
  for (const facts of items) {
    pushUnique(merged.defs, facts.defs);
    pushUnique(merged.uses, facts.uses);
    merged.operations.push(...facts.operations);
    merged.calls.push(...facts.calls);
    merged.constants.push(...facts.constants);
  }
  return merged;
}

function pushUnique(target: string[], values: string[]): void {
  for (const value of values) {
    if (!target.includes(value)) target.push(value);
  }
}

export function isFunctionDecl(decl: DeclNode): decl is FunctionDecl {
  return decl.kind === 'function';
}

export function isCallSiteDecl(decl: DeclNode): decl is CallSiteDecl {
  return decl.kind === 'call-site';
}

export function isImportDecl(decl: DeclNode): decl is ImportDecl {
  return decl.kind === 'import';
}

/**
 * Sequential statement ids for one function body
 */
export class StatementIds {
  private next = 0;

  take(): number {
    return this.next++;
  }

  get count(): number {
    return this.next;
  }
}
