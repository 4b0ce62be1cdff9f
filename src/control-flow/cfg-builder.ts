/**
 * CFG Builder - partitions a function's statement tree into basic blocks.
 *
 * Blocks open at every branch and loop keyword and close on jumps. After an
 * unconditional jump there is no current block, so the next statement starts a
 * block without incoming edges. That block is unreachable, which is how code
 * after a return is found.
 */

import type { FunctionDecl, LoopStatement, Statement, StatementPart, SwitchStatement, TryStatement } from '../syntax/syntax-types';
import type {
  BasicBlock,
  BlockKind,
  ControlEdgeKind,
  ControlFlowGraph,
  ControlEdge,
  JumpContext,
  StatementSite,
  TryContext,
} from './cfg-types';

const ENTRY = 0;
const EXIT = 1;

/**
 * Build the CFG of one function.
 */
export function buildControlFlowGraph(fn: FunctionDecl): ControlFlowGraph {
  const builder = new CFGBuilder(fn.qualifiedName, fn.file);
  return builder.build(fn.body);
}

/**
 * CFG Builder class that maintains state during graph construction.
 */
export class CFGBuilder {
  private readonly blocks: BasicBlock[] = [];
  private readonly edges: ControlEdge[] = [];
  private readonly sites: StatementSite[] = [];

  /** Block statements are appended to; `null` right after a jump */
  private current: number | null = ENTRY;

  private readonly jumpStack: JumpContext[] = [];
  private readonly tryStack: TryContext[] = [];
  private readonly labels = new Map<string, number>();
  private readonly pendingGotos: Array<{ from: number; label: string }> = [];

  constructor(
    private readonly functionName: string,
    private readonly file: string
  ) {
    this.createBlock('entry');
    this.createBlock('exit');
  }

  build(body: Statement[]): ControlFlowGraph {
    this.sequence(body);

    // falling off the end
    if (this.current !== null) {
      this.connect(this.current, EXIT, 'sequential');
    }

    for (const { from, label } of this.pendingGotos) {
      this.connect(from, this.labels.get(label) ?? EXIT, 'break');
    }

    return {
      functionName: this.functionName,
      file: this.file,
      entry: ENTRY,
      exit: EXIT,
      nodes: this.blocks,
      edges: this.edges,
      statements: [...this.sites].sort((a, b) => a.id - b.id),
    };
  }

  private createBlock(kind: BlockKind): number {
    const id = this.blocks.length;
    this.blocks.push({ id, kind, statements: [], joinBlock: null });
    return id;
  }

  private connect(from: number, to: number, kind: ControlEdgeKind): void {
    if (this.edges.some((edge) => edge.from === from && edge.to === to && edge.kind === kind)) return;
    this.edges.push({ from, to, kind });
  }

  private place(block: number, part: StatementPart): void {
    this.blocks[block].statements.push(part.id);
    this.sites.push({
      id: part.id,
      line: part.line,
      endLine: part.endLine,
      text: part.text,
      block,
      facts: part.facts,
    });
  }

  private hasIncoming(block: number): boolean {
    return this.edges.some((edge) => edge.to === block);
  }

  private isEmptyNormal(block: number): boolean {
    const candidate = this.blocks[block];
    return candidate.kind === 'normal' && candidate.statements.length === 0;
  }

  /**
   * Start a block of the given kind after the current one. An empty normal
   * block (a fresh arm or join block) is taken over rather than chained.
   */
  private open(kind: BlockKind): number {
    const from = this.current;
    if (from !== null && this.isEmptyNormal(from)) {
      this.blocks[from].kind = kind;
      return from;
    }
    const block = this.createBlock(kind);
    if (from !== null) this.connect(from, block, 'sequential');
    return block;
  }

  /**
   * Block that straight-line statements go into
   */
  private straightLine(): number {
    if (this.current === null) {
      // nothing falls into this block
      this.current = this.createBlock('normal');
    }
    const kind = this.blocks[this.current].kind;
    if (kind !== 'entry' && kind !== 'normal') {
      this.current = this.open('normal');
    }
    return this.current;
  }

  private sequence(statements: Statement[]): void {
    for (const statement of statements) {
      this.statement(statement);
    }
  }

  private statement(statement: Statement): void {
    switch (statement.kind) {
      case 'simple':
        this.place(this.straightLine(), statement);
        return;
      case 'label':
        this.label(statement, statement.name);
        return;
      case 'if':
        this.ifStatement(statement, statement.consequent, statement.alternate);
        return;
      case 'loop':
        if (statement.loopKind === 'do-while') {
          this.doWhile(statement);
        } else {
          this.loop(statement);
        }
        return;
      case 'switch':
        this.switchStatement(statement);
        return;
      case 'try':
        this.tryStatement(statement);
        return;
      case 'return':
        this.jump(statement, EXIT, 'sequential', true);
        return;
      case 'throw': {
        const handler = this.innermostHandler();
        this.jump(statement, handler ?? EXIT, 'sequential', handler === null);
        return;
      }
      case 'break': {
        const target = this.jumpTarget(statement.label, false);
        if (target) {
          this.jump(statement, target.breakTo, 'break', false);
        } else {
          this.place(this.straightLine(), statement);
        }
        return;
      }
      case 'continue': {
        const target = this.jumpTarget(statement.label, true);
        if (target && target.continueTo !== null) {
          this.jump(statement, target.continueTo, 'continue', false);
        } else {
          this.place(this.straightLine(), statement);
        }
        return;
      }
      case 'goto': {
        const block = this.straightLine();
        this.place(block, statement);
        if (statement.label) this.pendingGotos.push({ from: block, label: statement.label });
        this.current = null;
        return;
      }
    }
  }

  /**
   * End the current block with a jump to `target`
   */
  private jump(part: StatementPart, target: number, kind: ControlEdgeKind, leavesFunction: boolean): void {
    let block = this.straightLine();
    if (leavesFunction && this.blocks[block].kind === 'entry') {
      block = this.open('normal');
    }
    if (leavesFunction) this.blocks[block].kind = 'return';
    this.place(block, part);
    this.connect(block, target, kind);
    this.current = null;
  }

  private label(part: StatementPart, name: string): void {
    let block: number;
    if (this.current !== null && this.isEmptyNormal(this.current)) {
      block = this.current;
    } else {
      block = this.createBlock('normal');
      if (this.current !== null) this.connect(this.current, block, 'sequential');
    }
    this.place(block, part);
    this.labels.set(name, block);
    this.current = block;
  }

  private ifStatement(head: StatementPart, consequent: Statement[], alternate: Statement[] | null): void {
    const branch = this.open('branch');
    this.place(branch, head);

    const thenBlock = this.createBlock('normal');
    this.connect(branch, thenBlock, 'true-branch');
    this.current = thenBlock;
    this.sequence(consequent);
    const ends = [this.current];

    if (alternate) {
      const elseBlock = this.createBlock('normal');
      this.connect(branch, elseBlock, 'false-branch');
      this.current = elseBlock;
      this.sequence(alternate);
      ends.push(this.current);
    }

    const fallThrough = ends.filter((end): end is number => end !== null);
    if (alternate && fallThrough.length === 0) {
      // both arms jump away
      this.current = null;
      return;
    }

    const join = this.createBlock('normal');
    for (const end of fallThrough) {
      this.connect(end, join, 'sequential');
    }
    if (!alternate) this.connect(branch, join, 'false-branch');
    this.blocks[branch].joinBlock = join;
    this.current = join;
  }

  private loop(statement: LoopStatement): void {
    const header = this.open('loop');
    this.place(header, statement);

    const after = this.createBlock('normal');
    let update: number | null = null;
    if (statement.update) {
      update = this.createBlock('normal');
      this.place(update, statement.update);
    }

    const body = this.createBlock('normal');
    this.connect(header, body, 'true-branch');
    this.current = body;

    this.jumpStack.push({ kind: 'loop', label: statement.label, breakTo: after, continueTo: update ?? header });
    this.sequence(statement.body);
    this.jumpStack.pop();

    if (update !== null) {
      if (this.current !== null) this.connect(this.current, update, 'sequential');
      this.connect(update, header, 'loop-back');
    } else if (this.current !== null) {
      this.connect(this.current, header, 'loop-back');
    }

    if (statement.loopKind !== 'infinite') {
      this.connect(header, after, 'false-branch');
    }
    this.blocks[header].joinBlock = after;
    this.current = this.hasIncoming(after) ? after : null;
  }

  private doWhile(statement: LoopStatement): void {
    const body = this.open('normal');
    const test = this.createBlock('loop');
    this.place(test, statement);
    const after = this.createBlock('normal');

    this.current = body;
    this.jumpStack.push({ kind: 'loop', label: statement.label, breakTo: after, continueTo: test });
    this.sequence(statement.body);
    this.jumpStack.pop();

    if (this.current !== null) this.connect(this.current, test, 'sequential');
    this.connect(test, body, 'loop-back');
    this.connect(test, after, 'false-branch');
    this.blocks[test].joinBlock = after;
    this.current = after;
  }

  private switchStatement(statement: SwitchStatement): void {
    const dispatch = this.open('branch');
    this.place(dispatch, statement);
    const after = this.createBlock('normal');

    this.jumpStack.push({ kind: 'switch', label: statement.label, breakTo: after, continueTo: null });
    let previousEnd: number | null = null;
    for (const item of statement.cases) {
      const arm = this.createBlock('normal');
      this.place(arm, item);
      this.connect(dispatch, arm, 'true-branch');
      if (previousEnd !== null) {
        this.connect(previousEnd, statement.fallsThrough ? arm : after, 'sequential');
      }
      this.current = arm;
      this.sequence(item.body);
      previousEnd = this.current;
    }
    this.jumpStack.pop();

    if (previousEnd !== null) this.connect(previousEnd, after, 'sequential');
    if (!statement.cases.some((item) => item.isDefault)) {
      this.connect(dispatch, after, 'false-branch');
    }
    this.blocks[dispatch].joinBlock = after;
    this.current = this.hasIncoming(after) ? after : null;
  }

  private tryStatement(statement: TryStatement): void {
    const start = this.straightLine();
    this.place(start, statement);

    let handler: number | null = null;
    if (statement.handler) {
      handler = this.createBlock('normal');
      this.place(handler, statement.handler);
      // any statement of the protected block may throw
      this.connect(start, handler, 'sequential');
    }

    this.tryStack.push({ handler });
    this.sequence(statement.block);
    this.tryStack.pop();
    const ends = [this.current];

    if (statement.handler && handler !== null) {
      this.tryStack.push({ handler: null });
      this.current = handler;
      this.sequence(statement.handler.body);
      this.tryStack.pop();
      ends.push(this.current);
    }

    const fallThrough = ends.filter((end): end is number => end !== null);
    if (!statement.finalizer) {
      this.current = this.joinOf(fallThrough);
      return;
    }

    const finalizer = this.createBlock('normal');
    for (const end of fallThrough) {
      this.connect(end, finalizer, 'sequential');
    }
    if (fallThrough.length === 0) {
      // entered on the way out of a jump
      this.connect(start, finalizer, 'sequential');
    }
    this.current = finalizer;
    this.sequence(statement.finalizer);

    if (fallThrough.length === 0 && this.current !== null) {
      this.connect(this.current, EXIT, 'sequential');
      this.current = null;
    }
  }

  private joinOf(ends: number[]): number | null {
    if (ends.length === 0) return null;
    const join = this.createBlock('normal');
    for (const end of ends) {
      this.connect(end, join, 'sequential');
    }
    return join;
  }

  private innermostHandler(): number | null {
    for (let i = this.tryStack.length - 1; i >= 0; i--) {
      const handler = this.tryStack[i].handler;
      if (handler !== null) return handler;
    }
    return null;
  }

  private jumpTarget(label: string | null, continuable: boolean): JumpContext | undefined {
    for (let i = this.jumpStack.length - 1; i >= 0; i--) {
      const context = this.jumpStack[i];
      if (label !== null) {
        if (context.label === label) return context;
      } else if (!continuable || context.kind === 'loop') {
        return context;
      }
    }
    return undefined;
  }
}
