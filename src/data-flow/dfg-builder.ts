/**
 * DFG Builder - def-use chains for one function.
 *
 * The builder keeps the reaching definitions of every name while it walks the
 * statement tree. A definition replaces (kills) the previous ones; a read links
 * every reaching definition to a new use node. Branch arms run on copies of the
 * environment and only definitions made on every arm that falls through survive
 * the join. Loop bodies run once; uses in the loop that still see definitions
 * from before the loop also get an edge from the definitions live at the end of
 * the body (the value of the previous iteration).
 */

import type {
  FunctionDecl,
  LoopStatement,
  Statement,
  StatementPart,
  SwitchStatement,
  TryStatement,
} from '../syntax/syntax-types';
import type { DataEdgeKind, DataFlowGraph, DataEdge, VarNode, VarNodeKind } from './dfg-types';

type Environment = Map<string, number[]>;

/** How control leaves a statement list */
type Outcome = 'falls' | 'breaks' | 'leaves';

interface Arm {
  env: Environment;
  outcome: Outcome;
}

interface LoopFrame {
  /** First node id created inside the loop */
  start: number;
  /** Uses that can see a definition from before the loop */
  exposed: Array<{ use: number; name: string }>;
}

const IDENTIFIER = /^[A-Za-z_$@][\w$]*$/;

export function buildDataFlowGraph(fn: FunctionDecl): DataFlowGraph {
  const builder = new DFGBuilder(fn.qualifiedName, fn.file);
  return builder.build(fn.parameters, fn.body, fn.range.start);
}

export class DFGBuilder {
  private readonly nodes: VarNode[] = [];
  private readonly edges: DataEdge[] = [];
  private readonly edgeKeys = new Set<string>();
  private env: Environment = new Map();
  private readonly loops: LoopFrame[] = [];

  constructor(
    private readonly functionName: string,
    private readonly file: string
  ) {}

  build(parameters: string[], body: Statement[], line = 0): DataFlowGraph {
    for (const name of parameters) {
      this.env.set(name, [this.addNode('parameter', name, line, null)]);
    }
    this.sequence(body);

    return {
      functionName: this.functionName,
      file: this.file,
      parameters: [...parameters],
      nodes: this.nodes,
      edges: this.edges,
    };
  }

  private addNode(kind: VarNodeKind, name: string, line: number, statement: number | null): number {
    const id = this.nodes.length;
    this.nodes.push({ id, kind, name, line, statement });
    return id;
  }

  private addEdge(from: number, to: number, kind: DataEdgeKind): void {
    const key = `${from}>${to}:${kind}`;
    if (this.edgeKeys.has(key)) return;
    this.edgeKeys.add(key);
    this.edges.push({ from, to, kind });
  }

  /**
   * Nodes and edges for what one statement (part) reads and writes.
   * Reads resolve before the statement's own writes.
   */
  private facts(part: StatementPart): void {
    const { facts, line, id: statement } = part;
    const values: number[] = [];
    const uses = new Map<string, number>();

    for (const name of facts.uses) {
      const use = this.addNode('use', name, line, statement);
      uses.set(name, use);
      values.push(use);

      const reaching = this.env.get(name) ?? [];
      for (const def of reaching) {
        this.addEdge(def, use, 'def-use');
      }
      for (const frame of this.loops) {
        if (reaching.length === 0 || reaching.some((def) => def < frame.start)) {
          frame.exposed.push({ use, name });
        }
      }
    }

    for (const constant of facts.constants) {
      values.push(this.addNode('constant', constant, line, statement));
    }

    for (const operation of facts.operations) {
      const node = this.addNode('operation', operation.operator, line, statement);
      this.nodes[node].operands = operation.operands.map((operand) => {
        if (operand.literal) return operand.value;
        if (!IDENTIFIER.test(operand.value)) return `~${node}`;
        const reaching = this.env.get(operand.value);
        return reaching ? reaching.map((def) => `#${def}`).join('|') : `?${operand.value}`;
      });
      for (const operand of operation.operands) {
        const use = uses.get(operand.value);
        if (!operand.literal && use !== undefined) this.addEdge(use, node, 'flow');
      }
      values.push(node);
    }

    for (const call of facts.calls) {
      const node = this.addNode('call', call.callee, line, statement);
      for (const arg of call.args) {
        const use = uses.get(arg);
        if (use !== undefined) this.addEdge(use, node, 'flow');
      }
      values.push(node);
    }

    for (const name of facts.defs) {
      const def = this.addNode('definition', name, line, statement);
      for (const value of values) {
        this.addEdge(value, def, 'flow');
      }
      this.env.set(name, [def]);
    }
  }

  private sequence(statements: Statement[]): Outcome {
    let outcome: Outcome = 'falls';
    for (const statement of statements) {
      const result = this.statement(statement);
      if (outcome === 'falls') outcome = result;
    }
    return outcome;
  }

  private statement(statement: Statement): Outcome {
    switch (statement.kind) {
      case 'simple':
      case 'label':
        this.facts(statement);
        return 'falls';
      case 'return':
      case 'throw':
      case 'continue':
      case 'goto':
        this.facts(statement);
        return 'leaves';
      case 'break':
        this.facts(statement);
        return 'breaks';
      case 'if':
        return this.ifStatement(statement, statement.consequent, statement.alternate);
      case 'loop':
        return statement.loopKind === 'do-while' ? this.doWhile(statement) : this.loop(statement);
      case 'switch':
        return this.switchStatement(statement);
      case 'try':
        return this.tryStatement(statement);
    }
  }

  private ifStatement(head: StatementPart, consequent: Statement[], alternate: Statement[] | null): Outcome {
    this.facts(head);
    const before = new Map(this.env);

    const arms = [this.arm(before, consequent)];
    arms.push(alternate ? this.arm(before, alternate) : { env: before, outcome: 'falls' });

    this.env = join(before, arms.filter((arm) => arm.outcome === 'falls'));
    if (arms.some((arm) => arm.outcome === 'falls')) return 'falls';
    return arms.some((arm) => arm.outcome === 'breaks') ? 'breaks' : 'leaves';
  }

  private loop(statement: LoopStatement): Outcome {
    const before = new Map(this.env);
    const frame: LoopFrame = { start: this.nodes.length, exposed: [] };
    this.loops.push(frame);

    this.facts(statement);
    const afterHeader = new Map(this.env);
    const outcome = this.sequence(statement.body);
    if (statement.update) this.facts(statement.update);

    this.loops.pop();
    if (outcome === 'falls' || statement.update) this.carry(frame);

    // the loop variable of a for-each only exists inside the loop
    this.env = statement.loopKind === 'for-each' ? before : afterHeader;
    return 'falls';
  }

  private doWhile(statement: LoopStatement): Outcome {
    const frame: LoopFrame = { start: this.nodes.length, exposed: [] };
    this.loops.push(frame);
    // the body always runs once, so its definitions stay visible
    this.sequence(statement.body);
    this.facts(statement);
    this.loops.pop();
    this.carry(frame);
    return 'falls';
  }

  /**
   * Loop-carried edges from definitions live at the end of the body
   */
  private carry(frame: LoopFrame): void {
    for (const { use, name } of frame.exposed) {
      for (const def of this.env.get(name) ?? []) {
        if (def >= frame.start) this.addEdge(def, use, 'def-use');
      }
    }
  }

  private switchStatement(statement: SwitchStatement): Outcome {
    this.facts(statement);
    const before = new Map(this.env);
    const arms: Arm[] = [];

    for (const item of statement.cases) {
      this.env = new Map(before);
      this.facts(item);
      const outcome = this.sequence(item.body);
      arms.push({ env: this.env, outcome });
    }
    if (!statement.cases.some((item) => item.isDefault)) {
      arms.push({ env: before, outcome: 'falls' });
    }

    // a break inside a case ends the switch, not the enclosing loop
    const reaching = arms.filter((arm) => arm.outcome !== 'leaves');
    this.env = join(before, reaching);
    return reaching.length > 0 ? 'falls' : 'leaves';
  }

  private tryStatement(statement: TryStatement): Outcome {
    this.facts(statement);
    const before = new Map(this.env);
    const arms = [this.arm(before, statement.block)];

    if (statement.handler) {
      this.env = new Map(before);
      this.facts(statement.handler);
      arms.push({ env: this.env, outcome: this.sequence(statement.handler.body) });
    }

    const falling = arms.filter((arm) => arm.outcome === 'falls');
    this.env = join(before, falling);
    const finalOutcome = statement.finalizer ? this.sequence(statement.finalizer) : 'falls';
    if (finalOutcome !== 'falls') return finalOutcome;
    return falling.length > 0 ? 'falls' : arms[0].outcome;
  }

  private arm(before: Environment, statements: Statement[]): Arm {
    this.env = new Map(before);
    const outcome = this.sequence(statements);
    return { env: this.env, outcome };
  }
}

/**
 * Environment after a join: a name takes the union of the arms' definitions
 * only when every arm redefined it; otherwise the definitions from before the
 * branch still reach.
 */
function join(before: Environment, arms: Arm[]): Environment {
  if (arms.length === 0) return new Map(before);

  const result = new Map(before);
  const names = new Set<string>();
  for (const arm of arms) {
    for (const name of arm.env.keys()) names.add(name);
  }

  for (const name of names) {
    const previous = before.get(name);
    if (!arms.every((arm) => arm.env.get(name) !== previous && arm.env.has(name))) continue;
    const union = new Set<number>();
    for (const arm of arms) {
      for (const def of arm.env.get(name) ?? []) union.add(def);
    }
    result.set(name, [...union].sort((a, b) => a - b));
  }

  return result;
}
