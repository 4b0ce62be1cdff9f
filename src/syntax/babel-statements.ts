/**
 * Babel statement nodes → language-neutral statement tree.
 */

import * as t from '@babel/types';
import { FactReader } from './babel-facts';
import { excerpt } from './source-text';
import {
  emptyFacts,
  mergeFacts,
  type CatchClause,
  type LoopKind,
  type Statement,
  type StatementIds,
  type StatementPart,
  type SwitchCase,
  type ValueFacts,
} from './syntax-types';

export class StatementConverter {
  private readonly facts: FactReader;

  constructor(
    source: string,
    private readonly ids: StatementIds
  ) {
    this.facts = new FactReader(source);
  }

  /**
   * Body of a function: a block, or the expression of an arrow function
   */
  functionBody(body: t.BlockStatement | t.Expression): Statement[] {
    if (t.isBlockStatement(body)) {
      return this.statements(body.body);
    }
    return this.returnOf(body, body);
  }

  statements(list: t.Statement[]): Statement[] {
    const result: Statement[] = [];
    for (const statement of list) {
      result.push(...this.statement(statement));
    }
    return result;
  }

  private statement(node: t.Statement): Statement[] {
    if (t.isBlockStatement(node)) {
      return this.statements(node.body);
    }

    if (t.isEmptyStatement(node) || t.isTSTypeAliasDeclaration(node) || t.isTSInterfaceDeclaration(node)) {
      return [];
    }

    if (t.isLabeledStatement(node)) {
      const inner = this.statement(node.body);
      const last = inner[inner.length - 1];
      if (last && (last.kind === 'loop' || last.kind === 'switch')) {
        last.label = node.label.name;
      }
      return inner;
    }

    if (t.isIfStatement(node)) {
      const id = this.ids.take();
      return [
        {
          kind: 'if',
          ...this.head(node, id, this.facts.expression(node.test)),
          consequent: this.statement(node.consequent),
          alternate: node.alternate ? this.statement(node.alternate) : null,
        },
      ];
    }

    if (t.isWhileStatement(node)) {
      const infinite = isAlwaysTrue(node.test);
      return [this.loop(node, infinite ? 'infinite' : 'while', this.facts.expression(node.test), node.body)];
    }

    if (t.isDoWhileStatement(node)) {
      return [this.loop(node, 'do-while', this.facts.expression(node.test), node.body)];
    }

    if (t.isForStatement(node)) {
      return this.forStatement(node);
    }

    if (t.isForInStatement(node) || t.isForOfStatement(node)) {
      const facts = this.facts.expression(node.right);
      const target = t.isVariableDeclaration(node.left) ? node.left.declarations.map((d) => d.id) : [node.left];
      for (const pattern of target) {
        this.facts.bind(pattern, facts);
      }
      return [this.loop(node, 'for-each', facts, node.body)];
    }

    if (t.isSwitchStatement(node)) {
      const id = this.ids.take();
      const cases: SwitchCase[] = node.cases.map((item) => ({
        ...this.part(item, this.facts.expression(item.test)),
        isDefault: item.test == null,
        body: this.statements(item.consequent),
      }));
      return [
        {
          kind: 'switch',
          ...this.head(node, id, this.facts.expression(node.discriminant)),
          cases,
          fallsThrough: true,
          label: null,
        },
      ];
    }

    if (t.isTryStatement(node)) {
      const id = this.ids.take();
      const block = this.statements(node.block.body);
      let handler: CatchClause | null = null;
      if (node.handler) {
        const facts = emptyFacts();
        if (node.handler.param) this.facts.bind(node.handler.param, facts);
        handler = { ...this.part(node.handler, facts), body: this.statements(node.handler.body.body) };
      }
      return [
        {
          kind: 'try',
          ...this.head(node, id, emptyFacts()),
          block,
          handler,
          finalizer: node.finalizer ? this.statements(node.finalizer.body) : null,
        },
      ];
    }

    if (t.isReturnStatement(node)) {
      return this.returnOf(node, node.argument ?? null);
    }

    if (t.isThrowStatement(node)) {
      const id = this.ids.take();
      return [{ kind: 'throw', ...this.head(node, id, this.facts.expression(node.argument)), label: null }];
    }

    if (t.isBreakStatement(node) || t.isContinueStatement(node)) {
      const id = this.ids.take();
      return [
        {
          kind: t.isBreakStatement(node) ? 'break' : 'continue',
          ...this.head(node, id, emptyFacts()),
          label: node.label ? node.label.name : null,
        },
      ];
    }

    if (t.isFunctionDeclaration(node) || t.isClassDeclaration(node)) {
      const id = this.ids.take();
      const facts = emptyFacts();
      if (node.id) facts.defs.push(node.id.name);
      return [{ kind: 'simple', ...this.head(node, id, facts) }];
    }

    if (t.isVariableDeclaration(node)) {
      return this.declaration(node);
    }

    if (t.isExpressionStatement(node)) {
      return this.expressionStatement(node, node.expression);
    }

    const id = this.ids.take();
    return [{ kind: 'simple', ...this.head(node, id, this.facts.expression(node)) }];
  }

  private forStatement(node: t.ForStatement): Statement[] {
    const prefix: Statement[] = [];
    if (node.init) {
      if (t.isVariableDeclaration(node.init)) {
        prefix.push(...this.declaration(node.init));
      } else {
        const id = this.ids.take();
        prefix.push({ kind: 'simple', ...this.head(node.init, id, this.facts.expression(node.init)) });
      }
    }

    const loopKind: LoopKind = node.test && !isAlwaysTrue(node.test) ? 'for' : 'infinite';
    const id = this.ids.take();
    const update: StatementPart | null = node.update ? this.part(node.update, this.facts.expression(node.update)) : null;
    const body = this.statement(node.body);

    return [
      ...prefix,
      {
        kind: 'loop',
        ...this.head(node, id, this.facts.expression(node.test)),
        loopKind,
        update,
        body,
        label: null,
      },
    ];
  }

  private loop(node: t.Loop, loopKind: LoopKind, facts: ValueFacts, bodyNode: t.Statement): Statement {
    const id = this.ids.take();
    return {
      kind: 'loop',
      ...this.head(node, id, facts),
      loopKind,
      update: null,
      body: this.statement(bodyNode),
      label: null,
    };
  }

  private declaration(node: t.VariableDeclaration): Statement[] {
    const declarators = node.declarations;
    if (declarators.length === 1) {
      const [only] = declarators;
      if (only.init && t.isConditionalExpression(only.init)) {
        return [this.conditional(node, only.init, (branch) => this.facts.assignment(only.id, branch))];
      }
    }

    const id = this.ids.take();
    const facts = mergeFacts(
      ...declarators.map((declarator) =>
        // `let x;` declares without defining
        declarator.init ? this.facts.assignment(declarator.id, declarator.init) : emptyFacts()
      )
    );
    return [{ kind: 'simple', ...this.head(node, id, facts) }];
  }

  private expressionStatement(node: t.ExpressionStatement, expression: t.Expression): Statement[] {
    if (t.isConditionalExpression(expression)) {
      return [this.conditional(node, expression, (branch) => this.facts.expression(branch))];
    }
    if (
      t.isAssignmentExpression(expression) &&
      expression.operator === '=' &&
      t.isConditionalExpression(expression.right)
    ) {
      const target = expression.left;
      return [this.conditional(node, expression.right, (branch) => this.facts.assignment(target, branch))];
    }
    const id = this.ids.take();
    return [{ kind: 'simple', ...this.head(node, id, this.facts.expression(expression)) }];
  }

  private returnOf(node: t.Node, argument: t.Expression | null): Statement[] {
    if (argument && t.isConditionalExpression(argument)) {
      const test = argument;
      const id = this.ids.take();
      const branch = (value: t.Expression): Statement => ({
        kind: 'return',
        ...this.head(value, this.ids.take(), this.facts.expression(value)),
        label: null,
      });
      return [
        {
          kind: 'if',
          ...this.head(node, id, this.facts.expression(test.test)),
          consequent: [branch(test.consequent)],
          alternate: [branch(test.alternate)],
        },
      ];
    }
    const id = this.ids.take();
    return [{ kind: 'return', ...this.head(node, id, this.facts.expression(argument)), label: null }];
  }

  /**
   * `c ? a : b` used as a statement becomes if/else over the two values
   */
  private conditional(
    node: t.Node,
    expression: t.ConditionalExpression,
    factsOf: (branch: t.Expression) => ValueFacts
  ): Statement {
    const id = this.ids.take();
    const arm = (branch: t.Expression): Statement => ({
      kind: 'simple',
      ...this.head(branch, this.ids.take(), factsOf(branch)),
    });
    return {
      kind: 'if',
      ...this.head(node, id, this.facts.expression(expression.test)),
      consequent: [arm(expression.consequent)],
      alternate: [arm(expression.alternate)],
    };
  }

  private head(node: t.Node, id: number, facts: ValueFacts): StatementPart {
    return {
      id,
      line: node.loc?.start.line ?? 0,
      endLine: node.loc?.end.line ?? 0,
      text: excerpt(this.facts.text(node)),
      facts,
    };
  }

  private part(node: t.Node, facts: ValueFacts): StatementPart {
    return this.head(node, this.ids.take(), facts);
  }
}

function isAlwaysTrue(test: t.Expression | null | undefined): boolean {
  if (!test) return true;
  return (t.isBooleanLiteral(test) && test.value) || (t.isNumericLiteral(test) && test.value !== 0);
}
