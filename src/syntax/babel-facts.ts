/**
 * Def/use facts read from Babel expression nodes.
 */

import * as t from '@babel/types';
import { emptyFacts, type Operand, type ValueFacts } from './syntax-types';

const IGNORED_NAMES = new Set(['undefined', 'arguments', 'NaN', 'Infinity']);

/**
 * Facts collector bound to one file's source text (needed for literal values)
 */
export class FactReader {
  constructor(private readonly source: string) {}

  text(node: t.Node): string {
    return node.start == null || node.end == null ? '' : this.source.slice(node.start, node.end);
  }

  /**
   * Facts of an expression evaluated for its value
   */
  expression(node: t.Node | null | undefined): ValueFacts {
    const facts = emptyFacts();
    if (node) this.visit(node, facts);
    return facts;
  }

  /**
   * Facts of `target = value`; `value` may be null for a bare declaration target
   */
  assignment(target: t.Node, value: t.Node | null, operator = '='): ValueFacts {
    const facts = emptyFacts();
    if (value) this.visit(value, facts);
    this.bind(target, facts);

    if (operator !== '=' && t.isIdentifier(target)) {
      addUnique(facts.uses, [target.name]);
      facts.operations.push({
        operator: operator.slice(0, -1),
        operands: [{ value: target.name, literal: false }, value ? this.operand(value) : { value: '', literal: true }],
      });
    }
    return facts;
  }

  /**
   * Names a binding pattern writes. Member targets are reads of their object.
   */
  bind(pattern: t.Node, facts: ValueFacts): void {
    if (t.isIdentifier(pattern)) {
      addUnique(facts.defs, [pattern.name]);
    } else if (t.isObjectPattern(pattern)) {
      for (const property of pattern.properties) {
        if (t.isRestElement(property)) {
          this.bind(property.argument, facts);
        } else {
          if (property.computed) this.visit(property.key, facts);
          this.bind(property.value, facts);
        }
      }
    } else if (t.isArrayPattern(pattern)) {
      for (const element of pattern.elements) {
        if (element) this.bind(element, facts);
      }
    } else if (t.isAssignmentPattern(pattern)) {
      this.visit(pattern.right, facts);
      this.bind(pattern.left, facts);
    } else if (t.isRestElement(pattern)) {
      this.bind(pattern.argument, facts);
    } else if (t.isTSParameterProperty(pattern)) {
      this.bind(pattern.parameter, facts);
    } else if (t.isMemberExpression(pattern) || t.isOptionalMemberExpression(pattern)) {
      this.visit(pattern.object, facts);
      if (pattern.computed) this.visit(pattern.property, facts);
    } else if (t.isTSAsExpression(pattern) || t.isTSNonNullExpression(pattern) || t.isTSSatisfiesExpression(pattern)) {
      this.bind(pattern.expression, facts);
    }
  }

  private visit(node: t.Node, facts: ValueFacts): void {
    if (t.isIdentifier(node)) {
      if (!IGNORED_NAMES.has(node.name)) addUnique(facts.uses, [node.name]);
      return;
    }

    if (t.isFunction(node) || t.isClass(node)) {
      // nested functions are declarations of their own
      return;
    }

    if (t.isMemberExpression(node) || t.isOptionalMemberExpression(node)) {
      this.visit(node.object, facts);
      if (node.computed) this.visit(node.property, facts);
      return;
    }

    if (t.isCallExpression(node) || t.isOptionalCallExpression(node) || t.isNewExpression(node)) {
      const callee = calleeName(node.callee);
      if (!t.isIdentifier(node.callee) && !t.isV8IntrinsicIdentifier(node.callee)) {
        this.visit(node.callee, facts);
      }
      const args = emptyFacts();
      for (const arg of node.arguments) {
        this.visit(arg, args);
      }
      if (callee && !t.isNewExpression(node)) {
        facts.calls.push({ callee, args: args.uses });
      }
      mergeInto(facts, args);
      return;
    }

    if (t.isBinaryExpression(node) || t.isLogicalExpression(node)) {
      facts.operations.push({
        operator: node.operator,
        operands: [this.operand(node.left), this.operand(node.right)],
      });
      this.visit(node.left, facts);
      this.visit(node.right, facts);
      return;
    }

    if (t.isAssignmentExpression(node)) {
      mergeInto(facts, this.assignment(node.left, node.right, node.operator));
      return;
    }

    if (t.isUpdateExpression(node)) {
      if (t.isIdentifier(node.argument)) {
        addUnique(facts.defs, [node.argument.name]);
        addUnique(facts.uses, [node.argument.name]);
        facts.operations.push({
          operator: node.operator.charAt(0),
          operands: [
            { value: node.argument.name, literal: false },
            { value: '1', literal: true },
          ],
        });
        facts.constants.push('1');
      } else {
        this.visit(node.argument, facts);
      }
      return;
    }

    if (t.isLiteral(node) && !t.isTemplateLiteral(node)) {
      facts.constants.push(this.text(node));
      return;
    }

    if (t.isObjectProperty(node)) {
      if (node.computed) this.visit(node.key, facts);
      this.visit(node.value, facts);
      return;
    }

    if (t.isJSXAttribute(node) || t.isJSXIdentifier(node) || t.isJSXMemberExpression(node)) {
      if (t.isJSXAttribute(node) && node.value) this.visit(node.value, facts);
      return;
    }

    if (t.isTSType(node) || t.isTSTypeAnnotation(node) || t.isTSTypeParameterInstantiation(node)) {
      return;
    }

    for (const child of children(node)) {
      this.visit(child, facts);
    }
  }

  operand(node: t.Node): Operand {
    if (t.isIdentifier(node)) return { value: node.name, literal: false };
    if (t.isLiteral(node) && !t.isTemplateLiteral(node)) return { value: this.text(node), literal: true };
    return { value: this.text(node), literal: false };
  }
}

/**
 * `save`, `repo.save`, `this.save`; null for computed or dynamic callees
 */
export function calleeName(callee: t.Node): string | null {
  if (t.isIdentifier(callee)) return callee.name;
  if (t.isThisExpression(callee)) return 'this';
  if (t.isSuper(callee)) return 'super';
  if ((t.isMemberExpression(callee) || t.isOptionalMemberExpression(callee)) && !callee.computed) {
    const object = calleeName(callee.object);
    if (object && t.isIdentifier(callee.property)) return `${object}.${callee.property.name}`;
    if (object && t.isPrivateName(callee.property)) return `${object}.#${callee.property.id.name}`;
  }
  return null;
}

function children(node: t.Node): t.Node[] {
  const keys = t.VISITOR_KEYS[node.type] ?? [];
  const found: t.Node[] = [];
  for (const key of keys) {
    const value: unknown = Reflect.get(node, key);
    if (Array.isArray(value)) {
      for (const item of value) {
        if (isNode(item)) found.push(item);
      }
    } else if (isNode(value)) {
      found.push(value);
    }
  }
  return found;
}

function isNode(value: unknown): value is t.Node {
  return typeof value === 'object' && value !== null && t.isNode(value);
}

function mergeInto(target: ValueFacts, source: ValueFacts): void {
  addUnique(target.defs, source.defs);
  addUnique(target.uses, source.uses);
  target.operations.push(...source.operations);
  target.calls.push(...source.calls);
  target.constants.push(...source.constants);
}

function addUnique(target: string[], values: string[]): void {
  for (const value of values) {
    if (!target.includes(value)) target.push(value);
  }
}
