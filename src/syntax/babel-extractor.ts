/**
 * Grammar-based extraction for the JavaScript/TypeScript family.
 */

import * as parser from '@babel/parser';
import traverse, { NodePath } from '@babel/traverse';
import * as t from '@babel/types';
import { ParseFailureError } from '../errors';
import type { LanguageProfile } from '../language/language-registry';
import { calleeName, FactReader } from './babel-facts';
import { StatementConverter } from './babel-statements';
import type { ExtractionInput } from './pattern-extractor';
import {
  emptyFacts,
  StatementIds,
  type CallSiteDecl,
  type ClassDecl,
  type DeclNode,
  type FunctionDecl,
  type ImportDecl,
  type SyntaxTree,
  type VariableDecl,
  type Visibility,
} from './syntax-types';

type FunctionNode = t.FunctionDeclaration | t.FunctionExpression | t.ArrowFunctionExpression | t.ClassMethod | t.ClassPrivateMethod | t.ObjectMethod;

export function parseSource(file: string, source: string): t.File {
  const typescript = /\.[cm]?tsx?$/.test(file);
  const plugins: parser.ParserPlugin[] = typescript
    ? ['typescript', 'decorators-legacy']
    : ['jsx'];
  if (/\.tsx$/.test(file)) plugins.push('jsx');

  try {
    return parser.parse(source, {
      sourceType: 'module',
      allowReturnOutsideFunction: true,
      plugins,
    });
  } catch (error) {
    const loc = syntaxErrorLocation(error);
    throw new ParseFailureError(
      file,
      error instanceof Error ? error.message : String(error),
      loc?.line ?? null,
      loc?.column ?? null
    );
  }
}

export function extractWithGrammar(input: ExtractionInput, profile: LanguageProfile): SyntaxTree {
  const ast = parseSource(input.file, input.source);
  const facts = new FactReader(input.source);
  const exported = exportedNames(ast);
  const decls: DeclNode[] = [];
  const parentOf = new Map<DeclNode, DeclNode>();
  const functionByNode = new Map<t.Node, FunctionDecl>();
  const classByNode = new Map<t.Node, ClassDecl>();

  const base = (name: string, node: t.Node) => ({
    id: -1,
    name,
    file: input.file,
    range: { start: node.loc?.start.line ?? 0, end: node.loc?.end.line ?? 0 },
    language: profile.id,
    parent: null,
  });

  const enclosingClass = (path: NodePath): ClassDecl | undefined => {
    const classPath = path.findParent((p) => p.isClass());
    return classPath ? classByNode.get(classPath.node) : undefined;
  };

  const enclosingFunction = (path: NodePath): FunctionDecl | undefined => {
    let current = path.getFunctionParent();
    while (current) {
      const decl = functionByNode.get(current.node);
      if (decl) return decl;
      current = current.getFunctionParent();
    }
    return undefined;
  };

  const addFunction = (
    path: NodePath,
    node: FunctionNode,
    name: string,
    className: string | null,
    visibility: Visibility
  ) => {
    const ids = new StatementIds();
    const body = new StatementConverter(input.source, ids).functionBody(node.body);
    // a nested function is scoped by the function around it
    const outer = className === null ? enclosingFunction(path) : undefined;
    const decl: FunctionDecl = {
      kind: 'function',
      ...base(name, node),
      qualifiedName: outer
        ? `${outer.qualifiedName}.${name}`
        : `${input.modulePath}::${className ? `${className}.` : ''}${name}`,
      visibility,
      parameters: parameterNames(node.params, facts),
      returnType: node.returnType && t.isTSTypeAnnotation(node.returnType) ? facts.text(node.returnType.typeAnnotation) : null,
      isAsync: node.async ?? false,
      className,
      body,
      statementCount: ids.count,
    };
    const parent = enclosingFunction(path) ?? enclosingClass(path);
    if (parent) parentOf.set(decl, parent);
    functionByNode.set(node, decl);
    decls.push(decl);

    if (className) {
      const owner = enclosingClass(path);
      if (owner && owner.name === className) owner.methods.push(name);
    }
  };

  const moduleVisibility = (name: string, path: NodePath): Visibility => {
    if (path.getFunctionParent()) return 'private';
    return exported.has(name) ? 'exported' : 'internal';
  };

  // function expressions are declarations only when something names them
  const addFunctionExpression = (path: NodePath, node: t.FunctionExpression | t.ArrowFunctionExpression) => {
    const { parent } = path;
    if (t.isVariableDeclarator(parent) && t.isIdentifier(parent.id)) {
      addFunction(path, node, parent.id.name, null, moduleVisibility(parent.id.name, path));
    } else if (t.isAssignmentExpression(parent) && t.isMemberExpression(parent.left) && t.isIdentifier(parent.left.property)) {
      const owner = calleeName(parent.left.object);
      const name = parent.left.property.name;
      const isExport = owner === 'exports' || owner === 'module.exports';
      addFunction(path, node, name, isExport ? null : owner, isExport ? 'exported' : 'public');
    } else if (t.isClassProperty(parent) && t.isIdentifier(parent.key)) {
      addFunction(path, node, parent.key.name, enclosingClass(path)?.name ?? null, memberVisibility(parent));
    } else if (t.isFunctionExpression(node) && node.id) {
      addFunction(path, node, node.id.name, null, 'private');
    }
  };

  const addMethod = (path: NodePath, node: t.ClassMethod | t.ClassPrivateMethod) => {
    const name = memberName(node.key);
    if (name) addFunction(path, node, name, enclosingClass(path)?.name ?? null, memberVisibility(node));
  };

  const addField = (path: NodePath, node: t.ClassProperty | t.ClassPrivateProperty) => {
    const name = memberName(node.key);
    const owner = enclosingClass(path);
    if (name && owner && !t.isArrowFunctionExpression(node.value) && !t.isFunctionExpression(node.value)) {
      owner.fields.push(name);
    }
  };

  traverse(ast, {
    ClassDeclaration(path) {
      addClass(path, path.node);
    },
    ClassExpression(path) {
      addClass(path, path.node);
    },

    FunctionDeclaration(path) {
      const name = path.node.id?.name ?? 'default';
      addFunction(path, path.node, name, null, moduleVisibility(name, path));
    },
    FunctionExpression(path) {
      addFunctionExpression(path, path.node);
    },
    ArrowFunctionExpression(path) {
      addFunctionExpression(path, path.node);
    },
    ClassMethod(path) {
      addMethod(path, path.node);
    },
    ClassPrivateMethod(path) {
      addMethod(path, path.node);
    },

    ObjectMethod(path) {
      const name = memberName(path.node.key);
      if (!name) return;
      const holder = path.parentPath.parent;
      const owner = t.isVariableDeclarator(holder) && t.isIdentifier(holder.id) ? holder.id.name : null;
      addFunction(path, path.node, name, owner, 'public');
    },

    ClassProperty(path) {
      addField(path, path.node);
    },
    ClassPrivateProperty(path) {
      addField(path, path.node);
    },

    ImportDeclaration(path) {
      decls.push(importDecl(path.node.source.value, path.node.specifiers.map((s) => s.local.name), path.node));
    },

    VariableDeclarator(path) {
      const { node } = path;
      if (t.isArrowFunctionExpression(node.init) || t.isFunctionExpression(node.init)) return;
      const declaration = path.parent;
      if (!t.isVariableDeclaration(declaration)) return;

      const required = t.isCallExpression(node.init) && t.isIdentifier(node.init.callee, { name: 'require' })
        ? node.init.arguments[0]
        : undefined;
      if (t.isStringLiteral(required)) {
        decls.push(importDecl(required.value, bindingNames(node.id, facts), node));
        return;
      }

      const owner = enclosingFunction(path);
      for (const name of bindingNames(node.id, facts)) {
        const decl: VariableDecl = {
          kind: 'variable',
          ...base(name, node),
          qualifiedName: owner ? `${owner.qualifiedName}.${name}` : `${input.modulePath}::${name}`,
          visibility: moduleVisibility(name, path),
          isConst: declaration.kind === 'const',
          isMutable: declaration.kind !== 'const',
        };
        if (owner) parentOf.set(decl, owner);
        decls.push(decl);
      }
    },

    CallExpression(path) {
      const { node } = path;
      const [first] = node.arguments;
      if (t.isImport(node.callee) && t.isStringLiteral(first)) {
        decls.push(importDecl(first.value, [], node));
        return;
      }
      if (t.isIdentifier(node.callee, { name: 'require' })) return;

      const site = callSite(node.callee, node);
      if (!site) return;
      const caller = enclosingFunction(path);
      if (caller) {
        site.qualifiedName = `${caller.qualifiedName}@${site.range.start}:${site.qualifiedName}`;
        parentOf.set(site, caller);
      } else {
        site.qualifiedName = `${input.modulePath}::<module>@${site.range.start}:${site.qualifiedName}`;
      }
      decls.push(site);
    },

    OptionalCallExpression(path) {
      const site = callSite(path.node.callee, path.node);
      if (!site) return;
      const caller = enclosingFunction(path);
      site.qualifiedName = `${caller ? caller.qualifiedName : `${input.modulePath}::<module>`}@${site.range.start}:${site.qualifiedName}`;
      if (caller) parentOf.set(site, caller);
      decls.push(site);
    },
  });

  function addClass(path: NodePath, node: t.ClassDeclaration | t.ClassExpression): void {
    let name = node.id?.name;
    if (!name && t.isVariableDeclarator(path.parent) && t.isIdentifier(path.parent.id)) {
      name = path.parent.id.name;
    }
    if (!name) return;

    const decl: ClassDecl = {
      kind: 'class',
      ...base(name, node),
      qualifiedName: `${input.modulePath}::${name}`,
      visibility: moduleVisibility(name, path),
      methods: [],
      fields: [],
    };
    const outer = enclosingFunction(path) ?? enclosingClass(path);
    if (outer) parentOf.set(decl, outer);
    classByNode.set(node, decl);
    decls.push(decl);
  }

  function importDecl(source: string, names: string[], node: t.Node): ImportDecl {
    return {
      kind: 'import',
      ...base(source, node),
      qualifiedName: `${input.modulePath}::${source}`,
      visibility: 'private',
      source,
      importedNames: names,
    };
  }

  function callSite(calleeNode: t.Node, node: t.Node): CallSiteDecl | null {
    const written = calleeName(calleeNode);
    if (!written) return null;
    const dot = written.lastIndexOf('.');
    const callee = dot === -1 ? written : written.slice(dot + 1);
    return {
      kind: 'call-site',
      ...base(callee, node),
      qualifiedName: written,
      visibility: 'private',
      callee,
      receiver: dot === -1 ? null : written.slice(0, dot),
    };
  }

  decls.sort((a, b) => a.range.start - b.range.start);
  decls.forEach((decl, index) => {
    decl.id = index;
  });
  for (const decl of decls) {
    decl.parent = parentOf.get(decl)?.id ?? null;
  }

  return {
    file: input.file,
    modulePath: input.modulePath,
    language: profile.id,
    strategy: 'grammar',
    heuristic: false,
    decls,
    exportedNames: [...exported],
  };
}

/**
 * Names exported by ES module syntax or CommonJS assignments
 */
function exportedNames(ast: t.File): Set<string> {
  const names = new Set<string>();

  for (const statement of ast.program.body) {
    if (t.isExportNamedDeclaration(statement)) {
      const declaration = statement.declaration;
      if (t.isFunctionDeclaration(declaration) || t.isClassDeclaration(declaration)) {
        if (declaration.id) names.add(declaration.id.name);
      } else if (t.isVariableDeclaration(declaration)) {
        for (const declarator of declaration.declarations) {
          if (t.isIdentifier(declarator.id)) names.add(declarator.id.name);
        }
      } else if (t.isTSEnumDeclaration(declaration) || t.isTSInterfaceDeclaration(declaration) || t.isTSTypeAliasDeclaration(declaration)) {
        names.add(declaration.id.name);
      }
      if (!statement.source) {
        for (const specifier of statement.specifiers) {
          if (t.isExportSpecifier(specifier)) names.add(specifier.local.name);
        }
      }
    } else if (t.isExportDefaultDeclaration(statement)) {
      const declaration = statement.declaration;
      if ((t.isFunctionDeclaration(declaration) || t.isClassDeclaration(declaration)) && declaration.id) {
        names.add(declaration.id.name);
      } else if (t.isIdentifier(declaration)) {
        names.add(declaration.name);
      } else {
        names.add('default');
      }
    } else if (t.isExpressionStatement(statement) && t.isAssignmentExpression(statement.expression)) {
      const { left, right } = statement.expression;
      const target = t.isMemberExpression(left) ? calleeName(left) : null;
      if (target === 'module.exports' && t.isObjectExpression(right)) {
        for (const property of right.properties) {
          if ((t.isObjectProperty(property) || t.isObjectMethod(property)) && t.isIdentifier(property.key)) {
            names.add(property.key.name);
          }
        }
      } else if (target && /^(?:module\.)?exports\.\w+$/.test(target)) {
        names.add(target.slice(target.lastIndexOf('.') + 1));
      }
    }
  }

  return names;
}

function parameterNames(params: t.Node[], facts: FactReader): string[] {
  const names: string[] = [];
  for (const param of params) {
    for (const name of bindingNames(param, facts)) {
      if (!names.includes(name)) names.push(name);
    }
  }
  return names;
}

function bindingNames(pattern: t.Node, facts: FactReader): string[] {
  const collected = emptyFacts();
  facts.bind(pattern, collected);
  return collected.defs;
}

function memberName(key: t.Node): string | null {
  if (t.isIdentifier(key)) return key.name;
  if (t.isStringLiteral(key)) return key.value;
  if (t.isPrivateName(key)) return `#${key.id.name}`;
  return null;
}

function memberVisibility(node: t.ClassMethod | t.ClassPrivateMethod | t.ClassProperty): Visibility {
  if (t.isClassPrivateMethod(node) || t.isPrivateName(node.key)) return 'private';
  if (node.accessibility === 'private') return 'private';
  if (node.accessibility === 'protected') return 'protected';
  return 'public';
}

function syntaxErrorLocation(error: unknown): { line: number; column: number } | null {
  if (typeof error !== 'object' || error === null || !('loc' in error)) return null;
  const loc: unknown = error.loc;
  if (typeof loc !== 'object' || loc === null || !('line' in loc) || !('column' in loc)) return null;
  const { line, column } = loc;
  return typeof line === 'number' && typeof column === 'number' ? { line, column } : null;
}
