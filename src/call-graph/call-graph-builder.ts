/**
 * Call graph construction in two phases.
 *
 * 1. Registration: every function of every tree goes into the registry.
 * 2. Resolution: after `registry.seal()`, every call site is looked up as
 *    imported binding → same module → unique match project-wide.
 *
 * Calls that match nothing (library calls, dynamic dispatch) or several
 * functions are kept as unresolved entries rather than edges.
 */

import * as path from 'path';
import {
  isCallSiteDecl,
  isFunctionDecl,
  isImportDecl,
  type CallSiteDecl,
  type SyntaxTree,
} from '../syntax/syntax-types';
import type {
  CallEdge,
  CallGraph,
  CallGraphOptions,
  FunctionNode,
  UnresolvedCall,
  UnresolvedReason,
} from './call-graph-types';
import { FunctionRegistry, MODULE_NODE_NAME } from './function-registry';

export const DEFAULT_ENTRY_POINTS = ['^main$'];

const SELF_RECEIVERS = new Set(['this', 'self', 'Self', 'cls', 'static', 'super', '@', 'base', 'parent']);

type Resolution = { target: number } | { reason: UnresolvedReason; candidates: number[] };

export function createRegistry(options: CallGraphOptions = {}): FunctionRegistry {
  const patterns = (options.entryPoints ?? DEFAULT_ENTRY_POINTS).map((source) => new RegExp(source));
  return new FunctionRegistry(patterns);
}

/**
 * Registration phase for one file
 */
export function registerTree(registry: FunctionRegistry, tree: SyntaxTree): void {
  for (const decl of tree.decls) {
    if (!isFunctionDecl(decl)) continue;
    const parent = decl.parent === null ? undefined : tree.decls[decl.parent];
    registry.register(decl, tree.modulePath, parent && isFunctionDecl(parent) ? parent.qualifiedName : null);
  }
  if (tree.decls.some((decl) => isCallSiteDecl(decl) && decl.parent === null)) {
    registry.registerModule(tree.modulePath, tree.file);
  }
}

/**
 * Resolution phase; the registry must already be sealed
 */
export function resolveCalls(registry: FunctionRegistry, trees: SyntaxTree[]): CallGraph {
  const nodes = registry.nodes();
  const modules = new Set(registry.modulePaths());
  const edges: CallEdge[] = [];
  const edgeKeys = new Set<string>();
  const unresolved: UnresolvedCall[] = [];

  for (const tree of trees) {
    const resolver = new CallResolver(registry, tree, modules);
    for (const decl of tree.decls) {
      if (!isCallSiteDecl(decl)) continue;
      const caller = resolver.callerOf(decl);
      if (caller === undefined) continue;

      const resolution = resolver.resolve(decl, caller);
      if ('target' in resolution) {
        const key = `${caller}>${resolution.target}@${decl.range.start}`;
        if (edgeKeys.has(key)) continue;
        edgeKeys.add(key);
        edges.push({ from: caller, to: resolution.target, kind: 'call', line: decl.range.start });
      } else {
        unresolved.push({
          caller,
          callee: decl.receiver ? `${decl.receiver}.${decl.callee}` : decl.callee,
          file: tree.file,
          line: decl.range.start,
          reason: resolution.reason,
          candidates: resolution.candidates.map((id) => nodes[id].qualifiedName),
        });
      }
    }
  }

  return { nodes, edges, unresolved };
}

/**
 * Both phases over a settled set of trees
 */
export function buildCallGraph(trees: SyntaxTree[], options: CallGraphOptions = {}): CallGraph {
  const registry = createRegistry(options);
  for (const tree of trees) {
    registerTree(registry, tree);
  }
  registry.seal();
  return resolveCalls(registry, trees);
}

class CallResolver {
  /** Local import binding → module path it resolves to */
  private readonly bindings = new Map<string, string>();

  constructor(
    private readonly registry: FunctionRegistry,
    private readonly tree: SyntaxTree,
    modules: ReadonlySet<string>
  ) {
    for (const decl of tree.decls) {
      if (!isImportDecl(decl)) continue;
      const target = resolveModuleSpecifier(decl.source, tree.modulePath, modules);
      if (target === null) continue;
      for (const name of decl.importedNames) {
        this.bindings.set(name, target);
      }
      // `import utils` / `use crate::utils` bind the last segment
      const last = decl.source.split(/::|[./]/).filter(Boolean).pop();
      if (decl.importedNames.length === 0 && last) this.bindings.set(last, target);
    }
  }

  callerOf(site: CallSiteDecl): number | undefined {
    if (site.parent === null) {
      return this.registry.byQualified(`${this.tree.modulePath}::${MODULE_NODE_NAME}`);
    }
    return this.registry.idOfDecl(this.tree.file, site.parent);
  }

  resolve(site: CallSiteDecl, caller: number): Resolution {
    const segments = (site.receiver ? `${site.receiver}.${site.callee}` : site.callee)
      .split(/::|\./)
      .filter(Boolean);
    const name = segments[segments.length - 1] ?? site.callee;
    const receiver = segments.slice(0, -1);

    if (receiver.length === 0) return this.resolvePlain(name, caller);
    return this.resolveMember(name, receiver, caller);
  }

  private resolvePlain(name: string, caller: number): Resolution {
    const bound = this.bindings.get(name);
    if (bound !== undefined) {
      const imported = this.functionsIn(bound, name);
      if (imported.length > 0) return { target: imported[0] };
    }

    const callerNode = this.registry.get(caller);
    const local = this.functionsIn(callerNode.modulePath, name);
    // innermost visible scope first: functions nested in the caller, then in its outer functions, then top level
    for (const scope of this.scopesOf(callerNode)) {
      const visible = local.find((id) => {
        const fn = this.registry.get(id);
        return fn.className === null && fn.owner === scope;
      });
      if (visible !== undefined) return { target: visible };
    }
    // implicit receiver inside a class body
    const sibling = local.find((id) => this.registry.get(id).className === callerNode.className);
    if (sibling !== undefined && callerNode.className !== null) return { target: sibling };

    return this.projectWide(name, (id) => {
      const fn = this.registry.get(id);
      return fn.className === null && fn.owner === null;
    });
  }

  private scopesOf(caller: FunctionNode): Array<string | null> {
    const scopes: Array<string | null> = [];
    let current: FunctionNode | undefined = caller.synthetic ? undefined : caller;
    while (current) {
      scopes.push(current.qualifiedName);
      const owner: string | null = current.owner;
      const ownerId = owner === null ? undefined : this.registry.byQualified(owner);
      current = ownerId === undefined ? undefined : this.registry.get(ownerId);
    }
    scopes.push(null);
    return scopes;
  }

  private resolveMember(name: string, receiver: string[], caller: number): Resolution {
    const callerNode = this.registry.get(caller);
    const head = receiver[0];
    const tail = receiver[receiver.length - 1];

    if (receiver.length === 1 && SELF_RECEIVERS.has(head)) {
      const own = this.functionsIn(callerNode.modulePath, name).filter(
        (id) => this.registry.get(id).className === callerNode.className
      );
      if (own.length > 0 && head !== 'super') return { target: own[0] };
      return this.projectWide(name, (id) => this.registry.get(id).className !== null);
    }

    const bound = this.bindings.get(head);
    if (bound !== undefined) {
      const imported = this.functionsIn(bound, name);
      const preferred = imported.filter((id) => {
        const className = this.registry.get(id).className;
        return className === null || className === tail;
      });
      if (preferred.length > 0) return { target: preferred[0] };
    }

    // static call through a class name
    const statics = this.registry.named(name).filter((id) => this.registry.get(id).className === tail);
    if (statics.length === 1) return { target: statics[0] };
    if (statics.length > 1) return { reason: 'ambiguous', candidates: statics };

    return this.projectWide(name, (id) => this.registry.get(id).className !== null);
  }

  private projectWide(name: string, accept: (id: number) => boolean): Resolution {
    const candidates = this.registry.named(name).filter((id) => !this.registry.get(id).synthetic && accept(id));
    if (candidates.length === 1) return { target: candidates[0] };
    return { reason: candidates.length === 0 ? 'not-found' : 'ambiguous', candidates };
  }

  private functionsIn(modulePath: string, name: string): number[] {
    return this.registry.inModule(modulePath).filter((id) => this.registry.get(id).name === name);
  }
}

/**
 * Module path an import specifier refers to, among the known module paths.
 * Relative specifiers resolve against the importing module; dotted and `::`
 * paths match by path suffix, dropping the last segment when it names an item.
 */
export function resolveModuleSpecifier(
  specifier: string,
  fromModule: string,
  modules: ReadonlySet<string>
): string | null {
  const directory = path.posix.dirname(fromModule);

  if (specifier.startsWith('./') || specifier.startsWith('../')) {
    const base = path.posix.normalize(path.posix.join(directory, specifier.replace(/\.[cm]?[jt]sx?$/, '')));
    return firstKnown([base, `${base}/index`, `${base}/__init__`, `${base}/mod`], modules);
  }

  const relativeDots = /^(\.+)(.*)$/.exec(specifier);
  if (relativeDots) {
    // Python `from ..pkg import x`
    let base = directory;
    for (let i = 1; i < relativeDots[1].length; i++) base = path.posix.dirname(base);
    const rest = relativeDots[2].replace(/\./g, '/');
    const joined = path.posix.normalize(rest ? path.posix.join(base, rest) : base);
    return firstKnown([joined, `${joined}/__init__`], modules);
  }

  const segments = specifier
    .replace(/^(crate|self|super)::/, '')
    .split(/::|\./)
    .filter(Boolean);
  while (segments.length > 0) {
    const match = bySuffix(segments.join('/'), modules);
    if (match !== null) return match;
    segments.pop();
  }
  return null;
}

function firstKnown(candidates: string[], modules: ReadonlySet<string>): string | null {
  return candidates.find((candidate) => modules.has(candidate)) ?? null;
}

function bySuffix(suffix: string, modules: ReadonlySet<string>): string | null {
  const matches = [...modules].filter(
    (module) => module === suffix || module.endsWith(`/${suffix}`) || module === `${suffix}/mod` || module.endsWith(`/${suffix}/__init__`)
  );
  return matches.length === 1 ? matches[0] : null;
}
