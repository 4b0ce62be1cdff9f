/**
 * Global function table filled before any call is resolved.
 *
 * Registration happens once per file after its extraction settles; `seal()`
 * is the barrier between registration and resolution. Lookups before the seal
 * and registrations after it are programming errors.
 */

import { GraphError } from '../errors';
import type { FunctionDecl } from '../syntax/syntax-types';
import type { FunctionNode } from './call-graph-types';

export const MODULE_NODE_NAME = '<module>';

export class FunctionRegistry {
  private readonly functions: FunctionNode[] = [];
  private readonly byQualifiedName = new Map<string, number>();
  private readonly byName = new Map<string, number[]>();
  private readonly byModule = new Map<string, number[]>();
  private readonly declIds = new Map<string, number>();
  private sealed = false;

  constructor(private readonly entryPoints: RegExp[]) {}

  /**
   * Register a declared function. A second declaration with the same
   * qualified name (overloads, redeclarations) maps to the first.
   */
  register(decl: FunctionDecl, modulePath: string, owner: string | null = null): number {
    this.assertOpen();
    const existing = this.byQualifiedName.get(decl.qualifiedName);
    if (existing !== undefined) {
      this.declIds.set(declKey(decl.file, decl.id), existing);
      return existing;
    }

    const id = this.add({
      qualifiedName: decl.qualifiedName,
      name: decl.name,
      className: decl.className,
      owner,
      modulePath,
      file: decl.file,
      line: decl.range.start,
      endLine: decl.range.end,
      visibility: decl.visibility,
      synthetic: false,
      isEntryPoint: this.entryPoints.some((pattern) => pattern.test(decl.name)),
    });
    this.declIds.set(declKey(decl.file, decl.id), id);
    return id;
  }

  /**
   * Node for a file's top-level code; it runs on load, so it is an entry point
   */
  registerModule(modulePath: string, file: string): number {
    this.assertOpen();
    const qualifiedName = `${modulePath}::${MODULE_NODE_NAME}`;
    const existing = this.byQualifiedName.get(qualifiedName);
    if (existing !== undefined) return existing;

    return this.add({
      qualifiedName,
      name: MODULE_NODE_NAME,
      className: null,
      owner: null,
      modulePath,
      file,
      line: 1,
      endLine: 1,
      visibility: 'private',
      synthetic: true,
      isEntryPoint: true,
    });
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.functions.length;
  }

  /**
   * Registered nodes; the arena of the call graph
   */
  nodes(): FunctionNode[] {
    this.assertSealed();
    return this.functions;
  }

  idOfDecl(file: string, declId: number): number | undefined {
    return this.declIds.get(declKey(file, declId));
  }

  byQualified(qualifiedName: string): number | undefined {
    this.assertSealed();
    return this.byQualifiedName.get(qualifiedName);
  }

  named(name: string): number[] {
    this.assertSealed();
    return this.byName.get(name) ?? [];
  }

  inModule(modulePath: string): number[] {
    this.assertSealed();
    return this.byModule.get(modulePath) ?? [];
  }

  get(id: number): FunctionNode {
    return this.functions[id];
  }

  hasModule(modulePath: string): boolean {
    return this.byModule.has(modulePath);
  }

  modulePaths(): string[] {
    return [...this.byModule.keys()];
  }

  private add(node: Omit<FunctionNode, 'id'>): number {
    const id = this.functions.length;
    this.functions.push({ id, ...node });
    this.byQualifiedName.set(node.qualifiedName, id);
    push(this.byName, node.name, id);
    push(this.byModule, node.modulePath, id);
    return id;
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new GraphError('registry-sealed', 'Function registry is sealed; registration must finish before resolution');
    }
  }

  private assertSealed(): void {
    if (!this.sealed) {
      throw new GraphError('registry-open', 'Function registry must be sealed before call sites are resolved');
    }
  }
}

function declKey(file: string, declId: number): string {
  return `${file}#${declId}`;
}

function push(map: Map<string, number[]>, key: string, id: number): void {
  const list = map.get(key);
  if (list) {
    list.push(id);
  } else {
    map.set(key, [id]);
  }
}
