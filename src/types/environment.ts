/**
 * Typing environment: variable name → type scheme
 *
 * Environments are persistent. `extend` returns a new environment that
 * shadows the outer binding and leaves the receiver untouched.
 */

import type { PolyType, TypeVarId } from './types.js';
import { freeVars, freeVarsInScheme } from './factory.js';

export class TypeEnv {
  private readonly bindings: ReadonlyMap<string, PolyType>;

  private constructor(bindings: ReadonlyMap<string, PolyType>) {
    this.bindings = bindings;
  }

  /**
   * Create an empty environment
   */
  static empty(): TypeEnv {
    return new TypeEnv(new Map());
  }

  /**
   * Create an environment from existing bindings
   */
  static from(bindings: Iterable<readonly [string, PolyType]>): TypeEnv {
    return new TypeEnv(new Map(bindings));
  }

  /**
   * Bind a name, shadowing any outer binding of the same name
   */
  extend(name: string, scheme: PolyType): TypeEnv {
    const next = new Map(this.bindings);
    next.set(name, scheme);
    return new TypeEnv(next);
  }

  /**
   * Bind several names at once; later entries shadow earlier ones
   */
  extendAll(entries: Iterable<readonly [string, PolyType]>): TypeEnv {
    const next = new Map(this.bindings);
    for (const [name, scheme] of entries) {
      next.set(name, scheme);
    }
    return new TypeEnv(next);
  }

  lookup(name: string): PolyType | undefined {
    return this.bindings.get(name);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  /**
   * Rebuild the environment with every scheme transformed
   */
  map(fn: (scheme: PolyType, name: string) => PolyType): TypeEnv {
    const next = new Map<string, PolyType>();
    for (const [name, scheme] of this.bindings) {
      next.set(name, fn(scheme, name));
    }
    return new TypeEnv(next);
  }

  /**
   * Free type variables of all bound schemes
   */
  freeVars(): Set<TypeVarId> {
    const result = new Set<TypeVarId>();
    for (const scheme of this.bindings.values()) {
      for (const id of freeVarsInScheme(scheme)) {
        result.add(id);
      }
    }
    return result;
  }

  /**
   * Highest type variable ID mentioned by any scheme, quantified or free;
   * -1 when there is none
   */
  maxTypeVarId(): TypeVarId {
    let max = -1;
    for (const scheme of this.bindings.values()) {
      for (const id of scheme.vars) {
        max = Math.max(max, id);
      }
      for (const id of freeVars(scheme.body)) {
        max = Math.max(max, id);
      }
    }
    return max;
  }

  names(): string[] {
    return Array.from(this.bindings.keys());
  }

  entries(): Iterable<[string, PolyType]> {
    return this.bindings.entries();
  }

  get size(): number {
    return this.bindings.size;
  }
}

/**
 * Free type variables of an environment
 */
export function freeVarsInEnv(env: TypeEnv): Set<TypeVarId> {
  return env.freeVars();
}
