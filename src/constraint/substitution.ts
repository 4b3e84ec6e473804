/**
 * Substitution - Mapping from type variables to types
 *
 * A substitution is the result of unification. It maps type variable IDs
 * to types. Substitutions are immutable: composing two of them yields a
 * new substitution and leaves both inputs untouched.
 */

import type { Type, TypeVarId, PolyType, TypeEnv } from '../types/index.js';
import { Types, occursIn } from '../types/index.js';
import type { Result } from './result.js';
import { success, failure, occursCheckFailure } from './result.js';

export class Substitution {
  private readonly mapping: ReadonlyMap<TypeVarId, Type>;

  private constructor(mapping: ReadonlyMap<TypeVarId, Type>) {
    this.mapping = mapping;
  }

  private static readonly EMPTY = new Substitution(new Map());

  /**
   * The empty substitution
   */
  static empty(): Substitution {
    return Substitution.EMPTY;
  }

  /**
   * Create a substitution from an existing mapping
   */
  static from(mapping: Iterable<readonly [TypeVarId, Type]>): Substitution {
    return new Substitution(new Map(mapping));
  }

  /**
   * Create a singleton substitution { id ↦ type }.
   * No occurs check; use `bind` for that.
   */
  static singleton(id: TypeVarId, type: Type): Substitution {
    return new Substitution(new Map([[id, type]]));
  }

  /**
   * Apply this substitution to a type.
   *
   * One structural pass: a substitution built by `bind` and `compose` is
   * idempotent, so the replacement of a variable needs no further pass.
   */
  apply(type: Type): Type {
    if (this.mapping.size === 0) {
      return type;
    }
    return this.applyExcept(type, undefined);
  }

  /**
   * Apply to the body of a scheme, leaving its quantified variables alone
   */
  applyToScheme(scheme: PolyType): PolyType {
    if (this.mapping.size === 0) {
      return scheme;
    }
    return {
      kind: 'forall',
      vars: scheme.vars,
      body: this.applyExcept(scheme.body, scheme.vars),
    };
  }

  /**
   * Apply to every scheme bound in an environment
   */
  applyToEnv(env: TypeEnv): TypeEnv {
    if (this.mapping.size === 0) {
      return env;
    }
    return env.map(scheme => this.applyToScheme(scheme));
  }

  private applyExcept(type: Type, bound: ReadonlySet<TypeVarId> | undefined): Type {
    switch (type.kind) {
      case 'typevar': {
        if (bound?.has(type.id)) {
          return type;
        }
        return this.mapping.get(type.id) ?? type;
      }
      case 'function': {
        const param = this.applyExcept(type.param, bound);
        const result = this.applyExcept(type.result, bound);
        if (param === type.param && result === type.result) {
          return type;
        }
        return Types.fn(param, result);
      }
      case 'bool':
      case 'int':
      case 'unit':
        return type;
    }
  }

  /**
   * Compose this substitution with a later one.
   * The result behaves as: apply(this) then apply(next), i.e.
   * compose(s1, s2)(τ) = s2(s1(τ))
   */
  compose(next: Substitution): Substitution {
    if (next.mapping.size === 0) {
      return this;
    }
    if (this.mapping.size === 0) {
      return next;
    }

    const result = new Map<TypeVarId, Type>();

    // Apply the later substitution to all of our own mappings
    for (const [id, type] of this.mapping) {
      result.set(id, next.apply(type));
    }

    // Then add its mappings for variables we do not bind
    for (const [id, type] of next.mapping) {
      if (!result.has(id)) {
        result.set(id, type);
      }
    }

    return new Substitution(result);
  }

  /**
   * Check if a type variable is bound in this substitution
   */
  has(id: TypeVarId): boolean {
    return this.mapping.has(id);
  }

  /**
   * Get the binding for a type variable (if any)
   */
  get(id: TypeVarId): Type | undefined {
    return this.mapping.get(id);
  }

  get size(): number {
    return this.mapping.size;
  }

  isEmpty(): boolean {
    return this.mapping.size === 0;
  }

  /**
   * All bound type variable IDs
   */
  boundIds(): Set<TypeVarId> {
    return new Set(this.mapping.keys());
  }

  entries(): Array<[TypeVarId, Type]> {
    return Array.from(this.mapping.entries());
  }

  /**
   * Debug string representation
   */
  toString(): string {
    if (this.mapping.size === 0) {
      return '{}';
    }

    const entries = Array.from(this.mapping.entries())
      .map(([id, type]) => `τ${id} ↦ ${formatTypeForDebug(type)}`)
      .join(', ');

    return `{ ${entries} }`;
  }
}

// ============================================================================
// Functional API
// ============================================================================

/**
 * Compose substitutions in evaluation order
 */
export function composeAll(...substs: readonly Substitution[]): Substitution {
  return substs.reduce((acc, s) => acc.compose(s), Substitution.empty());
}

/**
 * Bind a type variable to a type, performing the occurs check.
 *
 * Binding a variable to itself yields the empty substitution.
 */
export function bind(id: TypeVarId, type: Type): Result<Substitution> {
  if (type.kind === 'typevar' && type.id === id) {
    return success(Substitution.empty());
  }

  // Occurs check - prevent infinite types like α = α → β
  if (occursIn(id, type)) {
    return failure(occursCheckFailure(id, type));
  }

  return success(Substitution.singleton(id, type));
}

/**
 * Simple type formatting for debug output
 */
function formatTypeForDebug(type: Type): string {
  switch (type.kind) {
    case 'typevar':
      return `τ${type.id}`;
    case 'function': {
      const param = type.param.kind === 'function'
        ? `(${formatTypeForDebug(type.param)})`
        : formatTypeForDebug(type.param);
      return `${param} → ${formatTypeForDebug(type.result)}`;
    }
    case 'bool':
      return 'Bool';
    case 'int':
      return 'Int';
    case 'unit':
      return 'Unit';
  }
}
