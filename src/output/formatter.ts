/**
 * Type Formatter - Converts types, schemes and errors to text
 *
 * Supports two variable styles:
 * 1. Normalized: variables renamed α, β, … in order of first appearance
 * 2. Raw: variables shown by ID (τ0, τ1, …), useful when tracing
 */

import type { Type, TypeVarId, PolyType } from '../types/index.js';
import type { InferenceError, Result } from '../constraint/index.js';
import { typeVarName } from '../constraint/index.js';
import type { ProgramInference, TraceEvent } from '../inference/index.js';

/**
 * Format options for type output
 */
export interface FormatOptions {
  /** Rename type variables α, β, … in order of appearance */
  normalize?: boolean;
  /** Arrow between parameter and result */
  arrow?: string;
}

const DEFAULT_FORMAT_OPTIONS: Required<FormatOptions> = {
  normalize: true,
  arrow: '→',
};

/**
 * Assigns display names to type variables.
 * Share one namer between types that must use consistent names.
 */
export class TypeNamer {
  private readonly names = new Map<TypeVarId, string>();
  private readonly normalize: boolean;

  constructor(normalize = true) {
    this.normalize = normalize;
  }

  name(id: TypeVarId): string {
    if (!this.normalize) {
      return `τ${id}`;
    }
    let name = this.names.get(id);
    if (name === undefined) {
      name = typeVarName(this.names.size);
      this.names.set(id, name);
    }
    return name;
  }
}

/**
 * Format a monotype
 */
export function typeToString(type: Type, options: FormatOptions = {}, namer?: TypeNamer): string {
  const opts = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  return formatTypeInternal(type, opts, namer ?? new TypeNamer(opts.normalize));
}

function formatTypeInternal(type: Type, opts: Required<FormatOptions>, namer: TypeNamer): string {
  switch (type.kind) {
    case 'bool':
      return 'Bool';
    case 'int':
      return 'Int';
    case 'unit':
      return 'Unit';
    case 'typevar':
      return namer.name(type.id);
    case 'function': {
      // Arrows associate to the right; a function parameter needs parentheses
      const param = formatTypeInternal(type.param, opts, namer);
      const result = formatTypeInternal(type.result, opts, namer);
      const left = type.param.kind === 'function' ? `(${param})` : param;
      return `${left} ${opts.arrow} ${result}`;
    }
  }
}

/**
 * Format a type scheme: ∀α β. α → β → α
 */
export function schemeToString(scheme: PolyType, options: FormatOptions = {}): string {
  const opts = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  const namer = new TypeNamer(opts.normalize);
  const body = formatTypeInternal(scheme.body, opts, namer);

  if (scheme.vars.size === 0) {
    return body;
  }

  // Quantifier lists variables in order of appearance in the body
  const order = appearanceOrder(scheme.body).filter(id => scheme.vars.has(id));
  const quantified = order.map(id => namer.name(id)).join(' ');
  return `∀${quantified}. ${body}`;
}

function appearanceOrder(type: Type, into: TypeVarId[] = []): TypeVarId[] {
  if (type.kind === 'typevar') {
    if (!into.includes(type.id)) {
      into.push(type.id);
    }
  } else if (type.kind === 'function') {
    appearanceOrder(type.param, into);
    appearanceOrder(type.result, into);
  }
  return into;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Format an inference error as a one-line message
 */
export function formatError(error: InferenceError, options: FormatOptions = {}): string {
  const opts = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  const namer = new TypeNamer(opts.normalize);
  const message = formatErrorMessage(error, opts, namer);
  return error.loc ? `${message} (at ${error.loc.line}:${error.loc.column})` : message;
}

function formatErrorMessage(error: InferenceError, opts: Required<FormatOptions>, namer: TypeNamer): string {
  switch (error.kind) {
    case 'undefined-variable':
      return `Undefined variable '${error.name}'`;
    case 'type-mismatch': {
      const expected = formatTypeInternal(error.expected, opts, namer);
      const actual = formatTypeInternal(error.actual, opts, namer);
      return `Type mismatch: expected ${expected}, got ${actual}`;
    }
    case 'occurs-check-failure': {
      const variable = namer.name(error.variable);
      const type = formatTypeInternal(error.type, opts, namer);
      return `Infinite type: ${variable} occurs in ${type}`;
    }
    case 'inference-too-complex':
      return error.limit === 'depth'
        ? `Inference too complex: nesting deeper than ${error.max}`
        : `Inference too complex: more than ${error.max} steps`;
  }
}

// ============================================================================
// Trace
// ============================================================================

/**
 * Format a trace event. Variables are shown raw so that IDs line up
 * across events.
 */
export function formatTraceEvent(event: TraceEvent): string {
  const raw: FormatOptions = { normalize: false };
  switch (event.kind) {
    case 'unify':
      return `unify ${typeToString(event.left, raw)} ~ ${typeToString(event.right, raw)} => ${event.substitution.toString()}`;
    case 'unify-failed':
      return `unify ${typeToString(event.left, raw)} ~ ${typeToString(event.right, raw)} failed: ${formatError(event.error, raw)}`;
    case 'instantiate':
      return `instantiate ${event.name} : ${schemeToString(event.scheme, raw)} => ${typeToString(event.type, raw)}`;
    case 'generalize':
      return `generalize ${event.name} : ${schemeToString(event.scheme, raw)}`;
  }
}

// ============================================================================
// Program Output
// ============================================================================

/**
 * Human-readable report: one line per binding, then the program's type
 */
export function formatReport(result: Result<ProgramInference>, options: FormatOptions = {}): string {
  if (!result.ok) {
    return `error: ${formatError(result.error, options)}`;
  }

  const lines = result.value.bindings.map(
    binding => `${binding.name} : ${schemeToString(binding.scheme, options)}`
  );
  if (result.value.type) {
    lines.push(`- : ${typeToString(result.value.type, options)}`);
  }
  return lines.join('\n');
}

/**
 * Machine-readable JSON output
 */
export function formatJSON(result: Result<ProgramInference>, options: FormatOptions = {}): string {
  if (!result.ok) {
    return JSON.stringify({
      ok: false,
      error: {
        kind: result.error.kind,
        message: formatError(result.error, options),
        loc: result.error.loc ?? null,
      },
    }, null, 2);
  }

  return JSON.stringify({
    ok: true,
    bindings: result.value.bindings.map(binding => ({
      name: binding.name,
      type: schemeToString(binding.scheme, options),
    })),
    type: result.value.type ? typeToString(result.value.type, options) : null,
  }, null, 2);
}
