/**
 * Type Variable Management - Creation of fresh type variables
 *
 * Each inference session owns one supply. IDs are allocated from a
 * monotonic counter and never reused, so variables from two sessions can
 * only collide if a supply is shared between them.
 */

import type { TypeVar, TypeVarId } from '../types/index.js';
import { Types } from '../types/index.js';

/** Greek letters for naming type variables */
const GREEK = [
  'α', 'β', 'γ', 'δ', 'ε', 'ζ', 'η', 'θ',
  'ι', 'κ', 'λ', 'μ', 'ν', 'ξ', 'ο', 'π',
  'ρ', 'σ', 'τ', 'υ', 'φ', 'χ', 'ψ', 'ω',
];

export class TypeVarSupply {
  /** Counter for generating unique IDs */
  private counter: number;

  constructor(start: TypeVarId = 0) {
    this.counter = start;
  }

  /**
   * Create a fresh type variable with a unique ID
   */
  fresh(): TypeVar {
    return Types.typeVar(this.counter++);
  }

  /**
   * Create multiple fresh type variables
   */
  freshN(count: number): TypeVar[] {
    return Array.from({ length: count }, () => this.fresh());
  }

  /**
   * Number of variables allocated so far (the next ID to be handed out)
   */
  get allocated(): number {
    return this.counter;
  }
}

/**
 * Human-readable name for the n-th type variable: α, β, …, ω, α₁, β₁, …
 */
export function typeVarName(index: number): string {
  const greekIndex = index % GREEK.length;
  const subscript = Math.floor(index / GREEK.length);
  const letter = GREEK[greekIndex] ?? 'τ';

  if (subscript === 0) {
    return letter;
  }
  return `${letter}${toSubscript(subscript)}`;
}

/**
 * Convert a number to Unicode subscript characters
 */
function toSubscript(n: number): string {
  const subscripts = '₀₁₂₃₄₅₆₇₈₉';
  return n.toString().split('').map(d => subscripts[Number(d)] ?? d).join('');
}
