// packages/engine/src/progression.ts

import { DEFAULT_SEQUENCE_TOLERANCE } from "./config";
import { IndexRangeError, ValidationError, divide } from "./errors";

function checkIndex(n: number): void {
  if (!Number.isInteger(n) || n < 1) throw new IndexRangeError(n);
}

function checkSequence(sequence: readonly number[]): void {
  if (sequence.length < 3) {
    throw new ValidationError("sequence should contain at least 3 items");
  }
}

/**
 * A sequence given by its first term and a ratio. Terms are 1-based and
 * memoized as they are requested.
 */
export abstract class Progression {
  readonly initialTerm: number;
  readonly ratio: number;
  protected readonly terms = new Map<number, number>();

  constructor(initialTerm: number, ratio: number) {
    this.initialTerm = initialTerm;
    this.ratio = ratio;
    this.terms.set(1, initialTerm);
  }

  protected abstract computeTerm(n: number): number;

  abstract sumFirstTerms(n: number): number;

  nthTerm(n: number): number {
    checkIndex(n);
    const cached = this.terms.get(n);
    if (cached !== undefined) return cached;
    const term = this.computeTerm(n);
    this.terms.set(n, term);
    return term;
  }

  nFirstTerms(n: number): number[] {
    checkIndex(n);
    const out: number[] = [];
    for (let i = 1; i <= n; i++) out.push(this.nthTerm(i));
    return out;
  }
}

export class ArithmeticProgression extends Progression {
  static getRatio(term1: number, term2: number): number {
    return term2 - term1;
  }

  static isArithmetic(sequence: readonly number[], tolerance = DEFAULT_SEQUENCE_TOLERANCE): boolean {
    checkSequence(sequence);
    const diff = sequence[1] - sequence[0];
    for (let i = 2; i < sequence.length; i++) {
      if (Math.abs(sequence[i] - sequence[i - 1] - diff) > tolerance) return false;
    }
    return true;
  }

  protected computeTerm(n: number): number {
    return this.initialTerm + (n - 1) * this.ratio;
  }

  sumFirstTerms(n: number): number {
    checkIndex(n);
    return (n * (this.initialTerm + this.nthTerm(n))) / 2;
  }
}

export class GeometricProgression extends Progression {
  static getRatio(term1: number, term2: number): number {
    return divide(term2, term1, "geometric ratio");
  }

  static isGeometric(sequence: readonly number[], tolerance = DEFAULT_SEQUENCE_TOLERANCE): boolean {
    checkSequence(sequence);
    const ratio = GeometricProgression.getRatio(sequence[0], sequence[1]);
    for (let i = 2; i < sequence.length; i++) {
      const current = GeometricProgression.getRatio(sequence[i - 1], sequence[i]);
      if (Math.abs(current - ratio) > tolerance) return false;
    }
    return true;
  }

  protected computeTerm(n: number): number {
    return this.initialTerm * Math.pow(this.ratio, n - 1);
  }

  sumFirstTerms(n: number): number {
    checkIndex(n);
    if (this.ratio === 1) return n * this.initialTerm;
    return (this.initialTerm * (1 - Math.pow(this.ratio, n))) / (1 - this.ratio);
  }
}
