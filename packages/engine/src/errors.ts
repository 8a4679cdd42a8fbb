export type TvmErrorCode = "validation" | "index_range" | "arithmetic";

export class TvmError extends Error {
  readonly code: TvmErrorCode;

  constructor(code: TvmErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends TvmError {
  readonly fieldErrors: Record<string, string[] | undefined>;

  constructor(message: string, fieldErrors: Record<string, string[] | undefined> = {}) {
    super("validation", message);
    this.fieldErrors = fieldErrors;
  }
}

export class IndexRangeError extends TvmError {
  readonly index: number;

  constructor(index: number) {
    super("index_range", `index must be an integer greater than or equal to 1, got ${index}`);
    this.index = index;
  }
}

export class ArithmeticError extends TvmError {
  constructor(message: string) {
    super("arithmetic", message);
  }
}

/**
 * Division that throws on a zero divisor instead of returning Infinity/NaN.
 */
export function divide(dividend: number, divisor: number, what: string): number {
  if (divisor === 0) throw new ArithmeticError(`division by zero in ${what}`);
  return dividend / divisor;
}
