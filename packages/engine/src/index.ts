// packages/engine/src/index.ts

export * from "./types";
export {
  TvmError,
  ValidationError,
  IndexRangeError,
  ArithmeticError,
} from "./errors";
export type { TvmErrorCode } from "./errors";
export {
  DEFAULT_CACHE_TOLERANCE,
  DEFAULT_RATE_TOLERANCE,
  DEFAULT_SEQUENCE_TOLERANCE,
  SolverOptionsSchema,
} from "./config";
export type { SolverOptions } from "./config";
export { Progression, ArithmeticProgression, GeometricProgression } from "./progression";
export {
  SimpleInterest,
  CompoundInterest,
  deriveModel,
  resolveNominalRate,
} from "./interest";
export type {
  InterestRegime,
  InterestModel,
  SimpleInterestModel,
  CompoundInterestModel,
} from "./interest";
export { UniformSeriesSolver } from "./series";
