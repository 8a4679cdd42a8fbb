export type Rate = number;          // per period, 0.05 = 5%
export type Money = number;

/** Rate applied over a number of periods. */
export interface RateInput {
  kind: "rate";
  rate: Rate;
  periods: number;            // may be fractional for the interest models
}

export interface InterestInput {
  kind: "interest";
  interest: Money;
}

export interface FutureValueInput {
  kind: "futureValue";
  futureValue: Money;
}

// What the caller knows besides the present/future value it passes.
export type GrowthInput = InterestInput | RateInput;
export type EarningsInput = FutureValueInput | RateInput;
export type RealizedInput = FutureValueInput | InterestInput;

/**
 * Sources the nominal rate of one period can be resolved from.
 * Checked in order: interestRate, futureValue, interest.
 */
export interface NominalRateSource {
  interestRate?: Rate;
  futureValue?: Money;
  interest?: Money;
}

/** 0: payments at the end of each period, 1: at the start. */
export type PaymentTiming = 0 | 1;

export const ORDINARY: PaymentTiming = 0;
export const DUE: PaymentTiming = 1;

// Checked at runtime by SolverOptionsSchema, which narrows timing to PaymentTiming.
export interface UniformSeriesOptions {
  interestRate: Rate;
  periods: number;            // int, >= 1
  timing: number;             // PaymentTiming
  tolerance?: Money;          // cache hit distance, >= 0
}

export interface SolvedSeries {
  payment: Money;
  presentValue: Money;
  futureValue: Money;
}
