// packages/engine/src/interest.ts

import { DEFAULT_RATE_TOLERANCE } from "./config";
import { ValidationError, divide } from "./errors";
import type {
  EarningsInput,
  GrowthInput,
  Money,
  NominalRateSource,
  Rate,
  RealizedInput,
} from "./types";

/**
 * The part of an interest model that depends on how interest grows.
 * Everything else is derived from these in {@link deriveModel}.
 */
export interface InterestRegime {
  readonly name: "simple" | "compound";
  /** Multiplier turning a present amount into its amount after `periods`. */
  accumulationFactor(rate: Rate, periods: number): number;
  /** Per-period rate that grows `presentValue` into `futureValue` over `periods`. */
  interestRate(presentValue: Money, futureValue: Money, periods: number): Rate;
  /** Number of periods `rate` needs to grow `presentValue` into `futureValue`. */
  periods(presentValue: Money, futureValue: Money, rate: Rate): number;
  /** Rate over `toPeriods` that matches `rate` over `fromPeriods`. */
  equivalentRate(rate: Rate, fromPeriods: number, toPeriods: number): Rate;
}

export interface InterestModel extends InterestRegime {
  reductionFactor(rate: Rate, periods: number): number;
  futureValue(presentValue: Money, known: GrowthInput): Money;
  presentValue(futureValue: Money, known: GrowthInput): Money;
  interest(presentValue: Money, known: EarningsInput): Money;
  interestRatePeriod(presentValue: Money, known: RealizedInput): Rate;
  internalRateReturn(presentValue: Money, futureValue: Money, periods: number): Rate;
  netPresentValue(
    futureValues: readonly Money[],
    rates: readonly Rate[],
    periods: readonly number[]
  ): Money;
  realInterestRatePeriod(presentValue: Money, inflationRate: Rate, source: NominalRateSource): Rate;
  realInterestPeriod(presentValue: Money, inflationRate: Rate, source: NominalRateSource): Money;
  realOrEffectiveInterestRate(realRate: Rate, effectiveRate: Rate, expectedInflationRate: Rate): Rate;
}

// ---------- derived operations ----------

/** Rate realized over the whole span, (fv - pv) / pv. */
const spanRate = (presentValue: Money, futureValue: Money): Rate =>
  divide(futureValue - presentValue, presentValue, "rate over the span");

export function reductionFactor(regime: InterestRegime, rate: Rate, periods: number): number {
  return divide(1, regime.accumulationFactor(rate, periods), "reduction factor");
}

export function futureValue(regime: InterestRegime, presentValue: Money, known: GrowthInput): Money {
  if (known.kind === "interest") return presentValue + known.interest;
  return presentValue * regime.accumulationFactor(known.rate, known.periods);
}

export function presentValue(regime: InterestRegime, futureValue: Money, known: GrowthInput): Money {
  if (known.kind === "interest") return futureValue - known.interest;
  return futureValue * reductionFactor(regime, known.rate, known.periods);
}

export function interest(regime: InterestRegime, presentValue: Money, known: EarningsInput): Money {
  if (known.kind === "futureValue") return known.futureValue - presentValue;
  return presentValue * (regime.accumulationFactor(known.rate, known.periods) - 1);
}

export function interestRatePeriod(presentValue: Money, known: RealizedInput): Rate {
  const earned = known.kind === "futureValue" ? known.futureValue - presentValue : known.interest;
  return divide(earned, presentValue, "interest rate of the period");
}

// Shorter lists repeat their last element up to the longest one.
const fillForward = <T>(list: readonly T[], i: number): T => list[Math.min(i, list.length - 1)];

export function netPresentValue(
  regime: InterestRegime,
  futureValues: readonly Money[],
  rates: readonly Rate[],
  periods: readonly number[]
): Money {
  const length = Math.max(futureValues.length, rates.length, periods.length);
  if (length === 0) throw new ValidationError("net present value needs at least one cash flow");
  if (futureValues.length === 0 || rates.length === 0 || periods.length === 0) {
    throw new ValidationError("future values, rates and periods must each have at least one item");
  }

  let total = 0;
  for (let i = 0; i < length; i++) {
    total += presentValue(regime, fillForward(futureValues, i), {
      kind: "rate",
      rate: fillForward(rates, i),
      periods: fillForward(periods, i),
    });
  }
  return total;
}

/**
 * Nominal rate of one period, taken from the first of `interestRate`,
 * `futureValue` or `interest` that is present.
 */
export function resolveNominalRate(presentValue: Money, source: NominalRateSource): Rate {
  if (source.interestRate !== undefined) return source.interestRate;
  if (source.futureValue !== undefined) {
    return interestRatePeriod(presentValue, { kind: "futureValue", futureValue: source.futureValue });
  }
  if (source.interest !== undefined) {
    return interestRatePeriod(presentValue, { kind: "interest", interest: source.interest });
  }
  throw new ValidationError("one of interestRate, futureValue or interest is required");
}

/** Fisher relation: (nominal - inflation) / (1 + inflation). */
export function realInterestRatePeriod(
  presentValue: Money,
  inflationRate: Rate,
  source: NominalRateSource
): Rate {
  const nominal = resolveNominalRate(presentValue, source);
  return divide(nominal - inflationRate, 1 + inflationRate, "real interest rate");
}

export function realInterestPeriod(
  presentValue: Money,
  inflationRate: Rate,
  source: NominalRateSource
): Money {
  return presentValue * realInterestRatePeriod(presentValue, inflationRate, source);
}

/**
 * Picks the rate that stays ahead under the expected inflation: the real
 * rate when inflation is expected above (1 + effective) / (1 + real) - 1,
 * the effective one otherwise.
 */
export function realOrEffectiveInterestRate(
  realRate: Rate,
  effectiveRate: Rate,
  expectedInflationRate: Rate
): Rate {
  const relation = divide(1 + effectiveRate, 1 + realRate, "rate relation") - 1;
  return expectedInflationRate > relation ? realRate : effectiveRate;
}

export function deriveModel(regime: InterestRegime): InterestModel {
  return {
    name: regime.name,
    accumulationFactor: (rate, periods) => regime.accumulationFactor(rate, periods),
    interestRate: (pv, fv, periods) => regime.interestRate(pv, fv, periods),
    periods: (pv, fv, rate) => regime.periods(pv, fv, rate),
    equivalentRate: (rate, from, to) => regime.equivalentRate(rate, from, to),
    reductionFactor: (rate, periods) => reductionFactor(regime, rate, periods),
    futureValue: (pv, known) => futureValue(regime, pv, known),
    presentValue: (fv, known) => presentValue(regime, fv, known),
    interest: (pv, known) => interest(regime, pv, known),
    interestRatePeriod,
    internalRateReturn: (pv, fv, periods) => regime.interestRate(pv, fv, periods),
    netPresentValue: (fvs, rates, periods) => netPresentValue(regime, fvs, rates, periods),
    realInterestRatePeriod,
    realInterestPeriod,
    realOrEffectiveInterestRate,
  };
}

// ---------- regimes ----------

const simpleRegime: InterestRegime = {
  name: "simple",
  accumulationFactor: (rate, periods) => 1 + rate * periods,
  interestRate: (pv, fv, periods) => divide(spanRate(pv, fv), periods, "simple interest rate"),
  periods: (pv, fv, rate) => divide(spanRate(pv, fv), rate, "simple periods"),
  equivalentRate: (rate, from, to) => rate * divide(to, from, "equivalent rate"),
};

const compoundRegime: InterestRegime = {
  name: "compound",
  accumulationFactor: (rate, periods) => Math.pow(1 + rate, periods),
  interestRate: (pv, fv, periods) =>
    Math.pow(1 + spanRate(pv, fv), divide(1, periods, "compound interest rate")) - 1,
  periods: (pv, fv, rate) =>
    divide(Math.log(1 + spanRate(pv, fv)), Math.log(1 + rate), "compound periods"),
  equivalentRate: (rate, from, to) => Math.pow(1 + rate, divide(to, from, "equivalent rate")) - 1,
};

export interface SimpleInterestModel extends InterestModel {
  /** True when rateN / rateM matches n / m. */
  isProportional(rateN: Rate, nPeriods: number, rateM: Rate, mPeriods: number, tolerance?: number): boolean;
}

export interface CompoundInterestModel extends InterestModel {
  /** True when both rates accumulate to the same factor over their spans. */
  isEquivalent(rateN: Rate, nPeriods: number, rateM: Rate, mPeriods: number, tolerance?: number): boolean;
}

export const SimpleInterest: SimpleInterestModel = {
  ...deriveModel(simpleRegime),
  isProportional(rateN, nPeriods, rateM, mPeriods, tolerance = DEFAULT_RATE_TOLERANCE) {
    const ratesQ = divide(rateN, rateM, "rate quotient");
    const periodsQ = divide(nPeriods, mPeriods, "period quotient");
    return Math.abs(ratesQ - periodsQ) < tolerance;
  },
};

export const CompoundInterest: CompoundInterestModel = {
  ...deriveModel(compoundRegime),
  isEquivalent(rateN, nPeriods, rateM, mPeriods, tolerance = DEFAULT_RATE_TOLERANCE) {
    const factorN = compoundRegime.accumulationFactor(rateN, nPeriods);
    const factorM = compoundRegime.accumulationFactor(rateM, mPeriods);
    return Math.abs(factorN - factorM) < tolerance;
  },
};
