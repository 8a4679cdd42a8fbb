// packages/engine/src/series.ts

import { parseSolverOptions } from "./config";
import { divide } from "./errors";
import { CompoundInterest } from "./interest";
import { GeometricProgression } from "./progression";
import type {
  Money,
  PaymentTiming,
  Rate,
  RateInput,
  SolvedSeries,
  UniformSeriesOptions,
} from "./types";

interface CacheEntry extends SolvedSeries {
  progression: GeometricProgression;
}

/**
 * Level payments over `periods` at a compound `interestRate`, paid at the
 * end (ordinary) or the start (due) of each period.
 *
 * The last solved payment / present value / future value triple is kept, and
 * a solve whose input lies within `tolerance` of the same quantity of that
 * triple returns the kept answer.
 */
export class UniformSeriesSolver {
  readonly interestRate: Rate;
  readonly periods: number;
  readonly timing: PaymentTiming;
  readonly tolerance: Money;
  private readonly model = CompoundInterest;
  // v = 1 / (1 + i): the discounted payments form a geometric progression
  private readonly progressionRatio: number;
  private cache: CacheEntry | undefined;

  constructor(options: UniformSeriesOptions) {
    const { interestRate, periods, timing, tolerance } = parseSolverOptions(options);
    this.interestRate = interestRate;
    this.periods = periods;
    this.timing = timing;
    this.tolerance = tolerance;
    this.progressionRatio = this.model.reductionFactor(interestRate, 1);
  }

  get progression(): GeometricProgression | undefined {
    return this.cache?.progression;
  }

  get solved(): SolvedSeries | undefined {
    if (!this.cache) return undefined;
    const { payment, presentValue, futureValue } = this.cache;
    return { payment, presentValue, futureValue };
  }

  // ---------- factors ----------

  accumulationFactor(): number {
    const an = this.growth();
    return divide(an - 1, this.interestRate, "accumulation factor") * this.toLumpSum();
  }

  presentWorthFactor(): number {
    const an = this.growth();
    return divide(an - 1, this.interestRate * an, "present worth factor") * this.toLumpSum();
  }

  capitalRecoveryFactor(): number {
    const an = this.growth();
    return divide(this.interestRate * an, an - 1, "capital recovery factor") * this.toPayment();
  }

  sinkingFundFactor(): number {
    const an = this.growth();
    return divide(this.interestRate, an - 1, "sinking fund factor") * this.toPayment();
  }

  // ---------- solves ----------

  presentValueFromPayment(payment: Money, tolerance = this.tolerance): Money {
    if (this.cache && Math.abs(payment - this.cache.payment) <= tolerance) {
      return this.cache.presentValue;
    }

    const progression = new GeometricProgression(payment, this.progressionRatio);
    // Sum of the discounted payments counts the first one at time 0.
    let presentValue = progression.sumFirstTerms(this.periods);
    if (this.timing === 0) presentValue *= this.progressionRatio;

    this.cache = {
      payment,
      presentValue,
      futureValue: this.model.futureValue(presentValue, this.overSeries()),
      progression,
    };
    return presentValue;
  }

  futureValueFromPayment(payment: Money, tolerance = this.tolerance): Money {
    if (this.cache && Math.abs(payment - this.cache.payment) <= tolerance) {
      return this.cache.futureValue;
    }

    const futureValue = payment * this.accumulationFactor();
    this.cache = {
      payment,
      presentValue: this.model.presentValue(futureValue, this.overSeries()),
      futureValue,
      progression: new GeometricProgression(payment, this.progressionRatio),
    };
    return futureValue;
  }

  paymentFromPresentValue(presentValue: Money, tolerance = this.tolerance): Money {
    if (this.cache && Math.abs(presentValue - this.cache.presentValue) <= tolerance) {
      return this.cache.payment;
    }

    const payment = presentValue * this.capitalRecoveryFactor();
    this.cache = {
      payment,
      presentValue,
      futureValue: this.model.futureValue(presentValue, this.overSeries()),
      progression: new GeometricProgression(payment, this.progressionRatio),
    };
    return payment;
  }

  paymentFromFutureValue(futureValue: Money, tolerance = this.tolerance): Money {
    if (this.cache && Math.abs(futureValue - this.cache.futureValue) <= tolerance) {
      return this.cache.payment;
    }

    const payment = futureValue * this.sinkingFundFactor();
    this.cache = {
      payment,
      presentValue: this.model.presentValue(futureValue, this.overSeries()),
      futureValue,
      progression: new GeometricProgression(payment, this.progressionRatio),
    };
    return payment;
  }

  /**
   * Present value of each payment of the last solved series, first to last.
   * Empty before any solve.
   */
  discountedPayments(): number[] {
    if (!this.cache) return [];
    const shift = this.timing === 0 ? this.progressionRatio : 1;
    return this.cache.progression.nFirstTerms(this.periods).map((term) => term * shift);
  }

  // ---------- helpers ----------

  private growth(): number {
    return this.model.accumulationFactor(this.interestRate, this.periods);
  }

  private overSeries(): RateInput {
    return { kind: "rate", rate: this.interestRate, periods: this.periods };
  }

  // Due series: payments sit one period earlier than the ordinary series.
  private toLumpSum(): number {
    return this.timing === 1 ? this.model.accumulationFactor(this.interestRate, 1) : 1;
  }

  private toPayment(): number {
    return this.timing === 1 ? this.progressionRatio : 1;
  }
}
