import { describe, it, expect } from "vitest";
import {
  ArithmeticError,
  DEFAULT_CACHE_TOLERANCE,
  DUE,
  ORDINARY,
  UniformSeriesSolver,
  ValidationError,
} from "../src/index";

const solver = (interestRate: number, periods: number, timing: number, tolerance?: number) =>
  new UniformSeriesSolver({ interestRate, periods, timing, tolerance });

describe("UniformSeriesSolver construction", () => {
  it("defaults the cache tolerance", () => {
    expect(solver(0.05, 6, ORDINARY).tolerance).toBe(DEFAULT_CACHE_TOLERANCE);
  });

  it("rejects timings other than 0 and 1", () => {
    expect.assertions(3);
    expect(()=> solver(0.05, 6, 2)).toThrow(ValidationError);
    try {
      solver(0.05, 6, -1);
    } catch (e) {
      expect(e).toBeInstanceOf(ValidationError);
      expect((e as ValidationError).fieldErrors.timing).toBeDefined();
    }
  });

  it("rejects non-integer or non-positive periods and negative tolerance", () => {
    expect(() => solver(0.05, 0, DUE)).toThrow(ValidationError);
    expect(() => solver(0.05, 2.5, DUE)).toThrow(ValidationError);
    expect(() => solver(0.05, 6, DUE, -1)).toThrow(ValidationError);
  });
});

describe("present value from payment", () => {
  it("6 payments of 3,000 at 5%", () => {
    expect(solver(0.05, 6, DUE).presentValueFromPayment(3000)).toBeCloseTo(15988.43, 2);
    expect(solver(0.05, 6, ORDINARY).presentValueFromPayment(3000)).toBeCloseTo(15227.08, 2);
  });

  it("zero rate sums the payments", () => {
    expect(solver(0, 4, ORDINARY).presentValueFromPayment(50)).toBe(200);
  });
});

describe("payments from lump sums", () => {
  it("payment that repays 2,000 over 5 periods at 4%", () => {
    expect(solver(0.04, 5, ORDINARY).paymentFromPresentValue(2000)).toBeCloseTo(449.2542, 4);
    expect(solver(0.04, 5, DUE).paymentFromPresentValue(2000)).toBeCloseTo(431.9752, 4);
  });

  it("payment that accumulates 1,000 over 5 periods at 7%", () => {
    expect(solver(0.07, 5, ORDINARY).paymentFromFutureValue(1000)).toBeCloseTo(173.8907, 4);
    expect(solver(0.07, 5, DUE).paymentFromFutureValue(1000)).toBeCloseTo(162.5147, 4);
  });

  it("future value of 12 payments of 750 at 0.5%", () => {
    expect(solver(0.005, 12, ORDINARY).futureValueFromPayment(750)).toBeCloseTo(9251.67, 2);
    expect(solver(0.005, 12, DUE).futureValueFromPayment(750)).toBeCloseTo(9297.93, 2);
  });

  it.each([ORDINARY, DUE])("timing %i: payment and present value invert each other", (timing) => {
    const payment = solver(0.045, 12, timing).paymentFromPresentValue(14_000);
    expect(solver(0.045, 12, timing).presentValueFromPayment(payment)).toBeCloseTo(14_000, 6);
  });

  it.each([ORDINARY, DUE])("timing %i: payment and future value invert each other", (timing) => {
    const payment = solver(0.01, 180, timing).paymentFromFutureValue(250_000);
    expect(solver(0.01, 180, timing).futureValueFromPayment(payment)).toBeCloseTo(250_000, 6);
  });
});

describe("annuity factors", () => {
  it("capital recovery at 5% over 6 periods", () => {
    expect(solver(0.05, 6, ORDINARY).capitalRecoveryFactor()).toBeCloseTo(0.197017, 6);
    expect(solver(0.05, 6, DUE).capitalRecoveryFactor()).toBeCloseTo(0.187636, 6);
  });

  it("sinking fund at 7% over 5 periods", () => {
    expect(solver(0.07, 5, ORDINARY).sinkingFundFactor()).toBeCloseTo(0.173891, 6);
    expect(solver(0.07, 5, DUE).sinkingFundFactor()).toBeCloseTo(0.162515, 6);
  });

  it.each([ORDINARY, DUE])("timing %i: factors pair up as reciprocals", (timing) => {
    const s = solver(0.035, 4, timing);
    expect(s.presentWorthFactor() * s.capitalRecoveryFactor()).toBeCloseTo(1, 12);
    expect(s.accumulationFactor() * s.sinkingFundFactor()).toBeCloseTo(1, 12);
  });

  it("due factors shift the ordinary ones by one period", () => {
    const ordinary = solver(0.035, 4, ORDINARY);
    const due = solver(0.035, 4, DUE);
    expect(due.presentWorthFactor()).toBeCloseTo(ordinary.presentWorthFactor() * 1.035, 12);
    expect(due.accumulationFactor()).toBeCloseTo(ordinary.accumulationFactor() * 1.035, 12);
    expect(due.sinkingFundFactor()).toBeCloseTo(ordinary.sinkingFundFactor() / 1.035, 12);
  });

  it("zero rate is an arithmetic error", () => {
    expect(() => solver(0, 4, ORDINARY).capitalRecoveryFactor()).toThrow(ArithmeticError);
    expect(() => solver(0, 4, DUE).futureValueFromPayment(10)).toThrow(ArithmeticError);
  });
});

describe("solved state cache", () => {
  it("returns the cached answer within tolerance", () => {
    const s = solver(0.05, 6, DUE);
    const pv = s.presentValueFromPayment(3000);
    expect(s.presentValueFromPayment(3000.005)).toBe(pv);
    expect(s.presentValueFromPayment(3000.005, 0)).not.toBe(pv);
  });

  it("keeps the payment, present value and future value consistent", () => {
    const s = solver(0.05, 6, ORDINARY);
    const payment = s.paymentFromPresentValue(10_000);
    const solved = s.solved;
    expect(solved?.payment).toBe(payment);
    expect(solved?.presentValue).toBe(10_000);
    expect(solved?.futureValue).toBeCloseTo(10_000 * Math.pow(1.05, 6), 6);

    // a later solve on the cached future value returns the same payment
    expect(s.paymentFromFutureValue(solved?.futureValue ?? 0)).toBe(payment);
    expect(s.futureValueFromPayment(payment)).toBe(solved?.futureValue);
  });

  it("honours the configured tolerance", () => {
    const s = solver(0.05, 6, ORDINARY, 1);
    const payment = s.paymentFromPresentValue(10_000);
    expect(s.paymentFromPresentValue(10_000.9)).toBe(payment);
    expect(s.paymentFromPresentValue(10_002)).toBeGreaterThan(payment);
  });

  it("rebuilds the payment progression on each solve", () => {
    const s = solver(0.1, 2, ORDINARY);
    expect(s.progression).toBeUndefined();
    expect(s.discountedPayments()).toEqual([]);

    s.presentValueFromPayment(121);
    expect(s.progression?.initialTerm).toBe(121);
    expect(s.progression?.ratio).toBeCloseTo(1 / 1.1, 12);

    const payment = s.paymentFromPresentValue(500);
    expect(s.progression?.initialTerm).toBe(payment);
  });

  it("discounts each payment to the start of the series", () => {
    const ordinary = solver(0.1, 2, ORDINARY);
    ordinary.presentValueFromPayment(121);
    const [first, second] = ordinary.discountedPayments();
    expect(first).toBeCloseTo(110, 8);
    expect(second).toBeCloseTo(100, 8);

    const due = solver(0.1, 2, DUE);
    due.presentValueFromPayment(121);
    const [dueFirst, dueSecond] = due.discountedPayments();
    expect(dueFirst).toBe(121);
    expect(dueSecond).toBeCloseTo(110, 8);
  });
});
