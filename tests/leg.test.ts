import {afterEach, describe, it, expect, vi} from "vitest";
import {priceOption} from "../src/components/black-scholes.js";
import {ConvergenceError, InvalidInputError} from "../src/components/errors.js";
import {
  OPTION_MULTIPLIER,
  isOptionLeg,
  legCost,
  legExposure,
  legValueAt,
  multiplierOf,
  resolveLeg,
} from "../src/components/strategy/leg.js";
import type {LegContext} from "../src/components/strategy/leg.js";

const ctx: LegContext = {
  underlyingPrice: 100,
  riskFreeRate: 0.05,
  yearDays: 365,
  defaultDaysToExpiration: 30,
  defaultVolatility: 0.22,
};

const market = {underlyingPrice: 100, riskFreeRate: 0.05, yearDays: 365};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("resolveLeg", () => {
  it("prices a leg from its volatility", () => {
    const leg = resolveLeg({kind: "call", strike: 100, quantity: 1, volatility: 0.3}, ctx);
    expect(leg.kind).toBe("call");
    expect(leg.mark).toBeCloseTo(3.6320671844517847, 9);
    expect(leg.greeks.delta).toBeGreaterThan(0);
    expect(leg.greeks.delta).toBeLessThan(1);
    if (!isOptionLeg(leg)) throw new Error("expected an option leg");
    expect(leg.daysToExpiration).toBe(30);
  });

  it("solves volatility from a mark", () => {
    const leg = resolveLeg({kind: "call", strike: 100, quantity: 1, mark: 3.6320671844517847}, ctx);
    if (!isOptionLeg(leg)) throw new Error("expected an option leg");
    expect(leg.volatility).toBeCloseTo(0.3, 6);
    expect(leg.mark).toBe(3.6320671844517847);
  });

  it("falls back to the strategy volatility", () => {
    const leg = resolveLeg({kind: "put", strike: 95, quantity: -2, daysToExpiration: 45}, ctx);
    if (!isOptionLeg(leg)) throw new Error("expected an option leg");
    expect(leg.volatility).toBe(0.22);
    expect(leg.daysToExpiration).toBe(45);
    expect(leg.mark).toBeCloseTo(0.9946673322394908, 9);
    expect(leg.greeks.delta).toBeCloseTo(-0.21697811598709582, 9);
  });

  it("keeps both mark and volatility when given", () => {
    const leg = resolveLeg({kind: "call", strike: 100, quantity: 1, mark: 3.65, volatility: 0.3}, ctx);
    if (!isOptionLeg(leg)) throw new Error("expected an option leg");
    const model = priceOption({
      kind: "call", spot: 100, strike: 100, days: 30, volatility: 0.3, riskFreeRate: 0.05, yearDays: 365,
    });
    expect(leg.mark).toBe(3.65);
    expect(leg.volatility).toBe(0.3);
    expect(leg.greeks.delta).toBe(model.delta);
  });

  it("warns when the mark and the model price disagree", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    resolveLeg({kind: "call", strike: 100, quantity: 1, mark: 5, volatility: 0.3}, ctx);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toContain("leg.inconsistent_mark");
  });

  it("stays quiet when the mark is close to the model price", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    resolveLeg({kind: "call", strike: 100, quantity: 1, mark: 3.65, volatility: 0.3}, ctx);
    expect(warn).not.toHaveBeenCalled();
  });

  it("applies a delta override", () => {
    const leg = resolveLeg({kind: "call", strike: 100, quantity: 1, volatility: 0.3, delta: 0.42}, ctx);
    expect(leg.greeks.delta).toBe(0.42);
  });

  it("resolves stock at the underlying price by default", () => {
    const leg = resolveLeg({kind: "stock", quantity: -50}, ctx);
    expect(leg).toEqual({kind: "stock", quantity: -50, mark: 100, greeks: {delta: -50, theta: 0, vega: 0, gamma: 0}});
    expect(resolveLeg({kind: "stock", quantity: 10, entryPrice: 97.5}, ctx).mark).toBe(97.5);
  });

  it("requires a DTE when there is no default", () => {
    expect(() => resolveLeg({kind: "call", strike: 100, quantity: 1}, {...ctx, defaultDaysToExpiration: null}))
      .toThrow(InvalidInputError);
  });

  it("propagates solver failures", () => {
    expect(() => resolveLeg({kind: "call", strike: 90, quantity: 1, mark: 5}, ctx)).toThrow(ConvergenceError);
  });

  it("returns frozen records", () => {
    const leg = resolveLeg({kind: "call", strike: 100, quantity: 1}, ctx);
    expect(Object.isFrozen(leg)).toBe(true);
    expect(Object.isFrozen(leg.greeks)).toBe(true);
  });
});

describe("leg arithmetic", () => {
  const call = resolveLeg({kind: "call", strike: 100, quantity: -2, mark: 3.5, volatility: 0.3}, ctx);
  const stock = resolveLeg({kind: "stock", quantity: 100}, ctx);

  it("uses a contract multiplier for options only", () => {
    expect(multiplierOf(call)).toBe(OPTION_MULTIPLIER);
    expect(multiplierOf(stock)).toBe(1);
  });

  it("signs the cost by quantity", () => {
    expect(legCost(call)).toBe(-700);
    expect(legCost(stock)).toBe(10_000);
  });

  it("scales option Greeks to the position", () => {
    const exposure = legExposure(call);
    expect(exposure.delta).toBeCloseTo(call.greeks.delta * -200, 9);
    expect(exposure.vega).toBeCloseTo(call.greeks.vega * -200, 9);
  });

  it("leaves stock exposure at its share count", () => {
    expect(legExposure(stock)).toEqual({delta: 100, theta: 0, vega: 0, gamma: 0});
  });

  it("values legs at a hypothetical price", () => {
    expect(legValueAt(stock, 123, 10, market)).toBe(123);
    expect(legValueAt(call, 110, 30, market)).toBe(10);
    expect(legValueAt(call, 110, 45, market)).toBe(10);
    expect(legValueAt(call, 110, 0, market)).toBe(priceOption({
      kind: "call", spot: 110, strike: 100, days: 30, volatility: 0.3, riskFreeRate: 0.05, yearDays: 365,
    }).price);
  });
});
