// Leg resolution and per-kind valuation.

import {priceOption, priceStock} from "../black-scholes.js";
import type {PricingResult} from "../black-scholes.js";
import {impliedVolatility} from "../implied-vol.js";
import {InvalidInputError} from "../errors.js";
import {createLogger} from "../logger.js";
import type {Greeks, Leg, LegSpec, MarketParams, OptionLeg, OptionLegSpec, StockLeg} from "./types.js";

const log = createLogger("Leg");

export const OPTION_MULTIPLIER = 100;

export interface LegContext extends MarketParams {
  /** Strategy DTE, or null when nothing sets one yet. */
  defaultDaysToExpiration: number | null;
  defaultVolatility: number;
}

function greeksOf(result: PricingResult): Greeks {
  return {delta: result.delta, theta: result.theta, vega: result.vega, gamma: result.gamma};
}

function resolveOptionLeg(spec: OptionLegSpec, ctx: LegContext): OptionLeg {
  const days = spec.daysToExpiration ?? ctx.defaultDaysToExpiration;
  if (days === null) {
    throw new InvalidInputError("invalid leg", ["daysToExpiration: required when the strategy has no default"]);
  }

  const market = {
    kind: spec.kind,
    spot: ctx.underlyingPrice,
    strike: spec.strike,
    days,
    riskFreeRate: ctx.riskFreeRate,
    yearDays: ctx.yearDays,
  };

  let volatility: number;
  let mark: number;
  let greeks: Greeks;

  if (spec.mark !== undefined && spec.volatility !== undefined) {
    const result = priceOption({...market, volatility: spec.volatility});
    volatility = spec.volatility;
    mark = spec.mark;
    greeks = greeksOf(result);
    const gap = Math.abs(result.price - mark);
    if (gap > 0.01 && gap > 0.05 * mark) {
      log.warn("leg.inconsistent_mark", {kind: spec.kind, strike: spec.strike, mark, modelPrice: result.price, volatility});
    }
  } else if (spec.mark !== undefined) {
    const solved = impliedVolatility({...market, mark: spec.mark});
    volatility = solved.volatility;
    mark = spec.mark;
    greeks = greeksOf(solved);
  } else {
    volatility = spec.volatility ?? ctx.defaultVolatility;
    const result = priceOption({...market, volatility});
    mark = result.price;
    greeks = greeksOf(result);
  }

  if (spec.delta !== undefined) greeks.delta = spec.delta;

  return Object.freeze({
    kind: spec.kind,
    strike: spec.strike,
    quantity: spec.quantity,
    volatility,
    daysToExpiration: days,
    mark,
    greeks: Object.freeze(greeks),
  });
}

function resolveStockLeg(quantity: number, entryPrice: number | undefined, ctx: LegContext): StockLeg {
  const result = priceStock(ctx.underlyingPrice, quantity);
  const leg: StockLeg = {
    kind: "stock",
    quantity,
    mark: entryPrice ?? result.price,
    greeks: Object.freeze(greeksOf(result)),
  };
  return Object.freeze(leg);
}

export function resolveLeg(spec: LegSpec, ctx: LegContext): Leg {
  const leg = spec.kind === "stock"
    ? resolveStockLeg(spec.quantity, spec.entryPrice, ctx)
    : resolveOptionLeg(spec, ctx);
  log.debug("leg.resolved", {kind: leg.kind, quantity: leg.quantity, mark: leg.mark, delta: leg.greeks.delta});
  return leg;
}

export function isOptionLeg(leg: Leg): leg is OptionLeg {
  return leg.kind !== "stock";
}

export function multiplierOf(leg: Leg): number {
  return leg.kind === "stock" ? 1 : OPTION_MULTIPLIER;
}

/** Signed entry outlay; negative for credits. */
export function legCost(leg: Leg): number {
  return leg.mark * leg.quantity * multiplierOf(leg);
}

/** Greeks scaled to the position. Shares already carry their count in delta. */
export function legExposure(leg: Leg): Greeks {
  if (leg.kind === "stock") {
    return {delta: leg.greeks.delta, theta: 0, vega: 0, gamma: 0};
  }
  const scale = leg.quantity * OPTION_MULTIPLIER;
  return {
    delta: leg.greeks.delta * scale,
    theta: leg.greeks.theta * scale,
    vega: leg.greeks.vega * scale,
    gamma: leg.greeks.gamma * scale,
  };
}

/**
 * Per-unit value of a leg at a hypothetical underlying price after
 * `elapsedDays` have passed. Expired options are worth intrinsic value.
 */
export function legValueAt(leg: Leg, spot: number, elapsedDays: number, market: MarketParams): number {
  switch (leg.kind) {
    case "stock":
      return spot;
    case "call":
    case "put":
      return priceOption({
        kind: leg.kind,
        spot,
        strike: leg.strike,
        days: Math.max(0, leg.daysToExpiration - elapsedDays),
        volatility: leg.volatility,
        riskFreeRate: market.riskFreeRate,
        yearDays: market.yearDays,
      }).price;
  }
}
