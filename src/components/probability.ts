// Probability-weighted P&L over a lognormal price grid.

import {cdf, dTerms, pdf} from "./black-scholes.js";
import type {OptionKind} from "./black-scholes.js";
import {NotImplementedError} from "./errors.js";
import {createLogger} from "./logger.js";
import {legValueAt, multiplierOf} from "./strategy/leg.js";
import type {Leg, MarketParams} from "./strategy/types.js";

const log = createLogger("Probability");

/** Shortest horizon sampled, so a snapshot at expiration-day still has spread. */
export const MIN_HORIZON_DAYS = 0.5;

/** Lowest grid price as a fraction of spot; keeps the log-density finite. */
const MIN_PRICE_FRACTION = 1e-4;

/** Everything the integrator needs from a strategy. */
export interface ValuationContext extends MarketParams {
  /** Strategy default DTE; `dte` arguments are measured against it. */
  daysToExpiration: number;
  legs: readonly Leg[];
  entryCost: number;
  stddevRange: number;
  numSimulations: number;
}

export interface PnlPoint {
  price: number;
  payoff: number;
  /** Normalised probability weight; weights over one grid sum to 1. */
  weight: number;
}

export interface PnlCurve {
  daysToExpiration: number;
  stddev: number;
  prices: number[];
  payoffs: number[];
  weights: number[];
  /** weight * payoff at each point. */
  expectedValues: number[];
}

export interface ExpectedValueResult {
  stddev: number;
  expectedProfit: number;
  probabilityOfProfit: number;
}

/** One standard deviation of the underlying after `days`. */
export function expectedMove(spot: number, volatility: number, days: number, yearDays = 365): number {
  if (days <= 0) return 0;
  return spot * volatility * Math.sqrt(days / yearDays);
}

/**
 * Risk-neutral probability that the underlying finishes above (call) or
 * below (put) the strike after `days`.
 */
export function breachProbability(
  kind: OptionKind,
  spot: number,
  strike: number,
  days: number,
  volatility: number,
  riskFreeRate = 0.05,
  yearDays = 365,
): number {
  if (days <= 0 || volatility <= 0) {
    if (kind === "call") return spot > strike ? 1 : 0;
    return spot < strike ? 1 : 0;
  }
  const D2 = dTerms(spot, strike, days / yearDays, riskFreeRate, volatility).d2;
  return kind === "call" ? cdf(D2) : cdf(-D2);
}

function horizonDays(ctx: ValuationContext, dte: number): number {
  return Math.max(ctx.daysToExpiration - dte, MIN_HORIZON_DAYS);
}

function gridPrices(ctx: ValuationContext, stddev: number): number[] {
  const S = ctx.underlyingPrice;
  const lo = Math.max(S - ctx.stddevRange * stddev, S * MIN_PRICE_FRACTION);
  const hi = S + ctx.stddevRange * stddev;
  const n = ctx.numSimulations;
  const step = (hi - lo) / (n - 1);
  const prices: number[] = [];
  for (let i = 0; i < n; i++) prices.push(lo + i * step);
  return prices;
}

function lognormalDensity(price: number, mu: number, s: number): number {
  return pdf((Math.log(price) - mu) / s) / (price * s);
}

function payoffAt(ctx: ValuationContext, price: number, elapsedDays: number): number {
  let value = 0;
  for (const leg of ctx.legs) {
    value += legValueAt(leg, price, elapsedDays, ctx) * leg.quantity * multiplierOf(leg);
  }
  return value - ctx.entryCost;
}

/**
 * Walks the price grid for a snapshot at `dte`, repricing every leg at each
 * point. Weights are normalised up front; payoffs are computed on demand.
 */
export function* pnlPoints(ctx: ValuationContext, dte: number, volatility: number): Generator<PnlPoint> {
  const horizon = horizonDays(ctx, dte);
  const stddev = expectedMove(ctx.underlyingPrice, volatility, horizon, ctx.yearDays);
  const prices = gridPrices(ctx, stddev);

  const t = horizon / ctx.yearDays;
  const s = volatility * Math.sqrt(t);
  const mu = Math.log(ctx.underlyingPrice) + (ctx.riskFreeRate - volatility * volatility / 2) * t;

  const densities = prices.map((p) => lognormalDensity(p, mu, s));
  const total = densities.reduce((sum, d) => sum + d, 0);
  if (!Number.isFinite(total) || total <= 0) {
    throw new Error(`degenerate price grid: density sum ${total} (vol=${volatility}, horizon=${horizon})`);
  }

  const elapsed = ctx.daysToExpiration - dte;
  for (let i = 0; i < prices.length; i++) {
    yield {price: prices[i], payoff: payoffAt(ctx, prices[i], elapsed), weight: densities[i] / total};
  }
}

export function buildPnlCurve(ctx: ValuationContext, dte: number, volatility: number): PnlCurve {
  const curve: PnlCurve = {
    daysToExpiration: dte,
    stddev: expectedMove(ctx.underlyingPrice, volatility, horizonDays(ctx, dte), ctx.yearDays),
    prices: [],
    payoffs: [],
    weights: [],
    expectedValues: [],
  };
  for (const point of pnlPoints(ctx, dte, volatility)) {
    curve.prices.push(point.price);
    curve.payoffs.push(point.payoff);
    curve.weights.push(point.weight);
    curve.expectedValues.push(point.weight * point.payoff);
  }
  return curve;
}

export function expectedValue(ctx: ValuationContext, dte: number, volatility: number): ExpectedValueResult {
  let expectedProfit = 0;
  let probabilityOfProfit = 0;
  for (const {payoff, weight} of pnlPoints(ctx, dte, volatility)) {
    expectedProfit += weight * payoff;
    if (payoff > 0) probabilityOfProfit += weight;
  }
  const stddev = expectedMove(ctx.underlyingPrice, volatility, horizonDays(ctx, dte), ctx.yearDays);

  log.debug("ev.computed", {dte, volatility, stddev, expectedProfit, probabilityOfProfit});
  return {stddev, expectedProfit, probabilityOfProfit};
}

/** Sampled counterpart of expectedValue; not available yet. */
export function monteCarloExpectedValue(
  ctx: ValuationContext,
  dte: number,
  volatility: number,
  seed: number,
): ExpectedValueResult {
  log.error("mc.unavailable", {dte, volatility, seed, samples: ctx.numSimulations});
  throw new NotImplementedError("Monte-Carlo expected value");
}
