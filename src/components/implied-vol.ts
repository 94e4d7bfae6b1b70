// Implied volatility: Newton-Raphson steps inside a shrinking bisection bracket.

import {priceOption} from "./black-scholes.js";
import type {OptionPricingInput, PricingResult} from "./black-scholes.js";
import {ConvergenceError} from "./errors.js";
import {createLogger} from "./logger.js";

const log = createLogger("ImpliedVol");

export interface ImpliedVolInput extends Omit<OptionPricingInput, "volatility"> {
  /** Observed option price to match. */
  mark: number;
}

export interface ImpliedVolOptions {
  initialVolatility?: number;
  /** Price tolerance. */
  tolerance?: number;
  /** Step size (in volatility) below which the search stops. */
  volatilityTolerance?: number;
  maxIterations?: number;
}

export interface ImpliedVolResult extends PricingResult {
  volatility: number;
  iterations: number;
}

export const IV_DEFAULTS = {
  initialVolatility: 0.20,
  tolerance: 1e-5,
  volatilityTolerance: 1e-6,
  maxIterations: 100,
  minVolatility: 1e-4,
  maxVolatility: 5,
  minVega: 1e-8,
} as const;

export function impliedVolatility(
  input: ImpliedVolInput,
  options: ImpliedVolOptions = {},
): ImpliedVolResult {
  const tolerance = options.tolerance ?? IV_DEFAULTS.tolerance;
  const volTolerance = options.volatilityTolerance ?? IV_DEFAULTS.volatilityTolerance;
  const maxIterations = options.maxIterations ?? IV_DEFAULTS.maxIterations;
  const {mark, ...market} = input;
  const label = `${market.kind} K=${market.strike} mark=${mark}`;

  if (market.days <= 0) {
    throw new ConvergenceError("implied volatility is undefined at expiration", 0, IV_DEFAULTS.minVolatility);
  }

  let lo: number = IV_DEFAULTS.minVolatility;
  let hi: number = IV_DEFAULTS.maxVolatility;
  const floor = priceOption({...market, volatility: lo}).price;
  const ceiling = priceOption({...market, volatility: hi}).price;
  if (mark < floor - tolerance || mark > ceiling + tolerance) {
    throw new ConvergenceError(
      `mark outside attainable range [${floor}, ${ceiling}] for ${label}`,
      0,
      mark < floor ? lo : hi,
    );
  }

  let volatility = Math.min(Math.max(options.initialVolatility ?? IV_DEFAULTS.initialVolatility, lo), hi);

  for (let i = 1; i <= maxIterations; i++) {
    const result = priceOption({...market, volatility});
    const diff = result.price - mark;

    // Price rises with volatility, so the sign of diff tells which side the root is on.
    if (diff > 0) hi = volatility;
    else lo = volatility;

    const step = result.vega >= IV_DEFAULTS.minVega ? diff / result.vega : Infinity;
    if (Math.abs(diff) < tolerance && (Math.abs(step) < volTolerance || hi - lo < volTolerance)) {
      log.debug("iv.converged", {kind: market.kind, strike: market.strike, mark, volatility, iterations: i});
      return {...result, volatility, iterations: i};
    }

    const next = volatility - step;
    volatility = next > lo && next < hi ? next : (lo + hi) / 2;
  }

  throw new ConvergenceError(`no convergence after ${maxIterations} iterations for ${label}`, maxIterations, volatility);
}
