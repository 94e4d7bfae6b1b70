// European option and share valuation under Black-Scholes, with per-unit Greeks.

export type OptionKind = "call" | "put";

/** Price and per-unit sensitivities of one option or share. */
export interface PricingResult {
  price: number;
  delta: number;
  /** Change in price per calendar day. */
  theta: number;
  /** Change in price per 1.00 change in volatility. */
  vega: number;
  gamma: number;
}

export interface OptionPricingInput {
  kind: OptionKind;
  spot: number;
  strike: number;
  days: number;
  volatility: number;
  riskFreeRate: number;
  yearDays: number;
}

/**
 * Cumulative standard normal distribution.
 * Hart's double-precision rational approximation (as given by West, 2005),
 * absolute error below 1e-14.
 */
export function cdf(x: number): number {
  const z = Math.abs(x);
  let tail: number;

  if (z > 37) {
    tail = 0;
  } else {
    const e = Math.exp(-z * z / 2);
    if (z < 7.07106781186547) {
      let n = 3.52624965998911e-2 * z + 0.700383064443688;
      n = n * z + 6.37396220353165;
      n = n * z + 33.912866078383;
      n = n * z + 112.079291497871;
      n = n * z + 221.213596169931;
      n = n * z + 220.206867912376;
      let d = 8.83883476483184e-2 * z + 1.75566716318264;
      d = d * z + 16.064177579207;
      d = d * z + 86.7807322029461;
      d = d * z + 296.564248779674;
      d = d * z + 637.333633378831;
      d = d * z + 793.826512519948;
      d = d * z + 440.413735824752;
      tail = e * n / d;
    } else {
      let d = z + 0.65;
      d = z + 4 / d;
      d = z + 3 / d;
      d = z + 2 / d;
      d = z + 1 / d;
      tail = e / d / 2.506628274631;
    }
  }

  return x > 0 ? 1 - tail : tail;
}

/** Standard normal density. */
export function pdf(x: number): number {
  return Math.exp(-x * x / 2) / Math.sqrt(2 * Math.PI);
}

/** The d1 and d2 terms for time T in years. */
export function dTerms(S: number, K: number, T: number, r: number, sigma: number): {d1: number; d2: number} {
  const spread = sigma * Math.sqrt(T);
  const d1 = (Math.log(S / K) + (r + sigma * sigma / 2) * T) / spread;
  return {d1, d2: d1 - spread};
}

export function intrinsicValue(kind: OptionKind, spot: number, strike: number): number {
  return kind === "call" ? Math.max(0, spot - strike) : Math.max(0, strike - spot);
}

// Expired or zero-vol: at-the-money counts as out of the money.
function expiredResult(kind: OptionKind, spot: number, strike: number): PricingResult {
  let delta = 0;
  if (kind === "call" && spot > strike) delta = 1;
  if (kind === "put" && spot < strike) delta = -1;
  return {price: intrinsicValue(kind, spot, strike), delta, theta: 0, vega: 0, gamma: 0};
}

export function priceOption(input: OptionPricingInput): PricingResult {
  const {kind, spot: S, strike: K, volatility: sigma, riskFreeRate: r} = input;
  const T = input.days / input.yearDays;

  if (T <= 0 || sigma <= 0) return expiredResult(kind, S, K);

  const sqrtT = Math.sqrt(T);
  const {d1: D1, d2: D2} = dTerms(S, K, T, r, sigma);
  const discount = Math.exp(-r * T);
  const density = pdf(D1);

  const gamma = density / (S * sigma * sqrtT);
  const vega = S * density * sqrtT;
  const decay = -(S * density * sigma) / (2 * sqrtT);

  if (kind === "call") {
    return {
      price: S * cdf(D1) - K * discount * cdf(D2),
      delta: cdf(D1),
      theta: (decay - r * K * discount * cdf(D2)) / input.yearDays,
      vega,
      gamma,
    };
  }
  return {
    price: K * discount * cdf(-D2) - S * cdf(-D1),
    delta: cdf(D1) - 1,
    theta: (decay + r * K * discount * cdf(-D2)) / input.yearDays,
    vega,
    gamma,
  };
}

/** Shares carry no optionality: price is spot, delta is the share count. */
export function priceStock(spot: number, quantity: number): PricingResult {
  return {price: spot, delta: quantity, theta: 0, vega: 0, gamma: 0};
}
