import {expectedValue, monteCarloExpectedValue} from "../probability.js";
import type {ValuationContext} from "../probability.js";
import type {PnLSnapshot} from "./types.js";

export interface SnapshotOptions {
  volatility: number;
  monteCarlo: boolean;
  seed: number;
}

/** Expected P&L and probability of profit for the strategy at `dte` days before expiration. */
export function createSnapshot(ctx: ValuationContext, dte: number, options: SnapshotOptions): PnLSnapshot {
  const result = options.monteCarlo
    ? monteCarloExpectedValue(ctx, dte, options.volatility, options.seed)
    : expectedValue(ctx, dte, options.volatility);

  return Object.freeze({
    daysToExpiration: dte,
    stddev: result.stddev,
    expectedProfit: result.expectedProfit,
    probabilityOfProfit: result.probabilityOfProfit,
  });
}
