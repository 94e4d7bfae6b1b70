import type {OptionKind} from "../black-scholes.js";

export type LegKind = OptionKind | "stock";

export interface Greeks {
  delta: number;
  theta: number;
  vega: number;
  gamma: number;
}

export interface OptionLegSpec {
  kind: OptionKind;
  strike: number;
  quantity: number;
  volatility?: number;
  mark?: number;
  daysToExpiration?: number;
  /** Replaces the model delta (per unit). */
  delta?: number;
}

export interface StockLegSpec {
  kind: "stock";
  quantity: number;
  /** Per-share price paid; defaults to the underlying price. */
  entryPrice?: number;
}

export type LegSpec = OptionLegSpec | StockLegSpec;

export interface OptionLeg {
  readonly kind: OptionKind;
  readonly strike: number;
  /** Signed contract count; negative is short. */
  readonly quantity: number;
  readonly volatility: number;
  readonly daysToExpiration: number;
  readonly mark: number;
  /** Per-unit Greeks, before quantity and multiplier. */
  readonly greeks: Readonly<Greeks>;
}

export interface StockLeg {
  readonly kind: "stock";
  /** Signed share count. */
  readonly quantity: number;
  readonly mark: number;
  /** delta equals the share count; the rest are zero. */
  readonly greeks: Readonly<Greeks>;
}

export type Leg = OptionLeg | StockLeg;

export interface MarketParams {
  underlyingPrice: number;
  riskFreeRate: number;
  yearDays: number;
}

export interface PnLSnapshot {
  readonly daysToExpiration: number;
  /** One standard deviation of the underlying over the elapsed horizon. */
  readonly stddev: number;
  readonly expectedProfit: number;
  readonly probabilityOfProfit: number;
}

export interface PnlRequest {
  partitions?: number;
  daysForward?: number;
  dte?: number;
}

export interface StrategySummary {
  underlyingPrice: number;
  symbol: string;
  title: string;
  daysToExpiration: number;
  volatility: number;
  expectedMove: number;
  probabilityOfProfit: number;
  expectedProfit: number;
  cost: number;
  delta: number;
  theta: number;
  vega: number;
  gamma: number;
  stddevRange: number;
}

export interface MarginRequirement {
  cash: number;
  margin: number;
}
