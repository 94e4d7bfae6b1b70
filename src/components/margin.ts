// Cash and margin requirements, approximating the CBOE margin manual.
//
// Recognised option groupings: single long, single short, short strangle,
// vertical spread and iron condor. Anything else is priced leg by leg, which
// overstates some hedged combinations.

import {readFileSync} from "node:fs";
import {z} from "zod";
import {createLogger} from "./logger.js";
import {OPTION_MULTIPLIER, isOptionLeg} from "./strategy/leg.js";
import type {Leg, MarginRequirement, OptionLeg, StockLeg} from "./strategy/types.js";

const log = createLogger("Margin");

/** Fraction of stock value held as margin. Brokers range from 0.2 to 0.5. */
export const STOCK_MARGIN = 0.25;

/** Long options at or beyond this DTE need only 75% of their cost. */
const LONG_DATED_DAYS = 90;

const leverageTableSchema = z.record(z.string(), z.number().positive());

let etfLeverage: Record<string, number> | undefined;

/** Broad-based ETFs and their leverage factor, loaded on first use. */
export function etfLeverageTable(): Record<string, number> {
  if (!etfLeverage) {
    const raw = readFileSync(new URL("../data/etf-leverage.json", import.meta.url), "utf8");
    etfLeverage = leverageTableSchema.parse(JSON.parse(raw));
    log.debug("etf.table_loaded", {symbols: Object.keys(etfLeverage).length});
  }
  return etfLeverage;
}

export interface MarginInput {
  underlyingPrice: number;
  symbol: string;
  legs: readonly Leg[];
}

function add(a: MarginRequirement, b: MarginRequirement): MarginRequirement {
  return {cash: a.cash + b.cash, margin: a.margin + b.margin};
}

function stockRequirement(legs: readonly StockLeg[]): MarginRequirement {
  let cash = 0;
  for (const leg of legs) cash += Math.abs(leg.mark * leg.quantity);
  return {cash, margin: cash * STOCK_MARGIN};
}

function longOption(leg: OptionLeg): MarginRequirement {
  const cost = leg.mark * OPTION_MULTIPLIER * leg.quantity;
  return {cash: cost, margin: leg.daysToExpiration < LONG_DATED_DAYS ? cost : cost * 0.75};
}

function nakedShort(leg: OptionLeg, spot: number, leverage: number | undefined): MarginRequirement {
  const {mark, strike} = leg;
  const otm = leg.kind === "put" ? Math.max(0, spot - strike) : Math.max(0, strike - spot);
  let margin: number;
  let cash: number;

  if (leverage !== undefined) {
    // Broad-based ETFs and indices: 15% of value, 10% floor, scaled by leverage.
    const base = mark + spot * 0.15 * leverage - otm;
    const minimum = leg.kind === "put"
      ? mark + strike * 0.10 * leverage
      : mark + spot * 0.10 * leverage;
    margin = Math.max(minimum, base);
    cash = strike - mark;
  } else {
    // Equities and narrow indices: 20% of value, 10% floor.
    const base = mark + spot * 0.20 - otm;
    const minimum = leg.kind === "put" ? mark + strike * 0.10 : mark + spot * 0.10;
    margin = Math.max(minimum, base);
    cash = leg.kind === "put" ? strike - mark : spot - mark;
  }

  const scale = OPTION_MULTIPLIER * Math.abs(leg.quantity);
  return {cash: cash * scale, margin: margin * scale};
}

function singleOption(leg: OptionLeg, spot: number, leverage: number | undefined): MarginRequirement {
  return leg.quantity > 0 ? longOption(leg) : nakedShort(leg, spot, leverage);
}

function proceeds(leg: OptionLeg): number {
  return leg.mark * OPTION_MULTIPLIER * Math.abs(leg.quantity);
}

function shortStrangle(a: OptionLeg, b: OptionLeg, spot: number, leverage: number | undefined): MarginRequirement {
  const first = nakedShort(a, spot, leverage);
  const second = nakedShort(b, spot, leverage);
  const margin = first.margin > second.margin
    ? first.margin + proceeds(b)
    : second.margin + proceeds(a);
  return {cash: first.cash + second.cash, margin};
}

function expirationValue(leg: OptionLeg, price: number): number {
  const itm = leg.kind === "call" ? Math.max(0, price - leg.strike) : Math.max(0, leg.strike - price);
  return itm * leg.quantity * OPTION_MULTIPLIER;
}

/** Worst expiration loss across both strikes plus net debit (negative for credits). */
function verticalSpread(legs: readonly OptionLeg[]): MarginRequirement {
  const net = legs.reduce((sum, leg) => sum + leg.quantity * leg.mark * OPTION_MULTIPLIER, 0);
  const worst = Math.min(
    ...legs.map((at) => legs.reduce((sum, leg) => sum + expirationValue(leg, at.strike), 0)),
  );
  const requirement = Math.abs(worst) + net;
  return {cash: requirement, margin: requirement};
}

function isCoveredSpread(a: OptionLeg, b: OptionLeg): boolean {
  if (a.kind !== b.kind || a.quantity !== -b.quantity) return false;
  const [long, short] = a.quantity > 0 ? [a, b] : [b, a];
  return long.daysToExpiration >= short.daysToExpiration;
}

function ironCondor(calls: OptionLeg[], puts: OptionLeg[]): MarginRequirement {
  const callSide = verticalSpread(calls);
  const putSide = verticalSpread(puts);
  return {cash: Math.max(callSide.cash, putSide.cash), margin: Math.max(callSide.margin, putSide.margin)};
}

function optionRequirement(legs: OptionLeg[], spot: number, leverage: number | undefined): MarginRequirement {
  const sumOfLegs = (): MarginRequirement =>
    legs.reduce((total, leg) => add(total, singleOption(leg, spot, leverage)), {cash: 0, margin: 0});

  if (legs.length === 0) return {cash: 0, margin: 0};
  if (legs.length === 1) return singleOption(legs[0], spot, leverage);

  if (legs.length === 2) {
    const [a, b] = legs;
    if (a.quantity < 0 && b.quantity < 0) return shortStrangle(a, b, spot, leverage);
    if (isCoveredSpread(a, b)) return verticalSpread(legs);
  }

  if (legs.length === 4) {
    const calls = legs.filter((leg) => leg.kind === "call");
    const puts = legs.filter((leg) => leg.kind === "put");
    if (
      calls.length === 2 && puts.length === 2 &&
      calls[0].quantity + calls[1].quantity === 0 &&
      puts[0].quantity + puts[1].quantity === 0 &&
      Math.abs(puts[0].quantity) === Math.abs(calls[0].quantity)
    ) {
      return ironCondor(calls, puts);
    }
  }

  return sumOfLegs();
}

export function estimateMargin(input: MarginInput): MarginRequirement {
  const options = input.legs.filter(isOptionLeg);
  const stocks = input.legs.filter((leg): leg is StockLeg => leg.kind === "stock");
  const leverage: number | undefined = etfLeverageTable()[input.symbol.toUpperCase()];

  const total = add(stockRequirement(stocks), optionRequirement(options, input.underlyingPrice, leverage));
  const result = {cash: Math.max(total.cash, total.margin), margin: total.margin};

  log.debug("margin.estimated", {symbol: input.symbol, legs: input.legs.length, cash: result.cash, margin: result.margin});
  return result;
}
