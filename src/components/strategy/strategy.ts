// Multi-leg option strategy: leg aggregation, summaries and P&L snapshots.

import {InvalidArgumentError} from "../errors.js";
import {createLogger} from "../logger.js";
import {estimateMargin} from "../margin.js";
import {buildPnlCurve, expectedMove} from "../probability.js";
import type {PnlCurve, ValuationContext} from "../probability.js";
import {DEFAULT_VOLATILITY, FALLBACK_DAYS_TO_EXPIRATION, parseLegSpec, parseStrategyConfig} from "./config.js";
import type {LegSpecInput, StrategyConfig, StrategyConfigInput} from "./config.js";
import {isOptionLeg, legCost, legExposure, resolveLeg} from "./leg.js";
import {createSnapshot} from "./snapshot.js";
import type {
  Greeks,
  Leg,
  MarginRequirement,
  OptionLeg,
  PnLSnapshot,
  PnlRequest,
  StockLeg,
  StrategySummary,
} from "./types.js";

const log = createLogger("Strategy");

export class Strategy {
  readonly config: StrategyConfig;
  private readonly legList: Leg[] = [];
  private readonly snapshotList: PnLSnapshot[] = [];

  constructor(config: StrategyConfigInput) {
    this.config = parseStrategyConfig(config);
    log.info("strategy.created", {
      symbol: this.config.symbol,
      title: this.config.title,
      underlyingPrice: this.config.underlyingPrice,
    });
  }

  get legs(): readonly Leg[] {
    return this.legList;
  }

  get snapshots(): readonly PnLSnapshot[] {
    return this.snapshotList;
  }

  optionLegs(): OptionLeg[] {
    return this.legList.filter(isOptionLeg);
  }

  stockLegs(): StockLeg[] {
    return this.legList.filter((leg): leg is StockLeg => leg.kind === "stock");
  }

  /** Validates, prices and appends a leg. */
  addLeg(spec: LegSpecInput): Leg {
    const [leg] = this.addLegs([spec]);
    return leg;
  }

  /** Resolves every spec before appending any, so a failing spec leaves the legs unchanged. */
  addLegs(specs: readonly LegSpecInput[]): Leg[] {
    const staged: Leg[] = [];
    for (const spec of specs) {
      const parsed = parseLegSpec(spec);
      const legs = [...this.legList, ...staged];
      staged.push(resolveLeg(parsed, {
        underlyingPrice: this.config.underlyingPrice,
        riskFreeRate: this.config.riskFreeRate,
        yearDays: this.config.yearDays,
        defaultDaysToExpiration: this.config.daysToExpiration ?? averageOptionDays(legs),
        defaultVolatility: this.config.volatility ?? weightedVolatility(legs),
      }));
    }
    for (const leg of staged) {
      this.legList.push(leg);
      log.debug("leg.added", {kind: leg.kind, quantity: leg.quantity, mark: leg.mark, legs: this.legList.length});
    }
    return staged;
  }

  /** Configured DTE, else the mean DTE of the option legs, else one day. */
  daysToExpiration(): number {
    return this.config.daysToExpiration ?? averageOptionDays(this.legList) ?? FALLBACK_DAYS_TO_EXPIRATION;
  }

  /** Configured volatility, else the |quantity|-weighted option leg average. */
  volatility(): number {
    return this.config.volatility ?? weightedVolatility(this.legList);
  }

  cost(): number {
    return this.legList.reduce((sum, leg) => sum + legCost(leg), 0);
  }

  greeks(): Greeks {
    const total: Greeks = {delta: 0, theta: 0, vega: 0, gamma: 0};
    for (const leg of this.legList) {
      const g = legExposure(leg);
      total.delta += g.delta;
      total.theta += g.theta;
      total.vega += g.vega;
      total.gamma += g.gamma;
    }
    return total;
  }

  delta(): number {
    return this.greeks().delta;
  }

  theta(): number {
    return this.greeks().theta;
  }

  vega(): number {
    return this.greeks().vega;
  }

  gamma(): number {
    return this.greeks().gamma;
  }

  /** One standard deviation of the underlying at expiration. */
  expectedMove(): number {
    return expectedMove(this.config.underlyingPrice, this.volatility(), this.daysToExpiration(), this.config.yearDays);
  }

  private valuationContext(): ValuationContext {
    return {
      underlyingPrice: this.config.underlyingPrice,
      riskFreeRate: this.config.riskFreeRate,
      yearDays: this.config.yearDays,
      daysToExpiration: this.daysToExpiration(),
      legs: this.legList,
      entryCost: this.cost(),
      stddevRange: this.config.stddevRange,
      numSimulations: this.config.numSimulations,
    };
  }

  /** Snapshot at `dte` days before expiration, without storing it. */
  evaluate(dte: number): PnLSnapshot {
    return createSnapshot(this.valuationContext(), dte, {
      volatility: this.volatility(),
      monteCarlo: this.config.monteCarlo,
      seed: this.config.seed,
    });
  }

  summary(): StrategySummary {
    const atExpiration = this.evaluate(0);
    const g = this.greeks();
    return {
      underlyingPrice: this.config.underlyingPrice,
      symbol: this.config.symbol,
      title: this.config.title,
      daysToExpiration: this.daysToExpiration(),
      volatility: this.volatility(),
      expectedMove: this.expectedMove(),
      probabilityOfProfit: atExpiration.probabilityOfProfit,
      expectedProfit: atExpiration.expectedProfit,
      cost: this.cost(),
      delta: g.delta,
      theta: g.theta,
      vega: g.vega,
      gamma: g.gamma,
      stddevRange: this.config.stddevRange,
    };
  }

  private snapshotDays(request: PnlRequest): number[] {
    const given = [request.partitions, request.daysForward, request.dte].filter((v) => v !== undefined);
    if (given.length !== 1) {
      throw new InvalidArgumentError("addPnl takes exactly one of partitions, daysForward or dte");
    }
    const total = this.daysToExpiration();

    if (request.partitions !== undefined) {
      const n = request.partitions;
      if (!Number.isInteger(n) || n <= 1) {
        throw new InvalidArgumentError(`partitions must be an integer greater than 1, got ${n}`);
      }
      return Array.from({length: n}, (_, i) => total * i / n);
    }

    if (request.daysForward !== undefined) {
      const d = request.daysForward;
      if (!Number.isInteger(d) || d <= 0) {
        throw new InvalidArgumentError(`daysForward must be a positive integer, got ${d}`);
      }
      return [Math.max(0, total - d)];
    }

    const dte = request.dte ?? 0;
    if (!Number.isFinite(dte) || dte < 0 || dte > total) {
      throw new InvalidArgumentError(`dte must lie within [0, ${total}], got ${dte}`);
    }
    return [dte];
  }

  /** Computes and stores snapshots; returns the ones added by this call. */
  addPnl(request: PnlRequest): PnLSnapshot[] {
    const added = this.snapshotDays(request).map((dte) => this.evaluate(dte));
    this.snapshotList.push(...added);
    log.debug("pnl.added", {count: added.length, total: this.snapshotList.length});
    return added;
  }

  snapshot(index: number): PnLSnapshot {
    if (!Number.isInteger(index) || index < 0 || index >= this.snapshotList.length) {
      throw new InvalidArgumentError(`no snapshot at index ${index} (have ${this.snapshotList.length})`);
    }
    return this.snapshotList[index];
  }

  /** Price grid and payoff curve for charting. */
  pnlCurve(dte = 0): PnlCurve {
    return buildPnlCurve(this.valuationContext(), dte, this.volatility());
  }

  margin(): MarginRequirement {
    return estimateMargin({
      underlyingPrice: this.config.underlyingPrice,
      symbol: this.config.symbol,
      legs: this.legList,
    });
  }
}

function averageOptionDays(legs: readonly Leg[]): number | null {
  const options = legs.filter(isOptionLeg);
  if (options.length === 0) return null;
  return options.reduce((sum, leg) => sum + leg.daysToExpiration, 0) / options.length;
}

function weightedVolatility(legs: readonly Leg[]): number {
  let weighted = 0;
  let contracts = 0;
  for (const leg of legs.filter(isOptionLeg)) {
    weighted += leg.volatility * Math.abs(leg.quantity);
    contracts += Math.abs(leg.quantity);
  }
  return contracts > 0 ? weighted / contracts : DEFAULT_VOLATILITY;
}
