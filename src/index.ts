export {Strategy} from "./components/strategy/strategy.js";
export {
  DEFAULT_VOLATILITY,
  FALLBACK_DAYS_TO_EXPIRATION,
  legSpecSchema,
  parseLegSpec,
  parseStrategyConfig,
  strategyConfigSchema,
} from "./components/strategy/config.js";
export type {LegSpecInput, StrategyConfig, StrategyConfigInput} from "./components/strategy/config.js";
export {
  OPTION_MULTIPLIER,
  isOptionLeg,
  legCost,
  legExposure,
  legValueAt,
  multiplierOf,
  resolveLeg,
} from "./components/strategy/leg.js";
export type {LegContext} from "./components/strategy/leg.js";
export {createSnapshot} from "./components/strategy/snapshot.js";
export type {SnapshotOptions} from "./components/strategy/snapshot.js";
export type * from "./components/strategy/types.js";

export {
  cdf,
  dTerms,
  intrinsicValue,
  pdf,
  priceOption,
  priceStock,
} from "./components/black-scholes.js";
export type {OptionKind, OptionPricingInput, PricingResult} from "./components/black-scholes.js";
export {IV_DEFAULTS, impliedVolatility} from "./components/implied-vol.js";
export type {ImpliedVolInput, ImpliedVolOptions, ImpliedVolResult} from "./components/implied-vol.js";
export {
  MIN_HORIZON_DAYS,
  breachProbability,
  buildPnlCurve,
  expectedMove,
  expectedValue,
  monteCarloExpectedValue,
  pnlPoints,
} from "./components/probability.js";
export type {ExpectedValueResult, PnlCurve, PnlPoint, ValuationContext} from "./components/probability.js";
export {STOCK_MARGIN, estimateMargin, etfLeverageTable} from "./components/margin.js";
export type {MarginInput} from "./components/margin.js";
export {ConvergenceError, InvalidArgumentError, InvalidInputError, NotImplementedError} from "./components/errors.js";
export {createLogger, formatLine, getLogLevel, setLogLevel} from "./components/logger.js";
export type {LogData, LogLevel, Logger} from "./components/logger.js";
