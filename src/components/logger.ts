// Leveled, structured console logging.
//
// LOG_LEVEL = error | warn | info | debug | trace  (default: info)
//
//   const log = createLogger("VolSolver");
//   log.debug("iv.converged", {volatility: 0.23, iterations: 4});

import chalk from "chalk";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

export type LogData = Record<string, unknown>;
type LogFn = (event: string, data?: LogData) => void;

export interface Logger {
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
  trace: LogFn;
  isEnabled: (level: LogLevel) => boolean;
  /** Logger with additional default fields on every line. */
  child: (fields: LogData) => Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveLevel(): LogLevel {
  const explicit = process.env.LOG_LEVEL?.toLowerCase();
  if (explicit && isLogLevel(explicit)) return explicit;
  return "info";
}

let currentLevel: LogLevel = resolveLevel();

/** Override the log level at runtime. Returns the previous level. */
export function setLogLevel(level: LogLevel): LogLevel {
  const prev = currentLevel;
  currentLevel = level;
  return prev;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function levelTag(level: LogLevel): string {
  switch (level) {
    case "error": return chalk.red("ERR ");
    case "warn": return chalk.yellow("WARN");
    case "info": return chalk.blue("INFO");
    case "debug": return chalk.gray("DBG ");
    case "trace": return chalk.gray("TRC ");
  }
}

function formatValue(value: unknown): string {
  if (typeof value === "number") return Number.isInteger(value) ? String(value) : String(+value.toPrecision(6));
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

export function formatLine(
  ts: string,
  level: LogLevel,
  module: string,
  event: string,
  data?: LogData,
): string {
  let line = `${ts} [${levelTag(level)}] [${module}] ${event}`;
  if (data) {
    const pairs = Object.entries(data)
      .filter(([, v]) => v !== undefined && v !== null)
      .map(([k, v]) => `${k}=${formatValue(v)}`);
    if (pairs.length > 0) line += " | " + pairs.join(" ");
  }
  return line;
}

function emit(level: LogLevel, module: string, event: string, base: LogData, data?: LogData): void {
  if (LEVEL_ORDER[level] > LEVEL_ORDER[currentLevel]) return;
  const merged = data ? {...base, ...data} : base;
  const line = formatLine(new Date().toISOString(), level, module, event, merged);

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function makeLogger(module: string, base: LogData): Logger {
  const logFn = (level: LogLevel): LogFn =>
    (event, data) => emit(level, module, event, base, data);

  return {
    error: logFn("error"),
    warn: logFn("warn"),
    info: logFn("info"),
    debug: logFn("debug"),
    trace: logFn("trace"),
    isEnabled: (level) => LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel],
    child: (fields) => makeLogger(module, {...base, ...fields}),
  };
}

export function createLogger(module: string, fields?: LogData): Logger {
  return makeLogger(module, fields ?? {});
}
