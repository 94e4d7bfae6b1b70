// Error types raised by the pricing engine.

/** Rejected configuration or leg specification, raised before any pricing. */
export class InvalidInputError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "InvalidInputError";
    this.issues = issues;
  }
}

/** Misuse of an operation's arguments (e.g. conflicting P&L requests). */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/** Implied-volatility search that could not match the observed mark. */
export class ConvergenceError extends Error {
  readonly iterations: number;
  readonly lastVolatility: number;

  constructor(message: string, iterations: number, lastVolatility: number) {
    super(message);
    this.name = "ConvergenceError";
    this.iterations = iterations;
    this.lastVolatility = lastVolatility;
  }
}

export class NotImplementedError extends Error {
  constructor(feature: string) {
    super(`${feature} is not implemented`);
    this.name = "NotImplementedError";
  }
}
