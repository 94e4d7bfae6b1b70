import {describe, it, expect} from "vitest";
import {InvalidInputError} from "../src/components/errors.js";
import {parseLegSpec, parseStrategyConfig} from "../src/components/strategy/config.js";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidInputError) return err.issues;
    throw err;
  }
  throw new Error("expected InvalidInputError");
}

describe("parseStrategyConfig", () => {
  it("applies defaults", () => {
    expect(parseStrategyConfig({underlyingPrice: 50})).toEqual({
      underlyingPrice: 50,
      title: "Option Strategy",
      symbol: "XYZ",
      stddevRange: 3,
      numSimulations: 1000,
      monteCarlo: false,
      seed: 1,
      riskFreeRate: 0.05,
      yearDays: 365,
    });
  });

  it("keeps optional defaults unset", () => {
    const config = parseStrategyConfig({underlyingPrice: 50});
    expect(config.daysToExpiration).toBeUndefined();
    expect(config.volatility).toBeUndefined();
  });

  it("lists every problem", () => {
    const issues = issuesOf(() => parseStrategyConfig({underlyingPrice: 0, numSimulations: 1}));
    expect(issues).toEqual([
      "underlyingPrice: Number must be greater than 0",
      "numSimulations: Number must be greater than or equal to 2",
    ]);
  });

  it("requires an underlying price", () => {
    expect(issuesOf(() => parseStrategyConfig({}))).toEqual(["underlyingPrice: Required"]);
  });
});

describe("parseLegSpec", () => {
  it("maps short kind codes", () => {
    expect(parseLegSpec({kind: "C", strike: 100, quantity: 1}).kind).toBe("call");
    expect(parseLegSpec({kind: "P", strike: 100, quantity: 1}).kind).toBe("put");
    expect(parseLegSpec({kind: "S", quantity: 1}).kind).toBe("stock");
  });

  it("drops option fields from stock legs", () => {
    expect(parseLegSpec({kind: "stock", quantity: 25, strike: 100, mark: 1, entryPrice: 99})).toEqual({
      kind: "stock", quantity: 25, entryPrice: 99,
    });
  });

  it("requires a strike on option legs", () => {
    expect(issuesOf(() => parseLegSpec({kind: "put", quantity: 1})))
      .toEqual(["strike: strike is required for option legs"]);
  });

  it("rejects a zero quantity", () => {
    expect(issuesOf(() => parseLegSpec({kind: "C", strike: 100, quantity: 0})))
      .toEqual(["quantity: quantity must not be zero"]);
  });

  it("rejects unknown kinds", () => {
    const issues = issuesOf(() => parseLegSpec({kind: "future", quantity: 1}));
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith("kind: ")).toBe(true);
  });

  it("prefixes the message with the subject", () => {
    expect(() => parseLegSpec({kind: "put", quantity: 1}))
      .toThrow("invalid leg: strike: strike is required for option legs");
  });
});
