/**
 * Strategy and leg input schemas.
 *
 * Every recognised option is listed here with its default; anything that
 * fails validation is rejected with an InvalidInputError before pricing.
 *
 * @example
 * ```typescript
 * const config = parseStrategyConfig({underlyingPrice: 100, daysToExpiration: 30});
 * config.riskFreeRate; // 0.05
 * ```
 */

import {z} from "zod";
import {InvalidInputError} from "../errors.js";
import type {LegKind, LegSpec} from "./types.js";

/** Used when neither the configuration nor any option leg gives a volatility. */
export const DEFAULT_VOLATILITY = 0.22;

/** Default DTE for a strategy holding no option legs and no configured value. */
export const FALLBACK_DAYS_TO_EXPIRATION = 1;

export const strategyConfigSchema = z.object({
  underlyingPrice: z.number().finite().positive(),
  title: z.string().min(1).default("Option Strategy"),
  symbol: z.string().min(1).default("XYZ"),
  daysToExpiration: z.number().finite().nonnegative().optional(),
  volatility: z.number().finite().positive().optional(),
  /** Half-width of the sampled price grid, in standard deviations. */
  stddevRange: z.number().finite().positive().default(3),
  numSimulations: z.number().int().min(2).default(1000),
  monteCarlo: z.boolean().default(false),
  /** Seed handed to the Monte-Carlo sampler. */
  seed: z.number().int().default(1),
  riskFreeRate: z.number().finite().default(0.05),
  yearDays: z.number().finite().positive().default(365),
});

export type StrategyConfigInput = z.input<typeof strategyConfigSchema>;
export type StrategyConfig = Readonly<z.output<typeof strategyConfigSchema>>;

const KIND_CODES: Record<"call" | "put" | "stock" | "C" | "P" | "S", LegKind> = {
  call: "call",
  put: "put",
  stock: "stock",
  C: "call",
  P: "put",
  S: "stock",
};

const legKindSchema = z
  .enum(["call", "put", "stock", "C", "P", "S"])
  .transform((code) => KIND_CODES[code]);

export const legSpecSchema = z
  .object({
    kind: legKindSchema,
    strike: z.number().finite().positive().optional(),
    quantity: z.number().int().refine((q) => q !== 0, {message: "quantity must not be zero"}),
    volatility: z.number().finite().positive().optional(),
    mark: z.number().finite().nonnegative().optional(),
    entryPrice: z.number().finite().nonnegative().optional(),
    daysToExpiration: z.number().finite().nonnegative().optional(),
    delta: z.number().finite().optional(),
  })
  .transform((spec, ctx): LegSpec => {
    if (spec.kind === "stock") {
      return {kind: "stock", quantity: spec.quantity, entryPrice: spec.entryPrice};
    }
    if (spec.strike === undefined) {
      ctx.addIssue({code: z.ZodIssueCode.custom, path: ["strike"], message: "strike is required for option legs"});
      return z.NEVER;
    }
    return {
      kind: spec.kind,
      strike: spec.strike,
      quantity: spec.quantity,
      volatility: spec.volatility,
      mark: spec.mark,
      daysToExpiration: spec.daysToExpiration,
      delta: spec.delta,
    };
  });

export type LegSpecInput = z.input<typeof legSpecSchema>;

function parseOrThrow<Out, In>(
  schema: z.ZodType<Out, z.ZodTypeDef, In>,
  value: unknown,
  label: string,
): Out {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
    );
    throw new InvalidInputError(`invalid ${label}`, issues);
  }
  return result.data;
}

export function parseStrategyConfig(input: unknown): StrategyConfig {
  return Object.freeze(parseOrThrow(strategyConfigSchema, input, "strategy config"));
}

export function parseLegSpec(input: unknown): LegSpec {
  return parseOrThrow(legSpecSchema, input, "leg");
}
