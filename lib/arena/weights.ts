import { z } from "zod";
import { ArenaConfigError } from "@/lib/arena/errors";
import { REVIEW_CATEGORIES, type CategoryWeights } from "@/lib/arena/types";

export const WEIGHT_SUM_TOLERANCE = 1e-6;

// "overall" carries the most weight by default.
export const DEFAULT_WEIGHTS: CategoryWeights = Object.freeze({
  technical: 0.2,
  constructiveness: 0.2,
  clarity: 0.2,
  overall: 0.4,
});

const weightSchema = z.number().finite().gt(0).lt(1);

const weightsSchema = z
  .object({
    technical: weightSchema,
    constructiveness: weightSchema,
    clarity: weightSchema,
    overall: weightSchema,
  })
  .strict()
  .superRefine((weights, ctx) => {
    const total = weightSum(weights);
    if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `weights must sum to 1, got ${total}`,
      });
    }
  });

export function weightSum(weights: CategoryWeights): number {
  return REVIEW_CATEGORIES.reduce((sum, category) => sum + weights[category], 0);
}

/**
 * Merges `input` over {@link DEFAULT_WEIGHTS} and validates the result.
 * Out-of-range or non-unit-sum weights throw; nothing is clamped or rescaled.
 */
export function parseCategoryWeights(input?: Partial<CategoryWeights>): CategoryWeights {
  const parsed = weightsSchema.safeParse({ ...DEFAULT_WEIGHTS, ...input });
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ArenaConfigError(`invalid category weights: ${detail}`);
  }
  return Object.freeze(parsed.data);
}
