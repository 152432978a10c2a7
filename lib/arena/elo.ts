import { REVIEW_CATEGORIES, type CategoryJudgements, type CategoryWeights, type VoteChoice } from "@/lib/arena/types";
import { weightSum } from "@/lib/arena/weights";

export const DEFAULT_K_FACTOR = 32;
export const INITIAL_RATING = 1500;

export function expectedScore(ra: number, rb: number): number {
  return 1 / (1 + 10 ** ((rb - ra) / 400));
}

/** Score from A's side. BOTH_BAD counts as a tie. */
export function choiceScore(choice: VoteChoice): 0 | 0.5 | 1 {
  if (choice === "A") return 1;
  if (choice === "B") return 0;
  return 0.5;
}

/**
 * A's fractional win across all categories. Divides by the actual weight
 * sum rather than assuming it is exactly 1.
 */
export function normalizedScore(judgements: CategoryJudgements, weights: CategoryWeights): number {
  let total = 0;
  for (const category of REVIEW_CATEGORIES) {
    total += weights[category] * choiceScore(judgements[category]);
  }
  return total / weightSum(weights);
}

export function updateEloPair(params: {
  ratingA: number;
  ratingB: number;
  score: number;
  k: number;
}): { newA: number; newB: number; expectedA: number; expectedB: number } {
  const expectedA = expectedScore(params.ratingA, params.ratingB);
  const expectedB = 1 - expectedA;

  return {
    newA: params.ratingA + params.k * (params.score - expectedA),
    newB: params.ratingB + params.k * (1 - params.score - expectedB),
    expectedA,
    expectedB,
  };
}
