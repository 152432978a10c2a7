import { DEFAULT_K_FACTOR, INITIAL_RATING, expectedScore, normalizedScore, updateEloPair } from "@/lib/arena/elo";
import { ArenaConfigError } from "@/lib/arena/errors";
import { DEFAULT_MAX_ATTEMPTS, findFairPair, type FairPairQuery } from "@/lib/arena/fairPair";
import { RatingStore } from "@/lib/arena/ratingStore";
import { mathRandom, type RandomSource } from "@/lib/arena/sampling";
import { buildLeaderboard, confidenceInterval } from "@/lib/arena/stats";
import type {
  CategoryWeights,
  ComparisonOutcome,
  CompetitorStats,
  FairPair,
  LeaderboardRow,
  RatingUpdate,
} from "@/lib/arena/types";
import { parseOutcome } from "@/lib/arena/votes";
import { parseCategoryWeights } from "@/lib/arena/weights";

export type RatingEngineOptions = {
  weights?: Partial<CategoryWeights>;
  kFactor?: number;
  initialRating?: number;
  random?: RandomSource;
  maxAttempts?: number;
};

/**
 * In-memory Elo ratings rebuilt from the vote log. Every method is
 * synchronous, so a single engine shared by concurrent callers only needs
 * its callers to avoid interleaving async work between reading and updating.
 */
export class RatingEngine {
  readonly weights: CategoryWeights;
  readonly kFactor: number;
  readonly initialRating: number;
  readonly maxAttempts: number;

  private readonly store: RatingStore;
  private readonly random: RandomSource;

  constructor(options: RatingEngineOptions = {}) {
    this.weights = parseCategoryWeights(options.weights);
    this.kFactor = options.kFactor ?? DEFAULT_K_FACTOR;
    this.initialRating = options.initialRating ?? INITIAL_RATING;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;

    if (!Number.isFinite(this.kFactor) || this.kFactor <= 0) {
      throw new ArenaConfigError(`k-factor must be a positive number, got ${this.kFactor}`);
    }
    if (!Number.isFinite(this.initialRating)) {
      throw new ArenaConfigError(`initial rating must be finite, got ${this.initialRating}`);
    }
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new ArenaConfigError(`max attempts must be a positive integer, got ${this.maxAttempts}`);
    }

    this.store = new RatingStore(this.initialRating);
    this.random = options.random ?? mathRandom;
  }

  /** Drops all state and re-applies `history` in order. */
  replay(history: Iterable<ComparisonOutcome>): number {
    this.store.reset();
    let count = 0;
    for (const outcome of history) {
      this.update(outcome);
      count += 1;
    }
    return count;
  }

  update(outcome: ComparisonOutcome): RatingUpdate {
    const { reviewerA: a, reviewerB: b, judgements } = parseOutcome(outcome);

    const score = normalizedScore(judgements, this.weights);
    const ratingA = this.store.rating(a);
    const ratingB = this.store.rating(b);
    const { newA, newB, expectedA } = updateEloPair({ ratingA, ratingB, score, k: this.kFactor });

    this.store.setRating(a, newA);
    this.store.setRating(b, newB);
    this.store.addMass(a, score);
    this.store.addMass(b, 1 - score);

    return {
      a,
      b,
      score,
      expectedA,
      before: { a: ratingA, b: ratingB },
      after: { a: newA, b: newB },
    };
  }

  findFairPair(query: FairPairQuery): FairPair | null {
    return findFairPair(this.store, query, { random: this.random, maxAttempts: this.maxAttempts });
  }

  rating(id: string): number {
    return this.store.rating(id);
  }

  ratings(): Record<string, number> {
    return this.store.snapshot();
  }

  expectedScore(a: string, b: string): number {
    return expectedScore(this.store.rating(a), this.store.rating(b));
  }

  stats(): Map<string, CompetitorStats> {
    const stats = new Map<string, CompetitorStats>();
    for (const id of this.store.ids()) {
      const rating = this.store.rating(id);
      const voteMass = this.store.mass(id);
      stats.set(id, { rating, ci: confidenceInterval(rating, voteMass, this.kFactor), voteMass });
    }
    return stats;
  }

  leaderboard(): LeaderboardRow[] {
    return buildLeaderboard(this.stats());
  }
}
