import { ArenaPreconditionError } from "@/lib/arena/errors";
import type { RatingStore } from "@/lib/arena/ratingStore";
import { mathRandom, randomPick, type RandomSource } from "@/lib/arena/sampling";
import type { FairPair } from "@/lib/arena/types";
import { PairSet } from "@/lib/arena/votes";

export const DEFAULT_FAIR_STEP = 10;
export const DEFAULT_MAX_ATTEMPTS = 100;

export type ExcludedPairs = PairSet | Iterable<readonly [string, string]>;

export type FairPairQuery = {
  poolA: Iterable<string>;
  poolB: Iterable<string>;
  exclude?: ExcludedPairs;
  step?: number;
};

export type FairPairOptions = {
  random?: RandomSource;
  maxAttempts?: number;
};

function toPairSet(exclude: ExcludedPairs | undefined): PairSet {
  if (exclude instanceof PairSet) return exclude;
  return new PairSet(exclude ?? []);
}

/**
 * Picks a random `a` from poolA, then widens a rating window around it in
 * `step` increments (starting at 0) until some `b` in poolB qualifies. The
 * first non-empty window wins, so the result is a close pair, not
 * necessarily the closest one. Returns null once the attempt budget is
 * spent or when either pool is empty.
 */
export function findFairPair(
  store: RatingStore,
  query: FairPairQuery,
  options: FairPairOptions = {},
): FairPair | null {
  const step = query.step ?? DEFAULT_FAIR_STEP;
  if (!Number.isFinite(step) || step <= 0) {
    throw new ArenaPreconditionError(`fair pair step must be a positive number, got ${step}`);
  }
  const random = options.random ?? mathRandom;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;

  const poolA = Array.from(new Set(query.poolA));
  const poolB = Array.from(new Set(query.poolB));
  if (poolA.length === 0 || poolB.length === 0) return null;

  const excluded = toPairSet(query.exclude);

  // Cold start: with no history every pairing is equally fair.
  if (store.size === 0) {
    const a = randomPick(poolA, random);
    if (a === null) return null;
    const b = randomPick(
      poolB.filter((id) => id !== a),
      random,
    );
    return b === null ? null : [a, b];
  }

  for (const id of poolA) store.rating(id);
  for (const id of poolB) store.rating(id);
  const bounds = store.bounds();
  if (!bounds) return null;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const a = randomPick(poolA, random);
    if (a === null) return null;
    const base = store.rating(a);

    const maxDiff = Math.max(bounds.max - base, base - bounds.min);
    const windowCount = Math.ceil(maxDiff / step);

    for (let i = 0; i <= windowCount; i++) {
      const window = i * step;
      const eligible = poolB.filter(
        (b) => b !== a && Math.abs(store.rating(b) - base) <= window && !excluded.has(a, b),
      );
      const b = randomPick(eligible, random);
      if (b !== null) return [a, b];
    }
  }

  console.warn(`no fair pair found after ${maxAttempts} attempts`);
  return null;
}
