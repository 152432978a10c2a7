import { DEFAULT_K_FACTOR, INITIAL_RATING } from "@/lib/arena/elo";
import { DEFAULT_PAPERS_FILE } from "@/lib/arena/eligibility";
import type { RatingEngineOptions } from "@/lib/arena/engine";
import { ArenaConfigError } from "@/lib/arena/errors";
import { DEFAULT_FAIR_STEP, DEFAULT_MAX_ATTEMPTS } from "@/lib/arena/fairPair";
import { REVIEW_CATEGORIES, type CategoryWeights, type ReviewCategory } from "@/lib/arena/types";
import { DEFAULT_VOTES_FILE } from "@/lib/arena/voteLog";
import { parseCategoryWeights } from "@/lib/arena/weights";

export const DEFAULT_MAX_PAPER_ATTEMPTS = 10;

type Env = Record<string, string | undefined>;

export type ArenaConfig = {
  engine: RatingEngineOptions & { weights: CategoryWeights };
  step: number;
  maxPaperAttempts: number;
  votesFile: string;
  papersFile: string;
  databaseUrl: string | null;
};

const WEIGHT_ENV: Record<ReviewCategory, string> = {
  technical: "ARENA_WEIGHT_TECHNICAL",
  constructiveness: "ARENA_WEIGHT_CONSTRUCTIVENESS",
  clarity: "ARENA_WEIGHT_CLARITY",
  overall: "ARENA_WEIGHT_OVERALL",
};

function readNumberEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function readIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function readStringEnv(env: Env, name: string): string | null {
  const raw = env[name]?.trim();
  return raw ? raw : null;
}

// Unlike the tuning knobs, a weight that does not parse throws.
function readWeights(env: Env): CategoryWeights {
  const overrides: Partial<Record<ReviewCategory, number>> = {};
  for (const category of REVIEW_CATEGORIES) {
    const name = WEIGHT_ENV[category];
    const raw = readStringEnv(env, name);
    if (raw === null) continue;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) throw new ArenaConfigError(`${name} is not a number: ${raw}`);
    overrides[category] = parsed;
  }
  return parseCategoryWeights(overrides);
}

export function loadArenaConfig(env: Env = process.env): ArenaConfig {
  return {
    engine: {
      weights: readWeights(env),
      kFactor: readNumberEnv(env, "ARENA_K_FACTOR", DEFAULT_K_FACTOR),
      initialRating: readNumberEnv(env, "ARENA_INITIAL_RATING", INITIAL_RATING),
      maxAttempts: readIntEnv(env, "ARENA_MAX_ATTEMPTS", DEFAULT_MAX_ATTEMPTS),
    },
    step: readNumberEnv(env, "ARENA_FAIR_STEP", DEFAULT_FAIR_STEP),
    maxPaperAttempts: readIntEnv(env, "ARENA_MAX_PAPER_ATTEMPTS", DEFAULT_MAX_PAPER_ATTEMPTS),
    votesFile: readStringEnv(env, "ARENA_VOTES_FILE") ?? DEFAULT_VOTES_FILE,
    papersFile: readStringEnv(env, "ARENA_PAPERS_FILE") ?? DEFAULT_PAPERS_FILE,
    databaseUrl: readStringEnv(env, "DATABASE_URL"),
  };
}
