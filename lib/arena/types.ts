export type VoteChoice = "A" | "B" | "TIE" | "BOTH_BAD";

export const VOTE_CHOICES = ["A", "B", "TIE", "BOTH_BAD"] as const satisfies readonly VoteChoice[];

export type ReviewCategory = "technical" | "constructiveness" | "clarity" | "overall";

export const REVIEW_CATEGORIES = [
  "technical",
  "constructiveness",
  "clarity",
  "overall",
] as const satisfies readonly ReviewCategory[];

export type CategoryJudgements = Readonly<Record<ReviewCategory, VoteChoice>>;

export type CategoryWeights = Readonly<Record<ReviewCategory, number>>;

export type ComparisonOutcome = {
  readonly reviewerA: string;
  readonly reviewerB: string;
  readonly judgements: CategoryJudgements;
};

export type ArenaVote = ComparisonOutcome & {
  readonly sessionId: string;
  readonly paperId: string;
  readonly reviewA: string;
  readonly reviewB: string;
  readonly votedAt: string;
};

export type FairPair = readonly [a: string, b: string];

export type RatingUpdate = {
  a: string;
  b: string;
  score: number;
  expectedA: number;
  before: { a: number; b: number };
  after: { a: number; b: number };
};

export type ConfidenceInterval = readonly [lower: number, upper: number];

export type CompetitorStats = {
  rating: number;
  ci: ConfidenceInterval;
  voteMass: number;
};

export type LeaderboardRow = CompetitorStats & {
  rank: number;
  reviewerId: string;
};

export type ArenaMatchup = {
  paperId: string;
  paperTitle: string;
  paperPosition: number;
  a: { reviewerId: string; review: string };
  b: { reviewerId: string; review: string };
};
