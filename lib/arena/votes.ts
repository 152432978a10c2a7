import { z } from "zod";
import { ArenaPreconditionError } from "@/lib/arena/errors";
import { VOTE_CHOICES, type ArenaVote, type ComparisonOutcome } from "@/lib/arena/types";

const choiceSchema = z.enum(VOTE_CHOICES);

const judgementsSchema = z
  .object({
    technical: choiceSchema,
    constructiveness: choiceSchema,
    clarity: choiceSchema,
    overall: choiceSchema,
  })
  .strict();

const outcomeFields = {
  reviewerA: z.string().min(1),
  reviewerB: z.string().min(1),
  judgements: judgementsSchema,
};

function distinctReviewers(value: { reviewerA: string; reviewerB: string }) {
  return value.reviewerA !== value.reviewerB;
}

const selfComparison = { message: "reviewerA and reviewerB must differ", path: ["reviewerB"] };

export const outcomeSchema = z.object(outcomeFields).refine(distinctReviewers, selfComparison);

export const voteSchema = z
  .object({
    ...outcomeFields,
    sessionId: z.string().min(1),
    paperId: z.string().min(1),
    reviewA: z.string(),
    reviewB: z.string(),
    votedAt: z.string().datetime({ offset: true }),
  })
  .refine(distinctReviewers, selfComparison);

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseOutcome(input: unknown): ComparisonOutcome {
  const parsed = outcomeSchema.safeParse(input);
  if (!parsed.success) throw new ArenaPreconditionError(`invalid outcome: ${describeIssues(parsed.error)}`);
  return parsed.data;
}

export function parseVote(input: unknown): ArenaVote {
  const parsed = voteSchema.safeParse(input);
  if (!parsed.success) throw new ArenaPreconditionError(`invalid vote: ${describeIssues(parsed.error)}`);
  return parsed.data;
}

export function pairKey(a: string, b: string): string {
  return JSON.stringify(a < b ? [a, b] : [b, a]);
}

/** Set of unordered reviewer pairs: `(a, b)` and `(b, a)` are the same entry. */
export class PairSet {
  private readonly keys = new Set<string>();

  constructor(pairs: Iterable<readonly [string, string]> = []) {
    for (const [a, b] of pairs) this.add(a, b);
  }

  add(a: string, b: string): this {
    this.keys.add(pairKey(a, b));
    return this;
  }

  has(a: string, b: string): boolean {
    return this.keys.has(pairKey(a, b));
  }
}
