import { z } from "zod";
import { ArenaPreconditionError } from "@/lib/arena/errors";
import type { ArenaVote } from "@/lib/arena/types";
import type { VoteLog } from "@/lib/arena/voteLog";
import { parseVote } from "@/lib/arena/votes";

/** The slice of `pg.Pool` / `pg.Client` this log needs. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export const VOTES_TABLE = "arena_votes";

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS ${VOTES_TABLE} (
    id BIGSERIAL PRIMARY KEY,
    session_id TEXT NOT NULL,
    paper_id TEXT NOT NULL,
    reviewer_a TEXT NOT NULL,
    reviewer_b TEXT NOT NULL,
    technical TEXT NOT NULL,
    constructiveness TEXT NOT NULL,
    clarity TEXT NOT NULL,
    overall TEXT NOT NULL,
    review_a TEXT NOT NULL,
    review_b TEXT NOT NULL,
    voted_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )
`;

const INSERT_SQL = `
  INSERT INTO ${VOTES_TABLE} (
    session_id, paper_id, reviewer_a, reviewer_b,
    technical, constructiveness, clarity, overall,
    review_a, review_b, voted_at
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
`;

const SELECT_SQL = `
  SELECT
    session_id, paper_id, reviewer_a, reviewer_b,
    technical, constructiveness, clarity, overall,
    review_a, review_b, voted_at
  FROM ${VOTES_TABLE}
  ORDER BY voted_at ASC, id ASC
`;

const rowSchema = z.object({
  session_id: z.string(),
  paper_id: z.string(),
  reviewer_a: z.string(),
  reviewer_b: z.string(),
  technical: z.string(),
  constructiveness: z.string(),
  clarity: z.string(),
  overall: z.string(),
  review_a: z.string(),
  review_b: z.string(),
  voted_at: z.union([z.date(), z.string()]),
});

type VoteRow = z.infer<typeof rowSchema>;

function toVote(row: VoteRow): ArenaVote {
  return parseVote({
    sessionId: row.session_id,
    paperId: row.paper_id,
    reviewerA: row.reviewer_a,
    reviewerB: row.reviewer_b,
    judgements: {
      technical: row.technical,
      constructiveness: row.constructiveness,
      clarity: row.clarity,
      overall: row.overall,
    },
    reviewA: row.review_a,
    reviewB: row.review_b,
    votedAt: row.voted_at instanceof Date ? row.voted_at.toISOString() : row.voted_at,
  });
}

export class PgVoteLog implements VoteLog {
  constructor(private readonly db: Queryable) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(CREATE_TABLE_SQL);
  }

  async append(vote: ArenaVote): Promise<void> {
    const v = parseVote(vote);
    await this.db.query(INSERT_SQL, [
      v.sessionId,
      v.paperId,
      v.reviewerA,
      v.reviewerB,
      v.judgements.technical,
      v.judgements.constructiveness,
      v.judgements.clarity,
      v.judgements.overall,
      v.reviewA,
      v.reviewB,
      v.votedAt,
    ]);
  }

  async readAll(): Promise<ArenaVote[]> {
    const { rows } = await this.db.query(SELECT_SQL);
    return rows.map((raw, index) => {
      const parsed = rowSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ArenaPreconditionError(`${VOTES_TABLE} row ${index + 1}: ${parsed.error.message}`);
      }
      return toVote(parsed.data);
    });
  }
}
