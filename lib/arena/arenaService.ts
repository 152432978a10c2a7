import { randomUUID } from "node:crypto";
import { DEFAULT_MAX_PAPER_ATTEMPTS } from "@/lib/arena/config";
import type { PaperRegistry } from "@/lib/arena/eligibility";
import { RatingEngine, type RatingEngineOptions } from "@/lib/arena/engine";
import { ArenaPreconditionError } from "@/lib/arena/errors";
import { DEFAULT_FAIR_STEP } from "@/lib/arena/fairPair";
import { mathRandom, randomPick, type RandomSource } from "@/lib/arena/sampling";
import type { ArenaMatchup, ArenaVote, CategoryJudgements, LeaderboardRow, RatingUpdate } from "@/lib/arena/types";
import type { VoteLog } from "@/lib/arena/voteLog";
import { PairSet } from "@/lib/arena/votes";

export type ArenaSession = {
  id: string;
  startedAt: string;
  paperPosition: number;
  votedPairs: Map<string, PairSet>;
  current: ArenaMatchup | null;
};

export function createSession(params: { id?: string; paperPosition?: number; now?: Date } = {}): ArenaSession {
  return {
    id: params.id ?? randomUUID(),
    startedAt: (params.now ?? new Date()).toISOString(),
    paperPosition: params.paperPosition ?? 0,
    votedPairs: new Map(),
    current: null,
  };
}

export type ArenaServiceOptions = {
  log: VoteLog;
  registry: PaperRegistry;
  engine?: RatingEngineOptions;
  step?: number;
  maxPaperAttempts?: number;
  random?: RandomSource;
  now?: () => Date;
};

/**
 * Wires the rating engine to the vote log and the paper registry. Matchups
 * and votes run one at a time through a single queue, so a vote's append and
 * its rating update are never interleaved with another caller's.
 */
export class ArenaService {
  private queue: Promise<unknown> = Promise.resolve();
  private readonly step: number;
  private readonly maxPaperAttempts: number;
  private readonly random: RandomSource;
  private readonly now: () => Date;

  private constructor(
    readonly engine: RatingEngine,
    private readonly log: VoteLog,
    private readonly registry: PaperRegistry,
    options: ArenaServiceOptions,
  ) {
    this.step = options.step ?? DEFAULT_FAIR_STEP;
    this.maxPaperAttempts = options.maxPaperAttempts ?? DEFAULT_MAX_PAPER_ATTEMPTS;
    this.random = options.random ?? mathRandom;
    this.now = options.now ?? (() => new Date());
  }

  /** Builds a fresh engine and replays the whole vote log into it. */
  static async activate(options: ArenaServiceOptions): Promise<ArenaService> {
    const engine = new RatingEngine({ random: options.random, ...options.engine });
    const votes = await options.log.readAll();
    const count = engine.replay(votes);
    console.info(`replayed ${count} votes across ${Object.keys(engine.ratings()).length} reviewers`);
    return new ArenaService(engine, options.log, options.registry, options);
  }

  nextMatchup(session: ArenaSession): Promise<ArenaMatchup | null> {
    return this.runExclusive(() => this.pickMatchup(session));
  }

  submitVote(session: ArenaSession, judgements: CategoryJudgements): Promise<RatingUpdate> {
    return this.runExclusive(async () => {
      const matchup = session.current;
      if (!matchup) throw new ArenaPreconditionError(`session ${session.id} has no open matchup`);

      const vote: ArenaVote = {
        sessionId: session.id,
        paperId: matchup.paperId,
        reviewerA: matchup.a.reviewerId,
        reviewerB: matchup.b.reviewerId,
        judgements,
        reviewA: matchup.a.review,
        reviewB: matchup.b.review,
        votedAt: this.now().toISOString(),
      };

      await this.log.append(vote);
      const update = this.engine.update(vote);

      const voted = session.votedPairs.get(matchup.paperId) ?? new PairSet();
      voted.add(matchup.a.reviewerId, matchup.b.reviewerId);
      session.votedPairs.set(matchup.paperId, voted);
      session.current = null;
      session.paperPosition = matchup.paperPosition;

      console.info(
        `vote recorded: ${update.a} ${update.before.a.toFixed(1)} -> ${update.after.a.toFixed(1)}, ${update.b} ${update.before.b.toFixed(1)} -> ${update.after.b.toFixed(1)}`,
      );
      return update;
    });
  }

  /** A new session starting at a random paper, unless a position is given. */
  startSession(params: { id?: string; paperPosition?: number } = {}): ArenaSession {
    const paperPosition =
      params.paperPosition ?? (this.registry.size > 0 ? this.registry.samplePosition(this.random) : 0);
    return createSession({ id: params.id, paperPosition, now: this.now() });
  }

  leaderboard(): Promise<LeaderboardRow[]> {
    return this.runExclusive(() => this.engine.leaderboard());
  }

  private pickMatchup(session: ArenaSession): ArenaMatchup | null {
    session.current = null;
    if (this.registry.size === 0) return null;

    for (let attempt = 0; attempt < this.maxPaperAttempts; attempt++) {
      const position = (session.paperPosition + attempt) % this.registry.size;
      const paper = this.registry.paperAt(position);
      const pool = this.registry.eligibleReviewers(paper.paperId);

      const pair = this.engine.findFairPair({
        poolA: pool,
        poolB: pool,
        exclude: session.votedPairs.get(paper.paperId),
        step: this.step,
      });
      if (!pair) {
        console.warn(`no fair pair for paper ${paper.paperId} at position ${position}, trying next paper`);
        continue;
      }

      const [a, b] = pair;
      const reviewA = randomPick(this.registry.reviewsBy(paper.paperId, a), this.random);
      const reviewB = randomPick(this.registry.reviewsBy(paper.paperId, b), this.random);
      if (reviewA === null || reviewB === null) continue;

      const matchup: ArenaMatchup = {
        paperId: paper.paperId,
        paperTitle: paper.title,
        paperPosition: position,
        a: { reviewerId: a, review: reviewA },
        b: { reviewerId: b, review: reviewB },
      };
      session.paperPosition = position;
      session.current = matchup;
      return matchup;
    }

    console.warn(`no fair pair found in ${this.maxPaperAttempts} papers from position ${session.paperPosition}`);
    return null;
  }

  private runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}
