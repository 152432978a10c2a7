import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RatingEngine } from "@/lib/arena/engine";
import { ArenaConfigError, ArenaPreconditionError } from "@/lib/arena/errors";
import { sequenceRandom } from "@/lib/arena/testRandom";
import type { ComparisonOutcome, VoteChoice } from "@/lib/arena/types";

function outcome(reviewerA: string, reviewerB: string, choice: VoteChoice): ComparisonOutcome {
  return {
    reviewerA,
    reviewerB,
    judgements: { technical: choice, constructiveness: choice, clarity: choice, overall: choice },
  };
}

const history: ComparisonOutcome[] = [
  outcome("multi_agent", "baseline", "A"),
  outcome("baseline", "single_pass", "TIE"),
  {
    reviewerA: "single_pass",
    reviewerB: "multi_agent",
    judgements: { technical: "B", constructiveness: "A", clarity: "BOTH_BAD", overall: "B" },
  },
  outcome("multi_agent", "single_pass", "A"),
  outcome("baseline", "multi_agent", "BOTH_BAD"),
];

describe("RatingEngine", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("construction", () => {
    it("uses the documented defaults", () => {
      const engine = new RatingEngine();
      expect(engine.kFactor).toBe(32);
      expect(engine.initialRating).toBe(1500);
      expect(engine.weights).toEqual({ technical: 0.2, constructiveness: 0.2, clarity: 0.2, overall: 0.4 });
    });

    it("rejects malformed weights", () => {
      expect(() => new RatingEngine({ weights: { overall: 0.9 } })).toThrow(ArenaConfigError);
    });

    it("rejects a non-positive k-factor", () => {
      expect(() => new RatingEngine({ kFactor: 0 })).toThrow(ArenaConfigError);
      expect(() => new RatingEngine({ kFactor: Number.POSITIVE_INFINITY })).toThrow(ArenaConfigError);
    });

    it("rejects a fractional attempt budget", () => {
      expect(() => new RatingEngine({ maxAttempts: 2.5 })).toThrow(ArenaConfigError);
    });
  });

  describe("update", () => {
    it("moves 1500 vs 1500 to 1516 / 1484 on a clean sweep", () => {
      const engine = new RatingEngine();
      const update = engine.update(outcome("A", "B", "A"));

      expect(update.score).toBeCloseTo(1, 12);
      expect(update.expectedA).toBe(0.5);
      expect(engine.rating("A")).toBeCloseTo(1516, 9);
      expect(engine.rating("B")).toBeCloseTo(1484, 9);
      expect(update.before).toEqual({ a: 1500, b: 1500 });
    });

    it("accumulates vote mass from the normalized score", () => {
      const engine = new RatingEngine();
      engine.update({
        reviewerA: "A",
        reviewerB: "B",
        judgements: { technical: "B", constructiveness: "B", clarity: "B", overall: "A" },
      });

      const stats = engine.stats();
      expect(stats.get("A")?.voteMass).toBeCloseTo(0.4, 12);
      expect(stats.get("B")?.voteMass).toBeCloseTo(0.6, 12);
    });

    it("leaves equal ratings unchanged on ties and both-bad votes", () => {
      const engine = new RatingEngine();
      engine.update(outcome("A", "B", "TIE"));
      engine.update(outcome("A", "B", "BOTH_BAD"));
      expect(engine.rating("A")).toBeCloseTo(1500, 9);
      expect(engine.rating("B")).toBeCloseTo(1500, 9);
    });

    it("keeps tie updates in lockstep across a rating gap", () => {
      const engine = new RatingEngine();
      engine.update(outcome("A", "B", "A"));
      engine.update(outcome("A", "B", "A"));

      const update = engine.update(outcome("A", "B", "BOTH_BAD"));
      const gainA = update.after.a - update.before.a;
      const gainB = update.after.b - update.before.b;
      expect(gainA).toBeLessThan(0);
      expect(gainA).toBeCloseTo(-gainB, 10);
    });

    it("pays a larger bonus for an upset win", () => {
      const even = new RatingEngine().update(outcome("A", "B", "A"));

      const engine = new RatingEngine();
      engine.update(outcome("A", "B", "B"));
      engine.update(outcome("A", "B", "B"));
      const upset = engine.update(outcome("A", "B", "A"));

      expect(upset.after.a).toBeGreaterThan(upset.before.a);
      expect(upset.after.b).toBeLessThan(upset.before.b);
      expect(upset.after.a - upset.before.a).toBeGreaterThan(even.after.a - even.before.a);
    });

    it("rejects a self-comparison without touching ratings", () => {
      const engine = new RatingEngine();
      expect(() => engine.update(outcome("A", "A", "A"))).toThrow(ArenaPreconditionError);
      expect(engine.ratings()).toEqual({});
    });
  });

  describe("replay", () => {
    it("is deterministic for the same ordered history", () => {
      const first = new RatingEngine();
      const second = new RatingEngine();
      expect(first.replay(history)).toBe(history.length);
      second.replay(history);
      expect(second.ratings()).toEqual(first.ratings());
    });

    it("resets ratings and vote mass before applying history", () => {
      const engine = new RatingEngine();
      engine.replay(history);
      const ratings = engine.ratings();
      const stats = engine.stats();

      engine.replay(history);
      expect(engine.ratings()).toEqual(ratings);
      expect(engine.stats()).toEqual(stats);

      engine.replay([]);
      expect(engine.stats().size).toBe(0);
    });

    it("depends on the order of the history", () => {
      const forward = new RatingEngine();
      forward.replay([outcome("A", "B", "A"), outcome("B", "C", "A")]);
      const reversed = new RatingEngine();
      reversed.replay([outcome("B", "C", "A"), outcome("A", "B", "A")]);
      expect(forward.rating("B")).not.toBeCloseTo(reversed.rating("B"), 6);
    });
  });

  describe("stats", () => {
    it("collapses the interval for a reviewer without vote mass", () => {
      const engine = new RatingEngine();
      engine.rating("fresh");
      expect(engine.stats().get("fresh")).toEqual({ rating: 1500, ci: [1500, 1500], voteMass: 0 });
    });

    it("widens the interval by 1.96 k / sqrt(mass)", () => {
      const engine = new RatingEngine();
      engine.update(outcome("A", "B", "A"));
      const a = engine.stats().get("A");
      expect(a?.voteMass).toBeCloseTo(1, 12);
      expect(a?.ci[0]).toBeCloseTo(1516 - 62.72, 6);
      expect(a?.ci[1]).toBeCloseTo(1516 + 62.72, 6);
    });

    it("ranks reviewers on the leaderboard", () => {
      const engine = new RatingEngine();
      engine.update(outcome("A", "B", "A"));
      const rows = engine.leaderboard();
      expect(rows.map((row) => [row.rank, row.reviewerId])).toEqual([
        [1, "A"],
        [2, "B"],
      ]);
    });
  });

  describe("findFairPair", () => {
    it("uses the injected random source", () => {
      const engine = new RatingEngine({ random: sequenceRandom([0.99]) });
      engine.replay([outcome("a", "b", "A"), outcome("c", "d", "A")]);
      const pool = ["a", "b", "c", "d"];
      // a and c sit at 1516, b and d at 1484; the last pick of poolA is d.
      expect(engine.findFairPair({ poolA: pool, poolB: pool })).toEqual(["d", "b"]);
    });

    it("returns null when the engine's attempt budget runs out", () => {
      const engine = new RatingEngine({ maxAttempts: 4 });
      engine.update(outcome("a", "b", "A"));
      expect(engine.findFairPair({ poolA: ["a", "b"], poolB: ["a", "b"], exclude: [["a", "b"]] })).toBeNull();
      expect(console.warn).toHaveBeenCalledWith("no fair pair found after 4 attempts");
    });
  });

  it("computes the expected score between two reviewers", () => {
    const engine = new RatingEngine();
    expect(engine.expectedScore("x", "y")).toBe(0.5);
    engine.update(outcome("x", "y", "A"));
    expect(engine.expectedScore("x", "y") + engine.expectedScore("y", "x")).toBeCloseTo(1, 12);
  });
});
