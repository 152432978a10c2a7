import { describe, expect, it } from "vitest";
import { buildLeaderboard, confidenceInterval, formatLeaderboard } from "@/lib/arena/stats";
import type { CompetitorStats } from "@/lib/arena/types";

describe("confidenceInterval", () => {
  it("collapses to the rating when there is no vote mass", () => {
    expect(confidenceInterval(1532.5, 0, 32)).toEqual([1532.5, 1532.5]);
  });

  it("spans 1.96 standard deviations either side", () => {
    const [lower, upper] = confidenceInterval(1500, 4, 32);
    expect(lower).toBeCloseTo(1468.64, 9);
    expect(upper).toBeCloseTo(1531.36, 9);
  });

  it("contains the rating and narrows as vote mass grows", () => {
    let previousWidth = Infinity;
    for (const mass of [0.5, 1, 2.5, 10, 80]) {
      const [lower, upper] = confidenceInterval(1610, mass, 32);
      expect(lower).toBeLessThan(1610);
      expect(upper).toBeGreaterThan(1610);
      expect(upper - lower).toBeLessThan(previousWidth);
      previousWidth = upper - lower;
    }
  });
});

describe("buildLeaderboard", () => {
  it("sorts by rating and breaks ties by reviewer id", () => {
    const stats = new Map<string, CompetitorStats>([
      ["gamma", { rating: 1480, ci: [1480, 1480], voteMass: 0 }],
      ["beta", { rating: 1550, ci: [1500, 1600], voteMass: 2 }],
      ["alpha", { rating: 1480, ci: [1440, 1520], voteMass: 1 }],
    ]);

    expect(buildLeaderboard(stats)).toEqual([
      { rank: 1, reviewerId: "beta", rating: 1550, ci: [1500, 1600], voteMass: 2 },
      { rank: 2, reviewerId: "alpha", rating: 1480, ci: [1440, 1520], voteMass: 1 },
      { rank: 3, reviewerId: "gamma", rating: 1480, ci: [1480, 1480], voteMass: 0 },
    ]);
  });
});

describe("formatLeaderboard", () => {
  it("prints a placeholder when empty", () => {
    expect(formatLeaderboard([])).toBe("no ratings yet");
  });

  it("prints one aligned line per reviewer", () => {
    const lines = formatLeaderboard([
      { rank: 1, reviewerId: "alpha", rating: 1516, ci: [1453.28, 1578.72], voteMass: 1 },
    ]).split("\n");

    expect(lines).toEqual([
      "  #  reviewer    rating         95% ci    votes",
      "  1  alpha       1516.0    +62.7/-62.7     1.00",
    ]);
  });
});
