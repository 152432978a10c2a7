import type { CompetitorStats, ConfidenceInterval, LeaderboardRow } from "@/lib/arena/types";

const Z_95 = 1.96;

/**
 * Heuristic 95% interval: the spread is approximated as `k / sqrt(voteMass)`.
 * This is not a derived Elo confidence bound; use it for display only.
 */
export function confidenceInterval(rating: number, voteMass: number, kFactor: number): ConfidenceInterval {
  if (voteMass <= 0) return [rating, rating];
  const margin = Z_95 * (kFactor / Math.sqrt(voteMass));
  return [rating - margin, rating + margin];
}

export function buildLeaderboard(stats: ReadonlyMap<string, CompetitorStats>): LeaderboardRow[] {
  return Array.from(stats.entries())
    .sort(([idA, a], [idB, b]) => b.rating - a.rating || (idA < idB ? -1 : idA > idB ? 1 : 0))
    .map(([reviewerId, entry], index) => ({
      rank: index + 1,
      reviewerId,
      rating: entry.rating,
      ci: entry.ci,
      voteMass: entry.voteMass,
    }));
}

function formatDelta(value: number) {
  return `${value >= 0 ? "+" : "-"}${Math.abs(value).toFixed(1)}`;
}

export function formatLeaderboard(rows: readonly LeaderboardRow[]): string {
  if (rows.length === 0) return "no ratings yet";

  const idWidth = Math.max("reviewer".length, ...rows.map((row) => row.reviewerId.length));
  const header = `${"#".padStart(3)}  ${"reviewer".padEnd(idWidth)}  ${"rating".padStart(8)}  ${"95% ci".padStart(13)}  ${"votes".padStart(7)}`;
  const lines = rows.map((row) => {
    const [lower, upper] = row.ci;
    const ci = `${formatDelta(upper - row.rating)}/${formatDelta(lower - row.rating)}`;
    return `${String(row.rank).padStart(3)}  ${row.reviewerId.padEnd(idWidth)}  ${row.rating.toFixed(1).padStart(8)}  ${ci.padStart(13)}  ${row.voteMass.toFixed(2).padStart(7)}`;
  });
  return [header, ...lines].join("\n");
}
