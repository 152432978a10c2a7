#!/usr/bin/env npx tsx
/**
 * Recompute reviewer ratings from the stored vote history and print the
 * leaderboard.
 *
 * Usage:
 *   npm run elo:recompute
 *   npm run elo:recompute -- --json
 *   npm run elo:recompute -- --file arena_data/other_votes.jsonl
 */

import "dotenv/config";
import { loadArenaConfig } from "../lib/arena/config";
import { RatingEngine } from "../lib/arena/engine";
import { errorMessage } from "../lib/arena/errors";
import { openVoteLog } from "../lib/arena/openVoteLog";
import { formatLeaderboard } from "../lib/arena/stats";

function parseArgs(argv: string[]) {
  return {
    help: argv.includes("--help") || argv.includes("-h"),
    json: argv.includes("--json"),
    file: argv.find((_, i) => argv[i - 1] === "--file") ?? null,
  };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(`
Recompute reviewer arena ratings from vote history.

Usage:
  npm run elo:recompute
  npm run elo:recompute -- --json
  npm run elo:recompute -- --file <votes.jsonl>
`.trim());
    return;
  }

  const config = loadArenaConfig();
  const opened = await openVoteLog({
    databaseUrl: args.file ? null : config.databaseUrl,
    votesFile: args.file ?? config.votesFile,
  });

  try {
    const votes = await opened.log.readAll();
    const engine = new RatingEngine(config.engine);
    engine.replay(votes);
    const rows = engine.leaderboard();

    if (args.json) {
      console.log(JSON.stringify(rows, null, 2));
      return;
    }

    console.log(`source: ${opened.description}`);
    console.log(`votes replayed: ${votes.length}`);
    console.log(formatLeaderboard(rows));
  } finally {
    await opened.close();
  }
}

main().catch((error) => {
  console.error(`error: ${errorMessage(error)}`);
  process.exitCode = 1;
});
