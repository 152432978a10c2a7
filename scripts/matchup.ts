#!/usr/bin/env npx tsx
/**
 * Replay the vote log and print the next fair matchup from the paper registry.
 *
 * Usage:
 *   npm run arena:matchup            (random starting paper)
 *   npm run arena:matchup -- --position 3
 */

import "dotenv/config";
import { ArenaService } from "../lib/arena/arenaService";
import { loadArenaConfig } from "../lib/arena/config";
import { PaperRegistry } from "../lib/arena/eligibility";
import { errorMessage } from "../lib/arena/errors";
import { openVoteLog } from "../lib/arena/openVoteLog";

function parseArgs(argv: string[]) {
  return {
    help: argv.includes("--help") || argv.includes("-h"),
    position: argv.find((_, i) => argv[i - 1] === "--position") ?? null,
  };
}

function preview(text: string, max = 120) {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(`
Print the next fair reviewer matchup.

Usage:
  npm run arena:matchup -- [--position <n>]
`.trim());
    return;
  }

  const position = args.position ? Number.parseInt(args.position, 10) : null;
  if (position !== null && (!Number.isFinite(position) || position < 0)) {
    throw new Error(`--position must be a non-negative integer, got ${args.position}`);
  }

  const config = loadArenaConfig();
  const registry = await PaperRegistry.fromFile(config.papersFile);
  const opened = await openVoteLog(config);

  try {
    const service = await ArenaService.activate({
      log: opened.log,
      registry,
      engine: config.engine,
      step: config.step,
      maxPaperAttempts: config.maxPaperAttempts,
    });
    const matchup = await service.nextMatchup(service.startSession({ paperPosition: position ?? undefined }));

    if (!matchup) {
      console.log("no fair matchup available");
      return;
    }

    const ratingA = service.engine.rating(matchup.a.reviewerId);
    const ratingB = service.engine.rating(matchup.b.reviewerId);
    console.log(`paper: ${matchup.paperTitle} (${matchup.paperId}, position ${matchup.paperPosition})`);
    console.log(`A: ${matchup.a.reviewerId} (${ratingA.toFixed(1)}) ${preview(matchup.a.review)}`);
    console.log(`B: ${matchup.b.reviewerId} (${ratingB.toFixed(1)}) ${preview(matchup.b.review)}`);
    console.log(`expected A: ${service.engine.expectedScore(matchup.a.reviewerId, matchup.b.reviewerId).toFixed(3)}`);
  } finally {
    await opened.close();
  }
}

main().catch((error) => {
  console.error(`error: ${errorMessage(error)}`);
  process.exitCode = 1;
});
