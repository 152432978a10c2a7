#!/usr/bin/env npx tsx
/**
 * Append synthetic votes to a JSONL vote log, for trying the leaderboard and
 * matchup scripts locally.
 *
 * Usage:
 *   npm run votes:seed -- --count 50 --reviewers baseline,multi_agent,single_pass
 *   npm run votes:seed -- --count 10 --reviewers a,b --file /tmp/votes.jsonl
 */

import "dotenv/config";
import { randomUUID } from "node:crypto";
import { loadArenaConfig } from "../lib/arena/config";
import { errorMessage } from "../lib/arena/errors";
import { randomPick } from "../lib/arena/sampling";
import { VOTE_CHOICES, type CategoryJudgements, type VoteChoice } from "../lib/arena/types";
import { JsonlVoteLog } from "../lib/arena/voteLog";

const DEFAULT_COUNT = 20;

function parseArgs(argv: string[]) {
  const value = (flag: string) => argv.find((_, i) => argv[i - 1] === flag) ?? null;
  return {
    help: argv.includes("--help") || argv.includes("-h"),
    count: value("--count"),
    reviewers: value("--reviewers"),
    file: value("--file"),
    paper: value("--paper"),
  };
}

function pickChoice(): VoteChoice {
  return randomPick(VOTE_CHOICES) ?? "TIE";
}

function randomJudgements(): CategoryJudgements {
  return {
    technical: pickChoice(),
    constructiveness: pickChoice(),
    clarity: pickChoice(),
    overall: pickChoice(),
  };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(`
Append synthetic arena votes to a JSONL log.

Usage:
  npm run votes:seed -- --count <n> --reviewers <a,b,...> [--file <votes.jsonl>] [--paper <paperId>]
`.trim());
    return;
  }

  const reviewers = (args.reviewers ?? "")
    .split(",")
    .map((id) => id.trim())
    .filter(Boolean);
  if (new Set(reviewers).size < 2) {
    throw new Error("--reviewers needs at least two distinct ids");
  }

  const count = args.count ? Number.parseInt(args.count, 10) : DEFAULT_COUNT;
  if (!Number.isFinite(count) || count <= 0) {
    throw new Error(`--count must be a positive integer, got ${args.count}`);
  }

  const config = loadArenaConfig();
  const log = new JsonlVoteLog(args.file ?? config.votesFile);
  const sessionId = randomUUID();

  for (let i = 0; i < count; i++) {
    const reviewerA = randomPick(reviewers);
    const reviewerB = randomPick(reviewers.filter((id) => id !== reviewerA));
    if (reviewerA === null || reviewerB === null) continue;

    await log.append({
      sessionId,
      paperId: args.paper ?? `paper-${(i % 5) + 1}`,
      reviewerA,
      reviewerB,
      judgements: randomJudgements(),
      reviewA: `synthetic review by ${reviewerA}`,
      reviewB: `synthetic review by ${reviewerB}`,
      votedAt: new Date().toISOString(),
    });
  }

  console.log(`appended ${count} votes to ${log.filePath}`);
}

main().catch((error) => {
  console.error(`error: ${errorMessage(error)}`);
  process.exitCode = 1;
});
