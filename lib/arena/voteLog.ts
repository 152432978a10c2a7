import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import { ArenaPreconditionError, errorMessage } from "@/lib/arena/errors";
import type { ArenaVote } from "@/lib/arena/types";
import { parseVote } from "@/lib/arena/votes";

export const DEFAULT_VOTES_FILE = "arena_data/arena_votes.jsonl";

/** Chronological, append-only source of every recorded vote. */
export interface VoteLogReader {
  readAll(): Promise<ArenaVote[]>;
}

export interface VoteSink {
  append(vote: ArenaVote): Promise<void>;
}

export type VoteLog = VoteLogReader & VoteSink;

export class MemoryVoteLog implements VoteLog {
  private readonly votes: ArenaVote[];

  constructor(votes: readonly ArenaVote[] = []) {
    this.votes = votes.map((vote) => parseVote(vote));
  }

  async append(vote: ArenaVote): Promise<void> {
    this.votes.push(parseVote(vote));
  }

  async readAll(): Promise<ArenaVote[]> {
    return [...this.votes];
  }
}

export class JsonlVoteLog implements VoteLog {
  constructor(readonly filePath: string = DEFAULT_VOTES_FILE) {}

  async append(vote: ArenaVote): Promise<void> {
    const line = JSON.stringify(parseVote(vote));
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${line}\n`, "utf8");
  }

  async readAll(): Promise<ArenaVote[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const votes: ArenaVote[] = [];
    const lines = raw.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]?.trim();
      if (!line) continue;
      votes.push(parseLine(line, i + 1, this.filePath));
    }
    return votes;
  }
}

function parseLine(line: string, lineNumber: number, filePath: string): ArenaVote {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    throw new ArenaPreconditionError(`${filePath}:${lineNumber}: ${errorMessage(err)}`);
  }
  try {
    return parseVote(json);
  } catch (err) {
    throw new ArenaPreconditionError(`${filePath}:${lineNumber}: ${errorMessage(err)}`);
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
