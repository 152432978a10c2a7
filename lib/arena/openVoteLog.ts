import pg from "pg";
import type { ArenaConfig } from "@/lib/arena/config";
import { PgVoteLog } from "@/lib/arena/pgVoteLog";
import { JsonlVoteLog, type VoteLog } from "@/lib/arena/voteLog";

export type OpenedVoteLog = {
  log: VoteLog;
  description: string;
  close: () => Promise<void>;
};

/** Postgres when DATABASE_URL is set, otherwise the JSONL file. */
export async function openVoteLog(config: Pick<ArenaConfig, "databaseUrl" | "votesFile">): Promise<OpenedVoteLog> {
  if (config.databaseUrl) {
    const pool = new pg.Pool({ connectionString: config.databaseUrl });
    const log = new PgVoteLog({ query: (text, values) => pool.query(text, values) });
    try {
      await log.ensureSchema();
    } catch (err) {
      await pool.end();
      throw err;
    }
    return { log, description: "postgres", close: () => pool.end() };
  }

  return {
    log: new JsonlVoteLog(config.votesFile),
    description: config.votesFile,
    close: async () => undefined,
  };
}
