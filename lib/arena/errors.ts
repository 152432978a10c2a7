export class ArenaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArenaError";
  }
}

/** Malformed engine configuration (weights, k-factor, initial rating). */
export class ArenaConfigError extends ArenaError {
  constructor(message: string) {
    super(message);
    this.name = "ArenaConfigError";
  }
}

/**
 * Input the engine refuses to act on: self-comparisons, unknown judgement
 * values, malformed vote log lines.
 */
export class ArenaPreconditionError extends ArenaError {
  constructor(message: string) {
    super(message);
    this.name = "ArenaPreconditionError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
