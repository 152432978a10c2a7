import { INITIAL_RATING } from "@/lib/arena/elo";

export type RatingBounds = { min: number; max: number };

/**
 * Ratings and cumulative vote mass per reviewer. A reviewer gets the initial
 * rating the first time it is referenced and keeps an entry until `reset()`.
 */
export class RatingStore {
  private readonly ratingsById = new Map<string, number>();
  private readonly massById = new Map<string, number>();

  constructor(readonly initialRating: number = INITIAL_RATING) {}

  get size(): number {
    return this.ratingsById.size;
  }

  rating(id: string): number {
    const existing = this.ratingsById.get(id);
    if (existing !== undefined) return existing;
    this.ratingsById.set(id, this.initialRating);
    return this.initialRating;
  }

  peek(id: string): number | undefined {
    return this.ratingsById.get(id);
  }

  setRating(id: string, value: number): void {
    this.ratingsById.set(id, value);
  }

  mass(id: string): number {
    return this.massById.get(id) ?? 0;
  }

  addMass(id: string, amount: number): void {
    this.massById.set(id, this.mass(id) + amount);
  }

  ids(): string[] {
    return Array.from(this.ratingsById.keys());
  }

  bounds(): RatingBounds | null {
    if (this.ratingsById.size === 0) return null;
    let min = Infinity;
    let max = -Infinity;
    for (const value of this.ratingsById.values()) {
      if (value < min) min = value;
      if (value > max) max = value;
    }
    return { min, max };
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.ratingsById);
  }

  reset(): void {
    this.ratingsById.clear();
    this.massById.clear();
  }
}
