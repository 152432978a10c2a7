import type { RandomSource } from "@/lib/arena/sampling";

/** Cycles through `values` so pair selection can be replayed in tests. */
export function sequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) throw new Error("sequenceRandom needs at least one value");
  let i = 0;
  return () => {
    const value = values[i % values.length] ?? 0;
    i += 1;
    return value;
  };
}
