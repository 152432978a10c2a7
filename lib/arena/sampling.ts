/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const mathRandom: RandomSource = () => Math.random();

export function randomPick<T>(items: readonly T[], random: RandomSource = mathRandom): T | null {
  if (items.length === 0) return null;
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index] ?? null;
}
