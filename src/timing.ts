export type Sleep = (ms: number) => Promise<void>;

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));

export function seconds(s: number): number {
  return Math.round(s * 1000);
}

/** Uniform integer in [min, max]. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  if (max <= min) return min;
  return min + Math.floor(random() * (max - min + 1));
}
