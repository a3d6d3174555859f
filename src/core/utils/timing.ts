// src/core/utils/timing.ts
export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Uniform draw in `[min, max)`. */
export function randomBetween(min: number, max: number, random: () => number = Math.random): number {
  return min + random() * (max - min);
}
