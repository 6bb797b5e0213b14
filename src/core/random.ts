/**
 * Randomness helpers
 */

import type { RandomSource } from './types.js';

export const defaultRandom: RandomSource = Math.random;

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: RandomSource = defaultRandom): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Pick one item uniformly. Returns undefined for an empty list.
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource = defaultRandom): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.floor(random() * items.length)];
}
