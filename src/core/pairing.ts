/**
 * Pair Generator
 *
 * Shuffles channel members into coffee pairs, steering away from pairs
 * that already met in one of the recent rounds.
 */

import type { MemberId, Pair, PairingBatch, RandomSource } from './types.js';
import { defaultRandom, pickRandom, shuffle } from './random.js';

/**
 * Map each member to everyone they were paired with across all batches.
 * Symmetric: a pair (a, b) is recorded under both a and b.
 */
export function buildMatchIndex(history: readonly PairingBatch[]): Map<MemberId, Set<MemberId>> {
  const index = new Map<MemberId, Set<MemberId>>();
  const record = (from: MemberId, to: MemberId) => {
    let seen = index.get(from);
    if (!seen) {
      seen = new Set();
      index.set(from, seen);
    }
    seen.add(to);
  };

  for (const batch of history) {
    for (const [a, b] of batch) {
      record(a, b);
      record(b, a);
    }
  }
  return index;
}

/**
 * Pair up members.
 *
 * With an odd count, the last member of the shuffled list floats: it is
 * paired once in the normal way and once more with whoever is left over
 * at the end. A single member is paired with themself.
 *
 * Historic matches are avoided when possible. When every remaining member
 * is a historic match, any remaining member may be picked.
 */
export function generatePairs(
  members: readonly MemberId[],
  history: readonly PairingBatch[] = [],
  random: RandomSource = defaultRandom,
): PairingBatch {
  if (members.length === 0) return [];

  const remaining = shuffle(members, random);
  const floating = remaining[remaining.length - 1];
  const previous = buildMatchIndex(history);
  const pairs: PairingBatch = [];

  while (remaining.length > 0) {
    const first = remaining[remaining.length - 1];
    remaining.pop();

    const seen = previous.get(first);
    const fresh = seen ? remaining.filter(m => !seen.has(m)) : remaining;
    const second = pickRandom(fresh.length > 0 ? fresh : remaining, random);

    if (second === undefined) {
      // Nobody left: the floating member takes a second coffee
      pairs.push([floating, first]);
      break;
    }

    remaining.splice(remaining.indexOf(second), 1);
    const pair: Pair = [first, second];
    pairs.push(pair);
  }

  return pairs;
}
