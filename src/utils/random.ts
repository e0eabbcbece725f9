import { GameInvariantError } from '../game/errors';

/**
 * Uniform source in [0, 1). Injected everywhere randomness is needed so a game can be replayed.
 */
export type RandomSource = () => number;

/**
 * Seeded PRNG (mulberry32)
 */
export function createRandom(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(rng: RandomSource, maxExclusive: number): number {
  return Math.min(Math.floor(rng() * maxExclusive), maxExclusive - 1);
}

/**
 * Pick one element uniformly. Picking from nothing is a logic bug.
 */
export function pickRandom<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new GameInvariantError('EMPTY_CHOICE', 'Cannot choose from an empty candidate set');
  }
  return items[randomInt(rng, items.length)];
}

export function shuffle<T>(rng: RandomSource, items: readonly T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomInt(rng, i + 1);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Sum of two dice, drawn uniformly from [2, 12]
 */
export function rollDice(rng: RandomSource): number {
  return randomInt(rng, 11) + 2;
}
