/**
 * Deterministic pseudo-random numbers for shuffling.
 *
 * Two engines seeded with the same value draw the same sequence, which is
 * what keeps a shuffled layout reproducible across peers and saves.
 */

// Mulberry32: small, fast deterministic PRNG
export class SeededRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Uniform float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let x = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }
}

/** Fresh 31-bit seed for games started without an explicit one. */
export function generateGameSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}
