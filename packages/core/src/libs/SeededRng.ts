export interface RandomSource {
  /** Integer in [0, bound) */
  nextInt(bound: number): number;
  /** Reorders `items` in place and returns it */
  shuffle<T>(items: T[]): T[];
}

/**
 * xorshift32 over a state word taken from an FNV-1a hash of the seed string.
 * Two instances built from the same seed produce the same turn orders and
 * the same random moves, which is what `--seed` relies on.
 */
export class SeededRng implements RandomSource {
  private word: number;

  constructor(seed: string) {
    let h = 0x811c9dc5;
    for (const ch of seed) {
      h ^= ch.codePointAt(0) ?? 0;
      h = Math.imul(h, 0x01000193);
    }
    // a zero word would stay zero forever
    this.word = h >>> 0 || 1;
  }

  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound < 1) {
      throw new RangeError(`Random bound must be a strictly positive integer, got ${bound}`);
    }
    let x = this.word;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.word = x >>> 0;
    return Math.floor((this.word / 0x100000000) * bound);
  }

  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      const picked = items[j];
      items[j] = items[i];
      items[i] = picked;
    }
    return items;
  }
}
