import { createHash } from 'crypto';

/**
 * Deterministic pseudo-random stream derived from a seed. Each draw hashes
 * `seed:counter` with SHA-256, so the sequence depends only on the seed and
 * the number of draws made so far.
 */
export class SeededRandom {
  private counter = 0;

  constructor(private readonly seed: number | string) {}

  getSeed(): number | string {
    return this.seed;
  }

  /** Uniform in [0, 1) */
  next(): number {
    const digest = createHash('sha256').update(`${this.seed}:${this.counter++}`).digest();
    return digest.readUIntBE(0, 6) / 2 ** 48;
  }

  /** Uniform integer in [min, max] */
  nextInt(min: number, max: number): number {
    if (max < min) {
      throw new RangeError(`nextInt: max (${max}) is below min (${min})`);
    }
    return min + Math.floor(this.next() * (max - min + 1));
  }

  pick<T>(items: readonly T[]): T {
    const item = items[this.nextInt(0, items.length - 1)];
    if (item === undefined) {
      throw new RangeError('pick: cannot choose from an empty list');
    }
    return item;
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }

  digits(count: number): string {
    let out = '';
    for (let i = 0; i < count; i++) {
      out += String(this.nextInt(0, 9));
    }
    return out;
  }

  /** An independent stream for a named purpose */
  fork(label: string): SeededRandom {
    return new SeededRandom(`${this.seed}/${label}`);
  }
}
