import seedrandom from "seedrandom";

/**
 * Seeded random number source.
 * Every random decision in a simulation session flows through one instance
 * so runs with the same seed replay identically.
 */
export class RandomUtils {
  private rng: seedrandom.PRNG;

  constructor(private seed: string) {
    this.rng = seedrandom(seed);
  }

  /**
   * Restarts the sequence, optionally from a new seed.
   */
  public reseed(seed: string = this.seed): void {
    this.seed = seed;
    this.rng = seedrandom(seed);
  }

  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public float(): number {
    return this.rng();
  }

  /**
   * Returns a random integer between min (inclusive) and max (inclusive).
   */
  public intRange(min: number, max: number): number {
    return Math.floor(this.rng() * (max - min + 1)) + min;
  }

  /**
   * Random angle in radians, [0, 2π).
   */
  public angle(): number {
    return this.rng() * Math.PI * 2;
  }
}
