import seedrandom from "seedrandom";

let rng: seedrandom.PRNG = seedrandom("warehouse");

/**
 * Shared utility for random number generation.
 * Centralizes RNG behind a seedable generator so runs can be replayed.
 */
export class RandomUtils {
  /**
   * Replaces the generator with one seeded from `seed`.
   */
  public static seed(seed: string): void {
    rng = seedrandom(seed);
  }

  /**
   * Returns a random element from an array.
   */
  public static element<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) return undefined;
    return array[Math.floor(rng() * array.length)];
  }
}
