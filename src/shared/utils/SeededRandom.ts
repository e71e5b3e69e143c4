import seedrandom from "seedrandom";

/**
 * Seedable random number generator.
 * Every source of randomness in a run goes through an instance of this class,
 * so two runs with the same seed draw the same sequence.
 */
export class SeededRandom {
  private readonly rng: seedrandom.PRNG;

  constructor(
    public readonly seed: number | string,
    stream?: string,
  ) {
    this.rng = seedrandom(stream ? `${seed}:${stream}` : String(seed));
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
   * Returns a random index into a collection of the given length.
   */
  public index(length: number): number {
    if (length <= 0) throw new Error("Cannot pick from an empty collection");
    return Math.floor(this.rng() * length);
  }

  /**
   * Shuffles an array in place (Fisher-Yates).
   */
  public shuffle<T>(array: T[]): T[] {
    for (let i = array.length - 1; i > 0; i--) {
      const j = Math.floor(this.rng() * (i + 1));
      [array[i], array[j]] = [array[j], array[i]];
    }
    return array;
  }
}
