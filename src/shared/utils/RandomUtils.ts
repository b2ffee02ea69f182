/**
 * Shared utility for random number generation.
 * Centralizes RNG so tests can stub it.
 */
export class RandomUtils {
  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public static float(): number {
    return Math.random();
  }
}
