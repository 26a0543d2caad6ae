/**
 * Shared utility for random values.
 * Centralizes RNG so identifiers can be stubbed in tests.
 */
export class RandomUtils {
  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public static float(): number {
    return Math.random();
  }

  /**
   * Returns a short base-36 token suitable for log and correlation ids.
   */
  public static token(length = 7): string {
    return RandomUtils.float()
      .toString(36)
      .substring(2, 2 + length);
  }
}
