import seedrandom from "seedrandom";
import type { Vec2 } from "../types/navigation";

type Prng = seedrandom.PRNG;

let prng: Prng = seedrandom();

/**
 * Shared utility for random number generation.
 * Centralizes RNG so the whole core can be seeded for deterministic runs and tests.
 */
export class RandomUtils {
  /**
   * Re-seeds the shared generator. The same seed always yields the same sequence.
   */
  public static seed(seed: string | number): void {
    prng = seedrandom(String(seed));
  }

  /**
   * Returns a random integer between min (inclusive) and max (inclusive).
   */
  public static intRange(min: number, max: number): number {
    return Math.floor(prng() * (max - min + 1)) + min;
  }

  /**
   * Returns true with the specified probability (0-1).
   */
  public static chance(probability: number): boolean {
    return prng() < probability;
  }

  /**
   * Unit vector with a uniformly random heading. Stands in for the direction
   * of a zero-length vector.
   */
  public static unitVector(): Vec2 {
    const angle = prng() * Math.PI * 2;
    return { x: Math.cos(angle), y: Math.sin(angle) };
  }
}
