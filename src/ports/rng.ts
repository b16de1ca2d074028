/**
 * RNG port interface.
 * MUST be used for all randomness so that runs can be seeded and replayed.
 */
export interface RngPort {
  /**
   * Uniform real in [low, high], both bounds inclusive.
   * In replay mode, returns the logged value.
   */
  uniformReal(low: number, high: number): number;

  /**
   * Uniform integer in [low, high], both bounds inclusive.
   */
  uniformInt(low: number, high: number): number;
}
