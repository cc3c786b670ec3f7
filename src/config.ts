/**
 * Global queens-evolve configuration contract & default instance.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'queens-evolve';
 *   config.warnings = true; // surface runtime guidance on stdout
 *
 * Adjust BEFORE constructing an `Evolution` so the engine reads the intended
 * values when it validates its options.
 *
 * DESIGN NOTES
 * ------------
 * - Plain serializable object: no setters, no proxies.
 * - The queen range is advisory for the engine (it only warns) and binding for
 *   the CLI (it rejects values outside of it).
 */
export interface QueensConfig {
  /**
   * Emit guidance warnings (unsupported queen counts, population drift,
   * elitism swallowing the whole population) through `console.warn`.
   * Default: false
   */
  warnings: boolean;

  /** Smallest queen count the CLI accepts. Default: 4 */
  minQueens: number;

  /** Largest queen count the CLI accepts. Default: 25 */
  maxQueens: number;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: QueensConfig = {
  warnings: false, // emit runtime guidance
  minQueens: 4,
  maxQueens: 25,
};
