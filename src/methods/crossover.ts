import type {
  CrossoverOperator,
  Genome,
} from '../evolution/evolution.types';
import type { Rng } from '../utils/rng';
import { randomInt } from '../utils/rng';

/**
 * Crossover methods for column-encoded placements.
 *
 * Children are always freshly allocated arrays; no child shares storage with
 * a parent.
 *
 * @see {@link https://en.wikipedia.org/wiki/Crossover_(genetic_algorithm)}
 */

/**
 * Split both parents at `point` and swap the tails.
 *
 * @example
 * splitAt([0, 0, 0, 0], [1, 1, 1, 1], 2); // [[0, 0, 1, 1], [1, 1, 0, 0]]
 */
export function splitAt(
  a: readonly number[],
  b: readonly number[],
  point: number
): [Genome, Genome] {
  return [
    a.slice(0, point).concat(b.slice(point)),
    b.slice(0, point).concat(a.slice(point)),
  ];
}

export const crossover = {
  /**
   * Single-point crossover.
   * A split point `p` is drawn uniformly from [1, N-1]; the first child takes
   * `a[0:p] + b[p:]`, the second `b[0:p] + a[p:]`. Boards with fewer than two
   * columns have no split point and yield copies of the parents.
   *
   * @see {@link https://en.wikipedia.org/wiki/Crossover_(genetic_algorithm)#One-point_crossover}
   */
  SINGLE_POINT: {
    name: 'SINGLE_POINT',
    cross(
      a: readonly number[],
      b: readonly number[],
      rng: Rng
    ): [Genome, Genome] {
      if (a.length !== b.length) {
        throw new Error(
          `Crossover parents must have equal length (got ${a.length} and ${b.length}).`
        );
      }
      if (a.length < 2) return [a.slice(), b.slice()];
      return splitAt(a, b, randomInt(rng, 1, a.length - 1));
    },
  } satisfies CrossoverOperator,
};
