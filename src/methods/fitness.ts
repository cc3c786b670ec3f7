import type { FitnessEvaluator } from '../evolution/evolution.types';

/**
 * Conflict-based scoring for column-encoded queen placements.
 *
 * A genome stores one queen per column, so column clashes cannot occur; only
 * rows and diagonals are counted. The score is
 *
 *   fitness = maxFitness(N) - conflicts,   maxFitness(N) = N·(N-1)/2
 *
 * i.e. the number of unordered queen pairs minus the clashing ones, so a
 * non-attacking placement scores exactly `maxFitness(N)` (28 for eight queens).
 *
 * The score never drops below zero: a diagonal pair can never share a row,
 * and a row shared by k queens adds k-1 <= k(k-1)/2 conflicts, so the total
 * is bounded by the pair count.
 *
 * @see {@link https://en.wikipedia.org/wiki/Eight_queens_puzzle|Eight queens puzzle - Wikipedia}
 */

/** Number of unordered queen pairs on an n-queen board. */
export function maxFitness(queens: number): number {
  return queens < 2 ? 0 : (queens * (queens - 1)) / 2;
}

/**
 * Row conflicts: every value seen k > 1 times contributes k - 1.
 *
 * @example rowConflicts([0, 2, 3, 0]) // 1
 */
export function rowConflicts(genome: readonly number[]): number {
  const counts = new Map<number, number>();
  for (const row of genome) counts.set(row, (counts.get(row) ?? 0) + 1);
  let conflicts = 0;
  for (const count of counts.values()) if (count > 1) conflicts += count - 1;
  return conflicts;
}

/** Pairs of columns whose horizontal and vertical distances are equal. */
export function diagonalConflicts(genome: readonly number[]): number {
  const size = genome.length;
  let conflicts = 0;
  for (let i = 0; i < size - 1; i++) {
    for (let j = i + 1; j < size; j++) {
      if (j - i === Math.abs(genome[i] - genome[j])) conflicts++;
    }
  }
  return conflicts;
}

export function countConflicts(genome: readonly number[]): number {
  return rowConflicts(genome) + diagonalConflicts(genome);
}

/**
 * Score a genome. Pure and deterministic.
 *
 * @example
 * fitness([1, 3, 0, 2]); // 6 (solved)
 * fitness([0, 0, 0, 0]); // 3
 */
export function evaluateConflicts(genome: readonly number[]): number {
  return maxFitness(genome.length) - countConflicts(genome);
}

/**
 * Available fitness evaluators.
 */
export const fitness = {
  /**
   * Pair-counting evaluator: `maxFitness(N)` minus row and diagonal conflicts.
   */
  CONFLICTS: {
    name: 'CONFLICTS',
    evaluate: evaluateConflicts,
    maxFitness,
  } satisfies FitnessEvaluator,
};
