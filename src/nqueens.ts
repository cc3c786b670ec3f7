import Evolution from './evolution';
import * as methods from './methods/methods';
import { config } from './config';
import { evaluateConflicts } from './methods/fitness';
import type { FitnessFunc, Genome, Population } from './evolution/evolution.types';
import type { Rng } from './utils/rng';
import { defaultRng } from './utils/rng';

/**
 * Score a genome: `N·(N-1)/2` minus its row and diagonal conflicts.
 */
export function fitness(genome: readonly number[]): number {
  return evaluateConflicts(genome);
}

/** Single-point crossover of two equal-length parents. */
export function crossover(
  a: readonly number[],
  b: readonly number[],
  rng: Rng = defaultRng()
): [Genome, Genome] {
  return methods.crossover.SINGLE_POINT.cross(a, b, rng);
}

/** Maybe move one queen to a random row; mutates and returns `genome`. */
export function mutation(
  genome: Genome,
  probability = methods.mutation.RANDOM_RESET.probability,
  rng: Rng = defaultRng()
): Genome {
  return methods.mutation.RANDOM_RESET.mutate(genome, rng, probability);
}

/** Two fitness-proportionate draws, with replacement. */
export function selection(
  population: Population,
  fitnessFunc: FitnessFunc,
  rng: Rng = defaultRng()
): [Genome, Genome] {
  return methods.selection.FITNESS_PROPORTIONATE.select(
    population,
    fitnessFunc,
    rng
  );
}

export { Evolution, methods, config };
export { runEvolution } from './evolution/evolution.run';
export type { RunEvolutionOptions } from './evolution/evolution.run';
export {
  generateGenome,
  generatePopulation,
  isValidGenome,
} from './evolution/evolution.population';
export { rankPopulation } from './evolution/evolution.selection';
export {
  exportHistoryCSV,
  exportHistoryJSONL,
  formatAccuracy,
} from './evolution/evolution.history';
export {
  countConflicts,
  diagonalConflicts,
  maxFitness,
  rowConflicts,
} from './methods/fitness';
export { createRng, restoreRng, randomInt } from './utils/rng';
export type { Rng, RngState, SeededRng } from './utils/rng';
export { renderBoard, conflictedColumns } from './visualization/board';
export { renderHistoryTable } from './visualization/table';
export type * from './evolution/evolution.types';
