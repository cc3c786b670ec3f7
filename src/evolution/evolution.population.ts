import type { Genome, Population } from './evolution.types';
import type { Rng } from '../utils/rng';
import { defaultRng, randomInt } from '../utils/rng';

/**
 * Genome & population bootstrapping helpers.
 *
 * Rows are drawn independently per column, so freshly generated genomes may
 * contain row conflicts; those are scored by the fitness function, not
 * prevented here.
 */

/** Random genome of `length` columns with rows in [0, length - 1]. */
export function generateGenome(length: number, rng: Rng = defaultRng()): Genome {
  const genome: Genome = [];
  for (let column = 0; column < length; column++) {
    genome.push(randomInt(rng, 0, length - 1));
  }
  return genome;
}

/** `populationSize` random genomes, each placing `queens` queens. */
export function generatePopulation(
  populationSize: number,
  queens: number,
  rng: Rng = defaultRng()
): Population {
  const population: Population = [];
  for (let i = 0; i < populationSize; i++) {
    population.push(generateGenome(queens, rng));
  }
  return population;
}

/** Independent copy; the engine never lets two members share an array. */
export function cloneGenome(genome: readonly number[]): Genome {
  return genome.slice();
}

/**
 * True when `genome` has `queens` integer entries, each in [0, queens - 1].
 * Duplicated rows are valid (they are row conflicts, not malformed genomes).
 */
export function isValidGenome(genome: readonly number[], queens: number): boolean {
  return (
    genome.length === queens &&
    genome.every((row) => Number.isInteger(row) && row >= 0 && row < queens)
  );
}
