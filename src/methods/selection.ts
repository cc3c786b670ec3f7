import type {
  FitnessFunc,
  Genome,
  SelectionStrategy,
} from '../evolution/evolution.types';
import type { Rng } from '../utils/rng';

/**
 * Selection methods used to choose parents for reproduction based on their
 * fitness scores.
 *
 * Selection decides which placements pass their rows on to the next
 * generation. Strong pressure towards the fittest converges fast but can
 * stall on a local optimum; weak pressure keeps diversity at the cost of
 * speed.
 *
 * @see {@link https://en.wikipedia.org/wiki/Selection_(genetic_algorithm)|Selection (genetic algorithm) - Wikipedia}
 */

/**
 * Collect one weight per genome, rejecting populations that cannot be
 * sampled proportionately.
 */
function proportionateWeights(
  population: readonly Genome[],
  fitness: FitnessFunc
): { weights: number[]; total: number } {
  if (population.length === 0) {
    throw new Error('Cannot select parents from an empty population.');
  }
  const weights: number[] = [];
  let total = 0;
  for (const genome of population) {
    const weight = fitness(genome);
    if (!Number.isFinite(weight) || weight < 0) {
      throw new Error(
        `Fitness proportionate selection requires non-negative finite weights (got ${weight}).`
      );
    }
    weights.push(weight);
    total += weight;
  }
  if (total <= 0) {
    throw new Error(
      'Fitness proportionate selection requires at least one strictly positive weight.'
    );
  }
  return { weights, total };
}

/** One roulette spin: first genome whose cumulative weight exceeds the threshold. */
function spin(
  population: readonly Genome[],
  weights: readonly number[],
  total: number,
  rng: Rng
): Genome {
  const threshold = rng() * total;
  let cumulative = 0;
  let lastPositive = 0;
  for (let i = 0; i < population.length; i++) {
    if (weights[i] <= 0) continue;
    cumulative += weights[i];
    lastPositive = i;
    if (threshold < cumulative) return population[i];
  }
  // floating point round-off at the top of the wheel
  return population[lastPositive];
}

export const selection = {
  /**
   * Fitness Proportionate Selection (also known as Roulette Wheel Selection).
   *
   * Each genome is drawn with probability `fitness / totalFitness`, twice,
   * with replacement, so both parents may be the same genome. Zero-weight
   * genomes are never drawn. Throws when the population is empty, when a
   * weight is negative, or when no weight is strictly positive.
   */
  FITNESS_PROPORTIONATE: {
    name: 'FITNESS_PROPORTIONATE',
    select(
      population: readonly Genome[],
      fitness: FitnessFunc,
      rng: Rng
    ): [Genome, Genome] {
      const { weights, total } = proportionateWeights(population, fitness);
      return [
        spin(population, weights, total, rng),
        spin(population, weights, total, rng),
      ];
    },
  } satisfies SelectionStrategy,
};
