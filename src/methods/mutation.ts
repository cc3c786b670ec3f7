import type { Genome, MutationOperator } from '../evolution/evolution.types';
import type { Rng } from '../utils/rng';
import { randomInt } from '../utils/rng';

/**
 * Mutation methods used to keep diversity in the population.
 *
 * Mutation is what lets the search leave a local optimum: crossover only
 * recombines rows already present in the parents, mutation introduces rows
 * that no parent had at that column.
 *
 * @see {@link https://en.wikipedia.org/wiki/Mutation_(genetic_algorithm) Mutation (Genetic Algorithm) - Wikipedia}
 */
export const mutation = {
  /**
   * Random resetting.
   * With probability `probability` one column is picked uniformly and its
   * queen moved to a uniformly drawn row in [0, N-1]. The drawn row may equal
   * the current one, which leaves the genome as it was. The genome is
   * modified in place and returned.
   */
  RANDOM_RESET: {
    name: 'RANDOM_RESET',
    /** Default chance of mutating a genome per call. */
    probability: 0.5,
    mutate(genome: Genome, rng: Rng, probability: number = 0.5) {
      if (rng() < probability && genome.length > 0) {
        const last = genome.length - 1;
        const index = randomInt(rng, 0, last);
        genome[index] = randomInt(rng, 0, last);
      }
      return genome;
    },
  } satisfies MutationOperator,
};
