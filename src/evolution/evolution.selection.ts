import type { FitnessFunc, Genome, ScoredGenome } from './evolution.types';

/**
 * Score every genome once and order the result by descending fitness.
 *
 * Equal scores keep their prior population order (the original index is the
 * secondary key), so ranking is reproducible regardless of the sort
 * implementation.
 *
 * @example
 * const ranked = rankPopulation(population, fitness);
 * ranked[0].genome; // fittest genome
 */
export function rankPopulation(
  population: readonly Genome[],
  fitness: FitnessFunc
): ScoredGenome[] {
  const scored = population.map((genome, index) => ({
    genome,
    score: fitness(genome),
    index,
  }));
  scored.sort((a, b) => b.score - a.score || a.index - b.index);
  return scored;
}

/**
 * Fitness lookup backed by a ranking so selection does not rescore genomes
 * already evaluated this generation. Unknown genomes fall through to `fitness`.
 */
export function cachedFitness(
  ranked: readonly ScoredGenome[],
  fitness: FitnessFunc
): FitnessFunc {
  const scores = new Map<readonly number[], number>();
  for (const entry of ranked) scores.set(entry.genome, entry.score);
  return (genome) => scores.get(genome) ?? fitness(genome);
}

/** Mean score of a ranking; 0 for an empty one. */
export function averageScore(ranked: readonly ScoredGenome[]): number {
  if (!ranked.length) return 0;
  return ranked.reduce((sum, entry) => sum + entry.score, 0) / ranked.length;
}
