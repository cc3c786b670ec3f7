import type {
  CrossoverOperator,
  FillPolicy,
  FitnessEvaluator,
  FitnessFunc,
  GenerationRecord,
  Genome,
  MutationOperator,
  Population,
  ScoredGenome,
  SelectionStrategy,
} from './evolution.types';
import type { Rng } from '../utils/rng';
import { cloneGenome } from './evolution.population';
import { cachedFitness, rankPopulation } from './evolution.selection';
import { formatAccuracy } from './evolution.history';
import { onceWarn } from '../utils/warnings';

/** Options after default hydration; every knob is present. */
export interface ResolvedEvolutionOptions {
  populationSize: number;
  generationLimit: number;
  survivals: number;
  single: boolean;
  mutationProbability: number;
  fillPolicy: FillPolicy;
  fitness: FitnessEvaluator;
  selection: SelectionStrategy;
  crossover: CrossoverOperator;
  mutation: MutationOperator;
  onGeneration?: (record: GenerationRecord) => void;
  log: number;
}

/**
 * Minimal surface the generation step needs from an `Evolution` instance.
 * Kept structural so the step can be exercised without the class.
 */
export interface EvolutionContext {
  readonly queens: number;
  readonly settings: ResolvedEvolutionOptions;
  readonly maxFitness: number;
  readonly history: GenerationRecord[];
  readonly rng: Rng;
  population: Population;
  generation: number;
  halted: boolean;
}

/**
 * Freeze a snapshot of the best genome of a generation.
 *
 * Boards with fewer than two queens have no pairs to conflict, so their
 * maximum fitness is 0; such a generation counts as solved at 100%.
 */
export function recordGeneration(
  generation: number,
  best: ScoredGenome,
  maxFitness: number
): GenerationRecord {
  const accuracy = maxFitness === 0 ? 100 : (best.score / maxFitness) * 100;
  return Object.freeze({
    generation,
    solved: best.score === maxFitness,
    best: Object.freeze(cloneGenome(best.genome)),
    fitness: best.score,
    accuracy,
    accuracyText: formatAccuracy(accuracy),
  });
}

/**
 * Run a single generation step.
 *
 * 1. Rank the population (descending fitness, prior order on ties).
 * 2. Append a {@link GenerationRecord} and notify `onGeneration` / `log`.
 * 3. In single mode a solved generation halts the run; the counter stays on
 *    the solved generation and the population stays ranked.
 * 4. Otherwise breed the next generation and advance the counter.
 *
 * Side-effects: replaces `this.population`, increments `this.generation`,
 * grows `this.history`.
 *
 * @this the `Evolution` instance
 * @returns the record of the generation that was just ranked
 */
export function evolve(this: EvolutionContext): GenerationRecord {
  if (this.halted) {
    throw new Error(
      `Evolution already halted on a solution at generation ${this.generation}.`
    );
  }
  if (!this.population.length) {
    throw new Error('Cannot evolve an empty population.');
  }
  const settings = this.settings;
  const evaluate: FitnessFunc = (genome) => settings.fitness.evaluate(genome);

  const ranked = rankPopulation(this.population, evaluate);
  this.population = ranked.map((entry) => entry.genome);

  const record = recordGeneration(this.generation, ranked[0], this.maxFitness);
  this.history.push(record);
  settings.onGeneration?.(record);
  if (settings.log > 0 && record.generation % settings.log === 0) {
    console.log(
      'generation',
      record.generation,
      'fitness',
      record.fitness,
      'accuracy',
      record.accuracyText
    );
  }

  if (record.solved && settings.single) {
    this.halted = true;
    return record;
  }

  this.population = breed.call(this, ranked, cachedFitness(ranked, evaluate));
  this.generation++;
  return record;
}

/**
 * Build the next generation from a ranking: copied elites first, then
 * mutated offspring of fitness-selected parents, filled per `fillPolicy`.
 */
export function breed(
  this: EvolutionContext,
  ranked: readonly ScoredGenome[],
  fitness: FitnessFunc
): Population {
  const {
    populationSize,
    survivals,
    fillPolicy,
    selection,
    crossover,
    mutation,
    mutationProbability,
  } = this.settings;
  const rng = this.rng;
  const parents = ranked.map((entry) => entry.genome);

  const offspring = (): [Genome, Genome] => {
    const [mother, father] = selection.select(parents, fitness, rng);
    const [first, second] = crossover.cross(mother, father, rng);
    return [
      mutation.mutate(first, rng, mutationProbability),
      mutation.mutate(second, rng, mutationProbability),
    ];
  };

  if (fillPolicy === 'legacy') {
    const next = parents.slice(0, survivals).map(cloneGenome);
    const rounds = Math.floor(parents.length / 2) - 1;
    for (let round = 0; round < rounds; round++) next.push(...offspring());
    if (next.length !== populationSize) {
      onceWarn(
        'legacy-fill-drift',
        `Legacy fill produced ${next.length} genomes instead of ${populationSize}.`
      );
    }
    return next;
  }

  const next = parents
    .slice(0, Math.min(survivals, populationSize))
    .map(cloneGenome);
  while (next.length < populationSize) {
    const [first, second] = offspring();
    next.push(first);
    if (next.length < populationSize) next.push(second);
  }
  return next;
}
