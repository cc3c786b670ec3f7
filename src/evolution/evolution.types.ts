/**
 * Shared structural types for the evolutionary engine.
 *
 * Operators are narrow, single-capability strategy objects so that an
 * alternative fitness, selection, crossover or mutation can be swapped in
 * through `EvolutionOptions` without touching the generation loop.
 */
import type { Rng } from '../utils/rng';

/**
 * One candidate placement: index = column, value = row of that column's queen.
 *
 * @example
 * // * Q * *
 * // * * * Q
 * // Q * * *
 * // * * Q *
 * const genome: Genome = [2, 0, 3, 1];
 */
export type Genome = number[];

/** The genomes of one generation. Index 0 is the fittest right after ranking. */
export type Population = Genome[];

/** Scores a genome; higher is better. */
export type FitnessFunc = (genome: readonly number[]) => number;

export interface FitnessEvaluator {
  readonly name: string;
  evaluate(genome: readonly number[]): number;
  /** Score of a conflict-free placement of `queens` queens. */
  maxFitness(queens: number): number;
}

export interface SelectionStrategy {
  readonly name: string;
  /** Pick two parents (possibly the same genome twice). */
  select(
    population: readonly Genome[],
    fitness: FitnessFunc,
    rng: Rng
  ): [Genome, Genome];
}

export interface CrossoverOperator {
  readonly name: string;
  /** Recombine two equal-length parents into two freshly allocated children. */
  cross(a: readonly number[], b: readonly number[], rng: Rng): [Genome, Genome];
}

export interface MutationOperator {
  readonly name: string;
  /** Chance that a call alters the genome. */
  readonly probability: number;
  /** Perturb `genome` in place and return the same instance. */
  mutate(genome: Genome, rng: Rng, probability?: number): Genome;
}

/**
 * How the next generation is refilled after elitism.
 * - `exact`: breed until the population holds exactly `populationSize` genomes.
 * - `legacy`: `floor(length / 2) - 1` breeding rounds of two children plus the
 *   elites, which may let the size drift away from `populationSize`.
 */
export type FillPolicy = 'exact' | 'legacy';

/** Immutable per-generation snapshot appended to the engine history. */
export interface GenerationRecord {
  readonly generation: number;
  readonly solved: boolean;
  readonly best: readonly number[];
  readonly fitness: number;
  /** Best fitness as a percentage of the maximum. */
  readonly accuracy: number;
  /** `accuracy` with three decimals and a percent sign, e.g. `"96.429%"`. */
  readonly accuracyText: string;
}

export interface EvolutionOptions {
  /** Default: 50 */
  populationSize?: number;
  /** Negative runs until solved (requires `single`). Default: 100 */
  generationLimit?: number;
  /** Elites carried over unchanged. Default: 2 */
  survivals?: number;
  /** Stop at the first solved generation. Default: false */
  single?: boolean;
  /** Default: 0.5 */
  mutationProbability?: number;
  /** Default: 'exact' */
  fillPolicy?: FillPolicy;
  /** Seed for the engine's seedrandom generator; ignored when `rng` is given. */
  seed?: string | number;
  /** Caller-owned random source (no snapshot support). */
  rng?: Rng;
  fitness?: FitnessEvaluator;
  selection?: SelectionStrategy;
  crossover?: CrossoverOperator;
  mutation?: MutationOperator;
  /** Starting population; defaults to random genomes. Copied on construction. */
  population?: readonly (readonly number[])[];
  /** Called once for every recorded generation. */
  onGeneration?: (record: GenerationRecord) => void;
  /** Print a progress line every `log` generations (0 disables). */
  log?: number;
}

export interface EvolutionResult {
  /** Final population: ranked when halted on a solution, freshly bred otherwise. */
  population: Population;
  /** Generations completed (index of the halting generation in single mode). */
  generation: number;
  history: GenerationRecord[];
}

/** A genome paired with its score and its position before ranking. */
export interface ScoredGenome {
  genome: Genome;
  score: number;
  index: number;
}
