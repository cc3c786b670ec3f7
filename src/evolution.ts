import type {
  EvolutionOptions,
  EvolutionResult,
  GenerationRecord,
  Genome,
  Population,
} from './evolution/evolution.types';
import type { Rng, RngState, SeededRng } from './utils/rng';
import { createRng, restoreRng } from './utils/rng';
import { config } from './config';
import { onceWarn } from './utils/warnings';
import * as methods from './methods/methods';
import {
  cloneGenome,
  generatePopulation,
  isValidGenome,
} from './evolution/evolution.population';
import { evolve } from './evolution/evolution.evolve';
import type {
  EvolutionContext,
  ResolvedEvolutionOptions,
} from './evolution/evolution.evolve';
import {
  averageScore,
  rankPopulation,
} from './evolution/evolution.selection';
import {
  exportHistoryCSV,
  exportHistoryJSONL,
} from './evolution/evolution.history';

/**
 * Genetic search for non-attacking queen placements.
 *
 * Holds the population, generation counter, history and random source of one
 * run. Each {@link Evolution.evolve} call ranks, records and repopulates once;
 * {@link Evolution.run} loops until the generation limit or, in single mode,
 * the first solved generation.
 *
 * @example
 * const evolution = new Evolution(8, { populationSize: 50, single: true, seed: 7 });
 * const { generation, history } = evolution.run();
 * console.log(history[history.length - 1].solved, generation);
 */
export default class Evolution implements EvolutionContext {
  readonly queens: number;
  readonly settings: ResolvedEvolutionOptions;
  /** Score of a conflict-free placement for this board. */
  readonly maxFitness: number;
  readonly history: GenerationRecord[] = [];
  population: Population;
  generation = 0;
  /** Set once a solved generation stops a single-mode run. */
  halted = false;
  /** seedrandom generator backing `rng`; absent when the caller supplied one. */
  private _seeded?: SeededRng;
  private _rng: Rng;

  /**
   * @param queens Board size N; the engine runs for any N >= 0, the CLI
   *   restricts it to [config.minQueens, config.maxQueens].
   * @throws RangeError on a non-positive population size, negative survivals,
   *   a fractional generation limit, a negative one without `single`, or a
   *   starting genome that is not a placement of `queens` queens.
   */
  constructor(queens: number, options: EvolutionOptions = {}) {
    this.queens = queens;
    const fitness = options.fitness ?? methods.fitness.CONFLICTS;
    const mutation = options.mutation ?? methods.mutation.RANDOM_RESET;
    this.settings = {
      populationSize: options.populationSize ?? 50,
      generationLimit: options.generationLimit ?? 100,
      survivals: options.survivals ?? 2,
      single: options.single ?? false,
      mutationProbability: options.mutationProbability ?? mutation.probability,
      fillPolicy: options.fillPolicy ?? 'exact',
      fitness,
      selection: options.selection ?? methods.selection.FITNESS_PROPORTIONATE,
      crossover: options.crossover ?? methods.crossover.SINGLE_POINT,
      mutation,
      onGeneration: options.onGeneration,
      log: options.log ?? 0,
    };
    this.maxFitness = fitness.maxFitness(queens);

    const { populationSize, survivals, generationLimit, single } = this.settings;
    if (!Number.isInteger(populationSize) || populationSize < 1) {
      throw new RangeError(
        `Population size must be a positive integer (got ${populationSize}).`
      );
    }
    if (!Number.isInteger(survivals) || survivals < 0) {
      throw new RangeError(
        `Survivals must be a non-negative integer (got ${survivals}).`
      );
    }
    if (!Number.isInteger(generationLimit)) {
      throw new RangeError(
        `Generation limit must be an integer (got ${generationLimit}).`
      );
    }
    if (generationLimit < 0 && !single) {
      throw new RangeError(
        'A negative generation limit only terminates in single mode.'
      );
    }
    if (queens < config.minQueens || queens > config.maxQueens) {
      onceWarn(
        'queens-range',
        `Queen count ${queens} is outside the supported range [${config.minQueens}, ${config.maxQueens}].`
      );
    }
    if (survivals >= populationSize) {
      onceWarn(
        'survivals-fill',
        `Survivals (${survivals}) fill the whole population (${populationSize}); no offspring will be bred.`
      );
    }

    if (options.rng) {
      this._rng = options.rng;
    } else {
      this._seeded = createRng(options.seed);
      this._rng = this._seeded;
    }
    if (options.population) {
      options.population.forEach((genome, index) => {
        if (!isValidGenome(genome, queens)) {
          throw new RangeError(
            `Starting genome ${index} is not a valid placement for ${queens} queens (got [${genome.join(', ')}]).`
          );
        }
      });
    }
    this.population = options.population
      ? options.population.map(cloneGenome)
      : generatePopulation(populationSize, queens, this._rng);
  }

  /** The random source threaded through every operator of this run. */
  get rng(): Rng {
    return this._rng;
  }

  /** True once the latest recorded generation reached the maximum fitness. */
  get solved(): boolean {
    const last = this.history[this.history.length - 1];
    return last !== undefined && last.solved;
  }

  /** Whether `run()` would stop before evolving another generation. */
  get finished(): boolean {
    const limit = this.settings.generationLimit;
    return this.halted || (limit >= 0 && this.generation >= limit);
  }

  /**
   * Rank, record and repopulate once. Delegates to
   * `src/evolution/evolution.evolve.ts`.
   *
   * @throws Error when called after a single-mode run halted.
   */
  evolve(): GenerationRecord {
    return evolve.call(this);
  }

  /**
   * Evolve until the generation limit is reached or, in single mode, a
   * solution is found. Running out of generations is a normal outcome:
   * inspect the last history record's `solved` flag.
   */
  run(): EvolutionResult {
    while (!this.finished) this.evolve();
    return {
      population: this.population,
      generation: this.generation,
      history: this.history,
    };
  }

  /** Score a genome with this run's evaluator. */
  score(genome: readonly number[]): number {
    return this.settings.fitness.evaluate(genome);
  }

  /** Sort the population in place by descending fitness (stable on ties). */
  sort(): void {
    this.population = rankPopulation(this.population, (genome) =>
      this.score(genome)
    ).map((entry) => entry.genome);
  }

  /** The fittest genome of the current population (first one on ties). */
  getFittest(): Genome {
    const ranked = rankPopulation(this.population, (genome) =>
      this.score(genome)
    );
    if (!ranked.length) throw new Error('Population is empty.');
    return ranked[0].genome;
  }

  /** Mean fitness across the current population. */
  getAverage(): number {
    return averageScore(
      rankPopulation(this.population, (genome) => this.score(genome))
    );
  }

  /**
   * Return the opaque state of the engine's seedrandom generator, or
   * undefined when the caller supplied its own `rng`.
   */
  snapshotRNGState(): RngState | undefined {
    return this._seeded?.state();
  }

  /**
   * Continue from a state produced by `snapshotRNGState()`; the following
   * draws replay the sequence that followed the snapshot.
   */
  restoreRNGState(state: RngState): void {
    this._seeded = restoreRng(state);
    this._rng = this._seeded;
  }

  /** History as JSON Lines. */
  exportHistoryJSONL(): string {
    return exportHistoryJSONL(this.history);
  }

  /** Recent history as CSV (see `exportHistoryCSV`). */
  exportHistoryCSV(maxEntries = 500): string {
    return exportHistoryCSV(this.history, maxEntries);
  }
}
