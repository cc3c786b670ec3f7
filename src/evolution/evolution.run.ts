import Evolution from '../evolution';
import type { EvolutionOptions, EvolutionResult } from './evolution.types';

export interface RunEvolutionOptions extends EvolutionOptions {
  populationSize: number;
  queensTotal: number;
}

/**
 * One-shot search: build an {@link Evolution} and run it to completion.
 *
 * Defaults: `generationLimit` 100, `survivals` 2, `single` false.
 *
 * @example
 * const { population, generation, history } = runEvolution({
 *   populationSize: 50,
 *   queensTotal: 8,
 *   single: true,
 * });
 */
export function runEvolution(options: RunEvolutionOptions): EvolutionResult {
  const { queensTotal, ...rest } = options;
  return new Evolution(queensTotal, rest).run();
}
