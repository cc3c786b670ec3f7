#!/usr/bin/env node
/**
 * Command line front end: reads the queen count, runs the search a number of
 * times and prints the best placement of each run followed by the generation
 * table of the last one.
 *
 * Usage: nqueens-evolve 8 --population 50 --generations 100 --seed 7
 */
import { Command, InvalidArgumentError, Option } from 'commander';
import Evolution from './evolution';
import { config } from './config';
import type { FillPolicy, GenerationRecord } from './evolution/evolution.types';
import { renderBoard } from './visualization/board';
import { renderHistoryTable } from './visualization/table';

export interface CliOptions {
  population: number;
  generations: number;
  survivals: number;
  all: boolean;
  seed?: string;
  fill: FillPolicy;
  iterations: number;
  table: boolean;
  color: boolean;
}

/** Where the CLI writes; swapped out by tests. */
export interface CliOutput {
  write(line: string): void;
  error(line: string): void;
}

const consoleOutput: CliOutput = {
  write: (line) => console.log(line),
  error: (line) => console.error(line),
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

const SEPARATOR = '- - - - - - - - - - - - - - - - -';

/**
 * Run the search for `queens` with parsed CLI options.
 *
 * @returns process exit code (0 on success, 1 on an unsupported queen count
 *   or search setting)
 */
export function runCli(
  queens: number,
  options: CliOptions,
  output: CliOutput = consoleOutput
): number {
  if (queens < config.minQueens || queens > config.maxQueens) {
    output.error(
      `Invalid option: queen count must be between ${config.minQueens} and ${config.maxQueens}.`
    );
    return 1;
  }

  let history: readonly GenerationRecord[] = [];
  for (let iteration = 0; iteration < options.iterations; iteration++) {
    const seed =
      options.seed === undefined ? undefined : `${options.seed}:${iteration}`;
    const startedAt = performance.now();
    let evolution: Evolution;
    try {
      evolution = new Evolution(queens, {
        populationSize: options.population,
        generationLimit: options.generations,
        survivals: options.survivals,
        single: !options.all,
        fillPolicy: options.fill,
        seed,
      });
    } catch (error) {
      if (!(error instanceof RangeError)) throw error;
      output.error(`Invalid option: ${error.message}`);
      return 1;
    }
    const result = evolution.run();
    const seconds = (performance.now() - startedAt) / 1000;

    const best = evolution.getFittest();
    const accuracy =
      evolution.maxFitness === 0
        ? 100
        : (evolution.score(best) / evolution.maxFitness) * 100;
    output.write(
      `Iteration: ${iteration} | Generations: ${result.generation} | Time: ${seconds.toFixed(3)}s`
    );
    output.write(`Best genome: [${best.join(', ')}]`);
    output.write(`Accuracy: ${accuracy.toFixed(3)} %`);
    output.write(renderBoard(best, { color: options.color }));
    output.write(SEPARATOR);
    history = result.history;
  }

  if (options.table) output.write(renderHistoryTable(history));
  return 0;
}

/**
 * Build the commander program. The action stores its exit code on
 * `process.exitCode` rather than exiting, so tests can drive it.
 */
export function createProgram(output: CliOutput = consoleOutput): Command {
  const program = new Command();
  program
    .name('nqueens-evolve')
    .description('Place N non-attacking queens with a genetic search.')
    .argument('<queens>', 'number of queens (board size)', parseInteger)
    .option('-p, --population <size>', 'population size', parseInteger, 50)
    .option('-g, --generations <limit>', 'generation limit', parseInteger, 100)
    .option('-s, --survivals <count>', 'elites kept per generation', parseInteger, 2)
    .option('-a, --all', 'keep evolving after the first solution', false)
    .option('--seed <seed>', 'seed for reproducible runs')
    .addOption(
      new Option('--fill <policy>', 'population refill policy')
        .choices(['exact', 'legacy'])
        .default('exact')
    )
    .option('-i, --iterations <count>', 'independent runs', parseInteger, 1)
    .option('--no-table', 'skip the generation table')
    .option('--color', 'color attacked and safe queens', false)
    .action((queens: number) => {
      process.exitCode = runCli(queens, program.opts<CliOptions>(), output);
    });
  return program;
}

if (require.main === module) {
  createProgram().parse(process.argv);
}
