import {
  Evolution,
  crossover,
  fitness,
  generatePopulation,
  methods,
  mutation,
  runEvolution,
  selection,
} from '../src/nqueens';
import { sequenceRng } from './utils/test-helpers';

describe('nqueens entry point', () => {
  test('fitness scores a solution at the maximum', () => {
    // Act & Assert
    expect(fitness([1, 3, 0, 2])).toBe(6);
    expect(fitness([0, 0, 0, 0])).toBe(3);
  });

  test('crossover splits at the drawn point', () => {
    // Act: randomInt(1, 3) with 0.5 -> 2
    const children = crossover([0, 1, 2, 3], [3, 2, 1, 0], sequenceRng([0.5]));
    // Assert
    expect(children).toEqual([
      [0, 1, 1, 0],
      [3, 2, 2, 3],
    ]);
  });

  test('mutation moves one queen in place', () => {
    // Arrange
    const genome = [0, 0, 0, 0];
    // Act: 0 < 1 mutates, column floor(0.5 * 4) = 2, row floor(0.75 * 4) = 3
    const result = mutation(genome, 1, sequenceRng([0, 0.5, 0.75]));
    // Assert
    expect(result).toBe(genome);
    expect(genome).toEqual([0, 0, 3, 0]);
  });

  test('mutation with probability zero leaves the genome alone', () => {
    // Arrange
    const genome = [2, 1, 0];
    // Act
    mutation(genome, 0, sequenceRng([0]));
    // Assert
    expect(genome).toEqual([2, 1, 0]);
  });

  test('selection never picks zero-weight genomes', () => {
    // Arrange
    const population = [
      [0, 0, 0, 0],
      [1, 3, 0, 2],
    ];
    // Act
    const [a, b] = selection(
      population,
      (genome) => (genome[0] === 1 ? 1 : 0),
      sequenceRng([0, 0.99])
    );
    // Assert
    expect(a).toBe(population[1]);
    expect(b).toBe(population[1]);
  });

  test('free functions fall back to the shared generator', () => {
    // Act
    const population = generatePopulation(3, 5);
    const [first, second] = crossover(population[0], population[1]);
    // Assert
    expect(population).toHaveLength(3);
    expect(first).toHaveLength(5);
    expect(second).toHaveLength(5);
  });

  test('exposes the engine and its defaults', () => {
    // Act
    const result = runEvolution({
      populationSize: 10,
      queensTotal: 4,
      generationLimit: 2,
      seed: 'entry',
    });
    // Assert
    expect(new Evolution(4, { seed: 'entry' }).settings.selection).toBe(
      methods.selection.FITNESS_PROPORTIONATE
    );
    expect(result.history).toHaveLength(2);
  });
});
