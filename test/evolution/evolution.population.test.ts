import {
  cloneGenome,
  generateGenome,
  generatePopulation,
  isValidGenome,
} from '../../src/evolution/evolution.population';
import { createRng } from '../../src/utils/rng';
import { sequenceRng } from '../utils/test-helpers';

describe('population model', () => {
  describe('generateGenome', () => {
    test('draws one row per column', () => {
      // Arrange: rows floor(0 * 4), floor(0.3 * 4), floor(0.6 * 4), floor(0.99 * 4)
      const rng = sequenceRng([0, 0.3, 0.6, 0.99]);
      // Act
      const genome = generateGenome(4, rng);
      // Assert
      expect(genome).toEqual([0, 1, 2, 3]);
    });
    test('is empty for a zero-sized board', () => {
      // Act & Assert
      expect(generateGenome(0, sequenceRng([]))).toEqual([]);
    });
  });

  describe('generatePopulation', () => {
    const population = generatePopulation(10, 6, createRng('population'));

    test('creates the requested number of genomes', () => {
      // Assert
      expect(population).toHaveLength(10);
    });
    test('creates only valid genomes', () => {
      // Assert
      expect(population.every((genome) => isValidGenome(genome, 6))).toBe(true);
    });
    test('never shares arrays between members', () => {
      // Assert
      expect(new Set(population).size).toBe(10);
    });
  });

  describe('isValidGenome', () => {
    test('accepts duplicated rows', () => {
      // Act & Assert
      expect(isValidGenome([0, 0, 0, 0], 4)).toBe(true);
    });
    test('rejects a wrong length', () => {
      // Act & Assert
      expect(isValidGenome([0, 1], 4)).toBe(false);
    });
    test('rejects rows outside the board', () => {
      // Act & Assert
      expect(isValidGenome([0, 4, 1, 2], 4)).toBe(false);
    });
    test('rejects fractional rows', () => {
      // Act & Assert
      expect(isValidGenome([0, 1.5, 1, 2], 4)).toBe(false);
    });
  });

  test('cloneGenome copies contents into a new array', () => {
    // Arrange
    const genome = [2, 0, 3, 1];
    // Act
    const copy = cloneGenome(genome);
    copy[0] = 0;
    // Assert
    expect(genome).toEqual([2, 0, 3, 1]);
  });
});
