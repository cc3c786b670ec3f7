import seedrandom from 'seedrandom';

/**
 * Uniform random source in [0, 1). Every stochastic operator receives one of
 * these explicitly so runs can be replayed from a seed.
 */
export type Rng = () => number;

/** A seedrandom ARC4 generator: callable like {@link Rng}, plus state capture. */
export type SeededRng = seedrandom.StatefulPRNG<seedrandom.State.Arc4>;

/** Opaque snapshot produced by `SeededRng.state()`; JSON serializable. */
export type RngState = seedrandom.State.Arc4;

/**
 * Build a generator. A seed makes the sequence reproducible; without one
 * seedrandom autoseeds from local entropy.
 *
 * @example
 * const rng = createRng(42);
 * const saved = rng.state();
 * const first = rng();
 * restoreRng(saved)() === first; // true
 */
export function createRng(seed?: string | number): SeededRng {
  return seed === undefined
    ? seedrandom(undefined, { state: true })
    : seedrandom(String(seed), { state: true });
}

/** Rebuild a generator that continues exactly where `state` was captured. */
export function restoreRng(state: RngState): SeededRng {
  return seedrandom('', { state });
}

/** Uniform integer in the inclusive range [min, max]. */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

let shared: SeededRng | undefined;

/**
 * Lazily created autoseeded generator used by the free-standing operator
 * functions when the caller does not pass one.
 */
export function defaultRng(): Rng {
  if (!shared) shared = createRng();
  return shared;
}
