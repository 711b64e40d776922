import seedrandom from 'seedrandom';
import type { RandomSource } from './agent.types';

/**
 * Resolve the exploration random source.
 *
 * Precedence: an explicit `rng` function, then a seeded `seedrandom` stream
 * (same seed → same exploration rolls), then an auto-seeded stream.
 */
export function createRandomSource(options: {
  rng?: RandomSource;
  seed?: string | number;
}): RandomSource {
  if (typeof options.rng === 'function') return options.rng;
  const prng =
    options.seed === undefined ? seedrandom() : seedrandom(String(options.seed));
  return () => prng();
}
