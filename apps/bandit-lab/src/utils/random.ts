/**
 * Random variate generation for the policies.
 *
 * Every draw goes through a RandomSource so a seeded run is reproducible.
 */

import seedrandom from 'seedrandom';

/**
 * Uniform source on [0, 1)
 */
export type RandomSource = () => number;

/**
 * Seeded generator when a seed is given, Math.random otherwise
 */
export function createRandomSource(seed?: string): RandomSource {
  if (seed === undefined) {
    return Math.random;
  }
  const rng = seedrandom(seed);
  return () => rng();
}

/**
 * Uniform integer in [0, n)
 */
export function randomInt(random: RandomSource, n: number): number {
  return Math.min(n - 1, Math.floor(random() * n));
}

/**
 * Standard normal N(0,1) via Box-Muller
 */
export function sampleStandardNormal(random: RandomSource): number {
  let u1 = random();
  while (u1 === 0) {
    u1 = random();
  }
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * Gamma(shape, 1) using Marsaglia-Tsang.
 * Shapes below 1 are boosted: Gamma(a) = Gamma(a+1) * U^(1/a).
 */
export function sampleGamma(random: RandomSource, shape: number): number {
  if (!(shape > 0)) {
    throw new RangeError(`Gamma shape must be positive, got ${shape}`);
  }

  if (shape < 1) {
    let u = random();
    while (u === 0) {
      u = random();
    }
    return sampleGamma(random, shape + 1) * Math.pow(u, 1 / shape);
  }

  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);

  while (true) {
    let x: number;
    let v: number;
    do {
      x = sampleStandardNormal(random);
      v = 1 + c * x;
    } while (v <= 0);

    v = v * v * v;
    const u = random();
    const xSq = x * x;

    if (u < 1 - 0.0331 * xSq * xSq) {
      return d * v;
    }
    if (Math.log(u) < 0.5 * xSq + d * (1 - v + Math.log(v))) {
      return d * v;
    }
  }
}

/**
 * Beta(alpha, beta) as the ratio Ga / (Ga + Gb)
 */
export function sampleBeta(random: RandomSource, alpha: number, beta: number): number {
  const ga = sampleGamma(random, alpha);
  const gb = sampleGamma(random, beta);
  if (ga + gb === 0) {
    return 0.5;
  }
  return ga / (ga + gb);
}
