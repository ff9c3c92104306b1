/**
 * Seeded randomness
 *
 * Deterministic PRNG for initial weights and for zero-mean Gaussian noise
 * injected onto the feature.
 */

import type { NoiseConfig, Sample } from './types.js';

export type Rng = () => number;

/**
 * Mulberry32 - fast deterministic PRNG, uniform in [0, 1)
 */
export function mulberry32(seed: number): Rng {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Box-Muller transform for N(0,1)
 */
export function randn(rng: Rng): number {
  let u = 0;
  let v = 0;
  while (u === 0) u = rng();
  while (v === 0) v = rng();
  return Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
}

export class GaussianNoise {
  readonly amplitude: number;
  private rng: Rng;

  constructor(config: NoiseConfig) {
    this.amplitude = config.amplitude;
    this.rng = mulberry32(config.seed);
  }

  get enabled(): boolean {
    return this.amplitude > 0;
  }

  /**
   * Returns a new sample with `amplitude · N(0,1)` added to its value
   */
  apply(sample: Sample): Sample {
    if (!this.enabled) return sample;
    return Object.freeze({
      index: sample.index,
      timestamp: sample.timestamp,
      value: sample.value + this.amplitude * randn(this.rng),
    });
  }
}
