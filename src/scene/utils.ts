/**
 * Shared utilities for scene construction.
 */

import { createNoise2D } from "simplex-noise";
import type { Rng } from "../math";

// =============================================================================
// Random
// =============================================================================

/** Deterministic LCG in [0, 1). */
export function seededRandom(seed: number): Rng {
  let state = seed & 0x7fffffff;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
}

// =============================================================================
// Noise
// =============================================================================

/**
 * Fractal simplex noise over the ground plane, normalised to [-1, 1].
 */
export function createNoiseGenerator(rng: Rng) {
  const noise2D = createNoise2D(rng);

  return function fbm(x: number, z: number, octaves: number = 1): number {
    let value = 0;
    let amplitude = 1;
    let frequency = 1;
    let maxValue = 0;

    for (let i = 0; i < octaves; i++) {
      value += noise2D(x * frequency, z * frequency) * amplitude;
      maxValue += amplitude;
      amplitude *= 0.5;
      frequency *= 2;
    }

    return value / maxValue;
  };
}
