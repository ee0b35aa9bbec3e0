/**
 * Tests for seeded randomness and noise.
 */

import { describe, test, expect } from "vitest";
import { createNoiseGenerator, seededRandom } from "./utils";

describe("seededRandom", () => {
  test("is deterministic per seed", () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    for (let i = 0; i < 20; i++) expect(a()).toBe(b());
  });

  test("stays in [0, 1)", () => {
    const rng = seededRandom(123456789);
    for (let i = 0; i < 10000; i++) {
      const x = rng();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  test("different seeds diverge", () => {
    expect(seededRandom(1)()).not.toBe(seededRandom(2)());
  });
});

describe("createNoiseGenerator", () => {
  test("same seed gives the same field", () => {
    const a = createNoiseGenerator(seededRandom(3));
    const b = createNoiseGenerator(seededRandom(3));
    expect(a(0.3, 1.7, 3)).toBe(b(0.3, 1.7, 3));
  });

  test("output is normalised to [-1, 1]", () => {
    const noise = createNoiseGenerator(seededRandom(4));
    for (let x = -5; x <= 5; x += 0.37) {
      const n = noise(x, x * 0.5, 4);
      expect(n).toBeGreaterThanOrEqual(-1);
      expect(n).toBeLessThanOrEqual(1);
    }
  });
});
