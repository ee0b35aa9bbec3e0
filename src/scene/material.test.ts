/**
 * Tests for material scattering.
 */

import { describe, test, expect } from "vitest";
import { dot } from "../math";
import { Absorber, Dielectric, Lambertian, Metal, reflectance } from "./material";
import type { HitRecord, Material, Rng, Vec3 } from "./types";
import { seededRandom } from "./utils";

// =============================================================================
// Test Harness
// =============================================================================

/** Replays `values` in order, then repeats the last one. */
function sequenceRng(values: number[]): Rng {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)] ?? 0.5;
}

function hitRecord(material: Material, normal: Vec3, frontFace = true): HitRecord {
  return { p: [0, 0, 0], normal, material, t: 1, frontFace };
}

function expectVec(actual: Vec3, expected: Vec3) {
  expect(actual[0]).toBeCloseTo(expected[0], 10);
  expect(actual[1]).toBeCloseTo(expected[1], 10);
  expect(actual[2]).toBeCloseTo(expected[2], 10);
}

// rng draws [0.5, 0.25, 0.5] make randomUnitVector return (0, -1, 0)
const DOWNWARD_UNIT = [0.5, 0.25, 0.5];

// =============================================================================
// Tests: Absorber
// =============================================================================

describe("Absorber", () => {
  test("always absorbs", () => {
    const m = new Absorber();
    expect(m.scatter()).toBeNull();
  });
});

// =============================================================================
// Tests: Lambertian
// =============================================================================

describe("Lambertian", () => {
  test("scatters into the normal hemisphere with its albedo", () => {
    const m = new Lambertian([0.2, 0.4, 0.6]);
    const rng = seededRandom(5);
    for (let i = 0; i < 20; i++) {
      const result = m.scatter({ origin: [0, 1, 0], direction: [0, -1, 0] }, hitRecord(m, [0, 1, 0]), rng);
      expect(result?.attenuation).toEqual([0.2, 0.4, 0.6]);
      expect(result?.scattered.origin).toEqual([0, 0, 0]);
      expect(dot(result?.scattered.direction ?? [0, -1, 0], [0, 1, 0])).toBeGreaterThanOrEqual(0);
    }
  });

  test("falls back to the normal when the sample cancels it", () => {
    const m = new Lambertian([1, 1, 1]);
    const result = m.scatter(
      { origin: [0, 1, 0], direction: [0, -1, 0] },
      hitRecord(m, [0, 1, 0]),
      sequenceRng(DOWNWARD_UNIT)
    );
    expect(result?.scattered.direction).toEqual([0, 1, 0]);
  });

  test("attenuation is a copy of the albedo", () => {
    const m = new Lambertian([0.2, 0.4, 0.6]);
    const result = m.scatter({ origin: [0, 1, 0], direction: [0, -1, 0] }, hitRecord(m, [0, 1, 0]), seededRandom(2));
    if (result) result.attenuation[0] = 9;
    expect(m.albedo).toEqual([0.2, 0.4, 0.6]);
  });
});

// =============================================================================
// Tests: Metal
// =============================================================================

describe("Metal", () => {
  test("mirror reflection without fuzz", () => {
    const m = new Metal([0.8, 0.8, 0.8]);
    const result = m.scatter({ origin: [-1, 1, 0], direction: [1, -1, 0] }, hitRecord(m, [0, 1, 0]), seededRandom(1));
    expect(result?.attenuation).toEqual([0.8, 0.8, 0.8]);
    expectVec(result?.scattered.direction ?? [0, 0, 0], [Math.SQRT1_2, Math.SQRT1_2, 0]);
  });

  test("absorbs when fuzz pushes the ray below the surface", () => {
    const m = new Metal([0.8, 0.8, 0.8], 1.0);
    const result = m.scatter(
      { origin: [-1, 0.1, 0], direction: [1, -0.1, 0] },
      hitRecord(m, [0, 1, 0]),
      sequenceRng(DOWNWARD_UNIT)
    );
    expect(result).toBeNull();
  });

  test("fuzz is clamped to [0, 1]", () => {
    expect(new Metal([1, 1, 1], 3).fuzz).toBe(1);
    expect(new Metal([1, 1, 1], -2).fuzz).toBe(0);
    expect(new Metal([1, 1, 1], 0.3).fuzz).toBe(0.3);
  });

  test("attenuation is a copy of the albedo", () => {
    const m = new Metal([0.8, 0.6, 0.2]);
    const result = m.scatter({ origin: [-1, 1, 0], direction: [1, -1, 0] }, hitRecord(m, [0, 1, 0]), seededRandom(1));
    if (result) result.attenuation[2] = 9;
    expect(m.albedo).toEqual([0.8, 0.6, 0.2]);
  });
});

// =============================================================================
// Tests: Dielectric
// =============================================================================

describe("Dielectric", () => {
  test("total internal reflection from inside at a steep angle", () => {
    const m = new Dielectric(1.5);
    const result = m.scatter(
      { origin: [-0.8, 0.6, 0], direction: [0.8, -0.6, 0] },
      hitRecord(m, [0, 1, 0], false),
      sequenceRng([0.99])
    );
    expect(result?.attenuation).toEqual([1, 1, 1]);
    expectVec(result?.scattered.direction ?? [0, 0, 0], [0.8, 0.6, 0]);
  });

  test("refracts straight through at normal incidence", () => {
    const m = new Dielectric(1.5);
    const result = m.scatter(
      { origin: [0, 0, 1], direction: [0, 0, -1] },
      hitRecord(m, [0, 0, 1]),
      sequenceRng([0.99])
    );
    expectVec(result?.scattered.direction ?? [0, 0, 0], [0, 0, -1]);
  });

  test("reflects at normal incidence when the draw is below the reflectance", () => {
    const m = new Dielectric(1.5);
    const result = m.scatter(
      { origin: [0, 0, 1], direction: [0, 0, -1] },
      hitRecord(m, [0, 0, 1]),
      sequenceRng([0.01])
    );
    expectVec(result?.scattered.direction ?? [0, 0, 0], [0, 0, 1]);
  });

  test("Schlick reflectance", () => {
    expect(reflectance(1, 1.5)).toBeCloseTo(0.04, 12);
    expect(reflectance(0, 1.5)).toBeCloseTo(1, 12);
  });
});
