/**
 * Shared types for scene system.
 */

import { add, scale, type Rng, type Vec3 } from "../math";
import type { Interval } from "./interval";

export type { Vec3, Rng };

// =============================================================================
// Ray
// =============================================================================

export interface Ray {
  origin: Vec3;
  direction: Vec3;
}

export function rayAt(ray: Ray, t: number): Vec3 {
  return add(ray.origin, scale(ray.direction, t));
}

// =============================================================================
// Hit Testing
// =============================================================================

export interface HitRecord {
  p: Vec3;
  normal: Vec3;           // always opposes the incoming ray
  material: Material;     // owned by the hittable
  t: number;
  frontFace: boolean;     // true when the ray hit the outside surface
}

export interface Hittable {
  /** Nearest intersection with `ray` for t inside `rayT`, or null. */
  hit(ray: Ray, rayT: Interval): HitRecord | null;
}

// =============================================================================
// Materials
// =============================================================================

export interface ScatterResult {
  attenuation: Vec3;
  scattered: Ray;
}

export interface Material {
  /** Returns null when the ray is absorbed. */
  scatter(rayIn: Ray, rec: HitRecord, rng: Rng): ScatterResult | null;
}
