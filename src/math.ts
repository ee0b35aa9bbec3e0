/**
 * Vector math and random sampling helpers.
 *
 * Vec3 doubles as point, direction and linear RGB colour.
 */

export type Vec3 = [number, number, number];

/** Uniform random source in [0, 1). */
export type Rng = () => number;

// =============================================================================
// Math Helpers
// =============================================================================

export function clone(v: Readonly<Vec3>): Vec3 {
  return [v[0], v[1], v[2]];
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/** Component-wise product. */
export function mul(a: Vec3, b: Vec3): Vec3 {
  return [a[0] * b[0], a[1] * b[1], a[2] * b[2]];
}

export function scale(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

export function div(v: Vec3, s: number): Vec3 {
  return [v[0] / s, v[1] / s, v[2] / s];
}

export function negate(v: Vec3): Vec3 {
  return [-v[0], -v[1], -v[2]];
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

export function lengthSquared(v: Vec3): number {
  return v[0] * v[0] + v[1] * v[1] + v[2] * v[2];
}

export function length(v: Vec3): number {
  return Math.sqrt(lengthSquared(v));
}

export function normalize(v: Vec3): Vec3 {
  const len = length(v);
  if (len === 0) return v;
  return [v[0] / len, v[1] / len, v[2] / len];
}

/** (1 - t) * a + t * b */
export function lerp(a: Vec3, b: Vec3, t: number): Vec3 {
  return [
    (1 - t) * a[0] + t * b[0],
    (1 - t) * a[1] + t * b[1],
    (1 - t) * a[2] + t * b[2],
  ];
}

export function nearZero(v: Vec3): boolean {
  const s = 1e-8;
  return Math.abs(v[0]) < s && Math.abs(v[1]) < s && Math.abs(v[2]) < s;
}

export function reflect(v: Vec3, n: Vec3): Vec3 {
  return sub(v, scale(n, 2 * dot(v, n)));
}

/** Snell refraction of unit vector `uv` through surface with unit normal `n`. */
export function refract(uv: Vec3, n: Vec3, etaiOverEtat: number): Vec3 {
  const cosTheta = Math.min(dot(negate(uv), n), 1.0);
  const rOutPerp = scale(add(uv, scale(n, cosTheta)), etaiOverEtat);
  const rOutParallel = scale(n, -Math.sqrt(Math.abs(1.0 - lengthSquared(rOutPerp))));
  return add(rOutPerp, rOutParallel);
}

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

// =============================================================================
// Random
// =============================================================================

export function randomRange(rng: Rng, min: number, max: number): number {
  return min + (max - min) * rng();
}

export function randomVec3(rng: Rng, min = 0, max = 1): Vec3 {
  return [randomRange(rng, min, max), randomRange(rng, min, max), randomRange(rng, min, max)];
}

export function randomInUnitSphere(rng: Rng): Vec3 {
  for (;;) {
    const p = randomVec3(rng, -1, 1);
    if (lengthSquared(p) < 1) return p;
  }
}

export function randomUnitVector(rng: Rng): Vec3 {
  return normalize(randomInUnitSphere(rng));
}

/** Rejection-sampled point in the unit disk on the z = 0 plane. */
export function randomInUnitDisk(rng: Rng): Vec3 {
  for (;;) {
    const p: Vec3 = [randomRange(rng, -1, 1), randomRange(rng, -1, 1), 0];
    if (lengthSquared(p) < 1) return p;
  }
}
