/**
 * Ray-intersectable geometry: spheres and lists of hittables.
 */

import { dot, div, lengthSquared, negate, sub, type Vec3 } from "../math";
import type { Interval } from "./interval";
import { rayAt, type HitRecord, type Hittable, type Material, type Ray } from "./types";

export class Sphere implements Hittable {
  readonly radius: number;

  constructor(
    public readonly center: Vec3,
    radius: number,
    public readonly material: Material
  ) {
    // Negative radii are kept as-is for hollow glass shells: the normal flips inward.
    if (radius === 0 || !Number.isFinite(radius)) {
      throw new Error(`Sphere radius must be a non-zero finite number, got ${radius}`);
    }
    this.radius = radius;
  }

  hit(ray: Ray, rayT: Interval): HitRecord | null {
    const oc = sub(ray.origin, this.center);
    const a = lengthSquared(ray.direction);
    const halfB = dot(oc, ray.direction);
    const c = lengthSquared(oc) - this.radius * this.radius;

    const discriminant = halfB * halfB - a * c;
    if (discriminant < 0) return null;
    const sqrtd = Math.sqrt(discriminant);

    // Nearest root inside the acceptable range
    let root = (-halfB - sqrtd) / a;
    if (!rayT.surrounds(root)) {
      root = (-halfB + sqrtd) / a;
      if (!rayT.surrounds(root)) return null;
    }

    const p = rayAt(ray, root);
    const outwardNormal = div(sub(p, this.center), this.radius);
    const frontFace = dot(ray.direction, outwardNormal) < 0;

    return {
      p,
      normal: frontFace ? outwardNormal : negate(outwardNormal),
      material: this.material,
      t: root,
      frontFace,
    };
  }
}

export class HittableList implements Hittable {
  readonly objects: Hittable[];

  constructor(objects: Hittable[] = []) {
    this.objects = [...objects];
  }

  add(object: Hittable): this {
    this.objects.push(object);
    return this;
  }

  clear(): void {
    this.objects.length = 0;
  }

  hit(ray: Ray, rayT: Interval): HitRecord | null {
    let closest: HitRecord | null = null;
    let range = rayT;

    for (const object of this.objects) {
      const rec = object.hit(ray, range);
      if (rec) {
        closest = rec;
        range = range.withMax(rec.t);
      }
    }

    return closest;
  }
}
