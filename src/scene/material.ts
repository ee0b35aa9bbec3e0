/**
 * Surface scattering models.
 */

import {
  add,
  clone,
  dot,
  nearZero,
  negate,
  normalize,
  randomUnitVector,
  reflect,
  refract,
  scale,
  type Rng,
  type Vec3,
} from "../math";
import type { HitRecord, Material, Ray, ScatterResult } from "./types";

/** Ideal diffuse reflector. */
export class Lambertian implements Material {
  constructor(public readonly albedo: Vec3) {}

  scatter(_rayIn: Ray, rec: HitRecord, rng: Rng): ScatterResult | null {
    let direction = add(rec.normal, randomUnitVector(rng));

    // Unit vector exactly opposite the normal
    if (nearZero(direction)) direction = rec.normal;

    return {
      attenuation: clone(this.albedo),
      scattered: { origin: rec.p, direction },
    };
  }
}

export class Metal implements Material {
  readonly fuzz: number;

  constructor(
    public readonly albedo: Vec3,
    fuzz: number = 0
  ) {
    this.fuzz = fuzz < 1 ? Math.max(fuzz, 0) : 1;
  }

  scatter(rayIn: Ray, rec: HitRecord, rng: Rng): ScatterResult | null {
    const reflected = reflect(normalize(rayIn.direction), rec.normal);
    const direction =
      this.fuzz > 0 ? add(reflected, scale(randomUnitVector(rng), this.fuzz)) : reflected;

    if (dot(direction, rec.normal) <= 0) return null;

    return {
      attenuation: clone(this.albedo),
      scattered: { origin: rec.p, direction },
    };
  }
}

/** Clear refractive material such as glass or water. */
export class Dielectric implements Material {
  constructor(public readonly refractionIndex: number) {}

  scatter(rayIn: Ray, rec: HitRecord, rng: Rng): ScatterResult | null {
    const ratio = rec.frontFace ? 1.0 / this.refractionIndex : this.refractionIndex;

    const unitDirection = normalize(rayIn.direction);
    const cosTheta = Math.min(dot(negate(unitDirection), rec.normal), 1.0);
    const sinTheta = Math.sqrt(1.0 - cosTheta * cosTheta);

    const cannotRefract = ratio * sinTheta > 1.0;
    const direction =
      cannotRefract || reflectance(cosTheta, ratio) > rng()
        ? reflect(unitDirection, rec.normal)
        : refract(unitDirection, rec.normal, ratio);

    return {
      attenuation: [1.0, 1.0, 1.0],
      scattered: { origin: rec.p, direction },
    };
  }
}

/** Absorbs every ray; renders as pure black. */
export class Absorber implements Material {
  scatter(): ScatterResult | null {
    return null;
  }
}

/** Schlick's approximation. */
export function reflectance(cosine: number, refractionRatio: number): number {
  let r0 = (1 - refractionRatio) / (1 + refractionRatio);
  r0 = r0 * r0;
  return r0 + (1 - r0) * Math.pow(1 - cosine, 5);
}
