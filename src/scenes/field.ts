/**
 * Field scene - a grid of small random spheres around three large ones.
 * Sphere sizes follow a simplex noise field so neighbours grow and shrink together.
 */

import { length, mul, randomVec3, sub, type Vec3 } from "../math";
import {
  type Material,
  type Rng,
  createNoiseGenerator,
  Dielectric,
  HittableList,
  Lambertian,
  Metal,
  Sphere,
} from "../scene";
import { registerScene } from "./registry";

////////////
// CONFIG //
////////////
const fieldParams = {
  extent: 11,            // grid covers [-extent, extent) on x and z
  jitter: 0.9,
  baseRadius: 0.2,
  radiusNoise: 0.06,     // +/- radius from the noise field
  noiseScale: 0.25,
  noiseOctaves: 2,
  clearance: 0.9,        // keep clear of the metal feature sphere
  diffuseChance: 0.8,
  metalChance: 0.15,
};

interface FeatureSphere {
  center: Vec3;
  radius: number;
}

const featureSpheres: Record<"glass" | "diffuse" | "metal", FeatureSphere> = {
  glass: { center: [0, 1, 0], radius: 1.0 },
  diffuse: { center: [-4, 1, 0], radius: 1.0 },
  metal: { center: [4, 1, 0], radius: 1.0 },
};

function pickMaterial(rng: Rng): Material {
  const chooseMat = rng();

  if (chooseMat < fieldParams.diffuseChance) {
    return new Lambertian(mul(randomVec3(rng), randomVec3(rng)));
  }
  if (chooseMat < fieldParams.diffuseChance + fieldParams.metalChance) {
    return new Metal(randomVec3(rng, 0.5, 1), 0.5 * rng());
  }
  return new Dielectric(1.5);
}

export function buildFieldWorld(rng: Rng): HittableList {
  const noise = createNoiseGenerator(rng);
  const world = new HittableList();

  world.add(new Sphere([0, -1000, 0], 1000, new Lambertian([0.5, 0.5, 0.5])));

  const metalCenter = featureSpheres.metal.center;
  const { extent, jitter, baseRadius, radiusNoise, noiseScale, noiseOctaves } = fieldParams;

  for (let a = -extent; a < extent; a++) {
    for (let b = -extent; b < extent; b++) {
      const n = noise(a * noiseScale, b * noiseScale, noiseOctaves);
      const radius = baseRadius + radiusNoise * n;
      const center: Vec3 = [a + jitter * rng(), radius, b + jitter * rng()];

      if (length(sub(center, [metalCenter[0], radius, metalCenter[2]])) <= fieldParams.clearance) {
        continue;
      }

      world.add(new Sphere(center, radius, pickMaterial(rng)));
    }
  }

  const { glass, diffuse, metal } = featureSpheres;
  world.add(new Sphere(glass.center, glass.radius, new Dielectric(1.5)));
  world.add(new Sphere(diffuse.center, diffuse.radius, new Lambertian([0.4, 0.2, 0.1])));
  world.add(new Sphere(metal.center, metal.radius, new Metal([0.7, 0.6, 0.5], 0.0)));

  return world;
}

registerScene({
  name: "field",
  description: "Procedural field of small spheres with depth of field",
  build: (rng) => ({
    world: buildFieldWorld(rng),
    camera: {
      aspectRatio: 16.0 / 9.0,
      imageWidth: 400,
      samplesPerPixel: 50,
      maxDepth: 50,
      vfov: 20,
      lookfrom: [13, 2, 3],
      lookat: [0, 0, 0],
      vup: [0, 1, 0],
      defocusAngle: 0.6,
      focusDist: 10.0,
    },
  }),
});
