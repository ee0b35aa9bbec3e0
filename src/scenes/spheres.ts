/**
 * Three spheres on a ground plane: diffuse, hollow glass, and metal.
 */

import {
  Dielectric,
  HittableList,
  Lambertian,
  Metal,
  Sphere,
} from "../scene";
import { registerScene } from "./registry";

export function buildSpheresWorld(): HittableList {
  const ground = new Lambertian([0.8, 0.8, 0.0]);
  const center = new Lambertian([0.1, 0.2, 0.5]);
  const left = new Dielectric(1.5);
  const right = new Metal([0.8, 0.6, 0.2], 0.0);

  return new HittableList([
    new Sphere([0.0, -100.5, -1.0], 100.0, ground),
    new Sphere([0.0, 0.0, -1.0], 0.5, center),
    new Sphere([-1.0, 0.0, -1.0], 0.5, left),
    // Inner shell with negative radius makes the left sphere a hollow bubble
    new Sphere([-1.0, 0.0, -1.0], -0.4, left),
    new Sphere([1.0, 0.0, -1.0], 0.5, right),
  ]);
}

registerScene({
  name: "spheres",
  description: "Diffuse, glass and metal spheres through a wide pinhole lens",
  build: () => ({
    world: buildSpheresWorld(),
    camera: {
      aspectRatio: 16.0 / 9.0,
      imageWidth: 400,
      samplesPerPixel: 100,
      maxDepth: 50,
      vfov: 90,
      lookfrom: [0, 0, 0],
      lookat: [0, 0, -1],
      vup: [0, 1, 0],
      defocusAngle: 0,
      focusDist: 1,
    },
  }),
});

registerScene({
  name: "focus",
  description: "The same spheres from a distance, focused on the centre sphere",
  build: () => ({
    world: buildSpheresWorld(),
    camera: {
      aspectRatio: 16.0 / 9.0,
      imageWidth: 400,
      samplesPerPixel: 100,
      maxDepth: 50,
      vfov: 20,
      lookfrom: [-2, 2, 1],
      lookat: [0, 0, -1],
      vup: [0, 1, 0],
      defocusAngle: 10.0,
      focusDist: 3.4,
    },
  }),
});
