/**
 * Scene utilities - types, geometry, and materials.
 */

export * from "./types";
export { Interval } from "./interval";
export { Sphere, HittableList } from "./hittable";
export { Lambertian, Metal, Dielectric, Absorber, reflectance } from "./material";
export { seededRandom, createNoiseGenerator } from "./utils";
