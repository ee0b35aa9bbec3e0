/**
 * Thin-lens camera: frame derivation, ray generation, and path-traced shading.
 */

import { parseCameraConfig, DEFAULT_CAMERA, type CameraConfig, type CameraConfigInput } from "./config";
import {
  add,
  clone,
  cross,
  degreesToRadians,
  div,
  lerp,
  mul,
  negate,
  normalize,
  randomInUnitDisk,
  scale,
  sub,
  type Rng,
  type Vec3,
} from "./math";
import type { PixelSink } from "./output";
import { Interval } from "./scene/interval";
import type { Hittable, Ray } from "./scene/types";

export type { Vec3 };

// =============================================================================
// Frame
// =============================================================================

export interface DerivedFrame {
  readonly imageWidth: number;
  readonly imageHeight: number;
  readonly samplesPerPixel: number;
  readonly maxDepth: number;
  readonly defocusAngle: number;
  readonly center: Vec3;
  readonly pixel00Loc: Vec3;       // centre of pixel (0, 0)
  readonly pixelDeltaU: Vec3;      // offset to the pixel on the right
  readonly pixelDeltaV: Vec3;      // offset to the pixel below
  readonly u: Vec3;
  readonly v: Vec3;
  readonly w: Vec3;
  readonly defocusDiskU: Vec3;     // horizontal radius of the lens
  readonly defocusDiskV: Vec3;     // vertical radius of the lens
}

/**
 * Validates the configuration and computes everything the render loop reads.
 * Throws CameraConfigError before any pixel is produced.
 */
export function deriveFrame(input: CameraConfigInput): DerivedFrame {
  const cfg = parseCameraConfig(input);

  // Load-bearing: keeps the viewport aspect finite
  const imageHeight = Math.max(1, Math.round(cfg.imageWidth / cfg.aspectRatio));
  const center = cfg.lookfrom;

  const h = Math.tan(degreesToRadians(cfg.vfov) / 2);
  const viewportHeight = 2 * h * cfg.focusDist;
  const viewportWidth = viewportHeight * (cfg.imageWidth / imageHeight);

  const w = normalize(sub(cfg.lookfrom, cfg.lookat));
  const u = normalize(cross(cfg.vup, w));
  const v = cross(w, u);

  // Across the horizontal edge, and down the vertical edge
  const viewportU = scale(u, viewportWidth);
  const viewportV = scale(negate(v), viewportHeight);

  const pixelDeltaU = div(viewportU, cfg.imageWidth);
  const pixelDeltaV = div(viewportV, imageHeight);

  const viewportUpperLeft = sub(
    sub(sub(center, scale(w, cfg.focusDist)), div(viewportU, 2)),
    div(viewportV, 2)
  );
  const pixel00Loc = add(viewportUpperLeft, scale(add(pixelDeltaU, pixelDeltaV), 0.5));

  const defocusRadius = cfg.focusDist * Math.tan(degreesToRadians(cfg.defocusAngle / 2));

  return {
    imageWidth: cfg.imageWidth,
    imageHeight,
    samplesPerPixel: cfg.samplesPerPixel,
    maxDepth: cfg.maxDepth,
    defocusAngle: cfg.defocusAngle,
    center,
    pixel00Loc,
    pixelDeltaU,
    pixelDeltaV,
    u,
    v,
    w,
    defocusDiskU: scale(u, defocusRadius),
    defocusDiskV: scale(v, defocusRadius),
  };
}

// =============================================================================
// Ray Generation
// =============================================================================

export function pixelCenter(frame: DerivedFrame, i: number, j: number): Vec3 {
  return add(add(frame.pixel00Loc, scale(frame.pixelDeltaU, i)), scale(frame.pixelDeltaV, j));
}

/** Random offset inside the pixel's [-0.5, 0.5]^2 footprint. */
export function pixelSampleSquare(frame: DerivedFrame, rng: Rng): Vec3 {
  const px = -0.5 + rng();
  const py = -0.5 + rng();
  return add(scale(frame.pixelDeltaU, px), scale(frame.pixelDeltaV, py));
}

export function defocusDiskSample(frame: DerivedFrame, rng: Rng): Vec3 {
  const p = randomInUnitDisk(rng);
  return add(add(frame.center, scale(frame.defocusDiskU, p[0])), scale(frame.defocusDiskV, p[1]));
}

/**
 * Camera ray for pixel (i, j), jittered within the pixel and, when the lens
 * has an aperture, originating on the defocus disk.
 */
export function getRay(frame: DerivedFrame, i: number, j: number, rng: Rng): Ray {
  const pixelSample = add(pixelCenter(frame, i, j), pixelSampleSquare(frame, rng));
  const origin = frame.defocusAngle <= 0 ? frame.center : defocusDiskSample(frame, rng);
  return { origin, direction: sub(pixelSample, origin) };
}

// =============================================================================
// Shading
// =============================================================================

const WHITE: Vec3 = [1.0, 1.0, 1.0];
const SKY_BLUE: Vec3 = [0.5, 0.7, 1.0];

// Lower bound skips self-intersection at the scattered ray's origin
export const HIT_RANGE = new Interval(0.001, Infinity);

/** Vertical sky gradient; the only light source. */
export function background(direction: Vec3): Vec3 {
  const unit = normalize(direction);
  const a = 0.5 * (unit[1] + 1.0);
  return lerp(WHITE, SKY_BLUE, a);
}

/**
 * Radiance along `ray`, following at most `depth` bounces.
 * Carries the attenuation product forward instead of recursing.
 */
export function rayColour(ray: Ray, depth: number, world: Hittable, rng: Rng): Vec3 {
  let attenuation: Vec3 = [1, 1, 1];
  let current = ray;

  for (let remaining = depth; remaining > 0; remaining--) {
    const rec = world.hit(current, HIT_RANGE);
    if (!rec) return mul(attenuation, background(current.direction));

    const scatter = rec.material.scatter(current, rec, rng);
    if (!scatter) return [0, 0, 0];

    attenuation = mul(attenuation, scatter.attenuation);
    current = scatter.scattered;
  }

  // Bounce limit reached: no more light is gathered
  return [0, 0, 0];
}

// =============================================================================
// Render
// =============================================================================

export interface RenderProgress {
  scanline(remaining: number): void;
  done(): void;
}

export interface RenderOptions {
  rng?: Rng;
  progress?: RenderProgress;
}

/** Writes every pixel of `frame` to `sink` in row-major order. */
export function renderFrame(
  frame: DerivedFrame,
  world: Hittable,
  sink: PixelSink,
  options: RenderOptions = {}
): void {
  const rng = options.rng ?? Math.random;
  const { imageWidth, imageHeight, samplesPerPixel, maxDepth } = frame;

  sink.begin(imageWidth, imageHeight);

  for (let j = 0; j < imageHeight; j++) {
    options.progress?.scanline(imageHeight - j);
    for (let i = 0; i < imageWidth; i++) {
      let pixelColour: Vec3 = [0, 0, 0];
      for (let sample = 0; sample < samplesPerPixel; sample++) {
        const ray = getRay(frame, i, j, rng);
        pixelColour = add(pixelColour, rayColour(ray, maxDepth, world, rng));
      }
      sink.writePixel(pixelColour, samplesPerPixel);
    }
  }

  sink.end();
  options.progress?.done();
}

// =============================================================================
// Camera
// =============================================================================

export class Camera {
  aspectRatio: number;
  imageWidth: number;
  samplesPerPixel: number;
  maxDepth: number;

  vfov: number;
  lookfrom: Vec3;
  lookat: Vec3;
  vup: Vec3;

  defocusAngle: number;
  focusDist: number;

  constructor(cfg: CameraConfigInput = {}) {
    this.aspectRatio = cfg.aspectRatio ?? DEFAULT_CAMERA.aspectRatio;
    this.imageWidth = cfg.imageWidth ?? DEFAULT_CAMERA.imageWidth;
    this.samplesPerPixel = cfg.samplesPerPixel ?? DEFAULT_CAMERA.samplesPerPixel;
    this.maxDepth = cfg.maxDepth ?? DEFAULT_CAMERA.maxDepth;
    this.vfov = cfg.vfov ?? DEFAULT_CAMERA.vfov;
    this.lookfrom = clone(cfg.lookfrom ?? DEFAULT_CAMERA.lookfrom);
    this.lookat = clone(cfg.lookat ?? DEFAULT_CAMERA.lookat);
    this.vup = clone(cfg.vup ?? DEFAULT_CAMERA.vup);
    this.defocusAngle = cfg.defocusAngle ?? DEFAULT_CAMERA.defocusAngle;
    this.focusDist = cfg.focusDist ?? DEFAULT_CAMERA.focusDist;
  }

  toConfig(): CameraConfig {
    return {
      aspectRatio: this.aspectRatio,
      imageWidth: this.imageWidth,
      samplesPerPixel: this.samplesPerPixel,
      maxDepth: this.maxDepth,
      vfov: this.vfov,
      lookfrom: clone(this.lookfrom),
      lookat: clone(this.lookat),
      vup: clone(this.vup),
      defocusAngle: this.defocusAngle,
      focusDist: this.focusDist,
    };
  }

  /** Derives a fresh frame from the current fields, so edits between renders apply. */
  render(world: Hittable, sink: PixelSink, options: RenderOptions = {}): DerivedFrame {
    const frame = deriveFrame(this.toConfig());
    renderFrame(frame, world, sink, options);
    return frame;
  }
}
