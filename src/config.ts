/**
 * Camera configuration: defaults and validation.
 */

import { z } from "zod";
import { cross, length, normalize, sub, type Vec3 } from "./math";

// =============================================================================
// Schema
// =============================================================================

const vec3Schema = z.tuple([z.number().finite(), z.number().finite(), z.number().finite()]);

export const cameraConfigSchema = z
  .object({
    aspectRatio: z.number().finite().positive(),       // image width over height
    imageWidth: z.number().int().positive(),           // in pixels
    samplesPerPixel: z.number().int().positive(),
    maxDepth: z.number().int().nonnegative(),          // ray bounce limit
    vfov: z.number().gt(0).lt(180),                    // vertical view angle, degrees
    lookfrom: vec3Schema,
    lookat: vec3Schema,
    vup: vec3Schema,                                   // camera-relative up
    defocusAngle: z.number().nonnegative().lt(180),    // cone angle through each pixel, degrees
    focusDist: z.number().finite().positive(),         // distance to plane of perfect focus
  })
  .superRefine((cfg, ctx) => {
    const view = sub(cfg.lookfrom, cfg.lookat);
    if (length(view) === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["lookat"],
        message: "lookat must differ from lookfrom",
      });
      return;
    }
    if (length(cross(normalize(cfg.vup), normalize(view))) < 1e-8) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["vup"],
        message: "vup must not be parallel to the view direction",
      });
    }
  });

export type CameraConfig = z.infer<typeof cameraConfigSchema>;
export type CameraConfigInput = Partial<CameraConfig>;

// =============================================================================
// Defaults
// =============================================================================

type CameraDefaults = {
  readonly [K in keyof CameraConfig]: CameraConfig[K] extends Vec3 ? Readonly<Vec3> : CameraConfig[K];
};

export const DEFAULT_CAMERA: CameraDefaults = {
  aspectRatio: 1.0,
  imageWidth: 100,
  samplesPerPixel: 10,
  maxDepth: 10,
  vfov: 90,
  lookfrom: [0, 0, -1],
  lookat: [0, 0, 0],
  vup: [0, 1, 0],
  defocusAngle: 0,
  focusDist: 10,
};

// =============================================================================
// Errors
// =============================================================================

export class CameraConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(
      `Invalid camera configuration: ${issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "CameraConfigError";
  }
}

/** Merges `input` over the defaults and validates; throws CameraConfigError. */
export function parseCameraConfig(input: CameraConfigInput = {}): CameraConfig {
  const result = cameraConfigSchema.safeParse({ ...DEFAULT_CAMERA, ...input });
  if (!result.success) {
    throw new CameraConfigError(result.error.issues);
  }
  return result.data;
}
