/**
 * Pixel stream output: sample averaging, gamma correction, and PPM (P3) text.
 */

import type { RenderProgress } from "./camera";
import type { Vec3 } from "./math";
import { Interval } from "./scene/interval";

export interface PixelSink {
  begin(width: number, height: number): void;
  /** `colourSum` is the sum of `samples` linear radiance samples. */
  writePixel(colourSum: Vec3, samples: number): void;
  end(): void;
}

/** Anything with a string `write`, e.g. process.stdout or a test buffer. */
export interface TextTarget {
  write(chunk: string): unknown;
}

// =============================================================================
// Colour Conversion
// =============================================================================

const intensity = new Interval(0.0, 0.999);

export function linearToGamma(linear: number): number {
  return linear > 0 ? Math.sqrt(linear) : 0;
}

export function toByte(linear: number): number {
  return Math.floor(256 * intensity.clamp(linearToGamma(linear)));
}

/** One `r g b` triplet for the averaged sample sum. */
export function formatColour(colourSum: Vec3, samples: number): string {
  const s = 1.0 / samples;
  const r = toByte(colourSum[0] * s);
  const g = toByte(colourSum[1] * s);
  const b = toByte(colourSum[2] * s);
  return `${r} ${g} ${b}`;
}

// =============================================================================
// PPM Writer
// =============================================================================

export class PpmWriter implements PixelSink {
  private width = 0;
  private height = 0;
  private written = 0;
  private row: string[] = [];

  constructor(private readonly target: TextTarget) {}

  begin(width: number, height: number): void {
    this.width = width;
    this.height = height;
    this.written = 0;
    this.row = [];
    this.target.write(`P3\n${width} ${height}\n255\n`);
  }

  writePixel(colourSum: Vec3, samples: number): void {
    if (this.written >= this.width * this.height) {
      throw new Error(`PPM writer received more than ${this.width}x${this.height} pixels`);
    }
    this.row.push(formatColour(colourSum, samples) + "\n");
    this.written++;

    // Flush a scanline at a time
    if (this.row.length === this.width) this.flush();
  }

  end(): void {
    this.flush();
    const expected = this.width * this.height;
    if (this.written !== expected) {
      throw new Error(`PPM writer expected ${expected} pixels, got ${this.written}`);
    }
  }

  private flush(): void {
    if (this.row.length === 0) return;
    this.target.write(this.row.join(""));
    this.row = [];
  }
}

// =============================================================================
// Progress
// =============================================================================

/** Carriage-return scanline counter, meant for stderr. */
export function createProgressReporter(target: TextTarget): RenderProgress {
  return {
    scanline(remaining) {
      target.write(`\rScanlines remaining: ${remaining} `);
    },
    done() {
      target.write("\rDone.                 \n");
    },
  };
}
