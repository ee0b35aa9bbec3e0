/**
 * Closed real interval used for ray parameter bounds and colour clamping.
 */

export class Interval {
  static readonly EMPTY = new Interval(Infinity, -Infinity);
  static readonly UNIVERSE = new Interval(-Infinity, Infinity);

  constructor(
    public readonly min: number = Infinity,
    public readonly max: number = -Infinity
  ) {}

  size(): number {
    return this.max - this.min;
  }

  contains(x: number): boolean {
    return this.min <= x && x <= this.max;
  }

  /** Strict containment; the endpoints are excluded. */
  surrounds(x: number): boolean {
    return this.min < x && x < this.max;
  }

  clamp(x: number): number {
    if (x < this.min) return this.min;
    if (x > this.max) return this.max;
    return x;
  }

  withMax(max: number): Interval {
    return new Interval(this.min, max);
  }
}
