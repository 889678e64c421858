import { DegenerateRangeError } from "./Errors.ts";

/**
 * Linear map between a value domain and a coordinate range: `y = m·x + c`.
 *
 * Transforms are values: every operation returns a new instance.
 */
export class AxisTransform {
  readonly m: number;
  readonly c: number;

  constructor(m: number, c: number) {
    this.m = m;
    this.c = c;
  }

  /** @return transform taking min to 0 and max to 1 */
  static fromRange(min: number, max: number): AxisTransform {
    if (!Number.isFinite(min) || !Number.isFinite(max) || min === max) {
      throw new DegenerateRangeError(min, max);
    }
    const m = 1 / (max - min);
    return new AxisTransform(m, -min * m);
  }

  /** @return mapped value, unclamped */
  map(value: number): number {
    return this.m * value + this.c;
  }

  /** @return value that maps to the given coordinate */
  unmap(value: number): number {
    return (value - this.c) / this.m;
  }

  /**
   * Fold a display transform into this one.
   *
   * `display` maps device coordinates onto the same unit range this transform
   * produces (e.g. `fromRange(left, right)` in pixels). The result maps data
   * values straight to device coordinates: `display.unmap(this.map(x))`.
   */
  applyDisplay(display: AxisTransform): AxisTransform {
    return new AxisTransform(this.m / display.m, (this.c - display.c) / display.m);
  }
}
