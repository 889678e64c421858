import type { Point } from "./svg/PathSegment.ts";

/** Axis range with zero width (or non-finite bounds), so no transform exists */
export class DegenerateRangeError extends Error {
  readonly min: number;
  readonly max: number;

  constructor(min: number, max: number, message?: string) {
    super(message ?? `Degenerate axis range: [${min}, ${max}]`);
    this.name = "DegenerateRangeError";
    this.min = min;
    this.max = max;
  }
}

/** A plotted column is absent (or not a finite number) in a sample */
export class MissingFieldError extends Error {
  readonly field: string;
  readonly index: number;

  constructor(field: string, index: number) {
    super(`Sample ${index} has no numeric "${field}" value`);
    this.name = "MissingFieldError";
    this.field = field;
    this.index = index;
  }
}

/** Cubic control point could not be estimated from its neighbours */
export class UndefinedTangentError extends Error {
  readonly points: readonly [Point, Point, Point];

  constructor(prev: Point, current: Point, next: Point) {
    const fmt = (p: Point) => `(${p.x}, ${p.y})`;
    super(
      `Undefined tangent at ${fmt(current)} between ${fmt(prev)} and ${fmt(next)}`,
    );
    this.name = "UndefinedTangentError";
    this.points = [prev, current, next];
  }
}

/** Input readings or samples that can't be plotted */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}
