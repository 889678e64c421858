import { UndefinedTangentError } from "../Errors.ts";
import { formatNumber } from "./Attributes.ts";

/** Device coordinates */
export interface Point {
  x: number;
  y: number;
}

export type SegmentKind = "linear" | "quadratic" | "cubic";

/** Ordered, non-empty run of points joined by one kind of curve */
export interface PathSegment {
  readonly kind: SegmentKind;
  readonly points: readonly Point[];
}

/** Absolute SVG path command; optional controls select the smooth forms T and S */
export type PathCommand =
  | { type: "M"; to: Point }
  | { type: "L"; to: Point }
  | { type: "Q"; control: Point; to: Point }
  | { type: "T"; to: Point }
  | { type: "C"; control1: Point; control2: Point; to: Point }
  | { type: "S"; control2: Point; to: Point }
  | { type: "Z" };

/** Straight lines between points */
export function linearPath(points: readonly Point[]): PathSegment {
  return segment("linear", points);
}

/** Smooth quadratic curve through points */
export function quadraticPath(points: readonly Point[]): PathSegment {
  return segment("quadratic", points);
}

/** Smooth cubic curve through points, tangents estimated from neighbours */
export function cubicPath(points: readonly Point[]): PathSegment {
  return segment("cubic", points);
}

function segment(kind: SegmentKind, points: readonly Point[]): PathSegment {
  if (points.length === 0) {
    throw new RangeError(`A ${kind} path needs at least one point`);
  }
  return { kind, points: [...points] };
}

/** @return first point of the segment */
export function segmentStart(segment: PathSegment): Point {
  return segment.points[0];
}

/** @return commands drawing from the segment start through the remaining points */
export function segmentCommands(segment: PathSegment): Generator<PathCommand> {
  switch (segment.kind) {
    case "linear":
      return linearCommands(segment.points);
    case "quadratic":
      return quadraticCommands(segment.points);
    case "cubic":
      return cubicCommands(segment.points);
  }
}

function* linearCommands(points: readonly Point[]): Generator<PathCommand> {
  for (const to of points.slice(1)) yield { type: "L", to };
}

function* quadraticCommands(points: readonly Point[]): Generator<PathCommand> {
  if (points.length < 2) return;
  const [start, first] = points;
  const control = { x: (start.x + first.x) / 2, y: (start.y + first.y) / 2 };
  yield { type: "Q", control, to: first };
  for (const to of points.slice(2)) yield { type: "T", to };
}

/**
 * Each point is reached with an `S` command whose explicit control is the
 * incoming handle; the outgoing handle is the reflection SVG applies to the
 * next `S`. The last point uses itself as its following neighbour.
 */
function* cubicCommands(points: readonly Point[]): Generator<PathCommand> {
  let prev = points[0];
  let current = prev;
  for (const next of points.slice(1)) {
    yield { type: "S", control2: controlPoint(prev, current, next), to: current };
    [prev, current] = [current, next];
  }
  yield { type: "S", control2: controlPoint(prev, current, current), to: current };
}

const tension = 0.5;
const slope = 0.5;

/**
 * Incoming control handle for current, from the slope between its neighbours.
 * Neighbours sharing an x coordinate give a horizontal handle.
 */
export function controlPoint(prev: Point, current: Point, next: Point): Point {
  const dx = next.x - prev.x;
  const gradient = dx === 0 ? 0 : (slope * (next.y - prev.y)) / dx;
  const offset = current.x - prev.x;
  const control = {
    x: current.x - tension * offset,
    y: current.y - tension * offset * gradient,
  };
  if (!Number.isFinite(control.x) || !Number.isFinite(control.y)) {
    throw new UndefinedTangentError(prev, current, next);
  }
  return control;
}

function pair(p: Point): string {
  return `${formatNumber(p.x)} ${formatNumber(p.y)}`;
}

/** @return command in path data syntax, e.g. "S 1 2, 3 4" */
export function formatCommand(command: PathCommand): string {
  switch (command.type) {
    case "M":
    case "L":
    case "T":
      return `${command.type} ${pair(command.to)}`;
    case "Q":
      return `Q ${pair(command.control)}, ${pair(command.to)}`;
    case "C":
      return `C ${pair(command.control1)}, ${pair(command.control2)}, ${pair(command.to)}`;
    case "S":
      return `S ${pair(command.control2)}, ${pair(command.to)}`;
    case "Z":
      return "Z";
  }
}
