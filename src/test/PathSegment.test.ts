import { expect, test } from "vitest";
import { UndefinedTangentError } from "../Errors.ts";
import {
  controlPoint,
  cubicPath,
  formatCommand,
  linearPath,
  type PathSegment,
  type Point,
  quadraticPath,
  segmentCommands,
  segmentStart,
} from "../svg/PathSegment.ts";

function points(...coords: [number, number][]): Point[] {
  return coords.map(([x, y]) => ({ x, y }));
}

function commandText(segment: PathSegment): string[] {
  return [...segmentCommands(segment)].map(formatCommand);
}

test("linear: one line per remaining point", () => {
  const segment = linearPath(points([0, 0], [1, 2], [3, 4]));
  expect(segmentStart(segment)).toEqual({ x: 0, y: 0 });
  expect(commandText(segment)).toEqual(["L 1 2", "L 3 4"]);
});

test("quadratic: midpoint control, then smooth continuation", () => {
  const segment = quadraticPath(points([0, 0], [2, 2], [4, 0], [6, 2]));
  expect(commandText(segment)).toEqual(["Q 1 1, 2 2", "T 4 0", "T 6 2"]);
});

test("single point segments draw nothing after the start", () => {
  for (const build of [linearPath, quadraticPath]) {
    const segment = build(points([3, 4]));
    expect(segmentStart(segment)).toEqual({ x: 3, y: 4 });
    expect(commandText(segment)).toEqual([]);
  }
  expect(commandText(cubicPath(points([3, 4])))).toEqual(["S 3 4, 3 4"]);
});

test("cubic: incoming handle from neighbour slope", () => {
  const segment = cubicPath(points([0, 0], [1, 1], [2, 0]));
  expect(commandText(segment)).toEqual([
    "S 0 0, 0 0",
    "S 0.5 1, 1 1",
    "S 1.5 0.25, 2 0",
  ]);
});

test("cubic: neighbours sharing x give a horizontal handle", () => {
  const segment = cubicPath(points([0, 0], [0, 1], [0, 2]));
  expect(commandText(segment)).toEqual([
    "S 0 0, 0 0",
    "S 0 1, 0 1",
    "S 0 2, 0 2",
  ]);
});

test("controlPoint: equal neighbour x is not a division by zero", () => {
  const cp = controlPoint({ x: 0, y: 0 }, { x: 2, y: 5 }, { x: 0, y: 9 });
  expect(cp).toEqual({ x: 1, y: 5 });
});

test("controlPoint: non-finite input has no tangent", () => {
  const prev = { x: 0, y: 0 };
  const current = { x: 1, y: Number.NaN };
  expect(() => controlPoint(prev, current, { x: 2, y: 0 })).toThrow(
    UndefinedTangentError,
  );
});

test("segments need at least one point", () => {
  expect(() => linearPath([])).toThrow(RangeError);
  expect(() => quadraticPath([])).toThrow(RangeError);
  expect(() => cubicPath([])).toThrow(RangeError);
});

test("segments copy their points", () => {
  const input = points([0, 0], [1, 1]);
  const segment = linearPath(input);
  input.push({ x: 2, y: 2 });
  expect(segment.points).toHaveLength(2);
});

test("commands are regenerated on each call", () => {
  const segment = cubicPath(points([0, 0], [1, 1], [2, 0]));
  expect(commandText(segment)).toEqual(commandText(segment));
});

test("formatCommand: every command type", () => {
  const to = { x: 4, y: 5 };
  expect(formatCommand({ type: "M", to })).toBe("M 4 5");
  expect(formatCommand({ type: "L", to })).toBe("L 4 5");
  expect(formatCommand({ type: "T", to })).toBe("T 4 5");
  expect(formatCommand({ type: "Q", control: { x: 0, y: 1 }, to })).toBe(
    "Q 0 1, 4 5",
  );
  const control1 = { x: 0, y: 1 };
  const control2 = { x: 2, y: 3 };
  expect(formatCommand({ type: "C", control1, control2, to })).toBe(
    "C 0 1, 2 3, 4 5",
  );
  expect(formatCommand({ type: "S", control2, to })).toBe("S 2 3, 4 5");
  expect(formatCommand({ type: "Z" })).toBe("Z");
});

test("formatCommand: three decimals, no negative zero", () => {
  const to = { x: 1.23456, y: -0.0001 };
  expect(formatCommand({ type: "L", to })).toBe("L 1.235 0");
});
