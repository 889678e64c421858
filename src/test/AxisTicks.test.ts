import { expect, test } from "vitest";
import { gridlineValues, selectDivisionInterval } from "../AxisTicks.ts";
import { DegenerateRangeError } from "../Errors.ts";

test("selectDivisionInterval: descends 1/0.5/0.2 per power of ten", () => {
  expect(selectDivisionInterval(37, 4)).toBe(10);
  expect(selectDivisionInterval(100, 4)).toBe(50);
  expect(selectDivisionInterval(3.2, 4)).toBe(1);
  expect(selectDivisionInterval(39, 5)).toBe(10);
});

test("selectDivisionInterval: fractional ranges", () => {
  expect(selectDivisionInterval(1, 5)).toBeCloseTo(0.2);
  expect(selectDivisionInterval(0.37, 4)).toBeCloseTo(0.1);
});

test("selectDivisionInterval: first candidate returned when already too fine", () => {
  expect(selectDivisionInterval(37, 0)).toBe(100);
});

test("selectDivisionInterval: rejects empty ranges", () => {
  expect(() => selectDivisionInterval(0, 4)).toThrow(DegenerateRangeError);
  expect(() => selectDivisionInterval(-2, 4)).toThrow(DegenerateRangeError);
  expect(() => selectDivisionInterval(10, Number.NaN)).toThrow(RangeError);
});

test("gridlineValues: multiples of the interval up to max", () => {
  expect(gridlineValues(37, 4)).toEqual([10, 20, 30]);
  expect(gridlineValues(1, 5)).toEqual([0.2, 0.4, 0.6, 0.8, 1]);
  expect(gridlineValues(100, 4)).toEqual([50, 100]);
});
