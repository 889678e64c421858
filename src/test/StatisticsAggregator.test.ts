import { expect, test } from "vitest";
import { aggregateStatistics } from "../StatisticsAggregator.ts";
import { hour, hourlySamples, mondayMidnight } from "./TestUtils.ts";

test("40 samples into 4 buckets of 10 stride-matched values", () => {
  const series = [...aggregateStatistics(hourlySamples(40), 4, 10)];

  expect(series).toHaveLength(4);
  expect(series.map(s => s.timestamp)).toEqual(
    [36, 37, 38, 39].map(j => mondayMidnight + j * hour),
  );
  expect(series.map(s => s.current)).toEqual([36, 37, 38, 39]);
  expect(series.map(s => s.average)).toEqual([18, 19, 20, 21]);
  expect(series.map(s => s.q1)).toEqual([8, 9, 10, 11]);
  expect(series.map(s => s.q3)).toEqual([28, 29, 30, 31]);
});

test("statsDuration limits how many periods each bucket looks back", () => {
  const series = [...aggregateStatistics(hourlySamples(40), 4, 3)];
  const newest = series[3];

  expect(newest.current).toBe(39);
  expect(newest.average).toBe(35);
  expect(newest.q1).toBe(31);
  expect(newest.q3).toBe(39);
});

test("stops early when history runs out", () => {
  const samples = hourlySamples(3, j => j + 5);
  const series = [...aggregateStatistics(samples, 4)];

  expect(series).toHaveLength(3);
  expect(series.map(s => s.current)).toEqual([5, 6, 7]);
  for (const s of series) {
    expect(s.average).toBe(s.current);
    expect(s.q1).toBe(s.current);
    expect(s.q3).toBe(s.current);
  }
});

test("a short final period trims the oldest window, not the series", () => {
  const series = [...aggregateStatistics(hourlySamples(39), 4, 10)];

  expect(series.map(s => s.current)).toEqual([35, 36, 37, 38]);
  // oldest bucket sees 9 periods (35, 31, …, 3), the rest see 10
  expect(series.map(s => s.average)).toEqual([19, 18, 19, 20]);
});

test("no samples, no buckets", () => {
  expect([...aggregateStatistics([], 4)]).toEqual([]);
});

test("quartiles may sit above the mean for skewed windows", () => {
  const samples = hourlySamples(4, j => (j === 0 ? 0 : 10));
  const [bucket] = [...aggregateStatistics(samples, 1)];

  expect(bucket.current).toBe(10);
  expect(bucket.average).toBe(7.5);
  expect(bucket.q1).toBe(10);
  expect(bucket.q3).toBe(10);
  expect(bucket.q1).toBeGreaterThan(bucket.average);
});

test("quartile ranks use floor(n/4) without interpolation", () => {
  const values = [9, 1, 5, 3, 7, 2, 8];
  const samples = hourlySamples(values.length, j => values[j]);
  const [bucket] = [...aggregateStatistics(samples, 1)];

  // sorted: 1 2 3 5 7 8 9, offset 1
  expect(bucket.q1).toBe(2);
  expect(bucket.q3).toBe(8);
  expect(bucket.current).toBe(8);
});

test("sequence is lazy and produced once", () => {
  const buckets = aggregateStatistics(hourlySamples(8), 4);

  expect(buckets.next().value?.current).toBe(4);
  expect([...buckets].map(s => s.current)).toEqual([5, 6, 7]);
  expect([...buckets]).toEqual([]);
});

test("accepts any iterable of samples", () => {
  function* generated() {
    yield* hourlySamples(6);
  }
  const series = [...aggregateStatistics(generated(), 3)];
  expect(series.map(s => s.average)).toEqual([1.5, 2.5, 3.5]);
});

test("rejects bucket counts that are not positive integers", () => {
  expect(() => [...aggregateStatistics(hourlySamples(4), 0)]).toThrow(
    RangeError,
  );
  expect(() => [...aggregateStatistics(hourlySamples(4), 1.5)]).toThrow(
    RangeError,
  );
});

test("rejects stats durations that are not positive integers", () => {
  for (const duration of [Number.NaN, 0, 2.5, -1]) {
    expect(() => [...aggregateStatistics(hourlySamples(4), 2, duration)]).toThrow(
      `Invalid stats duration: ${duration}`,
    );
  }
  const unbounded = aggregateStatistics(hourlySamples(4), 2, Infinity);
  expect([...unbounded].map(s => s.average)).toEqual([1, 2]);
});
