import { expect, test } from "vitest";
import { InvalidInputError } from "../Errors.ts";
import {
  groupByIntervalHours,
  parseSampleInput,
  readingsToSamples,
} from "../source/Readings.ts";
import { mondayMidnight } from "./TestUtils.ts";

const readings = [
  { interval_start: "2024-06-03T00:30:00Z", consumption: 0.4 },
  { interval_start: "2024-06-03T00:00:00Z", consumption: 0.2 },
];

test("groupByIntervalHours: hours per reading", () => {
  expect(groupByIntervalHours()).toBe(0.5);
  expect(groupByIntervalHours("hour")).toBe(1);
  expect(groupByIntervalHours("day")).toBe(24);
  expect(groupByIntervalHours("week")).toBe(168);
  expect(() => groupByIntervalHours("fortnight")).toThrow(InvalidInputError);
});

test("readingsToSamples: kWh per interval becomes average kW, oldest first", () => {
  expect(readingsToSamples(readings)).toEqual([
    { timestamp: mondayMidnight, value: 0.4 },
    { timestamp: mondayMidnight + 1800, value: 0.8 },
  ]);
  const hourly = readingsToSamples(readings, "hour");
  expect(hourly.map(s => s.value)).toEqual([0.2, 0.4]);
});

test("readingsToSamples: honours timezone offsets", () => {
  const [sample] = readingsToSamples([
    { interval_start: "2024-06-03T01:00:00+01:00", consumption: 1 },
  ]);
  expect(sample.timestamp).toBe(mondayMidnight);
});

test("parseSampleInput: readings, wrapped results, or samples", () => {
  expect(parseSampleInput(readings)).toHaveLength(2);
  expect(parseSampleInput({ results: readings, count: 2 })).toHaveLength(2);
  const samples = [
    { timestamp: 20, value: 2 },
    { timestamp: 10, value: 1 },
  ];
  expect(parseSampleInput(samples).map(s => s.timestamp)).toEqual([10, 20]);
});

test("parseSampleInput: rejects other shapes", () => {
  expect(() => parseSampleInput({ data: [] })).toThrow(InvalidInputError);
  expect(() => parseSampleInput([{ timestamp: 1 }])).toThrow(
    "Entries need interval_start/consumption or timestamp/value fields",
  );
  const badTime = [{ interval_start: "yesterday", consumption: 1 }];
  expect(() => parseSampleInput(badTime)).toThrow('Invalid timestamp: "yesterday"');
});
