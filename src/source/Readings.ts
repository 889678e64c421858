import { InvalidInputError } from "../Errors.ts";
import type { Sample } from "../Types.ts";

/** Metered consumption over one interval, as reported by the supplier */
export interface ConsumptionReading {
  interval_start: string;
  /** kWh consumed during the interval */
  consumption: number;
}

export type GroupBy = "half-hour" | "hour" | "day" | "week" | "month" | "quarter";

const intervalHours: Record<GroupBy, number> = {
  "half-hour": 0.5,
  hour: 1,
  day: 24,
  week: 24 * 7,
  month: (24 * 365) / 12,
  quarter: (24 * 365) / 4,
};

export const groupByValues: readonly GroupBy[] = [
  "half-hour",
  "hour",
  "day",
  "week",
  "month",
  "quarter",
];

/** @return hours covered by one reading; ungrouped readings are half-hourly */
export function groupByIntervalHours(groupBy?: string): number {
  if (groupBy === undefined) return intervalHours["half-hour"];
  if (!isGroupBy(groupBy)) {
    throw new InvalidInputError(`Unknown group-by: "${groupBy}"`);
  }
  return intervalHours[groupBy];
}

function isGroupBy(value: string): value is GroupBy {
  return groupByValues.some(g => g === value);
}

/** @return power samples (average kW) in ascending time order */
export function readingsToSamples(
  readings: readonly ConsumptionReading[],
  groupBy?: string,
): Sample[] {
  const hours = groupByIntervalHours(groupBy);
  return readings
    .map(reading => ({
      timestamp: parseTimestamp(reading.interval_start),
      value: reading.consumption / hours,
    }))
    .sort((a, b) => a.timestamp - b.timestamp);
}

/** @return unix seconds for an ISO 8601 timestamp */
export function parseTimestamp(iso: string): number {
  const ms = Date.parse(iso);
  if (Number.isNaN(ms)) {
    throw new InvalidInputError(`Invalid timestamp: "${iso}"`);
  }
  return Math.floor(ms / 1000);
}

/**
 * @return samples from parsed JSON: an array (or `{ results: [...] }`) of
 *   readings with interval_start/consumption or samples with timestamp/value
 */
export function parseSampleInput(json: unknown, groupBy?: string): Sample[] {
  const entries = isRecord(json) && "results" in json ? json.results : json;
  if (!Array.isArray(entries)) {
    throw new InvalidInputError("Expected an array of readings or samples");
  }
  const items: unknown[] = entries;
  if (items.every(isReading)) return readingsToSamples(items, groupBy);
  if (items.every(isSample)) {
    return [...items].sort((a, b) => a.timestamp - b.timestamp);
  }
  throw new InvalidInputError(
    "Entries need interval_start/consumption or timestamp/value fields",
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isReading(value: unknown): value is ConsumptionReading {
  return (
    isRecord(value) &&
    typeof value.interval_start === "string" &&
    typeof value.consumption === "number"
  );
}

function isSample(value: unknown): value is Sample {
  return (
    isRecord(value) &&
    typeof value.timestamp === "number" &&
    typeof value.value === "number"
  );
}
