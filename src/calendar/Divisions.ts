import type { Division } from "../Types.ts";

export type DivisionKind = "four-hour" | "day" | "week" | "month";

export const divisionKinds: readonly DivisionKind[] = [
  "four-hour",
  "day",
  "week",
  "month",
];

/** Produces calendar boundaries covering [periodStart, periodEnd] */
export type DivisionSource = (
  periodStart: number,
  periodEnd: number,
) => Iterable<Division>;

const hour = 3600;
const day = 24 * hour;

const weekdayNames = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
// biome-ignore format: lookup tables
const monthNames = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

/**
 * UTC calendar boundaries: the first at or before periodStart, the last
 * strictly after periodEnd.
 */
export function* divisions(
  kind: DivisionKind,
  periodStart: number,
  periodEnd: number,
): Generator<Division> {
  let timestamp = floorBoundary(kind, periodStart);
  while (true) {
    yield { timestamp, label: divisionLabel(kind, timestamp) };
    if (timestamp > periodEnd) return;
    timestamp = nextBoundary(kind, timestamp);
  }
}

/** @return division source for one kind of calendar period */
export function divisionSource(kind: DivisionKind): DivisionSource {
  return (periodStart, periodEnd) => divisions(kind, periodStart, periodEnd);
}

/** @return latest boundary at or before timestamp */
export function floorBoundary(kind: DivisionKind, timestamp: number): number {
  switch (kind) {
    case "four-hour":
      return Math.floor(timestamp / (4 * hour)) * 4 * hour;
    case "day":
      return Math.floor(timestamp / day) * day;
    case "week": {
      const dayStart = Math.floor(timestamp / day) * day;
      const sinceMonday = (utcDate(dayStart).getUTCDay() + 6) % 7;
      return dayStart - sinceMonday * day;
    }
    case "month": {
      const date = utcDate(timestamp);
      return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1) / 1000;
    }
  }
}

/** @return boundary following the given one */
export function nextBoundary(kind: DivisionKind, boundary: number): number {
  switch (kind) {
    case "four-hour":
      return boundary + 4 * hour;
    case "day":
      return boundary + day;
    case "week":
      return boundary + 7 * day;
    case "month": {
      const date = utcDate(boundary);
      return Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 1) / 1000;
    }
  }
}

/** @return caption for the period starting at a boundary, e.g. "Mon 3", "Jun 2024" */
export function divisionLabel(kind: DivisionKind, boundary: number): string {
  const date = utcDate(boundary);
  const month = monthNames[date.getUTCMonth()];
  switch (kind) {
    case "four-hour":
      return `${String(date.getUTCHours()).padStart(2, "0")}:00`;
    case "day":
      return `${weekdayNames[date.getUTCDay()]} ${date.getUTCDate()}`;
    case "week":
      return `w/c ${date.getUTCDate()} ${month}`;
    case "month":
      return `${month} ${date.getUTCFullYear()}`;
  }
}

function utcDate(timestamp: number): Date {
  return new Date(timestamp * 1000);
}
