import pico from "picocolors";
import type { TableUserConfig } from "table";
import { table } from "table";
import { columnLabels, formatPower } from "../graph/GraphComponents.ts";
import { type StatSample, statColumns } from "../Types.ts";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const { bold } = isTest ? { bold: (str: string) => str } : pico;

/** @return one table row per bucket: time, then each statistic */
export function formatStatsTable(
  series: readonly StatSample[],
  formatTime: (timestamp: number) => string,
): string {
  const titles = ["time", ...statColumns.map(c => columnLabels[c])].map(bold);
  const rows = series.map(sample => [
    formatTime(sample.timestamp),
    ...statColumns.map(c => formatPower(sample[c])),
  ]);
  const config: TableUserConfig = {
    columns: Object.fromEntries(
      statColumns.map((_, i) => [i + 1, { alignment: "right" as const }]),
    ),
    drawHorizontalLine: (index, size) =>
      index === 0 || index === 1 || index === size,
  };
  return table([titles, ...rows], config);
}
