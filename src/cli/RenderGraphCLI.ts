import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import open from "open";
import pico from "picocolors";
import { hideBin } from "yargs/helpers";
import {
  type EnergyGraphOptions,
  type EnergyGraphResult,
  renderEnergyGraph,
  timeFormatter,
} from "../graph/EnergyGraph.ts";
import { parseSampleInput } from "../source/Readings.ts";
import type { Sample } from "../Types.ts";
import { type GraphCliArgs, parseCliArgs } from "./CliArgs.ts";
import { formatStatsTable } from "./StatsTable.ts";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const { yellow, green } = isTest
  ? { yellow: (str: string) => str, green: (str: string) => str }
  : pico;

/** Parse arguments, render the input file, and write the SVG */
export async function runGraphCli(
  argv: string[] = hideBin(process.argv),
): Promise<EnergyGraphResult> {
  const args = parseCliArgs(argv);
  const samples = await loadSamples(args.input, args["group-by"]);
  const result = renderEnergyGraph(samples, cliToGraphOptions(args));

  await writeFile(args.output, result.svg, "utf-8");
  reportResult(result, args);
  if (args.open) await open(resolve(args.output));
  return result;
}

/** @return power samples from a JSON file of readings or samples */
export async function loadSamples(
  inputPath: string,
  groupBy?: string,
): Promise<Sample[]> {
  const content = await readFile(inputPath, "utf-8");
  return parseSampleInput(JSON.parse(content), groupBy);
}

/** Convert CLI args to graph options */
export function cliToGraphOptions(args: GraphCliArgs): EnergyGraphOptions {
  const { width, height, gridlines, division, unit } = args;
  const { buckets: bucketCount, "stats-duration": statsDuration } = args;
  const { "time-zone": timeZone } = args;
  return {
    width,
    height,
    bucketCount,
    statsDuration,
    gridlines,
    division,
    timeZone,
    unit,
    standalone: true,
  };
}

/** Log where the graph went, and warn when history ran short */
function reportResult(result: EnergyGraphResult, args: GraphCliArgs): void {
  const { bucketCount, requestedBuckets } = result;
  if (bucketCount < requestedBuckets) {
    const msg = `Only ${bucketCount} of ${requestedBuckets} buckets have data`;
    console.warn(yellow(msg));
  }
  if (args.stats) {
    console.log(formatStatsTable(result.series, timeFormatter(args["time-zone"])));
  }
  console.log(`Graph saved to: ${green(args.output)}`);
}
