import type { Argv, InferredOptionTypes } from "yargs";
import yargs from "yargs";
import { divisionKinds } from "../calendar/Divisions.ts";
import { defaultGraphOptions } from "../graph/EnergyGraph.ts";
import { groupByValues } from "../source/Readings.ts";

/** CLI args type inferred from cliOptions */
export type GraphCliArgs = InferredOptionTypes<typeof cliOptions> & {
  input: string;
};

const defaults = defaultGraphOptions;

// biome-ignore format: compact option definitions
const cliOptions = {
  output:           { type: "string",  alias: "o", default: "energy-graph.svg", requiresArg: true, describe: "SVG file to write" },
  buckets:          { type: "number",  default: defaults.bucketCount, describe: "buckets to plot (one per sample in the latest period)" },
  "stats-duration": { type: "number",  default: defaults.statsDuration, describe: "earlier periods summarized in each bucket" },
  width:            { type: "number",  default: defaults.width, describe: "document width in pixels" },
  height:           { type: "number",  default: defaults.height, describe: "document height in pixels" },
  gridlines:        { type: "number",  default: defaults.gridlines, describe: "approximate number of horizontal gridlines" },
  division:         { choices: divisionKinds, default: defaults.division, describe: "calendar period shading" },
  "group-by":       { choices: groupByValues, describe: "interval of each reading (default: half-hour)" },
  "time-zone":      { type: "string",  default: defaults.timeZone, describe: "time zone for hover labels (interval blocks stay on UTC days)" },
  unit:             { type: "string",  default: defaults.unit, describe: "unit label for plotted values" },
  stats:            { type: "boolean", default: false, describe: "print per-bucket statistics" },
  open:             { type: "boolean", default: false, describe: "open the SVG after writing it" },
} as const;

/** @return yargs with standard graph options */
export function defaultCliArgs(yargsInstance: Argv) {
  return yargsInstance
    .scriptName("energy-graph")
    .usage("$0 <input.json>\n\nRender energy samples as an SVG graph")
    .options(cliOptions)
    .demandCommand(1, 1, "an input JSON file is required")
    .help()
    .strict();
}

/** @return parsed command line arguments */
export function parseCliArgs(args: string[]): GraphCliArgs {
  const argv = defaultCliArgs(yargs(args)).parseSync();
  const [input] = argv._;
  return { ...argv, input: String(input) };
}
