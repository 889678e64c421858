import * as d3 from "d3";
import { gridlineValues } from "../AxisTicks.ts";
import { AxisTransform } from "../AxisTransform.ts";
import {
  type DivisionKind,
  type DivisionSource,
  divisionSource,
} from "../calendar/Divisions.ts";
import { DegenerateRangeError } from "../Errors.ts";
import { aggregateStatistics } from "../StatisticsAggregator.ts";
import { type DocumentNode, document, group, type SvgNode } from "../svg/Nodes.ts";
import { render } from "../svg/Render.ts";
import { createStyle, type Style } from "../svg/Style.ts";
import {
  type Division,
  type Sample,
  type StatSample,
  statColumns,
} from "../Types.ts";
import {
  type GraphAxes,
  graphInfoOverlay,
  graphLine,
  graphRegion,
  horizontalAxis,
  intervalBlock,
  type SeriesStyles,
} from "./GraphComponents.ts";

export interface Padding {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface GraphStyles {
  series: SeriesStyles;
  /** q1 to q3 band */
  region: Style;
  gridline: Style;
  /** vertical hover guide */
  guide: Style;
  /** alternating interval block backgrounds */
  intervals: readonly [Style, Style];
  caption: Style;
}

export interface GraphOptions {
  width: number;
  height: number;
  bucketCount: number;
  /** number of earlier periods in each bucket's statistics */
  statsDuration: number;
  /** approximate number of horizontal gridlines */
  gridlines: number;
  padding: Padding;
  division: DivisionKind;
  /** custom boundaries, replacing the calendar division */
  divisions?: DivisionSource;
  /**
   * IANA zone for hover time labels.
   * Interval blocks keep UTC calendar boundaries whatever the zone.
   */
  timeZone: string;
  unit: string;
  styles: GraphStyles;
  /** embed a stylesheet that shows hover overlays only under the pointer */
  standalone: boolean;
}

export type EnergyGraphOptions = Partial<
  Omit<GraphOptions, "padding" | "styles">
> & {
  padding?: Partial<Padding>;
  styles?: Partial<GraphStyles>;
};

export interface EnergyGraphResult {
  svg: string;
  root: DocumentNode;
  series: StatSample[];
  requestedBuckets: number;
  /** fewer than requestedBuckets when history ran out */
  bucketCount: number;
}

const curve = { fill: "none", strokeWidth: 2 };

export const defaultGraphStyles: GraphStyles = {
  series: {
    current: createStyle({ ...curve, stroke: "#2563eb" }),
    average: createStyle({ ...curve, stroke: "#16a34a" }),
    q1: createStyle({ ...curve, stroke: "#a855f7", strokeWidth: 1 }),
    q3: createStyle({ ...curve, stroke: "#7e22ce", strokeWidth: 1 }),
  },
  region: createStyle({ stroke: "none", fill: "#a855f7", fillOpacity: 0.15 }),
  gridline: createStyle({ stroke: "#d4d4d8", fill: "none" }),
  guide: createStyle({ stroke: "#52525b", fill: "none" }),
  intervals: [
    createStyle({ stroke: "none", fill: "#f4f4f5" }),
    createStyle({ stroke: "none", fill: "#ffffff" }),
  ],
  caption: createStyle({ stroke: "none", fill: "#e4e4e7" }),
};

export const defaultGraphOptions: GraphOptions = {
  width: 840,
  height: 630,
  bucketCount: 48,
  statsDuration: 10,
  gridlines: 5,
  padding: { top: 30, right: 0, bottom: 10, left: 0 },
  division: "day",
  timeZone: "UTC",
  unit: "kW",
  styles: defaultGraphStyles,
  standalone: false,
};

/** Hides hover overlays until hovered, for SVG viewed without a host page */
export const standaloneStylesheet =
  ".graph-info{opacity:0}.graph-info:hover{opacity:1}";

/**
 * Render samples as an SVG chart of consumption, average, and quartiles.
 *
 * The series is aggregated and the axes built before any node is created.
 * Any error aborts the whole call; no partial document is returned.
 */
export function renderEnergyGraph(
  samples: Iterable<Sample>,
  options: EnergyGraphOptions = {},
): EnergyGraphResult {
  const opts = resolveOptions(options);
  const { bucketCount, statsDuration } = opts;

  // materialized: axes, overlays, and every curve index the same buckets
  const series = [...aggregateStatistics(samples, bucketCount, statsDuration)];
  const axes = graphAxes(series, opts);
  const root = buildDocument(series, axes, opts);

  return {
    svg: render(root),
    root,
    series,
    requestedBuckets: bucketCount,
    bucketCount: series.length,
  };
}

/** @return options with defaults filled in, padding and styles merged per field */
export function resolveOptions(options: EnergyGraphOptions): GraphOptions {
  return {
    ...defaultGraphOptions,
    ...options,
    padding: { ...defaultGraphOptions.padding, ...options.padding },
    styles: { ...defaultGraphOptions.styles, ...options.styles },
  };
}

/** @return transforms from timestamps and kW straight to pixels */
export function graphAxes(
  series: readonly StatSample[],
  opts: GraphOptions,
): GraphAxes {
  const { width, height, padding } = opts;
  const first = series.at(0)?.timestamp ?? Number.NaN;
  const last = series.at(-1)?.timestamp ?? Number.NaN;
  const xDisplay = AxisTransform.fromRange(padding.left, width - padding.right);
  const x = AxisTransform.fromRange(first, last).applyDisplay(xDisplay);

  // gridlines need a positive top value
  const maxValue = seriesMax(series);
  if (!(maxValue > 0)) {
    const msg = `No positive values to plot (maximum ${maxValue})`;
    throw new DegenerateRangeError(0, maxValue, msg);
  }
  const yDisplay = AxisTransform.fromRange(height - padding.bottom, padding.top);
  const y = AxisTransform.fromRange(0, maxValue).applyDisplay(yDisplay);
  return { x, y };
}

/** @return largest plotted value across the columns that bound the chart */
function seriesMax(series: readonly StatSample[]): number {
  return d3.max(series, s => Math.max(s.current, s.average, s.q3)) ?? 0;
}

/** Layers bottom to top: intervals, gridlines, band, curves, overlays */
function buildDocument(
  series: StatSample[],
  axes: GraphAxes,
  opts: GraphOptions,
): DocumentNode {
  const { width, height, styles } = opts;

  const blocks = intervalBlocks(series, axes, opts);
  const gridlines = gridlineValues(seriesMax(series), opts.gridlines).map(
    value =>
      horizontalAxis(
        axes.y.map(value),
        width,
        `${value} ${opts.unit}`,
        styles.gridline,
      ),
  );
  const band = graphRegion(series, "q1", "q3", axes, styles.region);
  const curves = statColumns.map(column =>
    graphLine(series, column, axes, styles.series[column]),
  );
  const formatTime = timeFormatter(opts.timeZone);
  const overlays = series.map((sample, i) =>
    graphInfoOverlay(sample, i, axes, {
      height,
      styles: styles.series,
      guideStyle: styles.guide,
      formatTime,
      unit: opts.unit,
    }),
  );

  const layers: SvgNode[] = [
    group(blocks, "intervals"),
    group(gridlines, "gridlines"),
    band,
    group(curves, "series"),
    group(overlays, "overlays"),
  ];
  const stylesheet = opts.standalone ? standaloneStylesheet : undefined;
  return document(width, height, layers, stylesheet);
}

/** Alternately shaded blocks between consecutive boundaries, clipped to the chart */
function intervalBlocks(
  series: readonly StatSample[],
  axes: GraphAxes,
  opts: GraphOptions,
): SvgNode[] {
  const { width, height, padding, styles } = opts;
  const first = series[0].timestamp;
  const last = series[series.length - 1].timestamp;
  const source = opts.divisions ?? divisionSource(opts.division);
  const boundaries: Division[] = [...source(first, last)];

  const left = padding.left;
  const right = width - padding.right;
  const clip = (x: number) => Math.min(right, Math.max(left, x));

  const blocks: SvgNode[] = [];
  for (let i = 0; i + 1 < boundaries.length; i++) {
    const start = boundaries[i];
    const x1 = clip(axes.x.map(start.timestamp));
    const x2 = clip(axes.x.map(boundaries[i + 1].timestamp));
    if (x2 <= x1) continue;
    const style = styles.intervals[i % 2];
    blocks.push(
      intervalBlock(x1, x2, height, start.label, style, styles.caption),
    );
  }
  return blocks;
}

/** @return hover label formatter, e.g. "Mon 3 Jun, 14:30" */
export function timeFormatter(timeZone: string): (timestamp: number) => string {
  const format = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    weekday: "short",
    day: "numeric",
    month: "short",
    hour: "2-digit",
    minute: "2-digit",
  });
  return timestamp => format.format(new Date(timestamp * 1000));
}
