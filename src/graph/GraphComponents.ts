import type { AxisTransform } from "../AxisTransform.ts";
import { MissingFieldError } from "../Errors.ts";
import type {
  DataPointNode,
  GraphInfoOverlayNode,
  GraphLineNode,
  GraphRegionNode,
  HorizontalAxisNode,
  IntervalBlockNode,
  SvgNode,
} from "../svg/Nodes.ts";
import { line, text } from "../svg/Nodes.ts";
import { cubicPath, type Point } from "../svg/PathSegment.ts";
import type { Style } from "../svg/Style.ts";
import { type StatColumn, type StatSample, statColumns } from "../Types.ts";

/** Data to device transforms for both axes */
export interface GraphAxes {
  x: AxisTransform;
  y: AxisTransform;
}

export type SeriesStyles = Readonly<Record<StatColumn, Style>>;

export const columnLabels: Readonly<Record<StatColumn, string>> = {
  current: "Consumption",
  average: "Average",
  q1: "Q1",
  q3: "Q3",
};

export function dataPoint(
  x: number,
  y: number,
  radius: number,
  style: Style,
  title: string,
): DataPointNode {
  return { kind: "dataPoint", x, y, radius, style, title };
}

export function intervalBlock(
  x1: number,
  x2: number,
  height: number,
  label: string,
  style: Style,
  captionStyle: Style,
  captionHeight = 20,
): IntervalBlockNode {
  return {
    kind: "intervalBlock",
    x1,
    x2,
    height,
    captionHeight,
    label,
    style,
    captionStyle,
  };
}

export function horizontalAxis(
  y: number,
  width: number,
  label: string,
  style: Style,
): HorizontalAxisNode {
  return { kind: "horizontalAxis", y, width, label, style };
}

/** Curve through one column of the series */
export function graphLine(
  series: readonly StatSample[],
  column: StatColumn,
  axes: GraphAxes,
  style: Style,
): GraphLineNode {
  const segment = cubicPath(projectColumn(series, column, axes));
  return { kind: "graphLine", column, style, segment };
}

/** Band between a lower and an upper column of the series */
export function graphRegion(
  series: readonly StatSample[],
  lower: StatColumn,
  upper: StatColumn,
  axes: GraphAxes,
  style: Style,
): GraphRegionNode {
  const lowerPoints = projectColumn(series, lower, axes);
  const upperPoints = projectColumn(series, upper, axes);
  return regionBetween(lowerPoints, upperPoints, style);
}

/**
 * Closed band: the lower bound right to left, then the upper bound left to
 * right, so the outline runs around the area between them.
 */
export function regionBetween(
  lower: readonly Point[],
  upper: readonly Point[],
  style: Style,
): GraphRegionNode {
  return {
    kind: "graphRegion",
    style,
    lower: cubicPath([...lower].reverse()),
    upper: cubicPath(upper),
  };
}

export interface OverlayOptions {
  height: number;
  styles: SeriesStyles;
  guideStyle: Style;
  formatTime: (timestamp: number) => string;
  unit: string;
  radius?: number;
}

/** Guide line, time label, and a marker and label per column for one bucket */
export function graphInfoOverlay(
  sample: StatSample,
  index: number,
  axes: GraphAxes,
  options: OverlayOptions,
): GraphInfoOverlayNode {
  const { height, styles, guideStyle, formatTime, unit, radius = 3 } = options;
  const x = axes.x.map(readTimestamp(sample, index));

  const children: SvgNode[] = [
    line(x, 0, x, height, guideStyle),
    text(x + 4, height - 4, formatTime(sample.timestamp), {
      className: "graph-info-time",
    }),
  ];
  for (const column of statColumns) {
    const value = readColumn(sample, column, index);
    const y = axes.y.map(value);
    const style = styles[column];
    const label = `${columnLabels[column]}: ${formatPower(value)} ${unit}`;
    children.push(dataPoint(x, y, radius, style, label));
    children.push(
      text(x + 6, y - 6, label, {
        className: `graph-info-${column}`,
        fill: style.stroke,
      }),
    );
  }
  return { kind: "graphInfoOverlay", timestamp: sample.timestamp, children };
}

/** @return device points for one column */
export function projectColumn(
  series: readonly StatSample[],
  column: StatColumn,
  axes: GraphAxes,
): Point[] {
  return series.map((sample, i) => ({
    x: axes.x.map(readTimestamp(sample, i)),
    y: axes.y.map(readColumn(sample, column, i)),
  }));
}

/** @return column value, failing for absent or non-numeric values */
export function readColumn(
  sample: StatSample,
  column: StatColumn,
  index: number,
): number {
  const value: unknown = sample[column];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new MissingFieldError(column, index);
  }
  return value;
}

function readTimestamp(sample: StatSample, index: number): number {
  const value: unknown = sample.timestamp;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new MissingFieldError("timestamp", index);
  }
  return value;
}

/** @return power with two decimals */
export function formatPower(value: number): string {
  return value.toFixed(2);
}
