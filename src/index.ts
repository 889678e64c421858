export { selectDivisionInterval, gridlineValues } from "./AxisTicks.ts";
export { AxisTransform } from "./AxisTransform.ts";
export type { DivisionKind, DivisionSource } from "./calendar/Divisions.ts";
export {
  divisionKinds,
  divisionLabel,
  divisionSource,
  divisions,
  floorBoundary,
  nextBoundary,
} from "./calendar/Divisions.ts";
export type { GraphCliArgs } from "./cli/CliArgs.ts";
export { parseCliArgs } from "./cli/CliArgs.ts";
export { cliToGraphOptions, loadSamples, runGraphCli } from "./cli/RenderGraphCLI.ts";
export { formatStatsTable } from "./cli/StatsTable.ts";
export {
  DegenerateRangeError,
  InvalidInputError,
  MissingFieldError,
  UndefinedTangentError,
} from "./Errors.ts";
export type {
  EnergyGraphOptions,
  EnergyGraphResult,
  GraphOptions,
  GraphStyles,
  Padding,
} from "./graph/EnergyGraph.ts";
export {
  defaultGraphOptions,
  defaultGraphStyles,
  renderEnergyGraph,
  resolveOptions,
  standaloneStylesheet,
  timeFormatter,
} from "./graph/EnergyGraph.ts";
export type {
  GraphAxes,
  OverlayOptions,
  SeriesStyles,
} from "./graph/GraphComponents.ts";
export {
  dataPoint,
  graphInfoOverlay,
  graphLine,
  graphRegion,
  horizontalAxis,
  intervalBlock,
  projectColumn,
  regionBetween,
} from "./graph/GraphComponents.ts";
export type { ConsumptionReading, GroupBy } from "./source/Readings.ts";
export {
  groupByIntervalHours,
  parseSampleInput,
  readingsToSamples,
} from "./source/Readings.ts";
export { average, rankQuartiles } from "./StatisticalUtils.ts";
export { aggregateStatistics } from "./StatisticsAggregator.ts";
export { escapeXml, formatAttributes, formatNumber } from "./svg/Attributes.ts";
export type {
  ContainerNode,
  DataPointNode,
  DocumentNode,
  GraphInfoOverlayNode,
  GraphLineNode,
  GraphRegionNode,
  GroupNode,
  HorizontalAxisNode,
  IntervalBlockNode,
  LineNode,
  PathNode,
  RectNode,
  SvgNode,
  TextNode,
  TextOptions,
} from "./svg/Nodes.ts";
export { document, group, line, path, rect, text } from "./svg/Nodes.ts";
export type {
  PathCommand,
  PathSegment,
  Point,
  SegmentKind,
} from "./svg/PathSegment.ts";
export {
  controlPoint,
  cubicPath,
  formatCommand,
  linearPath,
  quadraticPath,
  segmentCommands,
  segmentStart,
} from "./svg/PathSegment.ts";
export { pathData, render, walkNodes } from "./svg/Render.ts";
export type { Style } from "./svg/Style.ts";
export { createStyle, defaultStyle, styleAttributes } from "./svg/Style.ts";
export type { Division, Sample, StatColumn, StatSample } from "./Types.ts";
export { statColumns } from "./Types.ts";
