import type { StatColumn } from "../Types.ts";
import type { PathSegment } from "./PathSegment.ts";
import type { Style } from "./Style.ts";

/** Anything that can be rendered into the SVG document */
export type SvgNode =
  | DocumentNode
  | GroupNode
  | RectNode
  | LineNode
  | TextNode
  | PathNode
  | DataPointNode
  | IntervalBlockNode
  | HorizontalAxisNode
  | GraphLineNode
  | GraphRegionNode
  | GraphInfoOverlayNode;

/** Nodes owning an ordered child list, fixed at construction */
export type ContainerNode = DocumentNode | GroupNode | GraphInfoOverlayNode;

export interface DocumentNode {
  readonly kind: "document";
  readonly width: number;
  readonly height: number;
  readonly children: readonly SvgNode[];
  /** CSS embedded ahead of the children */
  readonly stylesheet?: string;
}

export interface GroupNode {
  readonly kind: "group";
  readonly className?: string;
  readonly children: readonly SvgNode[];
}

export interface RectNode {
  readonly kind: "rect";
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly style: Style;
}

export interface LineNode {
  readonly kind: "line";
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;
  readonly style: Style;
}

export interface TextOptions {
  className?: string;
  anchor?: "start" | "middle" | "end";
  fill?: string;
}

export interface TextNode extends Readonly<TextOptions> {
  readonly kind: "text";
  readonly x: number;
  readonly y: number;
  readonly content: string;
}

export interface PathNode {
  readonly kind: "path";
  readonly style: Style;
  readonly segments: readonly PathSegment[];
  /** close the outline back to the first point */
  readonly closed: boolean;
}

/** Hover marker: a circle with a tooltip */
export interface DataPointNode {
  readonly kind: "dataPoint";
  readonly x: number;
  readonly y: number;
  readonly radius: number;
  readonly style: Style;
  readonly title: string;
}

/** Shaded calendar period with a caption bar along the top */
export interface IntervalBlockNode {
  readonly kind: "intervalBlock";
  readonly x1: number;
  readonly x2: number;
  readonly height: number;
  readonly captionHeight: number;
  readonly label: string;
  readonly style: Style;
  readonly captionStyle: Style;
}

/** Gridline across the chart with its value label */
export interface HorizontalAxisNode {
  readonly kind: "horizontalAxis";
  readonly y: number;
  readonly width: number;
  readonly label: string;
  readonly style: Style;
}

/** One statistic column drawn as a smooth curve */
export interface GraphLineNode {
  readonly kind: "graphLine";
  readonly column: StatColumn;
  readonly style: Style;
  readonly segment: PathSegment;
}

/** Shaded band between two statistic columns */
export interface GraphRegionNode {
  readonly kind: "graphRegion";
  readonly style: Style;
  /** lower bound, already reversed to run right to left */
  readonly lower: PathSegment;
  readonly upper: PathSegment;
}

/** Static hover details for one bucket, shown by the host page via CSS */
export interface GraphInfoOverlayNode {
  readonly kind: "graphInfoOverlay";
  readonly timestamp: number;
  readonly children: readonly SvgNode[];
}

export function document(
  width: number,
  height: number,
  children: readonly SvgNode[] = [],
  stylesheet?: string,
): DocumentNode {
  return { kind: "document", width, height, children: [...children], stylesheet };
}

export function group(
  children: readonly SvgNode[],
  className?: string,
): GroupNode {
  return { kind: "group", className, children: [...children] };
}

export function rect(
  x: number,
  y: number,
  width: number,
  height: number,
  style: Style,
): RectNode {
  return { kind: "rect", x, y, width, height, style };
}

export function line(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  style: Style,
): LineNode {
  return { kind: "line", x1, y1, x2, y2, style };
}

export function text(
  x: number,
  y: number,
  content: string,
  options: TextOptions = {},
): TextNode {
  return { kind: "text", x, y, content, ...options };
}

export function path(
  style: Style,
  segments: readonly PathSegment[],
  closed = false,
): PathNode {
  return { kind: "path", style, segments: [...segments], closed };
}

/** @return true for nodes that own children */
export function isContainer(node: SvgNode): node is ContainerNode {
  return (
    node.kind === "document" ||
    node.kind === "group" ||
    node.kind === "graphInfoOverlay"
  );
}
