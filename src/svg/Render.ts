import { escapeXml, formatAttributes, formatNumber } from "./Attributes.ts";
import {
  group,
  isContainer,
  line,
  path,
  rect,
  type SvgNode,
  text,
} from "./Nodes.ts";
import {
  formatCommand,
  type PathCommand,
  type PathSegment,
  segmentCommands,
  segmentStart,
} from "./PathSegment.ts";
import { styleAttributes } from "./Style.ts";

export const svgNamespace = "http://www.w3.org/2000/svg";

/** CSS class on the root element, for host page styling */
export const documentClass = "energy-graph";

/** @return markup for the node and its descendants, depth first */
export function render(node: SvgNode): string {
  switch (node.kind) {
    case "document": {
      const { width, height, stylesheet } = node;
      const attrs = formatAttributes({
        version: "1.1",
        width,
        height,
        viewBox: `0 0 ${formatNumber(width)} ${formatNumber(height)}`,
        xmlns: svgNamespace,
        class: documentClass,
      });
      const style =
        stylesheet === undefined ? "" : `<style>${escapeXml(stylesheet)}</style>`;
      return `<svg${attrs}>${style}${renderChildren(node.children)}</svg>`;
    }
    case "group": {
      const attrs = formatAttributes({ class: node.className });
      return `<g${attrs}>${renderChildren(node.children)}</g>`;
    }
    case "rect": {
      const { x, y, width, height } = node;
      const attrs = { ...styleAttributes(node.style), x, y, width, height };
      return `<rect${formatAttributes(attrs)}/>`;
    }
    case "line": {
      const { x1, y1, x2, y2 } = node;
      const attrs = { ...styleAttributes(node.style), x1, y1, x2, y2 };
      return `<line${formatAttributes(attrs)}/>`;
    }
    case "text": {
      const attrs = formatAttributes({
        x: node.x,
        y: node.y,
        class: node.className,
        "text-anchor": node.anchor,
        fill: node.fill,
      });
      return `<text${attrs}>${escapeXml(node.content)}</text>`;
    }
    case "path": {
      const d = pathData(node.segments, node.closed);
      const attrs = { ...styleAttributes(node.style), d };
      return `<path${formatAttributes(attrs)}/>`;
    }
    case "dataPoint": {
      const { x: cx, y: cy, radius: r } = node;
      const attrs = { ...styleAttributes(node.style), cx, cy, r };
      const title = `<title>${escapeXml(node.title)}</title>`;
      return `<circle${formatAttributes(attrs)}>${title}</circle>`;
    }
    case "intervalBlock":
    case "horizontalAxis":
    case "graphLine":
    case "graphRegion":
    case "graphInfoOverlay":
      return render(expand(node));
  }
}

type CompositeNode = Extract<
  SvgNode,
  {
    kind:
      | "intervalBlock"
      | "horizontalAxis"
      | "graphLine"
      | "graphRegion"
      | "graphInfoOverlay";
  }
>;

/** @return primitive nodes a composite is drawn with */
function expand(node: CompositeNode): SvgNode {
  switch (node.kind) {
    case "intervalBlock": {
      const { x1, x2, height, captionHeight } = node;
      const width = x2 - x1;
      const caption = text(x1 + width / 2, captionHeight - 6, node.label, {
        className: "interval-label",
        anchor: "middle",
      });
      return group(
        [
          rect(x1, 0, width, height, node.style),
          rect(x1, 0, width, captionHeight, node.captionStyle),
          caption,
        ],
        "interval-block",
      );
    }
    case "horizontalAxis": {
      const { y, width } = node;
      const label = text(4, y - 4, node.label, { className: "gridline-label" });
      return group([line(0, y, width, y, node.style), label], "gridline");
    }
    case "graphLine":
      return path(node.style, [node.segment]);
    case "graphRegion":
      return path(node.style, [node.lower, node.upper], true);
    case "graphInfoOverlay":
      return group(node.children, "graph-info");
  }
}

/** @return concatenated markup of children, in insertion order */
export function renderChildren(children: readonly SvgNode[]): string {
  return children.map(render).join("");
}

/** @return path data: a move to the first segment, later segments joined by lines */
export function pathData(
  segments: readonly PathSegment[],
  closed = false,
): string {
  const commands: PathCommand[] = [];
  segments.forEach((segment, i) => {
    const to = segmentStart(segment);
    commands.push(i === 0 ? { type: "M", to } : { type: "L", to });
    commands.push(...segmentCommands(segment));
  });
  if (closed && commands.length) commands.push({ type: "Z" });
  return commands.map(formatCommand).join(" ");
}

/** @return every node in the tree, depth first, parents before children */
export function* walkNodes(node: SvgNode): Generator<SvgNode> {
  yield node;
  if (isContainer(node)) {
    for (const child of node.children) yield* walkNodes(child);
  }
}
