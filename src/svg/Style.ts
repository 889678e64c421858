import type { AttributeValue } from "./Attributes.ts";

/** Stroke and fill properties shared by many nodes */
export interface Style {
  readonly stroke: string;
  readonly fill: string;
  readonly strokeWidth: number;
  readonly strokeOpacity: number;
  readonly fillOpacity: number;
}

export const defaultStyle: Style = Object.freeze({
  stroke: "black",
  fill: "black",
  strokeWidth: 1,
  strokeOpacity: 1,
  fillOpacity: 1,
});

/** @return frozen style with defaults for unspecified properties */
export function createStyle(style: Partial<Style> = {}): Style {
  return Object.freeze({ ...defaultStyle, ...style });
}

/** @return presentation attributes for a styled element */
export function styleAttributes(style: Style): Record<string, AttributeValue> {
  return {
    stroke: style.stroke,
    fill: style.fill,
    "stroke-width": style.strokeWidth,
    "stroke-opacity": style.strokeOpacity,
    "fill-opacity": style.fillOpacity,
  };
}
