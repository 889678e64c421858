import { DegenerateRangeError } from "./Errors.ts";

const mantissas = [1, 0.5, 0.2];

/**
 * @return gridline spacing from the 1/2/5 series: the finest interval that
 *   still divides [0, max] into no more than desiredIntervals divisions
 */
export function selectDivisionInterval(
  max: number,
  desiredIntervals: number,
): number {
  if (!Number.isFinite(max) || max <= 0) {
    throw new DegenerateRangeError(0, max);
  }
  if (!Number.isFinite(desiredIntervals)) {
    throw new RangeError(`Invalid interval count: ${desiredIntervals}`);
  }

  let previous: number | undefined;
  for (let k = Math.ceil(Math.log10(max)); ; k--) {
    const magnitude = 10 ** k;
    for (const mantissa of mantissas) {
      const interval = mantissa * magnitude;
      if (max / interval > desiredIntervals) return previous ?? interval;
      previous = interval;
    }
  }
}

/** @return gridline values at multiples of the selected interval, 0 excluded */
export function gridlineValues(max: number, desiredIntervals: number): number[] {
  const interval = selectDivisionInterval(max, desiredIntervals);
  const count = Math.floor(max / interval + 1e-9);
  return Array.from({ length: count }, (_, i) => roundTo((i + 1) * interval));
}

/** Strip float noise from products like 3 * 0.1 */
function roundTo(value: number, digits = 10): number {
  return Number(value.toFixed(digits));
}
