/** @return mean of values */
export function average(values: readonly number[]): number {
  const sum = values.reduce((a, b) => a + b, 0);
  return sum / values.length;
}

/**
 * @return first and third quartiles by rank, without interpolation:
 *   sorted[⌊n/4⌋] and sorted[n - 1 - ⌊n/4⌋]
 */
export function rankQuartiles(values: readonly number[]): [number, number] {
  const sorted = [...values].sort((a, b) => a - b);
  const offset = Math.floor(sorted.length / 4);
  return [sorted[offset], sorted[sorted.length - 1 - offset]];
}
