/** Power sample from the data source: unix seconds and average kW */
export interface Sample {
  timestamp: number;
  value: number;
}

/** Summary statistics for one output bucket */
export interface StatSample {
  timestamp: number;
  /** most recent value at this position in the period */
  current: number;
  average: number;
  q1: number;
  q3: number;
}

/** Numeric columns of a StatSample that can be plotted */
export type StatColumn = Exclude<keyof StatSample, "timestamp">;

export const statColumns: readonly StatColumn[] = [
  "current",
  "average",
  "q1",
  "q3",
];

/** Calendar-aligned breakpoint on the time axis */
export interface Division {
  timestamp: number;
  label: string;
}
