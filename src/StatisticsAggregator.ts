import { average, rankQuartiles } from "./StatisticalUtils.ts";
import type { Sample, StatSample } from "./Types.ts";

/**
 * Summarize an over-fetched series into per-bucket statistics.
 *
 * Bucket i collects the samples at newest-first indices i, i + n, i + 2n, …
 * (n = desiredBucketCount): the same position within each earlier period.
 * The samples are materialized once so they can be indexed by stride.
 *
 * Buckets are yielded oldest position first, so timestamps ascend. When
 * fewer than n samples are available the sequence is shorter than n; that
 * is the normal end of history, not an error.
 *
 * @param samples ordered oldest to newest
 * @param statsDuration maximum number of periods in each window: a positive
 *   integer, or Infinity for the whole history
 */
export function* aggregateStatistics(
  samples: Iterable<Sample>,
  desiredBucketCount: number,
  statsDuration = Number.POSITIVE_INFINITY,
): Generator<StatSample> {
  if (!Number.isInteger(desiredBucketCount) || desiredBucketCount < 1) {
    throw new RangeError(`Invalid bucket count: ${desiredBucketCount}`);
  }
  const unbounded = statsDuration === Number.POSITIVE_INFINITY;
  if (!unbounded && !(Number.isInteger(statsDuration) && statsDuration >= 1)) {
    throw new RangeError(`Invalid stats duration: ${statsDuration}`);
  }
  const newestFirst = [...samples].reverse();
  const bucketCount = Math.min(desiredBucketCount, newestFirst.length);

  for (let i = bucketCount - 1; i >= 0; i--) {
    const window = strideWindow(
      newestFirst,
      i,
      desiredBucketCount,
      statsDuration,
    );
    if (window.length === 0) return;
    yield summarize(window);
  }
}

/** @return samples at offset, offset + stride, … (at most maxPeriods) */
function strideWindow(
  samples: readonly Sample[],
  offset: number,
  stride: number,
  maxPeriods: number,
): Sample[] {
  const window: Sample[] = [];
  for (
    let index = offset;
    index < samples.length && window.length < maxPeriods;
    index += stride
  ) {
    window.push(samples[index]);
  }
  return window;
}

/** @return statistics for one non-empty window, newest sample first */
function summarize(window: readonly Sample[]): StatSample {
  const [latest] = window;
  const values = window.map(s => s.value);
  const [q1, q3] = rankQuartiles(values);
  return {
    timestamp: latest.timestamp,
    current: latest.value,
    average: average(values),
    q1,
    q3,
  };
}
