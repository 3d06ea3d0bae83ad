/**
 * Blank statistics and detection limits
 */

import { DETECTION_LIMIT_MULTIPLIER } from './constants';
import { DEFAULT_CONFIG, type Markers } from './config';
import { isBlank } from './sampleId';
import type { BlankScope, BlankStatistic, BlankStatistics, SampleMeasurement } from './types';

export interface SummaryStatistics {
  mean: number | null;
  std: number | null;
  count: number;
}

/**
 * Mean and sample standard deviation (n - 1).
 * std is null below two values, mean is null for none.
 */
export function meanAndSD(values: readonly number[]): SummaryStatistics {
  const n = values.length;
  if (n === 0) return { mean: null, std: null, count: 0 };

  const mean = values.reduce((a, b) => a + b, 0) / n;
  if (n === 1) return { mean, std: null, count: 1 };

  const squaredDiffs = values.map(v => Math.pow(v - mean, 2));
  const variance = squaredDiffs.reduce((a, b) => a + b, 0) / (n - 1);

  return { mean, std: Math.sqrt(variance), count: n };
}

function groupBlankValues(
  blanks: readonly SampleMeasurement[],
  keyOf: (m: SampleMeasurement) => string
): Map<string, number[]> {
  const groups = new Map<string, number[]>();
  for (const m of blanks) {
    const key = keyOf(m);
    if (!groups.has(key)) groups.set(key, []);
    if (m.raw !== null) groups.get(key)?.push(m.raw);
  }
  return groups;
}

function toBlankStatistic(scope: BlankScope, key: string, values: readonly number[]): BlankStatistic {
  const { mean, std, count } = meanAndSD(values);
  return {
    scope,
    key,
    mean,
    standardDeviation: std,
    detectionLimit: std === null ? null : DETECTION_LIMIT_MULTIPLIER * std,
    sampleCount: count,
  };
}

/**
 * Blank mean, SD and MDL (3 × SD) per channel and per element.
 * Blank rows are those whose sample id contains the blank marker;
 * missing raw values are left out of every statistic.
 */
export function computeBlankStatistics(
  measurements: readonly SampleMeasurement[],
  markers: Markers = DEFAULT_CONFIG.markers
): BlankStatistics {
  const blanks = measurements.filter(m => isBlank(m.sampleId, markers));

  const channel = Array.from(groupBlankValues(blanks, m => m.channelId), ([key, values]) =>
    toBlankStatistic('channel', key, values)
  );
  const element = Array.from(groupBlankValues(blanks, m => m.element), ([key, values]) =>
    toBlankStatistic('element', key, values)
  );

  return { channel, element };
}

/**
 * Key → statistic lookup for joins.
 */
export function indexBlankStatistics(stats: readonly BlankStatistic[]): Map<string, BlankStatistic> {
  return new Map(stats.map((s): [string, BlankStatistic] => [s.key, s]));
}
