import { indexBlankStatistics } from './statistics';
import type { BelowDetectionRecord, BlankStatistic, SampleMeasurement } from './types';

/**
 * Below detection iff (raw - blankMean) < detectionLimit, strictly.
 * An undefined limit or a missing raw value never flags.
 */
export function isBelowDetection(
  raw: number | null,
  blankMean: number,
  detectionLimit: number | null
): boolean {
  if (raw === null || detectionLimit === null) return false;
  return raw - blankMean < detectionLimit;
}

/**
 * Rows falling under their element's detection limit, with the values used to decide.
 */
export function classifyBelowDetection(
  measurements: readonly SampleMeasurement[],
  elementBlanks: readonly BlankStatistic[]
): BelowDetectionRecord[] {
  const byElement = indexBlankStatistics(elementBlanks);
  const records: BelowDetectionRecord[] = [];

  for (const m of measurements) {
    const stat = byElement.get(m.element);
    const blankMean = stat?.mean ?? 0;
    const detectionLimit = stat?.detectionLimit ?? null;
    if (m.raw === null || detectionLimit === null) continue;
    if (!isBelowDetection(m.raw, blankMean, detectionLimit)) continue;

    records.push({
      sampleId: m.sampleId,
      element: m.element,
      channelId: m.channelId,
      raw: m.raw,
      blankMean,
      detectionLimit,
    });
  }

  return records;
}
