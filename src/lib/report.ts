/**
 * Result tables handed to the report writer.
 */

import { DEFAULT_CONFIG, type Markers } from './config';
import { classifySample, isBlank } from './sampleId';
import type {
  BatchSummary,
  BelowDetectionRecord,
  ChannelDescriptor,
  ChannelSelection,
  CorrectedMeasurement,
  RecoveryTables,
  WideSampleRow,
} from './types';

/**
 * Corrected rows of ordinary samples (no blanks, ICV/ICB, reference material or duplicates).
 */
export function sampleResults(
  corrected: readonly CorrectedMeasurement[],
  markers: Markers = DEFAULT_CONFIG.markers
): CorrectedMeasurement[] {
  return corrected.filter(m => classifySample(m.sampleId, markers) === 'sample');
}

/**
 * Channel used for each element in the wide table: the QC selection, or the
 * first channel by id when QC could not decide.
 */
export function reportingChannels(
  channels: readonly ChannelDescriptor[],
  selections: readonly ChannelSelection[]
): Map<string, string> {
  const chosen = new Map<string, string>();
  for (const s of selections) {
    if (s.selectedChannelId !== null) chosen.set(s.element, s.selectedChannelId);
  }

  const sortedIds = channels.map(c => c.channelId).sort();
  const elementOf = new Map(channels.map((c): [string, string] => [c.channelId, c.element]));
  for (const id of sortedIds) {
    const element = elementOf.get(id);
    if (element !== undefined && !chosen.has(element)) chosen.set(element, id);
  }
  return chosen;
}

const cellKey = (sampleId: string, channelId: string) => `${sampleId}\u0000${channelId}`;

/**
 * One row per sample, one column per element.
 */
export function pivotByElement(
  rows: readonly CorrectedMeasurement[],
  channels: readonly ChannelDescriptor[],
  selections: readonly ChannelSelection[],
  belowDetection: readonly BelowDetectionRecord[],
  unmatchedSamples: readonly string[]
): WideSampleRow[] {
  const chosen = reportingChannels(channels, selections);
  const elements = Array.from(new Set(channels.map(c => c.element)));
  const unmatched = new Set(unmatchedSamples);
  const bdl = new Set(belowDetection.map(r => cellKey(r.sampleId, r.channelId)));

  // first value wins when a sample id repeats
  const values = new Map<string, number | null>();
  const sampleOrder: string[] = [];
  const seenSamples = new Set<string>();
  for (const m of rows) {
    if (!seenSamples.has(m.sampleId)) {
      seenSamples.add(m.sampleId);
      sampleOrder.push(m.sampleId);
    }
    const key = cellKey(m.sampleId, m.channelId);
    if (!values.has(key)) values.set(key, m.corrected);
  }

  return sampleOrder.map(sampleId => {
    const row: WideSampleRow = {
      sampleId,
      values: {},
      channels: {},
      belowDetection: [],
      unmatched: unmatched.has(sampleId),
    };
    for (const element of elements) {
      const channelId = chosen.get(element);
      if (channelId === undefined) continue;
      row.channels[element] = channelId;
      row.values[element] = values.get(cellKey(sampleId, channelId)) ?? null;
      if (bdl.has(cellKey(sampleId, channelId))) row.belowDetection.push(element);
    }
    return row;
  });
}

const uniqueCount = (ids: Iterable<string>) => new Set(ids).size;

const passRate = (passed: number, total: number) => (total > 0 ? (passed / total) * 100 : 0);

export function summarizeBatch(
  corrected: readonly CorrectedMeasurement[],
  samples: readonly CorrectedMeasurement[],
  recoveries: RecoveryTables,
  selections: readonly ChannelSelection[],
  unmatchedSamples: readonly string[],
  markers: Markers = DEFAULT_CONFIG.markers
): BatchSummary {
  return {
    totalSamples: uniqueCount(samples.map(m => m.sampleId)),
    totalCalibrationVerification: uniqueCount(recoveries.calibration.map(r => r.sampleId)),
    totalReference: uniqueCount(recoveries.reference.map(r => r.sampleId)),
    totalBlanks: uniqueCount(corrected.filter(m => isBlank(m.sampleId, markers)).map(m => m.sampleId)),
    calibrationPassRate: passRate(selections.filter(s => s.calibrationPass).length, selections.length),
    referencePassRate: passRate(selections.filter(s => s.referencePass).length, selections.length),
    elementsAnalyzed: selections.length,
    unmatchedSamples: [...unmatchedSamples],
  };
}
