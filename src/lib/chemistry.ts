import { PPM_DIVISOR } from './constants';
import { DEFAULT_CONFIG, type Markers, type OutputUnit } from './config';
import { isQualityControl } from './sampleId';
import { indexBlankStatistics } from './statistics';
import type {
  BlankStatistic,
  CorrectedMeasurement,
  CorrectionResult,
  DilutionFactor,
  SampleMeasurement,
} from './types';

// Null-fill policy for the joins below
export const DEFAULT_DILUTION_FACTOR = 1.0;
export const DEFAULT_BLANK_MEAN = 0.0;

export interface CorrectionOptions {
  outputUnit?: OutputUnit;
  markers?: Markers;
}

/**
 * Blank-subtract, apply the dilution factor and optionally convert to ppm.
 * Formula: (raw - blankMean) × df, ÷ 1000 for ppm, clamped at 0
 */
export function correctValue(
  raw: number | null,
  blankMean: number,
  dilutionFactor: number,
  outputUnit: OutputUnit
): number | null {
  if (raw === null) return null;
  let corrected = (raw - blankMean) * dilutionFactor;
  if (outputUnit === 'ppm') corrected /= PPM_DIVISOR;
  // Negative concentrations are not physical
  return Math.max(0, corrected);
}

/**
 * Join dilution factors and channel blank means onto the long table and
 * compute corrected concentrations.
 *
 * - dilution factor joined by sampleId, missing → 1.0
 * - blank mean joined by channelId, missing → 0.0
 * - ordinary samples without a factor are reported in unmatchedSamples
 */
export function correctConcentrations(
  measurements: readonly SampleMeasurement[],
  dilutionFactors: readonly DilutionFactor[],
  channelBlanks: readonly BlankStatistic[],
  options: CorrectionOptions = {}
): CorrectionResult {
  const outputUnit = options.outputUnit ?? DEFAULT_CONFIG.outputUnit;
  const markers = options.markers ?? DEFAULT_CONFIG.markers;

  const dfBySample = new Map(dilutionFactors.map((d): [string, number] => [d.sampleId, d.df]));
  const blanksByChannel = indexBlankStatistics(channelBlanks);
  const unmatched = new Set<string>();

  const table = measurements.map((m): CorrectedMeasurement => {
    const df = dfBySample.get(m.sampleId);
    if (df === undefined && !isQualityControl(m.sampleId, markers)) {
      unmatched.add(m.sampleId);
    }
    const dilutionFactor = df ?? DEFAULT_DILUTION_FACTOR;
    const blankMean = blanksByChannel.get(m.channelId)?.mean ?? DEFAULT_BLANK_MEAN;

    return {
      ...m,
      dilutionFactor,
      blankMean,
      corrected: correctValue(m.raw, blankMean, dilutionFactor, outputUnit),
    };
  });

  return { table, unmatchedSamples: Array.from(unmatched) };
}
