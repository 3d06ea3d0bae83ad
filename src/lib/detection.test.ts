import { describe, expect, it } from 'vitest';
import { classifyBelowDetection, isBelowDetection } from './detection';
import type { BlankStatistic, SampleMeasurement } from './types';

const measurement = (
  sampleId: string,
  channelId: string,
  element: string,
  raw: number | null
): SampleMeasurement => ({ sampleId, acqTime: '', channelId, element, raw });

const elementStat = (key: string, mean: number, detectionLimit: number | null): BlankStatistic => ({
  scope: 'element',
  key,
  mean,
  standardDeviation: detectionLimit === null ? null : detectionLimit / 3,
  detectionLimit,
  sampleCount: 2,
});

describe('isBelowDetection', () => {
  it('is strict at the detection limit', () => {
    expect(isBelowDetection(8, 2, 6)).toBe(false);
    expect(isBelowDetection(8 - 1e-9, 2, 6)).toBe(true);
    expect(isBelowDetection(7.5, 2, 6)).toBe(true);
  });

  it('never flags without a limit or a value', () => {
    expect(isBelowDetection(0, 2, null)).toBe(false);
    expect(isBelowDetection(null, 2, 6)).toBe(false);
  });
});

describe('classifyBelowDetection', () => {
  it('uses the element blank mean and limit', () => {
    const records = classifyBelowDetection(
      [
        measurement('S1', 'Cu63_He', 'Cu', 7.5),
        measurement('S2', 'Cu63_He', 'Cu', 8),
        measurement('S3', 'As75_He', 'As', 0),
        measurement('S4', 'Cu65_He', 'Cu', null),
        measurement('S5', 'Zn66_He', 'Zn', 0),
      ],
      [elementStat('Cu', 2, 6), elementStat('As', 1, null)]
    );

    expect(records).toEqual([
      { sampleId: 'S1', element: 'Cu', channelId: 'Cu63_He', raw: 7.5, blankMean: 2, detectionLimit: 6 },
    ]);
  });
});
