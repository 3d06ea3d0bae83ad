import { describe, expect, it } from 'vitest';
import { computeBlankStatistics, meanAndSD } from './statistics';
import type { SampleMeasurement } from './types';

const measurement = (
  sampleId: string,
  channelId: string,
  element: string,
  raw: number | null
): SampleMeasurement => ({ sampleId, acqTime: '', channelId, element, raw });

describe('meanAndSD', () => {
  it('handles empty and single-value input', () => {
    expect(meanAndSD([])).toEqual({ mean: null, std: null, count: 0 });
    expect(meanAndSD([4])).toEqual({ mean: 4, std: null, count: 1 });
  });

  it('uses the sample standard deviation', () => {
    const stats = meanAndSD([2, 4, 4, 4, 5, 5, 7, 9]);
    expect(stats.mean).toBe(5);
    expect(stats.std).toBeCloseTo(2.13809, 5);
    expect(stats.count).toBe(8);
  });
});

describe('computeBlankStatistics', () => {
  const measurements = [
    measurement('BLANK_1', 'Cu63_He', 'Cu', 1),
    measurement('BLANK_2', 'Cu63_He', 'Cu', 3),
    measurement('BLANK_1', 'Cu65_He', 'Cu', 2),
    measurement('BLANK_2', 'Cu65_He', 'Cu', null),
    measurement('SOIL_1', 'Cu63_He', 'Cu', 100),
    measurement('BLANK_1', 'As75_He', 'As', 0.5),
  ];
  const stats = computeBlankStatistics(measurements);
  const channel = (key: string) => stats.channel.find(s => s.key === key);
  const element = (key: string) => stats.element.find(s => s.key === key);

  it('computes channel statistics over blank rows only', () => {
    const cu63 = channel('Cu63_He');
    expect(cu63?.mean).toBe(2);
    expect(cu63?.standardDeviation).toBeCloseTo(Math.SQRT2, 10);
    expect(cu63?.detectionLimit).toBeCloseTo(3 * Math.SQRT2, 10);
    expect(cu63?.sampleCount).toBe(2);
  });

  it('leaves SD and detection limit undefined below two values', () => {
    expect(channel('Cu65_He')).toEqual({
      scope: 'channel',
      key: 'Cu65_He',
      mean: 2,
      standardDeviation: null,
      detectionLimit: null,
      sampleCount: 1,
    });
  });

  it('pools channels of an element', () => {
    expect(element('Cu')).toEqual({
      scope: 'element',
      key: 'Cu',
      mean: 2,
      standardDeviation: 1,
      detectionLimit: 3,
      sampleCount: 3,
    });
    expect(element('As')?.detectionLimit).toBeNull();
  });

  it('keeps a blank channel with no numeric values', () => {
    const empty = computeBlankStatistics([measurement('BLANK_1', 'Pb208_He', 'Pb', null)]);
    expect(empty.channel).toEqual([
      {
        scope: 'channel',
        key: 'Pb208_He',
        mean: null,
        standardDeviation: null,
        detectionLimit: null,
        sampleCount: 0,
      },
    ]);
  });
});
