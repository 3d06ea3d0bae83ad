import { describe, expect, it } from 'vitest';
import { computeRecoveries, percentRecovery } from './recovery';
import type { CalibrationTarget, CorrectedMeasurement } from './types';

const row = (
  sampleId: string,
  channelId: string,
  element: string,
  corrected: number | null
): CorrectedMeasurement => ({
  sampleId,
  acqTime: '',
  channelId,
  element,
  raw: corrected,
  dilutionFactor: 1,
  blankMean: 0,
  corrected,
});

const targets: CalibrationTarget[] = [
  { element: 'Cu', calibrationTarget: 50, referenceTarget: 30 },
  { element: 'As', calibrationTarget: null, referenceTarget: null },
];

describe('percentRecovery', () => {
  it('divides by the target', () => {
    expect(percentRecovery(90, 100)).toBe(90);
    expect(percentRecovery(89.9, 100)).toBeCloseTo(89.9, 10);
  });

  it('is undefined without a usable target or value', () => {
    expect(percentRecovery(null, 100)).toBeNull();
    expect(percentRecovery(50, null)).toBeNull();
    expect(percentRecovery(50, 0)).toBeNull();
    expect(percentRecovery(50, -5)).toBeNull();
  });
});

describe('computeRecoveries', () => {
  it('joins ICV rows to targets by element', () => {
    const { calibration } = computeRecoveries(
      [row('ICV_1', 'Cu63_He', 'Cu', 45), row('ICV_1', 'As75_He', 'As', 10), row('SOIL_1', 'Cu63_He', 'Cu', 45)],
      { calibrationTargets: targets }
    );

    expect(calibration).toHaveLength(2);
    expect(calibration[0]).toEqual({
      kind: 'calibration-verification',
      sampleId: 'ICV_1',
      channelId: 'Cu63_He',
      element: 'Cu',
      referenceName: null,
      corrected: 45,
      target: 50,
      recovery: 90,
    });
    expect(calibration[1].recovery).toBeNull();
  });

  it('falls back to the reference target column without a reference table', () => {
    const { reference } = computeRecoveries([row('SRM_DOLT-5_1', 'Cu63_He', 'Cu', 27)], {
      calibrationTargets: targets,
    });
    expect(reference[0].target).toBe(30);
    expect(reference[0].recovery).toBeCloseTo(90, 10);
  });

  it('looks up named reference values by the name in the sample id', () => {
    const { reference } = computeRecoveries(
      [row('SRM_DOLT-5_1', 'Cu63_He', 'Cu', 30), row('SRM_NIST_2710_1', 'Cu63_He', 'Cu', 2)],
      {
        calibrationTargets: targets,
        referenceValues: {
          named: true,
          values: [
            { referenceName: 'DOLT-5', element: 'Cu', targetValue: 40 },
            { referenceName: 'NIST_2710', element: 'Cu', targetValue: 2.5 },
          ],
        },
      }
    );

    expect(reference.map(r => r.referenceName)).toEqual(['DOLT-5', 'NIST_2710']);
    expect(reference[0].recovery).toBeCloseTo(75, 10);
    expect(reference[1].recovery).toBeCloseTo(80, 10);
  });

  it('prefers an explicit reference assignment', () => {
    const { reference } = computeRecoveries([row('SRM_A_1', 'Cu63_He', 'Cu', 20)], {
      calibrationTargets: targets,
      referenceValues: {
        named: true,
        values: [{ referenceName: 'DOLT-5', element: 'Cu', targetValue: 40 }],
      },
      referenceAssignments: [{ sampleId: 'SRM_A_1', referenceName: 'DOLT-5' }],
    });

    expect(reference[0].referenceName).toBe('DOLT-5');
    expect(reference[0].recovery).toBeCloseTo(50, 10);
  });

  it('leaves the recovery undefined for an unknown reference name', () => {
    const { reference } = computeRecoveries([row('SRM_UNKNOWN_1', 'Cu63_He', 'Cu', 20)], {
      calibrationTargets: targets,
      referenceValues: {
        named: true,
        values: [{ referenceName: 'DOLT-5', element: 'Cu', targetValue: 40 }],
      },
    });
    expect(reference[0].target).toBeNull();
    expect(reference[0].recovery).toBeNull();
  });

  it('joins an unnamed reference table on element', () => {
    const { reference } = computeRecoveries([row('SRM_X_1', 'Cu63_He', 'Cu', 36)], {
      calibrationTargets: targets,
      referenceValues: {
        named: false,
        values: [{ referenceName: null, element: 'Cu', targetValue: 40 }],
      },
    });
    expect(reference[0].referenceName).toBeNull();
    expect(reference[0].recovery).toBeCloseTo(90, 10);
  });

  it('only treats the reference prefix at the start of a sample id', () => {
    const { reference } = computeRecoveries([row('X_SRM_1', 'Cu63_He', 'Cu', 36)], {
      calibrationTargets: targets,
    });
    expect(reference).toEqual([]);
  });
});
