import { describe, expect, it } from 'vitest';
import { batchInputs } from '@/test/batchFixture';
import { ConfigError, HeaderCollisionError, SchemaError } from './errors';
import { Logger } from './logger';
import { processBatch } from './pipeline';
import { csvSource } from './tables';

const quiet = new Logger({ level: 'error', service: 'test', pretty: true });

describe('processBatch', () => {
  const result = processBatch(batchInputs(), { config: { outputUnit: 'ppb' }, logger: quiet });

  it('parses the instrument channels', () => {
    expect(result.channels.map(c => c.channelId)).toEqual(['Cu63_He', 'As75_He', 'As75to91_O2']);
    expect(result.measurements).toHaveLength(18);
  });

  it('selects the interference-free arsenic channel', () => {
    const bySelection = Object.fromEntries(
      result.selections.map(s => [s.element, [s.selectedChannelId, s.basis]])
    );
    expect(bySelection).toEqual({
      Cu: ['Cu63_He', 'passed-both'],
      As: ['As75to91_O2', 'passed-both'],
    });

    const arsenic = result.selections.find(s => s.element === 'As');
    expect(arsenic?.calibrationRecovery).toBeCloseTo(98, 6);
    expect(arsenic?.referenceRecovery).toBeCloseTo(101, 6);
  });

  it('reports samples in the wide table', () => {
    expect(result.wide).toHaveLength(2);
    const [soil1, soil2] = result.wide;

    expect(soil1).toEqual({
      sampleId: 'SOIL_01',
      values: { Cu: 20, As: 10 },
      channels: { Cu: 'Cu63_He', As: 'As75to91_O2' },
      belowDetection: [],
      unmatched: false,
    });

    expect(soil2.sampleId).toBe('SOIL_02');
    expect(soil2.values.Cu).toBe(0);
    expect(soil2.values.As).toBeCloseTo(0.1, 10);
    expect(soil2.belowDetection).toEqual(['Cu', 'As']);
    expect(soil2.unmatched).toBe(true);
  });

  it('excludes QC rows from sample results', () => {
    expect(new Set(result.sampleResults.map(r => r.sampleId))).toEqual(
      new Set(['SOIL_01', 'SOIL_02'])
    );
    expect(result.sampleResults).toHaveLength(6);
  });

  it('summarizes the batch', () => {
    expect(result.summary).toEqual({
      totalSamples: 2,
      totalCalibrationVerification: 1,
      totalReference: 1,
      totalBlanks: 2,
      calibrationPassRate: 100,
      referencePassRate: 100,
      elementsAnalyzed: 2,
      unmatchedSamples: ['SOIL_02'],
    });
  });

  it('records non-fatal anomalies as diagnostics', () => {
    const warnings = result.diagnostics.filter(d => d.level === 'warn');
    expect(warnings.map(d => [d.stage, d.message])).toEqual([
      ['channels', "Skipping column 'Bad Column': not a channel header"],
      ['correction', '1 samples not found in dilution factor table (using df=1.0)'],
    ]);
  });

  it('records the below-detection count', () => {
    expect(result.belowDetection).toHaveLength(8);
    expect(result.diagnostics.find(d => d.stage === 'detection')).toEqual({
      stage: 'detection',
      level: 'info',
      message: '8 values below the detection limit',
      context: { samples: 3 },
    });
  });

  it('converts to ppm by default', () => {
    const ppm = processBatch(batchInputs(), { logger: quiet });
    expect(ppm.config.outputUnit).toBe('ppm');
    expect(ppm.wide[0].values.Cu).toBe(0.02);
  });

  it('falls back to the reference target column without a reference table', () => {
    const withoutReference = processBatch(
      batchInputs({
        referenceValues: null,
        calibrationTargets: csvSource('element,icv_target,ref_target\nCu,50,40\nAs,50,20\n'),
      }),
      { config: { outputUnit: 'ppb' }, logger: quiet }
    );
    expect(withoutReference.selections.map(s => s.selectedChannelId)).toEqual([
      'Cu63_He',
      'As75to91_O2',
    ]);
  });

  it('fails on a calibration table without targets', () => {
    expect(() =>
      processBatch(batchInputs({ calibrationTargets: csvSource('element,target\nCu,1') }), {
        logger: quiet,
      })
    ).toThrow(SchemaError);
  });

  it('fails when two headers name the same channel', () => {
    const instrumentExport = csvSource(
      'Time,Sample,63  Cu  [ He ],63 Cu [He]\nt1,Soil 01,1,2'
    );
    expect(() => processBatch(batchInputs({ instrumentExport }), { logger: quiet })).toThrow(
      HeaderCollisionError
    );
  });

  it('rejects an invalid configuration', () => {
    expect(() =>
      processBatch(batchInputs(), {
        config: { bands: { calibration: { low: 120, high: 80 } } },
        logger: quiet,
      })
    ).toThrow(ConfigError);
  });
});
