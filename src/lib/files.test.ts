import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { CALIBRATION_CSV, EXPORT_CSV } from '@/test/batchFixture';
import { readBatchInputs, readTableSource } from './files';
import { loadDilutionFactors } from './inputs';

let dir = '';

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'icpms-batch-'));

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet([
      ['sample_id', 'df'],
      ['Soil 01', 4],
    ]),
    'Sheet1'
  );
  const data: Uint8Array = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });

  await Promise.all([
    writeFile(join(dir, 'export.csv'), EXPORT_CSV),
    writeFile(join(dir, 'dilutions.XLSX'), data),
    writeFile(join(dir, 'targets.csv'), CALIBRATION_CSV),
  ]);
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('readTableSource', () => {
  it('reads text files as csv', async () => {
    const source = await readTableSource(join(dir, 'targets.csv'));
    expect(source).toEqual({ format: 'csv', text: CALIBRATION_CSV });
  });

  it('reads workbooks by extension', async () => {
    const source = await readTableSource(join(dir, 'dilutions.XLSX'));
    expect(source.format).toBe('xlsx');
    expect(loadDilutionFactors(source)).toEqual([{ sampleId: 'SOIL_01', df: 4 }]);
  });
});

describe('readBatchInputs', () => {
  it('leaves optional inputs empty', async () => {
    const inputs = await readBatchInputs({
      instrumentExport: join(dir, 'export.csv'),
      dilutionFactors: join(dir, 'dilutions.XLSX'),
      calibrationTargets: join(dir, 'targets.csv'),
    });
    expect(inputs.instrumentExport).toEqual({ format: 'csv', text: EXPORT_CSV });
    expect(inputs.referenceValues).toBeNull();
    expect(inputs.referenceAssignments).toBeNull();
  });
});
