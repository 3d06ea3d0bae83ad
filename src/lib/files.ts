import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { BatchInputs } from './pipeline';
import type { TableSource } from './tables';

export interface BatchPaths {
  instrumentExport: string;
  dilutionFactors: string;
  calibrationTargets: string;
  referenceValues?: string | null;
  referenceAssignments?: string | null;
}

const WORKBOOK_EXTENSIONS = new Set(['.xlsx', '.xls']);

/**
 * Read one input file; workbooks by extension, everything else as UTF-8 text.
 */
export async function readTableSource(path: string): Promise<TableSource> {
  if (WORKBOOK_EXTENSIONS.has(extname(path).toLowerCase())) {
    return { format: 'xlsx', data: await readFile(path) };
  }
  return { format: 'csv', text: await readFile(path, 'utf8') };
}

async function readOptional(path: string | null | undefined): Promise<TableSource | null> {
  return path ? readTableSource(path) : null;
}

export async function readBatchInputs(paths: BatchPaths): Promise<BatchInputs> {
  const [instrumentExport, dilutionFactors, calibrationTargets, referenceValues, referenceAssignments] =
    await Promise.all([
      readTableSource(paths.instrumentExport),
      readTableSource(paths.dilutionFactors),
      readTableSource(paths.calibrationTargets),
      readOptional(paths.referenceValues),
      readOptional(paths.referenceAssignments),
    ]);

  return { instrumentExport, dilutionFactors, calibrationTargets, referenceValues, referenceAssignments };
}
