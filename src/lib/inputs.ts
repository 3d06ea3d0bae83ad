import { z } from 'zod';
import { COLUMN_ALIASES, ELEMENT_SYMBOL_PATTERN, REFERENCE_UNIT_FACTOR } from './constants';
import type { DiagnosticLog } from './diagnostics';
import { SchemaError } from './errors';
import { normalizeSampleId } from './sampleId';
import { KeyedTable, readMatrix, toNumber, type TableSource } from './tables';
import type {
  CalibrationTarget,
  DilutionFactor,
  ReferenceAssignment,
  ReferenceValue,
} from './types';

const DILUTION_SCHEMA = ['sample_id', 'df'];
const CALIBRATION_SCHEMA = ['element', 'icv_target', 'ref_target (optional)'];
const REFERENCE_LONG_SCHEMA = ['ref_name (optional)', 'element', 'target_value'];
const ASSIGNMENT_SCHEMA = ['sample_id', 'ref_name'];

const DilutionRowSchema = z.object({
  sampleId: z.string().min(1),
  df: z
    .number({ required_error: 'df must be a number', invalid_type_error: 'df must be a number' })
    .positive('df must be positive'),
});

const ElementSchema = z.string().trim().min(1);

/**
 * Dilution/digestion factors keyed by normalized sample id.
 * Blank rows are ignored; a repeated sample keeps its first factor.
 */
export function loadDilutionFactors(source: TableSource, diagnostics?: DiagnosticLog): DilutionFactor[] {
  const table = new KeyedTable('Dilution factor', readMatrix(source));
  const sampleCol = table.require(COLUMN_ALIASES.sampleId, DILUTION_SCHEMA);
  const dfCol = table.require(COLUMN_ALIASES.df, DILUTION_SCHEMA);

  const factors: DilutionFactor[] = [];
  const seen = new Set<string>();

  table.rows.forEach((row, i) => {
    const sampleId = normalizeSampleId(row[sampleCol]);
    if (!sampleId) return;

    const parsed = DilutionRowSchema.safeParse({ sampleId, df: toNumber(row[dfCol]) ?? undefined });
    if (!parsed.success) {
      const reason = parsed.error.issues[0]?.message ?? 'invalid value';
      throw new SchemaError(
        `Dilution factor table row ${i + 2} (${sampleId}): ${reason}, got '${row[dfCol]}'`,
        table.name,
        DILUTION_SCHEMA,
        table.headers
      );
    }

    if (seen.has(sampleId)) {
      diagnostics?.warn('load', `Duplicate dilution factor for ${sampleId}; keeping the first`, {
        sampleId,
      });
      return;
    }
    seen.add(sampleId);
    factors.push(parsed.data);
  });

  return factors;
}

/**
 * ICV targets per element, with an optional per-element reference target.
 */
export function loadCalibrationTargets(source: TableSource): CalibrationTarget[] {
  const table = new KeyedTable('Calibration target', readMatrix(source));
  const elementCol = table.require(COLUMN_ALIASES.element, CALIBRATION_SCHEMA);
  const targetCol = table.require(COLUMN_ALIASES.calibrationTarget, CALIBRATION_SCHEMA);
  const refCol = table.find(COLUMN_ALIASES.referenceTarget);

  const targets: CalibrationTarget[] = [];
  for (const row of table.rows) {
    const element = ElementSchema.safeParse(row[elementCol]);
    if (!element.success) continue;
    targets.push({
      element: element.data,
      calibrationTarget: toNumber(row[targetCol]),
      referenceTarget: refCol >= 0 ? toNumber(row[refCol]) : null,
    });
  }
  return targets;
}

export interface ReferenceTable {
  // true when values are keyed by reference material name as well as element
  named: boolean;
  values: ReferenceValue[];
}

/**
 * Certified reference values. Two layouts:
 *
 * Long: ref_name (optional), element, target_value, used as given.
 * Wide: row 1 element symbols (from column 3), row 2 element names, row 3 units,
 *       rows 4+ reference name in column 2 and one mg/kg value per element.
 *       Wide values are converted to µg/kg.
 */
export function loadReferenceValues(source: TableSource, diagnostics?: DiagnosticLog): ReferenceTable {
  const matrix = readMatrix(source);
  const table = new KeyedTable('Reference value', matrix);

  if (table.has(COLUMN_ALIASES.element) && table.has(COLUMN_ALIASES.targetValue)) {
    return readLongReferenceValues(table, diagnostics);
  }

  const values = hasWideReferenceShape(table) ? convertWideReferenceValues(matrix) : [];
  if (values.length === 0) {
    throw SchemaError.missingColumns(table.name, REFERENCE_LONG_SCHEMA, table.headers);
  }
  diagnostics?.info('load', 'Converted wide reference value table', {
    rows: values.length,
    references: new Set(values.map(v => v.referenceName)).size,
  });
  return { named: true, values };
}

function readLongReferenceValues(table: KeyedTable, diagnostics?: DiagnosticLog): ReferenceTable {
  const elementCol = table.find(COLUMN_ALIASES.element);
  const valueCol = table.find(COLUMN_ALIASES.targetValue);
  const nameCol = table.find(COLUMN_ALIASES.referenceName);

  const values: ReferenceValue[] = [];
  table.rows.forEach((row, i) => {
    const element = (row[elementCol] ?? '').trim();
    const target = toNumber(row[valueCol]);
    if (!element || target === null) {
      diagnostics?.warn('load', `Reference value row ${i + 2} has no element or numeric target`, {
        row: i + 2,
      });
      return;
    }
    values.push({
      referenceName: nameCol >= 0 ? (row[nameCol] ?? '').trim() || null : null,
      element,
      targetValue: target,
    });
  });

  return { named: nameCol >= 0, values };
}

/**
 * Wide sheets carry no long-format columns and have element symbols in row 1 from column 3.
 */
function hasWideReferenceShape(table: KeyedTable): boolean {
  if (
    table.has(COLUMN_ALIASES.element) ||
    table.has(COLUMN_ALIASES.referenceName) ||
    table.has(COLUMN_ALIASES.targetValue)
  ) {
    return false;
  }
  const symbols = table.headers.slice(2).filter(Boolean);
  return symbols.length > 0 && symbols.every(s => ELEMENT_SYMBOL_PATTERN.test(s));
}

/**
 * Wide certificate matrix (one column per element) to long rows in µg/kg.
 */
export function convertWideReferenceValues(matrix: string[][]): ReferenceValue[] {
  if (matrix.length < 4) return [];
  const symbols = matrix[0].slice(2).map(s => s.trim());

  const values: ReferenceValue[] = [];
  for (const row of matrix.slice(3)) {
    const referenceName = (row[1] ?? '').trim();
    if (!referenceName) continue;

    symbols.forEach((element, i) => {
      if (!element) return;
      const value = toNumber(row[i + 2]);
      if (value === null) return;
      values.push({ referenceName, element, targetValue: value * REFERENCE_UNIT_FACTOR });
    });
  }
  return values;
}

/**
 * Explicit sample id → reference material name lookup.
 */
export function loadReferenceAssignments(source: TableSource): ReferenceAssignment[] {
  const table = new KeyedTable('Reference assignment', readMatrix(source));
  const sampleCol = table.require(COLUMN_ALIASES.sampleId, ASSIGNMENT_SCHEMA);
  const nameCol = table.require(COLUMN_ALIASES.referenceName, ASSIGNMENT_SCHEMA);

  const assignments: ReferenceAssignment[] = [];
  for (const row of table.rows) {
    const sampleId = normalizeSampleId(row[sampleCol]);
    const referenceName = (row[nameCol] ?? '').trim();
    if (sampleId && referenceName) assignments.push({ sampleId, referenceName });
  }
  return assignments;
}
