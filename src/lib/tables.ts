import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { SchemaError } from './errors';

// Delimited text, or the bytes of a .xlsx/.xls workbook (first sheet is read)
export type TableSource =
  | { format: 'csv'; text: string }
  | { format: 'xlsx'; data: Uint8Array };

export type Matrix = string[][];

export function csvSource(text: string): TableSource {
  return { format: 'csv', text };
}

function cellToString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Read a table source into a rectangular matrix of strings.
 * Fully empty rows are dropped; short rows are padded with ''.
 */
export function readMatrix(source: TableSource): Matrix {
  let rows: Matrix;

  if (source.format === 'csv') {
    const result = Papa.parse<string[]>(source.text.replace(/^\uFEFF/, ''), {
      skipEmptyLines: 'greedy',
    });
    rows = result.data;
  } else {
    const workbook = XLSX.read(source.data, { type: 'array' });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    if (!sheet) return [];
    const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: '' });
    rows = raw
      .map(row => row.map(cellToString))
      .filter(row => row.some(cell => cell.trim() !== ''));
  }

  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  return rows.map(row =>
    row.length === width ? row : [...row, ...Array.from({ length: width - row.length }, () => '')]
  );
}

/**
 * Parse a numeric cell; blank or non-numeric text yields null.
 */
export function toNumber(value: string | undefined): number | null {
  const s = (value ?? '').trim();
  if (!s) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/**
 * Header-keyed view over a matrix whose first row is the header.
 */
export class KeyedTable {
  readonly headers: string[];
  readonly rows: Matrix;
  private readonly index = new Map<string, number>();

  constructor(
    readonly name: string,
    matrix: Matrix
  ) {
    this.headers = (matrix[0] ?? []).map(h => h.trim());
    this.rows = matrix.slice(1);
    this.headers.forEach((h, i) => {
      const key = h.toLowerCase();
      if (!this.index.has(key)) this.index.set(key, i);
    });
  }

  /**
   * Index of the first header matching one of the aliases, or -1.
   */
  find(aliases: readonly string[]): number {
    for (const alias of aliases) {
      const idx = this.index.get(alias.toLowerCase());
      if (idx !== undefined) return idx;
    }
    return -1;
  }

  has(aliases: readonly string[]): boolean {
    return this.find(aliases) >= 0;
  }

  /**
   * Like find(), but a missing column is a schema error naming `expected`.
   */
  require(aliases: readonly string[], expected: readonly string[]): number {
    const idx = this.find(aliases);
    if (idx < 0) throw SchemaError.missingColumns(this.name, expected, this.headers);
    return idx;
  }
}
