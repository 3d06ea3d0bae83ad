import { ACQ_TIME_KEYWORDS, GROUPING_ROW_MIN_BLANKS, SAMPLE_KEYWORDS } from './constants';
import { DEFAULT_CONFIG, type BatchConfig } from './config';
import { parseChannelHeaders } from './channels';
import type { DiagnosticLog } from './diagnostics';
import { SchemaError } from './errors';
import { normalizeSampleId } from './sampleId';
import { readMatrix, toNumber, type Matrix, type TableSource } from './tables';
import type { ChannelDescriptor, SampleMeasurement } from './types';

// One named way of locating a metadata column; returns a column index or null
export interface ColumnHeuristic {
  name: string;
  find: (headers: readonly string[], exclude: number | null) => number | null;
}

function keywordHeuristic(name: string, keywords: readonly string[], depth: number): ColumnHeuristic {
  return {
    name,
    find: (headers, exclude) => {
      const limit = Math.min(depth, headers.length);
      for (let i = 0; i < limit; i++) {
        if (i === exclude) continue;
        const lower = headers[i].toLowerCase();
        if (keywords.some(kw => lower.includes(kw))) return i;
      }
      return null;
    },
  };
}

/**
 * Acquisition time: a "date"/"time"/"acq" header among the first columns,
 * else the first column.
 */
export function acquisitionTimeHeuristics(depth: number): ColumnHeuristic[] {
  return [
    keywordHeuristic('acq-time-keyword', ACQ_TIME_KEYWORDS, depth),
    { name: 'first-column', find: headers => (headers.length > 0 ? 0 : null) },
  ];
}

/**
 * Sample name: a "sample"/"name" header among the first columns,
 * else the second column, else the first.
 */
export function sampleNameHeuristics(depth: number): ColumnHeuristic[] {
  return [
    keywordHeuristic('sample-keyword', SAMPLE_KEYWORDS, depth),
    {
      name: 'second-column',
      find: (headers, exclude) => (headers.length > 1 && exclude !== 1 ? 1 : null),
    },
    { name: 'first-column', find: headers => (headers.length > 0 ? 0 : null) },
  ];
}

export interface ColumnMatch {
  index: number;
  heuristic: string;
}

/**
 * Try heuristics in order; the first that yields a column wins.
 */
export function discoverColumn(
  headers: readonly string[],
  heuristics: readonly ColumnHeuristic[],
  exclude: number | null = null
): ColumnMatch | null {
  for (const heuristic of heuristics) {
    const index = heuristic.find(headers, exclude);
    if (index !== null) return { index, heuristic: heuristic.name };
  }
  return null;
}

/**
 * MassHunter may write a grouping row above the real header; it shows up as
 * mostly blank cells at the start of the first row.
 */
export function findHeaderRow(rows: Matrix, depth: number): number {
  if (rows.length < 2) return 0;
  const blanks = rows[0].slice(0, depth).filter(c => !c.trim()).length;
  return blanks >= GROUPING_ROW_MIN_BLANKS ? 1 : 0;
}

/**
 * True when every non-metadata cell under a named header equals the unit label.
 */
export function isUnitLabelRow(
  row: readonly string[],
  headers: readonly string[],
  metaColumns: ReadonlySet<number>,
  unitLabel: string
): boolean {
  let checked = 0;
  for (let i = 0; i < headers.length; i++) {
    if (metaColumns.has(i) || !headers[i].trim()) continue;
    if ((row[i] ?? '').trim() !== unitLabel) return false;
    checked++;
  }
  return checked > 0;
}

const EXPORT_SCHEMA = ['acquisition time', 'sample name', '<mass> <element> [ <gas> ]...'];

export interface InstrumentExport {
  headers: string[];
  acqTimeColumn: number;
  sampleColumn: number;
  rows: Matrix;
  droppedUnitRow: boolean;
}

/**
 * Locate header, metadata columns and data rows of an instrument export.
 */
export function loadInstrumentExport(
  source: TableSource,
  config: BatchConfig = DEFAULT_CONFIG,
  diagnostics?: DiagnosticLog
): InstrumentExport {
  const matrix = readMatrix(source);
  if (matrix.length === 0) {
    throw new SchemaError('Instrument export is empty', 'instrument export', EXPORT_SCHEMA, []);
  }

  const headerRow = findHeaderRow(matrix, config.headerSearchDepth);
  if (headerRow > 0) {
    diagnostics?.debug('load', 'Detected grouping row above header', { headerRow: headerRow + 1 });
  }
  const headers = matrix[headerRow].map(h => h.trim());

  const acq = discoverColumn(headers, acquisitionTimeHeuristics(config.headerSearchDepth));
  const sample = discoverColumn(
    headers,
    sampleNameHeuristics(config.headerSearchDepth),
    acq?.index ?? null
  );
  if (!acq || !sample) {
    throw SchemaError.missingColumns('instrument export', EXPORT_SCHEMA, headers);
  }
  diagnostics?.debug('load', 'Resolved metadata columns', {
    acqTime: headers[acq.index],
    acqTimeHeuristic: acq.heuristic,
    sample: headers[sample.index],
    sampleHeuristic: sample.heuristic,
  });

  let rows = matrix.slice(headerRow + 1);
  const metaColumns = new Set([acq.index, sample.index]);
  const droppedUnitRow =
    rows.length > 0 && isUnitLabelRow(rows[0], headers, metaColumns, config.unitLabel);
  if (droppedUnitRow) {
    rows = rows.slice(1);
  }

  return {
    headers,
    acqTimeColumn: acq.index,
    sampleColumn: sample.index,
    rows,
    droppedUnitRow,
  };
}

export interface ReshapeResult {
  channels: ChannelDescriptor[];
  measurements: SampleMeasurement[];
}

/**
 * Wide (sample × channel column) to long (one row per sample × channel).
 */
export function reshapeExport(data: InstrumentExport, diagnostics?: DiagnosticLog): ReshapeResult {
  const channelColumns: number[] = [];
  const channelHeaders: string[] = [];
  data.headers.forEach((header, i) => {
    if (i === data.acqTimeColumn || i === data.sampleColumn) return;
    channelColumns.push(i);
    channelHeaders.push(header);
  });

  const { channels, skipped } = parseChannelHeaders(channelHeaders);
  for (const header of skipped) {
    diagnostics?.warn('channels', `Skipping column '${header}': not a channel header`, { header });
  }

  const columnByHeader = new Map<string, number>();
  channelHeaders.forEach((header, i) => {
    if (!columnByHeader.has(header)) columnByHeader.set(header, channelColumns[i]);
  });

  const measurements: SampleMeasurement[] = [];
  for (const channel of channels) {
    const column = columnByHeader.get(channel.originalHeader);
    if (column === undefined) continue;
    for (const row of data.rows) {
      measurements.push({
        sampleId: normalizeSampleId(row[data.sampleColumn]),
        acqTime: (row[data.acqTimeColumn] ?? '').trim(),
        channelId: channel.channelId,
        element: channel.element,
        raw: toNumber(row[column]),
      });
    }
  }

  diagnostics?.info('reshape', 'Reshaped instrument export', {
    samples: data.rows.length,
    channels: channels.length,
    skippedColumns: skipped.length,
  });

  return { channels, measurements };
}
