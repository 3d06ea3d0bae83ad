import { correctConcentrations } from './chemistry';
import { selectBestChannels } from './channelSelection';
import { resolveConfig, type BatchConfig, type BatchConfigInput } from './config';
import { classifyBelowDetection } from './detection';
import { DiagnosticLog, type Diagnostic } from './diagnostics';
import {
  loadCalibrationTargets,
  loadDilutionFactors,
  loadReferenceAssignments,
  loadReferenceValues,
} from './inputs';
import { logger as rootLogger, type Logger } from './logger';
import { loadInstrumentExport, reshapeExport } from './parser';
import { computeRecoveries } from './recovery';
import { pivotByElement, sampleResults, summarizeBatch } from './report';
import { computeBlankStatistics } from './statistics';
import type { TableSource } from './tables';
import type {
  BatchSummary,
  BelowDetectionRecord,
  BlankStatistics,
  ChannelDescriptor,
  ChannelSelection,
  CorrectedMeasurement,
  RecoveryTables,
  SampleMeasurement,
  WideSampleRow,
} from './types';

export interface BatchInputs {
  instrumentExport: TableSource;
  dilutionFactors: TableSource;
  calibrationTargets: TableSource;
  referenceValues?: TableSource | null;
  referenceAssignments?: TableSource | null;
}

export interface BatchResult {
  config: BatchConfig;
  channels: ChannelDescriptor[];
  measurements: SampleMeasurement[];
  blankStatistics: BlankStatistics;
  corrected: CorrectedMeasurement[];
  unmatchedSamples: string[];
  recoveries: RecoveryTables;
  selections: ChannelSelection[];
  belowDetection: BelowDetectionRecord[];
  sampleResults: CorrectedMeasurement[];
  wide: WideSampleRow[];
  summary: BatchSummary;
  diagnostics: Diagnostic[];
}

export interface ProcessOptions {
  config?: BatchConfigInput;
  logger?: Logger;
}

/**
 * Run one instrument batch end to end.
 *
 * Throws on unusable inputs (missing columns, invalid dilution factors,
 * colliding channel headers); every other anomaly is reported in the result.
 */
export function processBatch(inputs: BatchInputs, options: ProcessOptions = {}): BatchResult {
  const config = resolveConfig(options.config);
  const log = options.logger ?? rootLogger;
  const diagnostics = new DiagnosticLog(log);

  // load
  const exported = loadInstrumentExport(inputs.instrumentExport, config, diagnostics);
  const dilutionFactors = loadDilutionFactors(inputs.dilutionFactors, diagnostics);
  const calibrationTargets = loadCalibrationTargets(inputs.calibrationTargets);
  const referenceValues = inputs.referenceValues
    ? loadReferenceValues(inputs.referenceValues, diagnostics)
    : null;
  const referenceAssignments = inputs.referenceAssignments
    ? loadReferenceAssignments(inputs.referenceAssignments)
    : [];

  // parse
  const { channels, measurements } = reshapeExport(exported, diagnostics);

  // blanks
  const blankStatistics = computeBlankStatistics(measurements, config.markers);
  const degenerate = blankStatistics.channel.filter(s => s.detectionLimit === null).map(s => s.key);
  if (degenerate.length > 0) {
    diagnostics.warn('blanks', 'Fewer than two blank values; detection limit undefined', {
      channels: degenerate,
    });
  }

  // correct
  const { table: corrected, unmatchedSamples } = correctConcentrations(
    measurements,
    dilutionFactors,
    blankStatistics.channel,
    { outputUnit: config.outputUnit, markers: config.markers }
  );
  if (unmatchedSamples.length > 0) {
    diagnostics.warn(
      'correction',
      `${unmatchedSamples.length} samples not found in dilution factor table (using df=1.0)`,
      { unmatchedSamples }
    );
  }

  // QC
  const recoveries = computeRecoveries(corrected, {
    calibrationTargets,
    referenceValues,
    referenceAssignments,
    markers: config.markers,
  });
  const missingTargets = new Set(
    [...recoveries.calibration, ...recoveries.reference]
      .filter(r => r.target === null)
      .map(r => `${r.kind}:${r.element}`)
  );
  if (missingTargets.size > 0) {
    diagnostics.warn('recovery', 'No recovery target for some QC rows', {
      missing: Array.from(missingTargets),
    });
  }

  const selections = selectBestChannels(
    channels,
    recoveries.calibration,
    recoveries.reference,
    config.bands
  );
  for (const s of selections) {
    if (s.selectedChannelId === null) {
      diagnostics.warn('selection', `No channel selected for ${s.element}`, {
        element: s.element,
        basis: s.basis,
      });
    }
  }

  // BDL
  const belowDetection = classifyBelowDetection(corrected, blankStatistics.element);
  diagnostics.info('detection', `${belowDetection.length} values below the detection limit`, {
    samples: new Set(belowDetection.map(r => r.sampleId)).size,
  });

  // report tables
  const samples = sampleResults(corrected, config.markers);
  const wide = pivotByElement(samples, channels, selections, belowDetection, unmatchedSamples);
  const summary = summarizeBatch(
    corrected,
    samples,
    recoveries,
    selections,
    unmatchedSamples,
    config.markers
  );
  diagnostics.info('report', 'Batch processed', {
    samples: summary.totalSamples,
    elements: summary.elementsAnalyzed,
  });

  return {
    config,
    channels,
    measurements,
    blankStatistics,
    corrected,
    unmatchedSamples,
    recoveries,
    selections,
    belowDetection,
    sampleResults: samples,
    wide,
    summary,
    diagnostics: diagnostics.list(),
  };
}
