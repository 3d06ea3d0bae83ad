// Gas modes are free text ("He", "O2", "No Gas", ...)
export type GasMode = string;

// Parsed instrument column header
export interface ChannelDescriptor {
  originalHeader: string;
  channelId: string;
  element: string;
  nominalMass: number;
  analyzedMass: number;
  gasMode: GasMode;
  isMassShift: boolean;
}

// One row per sample × channel
export interface SampleMeasurement {
  sampleId: string;
  acqTime: string;
  channelId: string;
  element: string;
  raw: number | null; // null when the export cell was not numeric
}

export interface DilutionFactor {
  sampleId: string;
  df: number;
}

export interface CalibrationTarget {
  element: string;
  calibrationTarget: number | null;
  referenceTarget: number | null;
}

// Long-form certified value; referenceName is null for single-reference tables
export interface ReferenceValue {
  referenceName: string | null;
  element: string;
  targetValue: number; // µg/kg
}

export interface ReferenceAssignment {
  sampleId: string;
  referenceName: string;
}

export type BlankScope = 'channel' | 'element';

export interface BlankStatistic {
  scope: BlankScope;
  key: string; // channelId or element
  mean: number | null;
  standardDeviation: number | null;
  detectionLimit: number | null; // 3 × SD
  sampleCount: number;
}

export interface BlankStatistics {
  channel: BlankStatistic[];
  element: BlankStatistic[];
}

export interface CorrectedMeasurement extends SampleMeasurement {
  dilutionFactor: number;
  blankMean: number;
  corrected: number | null; // ≥ 0 whenever raw is present
}

export interface CorrectionResult {
  table: CorrectedMeasurement[];
  unmatchedSamples: string[];
}

export type RecoveryKind = 'calibration-verification' | 'reference-material';

export interface RecoveryRecord {
  kind: RecoveryKind;
  sampleId: string;
  channelId: string;
  element: string;
  referenceName: string | null;
  corrected: number | null;
  target: number | null;
  recovery: number | null; // percent
}

export interface RecoveryTables {
  calibration: RecoveryRecord[];
  reference: RecoveryRecord[];
}

export type SelectionBasis =
  | 'passed-both'
  | 'closest-reference'
  | 'no-reference-recovery'
  | 'no-qc-data';

export interface ChannelSelection {
  element: string;
  selectedChannelId: string | null;
  calibrationRecovery: number | null;
  calibrationPass: boolean;
  referenceRecovery: number | null;
  referencePass: boolean;
  basis: SelectionBasis;
}

export interface BelowDetectionRecord {
  sampleId: string;
  element: string;
  channelId: string;
  raw: number;
  blankMean: number;
  detectionLimit: number;
}

export type SampleCategory =
  | 'blank'
  | 'calibration-verification'
  | 'calibration-blank'
  | 'reference-material'
  | 'duplicate'
  | 'sample';

// One row per sample, one value per element
export interface WideSampleRow {
  sampleId: string;
  values: Record<string, number | null>;
  channels: Record<string, string>; // element -> channel used
  belowDetection: string[]; // elements
  unmatched: boolean;
}

export interface BatchSummary {
  totalSamples: number;
  totalCalibrationVerification: number;
  totalReference: number;
  totalBlanks: number;
  calibrationPassRate: number;
  referencePassRate: number;
  elementsAnalyzed: number;
  unmatchedSamples: string[];
}
