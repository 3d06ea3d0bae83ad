import type { Markers } from './config';
import type { SampleCategory } from './types';

/**
 * Canonical sample id used for every cross-table join.
 * "  icv 1 " -> "ICV_1"
 */
export function normalizeSampleId(raw: string | null | undefined): string {
  return (raw ?? '').trim().toUpperCase().replace(/ /g, '_');
}

/**
 * Classify a normalized sample id by the lab's naming markers.
 * Checked most specific first, so "ICV_BLANK" is a blank.
 */
export function classifySample(sampleId: string, markers: Markers): SampleCategory {
  if (sampleId.includes(markers.blank)) return 'blank';
  if (sampleId.includes(markers.calibrationBlank)) return 'calibration-blank';
  if (sampleId.includes(markers.calibrationVerification)) return 'calibration-verification';
  if (sampleId.startsWith(markers.referencePrefix)) return 'reference-material';
  if (sampleId.includes(markers.duplicate)) return 'duplicate';
  return 'sample';
}

export function isBlank(sampleId: string, markers: Markers): boolean {
  return sampleId.includes(markers.blank);
}

export function isCalibrationVerification(sampleId: string, markers: Markers): boolean {
  return sampleId.includes(markers.calibrationVerification);
}

export function isReferenceMaterial(sampleId: string, markers: Markers): boolean {
  return sampleId.startsWith(markers.referencePrefix);
}

/**
 * QC samples are expected to have no dilution factor.
 */
export function isQualityControl(sampleId: string, markers: Markers): boolean {
  return (
    sampleId.includes(markers.calibrationVerification) ||
    sampleId.includes(markers.calibrationBlank) ||
    sampleId.includes(markers.blank) ||
    isReferenceMaterial(sampleId, markers)
  );
}

/**
 * Reference name from "<PREFIX>_<NAME>_<replicate>".
 * Examples:
 * - "SRM_DOLT-5_1" -> "DOLT-5"
 * - "SRM_NIST_2710_1" -> "NIST_2710"
 * - "SRM_DOLT-5" -> null (no replicate index)
 */
export function extractReferenceName(sampleId: string, prefix: string): string | null {
  if (!sampleId.startsWith(prefix)) return null;
  const head = prefix.replace(/_+$/, '');
  const parts = sampleId.split('_');
  if (parts.length < 3 || parts[0] !== head) return null;
  return parts.slice(1, -1).join('_');
}
