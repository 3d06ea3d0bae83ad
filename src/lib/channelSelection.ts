import { DEFAULT_CONFIG, type QcBands } from './config';
import type { ChannelDescriptor, ChannelSelection, RecoveryRecord } from './types';

export interface ChannelRecovery {
  channelId: string;
  calibrationRecovery: number | null;
  referenceRecovery: number | null;
  calibrationPass: boolean;
  referencePass: boolean;
}

export function withinBand(value: number | null, band: { low: number; high: number }): boolean {
  return value !== null && value >= band.low && value <= band.high;
}

const byChannelId = (a: ChannelRecovery, b: ChannelRecovery): number =>
  a.channelId < b.channelId ? -1 : a.channelId > b.channelId ? 1 : 0;

function meanOfDefined(values: readonly (number | null)[]): number | null {
  const defined = values.filter((v): v is number => v !== null);
  if (defined.length === 0) return null;
  return defined.reduce((a, b) => a + b, 0) / defined.length;
}

function groupByChannel(records: readonly RecoveryRecord[]): Map<string, (number | null)[]> {
  const groups = new Map<string, (number | null)[]>();
  for (const r of records) {
    const list = groups.get(r.channelId);
    if (list) list.push(r.recovery);
    else groups.set(r.channelId, [r.recovery]);
  }
  return groups;
}

/**
 * Outer join of calibration and reference recoveries on channelId, one row
 * per channel sorted by channelId. Repeated QC runs on a channel are averaged.
 */
export function collectChannelRecoveries(
  calibration: readonly RecoveryRecord[],
  reference: readonly RecoveryRecord[],
  bands: QcBands = DEFAULT_CONFIG.bands
): ChannelRecovery[] {
  const icv = groupByChannel(calibration);
  const ref = groupByChannel(reference);
  const channelIds = Array.from(new Set([...icv.keys(), ...ref.keys()])).sort();

  return channelIds.map(channelId => {
    const calibrationRecovery = meanOfDefined(icv.get(channelId) ?? []);
    const referenceRecovery = meanOfDefined(ref.get(channelId) ?? []);
    return {
      channelId,
      calibrationRecovery,
      referenceRecovery,
      calibrationPass: withinBand(calibrationRecovery, bands.calibration),
      referencePass: withinBand(referenceRecovery, bands.reference),
    };
  });
}

/**
 * Pick the authoritative channel among one element's candidates.
 *
 * 1. first channel (by channelId) passing both bands
 * 2. else the channel whose reference recovery is closest to 100%
 * 3. else no selection
 */
export function chooseChannel(
  element: string,
  candidates: readonly ChannelRecovery[]
): ChannelSelection {
  if (candidates.length === 0) {
    return {
      element,
      selectedChannelId: null,
      calibrationRecovery: null,
      calibrationPass: false,
      referenceRecovery: null,
      referencePass: false,
      basis: 'no-qc-data',
    };
  }

  const sorted = [...candidates].sort(byChannelId);

  const both = sorted.find(c => c.calibrationPass && c.referencePass);
  if (both) return toSelection(element, both, 'passed-both');

  let closest: ChannelRecovery | null = null;
  let bestDistance = Infinity;
  for (const c of sorted) {
    if (c.referenceRecovery === null) continue;
    const distance = Math.abs(c.referenceRecovery - 100);
    // strict < keeps the lexicographically first channel on ties
    if (distance < bestDistance) {
      bestDistance = distance;
      closest = c;
    }
  }
  if (closest) return toSelection(element, closest, 'closest-reference');

  return {
    element,
    selectedChannelId: null,
    calibrationRecovery: null,
    calibrationPass: false,
    referenceRecovery: null,
    referencePass: false,
    basis: 'no-reference-recovery',
  };
}

function toSelection(
  element: string,
  channel: ChannelRecovery,
  basis: ChannelSelection['basis']
): ChannelSelection {
  return {
    element,
    selectedChannelId: channel.channelId,
    calibrationRecovery: channel.calibrationRecovery,
    calibrationPass: channel.calibrationPass,
    referenceRecovery: channel.referenceRecovery,
    referencePass: channel.referencePass,
    basis,
  };
}

/**
 * One selection record per element, in the order elements first appear among the channels.
 */
export function selectBestChannels(
  channels: readonly ChannelDescriptor[],
  calibration: readonly RecoveryRecord[],
  reference: readonly RecoveryRecord[],
  bands: QcBands = DEFAULT_CONFIG.bands
): ChannelSelection[] {
  const elements = Array.from(new Set(channels.map(c => c.element)));

  return elements.map(element => {
    const candidates = collectChannelRecoveries(
      calibration.filter(r => r.element === element),
      reference.filter(r => r.element === element),
      bands
    );
    return chooseChannel(element, candidates);
  });
}
